// ─────────────────────────────────────────────────────────────
// MELL Workbench  ·  Public API
// ─────────────────────────────────────────────────────────────

export * from './core/ir';
export * from './core/formula';
export * from './core/sequent';
export * from './core/proof';
export * from './core/term';
export * from './core/pretty';
export * from './core/serialize';
export * from './engine/prover';
export * from './engine/verifier';
export * from './engine/extractor';
export * from './engine/normalizer';
export * from './parser/formula';
export * from './emitters/ascii';
export * from './emitters/latex';
export * from './emitters/dot';
export * from './emitters/html';
export * from './emitters/typescript';
export { loadConfig, getConfig, resetConfigCache, ConfigError, type WorkbenchConfig } from './config';
