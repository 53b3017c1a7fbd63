// ─────────────────────────────────────────────────────────────
// MELL Workbench  ·  Configuration
// Environment-driven defaults for search and normalization
// ─────────────────────────────────────────────────────────────

import { z } from 'zod';

export const DEFAULT_MAX_DEPTH = 100;
export const DEFAULT_MAX_STEPS = 1000;

const blankAsUnset = (v: unknown): unknown => (typeof v === 'string' && v.trim() === '' ? undefined : v);

const count = (fallback: number) =>
    z.preprocess(blankAsUnset, z.coerce.number().int().nonnegative().default(fallback));

const EnvSchema = z.object({
    MELL_MAX_DEPTH: count(DEFAULT_MAX_DEPTH),
    MELL_MAX_STEPS: count(DEFAULT_MAX_STEPS),
    MELL_DEBUG: z.preprocess(blankAsUnset, z.enum(['0', '1', 'true', 'false']).optional()),
});

export interface WorkbenchConfig {
    /** Depth bound for proof search. */
    maxDepth: number;
    /** Reduction budget for bounded normalization. */
    maxSteps: number;
    debug: boolean;
}

export class ConfigError extends Error {
    constructor(readonly issues: string[]) {
        super(`Invalid configuration: ${issues.join('; ')}`);
        this.name = 'ConfigError';
    }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): WorkbenchConfig {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        throw new ConfigError(parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`));
    }
    const { MELL_MAX_DEPTH, MELL_MAX_STEPS, MELL_DEBUG } = parsed.data;
    return {
        maxDepth: MELL_MAX_DEPTH,
        maxSteps: MELL_MAX_STEPS,
        debug: MELL_DEBUG === '1' || MELL_DEBUG === 'true',
    };
}

let cached: WorkbenchConfig | undefined;

/** Process-wide configuration, read once from `process.env`. */
export function getConfig(): WorkbenchConfig {
    cached ??= loadConfig();
    return cached;
}

export function resetConfigCache(): void {
    cached = undefined;
}
