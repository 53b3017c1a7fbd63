// ─────────────────────────────────────────────────────────────
// MELL Workbench  ·  CLI Helpers
// ─────────────────────────────────────────────────────────────

import { InvalidArgumentError } from 'commander';
import type { Proof, Sequent } from '../core/ir';
import { toOneSided } from '../core/sequent';
import { parseSequent } from '../parser/formula';
import { renderTree } from '../emitters/ascii';
import { renderLatex } from '../emitters/latex';
import { renderDot } from '../emitters/dot';
import { renderHtmlDocument } from '../emitters/html';
import { serializeProof } from '../core/serialize';

export const PROOF_FORMATS = ['tree', 'ascii', 'latex', 'dot', 'html', 'json'] as const;
export type ProofFormat = (typeof PROOF_FORMATS)[number];

/** Commander argument parser for non-negative integers. */
export function parseCount(value: string): number {
    const n = Number(value);
    if (!Number.isInteger(n) || n < 0) throw new InvalidArgumentError('expected a non-negative integer');
    return n;
}

export function parseFormat(value: string): ProofFormat {
    const format = PROOF_FORMATS.find(f => f === value);
    if (!format) throw new InvalidArgumentError(`expected one of ${PROOF_FORMATS.join(', ')}`);
    return format;
}

/** Reads `Γ ⊢ Δ` (or a bare formula list) as a one-sided goal. */
export function goalFrom(input: string): Sequent {
    return toOneSided(parseSequent(input));
}

export function renderProof(proof: Proof, format: ProofFormat): string {
    switch (format) {
        case 'tree': return renderTree(proof);
        case 'ascii': return renderTree(proof, { notation: 'ascii' });
        case 'latex': return renderLatex(proof, { includePreamble: true });
        case 'dot': return renderDot(proof);
        case 'html': return renderHtmlDocument(proof);
        case 'json': return serializeProof(proof);
    }
}
