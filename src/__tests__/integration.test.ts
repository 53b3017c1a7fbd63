// ─────────────────────────────────────────────────────────────
// MELL Workbench  ·  End-to-End Integration Tests
// Full pipeline: text → sequent → proof → verify → term → normal form
// ─────────────────────────────────────────────────────────────

import { describe, it, expect } from 'vitest';
import { parseSequent } from '../parser/formula';
import { toOneSided } from '../core/sequent';
import { prettyTerm } from '../core/pretty';
import { serializeProof, parseProofJson } from '../core/serialize';
import { Prover } from '../engine/prover';
import { verifyProof } from '../engine/verifier';
import { extractTerm } from '../engine/extractor';
import { reduce } from '../engine/normalizer';

// ── Helpers ─────────────────────────────────────────────────

function pipeline(input: string) {
    const goal = toOneSided(parseSequent(input));
    const proof = new Prover({ maxDepth: 20 }).prove(goal);
    if (!proof) return null;
    const term = extractTerm(proof);
    return { proof, term, reduction: reduce(term, 500) };
}

// ── Provable sequents ───────────────────────────────────────

describe('E2E: provable sequents', () => {
    const cases = [
        'A ⊢ A',
        'A ⊗ B ⊢ B ⊗ A',
        'A ⊕ B |- B + A',
        'A & B ⊢ A',
        '⊢ A -o A',
        'A, A ⊸ B ⊢ B',
        'A ⊗ (B ⊕ C) ⊢ (A ⊗ B) ⊕ (A ⊗ C)',
        '!A ⊢ A ⊗ A',
        '!A ⊢ 1',
        '!A ⊢ !!A',
        '!(A & B) ⊢ !A ⊗ !B',
        'A ⊢ A, ⊥',
        '⊢ ⊤, 0',
    ];

    for (const input of cases) {
        it(`proves, verifies and normalizes ${input}`, () => {
            const result = pipeline(input);
            expect(result).not.toBeNull();
            if (!result) return;
            expect(verifyProof(result.proof)).toEqual({ valid: true });
            expect(verifyProof(parseProofJson(serializeProof(result.proof)))).toEqual({ valid: true });
            expect(result.reduction.normal).toBe(true);
        });
    }
});

describe('E2E: unprovable sequents', () => {
    const cases = [
        'A ⊢ B',
        'A ⊢ A ⊗ A',
        'A ⊗ A ⊢ A',
        'A & B ⊢ A ⊗ B',
        '!A ⊢ B',
        '⊢ 0',
    ];

    for (const input of cases) {
        it(`finds no proof of ${input}`, () => {
            expect(pipeline(input)).toBeNull();
        });
    }
});

describe('E2E: terms', () => {
    it('reads modus ponens as a pair of identities', () => {
        const result = pipeline('A, A ⊸ B ⊢ B');
        expect(result && prettyTerm(result.term)).toBe('(λx0. x0, λx1. x1)');
    });

    it('reads the promoted identity', () => {
        const result = pipeline('!A ⊢ !A');
        expect(result && prettyTerm(result.term)).toBe('!(derelict (λx0. x0))');
    });
});
