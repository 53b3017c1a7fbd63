// ─────────────────────────────────────────────────────────────
// MELL Workbench  ·  JSON Interchange Tests
// ─────────────────────────────────────────────────────────────

import { describe, it, expect } from 'vitest';
import { fm, twoSided } from '../core/ir';
import { Prover } from '../engine/prover';
import { serializeProof, parseProofJson, proofFromJson, ProofFormatError } from '../core/serialize';

const A = fm.atom('A');

describe('proof JSON', () => {
    it('reads back a serialized proof', () => {
        const proof = new Prover({ recordFocus: true }).proveTwoSided(twoSided([fm.ofCourse(A)], [fm.tensor(A, A)]));
        expect(proof).not.toBeNull();
        if (proof) expect(parseProofJson(serializeProof(proof))).toEqual(proof);
    });

    it('indents with two spaces', () => {
        const text = serializeProof({ conclusion: { linear: [] }, rule: { tag: 'TopIntro' }, premises: [] });
        expect(text.split('\n')[1]).toBe('  "conclusion": {');
    });

    it('drops unknown fields', () => {
        const proof = proofFromJson({
            conclusion: { linear: [{ tag: 'Top', colour: 'red' }] },
            rule: { tag: 'TopIntro' },
            premises: [],
            comment: 'hand written',
        });
        expect(proof).toEqual({ conclusion: { linear: [{ tag: 'Top' }] }, rule: { tag: 'TopIntro' }, premises: [] });
    });
});

describe('malformed input', () => {
    it('rejects text that is not JSON', () => {
        expect(() => parseProofJson('{')).toThrow(/^Invalid JSON/);
    });

    it('lists schema issues with their paths', () => {
        try {
            proofFromJson({ conclusion: { linear: [] }, rule: { tag: 'Magic' }, premises: [] });
            expect.unreachable();
        } catch (err) {
            expect(err).toBeInstanceOf(ProofFormatError);
            if (err instanceof ProofFormatError) {
                expect(err.issues).toHaveLength(1);
                expect(err.issues[0]).toMatch(/^rule/);
                expect(err.message.startsWith('Not a proof: rule')).toBe(true);
            }
        }
    });

    it('rejects atoms without a name', () => {
        expect(() => proofFromJson({
            conclusion: { linear: [{ tag: 'Atom', name: '' }] },
            rule: { tag: 'TopIntro' },
            premises: [],
        })).toThrow(ProofFormatError);
    });
});
