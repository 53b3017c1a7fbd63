// ─────────────────────────────────────────────────────────────
// MELL Workbench  ·  Proof Search Tests
// ─────────────────────────────────────────────────────────────

import { afterEach, describe, it, expect, vi } from 'vitest';
import { fm, sequent, twoSided, type Proof, type RuleTag } from '../core/ir';
import { proofDepth, rulesUsed, stripFocusSteps } from '../core/proof';
import { Prover, prove } from '../engine/prover';
import { verifyProof } from '../engine/verifier';

const A = fm.atom('A');
const B = fm.atom('B');
const C = fm.atom('C');
const nA = fm.negAtom('A');
const nB = fm.negAtom('B');

function tags(proof: Proof): RuleTag[] {
    return [...rulesUsed(proof).keys()];
}

describe('leaves', () => {
    it('closes A, A⊥ with an axiom even at depth 0', () => {
        const proof = prove(sequent(A, nA), { maxDepth: 0 });
        expect(proof).not.toBeNull();
        expect(proof?.rule.tag).toBe('Axiom');
        expect(proof?.premises).toEqual([]);
    });

    it('closes any sequent containing ⊤', () => {
        const proof = prove(sequent(A, B, fm.top));
        expect(proof?.rule.tag).toBe('TopIntro');
    });

    it('fails on unrelated atoms', () => {
        expect(prove(sequent(A, B))).toBeNull();
    });

    it('fails on ⊢ 0', () => {
        expect(prove(sequent(fm.zero))).toBeNull();
    });
});

describe('invertible phase', () => {
    it('splits & into two premises over the same context', () => {
        const proof = prove(sequent(nA, fm.with(A, A)));
        expect(proof?.rule.tag).toBe('WithIntro');
        expect(proof?.premises).toHaveLength(2);
        for (const p of proof?.premises ?? []) expect(p.conclusion.linear).toEqual([nA, A]);
    });

    it('desugars implication before searching', () => {
        const proof = prove(sequent(fm.lolli(A, A)));
        expect(proof?.conclusion.linear).toEqual([fm.par(nA, A)]);
        expect(proof?.rule.tag).toBe('ParIntro');
    });
});

describe('focus phase', () => {
    it('proves commutativity of ⊗', () => {
        const proof = new Prover().proveTwoSided(twoSided([fm.tensor(A, B)], [fm.tensor(B, A)]));
        expect(proof).not.toBeNull();
        if (!proof) return;
        expect(proof.rule.tag).toBe('ParIntro');
        const tensor = proof.premises[0];
        expect(tensor.rule.tag).toBe('TensorIntro');
        expect(tensor.premises.map(p => p.conclusion.linear)).toEqual([[nB, B], [nA, A]]);
        expect(proofDepth(proof)).toBe(3);
    });

    it('respects the depth bound', () => {
        const goal = sequent(fm.par(nA, nB), fm.tensor(B, A));
        expect(prove(goal, { maxDepth: 1 })).toBeNull();
        expect(prove(goal, { maxDepth: 2 })).not.toBeNull();
    });

    it('chooses the ⊕ branch that closes', () => {
        const proof = prove(sequent(nA, fm.plus(B, A)));
        expect(proof?.rule.tag).toBe('PlusIntroRight');
    });

    it('proves distributivity of ⊗ over ⊕', () => {
        const goal = twoSided(
            [fm.tensor(A, fm.plus(B, C))],
            [fm.plus(fm.tensor(A, B), fm.tensor(A, C))],
        );
        const proof = new Prover().proveTwoSided(goal);
        expect(proof).not.toBeNull();
        if (proof) expect(verifyProof(proof)).toEqual({ valid: true });
    });

    it('does not duplicate linear hypotheses', () => {
        expect(new Prover().proveTwoSided(twoSided([A], [fm.tensor(A, A)]))).toBeNull();
        expect(new Prover().proveTwoSided(twoSided([fm.tensor(A, A)], [A]))).toBeNull();
        expect(new Prover().proveTwoSided(twoSided([fm.with(A, B)], [fm.tensor(A, B)]))).toBeNull();
    });
});

describe('exponentials', () => {
    it('contracts !A to prove A ⊗ A', () => {
        const proof = new Prover().proveTwoSided(twoSided([fm.ofCourse(A)], [fm.tensor(A, A)]));
        expect(proof).not.toBeNull();
        if (!proof) return;
        expect(proof.rule.tag).toBe('Contraction');
        expect(proof.conclusion.linear).toEqual([fm.whyNot(nA), fm.tensor(A, A)]);
        const [tensor] = proof.premises;
        expect(tensor.rule.tag).toBe('TensorIntro');
        expect(tensor.premises[0].rule.tag).toBe('Dereliction');
        expect(tensor.premises[0].premises[0].conclusion.linear).toEqual([nA, A]);
    });

    it('weakens !A away to prove 1', () => {
        const proof = new Prover().proveTwoSided(twoSided([fm.ofCourse(A)], [fm.one]));
        expect(proof?.rule.tag).toBe('Weakening');
        expect(proof?.premises[0].rule.tag).toBe('OneIntro');
    });

    it('promotes under a ?-context', () => {
        const proof = new Prover().proveTwoSided(twoSided([fm.ofCourse(A)], [fm.ofCourse(A)]));
        expect(proof?.rule.tag).toBe('OfCourseIntro');
        expect(proof?.premises[0].rule.tag).toBe('Dereliction');
    });

    it('uses ?-formulas with compound bodies', () => {
        const goal = twoSided([fm.ofCourse(fm.with(A, B))], [fm.tensor(fm.ofCourse(A), fm.ofCourse(B))]);
        const proof = new Prover().proveTwoSided(goal);
        expect(proof).not.toBeNull();
        if (!proof) return;
        expect(tags(proof)).toEqual(expect.arrayContaining(['Contraction', 'WhyNotIntro', 'OfCourseIntro']));
        expect(verifyProof(proof)).toEqual({ valid: true });
    });

    it('does not invent an unrelated atom from !A', () => {
        expect(new Prover().proveTwoSided(twoSided([fm.ofCourse(A)], [B]))).toBeNull();
    });

    it('gives up at once on !-hypotheses whose atoms never meet a dual', () => {
        const prover = new Prover({ maxDepth: 100 });
        const goal = twoSided([fm.ofCourse(fm.tensor(A, A)), fm.ofCourse(fm.tensor(C, C))], [B]);
        expect(prover.proveTwoSided(goal)).toBeNull();
        expect(prover.stats.calls).toBe(1);
    });

    it('still uses ?-formulas with no literals', () => {
        const proof = new Prover().prove(sequent(fm.whyNot(fm.one)));
        expect(proof?.rule.tag).toBe('WhyNotIntro');
        expect(proof?.premises[0].rule.tag).toBe('OneIntro');
    });

    it('still uses ?-formulas when ⊤ can absorb their atoms', () => {
        const proof = new Prover().prove(sequent(fm.whyNot(fm.par(nA, fm.top))));
        expect(proof?.rule.tag).toBe('Dereliction');
        expect(proof?.premises[0].rule.tag).toBe('ParIntro');
        expect(proof?.premises[0].premises[0].rule.tag).toBe('TopIntro');
    });
});

describe('focus markers', () => {
    it('wraps a decision in FocusPositive', () => {
        const proof = prove(sequent(nA, fm.plus(A, B)), { recordFocus: true });
        expect(proof?.rule).toEqual({ tag: 'FocusPositive', formula: fm.plus(A, B) });
        expect(proof?.premises[0].rule.tag).toBe('PlusIntroLeft');
    });

    it('records blurs and negative phases', () => {
        const proof = prove(sequent(fm.tensor(fm.one, fm.par(nA, A))), { recordFocus: true });
        expect(proof).not.toBeNull();
        if (!proof) return;
        expect(tags(proof)).toEqual(expect.arrayContaining(['FocusPositive', 'Blur', 'FocusNegative']));
        expect(verifyProof(proof)).toEqual({ valid: true });
        expect(tags(stripFocusSteps(proof)).sort()).toEqual(['Axiom', 'OneIntro', 'ParIntro', 'TensorIntro']);
    });

    it('leaves markers out by default', () => {
        const proof = prove(sequent(fm.tensor(fm.one, fm.par(nA, A))));
        expect(proof && tags(proof).sort()).toEqual(['Axiom', 'OneIntro', 'ParIntro', 'TensorIntro']);
    });
});

describe('soundness', () => {
    const provable = [
        twoSided([A], [A]),
        twoSided([fm.tensor(A, B)], [fm.tensor(B, A)]),
        twoSided([fm.plus(A, B)], [fm.plus(B, A)]),
        twoSided([fm.with(A, B)], [A]),
        twoSided([fm.ofCourse(A)], [fm.tensor(A, A)]),
        twoSided([fm.ofCourse(A)], [fm.one]),
        twoSided([fm.ofCourse(A)], [fm.ofCourse(fm.ofCourse(A))]),
        twoSided([], [fm.lolli(fm.tensor(A, fm.lolli(A, B)), B)]),
    ];

    it('returns only proofs the verifier accepts', () => {
        for (const goal of provable) {
            const proof = new Prover().proveTwoSided(goal);
            expect(proof).not.toBeNull();
            if (proof) expect(verifyProof(proof)).toEqual({ valid: true });
        }
    });
});

describe('instrumentation', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('counts visited sequents', () => {
        const prover = new Prover();
        prover.prove(sequent(fm.par(nA, nB), fm.tensor(B, A)));
        expect(prover.stats.calls).toBeGreaterThan(1);
        expect(prover.stats.deepest).toBeGreaterThan(0);
    });

    it('traces through console.debug when asked', () => {
        const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
        prove(sequent(A, nA), { debug: true });
        expect(debug).toHaveBeenCalledTimes(1);
        expect(debug).toHaveBeenCalledWith('[Prover] ⊢ A, A⊥: proved after 1 calls');
    });

    it('stays quiet otherwise', () => {
        const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
        prove(sequent(A, nA), { debug: false });
        expect(debug).not.toHaveBeenCalled();
    });
});
