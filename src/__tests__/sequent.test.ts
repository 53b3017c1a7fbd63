// ─────────────────────────────────────────────────────────────
// MELL Workbench  ·  Sequent & Derivation Tests
// ─────────────────────────────────────────────────────────────

import { describe, it, expect } from 'vitest';
import { fm, rules, proofNode, sequent, twoSided } from '../core/ir';
import {
    toOneSided, desugarSequent, sameMultiset, removeOne,
    replaceAt, isExponentialContext, distinctWithIndex,
} from '../core/sequent';
import { proofDepth, proofSize, cutCount, rulesUsed, ruleArity, stripFocusSteps } from '../core/proof';

const A = fm.atom('A');
const B = fm.atom('B');
const nA = fm.negAtom('A');

describe('sequents', () => {
    it('moves the antecedent across the turnstile negated', () => {
        const s = twoSided([fm.tensor(A, B), fm.ofCourse(A)], [B]);
        expect(toOneSided(s).linear).toEqual([
            fm.par(nA, fm.negAtom('B')),
            fm.whyNot(nA),
            B,
        ]);
    });

    it('desugars every formula', () => {
        expect(desugarSequent(sequent(fm.lolli(A, A))).linear).toEqual([fm.par(nA, A)]);
    });

    it('compares as multisets', () => {
        expect(sameMultiset([A, B, A], [A, A, B])).toBe(true);
        expect(sameMultiset([A, B, B], [A, A, B])).toBe(false);
        expect(sameMultiset([A], [A, A])).toBe(false);
    });

    it('removes a single occurrence', () => {
        expect(removeOne([A, B, A], A)).toEqual([B, A]);
        expect(removeOne([A, B], nA)).toBeNull();
    });

    it('replaces one position by several formulas', () => {
        expect(replaceAt([A, fm.par(A, B), B], 1, A, B)).toEqual([A, A, B, B]);
    });

    it('recognises exponential contexts', () => {
        expect(isExponentialContext([fm.whyNot(A), fm.whyNot(nA)])).toBe(true);
        expect(isExponentialContext([])).toBe(true);
        expect(isExponentialContext([fm.whyNot(A), A])).toBe(false);
    });

    it('keeps the first index of each distinct formula', () => {
        expect(distinctWithIndex([A, B, A, nA])).toEqual([
            { formula: A, index: 0 },
            { formula: B, index: 1 },
            { formula: nA, index: 3 },
        ]);
    });
});

describe('derivations', () => {
    const ax = (x: string) => proofNode(sequent(fm.negAtom(x), fm.atom(x)), rules.axiom);
    // ⊢ A⊥ ⅋ B⊥, B ⊗ A
    const swap = proofNode(
        sequent(fm.par(nA, fm.negAtom('B')), fm.tensor(B, A)),
        rules.parIntro,
        [proofNode(sequent(nA, fm.negAtom('B'), fm.tensor(B, A)), rules.tensorIntro, [ax('B'), ax('A')])],
    );

    it('measures depth and size', () => {
        expect(proofDepth(ax('A'))).toBe(1);
        expect(proofDepth(swap)).toBe(3);
        expect(proofSize(swap)).toBe(4);
    });

    it('counts cuts and rules', () => {
        const cut = proofNode(sequent(nA, A), rules.cut(A), [ax('A'), ax('A')]);
        expect(cutCount(cut)).toBe(1);
        expect(cutCount(swap)).toBe(0);
        expect(rulesUsed(swap).get('Axiom')).toBe(2);
        expect(rulesUsed(swap).get('TensorIntro')).toBe(1);
    });

    it('knows how many premises each rule takes', () => {
        expect(ruleArity(rules.axiom)).toBe(0);
        expect(ruleArity(rules.cut(A))).toBe(2);
        expect(ruleArity(rules.withIntro)).toBe(2);
        expect(ruleArity(rules.blur)).toBe(1);
    });

    it('strips focus markers', () => {
        const focused = proofNode(sequent(nA, A), rules.focusPositive(A), [
            proofNode(sequent(nA, A), rules.blur, [ax('A')]),
        ]);
        expect(stripFocusSteps(focused)).toEqual(ax('A'));
    });
});
