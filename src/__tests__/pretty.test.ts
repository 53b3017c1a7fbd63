// ─────────────────────────────────────────────────────────────
// MELL Workbench  ·  Pretty-Printer Tests
// ─────────────────────────────────────────────────────────────

import { describe, it, expect } from 'vitest';
import { fm, mk, rules, sequent, twoSided } from '../core/ir';
import {
    prettyFormula, latexFormula, prettySequent, prettyTwoSided,
    latexSequent, ruleName, ruleSymbol, prettyTerm,
} from '../core/pretty';

const A = fm.atom('A');
const B = fm.atom('B');
const nA = fm.negAtom('A');
const v = mk.var;

describe('prettyFormula', () => {
    it('parenthesises binary connectives', () => {
        expect(prettyFormula(fm.tensor(A, fm.negAtom('B')))).toBe('(A ⊗ B⊥)');
        expect(prettyFormula(fm.ofCourse(fm.par(A, B)))).toBe('!(A ⅋ B)');
        expect(prettyFormula(fm.lolli(A, fm.with(A, B)))).toBe('(A ⊸ (A & B))');
    });

    it('has an ASCII notation', () => {
        expect(prettyFormula(fm.tensor(A, fm.negAtom('B')), 'ascii')).toBe('(A * B^)');
        expect(prettyFormula(fm.par(fm.bottom, fm.top), 'ascii')).toBe('(bot | top)');
        expect(prettyFormula(fm.lolli(A, fm.plus(A, B)), 'ascii')).toBe('(A -o (A + B))');
    });
});

describe('latexFormula', () => {
    it('uses cmll macros by default', () => {
        expect(latexFormula(fm.with(A, fm.negAtom('B')))).toBe('(A \\with B^{\\bot})');
        expect(latexFormula(fm.par(fm.ofCourse(A), fm.one))).toBe('({!}A \\parr \\mathbf{1})');
    });

    it('falls back to plain symbols for KaTeX', () => {
        expect(latexFormula(fm.with(A, B), 'katex')).toBe('(A \\mathbin{\\&} B)');
        expect(latexFormula(fm.par(A, B), 'katex')).toBe('(A \\mathbin{\\text{⅋}} B)');
    });
});

describe('sequents', () => {
    it('prints one-sided sequents', () => {
        expect(prettySequent(sequent(A, nA))).toBe('⊢ A, A⊥');
        expect(prettySequent(sequent())).toBe('⊢');
        expect(prettySequent(sequent(A, nA), 'ascii')).toBe('|- A, A^');
        expect(latexSequent(sequent(A, nA))).toBe('\\vdash A, A^{\\bot}');
    });

    it('prints two-sided sequents', () => {
        expect(prettyTwoSided(twoSided([A, B], [fm.tensor(A, B)]))).toBe('A, B ⊢ (A ⊗ B)');
        expect(prettyTwoSided(twoSided([], [B]))).toBe('⊢ B');
        expect(prettyTwoSided(twoSided([A], []), 'ascii')).toBe('A |-');
    });
});

describe('rules', () => {
    it('names each rule', () => {
        expect(ruleName(rules.plusIntroLeft)).toBe('plus-left');
        expect(ruleName(rules.focusNegative(fm.par(A, B)))).toBe('focus-');
        expect(ruleName(rules.ofCourseIntro)).toBe('of-course');
    });

    it('draws short symbols', () => {
        expect(ruleSymbol(rules.axiom)).toBe('ax');
        expect(ruleSymbol(rules.plusIntroRight)).toBe('⊕R');
        expect(ruleSymbol(rules.plusIntroRight, 'ascii')).toBe('+R');
        expect(ruleSymbol(rules.cut(fm.tensor(A, B)))).toBe('cut (A ⊗ B)');
        expect(ruleSymbol(rules.contraction)).toBe('C');
    });
});

describe('prettyTerm', () => {
    it('prints abstractions and applications', () => {
        expect(prettyTerm(mk.abs('x', v('x')))).toBe('λx. x');
        expect(prettyTerm(mk.app(v('f'), v('a')))).toBe('(f a)');
        expect(prettyTerm(mk.app(v('f'), mk.abs('x', v('x'))))).toBe('(f (λx. x))');
    });

    it('prints the constants', () => {
        expect(prettyTerm(mk.unit)).toBe('()');
        expect(prettyTerm(mk.trivial)).toBe('⟨⟩');
    });

    it('prints pairs and their eliminators', () => {
        expect(prettyTerm(mk.pair(v('x'), v('y')))).toBe('(x, y)');
        expect(prettyTerm(mk.letPair('x', 'y', v('p'), mk.pair(v('y'), v('x'))))).toBe('let (x, y) = p in (y, x)');
        expect(prettyTerm(mk.fst(mk.pair(v('x'), v('y'))))).toBe('fst (x, y)');
    });

    it('prints sums', () => {
        expect(prettyTerm(mk.inl(mk.unit))).toBe('inl ()');
        expect(prettyTerm(mk.inr(mk.inl(v('x'))))).toBe('inr (inl x)');
        expect(prettyTerm(mk.case(v('s'), 'a', v('a'), 'b', v('b')))).toBe('case s of inl a ⇒ a | inr b ⇒ b');
    });

    it('prints the exponential forms', () => {
        expect(prettyTerm(mk.promote(mk.unit))).toBe('!()');
        expect(prettyTerm(mk.promote(mk.abs('x', v('x'))))).toBe('!(λx. x)');
        expect(prettyTerm(mk.derelict(v('d')))).toBe('derelict d');
        expect(prettyTerm(mk.copy(v('c'), 'x', 'y', mk.pair(v('x'), v('y'))))).toBe('copy c as x, y in (x, y)');
        expect(prettyTerm(mk.discard(v('d'), mk.unit))).toBe('discard d in ()');
    });
});
