// ─────────────────────────────────────────────────────────────
// MELL Workbench  ·  Normalizer Tests
// ─────────────────────────────────────────────────────────────

import { describe, it, expect } from 'vitest';
import { mk } from '../core/ir';
import { step, isNormal, normalize, normalizeBounded, reduce, reductionTrace } from '../engine/normalizer';

const v = mk.var;
const id = (x: string) => mk.abs(x, v(x));
const selfApp = mk.abs('x', mk.app(v('x'), v('x')));
const omega = mk.app(selfApp, selfApp);

describe('redexes', () => {
    it('β-reduces an application', () => {
        expect(normalize(mk.app(id('x'), mk.unit))).toEqual(mk.unit);
    });

    it('destructures a pair with let', () => {
        const t = mk.letPair('x', 'y', mk.pair(mk.unit, mk.trivial), mk.pair(v('y'), v('x')));
        expect(normalize(t)).toEqual(mk.pair(mk.trivial, mk.unit));
    });

    it('selects the matching case branch', () => {
        const t = mk.case(mk.inr(mk.unit), 'a', v('a'), 'b', mk.pair(v('b'), v('b')));
        expect(normalize(t)).toEqual(mk.pair(mk.unit, mk.unit));
    });

    it('projects from pairs', () => {
        expect(normalize(mk.fst(mk.pair(mk.unit, mk.trivial)))).toEqual(mk.unit);
        expect(normalize(mk.snd(mk.pair(mk.unit, mk.trivial)))).toEqual(mk.trivial);
    });

    it('cancels dereliction against promotion', () => {
        expect(normalize(mk.derelict(mk.promote(mk.unit)))).toEqual(mk.unit);
    });

    it('copies a promoted value', () => {
        const t = mk.copy(mk.promote(mk.unit), 'x', 'y', mk.pair(v('x'), v('y')));
        expect(normalize(t)).toEqual(mk.pair(mk.promote(mk.unit), mk.promote(mk.unit)));
    });

    it('discards a promoted value', () => {
        expect(normalize(mk.discard(mk.promote(mk.trivial), mk.unit))).toEqual(mk.unit);
    });

    it('avoids capturing free variables', () => {
        const t = mk.app(mk.abs('x', mk.abs('y', v('x'))), v('y'));
        expect(normalize(t)).toEqual(mk.abs('y′', v('y')));
    });
});

describe('strategy', () => {
    it('contracts the outermost redex first', () => {
        const t = mk.app(id('x'), mk.app(id('y'), mk.unit));
        expect(reductionTrace(t, 10)).toEqual([t, mk.app(id('y'), mk.unit), mk.unit]);
    });

    it('reduces under binders', () => {
        expect(normalize(mk.abs('z', mk.app(id('x'), v('z'))))).toEqual(id('z'));
    });

    it('reduces inside a branch when the scrutinee is stuck', () => {
        const t = mk.case(v('s'), 'a', mk.app(id('x'), v('a')), 'b', v('b'));
        expect(step(t)).toEqual(mk.case(v('s'), 'a', v('a'), 'b', v('b')));
    });

    it('leaves stuck terms alone', () => {
        expect(isNormal(v('x'))).toBe(true);
        expect(isNormal(mk.discard(v('z'), mk.unit))).toBe(true);
        expect(isNormal(mk.derelict(v('z')))).toBe(true);
        expect(isNormal(mk.app(id('x'), mk.unit))).toBe(false);
    });

    it('is idempotent', () => {
        const t = mk.letPair('p', 'q', mk.pair(id('a'), mk.unit), mk.app(v('p'), v('q')));
        const once = normalize(t);
        expect(once).toEqual(mk.unit);
        expect(normalize(once)).toEqual(once);
    });
});

describe('bounded reduction', () => {
    it('returns the input untouched with no budget', () => {
        const t = mk.app(id('x'), mk.unit);
        expect(normalizeBounded(t, 0)).toBe(t);
    });

    it('reports the steps taken', () => {
        expect(reduce(mk.app(id('x'), mk.app(id('y'), mk.unit)), 100)).toEqual({ term: mk.unit, steps: 2, normal: true });
    });

    it('stops a diverging term at the budget', () => {
        const result = reduce(omega, 10);
        expect(result.steps).toBe(10);
        expect(result.normal).toBe(false);
        expect(result.term).toEqual(omega);
        expect(normalizeBounded(omega, 3)).toEqual(omega);
    });
});
