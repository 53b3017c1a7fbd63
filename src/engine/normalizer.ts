// ─────────────────────────────────────────────────────────────
// MELL Workbench  ·  Term Normalizer
// Leftmost-outermost small-step reduction
// ─────────────────────────────────────────────────────────────

import { mk, type Term } from '../core/ir';
import { substitute, substituteAll } from '../core/term';

/**
 * One reduction step, or `null` if the term is normal. The redex at the
 * root is contracted first; otherwise subterms are tried left to right.
 */
export function step(term: Term): Term | null {
    switch (term.tag) {
        case 'Var':
        case 'Unit':
        case 'Trivial':
            return null;

        case 'Abs':
            return inside(term.body, b => mk.abs(term.param, b));

        case 'App':
            if (term.func.tag === 'Abs') return substitute(term.func.body, term.func.param, term.arg);
            return inside(term.func, f => mk.app(f, term.arg))
                ?? inside(term.arg, a => mk.app(term.func, a));

        case 'Pair':
            return inside(term.fst, a => mk.pair(a, term.snd))
                ?? inside(term.snd, b => mk.pair(term.fst, b));

        case 'LetPair':
            if (term.pair.tag === 'Pair') {
                return substituteAll(term.body, [[term.left, term.pair.fst], [term.right, term.pair.snd]]);
            }
            return inside(term.pair, p => mk.letPair(term.left, term.right, p, term.body))
                ?? inside(term.body, b => mk.letPair(term.left, term.right, term.pair, b));

        case 'Case': {
            const s = term.scrutinee;
            if (s.tag === 'Inl') return substitute(term.left, term.leftVar, s.term);
            if (s.tag === 'Inr') return substitute(term.right, term.rightVar, s.term);
            const rebuild = (scrutinee: Term, left: Term, right: Term): Term =>
                mk.case(scrutinee, term.leftVar, left, term.rightVar, right);
            return inside(s, x => rebuild(x, term.left, term.right))
                ?? inside(term.left, l => rebuild(s, l, term.right))
                ?? inside(term.right, r => rebuild(s, term.left, r));
        }

        case 'Fst':
            if (term.term.tag === 'Pair') return term.term.fst;
            return inside(term.term, mk.fst);

        case 'Snd':
            if (term.term.tag === 'Pair') return term.term.snd;
            return inside(term.term, mk.snd);

        case 'Derelict':
            if (term.term.tag === 'Promote') return term.term.term;
            return inside(term.term, mk.derelict);

        case 'Copy':
            if (term.source.tag === 'Promote') {
                return substituteAll(term.body, [[term.left, term.source], [term.right, term.source]]);
            }
            return inside(term.source, s => mk.copy(s, term.left, term.right, term.body))
                ?? inside(term.body, b => mk.copy(term.source, term.left, term.right, b));

        case 'Discard':
            if (term.discarded.tag === 'Promote') return term.body;
            return inside(term.discarded, d => mk.discard(d, term.body))
                ?? inside(term.body, b => mk.discard(term.discarded, b));

        case 'Inl': return inside(term.term, mk.inl);
        case 'Inr': return inside(term.term, mk.inr);
        case 'Promote': return inside(term.term, mk.promote);
        case 'Abort': return inside(term.term, mk.abort);
    }
}

function inside(sub: Term, rebuild: (t: Term) => Term): Term | null {
    const next = step(sub);
    return next === null ? null : rebuild(next);
}

export const isNormal = (term: Term): boolean => step(term) === null;

/** Reduces until no redex is left. Does not return on a diverging term. */
export function normalize(term: Term): Term {
    let current = term;
    for (let next = step(current); next !== null; next = step(current)) current = next;
    return current;
}

export interface Reduction {
    term: Term;
    steps: number;
    /** The result is in normal form (the budget was not the reason to stop). */
    normal: boolean;
}

/** At most `maxSteps` steps, reporting how many were taken. */
export function reduce(term: Term, maxSteps: number): Reduction {
    let current = term;
    for (let steps = 0; steps < maxSteps; steps++) {
        const next = step(current);
        if (next === null) return { term: current, steps, normal: true };
        current = next;
    }
    return { term: current, steps: maxSteps, normal: isNormal(current) };
}

export function normalizeBounded(term: Term, maxSteps: number): Term {
    return reduce(term, maxSteps).term;
}

/** The term followed by each intermediate reduct, at most `maxSteps` of them. */
export function reductionTrace(term: Term, maxSteps: number): Term[] {
    const trace = [term];
    let current = term;
    for (let i = 0; i < maxSteps; i++) {
        const next = step(current);
        if (next === null) break;
        trace.push(next);
        current = next;
    }
    return trace;
}
