// ─────────────────────────────────────────────────────────────
// MELL Workbench  ·  Formula Operations
// Linear negation, desugaring and polarity
// ─────────────────────────────────────────────────────────────

import { fm, type Formula } from './ir';

// ── Negation ────────────────────────────────────────────────

/**
 * Linear negation, pushed through the connectives by De Morgan duality.
 * Involutive on every connective except `⊸`, whose negation `A ⊗ B⊥`
 * no longer mentions the implication.
 */
export function negate(f: Formula): Formula {
    switch (f.tag) {
        case 'Atom': return fm.negAtom(f.name);
        case 'NegAtom': return fm.atom(f.name);
        case 'Tensor': return fm.par(negate(f.left), negate(f.right));
        case 'Par': return fm.tensor(negate(f.left), negate(f.right));
        case 'With': return fm.plus(negate(f.left), negate(f.right));
        case 'Plus': return fm.with(negate(f.left), negate(f.right));
        case 'One': return fm.bottom;
        case 'Bottom': return fm.one;
        case 'Top': return fm.zero;
        case 'Zero': return fm.top;
        case 'OfCourse': return fm.whyNot(negate(f.body));
        case 'WhyNot': return fm.ofCourse(negate(f.body));
        case 'Lolli': return fm.tensor(f.left, negate(f.right));
    }
}

/** Rewrites every `A ⊸ B` into `A⊥ ⅋ B`. */
export function desugar(f: Formula): Formula {
    switch (f.tag) {
        case 'Atom': case 'NegAtom':
        case 'One': case 'Bottom': case 'Top': case 'Zero':
            return f;
        case 'Lolli': return fm.par(negate(desugar(f.left)), desugar(f.right));
        case 'Tensor': return fm.tensor(desugar(f.left), desugar(f.right));
        case 'Par': return fm.par(desugar(f.left), desugar(f.right));
        case 'With': return fm.with(desugar(f.left), desugar(f.right));
        case 'Plus': return fm.plus(desugar(f.left), desugar(f.right));
        case 'OfCourse': return fm.ofCourse(desugar(f.body));
        case 'WhyNot': return fm.whyNot(desugar(f.body));
    }
}

export function containsLolli(f: Formula): boolean {
    switch (f.tag) {
        case 'Lolli': return true;
        case 'Tensor': case 'Par': case 'With': case 'Plus':
            return containsLolli(f.left) || containsLolli(f.right);
        case 'OfCourse': case 'WhyNot':
            return containsLolli(f.body);
        default:
            return false;
    }
}

// ── Polarity ────────────────────────────────────────────────

export type Polarity = 'positive' | 'negative';

export function polarity(f: Formula): Polarity {
    switch (f.tag) {
        case 'Atom': case 'Tensor': case 'One': case 'Plus': case 'Zero': case 'OfCourse':
            return 'positive';
        case 'NegAtom': case 'Par': case 'Bottom': case 'With': case 'Top': case 'WhyNot': case 'Lolli':
            return 'negative';
    }
}

export const isPositive = (f: Formula): boolean => polarity(f) === 'positive';
export const isNegative = (f: Formula): boolean => polarity(f) === 'negative';

/** Atoms and their negations. */
export const isLiteral = (f: Formula): boolean => f.tag === 'Atom' || f.tag === 'NegAtom';

// ── Equality and keys ───────────────────────────────────────

export function formulasEqual(a: Formula, b: Formula): boolean {
    switch (a.tag) {
        case 'Atom': case 'NegAtom':
            return b.tag === a.tag && b.name === a.name;
        case 'One': case 'Bottom': case 'Top': case 'Zero':
            return b.tag === a.tag;
        case 'OfCourse': case 'WhyNot':
            return b.tag === a.tag && formulasEqual(a.body, b.body);
        case 'Tensor': case 'Par': case 'With': case 'Plus': case 'Lolli':
            return b.tag === a.tag && formulasEqual(a.left, b.left) && formulasEqual(a.right, b.right);
    }
}

/**
 * Canonical string for a formula. Two formulas share a key exactly when
 * they are structurally equal, so keys can index multisets.
 */
export function formulaKey(f: Formula): string {
    switch (f.tag) {
        case 'Atom': return `+${JSON.stringify(f.name)}`;
        case 'NegAtom': return `-${JSON.stringify(f.name)}`;
        case 'One': case 'Bottom': case 'Top': case 'Zero':
            return f.tag;
        case 'OfCourse': case 'WhyNot':
            return `${f.tag}(${formulaKey(f.body)})`;
        case 'Tensor': case 'Par': case 'With': case 'Plus': case 'Lolli':
            return `${f.tag}(${formulaKey(f.left)},${formulaKey(f.right)})`;
    }
}

/** Number of connectives and atoms. */
export function formulaSize(f: Formula): number {
    switch (f.tag) {
        case 'Atom': case 'NegAtom':
        case 'One': case 'Bottom': case 'Top': case 'Zero':
            return 1;
        case 'OfCourse': case 'WhyNot':
            return 1 + formulaSize(f.body);
        case 'Tensor': case 'Par': case 'With': case 'Plus': case 'Lolli':
            return 1 + formulaSize(f.left) + formulaSize(f.right);
    }
}

export function atomsOf(f: Formula, acc: Set<string> = new Set()): Set<string> {
    switch (f.tag) {
        case 'Atom': case 'NegAtom':
            acc.add(f.name);
            break;
        case 'OfCourse': case 'WhyNot':
            atomsOf(f.body, acc);
            break;
        case 'Tensor': case 'Par': case 'With': case 'Plus': case 'Lolli':
            atomsOf(f.left, acc);
            atomsOf(f.right, acc);
            break;
        default:
            break;
    }
    return acc;
}

