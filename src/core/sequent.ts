// ─────────────────────────────────────────────────────────────
// MELL Workbench  ·  Sequents
// ─────────────────────────────────────────────────────────────

import type { Formula, Sequent, TwoSidedSequent } from './ir';
import { desugar, formulaKey, formulasEqual, negate } from './formula';

/** `Γ ⊢ Δ` becomes `⊢ Γ⊥, Δ`: negated antecedent first, then the succedent. */
export function toOneSided(s: TwoSidedSequent): Sequent {
    return { linear: [...s.antecedent.map(negate), ...s.succedent] };
}

export function desugarSequent(s: Sequent): Sequent {
    return { linear: s.linear.map(desugar) };
}

// ── Multiset helpers ────────────────────────────────────────

/** Occurrence count per formula key. */
export function multiset(formulas: readonly Formula[]): Map<string, number> {
    const counts = new Map<string, number>();
    for (const f of formulas) {
        const key = formulaKey(f);
        counts.set(key, (counts.get(key) ?? 0) + 1);
    }
    return counts;
}

export function sameMultiset(a: readonly Formula[], b: readonly Formula[]): boolean {
    if (a.length !== b.length) return false;
    const counts = multiset(a);
    for (const f of b) {
        const key = formulaKey(f);
        const n = counts.get(key) ?? 0;
        if (n === 0) return false;
        counts.set(key, n - 1);
    }
    return true;
}

export function indexOfFormula(list: readonly Formula[], f: Formula): number {
    return list.findIndex(g => formulasEqual(g, f));
}

/** Removes the first occurrence of `f`; `null` if there is none. */
export function removeOne(list: readonly Formula[], f: Formula): Formula[] | null {
    const i = indexOfFormula(list, f);
    if (i < 0) return null;
    return [...list.slice(0, i), ...list.slice(i + 1)];
}

export function removeAt(list: readonly Formula[], index: number): Formula[] {
    return [...list.slice(0, index), ...list.slice(index + 1)];
}

export function replaceAt(list: readonly Formula[], index: number, ...by: Formula[]): Formula[] {
    return [...list.slice(0, index), ...by, ...list.slice(index + 1)];
}

/** Every formula is `?`-headed (the context `!`-introduction requires). */
export function isExponentialContext(list: readonly Formula[]): boolean {
    return list.every(f => f.tag === 'WhyNot');
}

/** First occurrence of each distinct formula, with its index. */
export function distinctWithIndex(list: readonly Formula[]): Array<{ formula: Formula; index: number }> {
    const seen = new Set<string>();
    const out: Array<{ formula: Formula; index: number }> = [];
    list.forEach((formula, index) => {
        const key = formulaKey(formula);
        if (seen.has(key)) return;
        seen.add(key);
        out.push({ formula, index });
    });
    return out;
}
