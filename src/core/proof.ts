// ─────────────────────────────────────────────────────────────
// MELL Workbench  ·  Derivations
// ─────────────────────────────────────────────────────────────

import type { FocusRule, Proof, Rule, RuleTag } from './ir';

export function isFocusRule(rule: Rule): rule is FocusRule {
    return rule.tag === 'FocusPositive' || rule.tag === 'FocusNegative' || rule.tag === 'Blur';
}

/** Number of premises each rule takes. */
export function ruleArity(rule: Rule): 0 | 1 | 2 {
    switch (rule.tag) {
        case 'Axiom': case 'OneIntro': case 'TopIntro':
            return 0;
        case 'TensorIntro': case 'WithIntro': case 'Cut':
            return 2;
        default:
            return 1;
    }
}

// ── Metrics ─────────────────────────────────────────────────

/** Rule nodes on the longest branch. An axiom alone has depth 1. */
export function proofDepth(proof: Proof): number {
    let deepest = 0;
    for (const p of proof.premises) deepest = Math.max(deepest, proofDepth(p));
    return deepest + 1;
}

export function proofSize(proof: Proof): number {
    return proof.premises.reduce((n, p) => n + proofSize(p), 1);
}

export function cutCount(proof: Proof): number {
    const here = proof.rule.tag === 'Cut' ? 1 : 0;
    return proof.premises.reduce((n, p) => n + cutCount(p), here);
}

export function rulesUsed(proof: Proof, acc: Map<RuleTag, number> = new Map()): Map<RuleTag, number> {
    acc.set(proof.rule.tag, (acc.get(proof.rule.tag) ?? 0) + 1);
    for (const p of proof.premises) rulesUsed(p, acc);
    return acc;
}

/**
 * Drops focus markers. A marker always has exactly one premise over the
 * same sequent, so its premise takes its place.
 */
export function stripFocusSteps(proof: Proof): Proof {
    if (isFocusRule(proof.rule) && proof.premises.length === 1) {
        return stripFocusSteps(proof.premises[0]);
    }
    return { ...proof, premises: proof.premises.map(stripFocusSteps) };
}

