// ─────────────────────────────────────────────────────────────
// MELL Workbench  ·  Proof Verifier
// Checks every inference of a derivation against its rule,
// independently of how the derivation was built
// ─────────────────────────────────────────────────────────────

import type { Formula, Proof, Rule, Sequent } from '../core/ir';
import { formulasEqual, isNegative, isPositive, negate } from '../core/formula';
import { distinctWithIndex, indexOfFormula, isExponentialContext, removeAt, removeOne, sameMultiset } from '../core/sequent';
import { ruleArity } from '../core/proof';
import { prettyFormula, prettySequent, ruleName } from '../core/pretty';

// ── Errors ──────────────────────────────────────────────────

export type ProofError =
    | { tag: 'InvalidRule'; rule: Rule; conclusion: Sequent; reason: string }
    | { tag: 'WrongPremiseCount'; rule: Rule; expected: number; got: number }
    | { tag: 'ContextMismatch'; rule: Rule; message: string }
    | { tag: 'PremiseFailed'; rule: Rule; index: number; cause: ProofError };

export type VerifyResult =
    | { valid: true }
    | { valid: false; error: ProofError };

export class ProofVerificationError extends Error {
    constructor(readonly error: ProofError) {
        super(formatProofError(error));
        this.name = 'ProofVerificationError';
    }
}

export function formatProofError(error: ProofError): string {
    switch (error.tag) {
        case 'InvalidRule':
            return `${ruleName(error.rule)} does not apply to ${prettySequent(error.conclusion)}: ${error.reason}`;
        case 'WrongPremiseCount':
            return `${ruleName(error.rule)} expects ${error.expected} premise(s), got ${error.got}`;
        case 'ContextMismatch':
            return `${ruleName(error.rule)}: ${error.message}`;
        case 'PremiseFailed':
            return `premise ${error.index + 1} of ${ruleName(error.rule)} → ${formatProofError(error.cause)}`;
    }
}

/** Innermost error, past every `PremiseFailed` wrapper. */
export function rootCause(error: ProofError): ProofError {
    return error.tag === 'PremiseFailed' ? rootCause(error.cause) : error;
}

/** Premise indices from the root to the failing node. */
export function errorPath(error: ProofError): number[] {
    return error.tag === 'PremiseFailed' ? [error.index, ...errorPath(error.cause)] : [];
}

// ── Verification ────────────────────────────────────────────

export function verifyProof(proof: Proof): VerifyResult {
    const error = checkNode(proof);
    return error ? { valid: false, error } : { valid: true };
}

export const isValidProof = (proof: Proof): boolean => verifyProof(proof).valid;

export function assertValidProof(proof: Proof): void {
    const error = checkNode(proof);
    if (error) throw new ProofVerificationError(error);
}

function checkNode(proof: Proof): ProofError | null {
    const { rule, premises } = proof;
    const expected = ruleArity(rule);
    if (premises.length !== expected) {
        return { tag: 'WrongPremiseCount', rule, expected, got: premises.length };
    }

    const local = checkRule(proof);
    if (local) return local;

    for (let index = 0; index < premises.length; index++) {
        const cause = checkNode(premises[index]);
        if (cause) return { tag: 'PremiseFailed', rule, index, cause };
    }
    return null;
}

// ── Per-rule shape checks ───────────────────────────────────

function checkRule(proof: Proof): ProofError | null {
    const { rule } = proof;
    const concl = proof.conclusion.linear;
    const prem = proof.premises.map(p => p.conclusion.linear);

    const invalid = (reason: string): ProofError => ({ tag: 'InvalidRule', rule, conclusion: proof.conclusion, reason });
    const mismatch = (message: string): ProofError => ({ tag: 'ContextMismatch', rule, message });

    /**
     * Tries each distinct formula of the conclusion with the given tag as
     * the principal formula. `ok` receives it and the remaining context.
     */
    const principal = <T extends Formula['tag']>(
        tag: T,
        ok: (f: Extract<Formula, { tag: T }>, rest: Formula[]) => boolean,
    ): 'absent' | 'matched' | 'mismatch' => {
        let found = false;
        for (const { formula, index } of distinctWithIndex(concl)) {
            if (!hasTag(formula, tag)) continue;
            found = true;
            if (ok(formula, removeAt(concl, index))) return 'matched';
        }
        return found ? 'mismatch' : 'absent';
    };

    const expectPrincipal = <T extends Formula['tag']>(
        tag: T,
        ok: (f: Extract<Formula, { tag: T }>, rest: Formula[]) => boolean,
        what: string,
    ): ProofError | null => {
        switch (principal(tag, ok)) {
            case 'matched': return null;
            case 'absent': return invalid(`no ${what} in the conclusion`);
            case 'mismatch': return mismatch(`premises do not match the ${what} rule over ${prettySequent(proof.conclusion)}`);
        }
    };

    switch (rule.tag) {
        case 'Axiom':
            if (concl.length === 2 && isDualPair(concl[0], concl[1])) return null;
            return invalid('an axiom concludes exactly an atom and its negation');

        case 'OneIntro':
            if (concl.length === 1 && concl[0].tag === 'One') return null;
            return invalid('1 is introduced alone');

        case 'TopIntro':
            return concl.some(f => f.tag === 'Top') ? null : invalid('no ⊤ in the conclusion');

        case 'BottomIntro':
            return expectPrincipal('Bottom', (_, rest) => sameMultiset(prem[0], rest), '⊥');

        case 'ParIntro':
            return expectPrincipal('Par', (f, rest) => sameMultiset(prem[0], [...rest, f.left, f.right]), '⅋');

        case 'WithIntro':
            return expectPrincipal('With', (f, rest) =>
                sameMultiset(prem[0], [...rest, f.left]) && sameMultiset(prem[1], [...rest, f.right]), '&');

        case 'PlusIntroLeft':
            return expectPrincipal('Plus', (f, rest) => sameMultiset(prem[0], [...rest, f.left]), '⊕');

        case 'PlusIntroRight':
            return expectPrincipal('Plus', (f, rest) => sameMultiset(prem[0], [...rest, f.right]), '⊕');

        case 'TensorIntro':
            return expectPrincipal('Tensor', (f, rest) => {
                const l = removeOne(prem[0], f.left);
                const r = removeOne(prem[1], f.right);
                return l !== null && r !== null && sameMultiset([...l, ...r], rest);
            }, '⊗');

        case 'OfCourseIntro': {
            const error = expectPrincipal('OfCourse', (f, rest) =>
                isExponentialContext(rest) && sameMultiset(prem[0], [...rest, f.body]), '!');
            if (error?.tag === 'ContextMismatch' && concl.filter(g => g.tag !== 'WhyNot').length > 1) {
                return mismatch('! can only be introduced when every other formula is ?-headed');
            }
            return error;
        }

        case 'WhyNotIntro':
        case 'Dereliction':
            return expectPrincipal('WhyNot', (f, rest) => sameMultiset(prem[0], [...rest, f.body]), '?');

        case 'Weakening':
            return expectPrincipal('WhyNot', (_, rest) => sameMultiset(prem[0], rest), '?');

        case 'Contraction':
            return expectPrincipal('WhyNot', (f, rest) => sameMultiset(prem[0], [...rest, f, f]), '?');

        case 'Cut': {
            const cut = rule.formula;
            const dual = negate(cut);
            const l = removeOne(prem[0], cut);
            const r = removeOne(prem[1], dual);
            if (l === null) return mismatch(`left premise does not contain ${prettyFormula(cut)}`);
            if (r === null) return mismatch(`right premise does not contain ${prettyFormula(dual)}`);
            if (!sameMultiset([...l, ...r], concl)) return mismatch('premise contexts do not add up to the conclusion');
            return null;
        }

        case 'FocusPositive':
        case 'FocusNegative': {
            const f = rule.formula;
            const polarityOk = rule.tag === 'FocusPositive' ? isPositive(f) : isNegative(f);
            if (!polarityOk) return invalid(`${prettyFormula(f)} has the wrong polarity for this focus step`);
            if (indexOfFormula(concl, f) < 0) return invalid(`${prettyFormula(f)} is not in the conclusion`);
            return sameMultiset(prem[0], concl) ? null : mismatch('a focus step must not change the sequent');
        }

        case 'Blur':
            return sameMultiset(prem[0], concl) ? null : mismatch('a blur step must not change the sequent');
    }
}

function hasTag<T extends Formula['tag']>(f: Formula, tag: T): f is Extract<Formula, { tag: T }> {
    return f.tag === tag;
}

function isDualPair(a: Formula, b: Formula): boolean {
    return (a.tag === 'Atom' && formulasEqual(negate(a), b)) || (a.tag === 'NegAtom' && formulasEqual(negate(a), b));
}
