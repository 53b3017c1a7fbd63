// ─────────────────────────────────────────────────────────────
// MELL Workbench  ·  Focused Proof Search
// Bounded backward search in Andreoli's focused calculus:
// an invertible phase on negative connectives, then a focus
// phase that commits to one positive formula at a time.
// ─────────────────────────────────────────────────────────────

import {
    rules, proofNode,
    type Formula, type Proof, type Sequent, type TwoSidedSequent,
    type Par, type Bottom, type With, type Tensor, type WhyNot,
} from '../core/ir';
import { desugar, formulaKey, isPositive } from '../core/formula';
import { desugarSequent, distinctWithIndex, isExponentialContext, removeAt, replaceAt, toOneSided } from '../core/sequent';
import { prettyFormula, prettySequent } from '../core/pretty';
import { getConfig } from '../config';

export interface ProverOptions {
    /** Rule applications allowed along a single branch. */
    maxDepth?: number;
    /** Keep FocusPositive / FocusNegative / Blur markers in the result. */
    recordFocus?: boolean;
    /** Trace search decisions through `console.debug`. */
    debug?: boolean;
}

export interface SearchStats {
    /** Sequents visited during the last search. */
    calls: number;
    /** Deepest level reached, counted from the root. */
    deepest: number;
}

type Invertible = Par | Bottom | With;

function isInvertible(f: Formula): f is Invertible {
    return f.tag === 'Par' || f.tag === 'Bottom' || f.tag === 'With';
}

function isDualPair(a: Formula, b: Formula): boolean {
    return (a.tag === 'Atom' && b.tag === 'NegAtom' && a.name === b.name)
        || (a.tag === 'NegAtom' && b.tag === 'Atom' && a.name === b.name);
}

/** Signed literals (`+a`, `-a`) occurring anywhere in a sequent, and whether `⊤` does. */
interface Resources {
    literals: Set<string>;
    top: boolean;
}

function resourcesOf(ctx: Formula[]): Resources {
    const res: Resources = { literals: new Set(), top: false };
    const walk = (f: Formula): void => {
        switch (f.tag) {
            case 'Atom': res.literals.add(`+${f.name}`); break;
            case 'NegAtom': res.literals.add(`-${f.name}`); break;
            case 'Top': res.top = true; break;
            case 'OfCourse': case 'WhyNot': walk(f.body); break;
            case 'Tensor': case 'Par': case 'With': case 'Plus':
                walk(f.left);
                walk(f.right);
                break;
            case 'Lolli': walk(desugar(f)); break;
            default: break;
        }
    };
    ctx.forEach(walk);
    return res;
}

/**
 * Whether a cut-free proof could use up `f` entirely. With no `⊤` in the
 * sequent every literal must meet its dual at an axiom, so a formula that
 * cannot do so is never worth a dereliction.
 */
function mayClose(f: Formula, literals: Set<string>): boolean {
    switch (f.tag) {
        case 'Atom': return literals.has(`-${f.name}`);
        case 'NegAtom': return literals.has(`+${f.name}`);
        case 'One': case 'Bottom': case 'Top': case 'WhyNot': return true;
        case 'Zero': return false;
        case 'OfCourse': return mayClose(f.body, literals);
        case 'Plus': return mayClose(f.left, literals) || mayClose(f.right, literals);
        case 'Tensor': case 'Par': case 'With':
            return mayClose(f.left, literals) && mayClose(f.right, literals);
        case 'Lolli': return mayClose(desugar(f), literals);
    }
}

/** One way to hand the side formulas of a `⊗` to its two premises. */
interface Split {
    left: Formula[];
    right: Formula[];
    /** `?`-formulas given to both premises, each after a contraction. */
    shared: WhyNot[];
}

/**
 * Every split of `others`. Linear formulas go left or right; a `?`-formula
 * may also go to both sides. Splits equal as multisets are produced once.
 */
function* splits(others: Formula[]): Generator<Split> {
    const seen = new Set<string>();
    const keyOf = (fs: Formula[]): string => fs.map(formulaKey).sort().join(';');

    function* assign(i: number, left: Formula[], right: Formula[], shared: WhyNot[]): Generator<Split> {
        if (i === others.length) {
            const key = `${keyOf(left)}|${keyOf(right)}|${keyOf(shared)}`;
            if (seen.has(key)) return;
            seen.add(key);
            yield { left, right, shared };
            return;
        }
        const f = others[i];
        yield* assign(i + 1, [...left, f], right, shared);
        yield* assign(i + 1, left, [...right, f], shared);
        if (f.tag === 'WhyNot') yield* assign(i + 1, left, right, [...shared, f]);
    }

    yield* assign(0, [], [], []);
}

export class Prover {
    readonly maxDepth: number;
    private readonly recordFocus: boolean;
    private readonly debug: boolean;

    private calls = 0;
    private deepest = 0;

    constructor(options: ProverOptions = {}) {
        const config = getConfig();
        this.maxDepth = options.maxDepth ?? config.maxDepth;
        this.recordFocus = options.recordFocus ?? false;
        this.debug = options.debug ?? config.debug;
    }

    get stats(): SearchStats {
        return { calls: this.calls, deepest: this.deepest };
    }

    /**
     * Searches for a proof of `⊢ Γ`. Implications are desugared first, so
     * the root of the returned proof concludes the desugared sequent.
     * Returns `null` when no proof exists within the depth bound.
     */
    prove(goal: Sequent): Proof | null {
        this.calls = 0;
        this.deepest = 0;
        const ctx = desugarSequent(goal).linear;
        const proof = this.search(ctx, this.maxDepth);
        this.trace(`${prettySequent({ linear: ctx })}: ${proof ? 'proved' : 'no proof'} after ${this.calls} calls`);
        return proof;
    }

    proveTwoSided(goal: TwoSidedSequent): Proof | null {
        return this.prove(toOneSided(goal));
    }

    provable(goal: Sequent): boolean {
        return this.prove(goal) !== null;
    }

    // ── Main loop ─────────────────────────────────────────

    private search(ctx: Formula[], depth: number): Proof | null {
        this.calls++;
        this.deepest = Math.max(this.deepest, this.maxDepth - depth);

        const leaf = this.closeLeaf(ctx);
        if (leaf) return leaf;
        if (depth <= 0) return null;

        const index = ctx.findIndex(isInvertible);
        if (index >= 0) return this.invertible(ctx, index, depth);

        return this.decide(ctx, depth) ?? this.exponentials(ctx, depth);
    }

    /** Zero-premise rules. They cost no depth. */
    private closeLeaf(ctx: Formula[]): Proof | null {
        if (ctx.some(f => f.tag === 'Top')) return proofNode({ linear: ctx }, rules.topIntro);
        if (ctx.length === 2 && isDualPair(ctx[0], ctx[1])) return proofNode({ linear: ctx }, rules.axiom);
        if (ctx.length === 1 && ctx[0].tag === 'One') return proofNode({ linear: ctx }, rules.oneIntro);
        return null;
    }

    // ── Invertible phase ──────────────────────────────────

    private invertible(ctx: Formula[], index: number, depth: number): Proof | null {
        const f = ctx[index];
        let proof: Proof | null = null;

        switch (f.tag) {
            case 'Par': {
                const p = this.search(replaceAt(ctx, index, f.left, f.right), depth - 1);
                proof = p && proofNode({ linear: ctx }, rules.parIntro, [p]);
                break;
            }
            case 'Bottom': {
                const p = this.search(removeAt(ctx, index), depth - 1);
                proof = p && proofNode({ linear: ctx }, rules.bottomIntro, [p]);
                break;
            }
            case 'With': {
                const l = this.search(replaceAt(ctx, index, f.left), depth - 1);
                if (!l) return null;
                const r = this.search(replaceAt(ctx, index, f.right), depth - 1);
                proof = r && proofNode({ linear: ctx }, rules.withIntro, [l, r]);
                break;
            }
            default:
                return null;
        }

        if (proof && this.recordFocus) return proofNode({ linear: ctx }, rules.focusNegative(f), [proof]);
        return proof;
    }

    // ── Focus phase ───────────────────────────────────────

    /** Tries each distinct positive formula as the focus, left to right. */
    private decide(ctx: Formula[], depth: number): Proof | null {
        for (const { formula, index } of distinctWithIndex(ctx)) {
            if (!isPositive(formula)) continue;
            this.trace(`focus ${prettyFormula(formula)} (depth ${depth})`);
            const p = this.focus(ctx, index, depth);
            if (p) return this.recordFocus ? proofNode({ linear: ctx }, rules.focusPositive(formula), [p]) : p;
        }
        return null;
    }

    private focus(ctx: Formula[], index: number, depth: number): Proof | null {
        const f = ctx[index];
        switch (f.tag) {
            case 'Atom': return this.focusAtom(ctx, index, depth);
            case 'One': return this.focusOne(ctx, index, depth);
            case 'Zero': return null;
            case 'Tensor': return this.focusTensor(ctx, index, f, depth);
            case 'Plus': {
                if (depth <= 0) return null;
                const l = this.continueFocus(replaceAt(ctx, index, f.left), index, depth - 1);
                if (l) return proofNode({ linear: ctx }, rules.plusIntroLeft, [l]);
                const r = this.continueFocus(replaceAt(ctx, index, f.right), index, depth - 1);
                return r && proofNode({ linear: ctx }, rules.plusIntroRight, [r]);
            }
            case 'OfCourse': {
                if (depth <= 0) return null;
                if (!isExponentialContext(removeAt(ctx, index))) return null;
                const p = this.search(replaceAt(ctx, index, f.body), depth - 1);
                return p && proofNode({ linear: ctx }, rules.ofCourseIntro, [p]);
            }
            default:
                return this.continueFocus(ctx, index, depth);
        }
    }

    /** A positive subformula stays in focus; a negative one is released. */
    private continueFocus(ctx: Formula[], index: number, depth: number): Proof | null {
        if (isPositive(ctx[index])) return this.focus(ctx, index, depth);
        const p = this.search(ctx, depth);
        return p && this.recordFocus ? proofNode({ linear: ctx }, rules.blur, [p]) : p;
    }

    private focusAtom(ctx: Formula[], index: number, depth: number): Proof | null {
        const atom = ctx[index];
        if (atom.tag !== 'Atom') return null;
        const restIsExponential = (except: number): boolean =>
            ctx.every((g, k) => k === index || k === except || g.tag === 'WhyNot');

        const dual = ctx.findIndex((g, k) => k !== index && g.tag === 'NegAtom' && g.name === atom.name);
        if (dual >= 0 && restIsExponential(dual)) {
            return this.weakenExcept(ctx, new Set([index, dual]), depth, c => proofNode({ linear: c }, rules.axiom));
        }

        const stored = ctx.findIndex((g, k) =>
            k !== index && g.tag === 'WhyNot' && g.body.tag === 'NegAtom' && g.body.name === atom.name);
        if (stored >= 0 && restIsExponential(stored)) {
            return this.weakenExcept(ctx, new Set([index, stored]), depth, (c, d) => this.derelictIntoAxiom(c, d));
        }
        return null;
    }

    private focusOne(ctx: Formula[], index: number, depth: number): Proof | null {
        if (!ctx.every((g, k) => k === index || g.tag === 'WhyNot')) return null;
        return this.weakenExcept(ctx, new Set([index]), depth, c => proofNode({ linear: c }, rules.oneIntro));
    }

    private focusTensor(ctx: Formula[], index: number, f: Tensor, depth: number): Proof | null {
        if (depth <= 0) return null;

        for (const { left, right, shared } of splits(removeAt(ctx, index))) {
            // one contraction per shared formula, then the tensor itself
            const remaining = depth - shared.length - 1;
            if (remaining < 0) continue;

            const leftCtx = [...left, ...shared, f.left];
            const l = this.continueFocus(leftCtx, leftCtx.length - 1, remaining);
            if (!l) continue;
            const rightCtx = [...right, ...shared, f.right];
            const r = this.continueFocus(rightCtx, rightCtx.length - 1, remaining);
            if (!r) continue;

            let proof = proofNode({ linear: [...ctx, ...shared] }, rules.tensorIntro, [l, r]);
            for (let k = shared.length - 1; k >= 0; k--) {
                proof = proofNode({ linear: [...ctx, ...shared.slice(0, k)] }, rules.contraction, [proof]);
            }
            return proof;
        }
        return null;
    }

    // ── Exponential moves ─────────────────────────────────

    /**
     * Fallback when neither phase applies: use a `?A` once, or keep a copy
     * and use the other. Bodies that are negated atoms are left for the
     * axiom leaves, where `focusAtom` consumes them, and bodies that could
     * never be used up are skipped.
     */
    private exponentials(ctx: Formula[], depth: number): Proof | null {
        const { literals, top } = resourcesOf(ctx);
        for (const { formula, index } of distinctWithIndex(ctx)) {
            if (formula.tag !== 'WhyNot' || formula.body.tag === 'NegAtom') continue;
            if (!top && !mayClose(formula.body, literals)) {
                this.trace(`skip ${prettyFormula(formula)}: no dual for its literals`);
                continue;
            }

            const once = this.derelict(ctx, index, formula, depth);
            if (once) return once;

            if (depth < 2) continue;
            const copied = [...ctx, formula];
            const kept = this.derelict(copied, copied.length - 1, formula, depth - 1);
            if (kept) return proofNode({ linear: ctx }, rules.contraction, [kept]);
        }
        return null;
    }

    /** `⊢ Γ, ?A` from `⊢ Γ, A`. A positive body is focused at once. */
    private derelict(ctx: Formula[], index: number, f: WhyNot, depth: number): Proof | null {
        if (depth <= 0) return null;
        const next = replaceAt(ctx, index, f.body);

        if (isPositive(f.body)) {
            const focused = this.focus(next, index, depth - 1);
            if (!focused) return null;
            const p = this.recordFocus ? proofNode({ linear: next }, rules.focusPositive(f.body), [focused]) : focused;
            return proofNode({ linear: ctx }, rules.whyNotIntro, [p]);
        }

        const p = this.search(next, depth - 1);
        return p && proofNode({ linear: ctx }, rules.dereliction, [p]);
    }

    private derelictIntoAxiom(ctx: Formula[], depth: number): Proof | null {
        if (depth <= 0) return null;
        const index = ctx.findIndex(g => g.tag === 'WhyNot');
        if (index < 0) return null;
        const stored = ctx[index];
        if (stored.tag !== 'WhyNot') return null;
        const premise = replaceAt(ctx, index, stored.body);
        return proofNode({ linear: ctx }, rules.dereliction, [proofNode({ linear: premise }, rules.axiom)]);
    }

    /** Weakens away every formula whose index is not kept, then closes. */
    private weakenExcept(
        ctx: Formula[],
        keep: Set<number>,
        depth: number,
        close: (ctx: Formula[], depth: number) => Proof | null,
    ): Proof | null {
        const drop = ctx.findIndex((_, k) => !keep.has(k));
        if (drop < 0) return close(ctx, depth);
        if (depth <= 0) return null;

        const shifted = new Set([...keep].map(k => (k > drop ? k - 1 : k)));
        const p = this.weakenExcept(removeAt(ctx, drop), shifted, depth - 1, close);
        return p && proofNode({ linear: ctx }, rules.weakening, [p]);
    }

    private trace(message: string): void {
        if (this.debug) console.debug(`[Prover] ${message}`);
    }
}

/** Searches with a fresh prover. */
export function prove(goal: Sequent, options: ProverOptions = {}): Proof | null {
    return new Prover(options).prove(goal);
}
