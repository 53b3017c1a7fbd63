// ─────────────────────────────────────────────────────────────
// MELL Workbench  ·  Linear λ-Terms
// Free variables, capture-avoiding substitution, α-equivalence
// ─────────────────────────────────────────────────────────────

import type { Term } from './ir';

// ── Free variables ──────────────────────────────────────────

export function freeVars(term: Term): Set<string> {
    switch (term.tag) {
        case 'Var': return new Set([term.name]);
        case 'Unit': case 'Trivial': return new Set();
        case 'Abs': return without(freeVars(term.body), term.param);
        case 'App': return union(freeVars(term.func), freeVars(term.arg));
        case 'Pair': return union(freeVars(term.fst), freeVars(term.snd));
        case 'LetPair':
            return union(freeVars(term.pair), without(freeVars(term.body), term.left, term.right));
        case 'Case':
            return union(
                freeVars(term.scrutinee),
                union(without(freeVars(term.left), term.leftVar), without(freeVars(term.right), term.rightVar)),
            );
        case 'Copy':
            return union(freeVars(term.source), without(freeVars(term.body), term.left, term.right));
        case 'Discard': return union(freeVars(term.discarded), freeVars(term.body));
        case 'Inl': case 'Inr': case 'Promote': case 'Derelict': case 'Abort': case 'Fst': case 'Snd':
            return freeVars(term.term);
    }
}

function union(a: Set<string>, b: Set<string>): Set<string> {
    const r = new Set(a);
    for (const v of b) r.add(v);
    return r;
}

function without(s: Set<string>, ...names: string[]): Set<string> {
    for (const n of names) s.delete(n);
    return s;
}

// ── Fresh variable generation ───────────────────────────────

function fresh(base: string, avoid: Set<string>, counter: { value: number }): string {
    let candidate = base + '′';
    while (avoid.has(candidate)) {
        counter.value++;
        candidate = base + '′' + counter.value;
    }
    return candidate;
}

// ── Capture-avoiding substitution ───────────────────────────

/** `term[name := replacement]`, renaming binders that would capture. */
export function substitute(term: Term, name: string, replacement: Term): Term {
    const ctx: SubstContext = { name, replacement, replFV: freeVars(replacement), counter: { value: 0 } };
    return subst(term, ctx);
}

interface SubstContext {
    name: string;
    replacement: Term;
    replFV: Set<string>;
    counter: { value: number };
}

function subst(term: Term, ctx: SubstContext): Term {
    switch (term.tag) {
        case 'Var':
            return term.name === ctx.name ? ctx.replacement : term;

        case 'Unit':
        case 'Trivial':
            return term;

        case 'Abs': {
            const [[param], body] = underBinders([term.param], term.body, ctx);
            return { tag: 'Abs', param, body };
        }

        case 'App':
            return { tag: 'App', func: subst(term.func, ctx), arg: subst(term.arg, ctx) };

        case 'Pair':
            return { tag: 'Pair', fst: subst(term.fst, ctx), snd: subst(term.snd, ctx) };

        case 'LetPair': {
            const [[left, right], body] = underBinders([term.left, term.right], term.body, ctx);
            return { tag: 'LetPair', left, right, pair: subst(term.pair, ctx), body };
        }

        case 'Case': {
            const [[leftVar], left] = underBinders([term.leftVar], term.left, ctx);
            const [[rightVar], right] = underBinders([term.rightVar], term.right, ctx);
            return { tag: 'Case', scrutinee: subst(term.scrutinee, ctx), leftVar, left, rightVar, right };
        }

        case 'Copy': {
            const [[left, right], body] = underBinders([term.left, term.right], term.body, ctx);
            return { tag: 'Copy', source: subst(term.source, ctx), left, right, body };
        }

        case 'Discard':
            return { tag: 'Discard', discarded: subst(term.discarded, ctx), body: subst(term.body, ctx) };

        case 'Inl': case 'Inr': case 'Promote': case 'Derelict': case 'Abort': case 'Fst': case 'Snd':
            return { tag: term.tag, term: subst(term.term, ctx) };
    }
}

/**
 * Substitutes inside a body that binds `binders`. Stops at shadowing;
 * renames any binder free in the replacement first.
 */
function underBinders(binders: string[], body: Term, ctx: SubstContext): [string[], Term] {
    if (binders.includes(ctx.name)) return [binders, body];
    if (!freeVars(body).has(ctx.name)) return [binders, body];

    const renamed = [...binders];
    let current = body;
    for (let i = 0; i < renamed.length; i++) {
        const b = renamed[i];
        if (!ctx.replFV.has(b)) continue;
        const avoid = union(ctx.replFV, union(freeVars(current), new Set([ctx.name, ...renamed])));
        const next = fresh(b, avoid, ctx.counter);
        current = substitute(current, b, { tag: 'Var', name: next });
        renamed[i] = next;
    }
    return [renamed, subst(current, ctx)];
}

// ── Equality ────────────────────────────────────────────────

/** Equality up to renaming of bound variables. */
export function termsEqual(a: Term, b: Term): boolean {
    return alphaEq(a, b, new Map(), new Map(), { value: 0 });
}

function alphaEq(
    a: Term, b: Term,
    envA: Map<string, number>, envB: Map<string, number>,
    depth: { value: number },
): boolean {
    const bind = (na: string[], nb: string[], ta: Term, tb: Term): boolean => {
        const ea = new Map(envA);
        const eb = new Map(envB);
        for (let i = 0; i < na.length; i++) {
            const level = depth.value++;
            ea.set(na[i], level);
            eb.set(nb[i], level);
        }
        return alphaEq(ta, tb, ea, eb, depth);
    };

    switch (a.tag) {
        case 'Var': {
            if (b.tag !== 'Var') return false;
            const la = envA.get(a.name);
            const lb = envB.get(b.name);
            if (la === undefined && lb === undefined) return a.name === b.name;
            return la === lb;
        }
        case 'Unit': case 'Trivial':
            return b.tag === a.tag;
        case 'Abs':
            return b.tag === 'Abs' && bind([a.param], [b.param], a.body, b.body);
        case 'App':
            return b.tag === 'App' && alphaEq(a.func, b.func, envA, envB, depth) && alphaEq(a.arg, b.arg, envA, envB, depth);
        case 'Pair':
            return b.tag === 'Pair' && alphaEq(a.fst, b.fst, envA, envB, depth) && alphaEq(a.snd, b.snd, envA, envB, depth);
        case 'LetPair':
            return b.tag === 'LetPair'
                && alphaEq(a.pair, b.pair, envA, envB, depth)
                && bind([a.left, a.right], [b.left, b.right], a.body, b.body);
        case 'Case':
            return b.tag === 'Case'
                && alphaEq(a.scrutinee, b.scrutinee, envA, envB, depth)
                && bind([a.leftVar], [b.leftVar], a.left, b.left)
                && bind([a.rightVar], [b.rightVar], a.right, b.right);
        case 'Copy':
            return b.tag === 'Copy'
                && alphaEq(a.source, b.source, envA, envB, depth)
                && bind([a.left, a.right], [b.left, b.right], a.body, b.body);
        case 'Discard':
            return b.tag === 'Discard'
                && alphaEq(a.discarded, b.discarded, envA, envB, depth)
                && alphaEq(a.body, b.body, envA, envB, depth);
        case 'Inl': case 'Inr': case 'Promote': case 'Derelict': case 'Abort': case 'Fst': case 'Snd':
            return b.tag === a.tag && alphaEq(a.term, b.term, envA, envB, depth);
    }
}

export function termSize(term: Term): number {
    switch (term.tag) {
        case 'Var': case 'Unit': case 'Trivial': return 1;
        case 'Abs': return 1 + termSize(term.body);
        case 'App': return 1 + termSize(term.func) + termSize(term.arg);
        case 'Pair': return 1 + termSize(term.fst) + termSize(term.snd);
        case 'LetPair': return 1 + termSize(term.pair) + termSize(term.body);
        case 'Case': return 1 + termSize(term.scrutinee) + termSize(term.left) + termSize(term.right);
        case 'Copy': return 1 + termSize(term.source) + termSize(term.body);
        case 'Discard': return 1 + termSize(term.discarded) + termSize(term.body);
        case 'Inl': case 'Inr': case 'Promote': case 'Derelict': case 'Abort': case 'Fst': case 'Snd':
            return 1 + termSize(term.term);
    }
}

/**
 * Simultaneous substitution. Each name is first renamed apart from every
 * replacement, so one replacement never lands inside another.
 */
export function substituteAll(term: Term, bindings: Array<[string, Term]>): Term {
    const avoid = new Set<string>(freeVars(term));
    for (const [name, replacement] of bindings) {
        avoid.add(name);
        for (const v of freeVars(replacement)) avoid.add(v);
    }

    const counter = { value: 0 };
    let current = term;
    const staged: Array<[string, Term]> = [];
    for (const [name, replacement] of bindings) {
        const temp = fresh(name, avoid, counter);
        avoid.add(temp);
        current = substitute(current, name, { tag: 'Var', name: temp });
        staged.push([temp, replacement]);
    }
    for (const [temp, replacement] of staged) current = substitute(current, temp, replacement);
    return current;
}
