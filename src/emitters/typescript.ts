// ─────────────────────────────────────────────────────────────
// MELL Workbench  ·  TypeScript Emitter
// Turns an extracted proof term into a runnable function
// ─────────────────────────────────────────────────────────────

import type { Sequent, Term } from '../core/ir';
import { prettySequent } from '../core/pretty';
import { freeVars } from '../core/term';

export interface TypeScriptOptions {
    /** Name of the generated function. */
    name?: string;
    /** Emit a standalone module: runtime prelude plus an exported function. */
    module?: boolean;
}

// Values carried by generated code. `!A` is a thunk so promoted values are
// only computed when derelicted.
const PRELUDE = `export type Value =
    | null
    | { readonly tag: 'trivial' }
    | { readonly tag: 'fn'; readonly apply: (arg: Value) => Value }
    | { readonly tag: 'pair'; readonly fst: Value; readonly snd: Value }
    | { readonly tag: 'inl'; readonly value: Value }
    | { readonly tag: 'inr'; readonly value: Value }
    | { readonly tag: 'bang'; readonly force: () => Value };

const TRIVIAL: Value = { tag: 'trivial' };

function lam(body: (arg: Value) => Value): Value {
    return { tag: 'fn', apply: body };
}

function app(fn: Value, arg: Value): Value {
    if (fn === null || fn.tag !== 'fn') throw new TypeError('expected a function');
    return fn.apply(arg);
}

function pair(fst: Value, snd: Value): Value {
    return { tag: 'pair', fst, snd };
}

function fst(p: Value): Value {
    if (p === null || p.tag !== 'pair') throw new TypeError('expected a pair');
    return p.fst;
}

function snd(p: Value): Value {
    if (p === null || p.tag !== 'pair') throw new TypeError('expected a pair');
    return p.snd;
}

function letPair(p: Value, body: (fst: Value, snd: Value) => Value): Value {
    if (p === null || p.tag !== 'pair') throw new TypeError('expected a pair');
    return body(p.fst, p.snd);
}

function inl(value: Value): Value {
    return { tag: 'inl', value };
}

function inr(value: Value): Value {
    return { tag: 'inr', value };
}

function match(s: Value, left: (v: Value) => Value, right: (v: Value) => Value): Value {
    if (s !== null && s.tag === 'inl') return left(s.value);
    if (s !== null && s.tag === 'inr') return right(s.value);
    throw new TypeError('expected an injection');
}

function promote(force: () => Value): Value {
    return { tag: 'bang', force };
}

function derelict(v: Value): Value {
    if (v === null || v.tag !== 'bang') throw new TypeError('expected a promoted value');
    return v.force();
}

function copy(v: Value, body: (first: Value, second: Value) => Value): Value {
    return body(v, v);
}

function discard(_v: Value, body: Value): Value {
    return body;
}

function abort(_v: Value): never {
    throw new Error('abort: there is no value of 0');
}`;

const RESERVED = new Set([
    'break', 'case', 'catch', 'class', 'const', 'continue', 'debugger', 'default', 'delete', 'do',
    'else', 'enum', 'export', 'extends', 'false', 'finally', 'for', 'function', 'if', 'import', 'in',
    'instanceof', 'new', 'null', 'return', 'super', 'switch', 'this', 'throw', 'true', 'try',
    'typeof', 'var', 'void', 'while', 'with', 'yield', 'let', 'static', 'await',
]);

/** Maps a term variable to a JavaScript identifier: `x0′` becomes `x0$`. */
export function identifier(name: string): string {
    let id = name.replace(/′/g, '$').replace(/[^\w$]/g, '_');
    if (id === '' || /^\d/.test(id)) id = `_${id}`;
    return RESERVED.has(id) ? `${id}_` : id;
}

/** A term as one expression over the prelude's helpers. */
export function tsExpression(term: Term): string {
    const go = tsExpression;
    switch (term.tag) {
        case 'Var': return identifier(term.name);
        case 'Abs': return `lam((${identifier(term.param)}) => ${go(term.body)})`;
        case 'App': return `app(${go(term.func)}, ${go(term.arg)})`;
        case 'Unit': return 'null';
        case 'Trivial': return 'TRIVIAL';
        case 'Pair': return `pair(${go(term.fst)}, ${go(term.snd)})`;
        case 'LetPair':
            return `letPair(${go(term.pair)}, (${identifier(term.left)}, ${identifier(term.right)}) => ${go(term.body)})`;
        case 'Inl': return `inl(${go(term.term)})`;
        case 'Inr': return `inr(${go(term.term)})`;
        case 'Case':
            return `match(${go(term.scrutinee)}, (${identifier(term.leftVar)}) => ${go(term.left)}, `
                + `(${identifier(term.rightVar)}) => ${go(term.right)})`;
        case 'Promote': return `promote(() => ${go(term.term)})`;
        case 'Derelict': return `derelict(${go(term.term)})`;
        case 'Copy':
            return `copy(${go(term.source)}, (${identifier(term.left)}, ${identifier(term.right)}) => ${go(term.body)})`;
        case 'Discard': return `discard(${go(term.discarded)}, ${go(term.body)})`;
        case 'Abort': return `abort(${go(term.term)})`;
        case 'Fst': return `fst(${go(term.term)})`;
        case 'Snd': return `snd(${go(term.term)})`;
    }
}

/**
 * A function computing `term`. Free variables of the term (hypotheses the
 * proof weakened or contracted) become its parameters.
 */
export function renderTypeScript(goal: Sequent, term: Term, options: TypeScriptOptions = {}): string {
    const name = identifier(options.name ?? (options.module ? 'generated' : 'f'));
    const params = [...freeVars(term)].map(v => `${identifier(v)}: Value`).join(', ');
    const fn = [
        `/** ${prettySequent(goal)} */`,
        `${options.module ? 'export ' : ''}function ${name}(${params}): Value {`,
        `    return ${tsExpression(term)};`,
        '}',
    ].join('\n');

    if (!options.module) return fn;
    return ['// Generated by mell codegen', '', PRELUDE, '', fn, ''].join('\n');
}
