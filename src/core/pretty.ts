// ─────────────────────────────────────────────────────────────
// MELL Workbench  ·  Pretty-Printer
// Formulas, sequents, rules and terms in Unicode, ASCII and LaTeX
// ─────────────────────────────────────────────────────────────

import type { Formula, Rule, Sequent, Term, TwoSidedSequent } from './ir';

export type Notation = 'unicode' | 'ascii';

// ── Formulas ────────────────────────────────────────────────

interface Glyphs {
    tensor: string; par: string; with: string; plus: string; lolli: string;
    one: string; bottom: string; top: string; zero: string;
    neg: string; ofCourse: string; whyNot: string;
}

const UNICODE: Glyphs = {
    tensor: '⊗', par: '⅋', with: '&', plus: '⊕', lolli: '⊸',
    one: '1', bottom: '⊥', top: '⊤', zero: '0',
    neg: '⊥', ofCourse: '!', whyNot: '?',
};

const ASCII: Glyphs = {
    tensor: '*', par: '|', with: '&', plus: '+', lolli: '-o',
    one: '1', bottom: 'bot', top: 'top', zero: '0',
    neg: '^', ofCourse: '!', whyNot: '?',
};

/** Binary connectives are always parenthesised: `(A ⊗ B)`. */
export function prettyFormula(f: Formula, notation: Notation = 'unicode'): string {
    const g = notation === 'unicode' ? UNICODE : ASCII;
    const go = (h: Formula): string => prettyFormula(h, notation);

    switch (f.tag) {
        case 'Atom': return f.name;
        case 'NegAtom': return `${f.name}${g.neg}`;
        case 'One': return g.one;
        case 'Bottom': return g.bottom;
        case 'Top': return g.top;
        case 'Zero': return g.zero;
        case 'OfCourse': return `${g.ofCourse}${go(f.body)}`;
        case 'WhyNot': return `${g.whyNot}${go(f.body)}`;
        case 'Tensor': return `(${go(f.left)} ${g.tensor} ${go(f.right)})`;
        case 'Par': return `(${go(f.left)} ${g.par} ${go(f.right)})`;
        case 'With': return `(${go(f.left)} ${g.with} ${go(f.right)})`;
        case 'Plus': return `(${go(f.left)} ${g.plus} ${go(f.right)})`;
        case 'Lolli': return `(${go(f.left)} ${g.lolli} ${go(f.right)})`;
    }
}

/**
 * `cmll` uses the macros of the cmll package (`\parr`, `\with`);
 * `katex` sticks to what KaTeX can typeset.
 */
export type LatexDialect = 'cmll' | 'katex';

export function latexFormula(f: Formula, dialect: LatexDialect = 'cmll'): string {
    const go = (h: Formula): string => latexFormula(h, dialect);
    const bin = (op: string, l: Formula, r: Formula): string => `(${go(l)} ${op} ${go(r)})`;

    switch (f.tag) {
        case 'Atom': return f.name;
        case 'NegAtom': return `${f.name}^{\\bot}`;
        case 'One': return '\\mathbf{1}';
        case 'Bottom': return '\\bot';
        case 'Top': return '\\top';
        case 'Zero': return '\\mathbf{0}';
        case 'OfCourse': return `{!}${go(f.body)}`;
        case 'WhyNot': return `{?}${go(f.body)}`;
        case 'Tensor': return bin('\\otimes', f.left, f.right);
        case 'Par': return bin(dialect === 'cmll' ? '\\parr' : '\\mathbin{\\text{⅋}}', f.left, f.right);
        case 'With': return bin(dialect === 'cmll' ? '\\with' : '\\mathbin{\\&}', f.left, f.right);
        case 'Plus': return bin('\\oplus', f.left, f.right);
        case 'Lolli': return bin('\\multimap', f.left, f.right);
    }
}

// ── Sequents ────────────────────────────────────────────────

export function prettySequent(s: Sequent, notation: Notation = 'unicode'): string {
    const turnstile = notation === 'unicode' ? '⊢' : '|-';
    if (s.linear.length === 0) return turnstile;
    return `${turnstile} ${s.linear.map(f => prettyFormula(f, notation)).join(', ')}`;
}

export function prettyTwoSided(s: TwoSidedSequent, notation: Notation = 'unicode'): string {
    const turnstile = notation === 'unicode' ? '⊢' : '|-';
    const side = (fs: Formula[]): string => fs.map(f => prettyFormula(f, notation)).join(', ');
    return [side(s.antecedent), turnstile, side(s.succedent)].filter(part => part.length > 0).join(' ');
}

export function latexSequent(s: Sequent, dialect: LatexDialect = 'cmll'): string {
    if (s.linear.length === 0) return '\\vdash';
    return `\\vdash ${s.linear.map(f => latexFormula(f, dialect)).join(', ')}`;
}

// ── Rules ───────────────────────────────────────────────────

export function ruleName(rule: Rule): string {
    switch (rule.tag) {
        case 'Axiom': return 'axiom';
        case 'OneIntro': return 'one';
        case 'TopIntro': return 'top';
        case 'BottomIntro': return 'bottom';
        case 'TensorIntro': return 'tensor';
        case 'ParIntro': return 'par';
        case 'WithIntro': return 'with';
        case 'PlusIntroLeft': return 'plus-left';
        case 'PlusIntroRight': return 'plus-right';
        case 'OfCourseIntro': return 'of-course';
        case 'WhyNotIntro': return 'why-not';
        case 'Weakening': return 'weakening';
        case 'Contraction': return 'contraction';
        case 'Dereliction': return 'dereliction';
        case 'Cut': return 'cut';
        case 'FocusPositive': return 'focus+';
        case 'FocusNegative': return 'focus-';
        case 'Blur': return 'blur';
    }
}

/** Short label drawn next to an inference line. */
export function ruleSymbol(rule: Rule, notation: Notation = 'unicode'): string {
    const g = notation === 'unicode' ? UNICODE : ASCII;
    switch (rule.tag) {
        case 'Axiom': return 'ax';
        case 'OneIntro': return g.one;
        case 'TopIntro': return g.top;
        case 'BottomIntro': return g.bottom;
        case 'TensorIntro': return g.tensor;
        case 'ParIntro': return g.par;
        case 'WithIntro': return g.with;
        case 'PlusIntroLeft': return `${g.plus}L`;
        case 'PlusIntroRight': return `${g.plus}R`;
        case 'OfCourseIntro': return g.ofCourse;
        case 'WhyNotIntro': return g.whyNot;
        case 'Weakening': return 'W';
        case 'Contraction': return 'C';
        case 'Dereliction': return 'D';
        case 'Cut': return `cut ${prettyFormula(rule.formula, notation)}`;
        case 'FocusPositive': return 'F+';
        case 'FocusNegative': return 'F-';
        case 'Blur': return 'B';
    }
}

// ── Terms ───────────────────────────────────────────────────

function isAtomicTerm(t: Term): boolean {
    switch (t.tag) {
        case 'Var': case 'Unit': case 'Trivial': case 'Pair': case 'App':
            return true;
        default:
            return false;
    }
}

export function prettyTerm(term: Term): string {
    const wrap = (t: Term): string => isAtomicTerm(t) ? prettyTerm(t) : `(${prettyTerm(t)})`;

    switch (term.tag) {
        case 'Var': return term.name;
        case 'Unit': return '()';
        case 'Trivial': return '⟨⟩';
        case 'Abs': return `λ${term.param}. ${prettyTerm(term.body)}`;
        case 'App': return `(${prettyTerm(term.func)} ${wrap(term.arg)})`;
        case 'Pair': return `(${prettyTerm(term.fst)}, ${prettyTerm(term.snd)})`;
        case 'LetPair':
            return `let (${term.left}, ${term.right}) = ${prettyTerm(term.pair)} in ${prettyTerm(term.body)}`;
        case 'Inl': return `inl ${wrap(term.term)}`;
        case 'Inr': return `inr ${wrap(term.term)}`;
        case 'Case':
            return `case ${prettyTerm(term.scrutinee)} of inl ${term.leftVar} ⇒ ${prettyTerm(term.left)}`
                + ` | inr ${term.rightVar} ⇒ ${prettyTerm(term.right)}`;
        case 'Promote': return `!${wrap(term.term)}`;
        case 'Derelict': return `derelict ${wrap(term.term)}`;
        case 'Copy':
            return `copy ${prettyTerm(term.source)} as ${term.left}, ${term.right} in ${prettyTerm(term.body)}`;
        case 'Discard': return `discard ${prettyTerm(term.discarded)} in ${prettyTerm(term.body)}`;
        case 'Abort': return `abort ${wrap(term.term)}`;
        case 'Fst': return `fst ${wrap(term.term)}`;
        case 'Snd': return `snd ${wrap(term.term)}`;
    }
}
