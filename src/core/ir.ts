// ─────────────────────────────────────────────────────────────
// MELL Workbench  ·  Intermediate Representation
// Formulas, sequents, derivations and linear λ-terms
// ─────────────────────────────────────────────────────────────

// ── Formulas ────────────────────────────────────────────────

export type Formula =
    | Atom
    | NegAtom
    | Tensor
    | Par
    | One
    | Bottom
    | With
    | Plus
    | Top
    | Zero
    | OfCourse
    | WhyNot
    | Lolli;

export interface Atom {
    tag: 'Atom';
    name: string;
}

export interface NegAtom {
    tag: 'NegAtom';
    name: string;
}

export interface Tensor {
    tag: 'Tensor';
    left: Formula;
    right: Formula;
}

export interface Par {
    tag: 'Par';
    left: Formula;
    right: Formula;
}

export interface With {
    tag: 'With';
    left: Formula;
    right: Formula;
}

export interface Plus {
    tag: 'Plus';
    left: Formula;
    right: Formula;
}

/** Linear implication. Sugar for `A⊥ ⅋ B`; removed by `desugar` before search. */
export interface Lolli {
    tag: 'Lolli';
    left: Formula;
    right: Formula;
}

export interface One { tag: 'One' }
export interface Bottom { tag: 'Bottom' }
export interface Top { tag: 'Top' }
export interface Zero { tag: 'Zero' }

export interface OfCourse {
    tag: 'OfCourse';
    body: Formula;
}

export interface WhyNot {
    tag: 'WhyNot';
    body: Formula;
}

export type BinaryFormula = Tensor | Par | With | Plus | Lolli;
export type Connective = Formula['tag'];

// ── Sequents ────────────────────────────────────────────────

/** One-sided sequent `⊢ Γ`. Order is kept for display; equality is by multiset. */
export interface Sequent {
    linear: Formula[];
}

/** `Γ ⊢ Δ`, as parsed from user input. */
export interface TwoSidedSequent {
    antecedent: Formula[];
    succedent: Formula[];
}

// ── Inference rules ─────────────────────────────────────────

export type LogicalRule =
    | { tag: 'Axiom' }
    | { tag: 'OneIntro' }
    | { tag: 'TopIntro' }
    | { tag: 'BottomIntro' }
    | { tag: 'TensorIntro' }
    | { tag: 'ParIntro' }
    | { tag: 'WithIntro' }
    | { tag: 'PlusIntroLeft' }
    | { tag: 'PlusIntroRight' }
    | { tag: 'OfCourseIntro' }
    | { tag: 'WhyNotIntro' }
    | { tag: 'Weakening' }
    | { tag: 'Contraction' }
    | { tag: 'Dereliction' }
    | { tag: 'Cut'; formula: Formula };

/** Bookkeeping steps of the focusing discipline. They never change the sequent. */
export type FocusRule =
    | { tag: 'FocusPositive'; formula: Formula }
    | { tag: 'FocusNegative'; formula: Formula }
    | { tag: 'Blur' };

export type Rule = LogicalRule | FocusRule;
export type RuleTag = Rule['tag'];

export interface Proof {
    conclusion: Sequent;
    rule: Rule;
    premises: Proof[];
}

// ── Linear λ-terms ──────────────────────────────────────────

export type Term =
    | Var
    | Abs
    | App
    | UnitTerm
    | Trivial
    | Pair
    | LetPair
    | Inl
    | Inr
    | Case
    | Promote
    | Derelict
    | Copy
    | Discard
    | Abort
    | Fst
    | Snd;

export interface Var {
    tag: 'Var';
    name: string;
}

export interface Abs {
    tag: 'Abs';
    param: string;
    body: Term;
}

export interface App {
    tag: 'App';
    func: Term;
    arg: Term;
}

export interface UnitTerm { tag: 'Unit' }

/** Inhabitant of ⊤. */
export interface Trivial { tag: 'Trivial' }

export interface Pair {
    tag: 'Pair';
    fst: Term;
    snd: Term;
}

export interface LetPair {
    tag: 'LetPair';
    left: string;
    right: string;
    pair: Term;
    body: Term;
}

export interface Inl {
    tag: 'Inl';
    term: Term;
}

export interface Inr {
    tag: 'Inr';
    term: Term;
}

export interface Case {
    tag: 'Case';
    scrutinee: Term;
    leftVar: string;
    left: Term;
    rightVar: string;
    right: Term;
}

export interface Promote {
    tag: 'Promote';
    term: Term;
}

export interface Derelict {
    tag: 'Derelict';
    term: Term;
}

export interface Copy {
    tag: 'Copy';
    source: Term;
    left: string;
    right: string;
    body: Term;
}

export interface Discard {
    tag: 'Discard';
    discarded: Term;
    body: Term;
}

export interface Abort {
    tag: 'Abort';
    term: Term;
}

export interface Fst {
    tag: 'Fst';
    term: Term;
}

export interface Snd {
    tag: 'Snd';
    term: Term;
}

// ── Smart constructors ──────────────────────────────────────

export const fm = {
    atom: (name: string): Atom => ({ tag: 'Atom', name }),
    negAtom: (name: string): NegAtom => ({ tag: 'NegAtom', name }),
    tensor: (left: Formula, right: Formula): Tensor => ({ tag: 'Tensor', left, right }),
    par: (left: Formula, right: Formula): Par => ({ tag: 'Par', left, right }),
    with: (left: Formula, right: Formula): With => ({ tag: 'With', left, right }),
    plus: (left: Formula, right: Formula): Plus => ({ tag: 'Plus', left, right }),
    lolli: (left: Formula, right: Formula): Lolli => ({ tag: 'Lolli', left, right }),
    ofCourse: (body: Formula): OfCourse => ({ tag: 'OfCourse', body }),
    whyNot: (body: Formula): WhyNot => ({ tag: 'WhyNot', body }),
    one: { tag: 'One' } as const satisfies One,
    bottom: { tag: 'Bottom' } as const satisfies Bottom,
    top: { tag: 'Top' } as const satisfies Top,
    zero: { tag: 'Zero' } as const satisfies Zero,
};

export const sequent = (...linear: Formula[]): Sequent => ({ linear });

export const twoSided = (antecedent: Formula[], succedent: Formula[]): TwoSidedSequent =>
    ({ antecedent, succedent });

export const rules = {
    axiom: { tag: 'Axiom' } as const satisfies Rule,
    oneIntro: { tag: 'OneIntro' } as const satisfies Rule,
    topIntro: { tag: 'TopIntro' } as const satisfies Rule,
    bottomIntro: { tag: 'BottomIntro' } as const satisfies Rule,
    tensorIntro: { tag: 'TensorIntro' } as const satisfies Rule,
    parIntro: { tag: 'ParIntro' } as const satisfies Rule,
    withIntro: { tag: 'WithIntro' } as const satisfies Rule,
    plusIntroLeft: { tag: 'PlusIntroLeft' } as const satisfies Rule,
    plusIntroRight: { tag: 'PlusIntroRight' } as const satisfies Rule,
    ofCourseIntro: { tag: 'OfCourseIntro' } as const satisfies Rule,
    whyNotIntro: { tag: 'WhyNotIntro' } as const satisfies Rule,
    weakening: { tag: 'Weakening' } as const satisfies Rule,
    contraction: { tag: 'Contraction' } as const satisfies Rule,
    dereliction: { tag: 'Dereliction' } as const satisfies Rule,
    blur: { tag: 'Blur' } as const satisfies Rule,
    cut: (formula: Formula): Rule => ({ tag: 'Cut', formula }),
    focusPositive: (formula: Formula): Rule => ({ tag: 'FocusPositive', formula }),
    focusNegative: (formula: Formula): Rule => ({ tag: 'FocusNegative', formula }),
};

export const proofNode = (conclusion: Sequent, rule: Rule, premises: Proof[] = []): Proof =>
    ({ conclusion, rule, premises });

export const mk = {
    var: (name: string): Var => ({ tag: 'Var', name }),
    abs: (param: string, body: Term): Abs => ({ tag: 'Abs', param, body }),
    app: (func: Term, arg: Term): App => ({ tag: 'App', func, arg }),
    unit: { tag: 'Unit' } as const satisfies UnitTerm,
    trivial: { tag: 'Trivial' } as const satisfies Trivial,
    pair: (fst: Term, snd: Term): Pair => ({ tag: 'Pair', fst, snd }),
    letPair: (left: string, right: string, pair: Term, body: Term): LetPair =>
        ({ tag: 'LetPair', left, right, pair, body }),
    inl: (term: Term): Inl => ({ tag: 'Inl', term }),
    inr: (term: Term): Inr => ({ tag: 'Inr', term }),
    case: (scrutinee: Term, leftVar: string, left: Term, rightVar: string, right: Term): Case =>
        ({ tag: 'Case', scrutinee, leftVar, left, rightVar, right }),
    promote: (term: Term): Promote => ({ tag: 'Promote', term }),
    derelict: (term: Term): Derelict => ({ tag: 'Derelict', term }),
    copy: (source: Term, left: string, right: string, body: Term): Copy =>
        ({ tag: 'Copy', source, left, right, body }),
    discard: (discarded: Term, body: Term): Discard => ({ tag: 'Discard', discarded, body }),
    abort: (term: Term): Abort => ({ tag: 'Abort', term }),
    fst: (term: Term): Fst => ({ tag: 'Fst', term }),
    snd: (term: Term): Snd => ({ tag: 'Snd', term }),
};
