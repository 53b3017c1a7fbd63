// ─────────────────────────────────────────────────────────────
// MELL Workbench  ·  Term Extraction (Curry–Howard)
// Reads a derivation as a linear λ-term
// ─────────────────────────────────────────────────────────────

import { mk, type Formula, type Proof, type Term } from '../core/ir';
import { formulasEqual, negate } from '../core/formula';
import { substitute } from '../core/term';

/**
 * Each instance owns a name counter and a stack of hypotheses introduced
 * by cuts. Use one instance per extraction; it is not reentrant.
 */
export class Extractor {
    private counter = 0;
    private readonly env: Array<[Formula, string]> = [];

    extract(proof: Proof): Term {
        const [first, second] = proof.premises;
        const sub = (p: Proof | undefined): Term => (p ? this.extract(p) : mk.unit);

        switch (proof.rule.tag) {
            case 'Axiom': return this.axiom(proof);
            case 'OneIntro': return mk.unit;
            case 'TopIntro': return mk.trivial;

            case 'TensorIntro':
            case 'WithIntro':
                return mk.pair(sub(first), sub(second));

            case 'PlusIntroLeft': return mk.inl(sub(first));
            case 'PlusIntroRight': return mk.inr(sub(first));
            case 'OfCourseIntro': return mk.promote(sub(first));
            case 'Dereliction': return mk.derelict(sub(first));

            case 'Weakening':
                return mk.discard(mk.var(this.fresh()), sub(first));

            case 'Contraction': {
                const source = this.fresh();
                const left = this.fresh();
                const right = this.fresh();
                return mk.copy(mk.var(source), left, right, sub(first));
            }

            case 'Cut': return this.cut(proof.rule.formula, first, second);

            case 'ParIntro':
            case 'BottomIntro':
            case 'WhyNotIntro':
            case 'FocusPositive':
            case 'FocusNegative':
            case 'Blur':
                return sub(first);
        }
    }

    /** A hypothesis bound to the dual of a conclusion formula, else `λx. x`. */
    private axiom(proof: Proof): Term {
        for (const f of proof.conclusion.linear) {
            const bound = this.lookup(negate(f));
            if (bound !== undefined) return mk.var(bound);
        }
        const x = this.fresh();
        return mk.abs(x, mk.var(x));
    }

    /**
     * The left premise produces a value of the cut formula; the right one
     * consumes it under a fresh hypothesis. Tensor and plus cuts destructure
     * the produced value, giving each branch of a case its own continuation.
     */
    private cut(formula: Formula, producerProof: Proof | undefined, consumerProof: Proof | undefined): Term {
        const v = this.varFor(formula);
        const producer = producerProof ? this.extract(producerProof) : mk.unit;

        this.env.push([formula, v]);
        let consumer: Term;
        try {
            consumer = consumerProof ? this.extract(consumerProof) : mk.unit;
        } finally {
            this.env.pop();
        }

        switch (formula.tag) {
            case 'Tensor': {
                const x = this.fresh();
                const y = this.fresh();
                return mk.letPair(x, y, producer, substitute(consumer, v, mk.pair(mk.var(x), mk.var(y))));
            }
            case 'Plus': {
                const x = this.fresh();
                const y = this.fresh();
                return mk.case(
                    producer,
                    x, substitute(consumer, v, mk.inl(mk.var(x))),
                    y, substitute(consumer, v, mk.inr(mk.var(y))),
                );
            }
            default:
                return mk.app(mk.abs(v, consumer), producer);
        }
    }

    private lookup(f: Formula): string | undefined {
        for (let i = this.env.length - 1; i >= 0; i--) {
            const [bound, name] = this.env[i];
            if (formulasEqual(bound, f)) return name;
        }
        return undefined;
    }

    private fresh(): string {
        return `x${this.counter++}`;
    }

    /**
     * Atom-named hypotheses read better: `a_3` for a cut on `A`. The
     * underscore keeps them apart from `x<n>` even when the atom name
     * ends in a digit.
     */
    private varFor(f: Formula): string {
        if (f.tag === 'Atom' || f.tag === 'NegAtom') return `${f.name.toLowerCase()}_${this.counter++}`;
        return this.fresh();
    }
}

export function extractTerm(proof: Proof): Term {
    return new Extractor().extract(proof);
}
