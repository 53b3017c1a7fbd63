// ─────────────────────────────────────────────────────────────
// MELL Workbench  ·  JSON Interchange
// Proofs as plain JSON, validated with zod on the way in
// ─────────────────────────────────────────────────────────────

import { z } from 'zod';
import type { Formula, Proof, Rule } from './ir';

const binary = <T extends 'Tensor' | 'Par' | 'With' | 'Plus' | 'Lolli'>(tag: T) =>
    z.object({ tag: z.literal(tag), left: FormulaSchema, right: FormulaSchema });

const nullary = <T extends string>(tag: T) => z.object({ tag: z.literal(tag) });

export const FormulaSchema: z.ZodType<Formula> = z.lazy(() =>
    z.discriminatedUnion('tag', [
        z.object({ tag: z.literal('Atom'), name: z.string().min(1) }),
        z.object({ tag: z.literal('NegAtom'), name: z.string().min(1) }),
        binary('Tensor'),
        binary('Par'),
        binary('With'),
        binary('Plus'),
        binary('Lolli'),
        nullary('One'),
        nullary('Bottom'),
        nullary('Top'),
        nullary('Zero'),
        z.object({ tag: z.literal('OfCourse'), body: FormulaSchema }),
        z.object({ tag: z.literal('WhyNot'), body: FormulaSchema }),
    ]),
);

export const RuleSchema: z.ZodType<Rule> = z.discriminatedUnion('tag', [
    nullary('Axiom'),
    nullary('OneIntro'),
    nullary('TopIntro'),
    nullary('BottomIntro'),
    nullary('TensorIntro'),
    nullary('ParIntro'),
    nullary('WithIntro'),
    nullary('PlusIntroLeft'),
    nullary('PlusIntroRight'),
    nullary('OfCourseIntro'),
    nullary('WhyNotIntro'),
    nullary('Weakening'),
    nullary('Contraction'),
    nullary('Dereliction'),
    nullary('Blur'),
    z.object({ tag: z.literal('Cut'), formula: FormulaSchema }),
    z.object({ tag: z.literal('FocusPositive'), formula: FormulaSchema }),
    z.object({ tag: z.literal('FocusNegative'), formula: FormulaSchema }),
]);

export const SequentSchema = z.object({ linear: z.array(FormulaSchema) });

export const ProofSchema: z.ZodType<Proof> = z.lazy(() =>
    z.object({
        conclusion: SequentSchema,
        rule: RuleSchema,
        premises: z.array(ProofSchema),
    }),
);

export class ProofFormatError extends Error {
    constructor(message: string, readonly issues: string[] = []) {
        super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
        this.name = 'ProofFormatError';
    }
}

export function serializeProof(proof: Proof): string {
    return JSON.stringify(proof, null, 2);
}

/** Validates an already-parsed JSON value. The result is not yet verified. */
export function proofFromJson(value: unknown): Proof {
    const parsed = ProofSchema.safeParse(value);
    if (!parsed.success) {
        throw new ProofFormatError(
            'Not a proof',
            parsed.error.issues.map(i => `${i.path.length > 0 ? i.path.join('.') : '(root)'}: ${i.message}`),
        );
    }
    return parsed.data;
}

export function parseProofJson(text: string): Proof {
    let value: unknown;
    try {
        value = JSON.parse(text);
    } catch (err) {
        throw new ProofFormatError(`Invalid JSON: ${err instanceof Error ? err.message : String(err)}`);
    }
    return proofFromJson(value);
}
