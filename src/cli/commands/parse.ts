/**
 * `mell parse`: Show how a formula or sequent is read.
 */

import { Command } from 'commander';
import type { Formula } from '../../core/ir';
import { containsLolli, desugar, negate, polarity } from '../../core/formula';
import { toOneSided } from '../../core/sequent';
import { latexFormula, prettyFormula } from '../../core/pretty';
import { parseFormula, parseSequent } from '../../parser/formula';

export type OutputNotation = 'unicode' | 'ascii' | 'latex';

interface ParseOptions {
    ascii?: boolean;
    latex?: boolean;
}

export function createParseCommand(): Command {
    const cmd = new Command('parse');

    cmd
        .description('Parse a formula or sequent and show its normal readings')
        .argument('<input>', 'Formula, or sequent with ⊢ / |-')
        .option('--ascii', 'Print with ASCII connectives')
        .option('--latex', 'Print as LaTeX')
        .action((input: string, options: ParseOptions) => {
            const notation: OutputNotation = options.latex ? 'latex' : options.ascii ? 'ascii' : 'unicode';
            console.log(describeInput(input, notation));
        });

    return cmd;
}

export function describeInput(input: string, notation: OutputNotation = 'unicode'): string {
    const show = (f: Formula): string => (notation === 'latex' ? latexFormula(f) : prettyFormula(f, notation));
    const list = (fs: Formula[]): string => fs.map(show).join(', ');
    const turnstile = notation === 'ascii' ? '|-' : notation === 'latex' ? '\\vdash' : '⊢';

    if (/⊢|\|-/.test(input)) {
        const seq = parseSequent(input);
        const oneSided = toOneSided(seq).linear.map(desugar);
        return [
            `sequent:   ${[list(seq.antecedent), turnstile, list(seq.succedent)].filter(Boolean).join(' ')}`,
            `one-sided: ${[turnstile, list(oneSided)].filter(Boolean).join(' ')}`,
        ].join('\n');
    }

    const f = parseFormula(input);
    const lines = [`formula:   ${show(f)}`];
    if (containsLolli(f)) lines.push(`desugared: ${show(desugar(f))}`);
    lines.push(`negation:  ${show(negate(f))}`);
    lines.push(`polarity:  ${polarity(f)}`);
    return lines.join('\n');
}
