/**
 * `mell extract`: Prove a sequent and print the λ-term its proof denotes.
 */

import { Command } from 'commander';
import type { Term } from '../../core/ir';
import { prettySequent, prettyTerm } from '../../core/pretty';
import { proofDepth } from '../../core/proof';
import { Prover } from '../../engine/prover';
import { extractTerm } from '../../engine/extractor';
import { reduce } from '../../engine/normalizer';
import { getConfig } from '../../config';
import { goalFrom, parseCount } from '../shared';

export interface ExtractOptions {
    depth?: number;
    normalize?: boolean;
    steps?: number;
}

export interface ExtractOutcome {
    term: Term | null;
    output: string;
}

export function createExtractCommand(): Command {
    const cmd = new Command('extract');

    cmd
        .description('Extract the linear λ-term of a proof')
        .argument('<sequent>', 'Sequent to prove')
        .option('-d, --depth <n>', 'Depth bound for the search', parseCount)
        .option('-n, --normalize', 'Also print the normal form')
        .option('-s, --steps <n>', 'Reduction budget for --normalize', parseCount)
        .action((input: string, options: ExtractOptions) => {
            const outcome = runExtract(input, options);
            console.log(outcome.output);
            if (!outcome.term) process.exitCode = 1;
        });

    return cmd;
}

export function runExtract(input: string, options: ExtractOptions = {}): ExtractOutcome {
    const goal = goalFrom(input);
    const prover = new Prover({ maxDepth: options.depth });
    const proof = prover.prove(goal);
    if (!proof) {
        return { term: null, output: `✗ No proof of ${prettySequent(goal)} within depth ${prover.maxDepth}` };
    }

    const term = extractTerm(proof);
    const lines = [
        `proof:  ${prettySequent(proof.conclusion)}  (depth ${proofDepth(proof)})`,
        `term:   ${prettyTerm(term)}`,
    ];

    if (options.normalize) {
        const budget = options.steps ?? getConfig().maxSteps;
        const result = reduce(term, budget);
        const note = result.normal ? `${result.steps} steps` : `stopped after ${result.steps} steps`;
        lines.push(`normal: ${prettyTerm(result.term)}  (${note})`);
    }

    return { term, output: lines.join('\n') };
}
