/**
 * `mell prove`: Search for a focused proof and print it.
 */

import { Command } from 'commander';
import type { Proof } from '../../core/ir';
import { cutCount, proofDepth, proofSize } from '../../core/proof';
import { prettySequent } from '../../core/pretty';
import { Prover } from '../../engine/prover';
import { goalFrom, parseCount, parseFormat, renderProof, type ProofFormat } from '../shared';

export interface ProveOptions {
    depth?: number;
    format?: ProofFormat;
    focus?: boolean;
}

export interface ProveOutcome {
    proof: Proof | null;
    output: string;
}

export function createProveCommand(): Command {
    const cmd = new Command('prove');

    cmd
        .description('Search for a proof of a sequent')
        .argument('<sequent>', 'e.g. "A ⊗ B ⊢ B ⊗ A" or "A * B |- B * A"')
        .option('-d, --depth <n>', 'Depth bound for the search', parseCount)
        .option('-f, --format <format>', 'tree, ascii, latex, dot, html or json', parseFormat, 'tree')
        .option('--focus', 'Keep focusing steps in the proof')
        .action((input: string, options: ProveOptions) => {
            const outcome = runProve(input, options);
            console.log(outcome.output);
            if (!outcome.proof) process.exitCode = 1;
        });

    return cmd;
}

export function runProve(input: string, options: ProveOptions = {}): ProveOutcome {
    const goal = goalFrom(input);
    const prover = new Prover({ maxDepth: options.depth, recordFocus: options.focus });
    const proof = prover.prove(goal);

    if (!proof) {
        return { proof, output: `✗ No proof of ${prettySequent(goal)} within depth ${prover.maxDepth}` };
    }

    const format = options.format ?? 'tree';
    // machine-readable formats stay clean for piping
    if (format !== 'tree' && format !== 'ascii') return { proof, output: renderProof(proof, format) };

    const summary = `✓ ${prettySequent(proof.conclusion)}  (depth ${proofDepth(proof)}, ${proofSize(proof)} rules, ${cutCount(proof)} cuts)`;
    return { proof, output: `${summary}\n\n${renderProof(proof, format)}` };
}
