/**
 * `mell viz`: Render a proof to a file or stdout.
 */

import { Command } from 'commander';
import { writeFileSync } from 'fs';
import { Prover } from '../../engine/prover';
import { prettySequent } from '../../core/pretty';
import { goalFrom, parseCount, parseFormat, renderProof, type ProofFormat } from '../shared';

interface VizOptions {
    depth?: number;
    format: ProofFormat;
    output?: string;
    focus?: boolean;
}

export function createVizCommand(): Command {
    const cmd = new Command('viz');

    cmd
        .description('Render the proof of a sequent (Graphviz by default)')
        .argument('<sequent>', 'Sequent to prove')
        .option('-d, --depth <n>', 'Depth bound for the search', parseCount)
        .option('-f, --format <format>', 'tree, ascii, latex, dot, html or json', parseFormat, 'dot')
        .option('-o, --output <file>', 'Write to a file instead of stdout')
        .option('--focus', 'Keep focusing steps in the proof')
        .action((input: string, options: VizOptions) => {
            const goal = goalFrom(input);
            const proof = new Prover({ maxDepth: options.depth, recordFocus: options.focus }).prove(goal);
            if (!proof) throw new Error(`No proof of ${prettySequent(goal)}`);

            const rendered = renderProof(proof, options.format);
            if (options.output) {
                writeFileSync(options.output, rendered.endsWith('\n') ? rendered : `${rendered}\n`);
                console.log(`Wrote ${options.format} proof to ${options.output}`);
            } else {
                console.log(rendered);
            }
        });

    return cmd;
}
