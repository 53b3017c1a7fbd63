/**
 * `mell codegen`: Prove a sequent and emit its proof term as TypeScript.
 */

import { Command } from 'commander';
import { writeFileSync } from 'fs';
import { prettySequent } from '../../core/pretty';
import { Prover } from '../../engine/prover';
import { extractTerm } from '../../engine/extractor';
import { renderTypeScript } from '../../emitters/typescript';
import { goalFrom, parseCount } from '../shared';

export interface CodegenOptions {
    depth?: number;
    name?: string;
    output?: string;
}

export interface CodegenOutcome {
    code: string | null;
    output: string;
}

export function createCodegenCommand(): Command {
    const cmd = new Command('codegen');

    cmd
        .description('Generate a TypeScript function from the proof of a sequent')
        .argument('<sequent>', 'Sequent to prove')
        .option('-d, --depth <n>', 'Depth bound for the search', parseCount)
        .option('-n, --name <name>', 'Name of the generated function')
        .option('-o, --output <file>', 'Write a standalone module to a file')
        .action((input: string, options: CodegenOptions) => {
            const outcome = runCodegen(input, options);
            console.log(outcome.output);
            if (!outcome.code) {
                process.exitCode = 1;
                return;
            }
            if (options.output) {
                writeFileSync(options.output, outcome.code);
                console.log(`Wrote ${options.output}`);
            }
        });

    return cmd;
}

/** With `output` set the code is a full module, otherwise just the function. */
export function runCodegen(input: string, options: CodegenOptions = {}): CodegenOutcome {
    const goal = goalFrom(input);
    const prover = new Prover({ maxDepth: options.depth });
    const proof = prover.prove(goal);
    if (!proof) {
        return { code: null, output: `✗ No proof of ${prettySequent(goal)} within depth ${prover.maxDepth}` };
    }

    const code = renderTypeScript(proof.conclusion, extractTerm(proof), {
        name: options.name,
        module: options.output !== undefined,
    });
    return { code, output: code };
}
