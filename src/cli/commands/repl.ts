/**
 * `mell repl`: Interactive session: type a sequent to prove it.
 * Supports :parse, :extract, :latex, :depth, :help and :quit.
 */

import { Command } from 'commander';
import * as readline from 'readline';
import { getConfig } from '../../config';
import { Prover } from '../../engine/prover';
import { renderLatex } from '../../emitters/latex';
import { describeInput } from './parse';
import { runExtract } from './extract';
import { runProve } from './prove';
import { goalFrom, parseCount } from '../shared';

const HELP = [
    'Enter a sequent such as  A ⊗ B ⊢ B ⊗ A  (ASCII: A * B |- B * A)',
    '  :parse <formula>    show readings of a formula or sequent',
    '  :extract <sequent>  proof term and its normal form',
    '  :latex <sequent>    bussproofs source of the proof',
    '  :depth <n>          set the search depth',
    '  :help               this text',
    '  :quit               leave',
].join('\n');

export interface ReplReply {
    output: string;
    exit: boolean;
}

export class ReplSession {
    depth: number;

    constructor(depth: number = getConfig().maxDepth) {
        this.depth = depth;
    }

    handle(line: string): ReplReply {
        const input = line.trim();
        if (!input) return { output: '', exit: false };
        try {
            return this.dispatch(input);
        } catch (err) {
            return { output: `error: ${err instanceof Error ? err.message : String(err)}`, exit: false };
        }
    }

    private dispatch(input: string): ReplReply {
        const reply = (output: string): ReplReply => ({ output, exit: false });
        if (!input.startsWith(':')) return reply(runProve(input, { depth: this.depth }).output);

        const space = input.indexOf(' ');
        const command = space < 0 ? input : input.slice(0, space);
        const arg = space < 0 ? '' : input.slice(space + 1).trim();

        switch (command) {
            case ':q':
            case ':quit':
                return { output: '', exit: true };
            case ':help':
                return reply(HELP);
            case ':depth':
                this.depth = parseCount(arg);
                return reply(`depth = ${this.depth}`);
            case ':parse':
                return reply(describeInput(arg));
            case ':extract':
                return reply(runExtract(arg, { depth: this.depth, normalize: true }).output);
            case ':latex': {
                const proof = new Prover({ maxDepth: this.depth }).prove(goalFrom(arg));
                return reply(proof ? renderLatex(proof, { shortLabels: true }) : 'no proof');
            }
            default:
                return reply(`unknown command ${command} (try :help)`);
        }
    }
}

export function createReplCommand(): Command {
    const cmd = new Command('repl');

    cmd
        .description('Start an interactive session')
        .option('-d, --depth <n>', 'Initial search depth', parseCount)
        .action(async (options: { depth?: number }) => {
            await startRepl(new ReplSession(options.depth));
        });

    return cmd;
}

function startRepl(session: ReplSession): Promise<void> {
    console.log('MELL workbench. :help for commands, :quit to leave.');
    const rl = readline.createInterface({ input: process.stdin, output: process.stdout, prompt: 'mell> ' });

    return new Promise(resolve => {
        rl.on('line', (line: string) => {
            const { output, exit } = session.handle(line);
            if (output) console.log(output);
            if (exit) {
                rl.close();
                return;
            }
            rl.prompt();
        });
        rl.on('close', () => resolve());
        rl.prompt();
    });
}
