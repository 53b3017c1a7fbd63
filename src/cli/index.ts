/**
 * CLI Bootstrap
 * Creates and configures the commander program behind `mell`
 */

import { Command } from 'commander';
import { NAME, VERSION } from '../version';
import { createParseCommand } from './commands/parse';
import { createProveCommand } from './commands/prove';
import { createExtractCommand } from './commands/extract';
import { createCodegenCommand } from './commands/codegen';
import { createVizCommand } from './commands/viz';
import { createVerifyCommand } from './commands/verify';
import { createReplCommand } from './commands/repl';

export function createCLI(): Command {
    const program = new Command();

    program
        .name(NAME)
        .version(VERSION)
        .description('Linear logic workbench: focused proof search, verification and proof terms');

    program.addCommand(createParseCommand());
    program.addCommand(createProveCommand());
    program.addCommand(createExtractCommand());
    program.addCommand(createCodegenCommand());
    program.addCommand(createVizCommand());
    program.addCommand(createVerifyCommand());
    program.addCommand(createReplCommand());

    return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
    const cli = createCLI();

    try {
        await cli.parseAsync(argv);
    } catch (error) {
        if (error instanceof Error) {
            console.error(`✗ ${error.message}`);
            if (process.env.DEBUG) console.error(error.stack);
        } else {
            console.error(error);
        }
        process.exit(1);
    }
}
