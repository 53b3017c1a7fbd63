/**
 * `mell verify`: Check a proof stored as JSON.
 */

import { Command } from 'commander';
import { readFileSync } from 'fs';
import type { Proof } from '../../core/ir';
import { parseProofJson } from '../../core/serialize';
import { prettySequent } from '../../core/pretty';
import { errorPath, formatProofError, verifyProof } from '../../engine/verifier';

export function createVerifyCommand(): Command {
    const cmd = new Command('verify');

    cmd
        .description('Verify a proof produced by `mell prove --format json`')
        .argument('<file>', 'JSON proof file')
        .action((file: string) => {
            const { valid, output } = checkProofText(readFileSync(file, 'utf8'));
            console.log(output);
            if (!valid) process.exitCode = 1;
        });

    return cmd;
}

export function checkProofText(text: string): { valid: boolean; output: string } {
    const proof: Proof = parseProofJson(text);
    const result = verifyProof(proof);
    if (result.valid) return { valid: true, output: `✓ Valid proof of ${prettySequent(proof.conclusion)}` };

    const path = errorPath(result.error);
    const where = path.length > 0 ? ` at premise path ${path.map(i => i + 1).join('.')}` : ' at the root';
    return { valid: false, output: `✗ Invalid proof${where}: ${formatProofError(result.error)}` };
}
