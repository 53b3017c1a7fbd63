// ─────────────────────────────────────────────────────────────
// MELL Workbench  ·  Text Proof Trees
// ─────────────────────────────────────────────────────────────

import type { Proof } from '../core/ir';
import { prettySequent, ruleSymbol, type Notation } from '../core/pretty';
import { stripFocusSteps } from '../core/proof';

export interface TreeOptions {
    notation?: Notation;
    hideFocusSteps?: boolean;
}

const BRANCHES: Record<Notation, { mid: string; last: string; pipe: string; gap: string }> = {
    unicode: { mid: '├── ', last: '└── ', pipe: '│   ', gap: '    ' },
    ascii: { mid: '|-- ', last: '`-- ', pipe: '|   ', gap: '    ' },
};

/**
 * Conclusion first, premises below it:
 *
 *     ⊢ (A⊥ ⅋ B⊥), (B ⊗ A)  [⅋]
 *     └── ⊢ A⊥, B⊥, (B ⊗ A)  [⊗]
 *         ├── ⊢ B⊥, B  [ax]
 *         └── ⊢ A⊥, A  [ax]
 */
export function renderTree(proof: Proof, options: TreeOptions = {}): string {
    const notation = options.notation ?? 'unicode';
    const root = options.hideFocusSteps ? stripFocusSteps(proof) : proof;
    const glyphs = BRANCHES[notation];
    const lines: string[] = [];

    const label = (node: Proof): string =>
        `${prettySequent(node.conclusion, notation)}  [${ruleSymbol(node.rule, notation)}]`;

    const walk = (node: Proof, prefix: string): void => {
        node.premises.forEach((premise, i) => {
            const last = i === node.premises.length - 1;
            lines.push(prefix + (last ? glyphs.last : glyphs.mid) + label(premise));
            walk(premise, prefix + (last ? glyphs.gap : glyphs.pipe));
        });
    };

    lines.push(label(root));
    walk(root, '');
    return lines.join('\n');
}
