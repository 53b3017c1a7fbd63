// ─────────────────────────────────────────────────────────────
// MELL Workbench  ·  Graphviz Emitter
// ─────────────────────────────────────────────────────────────

import type { Proof } from '../core/ir';
import { prettySequent, ruleSymbol } from '../core/pretty';
import { stripFocusSteps } from '../core/proof';

export type RankDirection = 'TB' | 'BT' | 'LR' | 'RL';
export type NodeShape = 'box' | 'rounded' | 'ellipse' | 'plain';

export interface DotOptions {
    /** `BT` puts the conclusion at the bottom, as on paper. */
    direction?: RankDirection;
    nodeShape?: NodeShape;
    font?: string;
    showRules?: boolean;
    hideFocusSteps?: boolean;
}

function escapeLabel(text: string): string {
    return text.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}

function shapeAttrs(shape: NodeShape): string {
    return shape === 'rounded' ? 'shape=box, style=rounded' : `shape=${shape}`;
}

/** One node per sequent, with an edge from each premise to its conclusion. */
export function renderDot(proof: Proof, options: DotOptions = {}): string {
    const root = options.hideFocusSteps ? stripFocusSteps(proof) : proof;
    const showRules = options.showRules ?? true;
    const lines = [
        'digraph proof {',
        `    rankdir=${options.direction ?? 'BT'};`,
        `    node [${shapeAttrs(options.nodeShape ?? 'box')}, fontname="${escapeLabel(options.font ?? 'Helvetica')}"];`,
    ];
    const edges: string[] = [];
    let next = 0;

    const visit = (node: Proof): number => {
        const id = next++;
        const text = showRules
            ? `${escapeLabel(prettySequent(node.conclusion))}\\n(${escapeLabel(ruleSymbol(node.rule))})`
            : escapeLabel(prettySequent(node.conclusion));
        lines.push(`    n${id} [label="${text}"];`);
        for (const premise of node.premises) edges.push(`    n${visit(premise)} -> n${id};`);
        return id;
    };

    visit(root);
    return [...lines, ...edges, '}'].join('\n');
}
