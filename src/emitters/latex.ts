// ─────────────────────────────────────────────────────────────
// MELL Workbench  ·  LaTeX Emitter
// Proof trees for the bussproofs package
// ─────────────────────────────────────────────────────────────

import type { Proof, Rule } from '../core/ir';
import { latexFormula, latexSequent } from '../core/pretty';
import { stripFocusSteps } from '../core/proof';

export interface LatexOptions {
    /** Wrap the tree in a compilable article. */
    includePreamble?: boolean;
    /** `ax`, `$\otimes$`, `W` instead of `axiom`, `$\otimes$-intro`, `weakening`. */
    shortLabels?: boolean;
    hideFocusSteps?: boolean;
}

const PREAMBLE = [
    '\\documentclass{article}',
    '\\usepackage{amssymb}',
    '\\usepackage{cmll}',
    '\\usepackage{bussproofs}',
    '\\begin{document}',
];

export function ruleLabel(rule: Rule, short: boolean): string {
    switch (rule.tag) {
        case 'Axiom': return short ? 'ax' : 'axiom';
        case 'OneIntro': return short ? '$\\mathbf{1}$' : '$\\mathbf{1}$-intro';
        case 'TopIntro': return short ? '$\\top$' : '$\\top$-intro';
        case 'BottomIntro': return short ? '$\\bot$' : '$\\bot$-intro';
        case 'TensorIntro': return short ? '$\\otimes$' : '$\\otimes$-intro';
        case 'ParIntro': return short ? '$\\parr$' : '$\\parr$-intro';
        case 'WithIntro': return short ? '$\\with$' : '$\\with$-intro';
        case 'PlusIntroLeft': return short ? '$\\oplus_1$' : '$\\oplus_1$-intro';
        case 'PlusIntroRight': return short ? '$\\oplus_2$' : '$\\oplus_2$-intro';
        case 'OfCourseIntro': return short ? '$!$' : '$!$-intro';
        case 'WhyNotIntro': return short ? '$?$' : '$?$-intro';
        case 'Weakening': return short ? 'W' : 'weakening';
        case 'Contraction': return short ? 'C' : 'contraction';
        case 'Dereliction': return short ? 'D' : 'dereliction';
        case 'Cut': return short ? 'cut' : `cut on $${latexFormula(rule.formula)}$`;
        case 'FocusPositive': return short ? 'F+' : 'focus$^+$';
        case 'FocusNegative': return short ? 'F-' : 'focus$^-$';
        case 'Blur': return short ? 'B' : 'blur';
    }
}

const INFERENCE = ['\\UnaryInfC', '\\UnaryInfC', '\\BinaryInfC', '\\TrinaryInfC'];

export function renderLatex(proof: Proof, options: LatexOptions = {}): string {
    const root = options.hideFocusSteps ? stripFocusSteps(proof) : proof;
    const short = options.shortLabels ?? false;
    const lines: string[] = [];

    // bussproofs is postfix: premises first, then the inference
    const emit = (node: Proof): void => {
        if (node.premises.length === 0) lines.push('\\AxiomC{}');
        for (const p of node.premises) emit(p);
        lines.push(`\\RightLabel{\\scriptsize ${ruleLabel(node.rule, short)}}`);
        lines.push(`${INFERENCE[node.premises.length] ?? '\\TrinaryInfC'}{$${latexSequent(node.conclusion)}$}`);
    };

    emit(root);
    const tree = ['\\begin{prooftree}', ...lines, '\\end{prooftree}'];
    if (!options.includePreamble) return tree.join('\n');
    return [...PREAMBLE, ...tree, '\\end{document}'].join('\n') + '\n';
}

export function renderLatexDocument(proof: Proof, options: Omit<LatexOptions, 'includePreamble'> = {}): string {
    return renderLatex(proof, { ...options, includePreamble: true });
}
