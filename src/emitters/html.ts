// ─────────────────────────────────────────────────────────────
// MELL Workbench  ·  HTML Emitter
// Nested proof tree with sequents typeset by KaTeX
// ─────────────────────────────────────────────────────────────

import katex from 'katex';
import type { Formula, Proof, Sequent } from '../core/ir';
import { latexFormula, latexSequent, ruleName, ruleSymbol } from '../core/pretty';
import { stripFocusSteps } from '../core/proof';

export interface HtmlOptions {
    hideFocusSteps?: boolean;
    /** Page title for `renderHtmlDocument`. */
    title?: string;
    stylesheetHref?: string;
}

const KATEX_CSS = 'https://cdn.jsdelivr.net/npm/katex@0.16.11/dist/katex.min.css';

const STYLE = `
.proof { display: inline-flex; flex-direction: column; align-items: center; }
.premises { display: flex; gap: 2em; align-items: flex-end; }
.inference { border-top: 1px solid currentColor; padding-top: 2px; position: relative; }
.rule { position: absolute; right: -2.5em; top: -0.7em; font-size: 0.75em; }
`.trim();

export function escapeHtml(text: string): string {
    return text
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;');
}

function typeset(tex: string): string {
    return katex.renderToString(tex, { throwOnError: false, strict: 'ignore' });
}

export function typesetFormula(f: Formula): string {
    return typeset(latexFormula(f, 'katex'));
}

export function typesetSequent(s: Sequent): string {
    return typeset(latexSequent(s, 'katex'));
}

/** The proof as nested `div`s: premises side by side above each inference line. */
export function renderHtml(proof: Proof, options: HtmlOptions = {}): string {
    const root = options.hideFocusSteps ? stripFocusSteps(proof) : proof;

    const render = (node: Proof): string => {
        const premises = node.premises.length > 0
            ? `<div class="premises">${node.premises.map(render).join('')}</div>`
            : '';
        const rule = `<span class="rule" title="${escapeHtml(ruleName(node.rule))}">${escapeHtml(ruleSymbol(node.rule))}</span>`;
        return `<div class="proof">${premises}<div class="inference">${typesetSequent(node.conclusion)}${rule}</div></div>`;
    };

    return render(root);
}

export function renderHtmlDocument(proof: Proof, options: HtmlOptions = {}): string {
    const title = escapeHtml(options.title ?? 'Proof');
    return [
        '<!DOCTYPE html>',
        '<html lang="en">',
        '<head>',
        '<meta charset="utf-8">',
        `<title>${title}</title>`,
        `<link rel="stylesheet" href="${escapeHtml(options.stylesheetHref ?? KATEX_CSS)}">`,
        `<style>\n${STYLE}\n</style>`,
        '</head>',
        '<body>',
        renderHtml(proof, options),
        '</body>',
        '</html>',
        '',
    ].join('\n');
}
