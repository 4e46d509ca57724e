// ─────────────────────────────────────────────────────────────
// Proofscope  ·  HTML Report
// Step and assumption text with math spans rendered by KaTeX
// ─────────────────────────────────────────────────────────────

import katex from 'katex';
import type { AnalysisResult } from '../core/types';
import { findMathRanges } from '../parser/preprocess';

export interface HtmlReportOptions {
    title: string;
    /** Stylesheet link for KaTeX output; omit for a self-contained fragment. */
    katexCssHref: string | null;
}

const DEFAULT_OPTIONS: HtmlReportOptions = {
    title: 'Proof analysis',
    katexCssHref: null,
};

export function emitHtmlReport(result: AnalysisResult, options: Partial<HtmlReportOptions> = {}): string {
    const opts = { ...DEFAULT_OPTIONS, ...options };
    const html: string[] = [];

    html.push('<!DOCTYPE html>');
    html.push(`<html><head><meta charset="utf-8"><title>${esc(opts.title)}</title>`);
    if (opts.katexCssHref) html.push(`<link rel="stylesheet" href="${esc(opts.katexCssHref)}">`);
    html.push('</head><body>');
    html.push(`<h1>${esc(opts.title)}</h1>`);

    html.push('<section class="steps"><h2>Steps</h2><ol>');
    for (const step of result.steps) {
        const flags = result.flags.filter(f => f.target === step.id);
        const badge = flags.length > 0 ? ` <span class="flag-count">${flags.length} flag(s)</span>` : '';
        html.push(`<li id="${step.id}" data-kind="${step.kind}"><strong>${step.id}</strong>${badge} ${renderMathText(step.text)}</li>`);
    }
    html.push('</ol></section>');

    html.push('<section class="assumptions"><h2>Assumptions</h2><ul>');
    for (const a of result.assumptions) {
        html.push(`<li id="${a.id}" class="${a.scopeKind}"><strong>${a.id}</strong> (${a.scopeKind}, ${a.scope.length} step(s)) ${renderMathText(a.text)}</li>`);
    }
    html.push('</ul></section>');

    html.push('<section class="flags"><h2>Gap flags</h2><ul>');
    for (const f of result.flags) {
        html.push(`<li class="severity-${f.severity}"><strong>${f.id}</strong> [${f.kind}] at <a href="#${f.target}">${f.target}</a>: ${esc(f.message)} <em>${esc(f.suggestion)}</em></li>`);
    }
    html.push('</ul></section>');

    if (result.warnings.length > 0) {
        html.push('<section class="warnings"><h2>Warnings</h2><ul>');
        for (const w of result.warnings) html.push(`<li>${esc(w.message)}</li>`);
        html.push('</ul></section>');
    }

    html.push('</body></html>');
    return html.join('\n');
}

/** Escapes prose and renders each math span with KaTeX. */
export function renderMathText(text: string): string {
    let out = '';
    let cursor = 0;

    for (const range of findMathRanges(text)) {
        out += esc(text.slice(cursor, range.start));
        const { body, display } = unwrapMath(text.slice(range.start, range.end));
        try {
            out += katex.renderToString(body, { throwOnError: false, displayMode: display });
        } catch {
            out += `<code>${esc(text.slice(range.start, range.end))}</code>`;
        }
        cursor = range.end;
    }

    return out + esc(text.slice(cursor));
}

function unwrapMath(span: string): { body: string; display: boolean } {
    if (span.startsWith('$$')) return { body: span.slice(2, -2), display: true };
    if (span.startsWith('$')) return { body: span.slice(1, -1), display: false };
    if (span.startsWith('\\(')) return { body: span.slice(2, -2), display: false };
    if (span.startsWith('\\[')) return { body: span.slice(2, -2), display: true };
    // KaTeX has aligned/gathered but not the top-level AMS environments
    const env = /^\\begin\{(equation|align|gather)(\*?)\}([\s\S]*)\\end\{\1\2\}$/.exec(span);
    if (env) {
        const [, name, , inner] = env;
        return { body: name === 'equation' ? inner : `\\begin{${name}ed}${inner}\\end{${name}ed}`, display: true };
    }
    return { body: span, display: true };
}

export function esc(s: string): string {
    return s
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;');
}
