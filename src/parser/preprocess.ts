// ─────────────────────────────────────────────────────────────
// Proofscope  ·  LaTeX Preprocessor
// Comment stripping, macro expansion, whitespace collapsing,
// and protected (math-mode) span detection
// ─────────────────────────────────────────────────────────────

import { EmptyInputError, MalformedInputError } from '../core/errors';
import { Diagnostics } from '../core/log';
import type { Range } from '../core/types';
import { ABBREVIATIONS } from '../core/vocabulary';

export interface PreprocessedText {
    source: string;
    text: string;
    protectedRanges: readonly Range[];
    abbreviations: readonly string[];
}

// ── Macro table ─────────────────────────────────────────────

const MACROS: Readonly<Record<string, string>> = {
    R: '\\mathbb{R}',
    N: '\\mathbb{N}',
    Z: '\\mathbb{Z}',
    Q: '\\mathbb{Q}',
    C: '\\mathbb{C}',
    eps: '\\varepsilon',
    veps: '\\varepsilon',
    sse: '\\subseteq',
    la: '\\langle',
    ra: '\\rangle',
};

const MATH_ENVIRONMENTS = [
    'equation', 'align', 'alignat', 'gather', 'multline', 'eqnarray',
    'displaymath', 'math', 'cases', 'split', 'flalign',
];

const ENV_OPEN = new RegExp(`^\\\\begin\\{((?:${MATH_ENVIRONMENTS.join('|')})\\*?)\\}`);

// ── Public entry point ──────────────────────────────────────

export function preprocess(raw: string, diagnostics: Diagnostics = new Diagnostics()): PreprocessedText {
    if (!raw.trim()) throw new EmptyInputError();

    const text = collapseWhitespace(expandMacros(stripProofWrappers(stripComments(raw))));
    if (!text) throw new EmptyInputError('Proof text is empty after removing comments');

    const protectedRanges = findMathRanges(text, err => diagnostics.report('Preprocess', err));
    diagnostics.debug('Preprocess', `${text.length} chars, ${protectedRanges.length} protected span(s)`);

    return { source: raw, text, protectedRanges, abbreviations: ABBREVIATIONS };
}

// ── Normalization passes ────────────────────────────────────

export function stripComments(src: string): string {
    return src
        .split('\n')
        .map(line => {
            let out = '';
            for (let i = 0; i < line.length; i++) {
                const ch = line[i];
                if (ch === '\\' && i + 1 < line.length) {
                    out += ch + line[i + 1];
                    i++;
                    continue;
                }
                if (ch === '%') break;
                out += ch;
            }
            return out;
        })
        .join('\n');
}

function stripProofWrappers(src: string): string {
    return src
        .replace(/\\(?:begin|end)\{proof\}(?:\[[^\]]*\])?/g, ' ')
        .replace(/\\qed(?:here)?(?![a-zA-Z])/g, ' ');
}

export function expandMacros(src: string): string {
    return src.replace(/\\([a-zA-Z]+)/g, (whole, name: string) => MACROS[name] ?? whole);
}

function collapseWhitespace(src: string): string {
    return src.replace(/\s+/g, ' ').trim();
}

// ── Protected spans ─────────────────────────────────────────

/**
 * Math-mode spans of `text`, as half-open ranges covering the delimiters.
 * An opener without a closer is reported and the text after it stays
 * unprotected.
 */
export function findMathRanges(
    text: string,
    report?: (err: MalformedInputError) => void,
): Range[] {
    const ranges: Range[] = [];
    let i = 0;

    while (i < text.length) {
        const ch = text[i];

        if (ch === '\\') {
            const next = text[i + 1] ?? '';
            if (next === '(' || next === '[') {
                const closer = next === '(' ? '\\)' : '\\]';
                const end = text.indexOf(closer, i + 2);
                if (end === -1) {
                    report?.(new MalformedInputError('unbalanced-math', `Unclosed \\${next} at offset ${i}`, String(i)));
                    i += 2;
                } else {
                    ranges.push({ start: i, end: end + 2 });
                    i = end + 2;
                }
                continue;
            }

            const env = ENV_OPEN.exec(text.slice(i));
            if (env) {
                const endTag = `\\end{${env[1]}}`;
                const end = text.indexOf(endTag, i + env[0].length);
                if (end === -1) {
                    report?.(new MalformedInputError(
                        'unbalanced-environment',
                        `Unclosed \\begin{${env[1]}} at offset ${i}`,
                        String(i),
                    ));
                    i += env[0].length;
                } else {
                    ranges.push({ start: i, end: end + endTag.length });
                    i = end + endTag.length;
                }
                continue;
            }

            // \$, \\ and other escapes never open a span
            i += /[a-zA-Z]/.test(next) ? 1 : 2;
            continue;
        }

        if (ch === '$') {
            const display = text[i + 1] === '$';
            const delim = display ? '$$' : '$';
            const end = findUnescaped(text, delim, i + delim.length);
            if (end === -1) {
                report?.(new MalformedInputError('unbalanced-math', `Unclosed ${delim} at offset ${i}`, String(i)));
                i += delim.length;
            } else {
                ranges.push({ start: i, end: end + delim.length });
                i = end + delim.length;
            }
            continue;
        }

        i++;
    }

    return ranges;
}

function findUnescaped(text: string, delim: string, from: number): number {
    let idx = text.indexOf(delim, from);
    while (idx !== -1 && text[idx - 1] === '\\') {
        idx = text.indexOf(delim, idx + 1);
    }
    return idx;
}
