// ─────────────────────────────────────────────────────────────
// Proofscope  ·  Symbol Extraction & Token Registry
// ─────────────────────────────────────────────────────────────

import { findMathRanges } from './preprocess';
import { inRanges, type Range, type StepId, type StepToken, type Token, type TokenOccurrence } from '../core/types';
import { GREEK_LETTERS, NAMED_OPERATORS, WRAPPER_COMMANDS } from '../core/vocabulary';

// ── Patterns ────────────────────────────────────────────────

const WRAPPERS = [...WRAPPER_COMMANDS].join('|');

const MATH_TOKEN = new RegExp(
    String.raw`\\operatorname\*?\{([A-Za-z]+)\}`
    + String.raw`|\\(${WRAPPERS})\s*\{\s*([A-Za-z])\s*\}`
    + String.raw`|\\([A-Za-z]+)`
    + String.raw`|([A-Za-z]+)`,
    'g',
);

const MODIFIERS = /^(?:\s*[_^]\s*(?:\{[^{}]*\}|\\[A-Za-z]+|[A-Za-z0-9])|')+/;

/** Arguments that name things rather than use symbols. */
const OPAQUE_COMMANDS = /\\(?:text|textrm|textit|textbf|textsf|mbox|mathrm|label|tag|ref|eqref|cref|Cref|autoref|cite)\*?(?:\[[^\]]*\])?\{[^{}]*\}/g;

const PROSE_LETTER = /(?<![A-Za-z0-9.'\\-])([A-Za-z])(?![A-Za-z0-9'-]|\.[A-Za-z])/g;
const PROSE_EXCLUDED = new Set(['a', 'A', 'I']);

// ── Extraction ──────────────────────────────────────────────

/** Symbols of one step's text, ordered by position. */
export function extractStepTokens(text: string): StepToken[] {
    const masked = text.replace(OPAQUE_COMMANDS, m => ' '.repeat(m.length));
    const math = findMathRanges(masked);
    const tokens: StepToken[] = [];

    for (const range of math) {
        tokens.push(...scanMath(masked, range));
    }

    const prose = masked.replace(/\\[A-Za-z]+\*?/g, m => ' '.repeat(m.length));
    for (const m of prose.matchAll(PROSE_LETTER)) {
        const position = m.index ?? 0;
        if (inRanges(math, position) || PROSE_EXCLUDED.has(m[1])) continue;
        tokens.push({ symbol: m[1], display: m[1], position });
    }

    return tokens.sort((a, b) => a.position - b.position);
}

function scanMath(text: string, range: Range): StepToken[] {
    const inner = text.slice(range.start, range.end);
    const tokens: StepToken[] = [];
    const re = new RegExp(MATH_TOKEN.source, 'g');
    let m: RegExpExecArray | null;

    while ((m = re.exec(inner)) !== null) {
        const position = range.start + m.index;
        const [whole, opName, wrapper, wrapped, command, word] = m;

        if (opName) {
            tokens.push({ symbol: `\\${opName}`, display: whole, position });
        } else if (wrapper && wrapped) {
            const symbol = `\\${wrapper}{${wrapped}}`;
            tokens.push({ symbol, display: symbol, position });
        } else if (command) {
            const greek = GREEK_LETTERS.get(command);
            if (greek) tokens.push({ symbol: `\\${greek}`, display: `\\${command}`, position });
            else if (NAMED_OPERATORS.has(command)) tokens.push({ symbol: `\\${command}`, display: `\\${command}`, position });
        } else if (word) {
            const mods = inner.slice(re.lastIndex).match(MODIFIERS);
            const suffix = mods ? mods[0].replace(/\s+/g, '') : '';
            if (mods) re.lastIndex += mods[0].length;

            if (NAMED_OPERATORS.has(word)) {
                tokens.push({ symbol: `\\${word}`, display: word + suffix, position });
                continue;
            }
            // juxtaposed identifiers: `gh`, `ax`; modifiers bind to the last letter
            [...word].forEach((letter, i) => {
                const last = i === word.length - 1;
                tokens.push({ symbol: letter, display: last ? letter + suffix : letter, position: position + i });
            });
        }
    }

    return tokens;
}

// ── Introduction contexts ───────────────────────────────────

const INTRO_KEYWORD = /\b(?:let|define|assume|suppose|fix|given|consider|take|choose|pick|denote|for (?:all|any|every|each|some)|there (?:exists?|is|are)|where)\b|\\(?:forall|exists)(?![A-Za-z])/gi;

const BINDERS = /^(?:given|for |there |where|\\)/i;

/**
 * Ranges of `text` inside a clause that introduces symbols. Long
 * clauses (Let, Define, ...) end at `.`/`;` outside math; binders
 * (Given, for all, there exists, \forall) also end at `,`.
 */
export function findIntroductionClauses(text: string): Range[] {
    const math = findMathRanges(text);
    const clauses: Range[] = [];

    for (const m of text.matchAll(INTRO_KEYWORD)) {
        const start = m.index ?? 0;
        const from = start + m[0].length;
        const binder = BINDERS.test(m[0]);

        if (m[0].startsWith('\\')) {
            const host = math.find(r => start >= r.start && start < r.end);
            const limit = host ? host.end : text.length;
            const stop = text.slice(from, limit).search(/[,:.]|\\colon/);
            clauses.push({ start, end: stop === -1 ? limit : from + stop });
            continue;
        }

        clauses.push({ start, end: clauseEnd(text, from, binder ? ',.;' : '.;', math) });
    }

    return clauses;
}

export function clauseEnd(text: string, from: number, terminators: string, math: readonly Range[]): number {
    for (let i = from; i < text.length; i++) {
        if (terminators.includes(text[i]) && !inRanges(math, i)) return i;
    }
    return text.length;
}

// ── Registry ────────────────────────────────────────────────

interface RegistryEntry {
    symbol: string;
    display: string;
    occurrences: TokenOccurrence[];
}

/**
 * Run-local symbol table. Steps must be recorded in document order:
 * once a symbol appears in an introduction clause it stays introduced.
 */
export class TokenRegistry {
    private readonly entries = new Map<string, RegistryEntry>();
    private readonly introducedSymbols = new Set<string>();

    record(stepId: StepId, text: string): StepToken[] {
        const tokens = extractStepTokens(text);
        const clauses = findIntroductionClauses(text);

        for (const token of tokens) {
            let entry = this.entries.get(token.symbol);
            if (!entry) {
                entry = { symbol: token.symbol, display: token.display, occurrences: [] };
                this.entries.set(token.symbol, entry);
            }
            entry.occurrences.push({ stepId, position: token.position });
            if (inRanges(clauses, token.position)) this.introducedSymbols.add(token.symbol);
        }

        return tokens;
    }

    isIntroduced(symbol: string): boolean {
        return this.introducedSymbols.has(symbol);
    }

    /** Snapshot in first-occurrence order. */
    tokens(): Token[] {
        return [...this.entries.values()].map(e => ({
            symbol: e.symbol,
            display: e.display,
            occurrences: [...e.occurrences],
            introduced: this.introducedSymbols.has(e.symbol),
        }));
    }
}

/** Distinct symbols of a fragment of text, in order of first appearance. */
export function symbolsOf(text: string): string[] {
    return [...new Set(extractStepTokens(text).map(t => t.symbol))];
}
