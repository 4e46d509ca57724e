// ─────────────────────────────────────────────────────────────
// Proofscope  ·  Heuristic Gap Detection
// Four independent detectors over (steps, assumptions, tokens)
// ─────────────────────────────────────────────────────────────

import type { ObviousLeapThresholds } from '../core/config';
import {
    FLAG_KIND_ORDER,
    flagId,
    type Assumption,
    type Flag,
    type FlagKind,
    type NodeId,
    type Step,
    type Token,
} from '../core/types';
import {
    escapeRegExp,
    findTermMentions,
    HEDGE_PHRASES,
    STANDARD_PHRASES,
    SYMBOL_WHITELIST,
} from '../core/vocabulary';
import { activeAssumptions } from '../parser/assumptions';
import { findMathRanges } from '../parser/preprocess';

export interface GapInput {
    steps: readonly Step[];
    assumptions: readonly Assumption[];
    tokens: readonly Token[];
}

export interface GapOptions {
    vocabulary: readonly string[];
    obviousLeap: ObviousLeapThresholds;
}

export type FlagDraft = Omit<Flag, 'id'>;
export type GapDetector = (input: GapInput, options: GapOptions) => FlagDraft[];

// ── 1. Undefined symbols ────────────────────────────────────

export const detectUndefinedSymbols: GapDetector = ({ tokens }) => {
    const flags: FlagDraft[] = [];

    for (const token of tokens) {
        const uses = token.occurrences.length;
        if (token.introduced || uses < 2 || SYMBOL_WHITELIST.has(token.symbol)) continue;

        flags.push({
            kind: 'undefined-symbol',
            target: token.occurrences[0].stepId,
            severity: 'medium',
            message: `Symbol ${token.display} is used ${uses} times but never introduced`,
            suggestion: `Introduce ${token.display} with "Let", "Fix" or "Define" before its first use.`,
        });
    }

    return flags;
};

// ── 2. Uncited theorems ─────────────────────────────────────

const UNCITED = /\bby\s+(?:(?:the|a|an|this|that|these|our|previous|above|preceding|following|last|main|same|well-known|standard|known)\s+)*(?:theorem|lemma|corollary|proposition)s?\b/gi;

/** A number, a name, or a reference command right after the keyword. */
const CITED_FOLLOWER = /^\s*(?:~|\\,)?\s*(?:\d|[A-Z]|\\(?:ref|eqref|cref|Cref|autoref|cite)\b|\[|\(|of\s+[A-Z])/;

const RESULT_NOUN = String.raw`(?:theorem|lemma|corollary|proposition)s?\b`;

// "by the above" is standard, "by the above lemma" is not
const STANDARD_PHRASE_PATTERNS = STANDARD_PHRASES.map(
    phrase => new RegExp(`\\b${escapeRegExp(phrase)}\\b(?!\\s+${RESULT_NOUN})`, 'gi'),
);

export const detectUncitedTheorems: GapDetector = ({ steps }) => {
    const flags: FlagDraft[] = [];

    for (const step of steps) {
        const text = STANDARD_PHRASE_PATTERNS.reduce(
            (acc, pattern) => acc.replace(pattern, m => ' '.repeat(m.length)),
            step.text,
        );

        for (const m of text.matchAll(UNCITED)) {
            const end = (m.index ?? 0) + m[0].length;
            if (CITED_FOLLOWER.test(text.slice(end))) continue;

            flags.push({
                kind: 'uncited-theorem',
                target: step.id,
                severity: 'medium',
                message: `"${m[0]}" does not say which result is applied`,
                suggestion: 'Name the result or add a reference (number, label or citation).',
            });
        }
    }

    return flags;
};

// ── 3. Unassumed properties ─────────────────────────────────

export const detectUnassumedProperties: GapDetector = ({ steps, assumptions }, { vocabulary }) => {
    const flags: FlagDraft[] = [];
    const flagged = new Set<string>();

    for (const step of steps) {
        const active = activeAssumptions(assumptions, step.id);

        for (const mention of findTermMentions(step.text, vocabulary)) {
            const symbol = [...step.tokens].reverse().find(t => t.position < mention.start)?.symbol ?? null;
            const key = `${mention.term}|${symbol ?? ''}`;
            if (flagged.has(key)) continue;

            const covered = active.some(a =>
                a.properties.includes(mention.term)
                && (symbol === null || a.tokens.length === 0 || a.tokens.includes(symbol)));
            if (covered) continue;

            flagged.add(key);
            const subject = symbol ? ` of ${symbol}` : '';
            flags.push({
                kind: 'unassumed-property',
                target: step.id,
                severity: 'low',
                message: `Property "${mention.term}"${subject} is used but no active assumption states it`,
                suggestion: `State the assumption that ${symbol ?? 'the object'} is ${mention.term}, or cite the result establishing it.`,
            });
        }
    }

    return flags;
};

// ── 4. Obvious leaps ────────────────────────────────────────

const HEDGE = new RegExp(`\\b(?:${HEDGE_PHRASES.map(escapeRegExp).join('|')})\\b`, 'gi');

const OPERATOR = /\\(?:int|iint|oint|sum|prod|lim|limsup|liminf|sup|inf|max|min|frac|partial|nabla|otimes|oplus|circ|cdot|times|leq?|geq?|neq?|subseteq|subset|in|to|mapsto|implies|iff|sqrt|log|exp)(?![A-Za-z])|[=<>+\-*/^]/g;

export interface LeapComplexity {
    operators: number;
    mathLength: number;
    textLength: number;
}

/** Complexity of what a hedge phrase asserts: the rest of its sentence. */
export function measureHedgedContent(text: string, from: number): LeapComplexity {
    const math = findMathRanges(text);
    let end = text.length;
    for (const m of text.slice(from).matchAll(/[.!?](?=\s|$)/g)) {
        const pos = from + (m.index ?? 0);
        if (!math.some(r => pos >= r.start && pos < r.end)) {
            end = pos;
            break;
        }
    }

    let mathText = '';
    let prose = '';
    let cursor = from;
    for (const r of math) {
        if (r.end <= from || r.start >= end) continue;
        const s = Math.max(r.start, from);
        const e = Math.min(r.end, end);
        prose += text.slice(cursor, s);
        mathText += text.slice(s, e);
        cursor = e;
    }
    prose += text.slice(cursor, end);

    const operatorSource = mathText || prose;
    return {
        operators: operatorSource.match(OPERATOR)?.length ?? 0,
        mathLength: mathText.length,
        textLength: prose.replace(/^[\s,:;]+/, '').trim().length,
    };
}

export const detectObviousLeaps: GapDetector = ({ steps }, { obviousLeap }) => {
    const flags: FlagDraft[] = [];

    for (const step of steps) {
        const math = findMathRanges(step.text);

        for (const m of step.text.matchAll(HEDGE)) {
            const pos = m.index ?? 0;
            if (math.some(r => pos >= r.start && pos < r.end)) continue;

            const c = measureHedgedContent(step.text, pos + m[0].length);
            const reasons: string[] = [];
            if (c.operators > obviousLeap.maxOperators) reasons.push(`${c.operators} operators`);
            if (c.mathLength > obviousLeap.maxMathLength) reasons.push(`${c.mathLength} chars of math`);
            if (c.textLength > obviousLeap.maxTextLength) reasons.push(`${c.textLength} chars of prose`);
            if (reasons.length === 0) continue;

            flags.push({
                kind: 'obvious-leap',
                target: step.id,
                severity: reasons.length > 1 ? 'medium' : 'low',
                message: `"${m[0]}" introduces non-trivial content (${reasons.join(', ')})`,
                suggestion: 'Spell out the intermediate reasoning instead of calling it obvious.',
            });
        }
    }

    return flags;
};

// ── Orchestration ───────────────────────────────────────────

export const GAP_DETECTORS: Readonly<Record<FlagKind, GapDetector>> = {
    'undefined-symbol': detectUndefinedSymbols,
    'uncited-theorem': detectUncitedTheorems,
    'unassumed-property': detectUnassumedProperties,
    'obvious-leap': detectObviousLeaps,
};

/** Flags grouped by kind, then by target document order; ids follow that order. */
export function detectGaps(input: GapInput, options: GapOptions): Flag[] {
    const order = new Map<NodeId, number>();
    for (const step of input.steps) order.set(step.id, step.index);
    for (const a of input.assumptions) {
        order.set(a.id, input.steps.find(s => s.id === a.stepId)?.index ?? 0);
    }

    const drafts = FLAG_KIND_ORDER.flatMap(kind =>
        GAP_DETECTORS[kind](input, options)
            .map((flag, seq) => ({ flag, seq }))
            .sort((a, b) => (order.get(a.flag.target) ?? 0) - (order.get(b.flag.target) ?? 0) || a.seq - b.seq)
            .map(({ flag }) => flag));

    return drafts.map((flag, i) => ({ id: flagId(i), ...flag }));
}
