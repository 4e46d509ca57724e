// ─────────────────────────────────────────────────────────────
// Proofscope  ·  Assumption & Scope Extraction
// Hypotheses introduced by Let/Assume/Suppose/..., scoped by a
// stack of open sub-argument blocks (cases, contradiction, WLOG)
// ─────────────────────────────────────────────────────────────

import { findMathRanges } from './preprocess';
import { clauseEnd, symbolsOf } from './tokens';
import { MalformedInputError } from '../core/errors';
import { Diagnostics } from '../core/log';
import {
    assumptionId,
    type Assumption,
    type AssumptionKeyword,
    type ScopeKind,
    type Step,
    type StepId,
} from '../core/types';
import { findTermMentions } from '../core/vocabulary';

// ── Block markers ───────────────────────────────────────────

export type BlockKind = 'contradiction' | 'temporary' | 'case' | 'wlog';

const OPENERS: ReadonlyArray<{ pattern: RegExp; kind: BlockKind }> = [
    {
        pattern: /\b(?:Suppose|Assume)(?:,)?\s+(?:for\s+(?:the\s+sake\s+of\s+)?(?:a\s+)?contradiction|to\s+the\s+contrary|on\s+the\s+contrary|not\b)/gi,
        kind: 'contradiction',
    },
    { pattern: /\b(?:Suppose|Assume)\s+temporarily\b/gi, kind: 'temporary' },
    { pattern: /(?<=^|[.;:!?]\s|\\textbf\{|\()Case\s+[0-9IVXivx]+[a-z]?\s*[:.)]/g, kind: 'case' },
    { pattern: /\b(?:WLOG|W\.l\.o\.g\.|[Ww]ithout loss of generality)/g, kind: 'wlog' },
];

type CloserKind = 'case' | 'contradiction';

const CLOSERS: ReadonlyArray<{ pattern: RegExp; kind: CloserKind }> = [
    { pattern: /\bThis\s+(?:completes|concludes|ends|finishes)\s+(?:the\s+)?(?:proof\s+(?:of|for)\s+)?(?:the\s+)?[Cc]ase\b(?:\s+[0-9IVXivx]+[a-z]?)?/g, kind: 'case' },
    { pattern: /\b[Ee]nd\s+of\s+(?:the\s+)?case\b/g, kind: 'case' },
    { pattern: /\b(?:a|this|that)\s+contradiction\b/gi, kind: 'contradiction' },
    { pattern: /(?<=^|[.;!?]\s)Contradiction\b/g, kind: 'contradiction' },
    { pattern: /\bcontradicting\b/gi, kind: 'contradiction' },
];

const ASSUMPTION_KEYWORD = /(?<=^|[.;:!?]\s|\band\s|\\textbf\{[^}]*\}\s)(Let|Define|Assume|Suppose|Fix|Given|let|define|assume|suppose|fix|given)\b/g;

const QUALIFIER = /^,?\s*(?:for\s+(?:the\s+sake\s+of\s+)?(?:a\s+)?contradiction|to\s+the\s+contrary|on\s+the\s+contrary|temporarily)\s*,?\s*/i;

/** Hypothesis recorded for "Suppose not" / "Assume not". */
export const NEGATED_CLAIM = 'not (the claim)';

// ── Scope stack ─────────────────────────────────────────────

interface OpenBlock {
    kind: BlockKind;
    label: string;
    openIndex: number;
    members: AssumptionDraft[];
    /** Set when a case inside this contradiction block ended in a contradiction. */
    pendingEnd: number | null;
}

interface AssumptionDraft {
    text: string;
    keyword: AssumptionKeyword;
    stepIndex: number;
    scopeKind: ScopeKind;
    endIndex: number | null;
}

type ScopeEvent =
    | { type: 'close'; pos: number; phrase: string; kind: CloserKind }
    | { type: 'open'; pos: number; kind: BlockKind; label: string }
    | { type: 'assume'; pos: number; keyword: AssumptionKeyword; text: string };

const EVENT_PRIORITY: Record<ScopeEvent['type'], number> = { close: 0, open: 1, assume: 2 };

// ── Public API ──────────────────────────────────────────────

export function extractAssumptions(
    steps: readonly Step[],
    vocabulary: readonly string[],
    diagnostics: Diagnostics = new Diagnostics(),
): Assumption[] {
    const drafts: AssumptionDraft[] = [];
    const stack: OpenBlock[] = [];
    const lastIndex = steps.length - 1;
    let firstClaimSeen = false;

    const seal = (block: OpenBlock, endIndex: number) => {
        for (const member of block.members) member.endIndex = endIndex;
    };

    for (const step of steps) {
        let introducedHere = 0;

        for (const event of scopeEvents(step.text)) {
            switch (event.type) {
                case 'close': {
                    const block = stack.pop();
                    if (!block) {
                        diagnostics.report('Scope', new MalformedInputError(
                            'unmatched-close',
                            `"${event.phrase}" in ${step.id} closes no open block`,
                            step.id,
                        ));
                        break;
                    }
                    seal(block, step.index);
                    diagnostics.debug('Scope', `closed ${block.label} at ${step.id}`);
                    const parent = stack[stack.length - 1];
                    if (event.kind === 'contradiction' && block.kind === 'case' && parent?.kind === 'contradiction') {
                        parent.pendingEnd = step.index;
                    }
                    break;
                }
                case 'open': {
                    const top = stack[stack.length - 1];
                    if (event.kind === 'case' && top?.kind === 'case') {
                        stack.pop();
                        seal(top, Math.max(top.openIndex, step.index - 1));
                    } else if (event.kind === 'case' && top?.kind === 'contradiction') {
                        top.pendingEnd = null;
                    }
                    stack.push({ kind: event.kind, label: event.label, openIndex: step.index, members: [], pendingEnd: null });
                    break;
                }
                case 'assume': {
                    const block = stack[stack.length - 1];
                    const draft: AssumptionDraft = {
                        text: event.text,
                        keyword: event.keyword,
                        stepIndex: step.index,
                        scopeKind: block || firstClaimSeen ? 'local' : 'global',
                        endIndex: block ? null : lastIndex,
                    };
                    block?.members.push(draft);
                    drafts.push(draft);
                    introducedHere++;
                    break;
                }
            }
        }

        if (introducedHere === 0) firstClaimSeen = true;
    }

    for (const block of stack) {
        // every case of the argument ended in a contradiction
        if (block.pendingEnd !== null) {
            diagnostics.debug('Scope', `closed ${block.label} at ${steps[block.pendingEnd].id} after its last case`);
            seal(block, block.pendingEnd);
            continue;
        }
        diagnostics.report('Scope', new MalformedInputError(
            'unclosed-scope',
            `${block.label} opened at ${steps[block.openIndex].id} is never closed; scope extends to the end of the proof`,
            steps[block.openIndex].id,
        ));
        seal(block, lastIndex);
    }

    return drafts.map((d, i) => {
        const end = Math.max(d.stepIndex, d.endIndex ?? lastIndex);
        const scope: StepId[] = steps.slice(d.stepIndex, end + 1).map(s => s.id);
        return {
            id: assumptionId(i),
            text: d.text,
            keyword: d.keyword,
            stepId: steps[d.stepIndex].id,
            scopeKind: d.scopeKind,
            scope,
            tokens: symbolsOf(d.text),
            properties: [...new Set(findTermMentions(d.text, vocabulary).map(m => m.term))],
        };
    });
}

export function activeAssumptions(assumptions: readonly Assumption[], id: StepId): Assumption[] {
    return assumptions.filter(a => a.scope.includes(id));
}

// ── Event scanning ──────────────────────────────────────────

export function scopeEvents(text: string): ScopeEvent[] {
    const events: ScopeEvent[] = [];
    const openSpans: Array<{ start: number; end: number }> = [];

    for (const { pattern, kind } of OPENERS) {
        for (const m of text.matchAll(pattern)) {
            const pos = m.index ?? 0;
            openSpans.push({ start: pos, end: pos + m[0].length });
            events.push({ type: 'open', pos, kind, label: blockLabel(kind, m[0]) });
        }
    }

    for (const { pattern, kind } of CLOSERS) {
        for (const m of text.matchAll(pattern)) {
            const pos = m.index ?? 0;
            const end = pos + m[0].length;
            if (openSpans.some(s => pos < s.end && end > s.start)) continue;
            events.push({ type: 'close', pos, phrase: m[0], kind });
        }
    }

    events.push(...assumptionEvents(text));

    return events.sort((a, b) => a.pos - b.pos || EVENT_PRIORITY[a.type] - EVENT_PRIORITY[b.type]);
}

function assumptionEvents(text: string): ScopeEvent[] {
    const math = findMathRanges(text);
    const matches = [...text.matchAll(ASSUMPTION_KEYWORD)].filter(m => {
        const pos = m.index ?? 0;
        return !math.some(r => pos >= r.start && pos < r.end);
    });
    const events: ScopeEvent[] = [];

    matches.forEach((m, i) => {
        const pos = m.index ?? 0;
        const keyword = capitalize(m[1]);
        const from = pos + m[0].length;
        const nextKeyword = matches[i + 1]?.index ?? text.length;
        const end = Math.min(clauseEnd(text, from, keyword === 'Given' ? ',.;' : '.;', math), nextKeyword);
        const body = cleanClause(text.slice(from, end));
        if (body.toLowerCase() === 'not') {
            events.push({ type: 'assume', pos, keyword, text: NEGATED_CLAIM });
        } else if (body) {
            events.push({ type: 'assume', pos, keyword, text: body });
        }
    });

    return events;
}

function cleanClause(raw: string): string {
    return raw
        .trim()
        .replace(QUALIFIER, '')
        .replace(/^that\s+/i, '')
        .replace(/(?:,\s*|\s+)and$/, '')
        .replace(/[,\s]+$/, '')
        .trim();
}

function blockLabel(kind: BlockKind, phrase: string): string {
    switch (kind) {
        case 'case': return phrase.replace(/\s*[:.)]$/, '').replace(/\s+/g, ' ');
        case 'contradiction': return 'Contradiction block';
        case 'temporary': return 'Temporary assumption block';
        case 'wlog': return 'WLOG block';
    }
}

function capitalize(word: string): AssumptionKeyword {
    switch (word.toLowerCase()) {
        case 'let': return 'Let';
        case 'define': return 'Define';
        case 'assume': return 'Assume';
        case 'suppose': return 'Suppose';
        case 'fix': return 'Fix';
        default: return 'Given';
    }
}
