// ─────────────────────────────────────────────────────────────
// Proofscope  ·  Step Segmenter
// Sentence boundaries that respect math spans and abbreviations,
// grouped into reasoning steps by discourse markers
// ─────────────────────────────────────────────────────────────

import { findMathRanges, type PreprocessedText } from './preprocess';
import { inRanges, stepId, type Citation, type Range, type Step, type StepKind } from '../core/types';
import { DISCOURSE_MARKERS, REASONING_KEYWORDS, type MarkerKind } from '../core/vocabulary';

export type SegmentedStep = Omit<Step, 'tokens'>;

export interface SegmentOptions {
    minStepLength: number;
}

/** "Case 2." / "Step 1." headings: their period does not end a sentence. */
const HEADING = /^(?:\\textbf\{)?(?:Case|Step|Claim)\s+[0-9IVXivx]+[a-z]?\.$/;

const FORMATTING_PREFIX = /^(?:\\(?:textbf|emph|textit|textsc|underline)\{|\()+/;

// ── Sentences ───────────────────────────────────────────────

export function splitSentences(pre: PreprocessedText): Range[] {
    const { text, protectedRanges, abbreviations } = pre;
    const sentences: Range[] = [];
    let start = 0;

    for (const match of text.matchAll(/[.!?](?=\s|$)/g)) {
        const pos = match.index ?? 0;
        const end = pos + 1;
        if (inRanges(protectedRanges, pos)) continue;

        const candidate = text.slice(start, end);
        if (endsWithAbbreviation(candidate, abbreviations)) continue;
        if (HEADING.test(candidate)) continue;

        sentences.push({ start, end });
        start = end + 1;
    }

    if (start < text.length) sentences.push({ start, end: text.length });
    return sentences;
}

export function endsWithAbbreviation(candidate: string, abbreviations: readonly string[]): boolean {
    const lower = candidate.toLowerCase();
    return abbreviations.some(abbr => {
        const a = abbr.toLowerCase();
        if (!lower.endsWith(a)) return false;
        const before = lower[lower.length - a.length - 1];
        return before === undefined || !/[a-z]/.test(before);
    });
}

// ── Steps ───────────────────────────────────────────────────

interface Marker {
    text: string;
    kind: MarkerKind;
}

export function detectMarker(sentence: string): Marker | null {
    const lead = sentence.replace(FORMATTING_PREFIX, '');
    for (const { pattern, kind } of DISCOURSE_MARKERS) {
        const m = lead.match(pattern);
        if (m) return { text: m[0], kind };
    }
    return null;
}

export function segment(pre: PreprocessedText, options: SegmentOptions): SegmentedStep[] {
    const { text } = pre;
    const groups: Array<{ start: number; end: number; marker: Marker | null }> = [];

    for (const sentence of splitSentences(pre)) {
        const marker = detectMarker(text.slice(sentence.start, sentence.end));
        const current = groups[groups.length - 1];

        if (!current || marker || current.end - current.start >= options.minStepLength) {
            groups.push({ start: sentence.start, end: sentence.end, marker });
        } else {
            current.end = sentence.end;
        }
    }

    return groups.map((g, index) => {
        const stepText = text.slice(g.start, g.end);
        return {
            id: stepId(index),
            index,
            text: stepText,
            kind: kindFor(g.marker),
            marker: g.marker?.text ?? null,
            citations: extractCitations(stepText),
            labels: extractLabels(stepText),
            keywords: extractKeywords(stepText),
        };
    });
}

function kindFor(marker: Marker | null): StepKind {
    switch (marker?.kind) {
        case 'deduction': return 'deduction';
        case 'case-split': return 'case-split';
        case 'application': return 'application';
        default: return 'claim';
    }
}

// ── Per-step text features ──────────────────────────────────

const HEADING_LABEL = /^(?:\\textbf\{)?(Claim|Step)\s+(\d+)/;

export function extractLabels(text: string): string[] {
    const labels: string[] = [];
    const heading = text.match(HEADING_LABEL);
    if (heading) labels.push(`${heading[1].toLowerCase()}:${heading[2]}`);
    for (const m of text.matchAll(/\\(?:label|tag\*?)\{([^}]+)\}/g)) {
        labels.push(m[1].trim());
    }
    return labels;
}

export function extractCitations(text: string): Citation[] {
    const found: Array<Citation & { pos: number }> = [];
    const headingEnd = text.match(HEADING_LABEL)?.[0].length ?? 0;

    for (const m of text.matchAll(/\\(?:eqref|ref|cref|Cref|autoref)\{([^}]+)\}/g)) {
        found.push({ kind: 'label', target: m[1].trim(), raw: m[0], pos: m.index ?? 0 });
    }
    for (const m of text.matchAll(/\b(Step|Claim)\s+(\d+)\b/g)) {
        const pos = m.index ?? 0;
        if (pos < headingEnd) continue;
        const kind = m[1] === 'Step' ? 'step' : 'claim';
        found.push({ kind, target: `${kind}:${m[2]}`, raw: m[0], pos });
    }
    for (const m of text.matchAll(/\b(Theorem|Lemma|Corollary|Proposition|Definition|Equation)\s+(\d+(?:\.\d+)*)/g)) {
        found.push({ kind: 'result', target: `${m[1].toLowerCase()} ${m[2]}`, raw: m[0], pos: m.index ?? 0 });
    }
    for (const m of text.matchAll(/\\cite(?:\[[^\]]*\])?\{([^}]+)\}/g)) {
        found.push({ kind: 'result', target: `cite:${m[1].trim()}`, raw: m[0], pos: m.index ?? 0 });
    }

    return found
        .sort((a, b) => a.pos - b.pos)
        .map(({ kind, target, raw }) => ({ kind, target, raw }));
}

export function extractKeywords(text: string): string[] {
    const math = findMathRanges(text);
    const keywords: string[] = [];
    for (const m of text.matchAll(/[A-Za-z]+/g)) {
        if (inRanges(math, m.index ?? 0)) continue;
        const word = m[0].toLowerCase();
        if (REASONING_KEYWORDS.includes(word) && !keywords.includes(word)) keywords.push(word);
    }
    return keywords;
}
