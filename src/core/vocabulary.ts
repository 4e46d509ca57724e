// ─────────────────────────────────────────────────────────────
// Proofscope  ·  Read-Only Reference Tables
// Initialized once at module load, never mutated
// ─────────────────────────────────────────────────────────────

import propertyList from '../data/properties.json';

// ── Segmentation ────────────────────────────────────────────

/** Trailing periods of these never end a sentence. */
export const ABBREVIATIONS: readonly string[] = Object.freeze([
    'i.e.', 'e.g.', 'cf.', 'resp.', 'w.l.o.g.', 'etc.', 'viz.', 'vs.', 'et al.',
    'Thm.', 'Lem.', 'Prop.', 'Cor.', 'Def.', 'Eq.', 'Sec.', 'Fig.',
]);

export type MarkerKind = 'deduction' | 'case-split' | 'application' | 'hypothesis' | 'transition';

export interface DiscourseMarker {
    pattern: RegExp;
    kind: MarkerKind;
}

/** Sentence openers that start a new Step. Anchored at sentence start. */
export const DISCOURSE_MARKERS: readonly DiscourseMarker[] = Object.freeze([
    { pattern: /^(?:Then|Hence|Therefore|Thus|So|Consequently)\b/, kind: 'deduction' },
    { pattern: /^(?:Case\s+[0-9IVXivx]+[a-z]?|WLOG|W\.l\.o\.g\.|Without loss of generality)\b/, kind: 'case-split' },
    { pattern: /^By\b/, kind: 'application' },
    { pattern: /^(?:Suppose|Assume|Let)\b/, kind: 'hypothesis' },
    { pattern: /^(?:Now|Next|Finally|Conversely|Since|Because)\b/, kind: 'transition' },
]);

export const REASONING_KEYWORDS: readonly string[] = Object.freeze([
    'let', 'suppose', 'assume', 'fix', 'given', 'define', 'consider',
    'then', 'hence', 'therefore', 'thus', 'so', 'consequently', 'since', 'because',
    'by', 'implies', 'follows', 'contradiction', 'case', 'wlog', 'induction', 'finally',
]);

// ── Symbols ─────────────────────────────────────────────────

export const GREEK_LETTERS: ReadonlyMap<string, string> = new Map([
    ['alpha', 'alpha'], ['beta', 'beta'], ['gamma', 'gamma'], ['delta', 'delta'],
    ['epsilon', 'epsilon'], ['varepsilon', 'epsilon'], ['zeta', 'zeta'], ['eta', 'eta'],
    ['theta', 'theta'], ['vartheta', 'theta'], ['iota', 'iota'], ['kappa', 'kappa'],
    ['lambda', 'lambda'], ['mu', 'mu'], ['nu', 'nu'], ['xi', 'xi'], ['pi', 'pi'],
    ['varpi', 'pi'], ['rho', 'rho'], ['varrho', 'rho'], ['sigma', 'sigma'],
    ['varsigma', 'sigma'], ['tau', 'tau'], ['upsilon', 'upsilon'], ['phi', 'phi'],
    ['varphi', 'phi'], ['chi', 'chi'], ['psi', 'psi'], ['omega', 'omega'],
    ['Gamma', 'Gamma'], ['Delta', 'Delta'], ['Theta', 'Theta'], ['Lambda', 'Lambda'],
    ['Xi', 'Xi'], ['Pi', 'Pi'], ['Sigma', 'Sigma'], ['Upsilon', 'Upsilon'],
    ['Phi', 'Phi'], ['Psi', 'Psi'], ['Omega', 'Omega'],
]);

export const NAMED_OPERATORS: ReadonlySet<string> = new Set([
    'sup', 'inf', 'lim', 'limsup', 'liminf', 'max', 'min', 'log', 'ln', 'exp',
    'sin', 'cos', 'tan', 'det', 'dim', 'ker', 'deg', 'gcd', 'lcm', 'sum', 'prod',
    'int', 'arg', 'hom', 'Hom', 'Pr',
]);

export const WRAPPER_COMMANDS: ReadonlySet<string> = new Set([
    'mathbb', 'mathcal', 'mathfrak', 'mathscr', 'mathbf',
]);

/** Universal constants and standard sets never reported as undefined. */
export const SYMBOL_WHITELIST: ReadonlySet<string> = new Set([
    'e', 'i', '\\pi',
    '\\mathbb{N}', '\\mathbb{Z}', '\\mathbb{Q}', '\\mathbb{R}', '\\mathbb{C}',
    ...[...NAMED_OPERATORS].map(op => `\\${op}`),
]);

// ── Gap detection ───────────────────────────────────────────

/** "by ..." phrases that cite nothing and need no citation. */
export const STANDARD_PHRASES: readonly string[] = Object.freeze([
    'by definition', 'by construction', 'by assumption', 'by hypothesis',
    'by induction', 'by contradiction', 'by symmetry', 'by continuity',
    'by the definition', 'by the hypothesis', 'by the hypotheses', 'by the assumption',
    'by the induction hypothesis', 'by the inductive hypothesis', 'by the above',
    "by the theorem's hypothesis", 'by the theorem hypothesis', "by the lemma's hypothesis",
    'by the hypothesis of the theorem', 'by the hypothesis of the lemma',
]);

export const HEDGE_PHRASES: readonly string[] = Object.freeze([
    'clearly', 'obviously', 'trivially', 'evidently', 'plainly', 'manifestly',
    'it is easy to see', 'it is clear that', 'it is obvious that', 'one easily sees',
    'it is easily seen', 'it is straightforward', 'of course', 'easily verified',
]);

export const PROPERTY_VOCABULARY: readonly string[] = Object.freeze(
    propertyList.map(term => term.toLowerCase()),
);

// ── Context overlap ─────────────────────────────────────────

export const STOPWORDS: ReadonlySet<string> = new Set([
    'the', 'and', 'for', 'that', 'this', 'with', 'are', 'is', 'be', 'let', 'then',
    'every', 'some', 'any', 'all', 'each', 'there', 'exists', 'such', 'from',
    'into', 'onto', 'have', 'has', 'its', 'our', 'not', 'but', 'which', 'where',
    'assume', 'suppose', 'define', 'fix', 'given', 'hence', 'thus', 'therefore',
]);

// ── Helpers ─────────────────────────────────────────────────

export function escapeRegExp(s: string): string {
    return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export interface TermMention {
    term: string;
    start: number;
    end: number;
}

/**
 * Finds vocabulary terms in `text`, longest first; a shorter term
 * inside an already matched longer one is skipped.
 */
export function findTermMentions(text: string, vocabulary: readonly string[]): TermMention[] {
    const mentions: TermMention[] = [];
    const sorted = [...vocabulary].sort((a, b) => b.length - a.length || a.localeCompare(b));

    for (const term of sorted) {
        const pattern = new RegExp(`(?<![\\w-])${escapeRegExp(term)}(?![\\w-])`, 'gi');
        for (const match of text.matchAll(pattern)) {
            const start = match.index ?? 0;
            const end = start + match[0].length;
            if (mentions.some(m => start < m.end && end > m.start)) continue;
            mentions.push({ term, start, end });
        }
    }

    return mentions.sort((a, b) => a.start - b.start);
}
