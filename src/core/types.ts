// ─────────────────────────────────────────────────────────────
// Proofscope  ·  Core Analysis Types
// Steps, assumptions, flags and the dependency graph
// ─────────────────────────────────────────────────────────────

// ── Identifiers ─────────────────────────────────────────────

export type StepId = `S${number}`;
export type AssumptionId = `A${number}`;
export type FlagId = `F${number}`;
export type NodeId = StepId | AssumptionId;

export interface Range {
    start: number;
    end: number;
}

// ── Tokens ──────────────────────────────────────────────────

export interface TokenOccurrence {
    stepId: StepId;
    position: number;
}

export interface StepToken {
    /** Grouping form: `x` for `x_1`, `\epsilon` for `\varepsilon`. */
    symbol: string;
    /** Form as written, modifiers included. */
    display: string;
    position: number;
}

export interface Token {
    readonly symbol: string;
    readonly display: string;
    readonly occurrences: readonly TokenOccurrence[];
    readonly introduced: boolean;
}

// ── Steps ───────────────────────────────────────────────────

export type StepKind = 'claim' | 'deduction' | 'case-split' | 'application';

export type CitationKind = 'step' | 'label' | 'claim' | 'result';

export interface Citation {
    kind: CitationKind;
    /** Normalized key: `3` for "Step 3", `eq:main` for `\ref{eq:main}`. */
    target: string;
    raw: string;
}

export interface Step {
    readonly id: StepId;
    readonly index: number;
    readonly text: string;
    readonly kind: StepKind;
    readonly marker: string | null;
    readonly tokens: readonly StepToken[];
    readonly citations: readonly Citation[];
    readonly labels: readonly string[];
    readonly keywords: readonly string[];
}

// ── Assumptions ─────────────────────────────────────────────

export type AssumptionKeyword = 'Let' | 'Define' | 'Assume' | 'Suppose' | 'Fix' | 'Given';
export type ScopeKind = 'global' | 'local';

export interface Assumption {
    readonly id: AssumptionId;
    readonly text: string;
    readonly keyword: AssumptionKeyword;
    readonly stepId: StepId;
    readonly scopeKind: ScopeKind;
    readonly scope: readonly StepId[];
    readonly tokens: readonly string[];
    readonly properties: readonly string[];
}

// ── Flags ───────────────────────────────────────────────────

export type FlagKind = 'undefined-symbol' | 'uncited-theorem' | 'unassumed-property' | 'obvious-leap';
export type Severity = 'low' | 'medium' | 'high';

export const FLAG_KIND_ORDER: readonly FlagKind[] = [
    'undefined-symbol',
    'uncited-theorem',
    'unassumed-property',
    'obvious-leap',
];

export interface Flag {
    readonly id: FlagId;
    readonly kind: FlagKind;
    readonly target: NodeId;
    readonly message: string;
    readonly severity: Severity;
    readonly suggestion: string;
}

// ── Dependency graph ────────────────────────────────────────

export type EdgeKind = 'reference' | 'assumption' | 'context' | 'sequential';

export interface Edge {
    readonly source: NodeId;
    readonly target: NodeId;
    readonly weight: number;
    readonly kind: EdgeKind;
}

export interface GraphNode {
    readonly id: NodeId;
    readonly type: 'step' | 'assumption';
    /** Index of the Step this node belongs to, in document order. */
    readonly order: number;
    readonly scopeKind?: ScopeKind;
}

export interface ProofGraph {
    readonly nodes: readonly GraphNode[];
    readonly edges: readonly Edge[];
}

// ── Warnings & result ───────────────────────────────────────

export type WarningCode =
    | 'unbalanced-math'
    | 'unbalanced-environment'
    | 'unclosed-scope'
    | 'unmatched-close'
    | 'forward-reference';

export interface StructuralWarning {
    readonly code: WarningCode;
    readonly message: string;
    /** Step id, or a character offset into the normalized text. */
    readonly location: string;
}

export interface AnalysisResult {
    readonly source: string;
    readonly normalized: string;
    readonly steps: readonly Step[];
    readonly assumptions: readonly Assumption[];
    readonly tokens: readonly Token[];
    readonly flags: readonly Flag[];
    readonly graph: ProofGraph;
    readonly warnings: readonly StructuralWarning[];
}

// ── Helpers ─────────────────────────────────────────────────

export const stepId = (index: number): StepId => `S${index + 1}`;
export const assumptionId = (index: number): AssumptionId => `A${index + 1}`;
export const flagId = (index: number): FlagId => `F${index + 1}`;

export function inRanges(ranges: readonly Range[], offset: number): boolean {
    return ranges.some(r => offset >= r.start && offset < r.end);
}
