// ─────────────────────────────────────────────────────────────
// Proofscope  ·  Dependency Graph Builder
// Edges always point forward in document order, so the graph
// is acyclic by construction
// ─────────────────────────────────────────────────────────────

import { MalformedInputError } from '../core/errors';
import { Diagnostics } from '../core/log';
import type { Assumption, CitationKind, Edge, EdgeKind, GraphNode, NodeId, ProofGraph, Step } from '../core/types';
import { STOPWORDS } from '../core/vocabulary';
import { activeAssumptions } from '../parser/assumptions';

export const WEIGHTS = {
    reference: 1.0,
    assumption: 1.0,
    contextMin: 0.3,
    contextSpan: 0.3,
    sequential: 0.1,
} as const;

// ── Builder ─────────────────────────────────────────────────

export function buildGraph(
    steps: readonly Step[],
    assumptions: readonly Assumption[],
    diagnostics: Diagnostics = new Diagnostics(),
): ProofGraph {
    const nodes: GraphNode[] = [];
    for (const step of steps) {
        for (const a of assumptions.filter(x => x.stepId === step.id)) {
            nodes.push({ id: a.id, type: 'assumption', order: step.index, scopeKind: a.scopeKind });
        }
        nodes.push({ id: step.id, type: 'step', order: step.index });
    }
    const position = new Map(nodes.map((n, i): [NodeId, number] => [n.id, i]));

    const edges = new Map<string, Edge>();
    const addEdge = (source: NodeId, target: NodeId, weight: number, kind: EdgeKind) => {
        const key = `${source}->${target}`;
        const existing = edges.get(key);
        if (!existing || weight > existing.weight) edges.set(key, { source, target, weight, kind });
    };

    // Explicit back-references
    const labels = new Map<string, number>();
    for (const step of steps) {
        for (const label of step.labels) {
            if (!labels.has(label)) labels.set(label, step.index);
        }
    }

    for (const step of steps) {
        for (const citation of step.citations) {
            const target = resolveCitation(citation.kind, citation.target, labels, steps.length);
            if (target === null || target === step.index) continue;
            if (target > step.index) {
                diagnostics.report('Graph', new MalformedInputError(
                    'forward-reference',
                    `${step.id} refers to ${steps[target].id} ("${citation.raw}"), which comes later; edge skipped`,
                    step.id,
                ));
                continue;
            }
            addEdge(steps[target].id, step.id, WEIGHTS.reference, 'reference');
        }
    }

    // Assumption usage
    for (const step of steps) {
        const symbols = new Set(step.tokens.map(t => t.symbol));
        for (const a of activeAssumptions(assumptions, step.id)) {
            if (a.tokens.some(t => symbols.has(t))) {
                addEdge(a.id, step.id, WEIGHTS.assumption, 'assumption');
            } else {
                addEdge(a.id, step.id, contextWeight(a.text, step.text), 'context');
            }
        }
    }

    // Sequential fallback
    for (let i = 0; i + 1 < steps.length; i++) {
        if (!edges.has(`${steps[i].id}->${steps[i + 1].id}`)) {
            addEdge(steps[i].id, steps[i + 1].id, WEIGHTS.sequential, 'sequential');
        }
    }

    const ordered = [...edges.values()].sort((x, y) =>
        (position.get(x.source) ?? 0) - (position.get(y.source) ?? 0)
        || (position.get(x.target) ?? 0) - (position.get(y.target) ?? 0));

    diagnostics.debug('Graph', `${nodes.length} nodes, ${ordered.length} edges`);
    return { nodes, edges: ordered };
}

function resolveCitation(
    kind: CitationKind,
    target: string,
    labels: ReadonlyMap<string, number>,
    stepCount: number,
): number | null {
    if (kind === 'result') return null;
    const labelled = labels.get(target);
    if (labelled !== undefined) return labelled;
    if (kind === 'step') {
        const n = Number(target.slice('step:'.length));
        return Number.isInteger(n) && n >= 1 && n <= stepCount ? n - 1 : null;
    }
    return null;
}

// ── Context overlap ─────────────────────────────────────────

function contentWords(text: string): Set<string> {
    const words = text.toLowerCase().match(/[a-z]{3,}/g) ?? [];
    return new Set(words.filter(w => !STOPWORDS.has(w)));
}

/** 0.3 to 0.6, from the Jaccard overlap of content words. */
export function contextWeight(assumptionText: string, stepText: string): number {
    const a = contentWords(assumptionText);
    const b = contentWords(stepText);
    const shared = [...a].filter(w => b.has(w)).length;
    const union = new Set([...a, ...b]).size;
    const overlap = union === 0 ? 0 : shared / union;
    return Math.round((WEIGHTS.contextMin + WEIGHTS.contextSpan * overlap) * 100) / 100;
}

// ── Structural checks ───────────────────────────────────────

export function isAcyclic(graph: ProofGraph): boolean {
    const indegree = new Map(graph.nodes.map((n): [NodeId, number] => [n.id, 0]));
    const outgoing = new Map<NodeId, NodeId[]>();
    for (const e of graph.edges) {
        indegree.set(e.target, (indegree.get(e.target) ?? 0) + 1);
        outgoing.set(e.source, [...(outgoing.get(e.source) ?? []), e.target]);
    }

    const queue = [...indegree].filter(([, d]) => d === 0).map(([id]) => id);
    let visited = 0;
    while (queue.length > 0) {
        const id = queue.shift();
        if (id === undefined) break;
        visited++;
        for (const next of outgoing.get(id) ?? []) {
            const d = (indegree.get(next) ?? 0) - 1;
            indegree.set(next, d);
            if (d === 0) queue.push(next);
        }
    }

    return visited === indegree.size;
}
