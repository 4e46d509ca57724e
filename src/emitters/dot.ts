// ─────────────────────────────────────────────────────────────
// Proofscope  ·  Graphviz DOT Export
// Global assumptions light blue, local ones yellow, steps white;
// reference edges red, assumption edges blue, narrative gray
// ─────────────────────────────────────────────────────────────

import type { AnalysisResult, Edge, EdgeKind, GraphNode } from '../core/types';

export interface DotOptions {
    labelLength: number;
    rankdir: 'TB' | 'LR';
    showWeights: boolean;
}

const DEFAULT_OPTIONS: DotOptions = {
    labelLength: 40,
    rankdir: 'TB',
    showWeights: false,
};

const EDGE_STYLE: Record<EdgeKind, string> = {
    reference: 'color="red", style="bold", penwidth=2.5',
    assumption: 'color="blue", penwidth=1.5',
    context: 'color="blue", style="dashed", penwidth=1.0',
    sequential: 'color="gray", style="dotted"',
};

export function emitDot(result: AnalysisResult, options: Partial<DotOptions> = {}): string {
    const opts = { ...DEFAULT_OPTIONS, ...options };
    const texts = new Map<string, string>([
        ...result.steps.map(s => [s.id, s.text] as const),
        ...result.assumptions.map(a => [a.id, a.text] as const),
    ]);

    const lines: string[] = [];
    lines.push('digraph proof {');
    lines.push(`    rankdir=${opts.rankdir};`);
    lines.push('    node [shape=box, style="rounded,filled", fontname="Helvetica"];');

    for (const node of result.graph.nodes) {
        const label = `${node.id}: ${truncate(texts.get(node.id) ?? '', opts.labelLength)}`;
        lines.push(`    "${node.id}" [label="${escapeDot(label)}", fillcolor="${fillColor(node)}"];`);
    }

    for (const edge of result.graph.edges) {
        lines.push(`    "${edge.source}" -> "${edge.target}" [${edgeAttributes(edge, opts.showWeights)}];`);
    }

    lines.push('}');
    return lines.join('\n');
}

function fillColor(node: GraphNode): string {
    if (node.type === 'step') return 'white';
    return node.scopeKind === 'global' ? 'lightblue' : 'lightyellow';
}

function edgeAttributes(edge: Edge, showWeights: boolean): string {
    const style = EDGE_STYLE[edge.kind];
    return showWeights ? `${style}, label="${edge.weight.toFixed(2)}"` : style;
}

function truncate(text: string, max: number): string {
    return text.length > max ? `${text.slice(0, max - 1)}…` : text;
}

export function escapeDot(s: string): string {
    return s.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}
