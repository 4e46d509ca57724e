// ─────────────────────────────────────────────────────────────
// Proofscope  ·  Analysis Pipeline
// LaTeX proof → steps → tokens → assumptions → {flags, graph}
// ─────────────────────────────────────────────────────────────

import { resolveConfig, type AnalyzerOptions } from '../core/config';
import { Diagnostics } from '../core/log';
import type { AnalysisResult, Step } from '../core/types';
import { extractAssumptions } from '../parser/assumptions';
import { preprocess } from '../parser/preprocess';
import { segment } from '../parser/segmenter';
import { TokenRegistry } from '../parser/tokens';
import { detectGaps } from './gaps';
import { buildGraph } from './graph';

/**
 * Analyze a single proof. Throws `EmptyInputError` when there is nothing
 * to analyze and `AnalysisError` for invalid options; every other anomaly
 * is reported in `result.warnings`.
 */
export function analyzeProof(source: string, options: AnalyzerOptions = {}): AnalysisResult {
    const config = resolveConfig(options);
    const diagnostics = new Diagnostics(config.logger, config.logLevel);

    const pre = preprocess(source, diagnostics);
    const registry = new TokenRegistry();
    const steps: Step[] = segment(pre, config).map(s => ({
        ...s,
        tokens: registry.record(s.id, s.text),
    }));
    const tokens = registry.tokens();

    const assumptions = extractAssumptions(steps, config.vocabulary, diagnostics);
    const flags = detectGaps({ steps, assumptions, tokens }, config);
    const graph = buildGraph(steps, assumptions, diagnostics);

    diagnostics.debug(
        'Pipeline',
        `${steps.length} steps, ${assumptions.length} assumptions, ${flags.length} flags`,
    );

    return deepFreeze({
        source,
        normalized: pre.text,
        steps,
        assumptions,
        tokens,
        flags,
        graph,
        warnings: [...diagnostics.warnings],
    });
}

function deepFreeze<T>(value: T): T {
    if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
        Object.freeze(value);
        for (const child of Object.values(value)) deepFreeze(child);
    }
    return value;
}

// ── Serialization ───────────────────────────────────────────

export interface SerializedResult {
    steps: Array<{
        id: string;
        text: string;
        kind: string;
        tokens: string[];
        citations: string[];
        keywords: string[];
    }>;
    assumptions: Array<{
        id: string;
        text: string;
        keyword: string;
        scope_kind: string;
        scope_step_ids: string[];
        step_id: string;
        tokens: string[];
        properties: string[];
    }>;
    flags: Array<{
        id: string;
        kind: string;
        target: string;
        message: string;
        severity: string;
        suggestion: string;
    }>;
    graph: {
        nodes: string[];
        edges: Array<{ source: string; target: string; weight: number }>;
    };
    warnings: string[];
}

/** Plain nested mapping for presentation layers; safe to JSON.stringify. */
export function serializeResult(result: AnalysisResult): SerializedResult {
    return {
        steps: result.steps.map(s => ({
            id: s.id,
            text: s.text,
            kind: s.kind,
            tokens: [...new Set(s.tokens.map(t => t.display))],
            citations: s.citations.map(c => c.raw),
            keywords: [...s.keywords],
        })),
        assumptions: result.assumptions.map(a => ({
            id: a.id,
            text: a.text,
            keyword: a.keyword,
            scope_kind: a.scopeKind,
            scope_step_ids: [...a.scope],
            step_id: a.stepId,
            tokens: [...a.tokens],
            properties: [...a.properties],
        })),
        flags: result.flags.map(f => ({
            id: f.id,
            kind: f.kind,
            target: f.target,
            message: f.message,
            severity: f.severity,
            suggestion: f.suggestion,
        })),
        graph: {
            nodes: result.graph.nodes.map(n => n.id),
            edges: result.graph.edges.map(e => ({ source: e.source, target: e.target, weight: e.weight })),
        },
        warnings: result.warnings.map(w => `${w.location}: ${w.message}`),
    };
}
