// ─────────────────────────────────────────────────────────────
// Proofscope  ·  Public API
// ─────────────────────────────────────────────────────────────

export { analyzeProof, serializeResult, type SerializedResult } from './engine/pipeline';
export { resolveConfig, AnalyzerOptionsSchema, DEFAULT_CONFIG } from './core/config';
export type { AnalyzerOptions, AnalyzerConfig, ObviousLeapThresholds } from './core/config';
export { AnalysisError, EmptyInputError, MalformedInputError, isAnalysisError } from './core/errors';
export type { AnalysisErrorCode } from './core/errors';
export { consoleLogger, Diagnostics } from './core/log';
export type { Logger, LogLevel } from './core/log';
export { PROPERTY_VOCABULARY } from './core/vocabulary';
export type * from './core/types';
export { FLAG_KIND_ORDER } from './core/types';

export { preprocess, findMathRanges } from './parser/preprocess';
export { segment, splitSentences } from './parser/segmenter';
export { extractStepTokens, TokenRegistry } from './parser/tokens';
export { extractAssumptions, activeAssumptions } from './parser/assumptions';
export { detectGaps, GAP_DETECTORS } from './engine/gaps';
export { buildGraph, isAcyclic } from './engine/graph';

export { emitDot, type DotOptions } from './emitters/dot';
export { emitMarkdownReport } from './emitters/markdown';
export { emitHtmlReport, type HtmlReportOptions } from './emitters/html';
