// ─────────────────────────────────────────────────────────────
// Proofscope  ·  Analyzer Configuration
// ─────────────────────────────────────────────────────────────

import { z } from 'zod';
import { AnalysisError } from './errors';
import { consoleLogger, type Logger } from './log';
import { PROPERTY_VOCABULARY } from './vocabulary';

const LoggerSchema = z.custom<Logger>(
    v => typeof v === 'object' && v !== null
        && 'warn' in v && typeof v.warn === 'function'
        && 'debug' in v && typeof v.debug === 'function',
    { message: 'logger must provide warn() and debug()' },
);

const TermListSchema = z.array(z.string().trim().min(1).transform(s => s.toLowerCase()));

const ObviousLeapSchema = z.object({
    /** Operators in the hedged sentence's math (or prose when it has none). */
    maxOperators: z.number().int().nonnegative().default(3),
    /** Characters inside math spans of the hedged sentence. */
    maxMathLength: z.number().int().positive().default(40),
    /** Prose characters after the hedge phrase. */
    maxTextLength: z.number().int().positive().default(60),
});

export const AnalyzerOptionsSchema = z.object({
    minStepLength: z.number().int().nonnegative().default(40),
    obviousLeap: ObviousLeapSchema.default({}),
    properties: z.object({
        extra: TermListSchema.default([]),
        ignore: TermListSchema.default([]),
        replace: TermListSchema.optional(),
    }).default({}),
    logLevel: z.enum(['silent', 'warn', 'debug']).default('warn'),
    logger: LoggerSchema.optional(),
}).strict();

export type AnalyzerOptions = z.input<typeof AnalyzerOptionsSchema>;
export type ObviousLeapThresholds = z.output<typeof ObviousLeapSchema>;

export interface AnalyzerConfig {
    minStepLength: number;
    obviousLeap: ObviousLeapThresholds;
    /** Effective property vocabulary, lower-cased and deduplicated. */
    vocabulary: readonly string[];
    logLevel: 'silent' | 'warn' | 'debug';
    logger: Logger;
}

export function resolveConfig(options: AnalyzerOptions = {}): AnalyzerConfig {
    const parsed = AnalyzerOptionsSchema.safeParse(options);
    if (!parsed.success) {
        const detail = parsed.error.issues
            .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
        throw new AnalysisError('invalid-options', `Invalid analyzer options: ${detail}`);
    }

    const { minStepLength, obviousLeap, properties, logLevel, logger } = parsed.data;
    const base = properties.replace ?? PROPERTY_VOCABULARY;
    const ignored = new Set(properties.ignore);
    const vocabulary = [...new Set([...base, ...properties.extra])].filter(t => !ignored.has(t));

    return {
        minStepLength,
        obviousLeap,
        vocabulary,
        logLevel,
        logger: logger ?? consoleLogger,
    };
}

export const DEFAULT_CONFIG: AnalyzerConfig = resolveConfig();
