// ─────────────────────────────────────────────────────────────
// Proofscope  ·  Command Line
// proofscope <file.tex|-> [--format json|markdown|dot|html]
//            [--min-step-length n] [--verbose]
// ─────────────────────────────────────────────────────────────

import { readFile } from 'node:fs/promises';
import { pathToFileURL } from 'node:url';
import { parseArgs } from 'node:util';
import { AnalysisError, EmptyInputError } from './core/errors';
import { emitDot } from './emitters/dot';
import { emitHtmlReport } from './emitters/html';
import { emitMarkdownReport } from './emitters/markdown';
import { analyzeProof, serializeResult } from './engine/pipeline';
import type { AnalysisResult } from './core/types';

export const FORMATS = ['json', 'markdown', 'dot', 'html'] as const;
export type OutputFormat = (typeof FORMATS)[number];

export interface CliOptions {
    input: string;
    format: OutputFormat;
    minStepLength: number | undefined;
    verbose: boolean;
}

const USAGE = 'Usage: proofscope <file.tex|-> [--format json|markdown|dot|html] [--min-step-length n] [--verbose]';

function isFormat(value: string): value is OutputFormat {
    return FORMATS.some(f => f === value);
}

export function parseCliArgs(argv: readonly string[]): CliOptions {
    const { values, positionals } = parseArgs({
        args: [...argv],
        allowPositionals: true,
        options: {
            format: { type: 'string', short: 'f', default: 'json' },
            'min-step-length': { type: 'string' },
            verbose: { type: 'boolean', short: 'v', default: false },
        },
    });

    if (positionals.length !== 1) {
        throw new AnalysisError('invalid-options', USAGE);
    }

    const format = values.format ?? 'json';
    if (!isFormat(format)) {
        throw new AnalysisError('invalid-options', `Unknown format "${format}"; expected one of ${FORMATS.join(', ')}`);
    }

    let minStepLength: number | undefined;
    const rawLength = values['min-step-length'];
    if (rawLength !== undefined) {
        minStepLength = Number(rawLength);
        if (!Number.isInteger(minStepLength) || minStepLength < 0) {
            throw new AnalysisError('invalid-options', `--min-step-length must be a non-negative integer, got "${rawLength}"`);
        }
    }

    return { input: positionals[0], format, minStepLength, verbose: values.verbose ?? false };
}

export function render(result: AnalysisResult, format: OutputFormat): string {
    switch (format) {
        case 'json': return JSON.stringify(serializeResult(result), null, 2);
        case 'markdown': return emitMarkdownReport(result);
        case 'dot': return emitDot(result);
        case 'html': return emitHtmlReport(result);
    }
}

async function readInput(input: string): Promise<string> {
    if (input !== '-') return readFile(input, 'utf8');
    const chunks: Buffer[] = [];
    for await (const chunk of process.stdin) {
        chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    }
    return Buffer.concat(chunks).toString('utf8');
}

/** Returns the process exit code. */
export async function run(argv: readonly string[]): Promise<number> {
    try {
        const opts = parseCliArgs(argv);
        const source = await readInput(opts.input);
        const result = analyzeProof(source, {
            minStepLength: opts.minStepLength,
            logLevel: opts.verbose ? 'debug' : 'warn',
        });
        process.stdout.write(render(result, opts.format) + '\n');
        return 0;
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        console.error(`[CLI] ${message}`);
        return err instanceof EmptyInputError ? 2 : 1;
    }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
    run(process.argv.slice(2))
        .then(code => { process.exitCode = code; })
        .catch((err: unknown) => {
            console.error('[CLI] Unexpected failure:', err);
            process.exitCode = 1;
        });
}
