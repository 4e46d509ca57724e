// ─────────────────────────────────────────────────────────────
// Proofscope  ·  Test Helpers
// ─────────────────────────────────────────────────────────────

import { Diagnostics, type Logger } from '../core/log';
import type { Step } from '../core/types';
import { preprocess } from '../parser/preprocess';
import { segment } from '../parser/segmenter';
import { TokenRegistry } from '../parser/tokens';

export const quietLogger: Logger = {
    warn: () => {},
    debug: () => {},
};

export function quietDiagnostics(): Diagnostics {
    return new Diagnostics(quietLogger, 'silent');
}

/** Preprocess, segment and tokenize; one Step per sentence by default. */
export function stepsOf(source: string, minStepLength = 0, diagnostics = quietDiagnostics()): Step[] {
    const registry = new TokenRegistry();
    return segment(preprocess(source, diagnostics), { minStepLength }).map(s => ({
        ...s,
        tokens: registry.record(s.id, s.text),
    }));
}
