// ─────────────────────────────────────────────────────────────
// Proofscope  ·  Error Taxonomy
// ─────────────────────────────────────────────────────────────

import type { StructuralWarning, WarningCode } from './types';

export type AnalysisErrorCode = 'empty-input' | 'malformed-input' | 'invalid-options';

export class AnalysisError extends Error {
    readonly code: AnalysisErrorCode;

    constructor(code: AnalysisErrorCode, message: string) {
        super(message);
        this.name = 'AnalysisError';
        this.code = code;
    }
}

/** Fatal: there is nothing to analyze, no Result is produced. */
export class EmptyInputError extends AnalysisError {
    constructor(message = 'Proof text is empty') {
        super('empty-input', message);
        this.name = 'EmptyInputError';
    }
}

/**
 * Non-fatal structural anomaly. Never thrown out of the pipeline:
 * it is logged and recorded on the Result as a warning.
 */
export class MalformedInputError extends AnalysisError {
    readonly warningCode: WarningCode;
    readonly location: string;

    constructor(warningCode: WarningCode, message: string, location: string) {
        super('malformed-input', message);
        this.name = 'MalformedInputError';
        this.warningCode = warningCode;
        this.location = location;
    }

    toWarning(): StructuralWarning {
        return { code: this.warningCode, message: this.message, location: this.location };
    }
}

export function isAnalysisError(err: unknown): err is AnalysisError {
    return err instanceof AnalysisError;
}
