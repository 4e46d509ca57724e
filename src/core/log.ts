// ─────────────────────────────────────────────────────────────
// Proofscope  ·  Logging & Structural Diagnostics
// ─────────────────────────────────────────────────────────────

import type { MalformedInputError } from './errors';
import type { StructuralWarning } from './types';

export type LogLevel = 'silent' | 'warn' | 'debug';

export interface Logger {
    warn(message: string, ...details: unknown[]): void;
    debug(message: string, ...details: unknown[]): void;
}

export const consoleLogger: Logger = {
    warn: (message, ...details) => console.warn(message, ...details),
    debug: (message, ...details) => console.debug(message, ...details),
};

/**
 * Per-run sink for structural anomalies. Each anomaly is logged under
 * its module tag and kept so the Result can carry it.
 */
export class Diagnostics {
    private readonly items: StructuralWarning[] = [];
    private readonly logger: Logger;
    private readonly level: LogLevel;

    constructor(logger: Logger = consoleLogger, level: LogLevel = 'warn') {
        this.logger = logger;
        this.level = level;
    }

    report(tag: string, err: MalformedInputError): void {
        this.items.push(err.toWarning());
        if (this.level !== 'silent') {
            this.logger.warn(`[${tag}] ${err.message}`);
        }
    }

    debug(tag: string, message: string, ...details: unknown[]): void {
        if (this.level === 'debug') this.logger.debug(`[${tag}] ${message}`, ...details);
    }

    get warnings(): readonly StructuralWarning[] {
        return this.items;
    }
}
