/**
 * Reconciliation error taxonomy.
 *
 * Every error is raised before the first outcome is produced, so a failed
 * run never yields a partial report.
 */

import type { Origin } from './types/index.js';

export type ReconciliationErrorCode = 'READ_ERROR' | 'EMPTY_INPUT' | 'SCHEMA_ERROR';

/**
 * Base class. `source` names the input that caused the abort.
 */
export class ReconciliationError extends Error {
    readonly code: ReconciliationErrorCode;
    readonly source: Origin | undefined;

    constructor(code: ReconciliationErrorCode, message: string, source?: Origin, options?: ErrorOptions) {
        super(message, options);
        this.name = 'ReconciliationError';
        this.code = code;
        this.source = source;
    }
}

/**
 * Input could not be read as a table with the canonical columns.
 */
export class ReadError extends ReconciliationError {
    constructor(message: string, source?: Origin, options?: ErrorOptions) {
        super('READ_ERROR', message, source, options);
        this.name = 'ReadError';
    }
}

/**
 * A parsed collection has zero records.
 */
export class EmptyInputError extends ReconciliationError {
    constructor(source: Origin) {
        super('EMPTY_INPUT', `The ${source} input contains no records`, source);
        this.name = 'EmptyInputError';
    }
}

/**
 * A record is missing a required field or carries a malformed value.
 * `row` is 1-based and counts data rows only.
 */
export class SchemaError extends ReconciliationError {
    readonly row: number;
    readonly field: string;

    constructor(source: Origin, row: number, field: string, detail: string) {
        super('SCHEMA_ERROR', `The ${source} input, row ${row}: field "${field}" ${detail}`, source);
        this.name = 'SchemaError';
        this.row = row;
        this.field = field;
    }
}

export function isReconciliationError(err: unknown): err is ReconciliationError {
    return err instanceof ReconciliationError;
}
