/**
 * Error taxonomy.
 *
 * Fatal errors (discovery, output) end the run with a non-zero exit.
 * Quiet errors (cancelled, nothing selected) are normal early exits.
 */

export type ErrorCode =
    | 'DISCOVERY_FAILED'
    | 'READ_FAILED'
    | 'SELECTION_CANCELLED'
    | 'NO_FILES_SELECTED'
    | 'OUTPUT_FAILED';

export class CtxpickError extends Error {
    readonly code: ErrorCode;

    constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
        this.code = code;
    }
}

/** Root path missing, not a directory, or unreadable. */
export class DiscoveryError extends CtxpickError {
    readonly path: string;

    constructor(path: string, reason: string, cause?: unknown) {
        super('DISCOVERY_FAILED', `${reason}: ${path}`, { cause });
        this.path = path;
    }
}

export class ReadError extends CtxpickError {
    readonly path: string;

    constructor(path: string, cause: unknown) {
        super('READ_FAILED', `Failed to read ${path}: ${describeError(cause)}`, { cause });
        this.path = path;
    }
}

export class SelectionCancelledError extends CtxpickError {
    constructor(reason: string = 'selection cancelled') {
        super('SELECTION_CANCELLED', reason);
    }
}

export class NoFilesSelectedError extends CtxpickError {
    constructor(reason: string = 'no files selected') {
        super('NO_FILES_SELECTED', reason);
    }
}

export class OutputError extends CtxpickError {
    constructor(message: string, cause?: unknown) {
        super('OUTPUT_FAILED', cause === undefined ? message : `${message}: ${describeError(cause)}`, { cause });
    }
}

/** Cancellation and empty selection end the run without a failure status. */
export function isQuietExit(error: unknown): error is SelectionCancelledError | NoFilesSelectedError {
    return error instanceof SelectionCancelledError || error instanceof NoFilesSelectedError;
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
