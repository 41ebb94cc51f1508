/**
 * Error codes for retrieval and ingestion failures
 */
export enum RetrievalErrorCode {
    NOT_FOUND = 'NOT_FOUND',
    DUPLICATE_CHECKSUM = 'DUPLICATE_CHECKSUM',
    DIMENSION_MISMATCH = 'DIMENSION_MISMATCH',
    DANGLING_INDEX_ENTRY = 'DANGLING_INDEX_ENTRY',
    INVALID_MATCH_EXPRESSION = 'INVALID_MATCH_EXPRESSION',
    INVALID_EMBEDDING = 'INVALID_EMBEDDING',
    TIMEOUT = 'TIMEOUT',
    SEARCH_UNAVAILABLE = 'SEARCH_UNAVAILABLE',
    CANCELLED = 'CANCELLED'
}

/**
 * Base class for every domain failure. Callers branch on `code`, never on message text.
 */
export class RetrievalError extends Error {
    constructor(
        public readonly code: RetrievalErrorCode,
        message: string,
        cause?: unknown
    ) {
        super(message);
        this.name = 'RetrievalError';
        if (cause !== undefined) {
            this.cause = cause;
        }
    }
}

export class NotFoundError extends RetrievalError {
    constructor(public readonly kind: 'document' | 'chunk', public readonly id: string) {
        super(RetrievalErrorCode.NOT_FOUND, `${kind} not found: ${id}`);
        this.name = 'NotFoundError';
    }
}

export class DuplicateChecksumError extends RetrievalError {
    constructor(public readonly existingDocId: string, public readonly checksum: string) {
        super(
            RetrievalErrorCode.DUPLICATE_CHECKSUM,
            `Document with checksum ${checksum.substring(0, 12)} is already active as ${existingDocId}`
        );
        this.name = 'DuplicateChecksumError';
    }
}

export class DimensionMismatchError extends RetrievalError {
    constructor(public readonly expected: number, public readonly actual: number) {
        super(
            RetrievalErrorCode.DIMENSION_MISMATCH,
            `Vector dimension ${actual} does not match index dimension ${expected}`
        );
        this.name = 'DimensionMismatchError';
    }
}

export class DanglingIndexEntryError extends RetrievalError {
    constructor(public readonly entryId: number | string, detail: string) {
        super(RetrievalErrorCode.DANGLING_INDEX_ENTRY, `Dangling index entry ${entryId}: ${detail}`);
        this.name = 'DanglingIndexEntryError';
    }
}

export class InvalidMatchExpressionError extends RetrievalError {
    constructor(public readonly input: string, reason: string) {
        super(RetrievalErrorCode.INVALID_MATCH_EXPRESSION, `Invalid match expression: ${reason}`);
        this.name = 'InvalidMatchExpressionError';
    }
}

export class TimeoutError extends RetrievalError {
    constructor(public readonly operation: string, public readonly timeoutMs: number) {
        super(RetrievalErrorCode.TIMEOUT, `${operation} timed out after ${timeoutMs}ms`);
        this.name = 'TimeoutError';
    }
}

export function isRetrievalError(error: unknown, code?: RetrievalErrorCode): error is RetrievalError {
    return error instanceof RetrievalError && (code === undefined || error.code === code);
}

export function getErrorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}
