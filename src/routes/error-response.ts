import { ZodError } from 'zod';
import { logger } from '../config/logger';
import { RetrievalErrorCode, getErrorMessage, isRetrievalError } from '../types/errors';

export const STATUS_BY_CODE: Record<RetrievalErrorCode, number> = {
    [RetrievalErrorCode.NOT_FOUND]: 404,
    [RetrievalErrorCode.DUPLICATE_CHECKSUM]: 409,
    [RetrievalErrorCode.DIMENSION_MISMATCH]: 422,
    [RetrievalErrorCode.INVALID_EMBEDDING]: 422,
    [RetrievalErrorCode.INVALID_MATCH_EXPRESSION]: 400,
    [RetrievalErrorCode.DANGLING_INDEX_ENTRY]: 500,
    [RetrievalErrorCode.TIMEOUT]: 504,
    [RetrievalErrorCode.SEARCH_UNAVAILABLE]: 503,
    // nginx's "client closed request"
    [RetrievalErrorCode.CANCELLED]: 499
};

// The slices of express' Response these helpers touch
export interface JsonResponder {
    status(code: number): { json(body: unknown): unknown };
}

export interface ClosableResponse {
    readonly writableEnded: boolean;
    on(event: 'close', listener: () => void): unknown;
}

export function statusForError(error: unknown): number {
    if (error instanceof ZodError) {
        return 400;
    }
    if (isRetrievalError(error)) {
        return STATUS_BY_CODE[error.code];
    }
    return 500;
}

/**
 * Uniform `{ error, code, message }` body for failed requests.
 */
export function sendError(res: JsonResponder, error: unknown, description: string): void {
    const status = statusForError(error);

    if (error instanceof ZodError) {
        res.status(status).json({
            error: 'Validation failed',
            code: 'VALIDATION_ERROR',
            message: error.errors.map(issue => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; ')
        });
        return;
    }

    const code = isRetrievalError(error) ? error.code : 'INTERNAL_ERROR';
    const message = getErrorMessage(error);

    if (status >= 500) {
        logger.error({ code, error: message }, description);
    } else {
        logger.warn({ code, error: message }, description);
    }

    res.status(status).json({ error: description, code, message });
}

/**
 * AbortSignal that fires when the client goes away before the response is sent.
 */
export function requestSignal(res: ClosableResponse): AbortSignal {
    const controller = new AbortController();
    res.on('close', () => {
        if (!res.writableEnded) {
            controller.abort();
        }
    });
    return controller.signal;
}
