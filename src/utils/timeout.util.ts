import { RetrievalError, RetrievalErrorCode, TimeoutError } from '../types/errors';

/**
 * Run `operation` with a deadline. The operation receives an AbortSignal that
 * fires on timeout or when the caller's own signal aborts, so well-behaved
 * collaborators can stop work they no longer own.
 */
export async function withTimeout<T>(
    operation: (signal: AbortSignal) => Promise<T>,
    timeoutMs: number,
    operationName: string,
    parentSignal?: AbortSignal
): Promise<T> {
    if (parentSignal?.aborted) {
        throw new RetrievalError(RetrievalErrorCode.CANCELLED, `${operationName} cancelled`);
    }

    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    let onParentAbort: (() => void) | undefined;

    const deadline = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
            controller.abort();
            reject(new TimeoutError(operationName, timeoutMs));
        }, timeoutMs);

        if (parentSignal) {
            onParentAbort = () => {
                controller.abort();
                reject(new RetrievalError(RetrievalErrorCode.CANCELLED, `${operationName} cancelled`));
            };
            parentSignal.addEventListener('abort', onParentAbort, { once: true });
        }
    });

    try {
        return await Promise.race([operation(controller.signal), deadline]);
    } finally {
        clearTimeout(timer);
        if (parentSignal && onParentAbort) {
            parentSignal.removeEventListener('abort', onParentAbort);
        }
    }
}
