import { logger } from '../config/logger';
import { getErrorMessage, isRetrievalError } from '../types/errors';

export interface RetryOptions {
    maxAttempts?: number;
    baseDelay?: number;
    maxDelay?: number;
    backoffMultiplier?: number;
    operationName?: string;
}

export interface IRetryUtil {
    executeWithRetry<T>(operation: () => Promise<T>, options?: RetryOptions): Promise<T>;
}

/**
 * Retry Utility
 *
 * Exponential backoff for calls to external collaborators (OpenAI, Qdrant).
 * Domain errors are never retried: a timeout or dimension mismatch surfaces
 * to the caller on the first occurrence.
 */
export class RetryUtil {
    /**
     * Execute function with retry logic
     */
    static async executeWithRetry<T>(
        operation: () => Promise<T>,
        options: RetryOptions = {}
    ): Promise<T> {
        const {
            maxAttempts = 3,
            baseDelay = 1000,
            maxDelay = 10000,
            backoffMultiplier = 2,
            operationName = 'operation'
        } = options;

        let lastError: unknown = null;

        for (let attempt = 1; attempt <= maxAttempts; attempt++) {
            try {
                logger.debug({
                    operation: operationName,
                    attempt,
                    maxAttempts
                }, `Executing ${operationName} (attempt ${attempt}/${maxAttempts})`);

                const result = await operation();

                if (attempt > 1) {
                    logger.info({
                        operation: operationName,
                        attempt,
                        maxAttempts
                    }, `${operationName} succeeded on attempt ${attempt}`);
                }

                return result;

            } catch (error: unknown) {
                lastError = error;
                const retryable = this.isRetryableError(error);

                logger.warn({
                    operation: operationName,
                    attempt,
                    maxAttempts,
                    error: getErrorMessage(error),
                    isRetryable: retryable
                }, `${operationName} failed on attempt ${attempt}`);

                if (attempt === maxAttempts) {
                    break;
                }

                if (!retryable) {
                    logger.error({
                        operation: operationName,
                        error: getErrorMessage(error)
                    }, `${operationName} failed with non-retryable error`);
                    break;
                }

                const delay = Math.min(
                    baseDelay * Math.pow(backoffMultiplier, attempt - 1),
                    maxDelay
                );

                logger.info({
                    operation: operationName,
                    attempt,
                    delay
                }, `Retrying ${operationName} in ${delay}ms`);

                await this.sleep(delay);
            }
        }

        logger.error({
            operation: operationName,
            maxAttempts,
            error: getErrorMessage(lastError)
        }, `${operationName} failed after ${maxAttempts} attempts`);

        throw lastError ?? new Error(`${operationName} failed after ${maxAttempts} attempts`);
    }

    /**
     * Check if error is retryable
     */
    static isRetryableError(error: unknown): boolean {
        if (isRetrievalError(error) || typeof error !== 'object' || error === null) {
            return false;
        }

        const code = 'code' in error ? error.code : undefined;
        const status = 'status' in error ? error.status : undefined;
        const message = 'message' in error ? error.message : undefined;
        const text = typeof message === 'string' ? message.toLowerCase() : '';

        // Network errors
        if (code === 'ECONNRESET' || code === 'ENOTFOUND' || code === 'ECONNREFUSED' || code === 'ETIMEDOUT') {
            return true;
        }

        // OpenAI / Qdrant HTTP errors
        if (status === 429 || status === 500 || status === 502 || status === 503) {
            return true;
        }

        return ['timeout', 'rate limit', 'quota', 'connection', 'network'].some(marker => text.includes(marker));
    }

    /**
     * Sleep for specified milliseconds
     */
    private static sleep(ms: number): Promise<void> {
        return new Promise(resolve => setTimeout(resolve, ms));
    }
}
