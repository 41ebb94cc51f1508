import { describe, it, expect, beforeEach, vi } from 'vitest';
import { RetryUtil } from '../../../src/utils/retry.util';
import { logger } from '../../../src/config/logger';
import { DimensionMismatchError, TimeoutError } from '../../../src/types/errors';

// Mock the logger
vi.mock('../../../src/config/logger', () => ({
    logger: {
        debug: vi.fn(),
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn()
    }
}));

describe('RetryUtil - Static Utility Tests', () => {
    beforeEach(() => {
        vi.clearAllMocks();
    });

    describe('executeWithRetry - Success Cases', () => {
        it('should execute operation successfully on first attempt', async () => {
            const mockOperation = vi.fn().mockResolvedValue('success');
            const result = await RetryUtil.executeWithRetry(mockOperation, {
                operationName: 'test-operation'
            });

            expect(result).toBe('success');
            expect(mockOperation).toHaveBeenCalledTimes(1);
        });

        it('should succeed on second attempt after a network failure', async () => {
            const mockOperation = vi.fn()
                .mockRejectedValueOnce(new Error('network error'))
                .mockResolvedValueOnce('success');

            const result = await RetryUtil.executeWithRetry(mockOperation, {
                operationName: 'test-operation',
                maxAttempts: 3,
                baseDelay: 10
            });

            expect(result).toBe('success');
            expect(mockOperation).toHaveBeenCalledTimes(2);
        });
    });

    describe('executeWithRetry - Failure Cases', () => {
        it('should fail after max attempts with retryable error', async () => {
            const mockOperation = vi.fn().mockRejectedValue(new Error('network error'));

            await expect(RetryUtil.executeWithRetry(mockOperation, {
                operationName: 'test-operation',
                maxAttempts: 2,
                baseDelay: 10
            })).rejects.toThrow('network error');

            expect(mockOperation).toHaveBeenCalledTimes(2);
        });

        it('should fail immediately with non-retryable error', async () => {
            const mockOperation = vi.fn().mockRejectedValue(new Error('Invalid API key'));

            await expect(RetryUtil.executeWithRetry(mockOperation, {
                maxAttempts: 3,
                baseDelay: 10
            })).rejects.toThrow('Invalid API key');

            expect(mockOperation).toHaveBeenCalledTimes(1);
        });

        it('should never retry domain errors, even timeouts', async () => {
            const timeout = new TimeoutError('Query embedding', 50);
            const mockOperation = vi.fn().mockRejectedValue(timeout);

            await expect(RetryUtil.executeWithRetry(mockOperation, {
                maxAttempts: 3,
                baseDelay: 10
            })).rejects.toBe(timeout);

            expect(mockOperation).toHaveBeenCalledTimes(1);
        });

        it('should rethrow non-Error values unchanged', async () => {
            const mockOperation = vi.fn().mockRejectedValue('String error');

            await expect(RetryUtil.executeWithRetry(mockOperation, {
                maxAttempts: 3,
                baseDelay: 10
            })).rejects.toBe('String error');

            expect(mockOperation).toHaveBeenCalledTimes(1);
        });

        it('should cap backoff delay at maxDelay', async () => {
            const mockOperation = vi.fn().mockRejectedValue({ status: 503 });

            await expect(RetryUtil.executeWithRetry(mockOperation, {
                operationName: 'capped',
                maxAttempts: 3,
                baseDelay: 10,
                backoffMultiplier: 10,
                maxDelay: 20
            })).rejects.toEqual({ status: 503 });

            expect(logger.info).toHaveBeenCalledWith(
                { operation: 'capped', attempt: 1, delay: 10 },
                'Retrying capped in 10ms'
            );
            expect(logger.info).toHaveBeenCalledWith(
                { operation: 'capped', attempt: 2, delay: 20 },
                'Retrying capped in 20ms'
            );
        });
    });

    describe('isRetryableError - Error Classification', () => {
        it('should identify network error codes as retryable', () => {
            for (const code of ['ECONNRESET', 'ENOTFOUND', 'ECONNREFUSED', 'ETIMEDOUT']) {
                expect(RetryUtil.isRetryableError({ code })).toBe(true);
            }
        });

        it('should identify throttling and server statuses as retryable', () => {
            for (const status of [429, 500, 502, 503]) {
                expect(RetryUtil.isRetryableError({ status })).toBe(true);
            }
            expect(RetryUtil.isRetryableError({ status: 400 })).toBe(false);
        });

        it('should identify retryable messages', () => {
            expect(RetryUtil.isRetryableError(new Error('Request timeout'))).toBe(true);
            expect(RetryUtil.isRetryableError(new Error('Rate limit exceeded'))).toBe(true);
            expect(RetryUtil.isRetryableError(new Error('Quota exceeded'))).toBe(true);
            expect(RetryUtil.isRetryableError(new Error('Connection refused'))).toBe(true);
        });

        it('should identify non-retryable errors', () => {
            expect(RetryUtil.isRetryableError(new Error('Invalid API key'))).toBe(false);
            expect(RetryUtil.isRetryableError(new DimensionMismatchError(4, 3))).toBe(false);
            expect(RetryUtil.isRetryableError(null)).toBe(false);
            expect(RetryUtil.isRetryableError('network')).toBe(false);
        });
    });

    describe('executeWithRetry - Logging Integration', () => {
        it('should log each attempt, the recovery and the failure', async () => {
            const mockOperation = vi.fn()
                .mockRejectedValueOnce(new Error('network error'))
                .mockResolvedValueOnce('ok');

            await RetryUtil.executeWithRetry(mockOperation, {
                operationName: 'Qdrant upsert point',
                maxAttempts: 2,
                baseDelay: 1
            });

            expect(logger.debug).toHaveBeenCalledWith(
                { operation: 'Qdrant upsert point', attempt: 1, maxAttempts: 2 },
                'Executing Qdrant upsert point (attempt 1/2)'
            );
            expect(logger.warn).toHaveBeenCalledWith(
                {
                    operation: 'Qdrant upsert point',
                    attempt: 1,
                    maxAttempts: 2,
                    error: 'network error',
                    isRetryable: true
                },
                'Qdrant upsert point failed on attempt 1'
            );
            expect(logger.info).toHaveBeenCalledWith(
                { operation: 'Qdrant upsert point', attempt: 2, maxAttempts: 2 },
                'Qdrant upsert point succeeded on attempt 2'
            );
        });

        it('should log final error after all attempts', async () => {
            const mockOperation = vi.fn().mockRejectedValue(new Error('network error'));

            await expect(RetryUtil.executeWithRetry(mockOperation, {
                operationName: 'final',
                maxAttempts: 1
            })).rejects.toThrow('network error');

            expect(logger.error).toHaveBeenCalledWith(
                { operation: 'final', maxAttempts: 1, error: 'network error' },
                'final failed after 1 attempts'
            );
        });
    });
});
