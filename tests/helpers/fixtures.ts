import { vi, type Mock } from 'vitest';
import type { ILogger } from '../../src/config/logger';
import type { IRetryUtil, RetryOptions } from '../../src/utils/retry.util';
import type { EmbeddingFunction } from '../../src/services/openai.service';
import type { ChunkDraft, NewDocument } from '../../src/types/retrieval';

type LogFn = (data: object, message: string) => void;

export interface MockLogger extends ILogger {
    info: Mock<LogFn>;
    error: Mock<LogFn>;
    warn: Mock<LogFn>;
    debug: Mock<LogFn>;
}

export function createMockLogger(): MockLogger {
    return {
        info: vi.fn<LogFn>(),
        error: vi.fn<LogFn>(),
        warn: vi.fn<LogFn>(),
        debug: vi.fn<LogFn>()
    };
}

// Runs the operation once, no backoff
export const passthroughRetry: IRetryUtil = {
    executeWithRetry<T>(operation: () => Promise<T>, _options?: RetryOptions): Promise<T> {
        return operation();
    }
};

/**
 * Embeds text by looking up fixed vectors per keyword and summing them.
 * Text with no known keyword embeds to `fallback`.
 */
export class KeywordEmbedder implements EmbeddingFunction {
    readonly model = 'test-embedding-model';
    calls: string[] = [];

    constructor(
        private vectors: Record<string, number[]>,
        private fallback: number[]
    ) { }

    async embed(text: string): Promise<number[]> {
        this.calls.push(text);
        const lower = text.toLowerCase();
        let sum: number[] | null = null;
        for (const [keyword, vector] of Object.entries(this.vectors)) {
            if (!lower.includes(keyword)) continue;
            sum = sum ? sum.map((value, i) => value + vector[i]) : [...vector];
        }
        return sum ?? [...this.fallback];
    }
}

export function newDocument(overrides: Partial<NewDocument> = {}): NewDocument {
    return {
        title: 'Compressor Startup Procedure',
        sourcePath: '/docs/compressor-startup.pdf',
        bu: 'ops',
        revLabel: 'A',
        checksum: 'checksum-a',
        ...overrides
    };
}

export function draft(text: string, pageStart = 1, pageEnd = pageStart, sectionPath = '1 Scope'): ChunkDraft {
    return { text, sectionPath, pageStart, pageEnd };
}
