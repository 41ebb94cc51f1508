import { AppDataSource } from '../db/data-source';
import { EmbeddingRecordRepository } from '../db/interfaces';
import { PgEmbeddingRepository } from '../db/repositories/pg-embedding.repository';
import { getSettings } from '../config/settings';
import { logger, ILogger } from '../config/logger';
import { withTimeout } from '../utils/timeout.util';
import { l2Normalize } from '../utils/score.util';
import { DimensionMismatchError, RetrievalError, RetrievalErrorCode } from '../types/errors';

export type ComputeEmbedding = (signal: AbortSignal) => Promise<number[]>;

export interface IEmbeddingCache {
    readonly dimension: number;
    getOrCompute(chunkId: string, model: string, compute: ComputeEmbedding): Promise<number[]>;
    get(chunkId: string, model: string): Promise<number[] | null>;
    compute(label: string, compute: ComputeEmbedding): Promise<number[]>;
    store(chunkId: string, model: string, vector: number[]): Promise<number[]>;
    evict(chunkIds: string[], model: string): Promise<number>;
}

export interface EmbeddingCacheOptions {
    dimension: number;
    timeoutMs: number;
}

/**
 * Dimension-check, L2-normalise and round a raw embedding to float32.
 */
export function normalizeEmbedding(raw: number[], dimension: number): number[] {
    if (raw.length !== dimension) {
        throw new DimensionMismatchError(dimension, raw.length);
    }

    const normalized = l2Normalize(raw);
    if (!normalized) {
        throw new RetrievalError(
            RetrievalErrorCode.INVALID_EMBEDDING,
            'Embedding is the zero vector or contains non-finite values'
        );
    }
    return normalized;
}

/**
 * Embedding Cache Service
 *
 * Memoises chunk embeddings per (chunk, model). A miss runs the supplied
 * compute function under a deadline; concurrent misses for one key share a
 * single in-flight computation.
 */
export class EmbeddingCacheService implements IEmbeddingCache {
    private inFlight = new Map<string, Promise<number[]>>();

    constructor(
        private repository: EmbeddingRecordRepository,
        private logger: ILogger,
        private options: EmbeddingCacheOptions,
        private clock: () => Date = () => new Date()
    ) { }

    /**
     * Factory method for production use
     */
    static create(): EmbeddingCacheService {
        const settings = getSettings();
        return new EmbeddingCacheService(
            new PgEmbeddingRepository(AppDataSource),
            logger,
            { dimension: settings.embeddingDim, timeoutMs: settings.embeddingTimeoutMs }
        );
    }

    get dimension(): number {
        return this.options.dimension;
    }

    async get(chunkId: string, model: string): Promise<number[] | null> {
        const record = await this.repository.find(chunkId, model);
        return record ? record.vector : null;
    }

    /**
     * Run, bound and normalise an embedding call without persisting the result.
     */
    async compute(label: string, compute: ComputeEmbedding): Promise<number[]> {
        const raw = await withTimeout(compute, this.options.timeoutMs, label);
        return normalizeEmbedding(raw, this.options.dimension);
    }

    /**
     * Persist an already normalised vector; an existing record wins.
     */
    async store(chunkId: string, model: string, vector: number[]): Promise<number[]> {
        if (vector.length !== this.options.dimension) {
            throw new DimensionMismatchError(this.options.dimension, vector.length);
        }

        const stored = await this.repository.insertIfAbsent({
            chunkId,
            model,
            dim: vector.length,
            vector,
            createdAt: this.clock()
        });
        return stored.vector;
    }

    async evict(chunkIds: string[], model: string): Promise<number> {
        if (chunkIds.length === 0) {
            return 0;
        }
        return await this.repository.deleteMany(chunkIds, model);
    }

    getOrCompute(chunkId: string, model: string, compute: ComputeEmbedding): Promise<number[]> {
        const key = `${model}\u0000${chunkId}`;

        const pending = this.inFlight.get(key);
        if (pending) {
            return pending;
        }

        const promise = this.load(chunkId, model, compute).finally(() => {
            this.inFlight.delete(key);
        });
        this.inFlight.set(key, promise);
        return promise;
    }

    private async load(chunkId: string, model: string, compute: ComputeEmbedding): Promise<number[]> {
        const cached = await this.repository.find(chunkId, model);
        if (cached) {
            if (cached.dim !== this.options.dimension) {
                throw new DimensionMismatchError(this.options.dimension, cached.dim);
            }
            return cached.vector;
        }

        const vector = await this.compute(`Embedding for chunk ${chunkId}`, compute);
        const stored = await this.store(chunkId, model, vector);

        this.logger.debug({ chunkId, model, dimension: stored.length }, 'Embedding computed and cached');
        return stored;
    }
}

// Singleton instance
let embeddingCacheService: EmbeddingCacheService | null = null;

export function getEmbeddingCacheService(): EmbeddingCacheService {
    if (!embeddingCacheService) {
        embeddingCacheService = EmbeddingCacheService.create();
    }
    return embeddingCacheService;
}
