import { QdrantClient } from '@qdrant/js-client-rest';
import { AppDataSource } from '../db/data-source';
import { VectorMapRepository } from '../db/interfaces';
import { PgVectorMapRepository } from '../db/repositories/pg-vector-map.repository';
import { getSettings } from '../config/settings';
import { logger, ILogger } from '../config/logger';
import { RetryUtil, IRetryUtil } from '../utils/retry.util';
import { KeyedMutex } from '../utils/keyed-mutex.util';
import { DanglingIndexEntryError, DimensionMismatchError, getErrorMessage } from '../types/errors';
import type { VectorHit, VectorSearchResult } from '../types/retrieval';

type PointId = string | number;

// The slice of the Qdrant REST client this service relies on
export interface IQdrantClient {
    getCollections(): Promise<{ collections: Array<{ name: string }> }>;
    getCollection(collectionName: string): Promise<{
        status: string;
        points_count?: number | null;
        config: { params: { vectors?: unknown } };
    }>;
    createCollection(collectionName: string, config: {
        vectors: { size: number; distance: 'Dot' };
    }): Promise<unknown>;
    upsert(collectionName: string, data: {
        wait: boolean;
        points: Array<{ id: number; vector: number[]; payload: Record<string, unknown> }>;
    }): Promise<unknown>;
    search(collectionName: string, params: {
        vector: number[];
        limit: number;
        with_payload: boolean;
        with_vector: boolean;
    }): Promise<Array<{ id: PointId; score: number }>>;
    delete(collectionName: string, params: { wait: boolean; points: number[] }): Promise<unknown>;
    scroll(collectionName: string, params: {
        limit: number;
        offset?: PointId;
        with_payload: boolean;
        with_vector: boolean;
    }): Promise<{ points: Array<{ id: PointId }>; next_page_offset?: unknown }>;
}

export interface VectorIndexOptions {
    collectionName: string;
    dimension: number;
    model: string;
}

export interface VectorIndexStats {
    collection: string;
    pointsCount: number;
    mappedCount: number;
    dimension: number;
    status: string;
}

export interface IVectorIndex {
    readonly dimension: number;
    add(chunkId: string, vector: number[]): Promise<number>;
    search(queryVector: number[], k: number): Promise<VectorSearchResult>;
    remove(chunkId: string): Promise<boolean>;
}

const SCROLL_PAGE_SIZE = 256;

function readVectorSize(vectors: unknown): number | null {
    if (typeof vectors === 'object' && vectors !== null && 'size' in vectors && typeof vectors.size === 'number') {
        return vectors.size;
    }
    return null;
}

/**
 * Vector Index Service
 *
 * Dense similarity index over chunk embeddings. Qdrant stores the vectors
 * under numeric point ids; `vector_index_map` is the durable bijection
 * between those ids and chunk ids. Vectors are unit length, so the `Dot`
 * distance is cosine similarity.
 */
export class VectorIndexService implements IVectorIndex {
    private chunkLocks = new KeyedMutex();

    constructor(
        private client: IQdrantClient,
        private mapRepository: VectorMapRepository,
        private retryUtil: IRetryUtil,
        private logger: ILogger,
        private options: VectorIndexOptions,
        private clock: () => Date = () => new Date()
    ) { }

    /**
     * Factory method for production use
     */
    static create(): VectorIndexService {
        const settings = getSettings();
        const client = new QdrantClient({
            url: settings.vectorDbUrl,
            timeout: 30000
        });

        return new VectorIndexService(
            client,
            new PgVectorMapRepository(AppDataSource),
            RetryUtil,
            logger,
            {
                collectionName: settings.vectorCollection,
                dimension: settings.embeddingDim,
                model: settings.embeddingModel
            }
        );
    }

    get dimension(): number {
        return this.options.dimension;
    }

    /**
     * Verify the Qdrant connection and create the collection if missing.
     * An existing collection of another dimension is refused.
     */
    async initialize(): Promise<void> {
        const { collectionName, dimension } = this.options;

        try {
            await this.client.getCollections();
            this.logger.info({}, 'Qdrant connection established');
        } catch (error: unknown) {
            this.logger.error({ error: getErrorMessage(error) }, 'Failed to initialize Qdrant');
            throw new Error(`Qdrant initialization failed: ${getErrorMessage(error)}`);
        }

        let existingSize: number | null = null;
        let exists = true;
        try {
            const info = await this.client.getCollection(collectionName);
            existingSize = readVectorSize(info.config.params.vectors);
        } catch {
            exists = false;
        }

        if (!exists) {
            this.logger.info({ collection: collectionName, dimension }, 'Creating vector collection');
            await this.client.createCollection(collectionName, {
                vectors: { size: dimension, distance: 'Dot' }
            });
            return;
        }

        if (existingSize !== null && existingSize !== dimension) {
            throw new DimensionMismatchError(dimension, existingSize);
        }
        this.logger.info({ collection: collectionName }, 'Vector collection already exists');
    }

    /**
     * Index a chunk vector and return its point id. Re-adding a mapped chunk
     * returns the existing id without touching the index.
     */
    async add(chunkId: string, vector: number[]): Promise<number> {
        if (vector.length !== this.options.dimension) {
            throw new DimensionMismatchError(this.options.dimension, vector.length);
        }

        return this.chunkLocks.runExclusive(chunkId, async () => {
            const existing = await this.mapRepository.findByChunkId(chunkId);
            if (existing) {
                return existing.faissId;
            }

            const faissId = await this.mapRepository.nextId();
            await this.mapRepository.insert({
                faissId,
                chunkId,
                model: this.options.model,
                createdAt: this.clock()
            });

            try {
                await this.retryUtil.executeWithRetry(
                    () => this.client.upsert(this.options.collectionName, {
                        wait: true,
                        points: [{ id: faissId, vector, payload: { chunk_id: chunkId, model: this.options.model } }]
                    }),
                    {
                        maxAttempts: 3,
                        baseDelay: 1000,
                        maxDelay: 5000,
                        operationName: 'Qdrant upsert point'
                    }
                );
            } catch (error: unknown) {
                await this.mapRepository.deleteByChunkId(chunkId);
                this.logger.error({ chunkId, faissId, error: getErrorMessage(error) }, 'Vector upsert failed, mapping rolled back');
                throw error;
            }

            this.logger.debug({ chunkId, faissId }, 'Chunk vector indexed');
            return faissId;
        });
    }

    /**
     * Top-k by inner product. Point ids without a mapping are reported as
     * dangling and left out of the hits.
     */
    async search(queryVector: number[], k: number): Promise<VectorSearchResult> {
        if (queryVector.length !== this.options.dimension) {
            throw new DimensionMismatchError(this.options.dimension, queryVector.length);
        }
        if (k <= 0) {
            return { hits: [], danglingIds: [] };
        }

        // No retry on the query path
        const points = await this.client.search(this.options.collectionName, {
            vector: queryVector,
            limit: k,
            with_payload: false,
            with_vector: false
        });

        const faissIds = points.map(point => Number(point.id));
        const entries = await this.mapRepository.findByFaissIds(faissIds);
        const chunkByFaissId = new Map(entries.map(entry => [entry.faissId, entry.chunkId]));

        const hits: VectorHit[] = [];
        const danglingIds: number[] = [];
        for (const point of points) {
            const faissId = Number(point.id);
            const chunkId = chunkByFaissId.get(faissId);
            if (chunkId === undefined) {
                const dangling = new DanglingIndexEntryError(faissId, 'point has no chunk mapping');
                this.logger.warn({ faissId, code: dangling.code }, dangling.message);
                danglingIds.push(faissId);
                continue;
            }
            hits.push({ chunkId, faissId, similarity: point.score });
        }

        this.logger.debug({
            collection: this.options.collectionName,
            k,
            resultsCount: hits.length,
            danglingCount: danglingIds.length
        }, 'Vector search completed');

        return { hits, danglingIds };
    }

    /**
     * Remove a chunk's vector and mapping. Returns false when it was not indexed.
     */
    async remove(chunkId: string): Promise<boolean> {
        return this.chunkLocks.runExclusive(chunkId, async () => {
            const entry = await this.mapRepository.findByChunkId(chunkId);
            if (!entry) {
                return false;
            }

            await this.deletePoints([entry.faissId]);
            await this.mapRepository.deleteByChunkId(chunkId);

            this.logger.debug({ chunkId, faissId: entry.faissId }, 'Chunk vector removed');
            return true;
        });
    }

    async deletePoints(faissIds: number[]): Promise<void> {
        if (faissIds.length === 0) {
            return;
        }

        await this.retryUtil.executeWithRetry(
            () => this.client.delete(this.options.collectionName, { wait: true, points: faissIds }),
            {
                maxAttempts: 3,
                baseDelay: 1000,
                maxDelay: 5000,
                operationName: 'Qdrant delete points'
            }
        );
    }

    /**
     * Every point id currently stored in the collection.
     */
    async listPointIds(): Promise<number[]> {
        const ids: number[] = [];
        let offset: PointId | undefined;

        do {
            const page = await this.client.scroll(this.options.collectionName, {
                limit: SCROLL_PAGE_SIZE,
                offset,
                with_payload: false,
                with_vector: false
            });
            page.points.forEach(point => ids.push(Number(point.id)));

            const next = page.next_page_offset;
            offset = typeof next === 'number' || typeof next === 'string' ? next : undefined;
        } while (offset !== undefined);

        return ids;
    }

    async getStats(): Promise<VectorIndexStats> {
        const info = await this.client.getCollection(this.options.collectionName);
        const mapped = await this.mapRepository.listAll(this.options.model);

        return {
            collection: this.options.collectionName,
            pointsCount: info.points_count ?? 0,
            mappedCount: mapped.length,
            dimension: this.options.dimension,
            status: info.status
        };
    }
}

// Singleton instance
let vectorIndexService: VectorIndexService | null = null;

export function getVectorIndexService(): VectorIndexService {
    if (!vectorIndexService) {
        vectorIndexService = VectorIndexService.create();
    }
    return vectorIndexService;
}
