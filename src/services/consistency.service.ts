import { AppDataSource } from '../db/data-source';
import { EmbeddingRecordRepository, VectorMapRepository } from '../db/interfaces';
import { PgEmbeddingRepository } from '../db/repositories/pg-embedding.repository';
import { PgVectorMapRepository } from '../db/repositories/pg-vector-map.repository';
import { logger, ILogger } from '../config/logger';
import { getErrorMessage } from '../types/errors';
import { IChunkStore, getChunkStoreService } from './chunk-store.service';
import { IEmbeddingCache, getEmbeddingCacheService } from './embedding-cache.service';
import { VectorIndexService, VectorIndexStats, getVectorIndexService } from './vector-index.service';
import { EmbeddingFunction, getOpenAIService } from './openai.service';

export type ConsistencyIndex = Pick<VectorIndexService, 'add' | 'listPointIds' | 'deletePoints' | 'getStats'>;

export interface ConsistencyReport {
    model: string;
    index: VectorIndexStats;
    /** Index points with no chunk mapping */
    danglingPoints: number[];
    /** Mappings whose point is gone from the index */
    missingPoints: Array<{ faissId: number; chunkId: string }>;
    /** Chunks of active documents that were never indexed */
    unmappedChunks: string[];
    mapWithoutEmbedding: string[];
    orphanedEmbeddings: string[];
    consistent: boolean;
}

export interface RepairResult {
    deletedPoints: number;
    droppedMappings: number;
    reindexedChunks: number;
    restoredEmbeddings: number;
    purgedEmbeddings: number;
    failedChunks: string[];
}

/**
 * Consistency Service
 *
 * Reconciles the chunk store, the embedding cache, the id map and the
 * Qdrant collection after partial failures, and repairs what it finds.
 */
export class ConsistencyService {
    constructor(
        private chunkStore: IChunkStore,
        private embeddingCache: IEmbeddingCache,
        private vectorIndex: ConsistencyIndex,
        private mapRepository: VectorMapRepository,
        private embeddingRepository: EmbeddingRecordRepository,
        private embedder: EmbeddingFunction,
        private logger: ILogger
    ) { }

    /**
     * Factory method for production use
     */
    static create(): ConsistencyService {
        return new ConsistencyService(
            getChunkStoreService(),
            getEmbeddingCacheService(),
            getVectorIndexService(),
            new PgVectorMapRepository(AppDataSource),
            new PgEmbeddingRepository(AppDataSource),
            getOpenAIService(),
            logger
        );
    }

    async check(): Promise<ConsistencyReport> {
        const model = this.embedder.model;

        const pointIds = new Set(await this.vectorIndex.listPointIds());
        const entries = await this.mapRepository.listAll(model);
        const mappedIds = new Set(entries.map(entry => entry.faissId));
        const mappedChunks = new Set(entries.map(entry => entry.chunkId));

        const danglingPoints = Array.from(pointIds)
            .filter(id => !mappedIds.has(id))
            .sort((a, b) => a - b);
        const missingPoints = entries
            .filter(entry => !pointIds.has(entry.faissId))
            .map(entry => ({ faissId: entry.faissId, chunkId: entry.chunkId }));

        const activeChunkIds = await this.chunkStore.listActiveChunkIds();
        const unmappedChunks = activeChunkIds.filter(chunkId => !mappedChunks.has(chunkId));

        const embeddedChunkIds = await this.embeddingRepository.listChunkIds(model);
        const embedded = new Set(embeddedChunkIds);
        const mapWithoutEmbedding = entries
            .filter(entry => !embedded.has(entry.chunkId))
            .map(entry => entry.chunkId);

        const existing = await this.chunkStore.chunksExist(embeddedChunkIds);
        const orphanedEmbeddings = embeddedChunkIds.filter(chunkId => !existing.has(chunkId));

        const report: ConsistencyReport = {
            model,
            index: await this.vectorIndex.getStats(),
            danglingPoints,
            missingPoints,
            unmappedChunks,
            mapWithoutEmbedding,
            orphanedEmbeddings,
            consistent: danglingPoints.length === 0 &&
                missingPoints.length === 0 &&
                unmappedChunks.length === 0 &&
                mapWithoutEmbedding.length === 0 &&
                orphanedEmbeddings.length === 0
        };

        this.logger.info({
            consistent: report.consistent,
            pointsCount: report.index.pointsCount,
            mappedCount: report.index.mappedCount,
            danglingPoints: danglingPoints.length,
            missingPoints: missingPoints.length,
            unmappedChunks: unmappedChunks.length,
            mapWithoutEmbedding: mapWithoutEmbedding.length,
            orphanedEmbeddings: orphanedEmbeddings.length
        }, 'Consistency check completed');

        return report;
    }

    async repair(): Promise<RepairResult> {
        const report = await this.check();
        const result: RepairResult = {
            deletedPoints: 0,
            droppedMappings: 0,
            reindexedChunks: 0,
            restoredEmbeddings: 0,
            purgedEmbeddings: 0,
            failedChunks: []
        };

        await this.vectorIndex.deletePoints(report.danglingPoints);
        result.deletedPoints = report.danglingPoints.length;

        result.droppedMappings = await this.mapRepository.deleteByFaissIds(
            report.missingPoints.map(missing => missing.faissId)
        );

        const reindex = Array.from(new Set([
            ...report.missingPoints.map(missing => missing.chunkId),
            ...report.unmappedChunks
        ]));
        for (const chunkId of reindex) {
            try {
                const vector = await this.embed(chunkId);
                await this.vectorIndex.add(chunkId, vector);
                result.reindexedChunks++;
            } catch (error: unknown) {
                result.failedChunks.push(chunkId);
                this.logger.error({ chunkId, error: getErrorMessage(error) }, 'Failed to re-index chunk');
            }
        }

        const reindexed = new Set(reindex);
        for (const chunkId of report.mapWithoutEmbedding.filter(id => !reindexed.has(id))) {
            try {
                await this.embed(chunkId);
                result.restoredEmbeddings++;
            } catch (error: unknown) {
                result.failedChunks.push(chunkId);
                this.logger.error({ chunkId, error: getErrorMessage(error) }, 'Failed to restore chunk embedding');
            }
        }

        result.purgedEmbeddings = await this.embeddingRepository.deleteMany(report.orphanedEmbeddings, report.model);

        this.logger.info({ ...result, failedChunks: result.failedChunks.length }, 'Consistency repair completed');
        return result;
    }

    private async embed(chunkId: string): Promise<number[]> {
        const chunk = await this.chunkStore.getChunk(chunkId);
        return await this.embeddingCache.getOrCompute(
            chunkId,
            this.embedder.model,
            signal => this.embedder.embed(chunk.text, signal)
        );
    }
}

// Singleton instance
let consistencyService: ConsistencyService | null = null;

export function getConsistencyService(): ConsistencyService {
    if (!consistencyService) {
        consistencyService = ConsistencyService.create();
    }
    return consistencyService;
}
