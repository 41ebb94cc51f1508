import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ConsistencyService } from '../../../src/services/consistency.service';
import { ChunkStoreService } from '../../../src/services/chunk-store.service';
import { EmbeddingCacheService } from '../../../src/services/embedding-cache.service';
import { VectorIndexService } from '../../../src/services/vector-index.service';
import {
    MemoryChunkRepository,
    MemoryEmbeddingRepository,
    MemoryVectorMapRepository
} from '../../helpers/memory-repositories';
import { MemoryQdrantClient } from '../../helpers/memory-qdrant';
import {
    KeywordEmbedder,
    MockLogger,
    createMockLogger,
    draft,
    newDocument,
    passthroughRetry
} from '../../helpers/fixtures';

vi.mock('../../../src/db/data-source', () => ({ AppDataSource: {} }));

const MODEL = 'test-embedding-model';

describe('Consistency Service - Dependency Injection Tests', () => {
    let qdrant: MemoryQdrantClient;
    let mapRepository: MemoryVectorMapRepository;
    let embeddingRepository: MemoryEmbeddingRepository;
    let chunkStore: ChunkStoreService;
    let cache: EmbeddingCacheService;
    let vectorIndex: VectorIndexService;
    let embedder: KeywordEmbedder;
    let logger: MockLogger;
    let consistency: ConsistencyService;

    async function index(chunkId: string): Promise<void> {
        const chunk = await chunkStore.getChunk(chunkId);
        const vector = await cache.getOrCompute(chunkId, MODEL, () => embedder.embed(chunk.text));
        await vectorIndex.add(chunkId, vector);
    }

    beforeEach(async () => {
        logger = createMockLogger();
        qdrant = new MemoryQdrantClient();
        mapRepository = new MemoryVectorMapRepository();
        embeddingRepository = new MemoryEmbeddingRepository();
        chunkStore = new ChunkStoreService(new MemoryChunkRepository(), logger);
        cache = new EmbeddingCacheService(embeddingRepository, logger, { dimension: 3, timeoutMs: 100 });
        vectorIndex = new VectorIndexService(qdrant, mapRepository, passthroughRetry, logger, {
            collectionName: 'chunk_vectors',
            dimension: 3,
            model: MODEL
        });
        await vectorIndex.initialize();
        embedder = new KeywordEmbedder({ startup: [1, 0, 0], shutdown: [0, 1, 0] }, [0, 0, 1]);

        consistency = new ConsistencyService(chunkStore, cache, vectorIndex, mapRepository, embeddingRepository, embedder, logger);

        await chunkStore.ingestDocument(
            newDocument({ docId: 'd1' }),
            [draft('startup one'), draft('shutdown two', 2), draft('lube three', 3)]
        );
    });

    it('should report a fully indexed corpus as consistent', async () => {
        await index('d1:0000');
        await index('d1:0001');
        await index('d1:0002');

        await expect(consistency.check()).resolves.toEqual({
            model: MODEL,
            index: { collection: 'chunk_vectors', pointsCount: 3, mappedCount: 3, dimension: 3, status: 'green' },
            danglingPoints: [],
            missingPoints: [],
            unmappedChunks: [],
            mapWithoutEmbedding: [],
            orphanedEmbeddings: [],
            consistent: true
        });
    });

    describe('after partial failures', () => {
        beforeEach(async () => {
            await index('d1:0000');
            await index('d1:0001');

            // Point without mapping
            qdrant.points.set(99, { id: 99, vector: [1, 0, 0], payload: {} });
            // Mapping whose point is gone
            qdrant.points.delete(1);
            // Mapping without a cached embedding
            await embeddingRepository.deleteMany(['d1:0001'], MODEL);
            // Embedding of a chunk that no longer exists
            await embeddingRepository.insertIfAbsent({ chunkId: 'ghost:0000', model: MODEL, dim: 3, vector: [0, 0, 1], createdAt: new Date() });
        });

        it('should detect every class of drift', async () => {
            await expect(consistency.check()).resolves.toEqual({
                model: MODEL,
                index: { collection: 'chunk_vectors', pointsCount: 2, mappedCount: 2, dimension: 3, status: 'green' },
                danglingPoints: [99],
                missingPoints: [{ faissId: 1, chunkId: 'd1:0000' }],
                unmappedChunks: ['d1:0002'],
                mapWithoutEmbedding: ['d1:0001'],
                orphanedEmbeddings: ['ghost:0000'],
                consistent: false
            });
        });

        it('should repair the corpus back to consistent', async () => {
            const result = await consistency.repair();

            expect(result).toEqual({
                deletedPoints: 1,
                droppedMappings: 1,
                reindexedChunks: 2,
                restoredEmbeddings: 1,
                purgedEmbeddings: 1,
                failedChunks: []
            });
            expect((await consistency.check()).consistent).toBe(true);
            expect(qdrant.points.has(99)).toBe(false);
            expect((await mapRepository.findByChunkId('d1:0000'))?.faissId).toBe(3);
        });

        it('should list chunks it could not re-embed', async () => {
            vi.spyOn(embedder, 'embed').mockRejectedValue(new Error('Invalid API key'));

            const result = await consistency.repair();

            expect(result.reindexedChunks).toBe(1);
            expect(result.failedChunks).toEqual(['d1:0002', 'd1:0001']);
            expect(logger.error).toHaveBeenCalledWith(
                { chunkId: 'd1:0002', error: 'Invalid API key' },
                'Failed to re-index chunk'
            );
        });
    });
});
