import { describe, it, expect, beforeEach, vi } from 'vitest';
import { FusionService, FusionOptions, compareCandidates } from '../../../src/services/fusion.service';
import { ChunkStoreService } from '../../../src/services/chunk-store.service';
import { VectorIndexService } from '../../../src/services/vector-index.service';
import { normalizeEmbedding } from '../../../src/services/embedding-cache.service';
import { IRelationExpander } from '../../../src/services/relation-expander.service';
import {
    InvalidMatchExpressionError,
    RetrievalErrorCode,
    TimeoutError,
    isRetrievalError
} from '../../../src/types/errors';
import type { FusedCandidate, QuerySpec } from '../../../src/types/retrieval';
import { MemoryChunkRepository, MemoryVectorMapRepository } from '../../helpers/memory-repositories';
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

const OPTIONS: FusionOptions = {
    alpha: 0.5,
    overfetch: 10,
    topN: 10,
    entityBoost: 0.05,
    embeddingTimeoutMs: 100
};

const COMPRESSOR_QUERY: QuerySpec = {
    intent: 'lookup_procedure',
    slots: { topic: 'compressor startup', asset: 'K-101' }
};

const PUMP_SIMILARITY = Math.fround(Math.SQRT1_2);

describe('Fusion Service - Dependency Injection Tests', () => {
    let chunkStore: ChunkStoreService;
    let qdrant: MemoryQdrantClient;
    let vectorIndex: VectorIndexService;
    let embedder: KeywordEmbedder;
    let logger: MockLogger;
    let fusion: FusionService;

    beforeEach(async () => {
        logger = createMockLogger();
        chunkStore = new ChunkStoreService(new MemoryChunkRepository(), logger);
        qdrant = new MemoryQdrantClient();
        vectorIndex = new VectorIndexService(qdrant, new MemoryVectorMapRepository(), passthroughRetry, logger, {
            collectionName: 'chunk_vectors',
            dimension: 3,
            model: 'test-embedding-model'
        });
        await vectorIndex.initialize();
        embedder = new KeywordEmbedder({ startup: [1, 0, 0], shutdown: [0, 1, 0] }, [0, 0, 1]);

        // Rev A of the K-101 procedure, superseded by Rev B
        await chunkStore.ingestDocument(
            newDocument({ docId: 'rev-a', assetId: 'K-101', checksum: 'a' }),
            [draft('Compressor startup sequence, rev A')]
        );
        await chunkStore.ingestDocument(
            newDocument({ docId: 'rev-b', assetId: 'K-101', revLabel: 'B', checksum: 'b' }),
            [draft('Compressor startup: confirm startup permissives'), draft('Compressor shutdown steps', 3)]
        );
        await chunkStore.ingestDocument(
            newDocument({ docId: 'pump', title: 'Pump Lube Manual', assetId: 'P-7', bu: 'maintenance', checksum: 'p' }),
            [draft('Lube oil check before startup', 2)]
        );

        await vectorIndex.add('rev-a:0000', [1, 0, 0]);
        await vectorIndex.add('rev-b:0000', [1, 0, 0]);
        await vectorIndex.add('rev-b:0001', [0, 1, 0]);
        await vectorIndex.add('pump:0000', normalizeEmbedding([1, 0, 1], 3));

        fusion = new FusionService(chunkStore, vectorIndex, embedder, null, logger, OPTIONS);
    });

    describe('query', () => {
        it('should rank the current revision first and never return the superseded one', async () => {
            const result = await fusion.query({ spec: COMPRESSOR_QUERY, queryText: 'compressor startup' });

            expect(result.candidates.map(c => c.chunkId)).toEqual(['rev-b:0000', 'pump:0000', 'rev-b:0001']);

            const [top, pump, shutdown] = result.candidates;
            expect(top).toEqual(expect.objectContaining({
                docId: 'rev-b',
                lexicalScore: 1,
                vectorScore: 1,
                boost: 0.05,
                matchedBy: ['lexical', 'vector']
            }));
            expect(top.finalScore).toBeCloseTo(1.05, 10);
            expect(pump.finalScore).toBeCloseTo(PUMP_SIMILARITY / 2, 6);
            expect(pump.matchedBy).toEqual(['vector']);
            expect(shutdown.finalScore).toBeCloseTo(0.05, 10);

            expect(result.degraded).toBe(false);
            expect(result.diagnostics).toEqual(expect.objectContaining({
                lexicalHits: 1,
                vectorHits: 4,
                danglingIds: [],
                filteredOut: 1
            }));
        });

        it('should include superseded revisions when history is requested', async () => {
            const result = await fusion.query({
                spec: COMPRESSOR_QUERY,
                queryText: 'compressor startup',
                includeHistorical: true
            });

            expect(result.candidates.map(c => c.chunkId)).toEqual(['rev-b:0000', 'rev-a:0000', 'pump:0000', 'rev-b:0001']);
            const revA = result.candidates[1];
            expect(revA.lexicalScore).toBe(0);
            expect(revA.finalScore).toBeCloseTo(0.55, 10);
            expect(result.diagnostics.filteredOut).toBe(0);
        });

        it('should treat latestOnly=false as a request for history', async () => {
            const result = await fusion.query({
                spec: { intent: 'lookup', slots: { ...COMPRESSOR_QUERY.slots, latestOnly: false } },
                queryText: 'compressor startup'
            });

            expect(result.candidates.map(c => c.chunkId)).toContain('rev-a:0000');
        });

        it('should fall back to the topic as vector text', async () => {
            await fusion.query({ spec: COMPRESSOR_QUERY });

            expect(embedder.calls).toEqual(['compressor startup']);
        });

        it('should honour alpha and limit', async () => {
            const result = await fusion.query({
                spec: COMPRESSOR_QUERY,
                queryText: 'compressor startup',
                alpha: 1,
                limit: 2
            });

            expect(result.candidates.map(c => [c.chunkId, c.finalScore])).toEqual([
                ['rev-b:0000', 1.05],
                ['rev-b:0001', 0.05]
            ]);
        });

        it('should apply business unit filters to both branches', async () => {
            const result = await fusion.query({
                spec: COMPRESSOR_QUERY,
                queryText: 'compressor startup',
                filters: { bu: 'ops' }
            });

            expect(result.candidates.map(c => c.chunkId)).toEqual(['rev-b:0000', 'rev-b:0001']);
            expect(result.diagnostics.filteredOut).toBe(2);
        });

        it('should boost entity matches case-insensitively', async () => {
            const result = await fusion.query({
                spec: { intent: 'lookup', slots: { topic: 'lube', asset: 'p-7' } },
                queryText: 'lube oil'
            });

            expect(result.candidates[0]).toEqual(expect.objectContaining({ chunkId: 'pump:0000', boost: 0.05 }));
        });

        it('should search SQL punctuation as plain words', async () => {
            const result = await fusion.query({
                spec: { intent: 'lookup', slots: { topic: 'compressor; DROP TABLE chunks' } }
            });

            expect(result.diagnostics.lexicalHits).toBe(0);
            expect(result.degraded).toBe(false);
        });
    });

    describe('degraded operation', () => {
        it('should continue on keyword results when the vector branch fails', async () => {
            qdrant.failSearches = true;

            const result = await fusion.query({ spec: COMPRESSOR_QUERY, queryText: 'compressor startup' });

            expect(result.degraded).toBe(true);
            expect(result.degradedSources).toEqual(['vector']);
            expect(result.candidates.map(c => c.chunkId)).toEqual(['rev-b:0000']);
            expect(result.candidates[0].finalScore).toBeCloseTo(0.55, 10);
            expect(logger.warn).toHaveBeenCalledWith(
                { source: 'vector', error: 'Bad request: search rejected' },
                'Retrieval branch failed, continuing degraded'
            );
        });

        it('should treat a slow query embedding as a failed vector branch', async () => {
            vi.spyOn(embedder, 'embed').mockImplementation(() => new Promise(() => undefined));
            fusion = new FusionService(chunkStore, vectorIndex, embedder, null, logger, { ...OPTIONS, embeddingTimeoutMs: 10 });

            const result = await fusion.query({ spec: COMPRESSOR_QUERY, queryText: 'compressor startup' });

            expect(result.degradedSources).toEqual(['vector']);
            expect(result.candidates).toHaveLength(1);
        });

        it('should fail with SEARCH_UNAVAILABLE when both branches fail', async () => {
            qdrant.failSearches = true;
            vi.spyOn(chunkStore, 'lexicalSearch').mockRejectedValue(new Error('fts unavailable'));

            const error = await fusion.query({ spec: COMPRESSOR_QUERY, queryText: 'compressor startup' })
                .catch((e: unknown) => e);

            expect(isRetrievalError(error, RetrievalErrorCode.SEARCH_UNAVAILABLE)).toBe(true);
            expect(error instanceof Error && error.message).toBe(
                'Both retrieval branches failed: lexical: fts unavailable; vector: Bad request: search rejected'
            );
        });

        it('should rethrow the error of the only branch that ran', async () => {
            vi.spyOn(embedder, 'embed').mockImplementation(() => new Promise(() => undefined));
            fusion = new FusionService(chunkStore, vectorIndex, embedder, null, logger, { ...OPTIONS, embeddingTimeoutMs: 10 });

            await expect(fusion.query({ spec: { intent: 'lookup', slots: {} }, queryText: 'startup' }))
                .rejects.toBeInstanceOf(TimeoutError);
        });
    });

    describe('validation', () => {
        it('should reject an invalid match expression', async () => {
            await expect(fusion.query({ spec: { intent: 'lookup', slots: { topic: 'startup*' } } }))
                .rejects.toBeInstanceOf(InvalidMatchExpressionError);
        });

        it('should reject a query with nothing to search', async () => {
            await expect(fusion.query({ spec: { intent: 'lookup', slots: {} } }))
                .rejects.toThrow('Invalid match expression: query has neither a topic nor query text');
        });

        it('should reject alpha outside [0, 1]', async () => {
            await expect(fusion.query({ spec: COMPRESSOR_QUERY, alpha: 1.5 }))
                .rejects.toThrow('alpha must be within [0, 1], got 1.5');
        });

        it('should stop before searching when the request is already cancelled', async () => {
            const controller = new AbortController();
            controller.abort();
            const lexicalSearch = vi.spyOn(chunkStore, 'lexicalSearch');

            const error = await fusion.query({ spec: COMPRESSOR_QUERY, signal: controller.signal })
                .catch((e: unknown) => e);

            expect(isRetrievalError(error, RetrievalErrorCode.CANCELLED)).toBe(true);
            expect(lexicalSearch).not.toHaveBeenCalled();
        });
    });

    describe('index drift', () => {
        it('should report vector hits whose chunk is gone as dangling', async () => {
            await vectorIndex.add('ghost:0000', [1, 0, 0]);

            const result = await fusion.query({ spec: COMPRESSOR_QUERY, queryText: 'compressor startup' });

            expect(result.diagnostics.danglingIds).toEqual(['ghost:0000']);
            expect(result.candidates.map(c => c.chunkId)).not.toContain('ghost:0000');
        });
    });

    describe('relation expansion', () => {
        it('should ask the expander only when expansion is requested', async () => {
            const expander: IRelationExpander = { expand: vi.fn(async () => []) };
            fusion = new FusionService(chunkStore, vectorIndex, embedder, expander, logger, OPTIONS);

            await fusion.query({ spec: COMPRESSOR_QUERY });
            expect(expander.expand).not.toHaveBeenCalled();

            const result = await fusion.query({ spec: COMPRESSOR_QUERY, expandRelations: true });
            expect(expander.expand).toHaveBeenCalledWith(result.candidates);
        });
    });

    describe('compareCandidates', () => {
        const candidate = (chunkId: string, finalScore: number, pageStart: number): FusedCandidate => ({
            chunkId,
            docId: chunkId.split(':')[0],
            sectionPath: '',
            pageStart,
            pageEnd: pageStart,
            lexicalScore: 0,
            vectorScore: 0,
            boost: 0,
            finalScore,
            matchedBy: []
        });

        it('should order by score, then page, then chunk id', () => {
            const ordered = [
                candidate('b:0001', 0.5, 4),
                candidate('a:0002', 0.5, 2),
                candidate('a:0001', 0.5, 2),
                candidate('c:0000', 0.9, 9)
            ].sort(compareCandidates);

            expect(ordered.map(c => c.chunkId)).toEqual(['c:0000', 'a:0001', 'a:0002', 'b:0001']);
        });
    });
});
