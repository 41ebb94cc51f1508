import { createHash, randomUUID } from 'crypto';
import { promises as fs } from 'fs';
import * as path from 'path';
import { getSettings } from '../config/settings';
import { logger, ILogger } from '../config/logger';
import { DuplicateChecksumError, getErrorMessage } from '../types/errors';
import { IChunkStore, chunkIdFor, getChunkStoreService } from './chunk-store.service';
import { IEmbeddingCache, getEmbeddingCacheService } from './embedding-cache.service';
import { IVectorIndex, getVectorIndexService } from './vector-index.service';
import { EmbeddingFunction, getOpenAIService } from './openai.service';
import { Chunker, HeadingAwareChunker } from './chunker.service';
import { DEFAULT_EXTRACTORS, Extractor, findExtractor, readSource } from './document-extractor.service';
import type { ChunkDraft, IngestedDocument, NewDocument, TextBlock } from '../types/retrieval';

export interface IngestMetadata {
    title: string;
    bu: string;
    revLabel: string;
    sourcePath?: string;
    assetId?: string;
    equipmentId?: string;
    supersedes?: string;
    lineageKey?: string;
    validFrom?: Date;
}

export type DirectoryMetadata = Omit<IngestMetadata, 'title' | 'sourcePath' | 'supersedes'>;

export interface IngestionResult {
    status: 'created' | 'unchanged';
    docId: string;
    chunkCount: number;
    supersededDocIds: string[];
    /** Chunks added to the vector index by this call */
    indexedCount: number;
}

export interface DirectoryIngestionResult {
    processedCount: number;
    failedCount: number;
    files: Array<{ file: string; result?: IngestionResult; error?: string }>;
}

export interface RetireResult {
    docId: string;
    chunkCount: number;
    removedVectors: number;
}

export function sha256(content: Buffer | string): string {
    return createHash('sha256').update(content).digest('hex');
}

export function titleFromFileName(filePath: string): string {
    return path.basename(filePath, path.extname(filePath)).replace(/[-_]+/g, ' ').trim();
}

/**
 * Ingestion Service with Dependency Injection
 *
 * Extract → chunk → checksum → embed → store + index. Embeddings are computed
 * before anything is written; vectors and cache records are written inside the
 * lineage transaction, so a version becomes active only with all of its
 * chunks indexed, and any fault rolls the whole version back.
 */
export class IngestionService {
    constructor(
        private chunkStore: IChunkStore,
        private embeddingCache: IEmbeddingCache,
        private vectorIndex: IVectorIndex,
        private embedder: EmbeddingFunction,
        private chunker: Chunker,
        private logger: ILogger,
        private extractors: Extractor[] = DEFAULT_EXTRACTORS
    ) { }

    /**
     * Factory method for production use
     */
    static create(): IngestionService {
        const settings = getSettings();
        return new IngestionService(
            getChunkStoreService(),
            getEmbeddingCacheService(),
            getVectorIndexService(),
            getOpenAIService(),
            new HeadingAwareChunker({ maxWords: settings.chunkMaxWords, overlapWords: settings.chunkOverlapWords }),
            logger
        );
    }

    async ingestFile(filePath: string, metadata: IngestMetadata): Promise<IngestionResult> {
        const extractor = findExtractor(filePath, this.extractors);
        if (!extractor) {
            throw new Error(`Unsupported file type: ${path.extname(filePath) || filePath}`);
        }

        this.logger.info({ filePath, title: metadata.title }, 'Starting document ingestion');

        const content = await readSource(filePath);
        const { blocks, pageCount } = await extractor.extract(content);

        this.logger.debug({ filePath, pageCount, blocksCount: blocks.length }, 'Document text extracted');

        return await this.ingest(blocks, { ...metadata, sourcePath: metadata.sourcePath ?? filePath }, sha256(content));
    }

    async ingestBlocks(blocks: TextBlock[], metadata: IngestMetadata & { sourcePath: string }): Promise<IngestionResult> {
        return await this.ingest(blocks, metadata, sha256(blocks.map(block => block.text).join('\n')));
    }

    /**
     * Ingest every supported file of a directory, continuing past failures.
     * Titles come from the file names.
     */
    async ingestDirectory(directoryPath: string, metadata: DirectoryMetadata): Promise<DirectoryIngestionResult> {
        const entries = await fs.readdir(directoryPath, { withFileTypes: true });
        const files = entries
            .filter(entry => entry.isFile() && findExtractor(entry.name, this.extractors) !== null)
            .map(entry => entry.name)
            .sort();

        const outcome: DirectoryIngestionResult = { processedCount: 0, failedCount: 0, files: [] };

        for (const file of files) {
            const filePath = path.join(directoryPath, file);
            try {
                const result = await this.ingestFile(filePath, { ...metadata, title: titleFromFileName(file) });
                outcome.processedCount++;
                outcome.files.push({ file, result });
            } catch (error: unknown) {
                outcome.failedCount++;
                outcome.files.push({ file, error: getErrorMessage(error) });
                this.logger.error({ file, error: getErrorMessage(error) }, 'Failed to ingest file');
            }
        }

        this.logger.info({
            directoryPath,
            processedCount: outcome.processedCount,
            failedCount: outcome.failedCount
        }, 'Directory ingestion completed');

        return outcome;
    }

    /**
     * Retire a document and take its chunks out of the vector index.
     */
    async retireDocument(docId: string): Promise<RetireResult> {
        const chunkIds = await this.chunkStore.retireDocument(docId);

        let removedVectors = 0;
        for (const chunkId of chunkIds) {
            if (await this.vectorIndex.remove(chunkId)) {
                removedVectors++;
            }
        }

        this.logger.info({ docId, chunkCount: chunkIds.length, removedVectors }, 'Document vectors removed');
        return { docId, chunkCount: chunkIds.length, removedVectors };
    }

    private async ingest(
        blocks: TextBlock[],
        metadata: IngestMetadata & { sourcePath: string },
        checksum: string
    ): Promise<IngestionResult> {
        const drafts = this.chunker.split(blocks);
        if (drafts.length === 0) {
            throw new Error('Document contains no extractable text');
        }

        const document: NewDocument = {
            title: metadata.title,
            sourcePath: metadata.sourcePath,
            bu: metadata.bu,
            assetId: metadata.assetId,
            equipmentId: metadata.equipmentId,
            revLabel: metadata.revLabel,
            checksum,
            supersedes: metadata.supersedes,
            lineageKey: metadata.lineageKey,
            validFrom: metadata.validFrom
        };

        const duplicate = await this.chunkStore.findActiveDuplicate(document);
        if (duplicate) {
            return await this.unchanged(duplicate.docId, checksum);
        }

        const docId = randomUUID();
        const vectors = await this.embedChunks(docId, drafts);

        const staged: string[] = [];
        let stored: IngestedDocument;
        try {
            stored = await this.chunkStore.ingestDocument({ ...document, docId }, drafts, async ({ chunkIds }) => {
                for (let i = 0; i < chunkIds.length; i++) {
                    staged.push(chunkIds[i]);
                    await this.vectorIndex.add(chunkIds[i], vectors[i]);
                    await this.embeddingCache.store(chunkIds[i], this.embedder.model, vectors[i]);
                }
            });
        } catch (error: unknown) {
            await this.discardStaged(docId, staged);
            if (error instanceof DuplicateChecksumError) {
                return await this.unchanged(error.existingDocId, checksum);
            }
            throw error;
        }

        this.logger.info({
            docId,
            title: metadata.title,
            chunksCount: drafts.length,
            supersededDocIds: stored.supersededDocIds
        }, 'Document ingestion completed');

        return {
            status: 'created',
            docId,
            chunkCount: drafts.length,
            supersededDocIds: stored.supersededDocIds,
            indexedCount: stored.chunkIds.length
        };
    }

    /**
     * Embed every chunk up front. Nothing is persisted here, so a failed or
     * timed-out call leaves no rows behind.
     */
    private async embedChunks(docId: string, drafts: ChunkDraft[]): Promise<number[][]> {
        const vectors: number[][] = [];
        for (let ordinal = 0; ordinal < drafts.length; ordinal++) {
            const text = drafts[ordinal].text;
            vectors.push(await this.embeddingCache.compute(
                `Embedding for chunk ${chunkIdFor(docId, ordinal)}`,
                signal => this.embedder.embed(text, signal)
            ));
        }
        return vectors;
    }

    /**
     * Undo index and embedding writes of a version whose transaction rolled back.
     * Leftovers from a failed cleanup surface in the consistency report.
     */
    private async discardStaged(docId: string, chunkIds: string[]): Promise<void> {
        if (chunkIds.length === 0) {
            return;
        }

        const outcomes = await Promise.allSettled([
            ...chunkIds.map(chunkId => this.vectorIndex.remove(chunkId)),
            this.embeddingCache.evict(chunkIds, this.embedder.model)
        ]);
        const failures = outcomes.filter(outcome => outcome.status === 'rejected');

        this.logger.warn({
            docId,
            stagedCount: chunkIds.length,
            cleanupFailures: failures.length
        }, 'Ingestion rolled back, staged vectors discarded');
    }

    private async unchanged(docId: string, checksum: string): Promise<IngestionResult> {
        const chunks = await this.chunkStore.listChunks(docId);

        this.logger.info({
            docId,
            checksum: `${checksum.substring(0, 8)}...`
        }, 'Document already active with same content, skipping ingestion');

        return { status: 'unchanged', docId, chunkCount: chunks.length, supersededDocIds: [], indexedCount: 0 };
    }
}

// Singleton instance
let ingestionService: IngestionService | null = null;

export function getIngestionService(): IngestionService {
    if (!ingestionService) {
        ingestionService = IngestionService.create();
    }
    return ingestionService;
}
