import { randomUUID } from 'crypto';
import { AppDataSource } from '../db/data-source';
import { ChunkRepository } from '../db/interfaces';
import { PgChunkRepository } from '../db/repositories/pg-chunk.repository';
import { logger, ILogger } from '../config/logger';
import { KeyedMutex } from '../utils/keyed-mutex.util';
import { DuplicateChecksumError, NotFoundError } from '../types/errors';
import { MatchExpression } from './match-expression';
import type {
    ChunkContext,
    ChunkDraft,
    ChunkRecord,
    DocumentMetadataPatch,
    DocumentRecord,
    IngestedDocument,
    LexicalFilters,
    LexicalSearchResult,
    NewDocument,
    ScoreOrder
} from '../types/retrieval';

/** Runs inside the lineage transaction after every row is written; a throw rolls the version back */
export type BeforeCommit = (stored: IngestedDocument) => Promise<void>;

export interface IChunkStore {
    readonly lexicalScoreOrder: ScoreOrder;
    ingestDocument(doc: NewDocument, chunks: ChunkDraft[], beforeCommit?: BeforeCommit): Promise<IngestedDocument>;
    findActiveDuplicate(doc: NewDocument): Promise<DocumentRecord | null>;
    lexicalSearch(expression: MatchExpression, filters: LexicalFilters, limit: number): Promise<LexicalSearchResult>;
    getDocument(docId: string): Promise<DocumentRecord>;
    getChunk(chunkId: string): Promise<ChunkRecord>;
    getChunkContexts(chunkIds: string[]): Promise<ChunkContext[]>;
    listChunks(docId: string): Promise<ChunkRecord[]>;
    listActiveChunkIds(): Promise<string[]>;
    chunksExist(chunkIds: string[]): Promise<Set<string>>;
    updateDocumentMetadata(docId: string, patch: DocumentMetadataPatch): Promise<DocumentRecord>;
    retireDocument(docId: string): Promise<string[]>;
}

const REVISION_MARKER = /\brev(?:ision)?\b\.?\s*[a-z0-9][a-z0-9.-]*/g;
const VERSION_MARKER = /\bv(?:ersion)?\s*\d+(?:\.\d+)*\b/g;
const DRAFT_MARKER = /\bdraft\b/g;

/**
 * Normalised title shared by every revision of a document:
 * "Compressor Startup Procedure (Rev. C)" → "compressor startup procedure".
 */
export function titleFamily(title: string): string {
    return title
        .toLowerCase()
        .replace(REVISION_MARKER, ' ')
        .replace(VERSION_MARKER, ' ')
        .replace(DRAFT_MARKER, ' ')
        .replace(/[^\p{L}\p{N}]+/gu, ' ')
        .trim()
        .replace(/\s+/g, ' ');
}

export function lineageKeyFor(doc: Pick<NewDocument, 'title' | 'assetId' | 'equipmentId' | 'lineageKey'>): string {
    if (doc.lineageKey) {
        return doc.lineageKey;
    }
    return [doc.assetId ?? '-', doc.equipmentId ?? '-', titleFamily(doc.title)].join('|');
}

export function chunkIdFor(docId: string, ordinal: number): string {
    return `${docId}:${String(ordinal).padStart(4, '0')}`;
}

function validateDrafts(chunks: ChunkDraft[]): void {
    if (chunks.length === 0) {
        throw new Error('A document needs at least one chunk');
    }
    chunks.forEach((chunk, index) => {
        if (!Number.isInteger(chunk.pageStart) || !Number.isInteger(chunk.pageEnd) ||
            chunk.pageStart < 1 || chunk.pageEnd < chunk.pageStart) {
            throw new Error(`Chunk ${index} has an invalid page span ${chunk.pageStart}-${chunk.pageEnd}`);
        }
        if (chunk.text.trim().length === 0) {
            throw new Error(`Chunk ${index} has no text`);
        }
    });
}

/**
 * Chunk Store Service
 *
 * Durable record of documents and chunks. Owns the supersedence transition:
 * inserting a new version of a lineage and retiring the previous active
 * version happen in one transaction, under a per-lineage lock, so readers
 * never observe zero or two active documents for a lineage.
 */
export class ChunkStoreService implements IChunkStore {
    constructor(
        private repository: ChunkRepository,
        private logger: ILogger,
        private lineageLocks: KeyedMutex = new KeyedMutex(),
        private clock: () => Date = () => new Date()
    ) { }

    /**
     * Factory method for production use
     */
    static create(): ChunkStoreService {
        return new ChunkStoreService(new PgChunkRepository(AppDataSource), logger);
    }

    get lexicalScoreOrder(): ScoreOrder {
        return this.repository.lexicalScoreOrder;
    }

    /**
     * Persist a document version and its chunks.
     *
     * Throws DuplicateChecksumError (carrying the existing id) when the same
     * bytes are already active in the lineage; nothing is written then.
     * `beforeCommit` stages work that must land together with the version.
     */
    async ingestDocument(doc: NewDocument, chunks: ChunkDraft[], beforeCommit?: BeforeCommit): Promise<IngestedDocument> {
        validateDrafts(chunks);

        const lineageKey = lineageKeyFor(doc);
        const docId = doc.docId ?? randomUUID();

        const result = await this.lineageLocks.runExclusive(lineageKey, () =>
            this.repository.withLineageTransaction(lineageKey, async tx => {
                const active = await tx.findActiveInLineage(lineageKey);

                const duplicate = active.find(existing => existing.checksum === doc.checksum);
                if (duplicate) {
                    throw new DuplicateChecksumError(duplicate.docId, doc.checksum);
                }

                let explicitTarget: DocumentRecord | null = null;
                if (doc.supersedes !== undefined) {
                    explicitTarget = await tx.findDocument(doc.supersedes);
                    if (!explicitTarget) {
                        throw new NotFoundError('document', doc.supersedes);
                    }
                }

                const supersededDocIds = active.map(existing => existing.docId);
                if (explicitTarget && explicitTarget.status === 'active' && !supersededDocIds.includes(explicitTarget.docId)) {
                    supersededDocIds.push(explicitTarget.docId);
                }

                const now = this.clock();
                const previous = explicitTarget?.docId ?? active[active.length - 1]?.docId ?? null;

                // Retire first: the active-per-lineage unique index rejects the insert otherwise
                await tx.markSuperseded(supersededDocIds, now);

                await tx.insertDocument({
                    docId,
                    title: doc.title,
                    sourcePath: doc.sourcePath,
                    bu: doc.bu,
                    assetId: doc.assetId ?? null,
                    equipmentId: doc.equipmentId ?? null,
                    revLabel: doc.revLabel,
                    status: 'active',
                    validFrom: doc.validFrom ?? now,
                    validTo: null,
                    checksum: doc.checksum,
                    supersedes: previous,
                    lineageKey,
                    createdAt: now
                });

                const records: ChunkRecord[] = chunks.map((chunk, ordinal) => ({
                    chunkId: chunkIdFor(docId, ordinal),
                    docId,
                    ordinal,
                    sectionPath: chunk.sectionPath,
                    pageStart: chunk.pageStart,
                    pageEnd: chunk.pageEnd,
                    text: chunk.text,
                    createdAt: now
                }));
                await tx.insertChunks(records);

                if (previous) {
                    await tx.insertRelation({
                        type: 'supersedes',
                        src: { type: 'document', id: docId },
                        dst: { type: 'document', id: previous },
                        confidence: 1,
                        evidence: { phrase: 'ingest', checksum: doc.checksum }
                    });
                }

                const stored: IngestedDocument = {
                    docId,
                    chunkIds: records.map(record => record.chunkId),
                    supersededDocIds
                };
                if (beforeCommit) {
                    await beforeCommit(stored);
                }
                return stored;
            })
        );

        this.logger.info({
            docId,
            lineageKey,
            chunksCount: result.chunkIds.length,
            supersededDocIds: result.supersededDocIds
        }, 'Document version stored');

        return result;
    }

    /**
     * Lock-free precheck used by the ingestion pipeline before it spends
     * embedding calls; `ingestDocument` re-checks under the lineage lock.
     */
    async findActiveDuplicate(doc: NewDocument): Promise<DocumentRecord | null> {
        return await this.repository.findActiveByChecksum(lineageKeyFor(doc), doc.checksum);
    }

    async lexicalSearch(expression: MatchExpression, filters: LexicalFilters, limit: number): Promise<LexicalSearchResult> {
        const hits = await this.repository.lexicalSearch(expression, filters, limit);

        this.logger.debug({
            expression: expression.source,
            filters,
            limit,
            resultsCount: hits.length
        }, 'Lexical search completed');

        return { hits, scoreOrder: this.repository.lexicalScoreOrder };
    }

    async getDocument(docId: string): Promise<DocumentRecord> {
        const document = await this.repository.findDocument(docId);
        if (!document) {
            throw new NotFoundError('document', docId);
        }
        return document;
    }

    async getChunk(chunkId: string): Promise<ChunkRecord> {
        const chunk = await this.repository.findChunk(chunkId);
        if (!chunk) {
            throw new NotFoundError('chunk', chunkId);
        }
        return chunk;
    }

    async getChunkContexts(chunkIds: string[]): Promise<ChunkContext[]> {
        return await this.repository.findChunkContexts(Array.from(new Set(chunkIds)));
    }

    async listChunks(docId: string): Promise<ChunkRecord[]> {
        await this.getDocument(docId);
        return await this.repository.findChunksByDocument(docId);
    }

    async listActiveChunkIds(): Promise<string[]> {
        return await this.repository.findActiveChunkIds();
    }

    async chunksExist(chunkIds: string[]): Promise<Set<string>> {
        return await this.repository.chunksExist(chunkIds);
    }

    async updateDocumentMetadata(docId: string, patch: DocumentMetadataPatch): Promise<DocumentRecord> {
        const updated = await this.repository.updateDocument(docId, patch);
        if (!updated) {
            throw new NotFoundError('document', docId);
        }

        this.logger.info({ docId, fields: Object.keys(patch) }, 'Document metadata updated');
        return updated;
    }

    /**
     * Take an active document out of retrieval. The row stays (superseded,
     * valid_to = now); returns its chunk ids so their vectors can be removed.
     */
    async retireDocument(docId: string): Promise<string[]> {
        const document = await this.getDocument(docId);

        await this.lineageLocks.runExclusive(document.lineageKey, () =>
            this.repository.withLineageTransaction(document.lineageKey, async tx => {
                const current = await tx.findDocument(docId);
                if (current?.status === 'active') {
                    await tx.markSuperseded([docId], this.clock());
                }
            })
        );

        const chunks = await this.repository.findChunksByDocument(docId);
        this.logger.info({ docId, chunksCount: chunks.length }, 'Document retired');
        return chunks.map(chunk => chunk.chunkId);
    }
}

// Singleton instance
let chunkStoreService: ChunkStoreService | null = null;

export function getChunkStoreService(): ChunkStoreService {
    if (!chunkStoreService) {
        chunkStoreService = ChunkStoreService.create();
    }
    return chunkStoreService;
}
