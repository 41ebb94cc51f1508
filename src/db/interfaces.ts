/**
 * Persistence Ports
 *
 * Contracts between the retrieval services and their storage. Postgres
 * implementations live in `./repositories`; tests provide in-process ones.
 */
import type { MatchExpression } from '../services/match-expression';
import type {
    ChunkContext,
    ChunkMention,
    ChunkRecord,
    DocumentMetadataPatch,
    DocumentRecord,
    EmbeddingRecord,
    EntityRecord,
    LexicalFilters,
    LexicalHit,
    NewRelation,
    ObjectRef,
    RelationRecord,
    RelationType,
    ScoreOrder,
    VectorMapEntry
} from '../types/retrieval';

/**
 * Work performed while holding a lineage's write lock. Everything done through
 * one transaction object commits together or not at all.
 */
export interface LineageTransaction {
    findActiveInLineage(lineageKey: string): Promise<DocumentRecord[]>;
    findDocument(docId: string): Promise<DocumentRecord | null>;
    insertDocument(document: DocumentRecord): Promise<void>;
    insertChunks(chunks: ChunkRecord[]): Promise<void>;
    markSuperseded(docIds: string[], at: Date): Promise<void>;
    insertRelation(relation: NewRelation): Promise<void>;
}

export interface ChunkRepository {
    /** Orientation of `LexicalHit.rawScore` for this backend */
    readonly lexicalScoreOrder: ScoreOrder;

    withLineageTransaction<T>(lineageKey: string, work: (tx: LineageTransaction) => Promise<T>): Promise<T>;
    findDocument(docId: string): Promise<DocumentRecord | null>;
    findActiveByChecksum(lineageKey: string, checksum: string): Promise<DocumentRecord | null>;
    findChunk(chunkId: string): Promise<ChunkRecord | null>;
    findChunksByDocument(docId: string): Promise<ChunkRecord[]>;
    findChunkContexts(chunkIds: string[]): Promise<ChunkContext[]>;
    findActiveChunkIds(): Promise<string[]>;
    chunksExist(chunkIds: string[]): Promise<Set<string>>;
    lexicalSearch(expression: MatchExpression, filters: LexicalFilters, limit: number): Promise<LexicalHit[]>;
    updateDocument(docId: string, patch: DocumentMetadataPatch): Promise<DocumentRecord | null>;
}

export interface RelationRepository {
    findOutgoing(sources: ObjectRef[], types: RelationType[]): Promise<RelationRecord[]>;
    findMentions(entityIds: string[]): Promise<ChunkMention[]>;
    saveEntity(entity: EntityRecord): Promise<void>;
    saveMentions(mentions: ChunkMention[]): Promise<void>;
    saveRelation(relation: NewRelation): Promise<RelationRecord>;
}

export interface EmbeddingRecordRepository {
    find(chunkId: string, model: string): Promise<EmbeddingRecord | null>;
    /** Insert unless the key exists; returns whichever record is stored */
    insertIfAbsent(record: EmbeddingRecord): Promise<EmbeddingRecord>;
    listChunkIds(model: string): Promise<string[]>;
    deleteMany(chunkIds: string[], model: string): Promise<number>;
}

export interface VectorMapRepository {
    nextId(): Promise<number>;
    insert(entry: VectorMapEntry): Promise<void>;
    findByChunkId(chunkId: string): Promise<VectorMapEntry | null>;
    findByFaissIds(faissIds: number[]): Promise<VectorMapEntry[]>;
    deleteByChunkId(chunkId: string): Promise<boolean>;
    deleteByFaissIds(faissIds: number[]): Promise<number>;
    listAll(model: string): Promise<VectorMapEntry[]>;
}
