/**
 * Domain types shared by the chunk store, vector index, fusion engine and
 * citation builder. Persistence shapes live in `src/db/entities`; these are
 * the plain records that cross service boundaries.
 */

export type DocumentStatus = 'active' | 'superseded';

export interface DocumentRecord {
    docId: string;
    title: string;
    sourcePath: string;
    bu: string;
    assetId: string | null;
    equipmentId: string | null;
    revLabel: string;
    status: DocumentStatus;
    validFrom: Date;
    validTo: Date | null;
    checksum: string;
    supersedes: string | null;
    lineageKey: string;
    createdAt: Date;
}

export interface NewDocument {
    docId?: string;
    title: string;
    sourcePath: string;
    bu: string;
    assetId?: string;
    equipmentId?: string;
    revLabel: string;
    checksum: string;
    supersedes?: string;
    lineageKey?: string;
    validFrom?: Date;
}

export interface DocumentMetadataPatch {
    title?: string;
    revLabel?: string;
    sourcePath?: string;
}

// Extractor output
export interface TextBlock {
    text: string;
    page: number;
    headingLevel?: number;
}

// Chunker output
export interface ChunkDraft {
    text: string;
    sectionPath: string;
    pageStart: number;
    pageEnd: number;
}

export interface ChunkRecord extends ChunkDraft {
    chunkId: string;
    docId: string;
    ordinal: number;
    createdAt: Date;
}

export interface ChunkContext {
    chunk: ChunkRecord;
    document: DocumentRecord;
}

export interface IngestedDocument {
    docId: string;
    chunkIds: string[];
    supersededDocIds: string[];
}

export interface SearchFilters {
    bu?: string;
    assetId?: string;
    equipmentId?: string;
}

export interface LexicalFilters extends SearchFilters {
    includeHistorical?: boolean;
}

export type ScoreOrder = 'higher-is-better' | 'lower-is-better';

export interface LexicalHit {
    chunkId: string;
    docId: string;
    sectionPath: string;
    pageStart: number;
    pageEnd: number;
    rawScore: number;
}

export interface LexicalSearchResult {
    hits: LexicalHit[];
    scoreOrder: ScoreOrder;
}

export interface VectorHit {
    chunkId: string;
    faissId: number;
    similarity: number;
}

export interface VectorSearchResult {
    hits: VectorHit[];
    danglingIds: number[];
}

export interface EmbeddingRecord {
    chunkId: string;
    model: string;
    dim: number;
    vector: number[];
    createdAt: Date;
}

export interface VectorMapEntry {
    faissId: number;
    chunkId: string;
    model: string;
    createdAt: Date;
}

/**
 * Parsed user intent. Absent slots mean "no constraint"; an empty string is
 * never used as a sentinel.
 */
export interface QuerySlots {
    topic?: string;
    asset?: string;
    equipment?: string;
    bu?: string;
    latestOnly?: boolean;
}

export interface QuerySpec {
    intent: string;
    slots: QuerySlots;
}

export type RetrievalSource = 'lexical' | 'vector';

export interface FusedCandidate {
    chunkId: string;
    docId: string;
    sectionPath: string;
    pageStart: number;
    pageEnd: number;
    lexicalScore: number;
    vectorScore: number;
    boost: number;
    finalScore: number;
    matchedBy: RetrievalSource[];
}

export type ObjectType = 'document' | 'chunk' | 'entity';

export interface ObjectRef {
    type: ObjectType;
    id: string;
}

export type RelationType =
    | 'supersedes'
    | 'seeAlso'
    | 'appliesToAsset'
    | 'appliesToEquipment'
    | 'references';

export interface RelationEvidence {
    phrase: string;
    page?: number;
    span?: [number, number];
    [key: string]: unknown;
}

export interface RelationRecord {
    relationId: string;
    type: RelationType;
    src: ObjectRef;
    dst: ObjectRef;
    confidence: number;
    evidence: RelationEvidence | null;
    createdAt: Date;
}

export type NewRelation = Omit<RelationRecord, 'relationId' | 'createdAt'>;

export type EntityKind = 'asset' | 'equipment' | 'standard' | 'term';

export interface EntityRecord {
    entityId: string;
    kind: EntityKind;
    canonicalName: string;
    altLabels: string[];
}

export interface ChunkMention {
    chunkId: string;
    entityId: string;
    spanStart?: number;
    spanEnd?: number;
    confidence: number;
}

export interface SupplementaryCandidate {
    chunkId: string;
    docId: string;
    sectionPath: string;
    pageStart: number;
    pageEnd: number;
    relationType: RelationType;
    sourceChunkId: string;
    confidence: number;
    evidence: RelationEvidence;
}

export interface FusionDiagnostics {
    lexicalHits: number;
    vectorHits: number;
    danglingIds: Array<number | string>;
    filteredOut: number;
    elapsedMs: number;
}

export interface FusionResult {
    candidates: FusedCandidate[];
    supplementary: SupplementaryCandidate[];
    degraded: boolean;
    degradedSources: RetrievalSource[];
    diagnostics: FusionDiagnostics;
}

export interface Citation {
    docId: string;
    title: string;
    revLabel: string;
    sectionPath: string;
    pages: [number, number];
    chunkId: string;
    sourcePathWithPageAnchor: string;
}
