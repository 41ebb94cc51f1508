import { DocumentEntity } from './entities/document.entity';
import { ChunkEntity } from './entities/chunk.entity';
import { ChunkVectorEntity } from './entities/chunk-vector.entity';
import { VectorIndexEntryEntity } from './entities/vector-index-entry.entity';
import { RelationEntity } from './entities/relation.entity';
import type {
    ChunkRecord,
    DocumentRecord,
    DocumentStatus,
    EmbeddingRecord,
    ObjectType,
    RelationEvidence,
    RelationRecord,
    RelationType,
    VectorMapEntry
} from '../types/retrieval';

const OBJECT_TYPES: readonly ObjectType[] = ['document', 'chunk', 'entity'];
const RELATION_TYPES: readonly RelationType[] = ['supersedes', 'seeAlso', 'appliesToAsset', 'appliesToEquipment', 'references'];

function toStatus(value: string): DocumentStatus {
    return value === 'superseded' ? 'superseded' : 'active';
}

function toObjectType(value: string): ObjectType {
    const found = OBJECT_TYPES.find(type => type === value);
    if (!found) {
        throw new Error(`Unknown object type in relations table: ${value}`);
    }
    return found;
}

function toRelationType(value: string): RelationType {
    const found = RELATION_TYPES.find(type => type === value);
    if (!found) {
        throw new Error(`Unknown relation type in relations table: ${value}`);
    }
    return found;
}

function toEvidence(value: Record<string, unknown> | null): RelationEvidence | null {
    if (!value) {
        return null;
    }
    const phrase = value.phrase;
    if (typeof phrase !== 'string') {
        return null;
    }
    return { ...value, phrase };
}

export function toDocumentRecord(row: DocumentEntity): DocumentRecord {
    return {
        docId: row.doc_id,
        title: row.title,
        sourcePath: row.source_path,
        bu: row.bu,
        assetId: row.asset_id,
        equipmentId: row.equipment_id,
        revLabel: row.rev_label,
        status: toStatus(row.status),
        validFrom: row.valid_from,
        validTo: row.valid_to,
        checksum: row.checksum,
        supersedes: row.supersedes,
        lineageKey: row.lineage_key,
        createdAt: row.created_at
    };
}

export function fromDocumentRecord(record: DocumentRecord): Partial<DocumentEntity> {
    return {
        doc_id: record.docId,
        title: record.title,
        source_path: record.sourcePath,
        bu: record.bu,
        asset_id: record.assetId,
        equipment_id: record.equipmentId,
        rev_label: record.revLabel,
        status: record.status,
        valid_from: record.validFrom,
        valid_to: record.validTo,
        checksum: record.checksum,
        supersedes: record.supersedes,
        lineage_key: record.lineageKey,
        created_at: record.createdAt
    };
}

export function toChunkRecord(row: ChunkEntity): ChunkRecord {
    return {
        chunkId: row.chunk_id,
        docId: row.doc_id,
        ordinal: row.ordinal,
        sectionPath: row.section_path,
        pageStart: row.page_start,
        pageEnd: row.page_end,
        text: row.text,
        createdAt: row.created_at
    };
}

export function fromChunkRecord(record: ChunkRecord): Partial<ChunkEntity> {
    return {
        chunk_id: record.chunkId,
        doc_id: record.docId,
        ordinal: record.ordinal,
        section_path: record.sectionPath,
        page_start: record.pageStart,
        page_end: record.pageEnd,
        text: record.text,
        created_at: record.createdAt
    };
}

/**
 * Float32 little-endian, the layout of the `chunk_vectors.vector` column
 */
export function encodeVector(vector: number[]): Buffer {
    const buffer = Buffer.alloc(vector.length * 4);
    vector.forEach((value, index) => buffer.writeFloatLE(value, index * 4));
    return buffer;
}

export function decodeVector(buffer: Buffer): number[] {
    const vector: number[] = [];
    for (let offset = 0; offset + 4 <= buffer.length; offset += 4) {
        vector.push(buffer.readFloatLE(offset));
    }
    return vector;
}

export function toEmbeddingRecord(row: ChunkVectorEntity): EmbeddingRecord {
    return {
        chunkId: row.chunk_id,
        model: row.model,
        dim: row.dim,
        vector: decodeVector(row.vector),
        createdAt: row.created_at
    };
}

export function toVectorMapEntry(row: VectorIndexEntryEntity): VectorMapEntry {
    return {
        faissId: Number(row.faiss_id),
        chunkId: row.chunk_id,
        model: row.model,
        createdAt: row.created_at
    };
}

export function toRelationRecord(row: RelationEntity): RelationRecord {
    return {
        relationId: row.relation_id,
        type: toRelationType(row.type),
        src: { type: toObjectType(row.src_type), id: row.src_id },
        dst: { type: toObjectType(row.dst_type), id: row.dst_id },
        confidence: row.confidence,
        evidence: toEvidence(row.evidence),
        createdAt: row.created_at
    };
}
