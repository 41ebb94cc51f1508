import { DataSource, EntityManager, In } from 'typeorm';
import { DocumentEntity } from '../entities/document.entity';
import { ChunkEntity } from '../entities/chunk.entity';
import { RelationEntity } from '../entities/relation.entity';
import { ChunkRepository, LineageTransaction } from '../interfaces';
import { fromChunkRecord, fromDocumentRecord, toChunkRecord, toDocumentRecord } from '../mappers';
import { MatchExpression, toTsQuery } from '../../services/match-expression';
import { randomUUID } from 'crypto';
import type {
    ChunkContext,
    ChunkRecord,
    DocumentMetadataPatch,
    DocumentRecord,
    LexicalFilters,
    LexicalHit,
    NewRelation,
    ScoreOrder
} from '../../types/retrieval';

interface LexicalRow {
    chunk_id: string;
    doc_id: string;
    section_path: string;
    page_start: number;
    page_end: number;
    raw_score: number | string;
}

class PgLineageTransaction implements LineageTransaction {
    constructor(private manager: EntityManager) { }

    async findActiveInLineage(lineageKey: string): Promise<DocumentRecord[]> {
        const rows = await this.manager.find(DocumentEntity, {
            where: { lineage_key: lineageKey, status: 'active' },
            order: { created_at: 'ASC' }
        });
        return rows.map(toDocumentRecord);
    }

    async findDocument(docId: string): Promise<DocumentRecord | null> {
        const row = await this.manager.findOne(DocumentEntity, { where: { doc_id: docId } });
        return row ? toDocumentRecord(row) : null;
    }

    async insertDocument(document: DocumentRecord): Promise<void> {
        await this.manager.insert(DocumentEntity, fromDocumentRecord(document));
    }

    async insertChunks(chunks: ChunkRecord[]): Promise<void> {
        await this.manager.insert(ChunkEntity, chunks.map(fromChunkRecord));
    }

    async markSuperseded(docIds: string[], at: Date): Promise<void> {
        if (docIds.length === 0) {
            return;
        }
        await this.manager.update(DocumentEntity, { doc_id: In(docIds) }, { status: 'superseded', valid_to: at });
    }

    async insertRelation(relation: NewRelation): Promise<void> {
        await this.manager.insert(RelationEntity, {
            relation_id: randomUUID(),
            type: relation.type,
            src_type: relation.src.type,
            src_id: relation.src.id,
            dst_type: relation.dst.type,
            dst_id: relation.dst.id,
            confidence: relation.confidence,
            evidence: relation.evidence
        });
    }
}

/**
 * Postgres chunk store backend.
 *
 * Lexical search uses the generated `text_tsv` column with `ts_rank_cd`,
 * so raw scores are higher-is-better.
 */
export class PgChunkRepository implements ChunkRepository {
    readonly lexicalScoreOrder: ScoreOrder = 'higher-is-better';

    constructor(private dataSource: DataSource) { }

    private get documents() {
        return this.dataSource.getRepository(DocumentEntity);
    }

    private get chunks() {
        return this.dataSource.getRepository(ChunkEntity);
    }

    async withLineageTransaction<T>(lineageKey: string, work: (tx: LineageTransaction) => Promise<T>): Promise<T> {
        return await this.dataSource.transaction(async manager => {
            // Serialises supersedence for this lineage across processes; released on commit/rollback
            await manager.query('SELECT pg_advisory_xact_lock(hashtext($1))', [lineageKey]);
            return await work(new PgLineageTransaction(manager));
        });
    }

    async findDocument(docId: string): Promise<DocumentRecord | null> {
        const row = await this.documents.findOne({ where: { doc_id: docId } });
        return row ? toDocumentRecord(row) : null;
    }

    async findActiveByChecksum(lineageKey: string, checksum: string): Promise<DocumentRecord | null> {
        const row = await this.documents.findOne({
            where: { lineage_key: lineageKey, checksum, status: 'active' }
        });
        return row ? toDocumentRecord(row) : null;
    }

    async findChunk(chunkId: string): Promise<ChunkRecord | null> {
        const row = await this.chunks.findOne({ where: { chunk_id: chunkId } });
        return row ? toChunkRecord(row) : null;
    }

    async findChunksByDocument(docId: string): Promise<ChunkRecord[]> {
        const rows = await this.chunks.find({
            where: { doc_id: docId },
            order: { ordinal: 'ASC' }
        });
        return rows.map(toChunkRecord);
    }

    async findChunkContexts(chunkIds: string[]): Promise<ChunkContext[]> {
        if (chunkIds.length === 0) {
            return [];
        }
        const rows = await this.chunks.find({
            where: { chunk_id: In(chunkIds) },
            relations: { document: true }
        });
        return rows.map(row => ({
            chunk: toChunkRecord(row),
            document: toDocumentRecord(row.document)
        }));
    }

    async findActiveChunkIds(): Promise<string[]> {
        const rows = await this.chunks
            .createQueryBuilder('c')
            .innerJoin(DocumentEntity, 'd', 'd.doc_id = c.doc_id')
            .select('c.chunk_id', 'chunk_id')
            .where('d.status = :status', { status: 'active' })
            .orderBy('c.chunk_id', 'ASC')
            .getRawMany<{ chunk_id: string }>();
        return rows.map(row => row.chunk_id);
    }

    async chunksExist(chunkIds: string[]): Promise<Set<string>> {
        if (chunkIds.length === 0) {
            return new Set();
        }
        const rows = await this.chunks.find({
            select: { chunk_id: true },
            where: { chunk_id: In(chunkIds) }
        });
        return new Set(rows.map(row => row.chunk_id));
    }

    async lexicalSearch(expression: MatchExpression, filters: LexicalFilters, limit: number): Promise<LexicalHit[]> {
        const tsquery = toTsQuery(expression);

        const query = this.chunks
            .createQueryBuilder('c')
            .innerJoin(DocumentEntity, 'd', 'd.doc_id = c.doc_id')
            .select('c.chunk_id', 'chunk_id')
            .addSelect('c.doc_id', 'doc_id')
            .addSelect('c.section_path', 'section_path')
            .addSelect('c.page_start', 'page_start')
            .addSelect('c.page_end', 'page_end')
            .addSelect(`ts_rank_cd(c.text_tsv, to_tsquery('english', :tsquery))`, 'raw_score')
            .where(`c.text_tsv @@ to_tsquery('english', :tsquery)`, { tsquery });

        if (!filters.includeHistorical) {
            query.andWhere('d.status = :status', { status: 'active' });
        }
        if (filters.bu !== undefined) {
            query.andWhere('d.bu = :bu', { bu: filters.bu });
        }
        if (filters.assetId !== undefined) {
            query.andWhere('d.asset_id = :assetId', { assetId: filters.assetId });
        }
        if (filters.equipmentId !== undefined) {
            query.andWhere('d.equipment_id = :equipmentId', { equipmentId: filters.equipmentId });
        }

        const rows = await query
            .orderBy('raw_score', 'DESC')
            .addOrderBy('c.chunk_id', 'ASC')
            .limit(limit)
            .getRawMany<LexicalRow>();

        return rows.map(row => ({
            chunkId: row.chunk_id,
            docId: row.doc_id,
            sectionPath: row.section_path,
            pageStart: row.page_start,
            pageEnd: row.page_end,
            rawScore: Number(row.raw_score)
        }));
    }

    async updateDocument(docId: string, patch: DocumentMetadataPatch): Promise<DocumentRecord | null> {
        const changes: Partial<DocumentEntity> = {};
        if (patch.title !== undefined) changes.title = patch.title;
        if (patch.revLabel !== undefined) changes.rev_label = patch.revLabel;
        if (patch.sourcePath !== undefined) changes.source_path = patch.sourcePath;

        if (Object.keys(changes).length > 0) {
            await this.documents.update({ doc_id: docId }, changes);
        }
        return await this.findDocument(docId);
    }
}
