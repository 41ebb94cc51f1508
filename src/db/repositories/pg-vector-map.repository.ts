import { DataSource, In } from 'typeorm';
import { VectorIndexEntryEntity } from '../entities/vector-index-entry.entity';
import { VectorMapRepository } from '../interfaces';
import { toVectorMapEntry } from '../mappers';
import type { VectorMapEntry } from '../../types/retrieval';

export class PgVectorMapRepository implements VectorMapRepository {
    constructor(private dataSource: DataSource) { }

    private get entries() {
        return this.dataSource.getRepository(VectorIndexEntryEntity);
    }

    async nextId(): Promise<number> {
        const rows: Array<{ id: string }> = await this.dataSource.query(
            `SELECT nextval('vector_index_faiss_id_seq') AS id`
        );
        return Number(rows[0].id);
    }

    async insert(entry: VectorMapEntry): Promise<void> {
        await this.entries.insert({
            faiss_id: String(entry.faissId),
            chunk_id: entry.chunkId,
            model: entry.model,
            created_at: entry.createdAt
        });
    }

    async findByChunkId(chunkId: string): Promise<VectorMapEntry | null> {
        const row = await this.entries.findOne({ where: { chunk_id: chunkId } });
        return row ? toVectorMapEntry(row) : null;
    }

    async findByFaissIds(faissIds: number[]): Promise<VectorMapEntry[]> {
        if (faissIds.length === 0) {
            return [];
        }
        const rows = await this.entries.find({ where: { faiss_id: In(faissIds.map(String)) } });
        return rows.map(toVectorMapEntry);
    }

    async deleteByChunkId(chunkId: string): Promise<boolean> {
        const result = await this.entries.delete({ chunk_id: chunkId });
        return (result.affected ?? 0) > 0;
    }

    async deleteByFaissIds(faissIds: number[]): Promise<number> {
        if (faissIds.length === 0) {
            return 0;
        }
        const result = await this.entries.delete({ faiss_id: In(faissIds.map(String)) });
        return result.affected ?? 0;
    }

    async listAll(model: string): Promise<VectorMapEntry[]> {
        const rows = await this.entries.find({
            where: { model },
            order: { faiss_id: 'ASC' }
        });
        return rows.map(toVectorMapEntry);
    }
}
