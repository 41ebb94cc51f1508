import { DataSource, In } from 'typeorm';
import { ChunkVectorEntity } from '../entities/chunk-vector.entity';
import { EmbeddingRecordRepository } from '../interfaces';
import { encodeVector, toEmbeddingRecord } from '../mappers';
import type { EmbeddingRecord } from '../../types/retrieval';

export class PgEmbeddingRepository implements EmbeddingRecordRepository {
    constructor(private dataSource: DataSource) { }

    private get vectors() {
        return this.dataSource.getRepository(ChunkVectorEntity);
    }

    async find(chunkId: string, model: string): Promise<EmbeddingRecord | null> {
        const row = await this.vectors.findOne({ where: { chunk_id: chunkId, model } });
        return row ? toEmbeddingRecord(row) : null;
    }

    async insertIfAbsent(record: EmbeddingRecord): Promise<EmbeddingRecord> {
        await this.vectors
            .createQueryBuilder()
            .insert()
            .into(ChunkVectorEntity)
            .values({
                chunk_id: record.chunkId,
                model: record.model,
                dim: record.dim,
                vector: encodeVector(record.vector),
                created_at: record.createdAt
            })
            .orIgnore()
            .execute();

        return (await this.find(record.chunkId, record.model)) ?? record;
    }

    async listChunkIds(model: string): Promise<string[]> {
        const rows = await this.vectors.find({
            select: { chunk_id: true },
            where: { model },
            order: { chunk_id: 'ASC' }
        });
        return rows.map(row => row.chunk_id);
    }

    async deleteMany(chunkIds: string[], model: string): Promise<number> {
        if (chunkIds.length === 0) {
            return 0;
        }
        const result = await this.vectors.delete({ chunk_id: In(chunkIds), model });
        return result.affected ?? 0;
    }
}
