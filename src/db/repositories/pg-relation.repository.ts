import { Brackets, DataSource, In } from 'typeorm';
import { randomUUID } from 'crypto';
import { RelationEntity } from '../entities/relation.entity';
import { ChunkEntityLinkEntity } from '../entities/chunk-entity-link.entity';
import { KnowledgeEntityEntity } from '../entities/knowledge-entity.entity';
import { RelationRepository } from '../interfaces';
import { toRelationRecord } from '../mappers';
import type {
    ChunkMention,
    EntityRecord,
    NewRelation,
    ObjectRef,
    RelationRecord,
    RelationType
} from '../../types/retrieval';

export class PgRelationRepository implements RelationRepository {
    constructor(private dataSource: DataSource) { }

    async findOutgoing(sources: ObjectRef[], types: RelationType[]): Promise<RelationRecord[]> {
        if (sources.length === 0 || types.length === 0) {
            return [];
        }

        const idsByType = new Map<string, string[]>();
        for (const source of sources) {
            const ids = idsByType.get(source.type) ?? [];
            ids.push(source.id);
            idsByType.set(source.type, ids);
        }

        const rows = await this.dataSource
            .getRepository(RelationEntity)
            .createQueryBuilder('r')
            .where('r.type IN (:...types)', { types })
            .andWhere(new Brackets(qb => {
                let index = 0;
                for (const [srcType, ids] of idsByType) {
                    const clause = `(r.src_type = :srcType${index} AND r.src_id IN (:...srcIds${index}))`;
                    const params = { [`srcType${index}`]: srcType, [`srcIds${index}`]: ids };
                    if (index === 0) {
                        qb.where(clause, params);
                    } else {
                        qb.orWhere(clause, params);
                    }
                    index++;
                }
            }))
            .orderBy('r.confidence', 'DESC')
            .addOrderBy('r.relation_id', 'ASC')
            .getMany();

        return rows.map(toRelationRecord);
    }

    async findMentions(entityIds: string[]): Promise<ChunkMention[]> {
        if (entityIds.length === 0) {
            return [];
        }
        const rows = await this.dataSource.getRepository(ChunkEntityLinkEntity).find({
            where: { entity_id: In(entityIds) },
            order: { confidence: 'DESC', chunk_id: 'ASC' }
        });
        return rows.map(row => ({
            chunkId: row.chunk_id,
            entityId: row.entity_id,
            spanStart: row.span_start ?? undefined,
            spanEnd: row.span_end ?? undefined,
            confidence: row.confidence
        }));
    }

    async saveEntity(entity: EntityRecord): Promise<void> {
        await this.dataSource.getRepository(KnowledgeEntityEntity).save({
            entity_id: entity.entityId,
            kind: entity.kind,
            canonical_name: entity.canonicalName,
            alt_labels: entity.altLabels
        });
    }

    async saveMentions(mentions: ChunkMention[]): Promise<void> {
        if (mentions.length === 0) {
            return;
        }
        await this.dataSource.getRepository(ChunkEntityLinkEntity).save(mentions.map(mention => ({
            chunk_id: mention.chunkId,
            entity_id: mention.entityId,
            span_start: mention.spanStart ?? null,
            span_end: mention.spanEnd ?? null,
            confidence: mention.confidence
        })));
    }

    async saveRelation(relation: NewRelation): Promise<RelationRecord> {
        const row = await this.dataSource.getRepository(RelationEntity).save({
            relation_id: randomUUID(),
            type: relation.type,
            src_type: relation.src.type,
            src_id: relation.src.id,
            dst_type: relation.dst.type,
            dst_id: relation.dst.id,
            confidence: relation.confidence,
            evidence: relation.evidence
        });
        return {
            ...relation,
            relationId: row.relation_id,
            createdAt: row.created_at
        };
    }
}
