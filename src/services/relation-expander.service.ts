import { AppDataSource } from '../db/data-source';
import { RelationRepository } from '../db/interfaces';
import { PgRelationRepository } from '../db/repositories/pg-relation.repository';
import { getSettings } from '../config/settings';
import { logger, ILogger } from '../config/logger';
import { NotFoundError, RetrievalErrorCode, isRetrievalError } from '../types/errors';
import { IChunkStore, getChunkStoreService } from './chunk-store.service';
import type {
    ChunkMention,
    EntityRecord,
    FusedCandidate,
    NewRelation,
    ObjectRef,
    RelationEvidence,
    RelationRecord,
    RelationType,
    SupplementaryCandidate
} from '../types/retrieval';

export interface IRelationExpander {
    expand(primaries: FusedCandidate[]): Promise<SupplementaryCandidate[]>;
}

export interface RelationExpanderOptions {
    /** Supplementary candidates allowed per primary chunk */
    cap: number;
    minConfidence: number;
}

type EvidencedRelation = RelationRecord & { evidence: RelationEvidence };

export const EXPANSION_RELATION_TYPES: RelationType[] = ['seeAlso', 'appliesToAsset', 'appliesToEquipment'];

function refKey(ref: ObjectRef): string {
    return `${ref.type}:${ref.id}`;
}

function byConfidence(a: RelationRecord, b: RelationRecord): number {
    if (a.confidence !== b.confidence) {
        return b.confidence - a.confidence;
    }
    return a.relationId < b.relationId ? -1 : a.relationId > b.relationId ? 1 : 0;
}

function assertConfidence(confidence: number): void {
    if (!(confidence >= 0 && confidence <= 1)) {
        throw new RangeError(`confidence must be within [0, 1], got ${confidence}`);
    }
}

/**
 * Relation Expander Service
 *
 * Appends related chunks after the primary results. Only relations carrying
 * evidence and enough confidence are followed, targets must belong to an
 * active document, and a primary never yields more than `cap` additions.
 */
export class RelationExpanderService implements IRelationExpander {
    constructor(
        private repository: RelationRepository,
        private chunkStore: IChunkStore,
        private logger: ILogger,
        private options: RelationExpanderOptions
    ) { }

    /**
     * Factory method for production use
     */
    static create(): RelationExpanderService {
        const settings = getSettings();
        return new RelationExpanderService(
            new PgRelationRepository(AppDataSource),
            getChunkStoreService(),
            logger,
            { cap: settings.relationExpansionCap, minConfidence: settings.relationMinConfidence }
        );
    }

    async expand(primaries: FusedCandidate[]): Promise<SupplementaryCandidate[]> {
        if (primaries.length === 0 || this.options.cap === 0) {
            return [];
        }

        const sources = new Map<string, ObjectRef>();
        for (const primary of primaries) {
            const chunkRef: ObjectRef = { type: 'chunk', id: primary.chunkId };
            const documentRef: ObjectRef = { type: 'document', id: primary.docId };
            sources.set(refKey(chunkRef), chunkRef);
            sources.set(refKey(documentRef), documentRef);
        }

        const relations = await this.repository.findOutgoing(Array.from(sources.values()), EXPANSION_RELATION_TYPES);
        const bySource = new Map<string, EvidencedRelation[]>();
        for (const relation of relations) {
            if (!this.isFollowable(relation)) {
                continue;
            }
            const key = refKey(relation.src);
            const list = bySource.get(key) ?? [];
            list.push(relation);
            bySource.set(key, list);
        }

        const present = new Set(primaries.map(primary => primary.chunkId));
        const supplementary: SupplementaryCandidate[] = [];

        for (const primary of primaries) {
            const candidates = [
                ...(bySource.get(`chunk:${primary.chunkId}`) ?? []),
                ...(bySource.get(`document:${primary.docId}`) ?? [])
            ].sort(byConfidence);

            let added = 0;
            for (const relation of candidates) {
                if (added >= this.options.cap) {
                    break;
                }

                const targetIds = await this.resolveTarget(relation.dst);
                const contexts = await this.chunkStore.getChunkContexts(targetIds);
                const contextByChunk = new Map(contexts.map(context => [context.chunk.chunkId, context]));

                for (const targetId of targetIds) {
                    if (added >= this.options.cap) {
                        break;
                    }
                    const context = contextByChunk.get(targetId);
                    if (!context || context.document.status !== 'active' || present.has(targetId)) {
                        continue;
                    }

                    present.add(targetId);
                    added++;
                    supplementary.push({
                        chunkId: targetId,
                        docId: context.chunk.docId,
                        sectionPath: context.chunk.sectionPath,
                        pageStart: context.chunk.pageStart,
                        pageEnd: context.chunk.pageEnd,
                        relationType: relation.type,
                        sourceChunkId: primary.chunkId,
                        confidence: relation.confidence,
                        evidence: relation.evidence
                    });
                }
            }
        }

        this.logger.debug({
            primariesCount: primaries.length,
            relationsCount: relations.length,
            supplementaryCount: supplementary.length
        }, 'Relation expansion completed');

        return supplementary;
    }

    async recordEntity(entity: EntityRecord): Promise<void> {
        await this.repository.saveEntity(entity);
    }

    async recordMentions(mentions: ChunkMention[]): Promise<void> {
        mentions.forEach(mention => assertConfidence(mention.confidence));

        const existing = await this.chunkStore.chunksExist(mentions.map(mention => mention.chunkId));
        const unknown = mentions.find(mention => !existing.has(mention.chunkId));
        if (unknown) {
            throw new NotFoundError('chunk', unknown.chunkId);
        }

        await this.repository.saveMentions(mentions);
        this.logger.info({ mentionsCount: mentions.length }, 'Entity mentions recorded');
    }

    async recordRelation(relation: NewRelation): Promise<RelationRecord> {
        assertConfidence(relation.confidence);
        const saved = await this.repository.saveRelation(relation);

        this.logger.info({
            relationId: saved.relationId,
            type: saved.type,
            src: refKey(saved.src),
            dst: refKey(saved.dst)
        }, 'Relation recorded');
        return saved;
    }

    private isFollowable(relation: RelationRecord): relation is EvidencedRelation {
        return relation.evidence !== null && relation.confidence >= this.options.minConfidence;
    }

    /**
     * Chunk ids a relation target stands for, best first.
     */
    private async resolveTarget(target: ObjectRef): Promise<string[]> {
        switch (target.type) {
            case 'chunk':
                return [target.id];
            case 'document': {
                try {
                    const chunks = await this.chunkStore.listChunks(target.id);
                    const first = [...chunks].sort((a, b) =>
                        a.pageStart - b.pageStart || (a.chunkId < b.chunkId ? -1 : a.chunkId > b.chunkId ? 1 : 0)
                    )[0];
                    return first ? [first.chunkId] : [];
                } catch (error: unknown) {
                    if (isRetrievalError(error, RetrievalErrorCode.NOT_FOUND)) {
                        return [];
                    }
                    throw error;
                }
            }
            case 'entity': {
                const mentions = await this.repository.findMentions([target.id]);
                return [...mentions]
                    .sort((a, b) =>
                        b.confidence - a.confidence || (a.chunkId < b.chunkId ? -1 : a.chunkId > b.chunkId ? 1 : 0)
                    )
                    .map(mention => mention.chunkId);
            }
        }
    }
}

// Singleton instance
let relationExpanderService: RelationExpanderService | null = null;

export function getRelationExpanderService(): RelationExpanderService {
    if (!relationExpanderService) {
        relationExpanderService = RelationExpanderService.create();
    }
    return relationExpanderService;
}
