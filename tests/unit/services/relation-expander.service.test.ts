import { describe, it, expect, beforeEach, vi } from 'vitest';
import { RelationExpanderService } from '../../../src/services/relation-expander.service';
import { ChunkStoreService } from '../../../src/services/chunk-store.service';
import type { FusedCandidate, NewRelation, ObjectRef } from '../../../src/types/retrieval';
import { MemoryChunkRepository, MemoryRelationRepository } from '../../helpers/memory-repositories';
import { createMockLogger, draft, newDocument } from '../../helpers/fixtures';

vi.mock('../../../src/db/data-source', () => ({ AppDataSource: {} }));

function primary(chunkId: string): FusedCandidate {
    return {
        chunkId,
        docId: chunkId.split(':')[0],
        sectionPath: '',
        pageStart: 1,
        pageEnd: 1,
        lexicalScore: 1,
        vectorScore: 1,
        boost: 0,
        finalScore: 1,
        matchedBy: ['lexical', 'vector']
    };
}

const chunk = (id: string): ObjectRef => ({ type: 'chunk', id });
const doc = (id: string): ObjectRef => ({ type: 'document', id });

function seeAlso(src: ObjectRef, dst: ObjectRef, confidence: number): NewRelation {
    return { type: 'seeAlso', src, dst, confidence, evidence: { phrase: 'see also', page: 1 } };
}

describe('Relation Expander Service - Dependency Injection Tests', () => {
    let relations: MemoryRelationRepository;
    let expander: RelationExpanderService;

    beforeEach(async () => {
        const logger = createMockLogger();
        const chunkStore = new ChunkStoreService(new MemoryChunkRepository(), logger);
        relations = new MemoryRelationRepository();
        expander = new RelationExpanderService(relations, chunkStore, logger, { cap: 2, minConfidence: 0.5 });

        await chunkStore.ingestDocument(newDocument({ docId: 'main', checksum: 'm' }), [draft('main')]);
        await chunkStore.ingestDocument(
            newDocument({ docId: 'lube', title: 'Lube Oil System', checksum: 'l' }),
            [draft('lube page two', 2), draft('lube page one', 1)]
        );
        await chunkStore.ingestDocument(newDocument({ docId: 'seal-a', title: 'Seal Manual', checksum: 'sa' }), [draft('seal a')]);
        await chunkStore.ingestDocument(newDocument({ docId: 'seal-b', title: 'Seal Manual', checksum: 'sb' }), [draft('seal b')]);
        await chunkStore.ingestDocument(newDocument({ docId: 'extra', title: 'Extra Notes', checksum: 'e' }), [draft('extra')]);
    });

    it('should append the most confident targets up to the cap', async () => {
        await expander.recordRelation(seeAlso(chunk('main:0000'), chunk('extra:0000'), 0.6));
        await expander.recordRelation(seeAlso(chunk('main:0000'), chunk('seal-b:0000'), 0.9));
        await expander.recordRelation({
            type: 'appliesToAsset',
            src: doc('main'),
            dst: doc('lube'),
            confidence: 0.8,
            evidence: { phrase: 'applies to K-101' }
        });

        const supplementary = await expander.expand([primary('main:0000')]);

        expect(supplementary.map(s => s.chunkId)).toEqual(['seal-b:0000', 'lube:0001']);
        expect(supplementary[0]).toEqual({
            chunkId: 'seal-b:0000',
            docId: 'seal-b',
            sectionPath: '1 Scope',
            pageStart: 1,
            pageEnd: 1,
            relationType: 'seeAlso',
            sourceChunkId: 'main:0000',
            confidence: 0.9,
            evidence: { phrase: 'see also', page: 1 }
        });
    });

    it('should skip unevidenced, weak, superseded and already present targets', async () => {
        await relations.saveRelation({ ...seeAlso(chunk('main:0000'), chunk('lube:0000'), 0.95), evidence: null });
        await expander.recordRelation(seeAlso(chunk('main:0000'), chunk('lube:0001'), 0.4));
        await expander.recordRelation(seeAlso(chunk('main:0000'), chunk('seal-a:0000'), 0.9));
        await expander.recordRelation(seeAlso(chunk('main:0000'), chunk('extra:0000'), 0.8));
        await expander.recordRelation(seeAlso(chunk('extra:0000'), chunk('main:0000'), 0.8));

        const supplementary = await expander.expand([primary('main:0000'), primary('extra:0000')]);

        expect(supplementary).toEqual([]);
    });

    it('should resolve entity targets through their mentions', async () => {
        await expander.recordEntity({ entityId: 'ent-k101', kind: 'asset', canonicalName: 'K-101', altLabels: ['K101'] });
        await expander.recordMentions([
            { chunkId: 'lube:0000', entityId: 'ent-k101', confidence: 0.6 },
            { chunkId: 'extra:0000', entityId: 'ent-k101', confidence: 0.9 }
        ]);
        await expander.recordRelation({
            type: 'appliesToEquipment',
            src: chunk('main:0000'),
            dst: { type: 'entity', id: 'ent-k101' },
            confidence: 0.7,
            evidence: { phrase: 'K-101 train' }
        });

        const supplementary = await expander.expand([primary('main:0000')]);

        expect(supplementary.map(s => [s.chunkId, s.relationType])).toEqual([
            ['extra:0000', 'appliesToEquipment'],
            ['lube:0000', 'appliesToEquipment']
        ]);
    });

    it('should ignore document targets that do not exist', async () => {
        await expander.recordRelation(seeAlso(chunk('main:0000'), doc('missing'), 0.9));

        await expect(expander.expand([primary('main:0000')])).resolves.toEqual([]);
    });

    it('should refuse mentions of chunks that do not exist', async () => {
        await expect(expander.recordMentions([
            { chunkId: 'extra:0000', entityId: 'ent-k101', confidence: 0.8 },
            { chunkId: 'gone:0003', entityId: 'ent-k101', confidence: 0.8 }
        ])).rejects.toThrow('chunk not found: gone:0003');
        expect(relations.mentions).toEqual([]);
    });

    it('should reject confidence outside [0, 1]', async () => {
        await expect(expander.recordRelation(seeAlso(chunk('main:0000'), chunk('extra:0000'), 1.5)))
            .rejects.toThrow('confidence must be within [0, 1], got 1.5');
        await expect(expander.recordMentions([{ chunkId: 'extra:0000', entityId: 'e', confidence: -0.1 }]))
            .rejects.toBeInstanceOf(RangeError);
    });
});
