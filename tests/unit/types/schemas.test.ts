import { describe, it, expect } from 'vitest';
import { entityBodySchema, relationBodySchema } from '../../../src/types/schemas';

describe('Request schemas', () => {
    describe('entityBodySchema', () => {
        it('should trim names and default labels and mentions', () => {
            expect(entityBodySchema.parse({ entityId: 'ent-k101', kind: 'asset', canonicalName: ' K-101 ' })).toEqual({
                entityId: 'ent-k101',
                kind: 'asset',
                canonicalName: 'K-101',
                altLabels: [],
                mentions: []
            });
        });

        it('should reject unknown kinds and out-of-range mention confidence', () => {
            expect(entityBodySchema.safeParse({ entityId: 'e', kind: 'vendor', canonicalName: 'x' }).success).toBe(false);
            expect(entityBodySchema.safeParse({
                entityId: 'e',
                kind: 'term',
                canonicalName: 'x',
                mentions: [{ chunkId: 'manual:0000', confidence: 1.2 }]
            }).success).toBe(false);
        });
    });

    describe('relationBodySchema', () => {
        const seeAlso = {
            type: 'seeAlso',
            src: { type: 'chunk', id: 'manual:0000' },
            dst: { type: 'document', id: 'lube' },
            confidence: 0.8
        };

        it('should accept an expansion relation and default evidence to null', () => {
            expect(relationBodySchema.parse(seeAlso)).toEqual({ ...seeAlso, evidence: null });
        });

        it('should keep evidence pages and spans', () => {
            const parsed = relationBodySchema.parse({ ...seeAlso, evidence: { phrase: 'see section 4', page: 3, span: [10, 24] } });
            expect(parsed.evidence).toEqual({ phrase: 'see section 4', page: 3, span: [10, 24] });
        });

        it('should leave supersedes edges to ingestion', () => {
            expect(relationBodySchema.safeParse({ ...seeAlso, type: 'supersedes' }).success).toBe(false);
        });
    });
});
