import { z } from 'zod';

const identifier = z.string().trim().min(1);

/**
 * Document metadata accepted by the HTTP API and the ingestion queue.
 */
export const ingestMetadataSchema = z.object({
    title: identifier,
    bu: identifier,
    revLabel: identifier,
    sourcePath: identifier.optional(),
    assetId: identifier.optional(),
    equipmentId: identifier.optional(),
    supersedes: z.string().uuid().optional(),
    lineageKey: identifier.optional(),
    validFrom: z.coerce.date().optional()
});

export const directoryMetadataSchema = ingestMetadataSchema.omit({ title: true, sourcePath: true, supersedes: true });

export const ingestionJobSchema = z.object({
    filePath: identifier,
    metadata: ingestMetadataSchema
});

export type IngestionJobData = z.input<typeof ingestionJobSchema>;

export const querySlotsSchema = z.object({
    topic: identifier.optional(),
    asset: identifier.optional(),
    equipment: identifier.optional(),
    bu: identifier.optional(),
    latestOnly: z.boolean().optional()
});

export const searchFiltersSchema = z.object({
    bu: identifier.optional(),
    assetId: identifier.optional(),
    equipmentId: identifier.optional()
});

const objectRefSchema = z.object({
    type: z.enum(['document', 'chunk', 'entity']),
    id: identifier
});

const confidenceSchema = z.number().min(0).max(1);

/**
 * Entity with the chunks that mention it, as written by `POST /entities`.
 */
export const entityBodySchema = z.object({
    entityId: identifier,
    kind: z.enum(['asset', 'equipment', 'standard', 'term']),
    canonicalName: identifier,
    altLabels: z.array(identifier).default([]),
    mentions: z.array(z.object({
        chunkId: identifier,
        spanStart: z.number().int().nonnegative().optional(),
        spanEnd: z.number().int().nonnegative().optional(),
        confidence: confidenceSchema
    })).default([])
});

/**
 * Relation written by `POST /relations`. `supersedes` edges belong to ingestion.
 */
export const relationBodySchema = z.object({
    type: z.enum(['seeAlso', 'appliesToAsset', 'appliesToEquipment', 'references']),
    src: objectRefSchema,
    dst: objectRefSchema,
    confidence: confidenceSchema,
    evidence: z.object({
        phrase: identifier,
        page: z.number().int().positive().optional(),
        span: z.tuple([z.number().int().nonnegative(), z.number().int().nonnegative()]).optional()
    }).nullable().default(null)
});
