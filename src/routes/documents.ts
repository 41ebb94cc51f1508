import { Router, Request, Response } from "express";
import { z } from "zod";
import { getChunkStoreService } from "../services/chunk-store.service";
import { getIngestionService } from "../services/ingestion.service";
import { sendError } from "./error-response";

const router = Router();

const patchSchema = z.object({
    title: z.string().trim().min(1).optional(),
    revLabel: z.string().trim().min(1).optional(),
    sourcePath: z.string().trim().min(1).optional()
}).refine(patch => Object.keys(patch).length > 0, { message: 'At least one field is required' });

/**
 * GET /documents/:id
 */
router.get('/:id', async (req: Request, res: Response) => {
    try {
        const document = await getChunkStoreService().getDocument(req.params.id);
        res.json({ success: true, document });
    } catch (error: unknown) {
        sendError(res, error, 'Failed to get document');
    }
});

/**
 * GET /documents/:id/chunks
 */
router.get('/:id/chunks', async (req: Request, res: Response) => {
    try {
        const chunks = await getChunkStoreService().listChunks(req.params.id);
        res.json({ success: true, chunks, count: chunks.length });
    } catch (error: unknown) {
        sendError(res, error, 'Failed to list chunks');
    }
});

/**
 * PATCH /documents/:id
 *
 * Edit citation-facing metadata; the next citation reflects it.
 */
router.patch('/:id', async (req: Request, res: Response) => {
    try {
        const patch = patchSchema.parse(req.body);
        const document = await getChunkStoreService().updateDocumentMetadata(req.params.id, patch);
        res.json({ success: true, document });
    } catch (error: unknown) {
        sendError(res, error, 'Failed to update document');
    }
});

/**
 * POST /documents/:id/retire
 *
 * Mark a document superseded without a successor and drop its vectors.
 */
router.post('/:id/retire', async (req: Request, res: Response) => {
    try {
        const result = await getIngestionService().retireDocument(req.params.id);
        res.json({ success: true, ...result });
    } catch (error: unknown) {
        sendError(res, error, 'Failed to retire document');
    }
});

export { router as documentRoutes };
