import { Router, Request, Response } from "express";
import { getCitationService } from "../services/citation.service";
import { sendError } from "./error-response";

const router = Router();

/**
 * GET /citations/:chunkId
 */
router.get('/:chunkId', async (req: Request, res: Response) => {
    try {
        const citationService = getCitationService();
        const citation = await citationService.build(req.params.chunkId);

        res.json({ success: true, citation, formatted: citationService.format(citation) });
    } catch (error: unknown) {
        sendError(res, error, 'Failed to build citation');
    }
});

export { router as citationRoutes };
