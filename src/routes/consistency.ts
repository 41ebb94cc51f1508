import { Router, Request, Response } from "express";
import { getConsistencyService } from "../services/consistency.service";
import { sendError } from "./error-response";

const router = Router();

/**
 * GET /consistency
 *
 * Compare the chunk store, embedding cache, id map and vector collection.
 */
router.get('/', async (req: Request, res: Response) => {
    try {
        const report = await getConsistencyService().check();
        res.json({ success: true, report });
    } catch (error: unknown) {
        sendError(res, error, 'Consistency check failed');
    }
});

/**
 * POST /consistency/repair
 */
router.post('/repair', async (req: Request, res: Response) => {
    try {
        const result = await getConsistencyService().repair();
        res.json({ success: true, result });
    } catch (error: unknown) {
        sendError(res, error, 'Consistency repair failed');
    }
});

export { router as consistencyRoutes };
