import { Router, Request, Response } from "express";
import { z } from "zod";
import { getRetrievalService } from "../services/retrieval.service";
import { querySlotsSchema, searchFiltersSchema } from "../types/schemas";
import { requestSignal, sendError } from "./error-response";

const searchSchema = z.object({
    intent: z.string().trim().min(1).default('search'),
    slots: querySlotsSchema.default({}),
    queryText: z.string().trim().min(1).optional(),
    alpha: z.number().min(0).max(1).optional(),
    limit: z.number().int().positive().max(100).optional(),
    overfetch: z.number().int().positive().max(1000).optional(),
    includeHistorical: z.boolean().optional(),
    filters: searchFiltersSchema.optional(),
    expandRelations: z.boolean().optional()
});

const askSchema = z.object({
    question: z.string().trim().min(1, "Question is required"),
    limit: z.number().int().positive().max(20).optional(),
    includeHistorical: z.boolean().optional()
});

const searchRouter = Router();
const askRouter = Router();

/**
 * POST /search
 *
 * Fused lexical + vector search over a structured query.
 * Body: { intent?, slots: { topic?, asset?, equipment?, bu?, latestOnly? }, queryText?, alpha?, limit?, ... }
 */
searchRouter.post('/', async (req: Request, res: Response) => {
    try {
        const { intent, slots, ...options } = searchSchema.parse(req.body);
        const result = await getRetrievalService().search(
            { intent, slots },
            { ...options, signal: requestSignal(res) }
        );

        res.json({ success: true, ...result });
    } catch (error: unknown) {
        sendError(res, error, 'Search failed');
    }
});

/**
 * POST /ask
 *
 * Answer a free-text question from the indexed documents, with citations.
 */
askRouter.post('/', async (req: Request, res: Response) => {
    try {
        const { question, ...options } = askSchema.parse(req.body);
        const result = await getRetrievalService().ask(question, { ...options, signal: requestSignal(res) });

        res.json({ success: true, ...result });
    } catch (error: unknown) {
        sendError(res, error, 'Question answering failed');
    }
});

export { searchRouter as searchRoutes, askRouter as askRoutes };
