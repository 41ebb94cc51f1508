import { Router, Request, Response } from "express";
import { getRelationExpanderService } from "../services/relation-expander.service";
import { entityBodySchema, relationBodySchema } from "../types/schemas";
import { sendError } from "./error-response";

const entityRouter = Router();
const relationRouter = Router();

/**
 * POST /entities
 *
 * Register an entity and the chunks that mention it. Relations may then
 * target the entity.
 */
entityRouter.post('/', async (req: Request, res: Response) => {
    try {
        const { mentions, ...entity } = entityBodySchema.parse(req.body);
        const expander = getRelationExpanderService();

        await expander.recordEntity(entity);
        await expander.recordMentions(mentions.map(mention => ({ ...mention, entityId: entity.entityId })));

        res.status(201).json({ success: true, entity, mentionsCount: mentions.length });
    } catch (error: unknown) {
        sendError(res, error, 'Failed to record entity');
    }
});

/**
 * POST /relations
 *
 * Record a seeAlso / appliesTo* / references edge used by relation expansion.
 */
relationRouter.post('/', async (req: Request, res: Response) => {
    try {
        const relation = await getRelationExpanderService().recordRelation(relationBodySchema.parse(req.body));
        res.status(201).json({ success: true, relation });
    } catch (error: unknown) {
        sendError(res, error, 'Failed to record relation');
    }
});

export { entityRouter as entityRoutes, relationRouter as relationRoutes };
