import { Router, Request, Response } from 'express';
import { validate } from '../middleware/validation.js';
import { knowledgeSchemas } from '../validation/explorationSchemas.js';
import { asyncHandler } from '../utils/errorHandling.js';
import type { JobManager } from '../services/pipeline/JobManager.js';

/**
 * Graph queries and semantic search over everything stored, across jobs.
 */
export function createKnowledgeRouter(jobManager: JobManager): Router {
    const router = Router();

    /**
     * GET /api/knowledge/pages?url=
     */
    router.get('/pages', validate(knowledgeSchemas.getPage), asyncHandler(async (req: Request, res: Response) => {
        const { url } = knowledgeSchemas.getPage.query.parse(req.query);
        res.json(await jobManager.getPage(url));
    }));

    /**
     * GET /api/knowledge/links?url=&direction=from|to
     */
    router.get('/links', validate(knowledgeSchemas.getLinks), asyncHandler(async (req: Request, res: Response) => {
        const { url, direction } = knowledgeSchemas.getLinks.query.parse(req.query);
        res.json(await jobManager.getLinks(url, direction));
    }));

    /**
     * POST /api/knowledge/search
     * Body: { text } or { vector }, optional topK and metadata filter
     */
    router.post('/search', validate(knowledgeSchemas.search), asyncHandler(async (req: Request, res: Response) => {
        const request = knowledgeSchemas.search.body.parse(req.body);
        res.json(await jobManager.search(request));
    }));

    return router;
}
