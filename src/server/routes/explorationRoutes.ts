import { Router, Request, Response } from 'express';
import { validate } from '../middleware/validation.js';
import { explorationSchemas } from '../validation/explorationSchemas.js';
import { asyncHandler } from '../utils/errorHandling.js';
import type { JobManager } from '../services/pipeline/JobManager.js';

export function createExplorationRouter(jobManager: JobManager): Router {
    const router = Router();

    /**
     * POST /api/explorations
     * Start an exploration job. Responds 202 with the initial job snapshot.
     */
    router.post('/', validate(explorationSchemas.startJob), asyncHandler(async (req: Request, res: Response) => {
        const job = await jobManager.startJob(req.body);
        res.status(202).json(job);
    }));

    /**
     * GET /api/explorations?status=running
     */
    router.get('/', validate(explorationSchemas.listJobs), asyncHandler(async (req: Request, res: Response) => {
        const { status } = explorationSchemas.listJobs.query.parse(req.query);
        res.json(await jobManager.listJobs(status));
    }));

    router.get('/:jobId', validate(explorationSchemas.jobById), asyncHandler(async (req: Request, res: Response) => {
        res.json(await jobManager.getStatus(req.params.jobId));
    }));

    router.post('/:jobId/pause', validate(explorationSchemas.jobById), asyncHandler(async (req: Request, res: Response) => {
        res.json(await jobManager.pause(req.params.jobId));
    }));

    router.post('/:jobId/resume', validate(explorationSchemas.jobById), asyncHandler(async (req: Request, res: Response) => {
        res.json(await jobManager.resume(req.params.jobId));
    }));

    router.post('/:jobId/cancel', validate(explorationSchemas.jobById), asyncHandler(async (req: Request, res: Response) => {
        res.json(await jobManager.cancel(req.params.jobId));
    }));

    /**
     * POST /api/explorations/:jobId/restore
     * Continue an interrupted job from its last checkpoint
     */
    router.post('/:jobId/restore', validate(explorationSchemas.jobById), asyncHandler(async (req: Request, res: Response) => {
        res.status(202).json(await jobManager.restoreJob(req.params.jobId));
    }));

    /**
     * GET /api/explorations/:jobId/results
     * Pages and links stored so far; partial while the job runs
     */
    router.get('/:jobId/results', validate(explorationSchemas.jobById), asyncHandler(async (req: Request, res: Response) => {
        res.json(await jobManager.getResults(req.params.jobId));
    }));

    /**
     * GET /api/explorations/:jobId/sitemap/:kind?format=json|xml
     */
    router.get('/:jobId/sitemap/:kind', validate(explorationSchemas.sitemap), asyncHandler(async (req: Request, res: Response) => {
        const { jobId, kind } = explorationSchemas.sitemap.params.parse(req.params);
        const { format } = explorationSchemas.sitemap.query.parse(req.query);

        const sitemap =
            kind === 'semantic'
                ? await jobManager.generateSemanticSitemap(jobId)
                : await jobManager.generateFunctionalSitemap(jobId);
        const generator = jobManager.sitemapExporter();

        if (format === 'xml') {
            res.type('application/xml').send(generator.exportToXml(sitemap));
            return;
        }
        res.type('application/json').send(generator.exportToJson(sitemap));
    }));

    return router;
}
