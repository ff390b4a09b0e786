import express, { type Express, Request, Response } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import compression from 'compression';
import { requestIdMiddleware } from './middleware/requestId.js';
import { metricsMiddleware } from './middleware/metrics.js';
import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';
import { createExplorationRouter } from './routes/explorationRoutes.js';
import { createKnowledgeRouter } from './routes/knowledgeRoutes.js';
import type { JobManager } from './services/pipeline/JobManager.js';
import { asyncHandler } from './utils/errorHandling.js';
import { metricsRegistry } from './utils/metrics.js';

export interface AppDependencies {
  jobManager: JobManager;
}

/**
 * Build the express application. Kept free of listen() so tests can mount it on an ephemeral port.
 */
export function createApp({ jobManager }: AppDependencies): Express {
  const app = express();

  // Middleware order matters: request id first so every later log line carries it
  app.use(requestIdMiddleware);
  app.use(metricsMiddleware);
  app.use(cors());
  app.use(helmet());
  app.use(compression({ threshold: 1024 }));
  app.use(express.json({ limit: '1mb' }));

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.get(
    '/metrics',
    asyncHandler(async (_req: Request, res: Response) => {
      res.set('Content-Type', metricsRegistry.contentType);
      res.send(await metricsRegistry.metrics());
    })
  );

  app.use('/api/explorations', createExplorationRouter(jobManager));
  app.use('/api/knowledge', createKnowledgeRouter(jobManager));

  app.use(notFoundHandler);
  // Error handler must be registered last
  app.use(errorHandler);

  return app;
}
