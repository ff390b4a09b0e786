import { createServer } from 'http';
import type Redis from 'ioredis';
import { validateEnv, type Env } from './config/env.js';
import { connectDB, closeDB } from './config/database.js';
import { closeNeo4j } from './config/neo4j.js';
import { closePostgresPool } from './config/postgres.js';
import { createRedisPublisher } from './config/redis.js';
import { createApp } from './app.js';
import { MongoJobRepository } from './models/ExplorationJobModel.js';
import { HeuristicSemanticAnalyzer } from './services/analysis/HeuristicSemanticAnalyzer.js';
import { HttpPageFetcher } from './services/fetch/HttpPageFetcher.js';
import { createKnowledgeStorage } from './services/knowledge/createKnowledgeStorage.js';
import { ExplorationQueue } from './services/pipeline/ExplorationQueue.js';
import { JobManager } from './services/pipeline/JobManager.js';
import { InMemoryJobRepository, type JobRepository } from './services/pipeline/JobRepository.js';
import { CompositeProgressObserver } from './services/progress/CompositeProgressObserver.js';
import { LoggingProgressObserver } from './services/progress/LoggingProgressObserver.js';
import { RedisProgressObserver } from './services/progress/RedisProgressObserver.js';
import { getErrorMessage } from './types/errors.js';
import { pLimit } from './utils/concurrency.js';
import { logger } from './utils/logger.js';
import { createVectorStore } from './vector/createVectorStore.js';

async function createJobRepository(env: Env): Promise<JobRepository> {
  if (env.JOB_REGISTRY_BACKEND === 'mongodb') {
    const repository = new MongoJobRepository(await connectDB());
    await repository.ensureIndexes();
    logger.info('Job registry: mongodb');
    return repository;
  }
  logger.info('Job registry: in-memory');
  return new InMemoryJobRepository();
}

async function start(): Promise<void> {
  const env = validateEnv();

  const storage = await createKnowledgeStorage(env);
  const vectorStore = await createVectorStore(env);
  const jobRepository = await createJobRepository(env);

  const observer = new CompositeProgressObserver([new LoggingProgressObserver()]);
  let publisher: Redis | null = null;
  if (env.PROGRESS_PUBSUB_ENABLED) {
    publisher = createRedisPublisher();
    observer.add(new RedisProgressObserver(publisher));
  }

  const jobManager = new JobManager(
    {
      fetcher: new HttpPageFetcher({ userAgent: env.CRAWLER_USER_AGENT, timeoutMs: env.FETCH_TIMEOUT_MS }),
      analyzer: new HeuristicSemanticAnalyzer(env.EMBEDDING_DIMENSION),
      storage,
      vectorStore,
      jobRepository,
      observer,
      fetchGate: pLimit(env.FETCH_CONCURRENCY),
    },
    {
      fetchMaxRetries: env.FETCH_MAX_RETRIES,
      fetchInitialDelayMs: env.FETCH_INITIAL_RETRY_DELAY_MS,
      fetchMaxDelayMs: env.FETCH_MAX_RETRY_DELAY_MS,
      storageRetryDelayMs: env.STORAGE_RETRY_DELAY_MS,
      defaults: {
        maxDepth: env.DEFAULT_MAX_DEPTH,
        maxPages: env.DEFAULT_MAX_PAGES,
        subdomainPolicy: env.SUBDOMAIN_POLICY,
      },
    }
  );

  if (env.EXPLORATION_QUEUE_ENABLED) {
    const queue = new ExplorationQueue({
      redis: { host: env.REDIS_HOST, port: env.REDIS_PORT, password: env.REDIS_PASSWORD },
      concurrency: env.EXPLORATION_QUEUE_CONCURRENCY,
    });
    jobManager.attachQueue(queue);
    queue.start((jobId) => jobManager.runJob(jobId));
  }

  const server = createServer(createApp({ jobManager }));
  server.listen(env.PORT, () => {
    logger.info({ port: env.PORT, env: env.NODE_ENV }, 'Site knowledge explorer listening');
  });

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info({ signal }, 'Shutting down');

    await new Promise<void>((resolve) => server.close(() => resolve()));
    await jobManager.shutdown();
    await storage.close();
    await vectorStore.close();
    await jobRepository.close();
    if (publisher) {
      await publisher.quit();
    }
    await closeNeo4j();
    await closePostgresPool();
    await closeDB();
    logger.info('Shutdown complete');
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal)
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error({ error: getErrorMessage(error) }, 'Shutdown failed');
          process.exit(1);
        });
    });
  }
}

start().catch((error: unknown) => {
  logger.fatal({ error: getErrorMessage(error) }, 'Failed to start server');
  process.exit(1);
});
