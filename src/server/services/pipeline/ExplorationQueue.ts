import Bull from 'bull';
import type { JobStatus } from '../../types/job.js';
import { getErrorMessage } from '../../types/errors.js';
import { createChildLogger } from '../../utils/logger.js';
import type { JobQueue } from './JobManager.js';

const log = createChildLogger({ component: 'ExplorationQueue' });

const QUEUE_NAME = 'exploration-jobs';
const JOB_NAME = 'explore';

export interface ExplorationJobData {
  jobId: string;
}

export interface ExplorationQueueConfig {
  redis: { host: string; port: number; password?: string };
  concurrency: number;
}

/**
 * Bull queue carrying job ids. The queue makes starting a job durable across
 * restarts; the crawl itself retries inside the pipeline, so queue attempts stay at 1.
 */
export class ExplorationQueue implements JobQueue {
  private readonly queue: Bull.Queue<ExplorationJobData>;
  private processing = false;

  constructor(private readonly config: ExplorationQueueConfig) {
    this.queue = new Bull<ExplorationJobData>(QUEUE_NAME, {
      redis: config.redis,
      defaultJobOptions: {
        attempts: 1,
        removeOnComplete: {
          age: 24 * 3600,
          count: 1000,
        },
        removeOnFail: {
          age: 7 * 24 * 3600,
        },
      },
    });

    this.queue.on('failed', (job, error) => {
      log.error({ queueJobId: job.id, jobId: job.data.jobId, error: getErrorMessage(error) }, 'Exploration queue job failed');
    });
    this.queue.on('error', (error) => {
      log.error({ error: getErrorMessage(error) }, 'Exploration queue error');
    });
  }

  async enqueue(jobId: string): Promise<void> {
    // the exploration job id doubles as the queue job id, so a repeated enqueue is a no-op
    const job = await this.queue.add(JOB_NAME, { jobId }, { jobId });
    log.info({ queueJobId: job.id, jobId }, 'Queued exploration job');
  }

  /**
   * Start consuming. `runJob` resolves with the terminal status of the exploration.
   */
  start(runJob: (jobId: string) => Promise<JobStatus>): void {
    if (this.processing) {
      return;
    }
    this.processing = true;
    this.queue
      .process(JOB_NAME, this.config.concurrency, async (job: Bull.Job<ExplorationJobData>) => {
        log.info({ queueJobId: job.id, jobId: job.data.jobId }, 'Processing exploration job');
        const status = await runJob(job.data.jobId);
        return { jobId: job.data.jobId, status };
      })
      .catch((error: unknown) => {
        this.processing = false;
        log.error({ error: getErrorMessage(error) }, 'Exploration queue processor stopped');
      });
  }

  async close(): Promise<void> {
    await this.queue.close();
    log.info('Exploration queue closed');
  }
}
