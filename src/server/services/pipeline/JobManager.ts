import { randomUUID } from 'crypto';
import { ConflictError, IllegalStateTransitionError, NotFoundError, getErrorMessage } from '../../types/errors.js';
import {
  TERMINAL_JOB_STATUSES,
  isTerminalStatus,
  type ExplorationJobSnapshot,
  type JobErrorEntry,
  type JobRecord,
  type JobStatus,
  type JobWarningEntry,
} from '../../types/job.js';
import type { LinkRecord, PageRecord } from '../../types/knowledge.js';
import type { FunctionalSitemap, SemanticSitemap } from '../../types/sitemap.js';
import { createChildLogger } from '../../utils/logger.js';
import type { VectorMetadata, VectorSearchResult } from '../../vector/VectorStore.js';
import { parseExplorationConfig, type ExplorationDefaults } from '../../validation/explorationSchemas.js';
import { FlowMapper } from '../exploration/FlowMapper.js';
import { SiteMapGenerator } from '../sitemap/SiteMapGenerator.js';
import { ExplorationJob } from './ExplorationJob.js';
import { KnowledgePipeline, type PipelineDependencies, type PipelineOptions } from './KnowledgePipeline.js';

const log = createChildLogger({ component: 'JobManager' });

/**
 * Hands job ids to a durable queue whose worker calls `JobManager.runJob`.
 */
export interface JobQueue {
  enqueue(jobId: string): Promise<void>;
  close(): Promise<void>;
}

export interface JobManagerOptions extends PipelineOptions {
  defaults: ExplorationDefaults;
}

export interface JobResults {
  job: ExplorationJobSnapshot;
  pages: PageRecord[];
  links: LinkRecord[];
  errors: JobErrorEntry[];
  warnings: JobWarningEntry[];
}

export interface SemanticSearchRequest {
  text?: string;
  vector?: number[];
  topK: number;
  filter?: VectorMetadata;
}

export interface SemanticSearchHit {
  id: string;
  score: number;
  metadata: VectorMetadata;
  page: PageRecord | null;
}

export type LinkDirection = 'from' | 'to';

function snapshotFromRecord(record: JobRecord): ExplorationJobSnapshot {
  const queued = record.checkpoint?.frontier.length ?? 0;
  return {
    jobId: record.jobId,
    status: record.status,
    config: record.config,
    counters: { ...record.counters },
    queued,
    total: Math.min(record.config.maxPages, record.counters.processed + queued),
    currentUrl: null,
    pauseRequested: false,
    cancelRequested: false,
    errors: record.errors,
    warnings: record.warnings,
    estimatedTimeRemainingMs: null,
    processingRatePerMinute: null,
    createdAt: record.createdAt,
    startedAt: record.startedAt,
    finishedAt: record.finishedAt,
  };
}

/**
 * Registry and control surface for exploration jobs in this process.
 *
 * Jobs run in-process unless a JobQueue is attached, in which case startJob
 * only records the job and the queue worker runs it. Records in the
 * JobRepository outlive the process; restoreJob continues an interrupted job
 * from its last checkpoint. A job leaves the in-process registry once its
 * terminal record is stored; later queries read that record.
 */
export class JobManager {
  private readonly jobs = new Map<string, ExplorationJob>();
  private readonly running = new Map<string, Promise<JobStatus>>();
  private readonly pipeline: KnowledgePipeline;
  private queue: JobQueue | null = null;

  constructor(
    private readonly deps: PipelineDependencies,
    private readonly options: JobManagerOptions
  ) {
    this.pipeline = new KnowledgePipeline(deps, options);
  }

  attachQueue(queue: JobQueue): void {
    this.queue = queue;
  }

  /**
   * Validate the configuration and start (or enqueue) a new job.
   *
   * @throws ValidationError before the job exists when the configuration is rejected
   */
  async startJob(input: unknown): Promise<ExplorationJobSnapshot> {
    const config = parseExplorationConfig(input, this.options.defaults);
    const job = new ExplorationJob(randomUUID(), config);
    this.jobs.set(job.jobId, job);
    await this.deps.jobRepository.save(job.toRecord());

    if (this.queue) {
      await this.queue.enqueue(job.jobId);
      log.info({ jobId: job.jobId, seedUrl: config.seedUrl }, 'Exploration job queued');
    } else {
      void this.launch(job);
      log.info({ jobId: job.jobId, seedUrl: config.seedUrl }, 'Exploration job started');
    }
    return job.snapshot();
  }

  /**
   * Run a job by id to completion. Used by the queue worker; a job that is not
   * live in this process is rebuilt from its stored record.
   */
  async runJob(jobId: string): Promise<JobStatus> {
    const active = this.running.get(jobId);
    if (active) {
      return active;
    }
    let job = this.jobs.get(jobId);
    if (!job) {
      const record = await this.deps.jobRepository.get(jobId);
      if (!record) {
        throw new NotFoundError('Exploration job', jobId);
      }
      if (isTerminalStatus(record.status)) {
        return record.status;
      }
      job = ExplorationJob.fromRecord(record);
      this.jobs.set(jobId, job);
    }
    if (job.isTerminal) {
      return job.status;
    }
    return this.launch(job);
  }

  /**
   * Rebuild a non-terminal job from its last checkpoint and continue it.
   * Visited pages are not fetched again. A job restored from `paused` waits for resume.
   */
  async restoreJob(jobId: string): Promise<ExplorationJobSnapshot> {
    const live = this.jobs.get(jobId);
    if (live && !live.isTerminal) {
      throw new ConflictError(`Job ${jobId} is already active in this process`, { jobId, status: live.status });
    }
    const job = await this.loadJob(jobId);
    this.jobs.set(jobId, job);
    void this.launch(job);
    log.info({ jobId, status: job.status, processed: job.counters.processed }, 'Exploration job restored');
    return job.snapshot();
  }

  async pause(jobId: string): Promise<ExplorationJobSnapshot> {
    const job = this.jobs.get(jobId) ?? (await this.rejectControl(jobId, 'paused'));
    job.requestPause();
    log.info({ jobId }, 'Pause requested');
    return job.snapshot();
  }

  async resume(jobId: string): Promise<ExplorationJobSnapshot> {
    const job = this.jobs.get(jobId) ?? (await this.rejectControl(jobId, 'running'));
    job.resume();
    log.info({ jobId }, 'Resume requested');
    return job.snapshot();
  }

  async cancel(jobId: string): Promise<ExplorationJobSnapshot> {
    const job = this.jobs.get(jobId) ?? (await this.rejectControl(jobId, 'cancelled'));
    job.requestCancel();
    log.info({ jobId }, 'Cancel requested');
    return job.snapshot();
  }

  async getStatus(jobId: string): Promise<ExplorationJobSnapshot> {
    const job = this.jobs.get(jobId);
    if (job) {
      return job.snapshot();
    }
    const record = await this.deps.jobRepository.get(jobId);
    if (!record) {
      throw new NotFoundError('Exploration job', jobId);
    }
    return snapshotFromRecord(record);
  }

  /** Stored and live jobs, oldest first. Live state wins over the stored record. */
  async listJobs(status?: JobStatus): Promise<ExplorationJobSnapshot[]> {
    const records = await this.deps.jobRepository.list();
    const snapshots = new Map<string, ExplorationJobSnapshot>();
    records.forEach((record) => snapshots.set(record.jobId, snapshotFromRecord(record)));
    this.jobs.forEach((job, jobId) => snapshots.set(jobId, job.snapshot()));

    return [...snapshots.values()]
      .filter((snapshot) => status === undefined || snapshot.status === status)
      .sort((a, b) => a.createdAt.localeCompare(b.createdAt));
  }

  /** Resolves with the final snapshot once the job is terminal. */
  async waitForJob(jobId: string): Promise<ExplorationJobSnapshot> {
    const job = this.jobs.get(jobId);
    if (!job) {
      return this.getStatus(jobId);
    }
    await job.waitForStatus([...TERMINAL_JOB_STATUSES]);
    await this.running.get(jobId);
    return job.snapshot();
  }

  /** Resolves once the job reaches `status` (or any terminal status). */
  async waitForStatus(jobId: string, status: JobStatus): Promise<JobStatus> {
    const job = this.jobs.get(jobId);
    if (!job) {
      return (await this.getStatus(jobId)).status;
    }
    return job.waitForStatus([status, ...TERMINAL_JOB_STATUSES]);
  }

  /**
   * Pages and links stored so far. Safe to call mid-run for partial results.
   */
  async getResults(jobId: string): Promise<JobResults> {
    const job = await this.getStatus(jobId);
    const pages = await this.deps.storage.listPages({ jobId });
    const links: LinkRecord[] = [];
    for (const page of pages) {
      links.push(...(await this.deps.storage.getLinksFrom(page.url)));
    }
    return { job, pages, links, errors: job.errors, warnings: job.warnings };
  }

  async getPage(url: string): Promise<PageRecord> {
    const page = await this.deps.storage.getPage(url);
    if (!page) {
      throw new NotFoundError('Page', url);
    }
    return page;
  }

  getLinks(url: string, direction: LinkDirection = 'from'): Promise<LinkRecord[]> {
    return direction === 'from' ? this.deps.storage.getLinksFrom(url) : this.deps.storage.getLinksTo(url);
  }

  /**
   * Rank stored pages by similarity to a text (embedded with the job analyzer) or a raw vector.
   */
  async search(request: SemanticSearchRequest): Promise<SemanticSearchHit[]> {
    const query = request.vector ?? (await this.deps.analyzer.generateEmbedding(request.text ?? ''));
    const results = await this.rank(query, request.topK, request.filter);

    const hits: SemanticSearchHit[] = [];
    for (const result of results) {
      const url = result.metadata.url;
      const page = typeof url === 'string' ? await this.deps.storage.getPage(url) : null;
      hits.push({ ...result, page });
    }
    return hits;
  }

  /**
   * Embedding metadata names only the job that stored a page last, so a jobId
   * filter is resolved against the pages the job stored.
   */
  private async rank(query: number[], topK: number, filter: VectorMetadata = {}): Promise<VectorSearchResult[]> {
    const { jobId, ...rest } = filter;
    if (typeof jobId !== 'string') {
      return this.deps.vectorStore.searchSimilar(query, topK, filter);
    }
    const stored = new Set((await this.deps.storage.listPages({ jobId })).map((page) => page.key));
    const ranked = await this.deps.vectorStore.searchSimilar(query, await this.deps.vectorStore.count(), rest);
    return ranked.filter((result) => stored.has(result.id)).slice(0, topK);
  }

  /** Pages of one job, or of every job when no id is given. */
  async generateSemanticSitemap(jobId?: string): Promise<SemanticSitemap> {
    if (jobId) {
      await this.getStatus(jobId);
    }
    return new SiteMapGenerator(this.deps.storage).generateSemanticSitemap(jobId ? { jobId } : {});
  }

  async generateFunctionalSitemap(jobId: string): Promise<FunctionalSitemap> {
    return new SiteMapGenerator(this.deps.storage, await this.flowMapperFor(jobId)).generateFunctionalSitemap();
  }

  /** Generator for exporting site maps already built. */
  sitemapExporter(): SiteMapGenerator {
    return new SiteMapGenerator(this.deps.storage);
  }

  async flowMapperFor(jobId: string): Promise<FlowMapper> {
    const job = this.jobs.get(jobId);
    if (job) {
      return job.flowMapper;
    }
    const record = await this.deps.jobRepository.get(jobId);
    if (!record) {
      throw new NotFoundError('Exploration job', jobId);
    }
    return new FlowMapper(record.checkpoint?.flow);
  }

  /**
   * Pause running jobs so their checkpoints can be restored later, then wait
   * for every loop to settle at a boundary.
   */
  async shutdown(): Promise<void> {
    const settling: Array<Promise<JobStatus>> = [];
    for (const job of this.jobs.values()) {
      if (job.status !== 'running') {
        continue;
      }
      if (!job.pauseRequested && !job.cancelRequested) {
        job.requestPause();
      }
      settling.push(job.waitForStatus(['paused', ...TERMINAL_JOB_STATUSES]));
    }
    await Promise.all(settling);
    await this.deps.observer.flush();
    if (this.queue) {
      await this.queue.close();
    }
    log.info({ jobs: this.jobs.size }, 'Job manager stopped');
  }

  private launch(job: ExplorationJob): Promise<JobStatus> {
    const run = this.pipeline
      .run(job)
      .catch((error: unknown) => {
        log.error({ jobId: job.jobId, error: getErrorMessage(error) }, 'Exploration run crashed');
        return job.status;
      })
      .then(async (status) => {
        await this.evictFinished(job);
        return status;
      })
      .finally(() => this.running.delete(job.jobId));
    this.running.set(job.jobId, run);
    return run;
  }

  private async loadJob(jobId: string): Promise<ExplorationJob> {
    const record = await this.deps.jobRepository.get(jobId);
    if (!record) {
      throw new NotFoundError('Exploration job', jobId);
    }
    if (isTerminalStatus(record.status)) {
      throw new ConflictError(`Job ${jobId} already finished with status ${record.status}`, {
        jobId,
        status: record.status,
      });
    }
    return ExplorationJob.fromRecord(record);
  }

  /** Drop a finished job once the repository holds its terminal record. */
  private async evictFinished(job: ExplorationJob): Promise<void> {
    if (!job.isTerminal) {
      return;
    }
    try {
      const record = await this.deps.jobRepository.get(job.jobId);
      if (record?.status === job.status) {
        this.jobs.delete(job.jobId);
      }
    } catch (error) {
      log.warn({ jobId: job.jobId, error: getErrorMessage(error) }, 'Final job record unreadable, keeping job in memory');
    }
  }

  /**
   * Control call on a job that is not live here: a finished one answers with the
   * illegal transition, an unfinished one has to be restored first.
   */
  private async rejectControl(jobId: string, to: JobStatus): Promise<never> {
    const record = await this.deps.jobRepository.get(jobId);
    if (!record) {
      throw new NotFoundError('Exploration job', jobId);
    }
    if (isTerminalStatus(record.status)) {
      throw new IllegalStateTransitionError(record.status, to, { jobId });
    }
    throw new ConflictError(`Job ${jobId} is not active in this process`, { jobId, status: record.status });
  }
}
