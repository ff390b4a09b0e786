import type { Logger } from 'pino';
import { AnalysisError, StorageError, categorizeError, getErrorMessage } from '../../types/errors.js';
import type { FrontierEntry } from '../../types/exploration.js';
import type { JobStatus } from '../../types/job.js';
import { emptyContent, emptyTopics, type PageRecord } from '../../types/knowledge.js';
import type { ConcurrencyGate } from '../../utils/concurrency.js';
import { createChildLogger } from '../../utils/logger.js';
import {
  activeJobs,
  fetchRetries,
  jobsFinished,
  pageProcessingDuration,
  pagesProcessed,
} from '../../utils/metrics.js';
import { retryWithBackoff } from '../../utils/retry.js';
import { toPageKey } from '../../utils/urlCanonicalizer.js';
import type { VectorStore } from '../../vector/VectorStore.js';
import type { SemanticAnalyzer } from '../analysis/SemanticAnalyzer.js';
import type { FetchedPage, PageFetcher } from '../fetch/PageFetcher.js';
import type { KnowledgeStorage } from '../knowledge/KnowledgeStorage.js';
import type { CompositeProgressObserver } from '../progress/CompositeProgressObserver.js';
import type { ExplorationJob } from './ExplorationJob.js';
import type { JobRepository } from './JobRepository.js';

export interface PipelineDependencies {
  fetcher: PageFetcher;
  analyzer: SemanticAnalyzer;
  storage: KnowledgeStorage;
  vectorStore: VectorStore;
  jobRepository: JobRepository;
  observer: CompositeProgressObserver;
  /** Shared by every job, bounds concurrent fetches across the process */
  fetchGate: ConcurrencyGate;
}

export interface PipelineOptions {
  /** Retries after the first fetch attempt */
  fetchMaxRetries: number;
  fetchInitialDelayMs: number;
  fetchMaxDelayMs: number;
  storageRetryDelayMs: number;
}

/**
 * The crawl loop. One `run` call drives one job from idle (or a restored
 * checkpoint) to a terminal status.
 *
 * Per page: fetch with retry, analyze (each step may fail into a warning),
 * store embedding, page and links, update the flow model, then admit internal
 * links to the frontier and checkpoint the job. Pause and cancel requests are
 * honoured between pages only.
 */
export class KnowledgePipeline {
  constructor(
    private readonly deps: PipelineDependencies,
    private readonly options: PipelineOptions
  ) {}

  async run(job: ExplorationJob): Promise<JobStatus> {
    const log = createChildLogger({ component: 'KnowledgePipeline', jobId: job.jobId });
    if (job.status === 'idle') {
      job.transition('running');
    }
    activeJobs.inc();
    log.info({ seedUrl: job.config.seedUrl, strategy: job.config.strategy, status: job.status }, 'Exploration started');

    try {
      await this.checkpoint(job);
      await this.loop(job, log);
      if (job.status === 'running') {
        job.transition('completed');
      }
    } catch (error) {
      const kind = error instanceof StorageError ? 'storage' : 'internal';
      job.recordError(kind, job.currentUrl, error);
      this.deps.observer.onError({ jobId: job.jobId, context: kind, message: getErrorMessage(error) });
      log.error({ error: getErrorMessage(error), kind }, 'Exploration failed');
      if (job.status === 'running') {
        job.transition('failed');
      }
    } finally {
      activeJobs.dec();
    }

    jobsFinished.inc({ status: job.status });
    await this.saveFinalRecord(job, log);
    this.deps.observer.onProgress(job.progress());
    log.info({ status: job.status, counters: job.counters }, 'Exploration finished');
    return job.status;
  }

  private async loop(job: ExplorationJob, log: Logger): Promise<void> {
    for (;;) {
      if (job.status === 'paused') {
        log.info({ processed: job.counters.processed }, 'Exploration paused');
        await job.waitForResume();
        if (job.status !== 'running') {
          return;
        }
        log.info('Exploration resumed');
        continue;
      }

      if (job.cancelRequested) {
        job.transition('cancelled');
        return;
      }

      if (job.pauseRequested) {
        job.applyPause();
        await this.checkpointWhilePaused(job, log);
        this.deps.observer.onProgress(job.progress());
        continue;
      }

      if (job.counters.processed >= job.config.maxPages) {
        return;
      }

      const entry = job.engine.next();
      if (!entry) {
        return;
      }
      await this.processEntry(job, entry, log);
    }
  }

  private async processEntry(job: ExplorationJob, entry: FrontierEntry, log: Logger): Promise<void> {
    const { fetcher, analyzer, storage, vectorStore, observer } = this.deps;
    const started = Date.now();
    job.currentUrl = entry.url;
    job.engine.trackVisited(entry.url);
    job.counters.processed++;

    let fetched: FetchedPage;
    try {
      fetched = await this.fetchWithRetry(job, entry.url, fetcher);
    } catch (error) {
      job.counters.failed++;
      job.recordError('fetch', entry.url, error);
      pagesProcessed.inc({ outcome: 'failed' });
      log.warn({ url: entry.url, error: getErrorMessage(error), category: categorizeError(error) }, 'Page fetch failed');
      observer.onError({ jobId: job.jobId, context: `fetch ${entry.url}`, message: getErrorMessage(error) });
      job.metrics.record(Date.now() - started);
      await this.checkpoint(job);
      observer.onProgress(job.progress());
      return;
    }

    const warningsBefore = job.warnings.length;
    const guard = <T>(step: string, run: () => Promise<T>, fallback: () => T) =>
      this.analyze(job, entry.url, step, run, fallback, log);

    const content = await guard('extractContent', () => analyzer.extractContent(fetched.rawContent, entry.url), emptyContent);
    const entities = await guard('extractEntities', () => analyzer.extractEntities(content.text), () => []);
    const topics = await guard('extractTopics', () => analyzer.extractTopics(content), emptyTopics);
    const embedding = await guard<number[] | null>(
      'generateEmbedding',
      () => analyzer.generateEmbedding(`${content.title} ${content.text}`.trim()),
      () => null
    );

    const baseUrl = fetched.finalUrl || entry.url;
    const links = fetched.anchors
      ? job.engine.classifyAnchors(fetched.anchors, baseUrl)
      : job.engine.discoverLinks(fetched.rawContent, baseUrl);
    const forms = job.engine.discoverForms(fetched.rawContent, baseUrl);

    const key = toPageKey(entry.url);
    let embeddingId: string | null = null;
    if (embedding) {
      await this.withStorageRetry('storeEmbedding', () =>
        vectorStore.storeEmbedding(key, embedding, {
          url: entry.url,
          jobId: job.jobId,
          title: content.title,
          depth: entry.depth,
        })
      );
      embeddingId = key;
    }

    const page: PageRecord = {
      key,
      url: entry.url,
      depth: entry.depth,
      visitedAt: new Date().toISOString(),
      referrer: entry.referrer,
      jobId: job.jobId,
      content,
      entities,
      topics,
      forms: forms.safe,
      mutatingFormCount: forms.mutatingCount,
      embeddingId,
    };
    await this.withStorageRetry('storePage', () => storage.storePage(page));
    job.storedUrls.add(entry.url);
    job.counters.stored++;

    const discoveredAt = new Date().toISOString();
    for (const link of [...links.internal, ...links.external]) {
      await this.withStorageRetry('storeLink', () =>
        storage.storeLink({
          from: entry.url,
          to: link.url,
          text: link.text,
          attributes: link.attributes,
          kind: link.kind,
          discoveredAt,
        })
      );
    }

    job.flowMapper.trackNavigation(entry.url, entry.referrer);
    job.flowMapper.recordOutgoingLinks(entry.url, links.internal.length);

    job.counters.externalLinks += links.external.length;
    for (const link of links.external) {
      observer.onExternalLinkDetected({ jobId: job.jobId, from: entry.url, to: link.url });
    }

    // the page is stored before any of its links can be taken off the frontier
    const admitted = job.engine.admit(links.internal, entry, job.counters.processed);
    if (admitted.length === 0) {
      job.flowMapper.recordPath(entry.path);
    }

    const duration = Date.now() - started;
    job.metrics.record(duration, { url: entry.url, title: content.title });
    pageProcessingDuration.observe(duration / 1000);
    pagesProcessed.inc({ outcome: 'stored' });

    observer.onPageCompleted({
      jobId: job.jobId,
      url: entry.url,
      title: content.title,
      depth: entry.depth,
      internalLinks: links.internal.length,
      externalLinks: links.external.length,
      safeForms: forms.safe.length,
      warnings: job.warnings.length - warningsBefore,
    });
    log.debug({ url: entry.url, depth: entry.depth, admitted: admitted.length, durationMs: duration }, 'Page stored');

    await this.checkpoint(job);
    observer.onProgress(job.progress());
  }

  private fetchWithRetry(job: ExplorationJob, url: string, fetcher: PageFetcher): Promise<FetchedPage> {
    return retryWithBackoff(
      () => this.deps.fetchGate.run(() => fetcher.fetch(url)),
      {
        maxAttempts: this.options.fetchMaxRetries,
        initialDelay: this.options.fetchInitialDelayMs,
        maxDelay: this.options.fetchMaxDelayMs,
        shouldAbort: () => job.cancelRequested,
        onRetry: () => fetchRetries.inc(),
      },
      `fetch ${url}`
    );
  }

  private async analyze<T>(
    job: ExplorationJob,
    url: string,
    step: string,
    run: () => Promise<T>,
    fallback: () => T,
    log: Logger
  ): Promise<T> {
    try {
      return await run();
    } catch (error) {
      const failure = error instanceof AnalysisError ? error : new AnalysisError(url, step, getErrorMessage(error));
      job.recordWarning(url, step, failure);
      log.warn({ url, step, error: failure.message }, 'Analysis step failed, storing page without it');
      return fallback();
    }
  }

  /**
   * One retry after STORAGE_RETRY_DELAY_MS; a second failure surfaces as StorageError.
   */
  private async withStorageRetry(operation: string, write: () => Promise<void>): Promise<void> {
    try {
      await retryWithBackoff(
        write,
        { maxAttempts: 1, initialDelay: this.options.storageRetryDelayMs, isRetryable: () => true },
        operation
      );
    } catch (error) {
      throw error instanceof StorageError ? error : new StorageError(operation, getErrorMessage(error));
    }
  }

  private async checkpoint(job: ExplorationJob): Promise<void> {
    await this.withStorageRetry('saveJob', () => this.deps.jobRepository.save(job.toRecord()));
  }

  /**
   * A paused job cannot move to failed, so a checkpoint failure here is recorded
   * and the next checkpoint after resume writes the state again.
   */
  private async checkpointWhilePaused(job: ExplorationJob, log: Logger): Promise<void> {
    try {
      await this.checkpoint(job);
    } catch (error) {
      job.recordError('storage', null, error);
      log.error({ error: getErrorMessage(error) }, 'Checkpoint failed while pausing');
    }
  }

  private async saveFinalRecord(job: ExplorationJob, log: Logger): Promise<void> {
    try {
      await this.checkpoint(job);
    } catch (error) {
      job.recordError('storage', null, error);
      log.error({ status: job.status, error: getErrorMessage(error) }, 'Final job record could not be saved');
    }
  }
}
