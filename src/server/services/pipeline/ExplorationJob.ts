import { EventEmitter } from 'events';
import { IllegalStateTransitionError, categorizeError, getErrorMessage } from '../../types/errors.js';
import {
  isTerminalStatus,
  type ExplorationConfig,
  type ExplorationJobSnapshot,
  type JobCounters,
  type JobErrorEntry,
  type JobErrorKind,
  type JobRecord,
  type JobStatus,
  type JobWarningEntry,
} from '../../types/job.js';
import type { ExplorationProgress } from '../../types/progress.js';
import { ExplorationEngine } from '../exploration/ExplorationEngine.js';
import { FlowMapper } from '../exploration/FlowMapper.js';
import { assertTransition } from './jobStateMachine.js';
import { ProcessingMetrics } from './processingMetrics.js';

function emptyCounters(): JobCounters {
  return { processed: 0, stored: 0, failed: 0, externalLinks: 0 };
}

/**
 * In-process state of one exploration job.
 *
 * Control calls (pause, resume, cancel) only set flags; the pipeline loop
 * applies them at its next iteration boundary. A paused loop waits on a
 * signal that resume and cancel both fire.
 *
 * Emits `status` with the new JobStatus after every transition.
 */
export class ExplorationJob extends EventEmitter {
  readonly engine: ExplorationEngine;
  readonly flowMapper: FlowMapper;
  readonly metrics: ProcessingMetrics;
  readonly counters: JobCounters;
  readonly errors: JobErrorEntry[];
  readonly warnings: JobWarningEntry[];
  readonly storedUrls: Set<string>;
  readonly createdAt: string;
  currentUrl: string | null = null;

  private currentStatus: JobStatus;
  private pauseFlag = false;
  private cancelFlag = false;
  private wake: (() => void) | null = null;
  private startedAtValue: string | null;
  private finishedAtValue: string | null;

  constructor(
    readonly jobId: string,
    readonly config: ExplorationConfig,
    record?: JobRecord
  ) {
    super();
    const checkpoint = record?.checkpoint ?? null;
    this.engine = new ExplorationEngine(config, checkpoint ?? undefined);
    this.flowMapper = new FlowMapper(checkpoint?.flow);
    this.metrics = new ProcessingMetrics(checkpoint?.processingTimesMs);
    this.counters = checkpoint ? { ...checkpoint.counters } : emptyCounters();
    this.storedUrls = new Set(checkpoint?.storedUrls ?? []);
    this.errors = record ? [...record.errors] : [];
    this.warnings = record ? [...record.warnings] : [];
    this.createdAt = record?.createdAt ?? new Date().toISOString();
    this.startedAtValue = record?.startedAt ?? null;
    this.finishedAtValue = record?.finishedAt ?? null;
    // An interrupted run is re-entered through idle -> running; a paused one stays paused.
    this.currentStatus = record?.status === 'paused' ? 'paused' : 'idle';
  }

  static fromRecord(record: JobRecord): ExplorationJob {
    if (isTerminalStatus(record.status)) {
      throw new IllegalStateTransitionError(record.status, 'running', { jobId: record.jobId });
    }
    return new ExplorationJob(record.jobId, record.config, record);
  }

  get status(): JobStatus {
    return this.currentStatus;
  }

  get pauseRequested(): boolean {
    return this.pauseFlag;
  }

  get cancelRequested(): boolean {
    return this.cancelFlag;
  }

  get isTerminal(): boolean {
    return isTerminalStatus(this.currentStatus);
  }

  transition(to: JobStatus): void {
    const from = this.currentStatus;
    assertTransition(from, to, this.jobId);
    this.currentStatus = to;

    if (to === 'running' && !this.startedAtValue) {
      this.startedAtValue = new Date().toISOString();
    }
    if (isTerminalStatus(to)) {
      this.finishedAtValue = new Date().toISOString();
      this.currentUrl = null;
    }
    if (from === 'paused') {
      this.wakeLoop();
    }
    this.emit('status', to);
  }

  /**
   * Ask a running job to pause at its next loop boundary.
   */
  requestPause(): void {
    if (this.currentStatus !== 'running' || this.cancelFlag) {
      throw new IllegalStateTransitionError(this.currentStatus, 'paused', { jobId: this.jobId });
    }
    this.pauseFlag = true;
  }

  /** Called by the loop at a boundary once it has honoured a pause request. */
  applyPause(): void {
    this.pauseFlag = false;
    this.transition('paused');
  }

  /**
   * Resume a paused job, or withdraw a pause request the loop has not reached yet.
   */
  resume(): void {
    if (this.currentStatus === 'running' && this.pauseFlag) {
      this.pauseFlag = false;
      return;
    }
    if (this.currentStatus !== 'paused') {
      throw new IllegalStateTransitionError(this.currentStatus, 'running', { jobId: this.jobId });
    }
    this.transition('running');
  }

  /**
   * A paused job is cancelled at once; a running one at its next loop boundary.
   */
  requestCancel(): void {
    if (this.currentStatus === 'paused') {
      this.pauseFlag = false;
      this.transition('cancelled');
      return;
    }
    if (this.currentStatus !== 'running') {
      throw new IllegalStateTransitionError(this.currentStatus, 'cancelled', { jobId: this.jobId });
    }
    this.cancelFlag = true;
  }

  /** Resolves when the job leaves `paused`, immediately if it is not paused. */
  waitForResume(): Promise<void> {
    if (this.currentStatus !== 'paused') {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.wake = resolve;
    });
  }

  /** Resolves with the status once the job reaches one of `statuses`. */
  waitForStatus(statuses: JobStatus[]): Promise<JobStatus> {
    if (statuses.includes(this.currentStatus)) {
      return Promise.resolve(this.currentStatus);
    }
    return new Promise<JobStatus>((resolve) => {
      const listener = (status: JobStatus) => {
        if (statuses.includes(status)) {
          this.off('status', listener);
          resolve(status);
        }
      };
      this.on('status', listener);
    });
  }

  recordError(kind: JobErrorKind, url: string | null, error: unknown): JobErrorEntry {
    const entry: JobErrorEntry = {
      kind,
      url,
      message: getErrorMessage(error),
      category: categorizeError(error),
      occurredAt: new Date().toISOString(),
    };
    this.errors.push(entry);
    return entry;
  }

  recordWarning(url: string, step: string, error: unknown): JobWarningEntry {
    const entry: JobWarningEntry = {
      url,
      step,
      message: getErrorMessage(error),
      occurredAt: new Date().toISOString(),
    };
    this.warnings.push(entry);
    return entry;
  }

  /** Pages the job expects to process in total, bounded by max pages. */
  get total(): number {
    return Math.min(this.config.maxPages, this.counters.processed + this.engine.queuedCount);
  }

  progress(): ExplorationProgress {
    return {
      jobId: this.jobId,
      status: this.currentStatus,
      processed: this.counters.processed,
      total: this.total,
      queued: this.engine.queuedCount,
      failed: this.counters.failed,
      currentUrl: this.currentUrl,
      externalLinksDetected: this.counters.externalLinks,
      estimatedTimeRemainingMs: this.metrics.estimateRemainingMs(this.total - this.counters.processed),
      processingRatePerMinute: this.metrics.ratePerMinute(),
      recentPages: this.metrics.recentPages(),
    };
  }

  snapshot(): ExplorationJobSnapshot {
    const progress = this.progress();
    return {
      jobId: this.jobId,
      status: this.currentStatus,
      config: { ...this.config, includePaths: [...this.config.includePaths], excludePaths: [...this.config.excludePaths] },
      counters: { ...this.counters },
      queued: progress.queued,
      total: progress.total,
      currentUrl: this.currentUrl,
      pauseRequested: this.pauseFlag,
      cancelRequested: this.cancelFlag,
      errors: this.errors.map((entry) => ({ ...entry })),
      warnings: this.warnings.map((entry) => ({ ...entry })),
      estimatedTimeRemainingMs: progress.estimatedTimeRemainingMs,
      processingRatePerMinute: progress.processingRatePerMinute,
      createdAt: this.createdAt,
      startedAt: this.startedAtValue,
      finishedAt: this.finishedAtValue,
    };
  }

  toRecord(): JobRecord {
    const engineState = this.engine.snapshot();
    return {
      jobId: this.jobId,
      status: this.currentStatus,
      config: this.config,
      counters: { ...this.counters },
      errors: [...this.errors],
      warnings: [...this.warnings],
      createdAt: this.createdAt,
      startedAt: this.startedAtValue,
      finishedAt: this.finishedAtValue,
      updatedAt: new Date().toISOString(),
      checkpoint: {
        frontier: engineState.frontier,
        visited: engineState.visited,
        storedUrls: [...this.storedUrls],
        counters: { ...this.counters },
        flow: this.flowMapper.toSnapshot(),
        processingTimesMs: this.metrics.window(),
      },
    };
  }

  private wakeLoop(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }
}
