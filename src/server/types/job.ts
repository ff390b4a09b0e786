import type { ErrorCategory } from './errors.js';
import type { ExplorationStrategy, FrontierEntry, SubdomainPolicy } from './exploration.js';
import type { FlowSnapshot } from './flow.js';

export type JobStatus = 'idle' | 'running' | 'paused' | 'completed' | 'failed' | 'cancelled';

export const TERMINAL_JOB_STATUSES: readonly JobStatus[] = ['completed', 'failed', 'cancelled'];

export function isTerminalStatus(status: JobStatus): boolean {
  return TERMINAL_JOB_STATUSES.includes(status);
}

export interface ExplorationConfig {
  seedUrl: string;
  maxDepth: number;
  maxPages: number;
  strategy: ExplorationStrategy;
  subdomainPolicy: SubdomainPolicy;
  /** Path patterns with `*` wildcards; when non-empty an internal URL must match one */
  includePaths: string[];
  excludePaths: string[];
}

export type JobErrorKind = 'fetch' | 'storage' | 'internal';

export interface JobErrorEntry {
  kind: JobErrorKind;
  url: string | null;
  message: string;
  category: ErrorCategory;
  occurredAt: string;
}

export interface JobWarningEntry {
  url: string;
  step: string;
  message: string;
  occurredAt: string;
}

export interface JobCounters {
  /** URLs taken off the frontier and attempted, stored or failed */
  processed: number;
  stored: number;
  failed: number;
  externalLinks: number;
}

export interface JobCheckpoint {
  frontier: FrontierEntry[];
  visited: string[];
  storedUrls: string[];
  counters: JobCounters;
  flow: FlowSnapshot;
  processingTimesMs: number[];
}

export interface ExplorationJobSnapshot {
  jobId: string;
  status: JobStatus;
  config: ExplorationConfig;
  counters: JobCounters;
  queued: number;
  total: number;
  currentUrl: string | null;
  pauseRequested: boolean;
  cancelRequested: boolean;
  errors: JobErrorEntry[];
  warnings: JobWarningEntry[];
  estimatedTimeRemainingMs: number | null;
  processingRatePerMinute: number | null;
  createdAt: string;
  startedAt: string | null;
  finishedAt: string | null;
}

/**
 * Persisted status record, keyed by job id.
 */
export interface JobRecord {
  jobId: string;
  status: JobStatus;
  config: ExplorationConfig;
  counters: JobCounters;
  errors: JobErrorEntry[];
  warnings: JobWarningEntry[];
  createdAt: string;
  startedAt: string | null;
  finishedAt: string | null;
  updatedAt: string;
  checkpoint: JobCheckpoint | null;
}
