import type { JobStatus } from './job.js';

export interface RecentPage {
  url: string;
  title: string;
}

export interface ExplorationProgress {
  jobId: string;
  status: JobStatus;
  processed: number;
  total: number;
  queued: number;
  failed: number;
  currentUrl: string | null;
  externalLinksDetected: number;
  estimatedTimeRemainingMs: number | null;
  processingRatePerMinute: number | null;
  recentPages: RecentPage[];
}

export interface PageCompletedSummary {
  jobId: string;
  url: string;
  title: string;
  depth: number;
  internalLinks: number;
  externalLinks: number;
  safeForms: number;
  warnings: number;
}

export interface ExternalLinkDetected {
  jobId: string;
  from: string;
  to: string;
}

export interface ProgressErrorPayload {
  jobId: string;
  context: string;
  message: string;
}

/**
 * Events are delivered to observers and never persisted.
 */
export type ProgressEvent =
  | { kind: 'progress'; payload: ExplorationProgress; timestamp: string }
  | { kind: 'page_completed'; payload: PageCompletedSummary; timestamp: string }
  | { kind: 'external_link_detected'; payload: ExternalLinkDetected; timestamp: string }
  | { kind: 'error'; payload: ProgressErrorPayload; timestamp: string };
