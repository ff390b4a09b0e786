import type {
  ExplorationProgress,
  ExternalLinkDetected,
  PageCompletedSummary,
  ProgressErrorPayload,
} from '../../types/progress.js';

/**
 * Receiver of crawl progress. Delivery is best-effort: a throwing or slow
 * observer never affects the crawl or other observers.
 */
export interface ProgressObserver {
  readonly name: string;
  onProgress(progress: ExplorationProgress): void | Promise<void>;
  onPageCompleted(summary: PageCompletedSummary): void | Promise<void>;
  onExternalLinkDetected(event: ExternalLinkDetected): void | Promise<void>;
  onError(payload: ProgressErrorPayload): void | Promise<void>;
}
