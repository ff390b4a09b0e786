import type { Logger } from 'pino';
import type {
  ExplorationProgress,
  ExternalLinkDetected,
  PageCompletedSummary,
  ProgressErrorPayload,
} from '../../types/progress.js';
import { createChildLogger } from '../../utils/logger.js';
import type { ProgressObserver } from './ProgressObserver.js';

export class LoggingProgressObserver implements ProgressObserver {
  readonly name = 'logging';

  constructor(private readonly log: Logger = createChildLogger({ component: 'ExplorationProgress' })) {}

  onProgress(progress: ExplorationProgress): void {
    this.log.info(
      {
        jobId: progress.jobId,
        status: progress.status,
        processed: progress.processed,
        total: progress.total,
        failed: progress.failed,
        currentUrl: progress.currentUrl,
        etaMs: progress.estimatedTimeRemainingMs,
      },
      `Exploration progress ${progress.processed}/${progress.total}`
    );
  }

  onPageCompleted(summary: PageCompletedSummary): void {
    this.log.debug(summary, `Page completed: ${summary.url}`);
  }

  onExternalLinkDetected(event: ExternalLinkDetected): void {
    this.log.debug(event, 'External link detected');
  }

  onError(payload: ProgressErrorPayload): void {
    this.log.warn(payload, `Exploration error (${payload.context})`);
  }
}
