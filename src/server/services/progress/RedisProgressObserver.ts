import type {
  ExplorationProgress,
  ExternalLinkDetected,
  PageCompletedSummary,
  ProgressErrorPayload,
  ProgressEvent,
} from '../../types/progress.js';
import type { ProgressObserver } from './ProgressObserver.js';

/** The part of an ioredis client this observer uses. */
export interface ProgressPublisher {
  publish(channel: string, message: string): Promise<number>;
}

/**
 * Publishes each event as JSON on `<prefix>:<jobId>:<kind>`, e.g.
 * `exploration:3f2c...:page_completed`.
 */
export class RedisProgressObserver implements ProgressObserver {
  readonly name = 'redis';

  constructor(
    private readonly publisher: ProgressPublisher,
    private readonly channelPrefix: string = 'exploration'
  ) {}

  async onProgress(progress: ExplorationProgress): Promise<void> {
    await this.publish(progress.jobId, { kind: 'progress', payload: progress, timestamp: new Date().toISOString() });
  }

  async onPageCompleted(summary: PageCompletedSummary): Promise<void> {
    await this.publish(summary.jobId, {
      kind: 'page_completed',
      payload: summary,
      timestamp: new Date().toISOString(),
    });
  }

  async onExternalLinkDetected(event: ExternalLinkDetected): Promise<void> {
    await this.publish(event.jobId, {
      kind: 'external_link_detected',
      payload: event,
      timestamp: new Date().toISOString(),
    });
  }

  async onError(payload: ProgressErrorPayload): Promise<void> {
    await this.publish(payload.jobId, { kind: 'error', payload, timestamp: new Date().toISOString() });
  }

  channelFor(jobId: string, kind: ProgressEvent['kind']): string {
    return `${this.channelPrefix}:${jobId}:${kind}`;
  }

  private async publish(jobId: string, event: ProgressEvent): Promise<void> {
    await this.publisher.publish(this.channelFor(jobId, event.kind), JSON.stringify(event));
  }
}
