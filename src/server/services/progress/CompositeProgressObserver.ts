import type {
  ExplorationProgress,
  ExternalLinkDetected,
  PageCompletedSummary,
  ProgressErrorPayload,
} from '../../types/progress.js';
import { getErrorMessage } from '../../types/errors.js';
import { createChildLogger } from '../../utils/logger.js';
import { observerFailures } from '../../utils/metrics.js';
import type { ProgressObserver } from './ProgressObserver.js';

const log = createChildLogger({ component: 'CompositeProgressObserver' });

/**
 * Fans every event out to its observers without waiting for them. Each observer
 * has its own delivery chain, so events reach it in emission order even when it
 * is async, and a failure is logged and counted without touching the others.
 */
export class CompositeProgressObserver implements ProgressObserver {
  readonly name = 'composite';
  private readonly observers: ProgressObserver[] = [];
  private readonly chains = new Map<ProgressObserver, Promise<void>>();

  constructor(observers: ProgressObserver[] = []) {
    observers.forEach((observer) => this.add(observer));
  }

  add(observer: ProgressObserver): void {
    if (!this.observers.includes(observer)) {
      this.observers.push(observer);
    }
  }

  remove(observer: ProgressObserver): void {
    const index = this.observers.indexOf(observer);
    if (index >= 0) {
      this.observers.splice(index, 1);
    }
  }

  get size(): number {
    return this.observers.length;
  }

  onProgress(progress: ExplorationProgress): void {
    this.dispatch('progress', (observer) => observer.onProgress(progress));
  }

  onPageCompleted(summary: PageCompletedSummary): void {
    this.dispatch('page_completed', (observer) => observer.onPageCompleted(summary));
  }

  onExternalLinkDetected(event: ExternalLinkDetected): void {
    this.dispatch('external_link_detected', (observer) => observer.onExternalLinkDetected(event));
  }

  onError(payload: ProgressErrorPayload): void {
    this.dispatch('error', (observer) => observer.onError(payload));
  }

  /** Resolves once every delivery scheduled so far has settled. */
  async flush(): Promise<void> {
    await Promise.all(this.chains.values());
  }

  private dispatch(event: string, deliver: (observer: ProgressObserver) => void | Promise<void>): void {
    for (const observer of this.observers) {
      const previous = this.chains.get(observer) ?? Promise.resolve();
      const next = previous
        .then(() => deliver(observer))
        .catch((error: unknown) => {
          observerFailures.inc({ observer: observer.name, event });
          log.warn({ observer: observer.name, event, error: getErrorMessage(error) }, 'Progress observer failed');
        });
      this.chains.set(observer, next);
    }
  }
}
