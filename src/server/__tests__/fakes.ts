import { FetchError } from '../types/errors';
import type { ExternalLinkDetected, PageCompletedSummary, ProgressErrorPayload } from '../types/progress';
import type { FetchedPage, PageFetcher } from '../services/fetch/PageFetcher';
import type { ProgressObserver } from '../services/progress/ProgressObserver';

export const SITE = 'https://site.test';

/** Minimal HTML page: a title, one paragraph and one anchor per href. */
export function sitePage(title: string, hrefs: string[] = []): string {
  const anchors = hrefs.map((href) => `<a href="${href}">${href}</a>`).join('');
  return `<html><head><title>${title}</title></head><body><p>About ${title}</p>${anchors}</body></html>`;
}

interface Hold {
  reached: () => void;
  released: Promise<void>;
}

/**
 * In-process website keyed by absolute URL. Unknown URLs answer 404.
 */
export class FakeSite implements PageFetcher {
  readonly requests: string[] = [];
  private readonly failures = new Map<string, number>();
  private readonly holds = new Map<number, Hold>();

  constructor(private readonly pages: Record<string, string>) {}

  /** Answer the next `times` requests for `url` with 503. */
  failNext(url: string, times: number): void {
    this.failures.set(url, times);
  }

  /**
   * Park the `count`-th request until `release` is called. `reached` resolves
   * once that request has arrived.
   */
  holdRequest(count: number): { reached: Promise<void>; release: () => void } {
    let signalReached: () => void = () => undefined;
    let release: () => void = () => undefined;
    const reached = new Promise<void>((resolve) => {
      signalReached = resolve;
    });
    const released = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.holds.set(count, { reached: signalReached, released });
    return { reached, release };
  }

  async fetch(url: string): Promise<FetchedPage> {
    this.requests.push(url);
    const hold = this.holds.get(this.requests.length);
    if (hold) {
      hold.reached();
      await hold.released;
    }

    const remainingFailures = this.failures.get(url) ?? 0;
    if (remainingFailures > 0) {
      this.failures.set(url, remainingFailures - 1);
      throw new FetchError(url, `HTTP 503 for ${url}`, { statusCode: 503 });
    }

    const html = this.pages[url];
    if (html === undefined) {
      throw new FetchError(url, `HTTP 404 for ${url}`, { statusCode: 404 });
    }
    return { url, finalUrl: url, statusCode: 200, contentType: 'text/html', rawContent: html };
  }
}

/** Keeps every event it receives, in order. */
export class RecordingObserver implements ProgressObserver {
  readonly name = 'recording';
  readonly pages: PageCompletedSummary[] = [];
  readonly externalLinks: ExternalLinkDetected[] = [];
  readonly errors: ProgressErrorPayload[] = [];
  progressEvents = 0;

  onProgress(): void {
    this.progressEvents++;
  }

  onPageCompleted(summary: PageCompletedSummary): void {
    this.pages.push(summary);
  }

  onExternalLinkDetected(event: ExternalLinkDetected): void {
    this.externalLinks.push(event);
  }

  onError(payload: ProgressErrorPayload): void {
    this.errors.push(payload);
  }
}

/** Let every pending promise callback run. */
export function settle(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
