import type { RecentPage } from '../../types/progress.js';

const WINDOW_SIZE = 20;
const RECENT_PAGES = 5;

/**
 * Rolling page timings of one job, used for ETA and throughput in progress events.
 */
export class ProcessingMetrics {
  private readonly durations: number[];
  private readonly recent: RecentPage[] = [];

  constructor(initialDurations: number[] = []) {
    this.durations = initialDurations.slice(-WINDOW_SIZE);
  }

  record(durationMs: number, page?: RecentPage): void {
    this.durations.push(durationMs);
    if (this.durations.length > WINDOW_SIZE) {
      this.durations.shift();
    }
    if (page) {
      this.recent.push(page);
      if (this.recent.length > RECENT_PAGES) {
        this.recent.shift();
      }
    }
  }

  averageMs(): number | null {
    if (this.durations.length === 0) {
      return null;
    }
    return this.durations.reduce((sum, value) => sum + value, 0) / this.durations.length;
  }

  /** Pages per minute over the window, or null before the first page. */
  ratePerMinute(): number | null {
    const average = this.averageMs();
    if (average === null) {
      return null;
    }
    return average === 0 ? null : 60_000 / average;
  }

  estimateRemainingMs(remainingPages: number): number | null {
    const average = this.averageMs();
    if (average === null) {
      return null;
    }
    return Math.max(0, Math.round(average * remainingPages));
  }

  recentPages(): RecentPage[] {
    return this.recent.map((page) => ({ ...page }));
  }

  window(): number[] {
    return [...this.durations];
  }
}
