import type { FlowAnalysis, FlowSnapshot, FlowStats, PageVisits, PopularPath } from '../../types/flow.js';

const TOP_N = 10;
const MIN_POPULAR_PATH_STEPS = 2;

/**
 * Navigation model of one job: referrers, visit counts, entry and exit points,
 * and the click paths walked from the seed.
 */
export class FlowMapper {
  private readonly referrers = new Map<string, string[]>();
  private readonly visitCounts = new Map<string, number>();
  private readonly entryPoints = new Set<string>();
  private readonly outgoingCounts = new Map<string, number>();
  private readonly paths: string[][] = [];
  private currentPath: string[] = [];

  constructor(snapshot?: FlowSnapshot) {
    if (snapshot) {
      snapshot.referrers.forEach(([url, refs]) => this.referrers.set(url, [...refs]));
      snapshot.visitCounts.forEach(([url, count]) => this.visitCounts.set(url, count));
      snapshot.entryPoints.forEach((url) => this.entryPoints.add(url));
      snapshot.outgoingCounts.forEach(([url, count]) => this.outgoingCounts.set(url, count));
      snapshot.paths.forEach((path) => this.paths.push([...path]));
    }
  }

  /**
   * Record a visit to `url`. A first visit without a referrer makes `url` an entry point.
   */
  trackNavigation(url: string, referrer: string | null): void {
    const previousVisits = this.visitCounts.get(url) ?? 0;
    this.visitCounts.set(url, previousVisits + 1);

    if (referrer === null) {
      if (previousVisits === 0) {
        this.entryPoints.add(url);
      }
      return;
    }

    const refs = this.referrers.get(url) ?? [];
    if (!refs.includes(referrer)) {
      refs.push(referrer);
    }
    this.referrers.set(url, refs);
  }

  /** Number of internal links discovered on `url`. Pages with zero are exit points. */
  recordOutgoingLinks(url: string, internalLinkCount: number): void {
    this.outgoingCounts.set(url, internalLinkCount);
  }

  /** First known referrer, or null for entry points and unknown pages. */
  getReferrer(url: string): string | null {
    return this.referrers.get(url)?.[0] ?? null;
  }

  getReferrers(url: string): string[] {
    return [...(this.referrers.get(url) ?? [])];
  }

  getVisitCount(url: string): number {
    return this.visitCounts.get(url) ?? 0;
  }

  isEntryPoint(url: string): boolean {
    return this.entryPoints.has(url);
  }

  getEntryPoints(): string[] {
    return [...this.entryPoints];
  }

  /**
   * Visited pages that have no outgoing internal link. A page whose outgoing
   * links were never recorded counts as an exit when nothing names it as a referrer.
   */
  getExitPoints(): string[] {
    const asReferrer = new Set<string>();
    this.referrers.forEach((refs) => refs.forEach((ref) => asReferrer.add(ref)));

    return [...this.visitCounts.keys()].filter((url) => {
      const outgoing = this.outgoingCounts.get(url);
      return outgoing !== undefined ? outgoing === 0 : !asReferrer.has(url);
    });
  }

  startPath(url: string): void {
    this.currentPath = [url];
  }

  addToPath(url: string): void {
    this.currentPath.push(url);
  }

  /** Close the current path and keep it if it has at least one step. */
  endPath(): void {
    if (this.currentPath.length > 0) {
      this.paths.push(this.currentPath);
    }
    this.currentPath = [];
  }

  /** Record a complete path in one call. */
  recordPath(path: string[]): void {
    if (path.length === 0) {
      return;
    }
    this.startPath(path[0]);
    path.slice(1).forEach((url) => this.addToPath(url));
    this.endPath();
  }

  getCurrentPath(): string[] {
    return [...this.currentPath];
  }

  getAllPaths(): string[][] {
    return this.paths.map((path) => [...path]);
  }

  /**
   * Distinct paths of at least two steps, by occurrence count descending.
   * Ties keep first-recorded order.
   */
  getPopularPaths(limit: number = TOP_N): PopularPath[] {
    const counts = new Map<string, PopularPath>();
    for (const path of this.paths) {
      if (path.length < MIN_POPULAR_PATH_STEPS) {
        continue;
      }
      const key = JSON.stringify(path);
      const existing = counts.get(key);
      if (existing) {
        existing.count++;
      } else {
        counts.set(key, { path: [...path], count: 1 });
      }
    }
    return [...counts.values()].sort((a, b) => b.count - a.count).slice(0, limit);
  }

  getPopularPages(limit: number = TOP_N): PageVisits[] {
    return [...this.visitCounts.entries()]
      .map(([url, visits]) => ({ url, visits }))
      .sort((a, b) => b.visits - a.visits)
      .slice(0, limit);
  }

  getAveragePathLength(): number {
    if (this.paths.length === 0) {
      return 0;
    }
    const total = this.paths.reduce((sum, path) => sum + path.length, 0);
    return total / this.paths.length;
  }

  analyzeFlows(): FlowAnalysis {
    return {
      entryPoints: this.getEntryPoints(),
      exitPoints: this.getExitPoints(),
      popularPaths: this.getPopularPaths(),
      popularPages: this.getPopularPages(),
      averagePathLength: this.getAveragePathLength(),
    };
  }

  getFlowStats(): FlowStats {
    let totalVisits = 0;
    this.visitCounts.forEach((count) => (totalVisits += count));
    return {
      totalPages: this.visitCounts.size,
      totalPaths: this.paths.length,
      entryPointCount: this.entryPoints.size,
      exitPointCount: this.getExitPoints().length,
      totalVisits,
    };
  }

  reset(): void {
    this.referrers.clear();
    this.visitCounts.clear();
    this.entryPoints.clear();
    this.outgoingCounts.clear();
    this.paths.length = 0;
    this.currentPath = [];
  }

  toSnapshot(): FlowSnapshot {
    return {
      referrers: [...this.referrers.entries()].map(([url, refs]) => [url, [...refs]]),
      visitCounts: [...this.visitCounts.entries()],
      entryPoints: [...this.entryPoints],
      outgoingCounts: [...this.outgoingCounts.entries()],
      paths: this.getAllPaths(),
    };
  }
}
