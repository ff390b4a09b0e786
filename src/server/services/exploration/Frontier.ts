import type { ExplorationStrategy, FrontierEntry } from '../../types/exploration.js';

/**
 * Pending URLs of one job. BFS takes from the front (FIFO), DFS from the back (LIFO).
 * A URL is held at most once; pushing a URL that is already pending is a no-op.
 */
export class Frontier {
  private entries: FrontierEntry[] = [];
  private readonly pending = new Set<string>();

  constructor(
    private readonly strategy: ExplorationStrategy,
    initial: FrontierEntry[] = []
  ) {
    for (const entry of initial) {
      this.push(entry);
    }
  }

  get size(): number {
    return this.entries.length;
  }

  has(url: string): boolean {
    return this.pending.has(url);
  }

  push(entry: FrontierEntry): boolean {
    if (this.pending.has(entry.url)) {
      return false;
    }
    this.pending.add(entry.url);
    this.entries.push(entry);
    return true;
  }

  /**
   * Add the children of one page. Under DFS they are pushed in reverse so the
   * first link on the page is explored first.
   */
  pushChildren(children: FrontierEntry[]): FrontierEntry[] {
    const ordered = this.strategy === 'DFS' ? [...children].reverse() : children;
    const added = ordered.filter((child) => this.push(child));
    return this.strategy === 'DFS' ? added.reverse() : added;
  }

  next(): FrontierEntry | undefined {
    const entry = this.strategy === 'BFS' ? this.entries.shift() : this.entries.pop();
    if (entry) {
      this.pending.delete(entry.url);
    }
    return entry;
  }

  /** Entries in storage order, for checkpoints. Restoring them with the same strategy preserves visiting order. */
  toArray(): FrontierEntry[] {
    return this.entries.map((entry) => ({ ...entry, path: [...entry.path] }));
  }
}
