import type { LinkRecord, PageQuery, PageRecord } from '../../types/knowledge.js';
import { canonicalizeUrl, toPageKey } from '../../utils/urlCanonicalizer.js';
import type { KnowledgeStorage } from './KnowledgeStorage.js';

function linkKey(fromKey: string, toKey: string): string {
  return `${fromKey}>${toKey}`;
}

/**
 * Process-local backend with the same upsert semantics as the graph database.
 * Records are copied on the way in and out.
 */
export class InMemoryKnowledgeStorage implements KnowledgeStorage {
  private readonly pages = new Map<string, PageRecord>();
  private readonly links = new Map<string, LinkRecord>();
  private readonly outgoing = new Map<string, Set<string>>();
  private readonly incoming = new Map<string, Set<string>>();
  private readonly jobPages = new Map<string, Set<string>>();

  async storePage(page: PageRecord): Promise<void> {
    const url = canonicalizeUrl(page.url) ?? page.url;
    const key = toPageKey(url);
    this.pages.set(key, structuredClone({ ...page, url, key }));
    if (page.jobId !== null) {
      this.index(this.jobPages, page.jobId, key);
    }
  }

  async getPage(url: string): Promise<PageRecord | null> {
    const page = this.pages.get(toPageKey(url));
    return page ? structuredClone(page) : null;
  }

  async storeLink(link: LinkRecord): Promise<void> {
    const from = canonicalizeUrl(link.from) ?? link.from;
    const to = canonicalizeUrl(link.to) ?? link.to;
    const fromKey = toPageKey(from);
    const toKey = toPageKey(to);
    const key = linkKey(fromKey, toKey);

    this.links.set(key, structuredClone({ ...link, from, to }));
    this.index(this.outgoing, fromKey, key);
    this.index(this.incoming, toKey, key);
  }

  async getLinksFrom(url: string): Promise<LinkRecord[]> {
    return this.collect(this.outgoing.get(toPageKey(url)));
  }

  async getLinksTo(url: string): Promise<LinkRecord[]> {
    return this.collect(this.incoming.get(toPageKey(url)));
  }

  async listPages(query: PageQuery = {}): Promise<PageRecord[]> {
    const { jobId } = query;
    if (jobId === undefined) {
      return [...this.pages.values()].map((page) => structuredClone(page));
    }
    const keys = this.jobPages.get(jobId) ?? new Set<string>();
    return [...this.pages.values()].filter((page) => keys.has(page.key)).map((page) => structuredClone(page));
  }

  async close(): Promise<void> {
    // nothing to release
  }

  private index(map: Map<string, Set<string>>, owner: string, key: string): void {
    const keys = map.get(owner) ?? new Set<string>();
    keys.add(key);
    map.set(owner, keys);
  }

  private collect(keys: Set<string> | undefined): LinkRecord[] {
    if (!keys) {
      return [];
    }
    const result: LinkRecord[] = [];
    keys.forEach((key) => {
      const link = this.links.get(key);
      if (link) {
        result.push(structuredClone(link));
      }
    });
    return result;
  }
}
