import type { LinkRecord, PageQuery, PageRecord } from '../../types/knowledge.js';

/**
 * Graph persistence for pages and the links between them.
 *
 * Every backend upserts: storing a page for an existing canonical URL replaces
 * it, storing a link for an existing (from, to) pair replaces its attributes.
 * Links may point at URLs that have no stored page yet.
 *
 * The page record's `jobId` names the job that stored it last, but a backend
 * remembers every job that stored a page: `listPages({ jobId })` returns all of
 * them, whichever job wrote the record since.
 */
export interface KnowledgeStorage {
  storePage(page: PageRecord): Promise<void>;
  getPage(url: string): Promise<PageRecord | null>;
  storeLink(link: LinkRecord): Promise<void>;
  getLinksFrom(url: string): Promise<LinkRecord[]>;
  getLinksTo(url: string): Promise<LinkRecord[]>;
  listPages(query?: PageQuery): Promise<PageRecord[]>;
  close(): Promise<void>;
}
