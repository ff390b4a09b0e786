import type { DiscoveredForm, LinkKind } from './exploration.js';

export interface Heading {
  level: number;
  text: string;
}

export interface PageContent {
  title: string;
  description: string;
  headings: Heading[];
  paragraphs: string[];
  text: string;
}

export type EntityType = 'EMAIL' | 'URL' | 'PHONE' | 'DATE' | 'MONEY';

export interface Entity {
  type: EntityType;
  value: string;
}

export interface TopicSummary {
  keywords: string[];
  mainTopics: string[];
  categories: string[];
}

/**
 * One record per canonical URL. Storing a page for an existing key replaces it.
 */
export interface PageRecord {
  key: string;
  url: string;
  depth: number;
  visitedAt: string;
  referrer: string | null;
  jobId: string | null;
  content: PageContent;
  entities: Entity[];
  topics: TopicSummary;
  forms: DiscoveredForm[];
  mutatingFormCount: number;
  embeddingId: string | null;
}

export interface LinkRecord {
  from: string;
  to: string;
  text: string;
  attributes: Record<string, string>;
  kind: LinkKind;
  discoveredAt: string;
}

export interface PageQuery {
  jobId?: string;
}

export function emptyContent(): PageContent {
  return { title: '', description: '', headings: [], paragraphs: [], text: '' };
}

export function emptyTopics(): TopicSummary {
  return { keywords: [], mainTopics: [], categories: [] };
}
