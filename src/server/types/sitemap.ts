import type { PageVisits, PopularPath } from './flow.js';

export const UNCATEGORIZED = 'Uncategorized';

export interface SitemapPageSummary {
  url: string;
  title: string;
  description: string;
  mainTopics: string[];
  keywords: string[];
  depth: number;
  visitedAt: string;
}

export interface SitemapCategory {
  category: string;
  pages: SitemapPageSummary[];
  count: number;
}

export interface SemanticSitemap {
  type: 'semantic';
  hierarchy: SitemapCategory[];
  topics: string[];
  totalPages: number;
  categories: number;
  generatedAt: string;
}

export interface UserJourney {
  path: string[];
  steps: number;
  count: number;
}

export interface FunctionalSitemap {
  type: 'functional';
  entryPoints: string[];
  exitPoints: string[];
  popularPaths: PopularPath[];
  popularPages: PageVisits[];
  userJourneys: UserJourney[];
  averagePathLength: number;
  generatedAt: string;
}

export type SiteMap = SemanticSitemap | FunctionalSitemap;
