import { Builder } from 'xml2js';
import type { PageQuery, PageRecord } from '../../types/knowledge.js';
import {
  UNCATEGORIZED,
  type FunctionalSitemap,
  type SemanticSitemap,
  type SiteMap,
  type SitemapCategory,
  type SitemapPageSummary,
} from '../../types/sitemap.js';
import type { KnowledgeStorage } from '../knowledge/KnowledgeStorage.js';
import type { FlowMapper } from '../exploration/FlowMapper.js';

const SITEMAP_NAMESPACE = 'http://www.sitemaps.org/schemas/sitemap/0.9';
const MAX_KEYWORDS_PER_PAGE = 10;

function summarize(page: PageRecord): SitemapPageSummary {
  return {
    url: page.url,
    title: page.content.title,
    description: page.content.description,
    mainTopics: page.topics.mainTopics,
    keywords: page.topics.keywords.slice(0, MAX_KEYWORDS_PER_PAGE),
    depth: page.depth,
    visitedAt: page.visitedAt,
  };
}

/**
 * Read-only views over stored pages (semantic) and the flow model (functional).
 * Generating a site map never writes to storage or the flow mapper.
 */
export class SiteMapGenerator {
  constructor(
    private readonly storage: KnowledgeStorage,
    private readonly flowMapper?: FlowMapper
  ) {}

  /**
   * Groups pages by their first category. Pages without one land in "Uncategorized".
   * Categories appear in order of first occurrence.
   */
  async generateSemanticSitemap(query: PageQuery = {}): Promise<SemanticSitemap> {
    const pages = await this.storage.listPages(query);
    const groups = new Map<string, SitemapPageSummary[]>();

    for (const page of pages) {
      const category = page.topics.categories[0] ?? UNCATEGORIZED;
      const bucket = groups.get(category) ?? [];
      bucket.push(summarize(page));
      groups.set(category, bucket);
    }

    const hierarchy: SitemapCategory[] = [...groups.entries()].map(([category, categoryPages]) => ({
      category,
      pages: categoryPages,
      count: categoryPages.length,
    }));

    return {
      type: 'semantic',
      hierarchy,
      topics: [...groups.keys()],
      totalPages: pages.length,
      categories: groups.size,
      generatedAt: new Date().toISOString(),
    };
  }

  generateFunctionalSitemap(): FunctionalSitemap {
    if (!this.flowMapper) {
      return {
        type: 'functional',
        entryPoints: [],
        exitPoints: [],
        popularPaths: [],
        popularPages: [],
        userJourneys: [],
        averagePathLength: 0,
        generatedAt: new Date().toISOString(),
      };
    }

    const analysis = this.flowMapper.analyzeFlows();
    return {
      type: 'functional',
      entryPoints: analysis.entryPoints,
      exitPoints: analysis.exitPoints,
      popularPaths: analysis.popularPaths,
      popularPages: analysis.popularPages,
      userJourneys: analysis.popularPaths.map(({ path, count }) => ({ path, steps: path.length, count })),
      averagePathLength: analysis.averagePathLength,
      generatedAt: new Date().toISOString(),
    };
  }

  exportToJson(sitemap: SiteMap): string {
    return JSON.stringify(sitemap, null, 2);
  }

  /**
   * sitemaps.org <urlset> with every URL the site map names, sorted and deduplicated.
   * Semantic site maps carry <lastmod> from the page visit time.
   */
  exportToXml(sitemap: SiteMap): string {
    const lastModified = new Map<string, string>();
    if (sitemap.type === 'semantic') {
      sitemap.hierarchy.forEach((group) => group.pages.forEach((page) => lastModified.set(page.url, page.visitedAt)));
    } else {
      sitemap.entryPoints.forEach((url) => lastModified.set(url, ''));
      sitemap.popularPages.forEach(({ url }) => lastModified.set(url, ''));
      sitemap.exitPoints.forEach((url) => lastModified.set(url, ''));
      sitemap.popularPaths.forEach(({ path }) => path.forEach((url) => lastModified.set(url, '')));
    }

    const urls = [...lastModified.keys()].sort().map((loc) => {
      const modified = lastModified.get(loc);
      return modified ? { loc, lastmod: modified } : { loc };
    });

    const builder = new Builder({ xmldec: { version: '1.0', encoding: 'UTF-8' } });
    return builder.buildObject({ urlset: { $: { xmlns: SITEMAP_NAMESPACE }, url: urls } });
  }
}
