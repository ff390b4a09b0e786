import { parseStringPromise } from 'xml2js';
import { makePage } from '../../../__tests__/factories';
import { emptyTopics } from '../../../types/knowledge';
import { FlowMapper } from '../../exploration/FlowMapper';
import { InMemoryKnowledgeStorage } from '../../knowledge/InMemoryKnowledgeStorage';
import { SiteMapGenerator } from '../SiteMapGenerator';

const HOME = 'https://site.test/';
const DOCS = 'https://site.test/docs';
const GUIDE = 'https://site.test/guide';
const SEARCH = 'https://site.test/search?q=a&b=c';
const NAMESPACE = 'http://www.sitemaps.org/schemas/sitemap/0.9';

async function seededStorage(): Promise<InMemoryKnowledgeStorage> {
  const storage = new InMemoryKnowledgeStorage();
  await storage.storePage(
    makePage(DOCS, {
      depth: 1,
      visitedAt: '2024-01-02T00:00:00.000Z',
      content: { title: 'Docs', description: 'Reference', headings: [], paragraphs: [], text: '' },
      topics: {
        keywords: ['one', 'two', 'three', 'four', 'five', 'six', 'seven', 'eight', 'nine', 'ten', 'eleven', 'twelve'],
        mainTopics: ['Reference'],
        categories: ['Documentation', 'Education'],
      },
    })
  );
  await storage.storePage(makePage(HOME, { visitedAt: '2024-01-01T00:00:00.000Z', topics: emptyTopics() }));
  await storage.storePage(
    makePage(GUIDE, {
      depth: 1,
      jobId: 'job-2',
      visitedAt: '2024-01-03T00:00:00.000Z',
      topics: { keywords: [], mainTopics: [], categories: ['Documentation'] },
    })
  );
  return storage;
}

function sampleFlow(): FlowMapper {
  const flow = new FlowMapper();
  flow.trackNavigation(HOME, null);
  flow.trackNavigation(SEARCH, HOME);
  flow.recordOutgoingLinks(HOME, 1);
  flow.recordOutgoingLinks(SEARCH, 0);
  flow.recordPath([HOME, SEARCH]);
  return flow;
}

describe('SiteMapGenerator', () => {
  describe('semantic site map', () => {
    it('groups pages by their first category in order of first occurrence', async () => {
      const sitemap = await new SiteMapGenerator(await seededStorage()).generateSemanticSitemap();

      expect(sitemap.type).toBe('semantic');
      expect(sitemap.topics).toEqual(['Documentation', 'Uncategorized']);
      expect(sitemap.totalPages).toBe(3);
      expect(sitemap.categories).toBe(2);
      expect(sitemap.hierarchy.map((group) => [group.category, group.count, group.pages.map((page) => page.url)])).toEqual([
        ['Documentation', 2, [DOCS, GUIDE]],
        ['Uncategorized', 1, [HOME]],
      ]);
    });

    it('summarizes each page with at most ten keywords', async () => {
      const sitemap = await new SiteMapGenerator(await seededStorage()).generateSemanticSitemap();

      expect(sitemap.hierarchy[0].pages[0]).toEqual({
        url: DOCS,
        title: 'Docs',
        description: 'Reference',
        mainTopics: ['Reference'],
        keywords: ['one', 'two', 'three', 'four', 'five', 'six', 'seven', 'eight', 'nine', 'ten'],
        depth: 1,
        visitedAt: '2024-01-02T00:00:00.000Z',
      });
    });

    it('limits the map to one job', async () => {
      const sitemap = await new SiteMapGenerator(await seededStorage()).generateSemanticSitemap({ jobId: 'job-2' });

      expect(sitemap.totalPages).toBe(1);
      expect(sitemap.topics).toEqual(['Documentation']);
    });
  });

  describe('functional site map', () => {
    it('derives entry points, exits and journeys from the flow model', () => {
      const sitemap = new SiteMapGenerator(new InMemoryKnowledgeStorage(), sampleFlow()).generateFunctionalSitemap();

      expect(sitemap).toMatchObject({
        type: 'functional',
        entryPoints: [HOME],
        exitPoints: [SEARCH],
        popularPaths: [{ path: [HOME, SEARCH], count: 1 }],
        popularPages: [
          { url: HOME, visits: 1 },
          { url: SEARCH, visits: 1 },
        ],
        userJourneys: [{ path: [HOME, SEARCH], steps: 2, count: 1 }],
        averagePathLength: 2,
      });
    });

    it('is empty without a flow model', () => {
      const sitemap = new SiteMapGenerator(new InMemoryKnowledgeStorage()).generateFunctionalSitemap();

      expect(sitemap).toMatchObject({
        entryPoints: [],
        exitPoints: [],
        popularPaths: [],
        popularPages: [],
        userJourneys: [],
        averagePathLength: 0,
      });
    });
  });

  describe('export', () => {
    it('writes JSON that parses back to the same site map', async () => {
      const generator = new SiteMapGenerator(await seededStorage());
      const sitemap = await generator.generateSemanticSitemap();

      expect(JSON.parse(generator.exportToJson(sitemap))).toEqual(sitemap);
    });

    it('writes a sitemaps.org urlset with lastmod for semantic maps', async () => {
      const generator = new SiteMapGenerator(await seededStorage());
      const xml = generator.exportToXml(await generator.generateSemanticSitemap());

      expect(xml).toMatch(/^<\?xml version="1\.0" encoding="UTF-8"\?>/);
      const parsed: unknown = await parseStringPromise(xml);
      expect(parsed).toEqual({
        urlset: {
          $: { xmlns: NAMESPACE },
          url: [
            { loc: [HOME], lastmod: ['2024-01-01T00:00:00.000Z'] },
            { loc: [DOCS], lastmod: ['2024-01-02T00:00:00.000Z'] },
            { loc: [GUIDE], lastmod: ['2024-01-03T00:00:00.000Z'] },
          ],
        },
      });
    });

    it('lists every URL of a functional map once and escapes them', async () => {
      const generator = new SiteMapGenerator(new InMemoryKnowledgeStorage(), sampleFlow());
      const xml = generator.exportToXml(generator.generateFunctionalSitemap());

      expect(xml).toContain('<loc>https://site.test/search?q=a&amp;b=c</loc>');
      const parsed: unknown = await parseStringPromise(xml);
      expect(parsed).toEqual({
        urlset: {
          $: { xmlns: NAMESPACE },
          url: [{ loc: [HOME] }, { loc: [SEARCH] }],
        },
      });
    });
  });
});
