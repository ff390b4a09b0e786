import type { Driver } from 'neo4j-driver';
import { z } from 'zod';
import { StorageError, getErrorMessage } from '../../types/errors.js';
import type { LinkRecord, PageQuery, PageRecord } from '../../types/knowledge.js';
import { createChildLogger } from '../../utils/logger.js';
import { canonicalizeUrl, toPageKey } from '../../utils/urlCanonicalizer.js';
import {
  attributesSchema,
  discoveredFormSchema,
  entitySchema,
  jsonColumn,
  pageContentSchema,
  pageRecordSchema,
  topicSummarySchema,
} from '../../validation/knowledgeSchemas.js';
import type { KnowledgeStorage } from './KnowledgeStorage.js';

const log = createChildLogger({ component: 'Neo4jKnowledgeStorage' });

/**
 * Property map of a (:Resource:Page) node. Nested values are JSON columns because
 * Neo4j properties cannot hold maps.
 */
const pageNodeSchema = z
  .object({
    key: z.string(),
    url: z.string(),
    depth: z.number(),
    visitedAt: z.string(),
    referrer: z.string().nullable().default(null),
    jobId: z.string().nullable().default(null),
    contentJson: jsonColumn(pageContentSchema),
    entitiesJson: jsonColumn(z.array(entitySchema)),
    topicsJson: jsonColumn(topicSummarySchema),
    formsJson: jsonColumn(z.array(discoveredFormSchema)),
    mutatingFormCount: z.number().default(0),
    embeddingId: z.string().nullable().default(null),
  })
  .transform((node) =>
    pageRecordSchema.parse({
      key: node.key,
      url: node.url,
      depth: node.depth,
      visitedAt: node.visitedAt,
      referrer: node.referrer,
      jobId: node.jobId,
      content: node.contentJson,
      entities: node.entitiesJson,
      topics: node.topicsJson,
      forms: node.formsJson,
      mutatingFormCount: node.mutatingFormCount,
      embeddingId: node.embeddingId,
    })
  );

const linkRowSchema = z.object({
  from: z.string(),
  to: z.string(),
  text: z.string().default(''),
  attributesJson: jsonColumn(attributesSchema),
  kind: z.enum(['internal', 'external']),
  discoveredAt: z.string(),
});

/**
 * Knowledge graph in Neo4j. Every URL is a (:Resource {key}) node; stored pages
 * additionally carry the :Page label, so links can reference URLs that were
 * never (or not yet) crawled. (:Job)-[:STORED]->(:Page) records every job that
 * stored a page.
 */
export class Neo4jKnowledgeStorage implements KnowledgeStorage {
  constructor(
    private readonly driver: Driver,
    private readonly database?: string
  ) {}

  async ensureSchema(): Promise<void> {
    await this.run('ensureSchema', 'CREATE CONSTRAINT resource_key IF NOT EXISTS FOR (r:Resource) REQUIRE r.key IS UNIQUE', {});
    await this.run('ensureSchema', 'CREATE CONSTRAINT job_id IF NOT EXISTS FOR (j:Job) REQUIRE j.jobId IS UNIQUE', {});
  }

  async storePage(page: PageRecord): Promise<void> {
    const url = canonicalizeUrl(page.url) ?? page.url;
    await this.run(
      'storePage',
      `
        MERGE (p:Resource {key: $key})
        SET p:Page, p += $props
        WITH p
        WHERE $jobId IS NOT NULL
        MERGE (j:Job {jobId: $jobId})
        MERGE (j)-[:STORED]->(p)
      `,
      {
        key: toPageKey(url),
        jobId: page.jobId,
        props: {
          url,
          depth: page.depth,
          visitedAt: page.visitedAt,
          referrer: page.referrer,
          jobId: page.jobId,
          title: page.content.title,
          categories: page.topics.categories,
          contentJson: JSON.stringify(page.content),
          entitiesJson: JSON.stringify(page.entities),
          topicsJson: JSON.stringify(page.topics),
          formsJson: JSON.stringify(page.forms),
          mutatingFormCount: page.mutatingFormCount,
          embeddingId: page.embeddingId,
        },
      }
    );
  }

  async getPage(url: string): Promise<PageRecord | null> {
    const records = await this.run('getPage', 'MATCH (p:Page {key: $key}) RETURN p {.*} AS page', {
      key: toPageKey(url),
    });
    const first = records[0];
    return first ? this.parsePage(first.get('page')) : null;
  }

  async storeLink(link: LinkRecord): Promise<void> {
    const from = canonicalizeUrl(link.from) ?? link.from;
    const to = canonicalizeUrl(link.to) ?? link.to;
    await this.run(
      'storeLink',
      `
        MERGE (from:Resource {key: $fromKey})
        ON CREATE SET from.url = $from
        MERGE (to:Resource {key: $toKey})
        ON CREATE SET to.url = $to
        MERGE (from)-[l:LINKS_TO]->(to)
        SET l.text = $text,
            l.attributesJson = $attributesJson,
            l.kind = $kind,
            l.discoveredAt = $discoveredAt
      `,
      {
        from,
        to,
        fromKey: toPageKey(from),
        toKey: toPageKey(to),
        text: link.text,
        attributesJson: JSON.stringify(link.attributes),
        kind: link.kind,
        discoveredAt: link.discoveredAt,
      }
    );
  }

  async getLinksFrom(url: string): Promise<LinkRecord[]> {
    return this.queryLinks(
      'getLinksFrom',
      `
        MATCH (from:Resource {key: $key})-[l:LINKS_TO]->(to:Resource)
        RETURN from.url AS from, to.url AS to, l.text AS text, l.attributesJson AS attributesJson,
               l.kind AS kind, l.discoveredAt AS discoveredAt
        ORDER BY l.discoveredAt, to.url
      `,
      url
    );
  }

  async getLinksTo(url: string): Promise<LinkRecord[]> {
    return this.queryLinks(
      'getLinksTo',
      `
        MATCH (from:Resource)-[l:LINKS_TO]->(to:Resource {key: $key})
        RETURN from.url AS from, to.url AS to, l.text AS text, l.attributesJson AS attributesJson,
               l.kind AS kind, l.discoveredAt AS discoveredAt
        ORDER BY l.discoveredAt, from.url
      `,
      url
    );
  }

  async listPages(query: PageQuery = {}): Promise<PageRecord[]> {
    const records = await this.run(
      'listPages',
      `
        MATCH (p:Page)
        WHERE $jobId IS NULL OR EXISTS { MATCH (:Job {jobId: $jobId})-[:STORED]->(p) }
        RETURN p {.*} AS page
        ORDER BY p.visitedAt, p.url
      `,
      { jobId: query.jobId ?? null }
    );
    return records.map((record) => this.parsePage(record.get('page')));
  }

  async close(): Promise<void> {
    // The driver is shared and closed by the application on shutdown.
  }

  private async queryLinks(operation: string, cypher: string, url: string): Promise<LinkRecord[]> {
    const records = await this.run(operation, cypher, { key: toPageKey(url) });
    return records.map((record) => {
      const row = linkRowSchema.parse(record.toObject());
      return {
        from: row.from,
        to: row.to,
        text: row.text,
        attributes: row.attributesJson,
        kind: row.kind,
        discoveredAt: row.discoveredAt,
      };
    });
  }

  private parsePage(value: unknown): PageRecord {
    const parsed = pageNodeSchema.safeParse(value);
    if (!parsed.success) {
      throw new StorageError('parsePage', parsed.error.message);
    }
    return parsed.data;
  }

  private async run(operation: string, cypher: string, params: Record<string, unknown>) {
    const session = this.driver.session(this.database ? { database: this.database } : undefined);
    try {
      const result = await session.run(cypher, params);
      return result.records;
    } catch (error) {
      log.error({ operation, error: getErrorMessage(error) }, 'Neo4j query failed');
      throw new StorageError(operation, getErrorMessage(error));
    } finally {
      await session.close();
    }
  }
}
