import { ValidationError } from '../../types/errors';
import {
  jobRecordSchema,
  knowledgeSchemas,
  parseExplorationConfig,
  type ExplorationDefaults,
} from '../explorationSchemas';

const DEFAULTS: ExplorationDefaults = { maxDepth: 3, maxPages: 50, subdomainPolicy: 'internal' };

function issuesOf(input: unknown): Array<{ field: string; message: string }> {
  try {
    parseExplorationConfig(input, DEFAULTS);
  } catch (error) {
    if (error instanceof ValidationError) {
      return error.issues;
    }
    throw error;
  }
  throw new Error('expected the configuration to be rejected');
}

describe('parseExplorationConfig', () => {
  it('fills in defaults and canonicalizes the seed', () => {
    expect(parseExplorationConfig({ seedUrl: 'HTTPS://Site.test' }, DEFAULTS)).toEqual({
      seedUrl: 'https://site.test/',
      maxDepth: 3,
      maxPages: 50,
      strategy: 'BFS',
      subdomainPolicy: 'internal',
      includePaths: [],
      excludePaths: [],
    });
  });

  it('keeps explicit values', () => {
    const config = parseExplorationConfig(
      { seedUrl: 'https://site.test/', maxDepth: 0, maxPages: 1, strategy: 'DFS', subdomainPolicy: 'external', includePaths: ['/docs*'] },
      DEFAULTS
    );
    expect(config).toMatchObject({ maxDepth: 0, maxPages: 1, strategy: 'DFS', subdomainPolicy: 'external', includePaths: ['/docs*'] });
  });

  it('reports every rejected field', () => {
    expect(issuesOf({ seedUrl: 'mailto:someone@site.test', maxDepth: 1.5, maxPages: 0, includePaths: ['docs'] })).toEqual([
      { field: 'seedUrl', message: 'Seed URL must be an absolute http(s) URL' },
      { field: 'maxDepth', message: 'Max depth must be an integer' },
      { field: 'maxPages', message: 'Max pages must be at least 1' },
      { field: 'includePaths.0', message: 'Path pattern must start with / or *' },
    ]);
  });

  it('rejects a missing configuration', () => {
    expect(issuesOf(null)).toEqual([{ field: 'config', message: 'Expected object, received null' }]);
    expect(issuesOf({ seedUrl: 'https://site.test/', strategy: 'random' })[0].field).toBe('strategy');
  });
});

describe('knowledgeSchemas.search', () => {
  it('defaults topK', () => {
    expect(knowledgeSchemas.search.body.parse({ text: 'widgets' })).toEqual({ text: 'widgets', topK: 10 });
  });

  it('requires exactly one of text and vector', () => {
    const both = knowledgeSchemas.search.body.safeParse({ text: 'widgets', vector: [1, 0] });
    const neither = knowledgeSchemas.search.body.safeParse({ topK: 3 });

    expect(both.success).toBe(false);
    expect(neither.success).toBe(false);
    if (!both.success) {
      expect(both.error.issues[0].message).toBe('Provide exactly one of text or vector');
    }
  });

  it('bounds topK', () => {
    expect(knowledgeSchemas.search.body.safeParse({ vector: [1], topK: 101 }).success).toBe(false);
  });
});

describe('jobRecordSchema', () => {
  it('drops unknown keys of stored documents', () => {
    const record = jobRecordSchema.parse({
      _id: 'mongo-object-id',
      jobId: 'job-1',
      status: 'paused',
      config: {
        seedUrl: 'https://site.test/',
        maxDepth: 1,
        maxPages: 5,
        strategy: 'BFS',
        subdomainPolicy: 'internal',
        includePaths: [],
        excludePaths: [],
      },
      counters: { processed: 0, stored: 0, failed: 0, externalLinks: 0 },
      errors: [],
      warnings: [],
      createdAt: '2024-01-01T00:00:00.000Z',
      startedAt: null,
      finishedAt: null,
      updatedAt: '2024-01-01T00:00:00.000Z',
      checkpoint: null,
    });

    expect('_id' in record).toBe(false);
    expect(record.status).toBe('paused');
  });
});
