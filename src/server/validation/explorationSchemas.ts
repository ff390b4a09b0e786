import { z } from 'zod';
import { ValidationError, type ValidationIssue } from '../types/errors.js';
import type { ExplorationConfig } from '../types/job.js';
import { canonicalizeUrl } from '../utils/urlCanonicalizer.js';

export interface ExplorationDefaults {
  maxDepth: number;
  maxPages: number;
  subdomainPolicy: ExplorationConfig['subdomainPolicy'];
}

const jobStatusSchema = z.enum(['idle', 'running', 'paused', 'completed', 'failed', 'cancelled']);
const strategySchema = z.enum(['BFS', 'DFS']);
const subdomainPolicySchema = z.enum(['internal', 'external']);

const pathPatternSchema = z
  .string()
  .min(1, 'Path pattern cannot be empty')
  .refine((pattern) => pattern.startsWith('/') || pattern.startsWith('*'), 'Path pattern must start with / or *');

/**
 * Job configuration as accepted from callers. Omitted limits fall back to the
 * deployment defaults.
 */
export function explorationConfigSchema(defaults: ExplorationDefaults) {
  return z.object({
    seedUrl: z
      .string()
      .min(1, 'Seed URL is required')
      .refine((value) => canonicalizeUrl(value) !== null, 'Seed URL must be an absolute http(s) URL'),
    maxDepth: z.number().int('Max depth must be an integer').min(0, 'Max depth cannot be negative').default(defaults.maxDepth),
    maxPages: z.number().int('Max pages must be an integer').min(1, 'Max pages must be at least 1').default(defaults.maxPages),
    strategy: strategySchema.default('BFS'),
    subdomainPolicy: subdomainPolicySchema.default(defaults.subdomainPolicy),
    includePaths: z.array(pathPatternSchema).default([]),
    excludePaths: z.array(pathPatternSchema).default([]),
  });
}

/**
 * @throws ValidationError listing every rejected field
 */
export function parseExplorationConfig(input: unknown, defaults: ExplorationDefaults): ExplorationConfig {
  const result = explorationConfigSchema(defaults).safeParse(input);
  if (!result.success) {
    const issues: ValidationIssue[] = result.error.issues.map((issue) => ({
      field: issue.path.join('.') || 'config',
      message: issue.message,
    }));
    throw new ValidationError('Invalid exploration configuration', issues);
  }
  const seedUrl = canonicalizeUrl(result.data.seedUrl) ?? result.data.seedUrl;
  return { ...result.data, seedUrl };
}

const frontierEntrySchema = z.object({
  url: z.string(),
  depth: z.number().int().nonnegative(),
  referrer: z.string().nullable(),
  path: z.array(z.string()),
});

const countersSchema = z.object({
  processed: z.number().int().nonnegative(),
  stored: z.number().int().nonnegative(),
  failed: z.number().int().nonnegative(),
  externalLinks: z.number().int().nonnegative(),
});

const flowSnapshotSchema = z.object({
  referrers: z.array(z.tuple([z.string(), z.array(z.string())])),
  visitCounts: z.array(z.tuple([z.string(), z.number()])),
  entryPoints: z.array(z.string()),
  outgoingCounts: z.array(z.tuple([z.string(), z.number()])),
  paths: z.array(z.array(z.string())),
});

/** Stored job documents; unknown keys such as Mongo's _id are dropped. */
export const jobRecordSchema = z.object({
  jobId: z.string(),
  status: jobStatusSchema,
  config: z.object({
    seedUrl: z.string(),
    maxDepth: z.number().int().nonnegative(),
    maxPages: z.number().int().positive(),
    strategy: strategySchema,
    subdomainPolicy: subdomainPolicySchema,
    includePaths: z.array(z.string()),
    excludePaths: z.array(z.string()),
  }),
  counters: countersSchema,
  errors: z.array(
    z.object({
      kind: z.enum(['fetch', 'storage', 'internal']),
      url: z.string().nullable(),
      message: z.string(),
      category: z.enum(['network', 'timeout', 'http_4xx', 'http_5xx', 'parsing', 'other']),
      occurredAt: z.string(),
    })
  ),
  warnings: z.array(
    z.object({
      url: z.string(),
      step: z.string(),
      message: z.string(),
      occurredAt: z.string(),
    })
  ),
  createdAt: z.string(),
  startedAt: z.string().nullable(),
  finishedAt: z.string().nullable(),
  updatedAt: z.string(),
  checkpoint: z
    .object({
      frontier: z.array(frontierEntrySchema),
      visited: z.array(z.string()),
      storedUrls: z.array(z.string()),
      counters: countersSchema,
      flow: flowSnapshotSchema,
      processingTimesMs: z.array(z.number()),
    })
    .nullable(),
});

const jobIdParams = z.object({
  jobId: z.string().min(1, 'Job ID is required'),
});

const urlQuery = z.string().min(1, 'URL is required');

export const explorationSchemas = {
  startJob: {
    // Limits are defaulted and checked by JobManager.startJob
    body: z.object({}).passthrough(),
  },

  listJobs: {
    query: z.object({
      status: jobStatusSchema.optional(),
    }),
  },

  jobById: {
    params: jobIdParams,
  },

  sitemap: {
    params: jobIdParams.extend({
      kind: z.enum(['semantic', 'functional']),
    }),
    query: z.object({
      format: z.enum(['json', 'xml']).default('json'),
    }),
  },
};

export const knowledgeSchemas = {
  getPage: {
    query: z.object({
      url: urlQuery,
    }),
  },

  getLinks: {
    query: z.object({
      url: urlQuery,
      direction: z.enum(['from', 'to']).default('from'),
    }),
  },

  search: {
    body: z
      .object({
        text: z.string().min(1).optional(),
        vector: z.array(z.number()).min(1).optional(),
        topK: z.number().int().min(1).max(100).default(10),
        filter: z.record(z.union([z.string(), z.number(), z.boolean(), z.null()])).optional(),
      })
      .refine((body) => (body.text === undefined) !== (body.vector === undefined), {
        message: 'Provide exactly one of text or vector',
      }),
  },
};
