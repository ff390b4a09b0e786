import { z } from 'zod';

/**
 * Schemas for records read back from durable backends, where stored values
 * arrive untyped (Neo4j property maps, MongoDB documents, JSON columns).
 */

export const headingSchema = z.object({
  level: z.number().int(),
  text: z.string(),
});

export const pageContentSchema = z.object({
  title: z.string(),
  description: z.string(),
  headings: z.array(headingSchema),
  paragraphs: z.array(z.string()),
  text: z.string(),
});

export const entitySchema = z.object({
  type: z.enum(['EMAIL', 'URL', 'PHONE', 'DATE', 'MONEY']),
  value: z.string(),
});

export const topicSummarySchema = z.object({
  keywords: z.array(z.string()),
  mainTopics: z.array(z.string()),
  categories: z.array(z.string()),
});

export const formFieldSchema = z.object({
  name: z.string(),
  type: z.string(),
  value: z.string().optional(),
  readOnly: z.boolean(),
});

export const discoveredFormSchema = z.object({
  action: z.string(),
  method: z.string(),
  fields: z.array(formFieldSchema),
  safe: z.boolean(),
});

export const attributesSchema = z.record(z.string());

export const pageRecordSchema = z.object({
  key: z.string(),
  url: z.string(),
  depth: z.number().int().nonnegative(),
  visitedAt: z.string(),
  referrer: z.string().nullable().default(null),
  jobId: z.string().nullable().default(null),
  content: pageContentSchema,
  entities: z.array(entitySchema),
  topics: topicSummarySchema,
  forms: z.array(discoveredFormSchema),
  mutatingFormCount: z.number().int().nonnegative(),
  embeddingId: z.string().nullable().default(null),
});

/**
 * Parse a JSON string column. Malformed JSON becomes a zod issue instead of a SyntaxError.
 */
export function jsonColumn<T extends z.ZodTypeAny>(schema: T) {
  return z.string().transform((value, ctx): unknown => {
    try {
      return JSON.parse(value);
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Invalid JSON' });
      return z.NEVER;
    }
  }).pipe(schema);
}
