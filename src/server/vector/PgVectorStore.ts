/**
 * PgVectorStore - pgvector implementation of VectorStore
 *
 * Page embeddings live in `<schema>.page_embeddings`. Ranking is exhaustive
 * (no ANN index) so results match the in-memory store: cosine similarity
 * descending, then insertion sequence ascending.
 */

import type { Pool } from 'pg';
import { z } from 'zod';
import { StorageError, getErrorMessage } from '../types/errors.js';
import { createChildLogger } from '../utils/logger.js';
import type { VectorEntry, VectorMetadata, VectorSearchResult, VectorStore } from './VectorStore.js';

const log = createChildLogger({ component: 'PgVectorStore' });

const metadataSchema = z.record(z.union([z.string(), z.number(), z.boolean(), z.null()]));

const entryRowSchema = z.object({
  id: z.string(),
  embedding: z.string().transform((value) => z.array(z.number()).parse(JSON.parse(value))),
  metadata: metadataSchema,
});

const searchRowSchema = z.object({
  id: z.string(),
  score: z.coerce.number(),
  metadata: metadataSchema,
});

export class PgVectorStore implements VectorStore {
  private readonly table: string;
  private schemaEnsured = false;

  constructor(
    private readonly pool: Pool,
    private readonly schema: string = 'public'
  ) {
    if (!/^[a-z0-9_]+$/i.test(schema)) {
      throw new Error(`Invalid schema name: ${schema}. Only alphanumeric characters and underscores are allowed.`);
    }
    this.table = `${this.escapeIdentifier(schema)}.page_embeddings`;
  }

  /**
   * Escape identifier (schema/table name) to prevent SQL injection
   */
  private escapeIdentifier(identifier: string): string {
    return `"${identifier.replace(/"/g, '""')}"`;
  }

  async ensureSchema(): Promise<void> {
    if (this.schemaEnsured) {
      return;
    }
    await this.query('ensureSchema', 'CREATE EXTENSION IF NOT EXISTS vector');
    await this.query('ensureSchema', `CREATE SCHEMA IF NOT EXISTS ${this.escapeIdentifier(this.schema)}`);
    await this.query(
      'ensureSchema',
      `
        CREATE TABLE IF NOT EXISTS ${this.table} (
          id TEXT PRIMARY KEY,
          embedding vector NOT NULL,
          dims INTEGER NOT NULL,
          metadata JSONB NOT NULL DEFAULT '{}'::jsonb,
          seq BIGSERIAL,
          created_at TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT NOW(),
          updated_at TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT NOW()
        )
      `
    );
    this.schemaEnsured = true;
    log.info({ schema: this.schema }, 'pgvector schema ensured');
  }

  async storeEmbedding(id: string, embedding: number[], metadata: VectorMetadata = {}): Promise<void> {
    await this.ensureSchema();
    // pgvector expects '[1,2,3]'; pg would serialize a JS array as '{1,2,3}'
    await this.query(
      'storeEmbedding',
      `
        INSERT INTO ${this.table} (id, embedding, dims, metadata)
        VALUES ($1, $2::text::vector, $3, $4::jsonb)
        ON CONFLICT (id)
        DO UPDATE SET
          embedding = EXCLUDED.embedding,
          dims = EXCLUDED.dims,
          metadata = EXCLUDED.metadata,
          updated_at = NOW()
      `,
      [id, JSON.stringify(embedding), embedding.length, JSON.stringify(metadata)]
    );
  }

  async updateEmbedding(id: string, embedding?: number[], metadata?: VectorMetadata): Promise<boolean> {
    await this.ensureSchema();
    const result = await this.query(
      'updateEmbedding',
      `
        UPDATE ${this.table}
        SET embedding = COALESCE($2::text::vector, embedding),
            dims = COALESCE($3, dims),
            metadata = metadata || $4::jsonb,
            updated_at = NOW()
        WHERE id = $1
      `,
      [
        id,
        embedding ? JSON.stringify(embedding) : null,
        embedding ? embedding.length : null,
        JSON.stringify(metadata ?? {}),
      ]
    );
    return (result.rowCount ?? 0) > 0;
  }

  async deleteEmbedding(id: string): Promise<boolean> {
    await this.ensureSchema();
    const result = await this.query('deleteEmbedding', `DELETE FROM ${this.table} WHERE id = $1`, [id]);
    return (result.rowCount ?? 0) > 0;
  }

  async getEmbedding(id: string): Promise<VectorEntry | null> {
    await this.ensureSchema();
    const result = await this.query(
      'getEmbedding',
      `SELECT id, embedding::text AS embedding, metadata FROM ${this.table} WHERE id = $1`,
      [id]
    );
    const row = result.rows[0];
    return row ? entryRowSchema.parse(row) : null;
  }

  async searchSimilar(query: number[], topK: number, filter?: VectorMetadata): Promise<VectorSearchResult[]> {
    if (topK <= 0) {
      return [];
    }
    await this.ensureSchema();

    // Mismatched dimensions and zero vectors score 0 instead of erroring or yielding NaN.
    const queryIsZero = query.every((value) => value === 0);
    const result = await this.query(
      'searchSimilar',
      `
        SELECT id, metadata, score FROM (
          SELECT id, metadata, seq,
            CASE
              WHEN $3::boolean OR dims <> $2 OR vector_norm(embedding) = 0 THEN 0
              ELSE 1 - (embedding <=> CAST($1::text AS vector))
            END AS score
          FROM ${this.table}
          WHERE metadata @> $4::jsonb
        ) ranked
        ORDER BY score DESC, seq ASC
        LIMIT $5
      `,
      [JSON.stringify(query), query.length, queryIsZero, JSON.stringify(filter ?? {}), topK]
    );

    return result.rows.map((row) => searchRowSchema.parse(row));
  }

  async count(): Promise<number> {
    await this.ensureSchema();
    const result = await this.query('count', `SELECT COUNT(*)::int AS count FROM ${this.table}`);
    return z.coerce.number().parse(result.rows[0]?.count ?? 0);
  }

  async clear(): Promise<void> {
    await this.ensureSchema();
    await this.query('clear', `TRUNCATE ${this.table}`);
  }

  async close(): Promise<void> {
    // The pool is shared and closed by the application on shutdown.
  }

  private async query(operation: string, sql: string, params: unknown[] = []) {
    try {
      return await this.pool.query(sql, params);
    } catch (error) {
      log.error({ operation, error: getErrorMessage(error) }, 'pgvector query failed');
      throw new StorageError(operation, getErrorMessage(error));
    }
  }
}
