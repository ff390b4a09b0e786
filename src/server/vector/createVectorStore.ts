import type { Env } from '../config/env.js';
import { getPostgresPool } from '../config/postgres.js';
import { logger } from '../utils/logger.js';
import { InMemoryVectorStore } from './InMemoryVectorStore.js';
import { PgVectorStore } from './PgVectorStore.js';
import type { VectorStore } from './VectorStore.js';

/**
 * Build the vector store selected by VECTOR_STORE_BACKEND.
 */
export async function createVectorStore(env: Env): Promise<VectorStore> {
  if (env.VECTOR_STORE_BACKEND === 'pgvector') {
    const store = new PgVectorStore(getPostgresPool(), env.PGVECTOR_SCHEMA);
    await store.ensureSchema();
    logger.info({ schema: env.PGVECTOR_SCHEMA }, 'Vector store: pgvector');
    return store;
  }

  logger.info('Vector store: in-memory');
  return new InMemoryVectorStore();
}
