import { connectNeo4j } from '../../config/neo4j.js';
import type { Env } from '../../config/env.js';
import { logger } from '../../utils/logger.js';
import { InMemoryKnowledgeStorage } from './InMemoryKnowledgeStorage.js';
import type { KnowledgeStorage } from './KnowledgeStorage.js';
import { Neo4jKnowledgeStorage } from './Neo4jKnowledgeStorage.js';

/**
 * Build the storage backend selected by KNOWLEDGE_STORAGE_BACKEND.
 */
export async function createKnowledgeStorage(env: Env): Promise<KnowledgeStorage> {
  if (env.KNOWLEDGE_STORAGE_BACKEND === 'neo4j') {
    const driver = await connectNeo4j();
    const storage = new Neo4jKnowledgeStorage(driver, env.NEO4J_DATABASE);
    await storage.ensureSchema();
    logger.info('Knowledge storage: neo4j');
    return storage;
  }

  logger.info('Knowledge storage: in-memory');
  return new InMemoryKnowledgeStorage();
}
