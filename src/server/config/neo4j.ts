import neo4j, { type Driver, type Session } from 'neo4j-driver';
import { logger } from '../utils/logger.js';
import { retryWithBackoff } from '../utils/retry.js';
import { getEnv } from './env.js';

// Re-export Driver type for use in other modules
export type { Driver, Session };

let driver: Driver | null = null;

/**
 * Connect to Neo4j, retrying transient failures, and return the shared driver.
 * Integers come back as JS numbers (disableLosslessIntegers); page depths and
 * counters stay far below 2^53.
 */
export async function connectNeo4j(): Promise<Driver> {
  if (driver) {
    return driver;
  }

  const env = getEnv();
  const candidate = neo4j.driver(env.NEO4J_URI, neo4j.auth.basic(env.NEO4J_USER, env.NEO4J_PASSWORD), {
    maxConnectionPoolSize: env.NEO4J_MAX_POOL_SIZE,
    disableLosslessIntegers: true,
  });

  try {
    await retryWithBackoff(() => candidate.verifyConnectivity(), { maxAttempts: 5, initialDelay: 1000 }, 'neo4j connect');
  } catch (error) {
    await candidate.close();
    throw error;
  }

  logger.info({ uri: env.NEO4J_URI, maxPoolSize: env.NEO4J_MAX_POOL_SIZE }, 'Connected to Neo4j');
  driver = candidate;
  return driver;
}

export async function closeNeo4j(): Promise<void> {
  if (driver) {
    await driver.close();
    driver = null;
    logger.info('Neo4j driver closed');
  }
}
