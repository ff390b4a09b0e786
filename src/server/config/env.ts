/**
 * Environment Variable Validation
 *
 * Centralized parsing of all environment variables. Every problem is collected
 * and reported in one error so a misconfigured deployment fails on startup.
 */

// Load dotenv early to ensure environment variables are available
import * as dotenv from 'dotenv';
dotenv.config();

import { logger } from '../utils/logger.js';

export type NodeEnv = 'development' | 'production' | 'test';
export type KnowledgeStorageBackend = 'memory' | 'neo4j';
export type VectorStoreBackend = 'memory' | 'pgvector';
export type JobRegistryBackend = 'memory' | 'mongodb';
export type SubdomainPolicy = 'internal' | 'external';

function parseNumericEnv(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const num = parseInt(value, 10);
  return isNaN(num) ? defaultValue : num;
}

function parseBooleanEnv(value: string | undefined, defaultValue: boolean): boolean {
  if (!value) return defaultValue;
  return value === 'true';
}

function parseEnumEnv<T extends string>(
  name: string,
  value: string | undefined,
  allowed: readonly T[],
  defaultValue: T,
  errors: string[]
): T {
  if (!value) return defaultValue;
  const match = allowed.find((candidate) => candidate === value);
  if (!match) {
    errors.push(`${name}: Invalid value "${value}". Must be one of ${allowed.join(', ')}.`);
    return defaultValue;
  }
  return match;
}

export interface Env {
  // Server Configuration
  NODE_ENV: NodeEnv;
  PORT: number;

  // Logging Configuration
  LOG_LEVEL?: string;
  LOG_PRETTY?: string;

  // Backend selection
  KNOWLEDGE_STORAGE_BACKEND: KnowledgeStorageBackend;
  VECTOR_STORE_BACKEND: VectorStoreBackend;
  JOB_REGISTRY_BACKEND: JobRegistryBackend;

  // Neo4j Configuration
  NEO4J_URI: string;
  NEO4J_USER: string;
  NEO4J_PASSWORD: string;
  NEO4J_DATABASE?: string;
  NEO4J_MAX_POOL_SIZE: number;

  // PostgreSQL / pgvector Configuration
  POSTGRES_HOST: string;
  POSTGRES_PORT: number;
  POSTGRES_DB: string;
  POSTGRES_USER: string;
  POSTGRES_PASSWORD?: string;
  PGVECTOR_SCHEMA: string;

  // MongoDB Configuration
  MONGODB_URI: string;
  DB_NAME: string;

  // Redis Configuration
  REDIS_HOST: string;
  REDIS_PORT: number;
  REDIS_PASSWORD?: string;
  PROGRESS_PUBSUB_ENABLED: boolean;
  EXPLORATION_QUEUE_ENABLED: boolean;
  EXPLORATION_QUEUE_CONCURRENCY: number;

  // Fetching
  CRAWLER_USER_AGENT: string;
  FETCH_TIMEOUT_MS: number;
  FETCH_MAX_RETRIES: number;
  FETCH_INITIAL_RETRY_DELAY_MS: number;
  FETCH_MAX_RETRY_DELAY_MS: number;
  FETCH_CONCURRENCY: number;
  STORAGE_RETRY_DELAY_MS: number;

  // Exploration defaults
  SUBDOMAIN_POLICY: SubdomainPolicy;
  DEFAULT_MAX_DEPTH: number;
  DEFAULT_MAX_PAGES: number;
  EMBEDDING_DIMENSION: number;
}

let validatedEnv: Env | null = null;

/**
 * Validate environment variables. Validates on first call, then returns cached result.
 */
export function validateEnv(): Env {
  if (validatedEnv) {
    return validatedEnv;
  }

  const errors: string[] = [];

  const nodeEnv = parseEnumEnv<NodeEnv>(
    'NODE_ENV',
    process.env.NODE_ENV,
    ['development', 'production', 'test'],
    'development',
    errors
  );

  const port = parseNumericEnv(process.env.PORT, 4000);
  if (port < 1 || port > 65535) {
    errors.push(`PORT: Invalid value "${process.env.PORT}". Must be between 1 and 65535.`);
  }

  const storageBackend = parseEnumEnv<KnowledgeStorageBackend>(
    'KNOWLEDGE_STORAGE_BACKEND',
    process.env.KNOWLEDGE_STORAGE_BACKEND,
    ['memory', 'neo4j'],
    'memory',
    errors
  );
  const vectorBackend = parseEnumEnv<VectorStoreBackend>(
    'VECTOR_STORE_BACKEND',
    process.env.VECTOR_STORE_BACKEND,
    ['memory', 'pgvector'],
    'memory',
    errors
  );
  const registryBackend = parseEnumEnv<JobRegistryBackend>(
    'JOB_REGISTRY_BACKEND',
    process.env.JOB_REGISTRY_BACKEND,
    ['memory', 'mongodb'],
    'memory',
    errors
  );
  const subdomainPolicy = parseEnumEnv<SubdomainPolicy>(
    'SUBDOMAIN_POLICY',
    process.env.SUBDOMAIN_POLICY,
    ['internal', 'external'],
    'internal',
    errors
  );

  const neo4jPoolSize = parseNumericEnv(process.env.NEO4J_MAX_POOL_SIZE, 50);
  if (neo4jPoolSize < 1) {
    errors.push(`NEO4J_MAX_POOL_SIZE: Invalid value "${process.env.NEO4J_MAX_POOL_SIZE}". Must be at least 1.`);
  }

  if (storageBackend === 'neo4j' && !process.env.NEO4J_PASSWORD) {
    errors.push('NEO4J_PASSWORD: Environment variable is required when KNOWLEDGE_STORAGE_BACKEND=neo4j.');
  }
  if (vectorBackend === 'pgvector' && !process.env.POSTGRES_PASSWORD) {
    errors.push('POSTGRES_PASSWORD: Environment variable is required when VECTOR_STORE_BACKEND=pgvector.');
  }

  const fetchConcurrency = parseNumericEnv(process.env.FETCH_CONCURRENCY, 4);
  if (fetchConcurrency < 1) {
    errors.push(`FETCH_CONCURRENCY: Invalid value "${process.env.FETCH_CONCURRENCY}". Must be at least 1.`);
  }

  const fetchMaxRetries = parseNumericEnv(process.env.FETCH_MAX_RETRIES, 3);
  if (fetchMaxRetries < 0) {
    errors.push(`FETCH_MAX_RETRIES: Invalid value "${process.env.FETCH_MAX_RETRIES}". Must be 0 or more.`);
  }

  const defaultMaxDepth = parseNumericEnv(process.env.DEFAULT_MAX_DEPTH, 3);
  if (defaultMaxDepth < 0) {
    errors.push(`DEFAULT_MAX_DEPTH: Invalid value "${process.env.DEFAULT_MAX_DEPTH}". Must be 0 or more.`);
  }

  const defaultMaxPages = parseNumericEnv(process.env.DEFAULT_MAX_PAGES, 100);
  if (defaultMaxPages < 1) {
    errors.push(`DEFAULT_MAX_PAGES: Invalid value "${process.env.DEFAULT_MAX_PAGES}". Must be at least 1.`);
  }

  const embeddingDimension = parseNumericEnv(process.env.EMBEDDING_DIMENSION, 128);
  if (embeddingDimension < 8) {
    errors.push(`EMBEDDING_DIMENSION: Invalid value "${process.env.EMBEDDING_DIMENSION}". Must be at least 8.`);
  }

  const queueConcurrency = parseNumericEnv(process.env.EXPLORATION_QUEUE_CONCURRENCY, 2);
  if (queueConcurrency < 1) {
    errors.push(
      `EXPLORATION_QUEUE_CONCURRENCY: Invalid value "${process.env.EXPLORATION_QUEUE_CONCURRENCY}". Must be at least 1.`
    );
  }

  if (errors.length > 0) {
    throw new Error(
      `Environment variable validation failed:\n${errors.map((e) => `  - ${e}`).join('\n')}\n\n` +
        `Please check your .env file or environment variables.`
    );
  }

  const neo4jPassword = process.env.NEO4J_PASSWORD || 'password';
  if (storageBackend === 'neo4j' && neo4jPassword === 'password') {
    logger.warn('NEO4J_PASSWORD is using the default "password". Set a real password outside local development.');
  }

  validatedEnv = {
    NODE_ENV: nodeEnv,
    PORT: port,

    LOG_LEVEL: process.env.LOG_LEVEL,
    LOG_PRETTY: process.env.LOG_PRETTY,

    KNOWLEDGE_STORAGE_BACKEND: storageBackend,
    VECTOR_STORE_BACKEND: vectorBackend,
    JOB_REGISTRY_BACKEND: registryBackend,

    NEO4J_URI: process.env.NEO4J_URI || 'bolt://localhost:7687',
    NEO4J_USER: process.env.NEO4J_USER || 'neo4j',
    NEO4J_PASSWORD: neo4jPassword,
    NEO4J_DATABASE: process.env.NEO4J_DATABASE,
    NEO4J_MAX_POOL_SIZE: neo4jPoolSize,

    POSTGRES_HOST: process.env.POSTGRES_HOST || 'localhost',
    POSTGRES_PORT: parseNumericEnv(process.env.POSTGRES_PORT, 5432),
    POSTGRES_DB: process.env.POSTGRES_DB || 'site_knowledge',
    POSTGRES_USER: process.env.POSTGRES_USER || 'postgres',
    POSTGRES_PASSWORD: process.env.POSTGRES_PASSWORD,
    PGVECTOR_SCHEMA: process.env.PGVECTOR_SCHEMA || 'public',

    MONGODB_URI: process.env.MONGODB_URI || 'mongodb://localhost:27017',
    DB_NAME: process.env.DB_NAME || 'site_knowledge',

    REDIS_HOST: process.env.REDIS_HOST || 'localhost',
    REDIS_PORT: parseNumericEnv(process.env.REDIS_PORT, 6379),
    REDIS_PASSWORD: process.env.REDIS_PASSWORD,
    PROGRESS_PUBSUB_ENABLED: parseBooleanEnv(process.env.PROGRESS_PUBSUB_ENABLED, false),
    EXPLORATION_QUEUE_ENABLED: parseBooleanEnv(process.env.EXPLORATION_QUEUE_ENABLED, false),
    EXPLORATION_QUEUE_CONCURRENCY: queueConcurrency,

    CRAWLER_USER_AGENT: process.env.CRAWLER_USER_AGENT || 'SiteKnowledgeExplorer/0.1 (+https://example.com/bot)',
    FETCH_TIMEOUT_MS: parseNumericEnv(process.env.FETCH_TIMEOUT_MS, 30000),
    FETCH_MAX_RETRIES: fetchMaxRetries,
    FETCH_INITIAL_RETRY_DELAY_MS: parseNumericEnv(process.env.FETCH_INITIAL_RETRY_DELAY_MS, 1000),
    FETCH_MAX_RETRY_DELAY_MS: parseNumericEnv(process.env.FETCH_MAX_RETRY_DELAY_MS, 30000),
    FETCH_CONCURRENCY: fetchConcurrency,
    STORAGE_RETRY_DELAY_MS: parseNumericEnv(process.env.STORAGE_RETRY_DELAY_MS, 500),

    SUBDOMAIN_POLICY: subdomainPolicy,
    DEFAULT_MAX_DEPTH: defaultMaxDepth,
    DEFAULT_MAX_PAGES: defaultMaxPages,
    EMBEDDING_DIMENSION: embeddingDimension,
  };

  return validatedEnv;
}

/**
 * Get validated environment variables
 */
export function getEnv(): Env {
  return validateEnv();
}
