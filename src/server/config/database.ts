import { MongoClient, type Db } from 'mongodb';
import { logger } from '../utils/logger.js';
import { retryWithBackoff } from '../utils/retry.js';
import { getEnv } from './env.js';

// Re-export Db type for use in other modules
export type { Db };

let client: MongoClient | null = null;
let db: Db | null = null;

export async function connectDB(): Promise<Db> {
  if (db) {
    return db;
  }

  const env = getEnv();
  const mongoClient = new MongoClient(env.MONGODB_URI, {
    maxPoolSize: 10,
    serverSelectionTimeoutMS: 5000,
  });

  await retryWithBackoff(() => mongoClient.connect(), { maxAttempts: 3, initialDelay: 1000 }, 'mongodb connect');

  client = mongoClient;
  db = mongoClient.db(env.DB_NAME);
  logger.info({ dbName: env.DB_NAME }, 'Connected to MongoDB');
  return db;
}

export async function closeDB(): Promise<void> {
  if (client) {
    await client.close();
    client = null;
    db = null;
    logger.info('MongoDB connection closed');
  }
}
