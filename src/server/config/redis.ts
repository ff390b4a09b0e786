import Redis, { type RedisOptions } from 'ioredis';
import { logger } from '../utils/logger.js';
import { getEnv } from './env.js';

export function getRedisOptions(): RedisOptions {
  const env = getEnv();
  return {
    host: env.REDIS_HOST,
    port: env.REDIS_PORT,
    password: env.REDIS_PASSWORD,
    maxRetriesPerRequest: 3,
    enableOfflineQueue: false,
    retryStrategy: (times: number) => (times > 10 ? null : Math.min(times * 200, 2000)),
  };
}

/**
 * Dedicated publisher connection for progress events.
 */
export function createRedisPublisher(): Redis {
  const client = new Redis(getRedisOptions());
  client.on('error', (error) => {
    logger.warn({ error }, 'Redis publisher connection error');
  });
  return client;
}
