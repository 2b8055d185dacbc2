/**
 * Redis Client Configuration
 *
 * Provides a shared Redis client for rate limiting and idempotency caching.
 */

import Redis from 'ioredis';
import { config } from './index';
import { logger } from '../observability';

let redisClient: Redis | null = null;

/**
 * Get or create Redis client singleton
 */
export const getRedisClient = (): Redis => {
  if (!redisClient) {
    redisClient = new Redis({
      host: config.redis.host,
      port: config.redis.port,
      password: config.redis.password,
      connectTimeout: config.redis.connectTimeout,
      maxRetriesPerRequest: config.redis.maxRetriesPerRequest,
      retryStrategy: (times: number) => {
        if (times > 3) {
          return null;
        }
        return Math.min(times * 100, 3000);
      },
      lazyConnect: config.redis.lazyConnect,
    });

    redisClient.on('error', (err) => {
      logger.error({ err }, 'Redis client error');
    });

    redisClient.on('connect', () => {
      logger.info('Redis client connected');
    });
  }

  return redisClient;
};

export const connectRedis = async (): Promise<void> => {
  const client = getRedisClient();
  if (client.status === 'ready') {
    return;
  }
  await client.connect();
};

export const disconnectRedis = async (): Promise<void> => {
  if (redisClient) {
    await redisClient.quit();
    redisClient = null;
  }
};

export const isRedisConnected = (): boolean => {
  return redisClient?.status === 'ready';
};
