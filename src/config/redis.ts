/**
 * Redis Client Configuration
 *
 * Shared ioredis client for the distributed rate-limit store and health checks.
 * BullMQ opens its own connections from queueConnection.
 */

import Redis from 'ioredis';

import { logger } from '../observability/logger';

import { config } from './index';

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
      maxRetriesPerRequest: 3,
      retryStrategy: (times: number) => {
        if (times > 3) {
          return null;
        }
        return Math.min(times * 100, 3000);
      },
      lazyConnect: true,
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
