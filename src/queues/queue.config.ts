/**
 * BullMQ Queue Configuration
 *
 * Provides connection settings and default job options for all queues.
 */

import { ConnectionOptions, DefaultJobOptions } from 'bullmq';

import { config } from '../config';

/**
 * Redis connection configuration for BullMQ
 */
export const queueConnection: ConnectionOptions = {
  host: config.redis.host,
  port: config.redis.port,
  password: config.redis.password,
  maxRetriesPerRequest: null, // Required for BullMQ workers
};

/**
 * Default job options for generation jobs.
 * Retries cover worker crashes and settle failures; the ledger makes
 * redelivery harmless.
 */
export const generationJobOptions: DefaultJobOptions = {
  attempts: 3,
  backoff: {
    type: 'exponential',
    delay: 2000,
  },
  removeOnComplete: {
    count: 1000,
  },
  removeOnFail: {
    count: 5000,
  },
};

/**
 * Default job options for notifications
 */
export const notificationJobOptions: DefaultJobOptions = {
  attempts: 5,
  backoff: {
    type: 'exponential',
    delay: 1000, // 1s, 2s, 4s, 8s, 16s
  },
  removeOnComplete: {
    count: 100,
  },
  removeOnFail: {
    count: 1000,
  },
};

export const maintenanceJobOptions: DefaultJobOptions = {
  attempts: 1,
  removeOnComplete: {
    count: 20,
  },
  removeOnFail: {
    count: 100,
  },
};

/**
 * Queue names
 * Note: BullMQ doesn't allow colons in queue names as they are used as Redis key separators
 */
export const QUEUE_NAMES = {
  GENERATIONS: 'credit-generations',
  NOTIFICATIONS: 'credit-notifications',
  MAINTENANCE: 'credit-maintenance',
} as const;

/**
 * Worker concurrency settings
 */
export const WORKER_CONCURRENCY = {
  GENERATIONS: 4,
  NOTIFICATIONS: 10,
  MAINTENANCE: 1,
} as const;
