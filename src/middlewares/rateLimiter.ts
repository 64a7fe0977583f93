/**
 * Rate Limiting Middleware
 *
 * Provides rate limiting for API endpoints using Redis store
 * to ensure distributed rate limiting across multiple instances.
 *
 * - Test: memory store with very lenient limits
 * - RATE_LIMIT_DISABLED=true turns every limiter into a pass-through
 */

import { NextFunction, Request, RequestHandler, Response } from 'express';
import rateLimit from 'express-rate-limit';
import RedisStore from 'rate-limit-redis';

import { config } from '../config';
import { getRedisClient } from '../config/redis';
import { logger } from '../observability/logger';
import { ErrorCode } from '../types/errors';

/**
 * Create a Redis store for rate limiting
 * Falls back to memory store in test environment
 */
const createStore = (prefix: string) => {
  if (config.isTest) {
    return undefined; // Use default memory store in tests
  }

  try {
    const client = getRedisClient();
    return new RedisStore({
      // @ts-expect-error - RedisStore expects a specific sendCommand signature
      sendCommand: (...args: string[]) => client.call(...args),
      prefix,
    });
  } catch (error) {
    logger.warn({ err: error }, 'Redis rate-limit store unavailable, using memory store');
    return undefined;
  }
};

/**
 * No-op middleware that passes through (used when rate limiting is disabled)
 */
const noopLimiter: RequestHandler = (_req: Request, _res: Response, next: NextFunction) => next();

const createLimiter = (limiter: RequestHandler): RequestHandler => {
  if (config.rateLimit.disabled) {
    logger.warn('Rate limiting is DISABLED via RATE_LIMIT_DISABLED=true');
    return noopLimiter;
  }
  return limiter;
};

const limitExceeded = (message: string) => ({
  success: false,
  error: {
    code: ErrorCode.RATE_LIMIT_EXCEEDED,
    message,
    timestamp: new Date().toISOString(),
  },
});

/**
 * API rate limiter for bot and worker calls, mounted on the authenticated routers
 * Configurable via API_RATE_LIMIT_WINDOW_MS and API_RATE_LIMIT_MAX
 */
export const apiLimiter: RequestHandler = createLimiter(
  rateLimit({
    store: createStore('rl:api:'),
    windowMs: config.rateLimit.api.windowMs,
    max: config.rateLimit.api.maxRequests,
    standardHeaders: true,
    legacyHeaders: false,
    message: limitExceeded('API rate limit exceeded, please slow down'),
    keyGenerator: (req: Request) => `api:${req.ip ?? 'unknown'}`,
    validate: false,
  })
);

/**
 * Payment provider notifications
 * Configurable via WEBHOOK_RATE_LIMIT_WINDOW_MS and WEBHOOK_RATE_LIMIT_MAX
 */
export const webhookLimiter: RequestHandler = createLimiter(
  rateLimit({
    store: createStore('rl:webhook:'),
    windowMs: config.rateLimit.webhook.windowMs,
    max: config.rateLimit.webhook.maxRequests,
    standardHeaders: true,
    legacyHeaders: false,
    message: limitExceeded('Too many payment notifications, please retry later'),
    keyGenerator: (req: Request) => `webhook:${req.ip ?? 'unknown'}`,
    validate: false,
  })
);
