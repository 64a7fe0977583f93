import dotenv from 'dotenv';

// Load environment variables first
dotenv.config();

import {
  NODE_ENV,
  isProduction,
  isDevelopment,
  isTest,
  MONGODB_URI,
  MONGODB_CONFIG,
  REDIS_HOST,
  REDIS_PORT,
  REDIS_PASSWORD,
  SERVICE_AUTH_CONFIG,
  RATE_LIMIT_CONFIG,
  PAYMENT_CONFIG,
  GENERATION_CONFIG,
  NOTIFY_CONFIG,
  SWEEP_CONFIG,
  API_CONFIG,
  LOG_CONFIG,
  OTEL_CONFIG,
  validateProductionEnv,
  getEnvironmentInfo,
} from './environments';

export { isProduction, isDevelopment, isTest, validateProductionEnv, getEnvironmentInfo };

export * from './environments';

if (isProduction) {
  validateProductionEnv();
}

/**
 * Main application configuration object
 *
 * Consolidates all environment-specific settings.
 * Pricing lives in ./pricing, not here.
 */
export const config = {
  nodeEnv: NODE_ENV,
  isProduction,
  isDevelopment,
  isTest,

  port: API_CONFIG.port,

  mongodb: {
    uri: MONGODB_URI,
    ...MONGODB_CONFIG,
  },

  redis: {
    host: REDIS_HOST,
    port: REDIS_PORT,
    password: REDIS_PASSWORD,
  },

  serviceAuth: SERVICE_AUTH_CONFIG,

  api: {
    bodyLimit: API_CONFIG.bodyLimit,
    corsOrigins: API_CONFIG.corsOrigins,
  },

  rateLimit: RATE_LIMIT_CONFIG,
  payment: PAYMENT_CONFIG,
  generation: GENERATION_CONFIG,
  notify: NOTIFY_CONFIG,
  sweep: SWEEP_CONFIG,
  logging: LOG_CONFIG,
  otel: OTEL_CONFIG,
};
