/**
 * Environment Configuration
 *
 * Central place for environment detection and environment-specific values.
 * Use these flags and values throughout the app to avoid hardcoding environments.
 *
 * Usage:
 *   import { isProduction, MONGODB_URI, QUEUE_LIMITS } from './environments';
 */

// =============================================================================
// ENVIRONMENT FLAGS
// =============================================================================

/**
 * Current environment from NODE_ENV
 * Defaults to 'development' if not set
 */
export const NODE_ENV = process.env.NODE_ENV || 'development';

export const isProduction = NODE_ENV === 'production';
export const isDevelopment = NODE_ENV === 'development';
export const isTest = NODE_ENV === 'test';

const intFromEnv = (name: string, fallback: number): number => {
  const raw = process.env[name];
  if (!raw) return fallback;
  const parsed = parseInt(raw, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

// =============================================================================
// DATABASE CONFIGURATION
// =============================================================================

/**
 * MongoDB URI by environment
 * Transactions need a replica set, hence the rs0 default.
 */
export const MONGODB_URI = isTest
  ? process.env.MONGODB_URI || 'mongodb://localhost:27018/credit-ledger-test?replicaSet=rs0'
  : process.env.MONGODB_URI || 'mongodb://localhost:27017/credit-ledger?replicaSet=rs0';

/**
 * MongoDB connection pool settings
 */
export const MONGODB_CONFIG = {
  maxPoolSize: isProduction ? 50 : 10,
  minPoolSize: isProduction ? 5 : 2,
  maxIdleTimeMS: isProduction ? 60000 : 30000,
  serverSelectionTimeoutMS: isProduction ? 10000 : 5000,
};

// =============================================================================
// REDIS CONFIGURATION
// =============================================================================

export const REDIS_HOST = process.env.REDIS_HOST || (isProduction ? 'redis' : 'localhost');

export const REDIS_PORT = intFromEnv('REDIS_PORT', isTest ? 6380 : 6379);

/**
 * Redis password (production only)
 */
export const REDIS_PASSWORD = isProduction ? process.env.REDIS_PASSWORD || undefined : undefined;

// =============================================================================
// SERVICE AUTHENTICATION
// =============================================================================

/**
 * Secret for the service tokens presented by the bot front-end and workers.
 * MUST be set in production (checked by validateProductionEnv).
 */
export const SERVICE_AUTH_CONFIG = {
  secret: process.env.SERVICE_JWT_SECRET || 'dev-service-secret-do-not-use-in-production',
  // seconds
  tokenExpiresIn: intFromEnv('SERVICE_JWT_EXPIRES_IN', 3600),
};

// =============================================================================
// RATE LIMITING CONFIGURATION
// =============================================================================

export const RATE_LIMIT_CONFIG = {
  disabled: process.env.RATE_LIMIT_DISABLED === 'true',

  // General API calls from the bot front-end and workers
  api: {
    windowMs: intFromEnv('API_RATE_LIMIT_WINDOW_MS', 60000), // 1 minute
    maxRequests: isTest ? 10000 : intFromEnv('API_RATE_LIMIT_MAX', isProduction ? 600 : 3000),
  },

  // Payment provider notifications
  webhook: {
    windowMs: intFromEnv('WEBHOOK_RATE_LIMIT_WINDOW_MS', 60000),
    maxRequests: isTest ? 10000 : intFromEnv('WEBHOOK_RATE_LIMIT_MAX', 300),
  },
};

// =============================================================================
// PAYMENT PROVIDER CONFIGURATION
// =============================================================================

export const PAYMENT_CONFIG = {
  apiUrl: process.env.YOOKASSA_API_URL || 'https://api.yookassa.ru/v3',
  shopId: process.env.YOOKASSA_SHOP_ID || '',
  secretKey: process.env.YOOKASSA_SECRET_KEY || '',
  webhookSecret: process.env.PAYMENT_WEBHOOK_SECRET || (isProduction ? '' : 'dev-webhook-secret'),
  returnUrl: process.env.PAYMENT_RETURN_URL || 'http://localhost:3000/payment/return',
  timeoutMs: intFromEnv('PAYMENT_TIMEOUT_MS', 10000),
  // Topups left in `created` longer than this are expired by the sweep
  topupExpiryMs: intFromEnv('TOPUP_EXPIRY_MS', 24 * 60 * 60 * 1000),
};

// =============================================================================
// GENERATION CONFIGURATION
// =============================================================================

export const GENERATION_CONFIG = {
  apiUrl: process.env.GENERATION_API_URL || 'http://localhost:8090/generate',
  apiKey: process.env.GENERATION_API_KEY || '',
  // Stuck-job threshold for the reconciliation sweep, also the HTTP timeout
  timeoutMs: intFromEnv('GENERATION_TIMEOUT_MS', 10 * 60 * 1000),
  maxActivePerUser: intFromEnv('MAX_ACTIVE_GENERATIONS', 1),
  maxQueueSize: intFromEnv('MAX_QUEUE_SIZE', 100),
  maxReferenceImages: 5,
  maxPromptLength: 2000,
};

// =============================================================================
// BOT NOTIFICATIONS
// =============================================================================

export const NOTIFY_CONFIG = {
  url: process.env.BOT_NOTIFY_URL || 'http://localhost:8081/notify',
  secret: process.env.BOT_NOTIFY_SECRET || 'dev-notify-secret',
  timeoutMs: intFromEnv('BOT_NOTIFY_TIMEOUT_MS', 5000),
};

// =============================================================================
// SCHEDULING
// =============================================================================

export const SWEEP_CONFIG = {
  intervalMs: intFromEnv('SWEEP_INTERVAL_MS', 60000),
  batchSize: intFromEnv('SWEEP_BATCH_SIZE', 100),
};

// =============================================================================
// API CONFIGURATION
// =============================================================================

export const API_CONFIG = {
  bodyLimit: process.env.API_BODY_LIMIT || '64kb',
  port: intFromEnv('PORT', 3000),
  corsOrigins: (process.env.CORS_ORIGINS || 'http://localhost:3000').split(','),
};

// =============================================================================
// LOGGING CONFIGURATION
// =============================================================================

export const LOG_CONFIG = {
  level: process.env.LOG_LEVEL || (isProduction ? 'info' : isTest ? 'silent' : 'debug'),
  prettyPrint: isDevelopment,
};

// =============================================================================
// OBSERVABILITY / TELEMETRY
// =============================================================================

export const OTEL_CONFIG = {
  enabled: !isTest && (isProduction || process.env.OTEL_ENABLED === 'true'),
  serviceName: process.env.OTEL_SERVICE_NAME || 'credit-ledger',
  exporterEndpoint: process.env.OTEL_EXPORTER_OTLP_ENDPOINT || 'http://localhost:4318/v1/traces',
};

// =============================================================================
// VALIDATION
// =============================================================================

/**
 * Validate required production environment variables
 * Call this during app startup in production
 */
export const validateProductionEnv = (): void => {
  if (!isProduction) return;

  const required = [
    'MONGODB_URI',
    'REDIS_HOST',
    'SERVICE_JWT_SECRET',
    'PAYMENT_WEBHOOK_SECRET',
    'YOOKASSA_SHOP_ID',
    'YOOKASSA_SECRET_KEY',
    'BOT_NOTIFY_URL',
  ];

  const missing = required.filter((key) => !process.env[key]);

  if (missing.length > 0) {
    throw new Error(`Missing required environment variables for production: ${missing.join(', ')}`);
  }

  if ((process.env.SERVICE_JWT_SECRET || '').length < 32) {
    throw new Error('SERVICE_JWT_SECRET must be at least 32 characters in production');
  }
};

/**
 * Get current environment info (for logging/debugging)
 */
export const getEnvironmentInfo = () => ({
  nodeEnv: NODE_ENV,
  isProduction,
  isDevelopment,
  isTest,
  mongoHost: MONGODB_URI.split('@').pop()?.split('/')[0] || 'localhost', // Don't leak credentials
  redisHost: REDIS_HOST,
});
