import pino, { Logger } from 'pino';

import { config } from '../config';

import { getLogContext } from './log-context';

/**
 * Pino logger configuration
 * - Production: JSON logs at info level
 * - Development: Pretty printed logs at debug level
 * - Test: silent unless LOG_LEVEL overrides it
 */
export const logger = pino({
  level: config.logging.level,
  formatters: {
    level: (label) => ({ level: label }),
  },
  // Correlation id, user and job from the active request or queue job
  mixin: () => ({ ...getLogContext() }),
  base: {
    service: 'credit-ledger',
    env: config.nodeEnv,
  },
  ...(config.logging.prettyPrint && {
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    },
  }),
});

export type { Logger };

// Child logger factory for service-specific logging
export const createServiceLogger = (serviceName: string): Logger => {
  return logger.child({ component: serviceName });
};
