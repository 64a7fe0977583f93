import { AsyncLocalStorage } from 'async_hooks';

/**
 * Request- or job-scoped context for logging
 */
export interface LogContext {
  correlationId: string;
  userId?: string;
  jobId?: string;
  [key: string]: unknown;
}

export const asyncLocalStorage = new AsyncLocalStorage<LogContext>();

export const getCorrelationId = (): string | undefined => {
  return asyncLocalStorage.getStore()?.correlationId;
};

export const getLogContext = (): LogContext | undefined => {
  return asyncLocalStorage.getStore();
};

/**
 * Add additional context to the current log context
 */
export const addLogContext = (context: Partial<LogContext>): void => {
  const store = asyncLocalStorage.getStore();
  if (store) {
    Object.assign(store, context);
  }
};

/**
 * Run a function within a specific log context (used by queue workers)
 */
export const runWithContext = <T>(context: LogContext, fn: () => T): T => {
  return asyncLocalStorage.run(context, fn);
};
