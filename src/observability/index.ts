// Logger exports
export { logger, createServiceLogger, Logger } from './logger';

// Log context exports
export {
  LogContext,
  asyncLocalStorage,
  getCorrelationId,
  getLogContext,
  addLogContext,
  runWithContext,
} from './log-context';

// Correlation middleware
export { correlationMiddleware } from './correlation';

// Metrics exports
export {
  registry,
  httpRequestsTotal,
  httpRequestDuration,
  ledgerOperationsTotal,
  ledgerInvariantViolationsTotal,
  ledgerCreditsTotal,
  generationJobsTotal,
  paymentReconciliationsTotal,
  reconciliationSweepItemsTotal,
  queueJobsTotal,
  queueJobDuration,
  resetMetrics,
  getMetrics,
  getMetricsContentType,
} from './metrics';

// Metrics middleware
export { metricsMiddleware } from './metrics.middleware';

// Tracing exports
export {
  initTracing,
  shutdownTracing,
  getTracer,
  withSpan,
  traceLedgerOperation,
  traceGenerationJob,
} from './tracing';
