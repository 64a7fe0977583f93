import { Registry, Counter, Histogram, collectDefaultMetrics } from 'prom-client';

import { config } from '../config';

/**
 * Prometheus metrics registry
 */
export const registry = new Registry();
registry.setDefaultLabels({ service: 'credit-ledger' });

// Collect default Node.js metrics (CPU, memory, event loop, etc.)
if (!config.isTest) {
  collectDefaultMetrics({ register: registry });
}

// ============================================
// HTTP Metrics
// ============================================

export const httpRequestsTotal = new Counter({
  name: 'http_requests_total',
  help: 'Total HTTP requests',
  labelNames: ['method', 'path', 'status'] as const,
  registers: [registry],
});

export const httpRequestDuration = new Histogram({
  name: 'http_request_duration_seconds',
  help: 'HTTP request duration in seconds',
  labelNames: ['method', 'path', 'status'] as const,
  buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10],
  registers: [registry],
});

// ============================================
// Ledger Metrics
// ============================================

/**
 * Ledger operations by kind (grant, reserve, commit, release) and outcome
 * (applied, replayed, rejected)
 */
export const ledgerOperationsTotal = new Counter({
  name: 'ledger_operations_total',
  help: 'Credit ledger operations by kind and outcome',
  labelNames: ['kind', 'outcome'] as const,
  registers: [registry],
});

/**
 * Anything counted here needs manual reconciliation
 */
export const ledgerInvariantViolationsTotal = new Counter({
  name: 'ledger_invariant_violations_total',
  help: 'Ledger operations refused because balances would become inconsistent',
  labelNames: ['kind'] as const,
  registers: [registry],
});

export const ledgerCreditsTotal = new Counter({
  name: 'ledger_credits_total',
  help: 'Credits moved by the ledger, by kind',
  labelNames: ['kind'] as const,
  registers: [registry],
});

// ============================================
// Generation Metrics
// ============================================

export const generationJobsTotal = new Counter({
  name: 'generation_jobs_total',
  help: 'Generation job transitions by resulting status',
  labelNames: ['status'] as const,
  registers: [registry],
});

// ============================================
// Payment Metrics
// ============================================

export const paymentReconciliationsTotal = new Counter({
  name: 'payment_reconciliations_total',
  help: 'Payment notifications by outcome',
  labelNames: ['outcome'] as const,
  registers: [registry],
});

export const reconciliationSweepItemsTotal = new Counter({
  name: 'reconciliation_sweep_items_total',
  help: 'Items handled by the reconciliation sweep',
  labelNames: ['type', 'outcome'] as const,
  registers: [registry],
});

// ============================================
// Queue Metrics
// ============================================

export const queueJobsTotal = new Counter({
  name: 'queue_jobs_total',
  help: 'Queue jobs by queue and status',
  labelNames: ['queue', 'status'] as const,
  registers: [registry],
});

export const queueJobDuration = new Histogram({
  name: 'queue_job_duration_seconds',
  help: 'Queue job processing duration in seconds',
  labelNames: ['queue'] as const,
  buckets: [0.1, 0.5, 1, 5, 15, 30, 60, 120, 300, 600],
  registers: [registry],
});

// ============================================
// Utility Functions
// ============================================

/**
 * Reset all metrics (useful for testing)
 */
export const resetMetrics = (): void => {
  registry.resetMetrics();
};

export const getMetrics = async (): Promise<string> => {
  return registry.metrics();
};

export const getMetricsContentType = (): string => {
  return registry.contentType;
};
