import { NodeSDK } from '@opentelemetry/sdk-node';
import { getNodeAutoInstrumentations } from '@opentelemetry/auto-instrumentations-node';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-http';
import { trace, SpanStatusCode, Span, Tracer } from '@opentelemetry/api';

import { config } from '../config';

import { logger } from './logger';

let sdk: NodeSDK | null = null;

/**
 * Initialize OpenTelemetry SDK
 * Call before the HTTP server or workers start handling traffic.
 */
export const initTracing = (serviceName: string = config.otel.serviceName): void => {
  if (!config.otel.enabled) {
    logger.debug('Tracing disabled');
    return;
  }

  try {
    sdk = new NodeSDK({
      serviceName,
      traceExporter: new OTLPTraceExporter({
        url: config.otel.exporterEndpoint,
      }),
      instrumentations: [
        getNodeAutoInstrumentations({
          '@opentelemetry/instrumentation-express': { enabled: true },
          '@opentelemetry/instrumentation-mongodb': { enabled: true },
          '@opentelemetry/instrumentation-ioredis': { enabled: true },
          '@opentelemetry/instrumentation-http': { enabled: true },
          '@opentelemetry/instrumentation-fs': { enabled: false },
        }),
      ],
    });

    sdk.start();
    logger.info({ endpoint: config.otel.exporterEndpoint }, 'OpenTelemetry tracing initialized');
  } catch (error) {
    logger.warn({ err: error }, 'Failed to initialize OpenTelemetry tracing');
  }
};

export const shutdownTracing = async (): Promise<void> => {
  if (sdk) {
    try {
      await sdk.shutdown();
      logger.info('OpenTelemetry tracing shut down');
    } catch (error) {
      logger.error({ err: error }, 'Error shutting down OpenTelemetry');
    }
    sdk = null;
  }
};

export const getTracer = (name: string): Tracer => {
  return trace.getTracer(name);
};

/**
 * Run fn inside an active span, recording failure status on throw
 */
export const withSpan = async <T>(
  tracerName: string,
  spanName: string,
  attributes: Record<string, string | number | boolean>,
  fn: (span: Span) => Promise<T>
): Promise<T> => {
  const tracer = getTracer(tracerName);

  return tracer.startActiveSpan(spanName, async (span) => {
    span.setAttributes(attributes);

    try {
      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: error instanceof Error ? error.message : 'Unknown error',
      });
      throw error;
    } finally {
      span.end();
    }
  });
};

/**
 * Span around a single ledger operation
 */
export const traceLedgerOperation = async <T>(
  kind: string,
  userId: string,
  referenceId: string,
  fn: () => Promise<T>
): Promise<T> => {
  return withSpan(
    'credit-ledger',
    `ledger.${kind}`,
    {
      'ledger.kind': kind,
      'ledger.user_id': userId,
      'ledger.reference_id': referenceId,
    },
    async () => fn()
  );
};

/**
 * Span around one generation job execution in the worker
 */
export const traceGenerationJob = async <T>(jobId: string, fn: () => Promise<T>): Promise<T> => {
  return withSpan('generation-worker', 'generation.run', { 'generation.job_id': jobId }, async () =>
    fn()
  );
};
