import express, { Application } from 'express';
import cors from 'cors';
import helmet from 'helmet';

import { config } from './config';
import { apiLimiter, errorHandler, notFoundHandler } from './middlewares';
import {
  correlationMiddleware,
  metricsMiddleware,
  getMetrics,
  getMetricsContentType,
  logger,
} from './observability';
import { createHealthRoutes, HealthChecks } from './routes/health';
import { createGenerationRoutes, JobCoordinator } from './services/generation';
import { CreditLedger, createLedgerRoutes } from './services/ledger';
import {
  createPaymentWebhookRoutes,
  createTopupRoutes,
  PaymentReconciler,
} from './services/payment';

export interface AppServices {
  ledger: CreditLedger;
  coordinator: JobCoordinator;
  reconciler: PaymentReconciler;
  health?: HealthChecks;
}

export const createApp = (services: AppServices): Application => {
  const app = express();

  // Security middleware
  app.use(helmet());
  app.use(cors({ origin: config.api.corsOrigins }));

  // Observability middleware (applied early to capture all requests)
  app.use(correlationMiddleware);
  app.use(metricsMiddleware);

  // Payment notifications need the raw body for signature checks,
  // so they are routed before the JSON parser.
  app.use('/webhooks', createPaymentWebhookRoutes(services.reconciler));

  // Request parsing
  app.use(express.json({ limit: config.api.bodyLimit }));

  // Routes
  app.use('/health', createHealthRoutes(services.health));
  app.use('/balances', apiLimiter, createLedgerRoutes(services.ledger));
  app.use('/topups', apiLimiter, createTopupRoutes(services.reconciler));
  app.use('/generations', apiLimiter, createGenerationRoutes(services.coordinator));

  // Metrics endpoint (Prometheus format)
  app.get('/metrics', async (_req, res) => {
    try {
      res.set('Content-Type', getMetricsContentType());
      res.send(await getMetrics());
    } catch (error) {
      logger.error({ err: error }, 'Error collecting metrics');
      res.status(500).send('Error collecting metrics');
    }
  });

  // Root route
  app.get('/', (_req, res) => {
    res.json({
      name: 'Credit Ledger API',
      version: '1.0.0',
      description: 'Credits, payments and generation jobs for the image bot',
    });
  });

  // Error handling
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
