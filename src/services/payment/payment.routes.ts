import express, { Router, Request, Response, NextFunction } from 'express';

import { requireService } from '../../auth';
import { webhookLimiter } from '../../middlewares/rateLimiter';
import { validateRequest } from '../../middlewares/validateRequest';

import { PaymentController } from './payment.controller';
import { PaymentReconciler } from './payment.service';
import { createTopupValidation } from './payment.validation';

/**
 * /topups - bot-facing purchase flow
 */
export const createTopupRoutes = (reconciler: PaymentReconciler): Router => {
  const router = Router();
  const controller = new PaymentController(reconciler);

  router.get('/packages', requireService(['bot', 'admin']), (req: Request, res: Response) =>
    controller.listPackages(req, res)
  );

  router.post(
    '/',
    requireService(['bot']),
    createTopupValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => controller.createTopup(req, res, next)
  );

  return router;
};

/**
 * /webhooks - payment provider notifications.
 * Mounted before the JSON body parser: the signature covers the raw bytes.
 */
export const createPaymentWebhookRoutes = (reconciler: PaymentReconciler): Router => {
  const router = Router();
  const controller = new PaymentController(reconciler);

  router.post(
    '/payments',
    webhookLimiter,
    express.raw({ type: '*/*', limit: '64kb' }),
    (req: Request, res: Response, next: NextFunction) =>
      controller.handleNotification(req, res, next)
  );

  return router;
};
