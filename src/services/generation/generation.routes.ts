import { Router, Request, Response, NextFunction } from 'express';

import { requireService, userLogContext } from '../../auth';
import { validateRequest } from '../../middlewares/validateRequest';

import { GenerationController } from './generation.controller';
import { JobCoordinator } from './generation.service';
import {
  cancelGenerationValidation,
  completeGenerationValidation,
  createGenerationValidation,
  failGenerationValidation,
  getGenerationValidation,
  listUserGenerationsValidation,
  markProcessingValidation,
} from './generation.validation';

export const createGenerationRoutes = (coordinator: JobCoordinator): Router => {
  const router = Router();
  const controller = new GenerationController(coordinator);

  // POST /generations - Reserve credits and queue a job (bot)
  router.post(
    '/',
    requireService(['bot']),
    createGenerationValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => controller.create(req, res, next)
  );

  // GET /generations/users/:userId - Recent jobs for a user (bot)
  router.get(
    '/users/:userId',
    requireService(['bot', 'admin']),
    listUserGenerationsValidation,
    validateRequest,
    userLogContext,
    (req: Request, res: Response, next: NextFunction) => controller.listByUser(req, res, next)
  );

  // GET /generations/:jobId - Job status (bot, worker)
  router.get(
    '/:jobId',
    requireService(['bot', 'worker', 'admin']),
    getGenerationValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => controller.getById(req, res, next)
  );

  // POST /generations/:jobId/cancel - Owner cancels an unfinished job (bot)
  router.post(
    '/:jobId/cancel',
    requireService(['bot']),
    cancelGenerationValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => controller.cancel(req, res, next)
  );

  // Worker callbacks: the only mutation entry points a worker may use
  router.post(
    '/:jobId/processing',
    requireService(['worker']),
    markProcessingValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => controller.markProcessing(req, res, next)
  );

  router.post(
    '/:jobId/complete',
    requireService(['worker']),
    completeGenerationValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => controller.complete(req, res, next)
  );

  router.post(
    '/:jobId/fail',
    requireService(['worker']),
    failGenerationValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => controller.fail(req, res, next)
  );

  return router;
};
