/**
 * Balance API Routes
 */

import { Router, Request, Response, NextFunction } from 'express';

import { requireService, ServiceRequest, userLogContext } from '../../auth';
import { validateRequest } from '../../middlewares/validateRequest';

import { LedgerController } from './ledger.controller';
import { CreditLedger } from './ledger.service';
import {
  getBalanceValidation,
  getHistoryValidation,
  manualGrantValidation,
} from './ledger.validation';

export const createLedgerRoutes = (ledger: CreditLedger): Router => {
  const router = Router();
  const controller = new LedgerController(ledger);

  /**
   * GET /balances/:userId
   * Available and reserved credits
   */
  router.get(
    '/:userId',
    requireService(['bot', 'admin']),
    getBalanceValidation,
    validateRequest,
    userLogContext,
    (req: Request, res: Response, next: NextFunction) => controller.getBalance(req, res, next)
  );

  /**
   * GET /balances/:userId/transactions
   * Most recent ledger rows first
   */
  router.get(
    '/:userId/transactions',
    requireService(['bot', 'admin']),
    getHistoryValidation,
    validateRequest,
    userLogContext,
    (req: Request, res: Response, next: NextFunction) => controller.getHistory(req, res, next)
  );

  /**
   * POST /balances/:userId/grants
   * Operator credit, idempotent on referenceId
   */
  router.post(
    '/:userId/grants',
    requireService(['admin']),
    manualGrantValidation,
    validateRequest,
    userLogContext,
    (req: ServiceRequest, res: Response, next: NextFunction) => controller.grant(req, res, next)
  );

  return router;
};
