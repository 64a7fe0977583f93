/**
 * Ledger Controller
 *
 * Balance and history reads for the bot front-end, and the operator's
 * manual grant. Nothing else mutates balances over HTTP.
 */

import { Request, Response, NextFunction } from 'express';

import { ServiceRequest } from '../../auth';
import { createServiceLogger } from '../../observability/logger';

import { CreditLedger } from './ledger.service';

const log = createServiceLogger('ledger-controller');

interface ManualGrantBody {
  amount: number;
  referenceId: string;
}

export class LedgerController {
  constructor(private readonly ledger: CreditLedger) {}

  /**
   * GET /balances/:userId
   */
  async getBalance(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { userId } = req.params;
      const balance = await this.ledger.getBalance(userId);

      res.status(200).json({
        success: true,
        data: { userId, ...balance },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /balances/:userId/transactions?limit=
   */
  async getHistory(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { userId } = req.params;
      const limit = typeof req.query.limit === 'string' ? parseInt(req.query.limit, 10) : 20;
      const transactions = await this.ledger.getHistory(userId, limit);

      res.status(200).json({
        success: true,
        data: {
          userId,
          transactions,
          count: transactions.length,
        },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /balances/:userId/grants
   */
  async grant(req: ServiceRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const { userId } = req.params;
      const { amount, referenceId }: ManualGrantBody = req.body;
      const result = await this.ledger.grantManual(userId, amount, referenceId);

      if (!result.idempotent) {
        log.warn(
          { userId, amount, referenceId: result.referenceId, caller: req.service },
          'Manual credit grant'
        );
      }

      res.status(result.idempotent ? 200 : 201).json({
        success: true,
        data: result,
      });
    } catch (error) {
      next(error);
    }
  }
}
