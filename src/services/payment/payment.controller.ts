import { Request, Response, NextFunction } from 'express';

import { ApiError } from '../../middlewares/errorHandler';
import { ErrorCode } from '../../types/errors';

import { PaymentReconciler } from './payment.service';
import { SIGNATURE_HEADER } from './payment.signature';

export class PaymentController {
  constructor(private readonly reconciler: PaymentReconciler) {}

  /**
   * GET /topups/packages
   */
  listPackages(_req: Request, res: Response): void {
    res.status(200).json({
      success: true,
      data: { packages: this.reconciler.listPackages() },
    });
  }

  /**
   * POST /topups
   */
  async createTopup(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { userId, rubAmount }: { userId: string; rubAmount: number } = req.body;
      const topup = await this.reconciler.initiateTopup(userId, rubAmount);

      res.status(201).json({
        success: true,
        data: topup,
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /webhooks/payments
   *
   * 401 and 400 tell the provider its delivery was bad; every other
   * rejection is acknowledged with 200 so it stops redelivering.
   */
  async handleNotification(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const rawBody = Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);
      const result = await this.reconciler.reconcilePayment(rawBody, req.get(SIGNATURE_HEADER));

      if (result.status === 'rejected' && result.reason === 'INVALID_SIGNATURE') {
        throw ApiError.authenticationFailed();
      }
      if (result.status === 'rejected' && result.reason === 'MALFORMED_PAYLOAD') {
        throw new ApiError(ErrorCode.INVALID_INPUT, 'Malformed payment notification');
      }

      res.status(200).json({
        success: true,
        data: result,
      });
    } catch (error) {
      next(error);
    }
  }
}
