/**
 * Payment Reconciler
 *
 * Maps provider payment notifications onto exactly one credit grant per
 * topup. The PaymentRecord's `processedAt` is the replay guard; the ledger's
 * (grant, topupId) uniqueness backs it up.
 */

import { v4 as uuidv4 } from 'uuid';

import { config } from '../../config';
import { findTopupPackage, TOPUP_PACKAGES, TopupPackage } from '../../config/pricing';
import { ApiError, isApiError } from '../../middlewares/errorHandler';
import { addLogContext } from '../../observability/log-context';
import { createServiceLogger, Logger } from '../../observability/logger';
import { paymentReconciliationsTotal } from '../../observability/metrics';
import { LedgerStore, StoreSession } from '../../store/store.types';
import { TopupRecord } from '../../types/domain';
import { CreditLedger } from '../ledger/ledger.service';
import { NotificationService } from '../notification/notification.service';

import { CreatedPayment, PaymentProvider, ProviderPayment } from './payment.provider';
import {
  isSettledStatus,
  PaymentAmount,
  PaymentNotification,
  PaymentNotificationSchema,
} from './payment.schema';
import { verifySignature } from './payment.signature';
import { isValidTopupTransition } from './payment.state';

export type RejectionReason =
  | 'INVALID_SIGNATURE'
  | 'MALFORMED_PAYLOAD'
  | 'TOPUP_NOT_FOUND'
  | 'AMOUNT_MISMATCH'
  | 'INVALID_TOPUP_STATE'
  | 'VERIFICATION_FAILED';

export type AcceptedOutcome = 'paid' | 'failed' | 'duplicate' | 'ignored';

export type ReconcileResult =
  | { status: 'accepted'; outcome: AcceptedOutcome; paymentId?: string; topupId?: string }
  | { status: 'rejected'; reason: RejectionReason; paymentId?: string };

export interface InitiatedTopup {
  topupId: string;
  paymentId: string;
  confirmationUrl: string;
  credits: number;
  rubAmount: number;
}

export interface PaymentReconcilerDeps {
  store: LedgerStore;
  ledger: CreditLedger;
  provider: PaymentProvider;
  notifications: NotificationService;
  webhookSecret?: string;
  logger?: Logger;
}

/** What to tell the user once the transaction has committed */
type PendingNotice =
  | { kind: 'paid'; topup: TopupRecord }
  | { kind: 'failed'; topup: TopupRecord }
  | { kind: 'none' };

interface Settlement {
  result: ReconcileResult;
  notice: PendingNotice;
}

const amountMatches = (amount: PaymentAmount, topup: TopupRecord): boolean =>
  amount.currency === 'RUB' && Number(amount.value) === topup.rubAmount;

const sameAmount = (a: PaymentAmount, b: PaymentAmount): boolean =>
  a.currency === b.currency && Number(a.value) === Number(b.value);

export class PaymentReconciler {
  private readonly store: LedgerStore;
  private readonly ledger: CreditLedger;
  private readonly provider: PaymentProvider;
  private readonly notifications: NotificationService;
  private readonly webhookSecret: string;
  private readonly log: Logger;

  constructor(deps: PaymentReconcilerDeps) {
    this.store = deps.store;
    this.ledger = deps.ledger;
    this.provider = deps.provider;
    this.notifications = deps.notifications;
    this.webhookSecret = deps.webhookSecret ?? config.payment.webhookSecret;
    this.log = deps.logger ?? createServiceLogger('payment-reconciler');
  }

  listPackages(): readonly TopupPackage[] {
    return TOPUP_PACKAGES;
  }

  /**
   * Create a topup for one of the configured packages and open the external
   * payment for it.
   */
  async initiateTopup(userId: string, rubAmount: number): Promise<InitiatedTopup> {
    const pkg = findTopupPackage(rubAmount);
    if (!pkg) {
      throw ApiError.invalidAmount(
        `Top-up amount must be one of: ${TOPUP_PACKAGES.map((p) => p.rubAmount).join(', ')} RUB`
      );
    }

    const topupId = `tup_${uuidv4()}`;
    addLogContext({ userId });

    await this.store.withTransaction((session) =>
      session.topups.create({
        topupId,
        userId,
        rubAmount: pkg.rubAmount,
        credits: pkg.credits,
        status: 'created',
        paymentId: null,
        confirmationUrl: null,
        paidAt: null,
      })
    );

    const payment = await this.openExternalPayment(topupId, userId, pkg);

    await this.store.withTransaction(async (session) => {
      await session.topups.update(topupId, {
        paymentId: payment.paymentId,
        confirmationUrl: payment.confirmationUrl,
      });
      // The notification may have beaten us here and created the record
      const existing = await session.payments.findByPaymentId(payment.paymentId);
      if (!existing) {
        await session.payments.create({
          paymentId: payment.paymentId,
          topupId,
          userId,
          status: 'pending',
          processedAt: null,
        });
      }
    });

    this.log.info(
      { topupId, paymentId: payment.paymentId, userId, rubAmount: pkg.rubAmount },
      'Topup initiated'
    );

    return {
      topupId,
      paymentId: payment.paymentId,
      confirmationUrl: payment.confirmationUrl,
      credits: pkg.credits,
      rubAmount: pkg.rubAmount,
    };
  }

  private async openExternalPayment(
    topupId: string,
    userId: string,
    pkg: TopupPackage
  ): Promise<CreatedPayment> {
    try {
      return await this.provider.createPayment({
        topupId,
        userId,
        rubAmount: pkg.rubAmount,
        credits: pkg.credits,
      });
    } catch (error) {
      this.log.error({ err: error, topupId, userId }, 'Payment creation failed');
      await this.store.withTransaction((session) =>
        session.topups.update(topupId, { status: 'failed' })
      );
      throw isApiError(error) ? error : ApiError.upstreamUnavailable();
    }
  }

  /**
   * Apply one provider notification. The signature is checked before
   * anything is parsed or read, and a success is confirmed with the
   * provider before anything is granted.
   */
  async reconcilePayment(
    rawBody: Buffer,
    signatureHeader: string | undefined
  ): Promise<ReconcileResult> {
    if (!verifySignature(rawBody, signatureHeader, this.webhookSecret)) {
      this.log.warn('Payment notification with invalid signature rejected');
      return this.record({ status: 'rejected', reason: 'INVALID_SIGNATURE' });
    }

    const notification = this.parse(rawBody);
    if (!notification) {
      return this.record({ status: 'rejected', reason: 'MALFORMED_PAYLOAD' });
    }

    const paymentId = notification.object.id;
    const topupId = notification.object.metadata.topup_id;
    const status = notification.object.status;

    if (!isSettledStatus(status)) {
      this.log.info({ paymentId, status, event: notification.event }, 'Ignoring unsettled payment');
      return this.record({ status: 'accepted', outcome: 'ignored', paymentId, topupId });
    }

    const confirmed =
      status === 'succeeded' ? await this.confirmWithProvider(notification) : null;
    if (status === 'succeeded' && !confirmed) {
      return this.record({ status: 'rejected', reason: 'VERIFICATION_FAILED', paymentId });
    }

    const settlement = await this.store.withTransaction(async (session) => {
      const existing = await session.payments.findByPaymentId(paymentId);
      if (existing?.processedAt) {
        return this.settled({ status: 'accepted', outcome: 'duplicate', paymentId, topupId });
      }

      const topup = await session.topups.findById(topupId);
      if (!topup || (existing && existing.topupId !== topup.topupId)) {
        this.log.error({ paymentId, topupId }, 'Payment notification for unknown topup');
        return this.settled({ status: 'rejected', reason: 'TOPUP_NOT_FOUND', paymentId });
      }

      if (!existing) {
        await session.payments.create({
          paymentId,
          topupId: topup.topupId,
          userId: topup.userId,
          status: 'pending',
          processedAt: null,
        });
      }

      return confirmed
        ? this.applySuccess(session, confirmed, topup)
        : this.applyCancellation(session, paymentId, topup);
    });

    await this.deliver(settlement.notice);
    return this.record(settlement.result);
  }

  /**
   * Look the payment up at the provider. Returns null unless the provider
   * reports it succeeded for the amount the notification claims. Provider
   * errors propagate so the notification is redelivered.
   */
  private async confirmWithProvider(
    notification: PaymentNotification
  ): Promise<ProviderPayment | null> {
    const reported = notification.object;
    const payment = await this.provider.getPayment(reported.id);

    const agrees =
      payment.paymentId === reported.id &&
      payment.status === 'succeeded' &&
      (!reported.amount || sameAmount(reported.amount, payment.amount));

    if (!agrees) {
      this.log.error(
        {
          paymentId: reported.id,
          reportedStatus: reported.status,
          providerStatus: payment.status,
          reportedAmount: reported.amount,
          providerAmount: payment.amount,
        },
        'Payment notification does not match the provider; not granting'
      );
      return null;
    }
    return payment;
  }

  private async applySuccess(
    session: StoreSession,
    payment: ProviderPayment,
    topup: TopupRecord
  ): Promise<Settlement> {
    const paymentId = payment.paymentId;
    const topupId = topup.topupId;

    if (!amountMatches(payment.amount, topup)) {
      this.log.error(
        { paymentId, topupId, expected: topup.rubAmount, received: payment.amount },
        'Payment amount does not match topup'
      );
      return this.settled({ status: 'rejected', reason: 'AMOUNT_MISMATCH', paymentId });
    }

    if (topup.status !== 'paid' && !isValidTopupTransition(topup.status, 'paid')) {
      this.log.error(
        { paymentId, topupId, topupStatus: topup.status },
        'Successful payment for a topup that cannot be paid; needs manual review'
      );
      return this.settled({ status: 'rejected', reason: 'INVALID_TOPUP_STATE', paymentId });
    }

    const now = new Date();
    // Idempotent on topupId, so an already-paid topup is not credited twice
    const grant = await this.ledger.grant(topup.userId, topup.credits, topupId, session);

    if (topup.status === 'paid') {
      await session.payments.update(paymentId, { status: 'succeeded', processedAt: now });
      return this.settled({ status: 'accepted', outcome: 'duplicate', paymentId, topupId });
    }

    const paid = await session.topups.update(topupId, { status: 'paid', paidAt: now });
    await session.payments.update(paymentId, { status: 'succeeded', processedAt: now });

    this.log.info(
      { paymentId, topupId, userId: topup.userId, credits: topup.credits, balance: grant.balance },
      'Topup paid'
    );
    return this.settled(
      { status: 'accepted', outcome: 'paid', paymentId, topupId },
      { kind: 'paid', topup: paid }
    );
  }

  private async applyCancellation(
    session: StoreSession,
    paymentId: string,
    topup: TopupRecord
  ): Promise<Settlement> {
    const topupId = topup.topupId;

    if (topup.status === 'paid') {
      this.log.error({ paymentId, topupId }, 'Cancellation for a paid topup; needs manual review');
      return this.settled({ status: 'rejected', reason: 'INVALID_TOPUP_STATE', paymentId });
    }

    await session.payments.update(paymentId, { status: 'canceled', processedAt: new Date() });

    if (!isValidTopupTransition(topup.status, 'failed')) {
      // Already failed or expired: nothing left to change
      return this.settled({ status: 'accepted', outcome: 'failed', paymentId, topupId });
    }

    const failed = await session.topups.update(topupId, { status: 'failed' });
    this.log.info({ paymentId, topupId, userId: topup.userId }, 'Topup payment canceled');
    return this.settled(
      { status: 'accepted', outcome: 'failed', paymentId, topupId },
      { kind: 'failed', topup: failed }
    );
  }

  private parse(rawBody: Buffer): PaymentNotification | null {
    let json: unknown;
    try {
      json = JSON.parse(rawBody.toString('utf8'));
    } catch (error) {
      this.log.warn({ err: error }, 'Payment notification is not valid JSON');
      return null;
    }

    const parsed = PaymentNotificationSchema.safeParse(json);
    if (!parsed.success) {
      this.log.warn({ issues: parsed.error.issues }, 'Payment notification failed validation');
      return null;
    }
    return parsed.data;
  }

  private settled(result: ReconcileResult, notice: PendingNotice = { kind: 'none' }): Settlement {
    return { result, notice };
  }

  private async deliver(notice: PendingNotice): Promise<void> {
    switch (notice.kind) {
      case 'paid':
        await this.notifications.notifyTopupPaid(
          notice.topup.userId,
          notice.topup.topupId,
          notice.topup.credits,
          notice.topup.rubAmount
        );
        return;
      case 'failed':
        await this.notifications.notifyTopupFailed(
          notice.topup.userId,
          notice.topup.topupId,
          notice.topup.rubAmount
        );
        return;
      case 'none':
        return;
    }
  }

  private record(result: ReconcileResult): ReconcileResult {
    paymentReconciliationsTotal.inc({
      outcome: result.status === 'accepted' ? result.outcome : result.reason.toLowerCase(),
    });
    return result;
  }
}
