/**
 * Payment Reconciler Unit Tests
 *
 * Topup initiation against a fake provider and reconciliation of signed
 * provider notifications over the in-memory store.
 */

import { ApiError } from '../../../src/middlewares/errorHandler';
import { paymentReconciliationsTotal } from '../../../src/observability/metrics';
import { NotificationType } from '../../../src/queues/notification.queue';
import { InitiatedTopup } from '../../../src/services/payment/payment.service';
import { ErrorCode } from '../../../src/types/errors';
import {
  counterValue,
  createTestServices,
  notificationBody,
  sign,
  TestServices,
} from '../../helpers';

const errorCodeOf = async (promise: Promise<unknown>): Promise<ErrorCode | undefined> => {
  try {
    await promise;
  } catch (error) {
    return error instanceof ApiError ? error.errorCode : undefined;
  }
  throw new Error('Expected the operation to be rejected');
};

describe('PaymentReconciler', () => {
  let services: TestServices;

  beforeEach(() => {
    services = createTestServices();
  });

  describe('listPackages', () => {
    it('should offer the 100, 200 and 300 RUB packages at one credit per rouble', () => {
      const packages = services.reconciler.listPackages();

      expect(packages.map((p) => [p.rubAmount, p.credits])).toEqual([
        [100, 100],
        [200, 200],
        [300, 300],
      ]);
    });
  });

  describe('initiateTopup', () => {
    it('should create the topup and open an external payment', async () => {
      const topup = await services.reconciler.initiateTopup('user_1', 200);

      expect(topup.topupId).toMatch(/^tup_/);
      expect(topup).toMatchObject({
        paymentId: 'pay_test_1',
        confirmationUrl: 'https://checkout.test/pay_test_1',
        credits: 200,
        rubAmount: 200,
      });
      expect(services.provider.requests).toEqual([
        { topupId: topup.topupId, userId: 'user_1', rubAmount: 200, credits: 200 },
      ]);

      const stored = services.store.topup(topup.topupId);
      expect(stored?.status).toBe('created');
      expect(stored?.paymentId).toBe('pay_test_1');
      expect(services.store.payment('pay_test_1')).toMatchObject({
        topupId: topup.topupId,
        userId: 'user_1',
        status: 'pending',
        processedAt: null,
      });
    });

    it('should reject an amount that is not a package', async () => {
      const code = await errorCodeOf(services.reconciler.initiateTopup('user_1', 150));

      expect(code).toBe(ErrorCode.INVALID_AMOUNT);
      expect(services.provider.requests).toHaveLength(0);
    });

    it('should mark the topup failed when the provider is down', async () => {
      services.provider.createError = new Error('connect ECONNREFUSED');

      const code = await errorCodeOf(services.reconciler.initiateTopup('user_1', 100));

      expect(code).toBe(ErrorCode.UPSTREAM_UNAVAILABLE);
      const { topupId } = services.provider.requests[0];
      expect(services.store.topup(topupId)?.status).toBe('failed');
    });

    it('should pass provider errors through unchanged', async () => {
      services.provider.createError = ApiError.upstreamTimeout();

      const code = await errorCodeOf(services.reconciler.initiateTopup('user_1', 100));

      expect(code).toBe(ErrorCode.UPSTREAM_TIMEOUT);
    });
  });

  describe('reconcilePayment', () => {
    let topup: InitiatedTopup;

    beforeEach(async () => {
      topup = await services.reconciler.initiateTopup('user_1', 100);
    });

    const succeeded = (): Buffer =>
      notificationBody({ paymentId: topup.paymentId, topupId: topup.topupId });

    it('should grant the topup credits once for a successful payment', async () => {
      const body = succeeded();

      const result = await services.reconciler.reconcilePayment(body, `sha256=${sign(body)}`);

      expect(result).toEqual({
        status: 'accepted',
        outcome: 'paid',
        paymentId: topup.paymentId,
        topupId: topup.topupId,
      });
      expect(services.store.balance('user_1')).toEqual({ available: 100, reserved: 0 });
      expect(services.store.topup(topup.topupId)?.status).toBe('paid');
      expect(services.store.topup(topup.topupId)?.paidAt).toBeInstanceOf(Date);
      expect(services.store.payment(topup.paymentId)?.status).toBe('succeeded');
      expect(services.publisher.published).toEqual([
        {
          notificationId: `ntf_topup_paid_${topup.topupId}`,
          userId: 'user_1',
          type: NotificationType.TOPUP_PAID,
          title: 'Payment received',
          message: '100 credits were added to your balance',
          data: { topupId: topup.topupId, credits: 100, rubAmount: 100 },
        },
      ]);
    });

    it('should accept a bare hex signature', async () => {
      const body = succeeded();

      const result = await services.reconciler.reconcilePayment(body, sign(body));

      expect(result.status).toBe('accepted');
    });

    it('should answer a redelivered notification as a duplicate', async () => {
      const body = succeeded();
      await services.reconciler.reconcilePayment(body, sign(body));

      const again = await services.reconciler.reconcilePayment(body, sign(body));

      expect(again).toEqual({
        status: 'accepted',
        outcome: 'duplicate',
        paymentId: topup.paymentId,
        topupId: topup.topupId,
      });
      expect(services.store.balance('user_1')).toEqual({ available: 100, reserved: 0 });
      expect(services.store.entries('user_1')).toHaveLength(1);
      expect(services.publisher.published).toHaveLength(1);
    });

    it('should grant once when the same notification arrives concurrently', async () => {
      const body = succeeded();

      const results = await Promise.all(
        [1, 2, 3].map(() => services.reconciler.reconcilePayment(body, sign(body)))
      );

      const outcomes = results.map((r) => (r.status === 'accepted' ? r.outcome : r.reason));
      expect(outcomes.sort()).toEqual(['duplicate', 'duplicate', 'paid']);
      expect(services.store.balance('user_1')).toEqual({ available: 100, reserved: 0 });
    });

    it('should reject a bad signature without touching the store', async () => {
      const body = succeeded();
      const committedBefore = services.store.committed;

      const result = await services.reconciler.reconcilePayment(body, sign(body, 'wrong-secret'));

      expect(result).toEqual({ status: 'rejected', reason: 'INVALID_SIGNATURE' });
      expect(services.store.committed).toBe(committedBefore);
      expect(services.store.balance('user_1')).toEqual({ available: 0, reserved: 0 });
      expect(
        await counterValue(paymentReconciliationsTotal, { outcome: 'invalid_signature' })
      ).toBe(1);
    });

    it('should reject a missing signature', async () => {
      const result = await services.reconciler.reconcilePayment(succeeded(), undefined);

      expect(result).toEqual({ status: 'rejected', reason: 'INVALID_SIGNATURE' });
    });

    it('should reject a body that is not JSON', async () => {
      const body = Buffer.from('not json');

      const result = await services.reconciler.reconcilePayment(body, sign(body));

      expect(result).toEqual({ status: 'rejected', reason: 'MALFORMED_PAYLOAD' });
    });

    it('should reject a notification without a topup reference', async () => {
      const body = Buffer.from(
        JSON.stringify({
          event: 'payment.succeeded',
          object: { id: 'pay_1', status: 'succeeded', metadata: {} },
        })
      );

      const result = await services.reconciler.reconcilePayment(body, sign(body));

      expect(result).toEqual({ status: 'rejected', reason: 'MALFORMED_PAYLOAD' });
    });

    it('should acknowledge and ignore statuses that are not final', async () => {
      const body = notificationBody({
        paymentId: topup.paymentId,
        topupId: topup.topupId,
        status: 'waiting_for_capture',
      });

      const result = await services.reconciler.reconcilePayment(body, sign(body));

      expect(result).toEqual({
        status: 'accepted',
        outcome: 'ignored',
        paymentId: topup.paymentId,
        topupId: topup.topupId,
      });
      expect(services.store.topup(topup.topupId)?.status).toBe('created');
    });

    it('should reject a payment for an unknown topup', async () => {
      const body = notificationBody({ paymentId: 'pay_stray', topupId: 'tup_missing' });

      const result = await services.reconciler.reconcilePayment(body, sign(body));

      expect(result).toEqual({
        status: 'rejected',
        reason: 'TOPUP_NOT_FOUND',
        paymentId: 'pay_stray',
      });
    });

    it('should reject a payment whose record belongs to another topup', async () => {
      const other = await services.reconciler.initiateTopup('user_2', 100);
      const body = notificationBody({ paymentId: topup.paymentId, topupId: other.topupId });

      const result = await services.reconciler.reconcilePayment(body, sign(body));

      expect(result).toEqual({
        status: 'rejected',
        reason: 'TOPUP_NOT_FOUND',
        paymentId: topup.paymentId,
      });
      expect(services.store.balance('user_2')).toEqual({ available: 0, reserved: 0 });
    });

    it('should reject an amount that does not match the topup', async () => {
      services.provider.payments.set(topup.paymentId, {
        paymentId: topup.paymentId,
        status: 'succeeded',
        amount: { value: '200.00', currency: 'RUB' },
      });
      const body = notificationBody({
        paymentId: topup.paymentId,
        topupId: topup.topupId,
        value: '200.00',
      });

      const result = await services.reconciler.reconcilePayment(body, sign(body));

      expect(result).toEqual({
        status: 'rejected',
        reason: 'AMOUNT_MISMATCH',
        paymentId: topup.paymentId,
      });
      expect(services.store.balance('user_1')).toEqual({ available: 0, reserved: 0 });
      expect(services.store.topup(topup.topupId)?.status).toBe('created');
    });

    it('should confirm a successful payment with the provider before granting', async () => {
      const body = succeeded();

      await services.reconciler.reconcilePayment(body, sign(body));

      expect(services.provider.lookups).toEqual([topup.paymentId]);
    });

    it('should not look up cancellations or unsettled statuses', async () => {
      const pending = notificationBody({
        paymentId: topup.paymentId,
        topupId: topup.topupId,
        status: 'pending',
      });
      const cancel = notificationBody({
        paymentId: topup.paymentId,
        topupId: topup.topupId,
        status: 'canceled',
      });

      await services.reconciler.reconcilePayment(pending, sign(pending));
      await services.reconciler.reconcilePayment(cancel, sign(cancel));

      expect(services.provider.lookups).toEqual([]);
    });

    it('should reject a success the provider still reports as pending', async () => {
      services.provider.payments.set(topup.paymentId, {
        paymentId: topup.paymentId,
        status: 'pending',
        amount: { value: '100.00', currency: 'RUB' },
      });
      const body = succeeded();
      const committedBefore = services.store.committed;

      const result = await services.reconciler.reconcilePayment(body, sign(body));

      expect(result).toEqual({
        status: 'rejected',
        reason: 'VERIFICATION_FAILED',
        paymentId: topup.paymentId,
      });
      expect(services.store.committed).toBe(committedBefore);
      expect(services.store.balance('user_1')).toEqual({ available: 0, reserved: 0 });
      expect(services.store.topup(topup.topupId)?.status).toBe('created');
      expect(services.publisher.published).toEqual([]);
      expect(
        await counterValue(paymentReconciliationsTotal, { outcome: 'verification_failed' })
      ).toBe(1);
    });

    it('should reject a success whose amount differs from what the provider charged', async () => {
      const body = notificationBody({
        paymentId: topup.paymentId,
        topupId: topup.topupId,
        value: '300.00',
      });

      const result = await services.reconciler.reconcilePayment(body, sign(body));

      expect(result).toEqual({
        status: 'rejected',
        reason: 'VERIFICATION_FAILED',
        paymentId: topup.paymentId,
      });
      expect(services.store.balance('user_1')).toEqual({ available: 0, reserved: 0 });
    });

    it('should propagate a provider lookup failure without granting', async () => {
      services.provider.getError = ApiError.upstreamUnavailable();
      const body = succeeded();

      const code = await errorCodeOf(services.reconciler.reconcilePayment(body, sign(body)));

      expect(code).toBe(ErrorCode.UPSTREAM_UNAVAILABLE);
      expect(services.store.balance('user_1')).toEqual({ available: 0, reserved: 0 });
      expect(services.store.payment(topup.paymentId)?.processedAt).toBeNull();
    });

    it('should reject a payment in another currency', async () => {
      const body = notificationBody({
        paymentId: topup.paymentId,
        topupId: topup.topupId,
        currency: 'USD',
      });

      const result = await services.reconciler.reconcilePayment(body, sign(body));

      expect(result.status).toBe('rejected');
    });

    it('should create the payment record when the notification arrives first', async () => {
      const body = notificationBody({ paymentId: 'pay_early', topupId: topup.topupId });

      const result = await services.reconciler.reconcilePayment(body, sign(body));

      expect(result.status).toBe('accepted');
      expect(services.store.payment('pay_early')).toMatchObject({
        topupId: topup.topupId,
        userId: 'user_1',
        status: 'succeeded',
      });
    });

    it('should fail the topup on cancellation without granting', async () => {
      const body = notificationBody({
        paymentId: topup.paymentId,
        topupId: topup.topupId,
        status: 'canceled',
      });

      const result = await services.reconciler.reconcilePayment(body, sign(body));

      expect(result).toEqual({
        status: 'accepted',
        outcome: 'failed',
        paymentId: topup.paymentId,
        topupId: topup.topupId,
      });
      expect(services.store.topup(topup.topupId)?.status).toBe('failed');
      expect(services.store.payment(topup.paymentId)?.status).toBe('canceled');
      expect(services.store.balance('user_1')).toEqual({ available: 0, reserved: 0 });
      expect(services.publisher.published[0]).toMatchObject({
        type: NotificationType.TOPUP_FAILED,
        message: 'Your payment of 100 RUB did not go through. No credits were charged',
      });
    });

    it('should refuse to cancel a paid topup', async () => {
      const paid = succeeded();
      await services.reconciler.reconcilePayment(paid, sign(paid));
      const cancel = notificationBody({
        paymentId: 'pay_second',
        topupId: topup.topupId,
        status: 'canceled',
      });

      const result = await services.reconciler.reconcilePayment(cancel, sign(cancel));

      expect(result).toEqual({
        status: 'rejected',
        reason: 'INVALID_TOPUP_STATE',
        paymentId: 'pay_second',
      });
      expect(services.store.topup(topup.topupId)?.status).toBe('paid');
      expect(services.store.balance('user_1')).toEqual({ available: 100, reserved: 0 });
    });

    it('should still pay a topup that expired before the payment arrived', async () => {
      await services.store.withTransaction((session) =>
        session.topups.update(topup.topupId, { status: 'expired' })
      );
      const body = succeeded();

      const result = await services.reconciler.reconcilePayment(body, sign(body));

      expect(result.status === 'accepted' && result.outcome).toBe('paid');
      expect(services.store.topup(topup.topupId)?.status).toBe('paid');
      expect(services.store.balance('user_1')).toEqual({ available: 100, reserved: 0 });
    });

    it('should not pay a topup that already failed', async () => {
      const cancel = notificationBody({
        paymentId: topup.paymentId,
        topupId: topup.topupId,
        status: 'canceled',
      });
      await services.reconciler.reconcilePayment(cancel, sign(cancel));
      const late = notificationBody({ paymentId: 'pay_late', topupId: topup.topupId });

      const result = await services.reconciler.reconcilePayment(late, sign(late));

      expect(result).toEqual({
        status: 'rejected',
        reason: 'INVALID_TOPUP_STATE',
        paymentId: 'pay_late',
      });
      expect(services.store.balance('user_1')).toEqual({ available: 0, reserved: 0 });
    });
  });
});
