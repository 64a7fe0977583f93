import { Application } from 'express';
import request from 'supertest';

import { ApiError } from '../../src/middlewares/errorHandler';
import { paymentReconciliationsTotal } from '../../src/observability/metrics';
import {
  authenticatedRequest,
  counterValue,
  createTestServices,
  getTestApp,
  notificationBody,
  NotificationFields,
  sign,
  TestServices,
} from '../helpers';

describe('Topup and Payment Webhook Endpoints', () => {
  let services: TestServices;
  let app: Application;

  const deliver = (body: Buffer, signature: string) =>
    request(app)
      .post('/webhooks/payments')
      .set('Content-Type', 'application/json')
      .set('X-Payment-Signature', signature)
      .send(body.toString('utf8'));

  const deliverSigned = (fields: NotificationFields) => {
    const body = notificationBody(fields);
    return deliver(body, `sha256=${sign(body)}`);
  };

  beforeEach(() => {
    services = createTestServices();
    app = getTestApp(services);
  });

  describe('GET /topups/packages', () => {
    it('should list the three packages', async () => {
      const response = await authenticatedRequest(app, 'bot').get('/topups/packages');

      expect(response.status).toBe(200);
      expect(response.body.data.packages).toEqual([
        { rubAmount: 100, credits: 100, label: '100 RUB → 100 credits' },
        { rubAmount: 200, credits: 200, label: '200 RUB → 200 credits' },
        { rubAmount: 300, credits: 300, label: '300 RUB → 300 credits' },
      ]);
    });
  });

  describe('POST /topups', () => {
    it('should create a topup and open the payment', async () => {
      const response = await authenticatedRequest(app, 'bot')
        .post('/topups')
        .send({ userId: 'user_1', rubAmount: 200 });

      expect(response.status).toBe(201);
      expect(response.body.data).toMatchObject({
        paymentId: 'pay_test_1',
        confirmationUrl: 'https://checkout.test/pay_test_1',
        credits: 200,
        rubAmount: 200,
      });
      expect(response.body.data.topupId).toMatch(/^tup_/);
      expect(services.store.topup(response.body.data.topupId)).toMatchObject({
        status: 'created',
        paymentId: 'pay_test_1',
      });
    });

    it('should reject an amount that is not a package', async () => {
      const response = await authenticatedRequest(app, 'bot')
        .post('/topups')
        .send({ userId: 'user_1', rubAmount: 150 });

      expect(response.status).toBe(400);
      expect(response.body.error.details).toEqual({
        rubAmount: ['rubAmount must be one of: 100, 200, 300'],
      });
      expect(services.provider.requests).toHaveLength(0);
    });

    it('should answer 502 when the provider is down', async () => {
      services.provider.createError = new Error('connect ECONNREFUSED');

      const response = await authenticatedRequest(app, 'bot')
        .post('/topups')
        .send({ userId: 'user_1', rubAmount: 100 });

      expect(response.status).toBe(502);
      expect(response.body.error.code).toBe(5005);
    });
  });

  describe('POST /webhooks/payments', () => {
    let topupId: string;

    beforeEach(async () => {
      const response = await authenticatedRequest(app, 'bot')
        .post('/topups')
        .send({ userId: 'user_1', rubAmount: 200 });
      topupId = response.body.data.topupId;
    });

    it('should credit the user once for a successful payment', async () => {
      const response = await deliverSigned({ paymentId: 'pay_test_1', topupId, value: '200.00' });

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        success: true,
        data: { status: 'accepted', outcome: 'paid', paymentId: 'pay_test_1', topupId },
      });
      expect(services.store.balance('user_1')).toEqual({ available: 200, reserved: 0 });
      expect(services.store.topup(topupId)?.status).toBe('paid');
    });

    it('should acknowledge a redelivery without crediting again', async () => {
      await deliverSigned({ paymentId: 'pay_test_1', topupId, value: '200.00' });

      const response = await deliverSigned({ paymentId: 'pay_test_1', topupId, value: '200.00' });

      expect(response.status).toBe(200);
      expect(response.body.data.outcome).toBe('duplicate');
      expect(services.store.balance('user_1')).toEqual({ available: 200, reserved: 0 });
      expect(await counterValue(paymentReconciliationsTotal, { outcome: 'duplicate' })).toBe(1);
    });

    it('should accept a bare hex signature', async () => {
      const body = notificationBody({ paymentId: 'pay_test_1', topupId, value: '200.00' });

      const response = await deliver(body, sign(body));

      expect(response.status).toBe(200);
      expect(response.body.data.outcome).toBe('paid');
    });

    it('should answer 401 for a bad signature', async () => {
      const body = notificationBody({ paymentId: 'pay_test_1', topupId, value: '200.00' });

      const response = await deliver(body, `sha256=${sign(body, 'wrong-secret')}`);

      expect(response.status).toBe(401);
      expect(response.body.error.code).toBe(1006);
      expect(services.store.balance('user_1')).toEqual({ available: 0, reserved: 0 });
    });

    it('should answer 400 for a payload without the payment fields', async () => {
      const body = Buffer.from(JSON.stringify({ type: 'notification' }));

      const response = await deliver(body, sign(body));

      expect(response.status).toBe(400);
      expect(response.body.error.code).toBe(2003);
    });

    it('should acknowledge but not credit a mismatched amount', async () => {
      services.provider.payments.set('pay_test_1', {
        paymentId: 'pay_test_1',
        status: 'succeeded',
        amount: { value: '100.00', currency: 'RUB' },
      });

      const response = await deliverSigned({ paymentId: 'pay_test_1', topupId, value: '100.00' });

      expect(response.status).toBe(200);
      expect(response.body.data).toEqual({
        status: 'rejected',
        reason: 'AMOUNT_MISMATCH',
        paymentId: 'pay_test_1',
      });
      expect(services.store.balance('user_1')).toEqual({ available: 0, reserved: 0 });
    });

    it('should acknowledge but not credit a success the provider does not confirm', async () => {
      services.provider.payments.set('pay_test_1', {
        paymentId: 'pay_test_1',
        status: 'canceled',
        amount: { value: '200.00', currency: 'RUB' },
      });

      const response = await deliverSigned({ paymentId: 'pay_test_1', topupId, value: '200.00' });

      expect(response.status).toBe(200);
      expect(response.body.data).toEqual({
        status: 'rejected',
        reason: 'VERIFICATION_FAILED',
        paymentId: 'pay_test_1',
      });
      expect(services.store.balance('user_1')).toEqual({ available: 0, reserved: 0 });
    });

    it('should answer 502 when the provider cannot be asked, so the delivery is retried', async () => {
      services.provider.getError = ApiError.upstreamUnavailable();

      const response = await deliverSigned({ paymentId: 'pay_test_1', topupId, value: '200.00' });

      expect(response.status).toBe(502);
      expect(response.body.error.code).toBe(5005);
      expect(services.store.balance('user_1')).toEqual({ available: 0, reserved: 0 });
    });

    it('should fail the topup on cancellation', async () => {
      const response = await deliverSigned({
        paymentId: 'pay_test_1',
        topupId,
        status: 'canceled',
        value: '200.00',
      });

      expect(response.status).toBe(200);
      expect(response.body.data.outcome).toBe('failed');
      expect(services.store.topup(topupId)?.status).toBe('failed');
    });

    it('should ignore statuses that are not final', async () => {
      const response = await deliverSigned({
        paymentId: 'pay_test_1',
        topupId,
        status: 'waiting_for_capture',
        value: '200.00',
      });

      expect(response.status).toBe(200);
      expect(response.body.data.outcome).toBe('ignored');
      expect(services.store.topup(topupId)?.status).toBe('created');
    });

    it('should report an unknown topup', async () => {
      const response = await deliverSigned({ paymentId: 'pay_other', topupId: 'tup_missing' });

      expect(response.status).toBe(200);
      expect(response.body.data).toEqual({
        status: 'rejected',
        reason: 'TOPUP_NOT_FOUND',
        paymentId: 'pay_other',
      });
    });
  });
});
