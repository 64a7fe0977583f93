import request from 'supertest';

import { authenticatedRequest, createTestServices, getTestApp, TestServices } from '../helpers';

describe('Balance Endpoints', () => {
  let services: TestServices;
  let app: ReturnType<typeof getTestApp>;

  beforeEach(async () => {
    services = createTestServices();
    app = getTestApp(services);
    await services.ledger.grant('user_1', 100, 'tup_seed');
    await services.ledger.reserve('user_1', 10, 'gen_seed');
  });

  describe('GET /balances/:userId', () => {
    it('should return available and reserved credits', async () => {
      const response = await authenticatedRequest(app, 'bot').get('/balances/user_1');

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        success: true,
        data: { userId: 'user_1', available: 90, reserved: 10 },
      });
    });

    it('should return zero for an unknown user', async () => {
      const response = await authenticatedRequest(app, 'admin').get('/balances/user_2');

      expect(response.status).toBe(200);
      expect(response.body.data).toEqual({ userId: 'user_2', available: 0, reserved: 0 });
    });

    it('should require a token', async () => {
      const response = await request(app).get('/balances/user_1');

      expect(response.status).toBe(401);
      expect(response.body.error.code).toBe(1001);
    });

    it('should refuse the worker service', async () => {
      const response = await authenticatedRequest(app, 'worker').get('/balances/user_1');

      expect(response.status).toBe(403);
      expect(response.body.error.code).toBe(1005);
    });
  });

  describe('GET /balances/:userId/transactions', () => {
    it('should list ledger rows newest first', async () => {
      const response = await authenticatedRequest(app, 'bot').get('/balances/user_1/transactions');

      expect(response.status).toBe(200);
      expect(response.body.data.count).toBe(2);
      expect(
        response.body.data.transactions.map((entry: { kind: string; referenceId: string }) => [
          entry.kind,
          entry.referenceId,
        ])
      ).toEqual([
        ['reserve', 'gen_seed'],
        ['grant', 'tup_seed'],
      ]);
    });

    it('should honour the limit', async () => {
      const response = await authenticatedRequest(app, 'bot').get(
        '/balances/user_1/transactions?limit=1'
      );

      expect(response.status).toBe(200);
      expect(response.body.data.count).toBe(1);
      expect(response.body.data.transactions[0].kind).toBe('reserve');
    });

    it('should reject a limit above 100', async () => {
      const response = await authenticatedRequest(app, 'bot').get(
        '/balances/user_1/transactions?limit=101'
      );

      expect(response.status).toBe(400);
      expect(response.body.error.code).toBe(2001);
      expect(response.body.error.details).toEqual({
        limit: ['limit must be between 1 and 100'],
      });
    });
  });

  describe('POST /balances/:userId/grants', () => {
    const grant = (body: object) =>
      authenticatedRequest(app, 'admin').post('/balances/user_1/grants').send(body);

    it('should credit the user and answer 201', async () => {
      const response = await grant({ amount: 25, referenceId: 'support-7' });

      expect(response.status).toBe(201);
      expect(response.body.data).toMatchObject({
        kind: 'grant',
        userId: 'user_1',
        amount: 25,
        referenceId: 'adm_support-7',
        balance: { available: 115, reserved: 10 },
        idempotent: false,
      });
      expect(services.store.balance('user_1')).toEqual({ available: 115, reserved: 10 });
    });

    it('should answer a repeated reference with 200 and credit once', async () => {
      await grant({ amount: 25, referenceId: 'support-7' });

      const response = await grant({ amount: 25, referenceId: 'support-7' });

      expect(response.status).toBe(200);
      expect(response.body.data.idempotent).toBe(true);
      expect(services.store.balance('user_1')).toEqual({ available: 115, reserved: 10 });
    });

    it('should answer 400 when a reference is reused with another amount', async () => {
      await grant({ amount: 25, referenceId: 'support-7' });

      const response = await grant({ amount: 30, referenceId: 'support-7' });

      expect(response.status).toBe(400);
      expect(response.body.error.code).toBe(2001);
      expect(services.store.balance('user_1')).toEqual({ available: 115, reserved: 10 });
    });

    it('should reject an amount that is not a positive integer', async () => {
      const response = await grant({ amount: 0, referenceId: 'support-7' });

      expect(response.status).toBe(400);
      expect(response.body.error.details.amount).toEqual([
        'amount must be an integer between 1 and 100000',
      ]);
    });

    it('should require a reference', async () => {
      const response = await grant({ amount: 25 });

      expect(response.status).toBe(400);
      expect(response.body.error.details.referenceId).toContain('referenceId is required');
    });

    it('should refuse the bot service', async () => {
      const response = await authenticatedRequest(app, 'bot')
        .post('/balances/user_1/grants')
        .send({ amount: 25, referenceId: 'support-7' });

      expect(response.status).toBe(403);
      expect(services.store.balance('user_1')).toEqual({ available: 90, reserved: 10 });
    });
  });
});
