import request from 'supertest';

import { httpRequestsTotal } from '../../src/observability/metrics';
import { authenticatedRequest, counterValue, getTestApp } from '../helpers';

describe('Metrics Endpoint', () => {
  it('should expose Prometheus text', async () => {
    const response = await request(getTestApp()).get('/metrics');

    expect(response.status).toBe(200);
    expect(response.headers['content-type']).toMatch(/^text\/plain/);
    expect(response.text).toContain('# TYPE ledger_operations_total counter');
  });

  it('should count requests by route pattern', async () => {
    const app = getTestApp();

    await authenticatedRequest(app, 'bot').get('/balances/user_1');
    await authenticatedRequest(app, 'bot').get('/balances/user_2');

    expect(
      await counterValue(httpRequestsTotal, {
        method: 'GET',
        path: '/balances/:userId',
        status: '200',
      })
    ).toBe(2);
  });
});
