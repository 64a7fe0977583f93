/**
 * Payment Provider Client Unit Tests
 */

jest.mock('axios', () => {
  const actual = jest.requireActual<typeof import('axios')>('axios');
  const post = jest.fn();
  const get = jest.fn();
  return {
    ...actual,
    __esModule: true,
    default: { ...actual.default, post, get, create: jest.fn(() => ({ post, get })) },
  };
});

import axios, { AxiosError } from 'axios';

import { ApiError } from '../../../src/middlewares/errorHandler';
import { YooKassaPaymentProvider } from '../../../src/services/payment/payment.provider';
import { ErrorCode } from '../../../src/types/errors';
import { axiosResponse } from '../../helpers/axios';

const mockPost = jest.mocked(axios.post);
const mockGet = jest.mocked(axios.get);

const options = {
  apiUrl: 'http://provider.test/v3',
  shopId: 'test-shop',
  secretKey: 'test-secret',
  returnUrl: 'http://bot.test/return',
  timeoutMs: 1000,
};

describe('YooKassaPaymentProvider', () => {
  const provider = new YooKassaPaymentProvider(options);

  it('should create the payment with the topup as idempotence key', async () => {
    mockPost.mockResolvedValueOnce(
      axiosResponse({
        id: 'pay_abc',
        status: 'pending',
        confirmation: { type: 'redirect', confirmation_url: 'https://checkout.test/pay_abc' },
      })
    );

    const payment = await provider.createPayment({
      topupId: 'tup_1',
      userId: 'user_1',
      rubAmount: 200,
      credits: 200,
    });

    expect(payment).toEqual({
      paymentId: 'pay_abc',
      confirmationUrl: 'https://checkout.test/pay_abc',
    });
    expect(mockPost).toHaveBeenCalledWith(
      '/payments',
      {
        amount: { value: '200.00', currency: 'RUB' },
        capture: true,
        confirmation: { type: 'redirect', return_url: 'http://bot.test/return' },
        description: 'Balance top-up: 200 credits',
        metadata: { topup_id: 'tup_1', user_id: 'user_1', credits: 200 },
      },
      { headers: { 'Idempotence-Key': 'tup_1' } }
    );
  });

  it('should authenticate with the shop id and secret key', () => {
    new YooKassaPaymentProvider(options);

    expect(axios.create).toHaveBeenCalledWith({
      baseURL: 'http://provider.test/v3',
      timeout: 1000,
      auth: { username: 'test-shop', password: 'test-secret' },
      headers: { 'Content-Type': 'application/json' },
    });
  });

  it('should map provider errors to UPSTREAM_UNAVAILABLE', async () => {
    const response = axiosResponse({}, 401);
    mockPost.mockRejectedValueOnce(
      new AxiosError('Request failed', 'ERR_BAD_REQUEST', undefined, undefined, response)
    );

    const error = await provider
      .createPayment({ topupId: 'tup_1', userId: 'user_1', rubAmount: 100, credits: 100 })
      .catch((e: unknown) => e);

    expect(error instanceof ApiError && error.errorCode).toBe(ErrorCode.UPSTREAM_UNAVAILABLE);
    expect(error instanceof ApiError && error.message).toBe(
      'Payment provider request failed with status 401'
    );
  });

  it('should reject a response without a confirmation URL', async () => {
    mockPost.mockResolvedValueOnce(axiosResponse({ id: 'pay_abc', status: 'pending' }));

    const error = await provider
      .createPayment({ topupId: 'tup_1', userId: 'user_1', rubAmount: 100, credits: 100 })
      .catch((e: unknown) => e);

    expect(error instanceof ApiError && error.message).toBe(
      'Payment provider returned an unexpected response'
    );
  });

  describe('getPayment', () => {
    it('should read the payment status and amount', async () => {
      mockGet.mockResolvedValueOnce(
        axiosResponse({
          id: 'pay_abc',
          status: 'succeeded',
          paid: true,
          amount: { value: '200.00', currency: 'RUB' },
          metadata: { topup_id: 'tup_1' },
        })
      );

      const payment = await provider.getPayment('pay_abc');

      expect(payment).toEqual({
        paymentId: 'pay_abc',
        status: 'succeeded',
        amount: { value: '200.00', currency: 'RUB' },
      });
      expect(mockGet).toHaveBeenCalledWith('/payments/pay_abc');
    });

    it('should escape the payment id in the path', async () => {
      mockGet.mockResolvedValueOnce(
        axiosResponse({
          id: 'pay/../x',
          status: 'pending',
          amount: { value: '100.00', currency: 'RUB' },
        })
      );

      await provider.getPayment('pay/../x');

      expect(mockGet).toHaveBeenCalledWith('/payments/pay%2F..%2Fx');
    });

    it('should map a failed lookup to UPSTREAM_UNAVAILABLE', async () => {
      mockGet.mockRejectedValueOnce(
        new AxiosError(
          'Request failed',
          'ERR_BAD_REQUEST',
          undefined,
          undefined,
          axiosResponse({}, 404)
        )
      );

      const error = await provider.getPayment('pay_abc').catch((e: unknown) => e);

      expect(error instanceof ApiError && error.errorCode).toBe(ErrorCode.UPSTREAM_UNAVAILABLE);
      expect(error instanceof ApiError && error.message).toBe(
        'Payment provider request failed with status 404'
      );
    });

    it('should reject a lookup response without an amount', async () => {
      mockGet.mockResolvedValueOnce(axiosResponse({ id: 'pay_abc', status: 'succeeded' }));

      const error = await provider.getPayment('pay_abc').catch((e: unknown) => e);

      expect(error instanceof ApiError && error.message).toBe(
        'Payment provider returned an unexpected response'
      );
    });
  });
});
