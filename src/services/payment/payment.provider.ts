/**
 * Payment provider client (YooKassa REST API)
 *
 * Creates the external payment for a topup and returns the checkout URL,
 * and reads a payment back so notifications can be checked against it.
 * Never called inside a store transaction.
 */

import axios, { AxiosInstance } from 'axios';

import { config } from '../../config';
import { ApiError } from '../../middlewares/errorHandler';

import {
  CreatedPaymentResponseSchema,
  PaymentAmount,
  PaymentStatusResponseSchema,
} from './payment.schema';

export interface CreatePaymentRequest {
  topupId: string;
  userId: string;
  rubAmount: number;
  credits: number;
}

export interface CreatedPayment {
  paymentId: string;
  confirmationUrl: string;
}

/** A payment as the provider currently reports it */
export interface ProviderPayment {
  paymentId: string;
  status: string;
  amount: PaymentAmount;
}

export interface PaymentProvider {
  createPayment(request: CreatePaymentRequest): Promise<CreatedPayment>;
  getPayment(paymentId: string): Promise<ProviderPayment>;
}

const requestFailed = (error: unknown): ApiError => {
  const status = axios.isAxiosError(error) ? error.response?.status : undefined;
  return ApiError.upstreamUnavailable(
    `Payment provider request failed${status ? ` with status ${status}` : ''}`
  );
};

const unexpectedResponse = (): ApiError =>
  ApiError.upstreamUnavailable('Payment provider returned an unexpected response');

export interface YooKassaOptions {
  apiUrl: string;
  shopId: string;
  secretKey: string;
  returnUrl: string;
  timeoutMs: number;
}

export class YooKassaPaymentProvider implements PaymentProvider {
  private readonly client: AxiosInstance;

  constructor(
    private readonly options: YooKassaOptions = {
      apiUrl: config.payment.apiUrl,
      shopId: config.payment.shopId,
      secretKey: config.payment.secretKey,
      returnUrl: config.payment.returnUrl,
      timeoutMs: config.payment.timeoutMs,
    }
  ) {
    this.client = axios.create({
      baseURL: options.apiUrl,
      timeout: options.timeoutMs,
      auth: { username: options.shopId, password: options.secretKey },
      headers: { 'Content-Type': 'application/json' },
    });
  }

  async createPayment(request: CreatePaymentRequest): Promise<CreatedPayment> {
    let body: unknown;
    try {
      const response = await this.client.post(
        '/payments',
        {
          amount: { value: `${request.rubAmount}.00`, currency: 'RUB' },
          capture: true,
          confirmation: { type: 'redirect', return_url: this.options.returnUrl },
          description: `Balance top-up: ${request.credits} credits`,
          metadata: {
            topup_id: request.topupId,
            user_id: request.userId,
            credits: request.credits,
          },
        },
        // Provider-side deduplication of retried creates
        { headers: { 'Idempotence-Key': request.topupId } }
      );
      body = response.data;
    } catch (error) {
      throw requestFailed(error);
    }

    const parsed = CreatedPaymentResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw unexpectedResponse();
    }

    return {
      paymentId: parsed.data.id,
      confirmationUrl: parsed.data.confirmation.confirmation_url,
    };
  }

  async getPayment(paymentId: string): Promise<ProviderPayment> {
    let body: unknown;
    try {
      const response = await this.client.get(`/payments/${encodeURIComponent(paymentId)}`);
      body = response.data;
    } catch (error) {
      throw requestFailed(error);
    }

    const parsed = PaymentStatusResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw unexpectedResponse();
    }

    return {
      paymentId: parsed.data.id,
      status: parsed.data.status,
      amount: { value: parsed.data.amount.value, currency: parsed.data.amount.currency },
    };
  }
}
