/**
 * Payment provider notification contract.
 * Only the fields reconciliation reads are required; passthrough() keeps
 * whatever else the provider sends.
 */

import { z } from 'zod';

export const PaymentAmountSchema = z
  .object({
    value: z.string().regex(/^\d+(\.\d{1,2})?$/, 'Expected a decimal amount'),
    currency: z.string().length(3),
  })
  .passthrough();

export const PaymentNotificationSchema = z
  .object({
    event: z.string().min(1),
    object: z
      .object({
        id: z.string().min(1, 'payment id cannot be empty'),
        status: z.string().min(1),
        amount: PaymentAmountSchema.optional(),
        metadata: z
          .object({
            topup_id: z.string().min(1, 'topup_id cannot be empty'),
          })
          .passthrough(),
      })
      .passthrough(),
  })
  .passthrough();

export type PaymentNotification = z.infer<typeof PaymentNotificationSchema>;
export type PaymentAmount = z.infer<typeof PaymentAmountSchema>;

/** Statuses reconciliation acts on; anything else is acknowledged and ignored */
export const SETTLED_PAYMENT_STATUSES = ['succeeded', 'canceled'] as const;
export type SettledPaymentStatus = (typeof SETTLED_PAYMENT_STATUSES)[number];

export const isSettledStatus = (status: string): status is SettledPaymentStatus =>
  SETTLED_PAYMENT_STATUSES.some((settled) => settled === status);

/**
 * Provider response to payment creation
 */
export const CreatedPaymentResponseSchema = z
  .object({
    id: z.string().min(1),
    status: z.string(),
    confirmation: z
      .object({
        confirmation_url: z.string().url(),
      })
      .passthrough(),
  })
  .passthrough();

/**
 * Provider response to a payment lookup
 */
export const PaymentStatusResponseSchema = z
  .object({
    id: z.string().min(1),
    status: z.string().min(1),
    amount: PaymentAmountSchema,
  })
  .passthrough();
