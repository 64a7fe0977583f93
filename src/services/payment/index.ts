/**
 * Payment Module
 *
 * Topup initiation and provider notification reconciliation.
 */

export {
  PaymentReconciler,
  PaymentReconcilerDeps,
  ReconcileResult,
  RejectionReason,
  AcceptedOutcome,
  InitiatedTopup,
} from './payment.service';
export {
  PaymentProvider,
  YooKassaPaymentProvider,
  CreatePaymentRequest,
  CreatedPayment,
  ProviderPayment,
} from './payment.provider';
export { signPayload, verifySignature, SIGNATURE_HEADER } from './payment.signature';
export { PaymentNotificationSchema, PaymentNotification } from './payment.schema';
export {
  isValidTopupTransition,
  isTerminalTopupState,
  getAllowedTopupTransitions,
} from './payment.state';
export { createTopupRoutes, createPaymentWebhookRoutes } from './payment.routes';
