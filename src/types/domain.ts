/**
 * Domain records shared by the services, the storage port and the queues.
 */

export type LedgerKind = 'grant' | 'reserve' | 'commit' | 'release';

export const LEDGER_KINDS: readonly LedgerKind[] = ['grant', 'reserve', 'commit', 'release'];

export interface BalanceSnapshot {
  available: number;
  reserved: number;
}

export interface BalanceRecord extends BalanceSnapshot {
  userId: string;
  version: number;
  updatedAt: Date;
}

/**
 * One immutable ledger row. `amount` is signed: grant and release add to
 * `available`, reserve and commit take away.
 */
export interface LedgerEntry {
  transactionId: string;
  userId: string;
  kind: LedgerKind;
  amount: number;
  balanceBefore: BalanceSnapshot;
  balanceAfter: BalanceSnapshot;
  referenceId: string;
  createdAt: Date;
}

export type TopupStatus = 'created' | 'paid' | 'failed' | 'expired';

export interface TopupRecord {
  topupId: string;
  userId: string;
  rubAmount: number;
  credits: number;
  status: TopupStatus;
  paymentId: string | null;
  confirmationUrl: string | null;
  createdAt: Date;
  paidAt: Date | null;
  updatedAt: Date;
}

/** Mirror of the provider-side payment status */
export type PaymentStatus = 'pending' | 'succeeded' | 'canceled';

export interface PaymentRecord {
  paymentId: string;
  topupId: string;
  userId: string;
  status: PaymentStatus;
  processedAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export type GenerationStatus = 'pending' | 'reserved' | 'processing' | 'completed' | 'failed';

export type GenerationSettings = Record<string, string | number | boolean>;

export interface GenerationResult {
  imageUrl: string;
  seed?: number;
  metadata?: Record<string, unknown>;
}

export interface GenerationRecord {
  generationId: string;
  jobId: string;
  userId: string;
  prompt: string;
  settings: GenerationSettings;
  referenceImages: string[];
  cost: number;
  status: GenerationStatus;
  error: string | null;
  result: GenerationResult | null;
  createdAt: Date;
  startedAt: Date | null;
  completedAt: Date | null;
  updatedAt: Date;
}

/**
 * Message carried by the generation queue to the worker pool
 */
export interface GenerationJobMessage {
  generationId: string;
  jobId: string;
  userId: string;
  prompt: string;
  referenceImages: string[];
  settings: GenerationSettings;
}

/**
 * What the worker boundary reports back for one job
 */
export type GenerationOutcome =
  | { kind: 'completed'; result: GenerationResult }
  | { kind: 'failed'; error: string };
