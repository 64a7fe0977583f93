import {
  BalanceRecord,
  BalanceSnapshot,
  GenerationRecord,
  GenerationStatus,
  LedgerEntry,
  LedgerKind,
  PaymentRecord,
  TopupRecord,
  TopupStatus,
} from '../types/domain';

export interface BalanceRepository {
  find(userId: string): Promise<BalanceRecord | null>;
  /**
   * Get-or-create the balance and hold it for the rest of the transaction.
   */
  lockForUpdate(userId: string): Promise<BalanceRecord>;
  /**
   * Optimistic write: fails if the stored version is not `balance.version`.
   */
  save(balance: BalanceRecord, next: BalanceSnapshot): Promise<BalanceRecord>;
}

export interface TransactionRepository {
  findByReference(kind: LedgerKind, referenceId: string): Promise<LedgerEntry | null>;
  append(entry: LedgerEntry): Promise<LedgerEntry>;
  listByUser(userId: string, limit: number): Promise<LedgerEntry[]>;
}

export type NewTopup = Omit<TopupRecord, 'createdAt' | 'updatedAt'>;
export type TopupPatch = Partial<Pick<TopupRecord, 'status' | 'paymentId' | 'confirmationUrl' | 'paidAt'>>;

export interface TopupRepository {
  create(topup: NewTopup): Promise<TopupRecord>;
  findById(topupId: string): Promise<TopupRecord | null>;
  update(topupId: string, patch: TopupPatch): Promise<TopupRecord>;
  findStale(status: TopupStatus, olderThan: Date, limit: number): Promise<TopupRecord[]>;
}

export type NewPaymentRecord = Omit<PaymentRecord, 'createdAt' | 'updatedAt'>;
export type PaymentPatch = Partial<Pick<PaymentRecord, 'status' | 'processedAt'>>;

export interface PaymentRepository {
  findByPaymentId(paymentId: string): Promise<PaymentRecord | null>;
  create(record: NewPaymentRecord): Promise<PaymentRecord>;
  update(paymentId: string, patch: PaymentPatch): Promise<PaymentRecord>;
}

export type NewGeneration = Omit<GenerationRecord, 'createdAt' | 'updatedAt'>;
export type GenerationPatch = Partial<
  Pick<GenerationRecord, 'status' | 'error' | 'result' | 'startedAt' | 'completedAt'>
>;

export interface GenerationRepository {
  create(generation: NewGeneration): Promise<GenerationRecord>;
  findById(generationId: string): Promise<GenerationRecord | null>;
  findByJobId(jobId: string): Promise<GenerationRecord | null>;
  update(generationId: string, patch: GenerationPatch): Promise<GenerationRecord>;
  countActive(userId: string): Promise<number>;
  /**
   * Generations in one of `statuses` whose `startedAt ?? createdAt` is
   * before `olderThan`, oldest first.
   */
  findStuck(statuses: GenerationStatus[], olderThan: Date, limit: number): Promise<GenerationRecord[]>;
  listByUser(userId: string, limit: number): Promise<GenerationRecord[]>;
}

/**
 * Repositories bound to one open transaction
 */
export interface StoreSession {
  balances: BalanceRepository;
  transactions: TransactionRepository;
  topups: TopupRepository;
  payments: PaymentRepository;
  generations: GenerationRepository;
}

/**
 * Durable transactional storage behind the ledger, reconciler and coordinator.
 * Everything written through the session inside `work` commits together or
 * not at all.
 */
export interface LedgerStore {
  withTransaction<T>(work: (session: StoreSession) => Promise<T>): Promise<T>;
}

/** Non-terminal generation statuses, counted against the per-user limit */
export const ACTIVE_GENERATION_STATUSES: GenerationStatus[] = ['pending', 'reserved', 'processing'];
