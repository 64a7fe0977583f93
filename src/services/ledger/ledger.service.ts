/**
 * Credit Ledger
 *
 * Sole owner of balances and the transaction log. Every mutation is
 * grant / reserve / commit / release, runs inside one store transaction with
 * the user's balance locked, and is idempotent per (kind, referenceId).
 */

import { v4 as uuidv4 } from 'uuid';

import { ApiError } from '../../middlewares/errorHandler';
import { createServiceLogger, Logger } from '../../observability/logger';
import {
  ledgerCreditsTotal,
  ledgerInvariantViolationsTotal,
  ledgerOperationsTotal,
} from '../../observability/metrics';
import { traceLedgerOperation } from '../../observability/tracing';
import { LedgerStore, StoreSession } from '../../store/store.types';
import { BalanceSnapshot, LedgerEntry, LedgerKind } from '../../types/domain';

export interface LedgerOperationResult {
  transactionId: string;
  kind: LedgerKind;
  userId: string;
  amount: number;
  referenceId: string;
  balance: BalanceSnapshot;
  idempotent: boolean;
}

export const MAX_HISTORY_LIMIT = 100;
/** Keeps operator references apart from topup ids in the grant namespace */
export const MANUAL_GRANT_PREFIX = 'adm_';

const signedAmount = (kind: LedgerKind, amount: number): number =>
  kind === 'grant' || kind === 'release' ? amount : -amount;

const toResult = (entry: LedgerEntry, idempotent: boolean): LedgerOperationResult => ({
  transactionId: entry.transactionId,
  kind: entry.kind,
  userId: entry.userId,
  amount: Math.abs(entry.amount),
  referenceId: entry.referenceId,
  balance: { ...entry.balanceAfter },
  idempotent,
});

export class CreditLedger {
  private readonly log: Logger;

  constructor(
    private readonly store: LedgerStore,
    log?: Logger
  ) {
    this.log = log ?? createServiceLogger('credit-ledger');
  }

  /**
   * Add purchased credits. Replaying the same reference (a topup id) is a no-op.
   */
  async grant(
    userId: string,
    amount: number,
    referenceId: string,
    session?: StoreSession
  ): Promise<LedgerOperationResult> {
    return this.execute('grant', userId, amount, referenceId, session);
  }

  /**
   * Operator credit outside the payment flow. Replaying the same reference
   * is a no-op; reusing it for another user or amount is refused as bad
   * input rather than treated as ledger corruption.
   */
  async grantManual(
    userId: string,
    amount: number,
    referenceId: string
  ): Promise<LedgerOperationResult> {
    const reference = `${MANUAL_GRANT_PREFIX}${referenceId}`;
    return this.store.withTransaction(async (session) => {
      const existing = await session.transactions.findByReference('grant', reference);
      if (existing && (existing.userId !== userId || Math.abs(existing.amount) !== amount)) {
        throw ApiError.validationError('referenceId was already used for a different grant');
      }
      return this.grant(userId, amount, reference, session);
    });
  }

  /**
   * Hold credits against a job. Fails with INSUFFICIENT_CREDITS and no
   * mutation when `available < amount`.
   */
  async reserve(
    userId: string,
    amount: number,
    referenceId: string,
    session?: StoreSession
  ): Promise<LedgerOperationResult> {
    return this.execute('reserve', userId, amount, referenceId, session);
  }

  /**
   * Spend a reservation.
   */
  async commit(
    userId: string,
    amount: number,
    referenceId: string,
    session?: StoreSession
  ): Promise<LedgerOperationResult> {
    return this.execute('commit', userId, amount, referenceId, session);
  }

  /**
   * Return a reservation to `available`.
   */
  async release(
    userId: string,
    amount: number,
    referenceId: string,
    session?: StoreSession
  ): Promise<LedgerOperationResult> {
    return this.execute('release', userId, amount, referenceId, session);
  }

  /**
   * Unknown users read as zero; no balance row is created.
   */
  async getBalance(userId: string): Promise<BalanceSnapshot> {
    return this.store.withTransaction(async (session) => {
      const balance = await session.balances.find(userId);
      return balance
        ? { available: balance.available, reserved: balance.reserved }
        : { available: 0, reserved: 0 };
    });
  }

  async getHistory(userId: string, limit = 20): Promise<LedgerEntry[]> {
    const capped = Math.min(Math.max(1, Math.floor(limit)), MAX_HISTORY_LIMIT);
    return this.store.withTransaction((session) => session.transactions.listByUser(userId, capped));
  }

  private async execute(
    kind: LedgerKind,
    userId: string,
    amount: number,
    referenceId: string,
    session?: StoreSession
  ): Promise<LedgerOperationResult> {
    if (!Number.isInteger(amount) || amount <= 0) {
      throw ApiError.invalidAmount();
    }
    if (!userId || !referenceId) {
      throw ApiError.validationError('userId and referenceId are required');
    }

    return traceLedgerOperation(kind, userId, referenceId, async () => {
      try {
        const result = session
          ? await this.apply(session, kind, userId, amount, referenceId)
          : await this.store.withTransaction((own) =>
              this.apply(own, kind, userId, amount, referenceId)
            );

        ledgerOperationsTotal.inc({ kind, outcome: result.idempotent ? 'replayed' : 'applied' });
        if (!result.idempotent) {
          ledgerCreditsTotal.inc({ kind }, amount);
          this.log.info(
            { kind, userId, amount, referenceId, balance: result.balance },
            'Ledger operation applied'
          );
        }
        return result;
      } catch (error) {
        ledgerOperationsTotal.inc({ kind, outcome: 'rejected' });
        throw error;
      }
    });
  }

  private async apply(
    session: StoreSession,
    kind: LedgerKind,
    userId: string,
    amount: number,
    referenceId: string
  ): Promise<LedgerOperationResult> {
    const existing = await session.transactions.findByReference(kind, referenceId);
    if (existing) {
      if (existing.userId !== userId || Math.abs(existing.amount) !== amount) {
        throw this.violation(
          kind,
          userId,
          amount,
          referenceId,
          'reference already used with a different user or amount'
        );
      }
      this.log.debug({ kind, userId, referenceId }, 'Duplicate ledger operation');
      return toResult(existing, true);
    }

    // Lock before validating so concurrent callers for this user see the
    // balance this operation leaves behind.
    const balance = await session.balances.lockForUpdate(userId);
    const before: BalanceSnapshot = { available: balance.available, reserved: balance.reserved };
    let after: BalanceSnapshot;

    switch (kind) {
      case 'grant':
        after = { available: before.available + amount, reserved: before.reserved };
        break;

      case 'reserve':
        if (before.available < amount) {
          throw ApiError.insufficientCredits(
            `Insufficient credits: available ${before.available}, required ${amount}`
          );
        }
        after = { available: before.available - amount, reserved: before.reserved + amount };
        break;

      case 'commit':
      case 'release': {
        await this.assertSettleable(session, kind, userId, amount, referenceId);
        if (before.reserved < amount) {
          throw this.violation(
            kind,
            userId,
            amount,
            referenceId,
            `reserved ${before.reserved} is below ${amount}`
          );
        }
        after =
          kind === 'commit'
            ? { available: before.available, reserved: before.reserved - amount }
            : { available: before.available + amount, reserved: before.reserved - amount };
        break;
      }
    }

    await session.balances.save(balance, after);

    const entry = await session.transactions.append({
      transactionId: `txn_${uuidv4()}`,
      userId,
      kind,
      amount: signedAmount(kind, amount),
      balanceBefore: before,
      balanceAfter: after,
      referenceId,
      createdAt: new Date(),
    });

    return toResult(entry, false);
  }

  /**
   * A commit or release must settle a reservation made for the same user and
   * amount, and only one of the two may ever happen per reference.
   */
  private async assertSettleable(
    session: StoreSession,
    kind: 'commit' | 'release',
    userId: string,
    amount: number,
    referenceId: string
  ): Promise<void> {
    const reservation = await session.transactions.findByReference('reserve', referenceId);
    if (!reservation) {
      throw this.violation(kind, userId, amount, referenceId, 'no reservation for reference');
    }
    if (reservation.userId !== userId || Math.abs(reservation.amount) !== amount) {
      throw this.violation(kind, userId, amount, referenceId, 'does not match its reservation');
    }

    const opposite = kind === 'commit' ? 'release' : 'commit';
    if (await session.transactions.findByReference(opposite, referenceId)) {
      throw this.violation(
        kind,
        userId,
        amount,
        referenceId,
        `reservation already settled by ${opposite}`
      );
    }
  }

  private violation(
    kind: LedgerKind,
    userId: string,
    amount: number,
    referenceId: string,
    detail: string
  ): ApiError {
    ledgerInvariantViolationsTotal.inc({ kind });
    this.log.fatal(
      { kind, userId, amount, referenceId, detail, manualReconciliation: true },
      'Ledger invariant violation'
    );
    return ApiError.invariantViolation(`Ledger ${kind} for ${referenceId} refused: ${detail}`);
  }
}
