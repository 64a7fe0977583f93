import mongoose, { ClientSession } from 'mongoose';

import { ApiError, isApiError } from '../middlewares/errorHandler';
import {
  Balance,
  Generation,
  IBalance,
  IGeneration,
  IPaymentRecord,
  ITopup,
  ITransaction,
  PaymentRecordModel,
  Topup,
  Transaction,
} from '../models';
import { createServiceLogger } from '../observability/logger';
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

import {
  ACTIVE_GENERATION_STATUSES,
  BalanceRepository,
  GenerationPatch,
  GenerationRepository,
  LedgerStore,
  NewGeneration,
  NewPaymentRecord,
  NewTopup,
  PaymentPatch,
  PaymentRepository,
  StoreSession,
  TopupPatch,
  TopupRepository,
  TransactionRepository,
} from './store.types';

const log = createServiceLogger('mongo-store');

const snapshot = (value: BalanceSnapshot): BalanceSnapshot => ({
  available: value.available,
  reserved: value.reserved,
});

const toBalance = (doc: IBalance): BalanceRecord => ({
  userId: doc.userId,
  available: doc.available,
  reserved: doc.reserved,
  version: doc.version,
  updatedAt: doc.updatedAt,
});

const toEntry = (doc: ITransaction): LedgerEntry => ({
  transactionId: doc.transactionId,
  userId: doc.userId,
  kind: doc.kind,
  amount: doc.amount,
  balanceBefore: snapshot(doc.balanceBefore),
  balanceAfter: snapshot(doc.balanceAfter),
  referenceId: doc.referenceId,
  createdAt: doc.createdAt,
});

const toTopup = (doc: ITopup): TopupRecord => ({
  topupId: doc.topupId,
  userId: doc.userId,
  rubAmount: doc.rubAmount,
  credits: doc.credits,
  status: doc.status,
  paymentId: doc.paymentId ?? null,
  confirmationUrl: doc.confirmationUrl ?? null,
  createdAt: doc.createdAt,
  paidAt: doc.paidAt ?? null,
  updatedAt: doc.updatedAt,
});

const toPayment = (doc: IPaymentRecord): PaymentRecord => ({
  paymentId: doc.paymentId,
  topupId: doc.topupId,
  userId: doc.userId,
  status: doc.status,
  processedAt: doc.processedAt ?? null,
  createdAt: doc.createdAt,
  updatedAt: doc.updatedAt,
});

const toGeneration = (doc: IGeneration): GenerationRecord => ({
  generationId: doc.generationId,
  jobId: doc.jobId,
  userId: doc.userId,
  prompt: doc.prompt,
  settings: doc.settings ?? {},
  referenceImages: [...doc.referenceImages],
  cost: doc.cost,
  status: doc.status,
  error: doc.error ?? null,
  result: doc.result
    ? { imageUrl: doc.result.imageUrl, seed: doc.result.seed, metadata: doc.result.metadata }
    : null,
  createdAt: doc.createdAt,
  startedAt: doc.startedAt ?? null,
  completedAt: doc.completedAt ?? null,
  updatedAt: doc.updatedAt,
});

class MongoBalanceRepository implements BalanceRepository {
  constructor(private readonly session: ClientSession) {}

  async find(userId: string): Promise<BalanceRecord | null> {
    const doc = await Balance.findOne({ userId }, null, { session: this.session });
    return doc ? toBalance(doc) : null;
  }

  async lockForUpdate(userId: string): Promise<BalanceRecord> {
    // The write takes the document lock for the rest of the transaction
    const doc = await Balance.findOneAndUpdate(
      { userId },
      { $inc: { version: 1 }, $setOnInsert: { available: 0, reserved: 0 } },
      { new: true, upsert: true, session: this.session }
    );
    if (!doc) {
      throw ApiError.storageUnavailable(`Balance for ${userId} could not be locked`);
    }
    return toBalance(doc);
  }

  async save(balance: BalanceRecord, next: BalanceSnapshot): Promise<BalanceRecord> {
    const doc = await Balance.findOneAndUpdate(
      { userId: balance.userId, version: balance.version },
      { $set: { available: next.available, reserved: next.reserved }, $inc: { version: 1 } },
      { new: true, session: this.session }
    );
    if (!doc) {
      throw ApiError.storageUnavailable(`Balance for ${balance.userId} changed concurrently`);
    }
    return toBalance(doc);
  }
}

class MongoTransactionRepository implements TransactionRepository {
  constructor(private readonly session: ClientSession) {}

  async findByReference(kind: LedgerKind, referenceId: string): Promise<LedgerEntry | null> {
    const doc = await Transaction.findOne({ kind, referenceId }, null, { session: this.session });
    return doc ? toEntry(doc) : null;
  }

  async append(entry: LedgerEntry): Promise<LedgerEntry> {
    const [doc] = await Transaction.create([entry], { session: this.session });
    return toEntry(doc);
  }

  async listByUser(userId: string, limit: number): Promise<LedgerEntry[]> {
    const docs = await Transaction.find({ userId }, null, { session: this.session })
      .sort({ createdAt: -1 })
      .limit(limit);
    return docs.map(toEntry);
  }
}

class MongoTopupRepository implements TopupRepository {
  constructor(private readonly session: ClientSession) {}

  async create(topup: NewTopup): Promise<TopupRecord> {
    const [doc] = await Topup.create([topup], { session: this.session });
    return toTopup(doc);
  }

  async findById(topupId: string): Promise<TopupRecord | null> {
    const doc = await Topup.findOne({ topupId }, null, { session: this.session });
    return doc ? toTopup(doc) : null;
  }

  async update(topupId: string, patch: TopupPatch): Promise<TopupRecord> {
    const doc = await Topup.findOneAndUpdate(
      { topupId },
      { $set: patch },
      { new: true, session: this.session }
    );
    if (!doc) {
      throw ApiError.notFound('Topup');
    }
    return toTopup(doc);
  }

  async findStale(status: TopupStatus, olderThan: Date, limit: number): Promise<TopupRecord[]> {
    const docs = await Topup.find({ status, createdAt: { $lt: olderThan } }, null, {
      session: this.session,
    })
      .sort({ createdAt: 1 })
      .limit(limit);
    return docs.map(toTopup);
  }
}

class MongoPaymentRepository implements PaymentRepository {
  constructor(private readonly session: ClientSession) {}

  async findByPaymentId(paymentId: string): Promise<PaymentRecord | null> {
    const doc = await PaymentRecordModel.findOne({ paymentId }, null, { session: this.session });
    return doc ? toPayment(doc) : null;
  }

  async create(record: NewPaymentRecord): Promise<PaymentRecord> {
    const [doc] = await PaymentRecordModel.create([record], { session: this.session });
    return toPayment(doc);
  }

  async update(paymentId: string, patch: PaymentPatch): Promise<PaymentRecord> {
    const doc = await PaymentRecordModel.findOneAndUpdate(
      { paymentId },
      { $set: patch },
      { new: true, session: this.session }
    );
    if (!doc) {
      throw ApiError.notFound('Payment record');
    }
    return toPayment(doc);
  }
}

class MongoGenerationRepository implements GenerationRepository {
  constructor(private readonly session: ClientSession) {}

  async create(generation: NewGeneration): Promise<GenerationRecord> {
    const [doc] = await Generation.create([generation], { session: this.session });
    return toGeneration(doc);
  }

  async findById(generationId: string): Promise<GenerationRecord | null> {
    const doc = await Generation.findOne({ generationId }, null, { session: this.session });
    return doc ? toGeneration(doc) : null;
  }

  async findByJobId(jobId: string): Promise<GenerationRecord | null> {
    const doc = await Generation.findOne({ jobId }, null, { session: this.session });
    return doc ? toGeneration(doc) : null;
  }

  async update(generationId: string, patch: GenerationPatch): Promise<GenerationRecord> {
    const doc = await Generation.findOneAndUpdate(
      { generationId },
      { $set: patch },
      { new: true, session: this.session }
    );
    if (!doc) {
      throw ApiError.notFound('Generation');
    }
    return toGeneration(doc);
  }

  async countActive(userId: string): Promise<number> {
    return Generation.countDocuments(
      { userId, status: { $in: ACTIVE_GENERATION_STATUSES } },
      { session: this.session }
    );
  }

  async findStuck(
    statuses: GenerationStatus[],
    olderThan: Date,
    limit: number
  ): Promise<GenerationRecord[]> {
    const docs = await Generation.find(
      {
        status: { $in: statuses },
        $or: [
          { startedAt: { $lt: olderThan } },
          { startedAt: null, createdAt: { $lt: olderThan } },
        ],
      },
      null,
      { session: this.session }
    )
      .sort({ createdAt: 1 })
      .limit(limit);
    return docs.map(toGeneration);
  }

  async listByUser(userId: string, limit: number): Promise<GenerationRecord[]> {
    const docs = await Generation.find({ userId }, null, { session: this.session })
      .sort({ createdAt: -1 })
      .limit(limit);
    return docs.map(toGeneration);
  }
}

const isStorageFailure = (error: unknown): boolean =>
  error instanceof mongoose.mongo.MongoError ||
  (error instanceof mongoose.Error && !(error instanceof mongoose.Error.ValidationError));

/**
 * MongoDB-backed store. Requires a replica set (transactions).
 */
export class MongoLedgerStore implements LedgerStore {
  async withTransaction<T>(work: (session: StoreSession) => Promise<T>): Promise<T> {
    const box: { result?: { value: T } } = {};
    let clientSession: ClientSession | undefined;

    try {
      clientSession = await mongoose.startSession();
      const session = clientSession;
      // The driver re-runs the callback on TransientTransactionError
      await session.withTransaction(async () => {
        box.result = {
          value: await work({
            balances: new MongoBalanceRepository(session),
            transactions: new MongoTransactionRepository(session),
            topups: new MongoTopupRepository(session),
            payments: new MongoPaymentRepository(session),
            generations: new MongoGenerationRepository(session),
          }),
        };
      });
    } catch (error) {
      if (isApiError(error) || !isStorageFailure(error)) {
        throw error;
      }
      log.warn({ err: error }, 'Storage transaction failed');
      throw ApiError.storageUnavailable();
    } finally {
      await clientSession?.endSession();
    }

    if (!box.result) {
      throw ApiError.storageUnavailable('Transaction did not commit');
    }
    return box.result.value;
  }
}
