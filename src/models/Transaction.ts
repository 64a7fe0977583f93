import mongoose, { Document, Schema } from 'mongoose';

import { BalanceSnapshot, LEDGER_KINDS, LedgerKind } from '../types/domain';

export interface ITransaction extends Document {
  transactionId: string;
  userId: string;
  kind: LedgerKind;
  amount: number;
  balanceBefore: BalanceSnapshot;
  balanceAfter: BalanceSnapshot;
  referenceId: string;
  createdAt: Date;
}

const snapshotSchema = new Schema<BalanceSnapshot>(
  {
    available: { type: Number, required: true },
    reserved: { type: Number, required: true },
  },
  { _id: false }
);

const transactionSchema = new Schema<ITransaction>(
  {
    transactionId: {
      type: String,
      required: true,
      unique: true,
      index: true,
    },
    userId: {
      type: String,
      required: true,
      index: true,
    },
    kind: {
      type: String,
      required: true,
      enum: [...LEDGER_KINDS],
    },
    amount: {
      type: Number,
      required: true,
    },
    balanceBefore: {
      type: snapshotSchema,
      required: true,
    },
    balanceAfter: {
      type: snapshotSchema,
      required: true,
    },
    referenceId: {
      type: String,
      required: true,
    },
  },
  {
    timestamps: { createdAt: true, updatedAt: false },
    collection: 'transactions',
  }
);

// One ledger row per (kind, reference): the replay guard
transactionSchema.index({ kind: 1, referenceId: 1 }, { unique: true });
transactionSchema.index({ userId: 1, createdAt: -1 });

export const Transaction = mongoose.model<ITransaction>('Transaction', transactionSchema);
