import mongoose, { Document, Schema } from 'mongoose';

import { TopupStatus } from '../types/domain';

export interface ITopup extends Document {
  topupId: string;
  userId: string;
  rubAmount: number;
  credits: number;
  status: TopupStatus;
  paymentId: string | null;
  confirmationUrl: string | null;
  paidAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

const topupSchema = new Schema<ITopup>(
  {
    topupId: {
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
    rubAmount: {
      type: Number,
      required: true,
      min: 1,
    },
    credits: {
      type: Number,
      required: true,
      min: 1,
    },
    status: {
      type: String,
      required: true,
      enum: ['created', 'paid', 'failed', 'expired'],
      default: 'created',
    },
    paymentId: {
      type: String,
      default: null,
    },
    confirmationUrl: {
      type: String,
      default: null,
    },
    paidAt: {
      type: Date,
      default: null,
    },
  },
  {
    timestamps: true,
    collection: 'topups',
  }
);

// Expiry sweep scans created topups by age
topupSchema.index({ status: 1, createdAt: 1 });

export const Topup = mongoose.model<ITopup>('Topup', topupSchema);
