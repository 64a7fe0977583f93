import mongoose, { Document, Schema } from 'mongoose';

import { PaymentStatus } from '../types/domain';

export interface IPaymentRecord extends Document {
  paymentId: string;
  topupId: string;
  userId: string;
  status: PaymentStatus;
  processedAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

const paymentRecordSchema = new Schema<IPaymentRecord>(
  {
    paymentId: {
      type: String,
      required: true,
      unique: true,
      index: true,
    },
    topupId: {
      type: String,
      required: true,
      index: true,
    },
    userId: {
      type: String,
      required: true,
    },
    status: {
      type: String,
      required: true,
      enum: ['pending', 'succeeded', 'canceled'],
      default: 'pending',
    },
    processedAt: {
      type: Date,
      default: null,
    },
  },
  {
    timestamps: true,
    collection: 'payment_records',
  }
);

export const PaymentRecordModel = mongoose.model<IPaymentRecord>(
  'PaymentRecord',
  paymentRecordSchema
);
