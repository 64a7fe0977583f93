import mongoose, { Document, Schema } from 'mongoose';

export interface IBalance extends Document {
  userId: string;
  available: number;
  reserved: number;
  version: number;
  createdAt: Date;
  updatedAt: Date;
}

const balanceSchema = new Schema<IBalance>(
  {
    userId: {
      type: String,
      required: true,
      unique: true,
      index: true,
    },
    available: {
      type: Number,
      required: true,
      default: 0,
      min: 0,
    },
    reserved: {
      type: Number,
      required: true,
      default: 0,
      min: 0,
    },
    // Bumped by every locking write; concurrent transactions on the same
    // user conflict on this document.
    version: {
      type: Number,
      required: true,
      default: 0,
    },
  },
  {
    timestamps: true,
    collection: 'balances',
  }
);

export const Balance = mongoose.model<IBalance>('Balance', balanceSchema);
