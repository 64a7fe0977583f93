import mongoose, { Document, Schema } from 'mongoose';

import { GenerationResult, GenerationSettings, GenerationStatus } from '../types/domain';

export interface IGeneration extends Document {
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
  startedAt: Date | null;
  completedAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

const resultSchema = new Schema<GenerationResult>(
  {
    imageUrl: { type: String, required: true },
    seed: { type: Number },
    metadata: { type: Schema.Types.Mixed },
  },
  { _id: false }
);

const generationSchema = new Schema<IGeneration>(
  {
    generationId: {
      type: String,
      required: true,
      unique: true,
      index: true,
    },
    jobId: {
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
    prompt: {
      type: String,
      required: true,
      maxlength: 2000,
    },
    settings: {
      type: Schema.Types.Mixed,
      default: {},
    },
    referenceImages: {
      type: [String],
      default: [],
    },
    cost: {
      type: Number,
      required: true,
      min: 1,
    },
    status: {
      type: String,
      required: true,
      enum: ['pending', 'reserved', 'processing', 'completed', 'failed'],
      default: 'pending',
      index: true,
    },
    error: {
      type: String,
      default: null,
    },
    result: {
      type: resultSchema,
      default: null,
    },
    startedAt: {
      type: Date,
      default: null,
    },
    completedAt: {
      type: Date,
      default: null,
    },
  },
  {
    timestamps: true,
    collection: 'generations',
    minimize: false,
  }
);

generationSchema.index({ userId: 1, status: 1 });
generationSchema.index({ status: 1, createdAt: 1 });

export const Generation = mongoose.model<IGeneration>('Generation', generationSchema);
