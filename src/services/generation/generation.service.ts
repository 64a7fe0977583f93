/**
 * Job Coordinator
 *
 * Owns the generation lifecycle. Credits are reserved in the same store
 * transaction that creates the job, and committed or released only on a
 * terminal outcome reported by the worker.
 */

import { v4 as uuidv4 } from 'uuid';

import { config } from '../../config';
import { GENERATION_COST } from '../../config/pricing';
import { ApiError } from '../../middlewares/errorHandler';
import { addLogContext } from '../../observability/log-context';
import { createServiceLogger, Logger } from '../../observability/logger';
import { generationJobsTotal } from '../../observability/metrics';
import { GenerationQueue } from '../../queues/generation.queue';
import { LedgerStore, StoreSession } from '../../store/store.types';
import {
  BalanceSnapshot,
  GenerationJobMessage,
  GenerationOutcome,
  GenerationRecord,
  GenerationResult,
  GenerationSettings,
} from '../../types/domain';
import { CreditLedger } from '../ledger/ledger.service';
import { NotificationService } from '../notification/notification.service';

import { validateTransition } from './generation.state';

export const ENQUEUE_FAILED = 'ENQUEUE_FAILED';
export const CANCELLED = 'CANCELLED';
export const MAX_LIST_LIMIT = 50;
const MAX_ERROR_LENGTH = 500;

export interface CoordinatorLimits {
  maxActivePerUser: number;
  maxQueueSize: number;
  maxReferenceImages: number;
  maxPromptLength: number;
  generationCost: number;
}

export const defaultCoordinatorLimits = (): CoordinatorLimits => ({
  maxActivePerUser: config.generation.maxActivePerUser,
  maxQueueSize: config.generation.maxQueueSize,
  maxReferenceImages: config.generation.maxReferenceImages,
  maxPromptLength: config.generation.maxPromptLength,
  generationCost: GENERATION_COST,
});

export interface CreateJobInput {
  userId: string;
  prompt: string;
  settings?: GenerationSettings;
  referenceImages?: string[];
  /** Internal callers only; the HTTP surface always uses the configured cost */
  cost?: number;
  idempotencyKey?: string;
}

export interface GenerationHandle {
  jobId: string;
  generationId: string;
  userId: string;
  status: GenerationRecord['status'];
  cost: number;
  balance: BalanceSnapshot;
  idempotent: boolean;
}

export interface JobCoordinatorDeps {
  store: LedgerStore;
  ledger: CreditLedger;
  queue: GenerationQueue;
  notifications: NotificationService;
  limits?: CoordinatorLimits;
  logger?: Logger;
}

const toMessage = (generation: GenerationRecord): GenerationJobMessage => ({
  generationId: generation.generationId,
  jobId: generation.jobId,
  userId: generation.userId,
  prompt: generation.prompt,
  referenceImages: generation.referenceImages,
  settings: generation.settings,
});

export class JobCoordinator {
  private readonly store: LedgerStore;
  private readonly ledger: CreditLedger;
  private readonly queue: GenerationQueue;
  private readonly notifications: NotificationService;
  private readonly limits: CoordinatorLimits;
  private readonly log: Logger;

  constructor(deps: JobCoordinatorDeps) {
    this.store = deps.store;
    this.ledger = deps.ledger;
    this.queue = deps.queue;
    this.notifications = deps.notifications;
    this.limits = deps.limits ?? defaultCoordinatorLimits();
    this.log = deps.logger ?? createServiceLogger('job-coordinator');
  }

  /**
   * Reserve credits and create the job in one transaction, then enqueue it.
   * With an idempotency key, a retried request returns the existing job.
   */
  async createJob(input: CreateJobInput): Promise<GenerationHandle> {
    const cost = input.cost ?? this.limits.generationCost;
    const referenceImages = input.referenceImages ?? [];
    const prompt = input.prompt.trim();

    if (!Number.isInteger(cost) || cost <= 0) {
      throw ApiError.invalidAmount('Generation cost must be a positive integer');
    }
    if (prompt.length === 0 || prompt.length > this.limits.maxPromptLength) {
      throw ApiError.validationError(
        `Prompt must be 1-${this.limits.maxPromptLength} characters`
      );
    }
    if (referenceImages.length > this.limits.maxReferenceImages) {
      throw ApiError.validationError(
        `At most ${this.limits.maxReferenceImages} reference images are allowed`
      );
    }

    const generationId = input.idempotencyKey ? `gen_${input.idempotencyKey}` : `gen_${uuidv4()}`;
    addLogContext({ userId: input.userId, jobId: generationId });

    if (input.idempotencyKey) {
      const replay = await this.findReplay(generationId, input.userId);
      if (replay) {
        return replay;
      }
    }

    await this.assertQueueCapacity();

    const created = await this.store.withTransaction(async (session) => {
      // A concurrent request with the same key may have won the race
      const existing = await session.generations.findById(generationId);
      if (existing) {
        if (existing.userId !== input.userId) {
          throw ApiError.validationError('Idempotency key already used by another user');
        }
        return { generation: existing, balance: null };
      }

      validateTransition('pending', 'reserved', generationId);
      const reservation = await this.ledger.reserve(input.userId, cost, generationId, session);

      // The reserve holds the user's balance lock, so this count is serialized
      // with any other create for the same user.
      const active = await session.generations.countActive(input.userId);
      if (active >= this.limits.maxActivePerUser) {
        throw ApiError.activeGenerationLimit();
      }

      const generation = await session.generations.create({
        generationId,
        jobId: generationId,
        userId: input.userId,
        prompt,
        settings: input.settings ?? {},
        referenceImages,
        cost,
        status: 'reserved',
        error: null,
        result: null,
        startedAt: null,
        completedAt: null,
      });

      return { generation, balance: reservation.balance };
    });

    if (!created.balance) {
      return this.replay(created.generation);
    }

    generationJobsTotal.inc({ status: 'reserved' });
    this.log.info({ jobId: generationId, userId: input.userId, cost }, 'Generation reserved');

    try {
      await this.queue.enqueue(toMessage(created.generation));
    } catch (error) {
      this.log.error({ err: error, jobId: generationId }, 'Enqueue failed, releasing reservation');
      // If the release fails too, the reconciliation sweep fails the job later
      await this.fail(generationId, ENQUEUE_FAILED).catch((releaseError: unknown) => {
        this.log.error({ err: releaseError, jobId: generationId }, 'Release after enqueue failure');
      });
      throw ApiError.queueUnavailable();
    }

    return this.toHandle(created.generation, created.balance, false);
  }

  /**
   * reserved → processing. Repeating it on a processing job is a no-op.
   */
  async markProcessing(jobId: string): Promise<GenerationRecord> {
    const generation = await this.store.withTransaction(async (session) => {
      const current = await this.load(session, jobId);
      if (current.status === 'processing') {
        return current;
      }
      validateTransition(current.status, 'processing', jobId);
      return session.generations.update(current.generationId, {
        status: 'processing',
        startedAt: new Date(),
      });
    });

    generationJobsTotal.inc({ status: 'processing' });
    return generation;
  }

  /**
   * processing → completed, committing the reserved credits.
   */
  async complete(jobId: string, result: GenerationResult): Promise<GenerationRecord> {
    const outcome = await this.store.withTransaction(async (session) => {
      const current = await this.load(session, jobId);
      // A result that lands after the user cancelled is dropped; the credits are already back
      if (
        current.status === 'completed' ||
        (current.status === 'failed' && current.error === CANCELLED)
      ) {
        return { generation: current, replayed: true };
      }
      validateTransition(current.status, 'completed', jobId);

      await this.ledger.commit(current.userId, current.cost, current.jobId, session);
      const generation = await session.generations.update(current.generationId, {
        status: 'completed',
        result,
        completedAt: new Date(),
      });
      return { generation, replayed: false };
    });

    if (outcome.replayed) {
      this.log.debug({ jobId, status: outcome.generation.status }, 'Completion ignored');
      return outcome.generation;
    }

    generationJobsTotal.inc({ status: 'completed' });
    this.log.info({ jobId, userId: outcome.generation.userId }, 'Generation completed');
    await this.notifications.notifyGenerationCompleted(
      outcome.generation.userId,
      jobId,
      result.imageUrl
    );
    return outcome.generation;
  }

  /**
   * reserved|processing → failed, releasing the reserved credits.
   */
  async fail(jobId: string, error: string): Promise<GenerationRecord> {
    return this.terminate(jobId, error);
  }

  /**
   * The owner gives up on a job that has not finished. The reservation is
   * released as for a failure; cancelling a cancelled job is a no-op.
   */
  async cancel(jobId: string, userId: string): Promise<GenerationRecord> {
    addLogContext({ userId, jobId });
    return this.terminate(jobId, CANCELLED, userId);
  }

  /** `ownerId` is set only for a cancellation by that user */
  private async terminate(
    jobId: string,
    error: string,
    ownerId?: string
  ): Promise<GenerationRecord> {
    const reason = (error || 'Generation failed').slice(0, MAX_ERROR_LENGTH);

    const outcome = await this.store.withTransaction(async (session) => {
      const current = await this.load(session, jobId);
      // Someone else's job is reported as missing
      if (ownerId !== undefined && current.userId !== ownerId) {
        throw ApiError.notFound('Generation');
      }
      if (current.status === 'failed') {
        return { generation: current, replayed: true };
      }
      validateTransition(current.status, 'failed', jobId);

      // Nothing was reserved for a job that never left pending
      if (current.status !== 'pending') {
        await this.ledger.release(current.userId, current.cost, current.jobId, session);
      }
      const generation = await session.generations.update(current.generationId, {
        status: 'failed',
        error: reason,
        completedAt: new Date(),
      });
      return { generation, replayed: false };
    });

    if (outcome.replayed) {
      this.log.debug({ jobId }, 'Duplicate failure ignored');
      return outcome.generation;
    }

    if (ownerId !== undefined) {
      generationJobsTotal.inc({ status: 'cancelled' });
      this.log.info({ jobId, userId: outcome.generation.userId }, 'Generation cancelled');
      return outcome.generation;
    }

    generationJobsTotal.inc({ status: 'failed' });
    this.log.warn({ jobId, userId: outcome.generation.userId, reason }, 'Generation failed');
    await this.notifications.notifyGenerationFailed(
      outcome.generation.userId,
      jobId,
      outcome.generation.cost
    );
    return outcome.generation;
  }

  /**
   * Apply a worker outcome
   */
  async settle(jobId: string, outcome: GenerationOutcome): Promise<GenerationRecord> {
    switch (outcome.kind) {
      case 'completed':
        return this.complete(jobId, outcome.result);
      case 'failed':
        return this.fail(jobId, outcome.error);
    }
  }

  async getJob(jobId: string): Promise<GenerationRecord> {
    return this.store.withTransaction((session) => this.load(session, jobId));
  }

  async listUserJobs(userId: string, limit = 10): Promise<GenerationRecord[]> {
    const capped = Math.min(Math.max(1, Math.floor(limit)), MAX_LIST_LIMIT);
    return this.store.withTransaction((session) => session.generations.listByUser(userId, capped));
  }

  private async load(session: StoreSession, jobId: string): Promise<GenerationRecord> {
    const generation = await session.generations.findByJobId(jobId);
    if (!generation) {
      throw ApiError.notFound('Generation');
    }
    return generation;
  }

  private async findReplay(
    generationId: string,
    userId: string
  ): Promise<GenerationHandle | null> {
    const existing = await this.store.withTransaction((session) =>
      session.generations.findById(generationId)
    );
    if (!existing) {
      return null;
    }
    if (existing.userId !== userId) {
      throw ApiError.validationError('Idempotency key already used by another user');
    }
    return this.replay(existing);
  }

  /**
   * Answer a retried create with the existing job. A job still `reserved`
   * may never have reached the queue, so it is enqueued again; the queue
   * collapses the duplicate on the job id.
   */
  private async replay(generation: GenerationRecord): Promise<GenerationHandle> {
    this.log.debug({ jobId: generation.jobId }, 'Replayed generation request');
    if (generation.status === 'reserved') {
      try {
        await this.queue.enqueue(toMessage(generation));
      } catch (error) {
        this.log.error({ err: error, jobId: generation.jobId }, 'Re-enqueue on replay failed');
        throw ApiError.queueUnavailable();
      }
    }
    return this.toHandle(generation, await this.ledger.getBalance(generation.userId), true);
  }

  private async assertQueueCapacity(): Promise<void> {
    let depth: number;
    try {
      depth = await this.queue.depth();
    } catch (error) {
      this.log.error({ err: error }, 'Could not read generation queue depth');
      throw ApiError.queueUnavailable();
    }
    if (depth >= this.limits.maxQueueSize) {
      throw ApiError.queueFull();
    }
  }

  private toHandle(
    generation: GenerationRecord,
    balance: BalanceSnapshot,
    idempotent: boolean
  ): GenerationHandle {
    return {
      jobId: generation.jobId,
      generationId: generation.generationId,
      userId: generation.userId,
      status: generation.status,
      cost: generation.cost,
      balance,
      idempotent,
    };
  }
}
