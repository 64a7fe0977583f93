/**
 * Reconciliation Sweep
 *
 * Backstop for outcomes nobody reported: generations stuck in reserved or
 * processing are failed (releasing their credits), and topups the user
 * never paid are expired. Runs on a schedule from the maintenance queue.
 */

import { config } from '../../config';
import { createServiceLogger, Logger } from '../../observability/logger';
import { reconciliationSweepItemsTotal } from '../../observability/metrics';
import { LedgerStore } from '../../store/store.types';
import { JobCoordinator } from '../generation/generation.service';
import { isValidTopupTransition } from '../payment/payment.state';

export interface SweepResult {
  generationsFailed: number;
  topupsExpired: number;
  errors: number;
}

export interface SweepOptions {
  generationTimeoutMs: number;
  topupExpiryMs: number;
  batchSize: number;
}

export interface ReconciliationServiceDeps {
  store: LedgerStore;
  coordinator: JobCoordinator;
  options?: Partial<SweepOptions>;
  logger?: Logger;
}

export const timeoutReason = (timeoutMs: number): string =>
  `TIMEOUT: generation exceeded ${Math.round(timeoutMs / 1000)}s`;

export class ReconciliationService {
  private readonly store: LedgerStore;
  private readonly coordinator: JobCoordinator;
  private readonly options: SweepOptions;
  private readonly log: Logger;

  constructor(deps: ReconciliationServiceDeps) {
    this.store = deps.store;
    this.coordinator = deps.coordinator;
    this.options = {
      generationTimeoutMs: config.generation.timeoutMs,
      topupExpiryMs: config.payment.topupExpiryMs,
      batchSize: config.sweep.batchSize,
      ...deps.options,
    };
    this.log = deps.logger ?? createServiceLogger('reconciliation');
  }

  async sweep(now: Date = new Date(), batchSize = this.options.batchSize): Promise<SweepResult> {
    const result: SweepResult = { generationsFailed: 0, topupsExpired: 0, errors: 0 };

    await this.failStuckGenerations(now, batchSize, result);
    await this.expireStaleTopups(now, batchSize, result);

    if (result.generationsFailed || result.topupsExpired || result.errors) {
      this.log.info(result, 'Reconciliation sweep finished');
    } else {
      this.log.debug('Reconciliation sweep found nothing to do');
    }
    return result;
  }

  private async failStuckGenerations(
    now: Date,
    batchSize: number,
    result: SweepResult
  ): Promise<void> {
    const cutoff = new Date(now.getTime() - this.options.generationTimeoutMs);
    const stuck = await this.store.withTransaction((session) =>
      session.generations.findStuck(['reserved', 'processing'], cutoff, batchSize)
    );

    for (const generation of stuck) {
      try {
        const reason = timeoutReason(this.options.generationTimeoutMs);
        await this.coordinator.fail(generation.jobId, reason);
        result.generationsFailed += 1;
        reconciliationSweepItemsTotal.inc({ type: 'generation', outcome: 'failed' });
        this.log.warn(
          { jobId: generation.jobId, userId: generation.userId, status: generation.status },
          'Stuck generation failed by sweep'
        );
      } catch (error) {
        result.errors += 1;
        reconciliationSweepItemsTotal.inc({ type: 'generation', outcome: 'error' });
        this.log.error({ err: error, jobId: generation.jobId }, 'Sweep could not fail generation');
      }
    }
  }

  private async expireStaleTopups(
    now: Date,
    batchSize: number,
    result: SweepResult
  ): Promise<void> {
    const cutoff = new Date(now.getTime() - this.options.topupExpiryMs);
    const stale = await this.store.withTransaction((session) =>
      session.topups.findStale('created', cutoff, batchSize)
    );

    for (const topup of stale) {
      try {
        const expired = await this.store.withTransaction(async (session) => {
          // Re-read: a payment may have landed since the scan
          const current = await session.topups.findById(topup.topupId);
          if (!current || !isValidTopupTransition(current.status, 'expired')) {
            return false;
          }
          await session.topups.update(topup.topupId, { status: 'expired' });
          return true;
        });

        if (expired) {
          result.topupsExpired += 1;
          reconciliationSweepItemsTotal.inc({ type: 'topup', outcome: 'expired' });
        }
      } catch (error) {
        result.errors += 1;
        reconciliationSweepItemsTotal.inc({ type: 'topup', outcome: 'error' });
        this.log.error({ err: error, topupId: topup.topupId }, 'Sweep could not expire topup');
      }
    }
  }
}
