import { ApiError } from '../../middlewares/errorHandler';
import { GenerationStatus } from '../../types/domain';

/**
 * Valid state transitions for a generation job
 *
 * State Machine:
 * PENDING ──► RESERVED ──► PROCESSING ──► COMPLETED
 *    │            │             │
 *    │            │             │ (worker failure / timeout)
 *    └────────────┴─────────────┴──────► FAILED
 */
const validTransitions: Record<GenerationStatus, GenerationStatus[]> = {
  pending: ['reserved', 'failed'],
  reserved: ['processing', 'failed'],
  processing: ['completed', 'failed'],
  completed: [], // Terminal state
  failed: [], // Terminal state
};

/**
 * Check if a state transition is valid
 */
export function isValidTransition(
  currentStatus: GenerationStatus,
  newStatus: GenerationStatus
): boolean {
  return validTransitions[currentStatus].includes(newStatus);
}

/**
 * Throws INVALID_STATE_TRANSITION if the transition is not allowed
 */
export function validateTransition(
  currentStatus: GenerationStatus,
  newStatus: GenerationStatus,
  jobId: string
): void {
  if (!isValidTransition(currentStatus, newStatus)) {
    throw ApiError.invalidTransition(
      `Invalid state transition from ${currentStatus} to ${newStatus} for generation ${jobId}`
    );
  }
}

export function isTerminalState(status: GenerationStatus): boolean {
  return validTransitions[status].length === 0;
}

export function getAllowedTransitions(status: GenerationStatus): GenerationStatus[] {
  return validTransitions[status];
}
