import { TopupStatus } from '../../types/domain';

/**
 * Valid state transitions for a topup
 *
 * State Machine:
 * CREATED ──► PAID
 *    │         ▲
 *    ├──► EXPIRED (late success still pays)
 *    └──► FAILED
 */
const validTransitions: Record<TopupStatus, TopupStatus[]> = {
  created: ['paid', 'failed', 'expired'],
  expired: ['paid'],
  paid: [], // Terminal state
  failed: [], // Terminal state
};

export function isValidTopupTransition(currentStatus: TopupStatus, newStatus: TopupStatus): boolean {
  return validTransitions[currentStatus].includes(newStatus);
}

export function isTerminalTopupState(status: TopupStatus): boolean {
  return validTransitions[status].length === 0;
}

export function getAllowedTopupTransitions(status: TopupStatus): TopupStatus[] {
  return validTransitions[status];
}
