export {
  ReconciliationService,
  ReconciliationServiceDeps,
  SweepOptions,
  SweepResult,
  timeoutReason,
} from './reconciliation.service';
