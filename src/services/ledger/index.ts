/**
 * Credit Ledger Module
 *
 * Balances and the append-only transaction log. The only code allowed to
 * change a balance.
 */

// Service
export { CreditLedger, LedgerOperationResult, MAX_HISTORY_LIMIT } from './ledger.service';

// Controller
export { LedgerController } from './ledger.controller';

// Routes
export { createLedgerRoutes } from './ledger.routes';
