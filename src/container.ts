import { GenerationQueue, BullGenerationQueue } from './queues/generation.queue';
import { HttpImageGenerator, ImageGenerator, JobCoordinator } from './services/generation';
import { CreditLedger } from './services/ledger';
import { NotificationService } from './services/notification';
import { PaymentProvider, PaymentReconciler, YooKassaPaymentProvider } from './services/payment';
import { ReconciliationService } from './services/reconciliation';
import { LedgerStore, MongoLedgerStore } from './store';

export interface Container {
  store: LedgerStore;
  ledger: CreditLedger;
  notifications: NotificationService;
  queue: GenerationQueue;
  coordinator: JobCoordinator;
  provider: PaymentProvider;
  reconciler: PaymentReconciler;
  reconciliation: ReconciliationService;
  generator: ImageGenerator;
}

/**
 * Wire the production service graph (MongoDB, BullMQ, HTTP clients).
 * Connections are opened separately by the entry points.
 */
export const createContainer = (): Container => {
  const store = new MongoLedgerStore();
  const ledger = new CreditLedger(store);
  const notifications = new NotificationService();
  const queue = new BullGenerationQueue();
  const coordinator = new JobCoordinator({ store, ledger, queue, notifications });
  const provider = new YooKassaPaymentProvider();
  const reconciler = new PaymentReconciler({ store, ledger, provider, notifications });
  const reconciliation = new ReconciliationService({ store, coordinator });
  const generator = new HttpImageGenerator();

  return {
    store,
    ledger,
    notifications,
    queue,
    coordinator,
    provider,
    reconciler,
    reconciliation,
    generator,
  };
};
