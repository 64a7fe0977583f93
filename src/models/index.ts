export { Balance, IBalance } from './Balance';
export { Transaction, ITransaction } from './Transaction';
export { Topup, ITopup } from './Topup';
export { PaymentRecordModel, IPaymentRecord } from './PaymentRecord';
export { Generation, IGeneration } from './Generation';
