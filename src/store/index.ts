export * from './store.types';
export { MongoLedgerStore } from './mongo.store';
