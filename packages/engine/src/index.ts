export { InMemoryAccountBook, type IAccountBook } from './account-book.js';
export * from './engine-errors.js';
export { Ledger } from './ledger.js';
export { toAccountSnapshot } from './snapshot.js';
export { TransactionEngine } from './transaction-engine.js';
export type {
  Account,
  LedgerEntry,
  LedgerEntryKind,
  NewLedgerEntry,
  ProcessAllOptions,
  ProcessingSummary,
} from './types.js';
