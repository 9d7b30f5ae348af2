import type { Decimal } from 'decimal.js';

/**
 * Mutable balance state of one client. `total` is never stored; it is always
 * `available + held`.
 */
export interface Account {
  client: number;
  available: Decimal;
  held: Decimal;
  locked: boolean;
}

export type LedgerEntryKind = 'deposit' | 'withdrawal';

/**
 * An applied deposit or withdrawal, kept so later dispute-lifecycle records can
 * find it by transaction id.
 *
 * Lifecycle: applied ⇄ disputed → charged back (terminal, stays disputed).
 */
export interface LedgerEntry {
  client: number;
  tx: number;
  amount: Decimal;
  kind: LedgerEntryKind;
  disputed: boolean;
  chargedBack: boolean;
}

export type NewLedgerEntry = Omit<LedgerEntry, 'disputed' | 'chargedBack'>;

/**
 * Counters for one engine run.
 */
export interface ProcessingSummary {
  /** Well-formed records handed to the engine */
  processed: number;
  /** Records that changed an account */
  applied: number;
  /** Records ignored by policy (locked account, unknown tx, insufficient funds, ...) */
  rejected: number;
  /** Rows that failed to parse and were skipped */
  malformed: number;
  /** Rejections keyed by error code */
  rejectionsByCode: Record<string, number>;
}

export interface ProcessAllOptions {
  /** Log and skip malformed rows instead of aborting the run */
  skipInvalid?: boolean | undefined;
}
