import { err, ok, type Result } from 'neverthrow';

import { DuplicateTransactionError } from './engine-errors.js';
import type { LedgerEntry, NewLedgerEntry } from './types.js';

/**
 * Applied deposits and withdrawals keyed by transaction id.
 *
 * Entries are never removed: a charged-back transaction must stay visible so
 * that it cannot be disputed again.
 */
export class Ledger {
  private readonly entries = new Map<number, LedgerEntry>();

  get size(): number {
    return this.entries.size;
  }

  record(entry: NewLedgerEntry): Result<Readonly<LedgerEntry>, DuplicateTransactionError> {
    if (this.entries.has(entry.tx)) {
      return err(new DuplicateTransactionError(entry.tx, entry.client));
    }

    const stored: LedgerEntry = { ...entry, disputed: false, chargedBack: false };
    this.entries.set(entry.tx, stored);
    return ok(stored);
  }

  has(tx: number): boolean {
    return this.entries.has(tx);
  }

  find(tx: number): Readonly<LedgerEntry> | undefined {
    return this.entries.get(tx);
  }

  setDisputed(tx: number, disputed: boolean): void {
    const entry = this.entries.get(tx);
    if (entry) {
      entry.disputed = disputed;
    }
  }

  markChargedBack(tx: number): void {
    const entry = this.entries.get(tx);
    if (entry) {
      entry.chargedBack = true;
    }
  }
}
