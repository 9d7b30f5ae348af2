import type {
  AccountSnapshot,
  ChargebackRecord,
  DepositRecord,
  DisputeRecord,
  ResolveRecord,
  TransactionParseError,
  TransactionRecord,
  WithdrawalRecord,
} from '@tally/core';
import { getLogger } from '@tally/logger';
import { err, ok, type Result } from 'neverthrow';

import { InMemoryAccountBook, type IAccountBook } from './account-book.js';
import {
  AccountLockedError,
  ClientMismatchError,
  DuplicateTransactionError,
  InvalidDisputeStateError,
  UnknownTransactionError,
  type PolicyViolationError,
} from './engine-errors.js';
import { Ledger } from './ledger.js';
import { toAccountSnapshot } from './snapshot.js';
import type { Account, LedgerEntry, ProcessAllOptions, ProcessingSummary } from './types.js';

const logger = getLogger('TransactionEngine');

type RecordSource =
  | Iterable<Result<TransactionRecord, TransactionParseError>>
  | AsyncIterable<Result<TransactionRecord, TransactionParseError>>;

/**
 * TransactionEngine - replays transaction records into client balances
 *
 * Records are applied one at a time in arrival order:
 * 1. The client's account is opened on first sight
 * 2. The record is dispatched by type against the account and the ledger
 * 3. A record that breaks a rule (locked account, unknown or foreign tx,
 *    insufficient funds, wrong dispute state) changes nothing; the reason is
 *    logged and counted, and processing continues
 */
export class TransactionEngine {
  private summary: ProcessingSummary = {
    processed: 0,
    applied: 0,
    rejected: 0,
    malformed: 0,
    rejectionsByCode: {},
  };

  constructor(
    private readonly accounts: IAccountBook = new InMemoryAccountBook(),
    private readonly ledger: Ledger = new Ledger()
  ) {}

  /**
   * Apply a single record. Never throws for a well-formed record.
   */
  apply(record: TransactionRecord): void {
    this.accounts.ensureAccount(record.client);
    this.summary.processed++;

    const result = this.dispatch(record);

    if (result.isOk()) {
      this.summary.applied++;
      logger.debug({ client: record.client, tx: record.tx, type: record.type }, 'Transaction applied');
      return;
    }

    const error = result.error;
    this.summary.rejected++;
    this.summary.rejectionsByCode[error.code] = (this.summary.rejectionsByCode[error.code] ?? 0) + 1;
    logger.warn(
      { client: record.client, code: error.code, tx: record.tx, type: record.type },
      `Transaction ignored: ${error.message}`
    );
  }

  /**
   * Apply every record from a (possibly async) source in order.
   *
   * A malformed row aborts the run and is returned as the error, unless
   * `skipInvalid` is set, in which case it is logged, counted and skipped.
   * Errors thrown by the source itself (unreadable file, broken CSV) propagate.
   */
  async processAll(
    records: RecordSource,
    options: ProcessAllOptions = {}
  ): Promise<Result<ProcessingSummary, TransactionParseError>> {
    for await (const result of records) {
      if (result.isErr()) {
        this.summary.malformed++;

        if (!options.skipInvalid) {
          logger.error({ line: result.error.line }, `Encountered corrupt transaction: ${result.error.message}`);
          return err(result.error);
        }

        logger.warn({ line: result.error.line }, `Skipping corrupt transaction: ${result.error.message}`);
        continue;
      }

      this.apply(result.value);
    }

    logger.info(
      { applied: this.summary.applied, malformed: this.summary.malformed, rejected: this.summary.rejected },
      `Processed ${this.summary.processed} transactions`
    );

    return ok(this.getSummary());
  }

  /**
   * Rendered state of every known account, ordered by client id.
   */
  snapshot(): AccountSnapshot[] {
    return this.accounts
      .list()
      .map((account) => toAccountSnapshot(account))
      .sort((a, b) => a.client - b.client);
  }

  getSummary(): ProcessingSummary {
    return { ...this.summary, rejectionsByCode: { ...this.summary.rejectionsByCode } };
  }

  getAccount(client: number): Readonly<Account> | undefined {
    return this.accounts.get(client);
  }

  getLedgerEntry(tx: number): Readonly<LedgerEntry> | undefined {
    return this.ledger.find(tx);
  }

  private dispatch(record: TransactionRecord): Result<void, PolicyViolationError> {
    switch (record.type) {
      case 'deposit':
        return this.deposit(record);
      case 'withdrawal':
        return this.withdraw(record);
      case 'dispute':
        return this.dispute(record);
      case 'resolve':
        return this.resolve(record);
      case 'chargeback':
        return this.chargeback(record);
    }
  }

  private deposit(record: DepositRecord): Result<void, PolicyViolationError> {
    return this.requireUnlocked(record.client)
      .andThen(() => this.requireNewTransaction(record.tx, record.client))
      .andThen(() => this.accounts.deposit(record.client, record.amount))
      .andThen(() =>
        this.ledger.record({ client: record.client, tx: record.tx, amount: record.amount, kind: 'deposit' })
      )
      .map(() => undefined);
  }

  private withdraw(record: WithdrawalRecord): Result<void, PolicyViolationError> {
    return this.requireUnlocked(record.client)
      .andThen(() => this.requireNewTransaction(record.tx, record.client))
      .andThen(() => this.accounts.withdraw(record.client, record.amount))
      .andThen(() =>
        this.ledger.record({ client: record.client, tx: record.tx, amount: record.amount, kind: 'withdrawal' })
      )
      .map(() => undefined);
  }

  // Holds the full amount of either kind, even if that drives available below zero
  private dispute(record: DisputeRecord): Result<void, PolicyViolationError> {
    return this.requireUnlocked(record.client)
      .andThen(() => this.findOwnEntry(record.tx, record.client))
      .andThen((entry) => {
        if (entry.chargedBack) {
          return err(new InvalidDisputeStateError(entry.tx, record.client, 'charged-back'));
        }
        if (entry.disputed) {
          return err(new InvalidDisputeStateError(entry.tx, record.client, 'already-disputed'));
        }
        return this.accounts.hold(record.client, entry.amount);
      })
      .map(() => this.ledger.setDisputed(record.tx, true));
  }

  private resolve(record: ResolveRecord): Result<void, PolicyViolationError> {
    return this.requireUnlocked(record.client)
      .andThen(() => this.findDisputedEntry(record.tx, record.client))
      .andThen((entry) => this.accounts.release(record.client, entry.amount))
      .map(() => this.ledger.setDisputed(record.tx, false));
  }

  private chargeback(record: ChargebackRecord): Result<void, PolicyViolationError> {
    return this.requireUnlocked(record.client)
      .andThen(() => this.findDisputedEntry(record.tx, record.client))
      .andThen((entry) => this.accounts.withdrawHeld(record.client, entry.amount))
      .andThen(() => {
        this.ledger.markChargedBack(record.tx);
        return this.accounts.lock(record.client);
      })
      .map(() => undefined);
  }

  private requireUnlocked(client: number): Result<void, AccountLockedError> {
    return this.accounts.get(client)?.locked ? err(new AccountLockedError(client)) : ok(undefined);
  }

  private requireNewTransaction(tx: number, client: number): Result<void, DuplicateTransactionError> {
    return this.ledger.has(tx) ? err(new DuplicateTransactionError(tx, client)) : ok(undefined);
  }

  private findOwnEntry(
    tx: number,
    client: number
  ): Result<Readonly<LedgerEntry>, UnknownTransactionError | ClientMismatchError> {
    const entry = this.ledger.find(tx);
    if (!entry) {
      return err(new UnknownTransactionError(tx, client));
    }
    if (entry.client !== client) {
      return err(new ClientMismatchError(tx, client, entry.client));
    }
    return ok(entry);
  }

  private findDisputedEntry(
    tx: number,
    client: number
  ): Result<Readonly<LedgerEntry>, UnknownTransactionError | ClientMismatchError | InvalidDisputeStateError> {
    return this.findOwnEntry(tx, client).andThen((entry) =>
      entry.disputed ? ok(entry) : err(new InvalidDisputeStateError(tx, client, 'not-disputed'))
    );
  }
}
