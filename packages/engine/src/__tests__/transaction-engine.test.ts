import { formatAmount, parseDecimal, TransactionParseError, type TransactionRecord } from '@tally/core';
import { configureLogger, resetLogger } from '@tally/logger';
import { err, ok, type Result } from 'neverthrow';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { TransactionEngine } from '../transaction-engine.js';

const deposit = (client: number, tx: number, amount: string): TransactionRecord => ({
  type: 'deposit',
  client,
  tx,
  amount: parseDecimal(amount),
});

const withdrawal = (client: number, tx: number, amount: string): TransactionRecord => ({
  type: 'withdrawal',
  client,
  tx,
  amount: parseDecimal(amount),
});

const dispute = (client: number, tx: number): TransactionRecord => ({ type: 'dispute', client, tx });
const resolve = (client: number, tx: number): TransactionRecord => ({ type: 'resolve', client, tx });
const chargeback = (client: number, tx: number): TransactionRecord => ({ type: 'chargeback', client, tx });

describe('TransactionEngine', () => {
  let engine: TransactionEngine;

  beforeEach(() => {
    engine = new TransactionEngine();
  });

  function applyAll(records: TransactionRecord[]): void {
    for (const record of records) {
      engine.apply(record);
    }
  }

  function accountOf(client: number) {
    return engine.snapshot().find((snapshot) => snapshot.client === client);
  }

  describe('deposits and withdrawals', () => {
    it('should sum deposits and subtract withdrawals', () => {
      applyAll([deposit(1, 1, '10.0'), deposit(1, 2, '5.0'), withdrawal(1, 3, '3.0')]);

      expect(engine.snapshot()).toEqual([
        { client: 1, available: '12.0000', held: '0.0000', total: '12.0000', locked: false },
      ]);
    });

    it('should reject a withdrawal larger than the available amount', () => {
      applyAll([deposit(1, 1, '10.0'), withdrawal(1, 2, '20.0')]);

      expect(accountOf(1)).toEqual({ client: 1, available: '10.0000', held: '0.0000', total: '10.0000', locked: false });
      expect(engine.getLedgerEntry(2)).toBeUndefined();
      expect(engine.getSummary().rejectionsByCode).toEqual({ INSUFFICIENT_FUNDS: 1 });
    });

    it('should allow withdrawing exactly the available amount', () => {
      applyAll([deposit(1, 1, '2.5'), withdrawal(1, 2, '2.5')]);

      expect(accountOf(1)).toMatchObject({ available: '0.0000', total: '0.0000' });
    });

    it('should ignore a deposit that reuses a transaction id', () => {
      applyAll([deposit(1, 1, '10'), deposit(1, 1, '7')]);

      expect(accountOf(1)).toMatchObject({ available: '10.0000', total: '10.0000' });
      expect(engine.getSummary().rejectionsByCode).toEqual({ DUPLICATE_TRANSACTION: 1 });
    });

    it('should ignore a withdrawal that reuses a deposit transaction id', () => {
      applyAll([deposit(1, 1, '10'), withdrawal(1, 1, '4')]);

      expect(accountOf(1)).toMatchObject({ available: '10.0000' });
      expect(engine.getLedgerEntry(1)?.kind).toBe('deposit');
    });

    it('should keep clients independent', () => {
      applyAll([deposit(2, 1, '1'), deposit(1, 2, '2'), withdrawal(2, 3, '0.5')]);

      expect(engine.snapshot()).toEqual([
        { client: 1, available: '2.0000', held: '0.0000', total: '2.0000', locked: false },
        { client: 2, available: '0.5000', held: '0.0000', total: '0.5000', locked: false },
      ]);
    });

    it('should record applied deposits and withdrawals in the ledger', () => {
      applyAll([deposit(1, 1, '10'), withdrawal(1, 2, '4')]);

      expect(engine.getLedgerEntry(1)).toMatchObject({ client: 1, kind: 'deposit', disputed: false });
      expect(engine.getLedgerEntry(2)).toMatchObject({ client: 1, kind: 'withdrawal', disputed: false });
    });
  });

  describe('disputes', () => {
    it('should move the disputed amount from available to held', () => {
      applyAll([deposit(1, 1, '10.0'), dispute(1, 1)]);

      expect(accountOf(1)).toEqual({ client: 1, available: '0.0000', held: '10.0000', total: '10.0000', locked: false });
      expect(engine.getLedgerEntry(1)?.disputed).toBe(true);
    });

    it('should ignore a dispute on an unknown transaction but still open the account', () => {
      applyAll([dispute(9, 404)]);

      expect(accountOf(9)).toEqual({ client: 9, available: '0.0000', held: '0.0000', total: '0.0000', locked: false });
      expect(engine.getSummary().rejectionsByCode).toEqual({ UNKNOWN_TRANSACTION: 1 });
    });

    it('should ignore a second dispute on the same transaction', () => {
      applyAll([deposit(1, 1, '10'), dispute(1, 1), dispute(1, 1)]);

      expect(accountOf(1)).toMatchObject({ available: '0.0000', held: '10.0000' });
      expect(engine.getSummary().rejectionsByCode).toEqual({ INVALID_DISPUTE_STATE: 1 });
    });

    it("should ignore a dispute on another client's transaction", () => {
      applyAll([deposit(1, 1, '10'), dispute(2, 1)]);

      expect(accountOf(1)).toMatchObject({ available: '10.0000', held: '0.0000' });
      expect(accountOf(2)).toMatchObject({ available: '0.0000', held: '0.0000' });
      expect(engine.getLedgerEntry(1)?.disputed).toBe(false);
      expect(engine.getSummary().rejectionsByCode).toEqual({ CLIENT_MISMATCH: 1 });
    });

    it('should hold a disputed withdrawal the same way as a deposit', () => {
      applyAll([deposit(1, 1, '10'), withdrawal(1, 2, '4'), dispute(1, 2)]);

      expect(accountOf(1)).toEqual({ client: 1, available: '2.0000', held: '4.0000', total: '6.0000', locked: false });
    });

    it('should let available go negative when the disputed funds were already withdrawn', () => {
      applyAll([deposit(1, 1, '10'), withdrawal(1, 2, '8'), dispute(1, 1)]);

      expect(accountOf(1)).toEqual({ client: 1, available: '-8.0000', held: '10.0000', total: '2.0000', locked: false });
    });
  });

  describe('resolves', () => {
    it('should restore the pre-dispute split', () => {
      applyAll([deposit(1, 1, '10'), deposit(1, 2, '2.5'), dispute(1, 1)]);
      expect(accountOf(1)).toMatchObject({ available: '2.5000', held: '10.0000', total: '12.5000' });

      engine.apply(resolve(1, 1));

      expect(accountOf(1)).toEqual({ client: 1, available: '12.5000', held: '0.0000', total: '12.5000', locked: false });
      expect(engine.getLedgerEntry(1)?.disputed).toBe(false);
    });

    it('should allow disputing a resolved transaction again', () => {
      applyAll([deposit(1, 1, '10'), dispute(1, 1), resolve(1, 1), dispute(1, 1)]);

      expect(accountOf(1)).toMatchObject({ available: '0.0000', held: '10.0000' });
      expect(engine.getSummary().rejected).toBe(0);
    });

    it('should ignore a resolve on a transaction that is not disputed', () => {
      applyAll([deposit(1, 1, '10'), resolve(1, 1), resolve(1, 2)]);

      expect(accountOf(1)).toMatchObject({ available: '10.0000', held: '0.0000' });
      expect(engine.getSummary().rejectionsByCode).toEqual({ INVALID_DISPUTE_STATE: 1, UNKNOWN_TRANSACTION: 1 });
    });
  });

  describe('chargebacks', () => {
    it('should remove the held amount and lock the account', () => {
      applyAll([deposit(1, 1, '10.0'), dispute(1, 1), chargeback(1, 1)]);

      expect(accountOf(1)).toEqual({ client: 1, available: '0.0000', held: '0.0000', total: '0.0000', locked: true });
      expect(engine.getLedgerEntry(1)).toMatchObject({ disputed: true, chargedBack: true });
    });

    it('should ignore a deposit after the account was locked', () => {
      applyAll([deposit(1, 1, '10.0'), dispute(1, 1), chargeback(1, 1), deposit(1, 2, '5.0')]);

      expect(accountOf(1)).toEqual({ client: 1, available: '0.0000', held: '0.0000', total: '0.0000', locked: true });
      expect(engine.getSummary()).toEqual({
        processed: 4,
        applied: 3,
        rejected: 1,
        malformed: 0,
        rejectionsByCode: { ACCOUNT_LOCKED: 1 },
      });
    });

    it('should ignore every record for the client after a chargeback', () => {
      applyAll([deposit(1, 1, '10'), deposit(1, 2, '5'), dispute(1, 1), chargeback(1, 1)]);
      const locked = accountOf(1);

      applyAll([withdrawal(1, 3, '1'), dispute(1, 2), resolve(1, 1), chargeback(1, 1), deposit(1, 4, '1')]);

      expect(locked).toEqual({ client: 1, available: '5.0000', held: '0.0000', total: '5.0000', locked: true });
      expect(accountOf(1)).toEqual(locked);
      expect(engine.getLedgerEntry(2)?.disputed).toBe(false);
      expect(engine.getSummary().rejectionsByCode).toEqual({ ACCOUNT_LOCKED: 5 });
    });

    it('should charge back a disputed withdrawal', () => {
      applyAll([deposit(1, 1, '10'), withdrawal(1, 2, '4'), dispute(1, 2), chargeback(1, 2)]);

      expect(accountOf(1)).toEqual({ client: 1, available: '2.0000', held: '0.0000', total: '2.0000', locked: true });
    });

    it('should ignore a chargeback on a transaction that is not disputed', () => {
      applyAll([deposit(1, 1, '10'), chargeback(1, 1)]);

      expect(accountOf(1)).toEqual({ client: 1, available: '10.0000', held: '0.0000', total: '10.0000', locked: false });
    });

    it('should not lock other clients', () => {
      applyAll([deposit(1, 1, '10'), deposit(2, 2, '3'), dispute(1, 1), chargeback(1, 1), deposit(2, 3, '1')]);

      expect(accountOf(2)).toEqual({ client: 2, available: '4.0000', held: '0.0000', total: '4.0000', locked: false });
    });
  });

  describe('invariants', () => {
    it('should keep held non-negative, total equal to available + held, and locked accounts frozen', () => {
      let seed = 42;
      const next = () => {
        seed = (Math.imul(seed, 1664525) + 1013904223) >>> 0;
        return seed;
      };

      const frozen = new Map<number, ReturnType<typeof accountOf>>();
      let lastTx = 0;

      for (let i = 0; i < 500; i++) {
        const client = (next() % 3) + 1;
        const kind = next() % 5;
        const amount = parseDecimal(String((next() % 10000) + 1))
          .div(100)
          .toString();
        const referenced = lastTx === 0 ? 1 : (next() % lastTx) + 1;

        if (kind === 0) engine.apply(deposit(client, ++lastTx, amount));
        else if (kind === 1) engine.apply(withdrawal(client, ++lastTx, amount));
        else if (kind === 2) engine.apply(dispute(client, referenced));
        else if (kind === 3) engine.apply(resolve(client, referenced));
        else engine.apply(chargeback(client, referenced));

        for (const snapshot of engine.snapshot()) {
          const available = parseDecimal(snapshot.available);
          const held = parseDecimal(snapshot.held);

          expect(held.isNegative()).toBe(false);
          expect(snapshot.total).toBe(formatAmount(available.plus(held)));

          const previous = frozen.get(snapshot.client);
          if (previous) {
            expect(snapshot).toEqual(previous);
          } else if (snapshot.locked) {
            frozen.set(snapshot.client, snapshot);
          }
        }
      }

      expect(engine.getSummary().processed).toBe(500);
    });
  });

  describe('processAll', () => {
    const parseError = new TransactionParseError('type: Invalid discriminator value', 3);

    it('should apply every record from a synchronous source', async () => {
      const records: Result<TransactionRecord, TransactionParseError>[] = [
        ok(deposit(1, 1, '10')),
        ok(withdrawal(1, 2, '3')),
      ];

      const result = await engine.processAll(records);

      expect(result._unsafeUnwrap()).toEqual({
        processed: 2,
        applied: 2,
        rejected: 0,
        malformed: 0,
        rejectionsByCode: {},
      });
      expect(accountOf(1)).toMatchObject({ available: '7.0000' });
    });

    it('should consume an async source in order', async () => {
      async function* source(): AsyncGenerator<Result<TransactionRecord, TransactionParseError>> {
        yield ok(deposit(1, 1, '10'));
        await Promise.resolve();
        yield ok(dispute(1, 1));
        yield ok(resolve(1, 1));
      }

      const result = await engine.processAll(source());

      expect(result.isOk()).toBe(true);
      expect(accountOf(1)).toEqual({ client: 1, available: '10.0000', held: '0.0000', total: '10.0000', locked: false });
    });

    it('should stop at the first malformed row by default', async () => {
      const records: Result<TransactionRecord, TransactionParseError>[] = [
        ok(deposit(1, 1, '10')),
        err(parseError),
        ok(deposit(1, 2, '5')),
      ];

      const result = await engine.processAll(records);

      expect(result._unsafeUnwrapErr()).toBe(parseError);
      expect(accountOf(1)).toMatchObject({ available: '10.0000' });
      expect(engine.getSummary()).toMatchObject({ processed: 1, malformed: 1 });
    });

    it('should skip malformed rows when asked to', async () => {
      const records: Result<TransactionRecord, TransactionParseError>[] = [
        ok(deposit(1, 1, '10')),
        err(parseError),
        ok(deposit(1, 2, '5')),
      ];

      const result = await engine.processAll(records, { skipInvalid: true });

      expect(result._unsafeUnwrap()).toEqual({
        processed: 2,
        applied: 2,
        rejected: 0,
        malformed: 1,
        rejectionsByCode: {},
      });
      expect(accountOf(1)).toMatchObject({ available: '15.0000' });
    });
  });

  describe('logging', () => {
    afterEach(() => {
      resetLogger();
    });

    it('should log ignored records with their error code', () => {
      const lines: unknown[] = [];
      configureLogger({
        destination: { write: (msg: string) => lines.push(JSON.parse(msg)) },
        level: 'warn',
      });

      applyAll([deposit(1, 1, '10'), withdrawal(1, 2, '20')]);

      expect(lines).toHaveLength(1);
      expect(lines[0]).toMatchObject({
        category: 'TransactionEngine',
        client: 1,
        code: 'INSUFFICIENT_FUNDS',
        msg: 'Transaction ignored: Available amount 10 is lower than 20',
        tx: 2,
        type: 'withdrawal',
      });
    });
  });
});
