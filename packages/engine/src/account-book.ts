import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import {
  AccountLockedError,
  AccountNotFoundError,
  InsufficientFundsError,
  InsufficientHeldFundsError,
  InvalidAmountError,
} from './engine-errors.js';
import type { Account } from './types.js';

type BalanceError = AccountNotFoundError | AccountLockedError | InvalidAmountError;

/**
 * Balance primitives over client accounts. Every mutation refuses to act on a
 * missing or locked account and on a non-positive amount.
 */
export interface IAccountBook {
  /** Return the client's account, opening an empty one on first use */
  ensureAccount(client: number): Account;
  get(client: number): Readonly<Account> | undefined;
  list(): Readonly<Account>[];

  /** available += amount */
  deposit(client: number, amount: Decimal): Result<Readonly<Account>, BalanceError>;
  /** available -= amount, refused when available < amount */
  withdraw(client: number, amount: Decimal): Result<Readonly<Account>, BalanceError | InsufficientFundsError>;
  /** available -= amount, held += amount; available may go negative */
  hold(client: number, amount: Decimal): Result<Readonly<Account>, BalanceError>;
  /** held -= amount, available += amount, refused when held < amount */
  release(client: number, amount: Decimal): Result<Readonly<Account>, BalanceError | InsufficientHeldFundsError>;
  /** held -= amount, refused when held < amount */
  withdrawHeld(client: number, amount: Decimal): Result<Readonly<Account>, BalanceError | InsufficientHeldFundsError>;
  /** Freeze the account permanently */
  lock(client: number): Result<Readonly<Account>, AccountNotFoundError>;
}

export class InMemoryAccountBook implements IAccountBook {
  private readonly accounts = new Map<number, Account>();

  ensureAccount(client: number): Account {
    let account = this.accounts.get(client);
    if (!account) {
      account = { client, available: new Decimal(0), held: new Decimal(0), locked: false };
      this.accounts.set(client, account);
    }
    return account;
  }

  get(client: number): Readonly<Account> | undefined {
    return this.accounts.get(client);
  }

  list(): Readonly<Account>[] {
    return [...this.accounts.values()];
  }

  deposit(client: number, amount: Decimal): Result<Readonly<Account>, BalanceError> {
    return this.mutable(client, amount).map((account) => {
      account.available = account.available.plus(amount);
      return account;
    });
  }

  withdraw(client: number, amount: Decimal): Result<Readonly<Account>, BalanceError | InsufficientFundsError> {
    return this.mutable(client, amount).andThen((account) => {
      if (account.available.lessThan(amount)) {
        return err(new InsufficientFundsError(client, account.available, amount));
      }

      account.available = account.available.minus(amount);
      return ok(account);
    });
  }

  hold(client: number, amount: Decimal): Result<Readonly<Account>, BalanceError> {
    return this.mutable(client, amount).map((account) => {
      account.available = account.available.minus(amount);
      account.held = account.held.plus(amount);
      return account;
    });
  }

  release(client: number, amount: Decimal): Result<Readonly<Account>, BalanceError | InsufficientHeldFundsError> {
    return this.mutable(client, amount).andThen((account) => {
      if (account.held.lessThan(amount)) {
        return err(new InsufficientHeldFundsError(client, account.held, amount));
      }

      account.held = account.held.minus(amount);
      account.available = account.available.plus(amount);
      return ok(account);
    });
  }

  withdrawHeld(client: number, amount: Decimal): Result<Readonly<Account>, BalanceError | InsufficientHeldFundsError> {
    return this.mutable(client, amount).andThen((account) => {
      if (account.held.lessThan(amount)) {
        return err(new InsufficientHeldFundsError(client, account.held, amount));
      }

      account.held = account.held.minus(amount);
      return ok(account);
    });
  }

  lock(client: number): Result<Readonly<Account>, AccountNotFoundError> {
    const account = this.accounts.get(client);
    if (!account) {
      return err(new AccountNotFoundError(client));
    }

    account.locked = true;
    return ok(account);
  }

  private mutable(client: number, amount: Decimal): Result<Account, BalanceError> {
    const account = this.accounts.get(client);
    if (!account) {
      return err(new AccountNotFoundError(client));
    }
    if (account.locked) {
      return err(new AccountLockedError(client));
    }
    if (!amount.isFinite() || !amount.greaterThan(0)) {
      return err(new InvalidAmountError(client, amount));
    }
    return ok(account);
  }
}
