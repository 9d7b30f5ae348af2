import { DomainError } from '@tally/core';
import type { Decimal } from 'decimal.js';

/**
 * A well-formed record that the engine refuses to apply. These never abort a
 * run; the record is dropped and the reason is logged and counted.
 */
export abstract class PolicyViolationError extends DomainError {
  readonly severity = 'warning' as const;
}

export class AccountNotFoundError extends PolicyViolationError {
  readonly code = 'ACCOUNT_NOT_FOUND';

  constructor(client: number) {
    super(`Account for client ${client} not found`, { client });
  }
}

export class AccountLockedError extends PolicyViolationError {
  readonly code = 'ACCOUNT_LOCKED';

  constructor(client: number) {
    super(`Account for client ${client} is locked`, { client });
  }
}

export class InvalidAmountError extends PolicyViolationError {
  readonly code = 'INVALID_AMOUNT';

  constructor(client: number, amount: Decimal) {
    super(`Amount ${amount.toString()} must be greater than zero`, {
      client,
      additionalContext: { amount: amount.toString() },
    });
  }
}

export class InsufficientFundsError extends PolicyViolationError {
  readonly code = 'INSUFFICIENT_FUNDS';

  constructor(client: number, available: Decimal, requested: Decimal) {
    super(`Available amount ${available.toString()} is lower than ${requested.toString()}`, {
      client,
      additionalContext: { available: available.toString(), requested: requested.toString() },
    });
  }
}

export class InsufficientHeldFundsError extends PolicyViolationError {
  readonly code = 'INSUFFICIENT_HELD_FUNDS';

  constructor(client: number, held: Decimal, requested: Decimal) {
    super(`Held amount ${held.toString()} is lower than ${requested.toString()}`, {
      client,
      additionalContext: { held: held.toString(), requested: requested.toString() },
    });
  }
}

export class DuplicateTransactionError extends PolicyViolationError {
  readonly code = 'DUPLICATE_TRANSACTION';

  constructor(tx: number, client?: number) {
    super(`Transaction ${tx} has already been recorded`, { client, transactionId: tx });
  }
}

export class UnknownTransactionError extends PolicyViolationError {
  readonly code = 'UNKNOWN_TRANSACTION';

  constructor(tx: number, client: number) {
    super(`Transaction ${tx} is not in the ledger`, { client, transactionId: tx });
  }
}

export class ClientMismatchError extends PolicyViolationError {
  readonly code = 'CLIENT_MISMATCH';

  constructor(tx: number, client: number, owner: number) {
    super(`Transaction ${tx} belongs to client ${owner}, not ${client}`, {
      client,
      transactionId: tx,
      additionalContext: { owner },
    });
  }
}

export type DisputeStateProblem = 'already-disputed' | 'not-disputed' | 'charged-back';

const DISPUTE_STATE_MESSAGES: Record<DisputeStateProblem, string> = {
  'already-disputed': 'is already under dispute',
  'not-disputed': 'is not under dispute',
  'charged-back': 'has been charged back',
};

export class InvalidDisputeStateError extends PolicyViolationError {
  readonly code = 'INVALID_DISPUTE_STATE';

  constructor(
    tx: number,
    client: number,
    public readonly problem: DisputeStateProblem
  ) {
    super(`Transaction ${tx} ${DISPUTE_STATE_MESSAGES[problem]}`, { client, transactionId: tx });
  }
}
