import { formatAmount, type AccountSnapshot } from '@tally/core';

import type { Account } from './types.js';

export function toAccountSnapshot(account: Readonly<Account>): AccountSnapshot {
  return {
    client: account.client,
    available: formatAmount(account.available),
    held: formatAmount(account.held),
    total: formatAmount(account.available.plus(account.held)),
    locked: account.locked,
  };
}
