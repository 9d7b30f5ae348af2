import type { Result } from 'neverthrow';

import { TransactionParseError } from '../errors/index.js';
import { TransactionRecordSchema } from '../schemas/transaction.js';
import type { TransactionRecord } from '../schemas/transaction.js';

import { describeZodIssue, fromZod } from './zod-utils.js';

/**
 * Validate one raw input row (a column-name → cell map) into a typed record.
 *
 * @param line 1-based line number in the source, used in the error message
 */
export function parseTransactionRow(row: unknown, line: number): Result<TransactionRecord, TransactionParseError> {
  return fromZod(TransactionRecordSchema, row).mapErr((error) => {
    const issue = error.issues[0];
    const message = issue ? describeZodIssue(issue) : 'Invalid transaction row';
    return new TransactionParseError(message, line, { additionalContext: { row } });
  });
}

