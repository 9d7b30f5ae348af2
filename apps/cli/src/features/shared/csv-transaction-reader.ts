import fs from 'node:fs/promises';

import { getErrorMessage, parseTransactionRow, type TransactionParseError, type TransactionRecord } from '@tally/core';
import { getLogger } from '@tally/logger';
import { parse, type Info } from 'csv-parse';
import type { Result } from 'neverthrow';

const logger = getLogger('csv-transaction-reader');

/**
 * The transactions file could not be opened or read.
 */
export class TransactionsFileError extends Error {
  constructor(
    public readonly filePath: string,
    cause: unknown
  ) {
    super(`Cannot read transactions file ${filePath}: ${getErrorMessage(cause)}`, { cause });
    this.name = 'TransactionsFileError';
  }
}

/**
 * Stream a transactions CSV (header `type,client,tx,amount`) row by row.
 *
 * Each data row is yielded as a parsed record or a parse error carrying the
 * file line the row ends on (blank lines and quoted line breaks included).
 * File and CSV syntax errors are thrown from the iterator.
 */
export async function* readTransactionRecords(
  filePath: string
): AsyncGenerator<Result<TransactionRecord, TransactionParseError>> {
  const handle = await fs.open(filePath, 'r').catch((error: unknown) => {
    throw new TransactionsFileError(filePath, error);
  });

  const input = handle.createReadStream();
  const parser = parse({
    bom: true,
    columns: true,
    info: true,
    relax_column_count: true,
    skip_empty_lines: true,
    trim: true,
  });

  // pipe() does not forward source errors
  input.on('error', (error) => parser.destroy(new TransactionsFileError(filePath, error)));
  input.pipe(parser);

  logger.debug({ filePath }, 'Reading transactions');

  let rows = 0;
  try {
    for await (const entry of parser) {
      const { info, record }: { info: Info; record: unknown } = entry;
      rows++;
      yield parseTransactionRow(record, info.lines);
    }
  } finally {
    input.destroy();
  }

  logger.debug({ filePath, rows }, 'Finished reading transactions');
}
