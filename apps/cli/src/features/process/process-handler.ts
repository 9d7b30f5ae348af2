import { toError, type AccountSnapshot, type TransactionParseError, type TransactionRecord } from '@tally/core';
import { TransactionEngine, type ProcessingSummary } from '@tally/engine';
import { getLogger } from '@tally/logger';
import { err, ok, type Result } from 'neverthrow';

import { readTransactionRecords } from '../shared/csv-transaction-reader.js';

import type { ProcessHandlerParams } from './process-utils.js';

// Re-export for convenience
export type { ProcessHandlerParams };

const logger = getLogger('ProcessHandler');

/**
 * Result of the process operation.
 */
export interface ProcessResult {
  /** Final state of every client account, ordered by client id */
  accounts: AccountSnapshot[];

  /** Counts of applied, rejected and malformed records */
  summary: ProcessingSummary;
}

export type RecordReader = (
  filePath: string
) => AsyncIterable<Result<TransactionRecord, TransactionParseError>>;

/**
 * Process handler - replays a transactions file through a fresh engine.
 */
export class ProcessHandler {
  constructor(
    private readonly readRecords: RecordReader = readTransactionRecords,
    private readonly createEngine: () => TransactionEngine = () => new TransactionEngine()
  ) {}

  /**
   * Execute the process operation.
   */
  async execute(params: ProcessHandlerParams): Promise<Result<ProcessResult, Error>> {
    try {
      logger.info({ params }, 'Starting transaction processing');

      const engine = this.createEngine();
      const result = await engine.processAll(this.readRecords(params.transactionsFile), {
        skipInvalid: params.skipInvalid,
      });

      if (result.isErr()) {
        return err(result.error);
      }

      return ok({ accounts: engine.snapshot(), summary: result.value });
    } catch (error) {
      return err(toError(error));
    }
  }
}
