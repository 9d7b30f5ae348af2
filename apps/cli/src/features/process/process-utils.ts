// Pure utility functions for process command
// All functions are pure - no side effects

import { TransactionParseError, type AccountSnapshot } from '@tally/core';
import { CsvError } from 'csv-parse';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import type { z } from 'zod';

import { TransactionsFileError } from '../shared/csv-transaction-reader.js';
import { ExitCodes, type ExitCode } from '../shared/exit-codes.js';
import type { ProcessCommandOptionsSchema, REPORT_FORMATS } from '../shared/schemas.js';

/**
 * Process command options validated by Zod at CLI boundary
 */
export type ProcessCommandOptions = z.infer<typeof ProcessCommandOptionsSchema>;

export type ReportFormat = (typeof REPORT_FORMATS)[number];

/**
 * Process handler parameters.
 */
export interface ProcessHandlerParams {
  /** CSV file with `type,client,tx,amount` rows */
  transactionsFile: string;

  /** Skip malformed rows instead of aborting */
  skipInvalid: boolean;
}

/**
 * How the account report is rendered and where it goes.
 */
export interface ReportParams {
  format: ReportFormat;

  /** Write to this file instead of stdout */
  outputPath?: string | undefined;
}

export const ACCOUNT_CSV_HEADER = 'client,available,held,total,locked';

/**
 * Build handler and report parameters from the positional argument and validated flags.
 */
export function buildProcessParamsFromFlags(
  transactionsFile: string | undefined,
  options: ProcessCommandOptions
): Result<{ handler: ProcessHandlerParams; report: ReportParams }, Error> {
  const file = transactionsFile?.trim();
  if (!file) {
    return err(new Error('Missing required argument: transactions-file'));
  }

  return ok({
    handler: {
      transactionsFile: file,
      skipInvalid: options.skipInvalid ?? false,
    },
    report: {
      format: options.format,
      outputPath: options.output,
    },
  });
}

/**
 * Render accounts as CSV, one row per client, with a trailing newline.
 */
export function formatAccountsCsv(accounts: AccountSnapshot[]): string {
  const lines = [ACCOUNT_CSV_HEADER];

  for (const account of accounts) {
    lines.push([account.client, account.available, account.held, account.total, account.locked].join(','));
  }

  return `${lines.join('\n')}\n`;
}

export function formatAccountsJson(accounts: AccountSnapshot[]): string {
  return `${JSON.stringify(accounts, undefined, 2)}\n`;
}

export function formatAccounts(accounts: AccountSnapshot[], format: ReportFormat): string {
  return format === 'json' ? formatAccountsJson(accounts) : formatAccountsCsv(accounts);
}

/**
 * Map a failed run to the exit code the CLI reports.
 */
export function exitCodeForError(error: Error): ExitCode {
  if (error instanceof TransactionsFileError) {
    return ExitCodes.NOT_FOUND;
  }

  if (error instanceof TransactionParseError || error instanceof CsvError) {
    return ExitCodes.VALIDATION_ERROR;
  }

  return ExitCodes.GENERAL_ERROR;
}
