import fs from 'node:fs/promises';

import { toError } from '@tally/core';
import { configureLogger } from '@tally/logger';
import type { Command } from 'commander';
import pc from 'picocolors';

import { displayCliError } from '../shared/cli-error.js';
import { ExitCodes } from '../shared/exit-codes.js';
import { outputSuccess } from '../shared/json-output.js';
import { ProcessCommandOptionsSchema } from '../shared/schemas.js';

import { ProcessHandler, type ProcessResult } from './process-handler.js';
import { buildProcessParamsFromFlags, exitCodeForError, formatAccounts, type ReportParams } from './process-utils.js';

/**
 * Process command result data (JSON mode).
 */
interface ProcessCommandResult extends ProcessResult {
  outputPath?: string | undefined;
}

/**
 * Register the process command. It is the default command, so
 * `tally transactions.csv` and `tally process transactions.csv` are equivalent.
 */
export function registerProcessCommand(program: Command): void {
  program
    .command('process', { isDefault: true })
    .description('Replay a transactions CSV and report the final state of every client account')
    .argument('[transactions-file]', 'CSV file with type,client,tx,amount columns')
    .option('--format <type>', 'Report format (csv|json)', 'csv')
    .option('--output <file>', 'Write the report to a file instead of stdout')
    .option('--skip-invalid', 'Skip malformed rows instead of aborting')
    .option('--verbose', 'Log every transaction decision to stderr')
    .option('--json', 'Output results in JSON format')
    .action(async (transactionsFile: string | undefined, rawOptions: unknown) => {
      await executeProcessCommand(transactionsFile, rawOptions);
    });
}

/**
 * Execute the process command.
 */
async function executeProcessCommand(transactionsFile: string | undefined, rawOptions: unknown): Promise<void> {
  // Check for --json flag early (even before validation) to determine output format
  const isJsonMode =
    typeof rawOptions === 'object' && rawOptions !== null && 'json' in rawOptions && rawOptions.json === true;

  // Validate options at CLI boundary with Zod
  const validationResult = ProcessCommandOptionsSchema.safeParse(rawOptions);
  if (!validationResult.success) {
    const firstError = validationResult.error.issues[0];
    displayCliError(
      'process',
      new Error(firstError?.message ?? 'Invalid options'),
      ExitCodes.INVALID_ARGS,
      isJsonMode ? 'json' : 'text'
    );
  }

  const options = validationResult.data;
  const format = options.json ? 'json' : 'text';

  const paramsResult = buildProcessParamsFromFlags(transactionsFile, options);
  if (paramsResult.isErr()) {
    displayCliError('process', paramsResult.error, ExitCodes.INVALID_ARGS, format);
  }

  const params = paramsResult.value;

  if (options.verbose) {
    configureLogger({ console: true, level: 'debug' });
  }

  const startTime = Date.now();
  const handler = new ProcessHandler();
  const result = await handler.execute(params.handler);

  if (result.isErr()) {
    displayCliError('process', result.error, exitCodeForError(result.error), format);
  }

  try {
    await writeReport(result.value, params.report, options.json ?? false);
  } catch (error) {
    displayCliError('process', toError(error), ExitCodes.GENERAL_ERROR, format);
  }

  if (options.json) {
    const resultData: ProcessCommandResult = { ...result.value };
    if (params.report.outputPath) {
      resultData.outputPath = params.report.outputPath;
    }
    outputSuccess('process', resultData, { duration_ms: Date.now() - startTime });
    return;
  }

  const { summary } = result.value;
  if (params.report.outputPath || summary.rejected > 0 || summary.malformed > 0) {
    process.stderr.write(
      pc.dim(
        `Processed ${summary.processed} transactions: ${summary.applied} applied, ${summary.rejected} ignored, ${summary.malformed} malformed\n`
      )
    );
  }
}

/**
 * Write the account report to the output file, or to stdout outside JSON mode.
 */
async function writeReport(processResult: ProcessResult, report: ReportParams, jsonMode: boolean): Promise<void> {
  const content = formatAccounts(processResult.accounts, report.format);

  if (report.outputPath) {
    await fs.writeFile(report.outputPath, content);
    return;
  }

  if (!jsonMode) {
    process.stdout.write(content);
  }
}
