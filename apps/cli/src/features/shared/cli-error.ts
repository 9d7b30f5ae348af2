import { DomainError } from '@tally/core';
import pc from 'picocolors';

import { createErrorResponse, exitCodeToErrorCode } from './cli-response.js';
import type { ExitCode } from './exit-codes.js';

/**
 * Tips shown after error messages, keyed by error code.
 */
const ERROR_TIPS: Record<string, string> = {
  INVALID_ARGS: 'Check your command arguments and try again. Run with --help for usage information.',
  NOT_FOUND: 'Check that the transactions file exists and is readable.',
  VALIDATION_ERROR: 'Fix the offending row, or rerun with --skip-invalid to ignore malformed rows.',
};

/**
 * Display a CLI error and exit.
 *
 * - Text mode: formatted error to stderr with contextual tips
 * - JSON mode: structured JSON error to stdout
 */
export function displayCliError(command: string, error: Error, exitCode: ExitCode, format: 'json' | 'text'): never {
  const code = exitCodeToErrorCode(exitCode);

  if (format === 'json') {
    const details = error instanceof DomainError ? error.toJSON() : undefined;
    console.log(JSON.stringify(createErrorResponse(command, error, code, details), undefined, 2));
  } else {
    process.stderr.write(`\n${pc.red('✗')} Error: ${error.message}\n`);

    const tip = ERROR_TIPS[code];
    if (tip) {
      process.stderr.write(`\n${pc.dim(tip)}\n`);
    }

    // In development, show full stack trace
    if (process.env['NODE_ENV'] === 'development' && error.stack) {
      process.stderr.write(`\n${pc.dim(error.stack)}\n\n`);
    }
  }

  process.exit(exitCode);
}
