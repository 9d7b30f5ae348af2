#!/usr/bin/env node
import { getLogger } from '@tally/logger';
import { Command } from 'commander';

import { registerProcessCommand } from './features/process/process.js';
import { ExitCodes, exitWithCode } from './features/shared/exit-codes.js';

const logger = getLogger('CLI');
const program = new Command();

async function main() {
  program
    .name('tally')
    .description('Replay deposits, withdrawals and disputes into per-client account balances')
    .version('0.1.0')
    .showHelpAfterError()
    // Usage errors (unknown option, bad argument) exit with INVALID_ARGS; help and version exit 0
    .exitOverride((error) => exitWithCode(error.exitCode === 0 ? ExitCodes.SUCCESS : ExitCodes.INVALID_ARGS));

  // Process command - default, so `tally <file>` works without naming it
  registerProcessCommand(program);

  await program.parseAsync();
}

// Handle unhandled rejections
process.on('unhandledRejection', (reason) => {
  logger.error(`Unhandled Rejection: ${String(reason)}`);
  process.stderr.write(`Unhandled Rejection: ${String(reason)}\n`);
  exitWithCode(ExitCodes.GENERAL_ERROR);
});

main().catch((error: unknown) => {
  logger.error(`CLI failed: ${String(error)}`);
  process.stderr.write(`CLI failed: ${String(error)}\n`);
  exitWithCode(ExitCodes.GENERAL_ERROR);
});
