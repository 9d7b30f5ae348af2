/**
 * Semantic exit codes for the CLI.
 */
export const ExitCodes = {
  /** Successful execution */
  SUCCESS: 0,

  /** General error (catch-all) */
  GENERAL_ERROR: 1,

  /** Invalid command arguments or options */
  INVALID_ARGS: 2,

  /** Transactions file missing or unreadable */
  NOT_FOUND: 4,

  /** Input data failed validation (malformed row, broken CSV) */
  VALIDATION_ERROR: 8,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];

/**
 * Exit the process with a specific exit code.
 */
export function exitWithCode(code: ExitCode): never {
  process.exit(code);
}
