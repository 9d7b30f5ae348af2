import { createSuccessResponse, type CLIResponseMetadata } from './cli-response.js';

/**
 * Output a success response in JSON format.
 * Writes to stdout and does NOT exit.
 *
 * @example
 * ```typescript
 * outputSuccess('process', { accounts, summary }, { duration_ms: 12 });
 * ```
 */
export function outputSuccess<T>(command: string, data: T, metadata?: CLIResponseMetadata): void {
  const response = createSuccessResponse(command, data, metadata);
  console.log(JSON.stringify(response, undefined, 2));
}
