/**
 * Base class for errors raised while reading or applying transactions.
 *
 * `code` is a stable machine-readable identifier used in logs, processing
 * summaries and CLI error responses.
 */
export abstract class DomainError extends Error {
  abstract readonly code: string;
  abstract readonly severity: 'error' | 'warning';

  readonly timestamp: string;
  readonly client?: number | undefined;
  readonly transactionId?: number | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(
    message: string,
    context?: {
      additionalContext?: Record<string, unknown> | undefined;
      client?: number | undefined;
      transactionId?: number | undefined;
    }
  ) {
    super(message);
    this.timestamp = new Date().toISOString();
    this.client = context?.client;
    this.transactionId = context?.transactionId;
    this.context = context?.additionalContext;
    this.name = this.constructor.name;
  }

  toJSON() {
    return {
      client: this.client,
      code: this.code,
      context: this.context,
      message: this.message,
      name: this.name,
      severity: this.severity,
      timestamp: this.timestamp,
      transactionId: this.transactionId,
    };
  }
}

/**
 * A row of the input could not be turned into a transaction record.
 */
export class TransactionParseError extends DomainError {
  readonly code = 'TRANSACTION_PARSE_ERROR';
  readonly severity = 'error' as const;

  constructor(
    message: string,
    public readonly line: number,
    context?: {
      additionalContext?: Record<string, unknown> | undefined;
    }
  ) {
    super(`Line ${line}: ${message}`, context);
  }
}
