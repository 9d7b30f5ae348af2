import { Decimal } from 'decimal.js';
import { z } from 'zod';

import { tryParseDecimal } from '../utils/decimal-utils.js';

export const MAX_CLIENT_ID = 0xffff;
export const MAX_TRANSACTION_ID = 0xffffffff;

// Identifiers arrive as CSV strings or as numbers from in-memory callers
function unsignedIntegerSchema(label: string, max: number) {
  return z.unknown().transform((val, ctx) => {
    if (val === undefined || val === null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${label} is required` });
      return z.NEVER;
    }

    const parsed = typeof val === 'string' && /^\d+$/.test(val) ? Number(val) : val;
    if (typeof parsed !== 'number' || !Number.isInteger(parsed) || parsed < 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${label} must be a non-negative integer` });
      return z.NEVER;
    }

    if (parsed > max) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${label} must not exceed ${max}` });
      return z.NEVER;
    }

    return parsed;
  });
}

export const ClientIdSchema = unsignedIntegerSchema('Client id', MAX_CLIENT_ID);

export const TransactionIdSchema = unsignedIntegerSchema('Transaction id', MAX_TRANSACTION_ID);

// Strictly positive, finite decimal amount
export const AmountSchema = z.unknown().transform((val, ctx) => {
  if (val === undefined || val === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Amount is required' });
    return z.NEVER;
  }

  const out = { value: new Decimal(0) };
  if (val instanceof Decimal) {
    out.value = val;
  } else if ((typeof val !== 'string' && typeof val !== 'number') || !tryParseDecimal(val, out)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid amount "${String(val)}"` });
    return z.NEVER;
  }

  if (!out.value.isFinite() || !out.value.greaterThan(0)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Amount must be greater than zero' });
    return z.NEVER;
  }

  return out.value;
});

export const DepositRecordSchema = z.object({
  type: z.literal('deposit'),
  client: ClientIdSchema,
  tx: TransactionIdSchema,
  amount: AmountSchema,
});

export const WithdrawalRecordSchema = z.object({
  type: z.literal('withdrawal'),
  client: ClientIdSchema,
  tx: TransactionIdSchema,
  amount: AmountSchema,
});

// Dispute-lifecycle records reference an earlier transaction; any amount column is dropped
export const DisputeRecordSchema = z.object({
  type: z.literal('dispute'),
  client: ClientIdSchema,
  tx: TransactionIdSchema,
});

export const ResolveRecordSchema = z.object({
  type: z.literal('resolve'),
  client: ClientIdSchema,
  tx: TransactionIdSchema,
});

export const ChargebackRecordSchema = z.object({
  type: z.literal('chargeback'),
  client: ClientIdSchema,
  tx: TransactionIdSchema,
});

/**
 * Trims keys and values, lower-cases keys and the `type` value, and turns empty
 * cells into missing ones so optional columns can be left blank.
 */
function normalizeRow(row: unknown): unknown {
  if (typeof row !== 'object' || row === null || Array.isArray(row)) {
    return row;
  }

  const normalized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(row)) {
    const cleaned = typeof value === 'string' ? value.trim() : value;
    normalized[key.trim().toLowerCase()] = cleaned === '' ? undefined : cleaned;
  }

  const type = normalized['type'];
  if (typeof type === 'string') {
    normalized['type'] = type.toLowerCase();
  }

  return normalized;
}

export const TransactionRecordSchema = z.preprocess(
  normalizeRow,
  z.discriminatedUnion('type', [
    DepositRecordSchema,
    WithdrawalRecordSchema,
    DisputeRecordSchema,
    ResolveRecordSchema,
    ChargebackRecordSchema,
  ])
);

export type DepositRecord = z.infer<typeof DepositRecordSchema>;
export type WithdrawalRecord = z.infer<typeof WithdrawalRecordSchema>;
export type DisputeRecord = z.infer<typeof DisputeRecordSchema>;
export type ResolveRecord = z.infer<typeof ResolveRecordSchema>;
export type ChargebackRecord = z.infer<typeof ChargebackRecordSchema>;
export type TransactionRecord = z.infer<typeof TransactionRecordSchema>;
