import { Decimal } from 'decimal.js';

// Amounts are exact decimals; rounding only happens when a balance is rendered
Decimal.set({
  maxE: 9e15,
  minE: -9e15,
  modulo: Decimal.ROUND_HALF_UP,
  precision: 28,
  rounding: Decimal.ROUND_HALF_UP,
  toExpNeg: -7,
  toExpPos: 21,
});

/**
 * Number of fractional digits balances are reported with.
 */
export const AMOUNT_DECIMAL_PLACES = 4;

const PLAIN_DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Try to parse a string or number to a Decimal
 */
export function tryParseDecimal(
  value: string | number | Decimal | undefined | null,
  out?: { value: Decimal }
): boolean {
  if (value === undefined || value === null || value === '') {
    if (out) out.value = new Decimal(0);
    return true;
  }

  // Plain decimal notation only; decimal.js would also take 0x, 0b and 0o literals
  if (typeof value === 'string' && !PLAIN_DECIMAL_PATTERN.test(value)) {
    return false;
  }

  try {
    const decimal = new Decimal(value);
    if (out) out.value = decimal;
    return true;
  } catch {
    return false;
  }
}

/**
 * Parse a string or number to a Decimal with fallback to zero
 */
export function parseDecimal(value: string | number | Decimal | undefined | null): Decimal {
  const result = { value: new Decimal(0) };
  tryParseDecimal(value, result);
  return result.value;
}

/**
 * Render an amount with exactly AMOUNT_DECIMAL_PLACES fractional digits.
 * Midpoints round to even; a value that rounds to zero is printed unsigned.
 */
export function formatAmount(decimal: Decimal): string {
  const rounded = decimal.toDecimalPlaces(AMOUNT_DECIMAL_PLACES, Decimal.ROUND_HALF_EVEN);
  return (rounded.isZero() ? new Decimal(0) : rounded).toFixed(AMOUNT_DECIMAL_PLACES);
}
