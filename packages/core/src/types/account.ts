/**
 * Rendered state of one client account, as handed to output writers.
 * Decimal fields carry exactly four fractional digits.
 */
export interface AccountSnapshot {
  client: number;
  available: string;
  held: string;
  total: string;
  locked: boolean;
}
