import Decimal from 'decimal.js';

// Configure Decimal.js globally for price, quantity and PnL arithmetic
Decimal.set({
  precision: 20,
  rounding: Decimal.ROUND_HALF_UP,
  toExpPos: 9e15,
  toExpNeg: -9e15,
});

export type DecimalLike = number | string | Decimal;

/**
 * Converts any number-like value to Decimal.
 * Handles JavaScript numbers, numeric strings from venue payloads, and existing Decimal instances.
 */
export function toDecimal(value: DecimalLike): Decimal {
  return new Decimal(value);
}

/**
 * Parses a venue-supplied numeric string.
 * Returns undefined for anything Decimal would reject or that is not finite.
 */
export function parseDecimal(value: unknown): Decimal | undefined {
  if (typeof value !== 'string' && typeof value !== 'number') {
    return undefined;
  }
  try {
    const parsed = new Decimal(value);
    return parsed.isFinite() ? parsed : undefined;
  } catch {
    return undefined;
  }
}

/**
 * Converts Decimal back to JavaScript number for JSON serialization.
 * Rounds to 8 decimal places (standard crypto precision).
 */
export function toNumber(value: Decimal): number {
  return value.toDecimalPlaces(8).toNumber();
}

/** Arithmetic mean; zero for an empty list */
export function average(values: Decimal[]): Decimal {
  if (values.length === 0) {
    return new Decimal(0);
  }
  return values.reduce((sum, val) => sum.plus(val), new Decimal(0)).dividedBy(values.length);
}
