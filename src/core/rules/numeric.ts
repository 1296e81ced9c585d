/**
 * Numeric parsing shared by range and ordering rules.
 */

const INTEGER = /^[+-]?\d+$/;
const DECIMAL = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Parse a syntactically valid integer, or return null. The result is a
 * bigint so values beyond 2^53 keep every digit.
 */
export function parseInteger(value: string): bigint | null {
  return INTEGER.test(value) ? BigInt(value) : null;
}

/**
 * Parse a decimal number (integer, fraction, or exponent form), or return null.
 */
export function parseDecimal(value: string): number | null {
  return DECIMAL.test(value) ? Number(value) : null;
}

/**
 * Bounds check. A bigint value is compared exactly against number bounds.
 */
export function isWithinRange(
  value: number | bigint,
  min: number | undefined,
  max: number | undefined,
  inclusive: boolean
): boolean {
  if (min !== undefined && (inclusive ? value < min : value <= min)) return false;
  if (max !== undefined && (inclusive ? value > max : value >= max)) return false;
  return true;
}
