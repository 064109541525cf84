/**
 * Locale-free conversions between numbers and their decimal text.
 */

/**
 * Signed 64-bit integer bounds.
 */
export const MinInt64 = BigInt("-9223372036854775808"); // -2^63
export const MaxInt64 = BigInt("9223372036854775807"); // 2^63 - 1

/**
 * Unsigned 64-bit integer upper bound.
 */
export const MaxUint64 = BigInt("0xffffffffffffffff");

const INTEGER_TEXT = /^[+-]?\d+$/;
const FLOAT_TEXT = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

const SPECIAL_FLOATS = new Map<string, number>([
  ["NaN", NaN],
  ["Infinity", Infinity],
  ["+Infinity", Infinity],
  ["-Infinity", -Infinity],
]);

/**
 * Formats an integer as an optional minus sign followed by digits.
 */
export function formatInteger(value: number | bigint): string {
  return value.toString();
}

/**
 * Parses integer text into a bigint within [min, max].
 * Returns undefined for malformed or out-of-range text.
 */
export function parseBigInteger(text: string, min: bigint, max: bigint): bigint | undefined {
  if (!INTEGER_TEXT.test(text)) {
    return undefined;
  }
  const value = BigInt(text);
  if (value < min || value > max) {
    return undefined;
  }
  return value;
}

/**
 * Parses integer text into a number within [min, max].
 * Both bounds must be safe integers.
 */
export function parseInteger(text: string, min: number, max: number): number | undefined {
  const value = parseBigInteger(text, BigInt(min), BigInt(max));
  return value === undefined ? undefined : Number(value);
}

/**
 * Formats a floating-point value with the shortest text that reads back to
 * the same value at the given precision.
 */
export function formatFloat(value: number, precision: 32 | 64): string {
  if (Number.isNaN(value)) {
    return "NaN";
  }
  if (!Number.isFinite(value)) {
    return value > 0 ? "Infinity" : "-Infinity";
  }
  if (Object.is(value, -0)) {
    return "-0";
  }
  if (precision === 64) {
    return String(value);
  }

  // float32 needs at most 9 significant digits
  for (let digits = 1; digits < 9; digits++) {
    const text = String(Number(value.toPrecision(digits)));
    if (Math.fround(Number(text)) === value) {
      return text;
    }
  }
  return String(Number(value.toPrecision(9)));
}

/**
 * Parses decimal float text (or NaN / Infinity) at the given precision.
 * Returns undefined for malformed text and for finite text that overflows.
 */
export function parseFloating(text: string, precision: 32 | 64): number | undefined {
  const special = SPECIAL_FLOATS.get(text);
  if (special !== undefined) {
    return special;
  }
  if (!FLOAT_TEXT.test(text)) {
    return undefined;
  }
  const parsed = Number(text);
  const value = precision === 32 ? Math.fround(parsed) : parsed;
  return Number.isFinite(value) ? value : undefined;
}
