/**
 * All money operations use BigInt. Zero floating point.
 * Amounts are held in ten-thousandths of the currency unit (4 fractional digits).
 */

import { AmountOverflowError } from "./errors";

/** Fractional digits carried by every amount. */
export const AMOUNT_SCALE = 4;

/** 10^AMOUNT_SCALE: the number of minor units in one major unit. */
export const UNITS_PER_MAJOR = 10n ** BigInt(AMOUNT_SCALE);

/** Representable range: a signed 64-bit integer of minor units. */
export const MAX_AMOUNT = 2n ** 63n - 1n;
export const MIN_AMOUNT = -(2n ** 63n);

const DECIMAL_PATTERN = /^(\d*)(?:\.(\d*))?$/;

/**
 * Parse a decimal string into minor units: "1.5" -> 15000n.
 * Returns null for anything that is not a non-negative decimal with at most
 * AMOUNT_SCALE fractional digits.
 */
export function parseAmount(text: string): bigint | null {
  const match = DECIMAL_PATTERN.exec(text.trim());
  if (!match) return null;

  const whole = match[1] ?? "";
  const fraction = match[2] ?? "";
  if (whole.length === 0 && fraction.length === 0) return null;
  if (fraction.length > AMOUNT_SCALE) return null;

  const units =
    BigInt(whole || "0") * UNITS_PER_MAJOR + BigInt(fraction.padEnd(AMOUNT_SCALE, "0"));
  return isWithinRange(units) ? units : null;
}

/** Format minor units with exactly AMOUNT_SCALE decimals: 15000n -> "1.5000" */
export function formatAmount(units: bigint): string {
  const isNegative = units < 0n;
  const abs = isNegative ? -units : units;
  const whole = abs / UNITS_PER_MAJOR;
  const fraction = abs % UNITS_PER_MAJOR;
  const sign = isNegative ? "-" : "";
  return `${sign}${whole}.${fraction.toString().padStart(AMOUNT_SCALE, "0")}`;
}

/** Check if a value fits the signed 64-bit minor-unit range. */
export function isWithinRange(value: bigint): boolean {
  return value >= MIN_AMOUNT && value <= MAX_AMOUNT;
}

/** Add two amounts. Throws AmountOverflowError outside the representable range. */
export function addAmounts(a: bigint, b: bigint): bigint {
  const sum = a + b;
  if (!isWithinRange(sum)) throw new AmountOverflowError("add", a, b);
  return sum;
}

/** Subtract two amounts. Throws AmountOverflowError outside the representable range. */
export function subtractAmounts(a: bigint, b: bigint): bigint {
  const difference = a - b;
  if (!isWithinRange(difference)) throw new AmountOverflowError("subtract", a, b);
  return difference;
}

/** Convert a major-unit number to minor units. For testing convenience only. */
export function toUnits(major: number): bigint {
  return BigInt(Math.round(major * Number(UNITS_PER_MAJOR)));
}
