/**
 * @tally/ledger — Deterministic monetary arithmetic.
 *
 * All arithmetic uses bigint internally for precision.
 * String amounts are converted to/from bigint via decimal scaling.
 *
 * Rules:
 * - No floating-point operations
 * - Every result is range-checked against signed 64-bit units
 * - Amounts carry exactly MONEY_SCALE fractional digits
 * - Zero runtime dependencies
 */

import type { Money } from "@tally/types";
import { MONEY_MAX_UNITS, MONEY_MIN_UNITS, MONEY_SCALE, MONEY_UNIT } from "@tally/types";
import { LedgerError } from "./types.js";

// ─── Internal Helpers ────────────────────────────────────────────────────

function checkedUnits(units: bigint, operation: string): Money {
  if (units > MONEY_MAX_UNITS || units < MONEY_MIN_UNITS) {
    throw new LedgerError(
      "OVERFLOW",
      `${operation} result ${units.toString()} is outside the representable range`,
    );
  }
  return { units };
}

/**
 * Round a scaled value to the nearest whole unit, ties to even.
 *
 * `numerator / 10^dropped`, e.g. 199999n dropping 1 digit → 20000n.
 */
function roundHalfEven(numerator: bigint, dropped: number): bigint {
  if (dropped <= 0) {
    return numerator;
  }

  const divisor = 10n ** BigInt(dropped);
  const quotient = numerator / divisor;
  const remainder = numerator % divisor;
  const twice = remainder * 2n;

  if (twice > divisor || (twice === divisor && quotient % 2n === 1n)) {
    return quotient + 1n;
  }
  return quotient;
}

// ─── Parsing & Formatting ────────────────────────────────────────────────

/**
 * Parse a decimal string into Money, rounding to MONEY_SCALE digits.
 *
 * "1.5" → 15000 units
 * "1.99999" → 20000 units (half-even)
 * "-0.25" → -2500 units
 */
export function parseMoney(amount: string): Money {
  const trimmed = amount.trim();
  if (trimmed === "") {
    throw new LedgerError("INVALID_AMOUNT", "Amount is empty");
  }

  // Optional sign, digits with an optional fraction, or a bare fraction (".5")
  const match = /^([+-]?)(\d*)(?:\.(\d*))?$/.exec(trimmed);
  const intPart = match?.[2] ?? "";
  const fracPart = match?.[3] ?? "";
  if (match === null || (intPart === "" && fracPart === "")) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const negative = match[1] === "-";
  const digits = BigInt(`${intPart || "0"}${fracPart}`);
  const magnitude =
    fracPart.length >= MONEY_SCALE
      ? roundHalfEven(digits, fracPart.length - MONEY_SCALE)
      : digits * 10n ** BigInt(MONEY_SCALE - fracPart.length);

  const units = negative ? -magnitude : magnitude;
  if (units > MONEY_MAX_UNITS || units < MONEY_MIN_UNITS) {
    throw new LedgerError("INVALID_AMOUNT", `Amount "${trimmed}" is outside the representable range`);
  }
  return { units };
}

/**
 * Render Money with exactly MONEY_SCALE fractional digits.
 *
 * 15000 units → "1.5000"
 * -2500 units → "-0.2500"
 */
export function formatMoney(money: Money): string {
  const negative = money.units < 0n;
  const abs = negative ? -money.units : money.units;
  const intPart = (abs / MONEY_UNIT).toString();
  const fracPart = (abs % MONEY_UNIT).toString().padStart(MONEY_SCALE, "0");
  const result = `${intPart}.${fracPart}`;

  return negative ? `-${result}` : result;
}

// ─── Public API ──────────────────────────────────────────────────────────

/**
 * Options for subtraction.
 */
export interface SubtractOptions {
  /** Fail with INSUFFICIENT_FUNDS instead of returning a negative amount. */
  readonly requireNonNegative?: boolean | undefined;
}

/**
 * Create a zero Money value.
 */
export function zeroMoney(): Money {
  return { units: 0n };
}

/**
 * Add two Money values. Throws OVERFLOW outside the representable range.
 */
export function addMoney(a: Money, b: Money): Money {
  return checkedUnits(a.units + b.units, "Addition");
}

/**
 * Subtract b from a.
 * Throws INSUFFICIENT_FUNDS when the result would be negative and
 * `requireNonNegative` is set; OVERFLOW outside the representable range.
 */
export function subtractMoney(a: Money, b: Money, options?: SubtractOptions): Money {
  const diff = a.units - b.units;
  if (options?.requireNonNegative === true && diff < 0n) {
    throw new LedgerError(
      "INSUFFICIENT_FUNDS",
      `Cannot subtract ${formatMoney(b)} from ${formatMoney(a)} without going negative`,
    );
  }
  return checkedUnits(diff, "Subtraction");
}

/**
 * Compare two Money values. Returns -1, 0, or 1.
 */
export function compareMoney(a: Money, b: Money): -1 | 0 | 1 {
  if (a.units < b.units) return -1;
  if (a.units > b.units) return 1;
  return 0;
}

/**
 * Check if a Money amount is zero.
 */
export function isZero(money: Money): boolean {
  return money.units === 0n;
}

/**
 * Check if a Money amount is >= 0.
 */
export function isNonNegative(money: Money): boolean {
  return money.units >= 0n;
}

/**
 * Check if a Money amount is negative (< 0).
 */
export function isNegative(money: Money): boolean {
  return money.units < 0n;
}
