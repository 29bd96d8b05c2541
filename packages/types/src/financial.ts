/**
 * Financial Types
 *
 * Core financial primitives for the client ledger.
 *
 * Rules:
 * - Amounts are integer-scaled, never floating point
 * - Every amount carries exactly MONEY_SCALE fractional digits
 * - Values are immutable once created
 */

/** Number of fractional digits carried by every Money value. */
export const MONEY_SCALE = 4;

/** Multiplier from whole units to stored units (10^MONEY_SCALE). */
export const MONEY_UNIT = 10_000n;

/** Largest representable amount, in stored units (signed 64-bit). */
export const MONEY_MAX_UNITS = 9_223_372_036_854_775_807n;

/** Smallest representable amount, in stored units (signed 64-bit). */
export const MONEY_MIN_UNITS = -9_223_372_036_854_775_808n;

/**
 * A precise monetary amount.
 *
 * `units` counts ten-thousandths: `{ units: 12345n }` is 1.2345.
 */
export interface Money {
  readonly units: bigint;
}

/** Client identifier (unsigned 16-bit on the wire). */
export type ClientId = number;

/** Transaction identifier (unsigned 32-bit on the wire). */
export type TransactionId = number;

/** Largest accepted client id. */
export const MAX_CLIENT_ID = 65_535;

/** Largest accepted transaction id. */
export const MAX_TRANSACTION_ID = 4_294_967_295;
