/**
 * Runtime Type Guards
 *
 * Narrowing functions for Tally domain types.
 * These enable safe runtime validation at system boundaries
 * (parsed input rows, external integrations).
 */

import type { ClientId, Money, TransactionId } from "./financial.js";
import {
  MAX_CLIENT_ID,
  MAX_TRANSACTION_ID,
  MONEY_MAX_UNITS,
  MONEY_MIN_UNITS,
} from "./financial.js";
import type {
  DisputeLifecycleEvent,
  FundsEvent,
  TransactionEvent,
  TransactionEventKind,
} from "./event.js";

// =============================================================================
// Financial guards
// =============================================================================

export function isMoney(value: unknown): value is Money {
  if (value === null || typeof value !== "object") return false;
  return (
    "units" in value &&
    typeof value.units === "bigint" &&
    value.units >= MONEY_MIN_UNITS &&
    value.units <= MONEY_MAX_UNITS
  );
}

export function isClientId(value: unknown): value is ClientId {
  return (
    typeof value === "number" &&
    Number.isInteger(value) &&
    value >= 0 &&
    value <= MAX_CLIENT_ID
  );
}

export function isTransactionId(value: unknown): value is TransactionId {
  return (
    typeof value === "number" &&
    Number.isInteger(value) &&
    value >= 0 &&
    value <= MAX_TRANSACTION_ID
  );
}

// =============================================================================
// Event guards
// =============================================================================

const EVENT_KINDS = new Set<string>([
  "deposit", "withdrawal", "dispute", "resolve", "chargeback",
]);

export function isTransactionEventKind(value: unknown): value is TransactionEventKind {
  return typeof value === "string" && EVENT_KINDS.has(value);
}

export function isFundsEvent(event: TransactionEvent): event is FundsEvent {
  return event.kind === "deposit" || event.kind === "withdrawal";
}

export function isDisputeLifecycleEvent(
  event: TransactionEvent,
): event is DisputeLifecycleEvent {
  return !isFundsEvent(event);
}
