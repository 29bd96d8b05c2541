/**
 * @tally/types — Shared domain types for the Tally stack.
 *
 * These types are used across all Tally packages:
 * - Financial primitives (Money, client and transaction ids)
 * - Transaction events
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No methods that mutate state
 */

// Financial types
export type {
  Money,
  ClientId,
  TransactionId,
} from "./financial.js";

export {
  MONEY_SCALE,
  MONEY_UNIT,
  MONEY_MAX_UNITS,
  MONEY_MIN_UNITS,
  MAX_CLIENT_ID,
  MAX_TRANSACTION_ID,
} from "./financial.js";

// Event types
export type {
  TransactionEventKind,
  TransactionEvent,
  DepositEvent,
  WithdrawalEvent,
  DisputeEvent,
  ResolveEvent,
  ChargebackEvent,
  FundsEvent,
  DisputeLifecycleEvent,
} from "./event.js";

// Runtime type guards
export {
  isMoney,
  isClientId,
  isTransactionId,
  isTransactionEventKind,
  isFundsEvent,
  isDisputeLifecycleEvent,
} from "./guards.js";
