/**
 * @tally/ledger — Client account ledger engine.
 *
 * A pure TypeScript state machine with zero runtime dependencies.
 * Applies deposit, withdrawal, dispute, resolve and chargeback events
 * to per-client accounts:
 * - Events are applied strictly in input order
 * - Disputes move a deposit's amount from available to held
 * - Resolves move it back; chargebacks remove it and lock the account
 * - All monetary arithmetic uses bigint (no floating point)
 * - One bad event never aborts a run
 */

// Core engine
export { Ledger } from "./ledger.js";
export { Processor } from "./processor.js";

// Account registry
export { AccountRegistry } from "./accounts.js";

// Handlers
export {
  handleDeposit,
  handleWithdrawal,
  handleDispute,
  handleResolve,
  handleChargeback,
  findDisputeTarget,
} from "./handlers/index.js";
export type { DisputeTarget } from "./handlers/index.js";

// Balance computation
export {
  computeAccountSnapshot,
  computeLedgerTotals,
  sortSnapshots,
} from "./balance-calculator.js";

// Money arithmetic
export {
  parseMoney,
  formatMoney,
  zeroMoney,
  addMoney,
  subtractMoney,
  compareMoney,
  isZero,
  isNonNegative,
  isNegative,
} from "./money-math.js";
export type { SubtractOptions } from "./money-math.js";

// Types
export type {
  TransactionRecordKind,
  TransactionStatus,
  TransactionRecord,
  Account,
  AccountSnapshot,
  LedgerTotals,
  LedgerErrorCode,
  IgnoreReason,
  HandlerResult,
  EventOutcome,
  LockPolicy,
  Rejection,
  ProcessorOptions,
  ProcessStats,
  ProcessResult,
} from "./types.js";

export { LedgerError, VALID_STATUS_TRANSITIONS } from "./types.js";
