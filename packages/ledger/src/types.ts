/**
 * @tally/ledger — Internal types for the ledger engine.
 *
 * These extend the shared @tally/types with ledger-specific
 * structures used only within this package.
 *
 * Rules:
 * - Snapshots and records are readonly to callers
 * - Accounts are mutated only by handlers, through the Ledger
 * - Structural failures throw LedgerError; business no-ops return a reason
 */

import type { ClientId, Money, TransactionEventKind, TransactionId } from "@tally/types";

// ─── Transaction Records ─────────────────────────────────────────────────

/** Kind of transaction a record was created from. */
export type TransactionRecordKind = "deposit" | "withdrawal";

/** Dispute status of a recorded transaction. */
export type TransactionStatus = "normal" | "disputed" | "resolved" | "chargedBack";

/**
 * Allowed status transitions.
 *
 * - normal → disputed (dispute)
 * - disputed → resolved (resolve) | chargedBack (chargeback)
 * - resolved, chargedBack are terminal
 */
export const VALID_STATUS_TRANSITIONS: Readonly<
  Record<TransactionStatus, readonly TransactionStatus[]>
> = {
  normal: ["disputed"],
  disputed: ["resolved", "chargedBack"],
  resolved: [],
  chargedBack: [],
} as const;

/**
 * A transaction retained for later dispute handling.
 * Everything except `status` is fixed at creation.
 */
export interface TransactionRecord {
  readonly txId: TransactionId;
  readonly clientId: ClientId;
  readonly amount: Money;
  readonly kind: TransactionRecordKind;
  status: TransactionStatus;
}

// ─── Accounts ────────────────────────────────────────────────────────────

/**
 * Mutable per-client balance state.
 * `total` is derived (available + held) and never stored.
 */
export interface Account {
  readonly clientId: ClientId;
  available: Money;
  held: Money;
  locked: boolean;
}

/**
 * Read-only view of an account for reporting.
 */
export interface AccountSnapshot {
  readonly clientId: ClientId;
  readonly available: Money;
  readonly held: Money;
  readonly total: Money;
  readonly locked: boolean;
}

/**
 * Sums across every account in the ledger.
 */
export interface LedgerTotals {
  readonly accountCount: number;
  readonly lockedCount: number;
  readonly available: Money;
  readonly held: Money;
  readonly total: Money;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for structural ledger failures. */
export type LedgerErrorCode =
  | "OVERFLOW"
  | "INSUFFICIENT_FUNDS"
  | "INVALID_AMOUNT"
  | "DUPLICATE_TRANSACTION";

/**
 * Structured error from the ledger engine.
 * Always thrown; the Processor turns it into a rejected event.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}

// ─── Handler Results ─────────────────────────────────────────────────────

/**
 * Why an event was discarded without changing state.
 */
export type IgnoreReason =
  | "ACCOUNT_LOCKED"
  | "INSUFFICIENT_FUNDS"
  | "UNKNOWN_TRANSACTION"
  | "CLIENT_MISMATCH"
  | "NOT_DISPUTABLE"
  | "INVALID_STATUS_TRANSITION";

/**
 * Outcome of a single handler call.
 * Structural failures are not represented here; they throw LedgerError.
 */
export type HandlerResult =
  | { readonly status: "applied" }
  | { readonly status: "ignored"; readonly reason: IgnoreReason };

/**
 * Outcome of routing one event through the Processor.
 */
export type EventOutcome =
  | { readonly status: "applied" }
  | { readonly status: "ignored"; readonly reason: IgnoreReason }
  | { readonly status: "failed"; readonly code: LedgerErrorCode; readonly message: string };

// ─── Processor Types ─────────────────────────────────────────────────────

/**
 * How a locked account treats incoming events.
 *
 * - freeze-all: every event is ignored
 * - allow-dispute-lifecycle: deposits and withdrawals are ignored;
 *   dispute, resolve and chargeback still run against existing deposits
 */
export type LockPolicy = "freeze-all" | "allow-dispute-lifecycle";

/**
 * A non-applied event, recorded for diagnostics.
 */
export interface Rejection {
  /** Zero-based position of the event in the input sequence */
  readonly index: number;
  readonly kind: TransactionEventKind;
  readonly client: ClientId;
  readonly tx: TransactionId;
  readonly outcome: Exclude<EventOutcome, { readonly status: "applied" }>;
}

/**
 * Options for constructing a Processor.
 */
export interface ProcessorOptions {
  readonly lockPolicy?: LockPolicy | undefined;
  /** Called once per ignored or failed event, in input order. */
  readonly onRejection?: ((rejection: Rejection) => void) | undefined;
}

/**
 * Event counts for a completed run.
 */
export interface ProcessStats {
  readonly received: number;
  readonly applied: number;
  readonly ignored: number;
  readonly failed: number;
}

/**
 * Result of processing a full event sequence.
 */
export interface ProcessResult {
  readonly accounts: readonly AccountSnapshot[];
  readonly rejections: readonly Rejection[];
  readonly stats: ProcessStats;
}
