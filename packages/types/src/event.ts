/**
 * Event Types
 *
 * Every change to client balances enters the ledger as a TransactionEvent.
 *
 * Rules:
 * - Events are immutable after creation
 * - Events are applied strictly in the order received
 * - Only deposits and withdrawals carry an amount; the dispute family
 *   recovers it from the referenced transaction
 */

import type { ClientId, Money, TransactionId } from "./financial.js";

/**
 * Discriminator for TransactionEvent.
 */
export type TransactionEventKind =
  | "deposit"
  | "withdrawal"
  | "dispute"
  | "resolve"
  | "chargeback";

/** Fields shared by every event. */
interface EventBase {
  /** The client whose account the event targets */
  readonly client: ClientId;

  /** The transaction the event creates or refers to */
  readonly tx: TransactionId;
}

/** Credit funds to a client's available balance. */
export interface DepositEvent extends EventBase {
  readonly kind: "deposit";
  readonly amount: Money;
}

/** Debit funds from a client's available balance. */
export interface WithdrawalEvent extends EventBase {
  readonly kind: "withdrawal";
  readonly amount: Money;
}

/** Claim that an earlier deposit should be reversed. */
export interface DisputeEvent extends EventBase {
  readonly kind: "dispute";
}

/** Settle a dispute in the client's favor. */
export interface ResolveEvent extends EventBase {
  readonly kind: "resolve";
}

/** Settle a dispute against the client and freeze the account. */
export interface ChargebackEvent extends EventBase {
  readonly kind: "chargeback";
}

/**
 * A transaction event, discriminated by `kind`.
 */
export type TransactionEvent =
  | DepositEvent
  | WithdrawalEvent
  | DisputeEvent
  | ResolveEvent
  | ChargebackEvent;

/** Events that carry their own amount. */
export type FundsEvent = DepositEvent | WithdrawalEvent;

/** Events that act on an earlier deposit. */
export type DisputeLifecycleEvent = DisputeEvent | ResolveEvent | ChargebackEvent;
