/**
 * Precondition checks shared by dispute, resolve and chargeback.
 */

import type { DisputeLifecycleEvent } from "@tally/types";
import type { Ledger } from "../ledger.js";
import type { IgnoreReason, TransactionRecord, TransactionStatus } from "../types.js";
import { VALID_STATUS_TRANSITIONS } from "../types.js";

export type DisputeTarget =
  | { readonly found: true; readonly record: TransactionRecord }
  | { readonly found: false; readonly reason: IgnoreReason };

/**
 * Find the deposit an event refers to and check it may move to `next`.
 *
 * Checked in order: the record exists, belongs to the event's client,
 * is a deposit, and its current status allows the transition.
 */
export function findDisputeTarget(
  ledger: Ledger,
  event: DisputeLifecycleEvent,
  next: TransactionStatus,
): DisputeTarget {
  const record = ledger.getRecord(event.tx);
  if (record === undefined) {
    return { found: false, reason: "UNKNOWN_TRANSACTION" };
  }
  if (record.clientId !== event.client) {
    return { found: false, reason: "CLIENT_MISMATCH" };
  }
  if (record.kind !== "deposit") {
    return { found: false, reason: "NOT_DISPUTABLE" };
  }
  if (!VALID_STATUS_TRANSITIONS[record.status].includes(next)) {
    return { found: false, reason: "INVALID_STATUS_TRANSITION" };
  }
  return { found: true, record };
}
