/**
 * Dispute handlers: dispute, resolve, chargeback.
 *
 * Each moves a deposit's amount between available and held (or out
 * of the account) and advances the record's status. Both legs of a
 * move are computed before either is written, so an OVERFLOW leaves
 * the account untouched.
 */

import type { ChargebackEvent, DisputeEvent, ResolveEvent } from "@tally/types";
import type { Ledger } from "../ledger.js";
import { addMoney, compareMoney, subtractMoney } from "../money-math.js";
import type { HandlerResult } from "../types.js";
import { findDisputeTarget } from "./dispute-target.js";

/**
 * Move a deposit's amount from available to held.
 *
 * Available may go negative here when the client has already spent
 * the disputed funds.
 */
export function handleDispute(ledger: Ledger, event: DisputeEvent): HandlerResult {
  const target = findDisputeTarget(ledger, event, "disputed");
  if (!target.found) {
    return { status: "ignored", reason: target.reason };
  }

  const { record } = target;
  const account = ledger.getOrCreateAccount(event.client);
  const available = subtractMoney(account.available, record.amount);
  const held = addMoney(account.held, record.amount);

  account.available = available;
  account.held = held;
  record.status = "disputed";

  return { status: "applied" };
}

/**
 * Release a disputed amount from held back to available.
 *
 * Held smaller than the disputed amount is a no-op, as for chargeback.
 */
export function handleResolve(ledger: Ledger, event: ResolveEvent): HandlerResult {
  const target = findDisputeTarget(ledger, event, "resolved");
  if (!target.found) {
    return { status: "ignored", reason: target.reason };
  }

  const { record } = target;
  const account = ledger.getOrCreateAccount(event.client);
  if (compareMoney(account.held, record.amount) < 0) {
    return { status: "ignored", reason: "INSUFFICIENT_FUNDS" };
  }

  const held = subtractMoney(account.held, record.amount, { requireNonNegative: true });
  const available = addMoney(account.available, record.amount);

  account.held = held;
  account.available = available;
  record.status = "resolved";

  return { status: "applied" };
}

/**
 * Remove a disputed amount from held for good and lock the account.
 */
export function handleChargeback(ledger: Ledger, event: ChargebackEvent): HandlerResult {
  const target = findDisputeTarget(ledger, event, "chargedBack");
  if (!target.found) {
    return { status: "ignored", reason: target.reason };
  }

  const { record } = target;
  const account = ledger.getOrCreateAccount(event.client);
  if (compareMoney(account.held, record.amount) < 0) {
    return { status: "ignored", reason: "INSUFFICIENT_FUNDS" };
  }

  account.held = subtractMoney(account.held, record.amount, { requireNonNegative: true });
  account.locked = true;
  record.status = "chargedBack";

  return { status: "applied" };
}
