/**
 * Deposit and withdrawal handlers.
 *
 * Both reserve their transaction id in the ledger. Only deposit
 * records are ever eligible for dispute.
 */

import type { DepositEvent, WithdrawalEvent } from "@tally/types";
import type { Ledger } from "../ledger.js";
import { addMoney, compareMoney, subtractMoney } from "../money-math.js";
import type { HandlerResult } from "../types.js";
import { LedgerError } from "../types.js";

function assertUnusedTransaction(ledger: Ledger, event: DepositEvent | WithdrawalEvent): void {
  if (ledger.hasRecord(event.tx)) {
    throw new LedgerError(
      "DUPLICATE_TRANSACTION",
      `Transaction ID already exists in ledger: ${String(event.tx)}`,
    );
  }
}

/**
 * Credit `amount` to available and retain a disputable record.
 *
 * Throws DUPLICATE_TRANSACTION, or OVERFLOW when either available or
 * total would leave the signed 64-bit range, without touching the account.
 */
export function handleDeposit(ledger: Ledger, event: DepositEvent): HandlerResult {
  assertUnusedTransaction(ledger, event);

  const account = ledger.getOrCreateAccount(event.client);
  const available = addMoney(account.available, event.amount);
  // The reported total (available + held) must stay representable too
  addMoney(available, account.held);

  ledger.insertRecord({
    txId: event.tx,
    clientId: event.client,
    amount: event.amount,
    kind: "deposit",
    status: "normal",
  });
  account.available = available;

  return { status: "applied" };
}

/**
 * Debit `amount` from available when funds allow.
 *
 * Insufficient funds is a business no-op: nothing changes and the
 * transaction id stays unused.
 */
export function handleWithdrawal(ledger: Ledger, event: WithdrawalEvent): HandlerResult {
  assertUnusedTransaction(ledger, event);

  const account = ledger.getOrCreateAccount(event.client);
  if (compareMoney(account.available, event.amount) < 0) {
    return { status: "ignored", reason: "INSUFFICIENT_FUNDS" };
  }

  const available = subtractMoney(account.available, event.amount, { requireNonNegative: true });

  ledger.insertRecord({
    txId: event.tx,
    clientId: event.client,
    amount: event.amount,
    kind: "withdrawal",
    status: "normal",
  });
  account.available = available;

  return { status: "applied" };
}
