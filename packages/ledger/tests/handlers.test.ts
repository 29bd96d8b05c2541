/**
 * Tests for the five event handlers, called directly against a Ledger.
 *
 * Covers:
 * - Deposit / withdrawal balance effects and retained records
 * - Dispute family preconditions and status transitions
 * - Structural failures leave state untouched
 */

import { describe, it, expect, beforeEach } from "vitest";
import { MONEY_MAX_UNITS, MONEY_UNIT } from "@tally/types";
import type { Money } from "@tally/types";
import { Ledger } from "../src/ledger.js";
import {
  handleDeposit,
  handleWithdrawal,
  handleDispute,
  handleResolve,
  handleChargeback,
} from "../src/handlers/index.js";
import { LedgerError } from "../src/types.js";

// ─── Helpers ─────────────────────────────────────────────────────────────

/** Whole units to Money: amt(10) is 10.0000. */
function amt(whole: number): Money {
  return { units: BigInt(whole) * MONEY_UNIT };
}

function balances(ledger: Ledger, client: number): { available: bigint; held: bigint; locked: boolean } {
  const account = ledger.getOrCreateAccount(client);
  return { available: account.available.units, held: account.held.units, locked: account.locked };
}

// ─── Deposit ─────────────────────────────────────────────────────────────

describe("handleDeposit", () => {
  let ledger: Ledger;

  beforeEach(() => {
    ledger = new Ledger();
  });

  it("credits available and retains a normal deposit record", () => {
    const result = handleDeposit(ledger, { kind: "deposit", client: 1, tx: 1, amount: amt(10) });

    expect(result).toEqual({ status: "applied" });
    expect(balances(ledger, 1)).toEqual({ available: 100_000n, held: 0n, locked: false });
    expect(ledger.getRecord(1)).toEqual({
      txId: 1,
      clientId: 1,
      amount: amt(10),
      kind: "deposit",
      status: "normal",
    });
  });

  it("accepts a zero-amount deposit", () => {
    expect(handleDeposit(ledger, { kind: "deposit", client: 1, tx: 1, amount: amt(0) })).toEqual({
      status: "applied",
    });
    expect(ledger.hasRecord(1)).toBe(true);
  });

  it("throws DUPLICATE_TRANSACTION and keeps the first deposit", () => {
    handleDeposit(ledger, { kind: "deposit", client: 1, tx: 1, amount: amt(10) });

    expect(() =>
      handleDeposit(ledger, { kind: "deposit", client: 1, tx: 1, amount: amt(99) }),
    ).toThrow(LedgerError);
    expect(balances(ledger, 1).available).toBe(100_000n);
    expect(ledger.getRecord(1)?.amount).toEqual(amt(10));
  });

  it("throws OVERFLOW without recording the transaction", () => {
    ledger.getOrCreateAccount(1).available = { units: MONEY_MAX_UNITS };

    try {
      handleDeposit(ledger, { kind: "deposit", client: 1, tx: 2, amount: { units: 1n } });
      expect.unreachable("should have thrown");
    } catch (err) {
      expect(err).toBeInstanceOf(LedgerError);
      expect(err instanceof LedgerError && err.code).toBe("OVERFLOW");
    }
    expect(ledger.hasRecord(2)).toBe(false);
    expect(balances(ledger, 1).available).toBe(MONEY_MAX_UNITS);
  });

  it("throws OVERFLOW when available fits but available + held does not", () => {
    const account = ledger.getOrCreateAccount(1);
    account.held = { units: MONEY_MAX_UNITS };

    try {
      handleDeposit(ledger, { kind: "deposit", client: 1, tx: 2, amount: { units: 1n } });
      expect.unreachable("should have thrown");
    } catch (err) {
      expect(err).toMatchObject({ code: "OVERFLOW" });
    }
    expect(ledger.hasRecord(2)).toBe(false);
    expect(balances(ledger, 1)).toEqual({ available: 0n, held: MONEY_MAX_UNITS, locked: false });
  });
});

// ─── Withdrawal ──────────────────────────────────────────────────────────

describe("handleWithdrawal", () => {
  let ledger: Ledger;

  beforeEach(() => {
    ledger = new Ledger();
    handleDeposit(ledger, { kind: "deposit", client: 1, tx: 1, amount: amt(10) });
  });

  it("debits available and retains a withdrawal record", () => {
    const result = handleWithdrawal(ledger, { kind: "withdrawal", client: 1, tx: 2, amount: amt(3) });

    expect(result).toEqual({ status: "applied" });
    expect(balances(ledger, 1).available).toBe(70_000n);
    expect(ledger.getRecord(2)?.kind).toBe("withdrawal");
  });

  it("allows withdrawing the full balance", () => {
    handleWithdrawal(ledger, { kind: "withdrawal", client: 1, tx: 2, amount: amt(10) });
    expect(balances(ledger, 1).available).toBe(0n);
  });

  it("ignores a withdrawal exceeding available funds", () => {
    const result = handleWithdrawal(ledger, { kind: "withdrawal", client: 1, tx: 2, amount: amt(11) });

    expect(result).toEqual({ status: "ignored", reason: "INSUFFICIENT_FUNDS" });
    expect(balances(ledger, 1).available).toBe(100_000n);
    expect(ledger.hasRecord(2)).toBe(false);
  });

  it("ignores a withdrawal from a new client with no funds", () => {
    const result = handleWithdrawal(ledger, { kind: "withdrawal", client: 9, tx: 2, amount: amt(1) });
    expect(result).toEqual({ status: "ignored", reason: "INSUFFICIENT_FUNDS" });
    expect(balances(ledger, 9).available).toBe(0n);
  });

  it("throws DUPLICATE_TRANSACTION when reusing a deposit id", () => {
    expect(() =>
      handleWithdrawal(ledger, { kind: "withdrawal", client: 1, tx: 1, amount: amt(1) }),
    ).toThrow(LedgerError);
    expect(balances(ledger, 1).available).toBe(100_000n);
  });
});

// ─── Dispute ─────────────────────────────────────────────────────────────

describe("handleDispute", () => {
  let ledger: Ledger;

  beforeEach(() => {
    ledger = new Ledger();
    handleDeposit(ledger, { kind: "deposit", client: 1, tx: 1, amount: amt(10) });
  });

  it("moves the deposit amount from available to held", () => {
    const result = handleDispute(ledger, { kind: "dispute", client: 1, tx: 1 });

    expect(result).toEqual({ status: "applied" });
    expect(balances(ledger, 1)).toEqual({ available: 0n, held: 100_000n, locked: false });
    expect(ledger.getRecord(1)?.status).toBe("disputed");
  });

  it("drives available negative when the funds were already withdrawn", () => {
    handleWithdrawal(ledger, { kind: "withdrawal", client: 1, tx: 2, amount: amt(8) });
    handleDispute(ledger, { kind: "dispute", client: 1, tx: 1 });

    expect(balances(ledger, 1)).toEqual({ available: -80_000n, held: 100_000n, locked: false });
  });

  it("ignores an unknown transaction", () => {
    expect(handleDispute(ledger, { kind: "dispute", client: 1, tx: 99 })).toEqual({
      status: "ignored",
      reason: "UNKNOWN_TRANSACTION",
    });
  });

  it("ignores a transaction owned by another client", () => {
    expect(handleDispute(ledger, { kind: "dispute", client: 2, tx: 1 })).toEqual({
      status: "ignored",
      reason: "CLIENT_MISMATCH",
    });
    expect(balances(ledger, 1).held).toBe(0n);
  });

  it("ignores a withdrawal transaction", () => {
    handleWithdrawal(ledger, { kind: "withdrawal", client: 1, tx: 2, amount: amt(4) });

    expect(handleDispute(ledger, { kind: "dispute", client: 1, tx: 2 })).toEqual({
      status: "ignored",
      reason: "NOT_DISPUTABLE",
    });
    expect(balances(ledger, 1)).toEqual({ available: 60_000n, held: 0n, locked: false });
  });

  it("ignores a second dispute of the same deposit", () => {
    handleDispute(ledger, { kind: "dispute", client: 1, tx: 1 });

    expect(handleDispute(ledger, { kind: "dispute", client: 1, tx: 1 })).toEqual({
      status: "ignored",
      reason: "INVALID_STATUS_TRANSITION",
    });
    expect(balances(ledger, 1).held).toBe(100_000n);
  });

  it("ignores a dispute of an already resolved deposit", () => {
    handleDispute(ledger, { kind: "dispute", client: 1, tx: 1 });
    handleResolve(ledger, { kind: "resolve", client: 1, tx: 1 });

    expect(handleDispute(ledger, { kind: "dispute", client: 1, tx: 1 })).toEqual({
      status: "ignored",
      reason: "INVALID_STATUS_TRANSITION",
    });
  });

  it("throws OVERFLOW on held without moving either leg", () => {
    ledger.getOrCreateAccount(1).held = { units: MONEY_MAX_UNITS };

    expect(() => handleDispute(ledger, { kind: "dispute", client: 1, tx: 1 })).toThrow(LedgerError);
    expect(balances(ledger, 1).available).toBe(100_000n);
    expect(ledger.getRecord(1)?.status).toBe("normal");
  });
});

// ─── Resolve ─────────────────────────────────────────────────────────────

describe("handleResolve", () => {
  let ledger: Ledger;

  beforeEach(() => {
    ledger = new Ledger();
    handleDeposit(ledger, { kind: "deposit", client: 1, tx: 1, amount: amt(10) });
  });

  it("moves the disputed amount back to available", () => {
    handleDispute(ledger, { kind: "dispute", client: 1, tx: 1 });
    const result = handleResolve(ledger, { kind: "resolve", client: 1, tx: 1 });

    expect(result).toEqual({ status: "applied" });
    expect(balances(ledger, 1)).toEqual({ available: 100_000n, held: 0n, locked: false });
    expect(ledger.getRecord(1)?.status).toBe("resolved");
  });

  it("ignores a deposit that is not under dispute", () => {
    expect(handleResolve(ledger, { kind: "resolve", client: 1, tx: 1 })).toEqual({
      status: "ignored",
      reason: "INVALID_STATUS_TRANSITION",
    });
  });

  it("ignores a mismatched client", () => {
    handleDispute(ledger, { kind: "dispute", client: 1, tx: 1 });
    expect(handleResolve(ledger, { kind: "resolve", client: 3, tx: 1 })).toEqual({
      status: "ignored",
      reason: "CLIENT_MISMATCH",
    });
    expect(balances(ledger, 1).held).toBe(100_000n);
  });

  it("ignores a resolve when held is below the disputed amount", () => {
    handleDispute(ledger, { kind: "dispute", client: 1, tx: 1 });
    ledger.getOrCreateAccount(1).held = amt(4);

    expect(handleResolve(ledger, { kind: "resolve", client: 1, tx: 1 })).toEqual({
      status: "ignored",
      reason: "INSUFFICIENT_FUNDS",
    });
    expect(balances(ledger, 1)).toEqual({ available: 0n, held: 40_000n, locked: false });
    expect(ledger.getRecord(1)?.status).toBe("disputed");
  });

  it("ignores an unknown transaction", () => {
    expect(handleResolve(ledger, { kind: "resolve", client: 1, tx: 7 })).toEqual({
      status: "ignored",
      reason: "UNKNOWN_TRANSACTION",
    });
  });
});

// ─── Chargeback ──────────────────────────────────────────────────────────

describe("handleChargeback", () => {
  let ledger: Ledger;

  beforeEach(() => {
    ledger = new Ledger();
    handleDeposit(ledger, { kind: "deposit", client: 1, tx: 1, amount: amt(10) });
    handleDeposit(ledger, { kind: "deposit", client: 1, tx: 2, amount: amt(5) });
  });

  it("removes the held amount and locks the account", () => {
    handleDispute(ledger, { kind: "dispute", client: 1, tx: 1 });
    const result = handleChargeback(ledger, { kind: "chargeback", client: 1, tx: 1 });

    expect(result).toEqual({ status: "applied" });
    expect(balances(ledger, 1)).toEqual({ available: 50_000n, held: 0n, locked: true });
    expect(ledger.getRecord(1)?.status).toBe("chargedBack");
  });

  it("ignores a deposit that is not under dispute", () => {
    expect(handleChargeback(ledger, { kind: "chargeback", client: 1, tx: 2 })).toEqual({
      status: "ignored",
      reason: "INVALID_STATUS_TRANSITION",
    });
    expect(balances(ledger, 1).locked).toBe(false);
  });

  it("ignores a resolved deposit", () => {
    handleDispute(ledger, { kind: "dispute", client: 1, tx: 1 });
    handleResolve(ledger, { kind: "resolve", client: 1, tx: 1 });

    expect(handleChargeback(ledger, { kind: "chargeback", client: 1, tx: 1 })).toEqual({
      status: "ignored",
      reason: "INVALID_STATUS_TRANSITION",
    });
    expect(balances(ledger, 1)).toEqual({ available: 150_000n, held: 0n, locked: false });
  });

  it("ignores a chargeback when held is below the disputed amount", () => {
    handleDispute(ledger, { kind: "dispute", client: 1, tx: 1 });
    ledger.getOrCreateAccount(1).held = amt(3);

    expect(handleChargeback(ledger, { kind: "chargeback", client: 1, tx: 1 })).toEqual({
      status: "ignored",
      reason: "INSUFFICIENT_FUNDS",
    });
    expect(balances(ledger, 1)).toEqual({ available: 50_000n, held: 30_000n, locked: false });
    expect(ledger.getRecord(1)?.status).toBe("disputed");
  });

  it("ignores a mismatched client", () => {
    handleDispute(ledger, { kind: "dispute", client: 1, tx: 1 });
    expect(handleChargeback(ledger, { kind: "chargeback", client: 2, tx: 1 })).toEqual({
      status: "ignored",
      reason: "CLIENT_MISMATCH",
    });
  });
});
