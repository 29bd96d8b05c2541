/**
 * @tally/ledger — Balance calculation.
 *
 * Derives client-visible balances from account state.
 * All calculations are deterministic using bigint arithmetic.
 *
 * Rules:
 * - total is always available + held, never stored
 * - Snapshots are detached copies; mutating the ledger later
 *   does not change a snapshot already taken
 * - Ledger-wide totals add many in-range balances and are not
 *   range-checked
 */

import { addMoney } from "./money-math.js";
import type { Account, AccountSnapshot, LedgerTotals } from "./types.js";

/**
 * Build the read-only reporting view of one account.
 */
export function computeAccountSnapshot(account: Account): AccountSnapshot {
  return {
    clientId: account.clientId,
    available: account.available,
    held: account.held,
    total: addMoney(account.available, account.held),
    locked: account.locked,
  };
}

/**
 * Order snapshots by client id ascending.
 */
export function sortSnapshots(snapshots: readonly AccountSnapshot[]): AccountSnapshot[] {
  return [...snapshots].sort((a, b) => a.clientId - b.clientId);
}

/**
 * Sum balances across a set of snapshots.
 */
export function computeLedgerTotals(snapshots: readonly AccountSnapshot[]): LedgerTotals {
  let available = 0n;
  let held = 0n;
  let lockedCount = 0;

  for (const snapshot of snapshots) {
    available += snapshot.available.units;
    held += snapshot.held.units;
    if (snapshot.locked) {
      lockedCount++;
    }
  }

  return {
    accountCount: snapshots.length,
    lockedCount,
    available: { units: available },
    held: { units: held },
    total: { units: available + held },
  };
}
