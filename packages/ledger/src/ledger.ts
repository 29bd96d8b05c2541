/**
 * @tally/ledger — Core Ledger class.
 *
 * Passive store of client accounts and retained transactions.
 * Handlers read and mutate it; it never decides whether an event
 * is allowed.
 *
 * API surface:
 * - getOrCreateAccount() — Lazily create a client account
 * - getAccount() — Look up an account without creating it
 * - getRecord() / hasRecord() — Look up a retained transaction
 * - insertRecord() — Retain a new transaction (ids are unique)
 * - accountView() — Read-only snapshot of one account
 * - snapshots() — Snapshots of every account, by client id
 *
 * There is no delete. Accounts and records live for the whole run.
 */

import type { ClientId, TransactionId } from "@tally/types";
import { AccountRegistry } from "./accounts.js";
import { computeAccountSnapshot, sortSnapshots } from "./balance-calculator.js";
import type { Account, AccountSnapshot, TransactionRecord } from "./types.js";
import { LedgerError } from "./types.js";

/**
 * In-memory ledger: client id → Account, transaction id → record.
 */
export class Ledger {
  private readonly _accounts: AccountRegistry = new AccountRegistry();
  private readonly _records: Map<TransactionId, TransactionRecord> = new Map();

  // ─── Accounts ────────────────────────────────────────────────────────

  /**
   * Return the client's account, inserting a zeroed one if unseen.
   */
  getOrCreateAccount(clientId: ClientId): Account {
    return this._accounts.getOrCreate(clientId);
  }

  /**
   * Get an account by client id, without creating it.
   */
  getAccount(clientId: ClientId): Account | undefined {
    return this._accounts.get(clientId);
  }

  /**
   * Read-only snapshot of one account, or undefined if unseen.
   */
  accountView(clientId: ClientId): AccountSnapshot | undefined {
    const account = this._accounts.get(clientId);
    return account === undefined ? undefined : computeAccountSnapshot(account);
  }

  /**
   * Snapshots of every account, ordered by client id ascending.
   */
  snapshots(): AccountSnapshot[] {
    return sortSnapshots(this._accounts.getAll().map(computeAccountSnapshot));
  }

  // ─── Transaction Records ─────────────────────────────────────────────

  /**
   * Get a retained transaction by id.
   */
  getRecord(txId: TransactionId): TransactionRecord | undefined {
    return this._records.get(txId);
  }

  /**
   * Check if a transaction id has already been used.
   */
  hasRecord(txId: TransactionId): boolean {
    return this._records.has(txId);
  }

  /**
   * Retain a transaction.
   * Throws DUPLICATE_TRANSACTION if the id is already present.
   */
  insertRecord(record: TransactionRecord): void {
    if (this._records.has(record.txId)) {
      throw new LedgerError(
        "DUPLICATE_TRANSACTION",
        `Transaction ID already exists in ledger: ${String(record.txId)}`,
      );
    }
    this._records.set(record.txId, record);
  }

  // ─── Counts ──────────────────────────────────────────────────────────

  /**
   * Number of client accounts.
   */
  get accountCount(): number {
    return this._accounts.count;
  }

  /**
   * Number of retained transactions.
   */
  get recordCount(): number {
    return this._records.size;
  }
}
