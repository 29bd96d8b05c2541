/**
 * @tally/ledger — Account registry.
 *
 * Holds one Account per client. Accounts are created lazily on the
 * first event that names a client and are never removed.
 *
 * Rules:
 * - One account per client id
 * - New accounts start with zero balances and unlocked
 * - The registry applies no business rules
 */

import type { ClientId } from "@tally/types";
import { zeroMoney } from "./money-math.js";
import type { Account } from "./types.js";

/**
 * Append-only registry of client accounts.
 * Accounts can be added and mutated in place, never removed.
 */
export class AccountRegistry {
  private readonly _accounts: Map<ClientId, Account> = new Map();

  /**
   * Return the account for a client, creating a zeroed one if unseen.
   */
  getOrCreate(clientId: ClientId): Account {
    let account = this._accounts.get(clientId);
    if (account === undefined) {
      account = {
        clientId,
        available: zeroMoney(),
        held: zeroMoney(),
        locked: false,
      };
      this._accounts.set(clientId, account);
    }
    return account;
  }

  /**
   * Get an account by client id.
   * Returns undefined if not found.
   */
  get(clientId: ClientId): Account | undefined {
    return this._accounts.get(clientId);
  }

  /**
   * Check if an account exists.
   */
  has(clientId: ClientId): boolean {
    return this._accounts.has(clientId);
  }

  /**
   * Get all accounts in first-seen order.
   */
  getAll(): readonly Account[] {
    return [...this._accounts.values()];
  }

  /**
   * Get the count of registered accounts.
   */
  get count(): number {
    return this._accounts.size;
  }
}
