/**
 * Shared fixtures for the ledger tests.
 */

import { InMemoryFinanceStore } from "@ledgerline/store";
import type { FinanceStore } from "@ledgerline/store";
import type { Account, Party } from "@ledgerline/types";
import { AccountRegistry } from "../src/accounts.js";

export const NOW = "2024-03-10T12:00:00.000Z";

export const fixedClock = (): Date => new Date(NOW);

/** Run `fn` and return what it threw. */
export function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("expected a throw");
}

export interface Chart {
  readonly store: FinanceStore;
  readonly accounts: AccountRegistry;
  readonly party: Party;
  readonly cash: Account;
  readonly card: Account;
  readonly groceries: Account;
  readonly dining: Account;
  readonly salary: Account;
}

/**
 * A party with a small chart: cash, a credit card, two categories, salary.
 */
export function makeChart(store: FinanceStore = new InMemoryFinanceStore()): Chart {
  const accounts = new AccountRegistry(store, { clock: fixedClock });
  const party = accounts.createParty("Sam");
  const ownerId = party.id;
  return {
    store,
    accounts,
    party,
    cash: accounts.createAccount({ ownerId, name: "Cash", type: "asset" }),
    card: accounts.createAccount({ ownerId, name: "Credit Card", type: "liability" }),
    groceries: accounts.createAccount({ ownerId, name: "Groceries", type: "expense" }),
    dining: accounts.createAccount({ ownerId, name: "Dining", type: "expense" }),
    salary: accounts.createAccount({ ownerId, name: "Salary", type: "income" }),
  };
}
