/**
 * Shared fixtures for the budget tests.
 */

import pino from "pino";
import type { Logger } from "pino";
import { InMemoryFinanceStore } from "@ledgerline/store";
import type { FinanceStore } from "@ledgerline/store";
import type { Account, Amount, Party, YearMonth } from "@ledgerline/types";
import {
  AccountRegistry,
  LedgerJournal,
  LedgerSpendSource,
  LegacySpendSource,
  SpendAggregator,
} from "@ledgerline/ledger";
import { BudgetService } from "../src/budget-service.js";
import { RolloverEngine } from "../src/rollover-engine.js";
import type { RolloverNotifier } from "../src/types.js";

export const NOW = "2024-06-01T09:00:00.000Z";

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

/** A pino logger writing JSON lines into `lines`. */
export function captureLogger(lines: string[]): Logger {
  return pino(
    { level: "debug" },
    {
      write(msg: string) {
        lines.push(msg);
      },
    },
  );
}

export interface WorldOptions {
  readonly store?: FinanceStore | undefined;
  readonly notifier?: RolloverNotifier | undefined;
  readonly logger?: Logger | undefined;
}

export interface World {
  readonly store: FinanceStore;
  readonly accounts: AccountRegistry;
  readonly journal: LedgerJournal;
  readonly engine: RolloverEngine;
  readonly budgets: BudgetService;
  readonly user: Party;
  readonly cash: Account;
  readonly groceries: Account;
  readonly dining: Account;
  /** Spend `amount` from cash on a category */
  buy(amount: Amount, date: string, categoryId?: string): string;
  /** Stored rolloverAmount of a category in a month */
  rollover(yearMonth: YearMonth, categoryId?: string): Amount;
}

/**
 * A user with cash and two categories, the journal wired to the
 * rollover engine the same way the node service wires them.
 */
export function makeWorld(options?: WorldOptions): World {
  const store = options?.store ?? new InMemoryFinanceStore();
  const accounts = new AccountRegistry(store, { clock: fixedClock });
  const spend = new SpendAggregator(accounts, [
    new LedgerSpendSource(store),
    new LegacySpendSource(store),
  ]);
  const engine = new RolloverEngine(store, spend, {
    clock: fixedClock,
    notifier: options?.notifier,
    logger: options?.logger,
  });
  const journal = new LedgerJournal(store, accounts, {
    clock: fixedClock,
    hooks: {
      onTransactionChanged(ownerId, yearMonth, reason) {
        engine.invalidateAndRecomputeChain(ownerId, yearMonth, reason);
      },
    },
  });
  const budgets = new BudgetService(store, accounts, spend, engine, { clock: fixedClock });

  const user = accounts.createParty("Robin");
  const cash = accounts.createAccount({ ownerId: user.id, name: "Cash", type: "asset" });
  const groceries = accounts.createAccount({ ownerId: user.id, name: "Groceries", type: "expense" });
  const dining = accounts.createAccount({ ownerId: user.id, name: "Dining", type: "expense" });

  return {
    store,
    accounts,
    journal,
    engine,
    budgets,
    user,
    cash,
    groceries,
    dining,
    buy(amount, date, categoryId = groceries.id) {
      const { transaction } = journal.recordTransaction(user.id, "purchase", date, [
        { accountId: cash.id, amount: `-${amount}` },
        { accountId: categoryId, amount },
      ]);
      return transaction.id;
    },
    rollover(yearMonth, categoryId = groceries.id) {
      const budget = store.findBudget(user.id, yearMonth);
      const row = budget === undefined ? undefined : store.getCategoryBudget(budget.id, categoryId);
      if (row === undefined) throw new Error(`no allocation for ${yearMonth}`);
      return row.rolloverAmount;
    },
  };
}
