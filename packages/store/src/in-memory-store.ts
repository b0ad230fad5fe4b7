/**
 * @ledgerline/store — In-memory FinanceStore implementation.
 *
 * Keeps every table in a Map. Suitable for:
 * - Unit and integration tests
 * - Short-lived processes
 * - Development and prototyping
 *
 * Not suitable for production (all state lost on process exit).
 *
 * Unit of work: the outermost runInTransaction() snapshots the tables
 * and restores the snapshot if the work throws. Records are immutable,
 * so a snapshot only copies the Maps, never the records.
 */

import type {
  Account,
  Budget,
  CategoryBudget,
  Entry,
  LedgerTransaction,
  LegacyTransaction,
  Party,
  RolloverCalculation,
  YearMonth,
} from "@ledgerline/types";
import type { FinanceStore, Posting, RolloverHistoryFilter } from "./types.js";
import { StoreError } from "./types.js";

interface Tables {
  readonly parties: Map<string, Party>;
  readonly accounts: Map<string, Account>;
  readonly transactions: Map<string, LedgerTransaction>;
  /** Entries keyed by transaction ID, in posting order */
  readonly entries: Map<string, readonly Entry[]>;
  readonly legacy: Map<string, LegacyTransaction>;
  readonly budgets: Map<string, Budget>;
  readonly categoryBudgets: Map<string, CategoryBudget>;
  readonly rolloverHistory: RolloverCalculation[];
}

function emptyTables(): Tables {
  return {
    parties: new Map(),
    accounts: new Map(),
    transactions: new Map(),
    entries: new Map(),
    legacy: new Map(),
    budgets: new Map(),
    categoryBudgets: new Map(),
    rolloverHistory: [],
  };
}

function copyTables(t: Tables): Tables {
  return {
    parties: new Map(t.parties),
    accounts: new Map(t.accounts),
    transactions: new Map(t.transactions),
    entries: new Map(t.entries),
    legacy: new Map(t.legacy),
    budgets: new Map(t.budgets),
    categoryBudgets: new Map(t.categoryBudgets),
    rolloverHistory: [...t.rolloverHistory],
  };
}

export class InMemoryFinanceStore implements FinanceStore {
  private _tables: Tables = emptyTables();
  private _depth = 0;
  private _closed = false;

  // ─── Unit of Work ───────────────────────────────────────────────────

  runInTransaction<T>(work: () => T): T {
    if (this._depth > 0) {
      return work();
    }

    const snapshot = copyTables(this._tables);
    this._depth++;
    try {
      return work();
    } catch (err) {
      this._tables = snapshot;
      throw err;
    } finally {
      this._depth--;
    }
  }

  isHealthy(): boolean {
    return !this._closed;
  }

  close(): void {
    this._closed = true;
  }

  // ─── Parties ────────────────────────────────────────────────────────

  insertParty(party: Party): void {
    this._insertUnique(this._tables.parties, party.id, party, "party");
  }

  getParty(id: string): Party | undefined {
    return this._tables.parties.get(id);
  }

  // ─── Accounts ───────────────────────────────────────────────────────

  insertAccount(account: Account): void {
    this._insertUnique(this._tables.accounts, account.id, account, "account");
  }

  updateAccount(account: Account): void {
    this._replaceExisting(this._tables.accounts, account.id, account, "account");
  }

  getAccount(id: string): Account | undefined {
    return this._tables.accounts.get(id);
  }

  listAccounts(ownerId: string): readonly Account[] {
    return [...this._tables.accounts.values()].filter((a) => a.ownerId === ownerId);
  }

  // ─── Journal ────────────────────────────────────────────────────────

  insertTransaction(transaction: LedgerTransaction, entries: readonly Entry[]): void {
    this._assertOpen();
    if (this._tables.transactions.has(transaction.id)) {
      throw new StoreError("DUPLICATE_KEY", `Transaction already exists: "${transaction.id}"`);
    }
    this._assertNewEntryIds(entries);
    this._tables.transactions.set(transaction.id, transaction);
    this._tables.entries.set(transaction.id, [...entries]);
  }

  updateTransaction(transaction: LedgerTransaction): void {
    this._replaceExisting(
      this._tables.transactions,
      transaction.id,
      transaction,
      "transaction",
    );
  }

  replaceEntries(transactionId: string, entries: readonly Entry[]): void {
    this._assertOpen();
    if (!this._tables.transactions.has(transactionId)) {
      throw new StoreError("ROW_NOT_FOUND", `Transaction not found: "${transactionId}"`);
    }
    this._tables.entries.delete(transactionId);
    this._assertNewEntryIds(entries);
    this._tables.entries.set(transactionId, [...entries]);
  }

  deleteTransaction(id: string): void {
    this._assertOpen();
    this._tables.transactions.delete(id);
    this._tables.entries.delete(id);
  }

  getTransaction(id: string): LedgerTransaction | undefined {
    return this._tables.transactions.get(id);
  }

  getEntries(transactionId: string): readonly Entry[] {
    return this._tables.entries.get(transactionId) ?? [];
  }

  listTransactions(ownerId: string): readonly LedgerTransaction[] {
    return [...this._tables.transactions.values()]
      .filter((t) => t.ownerId === ownerId)
      .sort((a, b) => a.date.localeCompare(b.date));
  }

  listPostings(accountId: string): readonly Posting[] {
    const postings: Posting[] = [];
    for (const [transactionId, entries] of this._tables.entries) {
      const transaction = this._tables.transactions.get(transactionId);
      if (transaction === undefined) continue;
      for (const entry of entries) {
        if (entry.accountId === accountId) {
          postings.push({ entry, transaction });
        }
      }
    }
    return postings;
  }

  // ─── Legacy Transactions ────────────────────────────────────────────

  insertLegacyTransaction(row: LegacyTransaction): void {
    this._insertUnique(this._tables.legacy, row.id, row, "legacy transaction");
  }

  listLegacyTransactions(ownerId: string, categoryId: string): readonly LegacyTransaction[] {
    return [...this._tables.legacy.values()].filter(
      (r) => r.ownerId === ownerId && r.categoryId === categoryId,
    );
  }

  // ─── Budgets ────────────────────────────────────────────────────────

  insertBudget(budget: Budget): void {
    if (this.findBudget(budget.userId, budget.yearMonth) !== undefined) {
      throw new StoreError(
        "DUPLICATE_KEY",
        `Budget already exists for ${budget.userId} in ${budget.yearMonth}`,
      );
    }
    this._insertUnique(this._tables.budgets, budget.id, budget, "budget");
  }

  updateBudget(budget: Budget): void {
    this._replaceExisting(this._tables.budgets, budget.id, budget, "budget");
  }

  getBudget(id: string): Budget | undefined {
    return this._tables.budgets.get(id);
  }

  findBudget(userId: string, yearMonth: YearMonth): Budget | undefined {
    for (const budget of this._tables.budgets.values()) {
      if (budget.userId === userId && budget.yearMonth === yearMonth) {
        return budget;
      }
    }
    return undefined;
  }

  listBudgets(userId: string): readonly Budget[] {
    return [...this._tables.budgets.values()]
      .filter((b) => b.userId === userId)
      .sort((a, b) => a.yearMonth.localeCompare(b.yearMonth));
  }

  listBudgetsAfter(userId: string, yearMonth: YearMonth): readonly Budget[] {
    return this.listBudgets(userId).filter((b) => b.yearMonth > yearMonth);
  }

  insertCategoryBudget(categoryBudget: CategoryBudget): void {
    if (this.getCategoryBudget(categoryBudget.budgetId, categoryBudget.categoryId) !== undefined) {
      throw new StoreError(
        "DUPLICATE_KEY",
        `Category "${categoryBudget.categoryId}" is already budgeted in budget "${categoryBudget.budgetId}"`,
      );
    }
    this._insertUnique(
      this._tables.categoryBudgets,
      categoryBudget.id,
      categoryBudget,
      "category budget",
    );
  }

  updateCategoryBudget(categoryBudget: CategoryBudget): void {
    this._replaceExisting(
      this._tables.categoryBudgets,
      categoryBudget.id,
      categoryBudget,
      "category budget",
    );
  }

  deleteCategoryBudget(id: string): void {
    this._assertOpen();
    this._tables.categoryBudgets.delete(id);
  }

  getCategoryBudget(budgetId: string, categoryId: string): CategoryBudget | undefined {
    for (const cb of this._tables.categoryBudgets.values()) {
      if (cb.budgetId === budgetId && cb.categoryId === categoryId) {
        return cb;
      }
    }
    return undefined;
  }

  listCategoryBudgets(budgetId: string): readonly CategoryBudget[] {
    return [...this._tables.categoryBudgets.values()].filter((cb) => cb.budgetId === budgetId);
  }

  // ─── Rollover History ───────────────────────────────────────────────

  appendRolloverCalculation(calculation: RolloverCalculation): void {
    this._assertOpen();
    this._tables.rolloverHistory.push(calculation);
  }

  listRolloverCalculations(filter?: RolloverHistoryFilter): readonly RolloverCalculation[] {
    return this._tables.rolloverHistory.filter((c) => {
      if (filter?.budgetId !== undefined && c.budgetId !== filter.budgetId) return false;
      if (filter?.categoryId !== undefined && c.categoryId !== filter.categoryId) return false;
      return true;
    });
  }

  // ─── Private ────────────────────────────────────────────────────────

  private _assertOpen(): void {
    if (this._closed) {
      throw new StoreError("DATABASE_ERROR", "Store is closed");
    }
  }

  private _assertNewEntryIds(entries: readonly Entry[]): void {
    const known = new Set<string>();
    for (const existing of this._tables.entries.values()) {
      for (const e of existing) known.add(e.id);
    }
    for (const entry of entries) {
      if (known.has(entry.id)) {
        throw new StoreError("DUPLICATE_KEY", `Entry already exists: "${entry.id}"`);
      }
      known.add(entry.id);
    }
  }

  private _insertUnique<V>(table: Map<string, V>, id: string, value: V, label: string): void {
    this._assertOpen();
    if (table.has(id)) {
      throw new StoreError("DUPLICATE_KEY", `${label} already exists: "${id}"`);
    }
    table.set(id, value);
  }

  private _replaceExisting<V>(table: Map<string, V>, id: string, value: V, label: string): void {
    this._assertOpen();
    if (!table.has(id)) {
      throw new StoreError("ROW_NOT_FOUND", `${label} not found: "${id}"`);
    }
    table.set(id, value);
  }
}
