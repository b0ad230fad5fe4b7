/**
 * @ledgerline/store — SQLite-backed FinanceStore.
 *
 * Uses better-sqlite3 (synchronous). The schema is created on open.
 * Pass ":memory:" for an in-process database.
 *
 * Unit of work: runInTransaction() wraps the work in db.transaction();
 * when a transaction is already open the work joins it.
 */

import Database from "better-sqlite3";
import { isAccountType, isPartyKind, isRolloverReason } from "@ledgerline/types";
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
import { SCHEMA_STATEMENTS } from "./schema.js";

// =============================================================================
// Row shapes
// =============================================================================

interface PartyRow {
  id: string;
  name: string;
  kind: string;
  created_at: string;
}

interface AccountRow {
  id: string;
  owner_id: string;
  name: string;
  type: string;
  parent_id: string | null;
  active: number;
  currency: string;
  created_at: string;
}

interface TransactionRow {
  id: string;
  owner_id: string;
  date: string;
  description: string;
  notes: string | null;
  external_id: string | null;
  created_at: string;
  updated_at: string;
  deleted_at: string | null;
}

interface EntryRow {
  id: string;
  transaction_id: string;
  account_id: string;
  amount: string;
  is_reportable: number;
  position: number;
}

interface LegacyRow {
  id: string;
  owner_id: string;
  category_id: string;
  type: string;
  amount: string;
  occurred_on: string;
  is_deleted: number;
}

interface BudgetRow {
  id: string;
  user_id: string;
  year_month: string;
  rollover_last_calculated: string | null;
  rollover_needs_recalc: number;
  created_at: string;
}

interface CategoryBudgetRow {
  id: string;
  budget_id: string;
  category_id: string;
  budget_amount: string;
  rollover_enabled: number;
  rollover_amount: string;
}

interface RolloverRow {
  id: string;
  budget_id: string;
  category_id: string;
  calculated_at: string;
  rollover_amount: string;
  source_month: string;
  reason: string;
  base_budget: string;
  prev_rollover: string;
  effective_budget: string;
  spent_amount: string;
}

type PostingRow = EntryRow & { [K in keyof TransactionRow as `t_${K}`]: TransactionRow[K] };

// =============================================================================
// Row mappers
// =============================================================================

function corrupt(table: string, id: string, column: string): StoreError {
  return new StoreError("CORRUPT_ROW", `Invalid ${column} in ${table} row "${id}"`);
}

function toParty(row: PartyRow): Party {
  if (!isPartyKind(row.kind)) throw corrupt("parties", row.id, "kind");
  return { id: row.id, name: row.name, kind: row.kind, createdAt: row.created_at };
}

function toAccount(row: AccountRow): Account {
  if (!isAccountType(row.type)) throw corrupt("accounts", row.id, "type");
  return {
    id: row.id,
    ownerId: row.owner_id,
    name: row.name,
    type: row.type,
    parentId: row.parent_id ?? undefined,
    active: row.active === 1,
    currency: row.currency,
    createdAt: row.created_at,
  };
}

function toTransaction(row: TransactionRow): LedgerTransaction {
  return {
    id: row.id,
    ownerId: row.owner_id,
    date: row.date,
    description: row.description,
    notes: row.notes ?? undefined,
    externalId: row.external_id ?? undefined,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    deletedAt: row.deleted_at ?? undefined,
  };
}

function toEntry(row: EntryRow): Entry {
  return {
    id: row.id,
    transactionId: row.transaction_id,
    accountId: row.account_id,
    amount: row.amount,
    isReportable: row.is_reportable === 1,
  };
}

function toPosting(row: PostingRow): Posting {
  return {
    entry: toEntry(row),
    transaction: toTransaction({
      id: row.t_id,
      owner_id: row.t_owner_id,
      date: row.t_date,
      description: row.t_description,
      notes: row.t_notes,
      external_id: row.t_external_id,
      created_at: row.t_created_at,
      updated_at: row.t_updated_at,
      deleted_at: row.t_deleted_at,
    }),
  };
}

function toLegacy(row: LegacyRow): LegacyTransaction {
  if (row.type !== "income" && row.type !== "expense") {
    throw corrupt("legacy_transactions", row.id, "type");
  }
  return {
    id: row.id,
    ownerId: row.owner_id,
    categoryId: row.category_id,
    type: row.type,
    amount: row.amount,
    occurredOn: row.occurred_on,
    isDeleted: row.is_deleted === 1,
  };
}

function toBudget(row: BudgetRow): Budget {
  return {
    id: row.id,
    userId: row.user_id,
    yearMonth: row.year_month,
    rolloverLastCalculated: row.rollover_last_calculated ?? undefined,
    rolloverNeedsRecalc: row.rollover_needs_recalc === 1,
    createdAt: row.created_at,
  };
}

function toCategoryBudget(row: CategoryBudgetRow): CategoryBudget {
  return {
    id: row.id,
    budgetId: row.budget_id,
    categoryId: row.category_id,
    budgetAmount: row.budget_amount,
    rolloverEnabled: row.rollover_enabled === 1,
    rolloverAmount: row.rollover_amount,
  };
}

function toRolloverCalculation(row: RolloverRow): RolloverCalculation {
  if (!isRolloverReason(row.reason)) throw corrupt("rollover_calculations", row.id, "reason");
  return {
    id: row.id,
    budgetId: row.budget_id,
    categoryId: row.category_id,
    calculatedAt: row.calculated_at,
    rolloverAmount: row.rollover_amount,
    sourceMonth: row.source_month,
    reason: row.reason,
    baseBudget: row.base_budget,
    prevRollover: row.prev_rollover,
    effectiveBudget: row.effective_budget,
    spentAmount: row.spent_amount,
  };
}

function flag(value: boolean): number {
  return value ? 1 : 0;
}

const TRANSACTION_COLUMNS =
  "t.id AS t_id, t.owner_id AS t_owner_id, t.date AS t_date, t.description AS t_description, " +
  "t.notes AS t_notes, t.external_id AS t_external_id, t.created_at AS t_created_at, " +
  "t.updated_at AS t_updated_at, t.deleted_at AS t_deleted_at";

// =============================================================================
// Store
// =============================================================================

export class SqliteFinanceStore implements FinanceStore {
  private readonly _db: Database.Database;

  constructor(filename: string = ":memory:") {
    try {
      this._db = new Database(filename);
      this._db.pragma("foreign_keys = ON");
      if (filename !== ":memory:") {
        this._db.pragma("journal_mode = WAL");
      }
      for (const statement of SCHEMA_STATEMENTS) {
        this._db.exec(statement);
      }
    } catch (err) {
      throw translate("open database", err);
    }
  }

  // ─── Unit of Work ───────────────────────────────────────────────────

  runInTransaction<T>(work: () => T): T {
    if (this._db.inTransaction) {
      return work();
    }
    return this._guard("transaction", () => this._db.transaction(work)());
  }

  isHealthy(): boolean {
    if (!this._db.open) return false;
    try {
      return this._db.prepare<[], { ok: number }>("SELECT 1 AS ok").get()?.ok === 1;
    } catch {
      return false;
    }
  }

  close(): void {
    this._db.close();
  }

  // ─── Parties ────────────────────────────────────────────────────────

  insertParty(party: Party): void {
    this._guard("insert party", () => {
      this._db
        .prepare<[string, string, string, string]>(
          "INSERT INTO parties (id, name, kind, created_at) VALUES (?, ?, ?, ?)",
        )
        .run(party.id, party.name, party.kind, party.createdAt);
    });
  }

  getParty(id: string): Party | undefined {
    return this._guard("get party", () => {
      const row = this._db
        .prepare<[string], PartyRow>("SELECT * FROM parties WHERE id = ?")
        .get(id);
      return row === undefined ? undefined : toParty(row);
    });
  }

  // ─── Accounts ───────────────────────────────────────────────────────

  insertAccount(account: Account): void {
    this._guard("insert account", () => {
      this._db
        .prepare<AccountRow>(
          `INSERT INTO accounts (id, owner_id, name, type, parent_id, active, currency, created_at)
           VALUES (@id, @owner_id, @name, @type, @parent_id, @active, @currency, @created_at)`,
        )
        .run(this._accountRow(account));
    });
  }

  updateAccount(account: Account): void {
    this._guard("update account", () => {
      const result = this._db
        .prepare<AccountRow>(
          `UPDATE accounts SET owner_id = @owner_id, name = @name, type = @type,
             parent_id = @parent_id, active = @active, currency = @currency,
             created_at = @created_at
           WHERE id = @id`,
        )
        .run(this._accountRow(account));
      this._assertChanged(result.changes, "account", account.id);
    });
  }

  getAccount(id: string): Account | undefined {
    return this._guard("get account", () => {
      const row = this._db
        .prepare<[string], AccountRow>("SELECT * FROM accounts WHERE id = ?")
        .get(id);
      return row === undefined ? undefined : toAccount(row);
    });
  }

  listAccounts(ownerId: string): readonly Account[] {
    return this._guard("list accounts", () =>
      this._db
        .prepare<[string], AccountRow>("SELECT * FROM accounts WHERE owner_id = ? ORDER BY rowid")
        .all(ownerId)
        .map(toAccount),
    );
  }

  // ─── Journal ────────────────────────────────────────────────────────

  insertTransaction(transaction: LedgerTransaction, entries: readonly Entry[]): void {
    this._guard("insert transaction", () => {
      this._db
        .prepare<TransactionRow>(
          `INSERT INTO ledger_transactions
             (id, owner_id, date, description, notes, external_id, created_at, updated_at, deleted_at)
           VALUES (@id, @owner_id, @date, @description, @notes, @external_id, @created_at, @updated_at, @deleted_at)`,
        )
        .run(this._transactionRow(transaction));
      this._insertEntries(entries);
    });
  }

  updateTransaction(transaction: LedgerTransaction): void {
    this._guard("update transaction", () => {
      const result = this._db
        .prepare<TransactionRow>(
          `UPDATE ledger_transactions SET owner_id = @owner_id, date = @date,
             description = @description, notes = @notes, external_id = @external_id,
             created_at = @created_at, updated_at = @updated_at, deleted_at = @deleted_at
           WHERE id = @id`,
        )
        .run(this._transactionRow(transaction));
      this._assertChanged(result.changes, "transaction", transaction.id);
    });
  }

  replaceEntries(transactionId: string, entries: readonly Entry[]): void {
    this._guard("replace entries", () => {
      if (this.getTransaction(transactionId) === undefined) {
        throw new StoreError("ROW_NOT_FOUND", `Transaction not found: "${transactionId}"`);
      }
      this._db
        .prepare<[string]>("DELETE FROM entries WHERE transaction_id = ?")
        .run(transactionId);
      this._insertEntries(entries);
    });
  }

  deleteTransaction(id: string): void {
    this._guard("delete transaction", () => {
      this._db.prepare<[string]>("DELETE FROM entries WHERE transaction_id = ?").run(id);
      this._db.prepare<[string]>("DELETE FROM ledger_transactions WHERE id = ?").run(id);
    });
  }

  getTransaction(id: string): LedgerTransaction | undefined {
    return this._guard("get transaction", () => {
      const row = this._db
        .prepare<[string], TransactionRow>("SELECT * FROM ledger_transactions WHERE id = ?")
        .get(id);
      return row === undefined ? undefined : toTransaction(row);
    });
  }

  getEntries(transactionId: string): readonly Entry[] {
    return this._guard("get entries", () =>
      this._db
        .prepare<[string], EntryRow>(
          "SELECT * FROM entries WHERE transaction_id = ? ORDER BY position",
        )
        .all(transactionId)
        .map(toEntry),
    );
  }

  listTransactions(ownerId: string): readonly LedgerTransaction[] {
    return this._guard("list transactions", () =>
      this._db
        .prepare<[string], TransactionRow>(
          "SELECT * FROM ledger_transactions WHERE owner_id = ? ORDER BY date, rowid",
        )
        .all(ownerId)
        .map(toTransaction),
    );
  }

  listPostings(accountId: string): readonly Posting[] {
    return this._guard("list postings", () =>
      this._db
        .prepare<[string], PostingRow>(
          `SELECT e.*, ${TRANSACTION_COLUMNS}
           FROM entries e JOIN ledger_transactions t ON t.id = e.transaction_id
           WHERE e.account_id = ?
           ORDER BY t.date, e.position`,
        )
        .all(accountId)
        .map(toPosting),
    );
  }

  // ─── Legacy Transactions ────────────────────────────────────────────

  insertLegacyTransaction(row: LegacyTransaction): void {
    this._guard("insert legacy transaction", () => {
      this._db
        .prepare<LegacyRow>(
          `INSERT INTO legacy_transactions
             (id, owner_id, category_id, type, amount, occurred_on, is_deleted)
           VALUES (@id, @owner_id, @category_id, @type, @amount, @occurred_on, @is_deleted)`,
        )
        .run({
          id: row.id,
          owner_id: row.ownerId,
          category_id: row.categoryId,
          type: row.type,
          amount: row.amount,
          occurred_on: row.occurredOn,
          is_deleted: flag(row.isDeleted),
        });
    });
  }

  listLegacyTransactions(ownerId: string, categoryId: string): readonly LegacyTransaction[] {
    return this._guard("list legacy transactions", () =>
      this._db
        .prepare<[string, string], LegacyRow>(
          "SELECT * FROM legacy_transactions WHERE owner_id = ? AND category_id = ? ORDER BY rowid",
        )
        .all(ownerId, categoryId)
        .map(toLegacy),
    );
  }

  // ─── Budgets ────────────────────────────────────────────────────────

  insertBudget(budget: Budget): void {
    this._guard("insert budget", () => {
      this._db
        .prepare<BudgetRow>(
          `INSERT INTO budgets
             (id, user_id, year_month, rollover_last_calculated, rollover_needs_recalc, created_at)
           VALUES (@id, @user_id, @year_month, @rollover_last_calculated, @rollover_needs_recalc, @created_at)`,
        )
        .run(this._budgetRow(budget));
    });
  }

  updateBudget(budget: Budget): void {
    this._guard("update budget", () => {
      const result = this._db
        .prepare<BudgetRow>(
          `UPDATE budgets SET user_id = @user_id, year_month = @year_month,
             rollover_last_calculated = @rollover_last_calculated,
             rollover_needs_recalc = @rollover_needs_recalc, created_at = @created_at
           WHERE id = @id`,
        )
        .run(this._budgetRow(budget));
      this._assertChanged(result.changes, "budget", budget.id);
    });
  }

  getBudget(id: string): Budget | undefined {
    return this._guard("get budget", () => {
      const row = this._db
        .prepare<[string], BudgetRow>("SELECT * FROM budgets WHERE id = ?")
        .get(id);
      return row === undefined ? undefined : toBudget(row);
    });
  }

  findBudget(userId: string, yearMonth: YearMonth): Budget | undefined {
    return this._guard("find budget", () => {
      const row = this._db
        .prepare<[string, string], BudgetRow>(
          "SELECT * FROM budgets WHERE user_id = ? AND year_month = ?",
        )
        .get(userId, yearMonth);
      return row === undefined ? undefined : toBudget(row);
    });
  }

  listBudgets(userId: string): readonly Budget[] {
    return this._guard("list budgets", () =>
      this._db
        .prepare<[string], BudgetRow>(
          "SELECT * FROM budgets WHERE user_id = ? ORDER BY year_month ASC",
        )
        .all(userId)
        .map(toBudget),
    );
  }

  listBudgetsAfter(userId: string, yearMonth: YearMonth): readonly Budget[] {
    return this._guard("list budgets after", () =>
      this._db
        .prepare<[string, string], BudgetRow>(
          "SELECT * FROM budgets WHERE user_id = ? AND year_month > ? ORDER BY year_month ASC",
        )
        .all(userId, yearMonth)
        .map(toBudget),
    );
  }

  insertCategoryBudget(categoryBudget: CategoryBudget): void {
    this._guard("insert category budget", () => {
      this._db
        .prepare<CategoryBudgetRow>(
          `INSERT INTO category_budgets
             (id, budget_id, category_id, budget_amount, rollover_enabled, rollover_amount)
           VALUES (@id, @budget_id, @category_id, @budget_amount, @rollover_enabled, @rollover_amount)`,
        )
        .run(this._categoryBudgetRow(categoryBudget));
    });
  }

  updateCategoryBudget(categoryBudget: CategoryBudget): void {
    this._guard("update category budget", () => {
      const result = this._db
        .prepare<CategoryBudgetRow>(
          `UPDATE category_budgets SET budget_id = @budget_id, category_id = @category_id,
             budget_amount = @budget_amount, rollover_enabled = @rollover_enabled,
             rollover_amount = @rollover_amount
           WHERE id = @id`,
        )
        .run(this._categoryBudgetRow(categoryBudget));
      this._assertChanged(result.changes, "category budget", categoryBudget.id);
    });
  }

  deleteCategoryBudget(id: string): void {
    this._guard("delete category budget", () => {
      this._db.prepare<[string]>("DELETE FROM category_budgets WHERE id = ?").run(id);
    });
  }

  getCategoryBudget(budgetId: string, categoryId: string): CategoryBudget | undefined {
    return this._guard("get category budget", () => {
      const row = this._db
        .prepare<[string, string], CategoryBudgetRow>(
          "SELECT * FROM category_budgets WHERE budget_id = ? AND category_id = ?",
        )
        .get(budgetId, categoryId);
      return row === undefined ? undefined : toCategoryBudget(row);
    });
  }

  listCategoryBudgets(budgetId: string): readonly CategoryBudget[] {
    return this._guard("list category budgets", () =>
      this._db
        .prepare<[string], CategoryBudgetRow>(
          "SELECT * FROM category_budgets WHERE budget_id = ? ORDER BY rowid",
        )
        .all(budgetId)
        .map(toCategoryBudget),
    );
  }

  // ─── Rollover History ───────────────────────────────────────────────

  appendRolloverCalculation(calculation: RolloverCalculation): void {
    this._guard("append rollover calculation", () => {
      this._db
        .prepare<RolloverRow>(
          `INSERT INTO rollover_calculations
             (id, budget_id, category_id, calculated_at, rollover_amount, source_month, reason,
              base_budget, prev_rollover, effective_budget, spent_amount)
           VALUES (@id, @budget_id, @category_id, @calculated_at, @rollover_amount, @source_month,
              @reason, @base_budget, @prev_rollover, @effective_budget, @spent_amount)`,
        )
        .run({
          id: calculation.id,
          budget_id: calculation.budgetId,
          category_id: calculation.categoryId,
          calculated_at: calculation.calculatedAt,
          rollover_amount: calculation.rolloverAmount,
          source_month: calculation.sourceMonth,
          reason: calculation.reason,
          base_budget: calculation.baseBudget,
          prev_rollover: calculation.prevRollover,
          effective_budget: calculation.effectiveBudget,
          spent_amount: calculation.spentAmount,
        });
    });
  }

  listRolloverCalculations(filter?: RolloverHistoryFilter): readonly RolloverCalculation[] {
    return this._guard("list rollover calculations", () =>
      this._db
        .prepare<{ budget_id: string | null; category_id: string | null }, RolloverRow>(
          `SELECT * FROM rollover_calculations
           WHERE (@budget_id IS NULL OR budget_id = @budget_id)
             AND (@category_id IS NULL OR category_id = @category_id)
           ORDER BY seq`,
        )
        .all({
          budget_id: filter?.budgetId ?? null,
          category_id: filter?.categoryId ?? null,
        })
        .map(toRolloverCalculation),
    );
  }

  // ─── Private ────────────────────────────────────────────────────────

  private _insertEntries(entries: readonly Entry[]): void {
    const insert = this._db.prepare<EntryRow>(
      `INSERT INTO entries (id, transaction_id, account_id, amount, is_reportable, position)
       VALUES (@id, @transaction_id, @account_id, @amount, @is_reportable, @position)`,
    );
    entries.forEach((entry, position) => {
      insert.run({
        id: entry.id,
        transaction_id: entry.transactionId,
        account_id: entry.accountId,
        amount: entry.amount,
        is_reportable: flag(entry.isReportable),
        position,
      });
    });
  }

  private _accountRow(account: Account): AccountRow {
    return {
      id: account.id,
      owner_id: account.ownerId,
      name: account.name,
      type: account.type,
      parent_id: account.parentId ?? null,
      active: flag(account.active),
      currency: account.currency,
      created_at: account.createdAt,
    };
  }

  private _transactionRow(transaction: LedgerTransaction): TransactionRow {
    return {
      id: transaction.id,
      owner_id: transaction.ownerId,
      date: transaction.date,
      description: transaction.description,
      notes: transaction.notes ?? null,
      external_id: transaction.externalId ?? null,
      created_at: transaction.createdAt,
      updated_at: transaction.updatedAt,
      deleted_at: transaction.deletedAt ?? null,
    };
  }

  private _budgetRow(budget: Budget): BudgetRow {
    return {
      id: budget.id,
      user_id: budget.userId,
      year_month: budget.yearMonth,
      rollover_last_calculated: budget.rolloverLastCalculated ?? null,
      rollover_needs_recalc: flag(budget.rolloverNeedsRecalc),
      created_at: budget.createdAt,
    };
  }

  private _categoryBudgetRow(cb: CategoryBudget): CategoryBudgetRow {
    return {
      id: cb.id,
      budget_id: cb.budgetId,
      category_id: cb.categoryId,
      budget_amount: cb.budgetAmount,
      rollover_enabled: flag(cb.rolloverEnabled),
      rollover_amount: cb.rolloverAmount,
    };
  }

  private _assertChanged(changes: number, label: string, id: string): void {
    if (changes === 0) {
      throw new StoreError("ROW_NOT_FOUND", `${label} not found: "${id}"`);
    }
  }

  private _guard<T>(operation: string, fn: () => T): T {
    if (!this._db.open) {
      throw new StoreError("DATABASE_ERROR", `${operation} failed: store is closed`);
    }
    try {
      return fn();
    } catch (err) {
      throw translate(operation, err);
    }
  }
}

/**
 * Map driver errors onto StoreError. Anything else (domain errors thrown
 * from inside a unit of work) passes through untouched.
 */
function translate(operation: string, err: unknown): unknown {
  if (err instanceof Database.SqliteError) {
    if (err.code === "SQLITE_CONSTRAINT_UNIQUE" || err.code === "SQLITE_CONSTRAINT_PRIMARYKEY") {
      return new StoreError("DUPLICATE_KEY", `${operation}: ${err.message}`, {
        sqliteCode: err.code,
      });
    }
    return new StoreError("DATABASE_ERROR", `${operation} failed: ${err.message}`, {
      sqliteCode: err.code,
    });
  }
  if (err instanceof TypeError && operation === "open database") {
    return new StoreError("DATABASE_ERROR", `${operation} failed: ${err.message}`);
  }
  return err;
}
