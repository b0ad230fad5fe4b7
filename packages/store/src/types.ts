/**
 * @ledgerline/store — Persistence contracts.
 *
 * Defines the repositories the ledger and budget packages read and write,
 * and the unit-of-work primitive they commit through.
 *
 * Design principles:
 * - Records are immutable values; updates replace the whole record
 * - Everything written inside runInTransaction() commits together
 * - Rollover history is insert-only (no update, no delete)
 * - Persistence failures surface as StoreError, never raw driver errors
 */

import { FinanceError } from "@ledgerline/types";
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

// =============================================================================
// Repositories
// =============================================================================

export interface PartyRepository {
  insertParty(party: Party): void;
  getParty(id: string): Party | undefined;
}

export interface AccountRepository {
  insertAccount(account: Account): void;
  updateAccount(account: Account): void;
  getAccount(id: string): Account | undefined;
  /** All accounts of an owner, active or not, in creation order */
  listAccounts(ownerId: string): readonly Account[];
}

/**
 * An entry joined with the transaction it belongs to.
 */
export interface Posting {
  readonly entry: Entry;
  readonly transaction: LedgerTransaction;
}

export interface JournalRepository {
  insertTransaction(transaction: LedgerTransaction, entries: readonly Entry[]): void;
  updateTransaction(transaction: LedgerTransaction): void;
  /** Replace every entry of a transaction */
  replaceEntries(transactionId: string, entries: readonly Entry[]): void;
  /** Remove a transaction and its entries */
  deleteTransaction(id: string): void;
  getTransaction(id: string): LedgerTransaction | undefined;
  getEntries(transactionId: string): readonly Entry[];
  /** Every transaction of an owner (deleted included), ordered by date */
  listTransactions(ownerId: string): readonly LedgerTransaction[];
  /** Postings on one account, deleted transactions included */
  listPostings(accountId: string): readonly Posting[];
}

export interface LegacyTransactionRepository {
  insertLegacyTransaction(row: LegacyTransaction): void;
  listLegacyTransactions(ownerId: string, categoryId: string): readonly LegacyTransaction[];
}

export interface BudgetRepository {
  insertBudget(budget: Budget): void;
  updateBudget(budget: Budget): void;
  getBudget(id: string): Budget | undefined;
  findBudget(userId: string, yearMonth: YearMonth): Budget | undefined;
  /** Ascending by yearMonth */
  listBudgets(userId: string): readonly Budget[];
  /** Budgets with yearMonth strictly after the given month, ascending */
  listBudgetsAfter(userId: string, yearMonth: YearMonth): readonly Budget[];

  insertCategoryBudget(categoryBudget: CategoryBudget): void;
  updateCategoryBudget(categoryBudget: CategoryBudget): void;
  deleteCategoryBudget(id: string): void;
  getCategoryBudget(budgetId: string, categoryId: string): CategoryBudget | undefined;
  listCategoryBudgets(budgetId: string): readonly CategoryBudget[];
}

export interface RolloverHistoryFilter {
  readonly budgetId?: string | undefined;
  readonly categoryId?: string | undefined;
}

export interface RolloverHistoryRepository {
  appendRolloverCalculation(calculation: RolloverCalculation): void;
  /** Oldest first */
  listRolloverCalculations(filter?: RolloverHistoryFilter): readonly RolloverCalculation[];
}

// =============================================================================
// Store
// =============================================================================

export interface FinanceStore
  extends PartyRepository,
    AccountRepository,
    JournalRepository,
    LegacyTransactionRepository,
    BudgetRepository,
    RolloverHistoryRepository {
  /**
   * Run `work` as one unit. If it throws, nothing it wrote stays visible
   * and the error is rethrown. Nested calls join the enclosing unit.
   */
  runInTransaction<T>(work: () => T): T;

  /** True when the backing storage answers queries */
  isHealthy(): boolean;

  close(): void;
}

// =============================================================================
// Errors
// =============================================================================

export type StoreErrorCode =
  | "DATABASE_ERROR"
  | "DUPLICATE_KEY"
  | "ROW_NOT_FOUND"
  | "CORRUPT_ROW";

export class StoreError extends FinanceError {
  declare public readonly code: StoreErrorCode;

  constructor(
    code: StoreErrorCode,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super(code, code === "DUPLICATE_KEY" ? "conflict" : "database", message, details);
    this.name = "StoreError";
  }
}
