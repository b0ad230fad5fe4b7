/**
 * FinanceService — Composition root for all domain packages.
 *
 * Route handlers delegate to this service and to the domain objects it
 * exposes. It wires the journal's change hook to the rollover engine and
 * the engine's notifier to the update hub, so every committed journal
 * write re-walks the owner's later budgets.
 */

import pino from "pino";
import type { Logger } from "pino";
import type { FinanceStore } from "@ledgerline/store";
import type {
  Account,
  Amount,
  CategoryBudget,
  Party,
  PartyKind,
  TransactionWithEntries,
  YearMonth,
} from "@ledgerline/types";
import {
  AccountRegistry,
  LedgerError,
  LedgerJournal,
  LedgerSpendSource,
  LegacySpendSource,
  SpendAggregator,
  buildExpensePostings,
  buildSharedExpensePostings,
  buildSplitPostings,
  buildTransferPostings,
} from "@ledgerline/ledger";
import type { AccountBalance, EntryInput, TransactionPatch } from "@ledgerline/ledger";
import { BudgetError, BudgetService, RolloverEngine } from "@ledgerline/budget";
import type { BudgetAlert, BudgetAlertSummary, CategoryBudgetPatch } from "@ledgerline/budget";
import { RolloverUpdateHub } from "./rollover-update-hub.js";

// =============================================================================
// Configuration
// =============================================================================

export interface FinanceServiceConfig {
  readonly store: FinanceStore;
  readonly defaultCurrency?: string | undefined;
  readonly alertWarningPercent?: number | undefined;
  readonly seedDefaultAccounts?: boolean | undefined;
  readonly logger?: Logger | undefined;
  readonly clock?: (() => Date) | undefined;
}

/** Adapter input for POST /transactions/simple, one variant per kind. */
export type SimpleTransactionInput = {
  readonly description: string;
  readonly date: string;
  readonly notes?: string | undefined;
  readonly sourceAccountId: string;
} & (
  | { readonly kind: "expense"; readonly categoryId: string; readonly amount: Amount }
  | { readonly kind: "transfer"; readonly destinationAccountId: string; readonly amount: Amount }
  | {
      readonly kind: "split";
      readonly splits: readonly { readonly categoryId: string; readonly amount: Amount }[];
    }
  | {
      readonly kind: "shared";
      readonly categoryId: string;
      readonly reimbursableAccountId: string;
      readonly amount: Amount;
      readonly share: { readonly method: "FIXED" | "PERCENTAGE" | "EQUAL"; readonly value: string };
    }
);

export interface CreatedParty {
  readonly party: Party;
  readonly accounts: readonly Account[];
}

// =============================================================================
// Service
// =============================================================================

export class FinanceService {
  readonly store: FinanceStore;
  readonly accounts: AccountRegistry;
  readonly journal: LedgerJournal;
  readonly spend: SpendAggregator;
  readonly engine: RolloverEngine;
  readonly budgets: BudgetService;
  readonly hub: RolloverUpdateHub;

  private readonly _logger: Logger;
  private readonly _alertWarningPercent: number | undefined;
  private readonly _seedDefaultAccounts: boolean;

  constructor(config: FinanceServiceConfig) {
    const logger = config.logger ?? pino({ level: "silent" });
    const clock = config.clock;

    this._logger = logger;
    this._alertWarningPercent = config.alertWarningPercent;
    this._seedDefaultAccounts = config.seedDefaultAccounts ?? true;

    this.store = config.store;
    this.accounts = new AccountRegistry(this.store, {
      defaultCurrency: config.defaultCurrency,
      clock,
    });
    this.spend = new SpendAggregator(this.accounts, [
      new LedgerSpendSource(this.store),
      new LegacySpendSource(this.store),
    ]);
    this.hub = new RolloverUpdateHub({ logger: logger.child({ component: "hub" }) });
    this.engine = new RolloverEngine(this.store, this.spend, {
      notifier: this.hub,
      logger: logger.child({ component: "rollover" }),
      clock,
    });

    const engine = this.engine;
    this.journal = new LedgerJournal(this.store, this.accounts, {
      hooks: {
        onTransactionChanged(ownerId, yearMonth, reason) {
          engine.invalidateAndRecomputeChain(ownerId, yearMonth, reason);
        },
      },
      logger: logger.child({ component: "journal" }),
      clock,
    });
    this.budgets = new BudgetService(this.store, this.accounts, this.spend, this.engine, {
      logger: logger.child({ component: "budget" }),
      clock,
    });
  }

  // ─── Parties & Accounts ──────────────────────────────────────────────

  createParty(name: string, kind?: PartyKind, seedDefaultAccounts?: boolean): CreatedParty {
    const party = this.accounts.createParty(name, kind);
    const seeded = seedDefaultAccounts ?? this._seedDefaultAccounts;
    const accounts = seeded ? this.accounts.seedDefaultAccounts(party.id) : [];
    this._logger.info({ partyId: party.id, seeded: accounts.length }, "party created");
    return { party, accounts };
  }

  getAccountBalance(ownerId: string, accountId: string): AccountBalance {
    this.accounts.assertOwnedAccount(ownerId, accountId);
    return this.journal.getAccountBalance(accountId);
  }

  // ─── Transactions ────────────────────────────────────────────────────

  /**
   * Build balanced entries for a one-sided description and record them.
   */
  recordSimpleTransaction(ownerId: string, input: SimpleTransactionInput): TransactionWithEntries {
    let entries: EntryInput[];
    switch (input.kind) {
      case "expense":
        entries = buildExpensePostings(input.sourceAccountId, input.categoryId, input.amount);
        break;
      case "transfer":
        entries = buildTransferPostings(
          input.sourceAccountId,
          input.destinationAccountId,
          input.amount,
        );
        break;
      case "split":
        entries = buildSplitPostings(input.sourceAccountId, input.splits);
        break;
      case "shared":
        entries = buildSharedExpensePostings(
          input.sourceAccountId,
          input.categoryId,
          input.reimbursableAccountId,
          input.amount,
          input.share,
        );
        break;
    }
    return this.journal.recordTransaction(ownerId, input.description, input.date, entries, {
      notes: input.notes,
    });
  }

  /**
   * A transaction of this owner. Another owner's transaction is
   * reported as missing.
   */
  getOwnedTransaction(ownerId: string, id: string): TransactionWithEntries {
    const found = this.journal.getTransaction(id);
    if (found === undefined || found.transaction.ownerId !== ownerId) {
      throw new LedgerError("TRANSACTION_NOT_FOUND", `Transaction not found: "${id}"`, {
        transactionId: id,
      });
    }
    return found;
  }

  updateTransaction(ownerId: string, id: string, patch: TransactionPatch): TransactionWithEntries {
    this.getOwnedTransaction(ownerId, id);
    return this.journal.updateTransaction(id, patch);
  }

  deleteTransaction(ownerId: string, id: string, hard: boolean): void {
    this.getOwnedTransaction(ownerId, id);
    this.journal.deleteTransaction(id, { hard });
  }

  // ─── Budgets ─────────────────────────────────────────────────────────

  /**
   * Update the category's allocation, or add one when the month has none
   * for it yet (then budgetAmount is required).
   */
  putCategoryBudget(
    userId: string,
    yearMonth: YearMonth,
    categoryId: string,
    patch: CategoryBudgetPatch,
  ): CategoryBudget {
    const { categories } = this.budgets.getBudget(userId, yearMonth);
    if (categories.some((c) => c.categoryId === categoryId)) {
      return this.budgets.updateCategoryBudget(userId, yearMonth, categoryId, patch);
    }
    if (patch.budgetAmount === undefined) {
      throw new BudgetError(
        "CATEGORY_BUDGET_NOT_FOUND",
        `Category "${categoryId}" is not budgeted for ${yearMonth}; give budgetAmount to add it`,
        { categoryId, yearMonth },
      );
    }
    return this.budgets.addCategoryBudget(userId, yearMonth, {
      categoryId,
      budgetAmount: patch.budgetAmount,
      rolloverEnabled: patch.rolloverEnabled,
    });
  }

  getBudgetAlerts(userId: string, yearMonth: YearMonth, warningPercent?: number): readonly BudgetAlert[] {
    return this.budgets.getBudgetAlerts(userId, yearMonth, {
      warningPercent: warningPercent ?? this._alertWarningPercent,
    });
  }

  getBudgetAlertSummary(
    userId: string,
    yearMonth: YearMonth,
    warningPercent?: number,
  ): BudgetAlertSummary {
    return this.budgets.getBudgetAlertSummary(userId, yearMonth, {
      warningPercent: warningPercent ?? this._alertWarningPercent,
    });
  }

  // ─── Lifecycle ───────────────────────────────────────────────────────

  isReady(): boolean {
    return !this.hub.closed && this.store.isHealthy();
  }

  close(): void {
    this.hub.close();
    this.store.close();
  }
}
