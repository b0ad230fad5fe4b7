/**
 * @ledgerline/budget — Budget Service.
 *
 * Monthly category allocations per user. Every write that can move a
 * rollover hands off to the RolloverEngine:
 *
 * - createBudget / copyBudget — own month computed (creation), then the
 *   months after it
 * - addCategoryBudget — the new allocation's rollover computed in place,
 *   then the months after it
 * - updateCategoryBudget / removeCategoryBudget — the months after it
 *
 * Reads derive effective budget, spend, and status on demand; only
 * rolloverAmount is cached.
 */

import { randomUUID } from "node:crypto";
import pino from "pino";
import type { Logger } from "pino";
import type { FinanceStore } from "@ledgerline/store";
import type { Budget, CategoryBudget, RolloverStatus, YearMonth } from "@ledgerline/types";
import { isFinanceError } from "@ledgerline/types";
import { formatAmount, monthBounds, parseAmount } from "@ledgerline/ledger";
import type { AccountRegistry, SpendAggregator } from "@ledgerline/ledger";
import type { RolloverEngine } from "./rollover-engine.js";
import {
  ALERT_SUMMARY_LIMIT,
  DEFAULT_WARNING_PERCENT,
  OVER_BUDGET_PERCENT,
  healthOf,
  overallStatusOf,
  recommendationsFor,
  usageOf,
} from "./status.js";
import { assertYearMonth } from "./year-month.js";
import type {
  AlertOptions,
  BudgetAlert,
  BudgetAlertSummary,
  BudgetDetails,
  BudgetWithCategories,
  CategoryBudgetInput,
  CategoryBudgetPatch,
  CategoryBudgetStatus,
} from "./types.js";
import { BudgetError } from "./types.js";

export interface BudgetServiceOptions {
  readonly logger?: Logger | undefined;
  readonly clock?: (() => Date) | undefined;
}

export class BudgetService {
  private readonly _store: FinanceStore;
  private readonly _accounts: AccountRegistry;
  private readonly _spend: SpendAggregator;
  private readonly _engine: RolloverEngine;
  private readonly _logger: Logger;
  private readonly _clock: () => Date;

  constructor(
    store: FinanceStore,
    accounts: AccountRegistry,
    spend: SpendAggregator,
    engine: RolloverEngine,
    options?: BudgetServiceOptions,
  ) {
    this._store = store;
    this._accounts = accounts;
    this._spend = spend;
    this._engine = engine;
    this._logger = options?.logger ?? pino({ level: "silent" });
    this._clock = options?.clock ?? (() => new Date());
  }

  // ─── Writes ──────────────────────────────────────────────────────────

  /**
   * Create the budget for one month.
   *
   * Validation (before any write):
   * 1. User exists
   * 2. Month is YYYY-MM
   * 3. Each category is an expense account of the user, listed once
   * 4. Amounts are non-negative decimals
   * 5. No budget exists yet for (user, month)
   */
  createBudget(
    userId: string,
    yearMonth: YearMonth,
    categories: readonly CategoryBudgetInput[],
  ): BudgetWithCategories {
    this._accounts.assertParty(userId);
    const month = assertYearMonth(yearMonth);
    const inputs = this._validateInputs(userId, categories);

    if (this._store.findBudget(userId, month) !== undefined) {
      throw new BudgetError("BUDGET_EXISTS", `A budget for ${month} already exists`, {
        yearMonth: month,
      });
    }

    const now = this._clock().toISOString();
    const budget: Budget = {
      id: randomUUID(),
      userId,
      yearMonth: month,
      rolloverNeedsRecalc: false,
      rolloverLastCalculated: now,
      createdAt: now,
    };

    this._store.runInTransaction(() => {
      this._store.insertBudget(budget);
      for (const input of inputs) {
        const { rolloverAmount } = this._engine.calculateRollover(
          userId,
          input.categoryId,
          month,
          "creation",
        );
        this._store.insertCategoryBudget({
          id: randomUUID(),
          budgetId: budget.id,
          categoryId: input.categoryId,
          budgetAmount: input.budgetAmount,
          rolloverEnabled: input.rolloverEnabled ?? false,
          rolloverAmount,
        });
      }
    });

    this._logger.info(
      { userId, yearMonth: month, budgetId: budget.id, categories: inputs.length },
      "budget created",
    );

    this._engine.invalidateAndRecomputeChain(userId, month, "chain_propagation");
    return this.getBudget(userId, month);
  }

  /**
   * Create `toMonth`'s budget with the same allocations and rollover
   * flags as `fromMonth`.
   */
  copyBudget(userId: string, fromMonth: YearMonth, toMonth: YearMonth): BudgetWithCategories {
    const source = this.getBudget(userId, fromMonth);
    return this.createBudget(
      userId,
      toMonth,
      source.categories.map((c) => ({
        categoryId: c.categoryId,
        budgetAmount: c.budgetAmount,
        rolloverEnabled: c.rolloverEnabled,
      })),
    );
  }

  addCategoryBudget(
    userId: string,
    yearMonth: YearMonth,
    input: CategoryBudgetInput,
  ): CategoryBudget {
    const budget = this._requireBudget(userId, yearMonth);
    const validated = this._validateInput(userId, input);
    if (this._store.getCategoryBudget(budget.id, validated.categoryId) !== undefined) {
      throw new BudgetError(
        "CATEGORY_BUDGET_EXISTS",
        `Category "${validated.categoryId}" is already budgeted for ${budget.yearMonth}`,
        { yearMonth: budget.yearMonth, categoryId: validated.categoryId },
      );
    }

    const categoryBudget = this._store.runInTransaction(() => {
      const { rolloverAmount } = this._engine.calculateRollover(
        userId,
        validated.categoryId,
        budget.yearMonth,
        "budget_edit",
      );
      const row: CategoryBudget = {
        id: randomUUID(),
        budgetId: budget.id,
        categoryId: validated.categoryId,
        budgetAmount: validated.budgetAmount,
        rolloverEnabled: validated.rolloverEnabled ?? false,
        rolloverAmount,
      };
      this._store.insertCategoryBudget(row);
      return row;
    });

    this._engine.invalidateAndRecomputeChain(userId, budget.yearMonth, "budget_edit");
    return categoryBudget;
  }

  /**
   * Change a category's allocation or rollover flag. Its own rollover is
   * unaffected; the months after it are recomputed.
   */
  updateCategoryBudget(
    userId: string,
    yearMonth: YearMonth,
    categoryId: string,
    patch: CategoryBudgetPatch,
  ): CategoryBudget {
    const budget = this._requireBudget(userId, yearMonth);
    const current = this._requireCategoryBudget(budget, categoryId);

    const updated: CategoryBudget = {
      ...current,
      budgetAmount:
        patch.budgetAmount === undefined
          ? current.budgetAmount
          : this._validateAmount(patch.budgetAmount, categoryId),
      rolloverEnabled: patch.rolloverEnabled ?? current.rolloverEnabled,
    };

    this._store.runInTransaction(() => {
      this._store.updateCategoryBudget(updated);
    });

    this._logger.debug(
      { userId, yearMonth: budget.yearMonth, categoryId },
      "category budget updated",
    );

    this._engine.invalidateAndRecomputeChain(userId, budget.yearMonth, "budget_edit");
    return updated;
  }

  removeCategoryBudget(userId: string, yearMonth: YearMonth, categoryId: string): void {
    const budget = this._requireBudget(userId, yearMonth);
    const current = this._requireCategoryBudget(budget, categoryId);

    this._store.runInTransaction(() => {
      this._store.deleteCategoryBudget(current.id);
    });

    this._engine.invalidateAndRecomputeChain(userId, budget.yearMonth, "budget_edit");
  }

  // ─── Reads ───────────────────────────────────────────────────────────

  getBudget(userId: string, yearMonth: YearMonth): BudgetWithCategories {
    const budget = this._requireBudget(userId, yearMonth);
    return { budget, categories: this._store.listCategoryBudgets(budget.id) };
  }

  /** Ascending by month */
  listBudgets(userId: string): readonly BudgetWithCategories[] {
    return this._store.listBudgets(userId).map((budget) => ({
      budget,
      categories: this._store.listCategoryBudgets(budget.id),
    }));
  }

  getRolloverStatus(userId: string, yearMonth: YearMonth): RolloverStatus {
    return this._engine.getRolloverStatus(this._requireBudget(userId, yearMonth));
  }

  /**
   * Per-category effective budget, spend and status, with month totals.
   */
  getBudgetDetails(userId: string, yearMonth: YearMonth): BudgetDetails {
    const budget = this._requireBudget(userId, yearMonth);
    const { start, end } = monthBounds(budget.yearMonth);

    let totalBudgeted = 0n;
    let totalEffective = 0n;
    let totalSpent = 0n;
    const categories: CategoryBudgetStatus[] = [];

    for (const row of this._store.listCategoryBudgets(budget.id)) {
      const base = parseAmount(row.budgetAmount);
      const effective = base + parseAmount(row.rolloverAmount);
      const spent = this._spend.spendUnits(userId, row.categoryId, start, end);
      const usage = usageOf(effective, spent);

      totalBudgeted += base;
      totalEffective += effective;
      totalSpent += spent;

      categories.push({
        categoryId: row.categoryId,
        categoryName: this._categoryName(row.categoryId),
        budgetAmount: formatAmount(base),
        rolloverAmount: formatAmount(parseAmount(row.rolloverAmount)),
        rolloverEnabled: row.rolloverEnabled,
        effectiveBudget: formatAmount(effective),
        spentAmount: formatAmount(spent),
        remainingAmount: formatAmount(effective - spent),
        percentUsed: usage.percentUsed,
        status: usage.status,
      });
    }

    return {
      budget,
      categories,
      totalBudgeted: formatAmount(totalBudgeted),
      totalEffective: formatAmount(totalEffective),
      totalSpent: formatAmount(totalSpent),
      totalRemaining: formatAmount(totalEffective - totalSpent),
      overallStatus: overallStatusOf(categories.length, totalEffective, totalSpent),
    };
  }

  /**
   * Categories at or past the warning threshold of their effective
   * budget. Over-budget alerts come first.
   */
  getBudgetAlerts(userId: string, yearMonth: YearMonth, options?: AlertOptions): readonly BudgetAlert[] {
    const warningPercent = options?.warningPercent ?? DEFAULT_WARNING_PERCENT;
    const details = this.getBudgetDetails(userId, yearMonth);

    const alerts: BudgetAlert[] = [];
    for (const category of details.categories) {
      const over = category.percentUsed >= OVER_BUDGET_PERCENT;
      if (!over && category.percentUsed < warningPercent) continue;
      alerts.push({
        type: over ? "over_budget" : "approaching_limit",
        severity: over ? "high" : "medium",
        budgetId: details.budget.id,
        yearMonth: details.budget.yearMonth,
        categoryId: category.categoryId,
        categoryName: category.categoryName,
        message: over
          ? `${category.categoryName} is over budget`
          : `${category.categoryName} is approaching budget limit`,
        effectiveBudget: category.effectiveBudget,
        spentAmount: category.spentAmount,
        remainingAmount: category.remainingAmount,
        percentUsed: category.percentUsed,
      });
    }

    const rank = (alert: BudgetAlert): number => (alert.severity === "high" ? 0 : 1);
    return alerts.sort((a, b) => rank(a) - rank(b));
  }

  /**
   * Counts of the month's allocations by alert level, an overall
   * health grade, and the most severe alerts.
   */
  getBudgetAlertSummary(
    userId: string,
    yearMonth: YearMonth,
    options?: AlertOptions,
  ): BudgetAlertSummary {
    const month = assertYearMonth(yearMonth);
    const tracked = this._store.listCategoryBudgets(this._requireBudget(userId, month).id).length;
    const alerts = this.getBudgetAlerts(userId, month, options);

    const over = alerts.filter((a) => a.type === "over_budget").length;
    const warning = alerts.length - over;

    return {
      yearMonth: month,
      generatedAt: this._clock().toISOString(),
      totalCategoriesTracked: tracked,
      categoriesOnTrack: tracked - alerts.length,
      categoriesAtWarning: warning,
      categoriesOverBudget: over,
      overallHealth: healthOf(over, warning),
      alerts: alerts.slice(0, ALERT_SUMMARY_LIMIT),
      recommendations: recommendationsFor(over, warning),
    };
  }

  // ─── Internals ───────────────────────────────────────────────────────

  private _requireBudget(userId: string, yearMonth: YearMonth): Budget {
    const month = assertYearMonth(yearMonth);
    const budget = this._store.findBudget(userId, month);
    if (budget === undefined) {
      throw new BudgetError("BUDGET_NOT_FOUND", `No budget for ${month}`, { yearMonth: month });
    }
    return budget;
  }

  private _requireCategoryBudget(budget: Budget, categoryId: string): CategoryBudget {
    const row = this._store.getCategoryBudget(budget.id, categoryId);
    if (row === undefined) {
      throw new BudgetError(
        "CATEGORY_BUDGET_NOT_FOUND",
        `Category "${categoryId}" is not budgeted for ${budget.yearMonth}`,
        { yearMonth: budget.yearMonth, categoryId },
      );
    }
    return row;
  }

  private _validateInputs(
    userId: string,
    inputs: readonly CategoryBudgetInput[],
  ): readonly CategoryBudgetInput[] {
    const seen = new Set<string>();
    return inputs.map((input) => {
      if (seen.has(input.categoryId)) {
        throw new BudgetError("DUPLICATE_CATEGORY", `Category "${input.categoryId}" listed twice`, {
          categoryId: input.categoryId,
        });
      }
      seen.add(input.categoryId);
      return this._validateInput(userId, input);
    });
  }

  private _validateInput(userId: string, input: CategoryBudgetInput): CategoryBudgetInput {
    this._accounts.assertCategory(userId, input.categoryId);
    return { ...input, budgetAmount: this._validateAmount(input.budgetAmount, input.categoryId) };
  }

  private _validateAmount(amount: string, categoryId: string): string {
    let units: bigint;
    try {
      units = parseAmount(amount);
    } catch (err) {
      if (isFinanceError(err)) {
        throw new BudgetError("INVALID_BUDGET_AMOUNT", err.message, { categoryId, amount });
      }
      throw err;
    }
    if (units < 0n) {
      throw new BudgetError("NEGATIVE_BUDGET_AMOUNT", `Budget amount ${amount} is negative`, {
        categoryId,
        amount,
      });
    }
    return formatAmount(units);
  }

  private _categoryName(categoryId: string): string {
    return this._accounts.getAccount(categoryId)?.name ?? categoryId;
  }
}
