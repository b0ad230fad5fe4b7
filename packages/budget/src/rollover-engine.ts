/**
 * @ledgerline/budget — Budget Rollover Engine.
 *
 * Keeps each CategoryBudget.rolloverAmount equal to what the previous
 * month left over (or overspent), and propagates changes forward.
 *
 *   rollover(M) = (budget(M-1) + rollover(M-1)) - spend(M-1)
 *
 * The dependency between months is walked as an ordered work list:
 * budgets after the changed month, ascending, each month reading only
 * the already-committed state of the month before it.
 *
 * Rules:
 * - One unit of work per month; the walk itself is not one unit
 * - A failed month is rolled back, left flagged needsRecalc, and the
 *   walk moves on
 * - Stored rollovers are rewritten only when they move by more than 0.01
 * - Every computation with a previous allocation appends one history row
 */

import { randomUUID } from "node:crypto";
import pino from "pino";
import type { Logger } from "pino";
import type { FinanceStore } from "@ledgerline/store";
import type {
  Budget,
  RolloverCalculation,
  RolloverReason,
  RolloverStatus,
  YearMonth,
} from "@ledgerline/types";
import {
  CENT_UNITS,
  absUnits,
  formatAmount,
  monthBounds,
  parseAmount,
} from "@ledgerline/ledger";
import type { SpendAggregator } from "@ledgerline/ledger";
import { assertYearMonth, previousMonth } from "./year-month.js";
import type {
  CategoryRollover,
  ChainResult,
  MonthOutcome,
  RolloverNotifier,
  RolloverResult,
  RolloverUpdateEvent,
} from "./types.js";
import { BudgetError } from "./types.js";

export interface RolloverEngineOptions {
  readonly notifier?: RolloverNotifier | undefined;
  readonly logger?: Logger | undefined;
  readonly clock?: (() => Date) | undefined;
}

export interface RolloverHistoryQuery {
  readonly yearMonth?: YearMonth | undefined;
  readonly categoryId?: string | undefined;
}

/** Largest change of a stored rollover that is not written back. */
const REWRITE_THRESHOLD_UNITS = CENT_UNITS;

export class RolloverEngine {
  private readonly _store: FinanceStore;
  private readonly _spend: SpendAggregator;
  private readonly _notifier: RolloverNotifier | undefined;
  private readonly _logger: Logger;
  private readonly _clock: () => Date;
  /** Earliest changed month of a walk that never started, per user */
  private readonly _deferred = new Map<string, YearMonth>();

  constructor(store: FinanceStore, spend: SpendAggregator, options?: RolloverEngineOptions) {
    this._store = store;
    this._spend = spend;
    this._notifier = options?.notifier;
    this._logger = options?.logger ?? pino({ level: "silent" });
    this._clock = options?.clock ?? (() => new Date());
  }

  // ─── Single category ─────────────────────────────────────────────────

  /**
   * Rollover carried into `yearMonth` for one category.
   *
   * Zero when the previous month has no budget or no allocation for the
   * category. Otherwise the previous month's effective budget minus its
   * spend, or zero when that month's allocation has rollover disabled.
   *
   * Reads the previous month's stored rolloverAmount as-is; callers
   * walking several months must go in ascending order.
   */
  calculateRollover(
    userId: string,
    categoryId: string,
    yearMonth: YearMonth,
    reason: RolloverReason = "manual",
  ): RolloverResult {
    const month = assertYearMonth(yearMonth);
    const sourceMonth = previousMonth(month);

    const prevBudget = this._store.findBudget(userId, sourceMonth);
    const prev =
      prevBudget === undefined
        ? undefined
        : this._store.getCategoryBudget(prevBudget.id, categoryId);
    if (prev === undefined) {
      return { categoryId, yearMonth: month, sourceMonth, rolloverAmount: formatAmount(0n) };
    }

    const effective = parseAmount(prev.budgetAmount) + parseAmount(prev.rolloverAmount);
    const { start, end } = monthBounds(sourceMonth);
    const spent = this._spend.spendUnits(userId, categoryId, start, end);
    const rollover = prev.rolloverEnabled ? effective - spent : 0n;

    const target = this._store.findBudget(userId, month);
    if (target === undefined) {
      return { categoryId, yearMonth: month, sourceMonth, rolloverAmount: formatAmount(rollover) };
    }

    const calculation: RolloverCalculation = {
      id: randomUUID(),
      budgetId: target.id,
      categoryId,
      calculatedAt: this._clock().toISOString(),
      rolloverAmount: formatAmount(rollover),
      sourceMonth,
      reason,
      baseBudget: formatAmount(parseAmount(prev.budgetAmount)),
      prevRollover: formatAmount(parseAmount(prev.rolloverAmount)),
      effectiveBudget: formatAmount(effective),
      spentAmount: formatAmount(spent),
    };
    this._store.appendRolloverCalculation(calculation);

    return {
      categoryId,
      yearMonth: month,
      sourceMonth,
      rolloverAmount: calculation.rolloverAmount,
      calculationId: calculation.id,
    };
  }

  // ─── Chain walk ──────────────────────────────────────────────────────

  /**
   * Recompute every budget of the user after `changedMonth`, oldest
   * first. Never throws for a failing month; see ChainResult.failedMonths.
   *
   * When the budgets cannot even be listed, the walk is deferred: later
   * months are flagged where possible and retryStaleMonths() restarts
   * from `changedMonth`.
   */
  invalidateAndRecomputeChain(
    userId: string,
    changedMonth: YearMonth,
    reason: RolloverReason,
  ): ChainResult {
    const from = assertYearMonth(changedMonth);

    let budgets: readonly Budget[];
    try {
      budgets = this._store.listBudgetsAfter(userId, from);
    } catch (err) {
      return this._deferWalk(userId, from, reason, err);
    }
    this._clearDeferred(userId, from);

    const months = budgets.map((budget) => this._recomputeAndNotify(budget, reason));
    const result = this._chainResult(userId, from, reason, months);

    this._logger.info(
      {
        userId,
        changedMonth: from,
        reason,
        months: months.length,
        failed: result.failedMonths.length,
      },
      "rollover chain recomputed",
    );
    return result;
  }

  /**
   * Recompute one month, then the chain after it. Months after the
   * recomputed one are recorded as chain_propagation.
   */
  recalculateMonth(
    userId: string,
    yearMonth: YearMonth,
    reason: RolloverReason = "manual",
  ): ChainResult {
    const month = assertYearMonth(yearMonth);
    const budget = this._store.findBudget(userId, month);
    if (budget === undefined) {
      throw new BudgetError("BUDGET_NOT_FOUND", `No budget for ${month}`, { yearMonth: month });
    }

    const own = this._recomputeAndNotify(budget, reason);
    const chain = this.invalidateAndRecomputeChain(userId, month, "chain_propagation");
    return this._chainResult(userId, month, reason, [own, ...chain.months]);
  }

  /**
   * Re-run the chain from the month before the earliest budget still
   * flagged needsRecalc, or from an earlier deferred walk. Returns
   * undefined when nothing is stale.
   */
  retryStaleMonths(userId: string): ChainResult | undefined {
    const stale = this._store.listBudgets(userId).find((b) => b.rolloverNeedsRecalc);
    const candidates = [
      this._deferred.get(userId),
      stale === undefined ? undefined : previousMonth(stale.yearMonth),
    ].filter((m): m is YearMonth => m !== undefined);
    if (candidates.length === 0) return undefined;
    const from = candidates.reduce((a, b) => (b < a ? b : a));
    return this.invalidateAndRecomputeChain(userId, from, "manual");
  }

  getRolloverStatus(budget: Budget): RolloverStatus {
    return {
      lastCalculated: budget.rolloverLastCalculated,
      needsRecalc: budget.rolloverNeedsRecalc,
    };
  }

  /**
   * History rows of the user's budgets, oldest first.
   */
  getRolloverHistory(userId: string, query?: RolloverHistoryQuery): readonly RolloverCalculation[] {
    if (query?.yearMonth !== undefined) {
      const month = assertYearMonth(query.yearMonth);
      const budget = this._store.findBudget(userId, month);
      if (budget === undefined) {
        throw new BudgetError("BUDGET_NOT_FOUND", `No budget for ${month}`, { yearMonth: month });
      }
      return this._store.listRolloverCalculations({
        budgetId: budget.id,
        categoryId: query.categoryId,
      });
    }

    const owned = new Set(this._store.listBudgets(userId).map((b) => b.id));
    return this._store
      .listRolloverCalculations({ categoryId: query?.categoryId })
      .filter((row) => owned.has(row.budgetId));
  }

  // ─── Per month ───────────────────────────────────────────────────────

  private _recomputeAndNotify(budget: Budget, reason: RolloverReason): MonthOutcome {
    const outcome = this._recomputeMonth(budget, reason);
    this._notify({
      userId: budget.userId,
      yearMonth: budget.yearMonth,
      status: outcome.status,
      reason,
      categories: outcome.categories,
    });
    return outcome;
  }

  private _recomputeMonth(budget: Budget, reason: RolloverReason): MonthOutcome {
    try {
      const categories = this._store.runInTransaction(() => {
        this._store.updateBudget({ ...budget, rolloverNeedsRecalc: true });

        const results: CategoryRollover[] = [];
        for (const categoryBudget of this._store.listCategoryBudgets(budget.id)) {
          const { rolloverAmount } = this.calculateRollover(
            budget.userId,
            categoryBudget.categoryId,
            budget.yearMonth,
            reason,
          );
          const delta = parseAmount(rolloverAmount) - parseAmount(categoryBudget.rolloverAmount);
          const changed = absUnits(delta) > REWRITE_THRESHOLD_UNITS;
          if (changed) {
            this._store.updateCategoryBudget({ ...categoryBudget, rolloverAmount });
          }
          results.push({
            categoryId: categoryBudget.categoryId,
            previous: categoryBudget.rolloverAmount,
            rolloverAmount,
            changed,
          });
        }

        this._store.updateBudget({
          ...budget,
          rolloverNeedsRecalc: false,
          rolloverLastCalculated: this._clock().toISOString(),
        });
        return results;
      });

      return {
        yearMonth: budget.yearMonth,
        budgetId: budget.id,
        status: categories.some((c) => c.changed) ? "updated" : "unchanged",
        categories,
      };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this._logger.error(
        { err, userId: budget.userId, yearMonth: budget.yearMonth, budgetId: budget.id, reason },
        "rollover recompute failed, month left stale",
      );
      this._flagStale(budget);
      return {
        yearMonth: budget.yearMonth,
        budgetId: budget.id,
        status: "failed",
        categories: [],
        error: message,
      };
    }
  }

  /** Mark a month stale in its own unit, after the failed one rolled back. */
  private _flagStale(budget: Budget): void {
    try {
      this._store.runInTransaction(() => {
        const current = this._store.getBudget(budget.id) ?? budget;
        this._store.updateBudget({ ...current, rolloverNeedsRecalc: true });
      });
    } catch (err) {
      this._logger.error(
        { err, budgetId: budget.id, yearMonth: budget.yearMonth },
        "could not flag month for recalculation",
      );
    }
  }

  // ─── Deferred walks ──────────────────────────────────────────────────

  private _deferWalk(
    userId: string,
    from: YearMonth,
    reason: RolloverReason,
    err: unknown,
  ): ChainResult {
    const message = err instanceof Error ? err.message : String(err);
    this._logger.error(
      { err, userId, changedMonth: from, reason },
      "rollover chain could not list budgets, walk deferred",
    );

    const earlier = this._deferred.get(userId);
    this._deferred.set(userId, earlier !== undefined && earlier < from ? earlier : from);

    let flagged: Budget[] = [];
    try {
      flagged = this._store.listBudgets(userId).filter((b) => b.yearMonth > from);
    } catch (listErr) {
      this._logger.error({ err: listErr, userId }, "could not flag months for recalculation");
    }
    for (const budget of flagged) this._flagStale(budget);

    return { ...this._chainResult(userId, from, reason, []), error: message };
  }

  private _clearDeferred(userId: string, from: YearMonth): void {
    const deferred = this._deferred.get(userId);
    if (deferred !== undefined && from <= deferred) this._deferred.delete(userId);
  }

  private _notify(event: RolloverUpdateEvent): void {
    if (this._notifier === undefined) return;
    try {
      const pending = this._notifier.monthUpdated(event);
      if (pending instanceof Promise) {
        void pending.catch((err: unknown) => {
          this._logNotifyFailure(err, event);
        });
      }
    } catch (err) {
      this._logNotifyFailure(err, event);
    }
  }

  private _logNotifyFailure(err: unknown, event: RolloverUpdateEvent): void {
    this._logger.warn(
      { err, userId: event.userId, yearMonth: event.yearMonth },
      "rollover notification dropped",
    );
  }

  private _chainResult(
    userId: string,
    changedMonth: YearMonth,
    reason: RolloverReason,
    months: readonly MonthOutcome[],
  ): ChainResult {
    return {
      userId,
      changedMonth,
      reason,
      months,
      failedMonths: months.filter((m) => m.status === "failed").map((m) => m.yearMonth),
    };
  }
}
