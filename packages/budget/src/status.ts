/**
 * @ledgerline/budget — Budget status and alert thresholds.
 *
 * Pure functions over scaled units; no store access.
 */

import { formatAmount, percentOf } from "@ledgerline/ledger";
import type { BudgetHealth, CategoryStatusLevel, OverallStatus } from "./types.js";

export const NEAR_LIMIT_PERCENT = 80;
export const OVER_BUDGET_PERCENT = 100;
export const DEFAULT_WARNING_PERCENT = 75;
export const ALERT_SUMMARY_LIMIT = 5;

export interface Usage {
  readonly percentUsed: number;
  readonly status: CategoryStatusLevel;
}

/**
 * Share of the effective budget already spent.
 *
 * Any spend against a budget that is zero or negative (after a
 * carried-in overspend) counts as fully used.
 */
export function usageOf(effectiveUnits: bigint, spentUnits: bigint): Usage {
  if (effectiveUnits <= 0n) {
    return spentUnits > 0n
      ? { percentUsed: OVER_BUDGET_PERCENT, status: "over_budget" }
      : { percentUsed: 0, status: "under_budget" };
  }
  const percentUsed = percentOf(spentUnits, effectiveUnits);
  return { percentUsed, status: statusFor(percentUsed) };
}

export function statusFor(percentUsed: number): CategoryStatusLevel {
  if (percentUsed >= OVER_BUDGET_PERCENT) return "over_budget";
  if (percentUsed >= NEAR_LIMIT_PERCENT) return "near_limit";
  return "under_budget";
}

/** Status of the month as a whole, from its totals. */
export function overallStatusOf(
  categoryCount: number,
  totalEffectiveUnits: bigint,
  totalSpentUnits: bigint,
): OverallStatus {
  if (categoryCount === 0) return "no_budgets";
  return usageOf(totalEffectiveUnits, totalSpentUnits).status;
}

/**
 * good: nothing over and at most one warning; warning: at most one
 * over; poor otherwise.
 */
export function healthOf(overBudget: number, atWarning: number): BudgetHealth {
  if (overBudget === 0 && atWarning <= 1) return "good";
  if (overBudget <= 1) return "warning";
  return "poor";
}

export function recommendationsFor(overBudget: number, atWarning: number): string[] {
  const out: string[] = [];
  if (overBudget > 0) out.push("Review spending in over-budget categories");
  if (atWarning > 0) out.push("Monitor categories approaching limits");
  if (overBudget > 2) out.push("Consider adjusting budget allocations for next month");
  return out;
}
