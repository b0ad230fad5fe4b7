/**
 * @ledgerline/budget — Types for budgets and rollover propagation.
 */

import { FinanceError } from "@ledgerline/types";
import type {
  Amount,
  Budget,
  CategoryBudget,
  ErrorKind,
  RolloverReason,
  YearMonth,
} from "@ledgerline/types";

// =============================================================================
// Inputs
// =============================================================================

export interface CategoryBudgetInput {
  readonly categoryId: string;
  readonly budgetAmount: Amount;
  readonly rolloverEnabled?: boolean | undefined;
}

export interface CategoryBudgetPatch {
  readonly budgetAmount?: Amount | undefined;
  readonly rolloverEnabled?: boolean | undefined;
}

export interface BudgetWithCategories {
  readonly budget: Budget;
  readonly categories: readonly CategoryBudget[];
}

// =============================================================================
// Chain walk
// =============================================================================

/** Outcome of recomputing one month during a chain walk. */
export type MonthStatus = "updated" | "unchanged" | "failed";

export interface CategoryRollover {
  readonly categoryId: string;
  readonly previous: Amount;
  readonly rolloverAmount: Amount;
  /** Whether the stored rolloverAmount was rewritten */
  readonly changed: boolean;
}

export interface MonthOutcome {
  readonly yearMonth: YearMonth;
  readonly budgetId: string;
  readonly status: MonthStatus;
  readonly categories: readonly CategoryRollover[];
  readonly error?: string | undefined;
}

export interface ChainResult {
  readonly userId: string;
  readonly changedMonth: YearMonth;
  readonly reason: RolloverReason;
  /** Ascending by yearMonth */
  readonly months: readonly MonthOutcome[];
  readonly failedMonths: readonly YearMonth[];
  /** Set when the walk could not start; it is retried by retryStaleMonths() */
  readonly error?: string | undefined;
}

/**
 * Result of one calculateRollover() call.
 * `calculationId` is absent when no previous allocation existed.
 */
export interface RolloverResult {
  readonly categoryId: string;
  readonly yearMonth: YearMonth;
  readonly sourceMonth: YearMonth;
  readonly rolloverAmount: Amount;
  readonly calculationId?: string | undefined;
}

// =============================================================================
// Notification
// =============================================================================

export interface RolloverUpdateEvent {
  readonly userId: string;
  readonly yearMonth: YearMonth;
  readonly status: MonthStatus;
  readonly reason: RolloverReason;
  readonly categories: readonly CategoryRollover[];
}

/**
 * Receives one event per month touched by a chain walk.
 * Best-effort: thrown or rejected errors are logged and dropped.
 */
export interface RolloverNotifier {
  monthUpdated(event: RolloverUpdateEvent): void | Promise<void>;
}

// =============================================================================
// Status and alerts
// =============================================================================

export type CategoryStatusLevel = "under_budget" | "near_limit" | "over_budget";

export type OverallStatus = CategoryStatusLevel | "no_budgets";

export interface CategoryBudgetStatus {
  readonly categoryId: string;
  readonly categoryName: string;
  readonly budgetAmount: Amount;
  readonly rolloverAmount: Amount;
  readonly rolloverEnabled: boolean;
  readonly effectiveBudget: Amount;
  readonly spentAmount: Amount;
  readonly remainingAmount: Amount;
  readonly percentUsed: number;
  readonly status: CategoryStatusLevel;
}

export interface BudgetDetails {
  readonly budget: Budget;
  readonly categories: readonly CategoryBudgetStatus[];
  readonly totalBudgeted: Amount;
  readonly totalEffective: Amount;
  readonly totalSpent: Amount;
  readonly totalRemaining: Amount;
  readonly overallStatus: OverallStatus;
}

export type AlertType = "over_budget" | "approaching_limit";

export type AlertSeverity = "high" | "medium";

export interface BudgetAlert {
  readonly type: AlertType;
  readonly severity: AlertSeverity;
  readonly budgetId: string;
  readonly yearMonth: YearMonth;
  readonly categoryId: string;
  readonly categoryName: string;
  readonly message: string;
  readonly effectiveBudget: Amount;
  readonly spentAmount: Amount;
  /** Negative by the overspend once over budget */
  readonly remainingAmount: Amount;
  readonly percentUsed: number;
}

export type BudgetHealth = "good" | "warning" | "poor";

/** Month-level rollup of getBudgetAlerts(). */
export interface BudgetAlertSummary {
  readonly yearMonth: YearMonth;
  readonly generatedAt: string;
  readonly totalCategoriesTracked: number;
  readonly categoriesOnTrack: number;
  readonly categoriesAtWarning: number;
  readonly categoriesOverBudget: number;
  readonly overallHealth: BudgetHealth;
  /** The most severe alerts, at most ALERT_SUMMARY_LIMIT */
  readonly alerts: readonly BudgetAlert[];
  readonly recommendations: readonly string[];
}

export interface AlertOptions {
  /** Percent of the effective budget that raises approaching_limit. Default 75. */
  readonly warningPercent?: number | undefined;
}

// =============================================================================
// Errors
// =============================================================================

export type BudgetErrorCode =
  | "INVALID_YEAR_MONTH"
  | "NEGATIVE_BUDGET_AMOUNT"
  | "INVALID_BUDGET_AMOUNT"
  | "DUPLICATE_CATEGORY"
  | "BUDGET_EXISTS"
  | "BUDGET_NOT_FOUND"
  | "CATEGORY_BUDGET_EXISTS"
  | "CATEGORY_BUDGET_NOT_FOUND";

const BUDGET_ERROR_KINDS: Readonly<Record<BudgetErrorCode, ErrorKind>> = {
  INVALID_YEAR_MONTH: "validation",
  NEGATIVE_BUDGET_AMOUNT: "validation",
  INVALID_BUDGET_AMOUNT: "validation",
  DUPLICATE_CATEGORY: "validation",
  BUDGET_EXISTS: "conflict",
  BUDGET_NOT_FOUND: "not_found",
  CATEGORY_BUDGET_EXISTS: "conflict",
  CATEGORY_BUDGET_NOT_FOUND: "not_found",
};

export class BudgetError extends FinanceError {
  declare public readonly code: BudgetErrorCode;

  constructor(code: BudgetErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, BUDGET_ERROR_KINDS[code], message, details);
    this.name = "BudgetError";
  }
}
