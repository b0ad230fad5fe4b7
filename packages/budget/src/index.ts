/**
 * @ledgerline/budget — Monthly budgets with rollover propagation.
 *
 * A category's unused (or overspent) effective budget carries into the
 * next month. Changes in one month are propagated to every later month
 * in ascending order, one unit of work per month.
 */

// Engine
export { RolloverEngine } from "./rollover-engine.js";
export type { RolloverEngineOptions, RolloverHistoryQuery } from "./rollover-engine.js";

// Service
export { BudgetService } from "./budget-service.js";
export type { BudgetServiceOptions } from "./budget-service.js";

// Status thresholds
export {
  usageOf,
  statusFor,
  overallStatusOf,
  NEAR_LIMIT_PERCENT,
  OVER_BUDGET_PERCENT,
  DEFAULT_WARNING_PERCENT,
} from "./status.js";
export type { Usage } from "./status.js";

// Months
export { assertYearMonth, previousMonth } from "./year-month.js";

// Types
export type {
  CategoryBudgetInput,
  CategoryBudgetPatch,
  BudgetWithCategories,
  MonthStatus,
  CategoryRollover,
  MonthOutcome,
  ChainResult,
  RolloverResult,
  RolloverUpdateEvent,
  RolloverNotifier,
  CategoryStatusLevel,
  OverallStatus,
  CategoryBudgetStatus,
  BudgetDetails,
  AlertType,
  AlertSeverity,
  BudgetAlert,
  BudgetAlertSummary,
  BudgetHealth,
  AlertOptions,
  BudgetErrorCode,
} from "./types.js";

export { BudgetError } from "./types.js";
