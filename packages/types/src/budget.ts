/**
 * Budget Types
 *
 * Monthly category budgets and the rollover audit trail.
 *
 * Rules:
 * - One Budget per (user, yearMonth)
 * - CategoryBudget.rolloverAmount is derived and cached, never user input
 * - RolloverCalculation rows are append-only
 */

import type { Amount } from "./financial.js";

/**
 * Zero-padded calendar month, "YYYY-MM".
 * Lexicographic order equals chronological order.
 */
export type YearMonth = string;

/**
 * Why a rollover was (re)computed.
 */
export type RolloverReason =
  | "creation"
  | "manual"
  | "chain_propagation"
  | "budget_edit"
  | "transaction_edit";

export interface Budget {
  readonly id: string;
  readonly userId: string;
  readonly yearMonth: YearMonth;
  readonly rolloverLastCalculated?: string | undefined;
  readonly rolloverNeedsRecalc: boolean;
  readonly createdAt: string;
}

export interface CategoryBudget {
  readonly id: string;
  readonly budgetId: string;
  readonly categoryId: string;
  readonly budgetAmount: Amount;
  readonly rolloverEnabled: boolean;
  /** Carried in from the previous month; written only by the rollover engine */
  readonly rolloverAmount: Amount;
}

/**
 * One recomputation of a category's rollover, with every intermediate value.
 */
export interface RolloverCalculation {
  readonly id: string;
  readonly budgetId: string;
  readonly categoryId: string;
  readonly calculatedAt: string;
  readonly rolloverAmount: Amount;
  /** The month whose leftover or overspend produced this rollover */
  readonly sourceMonth: YearMonth;
  readonly reason: RolloverReason;
  readonly baseBudget: Amount;
  readonly prevRollover: Amount;
  readonly effectiveBudget: Amount;
  readonly spentAmount: Amount;
}

/**
 * Freshness of a budget's cached rollover amounts.
 */
export interface RolloverStatus {
  readonly lastCalculated?: string | undefined;
  readonly needsRecalc: boolean;
}
