/**
 * @ledgerline/types — Shared domain types for the Ledgerline stack.
 *
 * These types are used across all Ledgerline packages:
 * - Parties, accounts and categories
 * - Ledger transactions and signed entries
 * - Monthly budgets and the rollover audit trail
 * - The error taxonomy
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types — meaning lives in consuming code
 */

// Financial types
export type {
  Amount,
  AccountType,
  PartyKind,
  Party,
  Account,
  Category,
  LedgerTransaction,
  Entry,
  TransactionWithEntries,
  LegacyTransaction,
} from "./financial.js";

// Budget types
export type {
  YearMonth,
  RolloverReason,
  Budget,
  CategoryBudget,
  RolloverCalculation,
  RolloverStatus,
} from "./budget.js";

// Errors
export type { ErrorKind } from "./errors.js";
export { FinanceError, isFinanceError } from "./errors.js";

// Runtime type guards
export {
  isAccountType,
  isPartyKind,
  isAmount,
  isEntryInput,
  isYearMonth,
  isRolloverReason,
} from "./guards.js";
