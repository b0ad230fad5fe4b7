/**
 * @ledgerline/ledger — Double-entry journal for personal finance.
 *
 * Enforces double-entry accounting invariants:
 * - Every transaction balances (entries sum to zero)
 * - A transaction and its entries are written as one unit
 * - All monetary arithmetic uses bigint (no floating point)
 * - Dates are compared as normalized UTC instants
 *
 * Design rules:
 * - All types are readonly
 * - Fail-closed: invalid input throws, never silently succeeds
 * - Persistence goes through @ledgerline/store
 */

// Journal
export { LedgerJournal } from "./journal.js";
export type { LedgerJournalOptions } from "./journal.js";

// Account registry
export { AccountRegistry, toCategory } from "./accounts.js";
export type { AccountRegistryOptions } from "./accounts.js";

// Spend aggregation
export { SpendAggregator, LedgerSpendSource, LegacySpendSource } from "./spend.js";
export type { SpendSource, DateRange, CategorySpend } from "./spend.js";

// Posting builders
export {
  buildExpensePostings,
  buildTransferPostings,
  buildSplitPostings,
  buildSharedExpensePostings,
  personalShareUnits,
} from "./postings.js";
export type { ShareMethod, ShareSpec, SplitLine } from "./postings.js";

// Balance computation
export {
  computeAccountBalance,
  computeTrialBalance,
} from "./balance-calculator.js";

// Dates
export { toUtcInstant, requireUtcInstant, monthOf, monthBounds } from "./dates.js";
export type { DayEdge } from "./dates.js";

// Money arithmetic
export {
  AMOUNT_SCALE,
  CENT_UNITS,
  parseAmount,
  formatAmount,
  normalizeAmount,
  addAmounts,
  subtractAmounts,
  negateAmount,
  absAmount,
  sumAmounts,
  compareAmounts,
  isZeroAmount,
  absUnits,
  divideRounded,
  roundToCents,
  percentOf,
} from "./money-math.js";

// Types
export type {
  NormalBalance,
  CreateAccountInput,
  ListAccountsOptions,
  EntryInput,
  RecordOptions,
  TransactionPatch,
  DeleteOptions,
  TransactionQuery,
  JournalHooks,
  AccountBalance,
  TrialBalanceLine,
  TrialBalance,
  LedgerErrorCode,
} from "./types.js";

export { LedgerError, NORMAL_BALANCE } from "./types.js";
