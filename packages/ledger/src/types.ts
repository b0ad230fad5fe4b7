/**
 * @ledgerline/ledger — Internal types for the ledger engine.
 *
 * These extend the shared @ledgerline/types with ledger-specific
 * structures used by the registry, the journal and the aggregator.
 *
 * Rules:
 * - All types are readonly
 * - Fail-closed: invalid input throws before anything is written
 */

import { FinanceError } from "@ledgerline/types";
import type {
  AccountType,
  Amount,
  ErrorKind,
  RolloverReason,
  YearMonth,
} from "@ledgerline/types";

// ─── Account Types ───────────────────────────────────────────────────────

/** Normal balance direction for an account. */
export type NormalBalance = "debit" | "credit";

/**
 * Map account types to their normal balance direction.
 *
 * - Asset, Expense → debit-normal (increases with debits)
 * - Liability, Income → credit-normal (increases with credits)
 */
export const NORMAL_BALANCE: Readonly<Record<AccountType, NormalBalance>> = {
  asset: "debit",
  expense: "debit",
  liability: "credit",
  income: "credit",
} as const;

export interface CreateAccountInput {
  readonly ownerId: string;
  readonly name: string;
  readonly type: AccountType;
  readonly parentId?: string | undefined;
  /** Defaults to the registry's default currency */
  readonly currency?: string | undefined;
}

export interface ListAccountsOptions {
  readonly type?: AccountType | undefined;
  readonly includeInactive?: boolean | undefined;
}

// ─── Journal Types ───────────────────────────────────────────────────────

/**
 * One posting handed to the journal. Signed: positive = debit.
 */
export interface EntryInput {
  readonly accountId: string;
  readonly amount: Amount;
  readonly isReportable?: boolean | undefined;
}

export interface RecordOptions {
  readonly notes?: string | undefined;
  readonly externalId?: string | undefined;
}

/**
 * Fields of a transaction that may be edited after recording.
 * `entries`, when given, replaces every entry. `notes` of null or ""
 * clears the notes.
 */
export interface TransactionPatch {
  readonly description?: string | undefined;
  readonly notes?: string | null | undefined;
  readonly date?: string | undefined;
  readonly entries?: readonly EntryInput[] | undefined;
}

export interface DeleteOptions {
  /** Remove the rows instead of stamping deletedAt */
  readonly hard?: boolean | undefined;
}

export interface TransactionQuery {
  /** Inclusive lower bound; a date-only value means the start of that day */
  readonly from?: string | undefined;
  /** Inclusive upper bound; a date-only value means the end of that day */
  readonly to?: string | undefined;
  /** Only transactions with at least one entry on this account */
  readonly accountId?: string | undefined;
  readonly includeDeleted?: boolean | undefined;
  readonly limit?: number | undefined;
}

/**
 * Callbacks fired after a journal write has committed.
 */
export interface JournalHooks {
  onTransactionChanged(ownerId: string, yearMonth: YearMonth, reason: RolloverReason): void;
}

// ─── Balance Types ───────────────────────────────────────────────────────

export interface AccountBalance {
  readonly accountId: string;
  readonly accountType: AccountType;
  readonly currency: string;
  /** Signed sum of every posting (positive = net debit) */
  readonly net: Amount;
  /** Net balance in the account's normal direction */
  readonly balance: Amount;
  readonly totalDebits: Amount;
  readonly totalCredits: Amount;
}

/**
 * A single line in the trial balance.
 */
export interface TrialBalanceLine {
  readonly accountId: string;
  readonly accountName: string;
  readonly accountType: AccountType;
  readonly currency: string;
  readonly debitBalance: Amount;
  readonly creditBalance: Amount;
}

/**
 * The full trial balance report.
 * Total debits MUST equal total credits (per currency).
 */
export interface TrialBalance {
  readonly lines: readonly TrialBalanceLine[];
  readonly generatedAt: string;
  /** Whether the trial balance is in balance (debits = credits per currency). */
  readonly balanced: boolean;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "UNBALANCED_TRANSACTION"
  | "EMPTY_TRANSACTION"
  | "INVALID_AMOUNT"
  | "INVALID_DATE"
  | "INVALID_SHARE"
  | "INVALID_ACCOUNT"
  | "UNKNOWN_PARTY"
  | "UNKNOWN_ACCOUNT"
  | "ACCOUNT_NOT_OWNED"
  | "INACTIVE_ACCOUNT"
  | "CURRENCY_MISMATCH"
  | "NOT_A_CATEGORY"
  | "DUPLICATE_ACCOUNT_NAME"
  | "TRANSACTION_NOT_FOUND";

const LEDGER_ERROR_KINDS: Readonly<Record<LedgerErrorCode, ErrorKind>> = {
  UNBALANCED_TRANSACTION: "validation",
  EMPTY_TRANSACTION: "validation",
  INVALID_AMOUNT: "validation",
  INVALID_DATE: "validation",
  INVALID_SHARE: "validation",
  INVALID_ACCOUNT: "validation",
  UNKNOWN_PARTY: "not_found",
  UNKNOWN_ACCOUNT: "not_found",
  ACCOUNT_NOT_OWNED: "validation",
  INACTIVE_ACCOUNT: "validation",
  CURRENCY_MISMATCH: "validation",
  NOT_A_CATEGORY: "validation",
  DUPLICATE_ACCOUNT_NAME: "conflict",
  TRANSACTION_NOT_FOUND: "not_found",
};

/**
 * Structured error from the ledger engine.
 * Always thrown — never returns error codes silently.
 */
export class LedgerError extends FinanceError {
  declare public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, LEDGER_ERROR_KINDS[code], message, details);
    this.name = "LedgerError";
  }
}
