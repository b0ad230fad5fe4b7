/**
 * Financial Types
 *
 * Core primitives for personal double-entry bookkeeping.
 *
 * Rules:
 * - All amounts are decimal strings to avoid floating-point errors
 * - Entry amounts are signed: positive = debit, negative = credit
 * - Every transaction's entries sum to zero
 * - Categories are expense accounts, never a separate record
 */

/**
 * A signed decimal amount as a string (e.g., "45.00", "-50", "12.3456").
 * At most four fractional digits.
 */
export type Amount = string;

/**
 * The four account types used by the personal ledger.
 */
export type AccountType = "asset" | "liability" | "income" | "expense";

/**
 * Kind of economic actor.
 */
export type PartyKind = "person" | "household";

/**
 * An economic actor. Owns accounts, transactions and budgets.
 */
export interface Party {
  readonly id: string;
  readonly name: string;
  readonly kind: PartyKind;
  readonly createdAt: string;
}

/**
 * An account in a party's chart of accounts.
 *
 * `parentId` forms a display tree only; balances never roll up through it.
 */
export interface Account {
  readonly id: string;
  readonly ownerId: string;
  readonly name: string;
  readonly type: AccountType;
  readonly parentId?: string | undefined;
  readonly active: boolean;
  /** ISO 4217 code (e.g., "USD") */
  readonly currency: string;
  readonly createdAt: string;
}

/**
 * Budgeting view of an expense account.
 * Produced only through an explicit conversion at the API boundary.
 */
export interface Category {
  readonly id: string;
  readonly ownerId: string;
  readonly name: string;
  readonly parentId?: string | undefined;
  readonly active: boolean;
}

/**
 * Header of a balanced double-entry transaction.
 */
export interface LedgerTransaction {
  readonly id: string;
  readonly ownerId: string;
  /** UTC ISO 8601 instant */
  readonly date: string;
  readonly description: string;
  readonly notes?: string | undefined;
  readonly externalId?: string | undefined;
  readonly createdAt: string;
  readonly updatedAt: string;
  /** Set when soft-deleted */
  readonly deletedAt?: string | undefined;
}

/**
 * A single signed posting against an account.
 */
export interface Entry {
  readonly id: string;
  readonly transactionId: string;
  readonly accountId: string;
  readonly amount: Amount;
  readonly isReportable: boolean;
}

/**
 * A transaction together with its entries.
 */
export interface TransactionWithEntries {
  readonly transaction: LedgerTransaction;
  readonly entries: readonly Entry[];
}

/**
 * Row from the single-entry era, before the ledger existed.
 * Read-only input for spend aggregation.
 */
export interface LegacyTransaction {
  readonly id: string;
  readonly ownerId: string;
  readonly categoryId: string;
  readonly type: "income" | "expense";
  /** Unsigned amount */
  readonly amount: Amount;
  readonly occurredOn: string;
  readonly isDeleted: boolean;
}
