/**
 * Runtime Type Guards
 *
 * Narrowing functions for Ledgerline domain types.
 * These enable safe runtime validation at system boundaries
 * (API inputs, rows read back from storage).
 */

import type { AccountType, Amount, PartyKind } from "./financial.js";
import type { RolloverReason, YearMonth } from "./budget.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object";
}

// =============================================================================
// Financial guards
// =============================================================================

const ACCOUNT_TYPES = new Set<string>(["asset", "liability", "income", "expense"]);
const PARTY_KINDS = new Set<string>(["person", "household"]);
const AMOUNT_PATTERN = /^-?\d+(\.\d{1,4})?$/;

export function isAccountType(value: unknown): value is AccountType {
  return typeof value === "string" && ACCOUNT_TYPES.has(value);
}

export function isPartyKind(value: unknown): value is PartyKind {
  return typeof value === "string" && PARTY_KINDS.has(value);
}

export function isAmount(value: unknown): value is Amount {
  return typeof value === "string" && AMOUNT_PATTERN.test(value.trim());
}

export function isEntryInput(
  value: unknown,
): value is { accountId: string; amount: Amount } {
  if (!isRecord(value)) return false;
  return (
    typeof value.accountId === "string" &&
    value.accountId.length > 0 &&
    isAmount(value.amount)
  );
}

// =============================================================================
// Budget guards
// =============================================================================

const YEAR_MONTH_PATTERN = /^\d{4}-(0[1-9]|1[0-2])$/;
const ROLLOVER_REASONS = new Set<string>([
  "creation",
  "manual",
  "chain_propagation",
  "budget_edit",
  "transaction_edit",
]);

export function isYearMonth(value: unknown): value is YearMonth {
  return typeof value === "string" && YEAR_MONTH_PATTERN.test(value);
}

export function isRolloverReason(value: unknown): value is RolloverReason {
  return typeof value === "string" && ROLLOVER_REASONS.has(value);
}
