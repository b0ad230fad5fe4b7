/**
 * @ledgerline/ledger — Posting builders.
 *
 * Turn everyday actions into balanced entry lists for
 * LedgerJournal.recordTransaction(). Pure functions: no store access.
 *
 * Rules:
 * - Input amounts are taken as absolute values
 * - The source account is always credited, destinations debited
 * - Every returned list sums to zero
 */

import type { Amount } from "@ledgerline/types";
import type { EntryInput } from "./types.js";
import { LedgerError } from "./types.js";
import {
  CENT_UNITS,
  absUnits,
  divideRounded,
  formatAmount,
  parseAmount,
  roundToCents,
} from "./money-math.js";

export type ShareMethod = "FIXED" | "PERCENTAGE" | "EQUAL";

/**
 * How much of a shared expense is the payer's own.
 *
 * - FIXED: `value` is the personal amount
 * - PERCENTAGE: `value` is the personal percentage (0–100)
 * - EQUAL: `value` is the number of people splitting evenly
 */
export interface ShareSpec {
  readonly method: ShareMethod;
  readonly value: string;
}

export interface SplitLine {
  readonly categoryId: string;
  readonly amount: Amount;
}

function positiveUnits(amount: Amount): bigint {
  const units = absUnits(parseAmount(amount));
  if (units === 0n) {
    throw new LedgerError("INVALID_AMOUNT", "Amount must not be zero");
  }
  return units;
}

/**
 * Pay for a category from a source account (asset or liability).
 */
export function buildExpensePostings(
  sourceAccountId: string,
  categoryId: string,
  amount: Amount,
): EntryInput[] {
  const units = positiveUnits(amount);
  return [
    { accountId: sourceAccountId, amount: formatAmount(-units) },
    { accountId: categoryId, amount: formatAmount(units) },
  ];
}

/**
 * Move money between two accounts of the same owner.
 */
export function buildTransferPostings(
  sourceAccountId: string,
  destinationAccountId: string,
  amount: Amount,
): EntryInput[] {
  if (sourceAccountId === destinationAccountId) {
    throw new LedgerError("INVALID_ACCOUNT", "Transfer source and destination must differ");
  }
  return buildExpensePostings(sourceAccountId, destinationAccountId, amount);
}

/**
 * One payment spread over several categories: a single credit to the
 * source for the total, one debit per split line.
 */
export function buildSplitPostings(
  sourceAccountId: string,
  splits: readonly SplitLine[],
): EntryInput[] {
  if (splits.length === 0) {
    throw new LedgerError("EMPTY_TRANSACTION", "A split needs at least one line");
  }
  const debits = splits.map((s) => ({ accountId: s.categoryId, units: positiveUnits(s.amount) }));
  const total = debits.reduce((sum, d) => sum + d.units, 0n);
  return [
    { accountId: sourceAccountId, amount: formatAmount(-total) },
    ...debits.map((d) => ({ accountId: d.accountId, amount: formatAmount(d.units) })),
  ];
}

/**
 * Personal share of `amountUnits` in scaled units, rounded to cents.
 * Throws INVALID_SHARE when the share falls outside [0, amount + 0.01].
 */
export function personalShareUnits(amountUnits: bigint, share: ShareSpec): bigint {
  const value = parseAmount(share.value);

  // Exact share as numerator / denominator in scaled units
  let numerator: bigint;
  let denominator: bigint;
  switch (share.method) {
    case "FIXED":
      numerator = value;
      denominator = 1n;
      break;
    case "PERCENTAGE":
      numerator = amountUnits * value;
      denominator = parseAmount("100");
      break;
    case "EQUAL": {
      // amount / people, where a fractional head count divides exactly
      const one = parseAmount("1");
      numerator = amountUnits * one;
      denominator = value > 0n ? value : one;
      break;
    }
  }

  if (numerator < 0n || numerator > (amountUnits + CENT_UNITS) * denominator) {
    throw new LedgerError(
      "INVALID_SHARE",
      `Personal share ${share.method} ${share.value} is invalid for total ${formatAmount(amountUnits)}`,
      { method: share.method, value: share.value },
    );
  }

  const rounded = roundToCents(divideRounded(numerator, denominator));
  return rounded > amountUnits ? amountUnits : rounded;
}

/**
 * An expense paid in full where part is owed back by others.
 * The personal share is debited to the category, the remainder to a
 * reimbursable asset account. Zero-amount legs are omitted.
 */
export function buildSharedExpensePostings(
  sourceAccountId: string,
  categoryId: string,
  reimbursableAccountId: string,
  amount: Amount,
  share: ShareSpec,
): EntryInput[] {
  const total = positiveUnits(amount);
  const personal = personalShareUnits(total, share);
  const reimbursable = total - personal;

  const entries: EntryInput[] = [{ accountId: sourceAccountId, amount: formatAmount(-total) }];
  if (personal > 0n) {
    entries.push({ accountId: categoryId, amount: formatAmount(personal) });
  }
  if (reimbursable > 0n) {
    entries.push({ accountId: reimbursableAccountId, amount: formatAmount(reimbursable) });
  }
  return entries;
}
