/**
 * @ledgerline/ledger — Balance calculation engine.
 *
 * Computes account balances and trial balances from signed entries.
 * All calculations are deterministic using bigint arithmetic.
 *
 * Rules:
 * - Postings of soft-deleted transactions are excluded by the caller
 * - Normal balance rules determine sign conventions
 * - Trial balance must always balance (debits = credits per currency)
 */

import type { Account, Entry } from "@ledgerline/types";
import type {
  AccountBalance,
  TrialBalance,
  TrialBalanceLine,
} from "./types.js";
import { NORMAL_BALANCE } from "./types.js";
import { formatAmount, parseAmount } from "./money-math.js";

/**
 * Internal accumulator for building balances.
 */
interface BalanceAccumulator {
  totalDebits: bigint;
  totalCredits: bigint;
}

function accumulate(entries: readonly Entry[]): BalanceAccumulator {
  const acc: BalanceAccumulator = { totalDebits: 0n, totalCredits: 0n };
  for (const entry of entries) {
    const amount = parseAmount(entry.amount);
    if (amount >= 0n) {
      acc.totalDebits += amount;
    } else {
      acc.totalCredits -= amount;
    }
  }
  return acc;
}

/**
 * Compute the balance of one account from its entries.
 */
export function computeAccountBalance(
  account: Account,
  entries: readonly Entry[],
): AccountBalance {
  const acc = accumulate(entries);
  const net = acc.totalDebits - acc.totalCredits;
  const balance = NORMAL_BALANCE[account.type] === "debit" ? net : -net;

  return {
    accountId: account.id,
    accountType: account.type,
    currency: account.currency,
    net: formatAmount(net),
    balance: formatAmount(balance),
    totalDebits: formatAmount(acc.totalDebits),
    totalCredits: formatAmount(acc.totalCredits),
  };
}

/**
 * Compute the trial balance over a set of accounts.
 *
 * For each account with postings:
 * - Net debit goes to the debit column, net credit to the credit column
 *
 * Total debits MUST equal total credits per currency for the trial balance to be balanced.
 */
export function computeTrialBalance(
  accounts: readonly Account[],
  entriesOf: (account: Account) => readonly Entry[],
  timestamp: string,
): TrialBalance {
  const lines: TrialBalanceLine[] = [];
  const currencyTotals = new Map<string, { debits: bigint; credits: bigint }>();

  for (const account of accounts) {
    const entries = entriesOf(account);
    if (entries.length === 0) continue;

    const acc = accumulate(entries);
    const netDebit = acc.totalDebits - acc.totalCredits;
    const debitBalance = netDebit >= 0n ? netDebit : 0n;
    const creditBalance = netDebit < 0n ? -netDebit : 0n;

    lines.push({
      accountId: account.id,
      accountName: account.name,
      accountType: account.type,
      currency: account.currency,
      debitBalance: formatAmount(debitBalance),
      creditBalance: formatAmount(creditBalance),
    });

    let totals = currencyTotals.get(account.currency);
    if (totals === undefined) {
      totals = { debits: 0n, credits: 0n };
      currencyTotals.set(account.currency, totals);
    }
    totals.debits += debitBalance;
    totals.credits += creditBalance;
  }

  let balanced = true;
  for (const totals of currencyTotals.values()) {
    if (totals.debits !== totals.credits) {
      balanced = false;
      break;
    }
  }

  return {
    lines,
    generatedAt: timestamp,
    balanced,
  };
}
