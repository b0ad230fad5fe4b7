/**
 * @ledgerline/ledger — Spend Aggregator.
 *
 * Realized spend for a category over an inclusive date range.
 * Read-only; never fails on empty results.
 *
 * Sources are pluggable:
 * - LedgerSpendSource: signed entries of non-deleted transactions
 * - LegacySpendSource: rows from before the ledger existed
 *   (expense rows add, income rows subtract, deleted rows are skipped)
 */

import type { FinanceStore } from "@ledgerline/store";
import type { Amount, YearMonth } from "@ledgerline/types";
import { monthBounds, requireUtcInstant, toUtcInstant } from "./dates.js";
import { formatAmount, parseAmount } from "./money-math.js";
import type { AccountRegistry } from "./accounts.js";

/** Inclusive range of UTC instants. */
export interface DateRange {
  readonly start: string;
  readonly end: string;
}

export interface SpendSource {
  readonly name: string;
  /** Signed spend in scaled units */
  spendUnits(ownerId: string, categoryId: string, range: DateRange): bigint;
}

function inRange(date: string, range: DateRange): boolean {
  const instant = toUtcInstant(date);
  return instant !== undefined && instant >= range.start && instant <= range.end;
}

// ─── Sources ─────────────────────────────────────────────────────────────

export class LedgerSpendSource implements SpendSource {
  readonly name = "ledger";
  private readonly _store: FinanceStore;

  constructor(store: FinanceStore) {
    this._store = store;
  }

  spendUnits(ownerId: string, categoryId: string, range: DateRange): bigint {
    let total = 0n;
    for (const { entry, transaction } of this._store.listPostings(categoryId)) {
      if (transaction.ownerId !== ownerId) continue;
      if (transaction.deletedAt !== undefined) continue;
      if (!inRange(transaction.date, range)) continue;
      total += parseAmount(entry.amount);
    }
    return total;
  }
}

export class LegacySpendSource implements SpendSource {
  readonly name = "legacy";
  private readonly _store: FinanceStore;

  constructor(store: FinanceStore) {
    this._store = store;
  }

  spendUnits(ownerId: string, categoryId: string, range: DateRange): bigint {
    let total = 0n;
    for (const row of this._store.listLegacyTransactions(ownerId, categoryId)) {
      if (row.isDeleted) continue;
      if (!inRange(row.occurredOn, range)) continue;
      const amount = parseAmount(row.amount);
      total += row.type === "expense" ? amount : -amount;
    }
    return total;
  }
}

// ─── Aggregator ──────────────────────────────────────────────────────────

export interface CategorySpend {
  readonly categoryId: string;
  readonly name: string;
  readonly spent: Amount;
}

export class SpendAggregator {
  private readonly _sources: readonly SpendSource[];
  private readonly _accounts: AccountRegistry;

  constructor(accounts: AccountRegistry, sources: readonly SpendSource[]) {
    this._accounts = accounts;
    this._sources = sources;
  }

  /**
   * Spend on `categoryId` between `start` and `end`, both inclusive.
   * A date-only `end` covers that whole day.
   */
  spend(ownerId: string, categoryId: string, start: string, end: string): Amount {
    return formatAmount(this.spendUnits(ownerId, categoryId, start, end));
  }

  spendUnits(ownerId: string, categoryId: string, start: string, end: string): bigint {
    const range: DateRange = {
      start: requireUtcInstant(start, "start"),
      end: requireUtcInstant(end, "end"),
    };
    let total = 0n;
    for (const source of this._sources) {
      total += source.spendUnits(ownerId, categoryId, range);
    }
    return total;
  }

  spendForMonth(ownerId: string, categoryId: string, yearMonth: YearMonth): Amount {
    const { start, end } = monthBounds(yearMonth);
    return this.spend(ownerId, categoryId, start, end);
  }

  /**
   * Spend of every active category of the owner in one month,
   * skipping categories with no spend.
   */
  spendByCategory(ownerId: string, yearMonth: YearMonth): readonly CategorySpend[] {
    const { start, end } = monthBounds(yearMonth);
    const results: CategorySpend[] = [];
    for (const category of this._accounts.listCategories(ownerId)) {
      const units = this.spendUnits(ownerId, category.id, start, end);
      if (units === 0n) continue;
      results.push({ categoryId: category.id, name: category.name, spent: formatAmount(units) });
    }
    return results;
  }
}
