/**
 * @ledgerline/ledger — Ledger Journal.
 *
 * The only writer of financial truth. Accepts fully balanced postings
 * and persists a transaction with all of its entries as one unit.
 *
 * API surface:
 * - recordTransaction() — Validate and persist a balanced transaction
 * - updateTransaction() — Edit header fields and/or replace entries
 * - deleteTransaction() — Soft (deletedAt) or hard delete
 * - getTransaction() / listTransactions() — Queries
 * - getAccountBalance() / getTrialBalance() — Balances
 *
 * Callers build the offsetting entries themselves (see postings.ts);
 * the journal never invents a counter-entry.
 */

import { randomUUID } from "node:crypto";
import pino from "pino";
import type { Logger } from "pino";
import type { FinanceStore } from "@ledgerline/store";
import type {
  Account,
  Entry,
  LedgerTransaction,
  TransactionWithEntries,
  YearMonth,
} from "@ledgerline/types";
import type { AccountRegistry } from "./accounts.js";
import { computeAccountBalance, computeTrialBalance } from "./balance-calculator.js";
import { requireUtcInstant } from "./dates.js";
import { formatAmount, parseAmount } from "./money-math.js";
import type {
  AccountBalance,
  DeleteOptions,
  EntryInput,
  JournalHooks,
  RecordOptions,
  TransactionPatch,
  TransactionQuery,
  TrialBalance,
} from "./types.js";
import { LedgerError } from "./types.js";

export interface LedgerJournalOptions {
  readonly hooks?: JournalHooks | undefined;
  readonly logger?: Logger | undefined;
  readonly clock?: (() => Date) | undefined;
}

/** An entry that passed validation, with its amount in canonical form. */
interface ValidatedEntry {
  readonly accountId: string;
  readonly amount: string;
  readonly isReportable: boolean;
}

export class LedgerJournal {
  private readonly _store: FinanceStore;
  private readonly _accounts: AccountRegistry;
  private readonly _hooks: JournalHooks | undefined;
  private readonly _logger: Logger;
  private readonly _clock: () => Date;

  constructor(store: FinanceStore, accounts: AccountRegistry, options?: LedgerJournalOptions) {
    this._store = store;
    this._accounts = accounts;
    this._hooks = options?.hooks;
    this._logger = options?.logger ?? pino({ level: "silent" });
    this._clock = options?.clock ?? (() => new Date());
  }

  // ─── Writes ──────────────────────────────────────────────────────────

  /**
   * Record a balanced transaction.
   *
   * Validation rules (fail-closed — all must pass before any write):
   * 1. Owner must exist
   * 2. At least two entries
   * 3. Date must be a real calendar date
   * 4. Every amount is a decimal with at most four fractional digits
   * 5. Every account exists, belongs to the owner and is active
   * 6. All accounts share one currency
   * 7. Entry amounts sum to exactly zero
   *
   * Throws LedgerError if any validation fails.
   */
  recordTransaction(
    ownerId: string,
    description: string,
    date: string,
    entries: readonly EntryInput[],
    options?: RecordOptions,
  ): TransactionWithEntries {
    this._accounts.assertParty(ownerId);
    const instant = requireUtcInstant(date);
    const validated = this._validateEntries(ownerId, entries);

    const now = this._clock().toISOString();
    const transaction: LedgerTransaction = {
      id: randomUUID(),
      ownerId,
      date: instant,
      description,
      notes: options?.notes,
      externalId: options?.externalId,
      createdAt: now,
      updatedAt: now,
    };
    const rows = this._toEntries(transaction.id, validated);

    this._store.runInTransaction(() => {
      this._store.insertTransaction(transaction, rows);
    });

    this._logger.debug(
      { transactionId: transaction.id, ownerId, entries: rows.length },
      "transaction recorded",
    );
    this._changed(ownerId, instant.slice(0, 7));

    return { transaction, entries: rows };
  }

  /**
   * Edit a transaction. Replacement entries go through the same
   * validation as recordTransaction().
   */
  updateTransaction(id: string, patch: TransactionPatch): TransactionWithEntries {
    const current = this._assertLive(id);

    const instant = patch.date !== undefined ? requireUtcInstant(patch.date) : current.date;
    const validated =
      patch.entries !== undefined
        ? this._validateEntries(current.ownerId, patch.entries)
        : undefined;

    const updated: LedgerTransaction = {
      ...current,
      date: instant,
      description: patch.description ?? current.description,
      notes: patch.notes === undefined ? current.notes : patch.notes || undefined,
      updatedAt: this._clock().toISOString(),
    };
    const rows = validated !== undefined ? this._toEntries(id, validated) : undefined;

    this._store.runInTransaction(() => {
      this._store.updateTransaction(updated);
      if (rows !== undefined) {
        this._store.replaceEntries(id, rows);
      }
    });

    const oldMonth = current.date.slice(0, 7);
    const newMonth = instant.slice(0, 7);
    this._changed(current.ownerId, oldMonth < newMonth ? oldMonth : newMonth);

    return { transaction: updated, entries: rows ?? this._store.getEntries(id) };
  }

  /**
   * Soft delete (default) stamps deletedAt; hard delete removes the
   * transaction and its entries.
   */
  deleteTransaction(id: string, options?: DeleteOptions): void {
    const current = this._store.getTransaction(id);
    if (current === undefined || (current.deletedAt !== undefined && options?.hard !== true)) {
      throw new LedgerError("TRANSACTION_NOT_FOUND", `Transaction not found: "${id}"`, {
        transactionId: id,
      });
    }

    this._store.runInTransaction(() => {
      if (options?.hard === true) {
        this._store.deleteTransaction(id);
      } else {
        const now = this._clock().toISOString();
        this._store.updateTransaction({ ...current, deletedAt: now, updatedAt: now });
      }
    });

    this._changed(current.ownerId, current.date.slice(0, 7));
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  getTransaction(id: string): TransactionWithEntries | undefined {
    const transaction = this._store.getTransaction(id);
    if (transaction === undefined) return undefined;
    return { transaction, entries: this._store.getEntries(id) };
  }

  /**
   * Transactions of an owner, newest first.
   */
  listTransactions(ownerId: string, query?: TransactionQuery): readonly TransactionWithEntries[] {
    const from = query?.from !== undefined ? requireUtcInstant(query.from, "start") : undefined;
    const to = query?.to !== undefined ? requireUtcInstant(query.to, "end") : undefined;

    const results: TransactionWithEntries[] = [];
    const transactions = [...this._store.listTransactions(ownerId)].reverse();

    for (const transaction of transactions) {
      if (query?.includeDeleted !== true && transaction.deletedAt !== undefined) continue;
      if (from !== undefined && transaction.date < from) continue;
      if (to !== undefined && transaction.date > to) continue;

      const entries = this._store.getEntries(transaction.id);
      if (query?.accountId !== undefined && !entries.some((e) => e.accountId === query.accountId)) {
        continue;
      }

      results.push({ transaction, entries });
      if (query?.limit !== undefined && results.length >= query.limit) break;
    }

    return results;
  }

  getAccountBalance(accountId: string): AccountBalance {
    const account = this._accounts.assertAccount(accountId);
    return computeAccountBalance(account, this._liveEntries(account));
  }

  getTrialBalance(ownerId: string): TrialBalance {
    this._accounts.assertParty(ownerId);
    return computeTrialBalance(
      this._accounts.listAccounts(ownerId, { includeInactive: true }),
      (account) => this._liveEntries(account),
      this._clock().toISOString(),
    );
  }

  // ─── Private ─────────────────────────────────────────────────────────

  private _validateEntries(ownerId: string, entries: readonly EntryInput[]): ValidatedEntry[] {
    if (entries.length < 2) {
      throw new LedgerError(
        "EMPTY_TRANSACTION",
        `A transaction needs at least two entries, got ${String(entries.length)}`,
      );
    }

    const validated: ValidatedEntry[] = [];
    let currency: string | undefined;
    let total = 0n;

    for (const input of entries) {
      const scaled = parseAmount(input.amount);
      const account = this._accounts.assertOwnedAccount(ownerId, input.accountId);
      this._assertActive(account);

      if (currency !== undefined && account.currency !== currency) {
        throw new LedgerError(
          "CURRENCY_MISMATCH",
          `Cannot mix currencies in one transaction: "${currency}" vs "${account.currency}"`,
          { accountId: account.id },
        );
      }
      currency = account.currency;
      total += scaled;

      validated.push({
        accountId: account.id,
        amount: formatAmount(scaled),
        isReportable: input.isReportable ?? true,
      });
    }

    if (total !== 0n) {
      throw new LedgerError(
        "UNBALANCED_TRANSACTION",
        `Transaction is unbalanced: entries sum to ${formatAmount(total)}`,
        { imbalance: formatAmount(total) },
      );
    }

    return validated;
  }

  private _assertActive(account: Account): void {
    if (!account.active) {
      throw new LedgerError("INACTIVE_ACCOUNT", `Account "${account.id}" is inactive`, {
        accountId: account.id,
      });
    }
  }

  private _assertLive(id: string): LedgerTransaction {
    const transaction = this._store.getTransaction(id);
    if (transaction === undefined || transaction.deletedAt !== undefined) {
      throw new LedgerError("TRANSACTION_NOT_FOUND", `Transaction not found: "${id}"`, {
        transactionId: id,
      });
    }
    return transaction;
  }

  private _toEntries(transactionId: string, validated: readonly ValidatedEntry[]): Entry[] {
    return validated.map((e) => ({
      id: randomUUID(),
      transactionId,
      accountId: e.accountId,
      amount: e.amount,
      isReportable: e.isReportable,
    }));
  }

  private _liveEntries(account: Account): Entry[] {
    return this._store
      .listPostings(account.id)
      .filter((p) => p.transaction.deletedAt === undefined)
      .map((p) => p.entry);
  }

  /** The write has committed; a failing hook is logged, not rethrown. */
  private _changed(ownerId: string, yearMonth: YearMonth): void {
    try {
      this._hooks?.onTransactionChanged(ownerId, yearMonth, "transaction_edit");
    } catch (err) {
      this._logger.error({ err, ownerId, yearMonth }, "transaction change hook failed");
    }
  }
}
