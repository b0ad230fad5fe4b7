/**
 * Tests for the Ledger Journal.
 *
 * Covers:
 * - Balanced recording and canonical amounts
 * - Validation (balance, entry count, amounts, dates, accounts, currency)
 * - Atomicity: rejected transactions leave no rows
 * - Updates, soft and hard deletes
 * - Change hooks and their months
 * - Queries and balances
 */

import { describe, it, expect, beforeEach, vi } from "vitest";
import pino from "pino";
import type { RolloverReason, YearMonth } from "@ledgerline/types";
import { LedgerJournal } from "../src/journal.js";
import type { JournalHooks } from "../src/types.js";
import { LedgerError } from "../src/types.js";
import type { Chart } from "./helpers.js";
import { NOW, fixedClock, makeChart, thrown } from "./helpers.js";

describe("LedgerJournal", () => {
  let chart: Chart;
  let journal: LedgerJournal;
  let changes: Array<[string, YearMonth, RolloverReason]>;

  beforeEach(() => {
    chart = makeChart();
    changes = [];
    const hooks: JournalHooks = {
      onTransactionChanged: (ownerId, yearMonth, reason) => {
        changes.push([ownerId, yearMonth, reason]);
      },
    };
    journal = new LedgerJournal(chart.store, chart.accounts, { hooks, clock: fixedClock });
  });

  function expense(amount: string, date = "2024-01-15") {
    return journal.recordTransaction(chart.party.id, "Market", date, [
      { accountId: chart.cash.id, amount: `-${amount}` },
      { accountId: chart.groceries.id, amount },
    ]);
  }

  // ─── recordTransaction ───────────────────────────────────────────────

  describe("recordTransaction", () => {
    it("persists the transaction and its entries", () => {
      const { transaction, entries } = expense("45");

      expect(transaction).toMatchObject({
        ownerId: chart.party.id,
        description: "Market",
        date: "2024-01-15T00:00:00.000Z",
        createdAt: NOW,
        updatedAt: NOW,
      });
      expect(entries.map((e) => [e.accountId, e.amount])).toEqual([
        [chart.cash.id, "-45.00"],
        [chart.groceries.id, "45.00"],
      ]);
      expect(entries.every((e) => e.transactionId === transaction.id)).toBe(true);
      expect(journal.getTransaction(transaction.id)).toEqual({ transaction, entries });
    });

    it("keeps notes, external id and reportable flags", () => {
      const { transaction, entries } = journal.recordTransaction(
        chart.party.id,
        "Card payment",
        "2024-01-20",
        [
          { accountId: chart.cash.id, amount: "-100" },
          { accountId: chart.card.id, amount: "100", isReportable: false },
        ],
        { notes: "January statement", externalId: "bank-42" },
      );
      expect(transaction.notes).toBe("January statement");
      expect(transaction.externalId).toBe("bank-42");
      expect(entries.map((e) => e.isReportable)).toEqual([true, false]);
    });

    it("accepts more than two entries", () => {
      const { entries } = journal.recordTransaction(chart.party.id, "Split", "2024-01-15", [
        { accountId: chart.cash.id, amount: "-60" },
        { accountId: chart.groceries.id, amount: "40" },
        { accountId: chart.dining.id, amount: "20" },
      ]);
      expect(entries).toHaveLength(3);
    });

    it("allows credits to expense accounts (refunds)", () => {
      const { entries } = journal.recordTransaction(chart.party.id, "Refund", "2024-01-16", [
        { accountId: chart.groceries.id, amount: "-5" },
        { accountId: chart.cash.id, amount: "5" },
      ]);
      expect(entries[0]?.amount).toBe("-5.00");
    });

    it("fires the change hook with the transaction's month", () => {
      expense("10", "2024-02-29T23:00:00-05:00");
      expect(changes).toEqual([[chart.party.id, "2024-03", "transaction_edit"]]);
    });
  });

  // ─── Validation ──────────────────────────────────────────────────────

  describe("validation", () => {
    it("rejects an unbalanced transaction and writes nothing", () => {
      const err = thrown(() =>
        journal.recordTransaction(chart.party.id, "Typo", "2024-01-15", [
          { accountId: chart.cash.id, amount: "-50" },
          { accountId: chart.groceries.id, amount: "45" },
        ]),
      );

      expect(err).toBeInstanceOf(LedgerError);
      expect(err).toMatchObject({ code: "UNBALANCED_TRANSACTION", kind: "validation" });
      expect(journal.listTransactions(chart.party.id, { includeDeleted: true })).toHaveLength(0);
      expect(chart.store.listPostings(chart.cash.id)).toHaveLength(0);
      expect(chart.store.listPostings(chart.groceries.id)).toHaveLength(0);
      expect(changes).toEqual([]);
    });

    it("rejects an imbalance of a single unit", () => {
      expect(() =>
        journal.recordTransaction(chart.party.id, "Dust", "2024-01-15", [
          { accountId: chart.cash.id, amount: "-10.0001" },
          { accountId: chart.groceries.id, amount: "10" },
        ]),
      ).toThrow(/unbalanced/);
    });

    it("requires two entries", () => {
      expect(
        thrown(() =>
          journal.recordTransaction(chart.party.id, "One", "2024-01-15", [
            { accountId: chart.cash.id, amount: "0" },
          ]),
        ),
      ).toMatchObject({ code: "EMPTY_TRANSACTION" });
    });

    it("rejects malformed amounts", () => {
      expect(
        thrown(() =>
          journal.recordTransaction(chart.party.id, "Bad", "2024-01-15", [
            { accountId: chart.cash.id, amount: "-1.00001" },
            { accountId: chart.groceries.id, amount: "1.00001" },
          ]),
        ),
      ).toMatchObject({ code: "INVALID_AMOUNT" });
    });

    it("rejects invalid dates", () => {
      expect(thrown(() => expense("10", "2024-02-30"))).toMatchObject({ code: "INVALID_DATE" });
    });

    it("rejects unknown and foreign accounts", () => {
      const other = chart.accounts.createParty("Kim");
      const foreign = chart.accounts.createAccount({
        ownerId: other.id,
        name: "Cash",
        type: "asset",
      });

      expect(
        thrown(() =>
          journal.recordTransaction(chart.party.id, "x", "2024-01-15", [
            { accountId: "missing", amount: "-1" },
            { accountId: chart.groceries.id, amount: "1" },
          ]),
        ),
      ).toMatchObject({ code: "UNKNOWN_ACCOUNT" });

      expect(
        thrown(() =>
          journal.recordTransaction(chart.party.id, "x", "2024-01-15", [
            { accountId: foreign.id, amount: "-1" },
            { accountId: chart.groceries.id, amount: "1" },
          ]),
        ),
      ).toMatchObject({ code: "ACCOUNT_NOT_OWNED" });
    });

    it("rejects inactive accounts", () => {
      chart.accounts.deactivateAccount(chart.party.id, chart.dining.id);
      expect(
        thrown(() =>
          journal.recordTransaction(chart.party.id, "x", "2024-01-15", [
            { accountId: chart.cash.id, amount: "-1" },
            { accountId: chart.dining.id, amount: "1" },
          ]),
        ),
      ).toMatchObject({ code: "INACTIVE_ACCOUNT" });
    });

    it("rejects mixed currencies", () => {
      const euros = chart.accounts.createAccount({
        ownerId: chart.party.id,
        name: "Euro Cash",
        type: "asset",
        currency: "EUR",
      });
      expect(
        thrown(() =>
          journal.recordTransaction(chart.party.id, "x", "2024-01-15", [
            { accountId: euros.id, amount: "-1" },
            { accountId: chart.groceries.id, amount: "1" },
          ]),
        ),
      ).toMatchObject({ code: "CURRENCY_MISMATCH" });
    });

    it("rejects unknown owners", () => {
      expect(
        thrown(() =>
          journal.recordTransaction("ghost", "x", "2024-01-15", [
            { accountId: chart.cash.id, amount: "-1" },
            { accountId: chart.groceries.id, amount: "1" },
          ]),
        ),
      ).toMatchObject({ code: "UNKNOWN_PARTY" });
    });
  });

  // ─── Atomicity ───────────────────────────────────────────────────────

  describe("atomicity", () => {
    it("leaves nothing behind when the write fails part way", () => {
      const insert = chart.store.insertTransaction.bind(chart.store);
      const spy = vi
        .spyOn(chart.store, "insertTransaction")
        .mockImplementation((transaction, entries) => {
          insert(transaction, entries);
          throw new Error("disk full");
        });

      expect(() => expense("10")).toThrow("disk full");
      spy.mockRestore();

      expect(journal.listTransactions(chart.party.id, { includeDeleted: true })).toHaveLength(0);
      expect(chart.store.listPostings(chart.groceries.id)).toHaveLength(0);
      expect(changes).toEqual([]);
    });
  });

  // ─── Change hooks ────────────────────────────────────────────────────

  describe("change hooks", () => {
    it("logs a failing hook and keeps the committed write", () => {
      const lines: string[] = [];
      const logger = pino({ level: "error" }, { write: (msg: string) => lines.push(msg) });
      const failing = new LedgerJournal(chart.store, chart.accounts, {
        clock: fixedClock,
        logger,
        hooks: {
          onTransactionChanged: () => {
            throw new Error("hook outage");
          },
        },
      });

      const { transaction } = failing.recordTransaction(chart.party.id, "Market", "2024-01-15", [
        { accountId: chart.cash.id, amount: "-12" },
        { accountId: chart.groceries.id, amount: "12" },
      ]);

      expect(chart.store.getTransaction(transaction.id)?.description).toBe("Market");
      expect(lines).toHaveLength(1);
      expect(JSON.parse(lines[0] ?? "{}")).toMatchObject({
        ownerId: chart.party.id,
        yearMonth: "2024-01",
        msg: "transaction change hook failed",
      });
      expect(() => failing.deleteTransaction(transaction.id)).not.toThrow();
      expect(lines).toHaveLength(2);
    });
  });

  // ─── updateTransaction ───────────────────────────────────────────────

  describe("updateTransaction", () => {
    it("edits header fields and keeps entries", () => {
      const { transaction, entries } = expense("30");
      const updated = journal.updateTransaction(transaction.id, {
        description: "Farmers market",
        notes: "cash only",
      });
      expect(updated.transaction.description).toBe("Farmers market");
      expect(updated.transaction.notes).toBe("cash only");
      expect(updated.entries).toEqual(entries);
    });

    it("clears notes given null or an empty string", () => {
      const { transaction } = journal.recordTransaction(
        chart.party.id,
        "Market",
        "2024-01-15",
        [
          { accountId: chart.cash.id, amount: "-30" },
          { accountId: chart.groceries.id, amount: "30" },
        ],
        { notes: "cash only" },
      );

      const kept = journal.updateTransaction(transaction.id, { description: "Farmers market" });
      expect(kept.transaction.notes).toBe("cash only");

      const cleared = journal.updateTransaction(transaction.id, { notes: null });
      expect(cleared.transaction.notes).toBeUndefined();
      expect(chart.store.getTransaction(transaction.id)?.notes).toBeUndefined();

      journal.updateTransaction(transaction.id, { notes: "again" });
      const emptied = journal.updateTransaction(transaction.id, { notes: "" });
      expect(emptied.transaction.notes).toBeUndefined();
    });

    it("replaces entries after validating them", () => {
      const { transaction } = expense("30");
      const updated = journal.updateTransaction(transaction.id, {
        entries: [
          { accountId: chart.card.id, amount: "-35" },
          { accountId: chart.groceries.id, amount: "35" },
        ],
      });
      expect(updated.entries.map((e) => e.amount)).toEqual(["-35.00", "35.00"]);
      expect(chart.store.getEntries(transaction.id)).toEqual(updated.entries);
      expect(chart.store.listPostings(chart.cash.id)).toHaveLength(0);
    });

    it("leaves the transaction untouched when new entries are unbalanced", () => {
      const { transaction, entries } = expense("30");
      expect(() =>
        journal.updateTransaction(transaction.id, {
          entries: [
            { accountId: chart.cash.id, amount: "-30" },
            { accountId: chart.groceries.id, amount: "20" },
          ],
        }),
      ).toThrow(LedgerError);
      expect(journal.getTransaction(transaction.id)).toEqual({ transaction, entries });
    });

    it("fires the hook with the earlier of the old and new months", () => {
      const { transaction } = expense("30", "2024-03-05");
      changes = [];
      journal.updateTransaction(transaction.id, { date: "2024-01-20" });
      journal.updateTransaction(transaction.id, { date: "2024-02-01" });
      expect(changes.map(([, month]) => month)).toEqual(["2024-01", "2024-01"]);
    });

    it("rejects unknown transactions", () => {
      expect(thrown(() => journal.updateTransaction("nope", {}))).toMatchObject({
        code: "TRANSACTION_NOT_FOUND",
        kind: "not_found",
      });
    });
  });

  // ─── deleteTransaction ───────────────────────────────────────────────

  describe("deleteTransaction", () => {
    it("soft delete stamps deletedAt and hides the transaction", () => {
      const { transaction } = expense("30", "2024-02-10");
      changes = [];
      journal.deleteTransaction(transaction.id);

      expect(journal.getTransaction(transaction.id)?.transaction.deletedAt).toBe(NOW);
      expect(journal.listTransactions(chart.party.id)).toHaveLength(0);
      expect(journal.listTransactions(chart.party.id, { includeDeleted: true })).toHaveLength(1);
      expect(changes).toEqual([[chart.party.id, "2024-02", "transaction_edit"]]);
    });

    it("hard delete removes the rows", () => {
      const { transaction } = expense("30");
      journal.deleteTransaction(transaction.id, { hard: true });
      expect(journal.getTransaction(transaction.id)).toBeUndefined();
      expect(chart.store.getEntries(transaction.id)).toEqual([]);
    });

    it("cannot soft delete twice but can purge a soft-deleted row", () => {
      const { transaction } = expense("30");
      journal.deleteTransaction(transaction.id);
      expect(() => journal.deleteTransaction(transaction.id)).toThrow(LedgerError);
      journal.deleteTransaction(transaction.id, { hard: true });
      expect(journal.getTransaction(transaction.id)).toBeUndefined();
    });

    it("cannot edit a soft-deleted transaction", () => {
      const { transaction } = expense("30");
      journal.deleteTransaction(transaction.id);
      expect(() => journal.updateTransaction(transaction.id, { description: "x" })).toThrow(
        LedgerError,
      );
    });
  });

  // ─── Queries ─────────────────────────────────────────────────────────

  describe("listTransactions", () => {
    beforeEach(() => {
      expense("10", "2024-01-05");
      expense("20", "2024-01-31T18:00:00");
      expense("30", "2024-02-01");
      journal.recordTransaction(chart.party.id, "Payday", "2024-01-25", [
        { accountId: chart.cash.id, amount: "1000" },
        { accountId: chart.salary.id, amount: "-1000" },
      ]);
    });

    it("returns newest first", () => {
      expect(
        journal.listTransactions(chart.party.id).map((t) => t.transaction.date.slice(0, 10)),
      ).toEqual(["2024-02-01", "2024-01-31", "2024-01-25", "2024-01-05"]);
    });

    it("filters by inclusive date range", () => {
      const january = journal.listTransactions(chart.party.id, {
        from: "2024-01-01",
        to: "2024-01-31",
      });
      expect(january).toHaveLength(3);
    });

    it("filters by account and limits", () => {
      expect(journal.listTransactions(chart.party.id, { accountId: chart.salary.id })).toHaveLength(
        1,
      );
      expect(journal.listTransactions(chart.party.id, { limit: 2 })).toHaveLength(2);
    });
  });

  describe("balances", () => {
    it("computes account balances in the normal direction", () => {
      journal.recordTransaction(chart.party.id, "Payday", "2024-01-01", [
        { accountId: chart.cash.id, amount: "1000" },
        { accountId: chart.salary.id, amount: "-1000" },
      ]);
      expense("45.5");

      expect(journal.getAccountBalance(chart.cash.id)).toEqual({
        accountId: chart.cash.id,
        accountType: "asset",
        currency: "USD",
        net: "954.50",
        balance: "954.50",
        totalDebits: "1000.00",
        totalCredits: "45.50",
      });
      expect(journal.getAccountBalance(chart.salary.id).balance).toBe("1000.00");
    });

    it("excludes soft-deleted transactions", () => {
      const { transaction } = expense("45");
      journal.deleteTransaction(transaction.id);
      expect(journal.getAccountBalance(chart.groceries.id).balance).toBe("0.00");
    });

    it("produces a balanced trial balance", () => {
      journal.recordTransaction(chart.party.id, "Payday", "2024-01-01", [
        { accountId: chart.cash.id, amount: "1000" },
        { accountId: chart.salary.id, amount: "-1000" },
      ]);
      expense("45");

      const trial = journal.getTrialBalance(chart.party.id);
      expect(trial.balanced).toBe(true);
      expect(trial.generatedAt).toBe(NOW);
      expect(trial.lines.map((l) => [l.accountName, l.debitBalance, l.creditBalance])).toEqual([
        ["Cash", "955.00", "0.00"],
        ["Groceries", "45.00", "0.00"],
        ["Salary", "0.00", "1000.00"],
      ]);
    });
  });
});
