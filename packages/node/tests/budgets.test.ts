/**
 * Tests for budget routes.
 *
 * Covers: create, list, details, copy, per-category upsert and removal,
 * alerts, rollover status and manual recalculation, and the journal
 * re-walking later months after a write.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { z } from "zod";
import {
  ErrorBodySchema,
  NOW,
  createTestApp,
  createTestParty,
  dataOf,
  readBody,
} from "./setup.js";
import type { TestParty } from "./setup.js";
import type { AppInstance } from "../src/app.js";

const CategoryStatusSchema = z.object({
  categoryName: z.string(),
  budgetAmount: z.string(),
  rolloverAmount: z.string(),
  effectiveBudget: z.string(),
  spentAmount: z.string(),
  remainingAmount: z.string(),
  percentUsed: z.number(),
  status: z.string(),
});
const DetailsSchema = dataOf(
  z.object({
    categories: z.array(CategoryStatusSchema),
    totalEffective: z.string(),
    totalSpent: z.string(),
    overallStatus: z.string(),
  }),
);
const AlertsSchema = dataOf(
  z.array(z.object({ type: z.string(), severity: z.string(), message: z.string(), percentUsed: z.number() })),
);

let instance: AppInstance;
let party: TestParty;

beforeEach(async () => {
  instance = createTestApp();
  party = await createTestParty(instance);
});

function createBudget(
  yearMonth: string,
  categories: { name: string; amount: string; rollover?: boolean }[],
): Promise<Response> {
  return party.call("/api/v1/budgets", "POST", {
    yearMonth,
    categories: categories.map((c) => ({
      categoryId: party.account(c.name),
      budgetAmount: c.amount,
      rolloverEnabled: c.rollover ?? true,
    })),
  });
}

async function spend(category: string, amount: string, date: string): Promise<void> {
  const res = await party.call("/api/v1/transactions/simple", "POST", {
    kind: "expense",
    description: `${category} spend`,
    date,
    sourceAccountId: party.account("Cash"),
    categoryId: party.account(category),
    amount,
  });
  expect(res.status).toBe(201);
}

async function details(month: string): Promise<z.output<typeof DetailsSchema>["data"]> {
  const body = await readBody(await party.call(`/api/v1/budgets/${month}`), DetailsSchema);
  return body.data;
}

async function groceriesRollover(month: string): Promise<string> {
  const found = (await details(month)).categories.find((c) => c.categoryName === "Groceries");
  if (found === undefined) throw new Error(`Groceries not budgeted for ${month}`);
  return found.rolloverAmount;
}

// =============================================================================
// Create & read
// =============================================================================

describe("POST /api/v1/budgets", () => {
  it("creates a month with normalized amounts", async () => {
    const res = await createBudget("2024-01", [{ name: "Groceries", amount: "100" }]);

    expect(res.status).toBe(201);
    expect(await res.json()).toMatchObject({
      data: {
        budget: { yearMonth: "2024-01", userId: party.id, rolloverNeedsRecalc: false },
        categories: [{ categoryId: party.account("Groceries"), budgetAmount: "100.00", rolloverAmount: "0.00" }],
      },
    });
  });

  it("carries the previous month's remainder into a new month", async () => {
    await createBudget("2024-01", [{ name: "Groceries", amount: "100" }]);
    await spend("Groceries", "30", "2024-01-10");
    await createBudget("2024-02", [{ name: "Groceries", amount: "100" }]);

    expect(await groceriesRollover("2024-02")).toBe("70.00");
  });

  it("returns 409 when the month already has a budget", async () => {
    await createBudget("2024-01", [{ name: "Groceries", amount: "100" }]);
    const res = await createBudget("2024-01", [{ name: "Dining", amount: "10" }]);

    expect(res.status).toBe(409);
    const body = await readBody(res, ErrorBodySchema);
    expect(body.error.code).toBe("BUDGET_EXISTS");
  });

  it.each([
    ["2024-13", "100", "INVALID_YEAR_MONTH"],
    ["2024-01", "-5", "NEGATIVE_BUDGET_AMOUNT"],
    ["2024-01", "ten", "INVALID_BUDGET_AMOUNT"],
  ])("rejects month %s amount %s with %s", async (month, amount, code) => {
    const res = await createBudget(month, [{ name: "Groceries", amount }]);

    expect(res.status).toBe(400);
    const body = await readBody(res, ErrorBodySchema);
    expect(body.error.code).toBe(code);
  });

  it("rejects a non-expense account", async () => {
    const res = await createBudget("2024-01", [{ name: "Cash", amount: "10" }]);

    expect(res.status).toBe(400);
    const body = await readBody(res, ErrorBodySchema);
    expect(body.error.code).toBe("NOT_A_CATEGORY");
  });
});

describe("GET /api/v1/budgets", () => {
  it("lists months oldest first", async () => {
    await createBudget("2024-03", [{ name: "Groceries", amount: "10" }]);
    await createBudget("2024-01", [{ name: "Groceries", amount: "10" }]);

    const body = await readBody(
      await party.call("/api/v1/budgets"),
      dataOf(z.array(z.object({ budget: z.object({ yearMonth: z.string() }) }))),
    );
    expect(body.data.map((b) => b.budget.yearMonth)).toEqual(["2024-01", "2024-03"]);
  });

  it("returns 404 for a month without a budget", async () => {
    const res = await party.call("/api/v1/budgets/2024-05");

    expect(res.status).toBe(404);
    const body = await readBody(res, ErrorBodySchema);
    expect(body.error).toEqual({
      code: "BUDGET_NOT_FOUND",
      message: "No budget for 2024-05",
      details: { yearMonth: "2024-05" },
    });
  });

  it("reports spend and status per category", async () => {
    await createBudget("2024-01", [
      { name: "Groceries", amount: "100" },
      { name: "Dining", amount: "50", rollover: false },
    ]);
    await spend("Groceries", "30", "2024-01-10");
    await spend("Dining", "45", "2024-01-12");

    const month = await details("2024-01");

    expect(month.categories).toEqual([
      {
        categoryName: "Groceries",
        budgetAmount: "100.00",
        rolloverAmount: "0.00",
        effectiveBudget: "100.00",
        spentAmount: "30.00",
        remainingAmount: "70.00",
        percentUsed: 30,
        status: "under_budget",
      },
      {
        categoryName: "Dining",
        budgetAmount: "50.00",
        rolloverAmount: "0.00",
        effectiveBudget: "50.00",
        spentAmount: "45.00",
        remainingAmount: "5.00",
        percentUsed: 90,
        status: "near_limit",
      },
    ].map((c) => expect.objectContaining(c)));
    expect(month.totalEffective).toBe("150.00");
    expect(month.totalSpent).toBe("75.00");
    expect(month.overallStatus).toBe("under_budget");
  });
});

// =============================================================================
// Edits
// =============================================================================

describe("budget edits", () => {
  it("copies allocations into another month", async () => {
    await createBudget("2024-01", [{ name: "Groceries", amount: "100" }]);

    const res = await party.call("/api/v1/budgets/2024-01/copy", "POST", { toMonth: "2024-02" });

    expect(res.status).toBe(201);
    expect(await res.json()).toMatchObject({
      data: {
        budget: { yearMonth: "2024-02" },
        categories: [{ budgetAmount: "100.00", rolloverAmount: "100.00" }],
      },
    });
  });

  it("updates an allocation and re-walks later months", async () => {
    await createBudget("2024-01", [{ name: "Groceries", amount: "100" }]);
    await createBudget("2024-02", [{ name: "Groceries", amount: "100" }]);

    const res = await party.call(
      `/api/v1/budgets/2024-01/categories/${party.account("Groceries")}`,
      "PUT",
      { budgetAmount: "80" },
    );

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ data: { budgetAmount: "80.00", rolloverAmount: "0.00" } });
    expect(await groceriesRollover("2024-02")).toBe("80.00");
  });

  it("adds an allocation through PUT when the category has none", async () => {
    await createBudget("2024-01", [{ name: "Groceries", amount: "100" }]);

    const res = await party.call(
      `/api/v1/budgets/2024-01/categories/${party.account("Dining")}`,
      "PUT",
      { budgetAmount: "40", rolloverEnabled: false },
    );

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      data: { categoryId: party.account("Dining"), budgetAmount: "40.00", rolloverEnabled: false },
    });
  });

  it("needs budgetAmount to add an allocation", async () => {
    await createBudget("2024-01", [{ name: "Groceries", amount: "100" }]);

    const res = await party.call(
      `/api/v1/budgets/2024-01/categories/${party.account("Dining")}`,
      "PUT",
      { rolloverEnabled: true },
    );

    expect(res.status).toBe(404);
    const body = await readBody(res, ErrorBodySchema);
    expect(body.error.code).toBe("CATEGORY_BUDGET_NOT_FOUND");
  });

  it("removes an allocation and zeroes what it carried", async () => {
    await createBudget("2024-01", [{ name: "Groceries", amount: "100" }]);
    await createBudget("2024-02", [{ name: "Groceries", amount: "100" }]);

    const res = await party.call(
      `/api/v1/budgets/2024-01/categories/${party.account("Groceries")}`,
      "DELETE",
    );

    expect(res.status).toBe(204);
    expect(await groceriesRollover("2024-02")).toBe("0.00");
  });
});

// =============================================================================
// Journal → rollover
// =============================================================================

describe("journal writes", () => {
  beforeEach(async () => {
    await createBudget("2024-01", [{ name: "Groceries", amount: "100" }]);
    await createBudget("2024-02", [{ name: "Groceries", amount: "100" }]);
    await createBudget("2024-03", [{ name: "Groceries", amount: "100" }]);
  });

  it("re-walks every later month after a purchase", async () => {
    await spend("Groceries", "30", "2024-01-10");

    expect(await groceriesRollover("2024-02")).toBe("70.00");
    expect(await groceriesRollover("2024-03")).toBe("170.00");
  });

  it("re-walks when an edit moves a purchase to an earlier month", async () => {
    const res = await party.call("/api/v1/transactions/simple", "POST", {
      kind: "expense",
      description: "Market",
      date: "2024-02-10",
      sourceAccountId: party.account("Cash"),
      categoryId: party.account("Groceries"),
      amount: "50",
    });
    const { data } = await readBody(res, dataOf(z.object({ transaction: z.object({ id: z.string() }) })));
    expect(await groceriesRollover("2024-03")).toBe("150.00");

    await party.call(`/api/v1/transactions/${data.transaction.id}`, "PATCH", { date: "2024-01-10" });

    expect(await groceriesRollover("2024-02")).toBe("50.00");
    expect(await groceriesRollover("2024-03")).toBe("150.00");
  });

  it("re-walks after a delete", async () => {
    const res = await party.call("/api/v1/transactions/simple", "POST", {
      kind: "expense",
      description: "Market",
      date: "2024-01-10",
      sourceAccountId: party.account("Cash"),
      categoryId: party.account("Groceries"),
      amount: "50",
    });
    const { data } = await readBody(res, dataOf(z.object({ transaction: z.object({ id: z.string() }) })));

    await party.call(`/api/v1/transactions/${data.transaction.id}`, "DELETE");

    expect(await groceriesRollover("2024-02")).toBe("100.00");
    expect(await groceriesRollover("2024-03")).toBe("200.00");
  });
});

// =============================================================================
// Alerts, status, recalculation
// =============================================================================

describe("GET /api/v1/budgets/:month/alerts", () => {
  beforeEach(async () => {
    await createBudget("2024-01", [
      { name: "Groceries", amount: "100" },
      { name: "Dining", amount: "50" },
    ]);
    await spend("Dining", "40", "2024-01-05");
    await spend("Groceries", "120", "2024-01-06");
  });

  it("lists over-budget alerts before warnings", async () => {
    const body = await readBody(await party.call("/api/v1/budgets/2024-01/alerts"), AlertsSchema);

    expect(body.data).toEqual([
      { type: "over_budget", severity: "high", message: "Groceries is over budget", percentUsed: 120 },
      {
        type: "approaching_limit",
        severity: "medium",
        message: "Dining is approaching budget limit",
        percentUsed: 80,
      },
    ].map((a) => expect.objectContaining(a)));
  });

  it("takes the warning threshold from the query", async () => {
    const body = await readBody(
      await party.call("/api/v1/budgets/2024-01/alerts?warningPercent=85"),
      AlertsSchema,
    );

    expect(body.data.map((a) => a.type)).toEqual(["over_budget"]);
  });

  it("summarizes the month", async () => {
    const SummarySchema = dataOf(
      z.object({
        yearMonth: z.string(),
        totalCategoriesTracked: z.number(),
        categoriesOnTrack: z.number(),
        categoriesAtWarning: z.number(),
        categoriesOverBudget: z.number(),
        overallHealth: z.string(),
        alerts: z.array(z.object({ type: z.string() })),
        recommendations: z.array(z.string()),
      }),
    );

    const res = await party.call("/api/v1/budgets/2024-01/alerts/summary");

    expect(res.status).toBe(200);
    const body = await readBody(res, SummarySchema);
    expect(body.data).toEqual({
      yearMonth: "2024-01",
      totalCategoriesTracked: 2,
      categoriesOnTrack: 0,
      categoriesAtWarning: 1,
      categoriesOverBudget: 1,
      overallHealth: "warning",
      alerts: [{ type: "over_budget" }, { type: "approaching_limit" }],
      recommendations: [
        "Review spending in over-budget categories",
        "Monitor categories approaching limits",
      ],
    });
  });

  it("returns 404 for a summary of a month without a budget", async () => {
    const res = await party.call("/api/v1/budgets/2024-07/alerts/summary");

    expect(res.status).toBe(404);
    const body = await readBody(res, ErrorBodySchema);
    expect(body.error.code).toBe("BUDGET_NOT_FOUND");
  });

  it("falls back to the app-wide threshold", async () => {
    const strict = createTestApp({ alertWarningPercent: 85 });
    const other = await createTestParty(strict);
    await other.call("/api/v1/budgets", "POST", {
      yearMonth: "2024-01",
      categories: [{ categoryId: other.account("Dining"), budgetAmount: "50" }],
    });
    await other.call("/api/v1/transactions/simple", "POST", {
      kind: "expense",
      description: "Dinner",
      date: "2024-01-05",
      sourceAccountId: other.account("Cash"),
      categoryId: other.account("Dining"),
      amount: "40",
    });

    const body = await readBody(await other.call("/api/v1/budgets/2024-01/alerts"), AlertsSchema);
    expect(body.data).toEqual([]);
  });
});

describe("rollover status & recalculation", () => {
  it("reports when the month was last calculated", async () => {
    await createBudget("2024-01", [{ name: "Groceries", amount: "100" }]);

    const res = await party.call("/api/v1/budgets/2024-01/rollover-status");

    expect(await res.json()).toEqual({ data: { lastCalculated: NOW, needsRecalc: false } });
  });

  it("recalculates a month and the chain after it", async () => {
    await createBudget("2024-01", [{ name: "Groceries", amount: "100" }]);
    await createBudget("2024-02", [{ name: "Groceries", amount: "100" }]);

    const res = await party.call("/api/v1/budgets/2024-01/recalculate", "POST");

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      data: {
        changedMonth: "2024-01",
        reason: "manual",
        months: [
          { yearMonth: "2024-01", status: "unchanged" },
          { yearMonth: "2024-02", status: "unchanged" },
        ],
        failedMonths: [],
      },
    });
  });

  it("returns 404 when recalculating a month without a budget", async () => {
    const res = await party.call("/api/v1/budgets/2024-04/recalculate", "POST");

    expect(res.status).toBe(404);
  });
});
