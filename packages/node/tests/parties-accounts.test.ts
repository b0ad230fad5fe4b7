/**
 * Tests for party, account and category routes.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { z } from "zod";
import {
  AccountSchema,
  ErrorBodySchema,
  createTestApp,
  createTestParty,
  dataOf,
  jsonRequest,
  readBody,
} from "./setup.js";
import type { TestParty } from "./setup.js";
import type { AppInstance } from "../src/app.js";

let instance: AppInstance;

beforeEach(() => {
  instance = createTestApp();
});

// =============================================================================
// Parties
// =============================================================================

describe("POST /api/v1/parties", () => {
  it("creates a party with the default chart", async () => {
    const res = await instance.app.request(
      jsonRequest("/api/v1/parties", "POST", { name: "Robin" }),
    );

    expect(res.status).toBe(201);
    const body = await readBody(
      res,
      dataOf(z.object({ party: z.object({ name: z.string(), kind: z.string() }), accounts: z.array(AccountSchema) })),
    );
    expect(body.data.party).toMatchObject({ name: "Robin", kind: "person" });
    expect(body.data.accounts.map((a) => a.name)).toEqual([
      "Assets",
      "Liabilities",
      "Income",
      "Expenses",
      "Cash",
      "Groceries",
      "Salary",
    ]);
  });

  it("skips seeding when asked", async () => {
    const res = await instance.app.request(
      jsonRequest("/api/v1/parties", "POST", { name: "Sam", kind: "household", seedDefaultAccounts: false }),
    );

    const body = await readBody(res, dataOf(z.object({ accounts: z.array(AccountSchema) })));
    expect(body.data.accounts).toEqual([]);
  });

  it("follows the app-wide seeding default", async () => {
    const unseeded = createTestApp({ seedDefaultAccounts: false });
    const res = await unseeded.app.request(jsonRequest("/api/v1/parties", "POST", { name: "Sam" }));

    const body = await readBody(res, dataOf(z.object({ accounts: z.array(AccountSchema) })));
    expect(body.data.accounts).toEqual([]);
  });

  it("returns 400 for an invalid body", async () => {
    const res = await instance.app.request(jsonRequest("/api/v1/parties", "POST", { name: "" }));

    expect(res.status).toBe(400);
    const body = await readBody(res, ErrorBodySchema);
    expect(body.error.code).toBe("VALIDATION_ERROR");
    expect(body.error.details).toEqual({
      issues: [{ path: "name", message: "String must contain at least 1 character(s)" }],
    });
  });

  it("returns 400 for malformed JSON", async () => {
    const res = await instance.app.request(
      new Request("http://localhost/api/v1/parties", {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: "{not json",
      }),
    );

    expect(res.status).toBe(400);
    const body = await readBody(res, ErrorBodySchema);
    expect(body.error.message).toBe("Invalid JSON in request body");
  });
});

describe("X-Party-Id", () => {
  it("is required on party-scoped routes", async () => {
    const res = await instance.app.request("/api/v1/accounts");

    expect(res.status).toBe(400);
    const body = await readBody(res, ErrorBodySchema);
    expect(body.error).toEqual({ code: "VALIDATION_ERROR", message: "Missing X-Party-Id header" });
  });

  it("must name an existing party", async () => {
    const res = await instance.app.request(
      jsonRequest("/api/v1/accounts", "GET", undefined, { "X-Party-Id": "nobody" }),
    );

    expect(res.status).toBe(404);
    const body = await readBody(res, ErrorBodySchema);
    expect(body.error.code).toBe("UNKNOWN_PARTY");
  });

  it("resolves the calling party", async () => {
    const party = await createTestParty(instance);
    const res = await party.call("/api/v1/parties/me");

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ data: { id: party.id, name: "Robin" } });
  });
});

// =============================================================================
// Accounts & Categories
// =============================================================================

describe("accounts", () => {
  let party: TestParty;

  beforeEach(async () => {
    party = await createTestParty(instance);
  });

  it("opens an account in the default currency", async () => {
    const res = await party.call("/api/v1/accounts", "POST", { name: "Savings", type: "asset" });

    expect(res.status).toBe(201);
    expect(await res.json()).toMatchObject({
      data: { name: "Savings", type: "asset", currency: "USD", active: true, ownerId: party.id },
    });
  });

  it("rejects a duplicate active name with 409", async () => {
    const res = await party.call("/api/v1/accounts", "POST", { name: "Cash", type: "asset" });

    expect(res.status).toBe(409);
    const body = await readBody(res, ErrorBodySchema);
    expect(body.error.code).toBe("DUPLICATE_ACCOUNT_NAME");
  });

  it("filters the chart by type", async () => {
    const res = await party.call("/api/v1/accounts?type=expense");

    const body = await readBody(res, dataOf(z.array(AccountSchema)));
    expect(body.data.map((a) => a.name)).toEqual(["Expenses", "Groceries", "Dining"]);
  });

  it("hides another party's account", async () => {
    const other = await createTestParty(instance, "Sam");
    const res = await party.call(`/api/v1/accounts/${other.account("Cash")}`);

    expect(res.status).toBe(400);
    const body = await readBody(res, ErrorBodySchema);
    expect(body.error.code).toBe("ACCOUNT_NOT_OWNED");
  });

  it("reports a balance from the journal", async () => {
    await party.call("/api/v1/transactions/simple", "POST", {
      kind: "expense",
      description: "Market",
      date: "2024-03-02",
      sourceAccountId: party.account("Cash"),
      categoryId: party.account("Groceries"),
      amount: "42.50",
    });

    const res = await party.call(`/api/v1/accounts/${party.account("Cash")}/balance`);

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      data: { accountType: "asset", net: "-42.50", balance: "-42.50", totalCredits: "42.50" },
    });
  });

  it("lists expense accounts without children as categories", async () => {
    const res = await party.call("/api/v1/categories");

    const body = await readBody(res, dataOf(z.array(z.object({ name: z.string() }))));
    expect(body.data.map((c) => c.name)).toEqual(["Groceries", "Dining"]);
  });

  it("drops deactivated categories unless asked", async () => {
    await party.call(`/api/v1/accounts/${party.account("Dining")}/deactivate`, "POST");

    const active = await readBody(
      await party.call("/api/v1/categories"),
      dataOf(z.array(z.object({ name: z.string() }))),
    );
    const all = await readBody(
      await party.call("/api/v1/categories?includeInactive=true"),
      dataOf(z.array(z.object({ name: z.string() }))),
    );
    expect(active.data.map((c) => c.name)).toEqual(["Groceries"]);
    expect(all.data.map((c) => c.name)).toEqual(["Groceries", "Dining"]);
  });
});
