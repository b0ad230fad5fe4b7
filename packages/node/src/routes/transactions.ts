/**
 * Journal routes.
 *
 * POST   /api/v1/transactions        — Record balanced entries
 * POST   /api/v1/transactions/simple — Expense, transfer, split or shared expense
 * GET    /api/v1/transactions        — List (?from, ?to, ?accountId, ?includeDeleted, ?limit)
 * GET    /api/v1/transactions/:id    — One transaction with its entries
 * PATCH  /api/v1/transactions/:id    — Edit description, notes, date or entries
 * DELETE /api/v1/transactions/:id    — Soft delete (?hard=true removes)
 *
 * Every committed write re-walks the owner's budgets from the month it
 * touched (see FinanceService).
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  DeleteTransactionQuerySchema,
  ListTransactionsQuerySchema,
  RecordTransactionSchema,
  SimpleTransactionSchema,
  UpdateTransactionSchema,
} from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

export function createTransactionRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(RecordTransactionSchema), (c) => {
    const body = c.get("validatedBody");
    const recorded = c
      .get("service")
      .journal.recordTransaction(c.get("party").id, body.description, body.date, body.entries, {
        notes: body.notes,
        externalId: body.externalId,
      });
    return c.json({ data: recorded }, 201);
  });

  routes.post("/simple", validateBody(SimpleTransactionSchema), (c) => {
    const recorded = c
      .get("service")
      .recordSimpleTransaction(c.get("party").id, c.get("validatedBody"));
    return c.json({ data: recorded }, 201);
  });

  routes.get("/", (c) => {
    const query = ListTransactionsQuerySchema.parse(c.req.query());
    const transactions = c.get("service").journal.listTransactions(c.get("party").id, query);
    return c.json({ data: transactions });
  });

  routes.get("/:id", (c) => {
    const found = c.get("service").getOwnedTransaction(c.get("party").id, c.req.param("id"));
    return c.json({ data: found });
  });

  routes.patch("/:id", validateBody(UpdateTransactionSchema), (c) => {
    const updated = c
      .get("service")
      .updateTransaction(c.get("party").id, c.req.param("id"), c.get("validatedBody"));
    return c.json({ data: updated });
  });

  routes.delete("/:id", (c) => {
    const { hard } = DeleteTransactionQuerySchema.parse(c.req.query());
    c.get("service").deleteTransaction(c.get("party").id, c.req.param("id"), hard === true);
    return c.body(null, 204);
  });

  return routes;
}
