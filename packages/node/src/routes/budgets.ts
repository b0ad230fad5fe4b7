/**
 * Budget routes.
 *
 * POST /api/v1/budgets                                 — Create a month's budget
 * GET  /api/v1/budgets                                 — All months, oldest first
 * GET  /api/v1/budgets/:month                          — Details: effective, spent, status
 * POST /api/v1/budgets/:month/copy                     — Copy allocations to another month
 * PUT  /api/v1/budgets/:month/categories/:categoryId   — Update or add one allocation
 * DELETE /api/v1/budgets/:month/categories/:categoryId — Remove one allocation
 * GET  /api/v1/budgets/:month/alerts                   — ?warningPercent
 * GET  /api/v1/budgets/:month/alerts/summary           — Counts, health grade, top alerts
 * GET  /api/v1/budgets/:month/rollover-status
 * POST /api/v1/budgets/:month/recalculate              — Recompute the month and the chain after it
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  AlertsQuerySchema,
  CopyBudgetSchema,
  CreateBudgetSchema,
  PutCategoryBudgetSchema,
} from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

export function createBudgetRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(CreateBudgetSchema), (c) => {
    const body = c.get("validatedBody");
    const created = c
      .get("service")
      .budgets.createBudget(c.get("party").id, body.yearMonth, body.categories);
    return c.json({ data: created }, 201);
  });

  routes.get("/", (c) => {
    return c.json({ data: c.get("service").budgets.listBudgets(c.get("party").id) });
  });

  routes.get("/:month", (c) => {
    const details = c
      .get("service")
      .budgets.getBudgetDetails(c.get("party").id, c.req.param("month"));
    return c.json({ data: details });
  });

  routes.post("/:month/copy", validateBody(CopyBudgetSchema), (c) => {
    const copied = c
      .get("service")
      .budgets.copyBudget(c.get("party").id, c.req.param("month"), c.get("validatedBody").toMonth);
    return c.json({ data: copied }, 201);
  });

  routes.put(
    "/:month/categories/:categoryId",
    validateBody(PutCategoryBudgetSchema),
    (c) => {
      const saved = c
        .get("service")
        .putCategoryBudget(
          c.get("party").id,
          c.req.param("month"),
          c.req.param("categoryId"),
          c.get("validatedBody"),
        );
      return c.json({ data: saved });
    },
  );

  routes.delete("/:month/categories/:categoryId", (c) => {
    c.get("service")
      .budgets.removeCategoryBudget(
        c.get("party").id,
        c.req.param("month"),
        c.req.param("categoryId"),
      );
    return c.body(null, 204);
  });

  routes.get("/:month/alerts", (c) => {
    const { warningPercent } = AlertsQuerySchema.parse(c.req.query());
    const alerts = c
      .get("service")
      .getBudgetAlerts(c.get("party").id, c.req.param("month"), warningPercent);
    return c.json({ data: alerts });
  });

  routes.get("/:month/alerts/summary", (c) => {
    const { warningPercent } = AlertsQuerySchema.parse(c.req.query());
    const summary = c
      .get("service")
      .getBudgetAlertSummary(c.get("party").id, c.req.param("month"), warningPercent);
    return c.json({ data: summary });
  });

  routes.get("/:month/rollover-status", (c) => {
    const status = c
      .get("service")
      .budgets.getRolloverStatus(c.get("party").id, c.req.param("month"));
    return c.json({ data: status });
  });

  routes.post("/:month/recalculate", (c) => {
    const result = c
      .get("service")
      .engine.recalculateMonth(c.get("party").id, c.req.param("month"), "manual");
    return c.json({ data: result });
  });

  return routes;
}
