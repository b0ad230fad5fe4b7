/**
 * Category routes. Categories are the party's expense accounts.
 *
 * GET /api/v1/categories                — ?includeInactive
 * GET /api/v1/categories/spend/:month   — Spend per category for a month
 */

import { Hono } from "hono";
import { z } from "zod";
import { assertYearMonth } from "@ledgerline/budget";
import type { AppEnv } from "../types/api-contract.js";

const ListCategoriesQuerySchema = z.object({
  includeInactive: z.enum(["true", "false"]).optional(),
});

export function createCategoryRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const query = ListCategoriesQuerySchema.parse(c.req.query());
    const categories = c.get("service").accounts.listCategories(c.get("party").id, {
      includeInactive: query.includeInactive === "true",
    });
    return c.json({ data: categories });
  });

  routes.get("/spend/:month", (c) => {
    const month = assertYearMonth(c.req.param("month"));
    const spend = c.get("service").spend.spendByCategory(c.get("party").id, month);
    return c.json({ data: spend });
  });

  return routes;
}
