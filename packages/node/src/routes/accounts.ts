/**
 * Account routes.
 *
 * GET  /api/v1/accounts             — Chart of accounts (?type, ?includeInactive)
 * POST /api/v1/accounts             — Open an account
 * GET  /api/v1/accounts/:id         — One account
 * GET  /api/v1/accounts/:id/balance — Balance from the journal
 * POST /api/v1/accounts/:id/deactivate
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { CreateAccountSchema, ListAccountsQuerySchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

export function createAccountRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const query = ListAccountsQuerySchema.parse(c.req.query());
    const accounts = c.get("service").accounts.listAccounts(c.get("party").id, query);
    return c.json({ data: accounts });
  });

  routes.post("/", validateBody(CreateAccountSchema), (c) => {
    const body = c.get("validatedBody");
    const account = c.get("service").accounts.createAccount({
      ownerId: c.get("party").id,
      ...body,
    });
    return c.json({ data: account }, 201);
  });

  routes.get("/:id", (c) => {
    const account = c
      .get("service")
      .accounts.assertOwnedAccount(c.get("party").id, c.req.param("id"));
    return c.json({ data: account });
  });

  routes.get("/:id/balance", (c) => {
    const balance = c
      .get("service")
      .getAccountBalance(c.get("party").id, c.req.param("id"));
    return c.json({ data: balance });
  });

  routes.post("/:id/deactivate", (c) => {
    const account = c
      .get("service")
      .accounts.deactivateAccount(c.get("party").id, c.req.param("id"));
    return c.json({ data: account });
  });

  return routes;
}
