/**
 * Party routes.
 *
 * POST /api/v1/parties    — Create a party, optionally seeding its chart
 * GET  /api/v1/parties/me — The party named by X-Party-Id
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { CreatePartySchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

export function createPartyRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(CreatePartySchema), (c) => {
    const body = c.get("validatedBody");
    const created = c
      .get("service")
      .createParty(body.name, body.kind, body.seedDefaultAccounts);
    return c.json({ data: created }, 201);
  });

  routes.get("/me", (c) => c.json({ data: c.get("party") }));

  return routes;
}
