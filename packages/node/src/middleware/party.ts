/**
 * Party resolution middleware.
 *
 * Every /api/v1 route except party creation acts for the party named
 * by X-Party-Id. A missing header is a 400; an unknown party is the
 * registry's UNKNOWN_PARTY (404) through the error handler.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

export const PARTY_HEADER = "X-Party-Id";

/** Creating a party is the one call made before a party exists. */
function isExempt(method: string, path: string): boolean {
  return method === "POST" && path.replace(/\/+$/, "") === "/api/v1/parties";
}

export function partyMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    if (isExempt(c.req.method, c.req.path)) {
      await next();
      return;
    }

    const partyId = c.req.header(PARTY_HEADER);
    if (partyId === undefined || partyId.trim() === "") {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", `Missing ${PARTY_HEADER} header`),
        400,
      );
    }

    c.set("party", c.get("service").accounts.assertParty(partyId));
    await next();
  };
}
