/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { Party } from "@ledgerline/types";
import type { FinanceService } from "../services/finance-service.js";

/**
 * Hono environment type for the Ledgerline app.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** Composition root for the domain packages (set on every /api route) */
    service: FinanceService;

    /** Party named by X-Party-Id (set by party middleware) */
    party: Party;
  };
}
