/**
 * Rollover routes.
 *
 * GET /api/v1/rollover/history — Audit rows, oldest first (?yearMonth, ?categoryId)
 * GET /api/v1/rollover/updates — Server-Sent Events: one "rollover" event per
 *                                month a walk touched, for this party only
 */

import { randomUUID } from "node:crypto";
import { Hono } from "hono";
import { streamSSE } from "hono/streaming";
import type { AppEnv } from "../types/api-contract.js";
import { RolloverHistoryQuerySchema } from "../types/dto.js";

export function createRolloverRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/history", (c) => {
    const query = RolloverHistoryQuerySchema.parse(c.req.query());
    const rows = c.get("service").engine.getRolloverHistory(c.get("party").id, query);
    return c.json({ data: rows });
  });

  routes.get("/updates", (c) => {
    const hub = c.get("service").hub;
    const userId = c.get("party").id;

    return streamSSE(c, async (stream) => {
      const subscriberId = randomUUID();
      let sequence = 0;

      const closed = new Promise<void>((resolve) => {
        stream.onAbort(() => {
          hub.unregister(subscriberId);
          resolve();
        });
        hub.register({
          id: subscriberId,
          userId,
          send: (event) =>
            stream.writeSSE({
              event: "rollover",
              id: String(++sequence),
              data: JSON.stringify(event),
            }),
          close: () => resolve(),
        });
      });

      await stream.writeSSE({
        event: "ready",
        data: JSON.stringify({ subscriberId, userId }),
      });
      await closed;
    });
  });

  return routes;
}
