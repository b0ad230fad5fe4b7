/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 if server is running)
 * GET /ready  — Readiness probe (store reachable, hub accepting subscribers)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { FinanceService } from "../services/finance-service.js";

export function createHealthRoutes(service: FinanceService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const store = service.store.isHealthy() ? "ok" : "down";
    const ready = service.isReady();
    const body = {
      status: ready ? "ready" : "not_ready",
      subsystems: { store, subscribers: service.hub.size },
      timestamp: new Date().toISOString(),
    };
    return ready ? c.json(body, 200) : c.json(body, 503);
  });

  return routes;
}
