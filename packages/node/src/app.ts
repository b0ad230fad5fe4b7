/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts for testability — tests create the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import pino from "pino";
import type { Logger } from "pino";
import { InMemoryFinanceStore } from "@ledgerline/store";
import type { FinanceStore } from "@ledgerline/store";
import type { AppEnv } from "./types/api-contract.js";
import { FinanceService } from "./services/finance-service.js";
import {
  createErrorHandler,
  loggerMiddleware,
  partyMiddleware,
  requestIdMiddleware,
} from "./middleware/index.js";
import {
  createAccountRoutes,
  createBudgetRoutes,
  createCategoryRoutes,
  createHealthRoutes,
  createPartyRoutes,
  createRolloverRoutes,
  createTransactionRoutes,
} from "./routes/index.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  /** Defaults to a fresh in-memory store */
  readonly store?: FinanceStore | undefined;
  readonly defaultCurrency?: string | undefined;
  readonly alertWarningPercent?: number | undefined;
  readonly seedDefaultAccounts?: boolean | undefined;
  /** Root logger; request lines and service children hang off it. Silent by default. */
  readonly logger?: Logger | undefined;
  readonly clock?: (() => Date) | undefined;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: FinanceService;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options?: CreateAppOptions): AppInstance {
  const logger = options?.logger ?? pino({ level: "silent" });
  const service = new FinanceService({
    store: options?.store ?? new InMemoryFinanceStore(),
    defaultCurrency: options?.defaultCurrency,
    alertWarningPercent: options?.alertWarningPercent,
    seedDefaultAccounts: options?.seedDefaultAccounts,
    logger,
    clock: options?.clock,
  });

  const httpLogger = logger.child({ component: "http" });
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());
  app.use("*", loggerMiddleware(httpLogger));

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(createErrorHandler(httpLogger));

  // ─── Health Routes ──────────────────────────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });
  app.use("/api/*", partyMiddleware());

  app.route("/api/v1/parties", createPartyRoutes());
  app.route("/api/v1/accounts", createAccountRoutes());
  app.route("/api/v1/categories", createCategoryRoutes());
  app.route("/api/v1/transactions", createTransactionRoutes());
  app.route("/api/v1/budgets", createBudgetRoutes());
  app.route("/api/v1/rollover", createRolloverRoutes());

  return { app, service };
}
