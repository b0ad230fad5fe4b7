/**
 * @ledgerline/node — Entry point.
 *
 * Bootstraps the Hono app, loads config, opens the store, starts the
 * HTTP server, and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import type { Logger } from "pino";
import { InMemoryFinanceStore, SqliteFinanceStore } from "@ledgerline/store";
import type { FinanceStore } from "@ledgerline/store";
import { loadConfig } from "./config.js";
import type { AppConfig } from "./config.js";
import { createApp } from "./app.js";

function openStore(config: AppConfig, logger: Logger): FinanceStore {
  if (config.STORE_DRIVER === "sqlite") {
    logger.info({ path: config.DATABASE_PATH }, "Opening SQLite store");
    return new SqliteFinanceStore(config.DATABASE_PATH);
  }
  logger.warn("Using the in-memory store; data is lost on restart");
  return new InMemoryFinanceStore();
}

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const { app, service } = createApp({
    store: openStore(config, logger),
    defaultCurrency: config.DEFAULT_CURRENCY,
    alertWarningPercent: config.ALERT_WARNING_PERCENT,
    seedDefaultAccounts: config.SEED_DEFAULT_ACCOUNTS,
    logger,
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info({ port: config.PORT, host: config.HOST }, "Ledgerline node started");

  // Graceful shutdown: ends open SSE streams, then the server, then the store
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, "Shutdown signal received");
    service.hub.close();
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err === undefined ? resolve() : reject(err)));
    });
    service.close();
    logger.info("Shutdown complete");
    process.exit(0);
  };

  const onSignal = (signal: string): void => {
    shutdown(signal).catch((err: unknown) => {
      logger.error({ err, signal }, "Shutdown failed");
      process.exit(1);
    });
  };
  process.on("SIGTERM", () => onSignal("SIGTERM"));
  process.on("SIGINT", () => onSignal("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
