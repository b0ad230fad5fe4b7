/**
 * @ledgerline/node — HTTP surface for the Ledgerline stack.
 *
 * Package public API. The server itself starts from main.ts.
 */

export { FinanceService } from "./services/finance-service.js";
export type {
  FinanceServiceConfig,
  SimpleTransactionInput,
  CreatedParty,
} from "./services/finance-service.js";
export { RolloverUpdateHub } from "./services/rollover-update-hub.js";
export type {
  RolloverSubscriber,
  RolloverUpdateHubOptions,
} from "./services/rollover-update-hub.js";
export { loadConfig, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./types/index.js";
