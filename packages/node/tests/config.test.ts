/**
 * Tests for config.ts — loadConfig.
 */

import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { loadConfig } from "../src/config.js";

describe("loadConfig", () => {
  it("applies defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      PORT: 3000,
      HOST: "0.0.0.0",
      LOG_LEVEL: "info",
      NODE_ENV: "development",
      STORE_DRIVER: "memory",
      DATABASE_PATH: "ledgerline.db",
      DEFAULT_CURRENCY: "USD",
      ALERT_WARNING_PERCENT: 75,
      SEED_DEFAULT_ACCOUNTS: true,
    });
  });

  it("coerces numbers and flags from strings", () => {
    const config = loadConfig({
      PORT: "8080",
      ALERT_WARNING_PERCENT: "90",
      SEED_DEFAULT_ACCOUNTS: "false",
      STORE_DRIVER: "sqlite",
      DATABASE_PATH: "/var/lib/ledgerline/finance.db",
    });

    expect(config.PORT).toBe(8080);
    expect(config.ALERT_WARNING_PERCENT).toBe(90);
    expect(config.SEED_DEFAULT_ACCOUNTS).toBe(false);
    expect(config.STORE_DRIVER).toBe("sqlite");
    expect(config.DATABASE_PATH).toBe("/var/lib/ledgerline/finance.db");
  });

  it("ignores unrelated variables", () => {
    const config = loadConfig({ HOME: "/root", PATH: "/usr/bin" });
    expect(config).not.toHaveProperty("HOME");
  });

  it.each([
    ["PORT", "0"],
    ["PORT", "not-a-port"],
    ["LOG_LEVEL", "verbose"],
    ["STORE_DRIVER", "postgres"],
    ["DEFAULT_CURRENCY", "usd"],
    ["ALERT_WARNING_PERCENT", "120"],
    ["SEED_DEFAULT_ACCOUNTS", "yes"],
  ])("rejects %s=%s", (key, value) => {
    expect(() => loadConfig({ [key]: value })).toThrow(ZodError);
  });
});
