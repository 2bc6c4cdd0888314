/**
 * Tests for configuration loading and logger construction.
 */

import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { loadConfig, toNodeContext } from "../src/config.js";
import { createLogger } from "../src/logger.js";

const BANK_KEY = "ab".repeat(32);
const NOTARY_KEY = "cd".repeat(32);

const minimal = { BANK_PUBLIC_KEY: BANK_KEY, NOTARY_PUBLIC_KEY: NOTARY_KEY };

describe("loadConfig", () => {
  it("applies defaults", () => {
    expect(loadConfig(minimal)).toEqual({
      LOG_LEVEL: "info",
      NODE_ENV: "development",
      BANK_HOST: "127.0.0.1",
      BANK_PORT: 8123,
      BANK_PUBLIC_KEY: BANK_KEY,
      NOTARY_HOST: "127.0.0.1",
      NOTARY_PORT: 4001,
      NOTARY_PUBLIC_KEY: NOTARY_KEY,
      CALL_TIMEOUT_MS: 10000,
    });
  });

  it("coerces numeric variables", () => {
    const config = loadConfig({ ...minimal, BANK_PORT: "9000", CALL_TIMEOUT_MS: "250" });
    expect(config.BANK_PORT).toBe(9000);
    expect(config.CALL_TIMEOUT_MS).toBe(250);
  });

  it("requires both authority keys", () => {
    expect(() => loadConfig({ BANK_PUBLIC_KEY: BANK_KEY })).toThrow(ZodError);
  });

  it("rejects malformed keys and ports", () => {
    expect(() => loadConfig({ ...minimal, NOTARY_PUBLIC_KEY: "CD".repeat(32) })).toThrow(ZodError);
    expect(() => loadConfig({ ...minimal, NOTARY_PORT: "70000" })).toThrow(ZodError);
    expect(() => loadConfig({ ...minimal, LOG_LEVEL: "verbose" })).toThrow(ZodError);
  });
});

describe("toNodeContext", () => {
  it("exposes endpoints and authority keys", () => {
    const config = loadConfig({ ...minimal, BANK_HOST: "bank.internal", NOTARY_PORT: "4100" });
    expect(toNodeContext(config)).toEqual({
      bankEndpoint: { host: "bank.internal", port: 8123 },
      notaryEndpoint: { host: "127.0.0.1", port: 4100 },
      bankPublicKey: BANK_KEY,
      notaryPublicKey: NOTARY_KEY,
    });
  });
});

describe("createLogger", () => {
  it("uses the configured level", () => {
    const logger = createLogger({ LOG_LEVEL: "warn", NODE_ENV: "production" });
    expect(logger.level).toBe("warn");
    expect(logger.isLevelEnabled("info")).toBe(false);
    expect(logger.isLevelEnabled("error")).toBe(true);
  });
});
