/**
 * Tests for config.ts — loadConfig.
 */

import { describe, it, expect } from "vitest";
import { loadConfig } from "../src/config.js";

describe("loadConfig", () => {
  it("returns defaults when env is empty", () => {
    const config = loadConfig({});
    expect(config.PORT).toBe(3000);
    expect(config.HOST).toBe("0.0.0.0");
    expect(config.LOG_LEVEL).toBe("info");
    expect(config.NODE_ENV).toBe("development");
    expect(config.BASE_CURRENCY).toBe("USD");
    expect(config.PAYOUT_DECIMALS).toBe(2);
    expect(config.SPLIT_EPSILON).toBe("0.001");
    expect(config.EXPIRY_HORIZON_DAYS).toBe(90);
  });

  it("parses overridden values", () => {
    const config = loadConfig({
      PORT: "8080",
      HOST: "127.0.0.1",
      LOG_LEVEL: "debug",
      NODE_ENV: "production",
      BASE_CURRENCY: "EUR",
      PAYOUT_DECIMALS: "4",
      SPLIT_EPSILON: "0.0005",
      EXPIRY_HORIZON_DAYS: "30",
    });
    expect(config.PORT).toBe(8080);
    expect(config.HOST).toBe("127.0.0.1");
    expect(config.LOG_LEVEL).toBe("debug");
    expect(config.NODE_ENV).toBe("production");
    expect(config.BASE_CURRENCY).toBe("EUR");
    expect(config.PAYOUT_DECIMALS).toBe(4);
    expect(config.SPLIT_EPSILON).toBe("0.0005");
    expect(config.EXPIRY_HORIZON_DAYS).toBe(30);
  });

  it("throws on invalid PORT", () => {
    expect(() => loadConfig({ PORT: "0" })).toThrow();
    expect(() => loadConfig({ PORT: "99999" })).toThrow();
  });

  it("throws on invalid LOG_LEVEL", () => {
    expect(() => loadConfig({ LOG_LEVEL: "verbose" })).toThrow();
  });

  it("throws on out-of-range PAYOUT_DECIMALS", () => {
    expect(() => loadConfig({ PAYOUT_DECIMALS: "7" })).toThrow();
  });

  it("throws on a malformed SPLIT_EPSILON", () => {
    expect(() => loadConfig({ SPLIT_EPSILON: "1e-3" })).toThrow(
      "SPLIT_EPSILON must be a non-negative decimal",
    );
  });

  it("throws on a currency that is not a three-letter code", () => {
    expect(() => loadConfig({ BASE_CURRENCY: "EURO" })).toThrow();
  });
});
