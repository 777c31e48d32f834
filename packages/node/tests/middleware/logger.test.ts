/**
 * Tests for request logging.
 */

import { describe, it, expect } from "vitest";
import { Hono } from "hono";
import type { AppEnv } from "../../src/types/api-contract.js";
import { loggerMiddleware } from "../../src/middleware/logger.js";
import { requestIdMiddleware } from "../../src/middleware/request-id.js";
import { createErrorHandler } from "../../src/middleware/error-handler.js";
import { createApp } from "../../src/app.js";
import { captureLogger, createTestApp, jsonRequest } from "../setup.js";
import type { LogLine } from "../setup.js";

function httpLines(lines: LogLine[]): LogLine[] {
  return lines.filter((l) => l.component === "http");
}

describe("loggerMiddleware", () => {
  it("logs one info line per successful request", async () => {
    const captured = captureLogger();
    const { app } = createTestApp({}, captured.logger);

    await app.request("/health", { headers: { "X-Request-Id": "req-1" } });

    const lines = httpLines(captured.lines());
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      level: 30,
      msg: "GET /health 200",
      method: "GET",
      path: "/health",
      status: 200,
      requestId: "req-1",
    });
    expect(lines[0]?.durationMs).toBeGreaterThanOrEqual(0);
  });

  it("logs client errors at warn", async () => {
    const captured = captureLogger();
    const { app } = createTestApp({}, captured.logger);

    await app.request(jsonRequest("/api/v1/shares/nova", "PUT", { fraction: "0.5" }));

    const [line] = httpLines(captured.lines());
    expect(line).toMatchObject({ level: 40, msg: "PUT /api/v1/shares/nova 400" });
  });

  it("logs server errors at error", async () => {
    const captured = captureLogger();
    const app = new Hono<AppEnv>();
    app.use("*", requestIdMiddleware(() => "req-fixed"));
    app.use("*", loggerMiddleware(captured.logger));
    app.onError(createErrorHandler(captured.logger));
    app.get("/boom", () => {
      throw new Error("kaboom");
    });

    await app.request("/boom");

    const [line] = httpLines(captured.lines());
    expect(line).toMatchObject({
      level: 50,
      msg: "GET /boom 500",
      status: 500,
      requestId: "req-fixed",
    });
  });

  it("stays quiet when request logging is off", async () => {
    const captured = captureLogger();
    const { app } = createApp({
      serviceConfig: {
        baseCurrency: "USD",
        payoutDecimals: 2,
        splitEpsilon: "0.001",
        expiryHorizonDays: 90,
      },
      logger: captured.logger,
      logRequests: false,
    });

    await app.request("/health");

    expect(httpLines(captured.lines())).toEqual([]);
  });
});
