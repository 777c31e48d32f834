/**
 * Tests for the error handler.
 *
 * Verifies domain error codes map to HTTP statuses and every error
 * leaves as the standard envelope.
 */

import { describe, it, expect } from "vitest";
import { Hono } from "hono";
import { HTTPException } from "hono/http-exception";
import { RoyaltyError } from "@rightsline/royalty";
import { captureLogger, createTestApp, jsonRequest } from "../setup.js";
import { createErrorHandler, statusFor } from "../../src/middleware/error-handler.js";

function appThrowing(error: Error, logger = captureLogger().logger): Hono {
  const app = new Hono();
  app.onError(createErrorHandler(logger));
  app.get("/boom", () => {
    throw error;
  });
  return app;
}

describe("statusFor", () => {
  it("maps domain codes to statuses", () => {
    expect(statusFor("OUT_OF_RANGE")).toBe(400);
    expect(statusFor("ALREADY_SETTLED")).toBe(409);
    expect(statusFor("CONTRACT_NOT_FOUND")).toBe(404);
    expect(statusFor("CONFIGURATION_MISSING")).toBe(503);
    expect(statusFor("INVALID_ACTUAL")).toBe(400);
  });

  it("falls back to 500", () => {
    expect(statusFor("SOMETHING_ELSE")).toBe(500);
    expect(statusFor(undefined)).toBe(500);
  });
});

describe("error handler", () => {
  it("answers a coded domain error with its code and message", async () => {
    const app = appThrowing(new RoyaltyError("INVALID_RECORD", "Revenue row 3 is malformed"));

    const res = await app.request("/boom");
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: { code: "INVALID_RECORD", message: "Revenue row 3 is malformed" },
    });
  });

  it("hides unexpected errors behind INTERNAL_ERROR and logs them", async () => {
    const captured = captureLogger();
    const app = appThrowing(new Error("kaboom"), captured.logger);

    const res = await app.request("/boom");
    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      error: { code: "INTERNAL_ERROR", message: "Internal server error" },
    });

    const [line] = captured.lines();
    expect(line).toMatchObject({
      level: 50,
      msg: "Unhandled error",
      path: "/boom",
      err: { type: "Error", message: "kaboom" },
    });
  });

  it("passes an HTTPException's own response through", async () => {
    const app = appThrowing(new HTTPException(401, { message: "Token expired" }));

    const res = await app.request("/boom");
    expect(res.status).toBe(401);
    expect(await res.text()).toBe("Token expired");
  });

  it("maps an out-of-range share fraction to 400 through the full app", async () => {
    const { app } = createTestApp();

    const res = await app.request(
      jsonRequest("/api/v1/shares/nova", "PUT", {
        fraction: "1.5",
        reason: "Typo",
        actor: "label-ops",
      }),
    );

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: {
        code: "OUT_OF_RANGE",
        message: "Share fraction for 'nova' must be within [0, 1], got 1.5",
      },
    });
  });
});
