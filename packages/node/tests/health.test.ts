/**
 * Tests for health routes.
 */

import { describe, it, expect } from "vitest";
import { createTestApp, jsonRequest } from "./setup.js";

describe("GET /health", () => {
  it("returns 200 with status ok", async () => {
    const { app } = createTestApp();
    const res = await app.request("/health");

    expect(res.status).toBe(200);
    const body = (await res.json()) as { status: string; timestamp: string };
    expect(body.status).toBe("ok");
  });
});

describe("GET /ready", () => {
  it("is ready with an empty share table", async () => {
    const { app } = createTestApp();
    const res = await app.request("/ready");

    expect(res.status).toBe(200);
    const body = (await res.json()) as {
      status: string;
      auditChain: { valid: boolean; lastVerifiedSequence: number; errors: number };
    };
    expect(body.status).toBe("ready");
    expect(body.auditChain).toEqual({ valid: true, lastVerifiedSequence: 0, errors: 0 });
  });

  it("reports the verified audit chain length", async () => {
    const { app } = createTestApp();
    for (const [artist, fraction] of [["nova", "0.7"], ["orbit", "0.8"]] as const) {
      await app.request(
        jsonRequest(`/api/v1/shares/${artist}`, "PUT", {
          fraction,
          reason: "initial",
          actor: "label-ops",
        }),
      );
    }

    const res = await app.request("/ready");
    const body = (await res.json()) as { auditChain: { lastVerifiedSequence: number } };
    expect(body.auditChain.lastVerifiedSequence).toBe(2);
  });
});

describe("unknown routes", () => {
  it("answers with the error envelope", async () => {
    const { app } = createTestApp();
    const res = await app.request("/api/v1/nothing-here");

    expect(res.status).toBe(404);
    const body = (await res.json()) as { error: { code: string; message: string } };
    expect(body.error).toEqual({
      code: "NOT_FOUND",
      message: "No route for GET /api/v1/nothing-here",
    });
  });
});
