/**
 * Tests for share table and advance routes.
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { AuditEntry, ShareEntry } from "@rightsline/types";
import { createTestApp, jsonRequest } from "../setup.js";
import type { AppInstance } from "../../src/app.js";

let instance: AppInstance;

beforeEach(() => {
  instance = createTestApp();
});

function putShare(artist: string, fraction: string, extra: Record<string, string> = {}): Request {
  return jsonRequest(`/api/v1/shares/${artist}`, "PUT", {
    fraction,
    reason: "Signed contract",
    actor: "label-ops",
    ...extra,
  });
}

// =============================================================================
// PUT /api/v1/shares/:artist
// =============================================================================

describe("PUT /api/v1/shares/:artist", () => {
  it("sets a fraction and returns the audit entry", async () => {
    const { app } = instance;
    const res = await app.request(putShare("nova", "0.70", { provenance: "contract" }));

    expect(res.status).toBe(200);
    const body = (await res.json()) as { data: AuditEntry };
    expect(body.data).toMatchObject({
      sequence: 1,
      timestamp: "2026-01-15T12:00:00.000Z",
      artist: "nova",
      oldFraction: null,
      newFraction: "0.7",
      provenance: "contract",
      reason: "Signed contract",
      actor: "label-ops",
      previousHash: "genesis",
    });
    expect(body.data.hash).toMatch(/^[0-9a-f]{64}$/);
  });

  it("defaults provenance to ad-hoc", async () => {
    const { app } = instance;
    await app.request(putShare("orbit", "0.8"));

    const res = await app.request("/api/v1/shares/orbit");
    const body = (await res.json()) as { data: ShareEntry };
    expect(body.data).toEqual({
      artist: "orbit",
      fraction: "0.8",
      provenance: "ad-hoc",
      updatedAt: "2026-01-15T12:00:00.000Z",
    });
  });

  it("chains the second change to the first", async () => {
    const { app } = instance;
    const first = (await (await app.request(putShare("nova", "0.6"))).json()) as { data: AuditEntry };
    const second = (await (await app.request(putShare("nova", "0.65"))).json()) as { data: AuditEntry };

    expect(second.data.oldFraction).toBe("0.6");
    expect(second.data.previousHash).toBe(first.data.hash);
  });

  it("returns 400 OUT_OF_RANGE for a fraction above 1", async () => {
    const { app } = instance;
    const res = await app.request(putShare("nova", "1.5"));

    expect(res.status).toBe(400);
    const body = (await res.json()) as { error: { code: string; message: string } };
    expect(body.error).toEqual({
      code: "OUT_OF_RANGE",
      message: "Share fraction for 'nova' must be within [0, 1], got 1.5",
    });
  });

  it("returns 400 VALIDATION_ERROR for a non-decimal fraction", async () => {
    const { app } = instance;
    const res = await app.request(putShare("nova", "70%"));

    expect(res.status).toBe(400);
    const body = (await res.json()) as {
      error: { code: string; details: { issues: { path: string }[] } };
    };
    expect(body.error.code).toBe("VALIDATION_ERROR");
    expect(body.error.details.issues[0]?.path).toBe("fraction");
  });

  it("returns 400 for invalid JSON", async () => {
    const { app } = instance;
    const res = await app.request(
      new Request("http://localhost/api/v1/shares/nova", {
        method: "PUT",
        headers: { "Content-Type": "application/json" },
        body: "{not json",
      }),
    );

    expect(res.status).toBe(400);
    const body = (await res.json()) as { error: { message: string } };
    expect(body.error.message).toBe("Invalid JSON in request body");
  });
});

// =============================================================================
// GET /api/v1/shares
// =============================================================================

describe("GET /api/v1/shares", () => {
  it("lists entries in insertion order", async () => {
    const { app } = instance;
    await app.request(putShare("nova", "0.7"));
    await app.request(putShare("orbit", "0.8"));

    const res = await app.request("/api/v1/shares");
    const body = (await res.json()) as { data: ShareEntry[] };
    expect(body.data.map((e) => [e.artist, e.fraction])).toEqual([
      ["nova", "0.7"],
      ["orbit", "0.8"],
    ]);
  });

  it("returns 404 for an artist without a split", async () => {
    const { app } = instance;
    const res = await app.request("/api/v1/shares/ghost");

    expect(res.status).toBe(404);
  });

  it("filters the audit trail", async () => {
    const { app } = instance;
    await app.request(putShare("nova", "0.6"));
    await app.request(putShare("orbit", "0.8"));
    await app.request(putShare("nova", "0.65", { actor: "legal" }));

    const byArtist = (await (await app.request("/api/v1/shares/audit?artist=nova")).json()) as {
      data: AuditEntry[];
    };
    expect(byArtist.data.map((e) => e.sequence)).toEqual([1, 3]);

    const last = (await (await app.request("/api/v1/shares/audit?limit=1")).json()) as {
      data: AuditEntry[];
    };
    expect(last.data.map((e) => e.actor)).toEqual(["legal"]);
  });

  it("rejects a bad audit limit", async () => {
    const { app } = instance;
    const res = await app.request("/api/v1/shares/audit?limit=zero");

    expect(res.status).toBe(400);
  });
});

// =============================================================================
// Advances
// =============================================================================

describe("advances", () => {
  it("sets a balance and reports it", async () => {
    const { app } = instance;
    const res = await app.request(
      jsonRequest("/api/v1/advances/nova", "PUT", { balance: "7500", actor: "finance" }),
    );

    expect(res.status).toBe(200);
    const body = (await res.json()) as { data: unknown };
    expect(body.data).toEqual({
      artist: "nova",
      advanceRemaining: "7500.00",
      status: "has_advance",
    });
  });

  it("lists only advances still being recovered", async () => {
    const { app } = instance;
    await app.request(jsonRequest("/api/v1/advances/nova", "PUT", { balance: "7500.00", actor: "finance" }));
    await app.request(jsonRequest("/api/v1/advances/orbit", "PUT", { balance: "0.00", actor: "finance" }));

    const res = await app.request("/api/v1/advances");
    const body = (await res.json()) as { data: unknown[] };
    expect(body.data).toEqual([
      { artist: "nova", remainingBalance: "7500.00", status: "active" },
    ]);
  });

  it("reports a clear balance for an unknown artist", async () => {
    const { app } = instance;
    const res = await app.request("/api/v1/advances/ghost");
    const body = (await res.json()) as { data: unknown };
    expect(body.data).toEqual({ artist: "ghost", advanceRemaining: "0.00", status: "clear" });
  });

  it("returns 400 OUT_OF_RANGE for a negative balance", async () => {
    const { app } = instance;
    const res = await app.request(
      jsonRequest("/api/v1/advances/nova", "PUT", { balance: "-5.00", actor: "finance" }),
    );

    expect(res.status).toBe(400);
    const body = (await res.json()) as { error: { code: string } };
    expect(body.error.code).toBe("OUT_OF_RANGE");
  });

  it("records the change in the request audit log", async () => {
    const { app } = instance;
    await app.request(jsonRequest("/api/v1/advances/nova", "PUT", { balance: "10.00", actor: "finance" }));

    const res = await app.request("/api/v1/audit?resourceType=advance");
    const body = (await res.json()) as { data: { action: string; actor: string; detail: string }[] };
    expect(body.data).toEqual([
      {
        action: "set_advance",
        resourceType: "advance",
        resourceId: "nova",
        actor: "finance",
        detail: "10.00",
        timestamp: "2026-01-15T12:00:00.000Z",
      },
    ]);
  });
});
