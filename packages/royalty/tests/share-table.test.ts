/**
 * Tests for ShareTable — share fractions and their audit trail.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { ShareTable } from "../src/share-table.js";
import { OutOfRangeError } from "../src/errors.js";
import { GENESIS_HASH } from "../src/audit-chain.js";

const fixedClock = (): Date => new Date("2025-10-01T09:00:00.000Z");

describe("ShareTable", () => {
  let table: ShareTable;

  beforeEach(() => {
    table = new ShareTable(fixedClock);
  });

  it("returns undefined for an unknown artist", () => {
    expect(table.get("nova")).toBeUndefined();
    expect(table.has("nova")).toBe(false);
  });

  it("stores a normalized fraction", () => {
    table.set("nova", "0.70", "initial contract", "finance");
    expect(table.get("nova")).toBe("0.7");
  });

  it("defaults provenance to ad-hoc", () => {
    table.set("nova", "0.5", "pending paperwork", "finance");
    expect(table.entry("nova")).toEqual({
      artist: "nova",
      fraction: "0.5",
      provenance: "ad-hoc",
      updatedAt: "2025-10-01T09:00:00.000Z",
    });
  });

  it("accepts both bounds of [0, 1]", () => {
    table.set("a", "0", "bound", "finance");
    table.set("b", "1.000", "bound", "finance");
    expect(table.get("a")).toBe("0");
    expect(table.get("b")).toBe("1");
  });

  it("rejects a fraction above 1", () => {
    expect(() => table.set("nova", "1.01", "typo", "finance")).toThrow(OutOfRangeError);
  });

  it("rejects a negative fraction", () => {
    expect(() => table.set("nova", "-0.1", "typo", "finance")).toThrow(/within \[0, 1\]/);
  });

  it("rejects a malformed fraction", () => {
    expect(() => table.set("nova", "60%", "typo", "finance")).toThrow(/not a decimal/);
  });

  it("leaves table and log untouched on rejection", () => {
    table.set("nova", "0.6", "contract", "finance");
    expect(() => table.set("nova", "2", "typo", "finance")).toThrow(OutOfRangeError);
    expect(table.get("nova")).toBe("0.6");
    expect(table.auditLog()).toHaveLength(1);
  });

  // ─── Audit log ─────────────────────────────────────────────────────

  describe("audit log", () => {
    it("appends one entry per set with old and new fraction", () => {
      const first = table.set("nova", "0.6", "contract signed", "max", "contract");
      const second = table.set("nova", "0.65", "amendment", "max", "contract");

      expect(first.sequence).toBe(1);
      expect(first.oldFraction).toBeNull();
      expect(first.newFraction).toBe("0.6");
      expect(first.previousHash).toBe(GENESIS_HASH);

      expect(second.sequence).toBe(2);
      expect(second.oldFraction).toBe("0.6");
      expect(second.newFraction).toBe("0.65");
      expect(second.reason).toBe("amendment");
      expect(second.actor).toBe("max");
      expect(second.previousHash).toBe(first.hash);
    });

    it("returns a copy of the log", () => {
      table.set("nova", "0.6", "contract", "max");
      const before = table.auditLog();
      table.set("nova", "0.7", "amendment", "max");
      expect(before).toHaveLength(1);
      expect(table.auditLog()).toHaveLength(2);
    });

    it("filters by artist and actor", () => {
      table.set("nova", "0.6", "contract", "max");
      table.set("ray", "0.5", "contract", "rita");
      table.set("nova", "0.7", "amendment", "rita");

      expect(table.auditLog({ artist: "nova" }).map((e) => e.newFraction)).toEqual(["0.6", "0.7"]);
      expect(table.auditLog({ actor: "rita" }).map((e) => e.artist)).toEqual(["ray", "nova"]);
      expect(table.auditLog({ limit: 1 }).map((e) => e.sequence)).toEqual([3]);
    });

    it("verifies an untouched chain", () => {
      table.set("nova", "0.6", "contract", "max");
      table.set("nova", "0.7", "amendment", "max");
      expect(table.verifyAuditLog()).toEqual({
        valid: true,
        lastVerifiedSequence: 2,
        errors: [],
      });
    });
  });

  // ─── Snapshot ──────────────────────────────────────────────────────

  it("snapshots artist → fraction", () => {
    table.set("nova", "0.60", "contract", "max");
    table.set("ray", "0.5", "contract", "max");
    expect(table.snapshot()).toEqual({ nova: "0.6", ray: "0.5" });
    expect(table.artists()).toEqual(["nova", "ray"]);
    expect(table.size).toBe(2);
  });
});
