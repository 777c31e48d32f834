/**
 * Runtime type guard tests for @rightsline/types
 *
 * Validates that guards narrow correctly for valid inputs
 * and reject invalid / malformed inputs at system boundaries.
 */
import { describe, it, expect } from "vitest";
import {
  isDecimalString,
  isShareProvenance,
  isRevenueRecord,
  isPayout,
  isDiscrepancyKind,
  isSplitMismatchKind,
  isEscalationAction,
} from "../src/guards.js";

// =============================================================================
// Scalar guards
// =============================================================================

describe("isDecimalString", () => {
  it("accepts integers and decimals", () => {
    expect(isDecimalString("100")).toBe(true);
    expect(isDecimalString("100.50")).toBe(true);
    expect(isDecimalString("-0.005")).toBe(true);
  });

  it("rejects numbers", () => {
    expect(isDecimalString(100.5)).toBe(false);
  });

  it("rejects exponent notation", () => {
    expect(isDecimalString("1e-7")).toBe(false);
  });

  it("rejects a trailing dot", () => {
    expect(isDecimalString("10.")).toBe(false);
  });
});

describe("isShareProvenance", () => {
  it("accepts known provenances", () => {
    expect(isShareProvenance("contract")).toBe(true);
    expect(isShareProvenance("ad-hoc")).toBe(true);
  });

  it("rejects anything else", () => {
    expect(isShareProvenance("manual")).toBe(false);
    expect(isShareProvenance(undefined)).toBe(false);
  });
});

// =============================================================================
// Royalty guards
// =============================================================================

describe("isRevenueRecord", () => {
  const valid = {
    artist: "nova",
    track: "ISRC-001",
    platform: "spotify",
    country: "DE",
    period: "2025-Q4",
    streams: 1200,
    revenue: "4.80",
  };

  it("accepts a valid record", () => {
    expect(isRevenueRecord(valid)).toBe(true);
  });

  it("accepts a catalog-level record without track", () => {
    const { track: _track, ...rest } = valid;
    expect(isRevenueRecord(rest)).toBe(true);
  });

  it("rejects negative streams", () => {
    expect(isRevenueRecord({ ...valid, streams: -1 })).toBe(false);
  });

  it("rejects fractional streams", () => {
    expect(isRevenueRecord({ ...valid, streams: 1.5 })).toBe(false);
  });

  it("rejects numeric revenue", () => {
    expect(isRevenueRecord({ ...valid, revenue: 4.8 })).toBe(false);
  });

  it("rejects empty artist", () => {
    expect(isRevenueRecord({ ...valid, artist: "" })).toBe(false);
  });

  it("rejects null", () => {
    expect(isRevenueRecord(null)).toBe(false);
  });
});

describe("isPayout", () => {
  const valid = {
    artist: "nova",
    period: "2025-Q4",
    grossRevenue: "500.00",
    shareFraction: "0.8",
    provenance: "contract",
    artistShare: "400.00",
    advanceBalance: "100.00",
    advanceDeducted: "100.00",
    netPayout: "300.00",
    trackCount: 2,
    streamCount: 90000,
  };

  it("accepts a valid payout", () => {
    expect(isPayout(valid)).toBe(true);
  });

  it("rejects an unknown provenance", () => {
    expect(isPayout({ ...valid, provenance: "guess" })).toBe(false);
  });

  it("rejects a numeric net payout", () => {
    expect(isPayout({ ...valid, netPayout: 300 })).toBe(false);
  });
});

// =============================================================================
// Finding guards
// =============================================================================

describe("finding kind guards", () => {
  it("recognizes discrepancy kinds", () => {
    expect(isDiscrepancyKind("missing_actual")).toBe(true);
    expect(isDiscrepancyKind("amount_mismatch")).toBe(true);
    expect(isDiscrepancyKind("missing_intent")).toBe(false);
  });

  it("recognizes split mismatch kinds", () => {
    expect(isSplitMismatchKind("missing_in_registry")).toBe(true);
    expect(isSplitMismatchKind("value_mismatch")).toBe(true);
    expect(isSplitMismatchKind("mismatch")).toBe(false);
  });

  it("recognizes escalation actions", () => {
    expect(isEscalationAction("block")).toBe(true);
    expect(isEscalationAction("notify_admin")).toBe(true);
    expect(isEscalationAction("auto_resolve")).toBe(true);
    expect(isEscalationAction("ignore")).toBe(false);
  });
});
