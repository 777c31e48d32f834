/**
 * Runtime Type Guards
 *
 * Narrowing functions for royalty domain types.
 * These enable safe runtime validation at system boundaries
 * (API inputs, revenue feeds, deserialized data).
 */

import type {
  RevenueRecord,
  ShareProvenance,
  Payout,
  DecimalString,
} from "./royalty.js";
import type { DiscrepancyKind, SplitMismatchKind } from "./reconciliation.js";
import type { EscalationAction } from "./escalation.js";

// =============================================================================
// Scalar guards
// =============================================================================

const DECIMAL_PATTERN = /^-?\d+(\.\d+)?$/;

/** A plain decimal string: optional minus, digits, optional fraction. No exponents. */
export function isDecimalString(value: unknown): value is DecimalString {
  return typeof value === "string" && DECIMAL_PATTERN.test(value.trim());
}

const PROVENANCES = new Set<string>(["contract", "ad-hoc"]);

export function isShareProvenance(value: unknown): value is ShareProvenance {
  return typeof value === "string" && PROVENANCES.has(value);
}

// =============================================================================
// Royalty guards
// =============================================================================

export function isRevenueRecord(value: unknown): value is RevenueRecord {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.artist === "string" &&
    v.artist.length > 0 &&
    (v.track === undefined || typeof v.track === "string") &&
    typeof v.platform === "string" &&
    typeof v.country === "string" &&
    typeof v.period === "string" &&
    typeof v.streams === "number" &&
    Number.isInteger(v.streams) &&
    v.streams >= 0 &&
    isDecimalString(v.revenue)
  );
}

export function isPayout(value: unknown): value is Payout {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.artist === "string" &&
    typeof v.period === "string" &&
    isDecimalString(v.grossRevenue) &&
    isDecimalString(v.shareFraction) &&
    isShareProvenance(v.provenance) &&
    isDecimalString(v.artistShare) &&
    isDecimalString(v.advanceBalance) &&
    isDecimalString(v.advanceDeducted) &&
    isDecimalString(v.netPayout) &&
    typeof v.trackCount === "number" &&
    typeof v.streamCount === "number"
  );
}

// =============================================================================
// Finding guards
// =============================================================================

const DISCREPANCY_KINDS = new Set<string>(["missing_actual", "amount_mismatch"]);
const MISMATCH_KINDS = new Set<string>(["missing_in_registry", "value_mismatch"]);
const ESCALATION_ACTIONS = new Set<string>(["notify_admin", "auto_resolve", "block"]);

export function isDiscrepancyKind(value: unknown): value is DiscrepancyKind {
  return typeof value === "string" && DISCREPANCY_KINDS.has(value);
}

export function isSplitMismatchKind(value: unknown): value is SplitMismatchKind {
  return typeof value === "string" && MISMATCH_KINDS.has(value);
}

export function isEscalationAction(value: unknown): value is EscalationAction {
  return typeof value === "string" && ESCALATION_ACTIONS.has(value);
}
