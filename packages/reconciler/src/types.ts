/**
 * @rightsline/reconciler domain types.
 *
 * Two comparisons against external sources of truth:
 * - Computed payouts ↔ actual payouts reported by the paying side
 * - Engine share table ↔ contract registry share table
 */

import type {
  ArtistId,
  DecimalString,
  DiscrepancyRecord,
  PeriodId,
  SplitMismatch,
} from "@rightsline/types";

// =============================================================================
// Inputs
// =============================================================================

/** Actual payout per artist, as reported by the paying side. */
export type ActualPayouts = Readonly<Record<ArtistId, DecimalString>>;

/**
 * Share fraction per artist from the contract registry. Values may carry
 * floating-point noise from the registry's source format.
 */
export type RegistryShares = Readonly<Record<ArtistId, number | string>>;

/** Engine-side artist → fraction view (a ShareTable snapshot). */
export type EngineShares = Readonly<Record<ArtistId, DecimalString>>;

/** Supplies a fresh snapshot of the contract registry's shares. */
export interface ContractRegistry {
  shares(): RegistryShares;
}

// =============================================================================
// Reconciliation Report
// =============================================================================

export interface ReconciliationSummary {
  readonly checked: number;
  readonly matched: number;
  readonly missingActual: number;
  readonly mismatched: number;

  /** Sum of actual - computed over amount mismatches */
  readonly netDifference: DecimalString;
  readonly allReconciled: boolean;
}

export interface ReconciliationReport {
  readonly id: string;
  readonly period: PeriodId;
  readonly timestamp: string;
  readonly discrepancies: readonly DiscrepancyRecord[];
  readonly summary: ReconciliationSummary;
}

// =============================================================================
// Split Verification Report
// =============================================================================

export interface SplitVerificationSummary {
  readonly checked: number;
  readonly consistent: number;
  readonly missingInRegistry: number;
  readonly valueMismatches: number;

  /** True when any value_mismatch must block payout release */
  readonly blocking: boolean;
}

export interface SplitVerificationReport {
  readonly timestamp: string;
  readonly epsilon: DecimalString;
  readonly mismatches: readonly SplitMismatch[];
  readonly summary: SplitVerificationSummary;
}
