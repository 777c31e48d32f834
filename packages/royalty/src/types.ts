/**
 * @rightsline/royalty — Engine collaborator contracts and result types.
 */

import type {
  ArtistId,
  DecimalString,
  PeriodId,
  Payout,
  RevenueRecord,
  RoyaltyWarning,
} from "@rightsline/types";

// =============================================================================
// Collaborators
// =============================================================================

/**
 * Supplies the revenue feed for a period: already deduplicated and
 * denominated in the base currency.
 */
export interface RevenueSource {
  fetch(period: PeriodId): Promise<readonly RevenueRecord[]>;
}

/** Receives engine warnings as they are produced. */
export type WarningSink = (warning: RoyaltyWarning) => void;

/** A single artist or a list of artists to restrict a computation to. */
export type ArtistFilter = ArtistId | readonly ArtistId[];

// =============================================================================
// Results
// =============================================================================

export interface ComputationResult {
  readonly payouts: readonly Payout[];
  readonly warnings: readonly RoyaltyWarning[];
}

/** Advance recovery applied for one settled payout. */
export interface SettlementRecord {
  readonly artist: ArtistId;
  readonly period: PeriodId;
  readonly balanceBefore: DecimalString;
  readonly recovered: DecimalString;
  readonly balanceAfter: DecimalString;
  readonly settledBy: string;
  readonly settledAt: string;
}

export type StatementFormat = "pdf" | "xlsx";

/**
 * Everything the export collaborator needs to render an artist's
 * statement for a period.
 */
export interface PayoutStatement {
  readonly artist: ArtistId;
  readonly period: PeriodId;
  readonly format: StatementFormat;
  readonly generatedAt: string;
  readonly filename: string;
  readonly payout: {
    readonly grossRevenue: DecimalString;
    readonly shareFraction: DecimalString;
    readonly artistShare: DecimalString;
    readonly advanceDeducted: DecimalString;
    readonly netPayout: DecimalString;
  };
}

export interface ArtistBalance {
  readonly artist: ArtistId;
  readonly advanceRemaining: DecimalString;
  readonly status: "has_advance" | "clear";
}

export interface AdvanceStatus {
  readonly artist: ArtistId;
  readonly remainingBalance: DecimalString;
  readonly status: "active";
}
