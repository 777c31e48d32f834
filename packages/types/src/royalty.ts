/**
 * Royalty Types
 *
 * Records flowing through one royalty computation: the revenue feed,
 * the share table and its audit trail, advances, and computed payouts.
 *
 * Rules:
 * - All amounts are decimal strings, never JavaScript numbers
 * - Payouts are derived values, recomputed on every call
 * - Audit entries are append-only by contract
 */

/** Artist identifier as it appears in the revenue feed and contracts. */
export type ArtistId = string;

/** Accounting period label (e.g. "2025-Q4"). */
export type PeriodId = string;

/**
 * Exact decimal amount in the label's base currency (e.g. "1250.75").
 * Parsed into bigint for arithmetic.
 */
export type DecimalString = string;

/**
 * One reported unit of income from a distributor.
 */
export interface RevenueRecord {
  readonly artist: ArtistId;

  /** Track identifier (ISRC or title). Catalog-level rows have none. */
  readonly track?: string | undefined;

  /** Storefront or DSP (e.g. "spotify", "apple-music") */
  readonly platform: string;

  /** ISO 3166 country code of the sale */
  readonly country: string;

  readonly period: PeriodId;

  /** Non-negative integer stream count */
  readonly streams: number;

  /** Revenue amount, any precision */
  readonly revenue: DecimalString;
}

/**
 * Where a share fraction came from: a signed contract, or an ad-hoc
 * value entered while paperwork is pending.
 */
export type ShareProvenance = "contract" | "ad-hoc";

/** The active revenue-share entry for one artist. */
export interface ShareEntry {
  readonly artist: ArtistId;

  /** Fraction of gross revenue owed to the artist, in [0, 1] */
  readonly fraction: DecimalString;

  readonly provenance: ShareProvenance;

  /** ISO 8601 timestamp of the last update */
  readonly updatedAt: string;
}

/**
 * One change to the share table.
 *
 * Entries are chained: `hash` covers the entry's content plus
 * `previousHash`, so rewriting any past entry breaks every later hash.
 */
export interface AuditEntry {
  /** 1-based position in the audit log */
  readonly sequence: number;
  readonly timestamp: string;
  readonly artist: ArtistId;

  /** Fraction before the change; null when the artist had no entry */
  readonly oldFraction: DecimalString | null;
  readonly newFraction: DecimalString;
  readonly provenance: ShareProvenance;
  readonly reason: string;
  readonly actor: string;

  readonly previousHash: string;
  readonly hash: string;
}

/** Outstanding advance for one artist. */
export interface AdvanceEntry {
  readonly artist: ArtistId;

  /** Non-negative balance still to be recovered */
  readonly balance: DecimalString;
}

/**
 * Computed result for one (artist, period) pair.
 *
 * Invariants:
 * - netPayout = artistShare - advanceDeducted
 * - 0 <= advanceDeducted <= advanceBalance
 * - advanceDeducted <= artistShare whenever artistShare is positive
 */
export interface Payout {
  readonly artist: ArtistId;
  readonly period: PeriodId;

  /** Exact sum of the artist's revenue rows for the period */
  readonly grossRevenue: DecimalString;

  readonly shareFraction: DecimalString;
  readonly provenance: ShareProvenance;

  /** grossRevenue × shareFraction, rounded half-up to payout precision */
  readonly artistShare: DecimalString;

  /** Advance balance before this computation */
  readonly advanceBalance: DecimalString;
  readonly advanceDeducted: DecimalString;
  readonly netPayout: DecimalString;

  /** Distinct track identifiers among the artist's rows */
  readonly trackCount: number;
  readonly streamCount: number;
}

export type RoyaltyWarningKind = "missing_split" | "foreign_period";

/**
 * Soft, per-batch signal from the engine. Never aborts a computation.
 */
export interface RoyaltyWarning {
  readonly kind: RoyaltyWarningKind;
  readonly period: PeriodId;

  /** Present for missing_split */
  readonly artist?: ArtistId | undefined;

  /** Number of revenue rows affected */
  readonly rowCount: number;
  readonly message: string;
}
