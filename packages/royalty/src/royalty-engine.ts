/**
 * RoyaltyEngine — per-artist payouts for an accounting period.
 *
 * Chain: partition revenue by artist → sum exactly → apply the artist's
 * share (half-up to payout precision) → net out the advance balance.
 *
 * Rules:
 * - `compute` is read-only: it never mutates shares or advances, so the
 *   same inputs always produce the same payouts
 * - A missing split skips that artist with a warning; the batch goes on
 * - Advance recovery happens only through `settle`
 * - All arithmetic is bigint via @rightsline/money
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import {
  formatAmount,
  maxDecimal,
  minDecimal,
  multiplyHalfUp,
  subtractDecimal,
  sumDecimals,
  isPositiveDecimal,
} from "@rightsline/money";
import { isRevenueRecord } from "@rightsline/types";
import type {
  ArtistId,
  Payout,
  PeriodId,
  RevenueRecord,
  RoyaltyWarning,
} from "@rightsline/types";
import { ShareTable } from "./share-table.js";
import { AdvanceLedger } from "./advance-ledger.js";
import { ConfigurationMissingError, RoyaltyError } from "./errors.js";
import type {
  AdvanceStatus,
  ArtistBalance,
  ArtistFilter,
  ComputationResult,
  PayoutStatement,
  RevenueSource,
  SettlementRecord,
  StatementFormat,
  WarningSink,
} from "./types.js";

// =============================================================================
// Configuration
// =============================================================================

export interface RoyaltyEngineConfig {
  /** Share table to read from. A fresh one is created when omitted. */
  readonly shares?: ShareTable;
  /** Advance ledger to net against. Its precision is the payout precision. */
  readonly advances?: AdvanceLedger;
  /** Payout precision used when the engine creates its own ledger. Default: 2 */
  readonly decimals?: number;
  readonly revenueSource?: RevenueSource;
  readonly onWarning?: WarningSink;
  readonly clock?: () => Date;
}

// =============================================================================
// Engine
// =============================================================================

export class RoyaltyEngine {
  readonly shares: ShareTable;
  readonly advances: AdvanceLedger;

  private readonly decimals: number;
  private readonly revenueSource: RevenueSource | undefined;
  private readonly onWarning: WarningSink | undefined;
  private readonly now: () => Date;
  private readonly settled = new Set<string>();

  constructor(config: RoyaltyEngineConfig = {}) {
    this.now = config.clock ?? (() => new Date());
    this.shares = config.shares ?? new ShareTable(this.now);
    this.advances = config.advances ?? new AdvanceLedger(config.decimals ?? 2);
    this.decimals = this.advances.decimals;
    this.revenueSource = config.revenueSource;
    this.onWarning = config.onWarning;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Computation
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Compute payouts for a period. Warnings go to the configured sink.
   */
  compute(
    period: PeriodId,
    rows: readonly RevenueRecord[],
    artistFilter?: ArtistFilter,
  ): readonly Payout[] {
    return this.computeDetailed(period, rows, artistFilter).payouts;
  }

  /**
   * Compute payouts and return the warnings alongside them.
   *
   * An empty `payouts` list is not an error: check `warnings` to tell
   * "no revenue" from "no splits".
   *
   * @throws {RoyaltyError} INVALID_RECORD if a row is malformed
   */
  computeDetailed(
    period: PeriodId,
    rows: readonly RevenueRecord[],
    artistFilter?: ArtistFilter,
  ): ComputationResult {
    const filter = toFilterSet(artistFilter);
    const byArtist = new Map<ArtistId, RevenueRecord[]>();
    const warnings: RoyaltyWarning[] = [];
    let foreignRows = 0;

    rows.forEach((row, index) => {
      if (!isRevenueRecord(row)) {
        throw new RoyaltyError(
          "INVALID_RECORD",
          `Revenue row ${String(index)} is malformed: ${JSON.stringify(row)}`,
        );
      }
      if (filter !== null && !filter.has(row.artist)) return;
      if (row.period !== period) {
        foreignRows += 1;
        return;
      }
      const list = byArtist.get(row.artist) ?? [];
      list.push(row);
      byArtist.set(row.artist, list);
    });

    if (foreignRows > 0) {
      warnings.push({
        kind: "foreign_period",
        period,
        rowCount: foreignRows,
        message: `${String(foreignRows)} revenue row(s) belong to another period and were excluded from ${period}`,
      });
    }

    const payouts: Payout[] = [];
    for (const [artist, artistRows] of byArtist) {
      const payout = this.computeArtist(period, artist, artistRows);
      if (payout === null) {
        warnings.push({
          kind: "missing_split",
          period,
          artist,
          rowCount: artistRows.length,
          message: `No split for '${artist}', skipped ${String(artistRows.length)} revenue row(s)`,
        });
        continue;
      }
      payouts.push(payout);
    }

    if (this.onWarning !== undefined) {
      for (const warning of warnings) {
        this.onWarning(warning);
      }
    }

    return { payouts, warnings };
  }

  /**
   * Pull the period's revenue from the configured source and compute.
   *
   * @throws {ConfigurationMissingError} if no revenue source is wired in
   */
  async fetchAndCompute(
    period: PeriodId,
    artistFilter?: ArtistFilter,
  ): Promise<ComputationResult> {
    if (this.revenueSource === undefined) {
      throw new ConfigurationMissingError("Revenue source");
    }
    const rows = await this.revenueSource.fetch(period);
    return this.computeDetailed(period, rows, artistFilter);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Settlement
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Recover advances for released payouts.
   *
   * Each payout's `advanceDeducted` is taken off the ledger, clamped at the
   * current balance. A batch is all-or-nothing: if any (artist, period) was
   * already settled, nothing is applied.
   *
   * @throws {RoyaltyError} ALREADY_SETTLED
   */
  settle(payouts: readonly Payout[], actor: string): readonly SettlementRecord[] {
    const keys = new Set<string>();
    for (const p of payouts) {
      const key = settlementKey(p.artist, p.period);
      if (this.settled.has(key) || keys.has(key)) {
        throw new RoyaltyError(
          "ALREADY_SETTLED",
          `Payout for '${p.artist}' in ${p.period} was already settled`,
        );
      }
      keys.add(key);
    }

    const settledAt = this.now().toISOString();
    const records = payouts.map((p): SettlementRecord => {
      const recovery = this.advances.recover(p.artist, p.advanceDeducted);
      return {
        artist: p.artist,
        period: p.period,
        balanceBefore: recovery.balanceBefore,
        recovered: recovery.recovered,
        balanceAfter: recovery.balanceAfter,
        settledBy: actor,
        settledAt,
      };
    });

    for (const key of keys) {
      this.settled.add(key);
    }
    return records;
  }

  isSettled(artist: ArtistId, period: PeriodId): boolean {
    return this.settled.has(settlementKey(artist, period));
  }

  // ───────────────────────────────────────────────────────────────────────
  // Reporting
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Statement metadata for the export collaborator.
   */
  statement(payout: Payout, format: StatementFormat = "pdf"): PayoutStatement {
    return {
      artist: payout.artist,
      period: payout.period,
      format,
      generatedAt: this.now().toISOString(),
      filename: `royalty_${reportLabel(payout.artist, payout.period)}.${format}`,
      payout: {
        grossRevenue: payout.grossRevenue,
        shareFraction: payout.shareFraction,
        artistShare: payout.artistShare,
        advanceDeducted: payout.advanceDeducted,
        netPayout: payout.netPayout,
      },
    };
  }

  /** Advances with a balance still to recover. */
  activeAdvances(artist?: ArtistId): readonly AdvanceStatus[] {
    return this.advances
      .active()
      .filter((e) => artist === undefined || e.artist === artist)
      .map((e) => ({ artist: e.artist, remainingBalance: e.balance, status: "active" as const }));
  }

  artistBalance(artist: ArtistId): ArtistBalance {
    const remaining = this.advances.get(artist);
    return {
      artist,
      advanceRemaining: remaining,
      status: isPositiveDecimal(remaining) ? "has_advance" : "clear",
    };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private
  // ───────────────────────────────────────────────────────────────────────

  private computeArtist(
    period: PeriodId,
    artist: ArtistId,
    rows: readonly RevenueRecord[],
  ): Payout | null {
    const entry = this.shares.entry(artist);
    if (entry === undefined) {
      return null;
    }

    const grossRevenue = sumDecimals(rows.map((r) => r.revenue), this.decimals);
    let streamCount = 0;
    const tracks = new Set<string>();
    for (const row of rows) {
      streamCount += row.streams;
      if (row.track) {
        tracks.add(row.track);
      }
    }

    const zero = formatAmount(0n, this.decimals);
    const artistShare = multiplyHalfUp(grossRevenue, entry.fraction, this.decimals);
    const advanceBalance = this.advances.get(artist);
    const advanceDeducted = maxDecimal(minDecimal(advanceBalance, artistShare), zero);
    const netPayout = subtractDecimal(artistShare, advanceDeducted);

    return {
      artist,
      period,
      grossRevenue,
      shareFraction: entry.fraction,
      provenance: entry.provenance,
      artistShare,
      advanceBalance,
      advanceDeducted,
      netPayout,
      trackCount: tracks.size,
      streamCount,
    };
  }
}

// =============================================================================
// Helpers
// =============================================================================

function toFilterSet(filter: ArtistFilter | undefined): ReadonlySet<ArtistId> | null {
  if (filter === undefined) return null;
  return new Set(typeof filter === "string" ? [filter] : filter);
}

function settlementKey(artist: ArtistId, period: PeriodId): string {
  return JSON.stringify([artist, period]);
}

/**
 * Filename-safe label for an artist's statement: "Nova Vega", "Q4 2025"
 * → "Nova_Vega_Q4_2025". Letters of any script are kept.
 */
export function reportLabel(artist: ArtistId, period: PeriodId): string {
  const safe = (s: string): string =>
    s.replace(/[^\p{L}\p{N}.-]+/gu, "_").replace(/^[._]+|_+$/g, "") || "unknown";
  return `${safe(artist)}_${safe(period)}`;
}

/**
 * SHA-256 over the canonical JSON of a payout batch.
 * Identical inputs to `compute` produce identical digests.
 */
export function payoutDigest(payouts: readonly Payout[]): string {
  return createHash("sha256").update(canonicalize(payouts)).digest("hex");
}
