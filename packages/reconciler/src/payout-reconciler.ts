/**
 * ReconciliationChecker — computed payouts ↔ reported actual payouts.
 *
 * Comparison is exact decimal equality: any non-zero difference is a
 * discrepancy. Artists that appear only in the actuals are out of the
 * engine's revenue scope and are not reported here.
 */

import { compareDecimal, subtractDecimal, sumDecimals } from "@rightsline/money";
import { isDecimalString } from "@rightsline/types";
import type { DiscrepancyRecord, Payout, PeriodId } from "@rightsline/types";
import type {
  ActualPayouts,
  ReconciliationReport,
  ReconciliationSummary,
} from "./types.js";

// =============================================================================
// Error
// =============================================================================

/**
 * The actual-payout input itself is unusable. Disagreements between
 * computed and actual amounts are never thrown; they are discrepancies.
 */
export class ReconciliationError extends Error {
  public readonly code: ReconciliationErrorCode;
  constructor(code: ReconciliationErrorCode, message: string) {
    super(message);
    this.name = "ReconciliationError";
    this.code = code;
  }
}

export type ReconciliationErrorCode = "INVALID_ACTUAL";

let reportCounter = 0;

export class ReconciliationChecker {
  private readonly now: () => Date;

  constructor(clock: () => Date = () => new Date()) {
    this.now = clock;
  }

  /**
   * Compare each computed net payout with the reported actual.
   *
   * Strategy:
   * 1. Index actuals by artist
   * 2. Missing actual → missing_actual
   * 3. Different amount → amount_mismatch with difference = actual - computed
   *
   * Every actual amount must be a plain decimal string. The whole input is
   * checked before any comparison, so a bad value yields no partial result.
   *
   * @throws {ReconciliationError} INVALID_ACTUAL naming the first bad artist
   */
  reconcile(
    period: PeriodId,
    computed: readonly Payout[],
    actual: ActualPayouts,
  ): readonly DiscrepancyRecord[] {
    const actuals = new Map(Object.entries(actual));
    for (const [artist, amount] of actuals) {
      if (!isDecimalString(amount)) {
        throw new ReconciliationError(
          "INVALID_ACTUAL",
          `Actual payout for '${artist}' is not a decimal: ${JSON.stringify(amount)}`,
        );
      }
    }
    const discrepancies: DiscrepancyRecord[] = [];

    for (const payout of computed) {
      const reported = actuals.get(payout.artist);

      if (reported === undefined) {
        discrepancies.push({
          artist: payout.artist,
          period,
          kind: "missing_actual",
          computed: payout.netPayout,
        });
        continue;
      }

      if (compareDecimal(reported, payout.netPayout) !== 0) {
        discrepancies.push({
          artist: payout.artist,
          period,
          kind: "amount_mismatch",
          computed: payout.netPayout,
          actual: reported,
          difference: subtractDecimal(reported, payout.netPayout),
        });
      }
    }

    return discrepancies;
  }

  /**
   * Reconcile and summarize in one report.
   */
  report(
    period: PeriodId,
    computed: readonly Payout[],
    actual: ActualPayouts,
  ): ReconciliationReport {
    const discrepancies = this.reconcile(period, computed, actual);
    const timestamp = this.now().toISOString();

    reportCounter += 1;
    return {
      id: `recon:${period}:${String(Date.parse(timestamp))}:${String(reportCounter)}`,
      period,
      timestamp,
      discrepancies,
      summary: summarize(computed.length, discrepancies),
    };
  }
}

function summarize(
  checked: number,
  discrepancies: readonly DiscrepancyRecord[],
): ReconciliationSummary {
  const missingActual = discrepancies.filter((d) => d.kind === "missing_actual").length;
  const mismatches = discrepancies.filter((d) => d.kind === "amount_mismatch");
  const netDifference = sumDecimals(
    mismatches.map((d) => d.difference ?? "0"),
    2,
  );

  return {
    checked,
    matched: checked - discrepancies.length,
    missingActual,
    mismatched: mismatches.length,
    netDifference,
    allReconciled: discrepancies.length === 0,
  };
}
