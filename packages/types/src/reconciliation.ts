/**
 * Reconciliation Types
 *
 * Findings produced when computed values are compared against an
 * external source. Findings are data, not errors: disagreement is an
 * expected steady-state condition.
 */

import type { ArtistId, DecimalString, PeriodId } from "./royalty.js";

export type DiscrepancyKind = "missing_actual" | "amount_mismatch";

/** A computed payout that disagrees with the reported actual payout. */
export interface DiscrepancyRecord {
  readonly artist: ArtistId;
  readonly period: PeriodId;
  readonly kind: DiscrepancyKind;

  /** Computed net payout */
  readonly computed: DecimalString;

  /** Reported actual payout (absent for missing_actual) */
  readonly actual?: DecimalString | undefined;

  /** actual - computed (absent for missing_actual) */
  readonly difference?: DecimalString | undefined;
}

export type SplitMismatchKind = "missing_in_registry" | "value_mismatch";

/** Disagreement between the engine's share table and the contract registry. */
export interface SplitMismatch {
  readonly artist: ArtistId;
  readonly kind: SplitMismatchKind;
  readonly engineFraction: DecimalString;

  /** Registry-side value as reported (absent for missing_in_registry) */
  readonly registryFraction?: string | undefined;
}
