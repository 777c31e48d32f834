/**
 * @rightsline/reconciler — Consistency checks against external truth.
 *
 * Two comparisons:
 * 1. Computed payouts ↔ actual payouts — did the money paid match?
 * 2. Engine splits ↔ contract registry — are we paying what was signed?
 *
 * Findings are returned as data, never thrown. Only unusable input
 * (a non-decimal actual amount) raises ReconciliationError.
 */

export { ReconciliationChecker, ReconciliationError } from "./payout-reconciler.js";
export type { ReconciliationErrorCode } from "./payout-reconciler.js";
export {
  SplitConsistencyChecker,
  DEFAULT_SPLIT_EPSILON,
} from "./split-consistency.js";
export type { SplitConsistencyConfig } from "./split-consistency.js";

export type {
  ActualPayouts,
  RegistryShares,
  EngineShares,
  ContractRegistry,
  ReconciliationSummary,
  ReconciliationReport,
  SplitVerificationSummary,
  SplitVerificationReport,
} from "./types.js";
