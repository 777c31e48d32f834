/**
 * @rightsline/types — Shared domain types for the Rightsline stack.
 *
 * These types are used across all Rightsline packages:
 * - Revenue feed records and computed payouts
 * - Share table entries and their audit trail
 * - Reconciliation and split-consistency findings
 * - Escalation issues and decisions
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - Money is a decimal string, never a number
 */

// Royalty types
export type {
  ArtistId,
  PeriodId,
  DecimalString,
  RevenueRecord,
  ShareProvenance,
  ShareEntry,
  AuditEntry,
  AdvanceEntry,
  Payout,
  RoyaltyWarning,
  RoyaltyWarningKind,
} from "./royalty.js";

// Reconciliation types
export type {
  DiscrepancyKind,
  DiscrepancyRecord,
  SplitMismatchKind,
  SplitMismatch,
} from "./reconciliation.js";

// Escalation types
export type {
  EscalationAction,
  SourceComponent,
  EscalationIssue,
  EscalationDecision,
} from "./escalation.js";

// Runtime type guards
export {
  isDecimalString,
  isShareProvenance,
  isRevenueRecord,
  isPayout,
  isDiscrepancyKind,
  isSplitMismatchKind,
  isEscalationAction,
} from "./guards.js";
