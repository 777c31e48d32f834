/**
 * @rightsline/escalation — Routing of findings and payout release.
 *
 * - EscalationRouter: first-match rule table, default notify_admin
 * - Issue adapters for mismatches, discrepancies, warnings
 * - ReleaseGate: blocked / provisional / overridden / released
 */

export {
  EscalationRouter,
  DEFAULT_ESCALATION_RULES,
  DEFAULT_ACTION,
  SOURCES,
} from "./router.js";
export type { EscalationRouterConfig } from "./router.js";

export {
  mismatchIssue,
  discrepancyIssue,
  warningIssue,
  calculationErrorIssue,
} from "./issues.js";

export { ReleaseGate, ReleaseGateError, releasable } from "./release-gate.js";
export type { ReleaseGateErrorCode } from "./release-gate.js";

export type {
  EscalationRule,
  EscalationSink,
  DecisionQuery,
  HoldStatus,
  HoldOverride,
  ReleaseHold,
  ReleaseStatus,
  ReleaseDecision,
} from "./types.js";
