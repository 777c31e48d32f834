/**
 * Adapters from core findings to escalation issues.
 */

import type {
  DiscrepancyRecord,
  EscalationIssue,
  RoyaltyWarning,
  SplitMismatch,
} from "@rightsline/types";
import { SOURCES } from "./router.js";

export function mismatchIssue(mismatch: SplitMismatch): EscalationIssue {
  return {
    issueKind: mismatch.kind,
    source: SOURCES.splitConsistency,
    subject: mismatch.artist,
    detail: {
      engineFraction: mismatch.engineFraction,
      ...(mismatch.registryFraction !== undefined
        ? { registryFraction: mismatch.registryFraction }
        : {}),
    },
  };
}

export function discrepancyIssue(discrepancy: DiscrepancyRecord): EscalationIssue {
  return {
    issueKind: discrepancy.kind,
    source: SOURCES.reconciliation,
    subject: discrepancy.artist,
    detail: { ...discrepancy },
  };
}

export function warningIssue(warning: RoyaltyWarning): EscalationIssue {
  return {
    issueKind: warning.kind,
    source: SOURCES.royaltyEngine,
    subject: warning.artist,
    detail: {
      period: warning.period,
      rowCount: warning.rowCount,
      message: warning.message,
    },
  };
}

/** A computation that failed outright. */
export function calculationErrorIssue(error: unknown, subject?: string): EscalationIssue {
  return {
    issueKind: "error_in_calculation",
    source: SOURCES.royaltyEngine,
    subject,
    detail: { message: error instanceof Error ? error.message : String(error) },
  };
}
