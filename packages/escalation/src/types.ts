/**
 * @rightsline/escalation domain types.
 */

import type {
  ArtistId,
  DecimalString,
  EscalationAction,
  EscalationDecision,
  PeriodId,
  SourceComponent,
  SplitMismatchKind,
} from "@rightsline/types";

// =============================================================================
// Routing
// =============================================================================

/**
 * One row of the routing table. A rule matches when the source is equal
 * and the condition occurs in the issue kind, ignoring case.
 */
export interface EscalationRule {
  readonly source: SourceComponent;
  readonly condition: string;
  readonly action: EscalationAction;
}

/** Delivery collaborator (chat, email, pager). */
export interface EscalationSink {
  deliver(decision: EscalationDecision): void;
}

export interface DecisionQuery {
  readonly source?: SourceComponent;
  readonly action?: EscalationAction;
  readonly subject?: string;
}

// =============================================================================
// Release Gate
// =============================================================================

export type HoldStatus = "open" | "resolved" | "overridden";

export interface HoldOverride {
  readonly actor: string;
  readonly reason: string;
  readonly at: string;
}

/** An artist's split disagreement as tracked by the release gate. */
export interface ReleaseHold {
  readonly artist: ArtistId;
  readonly kind: SplitMismatchKind;
  /** The disagreement this hold was opened for */
  readonly engineFraction: DecimalString;
  readonly registryFraction?: string | undefined;
  readonly status: HoldStatus;
  readonly openedAt: string;
  readonly resolvedAt?: string | undefined;
  readonly override?: HoldOverride | undefined;
}

export type ReleaseStatus = "released" | "provisional" | "blocked" | "overridden";

export interface ReleaseDecision {
  readonly artist: ArtistId;
  readonly period: PeriodId;
  readonly netPayout: DecimalString;
  readonly status: ReleaseStatus;
  readonly reason?: string | undefined;
}
