/**
 * Escalation Types
 *
 * Issues raised by core components and the routing decisions made
 * for them. Every raised issue yields exactly one decision.
 */

/** Action taken for an escalated issue. */
export type EscalationAction = "notify_admin" | "auto_resolve" | "block";

/**
 * Component that raised an issue: "royalty-engine", "reconciliation",
 * "split-consistency", "contract-registry", or a collaborator's own name.
 */
export type SourceComponent = string;

/** An issue handed to the escalation router. */
export interface EscalationIssue {
  /** Free-form kind, matched by substring (e.g. "value_mismatch") */
  readonly issueKind: string;
  readonly source: SourceComponent;

  /** Subject of the issue, usually an artist id */
  readonly subject?: string | undefined;
  readonly detail?: Readonly<Record<string, unknown>> | undefined;
}

/** The router's decision for one issue. */
export interface EscalationDecision {
  readonly issueKind: string;
  readonly source: SourceComponent;
  readonly subject?: string | undefined;
  readonly action: EscalationAction;

  /** Whether a rule matched; false means the default action was used */
  readonly matched: boolean;
  readonly message: string;
  readonly decidedAt: string;
  readonly detail?: Readonly<Record<string, unknown>> | undefined;
}
