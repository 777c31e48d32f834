/**
 * EscalationRouter — maps raised issues to an action.
 *
 * Rules:
 * - First matching rule wins; order is significant
 * - No match → notify_admin
 * - Every issue yields one decision, which is logged and delivered
 */

import type {
  EscalationAction,
  EscalationDecision,
  EscalationIssue,
} from "@rightsline/types";
import type { DecisionQuery, EscalationRule, EscalationSink } from "./types.js";

export const SOURCES = {
  royaltyEngine: "royalty-engine",
  reconciliation: "reconciliation",
  splitConsistency: "split-consistency",
  contractRegistry: "contract-registry",
} as const;

export const DEFAULT_ACTION: EscalationAction = "notify_admin";

export const DEFAULT_ESCALATION_RULES: readonly EscalationRule[] = [
  { source: SOURCES.splitConsistency, condition: "value_mismatch", action: "block" },
  { source: SOURCES.splitConsistency, condition: "missing_in_registry", action: "notify_admin" },
  { source: SOURCES.royaltyEngine, condition: "error_in_calculation", action: "notify_admin" },
  { source: SOURCES.royaltyEngine, condition: "missing_split", action: "notify_admin" },
  { source: SOURCES.reconciliation, condition: "amount_mismatch", action: "notify_admin" },
  { source: SOURCES.contractRegistry, condition: "split_mismatch", action: "block" },
];

export interface EscalationRouterConfig {
  readonly rules?: readonly EscalationRule[];
  readonly sink?: EscalationSink;
  readonly clock?: () => Date;
}

export class EscalationRouter {
  readonly rules: readonly EscalationRule[];
  private readonly sink: EscalationSink | undefined;
  private readonly now: () => Date;
  private readonly log: EscalationDecision[] = [];

  constructor(config: EscalationRouterConfig = {}) {
    this.rules = [...(config.rules ?? DEFAULT_ESCALATION_RULES)];
    this.sink = config.sink;
    this.now = config.clock ?? (() => new Date());
  }

  /**
   * Decide the action for one issue, log it, and hand it to the sink.
   */
  route(issue: EscalationIssue): EscalationDecision {
    const rule = this.match(issue);
    const base = {
      issueKind: issue.issueKind,
      source: issue.source,
      action: rule?.action ?? DEFAULT_ACTION,
      matched: rule !== undefined,
      message:
        rule !== undefined
          ? `Escalation from ${issue.source}: ${issue.issueKind}`
          : `Unmatched escalation from ${issue.source}: ${issue.issueKind}`,
      decidedAt: this.now().toISOString(),
    };
    const decision: EscalationDecision = {
      ...base,
      ...(issue.subject !== undefined ? { subject: issue.subject } : {}),
      ...(issue.detail !== undefined ? { detail: issue.detail } : {}),
    };

    this.log.push(decision);
    this.sink?.deliver(decision);
    return decision;
  }

  routeAll(issues: readonly EscalationIssue[]): readonly EscalationDecision[] {
    return issues.map((issue) => this.route(issue));
  }

  /**
   * Action only, without logging or delivery.
   */
  classify(issueKind: string, source: string): EscalationAction {
    return this.match({ issueKind, source })?.action ?? DEFAULT_ACTION;
  }

  /** Decision log, oldest first. */
  decisions(query: DecisionQuery = {}): readonly EscalationDecision[] {
    return this.log.filter(
      (d) =>
        (query.source === undefined || d.source === query.source) &&
        (query.action === undefined || d.action === query.action) &&
        (query.subject === undefined || d.subject === query.subject),
    );
  }

  private match(issue: EscalationIssue): EscalationRule | undefined {
    const kind = issue.issueKind.toLowerCase();
    return this.rules.find(
      (rule) =>
        rule.source === issue.source &&
        kind.includes(rule.condition.toLowerCase()),
    );
  }
}
