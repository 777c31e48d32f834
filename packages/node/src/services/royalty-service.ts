/**
 * RoyaltyService — Composition root for all domain packages.
 *
 * Route handlers delegate to this service; they never import domain
 * packages directly. The service wires the engine's warnings, the
 * reconciliation findings and the split mismatches into the escalation
 * router, and every payout release through the release gate.
 */

import pino from "pino";
import type { Logger } from "pino";
import {
  AdvanceLedger,
  RoyaltyEngine,
  ShareTable,
  payoutDigest,
} from "@rightsline/royalty";
import type {
  AdvanceStatus,
  ArtistBalance,
  AuditChainResult,
  AuditQuery,
  ComputationResult,
  PayoutStatement,
  RevenueSource,
  SettlementRecord,
  StatementFormat,
} from "@rightsline/royalty";
import {
  ReconciliationChecker,
  SplitConsistencyChecker,
} from "@rightsline/reconciler";
import type {
  ActualPayouts,
  ReconciliationReport,
  SplitVerificationReport,
} from "@rightsline/reconciler";
import {
  EscalationRouter,
  ReleaseGate,
  calculationErrorIssue,
  discrepancyIssue,
  mismatchIssue,
  releasable,
  warningIssue,
} from "@rightsline/escalation";
import type {
  DecisionQuery,
  HoldStatus,
  ReleaseDecision,
  ReleaseHold,
} from "@rightsline/escalation";
import { InMemoryContractRegistry } from "@rightsline/contracts";
import type {
  ContractAuditEntry,
  ContractInput,
  ContractRecord,
  ContractSummary,
  ExpiryNotice,
} from "@rightsline/contracts";
import type {
  ArtistId,
  AuditEntry,
  DecimalString,
  EscalationDecision,
  Payout,
  PeriodId,
  RevenueRecord,
  ShareEntry,
  ShareProvenance,
} from "@rightsline/types";
import { AuditLog } from "./audit-log.js";
import { createLoggerSink } from "./escalation-sink.js";

// =============================================================================
// Configuration
// =============================================================================

export interface RoyaltyServiceConfig {
  readonly baseCurrency: string;
  readonly payoutDecimals: number;
  readonly splitEpsilon: DecimalString;
  readonly expiryHorizonDays: number;
  readonly revenueSource?: RevenueSource | undefined;
  readonly logger?: Logger | undefined;
  readonly clock?: (() => Date) | undefined;
}

// =============================================================================
// Inputs / Results
// =============================================================================

export interface PeriodInput {
  readonly period: PeriodId;
  /** Inline revenue; the revenue source is used when omitted */
  readonly rows?: readonly RevenueRecord[] | undefined;
  readonly artists?: readonly ArtistId[] | undefined;
}

export interface ComputeResult extends ComputationResult {
  readonly period: PeriodId;
  readonly currency: string;
  readonly digest: string;
  readonly releases: readonly ReleaseDecision[];
}

export interface SettleResult {
  readonly period: PeriodId;
  readonly settlements: readonly SettlementRecord[];
  /** Payouts the release gate kept back */
  readonly held: readonly ReleaseDecision[];
}

export interface SplitCheckResult {
  readonly report: SplitVerificationReport;
  readonly decisions: readonly EscalationDecision[];
  readonly holds: readonly ReleaseHold[];
}

export interface ReadinessResult {
  readonly ready: boolean;
  readonly auditChain: AuditChainResult;
}

// =============================================================================
// Service
// =============================================================================

export class RoyaltyService {
  readonly engine: RoyaltyEngine;
  readonly reconciliation: ReconciliationChecker;
  readonly splits: SplitConsistencyChecker;
  readonly router: EscalationRouter;
  readonly gate: ReleaseGate;
  readonly contracts: InMemoryContractRegistry;
  readonly auditLog: AuditLog;
  readonly baseCurrency: string;

  private readonly expiryHorizonDays: number;
  private readonly logger: Logger;

  constructor(config: RoyaltyServiceConfig) {
    const clock = config.clock ?? (() => new Date());
    this.logger = config.logger ?? pino({ level: "silent" });
    this.baseCurrency = config.baseCurrency;
    this.expiryHorizonDays = config.expiryHorizonDays;

    this.router = new EscalationRouter({
      sink: createLoggerSink(this.logger),
      clock,
    });
    this.gate = new ReleaseGate(clock);
    this.engine = new RoyaltyEngine({
      shares: new ShareTable(clock),
      advances: new AdvanceLedger(config.payoutDecimals),
      revenueSource: config.revenueSource,
      clock,
      onWarning: (warning) => {
        this.logger.warn(
          { kind: warning.kind, artist: warning.artist, period: warning.period },
          warning.message,
        );
        this.router.route(warningIssue(warning));
      },
    });
    this.reconciliation = new ReconciliationChecker(clock);
    this.splits = new SplitConsistencyChecker({ epsilon: config.splitEpsilon, clock });
    this.contracts = new InMemoryContractRegistry(clock);
    this.auditLog = new AuditLog(clock);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Shares
  // ───────────────────────────────────────────────────────────────────────

  setShare(
    artist: ArtistId,
    fraction: DecimalString,
    reason: string,
    actor: string,
    provenance: ShareProvenance,
  ): AuditEntry {
    const entry = this.engine.shares.set(artist, fraction, reason, actor, provenance);
    this.logger.info(
      { artist, oldFraction: entry.oldFraction, newFraction: entry.newFraction, actor },
      "Share updated",
    );
    return entry;
  }

  listShares(): readonly ShareEntry[] {
    return this.engine.shares.list();
  }

  getShare(artist: ArtistId): ShareEntry | undefined {
    return this.engine.shares.entry(artist);
  }

  shareAuditLog(query: AuditQuery): readonly AuditEntry[] {
    return this.engine.shares.auditLog(query);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Advances
  // ───────────────────────────────────────────────────────────────────────

  setAdvance(artist: ArtistId, balance: DecimalString, actor: string): ArtistBalance {
    this.engine.advances.set(artist, balance);
    this.auditLog.append({
      action: "set_advance",
      resourceType: "advance",
      resourceId: artist,
      actor,
      detail: balance,
    });
    return this.engine.artistBalance(artist);
  }

  activeAdvances(artist?: ArtistId): readonly AdvanceStatus[] {
    return this.engine.activeAdvances(artist);
  }

  artistBalance(artist: ArtistId): ArtistBalance {
    return this.engine.artistBalance(artist);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Payouts
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Compute a period and attach the release gate's decision per payout.
   * Advances are untouched until `settle`.
   */
  async compute(input: PeriodInput): Promise<ComputeResult> {
    const result = await this.run(input);
    this.logger.info(
      { period: input.period, payouts: result.payouts.length, warnings: result.warnings.length },
      "Payouts computed",
    );
    return {
      period: input.period,
      currency: this.baseCurrency,
      payouts: result.payouts,
      warnings: result.warnings,
      digest: payoutDigest(result.payouts),
      releases: this.releaseDecisions(result.payouts),
    };
  }

  /**
   * Compute, then recover advances for every payout the gate releases.
   * Blocked payouts are returned as held and left unsettled.
   */
  async settle(input: PeriodInput, actor: string): Promise<SettleResult> {
    const { payouts } = await this.run(input);
    const decisions = this.releaseDecisions(payouts);
    const released = new Set(releasable(decisions).map((d) => d.artist));

    const settlements = this.engine.settle(
      payouts.filter((p) => released.has(p.artist)),
      actor,
    );
    const held = decisions.filter((d) => !released.has(d.artist));

    for (const s of settlements) {
      this.auditLog.append({
        action: "settle",
        resourceType: "payout",
        resourceId: `${s.artist}:${s.period}`,
        actor,
        detail: `recovered ${s.recovered}`,
      });
    }
    this.logger.info(
      { period: input.period, settled: settlements.length, held: held.length, actor },
      "Payouts settled",
    );
    return { period: input.period, settlements, held };
  }

  async statements(input: PeriodInput, format: StatementFormat): Promise<readonly PayoutStatement[]> {
    const { payouts } = await this.run(input);
    return payouts.map((p) => this.engine.statement(p, format));
  }

  // ───────────────────────────────────────────────────────────────────────
  // Reconciliation
  // ───────────────────────────────────────────────────────────────────────

  async reconcile(input: PeriodInput, actual: ActualPayouts): Promise<ReconciliationReport> {
    const { payouts } = await this.run(input);
    const report = this.reconciliation.report(input.period, payouts, actual);

    for (const d of report.discrepancies) {
      this.logger.warn(
        { artist: d.artist, period: d.period, kind: d.kind, difference: d.difference },
        "Payout discrepancy",
      );
    }
    this.router.routeAll(report.discrepancies.map(discrepancyIssue));
    return report;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Split consistency / release
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Verify engine splits against the contract registry, refresh the
   * release gate, and escalate every mismatch.
   */
  verifySplits(): SplitCheckResult {
    const report = this.splits.report(this.engine.shares.snapshot(), this.contracts.shares());
    const holds = this.gate.sync(report.mismatches);
    const decisions = this.router.routeAll(report.mismatches.map(mismatchIssue));

    this.logger.info(
      { checked: report.summary.checked, mismatches: report.mismatches.length, blocking: report.summary.blocking },
      "Split verification complete",
    );
    return { report, decisions, holds };
  }

  overrideHold(artist: ArtistId, actor: string, reason: string): ReleaseHold {
    const hold = this.gate.override(artist, actor, reason);
    this.auditLog.append({
      action: "override",
      resourceType: "release",
      resourceId: artist,
      actor,
      detail: reason,
    });
    this.logger.warn({ artist, actor, reason }, "Release hold overridden");
    return hold;
  }

  resolveHold(artist: ArtistId, actor: string): ReleaseHold {
    const hold = this.gate.resolve(artist);
    this.auditLog.append({
      action: "resolve",
      resourceType: "release",
      resourceId: artist,
      actor,
    });
    return hold;
  }

  listHolds(status?: HoldStatus): readonly ReleaseHold[] {
    return this.gate.list(status);
  }

  escalations(query: DecisionQuery): readonly EscalationDecision[] {
    return this.router.decisions(query);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Contracts
  // ───────────────────────────────────────────────────────────────────────

  addContract(input: ContractInput, actor: string): ContractRecord {
    const contract = this.contracts.add(input);
    this.auditLog.append({
      action: "add_contract",
      resourceType: "contract",
      resourceId: contract.artist,
      actor,
      detail: contract.split,
    });
    return contract;
  }

  getContract(artist: ArtistId): ContractRecord | undefined {
    return this.contracts.get(artist);
  }

  listContracts(): readonly ContractRecord[] {
    return this.contracts.list();
  }

  updateContractSplit(
    artist: ArtistId,
    split: DecimalString,
    reason: string,
    actor: string,
  ): ContractAuditEntry {
    const entry = this.contracts.updateSplit(artist, split, reason, actor);
    this.auditLog.append({
      action: "update_split",
      resourceType: "contract",
      resourceId: artist,
      actor,
      detail: `${entry.oldSplit} -> ${entry.newSplit}`,
    });
    return entry;
  }

  expiringContracts(days?: number): readonly ExpiryNotice[] {
    const notices = this.contracts.expiring(days ?? this.expiryHorizonDays);
    for (const n of notices.filter((x) => x.status === "invalid_date")) {
      this.logger.warn({ artist: n.artist, expiryDate: n.expiryDate }, "Unreadable contract expiry date");
    }
    return notices;
  }

  contractSummary(): ContractSummary {
    return this.contracts.summary();
  }

  // ───────────────────────────────────────────────────────────────────────
  // Health
  // ───────────────────────────────────────────────────────────────────────

  readiness(): ReadinessResult {
    const auditChain = this.engine.shares.verifyAuditLog();
    return { ready: auditChain.valid, auditChain };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Re-check the current splits against the registry, then decide each
   * payout's release. Holds follow the splits as they are now, not as
   * they were at the last explicit verification. Findings that open a
   * fresh hold are escalated.
   */
  private releaseDecisions(payouts: readonly Payout[]): readonly ReleaseDecision[] {
    const mismatches = this.splits.verify(this.engine.shares.snapshot(), this.contracts.shares());
    const previous = mismatches.map((m) => this.gate.hold(m.artist));
    const holds = this.gate.sync(mismatches);

    const fresh = mismatches.filter((_, i) => holds[i] !== previous[i]);
    this.router.routeAll(fresh.map(mismatchIssue));
    return this.gate.evaluate(payouts);
  }

  /**
   * Compute from inline rows or the revenue source. A failure is
   * escalated as error_in_calculation before it propagates.
   */
  private async run(input: PeriodInput): Promise<ComputationResult> {
    try {
      return input.rows !== undefined
        ? this.engine.computeDetailed(input.period, input.rows, input.artists)
        : await this.engine.fetchAndCompute(input.period, input.artists);
    } catch (error) {
      this.logger.error({ err: error, period: input.period }, "Payout computation failed");
      this.router.route(calculationErrorIssue(error));
      throw error;
    }
  }
}
