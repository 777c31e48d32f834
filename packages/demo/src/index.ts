#!/usr/bin/env node
/**
 * @rightsline/demo — Interactive CLI walkthrough.
 *
 * Runs one quarterly royalty cycle in your terminal:
 * splits -> advances -> compute -> contracts -> verify splits ->
 * release gate -> override -> settle -> reconcile
 *
 * Uses real domain packages directly (no HTTP server).
 */

import chalk from "chalk";
import { sumDecimals } from "@rightsline/money";
import { AdvanceLedger, RoyaltyEngine, ShareTable, payoutDigest } from "@rightsline/royalty";
import { ReconciliationChecker, SplitConsistencyChecker } from "@rightsline/reconciler";
import {
  EscalationRouter,
  ReleaseGate,
  discrepancyIssue,
  mismatchIssue,
  releasable,
  warningIssue,
} from "@rightsline/escalation";
import type { ReleaseStatus } from "@rightsline/escalation";
import { InMemoryContractRegistry } from "@rightsline/contracts";
import type { EscalationDecision, RevenueRecord } from "@rightsline/types";

// =============================================================================
// Helpers
// =============================================================================

const DELAY_MS = 600;
const PERIOD = "Q4-2025";
const CURRENCY = "USD";

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function banner(): void {
  console.log();
  console.log(chalk.cyan.bold("  ╔══════════════════════════════════════════════════════════╗"));
  console.log(chalk.cyan.bold("  ║") + chalk.white.bold("                    RIGHTSLINE DEMO                      ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ║") + chalk.gray("             Royalty Accounting, Quarter Close           ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ╚══════════════════════════════════════════════════════════╝"));
  console.log();
}

function stepHeader(step: number, total: number, title: string): void {
  const prefix = chalk.cyan.bold(`  Step ${step}/${total}`);
  const line = chalk.gray("─".repeat(Math.max(0, 50 - title.length)));
  console.log(`\n${prefix}  ${chalk.white.bold(title)}  ${line}`);
}

function ok(msg: string): void {
  console.log(chalk.green("    ✓ ") + chalk.white(msg));
}

function info(label: string, value: string): void {
  console.log(chalk.gray("    → ") + chalk.gray(label.padEnd(16)) + chalk.white(value));
}

function hashLine(label: string, hash: string): void {
  const short = hash.length > 16 ? `${hash.slice(0, 16)}...${hash.slice(-8)}` : hash;
  console.log(chalk.gray("    → ") + chalk.gray(label.padEnd(16)) + chalk.yellow(short));
}

function warn(msg: string): void {
  console.log(chalk.yellow("    ! ") + chalk.yellow(msg));
}

function money(amount: string): string {
  return `${amount} ${CURRENCY}`;
}

function escalation(decision: EscalationDecision): void {
  const action =
    decision.action === "block" ? chalk.red.bold(decision.action) : chalk.yellow(decision.action);
  console.log(chalk.gray("    ⇢ ") + action + chalk.gray(`  ${decision.message} (${decision.subject ?? "-"})`));
}

const STATUS_COLOR: Record<ReleaseStatus, (s: string) => string> = {
  released: chalk.green,
  provisional: chalk.yellow,
  overridden: chalk.magenta,
  blocked: chalk.red.bold,
};

const TOTAL_STEPS = 10;

// =============================================================================
// Demo
// =============================================================================

async function run(): Promise<void> {
  banner();
  console.log(chalk.gray("  Walk-through of a full quarter close."));
  console.log(chalk.gray("  Every step uses real domain packages, no mocks.\n"));

  await sleep(DELAY_MS);

  // ─── Step 1: Boot ───────────────────────────────────────────────────

  stepHeader(1, TOTAL_STEPS, "Boot");

  const router = new EscalationRouter({ sink: { deliver: escalation } });
  ok(`EscalationRouter initialized (${router.rules.length} rules)`);

  const engine = new RoyaltyEngine({
    shares: new ShareTable(),
    advances: new AdvanceLedger(2),
    onWarning: (w) => {
      warn(w.message);
      router.route(warningIssue(w));
    },
  });
  ok("RoyaltyEngine initialized (payout precision: 2)");

  const contracts = new InMemoryContractRegistry();
  const splits = new SplitConsistencyChecker();
  const gate = new ReleaseGate();
  const reconciliation = new ReconciliationChecker();
  ok(`Split checker initialized (epsilon: ${splits.epsilon})`);

  await sleep(DELAY_MS);

  // ─── Step 2: Splits & Advances ──────────────────────────────────────

  stepHeader(2, TOTAL_STEPS, "Splits & Advances");

  engine.shares.set("nova", "0.70", "Signed recording agreement", "label-ops", "contract");
  const last = engine.shares.set("orbit", "0.80", "Ad-hoc deal, paperwork pending", "label-ops");
  info("nova", "0.7 (contract)");
  info("orbit", "0.8 (ad-hoc)");
  hashLine("audit head", last.hash);

  engine.advances.set("nova", "7500.00");
  engine.advances.set("orbit", "100.00");
  info("advance nova", money("7500.00"));
  info("advance orbit", money("100.00"));
  ok("Share audit chain and advance ledger ready");

  await sleep(DELAY_MS);

  // ─── Step 3: Revenue Feed ───────────────────────────────────────────

  stepHeader(3, TOTAL_STEPS, "Revenue Feed");

  const rows: readonly RevenueRecord[] = [
    { artist: "nova", track: "nova-single", platform: "spotify", country: "US", period: PERIOD, streams: 1_200_000, revenue: "6000.00" },
    { artist: "nova", track: "nova-album", platform: "apple", country: "GB", period: PERIOD, streams: 800_000, revenue: "4000.00" },
    { artist: "orbit", track: "orbit-ep", platform: "spotify", country: "DE", period: PERIOD, streams: 90_000, revenue: "500.00" },
    { artist: "ghost", track: "ghost-demo", platform: "bandcamp", country: "US", period: PERIOD, streams: 3_000, revenue: "120.00" },
  ];

  info("rows", String(rows.length));
  info("gross", money(sumDecimals(rows.map((r) => r.revenue), 2)));
  ok(`Revenue for ${PERIOD} loaded`);

  await sleep(DELAY_MS);

  // ─── Step 4: Compute ────────────────────────────────────────────────

  stepHeader(4, TOTAL_STEPS, "Compute Payouts");

  const { payouts } = engine.computeDetailed(PERIOD, rows);
  for (const p of payouts) {
    info(p.artist, `${money(p.artistShare)} share, ${money(p.advanceDeducted)} recouped, net ${money(p.netPayout)}`);
  }
  hashLine("digest", payoutDigest(payouts));
  ok("Read-only: advances are untouched until settlement");

  await sleep(DELAY_MS);

  // ─── Step 5: Contracts ──────────────────────────────────────────────

  stepHeader(5, TOTAL_STEPS, "Contract Registry");

  contracts.add({ artist: "nova", split: "0.65", signedDate: "2024-03-01", expiryDate: "2026-03-01" });
  info("nova", "0.65 (signed 2024-03-01)");
  info("orbit", "no contract on file");
  for (const notice of contracts.expiring(90)) {
    warn(`Contract for ${notice.artist} expires ${notice.expiryDate} (${String(notice.daysLeft)} days)`);
  }
  ok("Registry loaded");

  await sleep(DELAY_MS);

  // ─── Step 6: Verify Splits ──────────────────────────────────────────

  stepHeader(6, TOTAL_STEPS, "Verify Splits");

  const report = splits.report(engine.shares.snapshot(), contracts.shares());
  gate.sync(report.mismatches);
  router.routeAll(report.mismatches.map(mismatchIssue));
  info("checked", String(report.summary.checked));
  info("value mismatch", String(report.summary.valueMismatches));
  info("no contract", String(report.summary.missingInRegistry));
  if (report.summary.blocking) {
    warn("Blocking mismatch found, affected payouts are held");
  } else {
    ok("Splits agree with the registry");
  }

  await sleep(DELAY_MS);

  // ─── Step 7: Release Gate ───────────────────────────────────────────

  stepHeader(7, TOTAL_STEPS, "Release Gate");

  for (const d of gate.evaluate(payouts)) {
    info(d.artist, STATUS_COLOR[d.status](d.status) + chalk.gray(d.reason !== undefined ? `  ${d.reason}` : ""));
  }

  await sleep(DELAY_MS);

  // ─── Step 8: Override ───────────────────────────────────────────────

  stepHeader(8, TOTAL_STEPS, "Human Override");

  const hold = gate.override("nova", "cfo", "Amendment to 0.70 awaiting countersignature");
  info("approver", hold.override?.actor ?? "-");
  info("reason", hold.override?.reason ?? "-");
  ok(`Hold status: ${chalk.bold(hold.status)}`);

  await sleep(DELAY_MS);

  // ─── Step 9: Settle ─────────────────────────────────────────────────

  stepHeader(9, TOTAL_STEPS, "Settle");

  const released = new Set(releasable(gate.evaluate(payouts)).map((d) => d.artist));
  const settlements = engine.settle(payouts.filter((p) => released.has(p.artist)), "finance");
  for (const s of settlements) {
    info(s.artist, `advance ${money(s.balanceBefore)} → ${money(s.balanceAfter)}`);
  }
  ok(`${settlements.length} payout(s) settled`);

  await sleep(DELAY_MS);

  // ─── Step 10: Reconcile ─────────────────────────────────────────────

  stepHeader(10, TOTAL_STEPS, "Reconcile");

  const recon = reconciliation.report(PERIOD, payouts, { nova: "0.00", orbit: "299.99" });
  router.routeAll(recon.discrepancies.map(discrepancyIssue));
  info("checked", String(recon.summary.checked));
  info("matched", String(recon.summary.matched));
  info("net difference", money(recon.summary.netDifference));

  const chain = engine.shares.verifyAuditLog();
  console.log();
  console.log(chalk.white("    Payouts computed:    ") + chalk.cyan.bold(String(payouts.length)));
  console.log(chalk.white("    Escalations:         ") + chalk.cyan.bold(String(router.decisions().length)));
  console.log(chalk.white("    Share audit chain:   ") + (chain.valid ? chalk.green.bold("VALID") : chalk.red.bold("BROKEN")));
  console.log();
  console.log(chalk.gray("    Splits are checked against signed contracts before"));
  console.log(chalk.gray("    any money moves."));
  console.log();
}

run().catch((err: unknown) => {
  console.error(chalk.red("\n  Demo failed:"), err);
  process.exit(1);
});
