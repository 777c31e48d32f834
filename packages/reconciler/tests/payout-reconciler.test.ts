/**
 * ReconciliationChecker tests
 *
 * Computed net payouts against the amounts the paying side reports.
 */
import { describe, it, expect } from "vitest";
import type { Payout } from "@rightsline/types";
import { ReconciliationChecker, ReconciliationError } from "../src/payout-reconciler.js";

function payout(artist: string, netPayout: string): Payout {
  return {
    artist,
    period: "Q4-2025",
    grossRevenue: "1000.00",
    shareFraction: "0.5",
    provenance: "contract",
    artistShare: netPayout,
    advanceBalance: "0.00",
    advanceDeducted: "0.00",
    netPayout,
    trackCount: 1,
    streamCount: 100,
  };
}

const FIXED = new Date("2026-01-15T12:00:00.000Z");

describe("ReconciliationChecker", () => {
  const checker = new ReconciliationChecker(() => FIXED);

  describe("reconcile", () => {
    it("returns nothing when every amount matches", () => {
      const result = checker.reconcile(
        "Q4-2025",
        [payout("nova", "300.00"), payout("orbit", "125.50")],
        { nova: "300.00", orbit: "125.50" },
      );
      expect(result).toEqual([]);
    });

    it("rejects a non-decimal actual amount before comparing anything", () => {
      const run = () =>
        checker.reconcile("Q4-2025", [payout("nova", "300.00"), payout("orbit", "50.00")], {
          nova: "300.00",
          orbit: "fifty",
        });

      expect(run).toThrow(ReconciliationError);
      expect(run).toThrow(`Actual payout for 'orbit' is not a decimal: "fifty"`);
    });

    it("rejects an actual written in exponent notation", () => {
      expect(() =>
        checker.reconcile("Q4-2025", [payout("nova", "300.00")], { nova: "3e2" }),
      ).toThrow(ReconciliationError);
    });

    it("treats equal values at different scales as a match", () => {
      const result = checker.reconcile("Q4-2025", [payout("nova", "300.00")], {
        nova: "300",
      });
      expect(result).toEqual([]);
    });

    it("flags a one-cent delta as amount_mismatch", () => {
      const result = checker.reconcile("Q4-2025", [payout("nova", "300.00")], {
        nova: "299.99",
      });
      expect(result).toEqual([
        {
          artist: "nova",
          period: "Q4-2025",
          kind: "amount_mismatch",
          computed: "300.00",
          actual: "299.99",
          difference: "-0.01",
        },
      ]);
    });

    it("computes a positive difference when more was paid", () => {
      const [d] = checker.reconcile("Q4-2025", [payout("nova", "300.00")], {
        nova: "310.25",
      });
      expect(d?.difference).toBe("10.25");
    });

    it("flags a computed payout without an actual as missing_actual", () => {
      const result = checker.reconcile(
        "Q4-2025",
        [payout("nova", "300.00"), payout("orbit", "50.00")],
        { nova: "300.00" },
      );
      expect(result).toEqual([
        { artist: "orbit", period: "Q4-2025", kind: "missing_actual", computed: "50.00" },
      ]);
    });

    it("reports every payout as missing when no actuals were supplied", () => {
      const result = checker.reconcile(
        "Q4-2025",
        [payout("nova", "300.00"), payout("orbit", "50.00")],
        {},
      );
      expect(result.map((d) => d.kind)).toEqual(["missing_actual", "missing_actual"]);
    });

    it("ignores artists that only appear in the actuals", () => {
      const result = checker.reconcile("Q4-2025", [payout("nova", "300.00")], {
        nova: "300.00",
        stranger: "999.00",
      });
      expect(result).toEqual([]);
    });

    it("keeps the order of the computed payouts", () => {
      const result = checker.reconcile(
        "Q4-2025",
        [payout("b", "1.00"), payout("a", "2.00"), payout("c", "3.00")],
        { a: "2.01" },
      );
      expect(result.map((d) => d.artist)).toEqual(["b", "a", "c"]);
    });
  });

  describe("report", () => {
    it("summarizes the discrepancies", () => {
      const report = checker.report(
        "Q4-2025",
        [
          payout("nova", "300.00"),
          payout("orbit", "50.00"),
          payout("pulse", "10.00"),
          payout("quasar", "20.00"),
        ],
        { nova: "299.99", pulse: "10.00", quasar: "20.50" },
      );

      expect(report.period).toBe("Q4-2025");
      expect(report.timestamp).toBe("2026-01-15T12:00:00.000Z");
      expect(report.id.startsWith("recon:Q4-2025:")).toBe(true);
      expect(report.discrepancies).toHaveLength(3);
      expect(report.summary).toEqual({
        checked: 4,
        matched: 1,
        missingActual: 1,
        mismatched: 2,
        netDifference: "0.49",
        allReconciled: false,
      });
    });

    it("marks a clean run as reconciled", () => {
      const report = checker.report("Q4-2025", [payout("nova", "300.00")], {
        nova: "300.00",
      });
      expect(report.summary.allReconciled).toBe(true);
      expect(report.summary.netDifference).toBe("0.00");
    });

    it("gives each report its own id", () => {
      const a = checker.report("Q4-2025", [], {});
      const b = checker.report("Q4-2025", [], {});
      expect(a.id).not.toBe(b.id);
    });
  });
});
