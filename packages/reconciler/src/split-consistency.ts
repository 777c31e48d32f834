/**
 * SplitConsistencyChecker — engine share table ↔ contract registry.
 *
 * The engine's view decides who is being paid right now, so only engine
 * artists are checked; registry-only artists are not yet onboarded.
 * Differences within epsilon are registry float noise; anything larger
 * is a real disagreement (e.g. 60% vs 65%).
 */

import {
  MoneyError,
  absDecimal,
  compareDecimal,
  parseDecimal,
  subtractDecimal,
} from "@rightsline/money";
import type { DecimalString, SplitMismatch } from "@rightsline/types";
import type {
  EngineShares,
  RegistryShares,
  SplitVerificationReport,
} from "./types.js";

export const DEFAULT_SPLIT_EPSILON = "0.001";

/** Registry fractions are compared at this many decimal places. */
const REGISTRY_PRECISION = 9;

export interface SplitConsistencyConfig {
  /** Largest tolerated absolute difference. Default: "0.001" */
  readonly epsilon?: DecimalString;
  readonly clock?: () => Date;
}

export class SplitConsistencyChecker {
  readonly epsilon: DecimalString;
  private readonly now: () => Date;

  constructor(config: SplitConsistencyConfig = {}) {
    this.epsilon = config.epsilon ?? DEFAULT_SPLIT_EPSILON;
    parseDecimal(this.epsilon);
    this.now = config.clock ?? (() => new Date());
  }

  verify(engineShares: EngineShares, registryShares: RegistryShares): readonly SplitMismatch[] {
    const registry = new Map(Object.entries(registryShares));
    const mismatches: SplitMismatch[] = [];

    for (const [artist, engineFraction] of Object.entries(engineShares)) {
      const raw = registry.get(artist);

      if (raw === undefined) {
        mismatches.push({ artist, kind: "missing_in_registry", engineFraction });
        continue;
      }

      const registryFraction = toDecimal(raw);
      if (
        registryFraction === null ||
        compareDecimal(absDecimal(subtractDecimal(engineFraction, registryFraction)), this.epsilon) > 0
      ) {
        mismatches.push({
          artist,
          kind: "value_mismatch",
          engineFraction,
          registryFraction: String(raw),
        });
      }
    }

    return mismatches;
  }

  report(engineShares: EngineShares, registryShares: RegistryShares): SplitVerificationReport {
    const mismatches = this.verify(engineShares, registryShares);
    const checked = Object.keys(engineShares).length;
    const missingInRegistry = mismatches.filter((m) => m.kind === "missing_in_registry").length;
    const valueMismatches = mismatches.filter((m) => m.kind === "value_mismatch").length;

    return {
      timestamp: this.now().toISOString(),
      epsilon: this.epsilon,
      mismatches,
      summary: {
        checked,
        consistent: checked - mismatches.length,
        missingInRegistry,
        valueMismatches,
        blocking: valueMismatches > 0,
      },
    };
  }
}

/**
 * Registry value → decimal string, or null when it is not a number at all.
 */
function toDecimal(value: number | string): DecimalString | null {
  const text =
    typeof value === "number"
      ? Number.isFinite(value) ? value.toFixed(REGISTRY_PRECISION) : ""
      : value.trim();
  try {
    parseDecimal(text);
    return text;
  } catch (error) {
    if (error instanceof MoneyError) return null;
    throw error;
  }
}
