/**
 * ReleaseGate — decides which computed payouts may be released.
 *
 * Holds follow the split-consistency findings for each artist:
 *
 *   open ──resolve──▶ resolved
 *     │
 *     └──override──▶ overridden ──resolve──▶ resolved
 *
 * An open value_mismatch blocks release until a person overrides it
 * or the splits agree again. A missing_in_registry hold never blocks;
 * the payout goes out tagged provisional.
 */

import type { ArtistId, Payout, SplitMismatch } from "@rightsline/types";
import type {
  HoldStatus,
  ReleaseDecision,
  ReleaseHold,
} from "./types.js";

// =============================================================================
// Error
// =============================================================================

export class ReleaseGateError extends Error {
  public readonly code: ReleaseGateErrorCode;
  constructor(code: ReleaseGateErrorCode, message: string) {
    super(message);
    this.name = "ReleaseGateError";
    this.code = code;
  }
}

export type ReleaseGateErrorCode = "NO_OPEN_MISMATCH" | "INVALID_OVERRIDE";

// =============================================================================
// Valid Transitions
// =============================================================================

const VALID_TRANSITIONS: Record<HoldStatus, readonly HoldStatus[]> = {
  open: ["resolved", "overridden"],
  overridden: ["resolved"],
  resolved: [],
};

// =============================================================================
// Release Gate
// =============================================================================

export class ReleaseGate {
  private readonly holds: Map<ArtistId, ReleaseHold> = new Map();
  private readonly now: () => Date;

  constructor(clock: () => Date = () => new Date()) {
    this.now = clock;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Record findings from a verification run.
   *
   * A finding identical to the artist's active hold (same kind, same
   * engine and registry fractions) keeps that hold, overrides included.
   * Anything else opens a fresh hold, so an override never carries over
   * to a disagreement it was not given for.
   */
  open(mismatches: readonly SplitMismatch[]): readonly ReleaseHold[] {
    return mismatches.map((m) => {
      const current = this.holds.get(m.artist);
      if (current !== undefined && isActive(current) && sameFinding(current, m)) {
        return current;
      }
      const hold: ReleaseHold = {
        artist: m.artist,
        kind: m.kind,
        engineFraction: m.engineFraction,
        ...(m.registryFraction !== undefined ? { registryFraction: m.registryFraction } : {}),
        status: "open",
        openedAt: this.now().toISOString(),
      };
      this.holds.set(m.artist, hold);
      return hold;
    });
  }

  /**
   * Replace the gate's view with a full verification run: active holds
   * for artists no longer reported are resolved, the rest are opened.
   */
  sync(mismatches: readonly SplitMismatch[]): readonly ReleaseHold[] {
    const reported = new Set(mismatches.map((m) => m.artist));
    for (const hold of this.holds.values()) {
      if (isActive(hold) && !reported.has(hold.artist)) {
        this.transition(hold, "resolved");
      }
    }
    return this.open(mismatches);
  }

  /**
   * Close an artist's hold once the splits agree again.
   *
   * @throws {ReleaseGateError} NO_OPEN_MISMATCH
   */
  resolve(artist: ArtistId): ReleaseHold {
    const hold = this.holds.get(artist);
    if (hold === undefined || !isActive(hold)) {
      throw new ReleaseGateError("NO_OPEN_MISMATCH", `No open split mismatch for '${artist}'`);
    }
    return this.transition(hold, "resolved");
  }

  /**
   * Human sign-off to release despite a value mismatch.
   *
   * @throws {ReleaseGateError} NO_OPEN_MISMATCH if there is no open value_mismatch
   * @throws {ReleaseGateError} INVALID_OVERRIDE if actor or reason is blank
   */
  override(artist: ArtistId, actor: string, reason: string): ReleaseHold {
    if (actor.trim() === "" || reason.trim() === "") {
      throw new ReleaseGateError("INVALID_OVERRIDE", "An override needs an actor and a reason");
    }
    const hold = this.holds.get(artist);
    if (hold === undefined || hold.status !== "open" || hold.kind !== "value_mismatch") {
      throw new ReleaseGateError(
        "NO_OPEN_MISMATCH",
        `No open value_mismatch for '${artist}' to override`,
      );
    }
    return this.transition(hold, "overridden", { actor, reason });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Release decision for each payout, in payout order.
   */
  evaluate(payouts: readonly Payout[]): readonly ReleaseDecision[] {
    return payouts.map((p): ReleaseDecision => {
      const base = { artist: p.artist, period: p.period, netPayout: p.netPayout };
      const hold = this.holds.get(p.artist);

      if (hold === undefined || !isActive(hold)) {
        return { ...base, status: "released" };
      }
      if (hold.status === "overridden" && hold.override !== undefined) {
        return {
          ...base,
          status: "overridden",
          reason: `Released by ${hold.override.actor}: ${hold.override.reason}`,
        };
      }
      if (hold.kind === "value_mismatch") {
        return {
          ...base,
          status: "blocked",
          reason: "Split disagrees with the signed contract",
        };
      }
      return {
        ...base,
        status: "provisional",
        reason: "No contract on file; paid under an ad-hoc split",
      };
    });
  }

  hold(artist: ArtistId): ReleaseHold | undefined {
    return this.holds.get(artist);
  }

  list(status?: HoldStatus): readonly ReleaseHold[] {
    const all = [...this.holds.values()];
    return status === undefined ? all : all.filter((h) => h.status === status);
  }

  isBlocked(artist: ArtistId): boolean {
    const hold = this.holds.get(artist);
    return hold !== undefined && hold.status === "open" && hold.kind === "value_mismatch";
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private
  // ───────────────────────────────────────────────────────────────────────

  private transition(
    hold: ReleaseHold,
    to: HoldStatus,
    override?: { actor: string; reason: string },
  ): ReleaseHold {
    if (!VALID_TRANSITIONS[hold.status].includes(to)) {
      throw new ReleaseGateError(
        "NO_OPEN_MISMATCH",
        `Cannot move hold for '${hold.artist}' from ${hold.status} to ${to}`,
      );
    }
    const at = this.now().toISOString();
    const updated: ReleaseHold = {
      ...hold,
      status: to,
      ...(to === "resolved" ? { resolvedAt: at } : {}),
      ...(override !== undefined ? { override: { ...override, at } } : {}),
    };
    this.holds.set(hold.artist, updated);
    return updated;
  }
}

/** Released payouts only, provisional and overridden included. */
export function releasable(decisions: readonly ReleaseDecision[]): readonly ReleaseDecision[] {
  return decisions.filter((d) => d.status !== "blocked");
}

function sameFinding(hold: ReleaseHold, mismatch: SplitMismatch): boolean {
  return (
    hold.kind === mismatch.kind &&
    hold.engineFraction === mismatch.engineFraction &&
    hold.registryFraction === mismatch.registryFraction
  );
}

function isActive(hold: ReleaseHold): boolean {
  return hold.status === "open" || hold.status === "overridden";
}
