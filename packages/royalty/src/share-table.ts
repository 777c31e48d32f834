/**
 * ShareTable — artist → revenue-share fraction, with an audit trail.
 *
 * Single writer: the RoyaltyEngine that owns it. Every `set` replaces
 * the artist's entry and appends exactly one hash-chained AuditEntry
 * inside the same synchronous call, so the table and its log can never
 * disagree.
 */

import { compareDecimal, normalizeDecimal, parseDecimal } from "@rightsline/money";
import type {
  ArtistId,
  AuditEntry,
  DecimalString,
  ShareEntry,
  ShareProvenance,
} from "@rightsline/types";
import { GENESIS_HASH, sealAuditEntry, verifyAuditChain } from "./audit-chain.js";
import type { AuditChainResult } from "./audit-chain.js";
import { OutOfRangeError } from "./errors.js";

/** Artist → fraction view of the table, as handed to split verification. */
export type ShareSnapshot = Readonly<Record<ArtistId, DecimalString>>;

export interface AuditQuery {
  readonly artist?: string | undefined;
  readonly actor?: string | undefined;
  readonly limit?: number | undefined;
}

export class ShareTable {
  private readonly entries = new Map<ArtistId, ShareEntry>();
  private readonly log: AuditEntry[] = [];
  private readonly now: () => Date;

  constructor(clock: () => Date = () => new Date()) {
    this.now = clock;
  }

  get(artist: ArtistId): DecimalString | undefined {
    return this.entries.get(artist)?.fraction;
  }

  entry(artist: ArtistId): ShareEntry | undefined {
    return this.entries.get(artist);
  }

  has(artist: ArtistId): boolean {
    return this.entries.has(artist);
  }

  artists(): readonly ArtistId[] {
    return [...this.entries.keys()];
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Replace the artist's share fraction and record the change.
   *
   * @throws {OutOfRangeError} if the fraction is malformed or outside [0, 1]
   */
  set(
    artist: ArtistId,
    fraction: DecimalString,
    reason: string,
    actor: string,
    provenance: ShareProvenance = "ad-hoc",
  ): AuditEntry {
    const normalized = validateFraction(artist, fraction);
    const timestamp = this.now().toISOString();
    const previous = this.entries.get(artist);
    const last = this.log[this.log.length - 1];

    const audit = sealAuditEntry(
      {
        sequence: this.log.length + 1,
        timestamp,
        artist,
        oldFraction: previous?.fraction ?? null,
        newFraction: normalized,
        provenance,
        reason,
        actor,
      },
      last?.hash ?? GENESIS_HASH,
    );

    this.entries.set(artist, { artist, fraction: normalized, provenance, updatedAt: timestamp });
    this.log.push(audit);
    return audit;
  }

  snapshot(): ShareSnapshot {
    return Object.fromEntries(
      [...this.entries.values()].map((e) => [e.artist, e.fraction]),
    );
  }

  list(): readonly ShareEntry[] {
    return [...this.entries.values()];
  }

  /**
   * Audit entries, oldest first, optionally filtered.
   */
  auditLog(query?: AuditQuery): readonly AuditEntry[] {
    let results: readonly AuditEntry[] = this.log;
    if (query?.artist !== undefined) {
      results = results.filter((e) => e.artist === query.artist);
    }
    if (query?.actor !== undefined) {
      results = results.filter((e) => e.actor === query.actor);
    }
    if (query?.limit !== undefined && query.limit > 0) {
      results = results.slice(-query.limit);
    }
    return [...results];
  }

  verifyAuditLog(): AuditChainResult {
    return verifyAuditChain(this.log);
  }
}

function validateFraction(artist: ArtistId, fraction: DecimalString): DecimalString {
  try {
    parseDecimal(fraction);
  } catch {
    throw new OutOfRangeError(
      `Share fraction for '${artist}' is not a decimal: "${String(fraction)}"`,
    );
  }

  if (compareDecimal(fraction, "0") < 0 || compareDecimal(fraction, "1") > 0) {
    throw new OutOfRangeError(
      `Share fraction for '${artist}' must be within [0, 1], got ${fraction}`,
    );
  }

  return normalizeDecimal(fraction);
}
