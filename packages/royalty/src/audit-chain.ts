/**
 * Hash chain over share-table audit entries.
 *
 *   entry[0].hash = sha256(canonicalize(entry[0] content) + "genesis")
 *   entry[n].hash = sha256(canonicalize(entry[n] content) + entry[n-1].hash)
 *
 * Any modification to any entry breaks the chain from that point forward.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type { AuditEntry } from "@rightsline/types";

export const GENESIS_HASH = "genesis";

/** Audit entry fields covered by the hash. */
export type AuditContent = Omit<AuditEntry, "hash" | "previousHash">;

export interface AuditChainError {
  readonly sequence: number;
  readonly reason: string;
}

export interface AuditChainResult {
  readonly valid: boolean;
  readonly lastVerifiedSequence: number;
  readonly errors: readonly AuditChainError[];
}

export function computeAuditHash(content: AuditContent, previousHash: string): string {
  const canonical = canonicalize({
    sequence: content.sequence,
    timestamp: content.timestamp,
    artist: content.artist,
    oldFraction: content.oldFraction,
    newFraction: content.newFraction,
    provenance: content.provenance,
    reason: content.reason,
    actor: content.actor,
  });
  return createHash("sha256").update(canonical + previousHash).digest("hex");
}

/**
 * Seal audit content onto the end of a chain.
 */
export function sealAuditEntry(content: AuditContent, previousHash: string): AuditEntry {
  return {
    ...content,
    previousHash,
    hash: computeAuditHash(content, previousHash),
  };
}

/**
 * Verify an audit log in sequence order.
 */
export function verifyAuditChain(entries: readonly AuditEntry[]): AuditChainResult {
  const errors: AuditChainError[] = [];
  let previousHash = GENESIS_HASH;
  let lastVerifiedSequence = 0;

  for (const entry of entries) {
    if (entry.previousHash !== previousHash) {
      errors.push({
        sequence: entry.sequence,
        reason: `previousHash mismatch at sequence ${String(entry.sequence)}: expected "${previousHash}", got "${entry.previousHash}"`,
      });
    }

    const expectedHash = computeAuditHash(entry, entry.previousHash);
    if (entry.hash !== expectedHash) {
      errors.push({
        sequence: entry.sequence,
        reason: `Hash mismatch at sequence ${String(entry.sequence)}: expected "${expectedHash}", got "${entry.hash}"`,
      });
    }

    previousHash = entry.hash;
    lastVerifiedSequence = entry.sequence;
  }

  return { valid: errors.length === 0, lastVerifiedSequence, errors };
}
