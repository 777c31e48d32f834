/**
 * Append-only audit log for recording who-did-what-when over the API.
 *
 * Split changes carry their own hash-chained trail in the share table;
 * this log covers every mutating request (advances, settlements,
 * overrides, contract edits). In-memory only.
 */

// =============================================================================
// Types
// =============================================================================

export type AuditResourceType = "share" | "advance" | "payout" | "contract" | "release";

export interface AuditLogEntry {
  readonly timestamp: string;
  readonly action: string;
  readonly resourceType: AuditResourceType;
  readonly resourceId: string;
  readonly actor: string;
  readonly detail?: string | undefined;
}

export interface AuditLogQuery {
  readonly action?: string | undefined;
  readonly resourceType?: string | undefined;
  readonly resourceId?: string | undefined;
  readonly limit?: number | undefined;
}

// =============================================================================
// AuditLog
// =============================================================================

export class AuditLog {
  private readonly _entries: AuditLogEntry[] = [];
  private readonly now: () => Date;

  constructor(clock: () => Date = () => new Date()) {
    this.now = clock;
  }

  /**
   * Append an entry to the audit log.
   */
  append(entry: Omit<AuditLogEntry, "timestamp">): void {
    this._entries.push({
      ...entry,
      timestamp: this.now().toISOString(),
    });
  }

  /**
   * Query audit log entries with optional filters.
   *
   * Returns newest-first.
   */
  query(filter?: AuditLogQuery): readonly AuditLogEntry[] {
    let results: AuditLogEntry[] = this._entries;

    if (filter?.action !== undefined) {
      results = results.filter((e) => e.action === filter.action);
    }
    if (filter?.resourceType !== undefined) {
      results = results.filter((e) => e.resourceType === filter.resourceType);
    }
    if (filter?.resourceId !== undefined) {
      results = results.filter((e) => e.resourceId === filter.resourceId);
    }

    // Newest first
    results = [...results].reverse();

    if (filter?.limit !== undefined && filter.limit > 0) {
      results = results.slice(0, filter.limit);
    }

    return results;
  }

  get size(): number {
    return this._entries.length;
  }
}
