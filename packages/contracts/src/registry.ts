/**
 * InMemoryContractRegistry — the legally agreed splits.
 *
 * Rules:
 * - One contract per artist
 * - Splits are decimal strings in [0, 1]
 * - Every split change is written to the audit log
 * - `shares()` leaves out expired contracts
 */

import {
  compareDecimal,
  formatAmount,
  normalizeDecimal,
  parseAmount,
  quantizeHalfUp,
  sumDecimals,
} from "@rightsline/money";
import type { ContractRegistry, RegistryShares } from "@rightsline/reconciler";
import { isDecimalString } from "@rightsline/types";
import type { ArtistId, DecimalString } from "@rightsline/types";
import type {
  ContractAuditEntry,
  ContractInput,
  ContractRecord,
  ContractSummary,
  ExpiryNotice,
} from "./types.js";

// =============================================================================
// Error
// =============================================================================

export class ContractError extends Error {
  public readonly code: ContractErrorCode;
  constructor(code: ContractErrorCode, message: string) {
    super(message);
    this.name = "ContractError";
    this.code = code;
  }
}

export type ContractErrorCode =
  | "CONTRACT_EXISTS"
  | "CONTRACT_NOT_FOUND"
  | "INVALID_SPLIT";

// =============================================================================
// Registry
// =============================================================================

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const MS_PER_DAY = 86_400_000;
const AVERAGE_SCALE = 6;

export const DEFAULT_EXPIRY_HORIZON_DAYS = 90;

export class InMemoryContractRegistry implements ContractRegistry {
  private readonly contracts: Map<ArtistId, ContractRecord> = new Map();
  private readonly audit: ContractAuditEntry[] = [];
  private readonly now: () => Date;

  constructor(clock: () => Date = () => new Date()) {
    this.now = clock;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Mutations
  // ───────────────────────────────────────────────────────────────────────

  /**
   * @throws {ContractError} CONTRACT_EXISTS, INVALID_SPLIT
   */
  add(input: ContractInput): ContractRecord {
    if (this.contracts.has(input.artist)) {
      throw new ContractError(
        "CONTRACT_EXISTS",
        `Contract for '${input.artist}' already exists`,
      );
    }

    const contract: ContractRecord = {
      ...input,
      split: validateSplit(input.split),
      fileType: input.fileType ?? "pdf",
      status: input.status ?? "active",
      notes: input.notes ?? "",
    };
    this.contracts.set(contract.artist, contract);
    return contract;
  }

  /**
   * Change an artist's contracted split.
   *
   * @throws {ContractError} INVALID_SPLIT, CONTRACT_NOT_FOUND
   */
  updateSplit(
    artist: ArtistId,
    split: DecimalString,
    reason: string,
    actor: string,
  ): ContractAuditEntry {
    const newSplit = validateSplit(split);
    const contract = this.require(artist);

    const entry: ContractAuditEntry = {
      timestamp: this.now().toISOString(),
      artist,
      oldSplit: contract.split,
      newSplit,
      reason,
      changedBy: actor,
    };

    this.contracts.set(artist, { ...contract, split: newSplit });
    this.audit.push(entry);
    return entry;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  get(artist: ArtistId): ContractRecord | undefined {
    return this.contracts.get(artist);
  }

  list(): readonly ContractRecord[] {
    return [...this.contracts.values()];
  }

  /** Artist → split for every contract that has not expired. */
  shares(): RegistryShares {
    return Object.fromEntries(
      this.list()
        .filter((c) => c.status !== "expired")
        .map((c) => [c.artist, c.split]),
    );
  }

  auditLog(artist?: ArtistId): readonly ContractAuditEntry[] {
    return artist === undefined ? [...this.audit] : this.audit.filter((e) => e.artist === artist);
  }

  /**
   * Contracts whose expiry date is on or before `today + daysAhead`.
   *
   * Contracts without an expiry date are skipped; unreadable dates are
   * reported as invalid_date.
   */
  expiring(
    daysAhead: number = DEFAULT_EXPIRY_HORIZON_DAYS,
    today: Date = this.now(),
  ): readonly ExpiryNotice[] {
    const start = utcDay(today);
    const notices: ExpiryNotice[] = [];

    for (const contract of this.contracts.values()) {
      if (!contract.expiryDate) continue;

      const expiry = parseIsoDate(contract.expiryDate);
      if (expiry === null) {
        notices.push({
          artist: contract.artist,
          expiryDate: contract.expiryDate,
          daysLeft: null,
          status: "invalid_date",
        });
        continue;
      }

      const daysLeft = Math.round((expiry - start) / MS_PER_DAY);
      if (daysLeft <= daysAhead) {
        notices.push({
          artist: contract.artist,
          expiryDate: contract.expiryDate,
          daysLeft,
          status: daysLeft <= 0 ? "expired" : "expiring_soon",
        });
      }
    }

    return notices;
  }

  summary(): ContractSummary {
    const all = this.list();
    const active = all.filter((c) => c.status === "active");

    return {
      total: all.length,
      active: active.length,
      expired: all.filter((c) => c.status === "expired").length,
      placeholders: all.filter((c) => c.status === "placeholder").length,
      averageSplit: average(active.map((c) => c.split)),
      artistsWithFiles: all.filter((c) => c.filePath).length,
      auditLogEntries: this.audit.length,
    };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private
  // ───────────────────────────────────────────────────────────────────────

  private require(artist: ArtistId): ContractRecord {
    const contract = this.contracts.get(artist);
    if (contract === undefined) {
      throw new ContractError(
        "CONTRACT_NOT_FOUND",
        `Contract not found for artist: ${artist}`,
      );
    }
    return contract;
  }
}

// =============================================================================
// Helpers
// =============================================================================

function validateSplit(split: string): DecimalString {
  if (
    !isDecimalString(split) ||
    compareDecimal(split, "0") < 0 ||
    compareDecimal(split, "1") > 0
  ) {
    throw new ContractError(
      "INVALID_SPLIT",
      `Invalid split: ${split}. Must be within [0, 1]`,
    );
  }
  return normalizeDecimal(split);
}

/** Midnight UTC of the given instant, in epoch ms. */
function utcDay(date: Date): number {
  return Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate());
}

/** Strict YYYY-MM-DD → epoch ms at midnight UTC, or null. */
function parseIsoDate(value: string): number | null {
  const match = ISO_DATE.exec(value);
  if (match === null) return null;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const ms = Date.UTC(year, month - 1, day);
  const check = new Date(ms);
  if (
    check.getUTCFullYear() !== year ||
    check.getUTCMonth() !== month - 1 ||
    check.getUTCDate() !== day
  ) {
    return null;
  }
  return ms;
}

/** Mean of non-negative decimals, half-up at six places. */
function average(values: readonly DecimalString[]): DecimalString {
  if (values.length === 0) return "0";
  const total = parseAmount(quantizeHalfUp(sumDecimals(values), AVERAGE_SCALE), AVERAGE_SCALE);
  const count = BigInt(values.length);
  return normalizeDecimal(formatAmount((total * 2n + count) / (2n * count), AVERAGE_SCALE));
}
