/**
 * AdvanceLedger — artist → outstanding advance balance.
 *
 * Absence means "no advance": unknown artists read as zero.
 * Balances never go below zero; recovery is clamped.
 */

import { formatAmount, parseAmount } from "@rightsline/money";
import type { AdvanceEntry, ArtistId, DecimalString } from "@rightsline/types";
import { OutOfRangeError } from "./errors.js";

/** Result of recovering part of an advance during settlement. */
export interface AdvanceRecovery {
  readonly artist: ArtistId;
  readonly balanceBefore: DecimalString;
  readonly recovered: DecimalString;
  readonly balanceAfter: DecimalString;
}

export class AdvanceLedger {
  /** Balances scaled by `decimals` */
  private readonly balances = new Map<ArtistId, bigint>();
  readonly decimals: number;

  constructor(decimals = 2) {
    this.decimals = decimals;
  }

  get(artist: ArtistId): DecimalString {
    return formatAmount(this.balances.get(artist) ?? 0n, this.decimals);
  }

  /**
   * @throws {OutOfRangeError} if the balance is negative, malformed,
   *   or finer than the ledger's precision
   */
  set(artist: ArtistId, balance: DecimalString): void {
    const scaled = this.parseBalance(artist, balance);
    if (scaled < 0n) {
      throw new OutOfRangeError(
        `Advance balance for '${artist}' cannot be negative, got ${balance}`,
      );
    }
    this.balances.set(artist, scaled);
  }

  /**
   * Reduce an artist's balance by up to `amount`.
   * Recovers at most the current balance; the balance never goes below zero.
   */
  recover(artist: ArtistId, amount: DecimalString): AdvanceRecovery {
    const requested = this.parseBalance(artist, amount);
    if (requested < 0n) {
      throw new OutOfRangeError(
        `Recovered amount for '${artist}' cannot be negative, got ${amount}`,
      );
    }

    const before = this.balances.get(artist) ?? 0n;
    const recovered = requested < before ? requested : before;
    const after = before - recovered;
    if (this.balances.has(artist)) {
      this.balances.set(artist, after);
    }

    return {
      artist,
      balanceBefore: formatAmount(before, this.decimals),
      recovered: formatAmount(recovered, this.decimals),
      balanceAfter: formatAmount(after, this.decimals),
    };
  }

  entries(): readonly AdvanceEntry[] {
    return [...this.balances].map(([artist, balance]) => ({
      artist,
      balance: formatAmount(balance, this.decimals),
    }));
  }

  /** Entries with a balance still to recover. */
  active(): readonly AdvanceEntry[] {
    return [...this.balances]
      .filter(([, balance]) => balance > 0n)
      .map(([artist, balance]) => ({ artist, balance: formatAmount(balance, this.decimals) }));
  }

  private parseBalance(artist: ArtistId, balance: DecimalString): bigint {
    try {
      return parseAmount(balance, this.decimals);
    } catch {
      throw new OutOfRangeError(
        `Advance amount for '${artist}' must be a decimal with at most ${String(this.decimals)} places, got "${String(balance)}"`,
      );
    }
  }
}
