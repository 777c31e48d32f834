/**
 * @rightsline/contracts domain types.
 */

import type { ArtistId, DecimalString } from "@rightsline/types";

export type ContractFileType = "pdf" | "docx" | "scan";

export type ContractStatus = "active" | "expired" | "placeholder";

/** A signed (or pending) artist contract. */
export interface ContractRecord {
  readonly artist: ArtistId;

  /** Artist's revenue share, in [0, 1] */
  readonly split: DecimalString;

  /** ISO date (YYYY-MM-DD) */
  readonly signedDate?: string | undefined;
  /** ISO date (YYYY-MM-DD) */
  readonly expiryDate?: string | undefined;

  /** Location of the signed document in storage */
  readonly filePath?: string | undefined;
  readonly fileType: ContractFileType;
  readonly status: ContractStatus;
  readonly notes: string;
}

/** Input to `add`; file type, status and notes have defaults. */
export type ContractInput = Pick<ContractRecord, "artist" | "split"> &
  Partial<Omit<ContractRecord, "artist" | "split">>;

export interface ContractAuditEntry {
  readonly timestamp: string;
  readonly artist: ArtistId;
  readonly oldSplit: DecimalString;
  readonly newSplit: DecimalString;
  readonly reason: string;
  readonly changedBy: string;
}

export type ExpiryStatus = "expired" | "expiring_soon" | "invalid_date";

export interface ExpiryNotice {
  readonly artist: ArtistId;
  readonly expiryDate: string;

  /** Days until expiry; null when the date cannot be read */
  readonly daysLeft: number | null;
  readonly status: ExpiryStatus;
}

export interface ContractSummary {
  readonly total: number;
  readonly active: number;
  readonly expired: number;
  readonly placeholders: number;

  /** Mean split over active contracts, "0" when there are none */
  readonly averageSplit: DecimalString;
  readonly artistsWithFiles: number;
  readonly auditLogEntries: number;
}
