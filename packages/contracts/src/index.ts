/**
 * @rightsline/contracts — In-memory contract registry.
 *
 * The legally agreed side of split verification: contracts, their
 * splits and expiry dates, with an audit trail of split changes.
 */

export {
  InMemoryContractRegistry,
  ContractError,
  DEFAULT_EXPIRY_HORIZON_DAYS,
} from "./registry.js";
export type { ContractErrorCode } from "./registry.js";

export type {
  ContractFileType,
  ContractStatus,
  ContractRecord,
  ContractInput,
  ContractAuditEntry,
  ExpiryStatus,
  ExpiryNotice,
  ContractSummary,
} from "./types.js";
