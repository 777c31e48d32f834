/**
 * @rightsline/royalty — Royalty computation engine.
 *
 * Turns a period's revenue feed into per-artist payouts:
 * - ShareTable: artist share fractions with a hash-chained audit log
 * - AdvanceLedger: outstanding advances, recovered only on settlement
 * - RoyaltyEngine: split application, advance netting, warnings
 *
 * Design rules:
 * - All types are readonly
 * - Computation never mutates state; settlement is explicit
 * - Missing data for one artist never fails the batch
 * - All monetary arithmetic uses bigint (no floating point)
 */

// Engine
export { RoyaltyEngine, reportLabel, payoutDigest } from "./royalty-engine.js";
export type { RoyaltyEngineConfig } from "./royalty-engine.js";

// State
export { ShareTable } from "./share-table.js";
export type { ShareSnapshot, AuditQuery } from "./share-table.js";
export { AdvanceLedger } from "./advance-ledger.js";
export type { AdvanceRecovery } from "./advance-ledger.js";

// Audit chain
export { GENESIS_HASH, computeAuditHash, verifyAuditChain } from "./audit-chain.js";
export type { AuditChainResult, AuditChainError } from "./audit-chain.js";

// Errors
export { RoyaltyError, OutOfRangeError, ConfigurationMissingError } from "./errors.js";
export type { RoyaltyErrorCode } from "./errors.js";

// Types
export type {
  RevenueSource,
  WarningSink,
  ArtistFilter,
  ComputationResult,
  SettlementRecord,
  StatementFormat,
  PayoutStatement,
  ArtistBalance,
  AdvanceStatus,
} from "./types.js";
