/**
 * Type barrel — re-exports all public types from @rightsline/node.
 */

// DTOs
export {
  DecimalSchema,
  RevenueRecordSchema,
  ActorSchema,
  SetShareSchema,
  ShareAuditQuerySchema,
  SetAdvanceSchema,
  ComputeSchema,
  SettleSchema,
  StatementSchema,
  ReconcileSchema,
  AddContractSchema,
  UpdateContractSplitSchema,
  ExpiringQuerySchema,
  OverrideSchema,
  ResolveSchema,
  HoldQuerySchema,
  EscalationQuerySchema,
  AuditLogQuerySchema,
} from "./dto.js";
export type {
  SetShareDto,
  ShareAuditQuery,
  SetAdvanceDto,
  ComputeDto,
  SettleDto,
  StatementDto,
  ReconcileDto,
  AddContractDto,
  UpdateContractSplitDto,
  ExpiringQuery,
  OverrideDto,
  ResolveDto,
  HoldQuery,
  EscalationQuery,
  AuditLogQueryDto,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// App env
export type { AppEnv } from "./api-contract.js";
