/**
 * Request/Response DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 * Route handlers use these for body/query validation.
 */

import { z } from "zod";

// =============================================================================
// Shared Schemas
// =============================================================================

export const DecimalSchema = z
  .string()
  .trim()
  .regex(/^-?\d+(\.\d+)?$/, "Expected a decimal string such as \"1234.50\"");

export const RevenueRecordSchema = z.object({
  artist: z.string().min(1),
  track: z.string().optional(),
  platform: z.string(),
  country: z.string(),
  period: z.string().min(1),
  streams: z.number().int().min(0),
  revenue: DecimalSchema,
});

export const ActorSchema = z.string().trim().min(1).max(128);

// =============================================================================
// Share / Advance DTOs
// =============================================================================

export const SetShareSchema = z.object({
  fraction: DecimalSchema,
  reason: z.string().min(1).max(1024),
  actor: ActorSchema,
  provenance: z.enum(["contract", "ad-hoc"]).default("ad-hoc"),
});

export type SetShareDto = z.infer<typeof SetShareSchema>;

export const ShareAuditQuerySchema = z.object({
  artist: z.string().optional(),
  actor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(1000).optional(),
});

export type ShareAuditQuery = z.infer<typeof ShareAuditQuerySchema>;

export const SetAdvanceSchema = z.object({
  balance: DecimalSchema,
  actor: ActorSchema,
});

export type SetAdvanceDto = z.infer<typeof SetAdvanceSchema>;

// =============================================================================
// Payout DTOs
// =============================================================================

/**
 * A period's revenue, either inline or pulled from the revenue source
 * when `rows` is omitted.
 */
export const ComputeSchema = z.object({
  period: z.string().min(1),
  rows: z.array(RevenueRecordSchema).optional(),
  artists: z.array(z.string().min(1)).optional(),
});

export type ComputeDto = z.infer<typeof ComputeSchema>;

export const SettleSchema = ComputeSchema.extend({
  actor: ActorSchema,
});

export type SettleDto = z.infer<typeof SettleSchema>;

export const StatementSchema = ComputeSchema.extend({
  format: z.enum(["pdf", "xlsx"]).default("pdf"),
});

export type StatementDto = z.infer<typeof StatementSchema>;

export const ReconcileSchema = ComputeSchema.extend({
  actual: z.record(DecimalSchema),
});

export type ReconcileDto = z.infer<typeof ReconcileSchema>;

// =============================================================================
// Contract DTOs
// =============================================================================

const IsoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "Expected YYYY-MM-DD");

export const AddContractSchema = z.object({
  artist: z.string().min(1),
  split: DecimalSchema,
  signedDate: IsoDateSchema.optional(),
  // Stored as given; unreadable dates surface in the expiry check
  expiryDate: z.string().optional(),
  filePath: z.string().optional(),
  fileType: z.enum(["pdf", "docx", "scan"]).optional(),
  status: z.enum(["active", "expired", "placeholder"]).optional(),
  notes: z.string().optional(),
});

export type AddContractDto = z.infer<typeof AddContractSchema>;

export const UpdateContractSplitSchema = z.object({
  split: DecimalSchema,
  reason: z.string().min(1).max(1024),
  actor: ActorSchema,
});

export type UpdateContractSplitDto = z.infer<typeof UpdateContractSplitSchema>;

export const ExpiringQuerySchema = z.object({
  days: z.coerce.number().int().min(0).optional(),
});

export type ExpiringQuery = z.infer<typeof ExpiringQuerySchema>;

// =============================================================================
// Release / Escalation DTOs
// =============================================================================

export const OverrideSchema = z.object({
  actor: ActorSchema,
  reason: z.string().trim().min(1).max(1024),
});

export type OverrideDto = z.infer<typeof OverrideSchema>;

export const ResolveSchema = z.object({
  actor: ActorSchema,
});

export type ResolveDto = z.infer<typeof ResolveSchema>;

export const HoldQuerySchema = z.object({
  status: z.enum(["open", "resolved", "overridden"]).optional(),
});

export type HoldQuery = z.infer<typeof HoldQuerySchema>;

export const EscalationQuerySchema = z.object({
  source: z.string().optional(),
  action: z.enum(["notify_admin", "auto_resolve", "block"]).optional(),
  subject: z.string().optional(),
});

export type EscalationQuery = z.infer<typeof EscalationQuerySchema>;

export const AuditLogQuerySchema = z.object({
  action: z.string().optional(),
  resourceType: z.string().optional(),
  resourceId: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(1000).optional(),
});

export type AuditLogQueryDto = z.infer<typeof AuditLogQuerySchema>;
