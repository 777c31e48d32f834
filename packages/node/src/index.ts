/**
 * @rightsline/node — Public API.
 *
 * `main.ts` is the process entry point; this module exposes the app
 * factory and service for embedding and tests.
 */

export { RoyaltyService } from "./services/royalty-service.js";
export type {
  RoyaltyServiceConfig,
  PeriodInput,
  ComputeResult,
  SettleResult,
  SplitCheckResult,
  ReadinessResult,
} from "./services/royalty-service.js";
export { AuditLog } from "./services/audit-log.js";
export type { AuditLogEntry, AuditLogQuery, AuditResourceType } from "./services/audit-log.js";
export { createLoggerSink } from "./services/escalation-sink.js";
export { loadConfig, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./types/index.js";
