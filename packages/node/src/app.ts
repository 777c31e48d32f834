/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts for testability: tests create the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import pino from "pino";
import type { Logger } from "pino";
import type { AppEnv } from "./types/api-contract.js";
import { RoyaltyService } from "./services/royalty-service.js";
import type { RoyaltyServiceConfig } from "./services/royalty-service.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import { createErrorEnvelope } from "./types/error.js";
import { createHealthRoutes } from "./routes/health.js";
import { createShareRoutes } from "./routes/shares.js";
import { createAdvanceRoutes } from "./routes/advances.js";
import { createPayoutRoutes } from "./routes/payouts.js";
import { createReconciliationRoutes } from "./routes/reconciliation.js";
import { createReleaseRoutes } from "./routes/releases.js";
import { createContractRoutes } from "./routes/contracts.js";
import { createAuditRoutes } from "./routes/audit.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly serviceConfig: Omit<RoyaltyServiceConfig, "logger">;
  /** Shared by request logging and the service. Default: silent */
  readonly logger?: Logger;
  /** Log one line per request. Default: true */
  readonly logRequests?: boolean;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: RoyaltyService;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const logger = options.logger ?? pino({ level: "silent" });
  const service = new RoyaltyService({ ...options.serviceConfig, logger });

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logRequests !== false) {
    app.use("*", loggerMiddleware(logger));
  }

  // ─── Error Handling ─────────────────────────────────────────────
  app.onError(createErrorHandler(logger));
  app.notFound((c) =>
    c.json(createErrorEnvelope("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`), 404),
  );

  // ─── Health Routes ──────────────────────────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  app.route("/api/v1/shares", createShareRoutes());
  app.route("/api/v1/advances", createAdvanceRoutes());
  app.route("/api/v1/payouts", createPayoutRoutes());
  app.route("/api/v1/reconciliation", createReconciliationRoutes());
  app.route("/api/v1/contracts", createContractRoutes());
  app.route("/api/v1/audit", createAuditRoutes());
  app.route("/api/v1", createReleaseRoutes());

  return { app, service };
}
