/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 if server is running)
 * GET /ready  — Readiness probe (share-table audit chain intact)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { RoyaltyService } from "../services/royalty-service.js";

export function createHealthRoutes(service: RoyaltyService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const { ready, auditChain } = service.readiness();

    return c.json(
      {
        status: ready ? "ready" : "not_ready",
        auditChain: {
          valid: auditChain.valid,
          lastVerifiedSequence: auditChain.lastVerifiedSequence,
          errors: auditChain.errors.length,
        },
        timestamp: new Date().toISOString(),
      },
      ready ? 200 : 503,
    );
  });

  return routes;
}
