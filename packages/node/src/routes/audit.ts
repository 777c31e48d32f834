/**
 * GET /api/v1/audit — Request audit trail, newest first.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { AuditLogQuerySchema } from "../types/dto.js";
import { parseQuery } from "../middleware/validate.js";

export function createAuditRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const query = parseQuery(c, AuditLogQuerySchema);
    if (!query.ok) return query.response;

    return c.json({ data: c.get("service").auditLog.query(query.data) });
  });

  return routes;
}
