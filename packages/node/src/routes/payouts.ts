/**
 * Payout routes.
 *
 * POST /api/v1/payouts/compute     — Compute a period (read-only)
 * POST /api/v1/payouts/settle      — Recover advances for released payouts
 * POST /api/v1/payouts/statements  — Statement metadata for export
 *
 * Each body names a period and either inline revenue rows or nothing,
 * in which case the configured revenue source is used.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ComputeSchema, SettleSchema, StatementSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

export function createPayoutRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/compute", validateBody(ComputeSchema), async (c) => {
    const result = await c.get("service").compute(c.get("validatedBody"));
    return c.json({ data: result });
  });

  routes.post("/settle", validateBody(SettleSchema), async (c) => {
    const body = c.get("validatedBody");
    const result = await c.get("service").settle(body, body.actor);
    return c.json({ data: result });
  });

  routes.post("/statements", validateBody(StatementSchema), async (c) => {
    const body = c.get("validatedBody");
    const statements = await c.get("service").statements(body, body.format);
    return c.json({ data: statements });
  });

  return routes;
}
