/**
 * POST /api/v1/reconciliation — Compare a period's computed payouts with
 * the actual amounts paid. Discrepancies are escalated.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ReconcileSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

export function createReconciliationRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(ReconcileSchema), async (c) => {
    const body = c.get("validatedBody");
    const report = await c.get("service").reconcile(body, body.actual);
    return c.json({ data: report });
  });

  return routes;
}
