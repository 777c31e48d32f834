/**
 * Split verification and release gate routes.
 *
 * POST /api/v1/splits/verify                 — Engine ↔ contract registry check
 * GET  /api/v1/releases/holds                — Release holds (?status)
 * POST /api/v1/releases/:artist/override     — Human sign-off on a value mismatch
 * POST /api/v1/releases/:artist/resolve      — Close a hold
 * GET  /api/v1/escalations                   — Escalation decision log
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  EscalationQuerySchema,
  HoldQuerySchema,
  OverrideSchema,
  ResolveSchema,
} from "../types/dto.js";
import { parseQuery, validateBody } from "../middleware/validate.js";

export function createReleaseRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/splits/verify", (c) => {
    return c.json({ data: c.get("service").verifySplits() });
  });

  routes.get("/releases/holds", (c) => {
    const query = parseQuery(c, HoldQuerySchema);
    if (!query.ok) return query.response;

    return c.json({ data: c.get("service").listHolds(query.data.status) });
  });

  routes.post("/releases/:artist/override", validateBody(OverrideSchema), (c) => {
    const body = c.get("validatedBody");
    const hold = c.get("service").overrideHold(c.req.param("artist"), body.actor, body.reason);
    return c.json({ data: hold });
  });

  routes.post("/releases/:artist/resolve", validateBody(ResolveSchema), (c) => {
    const body = c.get("validatedBody");
    const hold = c.get("service").resolveHold(c.req.param("artist"), body.actor);
    return c.json({ data: hold });
  });

  routes.get("/escalations", (c) => {
    const query = parseQuery(c, EscalationQuerySchema);
    if (!query.ok) return query.response;

    return c.json({ data: c.get("service").escalations(query.data) });
  });

  return routes;
}
