/**
 * Share table routes.
 *
 * GET /api/v1/shares          — All current share entries
 * GET /api/v1/shares/audit    — Split change trail (?artist, ?actor, ?limit)
 * GET /api/v1/shares/:artist  — One artist's entry
 * PUT /api/v1/shares/:artist  — Set an artist's fraction (audited)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { SetShareSchema, ShareAuditQuerySchema } from "../types/dto.js";
import { parseQuery, validateBody } from "../middleware/validate.js";
import { createErrorEnvelope } from "../types/error.js";

export function createShareRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    return c.json({ data: c.get("service").listShares() });
  });

  routes.get("/audit", (c) => {
    const query = parseQuery(c, ShareAuditQuerySchema);
    if (!query.ok) return query.response;

    return c.json({ data: c.get("service").shareAuditLog(query.data) });
  });

  routes.get("/:artist", (c) => {
    const artist = c.req.param("artist");
    const entry = c.get("service").getShare(artist);

    if (entry === undefined) {
      return c.json(
        createErrorEnvelope("NOT_FOUND", `No split for '${artist}'`),
        404,
      );
    }
    return c.json({ data: entry });
  });

  routes.put("/:artist", validateBody(SetShareSchema), (c) => {
    const body = c.get("validatedBody");
    const entry = c.get("service").setShare(
      c.req.param("artist"),
      body.fraction,
      body.reason,
      body.actor,
      body.provenance,
    );
    return c.json({ data: entry });
  });

  return routes;
}
