/**
 * Advance routes.
 *
 * GET /api/v1/advances          — Advances still being recovered (?artist)
 * GET /api/v1/advances/:artist  — One artist's balance
 * PUT /api/v1/advances/:artist  — Set an artist's outstanding balance
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { SetAdvanceSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

export function createAdvanceRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    return c.json({ data: c.get("service").activeAdvances(c.req.query("artist")) });
  });

  routes.get("/:artist", (c) => {
    return c.json({ data: c.get("service").artistBalance(c.req.param("artist")) });
  });

  routes.put("/:artist", validateBody(SetAdvanceSchema), (c) => {
    const body = c.get("validatedBody");
    const balance = c.get("service").setAdvance(c.req.param("artist"), body.balance, body.actor);
    return c.json({ data: balance });
  });

  return routes;
}
