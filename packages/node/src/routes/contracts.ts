/**
 * Contract registry routes.
 *
 * POST /api/v1/contracts                 — Register a contract
 * GET  /api/v1/contracts                 — List contracts
 * GET  /api/v1/contracts/summary         — Counts and average split
 * GET  /api/v1/contracts/expiring        — Expiry notices (?days)
 * GET  /api/v1/contracts/:artist         — One contract
 * PUT  /api/v1/contracts/:artist/split   — Change a contracted split
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  AddContractSchema,
  ExpiringQuerySchema,
  UpdateContractSplitSchema,
} from "../types/dto.js";
import { parseQuery, validateBody } from "../middleware/validate.js";
import { createErrorEnvelope } from "../types/error.js";

export function createContractRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(AddContractSchema), (c) => {
    const contract = c.get("service").addContract(c.get("validatedBody"), "api");
    return c.json({ data: contract }, 201);
  });

  routes.get("/", (c) => {
    return c.json({ data: c.get("service").listContracts() });
  });

  routes.get("/summary", (c) => {
    return c.json({ data: c.get("service").contractSummary() });
  });

  routes.get("/expiring", (c) => {
    const query = parseQuery(c, ExpiringQuerySchema);
    if (!query.ok) return query.response;

    return c.json({ data: c.get("service").expiringContracts(query.data.days) });
  });

  routes.get("/:artist", (c) => {
    const artist = c.req.param("artist");
    const contract = c.get("service").getContract(artist);

    if (contract === undefined) {
      return c.json(
        createErrorEnvelope("NOT_FOUND", `Contract not found for artist: ${artist}`),
        404,
      );
    }
    return c.json({ data: contract });
  });

  routes.put("/:artist/split", validateBody(UpdateContractSplitSchema), (c) => {
    const body = c.get("validatedBody");
    const entry = c.get("service").updateContractSplit(
      c.req.param("artist"),
      body.split,
      body.reason,
      body.actor,
    );
    return c.json({ data: entry });
  });

  return routes;
}
