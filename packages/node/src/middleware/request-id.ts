/**
 * Request ID middleware.
 *
 * Propagates an incoming X-Request-Id when it looks like an id, and
 * generates a fresh UUID otherwise. The id is echoed on the response.
 */

import { randomUUID } from "node:crypto";
import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export const REQUEST_ID_HEADER = "X-Request-Id";

const ACCEPTED_ID = /^[\w.:-]{1,128}$/;

export function requestIdMiddleware(
  generate: () => string = randomUUID,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const incoming = c.req.header(REQUEST_ID_HEADER);
    const requestId =
      incoming !== undefined && ACCEPTED_ID.test(incoming) ? incoming : generate();

    c.set("requestId", requestId);

    await next();

    c.header(REQUEST_ID_HEADER, requestId);
  };
}
