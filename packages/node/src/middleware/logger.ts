/**
 * Structured request logging middleware.
 *
 * One pino line per request with requestId context. Level follows the
 * response: 5xx → error, 4xx → warn, otherwise info.
 */

import type { MiddlewareHandler } from "hono";
import type { Logger } from "pino";
import type { AppEnv } from "../types/api-contract.js";

export interface RequestLogEntry {
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
  readonly requestId: string;
}

export function loggerMiddleware(logger: Logger): MiddlewareHandler<AppEnv> {
  const log = logger.child({ component: "http" });

  return async (c, next) => {
    const start = Date.now();

    await next();

    const entry: RequestLogEntry = {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Date.now() - start,
      requestId: c.get("requestId"),
    };
    const msg = `${entry.method} ${entry.path} ${String(entry.status)}`;

    if (entry.status >= 500) {
      log.error(entry, msg);
    } else if (entry.status >= 400) {
      log.warn(entry, msg);
    } else {
      log.info(entry, msg);
    }
  };
}
