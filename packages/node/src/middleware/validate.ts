/**
 * Zod validation middleware.
 *
 * Validates request bodies and query strings against Zod schemas.
 * Returns 400 with error envelope on validation failure.
 */

import type { Context, MiddlewareHandler } from "hono";
import type { z, ZodError, ZodTypeAny } from "zod";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

/** Context variables added by `validateBody`. */
export interface ValidatedBodyEnv<T> {
  Variables: AppEnv["Variables"] & { validatedBody: T };
}

/**
 * Validate JSON request body against a Zod schema.
 *
 * On success, sets `validatedBody` (typed as the schema's output) in
 * context variables. On failure, returns 400 with structured issues.
 */
export function validateBody<S extends ZodTypeAny>(
  schema: S,
): MiddlewareHandler<ValidatedBodyEnv<z.output<S>>> {
  return async (c, next) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid JSON in request body"),
        400,
      );
    }

    const result = schema.safeParse(body);
    if (!result.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Request body validation failed", {
          issues: formatZodErrors(result.error),
        }),
        400,
      );
    }

    c.set("validatedBody", result.data);
    return next();
  };
}

/**
 * Parse the query string, or produce the 400 response to return.
 */
export function parseQuery<S extends ZodTypeAny>(
  c: Context,
  schema: S,
): { ok: true; data: z.output<S> } | { ok: false; response: Response } {
  const result = schema.safeParse(c.req.query());
  if (!result.success) {
    return {
      ok: false,
      response: c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters", {
          issues: formatZodErrors(result.error),
        }),
        400,
      ),
    };
  }
  return { ok: true, data: result.data };
}

function formatZodErrors(
  error: ZodError,
): readonly { path: string; message: string }[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}
