/**
 * Global error handler.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Maps known domain errors (RoyaltyError, ContractError, ReconciliationError, ...)
 * to appropriate HTTP status codes through their `code`.
 */

import type { ErrorHandler } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import type { Logger } from "pino";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

const STATUS_MAP: Readonly<Record<string, ContentfulStatusCode>> = {
  // Royalty engine errors
  OUT_OF_RANGE: 400,
  INVALID_RECORD: 400,
  ALREADY_SETTLED: 409,
  CONFIGURATION_MISSING: 503,

  // Money errors
  INVALID_AMOUNT: 400,
  INVALID_PRECISION: 400,

  // Contract registry errors
  CONTRACT_EXISTS: 409,
  CONTRACT_NOT_FOUND: 404,
  INVALID_SPLIT: 400,

  // Reconciliation errors
  INVALID_ACTUAL: 400,

  // Release gate errors
  NO_OPEN_MISMATCH: 409,
  INVALID_OVERRIDE: 400,
};

function getErrorCode(error: Error): string | undefined {
  return "code" in error && typeof error.code === "string" ? error.code : undefined;
}

export function statusFor(code: string | undefined): ContentfulStatusCode {
  return (code !== undefined ? STATUS_MAP[code] : undefined) ?? 500;
}

// =============================================================================
// Handler
// =============================================================================

/**
 * Build the app's onError handler. Unmapped errors are logged and
 * answered with a generic 500.
 */
export function createErrorHandler(logger?: Logger): ErrorHandler {
  return (err, c) => {
    // HTTPException and friends carry their own response
    if ("getResponse" in err) {
      return err.getResponse();
    }

    const code = getErrorCode(err);
    const status = statusFor(code);

    if (status === 500) {
      logger?.error({ err, path: c.req.path }, "Unhandled error");
      return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
    }

    return c.json(createErrorEnvelope(code ?? "INTERNAL_ERROR", err.message), status);
  };
}
