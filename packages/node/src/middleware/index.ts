/**
 * Middleware barrel — re-exports all middleware.
 */

export { createErrorHandler, statusFor } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { validateBody, parseQuery } from "./validate.js";
export type { ValidatedBodyEnv } from "./validate.js";
