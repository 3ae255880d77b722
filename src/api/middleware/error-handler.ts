// ---------------------------------------------------------------------------
// Hono error handler: maps domain errors to HTTP responses.
// ---------------------------------------------------------------------------

import type { Context, ErrorHandler } from "hono";
import type pino from "pino";
import {
  CirculationError,
  ConflictError,
  ForbiddenError,
  NotFoundError,
  ReaderInactiveError,
  ReaderIneligibleError,
  RenewalNotAllowedError,
  TransientStoreError,
  UnauthenticatedError,
  ValidationError,
} from "../../core/errors.js";
import type { AppEnv } from "../env.js";

/**
 * Build the Hono `onError` handler.
 *
 * Domain errors are reported with their stable `type`; precondition failures
 * carry no internal details, so their messages are always returned.
 * Unexpected errors are logged and, in production, answered with a generic
 * message.
 *
 * Mapping:
 * - `ValidationError`                 -> 400
 * - `UnauthenticatedError`            -> 401
 * - `ForbiddenError` (+ cross-library) -> 403
 * - `NotFoundError`                   -> 404
 * - `ConflictError` (+ subclasses)    -> 409
 * - reader / renewal rule violations  -> 422
 * - `TransientStoreError`             -> 503
 * - Everything else                   -> 500
 */
export function errorHandler(logger: pino.Logger): ErrorHandler<AppEnv> {
  return (err: Error, c: Context<AppEnv>): Response => {
    if (err instanceof ValidationError) {
      return c.json({ error: err.message, type: err.type, issues: err.issues }, 400);
    }
    if (err instanceof UnauthenticatedError) {
      return c.json({ error: err.message, type: err.type }, 401);
    }
    if (err instanceof ForbiddenError) {
      return c.json({ error: err.message, type: err.type }, 403);
    }
    if (err instanceof NotFoundError) {
      return c.json({ error: err.message, type: err.type }, 404);
    }
    if (err instanceof ConflictError) {
      return c.json({ error: err.message, type: err.type }, 409);
    }
    if (
      err instanceof ReaderInactiveError ||
      err instanceof ReaderIneligibleError ||
      err instanceof RenewalNotAllowedError
    ) {
      return c.json({ error: err.message, type: err.type }, 422);
    }
    if (err instanceof TransientStoreError) {
      c.header("Retry-After", "1");
      return c.json({ error: "Store temporarily unavailable", type: err.type }, 503);
    }

    logger.error(
      { err: { name: err.name, message: err.message, stack: err.stack }, path: c.req.path },
      "unhandled error",
    );

    const isProduction = process.env["NODE_ENV"] === "production";
    const type = err instanceof CirculationError ? err.type : "internal_error";
    return c.json({ error: isProduction ? "Internal server error" : err.message, type }, 500);
  };
}
