// ---------------------------------------------------------------------------
// Request-scoped logging middleware.
// ---------------------------------------------------------------------------

import type { MiddlewareHandler } from "hono";
import type pino from "pino";
import type { AppEnv } from "../api/env.js";

function levelFor(status: number): pino.Level {
  if (status >= 500) return "error";
  if (status >= 400) return "warn";
  return "info";
}

/**
 * Attach a child logger bound to the request id, method and path, then
 * write one completion line whose level follows the response status.
 * The line names the actor role once the actor middleware has run.
 *
 * Runs after `requestId()`.
 */
export function createRequestLogger(baseLogger: pino.Logger): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const log = baseLogger.child({
      requestId: c.get("requestId"),
      method: c.req.method,
      path: c.req.path,
    });
    c.set("logger", log);

    const start = performance.now();
    await next();

    const status = c.res.status;
    const actor = c.get("actor");
    log[levelFor(status)](
      {
        status,
        durationMs: Math.round(performance.now() - start),
        actorRole: actor ? actor.role : null,
      },
      "request completed",
    );
  };
}
