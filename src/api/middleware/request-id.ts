// ---------------------------------------------------------------------------
// Request ID middleware for Hono.
// ---------------------------------------------------------------------------

import { randomUUID } from "node:crypto";
import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../env.js";

/** UUIDs or short alphanumeric ids; anything else is replaced. */
const SAFE_REQUEST_ID_RE = /^[a-zA-Z0-9_-]{1,128}$/;

/**
 * Stores a request ID on the context as `"requestId"` and echoes it in the
 * `X-Request-ID` response header. A well-formed incoming `X-Request-ID` is
 * reused; otherwise a fresh UUID is generated.
 */
export function requestIdMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const existing = c.req.header("x-request-id");
    const requestId =
      existing && SAFE_REQUEST_ID_RE.test(existing) ? existing : randomUUID();

    c.set("requestId", requestId);
    c.header("X-Request-ID", requestId);

    await next();
  };
}
