// ---------------------------------------------------------------------------
// Fixed-window rate limiting, bucketed per actor or per client address.
// ---------------------------------------------------------------------------

import type { Context, MiddlewareHandler } from "hono";
import { ActorRole } from "../../core/types.js";
import type { AppEnv } from "../env.js";

export interface RateLimitOptions {
  enabled: boolean;
  requestsPerMinute: number;
  /** Millisecond clock; defaults to `Date.now`. */
  now?: () => number;
}

interface Window {
  count: number;
  startedAt: number;
}

const WINDOW_MS = 60_000;
const SWEEP_INTERVAL_MS = 300_000;

/**
 * Requests are counted per bucket in fixed 60 s windows. Over the limit the
 * caller gets 429 with `Retry-After` set to the seconds left in the window.
 *
 * The bucket is the `X-Actor-Id` the gateway forwarded alongside a known
 * `X-Actor-Role`. Any other call, search included, is bucketed by client
 * address, whatever id it carries.
 */
export function rateLimitMiddleware(options: RateLimitOptions): MiddlewareHandler<AppEnv> {
  const now = options.now ?? Date.now;
  const windows = new Map<string, Window>();

  const sweep = setInterval(() => {
    const cutoff = now() - WINDOW_MS;
    for (const [key, window] of windows) {
      if (window.startedAt < cutoff) windows.delete(key);
    }
  }, SWEEP_INTERVAL_MS);
  sweep.unref();

  return async (c, next) => {
    if (!options.enabled) {
      await next();
      return;
    }

    const key = bucketKey(c);
    const at = now();

    let window = windows.get(key);
    if (!window || at - window.startedAt >= WINDOW_MS) {
      window = { count: 0, startedAt: at };
      windows.set(key, window);
    }
    window.count++;

    if (window.count > options.requestsPerMinute) {
      const retryAfterSeconds = Math.max(1, Math.ceil((window.startedAt + WINDOW_MS - at) / 1000));
      c.get("logger").warn({ bucket: key, retryAfterSeconds }, "rate limit exceeded");

      c.header("Retry-After", String(retryAfterSeconds));
      return c.json(
        { error: "Too many requests", type: "rate_limit_exceeded", retryAfterSeconds },
        429,
      );
    }

    await next();
  };
}

// ── Helpers ────────────────────────────────────────────────────────────────

const KNOWN_ROLES: ReadonlySet<string> = new Set(Object.values(ActorRole));

function bucketKey(c: Context<AppEnv>): string {
  const actorId = c.req.header("x-actor-id")?.trim();
  const role = c.req.header("x-actor-role")?.trim();
  if (actorId && role && KNOWN_ROLES.has(role)) return `actor:${actorId}`;
  return `ip:${clientAddress(c)}`;
}

/**
 * Proxy headers are honoured only with TRUST_PROXY=true. Clients that
 * cannot be identified share one bucket.
 */
function clientAddress(c: Context<AppEnv>): string {
  if (process.env["TRUST_PROXY"] === "true") {
    const forwarded = c.req.header("x-forwarded-for")?.split(",")[0]?.trim();
    if (forwarded) return forwarded;

    const realIp = c.req.header("x-real-ip");
    if (realIp) return realIp;
  }

  return "unknown";
}
