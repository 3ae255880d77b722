// ---------------------------------------------------------------------------
// Health check routes.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import type { InventoryStore } from "../../store/inventory-store.js";
import type { AppEnv } from "../env.js";

/** Dependencies required by health routes. */
export interface HealthRouteDeps {
  store: InventoryStore;
}

const startedAt = Date.now();

/**
 * Mounts health-check endpoints:
 *
 * - `GET /health` -- Liveness probe plus a round trip to the store.
 */
export function healthRoutes(deps: HealthRouteDeps): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  app.get("/", async (c) => {
    const uptimeMs = Date.now() - startedAt;
    const timestamp = new Date().toISOString();

    try {
      await deps.store.ping();
    } catch (err) {
      c.get("logger").warn(
        { err: err instanceof Error ? err.message : String(err) },
        "store ping failed",
      );
      return c.json(
        { status: "degraded", store: deps.store.kind, uptime: uptimeMs, timestamp },
        503,
      );
    }

    return c.json({ status: "ok", store: deps.store.kind, uptime: uptimeMs, timestamp });
  });

  return app;
}
