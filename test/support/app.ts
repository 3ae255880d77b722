// ---------------------------------------------------------------------------
// Builds the Hono app over a seeded memory store for HTTP tests.
// ---------------------------------------------------------------------------

import { createApp } from "../../src/api/server.js";
import { CatalogService } from "../../src/catalog/catalog-service.js";
import { CirculationEngine } from "../../src/circulation/circulation-engine.js";
import type { RateLimitConfig } from "../../src/core/types.js";
import { QuerySurface } from "../../src/query/query-surface.js";
import type { InventoryStore } from "../../src/store/inventory-store.js";
import {
  circulationConfig,
  manualClock,
  seededStore,
  silentLogger,
} from "./network.js";
import type { ManualClock } from "./network.js";

export interface TestAppOptions {
  store?: InventoryStore;
  rateLimit?: Partial<RateLimitConfig>;
}

export async function buildTestApp(options: TestAppOptions = {}) {
  const store = options.store ?? (await seededStore());
  const clock: ManualClock = manualClock("2024-03-01T10:00:00.000Z");

  const app = createApp({
    store,
    engine: new CirculationEngine(store, circulationConfig, silentLogger, clock.now),
    query: new QuerySurface(store),
    catalog: new CatalogService(store, silentLogger, clock.now),
    logger: silentLogger,
    rateLimitConfig: {
      enabled: false,
      requestsPerMinute: 120,
      searchRpm: 60,
      ...options.rateLimit,
    },
    clock: clock.now,
  });

  return { app, store, clock };
}

export const asAdmin = { "X-Actor-Role": "network_admin", "X-Actor-Id": "admin-1" };

export const asCentralCoordinator = {
  "X-Actor-Role": "local_coordinator",
  "X-Actor-Library": "lib-central",
  "X-Actor-Id": "coord-central",
};

export const asNorteCoordinator = {
  "X-Actor-Role": "local_coordinator",
  "X-Actor-Library": "lib-norte",
  "X-Actor-Id": "coord-norte",
};

export const asReader = {
  "X-Actor-Role": "reader",
  "X-Actor-Library": "lib-central",
  "X-Actor-Id": "r-ana",
};

/** JSON POST init with actor headers. */
export function postJson(headers: Record<string, string>, body: unknown): RequestInit {
  return {
    method: "POST",
    headers: { ...headers, "Content-Type": "application/json" },
    body: JSON.stringify(body),
  };
}
