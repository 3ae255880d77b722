// ---------------------------------------------------------------------------
// Hono application factory.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import type pino from "pino";

import type { CatalogService } from "../catalog/catalog-service.js";
import type { CirculationEngine } from "../circulation/circulation-engine.js";
import type { Clock, RateLimitConfig } from "../core/types.js";
import type { QuerySurface } from "../query/query-surface.js";
import type { InventoryStore } from "../store/inventory-store.js";

import { requestIdMiddleware } from "./middleware/request-id.js";
import { createRequestLogger } from "../logging/context.js";
import { rateLimitMiddleware } from "./middleware/rate-limit.js";
import { actorMiddleware } from "./middleware/actor.js";
import { errorHandler } from "./middleware/error-handler.js";
import type { AppEnv } from "./env.js";

import { searchRoutes } from "./routes/search.js";
import { libraryRoutes } from "./routes/libraries.js";
import { loanRoutes } from "./routes/loans.js";
import { catalogRoutes } from "./routes/catalog.js";
import { healthRoutes } from "./routes/health.js";

// ── Dependency bundle ──────────────────────────────────────────────────────

export interface AppDependencies {
  store: InventoryStore;
  engine: CirculationEngine;
  query: QuerySurface;
  catalog: CatalogService;
  logger: pino.Logger;
  rateLimitConfig: RateLimitConfig;
  clock: Clock;
}

// ── App factory ────────────────────────────────────────────────────────────

/**
 * Create and configure the Hono application.
 *
 * Middleware stack (applied in order):
 * 1. Request ID generation (`X-Request-ID`).
 * 2. Request-scoped child logger attached to context.
 * 3. Rate limiting per staff actor, else per client address (tighter on
 *    `/search`).
 * 4. Actor resolution from the gateway headers.
 * 5. Route handlers.
 * 6. Global error handler (maps domain errors to HTTP status codes).
 */
export function createApp(deps: AppDependencies): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  // ── Global middleware ──────────────────────────────────────────────────

  app.use("*", requestIdMiddleware());
  app.use("*", createRequestLogger(deps.logger));
  app.use(
    "*",
    rateLimitMiddleware({
      enabled: deps.rateLimitConfig.enabled,
      requestsPerMinute: deps.rateLimitConfig.requestsPerMinute,
    }),
  );
  app.use(
    "/search",
    rateLimitMiddleware({
      enabled: deps.rateLimitConfig.enabled,
      requestsPerMinute: deps.rateLimitConfig.searchRpm,
    }),
  );
  app.use("*", actorMiddleware());

  // ── Routes ────────────────────────────────────────────────────────────

  app.get("/", (c) =>
    c.json({
      service: "circulation-core",
      routes: ["/health", "/search", "/libraries", "/loans", "/catalog"],
    }),
  );

  app.route("/health", healthRoutes({ store: deps.store }));
  app.route("/search", searchRoutes({ query: deps.query }));
  app.route(
    "/libraries",
    libraryRoutes({ query: deps.query, catalog: deps.catalog, clock: deps.clock }),
  );
  app.route("/loans", loanRoutes({ engine: deps.engine }));
  app.route(
    "/catalog",
    catalogRoutes({ catalog: deps.catalog, query: deps.query, clock: deps.clock }),
  );

  app.notFound((c) => c.json({ error: "Route not found", type: "not_found" }, 404));

  // ── Error handler ─────────────────────────────────────────────────────

  app.onError(errorHandler(deps.logger));

  return app;
}
