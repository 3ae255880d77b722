// ---------------------------------------------------------------------------
// Circulation core -- application bootstrap.
// ---------------------------------------------------------------------------

import type { Hono } from "hono";
import type pino from "pino";

import type { AppConfig, Clock } from "./core/types.js";
import { loadConfig } from "./config/config.js";
import { applyNetworkSeed, loadNetworkSeed } from "./config/network-seed.js";
import { createLogger } from "./logging/logger.js";
import type { InventoryStore } from "./store/inventory-store.js";
import { MemoryInventoryStore } from "./store/memory-store.js";
import { createPool, initSchema, PgInventoryStore } from "./store/pg-store.js";
import { CirculationEngine } from "./circulation/circulation-engine.js";
import { QuerySurface } from "./query/query-surface.js";
import { CatalogService } from "./catalog/catalog-service.js";
import { createApp } from "./api/server.js";
import type { AppEnv } from "./api/env.js";

export interface BuiltApp {
  app: Hono<AppEnv>;
  config: AppConfig;
  logger: pino.Logger;
  store: InventoryStore;
}

// ── Store selection ────────────────────────────────────────────────────────

async function createStore(config: AppConfig, logger: pino.Logger): Promise<InventoryStore> {
  if (!config.database.url) {
    logger.info("DATABASE_URL not set; using the in-memory store");
    return new MemoryInventoryStore();
  }

  const pool = createPool(config.database, logger);
  await initSchema(pool);
  logger.info({ maxConnections: config.database.maxConnections }, "postgres store ready");
  return new PgInventoryStore(pool, config.store, logger.child({ module: "store" }));
}

// ── Main ───────────────────────────────────────────────────────────────────

export async function buildApp(env: NodeJS.ProcessEnv = process.env): Promise<BuiltApp> {
  // 1. Load configuration
  const config = loadConfig(env);

  // 2. Create logger
  const logger = createLogger({
    level: config.logLevel,
    prettyPrint: config.env === "development",
    redactPersonalData: true,
  });

  // 3. Open the store
  const store = await createStore(config, logger);
  const clock: Clock = () => new Date();

  // 4. Seed an empty network from YAML
  if ((await store.listLibraries()).length === 0) {
    const seed = loadNetworkSeed(config.seedDir, logger.child({ module: "seed" }));
    if (seed.libraries.length > 0) {
      await applyNetworkSeed(store, seed, clock());
      logger.info(
        {
          libraries: seed.libraries.length,
          titles: seed.titles.length,
          copies: seed.copies.length,
          readers: seed.readers.length,
        },
        "network seed loaded",
      );
    }
  }

  // 5. Create services
  const engine = new CirculationEngine(
    store,
    config.circulation,
    logger.child({ module: "circulation" }),
    clock,
  );
  const query = new QuerySurface(store);
  const catalog = new CatalogService(store, logger.child({ module: "catalog" }), clock);

  // 6. Create Hono app
  const app = createApp({
    store,
    engine,
    query,
    catalog,
    logger,
    rateLimitConfig: config.rateLimit,
    clock,
  });

  // 7. Log startup summary
  logger.info(
    {
      port: config.port,
      env: config.env,
      store: store.kind,
      loanPeriodDays: config.circulation.loanPeriodDays,
    },
    "circulation-core ready",
  );

  return { app, config, logger, store };
}
