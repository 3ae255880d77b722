// ---------------------------------------------------------------------------
// Network catalog routes (network administrators).
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import { z } from "zod";

import { assertPermitted, Operation } from "../../access/access-policy.js";
import type { CatalogService } from "../../catalog/catalog-service.js";
import type { Clock } from "../../core/types.js";
import type { QuerySurface } from "../../query/query-surface.js";
import { requireActor } from "../middleware/actor.js";
import type { AppEnv } from "../env.js";
import { readJsonBody } from "../validation.js";

/** Dependencies required by catalog routes. */
export interface CatalogRouteDeps {
  catalog: CatalogService;
  query: QuerySurface;
  clock: Clock;
}

const NewLibrarySchema = z.object({
  name: z.string().trim().min(1).max(200),
  city: z.string().trim().min(1).max(100),
  address: z.string().trim().max(300).optional(),
});

const NewTitleSchema = z.object({
  title: z.string().trim().min(1).max(300),
  author: z.string().trim().min(1).max(200),
  category: z.string().trim().min(1).max(100),
  isbn: z.string().max(32).optional(),
  publisher: z.string().trim().max(200).optional(),
  year: z.number().int().min(1000).max(9999).optional(),
});

/**
 * Mounts catalog endpoints:
 *
 * - `POST /catalog/libraries` -- Register a library.
 * - `POST /catalog/titles`    -- Register a bibliographic title.
 * - `GET  /catalog/summary`   -- Network-wide counts.
 */
export function catalogRoutes(deps: CatalogRouteDeps): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  app.post("/libraries", async (c) => {
    const actor = requireActor(c);
    const body = await readJsonBody(c, NewLibrarySchema);
    return c.json(await deps.catalog.registerLibrary(body, actor), 201);
  });

  app.post("/titles", async (c) => {
    const actor = requireActor(c);
    const body = await readJsonBody(c, NewTitleSchema);
    return c.json(await deps.catalog.registerTitle(body, actor), 201);
  });

  app.get("/summary", async (c) => {
    assertPermitted(requireActor(c), Operation.NETWORK_READ, null);
    return c.json(await deps.query.networkSummary(deps.clock()));
  });

  return app;
}
