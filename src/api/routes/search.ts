// ---------------------------------------------------------------------------
// Public title search across the network.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import { z } from "zod";

import type { LibraryId } from "../../core/types.js";
import type { QuerySurface } from "../../query/query-surface.js";
import type { AppEnv } from "../env.js";
import { IdParam, readQuery } from "../validation.js";

/** Dependencies required by search routes. */
export interface SearchRouteDeps {
  query: QuerySurface;
}

const SearchQuerySchema = z.object({
  q: z.string({ required_error: "required" }).max(200),
  library: IdParam.optional(),
});

/**
 * Mounts the search endpoint:
 *
 * - `GET /search?q=<term>&library=<id>` -- Copies whose title contains the
 *   term (case-insensitive), optionally restricted to one library.
 *
 * No actor is required.
 */
export function searchRoutes(deps: SearchRouteDeps): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  app.get("/", async (c) => {
    const params = readQuery(c, SearchQuerySchema);
    const libraryId = params.library === undefined ? undefined : (params.library as LibraryId);

    const results = await deps.query.searchTitles(params.q, { libraryId });
    c.get("logger").debug({ results: results.length }, "search completed");

    return c.json({ query: params.q.trim(), results, total: results.length });
  });

  return app;
}
