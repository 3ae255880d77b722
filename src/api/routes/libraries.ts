// ---------------------------------------------------------------------------
// Library routes: inventory, loans, readers, reports and registrations
// scoped to one library.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import type { Context } from "hono";
import { z } from "zod";

import { assertPermitted, inventoryScope, Operation } from "../../access/access-policy.js";
import type { CatalogService } from "../../catalog/catalog-service.js";
import { CopyStatus } from "../../core/types.js";
import type { Clock, LibraryId, TitleId } from "../../core/types.js";
import type { QuerySurface } from "../../query/query-surface.js";
import { requireActor } from "../middleware/actor.js";
import type { AppEnv } from "../env.js";
import { IdParam, readJsonBody, readQuery, validate } from "../validation.js";

/** Dependencies required by library routes. */
export interface LibraryRouteDeps {
  query: QuerySurface;
  catalog: CatalogService;
  clock: Clock;
}

const CopiesQuerySchema = z.object({
  status: z.enum([CopyStatus.AVAILABLE, CopyStatus.ON_LOAN]).optional(),
});

const AuditQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(50),
});

const NewCopySchema = z.object({
  titleId: IdParam,
  code: z.string().trim().min(1).max(64),
});

const NewReaderSchema = z.object({
  name: z.string().trim().min(1).max(200),
  email: z.string().trim().email(),
  document: z.string().trim().max(64).optional(),
  consent: z.boolean(),
});

function libraryIdOf(c: Context<AppEnv>): LibraryId {
  return validate(IdParam, c.req.param("id"), "library id") as LibraryId;
}

/**
 * Mounts library endpoints:
 *
 * - `GET  /libraries`                      -- All libraries (public).
 * - `GET  /libraries/:id/copies?status=`   -- Copies by status.
 * - `GET  /libraries/:id/copies/available` -- Copies on the shelf.
 * - `GET  /libraries/:id/loans`            -- Open loans with overdue flags.
 * - `GET  /libraries/:id/readers`          -- Registered readers.
 * - `GET  /libraries/:id/report`           -- Loan indicators.
 * - `GET  /libraries/:id/audit?limit=`     -- Most recent audit entries.
 * - `POST /libraries/:id/copies`           -- Add a copy.
 * - `POST /libraries/:id/readers`          -- Register a reader.
 */
export function libraryRoutes(deps: LibraryRouteDeps): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  // GET /libraries
  app.get("/", async (c) => {
    const actor = c.get("actor");
    const scope = actor ? inventoryScope(actor) : { kind: "none" as const };
    const libraries = await deps.query.listLibraries();

    return c.json({
      libraries: libraries.map((library) => ({
        ...library,
        inventoryVisible:
          scope.kind === "all" || (scope.kind === "library" && scope.libraryId === library.id),
      })),
      total: libraries.length,
    });
  });

  // GET /libraries/:id/copies
  app.get("/:id/copies", async (c) => {
    const libraryId = libraryIdOf(c);
    assertPermitted(requireActor(c), Operation.INVENTORY_READ, libraryId);
    const { status } = readQuery(c, CopiesQuerySchema);

    const copies = await deps.query.listCopies(libraryId, status);
    return c.json({ libraryId, copies, total: copies.length });
  });

  // GET /libraries/:id/copies/available
  app.get("/:id/copies/available", async (c) => {
    const libraryId = libraryIdOf(c);
    assertPermitted(requireActor(c), Operation.INVENTORY_READ, libraryId);

    const copies = await deps.query.listAvailableCopies(libraryId);
    return c.json({ libraryId, copies, total: copies.length });
  });

  // GET /libraries/:id/loans
  app.get("/:id/loans", async (c) => {
    const libraryId = libraryIdOf(c);
    assertPermitted(requireActor(c), Operation.LOANS_READ, libraryId);

    const loans = await deps.query.listOpenLoans(libraryId, deps.clock());
    return c.json({ libraryId, loans, total: loans.length });
  });

  // GET /libraries/:id/readers
  app.get("/:id/readers", async (c) => {
    const libraryId = libraryIdOf(c);
    assertPermitted(requireActor(c), Operation.LOANS_READ, libraryId);

    const readers = await deps.query.listReaders(libraryId);
    return c.json({ libraryId, readers, total: readers.length });
  });

  // GET /libraries/:id/report
  app.get("/:id/report", async (c) => {
    const libraryId = libraryIdOf(c);
    assertPermitted(requireActor(c), Operation.LOANS_READ, libraryId);

    return c.json(await deps.query.libraryReport(libraryId, deps.clock()));
  });

  // GET /libraries/:id/audit
  app.get("/:id/audit", async (c) => {
    const libraryId = libraryIdOf(c);
    assertPermitted(requireActor(c), Operation.LOANS_READ, libraryId);
    const { limit } = readQuery(c, AuditQuerySchema);

    const entries = await deps.query.listAuditEntries(libraryId, limit);
    return c.json({ libraryId, entries, total: entries.length });
  });

  // POST /libraries/:id/copies
  app.post("/:id/copies", async (c) => {
    const libraryId = libraryIdOf(c);
    const actor = requireActor(c);
    const body = await readJsonBody(c, NewCopySchema);

    const copy = await deps.catalog.addCopy(
      libraryId,
      { titleId: body.titleId as TitleId, code: body.code },
      actor,
    );
    return c.json(copy, 201);
  });

  // POST /libraries/:id/readers
  app.post("/:id/readers", async (c) => {
    const libraryId = libraryIdOf(c);
    const actor = requireActor(c);
    const body = await readJsonBody(c, NewReaderSchema);

    const reader = await deps.catalog.registerReader(libraryId, body, actor);
    return c.json(reader, 201);
  });

  return app;
}
