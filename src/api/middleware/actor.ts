// ---------------------------------------------------------------------------
// Actor context resolution for Hono.
// ---------------------------------------------------------------------------

import type { Context, MiddlewareHandler } from "hono";
import { z } from "zod";

import { UnauthenticatedError } from "../../core/errors.js";
import { ActorRole } from "../../core/types.js";
import type { ActorContext, LibraryId } from "../../core/types.js";
import type { AppEnv } from "../env.js";

const ActorHeadersSchema = z
  .object({
    role: z.enum([ActorRole.NETWORK_ADMIN, ActorRole.LOCAL_COORDINATOR, ActorRole.READER]),
    library: z.string().min(1).max(128).optional(),
    id: z.string().min(1).max(128).optional(),
  })
  .refine((h) => h.role === ActorRole.NETWORK_ADMIN || h.library !== undefined, {
    message: "X-Actor-Library is required for this role",
    path: ["library"],
  });

/**
 * Reads the actor resolved by the upstream authentication gateway from
 * `X-Actor-Role`, `X-Actor-Library` and `X-Actor-Id`.
 *
 * Requests without `X-Actor-Role` continue anonymously (`actor` is `null`);
 * malformed headers are rejected with 401.
 */
export function actorMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const role = c.req.header("x-actor-role");
    if (role === undefined) {
      c.set("actor", null);
      await next();
      return;
    }

    const parsed = ActorHeadersSchema.safeParse({
      role,
      library: c.req.header("x-actor-library"),
      id: c.req.header("x-actor-id"),
    });
    if (!parsed.success) {
      throw new UnauthenticatedError(
        `invalid actor headers: ${parsed.error.issues.map((i) => i.message).join("; ")}`,
      );
    }

    const actor: ActorContext = {
      role: parsed.data.role,
      homeLibraryId: parsed.data.library === undefined ? null : (parsed.data.library as LibraryId),
      actorId: parsed.data.id ?? null,
    };
    c.set("actor", actor);
    await next();
  };
}

/** The request's actor, or `UnauthenticatedError` when there is none. */
export function requireActor(c: Context<AppEnv>): ActorContext {
  const actor = c.get("actor");
  if (!actor) throw new UnauthenticatedError("actor headers are required");
  return actor;
}
