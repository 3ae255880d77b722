// ---------------------------------------------------------------------------
// Access Policy: which operations an actor may perform on which library.
// ---------------------------------------------------------------------------

import { ForbiddenError } from "../core/errors.js";
import { ActorRole } from "../core/types.js";
import type { ActorContext, LibraryId } from "../core/types.js";

export const Operation = {
  CHECKOUT: "circulation:checkout",
  RETURN: "circulation:return",
  RENEW: "circulation:renew",
  INVENTORY_READ: "inventory:read",
  INVENTORY_WRITE: "inventory:write",
  READERS_WRITE: "readers:write",
  LOANS_READ: "loans:read",
  CATALOG_WRITE: "catalog:write",
  NETWORK_READ: "network:read",
  SEARCH: "search",
} as const;
export type Operation = (typeof Operation)[keyof typeof Operation];

const NONE: ReadonlySet<Operation> = new Set();

const SEARCH_ONLY: ReadonlySet<Operation> = new Set([Operation.SEARCH]);

const ADMIN_OPERATIONS: ReadonlySet<Operation> = new Set([
  Operation.CATALOG_WRITE,
  Operation.INVENTORY_READ,
  Operation.LOANS_READ,
  Operation.NETWORK_READ,
  Operation.SEARCH,
]);

const COORDINATOR_HOME_OPERATIONS: ReadonlySet<Operation> = new Set([
  Operation.CHECKOUT,
  Operation.RETURN,
  Operation.RENEW,
  Operation.INVENTORY_READ,
  Operation.INVENTORY_WRITE,
  Operation.READERS_WRITE,
  Operation.LOANS_READ,
  Operation.SEARCH,
]);

/** Libraries whose inventory an actor may see. */
export type InventoryScope =
  | { kind: "all" }
  | { kind: "library"; libraryId: LibraryId }
  | { kind: "none" };

function assertNever(role: never): never {
  throw new Error(`unhandled actor role: ${String(role)}`);
}

/**
 * Operations `actor` may perform against `targetLibraryId`. Pass `null` for
 * network-wide operations (catalog writes, network summary).
 *
 * - `network_admin`: catalog management and read access everywhere, no
 *   circulation.
 * - `local_coordinator`: circulation and local inventory at their home
 *   library only; search elsewhere.
 * - `reader`: search.
 */
export function permittedOperations(
  actor: ActorContext,
  targetLibraryId: LibraryId | null,
): ReadonlySet<Operation> {
  switch (actor.role) {
    case ActorRole.NETWORK_ADMIN:
      return ADMIN_OPERATIONS;
    case ActorRole.LOCAL_COORDINATOR:
      if (actor.homeLibraryId === null) return NONE;
      return targetLibraryId === actor.homeLibraryId ? COORDINATOR_HOME_OPERATIONS : SEARCH_ONLY;
    case ActorRole.READER:
      return SEARCH_ONLY;
    default:
      return assertNever(actor.role);
  }
}

export function isPermitted(
  actor: ActorContext,
  operation: Operation,
  targetLibraryId: LibraryId | null,
): boolean {
  return permittedOperations(actor, targetLibraryId).has(operation);
}

/** Throws `ForbiddenError` unless `operation` is permitted. */
export function assertPermitted(
  actor: ActorContext,
  operation: Operation,
  targetLibraryId: LibraryId | null,
): void {
  if (!isPermitted(actor, operation, targetLibraryId)) {
    const where = targetLibraryId ? ` on library "${targetLibraryId}"` : "";
    throw new ForbiddenError(`role "${actor.role}" may not perform ${operation}${where}`);
  }
}

/**
 * True when the actor's role grants `operation` on at least one library,
 * checked before any record is loaded.
 */
export function roleCanEver(actor: ActorContext, operation: Operation): boolean {
  switch (actor.role) {
    case ActorRole.NETWORK_ADMIN:
      return ADMIN_OPERATIONS.has(operation);
    case ActorRole.LOCAL_COORDINATOR:
      return actor.homeLibraryId !== null && COORDINATOR_HOME_OPERATIONS.has(operation);
    case ActorRole.READER:
      return SEARCH_ONLY.has(operation);
    default:
      return assertNever(actor.role);
  }
}

export function inventoryScope(actor: ActorContext): InventoryScope {
  switch (actor.role) {
    case ActorRole.NETWORK_ADMIN:
      return { kind: "all" };
    case ActorRole.LOCAL_COORDINATOR:
      return actor.homeLibraryId === null
        ? { kind: "none" }
        : { kind: "library", libraryId: actor.homeLibraryId };
    case ActorRole.READER:
      return { kind: "none" };
    default:
      return assertNever(actor.role);
  }
}
