// ---------------------------------------------------------------------------
// Audit entry construction.
// ---------------------------------------------------------------------------

import { randomUUID } from "node:crypto";
import type {
  ActorContext,
  AuditAction,
  AuditEntry,
  AuditEntryId,
  LibraryId,
} from "./types.js";

export function auditEntry(
  action: AuditAction,
  actor: ActorContext,
  libraryId: LibraryId | null,
  details: Record<string, unknown>,
  recordedAt: Date,
): AuditEntry {
  return {
    id: randomUUID() as AuditEntryId,
    action,
    libraryId,
    actorId: actor.actorId,
    actorRole: actor.role,
    details,
    recordedAt,
  };
}
