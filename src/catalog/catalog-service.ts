// ---------------------------------------------------------------------------
// Catalog Service: registration of libraries, titles, copies and readers.
// ---------------------------------------------------------------------------

import { randomUUID } from "node:crypto";
import type pino from "pino";

import { assertPermitted, Operation } from "../access/access-policy.js";
import { auditEntry } from "../core/audit.js";
import { NotFoundError, ValidationError } from "../core/errors.js";
import { AuditAction, CopyStatus } from "../core/types.js";
import type {
  ActorContext,
  Clock,
  Copy,
  CopyId,
  Library,
  LibraryId,
  Reader,
  ReaderId,
  Title,
  TitleId,
} from "../core/types.js";
import { normalizeISBN } from "../domain/isbn.js";
import type { InventoryStore } from "../store/inventory-store.js";

// ── Inputs ─────────────────────────────────────────────────────────────────

export interface NewLibrary {
  name: string;
  city: string;
  address?: string;
}

export interface NewTitle {
  title: string;
  author: string;
  category: string;
  isbn?: string;
  publisher?: string;
  year?: number;
}

export interface NewCopy {
  titleId: TitleId;
  code: string;
}

export interface NewReader {
  name: string;
  email: string;
  document?: string;
  /** Privacy terms accepted by the reader; registration is refused without it. */
  consent: boolean;
}

/**
 * Creates the records the circulation core reads. Copies always start
 * AVAILABLE; after creation their status belongs to the Circulation Engine.
 * Every registration is audited in the same transaction.
 */
export class CatalogService {
  constructor(
    private readonly store: InventoryStore,
    private readonly logger: pino.Logger,
    private readonly clock: Clock = () => new Date(),
  ) {}

  async registerLibrary(input: NewLibrary, actor: ActorContext): Promise<Library> {
    assertPermitted(actor, Operation.CATALOG_WRITE, null);
    const now = this.clock();
    const library: Library = {
      id: randomUUID() as LibraryId,
      name: input.name.trim(),
      city: input.city.trim(),
      address: input.address?.trim() || null,
      active: true,
      createdAt: now,
    };

    await this.store.transaction(async (tx) => {
      await tx.insertLibrary(library);
      await tx.appendAudit(
        auditEntry(AuditAction.LIBRARY_REGISTER, actor, library.id, { name: library.name }, now),
      );
    });

    this.logger.info({ libraryId: library.id }, "library registered");
    return library;
  }

  async registerTitle(input: NewTitle, actor: ActorContext): Promise<Title> {
    assertPermitted(actor, Operation.CATALOG_WRITE, null);

    let isbn: string | null = null;
    if (input.isbn !== undefined && input.isbn.trim() !== "") {
      isbn = normalizeISBN(input.isbn);
      if (!isbn) {
        throw new ValidationError(`invalid ISBN "${input.isbn}"`, ["isbn: bad length or check digit"]);
      }
    }

    const now = this.clock();
    const title: Title = {
      id: randomUUID() as TitleId,
      title: input.title.trim(),
      author: input.author.trim(),
      category: input.category.trim(),
      isbn,
      publisher: input.publisher?.trim() || null,
      year: input.year ?? null,
      createdAt: now,
    };

    await this.store.transaction(async (tx) => {
      await tx.insertTitle(title);
      await tx.appendAudit(
        auditEntry(AuditAction.TITLE_REGISTER, actor, null, { titleId: title.id, title: title.title }, now),
      );
    });

    this.logger.info({ titleId: title.id }, "title registered");
    return title;
  }

  async addCopy(libraryId: LibraryId, input: NewCopy, actor: ActorContext): Promise<Copy> {
    assertPermitted(actor, Operation.INVENTORY_WRITE, libraryId);
    const now = this.clock();
    const copy: Copy = {
      id: randomUUID() as CopyId,
      titleId: input.titleId,
      libraryId,
      code: input.code.trim(),
      status: CopyStatus.AVAILABLE,
      acquiredAt: now,
    };

    await this.store.transaction(async (tx) => {
      if (!(await tx.getLibrary(libraryId))) throw new NotFoundError("library", libraryId);
      await tx.insertCopy(copy);
      await tx.appendAudit(
        auditEntry(
          AuditAction.COPY_ADD,
          actor,
          libraryId,
          { copyId: copy.id, titleId: copy.titleId, code: copy.code },
          now,
        ),
      );
    });

    this.logger.info({ copyId: copy.id, libraryId }, "copy added");
    return copy;
  }

  async registerReader(
    libraryId: LibraryId,
    input: NewReader,
    actor: ActorContext,
  ): Promise<Reader> {
    assertPermitted(actor, Operation.READERS_WRITE, libraryId);
    if (!input.consent) {
      throw new ValidationError("privacy consent is required to register a reader", [
        "consent: must be true",
      ]);
    }

    const now = this.clock();
    const reader: Reader = {
      id: randomUUID() as ReaderId,
      name: input.name.trim(),
      email: input.email.trim().toLowerCase(),
      document: input.document?.trim() || null,
      homeLibraryId: libraryId,
      active: true,
      consentedAt: now,
      registeredAt: now,
    };

    await this.store.transaction(async (tx) => {
      await tx.insertReader(reader);
      await tx.appendAudit(
        auditEntry(AuditAction.READER_REGISTER, actor, libraryId, { readerId: reader.id }, now),
      );
    });

    this.logger.info({ readerId: reader.id, libraryId }, "reader registered");
    return reader;
  }
}
