// ---------------------------------------------------------------------------
// PostgreSQL Inventory Store.
// ---------------------------------------------------------------------------

import pg from "pg";
import { readFileSync } from "node:fs";
import { join, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import type pino from "pino";

import {
  ConfigurationError,
  ConflictError,
  NotFoundError,
  TransientStoreError,
  ValidationError,
} from "../core/errors.js";
import { ActorRole, AuditAction, CopyStatus, LoanStatus } from "../core/types.js";
import type {
  AuditEntry,
  AuditEntryId,
  Copy,
  CopyId,
  CopyView,
  DatabaseConfig,
  EntityCounts,
  Library,
  LibraryId,
  Loan,
  LoanId,
  OpenLoanRow,
  Reader,
  ReaderId,
  StoreConfig,
  Title,
  TitleHolding,
  TitleId,
} from "../core/types.js";
import type { CopyFilter, InventoryStore, StoreTransaction } from "./inventory-store.js";
import { withRetry } from "./retry.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

// ── Pool & schema ──────────────────────────────────────────────────────────

/** The part of a node-postgres client the store talks to. */
export interface PgQueryable {
  query<R extends pg.QueryResultRow>(text: string, values?: unknown[]): Promise<pg.QueryResult<R>>;
}

export interface PgClient extends PgQueryable {
  /** `true` destroys the connection instead of returning it to the pool. */
  release(destroy?: boolean): void;
}

/** Satisfied by `pg.Pool`. */
export interface PgPool extends PgQueryable {
  connect(): Promise<PgClient>;
  end(): Promise<void>;
}

export function createPool(config: DatabaseConfig, logger: pino.Logger): pg.Pool {
  if (!config.url) {
    throw new ConfigurationError("createPool requires a database URL");
  }
  const pool = new pg.Pool({
    connectionString: config.url,
    max: config.maxConnections,
  });
  // Idle clients that die are dropped by the pool; log instead of crashing.
  pool.on("error", (err) => {
    logger.error({ err: err.message }, "postgres pool background error");
  });
  return pool;
}

export async function initSchema(pool: pg.Pool): Promise<void> {
  const sql = readFileSync(join(__dirname, "schema.sql"), "utf-8");
  await pool.query(sql);
}

// ── Error translation ──────────────────────────────────────────────────────

const SERIALIZATION_FAILURE = "40001";
const DEADLOCK_DETECTED = "40P01";
const UNIQUE_VIOLATION = "23505";
const FOREIGN_KEY_VIOLATION = "23503";

function sqlStateOf(err: unknown): { code: string; constraint: string | null } | null {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    const constraint =
      "constraint" in err && typeof err.constraint === "string" ? err.constraint : null;
    return { code: err.code, constraint };
  }
  return null;
}

/**
 * Map a PostgreSQL error to the domain error it stands for. Errors without a
 * recognised SQLSTATE are returned unchanged.
 */
export function translatePgError(err: unknown): unknown {
  const state = sqlStateOf(err);
  if (!state) return err;

  switch (state.code) {
    case SERIALIZATION_FAILURE:
    case DEADLOCK_DETECTED:
      return new TransientStoreError("transaction aborted by the database", { cause: err });

    case UNIQUE_VIOLATION:
      switch (state.constraint) {
        case "loans_one_open_per_copy":
          return new ConflictError("copy already has an open loan", "conflict", { cause: err });
        case "copies_library_code_key":
          return new ValidationError("copy code is already used in this library", [], { cause: err });
        case "readers_email_key":
          return new ValidationError("a reader with this email is already registered", [], {
            cause: err,
          });
        default:
          return new ValidationError("record already exists", [], { cause: err });
      }

    case FOREIGN_KEY_VIOLATION:
      return new ValidationError("referenced record does not exist", [], { cause: err });

    default:
      return err;
  }
}

/** Escape `%`, `_` and `\` so user input matches literally inside ILIKE. */
export function escapeLikePattern(term: string): string {
  return term.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

// ── Row types & mapping ────────────────────────────────────────────────────

type LibraryRow = {
  id: string;
  name: string;
  city: string;
  address: string | null;
  active: boolean;
  created_at: Date;
};

type TitleRow = {
  id: string;
  title: string;
  author: string;
  category: string;
  isbn: string | null;
  publisher: string | null;
  year: number | null;
  created_at: Date;
};

type CopyRow = {
  id: string;
  title_id: string;
  library_id: string;
  code: string;
  status: string;
  acquired_at: Date;
};

type ReaderRow = {
  id: string;
  name: string;
  email: string;
  document: string | null;
  home_library_id: string;
  active: boolean;
  consented_at: Date;
  registered_at: Date;
};

type LoanRow = {
  id: string;
  reader_id: string;
  copy_id: string;
  library_id: string;
  loan_date: Date;
  due_date: Date;
  return_date: Date | null;
  renewals: number;
  status: string;
};

type AuditRow = {
  id: string;
  action: string;
  library_id: string | null;
  actor_id: string | null;
  actor_role: string;
  details: unknown;
  recorded_at: Date;
};

type CopyViewRow = {
  copy_id: string;
  code: string;
  status: string;
  library_id: string;
  title_id: string;
  title: string;
  author: string;
};

type OpenLoanJoinRow = {
  loan_id: string;
  reader_id: string;
  reader_name: string;
  copy_id: string;
  copy_code: string;
  title_id: string;
  title: string;
  loan_date: Date;
  due_date: Date;
  renewals: number;
};

type HoldingRow = {
  title_id: string;
  title: string;
  author: string;
  category: string;
  library_id: string;
  library_name: string;
  copy_code: string;
  status: string;
};

type CountRow = { count: number };

type EntityCountRow = { libraries: number; titles: number; copies: number };

function parseCopyStatus(value: string): CopyStatus {
  switch (value) {
    case CopyStatus.AVAILABLE:
    case CopyStatus.ON_LOAN:
      return value;
    default:
      throw new Error(`unknown copy status "${value}" in database`);
  }
}

function parseLoanStatus(value: string): LoanStatus {
  switch (value) {
    case LoanStatus.OPEN:
    case LoanStatus.RETURNED:
      return value;
    default:
      throw new Error(`unknown loan status "${value}" in database`);
  }
}

function parseActorRole(value: string): ActorRole {
  const role = Object.values(ActorRole).find((r) => r === value);
  if (!role) throw new Error(`unknown actor role "${value}" in database`);
  return role;
}

function parseAuditAction(value: string): AuditAction {
  const action = Object.values(AuditAction).find((a) => a === value);
  if (!action) throw new Error(`unknown audit action "${value}" in database`);
  return action;
}

function toLibrary(row: LibraryRow): Library {
  return {
    id: row.id as LibraryId,
    name: row.name,
    city: row.city,
    address: row.address,
    active: row.active,
    createdAt: row.created_at,
  };
}

function toTitle(row: TitleRow): Title {
  return {
    id: row.id as TitleId,
    title: row.title,
    author: row.author,
    category: row.category,
    isbn: row.isbn,
    publisher: row.publisher,
    year: row.year,
    createdAt: row.created_at,
  };
}

function toCopy(row: CopyRow): Copy {
  return {
    id: row.id as CopyId,
    titleId: row.title_id as TitleId,
    libraryId: row.library_id as LibraryId,
    code: row.code,
    status: parseCopyStatus(row.status),
    acquiredAt: row.acquired_at,
  };
}

function toReader(row: ReaderRow): Reader {
  return {
    id: row.id as ReaderId,
    name: row.name,
    email: row.email,
    document: row.document,
    homeLibraryId: row.home_library_id as LibraryId,
    active: row.active,
    consentedAt: row.consented_at,
    registeredAt: row.registered_at,
  };
}

function toLoan(row: LoanRow): Loan {
  return {
    id: row.id as LoanId,
    readerId: row.reader_id as ReaderId,
    copyId: row.copy_id as CopyId,
    libraryId: row.library_id as LibraryId,
    loanDate: row.loan_date,
    dueDate: row.due_date,
    returnDate: row.return_date,
    renewals: row.renewals,
    status: parseLoanStatus(row.status),
  };
}

function toAuditEntry(row: AuditRow): AuditEntry {
  const details =
    row.details !== null && typeof row.details === "object" && !Array.isArray(row.details)
      ? Object.fromEntries(Object.entries(row.details))
      : {};
  return {
    id: row.id as AuditEntryId,
    action: parseAuditAction(row.action),
    libraryId: row.library_id === null ? null : (row.library_id as LibraryId),
    actorId: row.actor_id,
    actorRole: parseActorRole(row.actor_role),
    details,
    recordedAt: row.recorded_at,
  };
}

// ── SQL ────────────────────────────────────────────────────────────────────

const LOAN_COLUMNS =
  "id, reader_id, copy_id, library_id, loan_date, due_date, return_date, renewals, status";
const COPY_COLUMNS = "id, title_id, library_id, code, status, acquired_at";
const READER_COLUMNS =
  "id, name, email, document, home_library_id, active, consented_at, registered_at";
const TITLE_COLUMNS = "id, title, author, category, isbn, publisher, year, created_at";
const LIBRARY_COLUMNS = "id, name, city, address, active, created_at";

async function firstRow<R extends pg.QueryResultRow>(
  pending: Promise<pg.QueryResult<R>>,
): Promise<R | null> {
  const result = await pending;
  return result.rows[0] ?? null;
}

// ── Transaction ────────────────────────────────────────────────────────────

class PgTransaction implements StoreTransaction {
  constructor(private readonly client: PgClient) {}

  async lockCopy(copyId: CopyId): Promise<Copy | null> {
    const row = await firstRow(
      this.client.query<CopyRow>(
        `SELECT ${COPY_COLUMNS} FROM copies WHERE id = $1 FOR UPDATE`,
        [copyId],
      ),
    );
    return row ? toCopy(row) : null;
  }

  async lockLoan(loanId: LoanId): Promise<Loan | null> {
    const row = await firstRow(
      this.client.query<LoanRow>(
        `SELECT ${LOAN_COLUMNS} FROM loans WHERE id = $1 FOR UPDATE`,
        [loanId],
      ),
    );
    return row ? toLoan(row) : null;
  }

  async lockReader(readerId: ReaderId): Promise<Reader | null> {
    const row = await firstRow(
      this.client.query<ReaderRow>(
        `SELECT ${READER_COLUMNS} FROM readers WHERE id = $1 FOR UPDATE`,
        [readerId],
      ),
    );
    return row ? toReader(row) : null;
  }

  async getLibrary(libraryId: LibraryId): Promise<Library | null> {
    const row = await firstRow(
      this.client.query<LibraryRow>(
        `SELECT ${LIBRARY_COLUMNS} FROM libraries WHERE id = $1`,
        [libraryId],
      ),
    );
    return row ? toLibrary(row) : null;
  }

  async getTitle(titleId: TitleId): Promise<Title | null> {
    const row = await firstRow(
      this.client.query<TitleRow>(
        `SELECT ${TITLE_COLUMNS} FROM titles WHERE id = $1`,
        [titleId],
      ),
    );
    return row ? toTitle(row) : null;
  }

  async countOpenLoansForReader(readerId: ReaderId): Promise<number> {
    const row = await firstRow(
      this.client.query<CountRow>(
        "SELECT count(*)::int AS count FROM loans WHERE reader_id = $1 AND status = 'OPEN'",
        [readerId],
      ),
    );
    return row?.count ?? 0;
  }

  async countOverdueLoansForReader(readerId: ReaderId, now: Date): Promise<number> {
    const row = await firstRow(
      this.client.query<CountRow>(
        `SELECT count(*)::int AS count FROM loans
       WHERE reader_id = $1 AND status = 'OPEN' AND due_date < $2`,
        [readerId, now],
      ),
    );
    return row?.count ?? 0;
  }

  async compareAndSetCopyStatus(
    copyId: CopyId,
    expected: CopyStatus,
    next: CopyStatus,
  ): Promise<boolean> {
    const result = await this.client.query(
      "UPDATE copies SET status = $3 WHERE id = $1 AND status = $2",
      [copyId, expected, next],
    );
    return result.rowCount === 1;
  }

  async insertLoan(loan: Loan): Promise<void> {
    await this.client.query(
      `INSERT INTO loans (${LOAN_COLUMNS})
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)`,
      [
        loan.id,
        loan.readerId,
        loan.copyId,
        loan.libraryId,
        loan.loanDate,
        loan.dueDate,
        loan.returnDate,
        loan.renewals,
        loan.status,
      ],
    );
  }

  async closeLoan(loanId: LoanId, returnDate: Date): Promise<boolean> {
    const result = await this.client.query(
      `UPDATE loans SET status = 'RETURNED', return_date = $2
       WHERE id = $1 AND status = 'OPEN'`,
      [loanId, returnDate],
    );
    return result.rowCount === 1;
  }

  async extendLoan(loanId: LoanId, expectedRenewals: number, dueDate: Date): Promise<boolean> {
    const result = await this.client.query(
      `UPDATE loans SET due_date = $3, renewals = renewals + 1
       WHERE id = $1 AND status = 'OPEN' AND renewals = $2`,
      [loanId, expectedRenewals, dueDate],
    );
    return result.rowCount === 1;
  }

  async insertLibrary(library: Library): Promise<void> {
    await this.client.query(
      `INSERT INTO libraries (${LIBRARY_COLUMNS}) VALUES ($1, $2, $3, $4, $5, $6)`,
      [library.id, library.name, library.city, library.address, library.active, library.createdAt],
    );
  }

  async insertTitle(title: Title): Promise<void> {
    await this.client.query(
      `INSERT INTO titles (${TITLE_COLUMNS}) VALUES ($1, $2, $3, $4, $5, $6, $7, $8)`,
      [
        title.id,
        title.title,
        title.author,
        title.category,
        title.isbn,
        title.publisher,
        title.year,
        title.createdAt,
      ],
    );
  }

  async insertCopy(copy: Copy): Promise<void> {
    if (!(await this.getTitle(copy.titleId))) throw new NotFoundError("title", copy.titleId);
    if (!(await this.getLibrary(copy.libraryId))) throw new NotFoundError("library", copy.libraryId);
    await this.client.query(
      `INSERT INTO copies (${COPY_COLUMNS}) VALUES ($1, $2, $3, $4, $5, $6)`,
      [copy.id, copy.titleId, copy.libraryId, copy.code, copy.status, copy.acquiredAt],
    );
  }

  async insertReader(reader: Reader): Promise<void> {
    if (!(await this.getLibrary(reader.homeLibraryId))) {
      throw new NotFoundError("library", reader.homeLibraryId);
    }
    await this.client.query(
      `INSERT INTO readers (${READER_COLUMNS}) VALUES ($1, $2, $3, $4, $5, $6, $7, $8)`,
      [
        reader.id,
        reader.name,
        reader.email,
        reader.document,
        reader.homeLibraryId,
        reader.active,
        reader.consentedAt,
        reader.registeredAt,
      ],
    );
  }

  async appendAudit(entry: AuditEntry): Promise<void> {
    await this.client.query(
      `INSERT INTO audit_entries (id, action, library_id, actor_id, actor_role, details, recorded_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7)`,
      [
        entry.id,
        entry.action,
        entry.libraryId,
        entry.actorId,
        entry.actorRole,
        JSON.stringify(entry.details),
        entry.recordedAt,
      ],
    );
  }
}

// ── Store ──────────────────────────────────────────────────────────────────

/**
 * Inventory Store on PostgreSQL.
 *
 * Each unit of work runs inside `BEGIN … COMMIT` on a dedicated pooled
 * client. Copy, loan and reader rows are locked with `FOR UPDATE` before
 * being checked, writes are compare-and-set, and `loans_one_open_per_copy` backs
 * the one-open-loan-per-copy rule at the database level. Serialization
 * failures and deadlocks are retried up to `maxRetries` times.
 */
export class PgInventoryStore implements InventoryStore {
  readonly kind = "postgres" as const;

  constructor(
    private readonly pool: PgPool,
    private readonly config: StoreConfig,
    private readonly logger: pino.Logger,
  ) {}

  async transaction<T>(work: (tx: StoreTransaction) => Promise<T>): Promise<T> {
    return withRetry(() => this.runOnce(work), {
      maxRetries: this.config.maxRetries,
      baseDelayMs: this.config.retryBaseDelayMs,
      onRetry: (attempt, error) => {
        this.logger.warn(
          { attempt, err: error instanceof Error ? error.message : String(error) },
          "retrying aborted transaction",
        );
      },
    });
  }

  private async runOnce<T>(work: (tx: StoreTransaction) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    let broken = false;
    try {
      await client.query("BEGIN");
      const result = await work(new PgTransaction(client));
      await client.query("COMMIT");
      return result;
    } catch (err) {
      try {
        await client.query("ROLLBACK");
      } catch (rollbackErr) {
        broken = true;
        this.logger.error(
          { err: rollbackErr instanceof Error ? rollbackErr.message : String(rollbackErr) },
          "rollback failed; discarding connection",
        );
      }
      throw translatePgError(err);
    } finally {
      client.release(broken);
    }
  }

  // ── Reads ─────────────────────────────────────────────────────────────

  async getLibrary(libraryId: LibraryId): Promise<Library | null> {
    const row = await firstRow(
      this.pool.query<LibraryRow>(
        `SELECT ${LIBRARY_COLUMNS} FROM libraries WHERE id = $1`,
        [libraryId],
      ),
    );
    return row ? toLibrary(row) : null;
  }

  async listLibraries(): Promise<Library[]> {
    const result = await this.pool.query<LibraryRow>(
      `SELECT ${LIBRARY_COLUMNS} FROM libraries ORDER BY name`,
    );
    return result.rows.map(toLibrary);
  }

  async getTitle(titleId: TitleId): Promise<Title | null> {
    const row = await firstRow(
      this.pool.query<TitleRow>(
        `SELECT ${TITLE_COLUMNS} FROM titles WHERE id = $1`,
        [titleId],
      ),
    );
    return row ? toTitle(row) : null;
  }

  async getCopy(copyId: CopyId): Promise<Copy | null> {
    const row = await firstRow(
      this.pool.query<CopyRow>(
        `SELECT ${COPY_COLUMNS} FROM copies WHERE id = $1`,
        [copyId],
      ),
    );
    return row ? toCopy(row) : null;
  }

  async getReader(readerId: ReaderId): Promise<Reader | null> {
    const row = await firstRow(
      this.pool.query<ReaderRow>(
        `SELECT ${READER_COLUMNS} FROM readers WHERE id = $1`,
        [readerId],
      ),
    );
    return row ? toReader(row) : null;
  }

  async getLoan(loanId: LoanId): Promise<Loan | null> {
    const row = await firstRow(
      this.pool.query<LoanRow>(
        `SELECT ${LOAN_COLUMNS} FROM loans WHERE id = $1`,
        [loanId],
      ),
    );
    return row ? toLoan(row) : null;
  }

  async listCopies(filter: CopyFilter): Promise<CopyView[]> {
    const result = await this.pool.query<CopyViewRow>(
      `SELECT c.id AS copy_id, c.code, c.status, c.library_id,
              t.id AS title_id, t.title, t.author
       FROM copies c
       JOIN titles t ON t.id = c.title_id
       WHERE c.library_id = $1 AND ($2::text IS NULL OR c.status = $2)
       ORDER BY c.status, t.title, c.code`,
      [filter.libraryId, filter.status ?? null],
    );
    return result.rows.map((r) => ({
      copyId: r.copy_id as CopyId,
      code: r.code,
      status: parseCopyStatus(r.status),
      libraryId: r.library_id as LibraryId,
      titleId: r.title_id as TitleId,
      title: r.title,
      author: r.author,
    }));
  }

  async listOpenLoans(libraryId: LibraryId): Promise<OpenLoanRow[]> {
    const result = await this.pool.query<OpenLoanJoinRow>(
      `SELECT l.id AS loan_id, r.id AS reader_id, r.name AS reader_name,
              c.id AS copy_id, c.code AS copy_code, t.id AS title_id, t.title,
              l.loan_date, l.due_date, l.renewals
       FROM loans l
       JOIN readers r ON r.id = l.reader_id
       JOIN copies c ON c.id = l.copy_id
       JOIN titles t ON t.id = c.title_id
       WHERE l.library_id = $1 AND l.status = 'OPEN'
       ORDER BY l.due_date, l.id`,
      [libraryId],
    );
    return result.rows.map((r) => ({
      loanId: r.loan_id as LoanId,
      readerId: r.reader_id as ReaderId,
      readerName: r.reader_name,
      copyId: r.copy_id as CopyId,
      copyCode: r.copy_code,
      titleId: r.title_id as TitleId,
      title: r.title,
      loanDate: r.loan_date,
      dueDate: r.due_date,
      renewals: r.renewals,
    }));
  }

  async listLoans(libraryId: LibraryId): Promise<Loan[]> {
    const result = await this.pool.query<LoanRow>(
      `SELECT ${LOAN_COLUMNS} FROM loans WHERE library_id = $1 ORDER BY loan_date`,
      [libraryId],
    );
    return result.rows.map(toLoan);
  }

  async listAllOpenLoans(): Promise<Loan[]> {
    const result = await this.pool.query<LoanRow>(
      `SELECT ${LOAN_COLUMNS} FROM loans WHERE status = 'OPEN'`,
    );
    return result.rows.map(toLoan);
  }

  async listReaders(libraryId: LibraryId): Promise<Reader[]> {
    const result = await this.pool.query<ReaderRow>(
      `SELECT ${READER_COLUMNS} FROM readers WHERE home_library_id = $1 ORDER BY name`,
      [libraryId],
    );
    return result.rows.map(toReader);
  }

  async searchCopiesByTitle(term: string, libraryId?: LibraryId): Promise<TitleHolding[]> {
    const result = await this.pool.query<HoldingRow>(
      `SELECT t.id AS title_id, t.title, t.author, t.category,
              lib.id AS library_id, lib.name AS library_name,
              c.code AS copy_code, c.status
       FROM copies c
       JOIN titles t ON t.id = c.title_id
       JOIN libraries lib ON lib.id = c.library_id
       WHERE t.title ILIKE $1 ESCAPE '\\'
         AND ($2::text IS NULL OR c.library_id = $2)
       ORDER BY t.title, lib.name, c.code`,
      [`%${escapeLikePattern(term)}%`, libraryId ?? null],
    );
    return result.rows.map((r) => ({
      titleId: r.title_id as TitleId,
      title: r.title,
      author: r.author,
      category: r.category,
      libraryId: r.library_id as LibraryId,
      libraryName: r.library_name,
      copyCode: r.copy_code,
      status: parseCopyStatus(r.status),
    }));
  }

  async listAuditEntries(libraryId: LibraryId, limit: number): Promise<AuditEntry[]> {
    const result = await this.pool.query<AuditRow>(
      `SELECT id, action, library_id, actor_id, actor_role, details, recorded_at
       FROM audit_entries
       WHERE library_id = $1
       ORDER BY recorded_at DESC, id DESC
       LIMIT $2`,
      [libraryId, limit],
    );
    return result.rows.map(toAuditEntry);
  }

  async countEntities(): Promise<EntityCounts> {
    const row = await firstRow(
      this.pool.query<EntityCountRow>(
        `SELECT (SELECT count(*) FROM libraries)::int AS libraries,
              (SELECT count(*) FROM titles)::int AS titles,
              (SELECT count(*) FROM copies)::int AS copies`,
      ),
    );
    return row ?? { libraries: 0, titles: 0, copies: 0 };
  }

  async ping(): Promise<void> {
    await this.pool.query("SELECT 1");
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
