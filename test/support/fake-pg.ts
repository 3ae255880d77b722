// ---------------------------------------------------------------------------
// In-process stand-ins for a node-postgres pool.
// ---------------------------------------------------------------------------

import type pg from "pg";

import type { PgClient, PgPool } from "../../src/store/pg-store.js";

export interface QueryReply {
  rows?: pg.QueryResultRow[];
  /** Defaults to the number of rows. */
  rowCount?: number;
}

/**
 * Answers one statement. `session` is 0 for queries on the pool itself and
 * the connection number for queries on a checked-out client.
 */
export type Responder = (
  text: string,
  values: unknown[],
  session: number,
) => QueryReply | Promise<QueryReply>;

/** Collapses the whitespace of multi-line SQL so statements compare as one line. */
export function oneLine(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/** Shape of the errors node-postgres raises for a failed statement. */
export function pgError(code: string, constraint?: string): Error {
  return Object.assign(new Error(`pg error ${code}`), { code, constraint });
}

class ScriptedClient implements PgClient {
  constructor(
    private readonly pool: ScriptedPool,
    private readonly session: number,
  ) {}

  query<R extends pg.QueryResultRow>(text: string, values?: unknown[]): Promise<pg.QueryResult<R>>;
  async query(text: string, values: unknown[] = []): Promise<pg.QueryResult<pg.QueryResultRow>> {
    return this.pool.run(text, values, this.session);
  }

  release(destroy = false): void {
    this.pool.releases.push(destroy);
  }
}

/**
 * Pool whose statements are answered by a responder. Every statement is
 * recorded on one line, and every client release records whether the
 * connection was destroyed.
 */
export class ScriptedPool implements PgPool {
  readonly statements: string[] = [];
  readonly releases: boolean[] = [];
  ended = false;
  private connections = 0;

  constructor(private readonly respond: Responder) {}

  async connect(): Promise<PgClient> {
    this.connections += 1;
    return new ScriptedClient(this, this.connections);
  }

  query<R extends pg.QueryResultRow>(text: string, values?: unknown[]): Promise<pg.QueryResult<R>>;
  async query(text: string, values: unknown[] = []): Promise<pg.QueryResult<pg.QueryResultRow>> {
    return this.run(text, values, 0);
  }

  async run(
    text: string,
    values: unknown[],
    session: number,
  ): Promise<pg.QueryResult<pg.QueryResultRow>> {
    const statement = oneLine(text);
    this.statements.push(statement);
    const reply = await this.respond(statement, values, session);
    const rows = reply.rows ?? [];
    return {
      command: statement.split(" ")[0] ?? "",
      rowCount: reply.rowCount ?? rows.length,
      oid: 0,
      fields: [],
      rows,
    };
  }

  async end(): Promise<void> {
    this.ended = true;
  }

  count(statement: string): number {
    return this.statements.filter((s) => s === statement).length;
  }
}

// ── Lending database ──────────────────────────────────────────────────────

export interface CopyRecord {
  id: string;
  title_id: string;
  library_id: string;
  code: string;
  status: string;
  acquired_at: Date;
}

export interface ReaderRecord {
  id: string;
  name: string;
  email: string;
  document: string | null;
  home_library_id: string;
  active: boolean;
  consented_at: Date;
  registered_at: Date;
}

export interface LoanRecord {
  id: string;
  reader_id: string;
  copy_id: string;
  library_id: string;
  loan_date: Date;
  due_date: Date;
  return_date: Date | null;
  renewals: number;
  status: string;
}

interface RowLock {
  session: number;
  released: Promise<void>;
  release: () => void;
}

interface PendingWrites {
  copyStatus: Map<string, string>;
  loans: LoanRecord[];
}

/**
 * The copies, readers and loans tables under READ COMMITTED: a transaction
 * sees committed rows plus its own writes, `FOR UPDATE` and `UPDATE` wait
 * for row locks held by other transactions, and locks are released at
 * COMMIT or ROLLBACK. Only the statements of a checkout are understood.
 */
export class LendingDatabase {
  readonly pool = new ScriptedPool((text, values, session) => this.respond(text, values, session));

  private readonly copies = new Map<string, CopyRecord>();
  private readonly readers = new Map<string, ReaderRecord>();
  private readonly loans: LoanRecord[] = [];
  private readonly locks = new Map<string, RowLock>();
  private readonly pending = new Map<number, PendingWrites>();

  constructor(seed: { copies: CopyRecord[]; readers: ReaderRecord[]; loans: LoanRecord[] }) {
    for (const copy of seed.copies) this.copies.set(copy.id, { ...copy });
    for (const reader of seed.readers) this.readers.set(reader.id, { ...reader });
    this.loans.push(...seed.loans.map((loan) => ({ ...loan })));
  }

  committedOpenLoans(readerId: string): LoanRecord[] {
    return this.loans.filter((l) => l.reader_id === readerId && l.status === "OPEN");
  }

  committedCopyStatus(copyId: string): string | undefined {
    return this.copies.get(copyId)?.status;
  }

  private async respond(text: string, values: unknown[], session: number): Promise<QueryReply> {
    const id = String(values[0]);

    if (text === "BEGIN") return {};
    if (text === "COMMIT") return this.finish(session, true);
    if (text === "ROLLBACK") return this.finish(session, false);

    if (/^SELECT .* FROM copies WHERE id = \$1 FOR UPDATE$/.test(text)) {
      await this.lock(`copies:${id}`, session);
      const copy = this.copyAsSeenBy(id, session);
      return { rows: copy ? [copy] : [] };
    }
    if (/^SELECT .* FROM readers WHERE id = \$1 FOR UPDATE$/.test(text)) {
      await this.lock(`readers:${id}`, session);
      const reader = this.readers.get(id);
      return { rows: reader ? [{ ...reader }] : [] };
    }
    if (text.startsWith("SELECT count(*)::int AS count FROM loans WHERE reader_id = $1")) {
      const before = values[1];
      const count = this.loansAsSeenBy(session).filter(
        (l) =>
          l.reader_id === id &&
          l.status === "OPEN" &&
          (!(before instanceof Date) || l.due_date < before),
      ).length;
      return { rows: [{ count }] };
    }
    if (text === "UPDATE copies SET status = $3 WHERE id = $1 AND status = $2") {
      await this.lock(`copies:${id}`, session);
      const copy = this.copyAsSeenBy(id, session);
      if (!copy || copy.status !== values[1]) return { rowCount: 0 };
      this.writesOf(session).copyStatus.set(id, String(values[2]));
      return { rowCount: 1 };
    }
    if (text.startsWith("INSERT INTO loans ")) {
      const [loanId, readerId, copyId, libraryId, loanDate, dueDate, , renewals, status] = values;
      if (!(loanDate instanceof Date) || !(dueDate instanceof Date)) {
        throw new Error("loan dates must be Date values");
      }
      this.writesOf(session).loans.push({
        id: String(loanId),
        reader_id: String(readerId),
        copy_id: String(copyId),
        library_id: String(libraryId),
        loan_date: loanDate,
        due_date: dueDate,
        return_date: null,
        renewals: Number(renewals),
        status: String(status),
      });
      return { rowCount: 1 };
    }
    if (text.startsWith("INSERT INTO audit_entries ")) return { rowCount: 1 };

    throw new Error(`unexpected statement: ${text}`);
  }

  private copyAsSeenBy(id: string, session: number): CopyRecord | null {
    const copy = this.copies.get(id);
    if (!copy) return null;
    const status = this.pending.get(session)?.copyStatus.get(id);
    return { ...copy, status: status ?? copy.status };
  }

  private loansAsSeenBy(session: number): LoanRecord[] {
    return [...this.loans, ...(this.pending.get(session)?.loans ?? [])];
  }

  private writesOf(session: number): PendingWrites {
    let writes = this.pending.get(session);
    if (!writes) {
      writes = { copyStatus: new Map(), loans: [] };
      this.pending.set(session, writes);
    }
    return writes;
  }

  private async lock(key: string, session: number): Promise<void> {
    for (;;) {
      const held = this.locks.get(key);
      if (!held) break;
      if (held.session === session) return;
      await held.released;
    }
    let release = (): void => undefined;
    const released = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.locks.set(key, { session, released, release });
  }

  private finish(session: number, commit: boolean): QueryReply {
    const writes = this.pending.get(session);
    this.pending.delete(session);
    if (commit && writes) {
      for (const [copyId, status] of writes.copyStatus) {
        const copy = this.copies.get(copyId);
        if (copy) copy.status = status;
      }
      this.loans.push(...writes.loans);
    }
    for (const [key, lock] of this.locks) {
      if (lock.session !== session) continue;
      this.locks.delete(key);
      lock.release();
    }
    return {};
  }
}
