// ---------------------------------------------------------------------------
// Query Surface: read-only projections over current store state.
// ---------------------------------------------------------------------------

import { NotFoundError, ValidationError } from "../core/errors.js";
import { CopyStatus, LoanStatus } from "../core/types.js";
import type {
  AuditEntry,
  CopyView,
  LibraryId,
  Library,
  LoanId,
  ReaderId,
  Reader,
  TitleHolding,
  TitleId,
} from "../core/types.js";
import type { InventoryStore } from "../store/inventory-store.js";
import { daysPastDue, isOverdue } from "../circulation/overdue.js";

// ── Projections ────────────────────────────────────────────────────────────

export interface OpenLoanView {
  loanId: LoanId;
  readerId: ReaderId;
  readerName: string;
  titleId: TitleId;
  title: string;
  copyCode: string;
  loanDate: Date;
  dueDate: Date;
  renewals: number;
  overdue: boolean;
  daysOverdue: number;
}

export interface MonthlyLoanCount {
  /** `YYYY-MM`, UTC. */
  month: string;
  count: number;
}

export interface LibraryReport {
  libraryId: LibraryId;
  loansByMonth: MonthlyLoanCount[];
  loansByStatus: Record<LoanStatus, number>;
  overdueLoans: number;
}

export interface NetworkSummary {
  libraries: number;
  titles: number;
  copies: number;
  openLoans: number;
  overdueLoans: number;
}

export interface SearchOptions {
  libraryId?: LibraryId;
}

const STATUS_ORDER: Record<CopyStatus, number> = {
  [CopyStatus.AVAILABLE]: 0,
  [CopyStatus.ON_LOAN]: 1,
};

function compareText(a: string, b: string): number {
  return a.localeCompare(b, undefined, { sensitivity: "base" }) || (a < b ? -1 : a > b ? 1 : 0);
}

function byTitleThenCode(a: CopyView, b: CopyView): number {
  return compareText(a.title, b.title) || compareText(a.code, b.code);
}

function monthKey(date: Date): string {
  return date.toISOString().slice(0, 7);
}

// ── Query Surface ──────────────────────────────────────────────────────────

/**
 * Pure reads against the store. No caching: every call reflects the state
 * committed at the instant it runs. Ordering is applied here so both stores
 * return identical sequences.
 */
export class QuerySurface {
  constructor(private readonly store: InventoryStore) {}

  async listLibraries(): Promise<Library[]> {
    const libraries = await this.store.listLibraries();
    return libraries.sort((a, b) => compareText(a.name, b.name));
  }

  /** Copies on the shelf at `libraryId`, ordered by title then code. */
  async listAvailableCopies(libraryId: LibraryId): Promise<CopyView[]> {
    await this.requireLibrary(libraryId);
    const copies = await this.store.listCopies({ libraryId, status: CopyStatus.AVAILABLE });
    return copies.sort(byTitleThenCode);
  }

  /** Copies at `libraryId`, optionally filtered by status, ordered by status, title, code. */
  async listCopies(libraryId: LibraryId, status?: CopyStatus): Promise<CopyView[]> {
    await this.requireLibrary(libraryId);
    const copies = await this.store.listCopies({ libraryId, status });
    return copies.sort(
      (a, b) => STATUS_ORDER[a.status] - STATUS_ORDER[b.status] || byTitleThenCode(a, b),
    );
  }

  /** Open loans at `libraryId` with the overdue flag derived against `now`. */
  async listOpenLoans(libraryId: LibraryId, now: Date): Promise<OpenLoanView[]> {
    await this.requireLibrary(libraryId);
    const rows = await this.store.listOpenLoans(libraryId);
    return rows
      .map((row) => ({
        loanId: row.loanId,
        readerId: row.readerId,
        readerName: row.readerName,
        titleId: row.titleId,
        title: row.title,
        copyCode: row.copyCode,
        loanDate: row.loanDate,
        dueDate: row.dueDate,
        renewals: row.renewals,
        overdue: isOverdue({ status: LoanStatus.OPEN, dueDate: row.dueDate }, now),
        daysOverdue: daysPastDue(row.dueDate, now),
      }))
      .sort(
        (a, b) =>
          a.dueDate.getTime() - b.dueDate.getTime() || compareText(a.loanId, b.loanId),
      );
  }

  /**
   * Case-insensitive substring search on title text across the network.
   * Public; one row per physical copy.
   */
  async searchTitles(term: string, options: SearchOptions = {}): Promise<TitleHolding[]> {
    const needle = term.trim();
    if (needle.length === 0) {
      throw new ValidationError("search term must not be blank", ["q: required"]);
    }
    const holdings = await this.store.searchCopiesByTitle(needle, options.libraryId);
    return holdings.sort(
      (a, b) =>
        compareText(a.title, b.title) ||
        compareText(a.libraryName, b.libraryName) ||
        compareText(a.copyCode, b.copyCode),
    );
  }

  async listReaders(libraryId: LibraryId): Promise<Reader[]> {
    await this.requireLibrary(libraryId);
    const readers = await this.store.listReaders(libraryId);
    return readers.sort((a, b) => compareText(a.name, b.name));
  }

  /** Loans per month and per status, plus the current overdue count. */
  async libraryReport(libraryId: LibraryId, now: Date): Promise<LibraryReport> {
    await this.requireLibrary(libraryId);
    const loans = await this.store.listLoans(libraryId);

    const perMonth = new Map<string, number>();
    const loansByStatus: Record<LoanStatus, number> = {
      [LoanStatus.OPEN]: 0,
      [LoanStatus.RETURNED]: 0,
    };
    let overdueLoans = 0;

    for (const loan of loans) {
      const key = monthKey(loan.loanDate);
      perMonth.set(key, (perMonth.get(key) ?? 0) + 1);
      loansByStatus[loan.status]++;
      if (isOverdue(loan, now)) overdueLoans++;
    }

    const loansByMonth = [...perMonth.entries()]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([month, count]) => ({ month, count }));

    return { libraryId, loansByMonth, loansByStatus, overdueLoans };
  }

  async networkSummary(now: Date): Promise<NetworkSummary> {
    const counts = await this.store.countEntities();
    const open = await this.store.listAllOpenLoans();
    return {
      ...counts,
      openLoans: open.length,
      overdueLoans: open.filter((loan) => isOverdue(loan, now)).length,
    };
  }

  async listAuditEntries(libraryId: LibraryId, limit: number): Promise<AuditEntry[]> {
    await this.requireLibrary(libraryId);
    return this.store.listAuditEntries(libraryId, limit);
  }

  private async requireLibrary(libraryId: LibraryId): Promise<void> {
    const library = await this.store.getLibrary(libraryId);
    if (!library) throw new NotFoundError("library", libraryId);
  }
}
