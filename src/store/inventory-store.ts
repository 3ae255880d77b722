// ---------------------------------------------------------------------------
// Inventory Store contract shared by the in-memory and PostgreSQL stores.
// ---------------------------------------------------------------------------

import type {
  AuditEntry,
  Copy,
  CopyId,
  CopyStatus,
  CopyView,
  EntityCounts,
  Library,
  LibraryId,
  Loan,
  LoanId,
  OpenLoanRow,
  Reader,
  ReaderId,
  Title,
  TitleHolding,
  TitleId,
} from "../core/types.js";

export interface CopyFilter {
  libraryId: LibraryId;
  status?: CopyStatus;
}

/**
 * Handle passed to a unit of work. Everything done through it commits
 * together or not at all.
 *
 * The `lock*` reads take a row lock (or the store's equivalent) so the
 * record cannot change underneath the transaction. Locking the reader
 * serialises checkouts by that reader, which keeps the per-reader loan
 * counts exact until commit. The `compareAndSet*`,
 * `closeLoan` and `extendLoan` writes only apply when the record is still in
 * the expected state and report whether they did.
 */
export interface StoreTransaction {
  lockCopy(copyId: CopyId): Promise<Copy | null>;
  lockLoan(loanId: LoanId): Promise<Loan | null>;
  lockReader(readerId: ReaderId): Promise<Reader | null>;
  getLibrary(libraryId: LibraryId): Promise<Library | null>;
  getTitle(titleId: TitleId): Promise<Title | null>;

  countOpenLoansForReader(readerId: ReaderId): Promise<number>;
  countOverdueLoansForReader(readerId: ReaderId, now: Date): Promise<number>;

  compareAndSetCopyStatus(
    copyId: CopyId,
    expected: CopyStatus,
    next: CopyStatus,
  ): Promise<boolean>;
  insertLoan(loan: Loan): Promise<void>;
  closeLoan(loanId: LoanId, returnDate: Date): Promise<boolean>;
  extendLoan(loanId: LoanId, expectedRenewals: number, dueDate: Date): Promise<boolean>;

  insertLibrary(library: Library): Promise<void>;
  insertTitle(title: Title): Promise<void>;
  /** Fails with `NotFoundError` when the title or library does not resolve. */
  insertCopy(copy: Copy): Promise<void>;
  /** Fails with `ValidationError` when the email is already registered. */
  insertReader(reader: Reader): Promise<void>;

  appendAudit(entry: AuditEntry): Promise<void>;
}

/**
 * Durable record of libraries, titles, copies, readers and loans.
 *
 * Reads outside a transaction see the latest committed state. All writes go
 * through {@link InventoryStore.transaction}.
 */
export interface InventoryStore {
  readonly kind: "memory" | "postgres";

  transaction<T>(work: (tx: StoreTransaction) => Promise<T>): Promise<T>;

  getLibrary(libraryId: LibraryId): Promise<Library | null>;
  listLibraries(): Promise<Library[]>;
  getTitle(titleId: TitleId): Promise<Title | null>;
  getCopy(copyId: CopyId): Promise<Copy | null>;
  getReader(readerId: ReaderId): Promise<Reader | null>;
  getLoan(loanId: LoanId): Promise<Loan | null>;

  listCopies(filter: CopyFilter): Promise<CopyView[]>;
  listOpenLoans(libraryId: LibraryId): Promise<OpenLoanRow[]>;
  listLoans(libraryId: LibraryId): Promise<Loan[]>;
  listReaders(libraryId: LibraryId): Promise<Reader[]>;
  /** Case-insensitive substring match on title text, one row per copy. */
  searchCopiesByTitle(term: string, libraryId?: LibraryId): Promise<TitleHolding[]>;
  listAuditEntries(libraryId: LibraryId, limit: number): Promise<AuditEntry[]>;
  countEntities(): Promise<EntityCounts>;
  /** Open loans across the whole network, for the network summary. */
  listAllOpenLoans(): Promise<Loan[]>;

  ping(): Promise<void>;
  close(): Promise<void>;
}
