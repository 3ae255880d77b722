// ---------------------------------------------------------------------------
// In-process Inventory Store.
// ---------------------------------------------------------------------------

import { ConflictError, NotFoundError, ValidationError } from "../core/errors.js";
import { LoanStatus } from "../core/types.js";
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
import type { CopyFilter, InventoryStore, StoreTransaction } from "./inventory-store.js";

/** Records are replaced, never mutated, so a shallow map copy is a snapshot. */
interface MemoryState {
  libraries: Map<LibraryId, Library>;
  titles: Map<TitleId, Title>;
  copies: Map<CopyId, Copy>;
  readers: Map<ReaderId, Reader>;
  loans: Map<LoanId, Loan>;
  audit: AuditEntry[];
}

function emptyState(): MemoryState {
  return {
    libraries: new Map(),
    titles: new Map(),
    copies: new Map(),
    readers: new Map(),
    loans: new Map(),
    audit: [],
  };
}

/** Callers get their own copy; stored records only change through a transaction. */
function detached<T extends object>(record: T | undefined): T | null {
  return record ? { ...record } : null;
}

function snapshot(state: MemoryState): MemoryState {
  return {
    libraries: new Map(state.libraries),
    titles: new Map(state.titles),
    copies: new Map(state.copies),
    readers: new Map(state.readers),
    loans: new Map(state.loans),
    audit: [...state.audit],
  };
}

class MemoryTransaction implements StoreTransaction {
  constructor(private readonly draft: MemoryState) {}

  // The store-wide mutex already serialises transactions, so locks are plain reads.

  async lockCopy(copyId: CopyId): Promise<Copy | null> {
    return detached(this.draft.copies.get(copyId));
  }

  async lockLoan(loanId: LoanId): Promise<Loan | null> {
    return detached(this.draft.loans.get(loanId));
  }

  async lockReader(readerId: ReaderId): Promise<Reader | null> {
    return detached(this.draft.readers.get(readerId));
  }

  async getLibrary(libraryId: LibraryId): Promise<Library | null> {
    return detached(this.draft.libraries.get(libraryId));
  }

  async getTitle(titleId: TitleId): Promise<Title | null> {
    return detached(this.draft.titles.get(titleId));
  }

  async countOpenLoansForReader(readerId: ReaderId): Promise<number> {
    let count = 0;
    for (const loan of this.draft.loans.values()) {
      if (loan.readerId === readerId && loan.status === LoanStatus.OPEN) count++;
    }
    return count;
  }

  async countOverdueLoansForReader(readerId: ReaderId, now: Date): Promise<number> {
    let count = 0;
    for (const loan of this.draft.loans.values()) {
      if (
        loan.readerId === readerId &&
        loan.status === LoanStatus.OPEN &&
        loan.dueDate.getTime() < now.getTime()
      ) {
        count++;
      }
    }
    return count;
  }

  async compareAndSetCopyStatus(
    copyId: CopyId,
    expected: CopyStatus,
    next: CopyStatus,
  ): Promise<boolean> {
    const copy = this.draft.copies.get(copyId);
    if (!copy || copy.status !== expected) return false;
    this.draft.copies.set(copyId, { ...copy, status: next });
    return true;
  }

  async insertLoan(loan: Loan): Promise<void> {
    for (const existing of this.draft.loans.values()) {
      if (existing.copyId === loan.copyId && existing.status === LoanStatus.OPEN) {
        throw new ConflictError(`copy "${loan.copyId}" already has an open loan`);
      }
    }
    this.draft.loans.set(loan.id, { ...loan });
  }

  async closeLoan(loanId: LoanId, returnDate: Date): Promise<boolean> {
    const loan = this.draft.loans.get(loanId);
    if (!loan || loan.status !== LoanStatus.OPEN) return false;
    this.draft.loans.set(loanId, { ...loan, status: LoanStatus.RETURNED, returnDate });
    return true;
  }

  async extendLoan(loanId: LoanId, expectedRenewals: number, dueDate: Date): Promise<boolean> {
    const loan = this.draft.loans.get(loanId);
    if (!loan || loan.status !== LoanStatus.OPEN || loan.renewals !== expectedRenewals) {
      return false;
    }
    this.draft.loans.set(loanId, { ...loan, dueDate, renewals: expectedRenewals + 1 });
    return true;
  }

  async insertLibrary(library: Library): Promise<void> {
    if (this.draft.libraries.has(library.id)) {
      throw new ValidationError(`library "${library.id}" already exists`);
    }
    this.draft.libraries.set(library.id, { ...library });
  }

  async insertTitle(title: Title): Promise<void> {
    if (this.draft.titles.has(title.id)) {
      throw new ValidationError(`title "${title.id}" already exists`);
    }
    this.draft.titles.set(title.id, { ...title });
  }

  async insertCopy(copy: Copy): Promise<void> {
    if (!this.draft.titles.has(copy.titleId)) throw new NotFoundError("title", copy.titleId);
    if (!this.draft.libraries.has(copy.libraryId)) throw new NotFoundError("library", copy.libraryId);
    for (const existing of this.draft.copies.values()) {
      if (existing.libraryId === copy.libraryId && existing.code === copy.code) {
        throw new ValidationError(`copy code "${copy.code}" is already used in this library`);
      }
    }
    this.draft.copies.set(copy.id, { ...copy });
  }

  async insertReader(reader: Reader): Promise<void> {
    if (!this.draft.libraries.has(reader.homeLibraryId)) {
      throw new NotFoundError("library", reader.homeLibraryId);
    }
    for (const existing of this.draft.readers.values()) {
      if (existing.email === reader.email) {
        throw new ValidationError(`a reader with email "${reader.email}" is already registered`);
      }
    }
    this.draft.readers.set(reader.id, { ...reader });
  }

  async appendAudit(entry: AuditEntry): Promise<void> {
    this.draft.audit.push({ ...entry });
  }
}

/**
 * Inventory Store backed by in-process maps.
 *
 * Transactions are serialised through an async mutex and run against a
 * snapshot that replaces the committed state only when the unit of work
 * resolves. A rejected unit of work leaves no trace.
 */
export class MemoryInventoryStore implements InventoryStore {
  readonly kind = "memory" as const;

  private state: MemoryState = emptyState();
  private tail: Promise<void> = Promise.resolve();

  async transaction<T>(work: (tx: StoreTransaction) => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      const draft = snapshot(this.state);
      const result = await work(new MemoryTransaction(draft));
      this.state = draft;
      return result;
    } finally {
      release();
    }
  }

  private acquire(): Promise<() => void> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    const held = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.tail = previous.then(() => held);
    return previous.then(() => release);
  }

  // ── Reads ─────────────────────────────────────────────────────────────

  async getLibrary(libraryId: LibraryId): Promise<Library | null> {
    return detached(this.state.libraries.get(libraryId));
  }

  async listLibraries(): Promise<Library[]> {
    return [...this.state.libraries.values()].map((library) => ({ ...library }));
  }

  async getTitle(titleId: TitleId): Promise<Title | null> {
    return detached(this.state.titles.get(titleId));
  }

  async getCopy(copyId: CopyId): Promise<Copy | null> {
    return detached(this.state.copies.get(copyId));
  }

  async getReader(readerId: ReaderId): Promise<Reader | null> {
    return detached(this.state.readers.get(readerId));
  }

  async getLoan(loanId: LoanId): Promise<Loan | null> {
    return detached(this.state.loans.get(loanId));
  }

  async listCopies(filter: CopyFilter): Promise<CopyView[]> {
    const views: CopyView[] = [];
    for (const copy of this.state.copies.values()) {
      if (copy.libraryId !== filter.libraryId) continue;
      if (filter.status && copy.status !== filter.status) continue;
      const title = this.state.titles.get(copy.titleId);
      if (!title) continue;
      views.push({
        copyId: copy.id,
        code: copy.code,
        status: copy.status,
        libraryId: copy.libraryId,
        titleId: title.id,
        title: title.title,
        author: title.author,
      });
    }
    return views;
  }

  async listOpenLoans(libraryId: LibraryId): Promise<OpenLoanRow[]> {
    const rows: OpenLoanRow[] = [];
    for (const loan of this.state.loans.values()) {
      if (loan.libraryId !== libraryId || loan.status !== LoanStatus.OPEN) continue;
      const reader = this.state.readers.get(loan.readerId);
      const copy = this.state.copies.get(loan.copyId);
      const title = copy ? this.state.titles.get(copy.titleId) : undefined;
      if (!reader || !copy || !title) continue;
      rows.push({
        loanId: loan.id,
        readerId: reader.id,
        readerName: reader.name,
        copyId: copy.id,
        copyCode: copy.code,
        titleId: title.id,
        title: title.title,
        loanDate: loan.loanDate,
        dueDate: loan.dueDate,
        renewals: loan.renewals,
      });
    }
    return rows;
  }

  async listLoans(libraryId: LibraryId): Promise<Loan[]> {
    return [...this.state.loans.values()]
      .filter((loan) => loan.libraryId === libraryId)
      .map((loan) => ({ ...loan }));
  }

  async listAllOpenLoans(): Promise<Loan[]> {
    return [...this.state.loans.values()]
      .filter((loan) => loan.status === LoanStatus.OPEN)
      .map((loan) => ({ ...loan }));
  }

  async listReaders(libraryId: LibraryId): Promise<Reader[]> {
    return [...this.state.readers.values()]
      .filter((reader) => reader.homeLibraryId === libraryId)
      .map((reader) => ({ ...reader }));
  }

  async searchCopiesByTitle(term: string, libraryId?: LibraryId): Promise<TitleHolding[]> {
    const needle = term.toLowerCase();
    const holdings: TitleHolding[] = [];
    for (const copy of this.state.copies.values()) {
      if (libraryId && copy.libraryId !== libraryId) continue;
      const title = this.state.titles.get(copy.titleId);
      const library = this.state.libraries.get(copy.libraryId);
      if (!title || !library) continue;
      if (!title.title.toLowerCase().includes(needle)) continue;
      holdings.push({
        titleId: title.id,
        title: title.title,
        author: title.author,
        category: title.category,
        libraryId: library.id,
        libraryName: library.name,
        copyCode: copy.code,
        status: copy.status,
      });
    }
    return holdings;
  }

  async listAuditEntries(libraryId: LibraryId, limit: number): Promise<AuditEntry[]> {
    return this.state.audit
      .filter((entry) => entry.libraryId === libraryId)
      .reverse()
      .slice(0, limit)
      .map((entry) => ({ ...entry, details: { ...entry.details } }));
  }

  async countEntities(): Promise<EntityCounts> {
    return {
      libraries: this.state.libraries.size,
      titles: this.state.titles.size,
      copies: this.state.copies.size,
    };
  }

  async ping(): Promise<void> {
    // Nothing to reach.
  }

  async close(): Promise<void> {
    this.state = emptyState();
  }
}
