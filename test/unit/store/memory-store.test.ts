// ---------------------------------------------------------------------------
// Tests for the in-process Inventory Store.
// ---------------------------------------------------------------------------

import { describe, it, expect, beforeEach } from "vitest";

import { ConflictError, NotFoundError, ValidationError } from "../../../src/core/errors.js";
import { CopyStatus, LoanStatus } from "../../../src/core/types.js";
import type { CopyId, LibraryId, Loan, LoanId, ReaderId, TitleId } from "../../../src/core/types.js";
import type { MemoryInventoryStore } from "../../../src/store/memory-store.js";
import { ANA, C101, C102, CASMURRO, CENTRAL, DAVI, NORTE, seededStore } from "../../support/network.js";

const AT = new Date("2024-03-01T10:00:00.000Z");

function openLoan(id: string, copyId: CopyId, readerId: ReaderId): Loan {
  return {
    id: id as LoanId,
    readerId,
    copyId,
    libraryId: CENTRAL,
    loanDate: AT,
    dueDate: new Date("2024-03-15T10:00:00.000Z"),
    returnDate: null,
    renewals: 0,
    status: LoanStatus.OPEN,
  };
}

describe("MemoryInventoryStore", () => {
  let store: MemoryInventoryStore;

  beforeEach(async () => {
    store = await seededStore();
  });

  describe("transaction", () => {
    it("commits every write when the unit of work resolves", async () => {
      await store.transaction(async (tx) => {
        await tx.compareAndSetCopyStatus(C101, CopyStatus.AVAILABLE, CopyStatus.ON_LOAN);
        await tx.insertLoan(openLoan("loan-1", C101, ANA));
      });

      expect((await store.getCopy(C101))?.status).toBe(CopyStatus.ON_LOAN);
      expect((await store.getLoan("loan-1" as LoanId))?.status).toBe(LoanStatus.OPEN);
    });

    it("discards every write when the unit of work throws", async () => {
      const failure = store.transaction(async (tx) => {
        await tx.compareAndSetCopyStatus(C101, CopyStatus.AVAILABLE, CopyStatus.ON_LOAN);
        await tx.insertLoan(openLoan("loan-1", C101, ANA));
        throw new Error("abort");
      });

      await expect(failure).rejects.toThrow("abort");
      expect((await store.getCopy(C101))?.status).toBe(CopyStatus.AVAILABLE);
      expect(await store.getLoan("loan-1" as LoanId)).toBeNull();
    });

    it("runs transactions one at a time in arrival order", async () => {
      const order: string[] = [];
      const slow = store.transaction(async () => {
        order.push("slow:start");
        await new Promise((resolve) => setTimeout(resolve, 20));
        order.push("slow:end");
      });
      const fast = store.transaction(async () => {
        order.push("fast");
      });

      await Promise.all([slow, fast]);
      expect(order).toEqual(["slow:start", "slow:end", "fast"]);
    });

    it("keeps serving transactions after one fails", async () => {
      await store.transaction(async () => {
        throw new Error("first");
      }).catch(() => undefined);

      const value = await store.transaction(async () => 42);
      expect(value).toBe(42);
    });
  });

  describe("compare-and-set", () => {
    it("changes the copy status only from the expected value", async () => {
      const results = await store.transaction(async (tx) => [
        await tx.compareAndSetCopyStatus(C101, CopyStatus.ON_LOAN, CopyStatus.AVAILABLE),
        await tx.compareAndSetCopyStatus(C101, CopyStatus.AVAILABLE, CopyStatus.ON_LOAN),
        await tx.compareAndSetCopyStatus(C101, CopyStatus.AVAILABLE, CopyStatus.ON_LOAN),
      ]);

      expect(results).toEqual([false, true, false]);
    });

    it("closes a loan once", async () => {
      await store.transaction((tx) => tx.insertLoan(openLoan("loan-1", C101, ANA)));

      const results = await store.transaction(async (tx) => [
        await tx.closeLoan("loan-1" as LoanId, AT),
        await tx.closeLoan("loan-1" as LoanId, AT),
      ]);
      expect(results).toEqual([true, false]);
    });

    it("extends a loan only at the expected renewal count", async () => {
      await store.transaction((tx) => tx.insertLoan(openLoan("loan-1", C101, ANA)));
      const later = new Date("2024-03-29T10:00:00.000Z");

      const results = await store.transaction(async (tx) => [
        await tx.extendLoan("loan-1" as LoanId, 1, later),
        await tx.extendLoan("loan-1" as LoanId, 0, later),
      ]);
      expect(results).toEqual([false, true]);

      const loan = await store.getLoan("loan-1" as LoanId);
      expect(loan?.renewals).toBe(1);
      expect(loan?.dueDate).toEqual(later);
    });
  });

  describe("constraints", () => {
    it("refuses a second open loan for the same copy", async () => {
      await store.transaction((tx) => tx.insertLoan(openLoan("loan-1", C101, ANA)));

      await expect(
        store.transaction((tx) => tx.insertLoan(openLoan("loan-2", C101, DAVI))),
      ).rejects.toBeInstanceOf(ConflictError);
    });

    it("refuses duplicate copy codes within one library", async () => {
      await expect(
        store.transaction((tx) =>
          tx.insertCopy({
            id: "c-dup" as CopyId,
            titleId: CASMURRO,
            libraryId: CENTRAL,
            code: "C101",
            status: CopyStatus.AVAILABLE,
            acquiredAt: AT,
          }),
        ),
      ).rejects.toBeInstanceOf(ValidationError);
    });

    it("accepts the same copy code in another library", async () => {
      await store.transaction((tx) =>
        tx.insertCopy({
          id: "n-dup" as CopyId,
          titleId: CASMURRO,
          libraryId: NORTE,
          code: "C101",
          status: CopyStatus.AVAILABLE,
          acquiredAt: AT,
        }),
      );

      expect((await store.getCopy("n-dup" as CopyId))?.libraryId).toBe(NORTE);
    });

    it("refuses copies of unknown titles or libraries", async () => {
      const copy = {
        id: "c-new" as CopyId,
        titleId: "t-missing" as TitleId,
        libraryId: CENTRAL,
        code: "X1",
        status: CopyStatus.AVAILABLE,
        acquiredAt: AT,
      };
      await expect(store.transaction((tx) => tx.insertCopy(copy))).rejects.toBeInstanceOf(
        NotFoundError,
      );
      await expect(
        store.transaction((tx) =>
          tx.insertCopy({ ...copy, titleId: CASMURRO, libraryId: "lib-x" as LibraryId }),
        ),
      ).rejects.toBeInstanceOf(NotFoundError);
    });

    it("refuses a reader email already registered anywhere in the network", async () => {
      await expect(
        store.transaction((tx) =>
          tx.insertReader({
            id: "r-new" as ReaderId,
            name: "Outra Ana",
            email: "ana@example.org",
            document: null,
            homeLibraryId: NORTE,
            active: true,
            consentedAt: AT,
            registeredAt: AT,
          }),
        ),
      ).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe("reads", () => {
    it("counts open and overdue loans per reader", async () => {
      await store.transaction(async (tx) => {
        await tx.insertLoan(openLoan("loan-1", C101, ANA));
        await tx.insertLoan(openLoan("loan-2", C102, ANA));
        await tx.closeLoan("loan-2" as LoanId, AT);
      });

      const counts = await store.transaction(async (tx) => ({
        open: await tx.countOpenLoansForReader(ANA),
        overdueBefore: await tx.countOverdueLoansForReader(ANA, new Date("2024-03-15T10:00:00.000Z")),
        overdueAfter: await tx.countOverdueLoansForReader(ANA, new Date("2024-03-15T10:00:00.001Z")),
      }));
      expect(counts).toEqual({ open: 1, overdueBefore: 0, overdueAfter: 1 });
    });

    it("matches title text case-insensitively and filters by library", async () => {
      const all = await store.searchCopiesByTitle("CASMURRO");
      expect(all.map((h) => h.copyCode).sort()).toEqual(["C101", "C102", "N101"]);

      const norte = await store.searchCopiesByTitle("casmurro", NORTE);
      expect(norte.map((h) => h.copyCode)).toEqual(["N101"]);
    });

    it("counts libraries, titles and copies", async () => {
      expect(await store.countEntities()).toEqual({ libraries: 2, titles: 3, copies: 5 });
    });

    it("hands out copies that do not write through to the store", async () => {
      const copy = await store.getCopy(C101);
      if (!copy) throw new Error("seeded copy missing");
      copy.status = CopyStatus.ON_LOAN;

      const reader = await store.getReader(ANA);
      if (!reader) throw new Error("seeded reader missing");
      reader.active = false;

      expect((await store.getCopy(C101))?.status).toBe(CopyStatus.AVAILABLE);
      expect((await store.getReader(ANA))?.active).toBe(true);
      expect(await store.listAllOpenLoans()).toEqual([]);
    });

    it("keeps listed loans and locked rows detached as well", async () => {
      await store.transaction(async (tx) => {
        await tx.compareAndSetCopyStatus(C101, CopyStatus.AVAILABLE, CopyStatus.ON_LOAN);
        await tx.insertLoan(openLoan("loan-1", C101, ANA));
      });

      const [listed] = await store.listLoans(CENTRAL);
      if (!listed) throw new Error("loan missing");
      listed.status = LoanStatus.RETURNED;

      await store.transaction(async (tx) => {
        const locked = await tx.lockCopy(C101);
        if (!locked) throw new Error("copy missing");
        locked.status = CopyStatus.AVAILABLE;
      });

      expect((await store.getLoan("loan-1" as LoanId))?.status).toBe(LoanStatus.OPEN);
      expect((await store.getCopy(C101))?.status).toBe(CopyStatus.ON_LOAN);
    });

    it("forgets everything on close", async () => {
      await store.close();
      expect(await store.listLibraries()).toEqual([]);
    });
  });
});
