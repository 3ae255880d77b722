// ---------------------------------------------------------------------------
// Circulation Engine: checkout, return and renewal of physical copies.
// ---------------------------------------------------------------------------

import { randomUUID } from "node:crypto";
import type pino from "pino";

import { assertPermitted, Operation, roleCanEver } from "../access/access-policy.js";
import { auditEntry } from "../core/audit.js";
import {
  CirculationError,
  ConflictError,
  CopyNotAvailableError,
  CrossLibraryForbiddenError,
  ForbiddenError,
  LoanAlreadyReturnedError,
  NotFoundError,
  ReaderInactiveError,
  ReaderIneligibleError,
  RenewalNotAllowedError,
} from "../core/errors.js";
import { AuditAction, CopyStatus, LoanStatus } from "../core/types.js";
import type {
  ActorContext,
  CirculationConfig,
  Clock,
  CopyId,
  LibraryId,
  Loan,
  LoanId,
  ReaderId,
} from "../core/types.js";
import type { InventoryStore, StoreTransaction } from "../store/inventory-store.js";
import { addDays, daysPastDue, isOverdue } from "./overdue.js";

// ── Results ────────────────────────────────────────────────────────────────

export interface CheckoutReceipt {
  loanId: LoanId;
  copyId: CopyId;
  readerId: ReaderId;
  libraryId: LibraryId;
  loanDate: Date;
  dueDate: Date;
}

export interface ReturnReceipt {
  loanId: LoanId;
  copyId: CopyId;
  returnDate: Date;
  overdue: boolean;
  daysLate: number;
}

export interface RenewalReceipt {
  loanId: LoanId;
  dueDate: Date;
  renewals: number;
}

// ── Engine ─────────────────────────────────────────────────────────────────

/**
 * Sole writer of copy status and loan lifecycle.
 *
 * Every operation runs as one store transaction: the copy or loan row is
 * locked, every precondition is checked against the locked state, and the
 * writes are compare-and-set. Any failed check throws a typed error and the
 * transaction rolls back with nothing written. Nothing is retried here;
 * callers decide whether to re-query and try again.
 */
export class CirculationEngine {
  constructor(
    private readonly store: InventoryStore,
    private readonly config: CirculationConfig,
    private readonly logger: pino.Logger,
    private readonly clock: Clock = () => new Date(),
  ) {}

  // ── Checkout ──────────────────────────────────────────────────────────

  async checkout(
    readerId: ReaderId,
    copyId: CopyId,
    actor: ActorContext,
  ): Promise<CheckoutReceipt> {
    const log = this.logger.child({ op: "checkout", readerId, copyId, actorRole: actor.role });

    try {
      this.assertRole(actor, Operation.CHECKOUT);
      const receipt = await this.store.transaction((tx) =>
        this.checkoutIn(tx, readerId, copyId, actor),
      );
      log.info(
        { loanId: receipt.loanId, dueDate: receipt.dueDate.toISOString() },
        "copy checked out",
      );
      return receipt;
    } catch (err) {
      this.logRejection(log, err);
      throw err;
    }
  }

  private async checkoutIn(
    tx: StoreTransaction,
    readerId: ReaderId,
    copyId: CopyId,
    actor: ActorContext,
  ): Promise<CheckoutReceipt> {
    const now = this.clock();

    const copy = await tx.lockCopy(copyId);
    if (!copy) throw new NotFoundError("copy", copyId);

    assertPermitted(actor, Operation.CHECKOUT, copy.libraryId);

    // Held until commit so concurrent checkouts by this reader see each other's loans.
    const reader = await tx.lockReader(readerId);
    if (!reader) throw new NotFoundError("reader", readerId);

    // Checked before availability so the rejection does not depend on it.
    if (reader.homeLibraryId !== copy.libraryId) {
      throw new CrossLibraryForbiddenError(reader.homeLibraryId, copy.libraryId);
    }

    if (!reader.active) throw new ReaderInactiveError(readerId);

    switch (copy.status) {
      case CopyStatus.AVAILABLE:
        break;
      case CopyStatus.ON_LOAN:
        throw new CopyNotAvailableError(copyId);
    }

    const overdue = await tx.countOverdueLoansForReader(readerId, now);
    if (overdue > 0) {
      throw new ReaderIneligibleError(
        readerId,
        "overdue_loans",
        `${overdue} overdue loan(s) must be returned first`,
      );
    }

    const open = await tx.countOpenLoansForReader(readerId);
    if (open >= this.config.maxOpenLoansPerReader) {
      throw new ReaderIneligibleError(
        readerId,
        "loan_limit_reached",
        `limit of ${this.config.maxOpenLoansPerReader} open loans reached`,
      );
    }

    const claimed = await tx.compareAndSetCopyStatus(
      copyId,
      CopyStatus.AVAILABLE,
      CopyStatus.ON_LOAN,
    );
    if (!claimed) throw new CopyNotAvailableError(copyId);

    const loan: Loan = {
      id: randomUUID() as LoanId,
      readerId,
      copyId,
      libraryId: copy.libraryId,
      loanDate: now,
      dueDate: addDays(now, this.config.loanPeriodDays),
      returnDate: null,
      renewals: 0,
      status: LoanStatus.OPEN,
    };
    await tx.insertLoan(loan);

    await tx.appendAudit(
      auditEntry(
        AuditAction.LOAN_CHECKOUT,
        actor,
        copy.libraryId,
        { loanId: loan.id, copyId, copyCode: copy.code, readerId },
        now,
      ),
    );

    return {
      loanId: loan.id,
      copyId,
      readerId,
      libraryId: copy.libraryId,
      loanDate: loan.loanDate,
      dueDate: loan.dueDate,
    };
  }

  // ── Return ────────────────────────────────────────────────────────────

  async returnLoan(loanId: LoanId, actor: ActorContext): Promise<ReturnReceipt> {
    const log = this.logger.child({ op: "return", loanId, actorRole: actor.role });

    try {
      this.assertRole(actor, Operation.RETURN);
      const receipt = await this.store.transaction((tx) => this.returnIn(tx, loanId, actor));
      log.info(
        {
          copyId: receipt.copyId,
          returnDate: receipt.returnDate.toISOString(),
          daysLate: receipt.daysLate,
        },
        "loan returned",
      );
      return receipt;
    } catch (err) {
      this.logRejection(log, err);
      throw err;
    }
  }

  private async returnIn(
    tx: StoreTransaction,
    loanId: LoanId,
    actor: ActorContext,
  ): Promise<ReturnReceipt> {
    const now = this.clock();

    const loan = await tx.lockLoan(loanId);
    if (!loan) throw new NotFoundError("loan", loanId);

    assertPermitted(actor, Operation.RETURN, loan.libraryId);

    switch (loan.status) {
      case LoanStatus.OPEN:
        break;
      case LoanStatus.RETURNED:
        throw new LoanAlreadyReturnedError(loanId);
    }

    const returnDate = now.getTime() < loan.loanDate.getTime() ? loan.loanDate : now;

    const closed = await tx.closeLoan(loanId, returnDate);
    if (!closed) throw new LoanAlreadyReturnedError(loanId);

    const released = await tx.compareAndSetCopyStatus(
      loan.copyId,
      CopyStatus.ON_LOAN,
      CopyStatus.AVAILABLE,
    );
    if (!released) {
      throw new ConflictError(`copy "${loan.copyId}" was not on loan; return aborted`);
    }

    const daysLate = daysPastDue(loan.dueDate, returnDate);
    const overdue = isOverdue(loan, returnDate);

    await tx.appendAudit(
      auditEntry(
        AuditAction.LOAN_RETURN,
        actor,
        loan.libraryId,
        { loanId, copyId: loan.copyId, readerId: loan.readerId, daysLate },
        now,
      ),
    );

    return { loanId, copyId: loan.copyId, returnDate, overdue, daysLate };
  }

  // ── Renewal ───────────────────────────────────────────────────────────

  async renew(loanId: LoanId, actor: ActorContext): Promise<RenewalReceipt> {
    const log = this.logger.child({ op: "renew", loanId, actorRole: actor.role });

    try {
      this.assertRole(actor, Operation.RENEW);
      const receipt = await this.store.transaction((tx) => this.renewIn(tx, loanId, actor));
      log.info(
        { dueDate: receipt.dueDate.toISOString(), renewals: receipt.renewals },
        "loan renewed",
      );
      return receipt;
    } catch (err) {
      this.logRejection(log, err);
      throw err;
    }
  }

  private async renewIn(
    tx: StoreTransaction,
    loanId: LoanId,
    actor: ActorContext,
  ): Promise<RenewalReceipt> {
    const now = this.clock();

    const loan = await tx.lockLoan(loanId);
    if (!loan) throw new NotFoundError("loan", loanId);

    assertPermitted(actor, Operation.RENEW, loan.libraryId);

    if (loan.status === LoanStatus.RETURNED) throw new LoanAlreadyReturnedError(loanId);

    if (isOverdue(loan, now)) {
      throw new RenewalNotAllowedError(loanId, "loan is overdue");
    }
    if (loan.renewals >= this.config.maxRenewals) {
      throw new RenewalNotAllowedError(
        loanId,
        `renewal limit of ${this.config.maxRenewals} reached`,
      );
    }

    const dueDate = addDays(loan.dueDate, this.config.loanPeriodDays);
    const extended = await tx.extendLoan(loanId, loan.renewals, dueDate);
    if (!extended) throw new ConflictError(`loan "${loanId}" changed during renewal`);

    await tx.appendAudit(
      auditEntry(
        AuditAction.LOAN_RENEW,
        actor,
        loan.libraryId,
        { loanId, dueDate: dueDate.toISOString(), renewals: loan.renewals + 1 },
        now,
      ),
    );

    return { loanId, dueDate, renewals: loan.renewals + 1 };
  }

  // ── Helpers ───────────────────────────────────────────────────────────

  /** Rejects roles without any circulation rights before touching the store. */
  private assertRole(actor: ActorContext, operation: Operation): void {
    if (!roleCanEver(actor, operation)) {
      throw new ForbiddenError(`role "${actor.role}" has no circulation rights`);
    }
  }

  private logRejection(log: pino.Logger, err: unknown): void {
    if (err instanceof CirculationError) {
      log.warn({ errorType: err.type, err: err.message }, "circulation operation rejected");
    } else {
      log.error(
        { err: err instanceof Error ? { name: err.name, message: err.message } : err },
        "circulation operation failed",
      );
    }
  }
}
