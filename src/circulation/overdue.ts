// ---------------------------------------------------------------------------
// Due-date arithmetic and the derived overdue predicate.
// ---------------------------------------------------------------------------

import { LoanStatus } from "../core/types.js";
import type { Loan } from "../core/types.js";

export const DAY_MS = 24 * 60 * 60 * 1000;

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * DAY_MS);
}

/**
 * A loan is overdue while it is open and its due date has passed. Never
 * stored; always recomputed against the caller's `now`.
 */
export function isOverdue(loan: Pick<Loan, "status" | "dueDate">, now: Date): boolean {
  return loan.status === LoanStatus.OPEN && loan.dueDate.getTime() < now.getTime();
}

/** Whole days elapsed since `dueDate`; 0 when not yet due. */
export function daysPastDue(dueDate: Date, now: Date): number {
  const elapsed = now.getTime() - dueDate.getTime();
  return elapsed > 0 ? Math.floor(elapsed / DAY_MS) : 0;
}
