// ---------------------------------------------------------------------------
// Tests for due-date arithmetic and the overdue predicate.
// ---------------------------------------------------------------------------

import { describe, it, expect } from "vitest";

import { addDays, daysPastDue, isOverdue } from "../../../src/circulation/overdue.js";
import { LoanStatus } from "../../../src/core/types.js";

const DUE = new Date("2024-03-15T10:00:00.000Z");

describe("addDays", () => {
  it("adds whole days in UTC", () => {
    expect(addDays(new Date("2024-02-20T10:00:00.000Z"), 14).toISOString()).toBe(
      "2024-03-05T10:00:00.000Z",
    );
  });
});

describe("isOverdue", () => {
  it("is false up to and including the due instant", () => {
    expect(isOverdue({ status: LoanStatus.OPEN, dueDate: DUE }, DUE)).toBe(false);
  });

  it("is true once the due instant has passed", () => {
    expect(
      isOverdue({ status: LoanStatus.OPEN, dueDate: DUE }, new Date("2024-03-15T10:00:00.001Z")),
    ).toBe(true);
  });

  it("is never true for returned loans", () => {
    expect(
      isOverdue({ status: LoanStatus.RETURNED, dueDate: DUE }, new Date("2024-06-01T00:00:00.000Z")),
    ).toBe(false);
  });
});

describe("daysPastDue", () => {
  it("is zero before the due date", () => {
    expect(daysPastDue(DUE, new Date("2024-03-10T00:00:00.000Z"))).toBe(0);
  });

  it("counts whole elapsed days", () => {
    expect(daysPastDue(DUE, new Date("2024-03-16T09:59:59.999Z"))).toBe(0);
    expect(daysPastDue(DUE, new Date("2024-03-16T10:00:00.000Z"))).toBe(1);
    expect(daysPastDue(DUE, new Date("2024-03-20T12:00:00.000Z"))).toBe(5);
  });
});
