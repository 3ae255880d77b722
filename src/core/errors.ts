// ---------------------------------------------------------------------------
// Error hierarchy for the circulation service.
// ---------------------------------------------------------------------------

// ── Base error ──────────────────────────────────────────────────────────────

/**
 * Root of all circulation domain errors. `type` is the stable identifier
 * reported to API callers.
 */
export class CirculationError extends Error {
  public readonly type: string;

  constructor(message: string, type: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "CirculationError";
    this.type = type;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// ── Lookup errors ───────────────────────────────────────────────────────────

export type EntityKind = "library" | "title" | "copy" | "reader" | "loan";

/** A referenced entity id does not resolve. */
export class NotFoundError extends CirculationError {
  public readonly entity: EntityKind;
  public readonly entityId: string;

  constructor(entity: EntityKind, entityId: string, options?: ErrorOptions) {
    super(`${entity} "${entityId}" not found`, "not_found", options);
    this.name = "NotFoundError";
    this.entity = entity;
    this.entityId = entityId;
  }
}

// ── Conflicts ───────────────────────────────────────────────────────────────

/**
 * A concurrent mutation invalidated a precondition between read and write.
 */
export class ConflictError extends CirculationError {
  constructor(message: string, type = "conflict", options?: ErrorOptions) {
    super(message, type, options);
    this.name = "ConflictError";
  }
}

/** The copy is already on loan. */
export class CopyNotAvailableError extends ConflictError {
  public readonly copyId: string;

  constructor(copyId: string, options?: ErrorOptions) {
    super(`copy "${copyId}" is not available`, "copy_not_available", options);
    this.name = "CopyNotAvailableError";
    this.copyId = copyId;
  }
}

/** The loan has already been closed by an earlier return. */
export class LoanAlreadyReturnedError extends ConflictError {
  public readonly loanId: string;

  constructor(loanId: string, options?: ErrorOptions) {
    super(`loan "${loanId}" has already been returned`, "loan_already_returned", options);
    this.name = "LoanAlreadyReturnedError";
    this.loanId = loanId;
  }
}

// ── Authorisation ───────────────────────────────────────────────────────────

/** The actor's scope does not cover the target library or operation. */
export class ForbiddenError extends CirculationError {
  constructor(message: string, type = "forbidden", options?: ErrorOptions) {
    super(message, type, options);
    this.name = "ForbiddenError";
  }
}

/** A reader tried to borrow a copy owned by a library other than their own. */
export class CrossLibraryForbiddenError extends ForbiddenError {
  public readonly readerLibraryId: string;
  public readonly copyLibraryId: string;

  constructor(readerLibraryId: string, copyLibraryId: string, options?: ErrorOptions) {
    super(
      `reader from library "${readerLibraryId}" cannot borrow from library "${copyLibraryId}"`,
      "cross_library_forbidden",
      options,
    );
    this.name = "CrossLibraryForbiddenError";
    this.readerLibraryId = readerLibraryId;
    this.copyLibraryId = copyLibraryId;
  }
}

/** No usable actor context accompanied a protected request. */
export class UnauthenticatedError extends CirculationError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "unauthenticated", options);
    this.name = "UnauthenticatedError";
  }
}

// ── Reader and loan rules ───────────────────────────────────────────────────

export class ReaderInactiveError extends CirculationError {
  public readonly readerId: string;

  constructor(readerId: string, options?: ErrorOptions) {
    super(`reader "${readerId}" is inactive`, "reader_inactive", options);
    this.name = "ReaderInactiveError";
    this.readerId = readerId;
  }
}

export type IneligibilityReason = "overdue_loans" | "loan_limit_reached";

/** The reader has overdue items or has reached the open-loan limit. */
export class ReaderIneligibleError extends CirculationError {
  public readonly readerId: string;
  public readonly reason: IneligibilityReason;

  constructor(readerId: string, reason: IneligibilityReason, detail: string, options?: ErrorOptions) {
    super(`reader "${readerId}" cannot borrow: ${detail}`, "reader_ineligible", options);
    this.name = "ReaderIneligibleError";
    this.readerId = readerId;
    this.reason = reason;
  }
}

export class RenewalNotAllowedError extends CirculationError {
  public readonly loanId: string;

  constructor(loanId: string, detail: string, options?: ErrorOptions) {
    super(`loan "${loanId}" cannot be renewed: ${detail}`, "renewal_not_allowed", options);
    this.name = "RenewalNotAllowedError";
    this.loanId = loanId;
  }
}

// ── Input errors ────────────────────────────────────────────────────────────

/** Malformed input or a uniqueness rule violated by the input. */
export class ValidationError extends CirculationError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = [], options?: ErrorOptions) {
    super(message, "validation_error", options);
    this.name = "ValidationError";
    this.issues = issues;
  }
}

// ── Infrastructure errors ───────────────────────────────────────────────────

/** A required configuration value is missing or invalid. */
export class ConfigurationError extends CirculationError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "configuration_error", options);
    this.name = "ConfigurationError";
  }
}

/**
 * The store aborted a transaction for a transient reason (serialization
 * failure, deadlock). Retried a bounded number of times before surfacing.
 */
export class TransientStoreError extends CirculationError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "store_unavailable", options);
    this.name = "TransientStoreError";
  }
}
