// ---------------------------------------------------------------------------
// Core types for the circulation service.
// All other modules import from this file.
// ---------------------------------------------------------------------------

// ── Branded identifiers ─────────────────────────────────────────────────────

export type LibraryId = string & { readonly __brand: "LibraryId" };
export type TitleId = string & { readonly __brand: "TitleId" };
export type CopyId = string & { readonly __brand: "CopyId" };
export type ReaderId = string & { readonly __brand: "ReaderId" };
export type LoanId = string & { readonly __brand: "LoanId" };
export type AuditEntryId = string & { readonly __brand: "AuditEntryId" };

// ── Enums ───────────────────────────────────────────────────────────────────

export const CopyStatus = {
  AVAILABLE: "AVAILABLE",
  ON_LOAN: "ON_LOAN",
} as const;
export type CopyStatus = (typeof CopyStatus)[keyof typeof CopyStatus];

export const LoanStatus = {
  OPEN: "OPEN",
  RETURNED: "RETURNED",
} as const;
export type LoanStatus = (typeof LoanStatus)[keyof typeof LoanStatus];

export const ActorRole = {
  NETWORK_ADMIN: "network_admin",
  LOCAL_COORDINATOR: "local_coordinator",
  READER: "reader",
} as const;
export type ActorRole = (typeof ActorRole)[keyof typeof ActorRole];

export const AuditAction = {
  LIBRARY_REGISTER: "library.register",
  TITLE_REGISTER: "title.register",
  COPY_ADD: "copy.add",
  READER_REGISTER: "reader.register",
  LOAN_CHECKOUT: "loan.checkout",
  LOAN_RETURN: "loan.return",
  LOAN_RENEW: "loan.renew",
} as const;
export type AuditAction = (typeof AuditAction)[keyof typeof AuditAction];

// ── Entities ────────────────────────────────────────────────────────────────

export interface Library {
  id: LibraryId;
  name: string;
  city: string;
  address: string | null;
  active: boolean;
  createdAt: Date;
}

export interface Title {
  id: TitleId;
  title: string;
  author: string;
  category: string;
  /** Normalised ISBN (digits only, check digit verified). */
  isbn: string | null;
  publisher: string | null;
  year: number | null;
  createdAt: Date;
}

export interface Copy {
  id: CopyId;
  titleId: TitleId;
  libraryId: LibraryId;
  /** Barcode or shelf label; unique within its library. */
  code: string;
  status: CopyStatus;
  acquiredAt: Date;
}

export interface Reader {
  id: ReaderId;
  name: string;
  email: string;
  document: string | null;
  homeLibraryId: LibraryId;
  active: boolean;
  consentedAt: Date;
  registeredAt: Date;
}

export interface Loan {
  id: LoanId;
  readerId: ReaderId;
  copyId: CopyId;
  /** Owning library of the copy, denormalised for scoped queries. */
  libraryId: LibraryId;
  loanDate: Date;
  dueDate: Date;
  returnDate: Date | null;
  renewals: number;
  status: LoanStatus;
}

export interface AuditEntry {
  id: AuditEntryId;
  action: AuditAction;
  libraryId: LibraryId | null;
  actorId: string | null;
  actorRole: ActorRole;
  details: Record<string, unknown>;
  recordedAt: Date;
}

// ── Actor ───────────────────────────────────────────────────────────────────

/**
 * Authenticated caller, as resolved by the upstream authentication gateway.
 * Network administrators may have no home library.
 */
export interface ActorContext {
  role: ActorRole;
  homeLibraryId: LibraryId | null;
  actorId: string | null;
}

// ── Joined read models ──────────────────────────────────────────────────────

export interface CopyView {
  copyId: CopyId;
  code: string;
  status: CopyStatus;
  libraryId: LibraryId;
  titleId: TitleId;
  title: string;
  author: string;
}

export interface OpenLoanRow {
  loanId: LoanId;
  readerId: ReaderId;
  readerName: string;
  copyId: CopyId;
  copyCode: string;
  titleId: TitleId;
  title: string;
  loanDate: Date;
  dueDate: Date;
  renewals: number;
}

export interface TitleHolding {
  titleId: TitleId;
  title: string;
  author: string;
  category: string;
  libraryId: LibraryId;
  libraryName: string;
  copyCode: string;
  status: CopyStatus;
}

export interface EntityCounts {
  libraries: number;
  titles: number;
  copies: number;
}

/** Wall-clock source, injected so due dates and overdue checks are testable. */
export type Clock = () => Date;

// ── Config types ────────────────────────────────────────────────────────────

export interface AppConfig {
  env: "development" | "test" | "production";
  port: number;
  logLevel: string;
  database: DatabaseConfig;
  circulation: CirculationConfig;
  store: StoreConfig;
  rateLimit: RateLimitConfig;
  seedDir: string;
}

export interface DatabaseConfig {
  /** Absent means the in-memory store is used. */
  url: string | null;
  maxConnections: number;
}

export interface CirculationConfig {
  loanPeriodDays: number;
  maxOpenLoansPerReader: number;
  maxRenewals: number;
}

export interface StoreConfig {
  maxRetries: number;
  retryBaseDelayMs: number;
}

export interface RateLimitConfig {
  enabled: boolean;
  requestsPerMinute: number;
  searchRpm: number;
}

export interface LoggingConfig {
  level: string;
  prettyPrint: boolean;
  redactPersonalData: boolean;
}
