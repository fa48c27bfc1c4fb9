/**
 * Guild Wiki — src/lib/errors.ts
 * WHAT: Discriminated union error types for store, input and lookup failures.
 * WHY: Lets the scheduler and callers tell a transient store hiccup from a logic bug
 *      without inspecting driver internals.
 * FLOWS:
 *  - classifyError(err) → ClassifiedError union type
 *  - isTransientStoreError(err) → boolean (caller may retry manually)
 *  - errorContext(err) → flat fields for pino
 * USAGE:
 *  const classified = classifyError(err);
 *  if (classified.kind === "db_error" && isTransientStoreError(classified)) { ... }
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

// ===== Error Type Definitions =====

export interface AppError {
  kind: string;
  message: string;
  cause?: Error;
}

/**
 * Database errors (SQLite).
 *
 * - SQLITE_BUSY/SQLITE_LOCKED: transient, another writer holds the lock
 * - SQLITE_CONSTRAINT_*: logic error, retrying fails the same way
 * - SQLITE_CORRUPT/SQLITE_NOTADB: fatal, needs an operator
 */
export interface DbError extends AppError {
  kind: "db_error";
  code: string;
}

/** Rejected input, raised before the store is touched. */
export interface ValidationError extends AppError {
  kind: "validation";
  field: string;
}

/** A referenced entity vanished between the caller's lookup and the write. */
export interface NotFoundError extends AppError {
  kind: "not_found";
  entity: string;
}

export interface UnknownError extends AppError {
  kind: "unknown";
}

export type ClassifiedError = DbError | ValidationError | NotFoundError | UnknownError;

// ===== Classification =====

function readProp(err: object, key: string): unknown {
  return key in err ? (err as Record<string, unknown>)[key] : undefined;
}

export function classifyError(err: unknown): ClassifiedError {
  if (!err) {
    return { kind: "unknown", message: "Unknown error (null/undefined)" };
  }

  // Feature error classes are matched by name; lib/ never imports from features/
  if (err instanceof Error && err.name === "ValidationError") {
    const field = readProp(err, "field");
    return {
      kind: "validation",
      field: typeof field === "string" ? field : "unknown",
      message: err.message,
      cause: err,
    };
  }

  if (err instanceof Error && err.name === "CategoryNotFoundError") {
    return { kind: "not_found", entity: "category", message: err.message, cause: err };
  }

  if (typeof err !== "object") {
    return { kind: "unknown", message: String(err) };
  }

  const messageProp = readProp(err, "message");
  const message = typeof messageProp === "string" ? messageProp : String(err);
  const code = readProp(err, "code");
  const name = readProp(err, "name");
  const cause = err instanceof Error ? err : undefined;

  if (name === "SqliteError" || (typeof code === "string" && code.startsWith("SQLITE_"))) {
    return {
      kind: "db_error",
      code: typeof code === "string" ? code : "UNKNOWN",
      message,
      cause,
    };
  }

  return { kind: "unknown", message, cause };
}

// ===== Predicates =====

/**
 * Lock contention only. Constraint violations are logic errors and would fail again.
 */
export function isTransientStoreError(err: ClassifiedError): boolean {
  return err.kind === "db_error" && (err.code === "SQLITE_BUSY" || err.code === "SQLITE_LOCKED");
}

export function shouldReportToSentry(err: ClassifiedError): boolean {
  switch (err.kind) {
    case "validation":
    case "not_found":
      return false; // user error, not a bug
    case "db_error":
      return !isTransientStoreError(err);
    default:
      return true;
  }
}

/**
 * Structured context for logging a classified error.
 */
export function errorContext(
  err: ClassifiedError,
  extra: Record<string, unknown> = {}
): Record<string, unknown> {
  const base = {
    errorKind: err.kind,
    errorMessage: err.message,
    ...extra,
  };

  switch (err.kind) {
    case "db_error":
      return { ...base, sqlCode: err.code, transient: isTransientStoreError(err) };
    case "validation":
      return { ...base, field: err.field };
    case "not_found":
      return { ...base, entity: err.entity };
    default:
      return base;
  }
}
