/**
 * Guild Wiki — tests/lib/errors.test.ts
 * WHAT: Error classification and the reporting/logging predicates built on it.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi } from "vitest";

vi.mock("../../src/lib/logger.js", () => ({
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
  redact: (value: string) => value,
}));

import {
  classifyError,
  errorContext,
  isTransientStoreError,
  shouldReportToSentry,
} from "../../src/lib/errors.js";
import { CategoryNotFoundError } from "../../src/features/wiki/articles.js";
import { ValidationError } from "../../src/features/wiki/validation.js";

function sqliteError(code: string, message = "sqlite failure"): Error {
  return Object.assign(new Error(message), { name: "SqliteError", code });
}

describe("classifyError", () => {
  it("classifies null and primitives as unknown", () => {
    expect(classifyError(null)).toEqual({
      kind: "unknown",
      message: "Unknown error (null/undefined)",
    });
    expect(classifyError("plain")).toEqual({ kind: "unknown", message: "plain" });
  });

  it("classifies wiki validation errors with their field", () => {
    const err = new ValidationError("title cannot be empty or whitespace-only", "title");

    expect(classifyError(err)).toMatchObject({
      kind: "validation",
      field: "title",
      message: "title cannot be empty or whitespace-only",
    });
  });

  it("matches by error name, not class identity", () => {
    const err = Object.assign(new Error("limit must be an integer between 1 and 25 (got 0)"), {
      name: "ValidationError",
      field: "limit",
    });

    expect(classifyError(err)).toMatchObject({ kind: "validation", field: "limit" });
  });

  it("classifies a missing category as not_found", () => {
    const err = new CategoryNotFoundError("100000000000000001", "Guides");

    expect(classifyError(err)).toMatchObject({ kind: "not_found", entity: "category" });
  });

  it("classifies SQLite errors by code", () => {
    expect(classifyError(sqliteError("SQLITE_BUSY", "database is locked"))).toMatchObject({
      kind: "db_error",
      code: "SQLITE_BUSY",
      message: "database is locked",
    });
  });

  it("falls back to unknown for other errors", () => {
    expect(classifyError(new TypeError("nope"))).toMatchObject({ kind: "unknown", message: "nope" });
  });
});

describe("predicates", () => {
  it("treats lock contention as transient and constraints as permanent", () => {
    const busy = classifyError(sqliteError("SQLITE_BUSY"));
    const unique = classifyError(sqliteError("SQLITE_CONSTRAINT_UNIQUE"));

    expect(isTransientStoreError(busy)).toBe(true);
    expect(isTransientStoreError(unique)).toBe(false);
    expect(unique).toMatchObject({ kind: "db_error", code: "SQLITE_CONSTRAINT_UNIQUE" });
  });

  it("reports bugs to Sentry but not user errors or lock contention", () => {
    expect(shouldReportToSentry(classifyError(new Error("bug")))).toBe(true);
    expect(shouldReportToSentry(classifyError(sqliteError("SQLITE_CORRUPT")))).toBe(true);
    expect(shouldReportToSentry(classifyError(sqliteError("SQLITE_LOCKED")))).toBe(false);
    expect(shouldReportToSentry(classifyError(new ValidationError("bad", "limit")))).toBe(false);
    expect(
      shouldReportToSentry(classifyError(new CategoryNotFoundError("100000000000000001", "X")))
    ).toBe(false);
  });
});

describe("errorContext", () => {
  it("flattens db errors with their code and transience", () => {
    const ctx = errorContext(classifyError(sqliteError("SQLITE_BUSY", "locked")), { job: "x" });

    expect(ctx).toEqual({
      errorKind: "db_error",
      errorMessage: "locked",
      job: "x",
      sqlCode: "SQLITE_BUSY",
      transient: true,
    });
  });

  it("adds the field for validation errors", () => {
    expect(errorContext(classifyError(new ValidationError("bad", "limit")))).toEqual({
      errorKind: "validation",
      errorMessage: "bad",
      field: "limit",
    });
  });
});
