/**
 * Guild Wiki — src/features/wiki/validation.ts
 * WHAT: Input validation for wiki operations.
 * WHY: Bad input is rejected before any statement runs; only ValidationError is thrown
 *      this early, every other outcome is a returned result.
 * FLOWS:
 *  - validateSnowflake(id, field) → throws if not a Discord snowflake
 *  - validateCategoryName / validateTitle / validateContent → trimmed value or throw
 *  - validateLimit(n) → n or throw
 * DOCS:
 *  - Discord snowflakes: https://discord.com/developers/docs/reference#snowflakes
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

/** 17-20 digit numeric strings; current snowflakes are ~19 digits. */
const SNOWFLAKE_PATTERN = /^\d{17,20}$/;

export const MAX_CATEGORY_NAME_LENGTH = 100;
export const MAX_DESCRIPTION_LENGTH = 200;
export const MAX_TITLE_LENGTH = 100;
// Discord modal paragraph limit
export const MAX_CONTENT_LENGTH = 2000;
export const MAX_QUERY_LENGTH = 100;
export const MAX_LIST_LIMIT = 25;

export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly field: string
  ) {
    super(message);
    this.name = "ValidationError";
  }
}

/**
 * @example
 * validateSnowflake("123456789012345678", "guildId"); // OK
 * validateSnowflake("nope", "guildId"); // throws ValidationError
 */
export function validateSnowflake(id: string, fieldName = "id"): void {
  if (typeof id !== "string" || id.trim().length === 0) {
    throw new ValidationError(`${fieldName} cannot be empty`, fieldName);
  }
  if (!SNOWFLAKE_PATTERN.test(id.trim())) {
    throw new ValidationError(
      `${fieldName} must be a valid Discord snowflake (17-20 digits), got: "${id.trim()}"`,
      fieldName
    );
  }
}

/**
 * Trimmed, non-empty, at most `max` characters.
 * @returns the trimmed value
 */
function validateBoundedText(value: string, fieldName: string, max: number): string {
  if (typeof value !== "string") {
    throw new ValidationError(`${fieldName} cannot be empty`, fieldName);
  }
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    throw new ValidationError(`${fieldName} cannot be empty or whitespace-only`, fieldName);
  }
  if (trimmed.length > max) {
    throw new ValidationError(
      `${fieldName} must be at most ${max} characters (got ${trimmed.length})`,
      fieldName
    );
  }
  return trimmed;
}

export function validateCategoryName(name: string, fieldName = "category"): string {
  return validateBoundedText(name, fieldName, MAX_CATEGORY_NAME_LENGTH);
}

/**
 * Optional; blank collapses to null.
 */
export function validateDescription(description: string | null | undefined): string | null {
  if (description === null || description === undefined) return null;
  const trimmed = description.trim();
  if (trimmed.length === 0) return null;
  if (trimmed.length > MAX_DESCRIPTION_LENGTH) {
    throw new ValidationError(
      `description must be at most ${MAX_DESCRIPTION_LENGTH} characters (got ${trimmed.length})`,
      "description"
    );
  }
  return trimmed;
}

export function validateTitle(title: string, fieldName = "title"): string {
  return validateBoundedText(title, fieldName, MAX_TITLE_LENGTH);
}

/**
 * Content keeps its inner formatting; only surrounding whitespace is dropped.
 */
export function validateContent(content: string): string {
  return validateBoundedText(content, "content", MAX_CONTENT_LENGTH);
}

export function validateQuery(query: string): string {
  return validateBoundedText(query, "query", MAX_QUERY_LENGTH);
}

export function validateLimit(limit: number): number {
  if (!Number.isInteger(limit) || limit < 1 || limit > MAX_LIST_LIMIT) {
    throw new ValidationError(
      `limit must be an integer between 1 and ${MAX_LIST_LIMIT} (got ${limit})`,
      "limit"
    );
  }
  return limit;
}

export function validateRowId(id: number, fieldName: string): void {
  if (!Number.isSafeInteger(id) || id < 1) {
    throw new ValidationError(`${fieldName} must be a positive integer (got ${id})`, fieldName);
  }
}
