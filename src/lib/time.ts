/**
 * Guild Wiki — src/lib/time.ts
 * WHAT: Unix epoch timestamp utilities for deterministic, test-friendly timestamps.
 * WHY: SQLite defaults can't be mocked in tests; explicit timestamps keep tests predictable.
 * FLOWS:
 *  - nowUtc() → current Unix seconds (INTEGER for SQLite)
 *  - formatUtc() → "YYYY-MM-DD HH:MM UTC" for plain-text listings
 *
 * NOTE: Every wiki timestamp column holds Unix seconds, not milliseconds.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

export const SECONDS_PER_HOUR = 60 * 60;
export const SECONDS_PER_DAY = 24 * SECONDS_PER_HOUR;

/** A source of "now" in Unix seconds. Injected wherever tests need to move time. */
export type Clock = () => number;

// Floor, not round: "X seconds ago" must never go negative.
export const nowUtc: Clock = () => Math.floor(Date.now() / 1000);

/**
 * @example
 * formatUtc(1729468800) // "2024-10-21 00:00 UTC"
 */
export function formatUtc(tsSec: number): string {
  return new Date(tsSec * 1000)
    .toISOString()
    .replace("T", " ")
    .replace(/:\d{2}\.\d{3}Z$/, " UTC");
}
