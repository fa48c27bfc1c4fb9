/**
 * Guild Wiki — src/db/store.ts
 * WHAT: The WikiStore handle: one connection, one clock, one unit-of-work entry point.
 * WHY: Built once at process start and passed into every wiki operation, so tests can
 *      hand in an in-memory database and a fake clock.
 * FLOWS:
 *  - createWikiStore({ dbPath }) → openDatabase → ensureWikiSchema → register wiki_fold → handle
 *  - store.unitOfWork(fn) → BEGIN IMMEDIATE → fn(db) → COMMIT (ROLLBACK on throw)
 *  - closeWikiStore(store) → db.close()
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { openDatabase, type Db } from "./db.js";
import { ensureWikiSchema } from "./ensure.js";
import { nowUtc, type Clock } from "../lib/time.js";
import { logger } from "../lib/logger.js";

export interface WikiStore {
  readonly db: Db;
  /** Current Unix seconds */
  readonly clock: Clock;
  /**
   * Run `fn` inside a single IMMEDIATE transaction. The write lock is taken up front,
   * so "read current state → capture backup → write" cannot interleave with another writer.
   * Nested calls become savepoints.
   */
  unitOfWork<T>(fn: (db: Db) => T): T;
}

export type CreateWikiStoreOptions =
  | { dbPath: string; db?: undefined; clock?: Clock }
  | { db: Db; dbPath?: undefined; clock?: Clock };

/** Full Unicode lower-casing; SQLite's LIKE and lower() fold ASCII only. */
const FOLD_FUNCTION = "wiki_fold";

export function createWikiStore(options: CreateWikiStoreOptions): WikiStore {
  const db = options.db ?? openDatabase(options.dbPath);
  ensureWikiSchema(db);
  db.function(FOLD_FUNCTION, { deterministic: true }, (value: unknown) =>
    typeof value === "string" ? value.toLowerCase() : value
  );

  const clock = options.clock ?? nowUtc;

  return {
    db,
    clock,
    unitOfWork<T>(fn: (handle: Db) => T): T {
      // better-sqlite3 runs nested transaction() calls as savepoints
      const tx = db.transaction(() => fn(db));
      return db.inTransaction ? tx() : tx.immediate();
    },
  };
}

export function closeWikiStore(store: WikiStore): void {
  if (!store.db.open) return;
  store.db.close();
  logger.info("[store] wiki store closed");
}
