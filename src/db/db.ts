/**
 * Guild Wiki — src/db/db.ts
 * WHAT: SQLite connection bootstrap for the wiki store.
 * WHY: Centralizes better-sqlite3 setup and PRAGMAs; the handle is created once and injected.
 * FLOWS:
 *  - openDatabase(path) → mkdir → open → PRAGMAs → optional statement trace
 * DOCS:
 *  - better-sqlite3 API: https://github.com/WiseLibs/better-sqlite3/blob/master/docs/api.md
 *  - SQLite PRAGMA: https://sqlite.org/pragma.html
 *
 * NOTE: better-sqlite3 is synchronous; keep statements small and quick.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import Database from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";
import { logger } from "../lib/logger.js";

export type Db = Database.Database;

const DB_BUSY_TIMEOUT_MS = 5000;

export interface OpenDatabaseOptions {
  /** Log every statement at debug level. Defaults to DB_TRACE=1. */
  trace?: boolean;
}

export function openDatabase(dbPath: string, options: OpenDatabaseOptions = {}): Db {
  const inMemory = dbPath === ":memory:";
  if (!inMemory) {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  const trace = options.trace ?? process.env.DB_TRACE === "1";
  const db = new Database(dbPath, {
    fileMustExist: false,
    verbose: trace ? (sql: unknown) => logger.debug({ evt: "db_call", sql }, "db call") : undefined,
  });

  // WAL lets readers proceed while the single writer holds its lock
  if (!inMemory) {
    db.pragma("journal_mode = WAL");
  }
  db.pragma("synchronous = NORMAL");
  // Article → category cascade and backup SET NULL both depend on this
  db.pragma("foreign_keys = ON");
  // Wait out brief contention instead of failing immediately with SQLITE_BUSY
  db.pragma(`busy_timeout = ${DB_BUSY_TIMEOUT_MS}`);

  logger.info({ dbPath, trace }, "SQLite opened");
  return db;
}
