/**
 * Guild Wiki — src/db/ensure.ts
 * WHAT: On-start schema self-heal for the six wiki tables.
 * WHY: Runs against fresh and older databases alike without migration tooling;
 *      additive ALTERs bring older files up to the current column set.
 * FLOWS:
 *  - CREATE TABLE IF NOT EXISTS × 6 → probe PRAGMA table_info → ALTER missing columns
 *    → CREATE INDEX IF NOT EXISTS → seed maintenance singleton
 * DOCS:
 *  - SQLite PRAGMA table_info: https://sqlite.org/pragma.html#pragma_table_info
 *  - SQLite foreign key actions: https://sqlite.org/foreignkeys.html#fk_actions
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import type { Db } from "./db.js";
import { logger } from "../lib/logger.js";

const TABLES: ReadonlyArray<{ name: string; ddl: string }> = [
  {
    name: "wiki_categories",
    ddl: `
      CREATE TABLE IF NOT EXISTS wiki_categories (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        guild_id TEXT NOT NULL,
        name TEXT NOT NULL,
        description TEXT,
        created_at INTEGER NOT NULL DEFAULT (unixepoch()),
        UNIQUE (guild_id, name)
      )`,
  },
  {
    name: "wiki_articles",
    ddl: `
      CREATE TABLE IF NOT EXISTS wiki_articles (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        guild_id TEXT NOT NULL,
        category_id INTEGER NOT NULL REFERENCES wiki_categories(id) ON DELETE CASCADE,
        title TEXT NOT NULL,
        content TEXT NOT NULL,
        created_by_id TEXT,
        created_by_name TEXT,
        created_at INTEGER NOT NULL DEFAULT (unixepoch()),
        updated_at INTEGER NOT NULL DEFAULT (unixepoch()),
        UNIQUE (guild_id, category_id, title)
      )`,
  },
  {
    name: "wiki_contributors",
    ddl: `
      CREATE TABLE IF NOT EXISTS wiki_contributors (
        article_id INTEGER NOT NULL REFERENCES wiki_articles(id) ON DELETE CASCADE,
        user_id TEXT NOT NULL,
        count INTEGER NOT NULL DEFAULT 0,
        PRIMARY KEY (article_id, user_id)
      )`,
  },
  {
    // article_id is a back-reference, not ownership: history outlives the article
    name: "wiki_article_backups",
    ddl: `
      CREATE TABLE IF NOT EXISTS wiki_article_backups (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        guild_id TEXT NOT NULL,
        article_id INTEGER REFERENCES wiki_articles(id) ON DELETE SET NULL,
        category_name TEXT NOT NULL,
        title TEXT NOT NULL,
        content TEXT NOT NULL,
        created_by_id TEXT,
        created_by_name TEXT,
        created_at INTEGER,
        updated_at INTEGER,
        op_type TEXT NOT NULL CHECK (op_type IN ('edit', 'delete')),
        actor_id TEXT NOT NULL,
        backed_at INTEGER NOT NULL DEFAULT (unixepoch())
      )`,
  },
  {
    name: "wiki_snapshot_backups",
    ddl: `
      CREATE TABLE IF NOT EXISTS wiki_snapshot_backups (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        guild_id TEXT NOT NULL,
        article_id INTEGER REFERENCES wiki_articles(id) ON DELETE SET NULL,
        category_name TEXT NOT NULL,
        title TEXT NOT NULL,
        content TEXT NOT NULL,
        created_by_id TEXT,
        created_by_name TEXT,
        created_at INTEGER,
        updated_at INTEGER,
        snapshot_at INTEGER NOT NULL DEFAULT (unixepoch())
      )`,
  },
  {
    name: "wiki_maintenance_meta",
    ddl: `
      CREATE TABLE IF NOT EXISTS wiki_maintenance_meta (
        id INTEGER PRIMARY KEY CHECK (id = 1),
        last_cleanup_at INTEGER,
        last_cleanup_backup_id INTEGER
      )`,
  },
];

/**
 * Columns that arrived after the first schema. SQLite can't ADD COLUMN with
 * NOT NULL unless a default is given, so late columns are nullable or defaulted.
 */
const LATE_COLUMNS: ReadonlyArray<{ table: string; column: string; ddl: string }> = [
  { table: "wiki_categories", column: "description", ddl: "description TEXT" },
  {
    table: "wiki_articles",
    column: "updated_at",
    ddl: "updated_at INTEGER NOT NULL DEFAULT 0",
  },
  { table: "wiki_article_backups", column: "op_type", ddl: "op_type TEXT" },
  { table: "wiki_article_backups", column: "actor_id", ddl: "actor_id TEXT" },
  {
    table: "wiki_article_backups",
    column: "backed_at",
    ddl: "backed_at INTEGER NOT NULL DEFAULT 0",
  },
  {
    table: "wiki_snapshot_backups",
    column: "snapshot_at",
    ddl: "snapshot_at INTEGER NOT NULL DEFAULT 0",
  },
  // Highest backup id that existed when the last cycle ran
  {
    table: "wiki_maintenance_meta",
    column: "last_cleanup_backup_id",
    ddl: "last_cleanup_backup_id INTEGER",
  },
];

const INDEXES: ReadonlyArray<string> = [
  // Retention and listing walk (guild, actor) newest-first
  `CREATE INDEX IF NOT EXISTS idx_wiki_backups_actor
     ON wiki_article_backups(guild_id, actor_id, backed_at DESC, id DESC)`,
  // Conflict detection: later backups of the same article
  `CREATE INDEX IF NOT EXISTS idx_wiki_backups_article
     ON wiki_article_backups(article_id, backed_at)`,
  // Conflict detection for orphaned backups: match by name
  `CREATE INDEX IF NOT EXISTS idx_wiki_backups_name
     ON wiki_article_backups(guild_id, category_name, title)`,
  `CREATE INDEX IF NOT EXISTS idx_wiki_snapshots_name
     ON wiki_snapshot_backups(guild_id, category_name, title, snapshot_at DESC)`,
  `CREATE INDEX IF NOT EXISTS idx_wiki_snapshots_age
     ON wiki_snapshot_backups(snapshot_at)`,
  `CREATE INDEX IF NOT EXISTS idx_wiki_articles_category
     ON wiki_articles(category_id, title)`,
];

function columnExists(db: Db, table: string, column: string): boolean {
  const row = db
    .prepare(`SELECT COUNT(*) AS count FROM pragma_table_info(?) WHERE name = ?`)
    .get(table, column) as { count: number };
  return row.count > 0;
}

/**
 * Idempotent; safe to call on every start.
 * @returns the names of columns that had to be added
 */
export function ensureWikiSchema(db: Db): string[] {
  const added: string[] = [];

  db.transaction(() => {
    for (const table of TABLES) {
      db.prepare(table.ddl).run();
    }

    for (const late of LATE_COLUMNS) {
      if (!columnExists(db, late.table, late.column)) {
        db.prepare(`ALTER TABLE ${late.table} ADD COLUMN ${late.ddl}`).run();
        added.push(`${late.table}.${late.column}`);
      }
    }

    for (const ddl of INDEXES) {
      db.prepare(ddl).run();
    }

    db.prepare(
      `INSERT INTO wiki_maintenance_meta (id, last_cleanup_at) VALUES (1, NULL)
       ON CONFLICT (id) DO NOTHING`
    ).run();
  })();

  if (added.length > 0) {
    logger.info({ added }, "[ensure] added missing wiki columns");
  }
  logger.debug({ tables: TABLES.map((t) => t.name) }, "[ensure] wiki schema ready");
  return added;
}
