/**
 * Guild Wiki — tests/db/ensure.test.ts
 * WHAT: Schema self-heal against fresh and older databases.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

vi.mock("../../src/lib/logger.js", () => ({
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
  redact: (value: string) => value,
}));

import { openDatabase, type Db } from "../../src/db/db.js";
import { ensureWikiSchema } from "../../src/db/ensure.js";

function tableNames(db: Db): string[] {
  const rows = db
    .prepare(`SELECT name FROM sqlite_master WHERE type = 'table' AND name LIKE 'wiki_%' ORDER BY name`)
    .all() as Array<{ name: string }>;
  return rows.map((r) => r.name);
}

describe("ensureWikiSchema", () => {
  let db: Db;

  beforeEach(() => {
    db = openDatabase(":memory:");
  });

  afterEach(() => {
    db.close();
  });

  it("creates all six tables on a fresh database", () => {
    expect(ensureWikiSchema(db)).toEqual([]);

    expect(tableNames(db)).toEqual([
      "wiki_article_backups",
      "wiki_articles",
      "wiki_categories",
      "wiki_contributors",
      "wiki_maintenance_meta",
      "wiki_snapshot_backups",
    ]);
  });

  it("is idempotent", () => {
    ensureWikiSchema(db);
    expect(ensureWikiSchema(db)).toEqual([]);
    expect(db.prepare(`SELECT COUNT(*) AS n FROM wiki_maintenance_meta`).get()).toEqual({ n: 1 });
  });

  it("seeds the maintenance row with no cleanup yet", () => {
    ensureWikiSchema(db);

    expect(db.prepare(`SELECT id, last_cleanup_at FROM wiki_maintenance_meta`).all()).toEqual([
      { id: 1, last_cleanup_at: null },
    ]);
  });

  it("adds the columns an older backups table is missing", () => {
    db.exec(`
      CREATE TABLE wiki_article_backups (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        guild_id TEXT NOT NULL,
        article_id INTEGER,
        category_name TEXT NOT NULL,
        title TEXT NOT NULL,
        content TEXT NOT NULL,
        created_by_id TEXT,
        created_by_name TEXT,
        created_at INTEGER,
        updated_at INTEGER
      )`);

    expect(ensureWikiSchema(db)).toEqual([
      "wiki_article_backups.op_type",
      "wiki_article_backups.actor_id",
      "wiki_article_backups.backed_at",
    ]);
    expect(ensureWikiSchema(db)).toEqual([]);
  });

  it("adds the backup high-water column to an older maintenance table", () => {
    db.exec(`
      CREATE TABLE wiki_maintenance_meta (
        id INTEGER PRIMARY KEY CHECK (id = 1),
        last_cleanup_at INTEGER
      )`);
    db.exec(`INSERT INTO wiki_maintenance_meta (id, last_cleanup_at) VALUES (1, 123)`);

    expect(ensureWikiSchema(db)).toEqual(["wiki_maintenance_meta.last_cleanup_backup_id"]);
    expect(db.prepare(`SELECT * FROM wiki_maintenance_meta`).all()).toEqual([
      { id: 1, last_cleanup_at: 123, last_cleanup_backup_id: null },
    ]);
  });

  it("cascades article and contributor rows when a category is deleted", () => {
    ensureWikiSchema(db);
    const categoryId = Number(
      db.prepare(`INSERT INTO wiki_categories (guild_id, name) VALUES ('1', 'Guides')`).run()
        .lastInsertRowid
    );
    const articleId = Number(
      db
        .prepare(
          `INSERT INTO wiki_articles (guild_id, category_id, title, content) VALUES ('1', ?, 'Setup', 'v1')`
        )
        .run(categoryId).lastInsertRowid
    );
    db.prepare(`INSERT INTO wiki_contributors (article_id, user_id, count) VALUES (?, 'u', 1)`).run(
      articleId
    );
    db.prepare(
      `INSERT INTO wiki_article_backups
         (guild_id, article_id, category_name, title, content, op_type, actor_id, backed_at)
       VALUES ('1', ?, 'Guides', 'Setup', 'v0', 'edit', 'u', 0)`
    ).run(articleId);

    db.prepare(`DELETE FROM wiki_categories WHERE id = ?`).run(categoryId);

    expect(db.prepare(`SELECT COUNT(*) AS n FROM wiki_articles`).get()).toEqual({ n: 0 });
    expect(db.prepare(`SELECT COUNT(*) AS n FROM wiki_contributors`).get()).toEqual({ n: 0 });
    expect(db.prepare(`SELECT article_id FROM wiki_article_backups`).all()).toEqual([
      { article_id: null },
    ]);
  });

  it("rejects an unknown op_type", () => {
    ensureWikiSchema(db);

    expect(() =>
      db
        .prepare(
          `INSERT INTO wiki_article_backups
             (guild_id, category_name, title, content, op_type, actor_id, backed_at)
           VALUES ('1', 'c', 't', 'x', 'rename', 'u', 0)`
        )
        .run()
    ).toThrow(/CHECK constraint failed/);
  });
});
