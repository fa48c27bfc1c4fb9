/**
 * Guild Wiki — src/features/wiki/categories.ts
 * WHAT: Category CRUD. Deleting a category backs up every article in it first.
 * WHY: Categories are the unit of grouping and the cascade root for articles.
 * FLOWS:
 *  - listCategories(store, guildId) → Category[] ordered by name
 *  - addCategory(store, guildId, name, description?) → ok | dup
 *  - renameCategory(store, guildId, old, new) → ok | no_old | dup_new
 *  - deleteCategory(store, guildId, name, actorId) → backup each article → DELETE (cascade)
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { Db } from "../../db/db.js";
import type { WikiStore } from "../../db/store.js";
import { logger, redact } from "../../lib/logger.js";
import { captureBackup } from "./backups.js";
import type {
  AddCategoryResult,
  Category,
  CategoryRow,
  DeleteCategoryResult,
  RenameCategoryResult,
} from "./types.js";
import {
  validateCategoryName,
  validateDescription,
  validateSnowflake,
} from "./validation.js";

/**
 * Lookup by exact name within a guild. Shared by every operation that takes a category name.
 */
export function findCategoryId(db: Db, guildId: string, name: string): number | null {
  const row = db
    .prepare(`SELECT id FROM wiki_categories WHERE guild_id = ? AND name = ?`)
    .get(guildId, name) as { id: number } | undefined;
  return row ? row.id : null;
}

/**
 * Find-or-create. Used by restore, which resurrects a deleted category as a bare name.
 */
export function ensureCategory(
  db: Db,
  guildId: string,
  name: string,
  now: number
): { id: number; created: boolean } {
  const existing = findCategoryId(db, guildId, name);
  if (existing !== null) return { id: existing, created: false };

  const info = db
    .prepare(
      `INSERT INTO wiki_categories (guild_id, name, description, created_at) VALUES (?, ?, NULL, ?)`
    )
    .run(guildId, name, now);
  return { id: Number(info.lastInsertRowid), created: true };
}

export function listCategories(store: WikiStore, guildId: string): Category[] {
  validateSnowflake(guildId, "guildId");

  const rows = store.db
    .prepare(
      `SELECT id, guild_id, name, description, created_at
       FROM wiki_categories
       WHERE guild_id = ?
       ORDER BY name`
    )
    .all(guildId) as CategoryRow[];

  return rows.map((row) => ({ id: row.id, name: row.name, description: row.description }));
}

export function addCategory(
  store: WikiStore,
  guildId: string,
  name: string,
  description?: string | null
): AddCategoryResult {
  validateSnowflake(guildId, "guildId");
  const cleanName = validateCategoryName(name, "name");
  const cleanDescription = validateDescription(description);

  return store.unitOfWork((db): AddCategoryResult => {
    if (findCategoryId(db, guildId, cleanName) !== null) {
      return { kind: "dup" };
    }

    const info = db
      .prepare(
        `INSERT INTO wiki_categories (guild_id, name, description, created_at) VALUES (?, ?, ?, ?)`
      )
      .run(guildId, cleanName, cleanDescription, store.clock());
    const categoryId = Number(info.lastInsertRowid);

    logger.info({ guildId, categoryId, name: redact(cleanName) }, "[wiki:categories] added");
    return { kind: "ok", categoryId };
  });
}

/**
 * Articles follow the category because they reference it by id. Backups and snapshots
 * keep the name they were taken under, so restoring one after a rename resurrects the
 * old name as a bare category.
 */
export function renameCategory(
  store: WikiStore,
  guildId: string,
  oldName: string,
  newName: string
): RenameCategoryResult {
  validateSnowflake(guildId, "guildId");
  const cleanOld = validateCategoryName(oldName, "oldName");
  const cleanNew = validateCategoryName(newName, "newName");

  return store.unitOfWork((db): RenameCategoryResult => {
    const categoryId = findCategoryId(db, guildId, cleanOld);
    if (categoryId === null) return { kind: "no_old" };
    if (cleanOld === cleanNew) return { kind: "ok" };
    if (findCategoryId(db, guildId, cleanNew) !== null) return { kind: "dup_new" };

    db.prepare(`UPDATE wiki_categories SET name = ? WHERE id = ?`).run(cleanNew, categoryId);

    logger.info(
      { guildId, categoryId, from: redact(cleanOld), to: redact(cleanNew) },
      "[wiki:categories] renamed"
    );
    return { kind: "ok" };
  });
}

/**
 * Every article is backed up as a `delete` by the actor before the cascade removes it.
 * The actor's five-backup cap still applies, so a large category keeps only the last five.
 */
export function deleteCategory(
  store: WikiStore,
  guildId: string,
  name: string,
  actorId: string
): DeleteCategoryResult {
  validateSnowflake(guildId, "guildId");
  validateSnowflake(actorId, "actorId");
  const cleanName = validateCategoryName(name, "name");

  return store.unitOfWork((db): DeleteCategoryResult => {
    const categoryId = findCategoryId(db, guildId, cleanName);
    if (categoryId === null) return { kind: "no_category" };

    const articleIds = db
      .prepare(`SELECT id FROM wiki_articles WHERE category_id = ? ORDER BY id`)
      .all(categoryId) as Array<{ id: number }>;

    const now = store.clock();
    for (const { id } of articleIds) {
      captureBackup(db, id, "delete", actorId, now);
    }

    db.prepare(`DELETE FROM wiki_categories WHERE id = ?`).run(categoryId);

    logger.info(
      { guildId, categoryId, actorId, articlesBackedUp: articleIds.length },
      "[wiki:categories] deleted with articles"
    );
    return { kind: "ok", articlesBackedUp: articleIds.length };
  });
}
