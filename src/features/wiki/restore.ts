/**
 * Guild Wiki — src/features/wiki/restore.ts
 * WHAT: Writes a backup or snapshot back into the live article table.
 * WHY: The article may have been edited, renamed, moved or deleted since the copy was taken;
 *      reconciliation decides between update-in-place and insert-as-new.
 * FLOWS:
 *  - restoreBackup(store, backupId) → reconcile → DELETE consumed backup
 *  - reconcileArticleCopy(db, copy, now) → ensure category → title check → UPDATE or INSERT
 *
 * NOTE: Personal-backup restores are consuming (one-shot). That is a product decision:
 * the list shows "undo" entries, and an undo that could be replayed would be confusing.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { Db } from "../../db/db.js";
import type { WikiStore } from "../../db/store.js";
import { logger } from "../../lib/logger.js";
import { toPersonalBackup } from "./backups.js";
import { ensureCategory, findCategoryId } from "./categories.js";
import type { ArticleCopy, PersonalBackupRow, RestoreResult } from "./types.js";
import { validateRowId, validateSnowflake } from "./validation.js";

export type ReconcileResult = Exclude<RestoreResult, { kind: "not_found" }>;

function findLiveArticleId(db: Db, copy: ArticleCopy): number | null {
  if (copy.articleId === null) return null;
  const row = db
    .prepare(`SELECT id FROM wiki_articles WHERE id = ? AND guild_id = ?`)
    .get(copy.articleId, copy.guildId) as { id: number } | undefined;
  return row ? row.id : null;
}

/**
 * Must run inside a unit of work. On `title_taken` nothing has been written: the category
 * is only created once the title is known to be free.
 *
 * Contributor counters are left alone; a restore is not a contribution.
 */
export function reconcileArticleCopy(db: Db, copy: ArticleCopy, now: number): ReconcileResult {
  const existingCategoryId = findCategoryId(db, copy.guildId, copy.category);

  // articleId is a weak reference; it may point at nothing
  const liveId = findLiveArticleId(db, copy);

  if (existingCategoryId !== null) {
    const clash = db
      .prepare(
        `SELECT id FROM wiki_articles
         WHERE guild_id = ? AND category_id = ? AND title = ? AND id IS NOT ?`
      )
      .get(copy.guildId, existingCategoryId, copy.title, liveId) as { id: number } | undefined;
    if (clash) {
      return { kind: "title_taken", conflictingArticleId: clash.id };
    }
  }

  const category =
    existingCategoryId !== null
      ? { id: existingCategoryId, created: false }
      : ensureCategory(db, copy.guildId, copy.category, now);

  const createdAt = copy.createdAt ?? now;
  const updatedAt = copy.updatedAt ?? now;

  if (liveId !== null) {
    db.prepare(
      `UPDATE wiki_articles
       SET category_id = ?, title = ?, content = ?,
           created_by_id = ?, created_by_name = ?, created_at = ?, updated_at = ?
       WHERE id = ?`
    ).run(
      category.id,
      copy.title,
      copy.content,
      copy.createdById,
      copy.createdByName,
      createdAt,
      updatedAt,
      liveId
    );
    return { kind: "ok", articleId: liveId, mode: "updated", categoryCreated: category.created };
  }

  const info = db
    .prepare(
      `INSERT INTO wiki_articles
         (guild_id, category_id, title, content, created_by_id, created_by_name, created_at, updated_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
    )
    .run(
      copy.guildId,
      category.id,
      copy.title,
      copy.content,
      copy.createdById,
      copy.createdByName,
      createdAt,
      updatedAt
    );
  return {
    kind: "ok",
    articleId: Number(info.lastInsertRowid),
    mode: "inserted",
    categoryCreated: category.created,
  };
}

export interface RestoreOptions {
  /** When set, a backup from another guild is reported as not_found. */
  guildId?: string;
}

export interface RestoreBackupOptions extends RestoreOptions {
  /** The requesting user. When set, only the backup's own actor may restore it. */
  actorId?: string;
}

/**
 * Restore a personal backup. The backup is deleted on success; on `title_taken` it is kept
 * so the user can free the title and try again.
 *
 * Maintenance gating applies to listing only: a backup id obtained earlier still restores.
 */
export function restoreBackup(
  store: WikiStore,
  backupId: number,
  options: RestoreBackupOptions = {}
): RestoreResult {
  validateRowId(backupId, "backupId");
  if (options.guildId !== undefined) validateSnowflake(options.guildId, "guildId");
  if (options.actorId !== undefined) validateSnowflake(options.actorId, "actorId");

  return store.unitOfWork((db): RestoreResult => {
    const row = db
      .prepare(`SELECT * FROM wiki_article_backups WHERE id = ?`)
      .get(backupId) as PersonalBackupRow | undefined;
    if (!row || (options.guildId !== undefined && row.guild_id !== options.guildId)) {
      return { kind: "not_found" };
    }
    // Someone else's undo history is invisible, not forbidden
    if (options.actorId !== undefined && row.actor_id !== options.actorId) {
      return { kind: "not_found" };
    }

    const result = reconcileArticleCopy(db, toPersonalBackup(row), store.clock());
    if (result.kind !== "ok") {
      logger.info(
        {
          guildId: row.guild_id,
          backupId,
          requestedBy: options.actorId ?? null,
          conflictingArticleId: result.conflictingArticleId,
        },
        "[wiki:restore] backup restore blocked by existing title"
      );
      return result;
    }

    db.prepare(`DELETE FROM wiki_article_backups WHERE id = ?`).run(backupId);

    logger.info(
      {
        guildId: row.guild_id,
        backupId,
        actorId: row.actor_id,
        requestedBy: options.actorId ?? null,
        articleId: result.articleId,
        mode: result.mode,
        categoryCreated: result.categoryCreated,
      },
      "[wiki:restore] backup restored"
    );
    return result;
  });
}
