/**
 * Guild Wiki — src/features/wiki/backups.ts
 * WHAT: Personal backup capture, retention, listing and conflict detection.
 * WHY: Every edit/delete stores the pre-image for the acting user so they can undo it.
 * FLOWS:
 *  - captureBackup(db, articleId, op, actor, now) → INSERT pre-image → evict beyond newest 5 for (guild, actor)
 *  - listRecentBackups(store, guildId, userId) → backups newer than last_cleanup_at
 *  - checkConflict(store, backupId) → did someone else touch the article after this backup?
 *
 * NOTE: "Newest" is backed_at DESC then id DESC. backed_at has one-second resolution,
 * so the id breaks ties between backups taken within the same second.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { Db } from "../../db/db.js";
import type { WikiStore } from "../../db/store.js";
import { logger } from "../../lib/logger.js";
import type {
  ArticleWithCategoryRow,
  BackupOpType,
  BackupSummary,
  ConflictResult,
  PersonalBackup,
  PersonalBackupRow,
} from "./types.js";
import { validateLimit, validateRowId, validateSnowflake } from "./validation.js";

/** Personal backups kept per (guild, actor); the sixth evicts the oldest. */
export const BACKUPS_PER_ACTOR = 5;

export const DEFAULT_BACKUP_LIST_LIMIT = 5;

export function toPersonalBackup(row: PersonalBackupRow): PersonalBackup {
  return {
    id: row.id,
    guildId: row.guild_id,
    articleId: row.article_id,
    category: row.category_name,
    title: row.title,
    content: row.content,
    createdById: row.created_by_id,
    createdByName: row.created_by_name,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    opType: row.op_type,
    actorId: row.actor_id,
    backedAt: row.backed_at,
  };
}

/**
 * Must run inside the same unit of work as the mutation it precedes, and before it:
 * a missing article is a silent no-op.
 *
 * @returns the new backup id, or null when the article was already gone
 */
export function captureBackup(
  db: Db,
  articleId: number,
  opType: BackupOpType,
  actorId: string,
  backedAt: number
): number | null {
  const article = db
    .prepare(
      `SELECT a.*, c.name AS category_name
       FROM wiki_articles a
       JOIN wiki_categories c ON c.id = a.category_id
       WHERE a.id = ?`
    )
    .get(articleId) as ArticleWithCategoryRow | undefined;
  if (!article) return null;

  const info = db
    .prepare(
      `INSERT INTO wiki_article_backups
         (guild_id, article_id, category_name, title, content,
          created_by_id, created_by_name, created_at, updated_at,
          op_type, actor_id, backed_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
    )
    .run(
      article.guild_id,
      article.id,
      article.category_name,
      article.title,
      article.content,
      article.created_by_id,
      article.created_by_name,
      article.created_at,
      article.updated_at,
      opType,
      actorId,
      backedAt
    );

  const evicted = db
    .prepare(
      `DELETE FROM wiki_article_backups
       WHERE guild_id = @guildId
         AND actor_id = @actorId
         AND id NOT IN (
           SELECT id FROM wiki_article_backups
           WHERE guild_id = @guildId AND actor_id = @actorId
           ORDER BY backed_at DESC, id DESC
           LIMIT @keep
         )`
    )
    .run({ guildId: article.guild_id, actorId, keep: BACKUPS_PER_ACTOR }).changes;

  const backupId = Number(info.lastInsertRowid);
  logger.debug(
    { guildId: article.guild_id, articleId, backupId, opType, actorId, evicted },
    "[wiki:backups] captured"
  );
  return backupId;
}

/**
 * Only backups taken after the last maintenance run are listed: you may undo what you
 * did since the last cleanup, nothing older. "After" is by backup id, so a backup taken
 * in the same second as the cycle but after it still counts. A meta row written before
 * last_cleanup_backup_id existed falls back to the timestamp.
 */
export function listRecentBackups(
  store: WikiStore,
  guildId: string,
  userId: string,
  limit = DEFAULT_BACKUP_LIST_LIMIT
): BackupSummary[] {
  validateSnowflake(guildId, "guildId");
  validateSnowflake(userId, "userId");
  validateLimit(limit);

  const rows = store.db
    .prepare(
      `SELECT b.id, b.op_type, b.category_name, b.title, b.backed_at
       FROM wiki_article_backups b
       LEFT JOIN wiki_maintenance_meta m ON m.id = 1
       WHERE b.guild_id = ?
         AND b.actor_id = ?
         AND (CASE
                WHEN m.last_cleanup_backup_id IS NOT NULL THEN b.id > m.last_cleanup_backup_id
                WHEN m.last_cleanup_at IS NOT NULL THEN b.backed_at > m.last_cleanup_at
                ELSE 1
              END)
       ORDER BY b.backed_at DESC, b.id DESC
       LIMIT ?`
    )
    .all(guildId, userId, limit) as Array<
    Pick<PersonalBackupRow, "id" | "op_type" | "category_name" | "title" | "backed_at">
  >;

  return rows.map((row) => ({
    id: row.id,
    opType: row.op_type,
    category: row.category_name,
    title: row.title,
    backedAt: row.backed_at,
  }));
}

/**
 * Full backup row for a restore-confirmation preview. A row from another guild is null
 * when `guildId` is given.
 */
export function getBackup(
  store: WikiStore,
  backupId: number,
  guildId?: string
): PersonalBackup | null {
  validateRowId(backupId, "backupId");
  if (guildId !== undefined) validateSnowflake(guildId, "guildId");

  const row = store.db
    .prepare(`SELECT * FROM wiki_article_backups WHERE id = ?`)
    .get(backupId) as PersonalBackupRow | undefined;
  if (!row) return null;
  if (guildId !== undefined && row.guild_id !== guildId) return null;
  return toPersonalBackup(row);
}

interface LaterBackupRow {
  actor_id: string | null;
  op_type: BackupOpType;
}

/**
 * Advisory only: looks at the single most recent backup taken after `backupId` for the
 * same article and reports it when a different actor made it. A restore is never blocked.
 *
 * When the article is already gone (article_id nulled), falls back to matching later
 * `delete` backups by guild, category name and title.
 *
 * An unknown backup id reports `none`; the restore itself reports `not_found`.
 */
export function checkConflict(store: WikiStore, backupId: number): ConflictResult {
  validateRowId(backupId, "backupId");
  const db = store.db;

  const backup = db
    .prepare(`SELECT * FROM wiki_article_backups WHERE id = ?`)
    .get(backupId) as PersonalBackupRow | undefined;
  if (!backup) return { kind: "none" };

  if (backup.article_id !== null) {
    const later = db
      .prepare(
        `SELECT actor_id, op_type
         FROM wiki_article_backups
         WHERE article_id = @articleId
           AND (backed_at > @backedAt OR (backed_at = @backedAt AND id > @id))
         ORDER BY backed_at DESC, id DESC
         LIMIT 1`
      )
      .get({ articleId: backup.article_id, backedAt: backup.backed_at, id: backup.id }) as
      | LaterBackupRow
      | undefined;

    if (later && later.actor_id && later.actor_id !== backup.actor_id) {
      return later.op_type === "edit"
        ? { kind: "edited_by_other", otherUserId: later.actor_id }
        : { kind: "deleted_by_other", otherUserId: later.actor_id };
    }
    return { kind: "none" };
  }

  const laterDelete = db
    .prepare(
      `SELECT actor_id, op_type
       FROM wiki_article_backups
       WHERE guild_id = @guildId
         AND category_name = @category
         AND title = @title
         AND op_type = 'delete'
         AND (backed_at > @backedAt OR (backed_at = @backedAt AND id > @id))
       ORDER BY backed_at DESC, id DESC
       LIMIT 1`
    )
    .get({
      guildId: backup.guild_id,
      category: backup.category_name,
      title: backup.title,
      backedAt: backup.backed_at,
      id: backup.id,
    }) as LaterBackupRow | undefined;

  if (laterDelete && laterDelete.actor_id && laterDelete.actor_id !== backup.actor_id) {
    return { kind: "deleted_by_other", otherUserId: laterDelete.actor_id };
  }
  return { kind: "none" };
}
