/**
 * Guild Wiki — src/features/wiki/snapshots.ts
 * WHAT: Read and restore the periodic point-in-time copies taken by maintenance.
 * WHY: Snapshots cover what personal backups can't: anything older than the last cleanup,
 *      regardless of who changed it.
 * FLOWS:
 *  - listSnapshots(store, guildId, category, title) → newest first, at most 3 days old
 *  - restoreSnapshot(store, snapshotId) → reconcile; the snapshot stays
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { WikiStore } from "../../db/store.js";
import { logger } from "../../lib/logger.js";
import { reconcileArticleCopy, type RestoreOptions } from "./restore.js";
import type { RestoreResult, Snapshot, SnapshotRow, SnapshotSummary } from "./types.js";
import {
  validateCategoryName,
  validateLimit,
  validateRowId,
  validateSnowflake,
  validateTitle,
} from "./validation.js";

export const DEFAULT_SNAPSHOT_LIST_LIMIT = 10;

function toSnapshot(row: SnapshotRow): Snapshot {
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
    snapshotAt: row.snapshot_at,
  };
}

/**
 * Matched by the names the snapshot was taken under, not by article id, so snapshots of a
 * deleted article are still found.
 */
export function listSnapshots(
  store: WikiStore,
  guildId: string,
  category: string,
  title: string,
  limit = DEFAULT_SNAPSHOT_LIST_LIMIT
): SnapshotSummary[] {
  validateSnowflake(guildId, "guildId");
  const cleanCategory = validateCategoryName(category);
  const cleanTitle = validateTitle(title);
  validateLimit(limit);

  const rows = store.db
    .prepare(
      `SELECT id, snapshot_at
       FROM wiki_snapshot_backups
       WHERE guild_id = ? AND category_name = ? AND title = ?
       ORDER BY snapshot_at DESC, id DESC
       LIMIT ?`
    )
    .all(guildId, cleanCategory, cleanTitle, limit) as Array<Pick<SnapshotRow, "id" | "snapshot_at">>;

  return rows.map((row) => ({ id: row.id, snapshotAt: row.snapshot_at }));
}

export function getSnapshot(
  store: WikiStore,
  snapshotId: number,
  guildId?: string
): Snapshot | null {
  validateRowId(snapshotId, "snapshotId");
  if (guildId !== undefined) validateSnowflake(guildId, "guildId");

  const row = store.db
    .prepare(`SELECT * FROM wiki_snapshot_backups WHERE id = ?`)
    .get(snapshotId) as SnapshotRow | undefined;
  if (!row) return null;
  if (guildId !== undefined && row.guild_id !== guildId) return null;
  return toSnapshot(row);
}

/**
 * Non-consuming: a snapshot can be restored again until maintenance expires it.
 */
export function restoreSnapshot(
  store: WikiStore,
  snapshotId: number,
  options: RestoreOptions = {}
): RestoreResult {
  validateRowId(snapshotId, "snapshotId");
  if (options.guildId !== undefined) validateSnowflake(options.guildId, "guildId");

  return store.unitOfWork((db): RestoreResult => {
    const row = db
      .prepare(`SELECT * FROM wiki_snapshot_backups WHERE id = ?`)
      .get(snapshotId) as SnapshotRow | undefined;
    if (!row || (options.guildId !== undefined && row.guild_id !== options.guildId)) {
      return { kind: "not_found" };
    }

    const result = reconcileArticleCopy(db, toSnapshot(row), store.clock());
    if (result.kind === "ok") {
      logger.info(
        { guildId: row.guild_id, snapshotId, articleId: result.articleId, mode: result.mode },
        "[wiki:snapshots] snapshot restored"
      );
    } else {
      logger.info(
        { guildId: row.guild_id, snapshotId, conflictingArticleId: result.conflictingArticleId },
        "[wiki:snapshots] snapshot restore blocked by existing title"
      );
    }
    return result;
  });
}
