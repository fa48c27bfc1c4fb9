/**
 * Guild Wiki — src/features/wiki/maintenance.ts
 * WHAT: The maintenance cycle: snapshot, expire, compact, stamp.
 * WHY: Bounds backup storage and defines the window personal backups are restorable in.
 * FLOWS (one IMMEDIATE transaction; any failure rolls back all four):
 *  1. INSERT … SELECT every live article into wiki_snapshot_backups
 *  2. DELETE snapshots older than 3 days
 *  3. Keep MAX(id) per (article_id, actor_id) among live-article backups; delete all orphans
 *  4. last_cleanup_at = now, last_cleanup_backup_id = highest backup id at cycle start
 *
 * NOTE: Compaction never removes the newest backup of any (article, actor) pair, so a
 * backup captured moments before the cycle starts survives it.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { WikiStore } from "../../db/store.js";
import { logger } from "../../lib/logger.js";
import { SECONDS_PER_DAY } from "../../lib/time.js";
import type { MaintenanceReport, MaintenanceStatus } from "./types.js";

export const SNAPSHOT_RETENTION_SECONDS = 3 * SECONDS_PER_DAY;

export function runMaintenanceCycle(store: WikiStore): MaintenanceReport {
  const startedMs = Date.now();

  const report = store.unitOfWork((db): MaintenanceReport => {
    const now = store.clock();

    // AUTOINCREMENT: every backup captured after this cycle gets a larger id
    const { maxId } = db
      .prepare(`SELECT COALESCE(MAX(id), 0) AS maxId FROM wiki_article_backups`)
      .get() as { maxId: number };

    const snapshotsTaken = db
      .prepare(
        `INSERT INTO wiki_snapshot_backups
           (guild_id, article_id, category_name, title, content,
            created_by_id, created_by_name, created_at, updated_at, snapshot_at)
         SELECT a.guild_id, a.id, c.name, a.title, a.content,
                a.created_by_id, a.created_by_name, a.created_at, a.updated_at, ?
         FROM wiki_articles a
         JOIN wiki_categories c ON c.id = a.category_id
         ORDER BY a.id`
      )
      .run(now).changes;

    const snapshotsExpired = db
      .prepare(`DELETE FROM wiki_snapshot_backups WHERE snapshot_at < ?`)
      .run(now - SNAPSHOT_RETENTION_SECONDS).changes;

    const backupsCompacted = db
      .prepare(
        `DELETE FROM wiki_article_backups
         WHERE article_id IS NOT NULL
           AND id NOT IN (
             SELECT MAX(id) FROM wiki_article_backups
             WHERE article_id IS NOT NULL
             GROUP BY article_id, actor_id
           )`
      )
      .run().changes;

    const orphansDeleted = db
      .prepare(`DELETE FROM wiki_article_backups WHERE article_id IS NULL`)
      .run().changes;

    db.prepare(
      `INSERT INTO wiki_maintenance_meta (id, last_cleanup_at, last_cleanup_backup_id)
       VALUES (1, ?, ?)
       ON CONFLICT (id) DO UPDATE SET
         last_cleanup_at = excluded.last_cleanup_at,
         last_cleanup_backup_id = excluded.last_cleanup_backup_id`
    ).run(now, maxId);

    return { snapshotsTaken, snapshotsExpired, backupsCompacted, orphansDeleted, ranAt: now };
  });

  logger.info(
    { ...report, durationMs: Date.now() - startedMs },
    "[wiki:maintenance] cycle complete"
  );
  return report;
}

export function getMaintenanceStatus(store: WikiStore): MaintenanceStatus {
  const row = store.db
    .prepare(`SELECT last_cleanup_at FROM wiki_maintenance_meta WHERE id = 1`)
    .get() as { last_cleanup_at: number | null } | undefined;
  return { lastCleanupAt: row ? row.last_cleanup_at : null };
}
