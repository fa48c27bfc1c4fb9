/**
 * Guild Wiki — src/features/wiki/types.ts
 * WHAT: Row shapes, domain records and result unions for the wiki feature.
 * WHY: Every operation returns a `{ kind }` union so callers can switch on the outcome
 *      instead of catching exceptions.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

// ============================================================================
// Database rows (snake_case, as SQLite returns them)
// ============================================================================

export interface CategoryRow {
  id: number;
  guild_id: string;
  name: string;
  description: string | null;
  created_at: number;
}

export interface ArticleRow {
  id: number;
  guild_id: string;
  category_id: number;
  title: string;
  content: string;
  created_by_id: string | null;
  created_by_name: string | null;
  created_at: number;
  updated_at: number;
}

/** Article joined with its category name; the pre-image both backup kinds copy. */
export interface ArticleWithCategoryRow extends ArticleRow {
  category_name: string;
}

/** Columns shared by personal backups and snapshots. */
interface ArticleCopyRow {
  id: number;
  guild_id: string;
  article_id: number | null;
  category_name: string;
  title: string;
  content: string;
  created_by_id: string | null;
  created_by_name: string | null;
  created_at: number | null;
  updated_at: number | null;
}

export interface PersonalBackupRow extends ArticleCopyRow {
  op_type: BackupOpType;
  actor_id: string;
  backed_at: number;
}

export interface SnapshotRow extends ArticleCopyRow {
  snapshot_at: number;
}

// ============================================================================
// Domain records
// ============================================================================

export type BackupOpType = "edit" | "delete";

export interface Category {
  id: number;
  name: string;
  description: string | null;
}

export interface Article {
  id: number;
  guildId: string;
  categoryId: number;
  category: string;
  title: string;
  content: string;
  createdById: string | null;
  createdByName: string | null;
  createdAt: number;
  updatedAt: number;
}

export interface Contributor {
  userId: string;
  count: number;
}

/**
 * Pre-image fields common to both backup kinds. `articleId` is a weak reference:
 * it is nulled when the article is hard-deleted and must never be assumed to resolve.
 */
export interface ArticleCopy {
  id: number;
  guildId: string;
  articleId: number | null;
  category: string;
  title: string;
  content: string;
  createdById: string | null;
  createdByName: string | null;
  createdAt: number | null;
  updatedAt: number | null;
}

export interface PersonalBackup extends ArticleCopy {
  opType: BackupOpType;
  actorId: string;
  backedAt: number;
}

export interface Snapshot extends ArticleCopy {
  snapshotAt: number;
}

export interface BackupSummary {
  id: number;
  opType: BackupOpType;
  category: string;
  title: string;
  backedAt: number;
}

export interface SnapshotSummary {
  id: number;
  snapshotAt: number;
}

export interface SearchHit {
  category: string;
  title: string;
}

export interface ArticleListing {
  id: number;
  title: string;
}

// ============================================================================
// Operation results
// ============================================================================

export type AddCategoryResult = { kind: "ok"; categoryId: number } | { kind: "dup" };

export type RenameCategoryResult = { kind: "ok" } | { kind: "no_old" } | { kind: "dup_new" };

export type DeleteCategoryResult =
  | { kind: "ok"; articlesBackedUp: number }
  | { kind: "no_category" };

export type CreateArticleResult =
  | { kind: "created"; articleId: number; contribCount: number }
  | { kind: "dup" };

export type EditArticleResult =
  | { kind: "ok"; contribCount: number }
  | { kind: "no_category" }
  | { kind: "no_article" }
  | { kind: "dup_title" };

export type DeleteArticleResult = { kind: "ok" } | { kind: "no_category" } | { kind: "no_article" };

export type ViewArticleResult =
  | { kind: "ok"; article: Article; contributors: Contributor[] }
  | { kind: "not_found" };

export type ConflictResult =
  | { kind: "none" }
  | { kind: "edited_by_other"; otherUserId: string }
  | { kind: "deleted_by_other"; otherUserId: string };

export type RestoreResult =
  | { kind: "ok"; articleId: number; mode: "updated" | "inserted"; categoryCreated: boolean }
  | { kind: "not_found" }
  | { kind: "title_taken"; conflictingArticleId: number };

export interface MaintenanceReport {
  snapshotsTaken: number;
  snapshotsExpired: number;
  backupsCompacted: number;
  orphansDeleted: number;
  /** Unix seconds the cycle ran at; becomes last_cleanup_at */
  ranAt: number;
}

export interface MaintenanceStatus {
  lastCleanupAt: number | null;
}
