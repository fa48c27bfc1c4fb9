/**
 * Guild Wiki — src/features/wiki/articles.ts
 * WHAT: Article create/edit/delete/view/search with contributor counters.
 * WHY: Each mutation is one unit of work: read current state → capture backup → write → count.
 * FLOWS:
 *  - createArticle → insert-only (dup on collision) → contributor count = 1
 *  - editArticle → backup(edit) → UPDATE title/content/updated_at → contributor +1
 *  - deleteArticle → backup(delete) → DELETE (contributors cascade, backups keep a null article_id)
 *  - viewArticle / searchArticles / listArticlesInCategory → reads, no transaction
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { Db } from "../../db/db.js";
import type { WikiStore } from "../../db/store.js";
import { logger, redact } from "../../lib/logger.js";
import { captureBackup } from "./backups.js";
import { findCategoryId } from "./categories.js";
import type {
  ArticleListing,
  ArticleRow,
  ArticleWithCategoryRow,
  Contributor,
  CreateArticleResult,
  DeleteArticleResult,
  EditArticleResult,
  SearchHit,
  ViewArticleResult,
} from "./types.js";
import {
  validateCategoryName,
  validateContent,
  validateLimit,
  validateQuery,
  validateSnowflake,
  validateTitle,
} from "./validation.js";

export const DEFAULT_SEARCH_LIMIT = 10;

/**
 * Creation is the one operation that throws on a missing category: the caller picked the
 * category from a list, so a miss means it was deleted in between.
 */
export class CategoryNotFoundError extends Error {
  constructor(
    public readonly guildId: string,
    public readonly category: string
  ) {
    super(`Category "${category}" does not exist`);
    this.name = "CategoryNotFoundError";
  }
}

function findArticleId(db: Db, guildId: string, categoryId: number, title: string): number | null {
  const row = db
    .prepare(`SELECT id FROM wiki_articles WHERE guild_id = ? AND category_id = ? AND title = ?`)
    .get(guildId, categoryId, title) as { id: number } | undefined;
  return row ? row.id : null;
}

/** Increment-or-insert-at-1, then read back the new count. */
function bumpContributor(db: Db, articleId: number, userId: string): number {
  db.prepare(
    `INSERT INTO wiki_contributors (article_id, user_id, count)
     VALUES (?, ?, 1)
     ON CONFLICT (article_id, user_id) DO UPDATE SET count = count + 1`
  ).run(articleId, userId);

  const row = db
    .prepare(`SELECT count FROM wiki_contributors WHERE article_id = ? AND user_id = ?`)
    .get(articleId, userId) as { count: number } | undefined;
  return row ? row.count : 1;
}

export function createArticle(
  store: WikiStore,
  guildId: string,
  category: string,
  title: string,
  content: string,
  userId: string,
  userName: string
): CreateArticleResult {
  validateSnowflake(guildId, "guildId");
  validateSnowflake(userId, "userId");
  const cleanCategory = validateCategoryName(category);
  const cleanTitle = validateTitle(title);
  const cleanContent = validateContent(content);

  return store.unitOfWork((db): CreateArticleResult => {
    const categoryId = findCategoryId(db, guildId, cleanCategory);
    if (categoryId === null) {
      throw new CategoryNotFoundError(guildId, cleanCategory);
    }

    if (findArticleId(db, guildId, categoryId, cleanTitle) !== null) {
      return { kind: "dup" };
    }

    const now = store.clock();
    const info = db
      .prepare(
        `INSERT INTO wiki_articles
           (guild_id, category_id, title, content, created_by_id, created_by_name, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(guildId, categoryId, cleanTitle, cleanContent, userId, userName, now, now);
    const articleId = Number(info.lastInsertRowid);

    const contribCount = bumpContributor(db, articleId, userId);

    logger.info(
      { guildId, articleId, userId, title: redact(cleanTitle) },
      "[wiki:articles] created"
    );
    return { kind: "created", articleId, contribCount };
  });
}

/**
 * @returns the editor's contribution count on this article after the edit
 */
export function editArticle(
  store: WikiStore,
  guildId: string,
  category: string,
  oldTitle: string,
  newTitle: string,
  newContent: string,
  userId: string
): EditArticleResult {
  validateSnowflake(guildId, "guildId");
  validateSnowflake(userId, "userId");
  const cleanCategory = validateCategoryName(category);
  const cleanOld = validateTitle(oldTitle, "oldTitle");
  const cleanNew = validateTitle(newTitle, "newTitle");
  const cleanContent = validateContent(newContent);

  return store.unitOfWork((db): EditArticleResult => {
    const categoryId = findCategoryId(db, guildId, cleanCategory);
    if (categoryId === null) return { kind: "no_category" };

    const articleId = findArticleId(db, guildId, categoryId, cleanOld);
    if (articleId === null) return { kind: "no_article" };

    if (cleanNew !== cleanOld && findArticleId(db, guildId, categoryId, cleanNew) !== null) {
      return { kind: "dup_title" };
    }

    const now = store.clock();
    captureBackup(db, articleId, "edit", userId, now);

    db.prepare(`UPDATE wiki_articles SET title = ?, content = ?, updated_at = ? WHERE id = ?`).run(
      cleanNew,
      cleanContent,
      now,
      articleId
    );

    const contribCount = bumpContributor(db, articleId, userId);

    logger.info(
      { guildId, articleId, userId, renamed: cleanNew !== cleanOld, contribCount },
      "[wiki:articles] edited"
    );
    return { kind: "ok", contribCount };
  });
}

export function deleteArticle(
  store: WikiStore,
  guildId: string,
  category: string,
  title: string,
  actorId: string
): DeleteArticleResult {
  validateSnowflake(guildId, "guildId");
  validateSnowflake(actorId, "actorId");
  const cleanCategory = validateCategoryName(category);
  const cleanTitle = validateTitle(title);

  return store.unitOfWork((db): DeleteArticleResult => {
    const categoryId = findCategoryId(db, guildId, cleanCategory);
    if (categoryId === null) return { kind: "no_category" };

    const articleId = findArticleId(db, guildId, categoryId, cleanTitle);
    if (articleId === null) return { kind: "no_article" };

    captureBackup(db, articleId, "delete", actorId, store.clock());
    db.prepare(`DELETE FROM wiki_articles WHERE id = ?`).run(articleId);

    logger.info({ guildId, articleId, actorId }, "[wiki:articles] deleted");
    return { kind: "ok" };
  });
}

export function viewArticle(
  store: WikiStore,
  guildId: string,
  category: string,
  title: string
): ViewArticleResult {
  validateSnowflake(guildId, "guildId");
  const cleanCategory = validateCategoryName(category);
  const cleanTitle = validateTitle(title);

  const row = store.db
    .prepare(
      `SELECT a.*, c.name AS category_name
       FROM wiki_articles a
       JOIN wiki_categories c ON c.id = a.category_id
       WHERE a.guild_id = ? AND c.name = ? AND a.title = ?`
    )
    .get(guildId, cleanCategory, cleanTitle) as ArticleWithCategoryRow | undefined;
  if (!row) return { kind: "not_found" };

  const contributors = store.db
    .prepare(
      `SELECT user_id, count
       FROM wiki_contributors
       WHERE article_id = ?
       ORDER BY count DESC, user_id`
    )
    .all(row.id) as Array<{ user_id: string; count: number }>;

  return {
    kind: "ok",
    article: {
      id: row.id,
      guildId: row.guild_id,
      categoryId: row.category_id,
      category: row.category_name,
      title: row.title,
      content: row.content,
      createdById: row.created_by_id,
      createdByName: row.created_by_name,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    },
    contributors: contributors.map((c): Contributor => ({ userId: c.user_id, count: c.count })),
  };
}

/** Escape LIKE wildcards so user input matches literally under ESCAPE '\'. */
export function escapeLike(query: string): string {
  return query.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

/**
 * Case-insensitive substring match over category name, title and content, newest first.
 * Both sides go through wiki_fold so non-ASCII letters match regardless of case.
 */
export function searchArticles(
  store: WikiStore,
  guildId: string,
  query: string,
  limit = DEFAULT_SEARCH_LIMIT
): SearchHit[] {
  validateSnowflake(guildId, "guildId");
  const cleanQuery = validateQuery(query);
  validateLimit(limit);

  const pattern = `%${escapeLike(cleanQuery)}%`;
  const rows = store.db
    .prepare(
      `SELECT c.name AS category, a.title
       FROM wiki_articles a
       JOIN wiki_categories c ON c.id = a.category_id
       WHERE a.guild_id = @guildId
         AND (wiki_fold(c.name) LIKE wiki_fold(@pattern) ESCAPE '\\'
              OR wiki_fold(a.title) LIKE wiki_fold(@pattern) ESCAPE '\\'
              OR wiki_fold(a.content) LIKE wiki_fold(@pattern) ESCAPE '\\')
       ORDER BY a.id DESC
       LIMIT @limit`
    )
    .all({ guildId, pattern, limit }) as SearchHit[];

  logger.debug({ guildId, query: redact(cleanQuery), hits: rows.length }, "[wiki:articles] search");
  return rows;
}

/** Picker data: every article in a category, by title. Unknown category → empty. */
export function listArticlesInCategory(
  store: WikiStore,
  guildId: string,
  category: string
): ArticleListing[] {
  validateSnowflake(guildId, "guildId");
  const cleanCategory = validateCategoryName(category);

  return store.db
    .prepare(
      `SELECT a.id, a.title
       FROM wiki_articles a
       JOIN wiki_categories c ON c.id = a.category_id
       WHERE a.guild_id = ? AND c.name = ?
       ORDER BY a.title`
    )
    .all(guildId, cleanCategory) as Array<Pick<ArticleRow, "id" | "title">>;
}
