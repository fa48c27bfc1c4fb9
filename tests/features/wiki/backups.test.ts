/**
 * Guild Wiki — tests/features/wiki/backups.test.ts
 * WHAT: Backup capture, per-actor retention, listing/gating and conflict detection.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

vi.mock("../../../src/lib/logger.js", () => ({
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
  redact: (value: string) => value,
}));

import { deleteArticle, editArticle } from "../../../src/features/wiki/articles.js";
import {
  BACKUPS_PER_ACTOR,
  captureBackup,
  checkConflict,
  getBackup,
  listRecentBackups,
} from "../../../src/features/wiki/backups.js";
import { runMaintenanceCycle } from "../../../src/features/wiki/maintenance.js";
import {
  backupContents,
  countRows,
  createTestStore,
  seedArticle,
  GUILD_ID,
  OTHER_GUILD_ID,
  T0,
  USER_A,
  USER_B,
  USER_C,
  type TestStoreContext,
} from "../../utils/dbFixtures.js";

describe("wiki backups", () => {
  let ctx: TestStoreContext;

  beforeEach(() => {
    ctx = createTestStore();
  });

  afterEach(() => {
    ctx.cleanup();
  });

  function edit(content: string, actor: string, title = "Setup"): void {
    const result = editArticle(ctx.store, GUILD_ID, "Guides", title, title, content, actor);
    if (result.kind !== "ok") throw new Error(`edit failed: ${result.kind}`);
  }

  /** id of the actor's newest backup */
  function latestBackupId(actor: string): number {
    const [latest] = listRecentBackups(ctx.store, GUILD_ID, actor, 1);
    if (!latest) throw new Error("no backup");
    return latest.id;
  }

  describe("captureBackup", () => {
    it("is a no-op for an article that no longer exists", () => {
      const id = ctx.store.unitOfWork((db) => captureBackup(db, 999, "edit", USER_A, T0));

      expect(id).toBeNull();
      expect(countRows(ctx.store, "wiki_article_backups")).toBe(0);
    });

    it("copies the joined article state", () => {
      const articleId = seedArticle(ctx.store, {
        category: "Guides",
        title: "Setup",
        content: "v1",
        userName: "alice",
      });

      const id = ctx.store.unitOfWork((db) => captureBackup(db, articleId, "edit", USER_B, T0 + 5));

      expect(id).not.toBeNull();
      expect(getBackup(ctx.store, id ?? 0)).toEqual({
        id,
        guildId: GUILD_ID,
        articleId,
        category: "Guides",
        title: "Setup",
        content: "v1",
        createdById: USER_A,
        createdByName: "alice",
        createdAt: T0,
        updatedAt: T0,
        opType: "edit",
        actorId: USER_B,
        backedAt: T0 + 5,
      });
    });
  });

  describe("retention", () => {
    it("keeps only the newest five per actor", () => {
      seedArticle(ctx.store, { category: "Guides", title: "Setup", content: "v0" });
      for (let i = 1; i <= 7; i++) {
        ctx.clock.advance(10);
        edit(`v${i}`, USER_A);
      }

      expect(BACKUPS_PER_ACTOR).toBe(5);
      expect(backupContents(ctx.store, USER_A)).toEqual(["v6", "v5", "v4", "v3", "v2"]);
    });

    it("breaks same-second ties by insertion order", () => {
      seedArticle(ctx.store, { category: "Guides", title: "Setup", content: "v0" });
      for (let i = 1; i <= 6; i++) {
        edit(`v${i}`, USER_A);
      }

      expect(backupContents(ctx.store, USER_A)).toEqual(["v5", "v4", "v3", "v2", "v1"]);
    });

    it("counts across articles but never touches another actor's quota", () => {
      seedArticle(ctx.store, { category: "Guides", title: "Setup", content: "s0" });
      seedArticle(ctx.store, { category: "Guides", title: "Usage", content: "u0" });
      edit("s-by-b", USER_B);

      for (let i = 1; i <= 3; i++) {
        ctx.clock.advance(1);
        edit(`s${i}`, USER_A);
        ctx.clock.advance(1);
        edit(`u${i}`, USER_A, "Usage");
      }

      expect(backupContents(ctx.store, USER_A)).toEqual(["u2", "s2", "u1", "s1", "u0"]);
      expect(backupContents(ctx.store, USER_B)).toEqual(["s0"]);
    });

    it("keeps a separate quota per guild", () => {
      seedArticle(ctx.store, { category: "Guides", title: "Setup", content: "v0" });
      seedArticle(ctx.store, { guildId: OTHER_GUILD_ID, category: "Guides", title: "Setup", content: "o0" });
      editArticle(ctx.store, OTHER_GUILD_ID, "Guides", "Setup", "Setup", "o1", USER_A);
      for (let i = 1; i <= 6; i++) edit(`v${i}`, USER_A);

      expect(backupContents(ctx.store, USER_A, OTHER_GUILD_ID)).toEqual(["o0"]);
      expect(backupContents(ctx.store, USER_A)).toHaveLength(5);
    });
  });

  describe("listRecentBackups", () => {
    it("lists the actor's backups newest first, five by default", () => {
      seedArticle(ctx.store, { category: "Guides", title: "Setup", content: "v0" });
      edit("v1", USER_A);
      ctx.clock.advance(30);
      deleteArticle(ctx.store, GUILD_ID, "Guides", "Setup", USER_A);

      expect(listRecentBackups(ctx.store, GUILD_ID, USER_A)).toEqual([
        { id: expect.any(Number), opType: "delete", category: "Guides", title: "Setup", backedAt: T0 + 30 },
        { id: expect.any(Number), opType: "edit", category: "Guides", title: "Setup", backedAt: T0 },
      ]);
      expect(listRecentBackups(ctx.store, GUILD_ID, USER_B)).toEqual([]);
    });

    it("hides backups taken at or before the last maintenance run", () => {
      seedArticle(ctx.store, { category: "Guides", title: "Setup", content: "v0" });
      edit("v1", USER_A);
      runMaintenanceCycle(ctx.store); // same second as the backup

      expect(listRecentBackups(ctx.store, GUILD_ID, USER_A)).toEqual([]);

      ctx.clock.advance(1);
      edit("v2", USER_A);

      expect(listRecentBackups(ctx.store, GUILD_ID, USER_A).map((b) => b.backedAt)).toEqual([
        T0 + 1,
      ]);
    });

    it("lists a backup taken in the same second as, but after, the last run", () => {
      seedArticle(ctx.store, { category: "Guides", title: "Setup", content: "v0" });
      edit("v1", USER_A);
      runMaintenanceCycle(ctx.store);

      edit("v2", USER_A);

      expect(backupContents(ctx.store, USER_A)).toEqual(["v1", "v0"]);
      expect(listRecentBackups(ctx.store, GUILD_ID, USER_A)).toEqual([
        { id: expect.any(Number), opType: "edit", category: "Guides", title: "Setup", backedAt: T0 },
      ]);
      const [listed] = listRecentBackups(ctx.store, GUILD_ID, USER_A);
      expect(getBackup(ctx.store, listed?.id ?? 0)?.content).toBe("v1");
    });

    it("falls back to the timestamp when no backup id was recorded", () => {
      seedArticle(ctx.store, { category: "Guides", title: "Setup", content: "v0" });
      edit("v1", USER_A);
      ctx.store.db
        .prepare(`UPDATE wiki_maintenance_meta SET last_cleanup_at = ?, last_cleanup_backup_id = NULL`)
        .run(T0);
      ctx.clock.advance(1);
      edit("v2", USER_A);

      expect(listRecentBackups(ctx.store, GUILD_ID, USER_A).map((b) => b.backedAt)).toEqual([
        T0 + 1,
      ]);
    });
  });

  describe("getBackup", () => {
    it("returns null for unknown ids and for another guild's backup", () => {
      seedArticle(ctx.store, { category: "Guides", title: "Setup", content: "v0" });
      edit("v1", USER_A);
      const id = latestBackupId(USER_A);

      expect(getBackup(ctx.store, id, GUILD_ID)?.content).toBe("v0");
      expect(getBackup(ctx.store, id, OTHER_GUILD_ID)).toBeNull();
      expect(getBackup(ctx.store, id + 100)).toBeNull();
    });
  });

  describe("checkConflict", () => {
    beforeEach(() => {
      seedArticle(ctx.store, { category: "Guides", title: "Setup", content: "v0" });
    });

    it("reports none without later backups", () => {
      edit("v1", USER_A);

      expect(checkConflict(ctx.store, latestBackupId(USER_A))).toEqual({ kind: "none" });
    });

    it("reports a later edit by someone else", () => {
      edit("v1", USER_A);
      const mine = latestBackupId(USER_A);
      ctx.clock.advance(5);
      edit("v2", USER_B);

      expect(checkConflict(ctx.store, mine)).toEqual({
        kind: "edited_by_other",
        otherUserId: USER_B,
      });
    });

    it("orders same-second backups by id", () => {
      edit("v1", USER_A);
      const mine = latestBackupId(USER_A);
      edit("v2", USER_B);

      expect(checkConflict(ctx.store, mine)).toEqual({
        kind: "edited_by_other",
        otherUserId: USER_B,
      });
    });

    it("ignores later mutations by the same actor", () => {
      edit("v1", USER_A);
      const mine = latestBackupId(USER_A);
      ctx.clock.advance(5);
      edit("v2", USER_A);

      expect(checkConflict(ctx.store, mine)).toEqual({ kind: "none" });
    });

    it("looks only at the most recent later backup", () => {
      edit("v1", USER_A);
      const mine = latestBackupId(USER_A);
      ctx.clock.advance(5);
      edit("v2", USER_B);
      ctx.clock.advance(5);
      edit("v3", USER_C);

      expect(checkConflict(ctx.store, mine)).toEqual({
        kind: "edited_by_other",
        otherUserId: USER_C,
      });
    });

    it("matches orphaned backups to later deletes by category and title", () => {
      edit("v1", USER_A);
      const mine = latestBackupId(USER_A);
      ctx.clock.advance(5);
      deleteArticle(ctx.store, GUILD_ID, "Guides", "Setup", USER_B);

      expect(getBackup(ctx.store, mine)?.articleId).toBeNull();
      expect(checkConflict(ctx.store, mine)).toEqual({
        kind: "deleted_by_other",
        otherUserId: USER_B,
      });
    });

    it("reports none for an orphan deleted by its own actor", () => {
      edit("v1", USER_A);
      const mine = latestBackupId(USER_A);
      ctx.clock.advance(5);
      deleteArticle(ctx.store, GUILD_ID, "Guides", "Setup", USER_A);

      // the delete backup is now USER_A's newest; look up the edit backup by id
      expect(checkConflict(ctx.store, mine)).toEqual({ kind: "none" });
    });

    it("reports none for an unknown backup id", () => {
      expect(checkConflict(ctx.store, 12345)).toEqual({ kind: "none" });
    });
  });
});
