/**
 * Guild Wiki — tests/db/store.test.ts
 * WHAT: WikiStore unit of work, injected clock and close.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

vi.mock("../../src/lib/logger.js", () => ({
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
  redact: (value: string) => value,
}));

import { openDatabase } from "../../src/db/db.js";
import { closeWikiStore, createWikiStore, type WikiStore } from "../../src/db/store.js";

function categoryCount(store: WikiStore): number {
  const row = store.db.prepare(`SELECT COUNT(*) AS n FROM wiki_categories`).get() as { n: number };
  return row.n;
}

function insertCategory(store: WikiStore, name: string): void {
  store.db.prepare(`INSERT INTO wiki_categories (guild_id, name) VALUES ('1', ?)`).run(name);
}

describe("createWikiStore", () => {
  let store: WikiStore;

  beforeEach(() => {
    store = createWikiStore({ db: openDatabase(":memory:"), clock: () => 42 });
  });

  afterEach(() => {
    closeWikiStore(store);
  });

  it("uses the injected clock", () => {
    expect(store.clock()).toBe(42);
  });

  it("commits and returns the callback's value", () => {
    const result = store.unitOfWork(() => {
      insertCategory(store, "Guides");
      return "done";
    });

    expect(result).toBe("done");
    expect(categoryCount(store)).toBe(1);
    expect(store.db.inTransaction).toBe(false);
  });

  it("rolls back everything when the callback throws", () => {
    expect(() =>
      store.unitOfWork(() => {
        insertCategory(store, "Guides");
        throw new Error("boom");
      })
    ).toThrow("boom");

    expect(categoryCount(store)).toBe(0);
  });

  it("runs nested units as savepoints", () => {
    store.unitOfWork(() => {
      insertCategory(store, "Outer");
      expect(() =>
        store.unitOfWork(() => {
          insertCategory(store, "Inner");
          throw new Error("inner failed");
        })
      ).toThrow("inner failed");
    });

    const rows = store.db.prepare(`SELECT name FROM wiki_categories`).all();
    expect(rows).toEqual([{ name: "Outer" }]);
  });

  it("closes once and tolerates a second close", () => {
    closeWikiStore(store);
    expect(store.db.open).toBe(false);
    expect(() => closeWikiStore(store)).not.toThrow();
  });
});
