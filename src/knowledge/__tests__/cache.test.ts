import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { MEMORY_DB, openDb, type Database } from "../../db/db.js";
import { countCacheRows } from "../../db/knowledge_cache.js";
import { migrate } from "../../db/migrate.js";
import { KnowledgeCache, MAX_TTL_SECONDS, MIN_TTL_SECONDS, normalizeKey } from "../cache.js";

describe("normalizeKey", () => {
  it("lowercases and replaces spaces", () => {
    expect(normalizeKey("Framework:React Hooks")).toBe("framework:react_hooks");
  });

  it("hashes long keys", () => {
    expect(normalizeKey("x".repeat(201))).toMatch(/^[0-9a-f]{64}$/);
    expect(normalizeKey("x".repeat(200))).toBe("x".repeat(200));
  });
});

describe("KnowledgeCache", () => {
  let now: number;
  const clock = () => now;

  beforeEach(() => {
    now = 1_700_000_000_000;
  });

  it("expires entries after their TTL", () => {
    const cache = new KnowledgeCache({ now: clock });

    expect(cache.set("docs", { body: "x" }, { ttlSeconds: 600 })).toBe(600);
    expect(cache.get("DOCS")).toEqual({ body: "x" });

    now += 600_001;
    expect(cache.get("docs")).toBeUndefined();
    expect(cache.metrics()).toMatchObject({ hits: 1, misses: 1, totalRequests: 2, hitRate: 50 });
  });

  it("scales TTL by authority, source and popularity within bounds", () => {
    const cache = new KnowledgeCache({ now: clock });

    expect(cache.calculateDynamicTtl(5, "SecurityStandards")).toBe(3600);
    expect(new KnowledgeCache({ defaultTtlSeconds: 100 }).calculateDynamicTtl(5, "unknown")).toBe(MIN_TTL_SECONDS);
    expect(new KnowledgeCache({ defaultTtlSeconds: 86_400 }).calculateDynamicTtl(10, "SecurityStandards")).toBe(
      MAX_TTL_SECONDS
    );

    for (let i = 0; i < 5; i++) cache.set("popular", "v", { ttlSeconds: 60 });
    expect(cache.calculateDynamicTtl(5, "unknown", "popular")).toBe(2700);
  });

  it("evicts the lowest-scoring entry when full", () => {
    const cache = new KnowledgeCache({ now: clock, maxMemoryEntries: 10 });
    cache.set("weak", "v", { ttlSeconds: 600, authorityScore: 1 });
    for (let i = 0; i < 9; i++) cache.set(`k${i}`, i, { ttlSeconds: 600 });

    cache.set("new", "v", { ttlSeconds: 600 });

    expect(cache.get("weak")).toBeUndefined();
    expect(cache.get("k0")).toBe(0);
    expect(cache.metrics()).toMatchObject({ evictions: 1, memoryEntries: 10 });
  });

  it("returns the most specific fallback", () => {
    const cache = new KnowledgeCache({ now: clock });
    cache.set("fallback:generic", "generic", { ttlSeconds: 600 });
    cache.set("fallback:framework_docs:*", "any framework", { ttlSeconds: 600 });

    expect(cache.getFallbackContent("framework_docs", "react")).toBe("any framework");
    expect(cache.getFallbackContent("security_standards", "react")).toBe("generic");
  });

  it("clears by prefix or entirely", () => {
    const cache = new KnowledgeCache({ now: clock });
    cache.set("framework:a", 1, { ttlSeconds: 600 });
    cache.set("framework:b", 2, { ttlSeconds: 600 });
    cache.set("other", 3, { ttlSeconds: 600 });
    cache.get("missing");

    expect(cache.clear("Framework:")).toBe(2);
    expect(cache.get("other")).toBe(3);
    expect(cache.clear()).toBe(1);
    expect(cache.metrics()).toMatchObject({ hits: 0, misses: 0, memoryEntries: 0 });
  });

  it("forgets popularity of deleted, cleared and evicted keys", () => {
    const cache = new KnowledgeCache({ now: clock, maxMemoryEntries: 3 });
    for (let i = 0; i < 5; i++) cache.set("deleted", "v", { ttlSeconds: 600 });
    for (let i = 0; i < 5; i++) cache.set("docs:cleared", "v", { ttlSeconds: 600 });
    cache.set("weak", "v", { ttlSeconds: 600, authorityScore: 0 });
    expect(cache.calculateDynamicTtl(5, "unknown", "deleted")).toBe(2700);

    cache.delete("deleted");
    cache.clear("docs:");
    cache.set("a", 1, { ttlSeconds: 600 });
    cache.set("b", 2, { ttlSeconds: 600 });
    cache.set("c", 3, { ttlSeconds: 600 });

    expect(cache.get("weak")).toBeUndefined();
    for (const key of ["deleted", "docs:cleared", "weak"]) {
      expect(cache.calculateDynamicTtl(5, "unknown", key)).toBe(1800);
    }
  });

  it("removes expired entries", () => {
    const cache = new KnowledgeCache({ now: clock });
    cache.set("a", 1, { ttlSeconds: 300 });
    cache.set("b", 2, { ttlSeconds: 300 });
    cache.set("c", 3, { ttlSeconds: 600 });

    now += 301_000;

    expect(cache.cleanupExpired()).toBe(2);
    expect(cache.get("c")).toBe(3);
  });

  describe("with SQLite", () => {
    let db: Database.Database;

    beforeEach(() => {
      db = openDb(MEMORY_DB);
      migrate(db);
    });

    afterEach(() => {
      if (db.open) db.close();
    });

    it("reads entries written by another instance", () => {
      new KnowledgeCache({ db, now: clock }).set("Docs:React", { content: "x" }, { ttlSeconds: 600, source: "Fake" });

      const reader = new KnowledgeCache({ db, now: clock });

      expect(reader.get("docs:react")).toEqual({ content: "x" });
      expect(reader.metrics()).toMatchObject({ hits: 1, memoryEntries: 1, persistentEntries: 1 });
    });

    it("drops expired rows on read", () => {
      new KnowledgeCache({ db, now: clock }).set("k", "v", { ttlSeconds: 300 });
      now += 300_001;

      expect(new KnowledgeCache({ db, now: clock }).get("k")).toBeUndefined();
      expect(countCacheRows(db)).toBe(0);
    });

    it("clears persisted rows by prefix", () => {
      const cache = new KnowledgeCache({ db, now: clock });
      cache.set("framework:a", 1, { ttlSeconds: 600 });
      cache.set("frameworkx", 2, { ttlSeconds: 600 });
      cache.set("fallback:generic", 3, { ttlSeconds: 600 });

      expect(cache.clear("framework:")).toBe(1);
      expect(countCacheRows(db)).toBe(2);
    });

    it("closes the database", () => {
      new KnowledgeCache({ db, now: clock }).close();
      expect(db.open).toBe(false);
    });
  });
});
