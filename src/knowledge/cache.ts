import { createHash } from "node:crypto";
import type Database from "better-sqlite3";
import {
  countCacheRows,
  deleteCacheRow,
  deleteExpiredRows,
  deleteRowsByPrefix,
  getCacheRow,
  touchCacheRow,
  upsertCacheRow,
} from "../db/knowledge_cache.js";
import { errorMessage } from "../errors.js";
import { getLogger, type Logger } from "../logger.js";
import type { KnowledgeType } from "./types.js";

export const MIN_TTL_SECONDS = 300;
export const MAX_TTL_SECONDS = 86_400;
export const DEFAULT_TTL_SECONDS = 1800;

const MAX_KEY_LENGTH = 200;
const MAX_MEMORY_ENTRIES = 1000;
const MAX_POPULARITY_BONUS = 0.5;

/** Longer-lived sources get longer TTLs. Matched by substring of the source name. */
const SOURCE_TTL_MULTIPLIERS: ReadonlyArray<[string, number]> = [
  ["Context7", 1.2],
  ["DeepWiki", 1.0],
  ["GitHub", 0.8],
  ["SecurityStandards", 2.0],
];

interface CacheEntry {
  value: unknown;
  createdAt: number;
  lastAccessed: number;
  accessCount: number;
  ttlSeconds: number;
  authorityScore: number;
  source: string;
  sizeBytes: number;
}

export interface CacheSetOpts {
  /** Fixed TTL; computed from authority, source and popularity when omitted */
  ttlSeconds?: number;
  authorityScore?: number;
  source?: string;
}

export interface CacheMetrics {
  hits: number;
  misses: number;
  evictions: number;
  totalRequests: number;
  /** Percentage, 0-100 */
  hitRate: number;
  memoryEntries: number;
  persistentEntries: number;
}

export interface KnowledgeCacheOpts {
  /** Migrated database for the persistent layer, closed by close(); memory only when omitted */
  db?: Database.Database;
  maxMemoryEntries?: number;
  defaultTtlSeconds?: number;
  now?: () => number;
  logger?: Logger;
}

export function normalizeKey(key: string): string {
  if (key.length > MAX_KEY_LENGTH) {
    return createHash("sha256").update(key).digest("hex");
  }
  return key.toLowerCase().replace(/ /g, "_");
}

export function fallbackKeys(type: KnowledgeType | string, framework?: string): string[] {
  return [
    `fallback:${type}:${framework ?? ""}`,
    `fallback:${type}:*`,
    `fallback:*:${framework ?? ""}`,
    "fallback:generic",
  ];
}

function isExpired(entry: Pick<CacheEntry, "createdAt" | "ttlSeconds">, now: number): boolean {
  return now > entry.createdAt + entry.ttlSeconds * 1000;
}

/**
 * Two-layer cache for external knowledge: a bounded in-memory map in front
 * of the `knowledge_cache` SQLite table. Values must be JSON-serializable.
 */
export class KnowledgeCache {
  private memory = new Map<string, CacheEntry>();
  private popularity = new Map<string, number>();
  private hits = 0;
  private misses = 0;
  private evictions = 0;
  private db: Database.Database | null;
  private maxMemoryEntries: number;
  private defaultTtlSeconds: number;
  private now: () => number;
  private logger: Logger;

  constructor(opts: KnowledgeCacheOpts = {}) {
    this.db = opts.db ?? null;
    this.maxMemoryEntries = opts.maxMemoryEntries ?? MAX_MEMORY_ENTRIES;
    this.defaultTtlSeconds = opts.defaultTtlSeconds ?? DEFAULT_TTL_SECONDS;
    this.now = opts.now ?? Date.now;
    this.logger = (opts.logger ?? getLogger()).child({ component: "knowledge-cache" });
  }

  get(key: string): unknown {
    const cacheKey = normalizeKey(key);
    const now = this.now();

    const entry = this.memory.get(cacheKey);
    if (entry) {
      if (!isExpired(entry, now)) {
        this.recordAccess(cacheKey, entry, now);
        this.hits++;
        return entry.value;
      }
      this.memory.delete(cacheKey);
    }

    const persisted = this.readPersisted(cacheKey, now);
    if (persisted !== undefined) {
      this.ensureCapacity();
      this.memory.set(cacheKey, persisted);
      this.recordAccess(cacheKey, persisted, now);
      this.hits++;
      return persisted.value;
    }

    this.misses++;
    return undefined;
  }

  set(key: string, value: unknown, opts: CacheSetOpts = {}): number {
    const cacheKey = normalizeKey(key);
    const authorityScore = opts.authorityScore ?? 8.0;
    const source = opts.source ?? "unknown";
    const ttlSeconds = opts.ttlSeconds ?? this.calculateDynamicTtl(authorityScore, source, cacheKey);
    const now = this.now();
    const content = JSON.stringify(value);

    const entry: CacheEntry = {
      value,
      createdAt: now,
      lastAccessed: now,
      accessCount: 1,
      ttlSeconds,
      authorityScore,
      source,
      sizeBytes: Buffer.byteLength(content, "utf-8"),
    };

    if (!this.memory.has(cacheKey)) this.ensureCapacity();
    this.memory.set(cacheKey, entry);
    this.popularity.set(cacheKey, (this.popularity.get(cacheKey) ?? 0) + 1);

    if (this.db) {
      upsertCacheRow(this.db, {
        key: cacheKey,
        content,
        source,
        authority_score: authorityScore,
        ttl_seconds: ttlSeconds,
        created_at: now,
        last_accessed: now,
        access_count: 1,
      });
    }

    return ttlSeconds;
  }

  /**
   * base TTL x authority multiplier (0.5-1.5 over scores 0-10) x source
   * multiplier x popularity bonus, clamped to [MIN_TTL_SECONDS, MAX_TTL_SECONDS].
   */
  calculateDynamicTtl(authorityScore: number, source: string, key?: string): number {
    const authorityMultiplier = 1.0 + (authorityScore - 5.0) / 10.0;
    const sourceMultiplier = SOURCE_TTL_MULTIPLIERS.find(([name]) => source.includes(name))?.[1] ?? 1.0;
    const popularity = key === undefined ? 0 : (this.popularity.get(normalizeKey(key)) ?? 0);
    const popularityMultiplier = 1.0 + Math.min(popularity / 10.0, MAX_POPULARITY_BONUS);

    const ttl = Math.floor(this.defaultTtlSeconds * authorityMultiplier * sourceMultiplier * popularityMultiplier);
    return Math.max(MIN_TTL_SECONDS, Math.min(ttl, MAX_TTL_SECONDS));
  }

  /** First string stored under a fallback key, most specific first. */
  getFallbackContent(type: KnowledgeType | string, framework?: string): string | undefined {
    for (const key of fallbackKeys(type, framework)) {
      const value = this.get(key);
      if (typeof value === "string" && value.length > 0) {
        this.logger.info({ key }, "Using fallback content");
        return value;
      }
    }
    return undefined;
  }

  delete(key: string): boolean {
    const cacheKey = normalizeKey(key);
    const inMemory = this.memory.delete(cacheKey);
    this.popularity.delete(cacheKey);
    const persisted = this.db ? deleteCacheRow(this.db, cacheKey) : false;
    return inMemory || persisted;
  }

  /** Drop entries whose key starts with `prefix`, or everything (and the metrics). */
  clear(prefix?: string): number {
    let removed = 0;

    if (prefix === undefined) {
      removed = this.memory.size;
      this.memory.clear();
      this.popularity.clear();
      this.hits = 0;
      this.misses = 0;
      this.evictions = 0;
    } else {
      const normalized = normalizeKey(prefix);
      for (const key of [...this.memory.keys()]) {
        if (key.startsWith(normalized)) {
          this.memory.delete(key);
          removed++;
        }
      }
      for (const key of [...this.popularity.keys()]) {
        if (key.startsWith(normalized)) this.popularity.delete(key);
      }
    }

    if (this.db) {
      removed = Math.max(removed, deleteRowsByPrefix(this.db, prefix === undefined ? undefined : normalizeKey(prefix)));
    }

    this.logger.info({ prefix, removed }, "Cleared knowledge cache");
    return removed;
  }

  cleanupExpired(): number {
    const now = this.now();
    let removed = 0;
    for (const [key, entry] of [...this.memory.entries()]) {
      if (isExpired(entry, now)) {
        this.memory.delete(key);
        removed++;
      }
    }
    if (this.db) removed = Math.max(removed, deleteExpiredRows(this.db, now));
    return removed;
  }

  metrics(): CacheMetrics {
    const totalRequests = this.hits + this.misses;
    return {
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      totalRequests,
      hitRate: totalRequests === 0 ? 0 : (this.hits / totalRequests) * 100,
      memoryEntries: this.memory.size,
      persistentEntries: this.db ? countCacheRows(this.db) : 0,
    };
  }

  close(): void {
    this.db?.close();
    this.db = null;
  }

  private readPersisted(cacheKey: string, now: number): CacheEntry | undefined {
    if (!this.db) return undefined;
    const row = getCacheRow(this.db, cacheKey);
    if (!row) return undefined;

    if (isExpired({ createdAt: row.created_at, ttlSeconds: row.ttl_seconds }, now)) {
      deleteCacheRow(this.db, cacheKey);
      return undefined;
    }

    let value: unknown;
    try {
      value = JSON.parse(row.content);
    } catch (err) {
      this.logger.warn({ key: cacheKey, err: errorMessage(err) }, "Dropping unreadable cache row");
      deleteCacheRow(this.db, cacheKey);
      return undefined;
    }

    touchCacheRow(this.db, cacheKey, now);
    return {
      value,
      createdAt: row.created_at,
      lastAccessed: row.last_accessed,
      accessCount: row.access_count,
      ttlSeconds: row.ttl_seconds,
      authorityScore: row.authority_score,
      source: row.source,
      sizeBytes: Buffer.byteLength(row.content, "utf-8"),
    };
  }

  private recordAccess(cacheKey: string, entry: CacheEntry, now: number): void {
    entry.lastAccessed = now;
    entry.accessCount++;
    this.popularity.set(cacheKey, (this.popularity.get(cacheKey) ?? 0) + 1);
  }

  /** Evict the lowest-scoring tenth of the memory layer when it is full. */
  private ensureCapacity(): void {
    if (this.memory.size < this.maxMemoryEntries) return;

    const now = this.now();
    const scored = [...this.memory.entries()]
      .map(([key, entry]) => ({ key, score: this.evictionScore(entry, now) }))
      .sort((a, b) => a.score - b.score);

    const count = Math.max(1, Math.floor(scored.length / 10));
    for (const { key } of scored.slice(0, count)) {
      this.memory.delete(key);
      this.popularity.delete(key);
      this.evictions++;
    }
  }

  /** Lower scores are evicted first. */
  private evictionScore(entry: CacheEntry, now: number): number {
    const ageHours = (now - entry.lastAccessed) / 3_600_000;
    const recency = Math.max(0, 10 - ageHours);
    const frequency = Math.min(entry.accessCount, 10);
    const sizePenalty = Math.min(entry.sizeBytes / (1024 * 1024), 5);
    return Math.max(0, recency * 0.3 + frequency * 0.3 + entry.authorityScore * 0.3 - sizePenalty * 0.1);
  }
}
