import type Database from "better-sqlite3";

export interface KnowledgeCacheRow {
  key: string;
  content: string;
  source: string;
  authority_score: number;
  ttl_seconds: number;
  created_at: number;
  last_accessed: number;
  access_count: number;
}

export function upsertCacheRow(db: Database.Database, row: KnowledgeCacheRow): void {
  db.prepare(`
    INSERT INTO knowledge_cache
      (key, content, source, authority_score, ttl_seconds, created_at, last_accessed, access_count)
    VALUES (@key, @content, @source, @authority_score, @ttl_seconds, @created_at, @last_accessed, @access_count)
    ON CONFLICT(key) DO UPDATE SET
      content = excluded.content,
      source = excluded.source,
      authority_score = excluded.authority_score,
      ttl_seconds = excluded.ttl_seconds,
      created_at = excluded.created_at,
      last_accessed = excluded.last_accessed,
      access_count = excluded.access_count
  `).run(row);
}

export function getCacheRow(db: Database.Database, key: string): KnowledgeCacheRow | null {
  const row = db
    .prepare<[string], KnowledgeCacheRow>(`SELECT * FROM knowledge_cache WHERE key = ?`)
    .get(key);
  return row ?? null;
}

export function touchCacheRow(db: Database.Database, key: string, accessedAt: number): void {
  db.prepare(`
    UPDATE knowledge_cache
    SET last_accessed = ?, access_count = access_count + 1
    WHERE key = ?
  `).run(accessedAt, key);
}

export function deleteCacheRow(db: Database.Database, key: string): boolean {
  const result = db.prepare(`DELETE FROM knowledge_cache WHERE key = ?`).run(key);
  return result.changes > 0;
}

/** Remove rows whose TTL has passed at `now` (epoch ms). */
export function deleteExpiredRows(db: Database.Database, now: number): number {
  const result = db
    .prepare(`DELETE FROM knowledge_cache WHERE created_at + ttl_seconds * 1000 < ?`)
    .run(now);
  return result.changes;
}

export function deleteRowsByPrefix(db: Database.Database, prefix?: string): number {
  if (prefix === undefined) {
    return db.prepare(`DELETE FROM knowledge_cache`).run().changes;
  }
  const escaped = prefix.replace(/[\\%_]/g, (c) => `\\${c}`);
  return db.prepare(`DELETE FROM knowledge_cache WHERE key LIKE ? ESCAPE '\\'`).run(`${escaped}%`).changes;
}

export function countCacheRows(db: Database.Database): number {
  const row = db.prepare<[], { count: number }>(`SELECT COUNT(*) AS count FROM knowledge_cache`).get();
  return row?.count ?? 0;
}
