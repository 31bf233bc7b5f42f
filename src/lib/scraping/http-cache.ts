import { createHash } from "crypto";
import { config } from "../config";
import { getDb } from "../db";

const TRACKING_PARAM_RE = /^(?:utm_\w+|gclid|fbclid|_ga)$/i;

/**
 * Cache key for a page URL. Listing links carry campaign parameters and
 * fragments that don't change the product page, so those are dropped and
 * the remaining query is sorted.
 */
export function cacheKey(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return url;
  }
  parsed.hash = "";
  for (const name of [...parsed.searchParams.keys()]) {
    if (TRACKING_PARAM_RE.test(name)) parsed.searchParams.delete(name);
  }
  parsed.searchParams.sort();
  return parsed.toString();
}

function urlHash(url: string): string {
  return createHash("sha256").update(cacheKey(url)).digest("hex");
}

/**
 * Return cached body if a non-expired entry exists, otherwise null.
 * Pass ttlMs to override the per-entry TTL check (0 = never match).
 */
export function getHttpCache(url: string, ttlMs?: number): string | null {
  const ttl = ttlMs ?? config.httpCacheTtlMs;
  if (ttl === 0) return null;

  const db = getDb();
  const row = db
    .prepare("SELECT body, fetched_at, ttl_ms FROM http_cache WHERE url_hash = ?")
    .get(urlHash(url)) as { body: string; fetched_at: number; ttl_ms: number } | undefined;

  if (!row) return null;

  const age = Date.now() - row.fetched_at;
  if (age > Math.min(ttl, row.ttl_ms)) return null;

  console.log(`[cache] hit ${url}`);
  return row.body;
}

export function setHttpCache(url: string, body: string, options?: { ttlMs?: number }): void {
  const ttlMs = options?.ttlMs || config.httpCacheTtlMs;
  const db = getDb();
  db.prepare(
    `INSERT OR REPLACE INTO http_cache (url_hash, url, body, fetched_at, ttl_ms)
     VALUES (?, ?, ?, ?, ?)`
  ).run(urlHash(url), cacheKey(url), body, Date.now(), ttlMs);
}

/**
 * Delete all expired entries. Returns the number of rows deleted.
 */
export function pruneHttpCache(): number {
  const db = getDb();
  const result = db
    .prepare("DELETE FROM http_cache WHERE fetched_at + ttl_ms < ?")
    .run(Date.now());
  if (result.changes > 0) {
    console.log(`[cache] pruned ${result.changes} expired entries`);
  }
  return result.changes;
}
