/**
 * Disk cache for Overpass API responses.
 *
 * Each distinct query text maps to one cache file, so re-running the
 * same area and route types does not hit the public Overpass servers.
 *
 * Cache lives at ~/.transit-map/overpass-cache/.
 */

import { createHash } from "node:crypto";
import { existsSync, mkdirSync, readFileSync, statSync, writeFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";

/** Default cache directory */
export function defaultCacheDir(): string {
  return join(homedir(), ".transit-map", "overpass-cache");
}

/**
 * Deterministic cache key for a query.
 *
 * The key is a 16-char hex hash of the query text, filesystem-safe and
 * collision-free for realistic usage.
 */
export function queryCacheKey(query: string): string {
  return createHash("sha256").update(query).digest("hex").slice(0, 16);
}

/**
 * Get the cache file path for a query.
 */
export function getCachePath(query: string, cacheDir?: string): string {
  const dir = cacheDir ?? defaultCacheDir();
  return join(dir, `${queryCacheKey(query)}.json`);
}

/**
 * Read a cached Overpass response from disk.
 *
 * @returns Parsed JSON on hit, or null on miss/corruption.
 */
export function readCachedResponse(query: string, cacheDir?: string): unknown {
  const filepath = getCachePath(query, cacheDir);

  if (!existsSync(filepath)) return null;

  try {
    const stat = statSync(filepath);
    if (stat.size === 0) return null;

    const raw = readFileSync(filepath, "utf-8");
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch (err) {
    console.warn(`[cache] ignoring unreadable cache file ${filepath}: ${String(err)}`);
    return null;
  }
}

/**
 * Write an Overpass response to the disk cache.
 */
export function writeCachedResponse(
  query: string,
  response: unknown,
  cacheDir?: string
): void {
  const dir = cacheDir ?? defaultCacheDir();
  mkdirSync(dir, { recursive: true });
  writeFileSync(getCachePath(query, dir), JSON.stringify(response));
}
