/**
 * Overpass API query construction and execution.
 *
 * Generates Overpass QL queries for transit route relations and fetches
 * results via the overpass-ts client.
 */

import { overpassJson } from "overpass-ts";
import type { OverpassOptions as OverpassTsOptions } from "overpass-ts";
import type { TransitRouteType } from "../osm/types.js";
import { readCachedResponse, writeCachedResponse } from "./cache.js";

/** What to query for */
export interface TransitQueryOptions {
  /** Name of the area to search, matched against the area's name tag */
  area: string;
  /** route=* values to select, e.g. ["subway"] */
  routeTypes: readonly TransitRouteType[];
  /** Query timeout in seconds (default: 90) */
  timeout?: number;
}

/** Result from fetchOverpassData */
export interface OverpassResult {
  /** Raw Overpass JSON; validated later by parseOverpassResponse() */
  data: unknown;
  /** Whether the response came from the disk cache */
  fromCache: boolean;
}

/** Options for Overpass API requests */
export interface OverpassOptions {
  /** Overpass API endpoint URL (for self-hosted instances) */
  endpoint?: string;
  /** User-agent string */
  userAgent?: string;
  /** Bypass cache read (still writes to cache) */
  force?: boolean;
  /** Override the cache directory (default: ~/.transit-map/overpass-cache/) */
  cacheDir?: string;
  /** Disable caching entirely (no read or write) */
  noCache?: boolean;
}

export const DEFAULT_ENDPOINT = "https://lz4.overpass-api.de/api/interpreter";
export const DEFAULT_TIMEOUT = 90;

/** Escape a value for use inside a double-quoted Overpass QL string */
function quoteValue(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/"/g, '\\"');
}

/**
 * Build an Overpass QL query for transit routes within a named area.
 *
 * Fetches:
 * - Route relations whose route tag matches one of the route types
 * - Everything those relations reference (`>;`), so stop nodes come
 *   back with coordinates and tags
 *
 * @returns Overpass QL query string
 */
export function buildTransitQuery(options: TransitQueryOptions): string {
  if (options.routeTypes.length === 0) {
    throw new Error("At least one route type is required");
  }
  const timeout = options.timeout ?? DEFAULT_TIMEOUT;
  const routeRegex = options.routeTypes.join("|");

  return `[out:json][timeout:${timeout}];
area[name="${quoteValue(options.area)}"]->.searchArea;
relation["route"~"${routeRegex}"](area.searchArea);
out meta;
>;
out body;`;
}

/**
 * Run an Overpass query, going through the disk cache.
 *
 * Cache entries are keyed by the query text, so any change to the area,
 * route types or timeout results in a fresh fetch.
 *
 * @param query - Overpass QL query, e.g. from buildTransitQuery()
 * @param options - API and cache options
 */
export async function fetchOverpassData(
  query: string,
  options?: OverpassOptions
): Promise<OverpassResult> {
  const useCache = !options?.noCache;

  if (useCache && !options?.force) {
    const cached = readCachedResponse(query, options?.cacheDir);
    if (cached !== null) {
      console.log("[cache] using cached Overpass response");
      return { data: cached, fromCache: true };
    }
  }

  const overpassOpts: Partial<OverpassTsOptions> = {
    endpoint: options?.endpoint ?? DEFAULT_ENDPOINT,
  };
  if (options?.userAgent) {
    overpassOpts.userAgent = options.userAgent;
  }

  console.log(`[overpass] querying ${overpassOpts.endpoint}`);
  const data = await overpassJson(query, overpassOpts);

  if (useCache) {
    writeCachedResponse(query, data, options?.cacheDir);
  }

  return { data, fromCache: false };
}
