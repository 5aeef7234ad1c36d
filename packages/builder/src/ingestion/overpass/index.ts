/**
 * Overpass API ingestion module.
 *
 * Queries the Overpass API for transit route relations in a named area
 * and turns the response into OSM elements.
 */

export {
  buildTransitQuery,
  fetchOverpassData,
  DEFAULT_ENDPOINT,
  DEFAULT_TIMEOUT,
  type TransitQueryOptions,
  type OverpassOptions,
  type OverpassResult,
} from "./query.js";
export {
  parseOverpassResponse,
  InvalidPayloadError,
  type ParseResult,
} from "./parser.js";
export {
  defaultCacheDir,
  queryCacheKey,
  getCachePath,
  readCachedResponse,
  writeCachedResponse,
} from "./cache.js";
