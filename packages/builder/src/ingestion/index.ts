/**
 * Data ingestion module.
 *
 * Responsible for building the stop graph from Overpass data.
 *
 * Pipeline:
 * Overpass API (or a saved response) -> OSM elements -> routes + nodes -> StopGraph
 */

import type { StopGraph } from "@transit-map/types";
import {
  buildStopGraph,
  extractNodeElements,
  extractRouteElements,
} from "../transit/index.js";
import type { StopGraphBuildStats, StopGraphOptions } from "../transit/index.js";
import {
  buildTransitQuery,
  fetchOverpassData,
  parseOverpassResponse,
} from "./overpass/index.js";
import type { OverpassOptions, TransitQueryOptions } from "./overpass/index.js";

/** Options for the full ingestion pipeline */
export interface IngestionOptions extends TransitQueryOptions {
  /** Overpass API and cache options */
  overpass?: OverpassOptions;
  /** Stop graph builder options */
  graph?: StopGraphOptions;
}

/** Statistics about a payload -> graph conversion */
export interface PayloadStats extends StopGraphBuildStats {
  /** Elements accepted by the parser */
  elementsCount: number;
  /** Elements the parser dropped as invalid or unsupported */
  droppedElementsCount: number;
  /** Number of node elements available for stop lookup */
  nodeElementsCount: number;
}

/** Result of building a graph from a payload */
export interface PayloadResult {
  graph: StopGraph;
  stats: PayloadStats;
}

/** Result of ingestion */
export interface IngestionResult {
  graph: StopGraph;
  /** The Overpass QL query that was run */
  query: string;
  stats: PayloadStats & {
    /** Whether the Overpass response came from the disk cache */
    fromCache: boolean;
    ingestionTimeMs: number;
  };
}

/**
 * Build a stop graph from a deserialized Overpass response.
 *
 * The payload can come from anywhere (API, cache, file) as long as it has
 * the `{ elements: [...] }` shape.
 *
 * @throws InvalidPayloadError if the payload has no `elements` array
 */
export function buildStopGraphFromPayload(
  payload: unknown,
  options?: StopGraphOptions
): PayloadResult {
  const { elements, droppedCount } = parseOverpassResponse(payload);

  const routes = extractRouteElements(elements);
  const nodes = extractNodeElements(elements);
  const { graph, stats } = buildStopGraph(routes, nodes, options);

  return {
    graph,
    stats: {
      ...stats,
      elementsCount: elements.length,
      droppedElementsCount: droppedCount,
      nodeElementsCount: nodes.size,
    },
  };
}

/**
 * Ingest transit routes for a named area from the Overpass API.
 *
 * Fetch failures from the Overpass client propagate unchanged.
 *
 * @returns The stop graph, the query that produced it and statistics
 */
export async function ingestTransitRoutes(
  options: IngestionOptions
): Promise<IngestionResult> {
  const startTime = Date.now();

  const query = buildTransitQuery(options);
  const { data, fromCache } = await fetchOverpassData(query, options.overpass);
  const { graph, stats } = buildStopGraphFromPayload(data, options.graph);

  return {
    graph,
    query,
    stats: {
      ...stats,
      fromCache,
      ingestionTimeMs: Date.now() - startTime,
    },
  };
}
