/**
 * @transit-map/builder
 *
 * Core logic library for building transit stop graphs from OSM data.
 *
 * Pipeline:
 * 1. Query the Overpass API for route relations in a named area
 * 2. Parse the response into OSM elements
 * 3. Classify elements into routes and a node lookup
 * 4. Build the stop graph
 *
 * Rendering is handled separately by @transit-map/render.
 */

// Ingestion
export {
  ingestTransitRoutes,
  buildStopGraphFromPayload,
  type IngestionOptions,
  type IngestionResult,
  type PayloadResult,
  type PayloadStats,
} from "./ingestion/index.js";

// OSM elements
export {
  extractStopName,
  extractRouteColour,
  extractRouteType,
  isStopMember,
  type OsmNode,
  type OsmWay,
  type OsmRelation,
  type OsmRelationMember,
  type OsmElement,
  type OsmTags,
  type TransitRouteType,
  OsmElementSchema,
  TRANSIT_ROUTE_TYPES,
} from "./ingestion/osm/index.js";

// Overpass API
export {
  buildTransitQuery,
  fetchOverpassData,
  parseOverpassResponse,
  InvalidPayloadError,
  DEFAULT_ENDPOINT,
  DEFAULT_TIMEOUT,
  type TransitQueryOptions,
  type OverpassOptions,
  type OverpassResult,
  type ParseResult,
} from "./ingestion/overpass/index.js";

// Stop graph
export {
  extractRouteElements,
  extractNodeElements,
  buildStopGraph,
  createStopGraph,
  addStopEdge,
  stopGraphEdges,
  countStopGraphEdges,
  type RouteElement,
  type DanglingEdgePolicy,
  type StopGraphOptions,
  type StopGraphBuildStats,
  type StopGraphBuildResult,
} from "./transit/index.js";
