/**
 * @transit-map/types
 *
 * Shared domain types for the transit stop graph.
 *
 * - Geo: Coordinates in WGS84
 * - StopGraph: Undirected graph of transit stops built from route relations
 */

export * from "./geo.js";
export * from "./stop-graph.js";
