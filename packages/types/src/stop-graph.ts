/**
 * Stop graph built from transit route relations.
 *
 * Vertices are transit stops keyed by their OSM node ID. An edge joins two
 * stops that follow each other in at least one route. The graph is
 * undirected: an edge is stored in the neighbour set of both endpoints.
 */

import type { Coordinate } from "./geo.js";

/** Colour given to stops whose route has no colour tag */
export const DEFAULT_STOP_COLOUR = "#808080";

/** A stop in the graph */
export interface StopVertex {
  /** OSM node ID */
  id: number;
  position: Coordinate;
  /** Stop name, or the stringified ID when the node has no name tag */
  name: string;
  /** Colour of the last route that touched this stop */
  colour: string;
}

/** An undirected edge as a pair of stop IDs, smaller ID first */
export type StopEdge = readonly [number, number];

/**
 * The complete stop graph.
 *
 * `adjacency` normally only mentions IDs present in `vertices`. When the
 * builder keeps dangling edges, it may also mention IDs whose node lookup
 * failed; those have no entry in `vertices`.
 */
export interface StopGraph {
  vertices: Map<number, StopVertex>;
  /** Adjacency list: stop ID -> neighbouring stop IDs */
  adjacency: Map<number, Set<number>>;
}
