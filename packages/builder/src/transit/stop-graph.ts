/**
 * Build a StopGraph from route elements.
 *
 * Each route contributes its stop members as vertices and joins
 * consecutive stops with an undirected edge. Stops shared between
 * routes are deduplicated by OSM node ID.
 */

import type { StopEdge, StopGraph, StopVertex } from "@transit-map/types";
import type { OsmNode, OsmRelationMember } from "../ingestion/osm/types.js";
import {
  extractRouteColour,
  extractStopName,
  isStopMember,
} from "../ingestion/osm/tag-extractors.js";
import type { RouteElement } from "./classify.js";

/**
 * What to do with an edge whose endpoint has no node element.
 *
 * - "skip": leave the edge out, so every edge joins two real stops
 * - "keep": add it anyway; the adjacency then mentions IDs with no vertex
 */
export type DanglingEdgePolicy = "skip" | "keep";

/** Options for buildStopGraph */
export interface StopGraphOptions {
  /** Default: "skip" */
  danglingEdges?: DanglingEdgePolicy;
}

/**
 * Statistics about the graph building process.
 */
export interface StopGraphBuildStats {
  /** Number of route elements processed */
  routesProcessed: number;
  /** Stop-role members seen across all routes */
  stopMembers: number;
  /** Stop members whose node was not in the node lookup */
  missingNodeRefs: number;
  /** Consecutive-stop pairs dropped because an endpoint was missing */
  danglingEdgesSkipped: number;
  /** Number of vertices in the graph */
  verticesCount: number;
  /** Number of distinct undirected edges in the graph */
  edgesCount: number;
  /** Time taken to build the graph in milliseconds */
  buildTimeMs: number;
}

/**
 * Result of building a stop graph.
 */
export interface StopGraphBuildResult {
  graph: StopGraph;
  stats: StopGraphBuildStats;
}

/** Create an empty stop graph */
export function createStopGraph(): StopGraph {
  return { vertices: new Map(), adjacency: new Map() };
}

/**
 * Add an undirected edge, creating adjacency entries as needed.
 * Adding the same pair twice has no further effect.
 */
export function addStopEdge(graph: StopGraph, a: number, b: number): void {
  neighbours(graph, a).add(b);
  neighbours(graph, b).add(a);
}

function neighbours(graph: StopGraph, id: number): Set<number> {
  let set = graph.adjacency.get(id);
  if (!set) {
    set = new Set();
    graph.adjacency.set(id, set);
  }
  return set;
}

/**
 * List every undirected edge once, as [smaller ID, larger ID], sorted.
 */
export function stopGraphEdges(graph: StopGraph): StopEdge[] {
  const edges: StopEdge[] = [];
  for (const [id, adjacent] of graph.adjacency) {
    for (const other of adjacent) {
      if (id <= other) edges.push([id, other]);
    }
  }
  return edges.sort((x, y) => x[0] - y[0] || x[1] - y[1]);
}

/** Number of distinct undirected edges */
export function countStopGraphEdges(graph: StopGraph): number {
  let count = 0;
  for (const [id, adjacent] of graph.adjacency) {
    for (const other of adjacent) {
      if (id <= other) count++;
    }
  }
  return count;
}

/**
 * Build a StopGraph from route elements and a node lookup.
 *
 * Algorithm, per route in input order:
 * 1. Select members whose role contains "stop", keeping their order
 * 2. For each stop whose node is known, set the vertex (position, name,
 *    route colour); a later route overwrites an earlier one's attributes
 * 3. Join each pair of consecutive stops with an edge
 *
 * Missing nodes are never an error. Whether an edge to a missing node
 * is added is decided by `options.danglingEdges`.
 *
 * @param routes - Route elements, e.g. from extractRouteElements()
 * @param nodes - Node lookup, e.g. from extractNodeElements()
 * @returns Graph and build statistics
 */
export function buildStopGraph(
  routes: readonly RouteElement[],
  nodes: ReadonlyMap<number, OsmNode>,
  options: StopGraphOptions = {}
): StopGraphBuildResult {
  const startTime = Date.now();
  const danglingEdges = options.danglingEdges ?? "skip";
  const graph = createStopGraph();

  let stopMembers = 0;
  let missingNodeRefs = 0;
  let danglingEdgesSkipped = 0;

  for (const route of routes) {
    // Only relations have members; a way or node tagged route=* adds nothing
    const members: readonly OsmRelationMember[] =
      route.type === "relation" ? route.members : [];
    const stops = members.filter(isStopMember);
    const colour = extractRouteColour(route.tags);
    stopMembers += stops.length;

    for (const stop of stops) {
      const node = nodes.get(stop.ref);
      if (!node) {
        missingNodeRefs++;
        continue;
      }
      const vertex: StopVertex = {
        id: stop.ref,
        position: { lat: node.lat, lng: node.lon },
        name: extractStopName(node.tags, stop.ref),
        colour,
      };
      graph.vertices.set(stop.ref, vertex);
    }

    let previous: OsmRelationMember | undefined;
    for (const stop of stops) {
      if (previous) {
        const from = previous.ref;
        const to = stop.ref;
        if (danglingEdges === "keep" || (nodes.has(from) && nodes.has(to))) {
          addStopEdge(graph, from, to);
        } else {
          danglingEdgesSkipped++;
        }
      }
      previous = stop;
    }
  }

  return {
    graph,
    stats: {
      routesProcessed: routes.length,
      stopMembers,
      missingNodeRefs,
      danglingEdgesSkipped,
      verticesCount: graph.vertices.size,
      edgesCount: countStopGraphEdges(graph),
      buildTimeMs: Date.now() - startTime,
    },
  };
}
