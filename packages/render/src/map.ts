/**
 * Map model for a stop graph.
 *
 * Computes what a map of the graph shows: where it is centred, one
 * circle marker per stop, and one line per edge between two stops.
 * Drawing is left to the HTML page (see html.ts).
 */

import type { Coordinate, StopEdge, StopGraph, StopVertex } from "@transit-map/types";
import { stopGraphEdges } from "@transit-map/builder";

/** Raised when a graph has no stop positions to draw */
export class EmptyGraphError extends Error {
  constructor(message = "No positions available to compute a map center") {
    super(message);
    this.name = "EmptyGraphError";
  }
}

/** A stop marker */
export interface StopMarker {
  id: number;
  position: Coordinate;
  /** Text shown when hovering the marker */
  tooltip: string;
  colour: string;
  /** Circle radius in pixels */
  radius: number;
}

/** A line between two adjacent stops */
export interface StopLine {
  from: number;
  to: number;
  coordinates: [Coordinate, Coordinate];
  colour: string;
  /** Stroke width in pixels */
  weight: number;
}

/** Everything needed to draw a stop graph on a slippy map */
export interface StopMap {
  center: Coordinate;
  zoomStart: number;
  markers: StopMarker[];
  lines: StopLine[];
}

/** Options for createStopMap */
export interface StopMapOptions {
  /** Initial zoom level (default: 12) */
  zoomStart?: number;
}

export const DEFAULT_ZOOM_START = 12;
export const MARKER_RADIUS = 6;
export const LINE_COLOUR = "blue";
export const LINE_WEIGHT = 2;

/**
 * Compute the map center as the mean of all stop latitudes and longitudes.
 *
 * This is an unweighted centroid, not the center of the bounding box.
 *
 * @throws EmptyGraphError if the graph has no stops
 */
export function computeMapCenter(graph: StopGraph): Coordinate {
  if (graph.vertices.size === 0) {
    throw new EmptyGraphError();
  }

  let latSum = 0;
  let lngSum = 0;
  for (const vertex of graph.vertices.values()) {
    latSum += vertex.position.lat;
    lngSum += vertex.position.lng;
  }

  return {
    lat: latSum / graph.vertices.size,
    lng: lngSum / graph.vertices.size,
  };
}

/**
 * Edges that can be drawn: both endpoints are stops with a position and
 * the edge is not a loop from a stop back to itself.
 */
export function drawableEdges(
  graph: StopGraph
): { edge: StopEdge; from: StopVertex; to: StopVertex }[] {
  const result: { edge: StopEdge; from: StopVertex; to: StopVertex }[] = [];
  for (const edge of stopGraphEdges(graph)) {
    const [a, b] = edge;
    if (a === b) continue;
    const from = graph.vertices.get(a);
    const to = graph.vertices.get(b);
    if (from && to) result.push({ edge, from, to });
  }
  return result;
}

/**
 * Build the map model for a stop graph.
 *
 * @throws EmptyGraphError if the graph has no stops
 */
export function createStopMap(graph: StopGraph, options: StopMapOptions = {}): StopMap {
  const center = computeMapCenter(graph);

  const markers: StopMarker[] = [];
  for (const vertex of graph.vertices.values()) {
    markers.push({
      id: vertex.id,
      position: vertex.position,
      tooltip: vertex.name || `Node ${vertex.id}`,
      colour: vertex.colour,
      radius: MARKER_RADIUS,
    });
  }

  const lines: StopLine[] = drawableEdges(graph).map(({ edge, from, to }) => ({
    from: edge[0],
    to: edge[1],
    coordinates: [from.position, to.position],
    colour: LINE_COLOUR,
    weight: LINE_WEIGHT,
  }));

  return {
    center,
    zoomStart: options.zoomStart ?? DEFAULT_ZOOM_START,
    markers,
    lines,
  };
}
