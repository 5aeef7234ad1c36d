/**
 * GeoJSON export for StopGraph data.
 *
 * Exports graph edges as a FeatureCollection of LineStrings, and stops
 * as Points, with stop attributes as feature properties. Useful for
 * visualization in QGIS, geojson.io, Mapbox, etc.
 */

import type { Coordinate, StopGraph, StopVertex } from "@transit-map/types";
import { drawableEdges } from "./map.js";

/** GeoJSON types (subset we need) */
export interface GeoJsonFeatureCollection {
  type: "FeatureCollection";
  features: GeoJsonFeature[];
}

export interface GeoJsonFeature {
  type: "Feature";
  geometry: GeoJsonLineString | GeoJsonPoint;
  properties: Record<string, unknown>;
}

interface GeoJsonLineString {
  type: "LineString";
  coordinates: [number, number][];
}

interface GeoJsonPoint {
  type: "Point";
  coordinates: [number, number];
}

/** Options for GeoJSON export */
export interface GeoJsonExportOptions {
  /** Include stop points in addition to edges (default: true) */
  includeStops?: boolean;
}

/**
 * Export a StopGraph to a GeoJSON FeatureCollection.
 *
 * Edges come first, one LineString per edge between two known stops,
 * in ascending stop ID order. Stops follow as Points with `id`, `name`
 * and `colour` properties.
 */
export function stopGraphToGeoJson(
  graph: StopGraph,
  options: GeoJsonExportOptions = {}
): GeoJsonFeatureCollection {
  const features: GeoJsonFeature[] = [];

  for (const { from, to } of drawableEdges(graph)) {
    features.push({
      type: "Feature",
      geometry: {
        type: "LineString",
        coordinates: [coordToGeoJson(from.position), coordToGeoJson(to.position)],
      },
      properties: {
        from: from.id,
        to: to.id,
        featureType: "edge",
      },
    });
  }

  if (options.includeStops ?? true) {
    for (const vertex of graph.vertices.values()) {
      features.push(stopToFeature(vertex));
    }
  }

  return {
    type: "FeatureCollection",
    features,
  };
}

function stopToFeature(vertex: StopVertex): GeoJsonFeature {
  return {
    type: "Feature",
    geometry: {
      type: "Point",
      coordinates: coordToGeoJson(vertex.position),
    },
    properties: {
      id: vertex.id,
      name: vertex.name,
      colour: vertex.colour,
      featureType: "stop",
    },
  };
}

/**
 * Convert our Coordinate to GeoJSON [lng, lat] format.
 */
function coordToGeoJson(coord: Coordinate): [number, number] {
  return [coord.lng, coord.lat];
}
