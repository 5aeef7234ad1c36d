/**
 * Element classification.
 *
 * Splits parsed OSM elements into route elements (anything tagged
 * route=*) and a lookup of node elements by ID.
 */

import type { OsmElement, OsmNode, OsmTags } from "../ingestion/osm/types.js";

/** An element carrying a route=* tag; in practice a route relation */
export type RouteElement = OsmElement & { tags: OsmTags & { route: string } };

function isRouteElement(element: OsmElement): element is RouteElement {
  return element.tags !== undefined && element.tags["route"] !== undefined;
}

/**
 * Select the elements that describe a route.
 *
 * Keeps input order. Elements without tags never match.
 */
export function extractRouteElements(elements: readonly OsmElement[]): RouteElement[] {
  return elements.filter(isRouteElement);
}

/**
 * Index node elements by ID.
 *
 * When several nodes share an ID the later one wins.
 */
export function extractNodeElements(elements: readonly OsmElement[]): Map<number, OsmNode> {
  const nodes = new Map<number, OsmNode>();
  for (const element of elements) {
    if (element.type === "node") {
      nodes.set(element.id, element);
    }
  }
  return nodes;
}
