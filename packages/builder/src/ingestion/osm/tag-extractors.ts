/**
 * Extract stop graph attributes from OSM tags.
 *
 * These functions turn OSM's tag key-value pairs into the values
 * a StopVertex carries, applying the fallbacks for missing tags.
 */

import { DEFAULT_STOP_COLOUR } from "@transit-map/types";
import type { OsmRelationMember, OsmTags } from "./types.js";

/**
 * Extract a stop's display name.
 *
 * @param tags - OSM tags of the stop node
 * @param id - OSM node ID, used when there is no name tag
 * @returns The name tag, or the stringified ID
 */
export function extractStopName(tags: OsmTags | undefined, id: number): string {
  return tags?.["name"] ?? String(id);
}

/**
 * Extract a route's display colour.
 *
 * Takes the `colour` tag verbatim, falling back to a neutral gray.
 */
export function extractRouteColour(tags: OsmTags | undefined): string {
  return tags?.["colour"] ?? DEFAULT_STOP_COLOUR;
}

/**
 * Extract the `route=*` value of an element, if any.
 */
export function extractRouteType(tags: OsmTags | undefined): string | undefined {
  return tags?.["route"];
}

/**
 * Whether a relation member is a stop.
 *
 * Matches any role containing "stop", which covers "stop",
 * "stop_entry_only" and "stop_exit_only" but not "platform".
 */
export function isStopMember(member: OsmRelationMember): boolean {
  return member.role.includes("stop");
}
