/**
 * OSM element module.
 *
 * Element types, schemas, and tag extraction for transit data.
 */

export {
  extractStopName,
  extractRouteColour,
  extractRouteType,
  isStopMember,
} from "./tag-extractors.js";
export {
  type OsmNode,
  type OsmWay,
  type OsmRelation,
  type OsmRelationMember,
  type OsmElement,
  type OsmTags,
  type TransitRouteType,
  OsmTagsSchema,
  OsmNodeSchema,
  OsmWaySchema,
  OsmRelationSchema,
  OsmRelationMemberSchema,
  OsmElementSchema,
  TRANSIT_ROUTE_TYPES,
} from "./types.js";
