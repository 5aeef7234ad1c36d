/**
 * OSM element types as returned by the Overpass API.
 *
 * These represent the raw data before transformation into the stop graph.
 * The schemas validate untrusted JSON; the types are inferred from them.
 */

import { z } from "zod";

/**
 * OSM tags as key-value pairs.
 *
 * Overpass only emits string values; anything else is discarded rather
 * than failing the whole element.
 */
export const OsmTagsSchema = z
  .record(z.unknown())
  .transform((raw) => {
    const tags: Record<string, string> = {};
    for (const [key, value] of Object.entries(raw)) {
      if (typeof value === "string") tags[key] = value;
    }
    return tags;
  });

export type OsmTags = z.infer<typeof OsmTagsSchema>;

const OsmIdSchema = z.number().int();

/** A node from OSM - represents a point location */
export const OsmNodeSchema = z.object({
  type: z.literal("node"),
  id: OsmIdSchema,
  lat: z.number(),
  lon: z.number(),
  tags: OsmTagsSchema.optional(),
});

export type OsmNode = z.infer<typeof OsmNodeSchema>;

/** A way from OSM - represents a linear feature */
export const OsmWaySchema = z.object({
  type: z.literal("way"),
  id: OsmIdSchema,
  /** Ordered list of node IDs that make up this way */
  nodes: z.array(OsmIdSchema),
  tags: OsmTagsSchema.optional(),
});

export type OsmWay = z.infer<typeof OsmWaySchema>;

/** A member of a relation, in the relation's order */
export const OsmRelationMemberSchema = z.object({
  type: z.enum(["node", "way", "relation"]),
  ref: OsmIdSchema,
  /** Free-text role, e.g. "stop", "stop_entry_only", "platform" */
  role: z.string().default(""),
});

export type OsmRelationMember = z.infer<typeof OsmRelationMemberSchema>;

/** A relation from OSM - a transit route groups its stops this way */
export const OsmRelationSchema = z.object({
  type: z.literal("relation"),
  id: OsmIdSchema,
  members: z.array(OsmRelationMemberSchema),
  tags: OsmTagsSchema.optional(),
});

export type OsmRelation = z.infer<typeof OsmRelationSchema>;

/** Union of all OSM element types */
export const OsmElementSchema = z.discriminatedUnion("type", [
  OsmNodeSchema,
  OsmWaySchema,
  OsmRelationSchema,
]);

export type OsmElement = z.infer<typeof OsmElementSchema>;

/**
 * Route type values of `route=*` relations that describe public transit.
 */
export const TRANSIT_ROUTE_TYPES = [
  "bus",
  "trolleybus",
  "tram",
  "subway",
  "light_rail",
  "train",
  "monorail",
  "funicular",
  "ferry",
] as const;

export type TransitRouteType = (typeof TRANSIT_ROUTE_TYPES)[number];
