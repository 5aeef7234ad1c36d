/**
 * Overpass JSON response parser.
 *
 * Validates a deserialized Overpass response of the shape
 * `{ "elements": [...] }` and converts it into OsmElement values.
 * The payload may come from the API, the disk cache or a file on disk;
 * the parser does not care as long as it has that shape.
 *
 * Elements that fail validation (areas, counts, nodes without
 * coordinates, ...) are dropped and counted rather than failing the run.
 */

import { z } from "zod";
import { OsmElementSchema } from "../osm/types.js";
import type { OsmElement } from "../osm/types.js";

/** Raised when a payload does not have the Overpass response shape */
export class InvalidPayloadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidPayloadError";
  }
}

/** Result of parsing an Overpass response */
export interface ParseResult {
  elements: OsmElement[];
  /** Number of input elements that were not valid nodes, ways or relations */
  droppedCount: number;
}

const OverpassPayloadSchema = z.object({
  elements: z.array(z.unknown()),
});

/**
 * Parse an Overpass JSON response into OsmElement values.
 *
 * @param payload - Deserialized JSON, e.g. from fetchOverpassData()
 * @throws InvalidPayloadError if the payload has no `elements` array
 */
export function parseOverpassResponse(payload: unknown): ParseResult {
  const envelope = OverpassPayloadSchema.safeParse(payload);
  if (!envelope.success) {
    throw new InvalidPayloadError(
      "Overpass payload must be an object with an 'elements' array"
    );
  }

  const elements: OsmElement[] = [];
  let droppedCount = 0;

  for (const raw of envelope.data.elements) {
    const parsed = OsmElementSchema.safeParse(raw);
    if (parsed.success) {
      elements.push(parsed.data);
    } else {
      droppedCount++;
    }
  }

  return { elements, droppedCount };
}
