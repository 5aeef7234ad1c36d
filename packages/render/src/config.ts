/**
 * Run configuration from environment variables.
 *
 * | Variable                 | Default     |
 * |--------------------------|-------------|
 * | TRANSIT_AREA             | Berlin      |
 * | TRANSIT_ROUTE_TYPES      | subway      |
 * | TRANSIT_ZOOM             | 12          |
 * | OVERPASS_ENDPOINT        | lz4 mirror  |
 * | OVERPASS_TIMEOUT         | 90          |
 * | OVERPASS_CACHE_DIR       | ~/.transit-map/overpass-cache |
 * | OVERPASS_NO_CACHE        | false       |
 * | TRANSIT_INPUT            | (fetch)     |
 * | TRANSIT_OUT_DIR          | out         |
 * | TRANSIT_DANGLING_EDGES   | skip        |
 */

import { z } from "zod";
import {
  DEFAULT_ENDPOINT,
  DEFAULT_TIMEOUT,
  TRANSIT_ROUTE_TYPES,
} from "@transit-map/builder";
import type {
  DanglingEdgePolicy,
  OverpassOptions,
  TransitRouteType,
} from "@transit-map/builder";
import { DEFAULT_ZOOM_START } from "./map.js";

/** Raised when environment variables hold invalid values */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** Resolved run configuration */
export interface RenderConfig {
  area: string;
  routeTypes: TransitRouteType[];
  zoomStart: number;
  /** Query timeout in seconds */
  timeout: number;
  overpass: OverpassOptions;
  /** Read the Overpass payload from this file instead of fetching it */
  inputPath?: string;
  outDir: string;
  danglingEdges: DanglingEdgePolicy;
}

const EnvSchema = z.object({
  TRANSIT_AREA: z.string().min(1).default("Berlin"),
  TRANSIT_ROUTE_TYPES: z
    .string()
    .default("subway")
    .transform((value) =>
      value
        .split(",")
        .map((type) => type.trim())
        .filter((type) => type.length > 0)
    )
    .pipe(z.array(z.enum(TRANSIT_ROUTE_TYPES)).min(1)),
  TRANSIT_ZOOM: z.coerce.number().int().min(1).max(19).default(DEFAULT_ZOOM_START),
  OVERPASS_ENDPOINT: z.string().url().default(DEFAULT_ENDPOINT),
  OVERPASS_TIMEOUT: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT),
  OVERPASS_CACHE_DIR: z.string().min(1).optional(),
  OVERPASS_NO_CACHE: z
    .enum(["1", "0", "true", "false"])
    .optional()
    .transform((value) => value === "1" || value === "true"),
  TRANSIT_INPUT: z.string().min(1).optional(),
  TRANSIT_OUT_DIR: z.string().min(1).default("out"),
  TRANSIT_DANGLING_EDGES: z.enum(["skip", "keep"]).default("skip"),
});

/**
 * Load the run configuration.
 *
 * @param env - Environment to read (default: process.env)
 * @throws ConfigError naming every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): RenderConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${problems}`);
  }
  const vars = parsed.data;

  const overpass: OverpassOptions = {
    endpoint: vars.OVERPASS_ENDPOINT,
    noCache: vars.OVERPASS_NO_CACHE,
  };
  if (vars.OVERPASS_CACHE_DIR) {
    overpass.cacheDir = vars.OVERPASS_CACHE_DIR;
  }

  return {
    area: vars.TRANSIT_AREA,
    routeTypes: vars.TRANSIT_ROUTE_TYPES,
    zoomStart: vars.TRANSIT_ZOOM,
    timeout: vars.OVERPASS_TIMEOUT,
    overpass,
    inputPath: vars.TRANSIT_INPUT,
    outDir: vars.TRANSIT_OUT_DIR,
    danglingEdges: vars.TRANSIT_DANGLING_EDGES,
  };
}
