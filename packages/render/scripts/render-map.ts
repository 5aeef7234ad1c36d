/**
 * Render the transit stop graph of an area as an interactive map.
 *
 * Usage: npx tsx scripts/render-map.ts
 *
 * Configured through environment variables (see src/config.ts), e.g.
 *   TRANSIT_AREA=Wien TRANSIT_ROUTE_TYPES=subway,tram npx tsx scripts/render-map.ts
 *
 * Writes stop-map.html, stop-graph.geojson and stop-graph.svg to
 * TRANSIT_OUT_DIR. Open stop-map.html in a browser to explore the map.
 */

import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import {
  buildStopGraphFromPayload,
  buildTransitQuery,
  ingestTransitRoutes,
} from "@transit-map/builder";
import type { PayloadStats } from "@transit-map/builder";
import type { StopGraph } from "@transit-map/types";
import { loadConfig, writeStopMapOutputs } from "../src/index.js";
import type { RenderConfig } from "../src/index.js";

async function loadGraph(
  config: RenderConfig
): Promise<{ graph: StopGraph; stats: PayloadStats }> {
  if (config.inputPath) {
    const inputPath = resolve(config.inputPath);
    console.log(`Reading Overpass response from ${inputPath}`);
    const payload: unknown = JSON.parse(readFileSync(inputPath, "utf-8"));
    return buildStopGraphFromPayload(payload, { danglingEdges: config.danglingEdges });
  }

  console.log(`Querying ${config.routeTypes.join(", ")} routes in ${config.area}...`);
  const result = await ingestTransitRoutes({
    area: config.area,
    routeTypes: config.routeTypes,
    timeout: config.timeout,
    overpass: config.overpass,
    graph: { danglingEdges: config.danglingEdges },
  });
  console.log(`Fetch took ${(result.stats.ingestionTimeMs / 1000).toFixed(1)}s`);
  return result;
}

async function main() {
  const config = loadConfig();
  console.log("Query:");
  console.log(buildTransitQuery(config));
  console.log("");

  const { graph, stats } = await loadGraph(config);

  console.log("=== Stop Graph ===");
  console.log(`Elements: ${stats.elementsCount.toLocaleString()} (${stats.droppedElementsCount} dropped)`);
  console.log(`Routes: ${stats.routesProcessed.toLocaleString()}`);
  console.log(`Stops: ${stats.verticesCount.toLocaleString()}`);
  console.log(`Edges: ${stats.edgesCount.toLocaleString()}`);
  if (stats.missingNodeRefs > 0) {
    console.log(`Stop members without node data: ${stats.missingNodeRefs.toLocaleString()}`);
  }
  if (stats.danglingEdgesSkipped > 0) {
    console.log(`Edges skipped for missing stops: ${stats.danglingEdgesSkipped.toLocaleString()}`);
  }
  console.log("");

  const title = `${config.area} ${config.routeTypes.join(" + ")} network`;
  const paths = writeStopMapOutputs(graph, {
    outDir: resolve(config.outDir),
    zoomStart: config.zoomStart,
    title,
  });

  console.log(`Map: ${paths.html}`);
  console.log(`GeoJSON: ${paths.geojson}`);
  console.log(`SVG: ${paths.svg}`);
}

main().catch((err: unknown) => {
  console.error(`[error] ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
