/**
 * Write the rendered artifacts of a stop graph to disk.
 */

import { mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import type { StopGraph } from "@transit-map/types";
import { stopGraphToGeoJson } from "./geojson.js";
import { renderStopMapHtml } from "./html.js";
import { createStopMap } from "./map.js";
import { renderStopGraphSvg } from "./svg.js";

/** Options for writeStopMapOutputs */
export interface OutputOptions {
  outDir: string;
  /** Initial map zoom level */
  zoomStart?: number;
  /** Title for the HTML page and SVG drawing */
  title?: string;
}

/** Paths of the files written */
export interface OutputPaths {
  html: string;
  geojson: string;
  svg: string;
}

/**
 * Render a stop graph and write stop-map.html, stop-graph.geojson and
 * stop-graph.svg into the output directory.
 *
 * Nothing is written for an empty graph.
 *
 * @throws EmptyGraphError if the graph has no stops
 */
export function writeStopMapOutputs(graph: StopGraph, options: OutputOptions): OutputPaths {
  // Render everything before touching the disk
  const map = createStopMap(graph, { zoomStart: options.zoomStart });
  const html = renderStopMapHtml(map, { title: options.title });
  const svg = renderStopGraphSvg(graph, { title: options.title });
  const geojson = stopGraphToGeoJson(graph);

  mkdirSync(options.outDir, { recursive: true });
  const paths: OutputPaths = {
    html: join(options.outDir, "stop-map.html"),
    geojson: join(options.outDir, "stop-graph.geojson"),
    svg: join(options.outDir, "stop-graph.svg"),
  };
  writeFileSync(paths.html, html);
  writeFileSync(paths.geojson, JSON.stringify(geojson, null, 2));
  writeFileSync(paths.svg, svg);

  return paths;
}
