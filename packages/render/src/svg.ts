/**
 * Static SVG drawing of a stop graph.
 *
 * Plots stops at their (lng, lat) positions scaled into the image, with
 * gray edges underneath and a name label beside each stop. Meant for
 * reports and quick looks where an interactive map is overkill.
 */

import type { Coordinate, StopGraph } from "@transit-map/types";
import { drawableEdges, EmptyGraphError } from "./map.js";

/** Options for renderStopGraphSvg */
export interface StopGraphSvgOptions {
  title?: string;
  /** Image width in pixels (default: 1500) */
  width?: number;
  /** Image height in pixels (default: 800) */
  height?: number;
}

const PADDING = 20;
const TITLE_HEIGHT = 20;
const STOP_RADIUS = 4;
const LABEL_FONT_SIZE = 8;

/** Escape text for use in XML content and attribute values */
export function escapeXml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

/**
 * Render a stop graph as an SVG document.
 *
 * @throws EmptyGraphError if the graph has no stops
 */
export function renderStopGraphSvg(graph: StopGraph, options: StopGraphSvgOptions = {}): string {
  if (graph.vertices.size === 0) {
    throw new EmptyGraphError();
  }
  const width = options.width ?? 1500;
  const height = options.height ?? 800;
  const title = options.title ?? "Transit stop graph";

  let minLat = Infinity,
    maxLat = -Infinity;
  let minLng = Infinity,
    maxLng = -Infinity;
  for (const vertex of graph.vertices.values()) {
    minLat = Math.min(minLat, vertex.position.lat);
    maxLat = Math.max(maxLat, vertex.position.lat);
    minLng = Math.min(minLng, vertex.position.lng);
    maxLng = Math.max(maxLng, vertex.position.lng);
  }

  const plotTop = PADDING + TITLE_HEIGHT;
  const plotWidth = width - 2 * PADDING;
  const plotHeight = height - plotTop - PADDING;

  // A single stop (or a row of stops) has zero span: centre it
  const project = (coord: Coordinate): { x: number; y: number } => {
    const fx = maxLng === minLng ? 0.5 : (coord.lng - minLng) / (maxLng - minLng);
    const fy = maxLat === minLat ? 0.5 : (maxLat - coord.lat) / (maxLat - minLat);
    return { x: round1(PADDING + fx * plotWidth), y: round1(plotTop + fy * plotHeight) };
  };

  const lines: string[] = [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">`,
    `<rect width="${width}" height="${height}" fill="white"/>`,
    `<text x="${width / 2}" y="${PADDING}" text-anchor="middle" font-size="14">${escapeXml(title)}</text>`,
  ];

  for (const { from, to } of drawableEdges(graph)) {
    const a = project(from.position);
    const b = project(to.position);
    lines.push(
      `<line x1="${a.x}" y1="${a.y}" x2="${b.x}" y2="${b.y}" stroke="gray" stroke-opacity="0.7" stroke-width="1"/>`
    );
  }

  for (const vertex of graph.vertices.values()) {
    const { x, y } = project(vertex.position);
    const name = escapeXml(vertex.name);
    lines.push(
      `<circle cx="${x}" cy="${y}" r="${STOP_RADIUS}" fill="${escapeXml(vertex.colour)}"><title>${name}</title></circle>`,
      `<text x="${round1(x + STOP_RADIUS + 2)}" y="${round1(y + 3)}" font-size="${LABEL_FONT_SIZE}">${name}</text>`
    );
  }

  lines.push("</svg>");
  return lines.join("\n") + "\n";
}
