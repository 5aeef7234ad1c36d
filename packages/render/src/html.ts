/**
 * Standalone HTML page for a stop map.
 *
 * The page loads Leaflet from a CDN and draws the map model over
 * OpenStreetMap tiles. It can be opened straight from disk.
 */

import type { StopMap } from "./map.js";

/** Options for renderStopMapHtml */
export interface StopMapHtmlOptions {
  /** Page title (default: "Transit stop map") */
  title?: string;
}

export const LEAFLET_VERSION = "1.9.4";
const LEAFLET_BASE = `https://unpkg.com/leaflet@${LEAFLET_VERSION}/dist`;

/** Escape text for use in HTML content and attribute values */
export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

/**
 * Serialize a value as a JavaScript literal safe to inline in a script tag.
 * `<` is escaped so that no string can close the tag.
 */
export function serializeForScript(value: unknown): string {
  return JSON.stringify(value).replace(/</g, "\\u003c");
}

/**
 * Render a stop map as a standalone HTML page.
 */
export function renderStopMapHtml(map: StopMap, options: StopMapHtmlOptions = {}): string {
  const title = escapeHtml(options.title ?? "Transit stop map");

  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<meta name="viewport" content="width=device-width, initial-scale=1">
<title>${title}</title>
<link rel="stylesheet" href="${LEAFLET_BASE}/leaflet.css">
<script src="${LEAFLET_BASE}/leaflet.js"></script>
<style>html, body, #map { height: 100%; margin: 0; }</style>
</head>
<body>
<div id="map"></div>
<script>
const data = ${serializeForScript(map)};
const map = L.map("map").setView([data.center.lat, data.center.lng], data.zoomStart);
L.tileLayer("https://tile.openstreetmap.org/{z}/{x}/{y}.png", {
  maxZoom: 19,
  attribution: "&copy; OpenStreetMap contributors",
}).addTo(map);
for (const line of data.lines) {
  L.polyline(line.coordinates.map((c) => [c.lat, c.lng]), {
    color: line.colour,
    weight: line.weight,
  }).addTo(map);
}
for (const marker of data.markers) {
  const label = document.createElement("span");
  label.textContent = marker.tooltip;
  L.circleMarker([marker.position.lat, marker.position.lng], {
    radius: marker.radius,
    color: marker.colour,
    fill: true,
    fillColor: marker.colour,
  }).bindTooltip(label).addTo(map);
}
</script>
</body>
</html>
`;
}
