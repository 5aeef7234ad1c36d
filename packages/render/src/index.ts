/**
 * @transit-map/render
 *
 * Turns a StopGraph into things people can look at: an interactive
 * Leaflet map, GeoJSON, and a static SVG drawing.
 */

export {
  computeMapCenter,
  createStopMap,
  drawableEdges,
  EmptyGraphError,
  DEFAULT_ZOOM_START,
  MARKER_RADIUS,
  LINE_COLOUR,
  LINE_WEIGHT,
  type StopMap,
  type StopMapOptions,
  type StopMarker,
  type StopLine,
} from "./map.js";
export {
  renderStopMapHtml,
  escapeHtml,
  serializeForScript,
  LEAFLET_VERSION,
  type StopMapHtmlOptions,
} from "./html.js";
export {
  stopGraphToGeoJson,
  type GeoJsonExportOptions,
  type GeoJsonFeatureCollection,
  type GeoJsonFeature,
} from "./geojson.js";
export { renderStopGraphSvg, escapeXml, type StopGraphSvgOptions } from "./svg.js";
export { loadConfig, ConfigError, type RenderConfig } from "./config.js";
export { writeStopMapOutputs, type OutputOptions, type OutputPaths } from "./output.js";
