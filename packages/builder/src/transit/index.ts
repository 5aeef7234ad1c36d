/**
 * Transit stop graph module.
 *
 * Classifies OSM elements and builds the stop graph from route relations.
 */

export {
  extractRouteElements,
  extractNodeElements,
  type RouteElement,
} from "./classify.js";
export {
  buildStopGraph,
  createStopGraph,
  addStopEdge,
  stopGraphEdges,
  countStopGraphEdges,
  type DanglingEdgePolicy,
  type StopGraphOptions,
  type StopGraphBuildStats,
  type StopGraphBuildResult,
} from "./stop-graph.js";
