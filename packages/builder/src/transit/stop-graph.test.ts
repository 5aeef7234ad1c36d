import { describe, it, expect } from "vitest";
import {
  buildStopGraph,
  createStopGraph,
  addStopEdge,
  stopGraphEdges,
  countStopGraphEdges,
} from "./stop-graph.js";
import type { RouteElement } from "./classify.js";
import type { OsmNode, OsmRelationMember } from "../ingestion/osm/types.js";

function makeNode(id: number, lat: number, lon: number, name?: string): OsmNode {
  return name === undefined
    ? { type: "node", id, lat, lon }
    : { type: "node", id, lat, lon, tags: { name } };
}

function makeRoute(
  id: number,
  members: OsmRelationMember[],
  colour?: string
): RouteElement {
  const tags: RouteElement["tags"] = colour === undefined ? { route: "subway" } : { route: "subway", colour };
  return { type: "relation", id, members, tags };
}

function stops(...refs: number[]): OsmRelationMember[] {
  return refs.map((ref) => ({ type: "node", ref, role: "stop" }));
}

function nodeMap(...nodes: OsmNode[]): Map<number, OsmNode> {
  return new Map(nodes.map((n) => [n.id, n]));
}

const A = makeNode(1, 52.0, 13.0, "A-Platz");
const B = makeNode(2, 52.1, 13.1, "B-Strasse");
const C = makeNode(3, 52.2, 13.2, "C-Allee");
const D = makeNode(4, 52.3, 13.3, "D-Weg");

describe("buildStopGraph", () => {
  it("returns an empty graph for empty input", () => {
    const { graph, stats } = buildStopGraph([], new Map());

    expect(graph.vertices.size).toBe(0);
    expect(graph.adjacency.size).toBe(0);
    expect(stats.verticesCount).toBe(0);
    expect(stats.edgesCount).toBe(0);
  });

  it("connects consecutive stops of one route", () => {
    const { graph } = buildStopGraph(
      [makeRoute(100, stops(1, 2, 3), "#FF0000")],
      nodeMap(A, B, C)
    );

    expect([...graph.vertices.keys()].sort()).toEqual([1, 2, 3]);
    expect(stopGraphEdges(graph)).toEqual([
      [1, 2],
      [2, 3],
    ]);
  });

  it("sets position, name and colour on each vertex", () => {
    const { graph } = buildStopGraph([makeRoute(100, stops(1, 2), "#FF0000")], nodeMap(A, B));

    expect(graph.vertices.get(1)).toEqual({
      id: 1,
      position: { lat: 52.0, lng: 13.0 },
      name: "A-Platz",
      colour: "#FF0000",
    });
  });

  it("falls back to the stringified id for unnamed stops", () => {
    const { graph } = buildStopGraph([makeRoute(100, stops(9))], nodeMap(makeNode(9, 1, 2)));
    expect(graph.vertices.get(9)?.name).toBe("9");
  });

  it("uses neutral gray for routes without a colour", () => {
    const { graph } = buildStopGraph([makeRoute(100, stops(1, 2, 3))], nodeMap(A, B, C));

    for (const vertex of graph.vertices.values()) {
      expect(vertex.colour).toBe("#808080");
    }
  });

  it("lets the last route win on a shared stop", () => {
    const red = makeRoute(100, stops(1, 3), "#FF0000");
    const blue = makeRoute(101, stops(3, 4), "#0000FF");

    const forward = buildStopGraph([red, blue], nodeMap(A, C, D)).graph;
    expect(forward.vertices.get(3)?.colour).toBe("#0000FF");
    expect(forward.vertices.get(1)?.colour).toBe("#FF0000");

    const reversed = buildStopGraph([blue, red], nodeMap(A, C, D)).graph;
    expect(reversed.vertices.get(3)?.colour).toBe("#FF0000");
  });

  it("deduplicates stops and edges shared between routes", () => {
    const { graph, stats } = buildStopGraph(
      [makeRoute(100, stops(1, 2, 3)), makeRoute(101, stops(3, 2, 1))],
      nodeMap(A, B, C)
    );

    expect(graph.vertices.size).toBe(3);
    expect(stopGraphEdges(graph)).toEqual([
      [1, 2],
      [2, 3],
    ]);
    expect(stats.edgesCount).toBe(2);
  });

  it("ignores members whose role does not contain stop", () => {
    const members: OsmRelationMember[] = [
      { type: "node", ref: 1, role: "stop_entry_only" },
      { type: "way", ref: 2, role: "platform" },
      { type: "way", ref: 77, role: "" },
      { type: "node", ref: 3, role: "stop_exit_only" },
    ];
    const { graph, stats } = buildStopGraph([makeRoute(100, members)], nodeMap(A, B, C));

    expect([...graph.vertices.keys()].sort()).toEqual([1, 3]);
    expect(stopGraphEdges(graph)).toEqual([[1, 3]]);
    expect(stats.stopMembers).toBe(2);
  });

  it("adds nothing for route elements that are not relations", () => {
    const ferryWay: RouteElement = {
      type: "way",
      id: 500,
      nodes: [1, 2],
      tags: { route: "ferry" },
    };
    const { graph, stats } = buildStopGraph([ferryWay], nodeMap(A, B));

    expect(graph.vertices.size).toBe(0);
    expect(stats.routesProcessed).toBe(1);
    expect(stats.stopMembers).toBe(0);
  });

  it("keeps a repeated consecutive stop as a single self-loop", () => {
    const { graph } = buildStopGraph([makeRoute(100, stops(1, 1, 2))], nodeMap(A, B));
    expect(stopGraphEdges(graph)).toEqual([
      [1, 1],
      [1, 2],
    ]);
  });

  describe("missing nodes", () => {
    // Stop 2 is referenced but its node is not in the lookup
    const route = makeRoute(100, stops(1, 2, 3));
    const lookup = nodeMap(A, C);

    it("skips the vertex without raising", () => {
      const { graph, stats } = buildStopGraph([route], lookup);

      expect([...graph.vertices.keys()].sort()).toEqual([1, 3]);
      expect(stats.missingNodeRefs).toBe(1);
    });

    it("skips edges touching the missing stop by default", () => {
      const { graph, stats } = buildStopGraph([route], lookup);

      expect(stopGraphEdges(graph)).toEqual([]);
      expect(graph.adjacency.has(2)).toBe(false);
      expect(stats.danglingEdgesSkipped).toBe(2);
      expect(stats.edgesCount).toBe(0);
    });

    it("keeps dangling edges when asked to", () => {
      const { graph, stats } = buildStopGraph([route], lookup, { danglingEdges: "keep" });

      expect(stopGraphEdges(graph)).toEqual([
        [1, 2],
        [2, 3],
      ]);
      // The adjacency mentions stop 2, but it never became a vertex
      expect(graph.adjacency.has(2)).toBe(true);
      expect(graph.vertices.has(2)).toBe(false);
      expect(stats.danglingEdgesSkipped).toBe(0);
    });
  });

  it("reports build statistics", () => {
    const { stats } = buildStopGraph(
      [makeRoute(100, stops(1, 2, 3)), makeRoute(101, stops(3, 4, 99))],
      nodeMap(A, B, C, D)
    );

    expect(stats.routesProcessed).toBe(2);
    expect(stats.stopMembers).toBe(6);
    expect(stats.missingNodeRefs).toBe(1);
    expect(stats.danglingEdgesSkipped).toBe(1);
    expect(stats.verticesCount).toBe(4);
    expect(stats.edgesCount).toBe(3);
    expect(stats.buildTimeMs).toBeGreaterThanOrEqual(0);
  });
});

describe("addStopEdge", () => {
  it("stores the edge in both directions", () => {
    const graph = createStopGraph();
    addStopEdge(graph, 5, 7);

    expect(graph.adjacency.get(5)).toEqual(new Set([7]));
    expect(graph.adjacency.get(7)).toEqual(new Set([5]));
  });

  it("collapses repeated edges", () => {
    const graph = createStopGraph();
    addStopEdge(graph, 5, 7);
    addStopEdge(graph, 7, 5);

    expect(countStopGraphEdges(graph)).toBe(1);
    expect(stopGraphEdges(graph)).toEqual([[5, 7]]);
  });
});
