import { describe, it, expect } from "vitest";
import { addStopEdge, createStopGraph } from "@transit-map/builder";
import type { StopGraph } from "@transit-map/types";
import { escapeXml, renderStopGraphSvg } from "./svg.js";
import { EmptyGraphError } from "./map.js";

function makeGraph(): StopGraph {
  const graph = createStopGraph();
  graph.vertices.set(1, { id: 1, position: { lat: 0, lng: 0 }, name: "A", colour: "#FF0000" });
  graph.vertices.set(2, { id: 2, position: { lat: 2, lng: 2 }, name: "B & C", colour: "#808080" });
  addStopEdge(graph, 1, 2);
  return graph;
}

describe("escapeXml", () => {
  it("escapes markup characters", () => {
    expect(escapeXml(`<"a" & 'b'>`)).toBe("&lt;&quot;a&quot; &amp; &apos;b&apos;&gt;");
  });
});

describe("renderStopGraphSvg", () => {
  const svg = renderStopGraphSvg(makeGraph(), { title: "Test", width: 200, height: 140 });
  const lines = svg.trimEnd().split("\n");

  it("wraps the drawing in a sized svg element", () => {
    expect(lines[0]).toBe(
      '<svg xmlns="http://www.w3.org/2000/svg" width="200" height="140" viewBox="0 0 200 140">'
    );
    expect(lines[lines.length - 1]).toBe("</svg>");
  });

  it("draws the title", () => {
    expect(lines).toContain(
      '<text x="100" y="20" text-anchor="middle" font-size="14">Test</text>'
    );
  });

  it("draws edges in translucent gray", () => {
    expect(lines).toContain(
      '<line x1="20" y1="120" x2="180" y2="40" stroke="gray" stroke-opacity="0.7" stroke-width="1"/>'
    );
  });

  it("draws coloured, labelled stops with north up", () => {
    expect(lines).toContain('<circle cx="20" cy="120" r="4" fill="#FF0000"><title>A</title></circle>');
    expect(lines).toContain('<text x="26" y="123" font-size="8">A</text>');
    expect(lines).toContain(
      '<circle cx="180" cy="40" r="4" fill="#808080"><title>B &amp; C</title></circle>'
    );
  });

  it("centres a single stop", () => {
    const graph = createStopGraph();
    graph.vertices.set(7, { id: 7, position: { lat: 5, lng: 5 }, name: "Solo", colour: "#000000" });
    const single = renderStopGraphSvg(graph, { width: 200, height: 140 });

    expect(single).toContain('<circle cx="100" cy="80" r="4" fill="#000000">');
  });

  it("throws EmptyGraphError for an empty graph", () => {
    expect(() => renderStopGraphSvg(createStopGraph())).toThrow(EmptyGraphError);
  });
});
