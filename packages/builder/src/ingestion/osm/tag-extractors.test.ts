import { describe, it, expect } from "vitest";
import {
  extractStopName,
  extractRouteColour,
  extractRouteType,
  isStopMember,
} from "./tag-extractors.js";

describe("extractStopName", () => {
  it("uses the name tag", () => {
    expect(extractStopName({ name: "Alexanderplatz" }, 42)).toBe("Alexanderplatz");
  });

  it("falls back to the stringified id without a name tag", () => {
    expect(extractStopName({ railway: "stop" }, 42)).toBe("42");
  });

  it("falls back to the stringified id without any tags", () => {
    expect(extractStopName(undefined, 7)).toBe("7");
  });
});

describe("extractRouteColour", () => {
  it("uses the colour tag verbatim", () => {
    expect(extractRouteColour({ route: "subway", colour: "#55A822" })).toBe("#55A822");
  });

  it("returns neutral gray without a colour tag", () => {
    expect(extractRouteColour({ route: "subway" })).toBe("#808080");
  });

  it("returns neutral gray without tags", () => {
    expect(extractRouteColour(undefined)).toBe("#808080");
  });
});

describe("extractRouteType", () => {
  it("returns the route tag value", () => {
    expect(extractRouteType({ route: "tram" })).toBe("tram");
  });

  it("returns undefined when absent", () => {
    expect(extractRouteType({ name: "U2" })).toBeUndefined();
    expect(extractRouteType(undefined)).toBeUndefined();
  });
});

describe("isStopMember", () => {
  it("matches roles containing stop", () => {
    expect(isStopMember({ type: "node", ref: 1, role: "stop" })).toBe(true);
    expect(isStopMember({ type: "node", ref: 1, role: "stop_entry_only" })).toBe(true);
    expect(isStopMember({ type: "node", ref: 1, role: "stop_exit_only" })).toBe(true);
  });

  it("rejects other roles", () => {
    expect(isStopMember({ type: "way", ref: 1, role: "platform" })).toBe(false);
    expect(isStopMember({ type: "way", ref: 1, role: "" })).toBe(false);
  });
});
