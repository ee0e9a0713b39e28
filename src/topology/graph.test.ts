import { describe, expect, it } from "vitest";
import { isEnergized, isNodeOfType } from "./graph.js";
import { makeGraph, makeNode } from "./test-utils.js";

const at = (x: number, y: number, z: number) => ({ x, y, z });

function chain() {
  return makeGraph(
    [
      { id: "transformer_001", type: "transformer", subtype: "main", capacityKw: 100, at: at(0, 0, -4), floor: 0 },
      { id: "switchboard_001", type: "switchboard", subtype: "main", capacityKw: 90, at: at(0, 0, -4), floor: 0 },
      { id: "panelboard_001", type: "panelboard", subtype: "lighting", capacityKw: 20, at: at(5, 5, 0) },
      { id: "load_001", type: "load", subtype: "lighting", capacityKw: 10, at: at(8, 5, 0) },
    ],
    [
      ["transformer_001", "switchboard_001"],
      ["switchboard_001", "panelboard_001"],
      ["panelboard_001", "load_001"],
    ],
  );
}

describe("TopologyGraph", () => {
  it("tracks nodes and edges in insertion order", () => {
    const graph = chain();
    expect(graph.nodeCount).toBe(4);
    expect(graph.hasNode("load_001")).toBe(true);
    expect(graph.hasNode("load_002")).toBe(false);
    expect(graph.edgeCount).toBe(3);
    expect(graph.nodes().map((n) => n.id)).toEqual([
      "transformer_001",
      "switchboard_001",
      "panelboard_001",
      "load_001",
    ]);
    expect(graph.edges().map((e) => `${e.source}>${e.target}`)).toEqual([
      "transformer_001>switchboard_001",
      "switchboard_001>panelboard_001",
      "panelboard_001>load_001",
    ]);
  });

  it("answers adjacency queries", () => {
    const graph = chain();
    expect(graph.successors("switchboard_001")).toEqual(["panelboard_001"]);
    expect(graph.predecessors("load_001")).toEqual(["panelboard_001"]);
    expect(graph.inDegree("transformer_001")).toBe(0);
    expect(graph.outDegree("panelboard_001")).toBe(1);
    expect(graph.sources().map((n) => n.id)).toEqual(["transformer_001"]);
    expect([...graph.descendants("switchboard_001")]).toEqual(["panelboard_001", "load_001"]);
  });

  it("ignores a parallel edge", () => {
    const graph = chain();
    const first = graph.edge("panelboard_001", "load_001");
    const again = graph.addEdge({
      source: "panelboard_001",
      target: "load_001",
      connectionType: "power",
      cableDistance: 99,
      loadClassification: "Other",
    });
    expect(again).toBe(first);
    expect(graph.edgeCount).toBe(3);
  });

  it("removes edges from both adjacency lists", () => {
    const graph = chain();
    expect(graph.removeEdge("panelboard_001", "load_001")).toBe(true);
    expect(graph.removeEdge("panelboard_001", "load_001")).toBe(false);
    expect(graph.inDegree("load_001")).toBe(0);
    expect(graph.successors("panelboard_001")).toEqual([]);
  });

  it("rejects duplicate nodes and dangling edges", () => {
    const graph = chain();
    expect(() =>
      graph.addNode(makeNode({ id: "load_001", type: "load", subtype: "hvac", capacityKw: 5, at: at(0, 0, 0) })),
    ).toThrow("Duplicate node id 'load_001'.");
    expect(() =>
      graph.addEdge({
        source: "ghost",
        target: "load_001",
        connectionType: "power",
        cableDistance: 1,
        loadClassification: "x",
      }),
    ).toThrow("Edge ghost -> load_001 references an unknown node.");
    expect(() => graph.node("ghost")).toThrow("Unknown node 'ghost'.");
  });

  it("stops descendant walks on cycles", () => {
    const graph = chain();
    graph.addEdge({
      source: "load_001",
      target: "switchboard_001",
      connectionType: "power",
      cableDistance: 1,
      loadClassification: "loop",
    });
    expect([...graph.descendants("switchboard_001")].sort()).toEqual(["load_001", "panelboard_001"]);
  });

  it("filters nodes by type and reports provisional state", () => {
    const graph = chain();
    expect(graph.nodesOfType("panelboard").map((n) => n.id)).toEqual(["panelboard_001"]);
    const node = graph.node("load_001");
    expect(isNodeOfType(node, "load")).toBe(true);
    expect(isEnergized(node)).toBe(false);
  });
});
