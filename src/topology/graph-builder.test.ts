import { describe, expect, it } from "vitest";
import { planCoreStrategy } from "./core-strategy.js";
import type { Point3 } from "./geometry.js";
import { buildGraph, closestPanelboard, compareNodeIds, EDGE_LABELS, nearestPanelboard } from "./graph-builder.js";
import type { DecisionSubtype, NodeDecision, NodeType } from "./node-decision.js";
import { planNodeDecisions } from "./node-decision.js";
import { SeededRandom } from "./random.js";
import { analyzeRequirements } from "./requirement-analyzer.js";
import { makeGraph, requirement, testProfile } from "./test-utils.js";

function minimalGraph() {
  const profile = testProfile();
  const strategy = planCoreStrategy(profile);
  const rng = new SeededRandom(1);
  const reqs = analyzeRequirements(profile, strategy, rng);
  const decisions = planNodeDecisions(reqs, profile, strategy, 10, rng);
  return buildGraph(decisions, profile, rng);
}

let seq = 0;
function decision(nodeType: NodeType, subtype: DecisionSubtype, floor: number, location: Point3): NodeDecision {
  seq += 1;
  const serves =
    nodeType === "load" && subtype === "lighting" ? [requirement("lighting", 10, location, floor)] : [];
  return { seq, nodeType, subtype, reason: "test", capacityKw: 10, floor, location, serves };
}

describe("buildGraph", () => {
  it("allocates per-type ids in decision order", () => {
    const graph = minimalGraph();
    expect(graph.nodes().map((n) => n.id)).toEqual([
      "transformer_001",
      "switchboard_001",
      "panelboard_001",
      "panelboard_002",
      "panelboard_003",
      "panelboard_004",
      "panelboard_005",
      "load_001",
      "load_002",
      "load_003",
    ]);
    expect(graph.nodesOfType("load").map((n) => n.subtype)).toEqual(["hvac", "kitchen", "data_center"]);
  });

  it("wires the service hierarchy in precedence order", () => {
    const graph = minimalGraph();
    expect(graph.edgeCount).toBe(9);
    expect(graph.edge("transformer_001", "switchboard_001")?.loadClassification).toBe(EDGE_LABELS.serviceEntrance);
    expect(graph.edge("transformer_001", "switchboard_001")?.cableDistance).toBe(0);
    for (const panel of ["panelboard_002", "panelboard_003", "panelboard_004", "panelboard_005"]) {
      expect(graph.edge("switchboard_001", panel)?.loadClassification).toBe(EDGE_LABELS.mainDistribution);
    }
    // the basement plant panel is fed last, from the main switchboard
    expect(graph.edge("switchboard_001", "panelboard_001")?.loadClassification).toBe(
      EDGE_LABELS.serviceDistribution,
    );
    expect(graph.edges().at(-1)?.target).toBe("panelboard_001");
  });

  it("feeds every load from exactly one panelboard", () => {
    const graph = minimalGraph();
    for (const load of graph.nodesOfType("load")) {
      const preds = graph.predecessors(load.id);
      expect(preds).toHaveLength(1);
      expect(graph.node(preds[0] ?? "").type).toBe("panelboard");
    }
    const hvacFeed = graph.edge("panelboard_001", "load_001");
    expect(hvacFeed?.loadClassification).toBe("Hvac");
    expect(hvacFeed?.cableDistance).toBe(1);
  });

  it("fills structural and lifecycle attributes", () => {
    const graph = minimalGraph();
    const tr = graph.node("transformer_001");
    const sb = graph.node("switchboard_001");
    const hvac = graph.node("load_001");
    expect(tr.equipment.expectedLifespanYears).toBe(35);
    expect(tr.equipment.maintenanceFrequencyMonths).toBe(12);
    expect(sb.equipment.expectedLifespanYears).toBe(30);
    expect(graph.node("panelboard_002").equipment.maintenanceFrequencyMonths).toBe(24);
    expect(hvac.equipment.expectedLifespanYears).toBe(15);
    expect(hvac.roomCode).toBe("Mechanical Room");
    expect(graph.node("panelboard_001").roomCode).toBe("ELEC-B");
    expect(graph.node("panelboard_002").roomCode).toBe("ELEC-L01");
    for (const node of graph.nodes()) {
      expect(node.equipment.installationDate).toBe("2024-01-01");
      expect(node.equipment.manufactureYear).toBeGreaterThanOrEqual(2022);
      expect(node.equipment.manufactureYear).toBeLessThanOrEqual(2024);
      expect(node.electrical).toBeUndefined();
    }
    if (tr.type === "transformer") expect(tr.equipment.nominalPowerKva).toBe(227.73);
    if (sb.type === "switchboard") expect(sb.equipment.busRatingAmps).toBe(300);
  });

  it("routes floors with a secondary transformer through it", () => {
    const decisions = [
      decision("transformer", "main", 0, { x: 10, y: 10, z: -4 }),
      decision("switchboard", "main", 0, { x: 10, y: 10, z: -4 }),
      decision("transformer", "secondary", 0, { x: 6, y: 10, z: -4 }),
      decision("panelboard", "distribution", 0, { x: 7, y: 10, z: -4 }),
      decision("panelboard", "lighting", 1, { x: 6, y: 10, z: 0 }),
      decision("load", "lighting", 1, { x: 2, y: 3, z: 0 }),
    ];
    const graph = buildGraph(decisions, testProfile(), new SeededRandom(2));
    expect(graph.edges().map((e) => [e.source, e.target, e.loadClassification])).toEqual([
      ["transformer_001", "switchboard_001", "Service Entrance"],
      ["switchboard_001", "transformer_002", "Main Distribution"],
      ["transformer_002", "panelboard_001", "Floor Distribution"],
      ["switchboard_001", "panelboard_002", "Main Distribution"],
      ["panelboard_002", "load_001", "Lighting"],
    ]);
    expect(graph.edge("switchboard_001", "transformer_002")?.cableDistance).toBe(4);
  });

  it("rejects a load decision without a requirement", () => {
    const bad = decision("load", "hvac", 1, { x: 0, y: 0, z: 0 });
    expect(() => buildGraph([bad], testProfile(), new SeededRandom(1))).toThrow(
      `Load decision ${bad.seq} serves no requirement.`,
    );
  });
});

describe("nearestPanelboard", () => {
  it("breaks distance ties by id", () => {
    const graph = makeGraph(
      [
        { id: "panelboard_002", type: "panelboard", subtype: "power", capacityKw: 10, at: { x: 2, y: 0, z: 0 } },
        { id: "panelboard_001", type: "panelboard", subtype: "power", capacityKw: 10, at: { x: -2, y: 0, z: 0 } },
        { id: "load_001", type: "load", subtype: "receptacle", capacityKw: 5, at: { x: 0, y: 0, z: 0 } },
      ],
      [],
    );
    expect(nearestPanelboard(graph, graph.node("load_001"))?.id).toBe("panelboard_001");
  });

  it("breaks distance ties by counter value past three digits", () => {
    const graph = makeGraph(
      [
        { id: "panelboard_1000", type: "panelboard", subtype: "power", capacityKw: 10, at: { x: 2, y: 0, z: 0 } },
        { id: "panelboard_999", type: "panelboard", subtype: "power", capacityKw: 10, at: { x: -2, y: 0, z: 0 } },
        { id: "load_001", type: "load", subtype: "receptacle", capacityKw: 5, at: { x: 0, y: 0, z: 0 } },
      ],
      [],
    );
    expect(nearestPanelboard(graph, graph.node("load_001"))?.id).toBe("panelboard_999");
  });

  it("returns undefined without panelboards", () => {
    const graph = makeGraph(
      [{ id: "load_001", type: "load", subtype: "receptacle", capacityKw: 5, at: { x: 0, y: 0, z: 0 } }],
      [],
    );
    expect(nearestPanelboard(graph, graph.node("load_001"))).toBeUndefined();
  });
});

describe("closestPanelboard", () => {
  it("only considers the given panels", () => {
    const graph = makeGraph(
      [
        { id: "panelboard_001", type: "panelboard", subtype: "power", capacityKw: 10, at: { x: 1, y: 0, z: 0 } },
        { id: "panelboard_002", type: "panelboard", subtype: "power", capacityKw: 10, at: { x: 6, y: 0, z: 0 } },
        { id: "panelboard_003", type: "panelboard", subtype: "power", capacityKw: 10, at: { x: 0, y: 4, z: 0 } },
        { id: "load_001", type: "load", subtype: "receptacle", capacityKw: 5, at: { x: 0, y: 0, z: 0 } },
      ],
      [],
    );
    const candidates = graph.nodesOfType("panelboard").filter((p) => p.id !== "panelboard_001");
    const load = graph.node("load_001");
    expect(closestPanelboard(load, candidates)?.id).toBe("panelboard_003");
    expect(closestPanelboard(load, [])).toBeUndefined();
  });
});

describe("compareNodeIds", () => {
  it("orders by counter value within a type", () => {
    expect(["panelboard_1000", "panelboard_010", "panelboard_999"].sort(compareNodeIds)).toEqual([
      "panelboard_010",
      "panelboard_999",
      "panelboard_1000",
    ]);
  });

  it("orders different types by name", () => {
    expect(compareNodeIds("load_1000", "panelboard_001")).toBeLessThan(0);
    expect(compareNodeIds("panelboard_001", "panelboard_001")).toBe(0);
  });
});
