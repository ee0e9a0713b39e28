import { describe, expect, it } from "vitest";
import { rollUpLoads } from "./load-rollup.js";
import { makeGraph } from "./test-utils.js";
import { propagateVoltages, standardVoltages } from "./voltage-propagator.js";

const at = (x: number, y: number, z: number) => ({ x, y, z });

function chain() {
  const graph = makeGraph(
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
  propagateVoltages(graph, standardVoltages(13500));
  return graph;
}

describe("rollUpLoads", () => {
  it("sums downstream loads and sizes equipment", () => {
    const graph = chain();
    const summary = rollUpLoads(graph);

    expect(summary).toEqual({ connectedLoadKw: 10, highestRiskNodeId: "transformer_001" });
    expect(graph.node("transformer_001").analysis).toEqual({
      propagatedPowerKw: 10,
      powerRatingKva: 15,
      replacementCostUsd: 1500,
      riskScore: 1,
    });
    expect(graph.node("switchboard_001").analysis).toEqual({
      propagatedPowerKw: 10,
      amperageRating: 60,
      replacementCostUsd: 1000,
      riskScore: 0.6,
    });
    expect(graph.node("load_001").analysis).toEqual({ propagatedPowerKw: 10, riskScore: 0.2 });
  });

  it("scores risk relative to the riskiest node", () => {
    const graph = chain();
    rollUpLoads(graph);
    const scores = graph.nodes().map((n) => n.analysis?.riskScore);
    expect(scores).toEqual([1, 0.6, 0.2, 0.2]);
  });

  it("scores zero everywhere without loads or downstream gear", () => {
    const graph = makeGraph(
      [{ id: "transformer_001", type: "transformer", subtype: "main", capacityKw: 100, at: at(0, 0, 0) }],
      [],
    );
    const summary = rollUpLoads(graph);
    expect(summary).toEqual({ connectedLoadKw: 0, highestRiskNodeId: undefined });
    expect(graph.node("transformer_001").analysis).toEqual({
      propagatedPowerKw: 0,
      powerRatingKva: 15,
      replacementCostUsd: 1500,
      riskScore: 0,
    });
  });

  it("leaves amperage unset on unenergized gear", () => {
    const graph = makeGraph(
      [
        { id: "panelboard_001", type: "panelboard", subtype: "power", capacityKw: 20, at: at(0, 0, 0) },
        { id: "load_001", type: "load", subtype: "receptacle", capacityKw: 4, at: at(1, 0, 0) },
      ],
      [["panelboard_001", "load_001"]],
    );
    rollUpLoads(graph);
    expect(graph.node("panelboard_001").analysis).toEqual({ propagatedPowerKw: 4, riskScore: 1 });
  });
});
