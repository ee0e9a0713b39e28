import { describe, expect, it } from "vitest";
import { cableStats, formatSummary, summarizeTopology, type TopologySummary } from "./summary.js";
import { synthesizeTopology } from "./synthesize.js";
import { MINIMAL_BUILDING } from "./test-utils.js";

describe("cableStats", () => {
  it("rounds each statistic to centimeters", () => {
    expect(cableStats([1, 2, 4])).toEqual({ min: 1, mean: 2.33, max: 4, total: 7 });
  });

  it("is undefined without cables", () => {
    expect(cableStats([])).toBeUndefined();
  });
});

describe("summarizeTopology", () => {
  it("counts node types and loads", () => {
    const summary = summarizeTopology(synthesizeTopology(MINIMAL_BUILDING, { targetNodeCount: 10, seed: 1 }));
    expect(summary).toMatchObject({
      nodeCount: 10,
      edgeCount: 9,
      typeBreakdown: { transformer: 1, switchboard: 1, panelboard: 5, load: 3 },
      coreStrategy: "single_core",
      coreCount: 1,
      totalLoadKw: 163.97,
      connectedLoadKw: 105.83,
      repaired: 0,
      warnings: 0,
      seed: 1,
    });
  });
});

describe("formatSummary", () => {
  const summary: TopologySummary = {
    nodeCount: 3,
    edgeCount: 0,
    typeBreakdown: { transformer: 1, switchboard: 1, panelboard: 1, load: 0 },
    cable: undefined,
    coreStrategy: "single_core",
    coreCount: 1,
    highVoltage: 4160,
    totalLoadKw: 12.5,
    connectedLoadKw: 0,
    repaired: 0,
    warnings: 2,
    seed: 9,
  };

  it("renders a plain-text report", () => {
    const lines = formatSummary(summary);
    expect(lines).toContain("Core Strategy: single_core (1 core)");
    expect(lines).toContain("High Voltage:  4160 V");
    expect(lines).toContain("Building Load: 12.5 kW (0 kW connected)");
    expect(lines).toContain("  transformer: 1");
    expect(lines).toContain("  (no edges)");
    expect(lines.at(-1)).toBe("  Warnings: 2");
  });

  it("pluralizes cores", () => {
    expect(formatSummary({ ...summary, coreCount: 3 })).toContain("Core Strategy: single_core (3 cores)");
  });
});
