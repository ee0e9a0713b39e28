import { round2 } from "../shared.js";
import type { NodeType } from "./node-decision.js";
import type { TopologyResult } from "./synthesize.js";

export interface CableStats {
  min: number;
  mean: number;
  max: number;
  total: number;
}

export interface TopologySummary {
  nodeCount: number;
  edgeCount: number;
  typeBreakdown: Record<NodeType, number>;
  cable: CableStats | undefined;
  coreStrategy: string;
  coreCount: number;
  highVoltage: number;
  totalLoadKw: number;
  connectedLoadKw: number;
  repaired: number;
  warnings: number;
  seed: number;
}

export function cableStats(distances: readonly number[]): CableStats | undefined {
  if (distances.length === 0) return undefined;
  const total = distances.reduce((a, b) => a + b, 0);
  return {
    min: round2(Math.min(...distances)),
    mean: round2(total / distances.length),
    max: round2(Math.max(...distances)),
    total: round2(total),
  };
}

export function summarizeTopology(result: TopologyResult): TopologySummary {
  const { graph } = result;
  const typeBreakdown: Record<NodeType, number> = { transformer: 0, switchboard: 0, panelboard: 0, load: 0 };
  for (const node of graph.nodes()) typeBreakdown[node.type] += 1;

  return {
    nodeCount: graph.nodeCount,
    edgeCount: graph.edgeCount,
    typeBreakdown,
    cable: cableStats(graph.edges().map((e) => e.cableDistance)),
    coreStrategy: result.strategy.kind,
    coreCount: result.strategy.coreCount,
    highVoltage: result.propagation.highVoltage,
    totalLoadKw: round2(
      result.requirements.filter((r) => r.loadType !== "main_service").reduce((sum, r) => sum + r.loadKw, 0),
    ),
    connectedLoadKw: result.rollup.connectedLoadKw,
    repaired: result.validation.repaired,
    warnings: result.validation.warnings,
    seed: result.seed,
  };
}

export function formatSummary(summary: TopologySummary): string[] {
  const lines = [
    `Electrical Distribution Topology`,
    `================================`,
    `Seed:          ${summary.seed}`,
    `Core Strategy: ${summary.coreStrategy} (${summary.coreCount} core${summary.coreCount === 1 ? "" : "s"})`,
    `High Voltage:  ${summary.highVoltage} V`,
    `Building Load: ${summary.totalLoadKw} kW (${summary.connectedLoadKw} kW connected)`,
    ``,
    `Nodes: ${summary.nodeCount}`,
    `Edges: ${summary.edgeCount}`,
    ``,
    `NODE TYPES:`,
  ];
  for (const [type, count] of Object.entries(summary.typeBreakdown)) {
    lines.push(`  ${type}: ${count}`);
  }

  lines.push(``);
  lines.push(`CABLE DISTANCE (m):`);
  if (summary.cable) {
    const c = summary.cable;
    lines.push(`  Min: ${c.min}  Mean: ${c.mean}  Max: ${c.max}  Total: ${c.total}`);
  } else {
    lines.push(`  (no edges)`);
  }

  lines.push(``);
  lines.push(`VALIDATION:`);
  lines.push(`  Repaired: ${summary.repaired}`);
  lines.push(`  Warnings: ${summary.warnings}`);
  return lines;
}
