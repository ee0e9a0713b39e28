/**
 * Downstream load roll-up, standard equipment sizing and risk scoring.
 *
 * Runs after validation so each node sees its final set of descendants.
 * Results land in `node.analysis`.
 */
import { round2 } from "../shared.js";
import { lineCurrent, selectDistributionRating, selectTransformerRating } from "./conductor-sizing.js";
import type { NodeAnalysis, TopologyGraph, TopologyNode } from "./graph.js";
import { phasesForVoltage } from "./voltage-propagator.js";

export interface RollupSummary {
  /** Sum of every load's capacity. */
  connectedLoadKw: number;
  highestRiskNodeId: string | undefined;
}

function round3(n: number): number {
  return Math.round(n * 1000) / 1000;
}

function sizeNode(node: TopologyNode, propagatedPowerKw: number): Omit<NodeAnalysis, "riskScore"> {
  const analysis: Omit<NodeAnalysis, "riskScore"> = { propagatedPowerKw: round2(propagatedPowerKw) };
  if (node.type === "transformer") {
    const size = selectTransformerRating(propagatedPowerKw);
    analysis.powerRatingKva = size.rating;
    analysis.replacementCostUsd = size.replacementCostUsd;
  } else if ((node.type === "switchboard" || node.type === "panelboard") && node.electrical) {
    const voltage = node.electrical.downstreamVoltage;
    const amps = lineCurrent(propagatedPowerKw, voltage, phasesForVoltage(voltage));
    const size = selectDistributionRating(amps);
    analysis.amperageRating = size.rating;
    analysis.replacementCostUsd = size.replacementCostUsd;
  }
  return analysis;
}

export function rollUpLoads(graph: TopologyGraph): RollupSummary {
  const nodes = graph.nodes();
  const propagated = new Map<string, number>();
  const nonLoadDescendants = new Map<string, number>();

  for (const node of nodes) {
    if (node.type === "load") {
      propagated.set(node.id, node.capacityKw);
      nonLoadDescendants.set(node.id, 0);
      continue;
    }
    let power = 0;
    let equipment = 0;
    for (const id of graph.descendants(node.id)) {
      const descendant = graph.node(id);
      if (descendant.type === "load") power += descendant.capacityKw;
      else equipment += 1;
    }
    propagated.set(node.id, power);
    nonLoadDescendants.set(node.id, equipment);
  }

  const totalPropagated = [...propagated.values()].reduce((a, b) => a + b, 0);
  const maxDescendants = Math.max(0, ...nonLoadDescendants.values());

  const raw = new Map<string, number>();
  for (const node of nodes) {
    const powerShare = totalPropagated > 0 ? (propagated.get(node.id) ?? 0) / totalPropagated : 0;
    const reachShare = maxDescendants > 0 ? (nonLoadDescendants.get(node.id) ?? 0) / maxDescendants : 0;
    raw.set(node.id, (powerShare + reachShare) / 2);
  }
  const maxRaw = Math.max(0, ...raw.values());

  let highestRiskNodeId: string | undefined;
  for (const node of nodes) {
    const riskScore = maxRaw > 0 ? round3((raw.get(node.id) ?? 0) / maxRaw) : 0;
    node.analysis = { ...sizeNode(node, propagated.get(node.id) ?? 0), riskScore };
    if (riskScore === 1 && highestRiskNodeId === undefined) highestRiskNodeId = node.id;
  }

  const connectedLoadKw = round2(
    graph.nodesOfType("load").reduce((sum, load) => sum + load.capacityKw, 0),
  );
  return { connectedLoadKw, highestRiskNodeId };
}
