/**
 * Downstream voltage propagation.
 *
 * A FIFO worklist walks the graph from its sources. Each node moves through
 * `unvisited → assigned → propagated`; a node is assigned exactly once, by
 * whichever feeder reaches it first, and every traversed edge is energized
 * with its source's delivered voltage.
 */
import { voltageLog } from "../debug.js";
import { round2 } from "../shared.js";
import { calculateVoltageDrop, lineCurrent } from "./conductor-sizing.js";
import { powerFactorFor } from "./equipment-catalog.js";
import {
  deliveredVoltage,
  isEnergized,
  type ElectricalRecord,
  type EnergizedNode,
  type PhaseCount,
  type TopologyEdge,
  type TopologyGraph,
  type TopologyNode,
  type TransformerElectrical,
} from "./graph.js";

// ── Standard voltages ─────────────────────────────────────────────────────────

export const HIGH_VOLTAGE_TIERS = [13500, 4160] as const;
export type HighVoltageTier = (typeof HIGH_VOLTAGE_TIERS)[number];

export const MEDIUM_VOLTAGE = 480;
export const LOW_VOLTAGE = 208;
export const FREQUENCY_HZ = 60;
/** A transformer's output must sit at or below this share of its input. */
export const STEP_DOWN_RATIO = 0.8;
const SINGLE_PHASE_MAX_VOLTAGE = 240;
const DEFAULT_POWER_FACTOR = 0.9;

export interface StandardVoltages {
  readonly high: HighVoltageTier;
  /** Descending. */
  readonly tiers: readonly number[];
}

export function standardVoltages(high: HighVoltageTier): StandardVoltages {
  return { high, tiers: [high, MEDIUM_VOLTAGE, LOW_VOLTAGE] };
}

/** Closest tier to `voltage`; equal distances go to the higher tier. */
export function nearestStandard(voltage: number, std: StandardVoltages): number {
  let best = LOW_VOLTAGE;
  let bestDiff = Infinity;
  for (const tier of std.tiers) {
    const diff = Math.abs(tier - voltage);
    if (diff < bestDiff) {
      best = tier;
      bestDiff = diff;
    }
  }
  return best;
}

/** Highest tier at least 20% below `upstream`, or the low tier when none qualifies. */
export function stepDown(upstream: number, std: StandardVoltages): number {
  const limit = upstream * STEP_DOWN_RATIO;
  return std.tiers.find((tier) => tier <= limit) ?? LOW_VOLTAGE;
}

export function phasesForVoltage(voltage: number): PhaseCount {
  return voltage > SINGLE_PHASE_MAX_VOLTAGE ? 3 : 1;
}

// ── Electrical records ────────────────────────────────────────────────────────

export function transformerElectrical(capacityKw: number, upstream: number, downstream: number): TransformerElectrical {
  const phases = phasesForVoltage(downstream);
  const downstreamCurrent = round2(lineCurrent(capacityKw, downstream, phases));
  return {
    upstreamVoltage: upstream,
    downstreamVoltage: downstream,
    phases,
    frequency: FREQUENCY_HZ,
    upstreamCurrent: round2(lineCurrent(capacityKw, upstream, phasesForVoltage(upstream))),
    downstreamCurrent,
    currentRating: downstreamCurrent,
  };
}

function passThroughElectrical(capacityKw: number, voltage: number): ElectricalRecord {
  const phases = phasesForVoltage(voltage);
  return {
    upstreamVoltage: voltage,
    downstreamVoltage: voltage,
    phases,
    frequency: FREQUENCY_HZ,
    currentRating: round2(lineCurrent(capacityKw, voltage, phases)),
  };
}

function loadElectrical(capacityKw: number): ElectricalRecord {
  return {
    upstreamVoltage: LOW_VOLTAGE,
    downstreamVoltage: LOW_VOLTAGE,
    phases: 1,
    frequency: FREQUENCY_HZ,
    currentRating: round2(lineCurrent(capacityKw, LOW_VOLTAGE, 1)),
  };
}

/** Energizes a node that has no feeder. */
function seedSource(node: TopologyNode, std: StandardVoltages): void {
  switch (node.type) {
    case "transformer":
      node.electrical = transformerElectrical(node.capacityKw, std.high, stepDown(std.high, std));
      break;
    case "switchboard":
    case "panelboard":
      node.electrical = passThroughElectrical(node.capacityKw, MEDIUM_VOLTAGE);
      break;
    case "load":
      node.electrical = loadElectrical(node.capacityKw);
      break;
  }
}

/** Energizes `target` from the voltage its feeder delivers. */
function assignFromFeeder(target: TopologyNode, supplied: number, std: StandardVoltages): void {
  switch (target.type) {
    case "transformer":
      target.electrical = transformerElectrical(target.capacityKw, supplied, stepDown(supplied, std));
      break;
    case "switchboard":
    case "panelboard":
      target.electrical = passThroughElectrical(target.capacityKw, nearestStandard(supplied, std));
      break;
    case "load":
      target.electrical = loadElectrical(target.capacityKw);
      break;
  }
}

/** Fills an edge's electrical record from its (energized) source and its target. */
export function energizeEdge(edge: TopologyEdge, source: EnergizedNode, target: TopologyNode): void {
  const voltage = deliveredVoltage(source);
  const isLoad = target.type === "load";
  const phases: PhaseCount = isLoad ? 1 : phasesForVoltage(voltage);
  const current = lineCurrent(target.capacityKw, voltage, phases);
  const powerFactor = target.type === "load" ? powerFactorFor(target.subtype) : DEFAULT_POWER_FACTOR;
  const drop = calculateVoltageDrop(current, edge.cableDistance, voltage, phases);
  edge.electrical = {
    voltage,
    currentRating: round2(current),
    phases,
    frequency: FREQUENCY_HZ,
    apparentCurrent: round2(current / powerFactor),
    voltageDrop: drop.voltage_drop_v,
    voltageDropPercent: drop.voltage_drop_percent,
    conductorSize: drop.wire_size_awg,
  };
}

/** Re-energizes every outgoing edge of `node` after its delivered voltage changed. */
export function reenergizeFeeders(graph: TopologyGraph, node: TopologyNode): void {
  if (!isEnergized(node)) return;
  for (const targetId of graph.successors(node.id)) {
    const edge = graph.edge(node.id, targetId);
    if (edge) energizeEdge(edge, node, graph.node(targetId));
  }
}

// ── Propagation ───────────────────────────────────────────────────────────────

type NodeState = "unvisited" | "assigned" | "propagated";

export interface PropagationReport {
  highVoltage: HighVoltageTier;
  sources: string[];
  /** Nodes unreachable from any source, seeded afterwards. */
  lateSeeded: string[];
}

export function propagateVoltages(graph: TopologyGraph, std: StandardVoltages): PropagationReport {
  const state = new Map<string, NodeState>();
  for (const node of graph.nodes()) state.set(node.id, "unvisited");

  const queue: string[] = [];
  const seed = (node: TopologyNode) => {
    seedSource(node, std);
    state.set(node.id, "assigned");
    queue.push(node.id);
  };

  const drain = () => {
    while (queue.length > 0) {
      const id = queue.shift();
      if (id === undefined) break;
      const source = graph.node(id);
      if (!isEnergized(source)) continue;
      for (const targetId of graph.successors(id)) {
        const target = graph.node(targetId);
        if (state.get(targetId) === "unvisited") {
          assignFromFeeder(target, deliveredVoltage(source), std);
          state.set(targetId, "assigned");
          queue.push(targetId);
        }
        const edge = graph.edge(id, targetId);
        if (edge) energizeEdge(edge, source, target);
      }
      state.set(id, "propagated");
    }
  };

  let sources = graph.sources();
  if (sources.length === 0) {
    sources = graph.nodesOfType("transformer").filter((t) => t.subtype === "main");
  }
  for (const node of sources) seed(node);
  drain();

  const lateSeeded: string[] = [];
  for (const node of graph.nodes()) {
    if (state.get(node.id) !== "unvisited") continue;
    voltageLog("node %s unreachable from any source, seeding it directly", node.id);
    lateSeeded.push(node.id);
    seed(node);
    drain();
  }

  voltageLog(
    "propagated %d nodes from %d sources at %d V high tier",
    graph.nodeCount,
    sources.length,
    std.high,
  );
  return { highVoltage: std.high, sources: sources.map((s) => s.id), lateSeeded };
}
