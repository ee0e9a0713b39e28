/**
 * Materializes node decisions into a provisional topology graph.
 *
 * Node ids are allocated per type (`panelboard_003`). Hierarchy edges are
 * added in a fixed precedence so that transformers are only ever fed by a
 * switchboard or the utility, and loads are matched greedily to the nearest
 * panelboard.
 */
import { builderLog } from "../debug.js";
import { round2, titleCase } from "../shared.js";
import { floorTag, type BuildingProfile } from "./building-profile.js";
import {
  drawLoadEquipment,
  drawPanelboardEquipment,
  drawSwitchboardEquipment,
  drawTransformerEquipment,
} from "./equipment-catalog.js";
import { distance3, rectilinearDistance } from "./geometry.js";
import {
  TopologyGraph,
  type LoadNode,
  type PanelboardNode,
  type TopologyEdge,
  type TopologyNode,
} from "./graph.js";
import type { DecisionSubtype, EquipmentSubtype, NodeDecision, NodeType } from "./node-decision.js";
import type { SeededRandom } from "./random.js";

export const EDGE_LABELS = {
  serviceEntrance: "Service Entrance",
  mainDistribution: "Main Distribution",
  floorDistribution: "Floor Distribution",
  serviceDistribution: "Service Distribution",
} as const;

const EQUIPMENT_SUBTYPES: ReadonlySet<DecisionSubtype> = new Set<EquipmentSubtype>([
  "main",
  "secondary",
  "distribution",
  "lighting",
  "power",
  "generic",
]);

function isEquipmentSubtype(subtype: DecisionSubtype): subtype is EquipmentSubtype {
  return EQUIPMENT_SUBTYPES.has(subtype);
}

// ── Node creation ─────────────────────────────────────────────────────────────

export function formatId(type: NodeType, n: number): string {
  return `${type}_${String(n).padStart(3, "0")}`;
}

const ID_PATTERN = /^(.+)_(\d+)$/;

/** Orders `<type>_NNN` ids by type, then by counter value, so `_999` comes before `_1000`. */
export function compareNodeIds(a: string, b: string): number {
  const ma = ID_PATTERN.exec(a);
  const mb = ID_PATTERN.exec(b);
  if (ma?.[1] !== undefined && mb?.[1] !== undefined && ma[1] === mb[1]) {
    const diff = Number(ma[2]) - Number(mb[2]);
    if (diff !== 0) return diff;
  }
  return a < b ? -1 : a > b ? 1 : 0;
}

export function createNode(
  decision: NodeDecision,
  id: string,
  profile: BuildingProfile,
  rng: SeededRandom,
): TopologyNode {
  const common = {
    id,
    x: round2(decision.location.x),
    y: round2(decision.location.y),
    z: round2(decision.location.z),
    floor: decision.floor,
    roomCode: `ELEC-${floorTag(decision.floor)}`,
    capacityKw: decision.capacityKw,
    reason: decision.reason,
  };

  if (decision.nodeType === "load") {
    const req = decision.serves[0];
    if (!req) {
      throw new Error(`Load decision ${decision.seq} serves no requirement.`);
    }
    return {
      ...common,
      type: "load",
      subtype: req.loadType,
      roomCode: req.room,
      equipment: drawLoadEquipment(rng, profile, req.loadType, req.priority),
    };
  }

  const subtype = decision.subtype;
  if (!isEquipmentSubtype(subtype)) {
    throw new Error(`Decision ${decision.seq} has load subtype '${subtype}' on a ${decision.nodeType}.`);
  }
  switch (decision.nodeType) {
    case "transformer":
      return {
        ...common,
        type: "transformer",
        subtype,
        equipment: drawTransformerEquipment(rng, profile, subtype, decision.capacityKw),
      };
    case "switchboard":
      return {
        ...common,
        type: "switchboard",
        subtype,
        equipment: drawSwitchboardEquipment(rng, profile, decision.capacityKw),
      };
    case "panelboard":
      return {
        ...common,
        type: "panelboard",
        subtype,
        equipment: drawPanelboardEquipment(rng, profile),
      };
  }
}

// ── Edge helpers ──────────────────────────────────────────────────────────────

/** Builds a provisional power edge; electrical values are filled by propagation. */
export function createPowerEdge(source: TopologyNode, target: TopologyNode, loadClassification: string): TopologyEdge {
  return {
    source: source.id,
    target: target.id,
    connectionType: "power",
    cableDistance: round2(rectilinearDistance(source, target)),
    loadClassification,
  };
}

/** Nearest of `panels` by straight-line distance; equal distances resolve to the lower id. */
export function closestPanelboard(node: TopologyNode, panels: Iterable<PanelboardNode>): PanelboardNode | undefined {
  let best: PanelboardNode | undefined;
  let bestDist = Infinity;
  for (const panel of panels) {
    const dist = distance3(node, panel);
    if (dist < bestDist || (dist === bestDist && best !== undefined && compareNodeIds(panel.id, best.id) < 0)) {
      best = panel;
      bestDist = dist;
    }
  }
  return best;
}

export function nearestPanelboard(graph: TopologyGraph, node: TopologyNode): PanelboardNode | undefined {
  return closestPanelboard(node, graph.nodesOfType("panelboard"));
}

export function loadClassificationFor(load: LoadNode): string {
  return titleCase(load.subtype);
}

// ── Builder ───────────────────────────────────────────────────────────────────

export function buildGraph(
  decisions: readonly NodeDecision[],
  profile: BuildingProfile,
  rng: SeededRandom,
): TopologyGraph {
  const graph = new TopologyGraph();
  const counters = new Map<NodeType, number>();

  for (const decision of decisions) {
    const n = (counters.get(decision.nodeType) ?? 0) + 1;
    counters.set(decision.nodeType, n);
    graph.addNode(createNode(decision, formatId(decision.nodeType, n), profile, rng));
  }

  const transformers = graph.nodesOfType("transformer");
  const mainTransformer = transformers.find((t) => t.subtype === "main");
  const secondaryTransformers = transformers.filter((t) => t.subtype === "secondary");
  const mainSwitchboard = graph.nodesOfType("switchboard").find((s) => s.subtype === "main");
  const panelboards = graph.nodesOfType("panelboard");

  const connect = (source: TopologyNode, target: TopologyNode, label: string) => {
    graph.addEdge(createPowerEdge(source, target, label));
  };

  // 1. Service entrance
  if (mainTransformer && mainSwitchboard) {
    connect(mainTransformer, mainSwitchboard, EDGE_LABELS.serviceEntrance);
  }

  // 2. Main switchboard to secondary transformers
  if (mainSwitchboard) {
    for (const tr of secondaryTransformers) {
      connect(mainSwitchboard, tr, EDGE_LABELS.mainDistribution);
    }
  }

  // 3. Secondary transformers to panelboards on their floor
  const floorsWithTransformer = new Set<number>();
  for (const tr of secondaryTransformers) {
    floorsWithTransformer.add(tr.floor);
    for (const panel of panelboards) {
      if (panel.floor === tr.floor) connect(tr, panel, EDGE_LABELS.floorDistribution);
    }
  }

  // 4. Main switchboard to above-ground panelboards without a floor transformer
  if (mainSwitchboard) {
    for (const panel of panelboards) {
      if (panel.floor > 0 && !floorsWithTransformer.has(panel.floor)) {
        connect(mainSwitchboard, panel, EDGE_LABELS.mainDistribution);
      }
    }
  }

  // 5. Loads to nearest panelboard
  for (const load of graph.nodesOfType("load")) {
    if (graph.inDegree(load.id) > 0) continue;
    const panel = nearestPanelboard(graph, load);
    if (panel) {
      connect(panel, load, loadClassificationFor(load));
    } else {
      builderLog("no panelboard available for %s", load.id);
    }
  }

  // 6. Remaining unfed panelboards from the main switchboard
  if (mainSwitchboard) {
    for (const panel of panelboards) {
      if (graph.inDegree(panel.id) === 0) {
        connect(mainSwitchboard, panel, EDGE_LABELS.serviceDistribution);
      }
    }
  }

  builderLog("built %d nodes, %d edges", graph.nodeCount, graph.edgeCount);
  return graph;
}
