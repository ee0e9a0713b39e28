/**
 * Attributed directed graph for the distribution topology.
 *
 * Nodes are a tagged union over the four equipment kinds. Each node starts
 * provisional (structural attributes only) and becomes energized once the
 * voltage propagator fills its `electrical` record; the exporter refuses
 * anything still provisional.
 */
import type { Point3 } from "./geometry.js";
import type { EquipmentSubtype, NodeType } from "./node-decision.js";
import type { LoadType } from "./requirement-analyzer.js";

// ── Equipment (structural) attributes ─────────────────────────────────────────

export interface EquipmentRecord {
  manufacturer: string;
  widthM: number;
  depthM: number;
  heightM: number;
  manufactureYear: number;
  installYear: number;
  /** YYYY-MM-DD */
  installationDate: string;
  expectedLifespanYears: number;
  maintenanceFrequencyMonths: number;
}

export interface TransformerEquipment extends EquipmentRecord {
  nominalPowerKva: number;
  shortCircuitRatingKa: number;
  impedancePercent: number;
}

export interface SwitchboardEquipment extends EquipmentRecord {
  shortCircuitRatingKa: number;
  busRatingAmps: number;
  sectionCount: number;
}

export interface PanelboardEquipment extends EquipmentRecord {
  shortCircuitRatingKa: number;
  circuitCount: number;
}

export interface LoadEquipment extends EquipmentRecord {
  loadType: LoadType;
  priority: number;
  powerFactor: number;
}

// ── Electrical attributes (set by propagation) ────────────────────────────────

export type PhaseCount = 1 | 3;

export interface ElectricalRecord {
  upstreamVoltage: number;
  downstreamVoltage: number;
  phases: PhaseCount;
  frequency: number;
  currentRating: number;
}

export interface TransformerElectrical extends ElectricalRecord {
  upstreamCurrent: number;
  downstreamCurrent: number;
}

// ── Post-validation analysis ──────────────────────────────────────────────────

export interface NodeAnalysis {
  propagatedPowerKw: number;
  riskScore: number;
  amperageRating?: number;
  powerRatingKva?: number;
  replacementCostUsd?: number;
}

// ── Nodes ─────────────────────────────────────────────────────────────────────

interface NodeCommon extends Point3 {
  readonly id: string;
  readonly floor: number;
  readonly roomCode: string;
  readonly capacityKw: number;
  readonly reason: string;
  analysis?: NodeAnalysis;
}

export interface TransformerNode extends NodeCommon {
  readonly type: "transformer";
  readonly subtype: EquipmentSubtype;
  readonly equipment: TransformerEquipment;
  electrical?: TransformerElectrical;
}

export interface SwitchboardNode extends NodeCommon {
  readonly type: "switchboard";
  readonly subtype: EquipmentSubtype;
  readonly equipment: SwitchboardEquipment;
  electrical?: ElectricalRecord;
}

export interface PanelboardNode extends NodeCommon {
  readonly type: "panelboard";
  readonly subtype: EquipmentSubtype;
  readonly equipment: PanelboardEquipment;
  electrical?: ElectricalRecord;
}

export interface LoadNode extends NodeCommon {
  readonly type: "load";
  readonly subtype: LoadType;
  readonly equipment: LoadEquipment;
  electrical?: ElectricalRecord;
}

export type TopologyNode = TransformerNode | SwitchboardNode | PanelboardNode | LoadNode;

export type Energized<N extends TopologyNode> = N extends TopologyNode
  ? N & { electrical: NonNullable<N["electrical"]> }
  : never;

export type EnergizedNode = Energized<TopologyNode>;

export function isEnergized<N extends TopologyNode>(node: N): node is Energized<N> & N {
  return node.electrical !== undefined;
}

/** The voltage a node delivers to its successors. */
export function deliveredVoltage(node: EnergizedNode): number {
  return node.electrical.downstreamVoltage;
}

// ── Edges ─────────────────────────────────────────────────────────────────────

export interface EdgeElectrical {
  voltage: number;
  currentRating: number;
  phases: PhaseCount;
  frequency: number;
  apparentCurrent: number;
  voltageDrop: number;
  voltageDropPercent: number;
  conductorSize: string;
}

export interface TopologyEdge {
  readonly source: string;
  readonly target: string;
  readonly connectionType: "power";
  readonly cableDistance: number;
  readonly loadClassification: string;
  electrical?: EdgeElectrical;
}

export type GraphMetadataValue = string | number | boolean;

// ── Graph ─────────────────────────────────────────────────────────────────────

function edgeKey(source: string, target: string): string {
  return `${source}\u0000${target}`;
}

/**
 * Directed graph with insertion-ordered nodes and edges. Parallel edges are
 * not allowed: adding an existing (source, target) pair returns the edge
 * already present.
 */
export class TopologyGraph {
  private readonly nodeMap = new Map<string, TopologyNode>();
  private readonly edgeMap = new Map<string, TopologyEdge>();
  private readonly succ = new Map<string, Set<string>>();
  private readonly pred = new Map<string, Set<string>>();
  readonly metadata: Record<string, GraphMetadataValue> = {};

  get nodeCount(): number {
    return this.nodeMap.size;
  }

  get edgeCount(): number {
    return this.edgeMap.size;
  }

  addNode(node: TopologyNode): void {
    if (this.nodeMap.has(node.id)) {
      throw new Error(`Duplicate node id '${node.id}'.`);
    }
    this.nodeMap.set(node.id, node);
    this.succ.set(node.id, new Set());
    this.pred.set(node.id, new Set());
  }

  hasNode(id: string): boolean {
    return this.nodeMap.has(id);
  }

  node(id: string): TopologyNode {
    const node = this.nodeMap.get(id);
    if (!node) {
      throw new Error(`Unknown node '${id}'.`);
    }
    return node;
  }

  nodes(): TopologyNode[] {
    return [...this.nodeMap.values()];
  }

  nodesOfType<T extends NodeType>(type: T): Array<Extract<TopologyNode, { type: T }>> {
    const out: Array<Extract<TopologyNode, { type: T }>> = [];
    for (const node of this.nodeMap.values()) {
      if (isNodeOfType(node, type)) out.push(node);
    }
    return out;
  }

  addEdge(edge: TopologyEdge): TopologyEdge {
    const existing = this.edgeMap.get(edgeKey(edge.source, edge.target));
    if (existing) return existing;
    const out = this.succ.get(edge.source);
    const into = this.pred.get(edge.target);
    if (!out || !into) {
      throw new Error(`Edge ${edge.source} -> ${edge.target} references an unknown node.`);
    }
    this.edgeMap.set(edgeKey(edge.source, edge.target), edge);
    out.add(edge.target);
    into.add(edge.source);
    return edge;
  }

  removeEdge(source: string, target: string): boolean {
    const removed = this.edgeMap.delete(edgeKey(source, target));
    if (removed) {
      this.succ.get(source)?.delete(target);
      this.pred.get(target)?.delete(source);
    }
    return removed;
  }

  edge(source: string, target: string): TopologyEdge | undefined {
    return this.edgeMap.get(edgeKey(source, target));
  }

  edges(): TopologyEdge[] {
    return [...this.edgeMap.values()];
  }

  successors(id: string): string[] {
    return [...(this.succ.get(id) ?? [])];
  }

  predecessors(id: string): string[] {
    return [...(this.pred.get(id) ?? [])];
  }

  inDegree(id: string): number {
    return this.pred.get(id)?.size ?? 0;
  }

  outDegree(id: string): number {
    return this.succ.get(id)?.size ?? 0;
  }

  /** Nodes with no incoming edge, in insertion order. */
  sources(): TopologyNode[] {
    return this.nodes().filter((n) => this.inDegree(n.id) === 0);
  }

  /** Every node reachable from `id` following edge direction, excluding `id`. */
  descendants(id: string): Set<string> {
    const seen = new Set<string>();
    const queue = [...this.successors(id)];
    while (queue.length > 0) {
      const next = queue.shift();
      if (next === undefined || seen.has(next) || next === id) continue;
      seen.add(next);
      queue.push(...this.successors(next));
    }
    return seen;
  }
}

export function isNodeOfType<T extends NodeType>(
  node: TopologyNode,
  type: T,
): node is Extract<TopologyNode, { type: T }> {
  return node.type === type;
}
