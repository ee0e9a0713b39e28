import { createBuildingProfile, type BuildingParameters, type BuildingProfile } from "./building-profile.js";
import type { Point3 } from "./geometry.js";
import { createNode, createPowerEdge } from "./graph-builder.js";
import { TopologyGraph, type TopologyNode } from "./graph.js";
import type { DecisionSubtype, NodeDecision, NodeType } from "./node-decision.js";
import { SeededRandom } from "./random.js";
import type { ElectricalRequirement, LoadType } from "./requirement-analyzer.js";

export const MINIMAL_BUILDING: BuildingParameters = {
  length: 20,
  width: 20,
  floorHeight: 3.5,
  floorCount: 3,
  basementDepth: 4,
  constructionYear: 2024,
};

export function testProfile(overrides: Partial<BuildingParameters> = {}): BuildingProfile {
  return createBuildingProfile({ ...MINIMAL_BUILDING, ...overrides });
}

export function requirement(loadType: LoadType, loadKw: number, location: Point3, floor = 1): ElectricalRequirement {
  return {
    id: 1,
    loadKw,
    voltageClass: loadType === "hvac" || loadType === "data_center" ? "medium" : "low",
    location,
    loadType,
    floor,
    room: `Room ${loadType}`,
    priority: 2,
  };
}

interface NodeDef {
  id: string;
  type: NodeType;
  subtype: DecisionSubtype;
  capacityKw: number;
  at: Point3;
  floor?: number;
}

/** Materializes one node without wiring it. */
export function makeNode(def: NodeDef, rng = new SeededRandom(7)): TopologyNode {
  const floor = def.floor ?? 1;
  const serves =
    def.type === "load" && def.subtype !== "main_service" && isLoadType(def.subtype)
      ? [requirement(def.subtype, def.capacityKw, def.at, floor)]
      : [];
  const decision: NodeDecision = {
    seq: 1,
    nodeType: def.type,
    subtype: def.subtype,
    reason: "test",
    capacityKw: def.capacityKw,
    floor,
    location: def.at,
    serves,
  };
  return createNode(decision, def.id, testProfile(), rng);
}

const LOAD_TYPES: readonly string[] = ["hvac", "lighting", "receptacle", "kitchen", "data_center"];

function isLoadType(subtype: DecisionSubtype): subtype is LoadType {
  return LOAD_TYPES.includes(subtype);
}

/** Builds a graph from node specs and `[source, target]` pairs. */
export function makeGraph(nodes: readonly NodeDef[], edges: ReadonlyArray<readonly [string, string]>): TopologyGraph {
  const graph = new TopologyGraph();
  const rng = new SeededRandom(7);
  for (const def of nodes) graph.addNode(makeNode(def, rng));
  for (const [source, target] of edges) {
    graph.addEdge(createPowerEdge(graph.node(source), graph.node(target), "Test Feed"));
  }
  return graph;
}
