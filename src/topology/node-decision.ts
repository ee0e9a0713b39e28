/**
 * Node decision planning.
 *
 * Turns requirements into typed equipment decisions in four steps: main
 * service gear, per-floor distribution, one load per requirement, and a
 * final reconciliation against the caller's target node count.
 */
import { plannerLog } from "../debug.js";
import { round2 } from "../shared.js";
import { floorZ, type BuildingProfile } from "./building-profile.js";
import { nearestCore, type CoreStrategy } from "./core-strategy.js";
import { centroid, type Point3 } from "./geometry.js";
import type { SeededRandom } from "./random.js";
import type { ElectricalRequirement, LoadType } from "./requirement-analyzer.js";

// ── Types ─────────────────────────────────────────────────────────────────────

export type NodeType = "transformer" | "switchboard" | "panelboard" | "load";

export type EquipmentSubtype = "main" | "secondary" | "distribution" | "lighting" | "power" | "generic";

export type DecisionSubtype = EquipmentSubtype | LoadType;

export interface NodeDecision {
  /** Unique within one planning run; identity only, carries no ordering meaning beyond tie-breaks. */
  readonly seq: number;
  readonly nodeType: NodeType;
  readonly subtype: DecisionSubtype;
  readonly reason: string;
  readonly capacityKw: number;
  readonly floor: number;
  readonly location: Point3;
  readonly serves: readonly ElectricalRequirement[];
}

type DecisionDraft = Omit<NodeDecision, "seq">;

// ── Constants ─────────────────────────────────────────────────────────────────

export const MAIN_SERVICE_THRESHOLD_KW = 100;
export const SECONDARY_TRANSFORMER_THRESHOLD_KW = 75;
export const LOW_VOLTAGE_KW_PER_PANEL = 40;
export const MAX_PANELS_PER_GROUP = 3;
export const FILLER_MIN_KW = 20;
export const FILLER_MAX_KW = 50;

const MAIN_TRANSFORMER_FACTOR = 1.25;
const MAIN_SWITCHBOARD_FACTOR = 1.2;
const SECONDARY_TRANSFORMER_FACTOR = 1.3;
const DISTRIBUTION_PANEL_FACTOR = 1.2;
const BRANCH_PANEL_FACTOR = 1.25;
const SIBLING_OFFSET_M = 1.0;

function sumLoad(requirements: readonly ElectricalRequirement[]): number {
  return requirements.reduce((sum, r) => sum + r.loadKw, 0);
}

// ── Planner ───────────────────────────────────────────────────────────────────

export function planNodeDecisions(
  requirements: readonly ElectricalRequirement[],
  profile: BuildingProfile,
  strategy: CoreStrategy,
  targetNodeCount: number,
  rng: SeededRandom,
): NodeDecision[] {
  let decisions: NodeDecision[] = [];
  let seq = 0;
  const emit = (draft: DecisionDraft) => {
    seq += 1;
    decisions.push({ ...draft, capacityKw: round2(draft.capacityKw), seq });
  };

  /** Riser position nearest the served loads, nudged so siblings do not coincide. */
  const riserPlacement = (served: readonly ElectricalRequirement[], floor: number, sibling: number): Point3 => {
    const c = centroid(served.map((r) => r.location));
    const core = nearestCore(strategy.cores, c.x, c.y);
    return {
      x: Math.min(profile.length, core.xCenter + sibling * SIBLING_OFFSET_M),
      y: core.yCenter,
      z: floorZ(profile, floor),
    };
  };

  // Step A: main service
  const mainService = requirements.find((r) => r.loadType === "main_service");
  const others = requirements.filter((r) => r.loadType !== "main_service");
  const totalLoad = sumLoad(others);
  if (mainService && totalLoad > MAIN_SERVICE_THRESHOLD_KW) {
    emit({
      nodeType: "transformer",
      subtype: "main",
      reason: `Utility service transformer for ${round2(totalLoad)} kW building load`,
      capacityKw: totalLoad * MAIN_TRANSFORMER_FACTOR,
      floor: mainService.floor,
      location: mainService.location,
      serves: [mainService],
    });
    emit({
      nodeType: "switchboard",
      subtype: "main",
      reason: "Main switchboard distributing the service to the building",
      capacityKw: totalLoad * MAIN_SWITCHBOARD_FACTOR,
      floor: mainService.floor,
      location: mainService.location,
      serves: [mainService],
    });
  } else {
    plannerLog("no main service gear: load %d kW below %d kW threshold", round2(totalLoad), MAIN_SERVICE_THRESHOLD_KW);
  }

  // Step B: per-floor distribution
  const groups = new Map<string, { floor: number; voltageClass: "medium" | "low"; members: ElectricalRequirement[] }>();
  for (const req of others) {
    if (req.voltageClass === "high") continue;
    const key = `${req.floor}:${req.voltageClass}`;
    const group = groups.get(key) ?? { floor: req.floor, voltageClass: req.voltageClass, members: [] };
    group.members.push(req);
    groups.set(key, group);
  }
  const orderedGroups = [...groups.values()].sort(
    (a, b) => a.floor - b.floor || (a.voltageClass === b.voltageClass ? 0 : a.voltageClass === "medium" ? -1 : 1),
  );

  for (const group of orderedGroups) {
    const total = sumLoad(group.members);
    if (group.voltageClass === "medium") {
      if (total > SECONDARY_TRANSFORMER_THRESHOLD_KW) {
        emit({
          nodeType: "transformer",
          subtype: "secondary",
          reason: `Step-down transformer for ${round2(total)} kW of medium-voltage load on floor ${group.floor}`,
          capacityKw: total * SECONDARY_TRANSFORMER_FACTOR,
          floor: group.floor,
          location: riserPlacement(group.members, group.floor, 0),
          serves: group.members,
        });
      }
      emit({
        nodeType: "panelboard",
        subtype: "distribution",
        reason: `Distribution panelboard for medium-voltage loads on floor ${group.floor}`,
        capacityKw: total * DISTRIBUTION_PANEL_FACTOR,
        floor: group.floor,
        location: riserPlacement(group.members, group.floor, 1),
        serves: group.members,
      });
      continue;
    }

    // a partition may come out empty; it still becomes a power panelboard
    const panelCount = Math.max(1, Math.min(MAX_PANELS_PER_GROUP, Math.floor(total / LOW_VOLTAGE_KW_PER_PANEL)));
    const partitions: ElectricalRequirement[][] = Array.from({ length: panelCount }, () => []);
    group.members.forEach((req, i) => partitions[i % panelCount]?.push(req));

    partitions.forEach((members, i) => {
      const share = sumLoad(members);
      const subtype = members.some((r) => r.loadType === "lighting") ? "lighting" : "power";
      emit({
        nodeType: "panelboard",
        subtype,
        reason: `${subtype === "lighting" ? "Lighting" : "Power"} panelboard ${i + 1}/${panelCount} on floor ${group.floor}`,
        capacityKw: share * BRANCH_PANEL_FACTOR,
        floor: group.floor,
        location: riserPlacement(members, group.floor, i),
        serves: members,
      });
    });
  }

  // Step C: end loads
  for (const req of others) {
    emit({
      nodeType: "load",
      subtype: req.loadType,
      reason: `${req.loadType} load in ${req.room}`,
      capacityKw: req.loadKw,
      floor: req.floor,
      location: req.location,
      serves: [req],
    });
  }

  // Step D: reconcile against the target node count
  if (decisions.length < targetNodeCount) {
    const aboveGround = profile.floors.filter((f) => !f.isBasement);
    while (decisions.length < targetNodeCount) {
      const level = rng.pick(aboveGround);
      const capacity = rng.uniform(FILLER_MIN_KW, FILLER_MAX_KW);
      const core = rng.pick(strategy.cores);
      emit({
        nodeType: "panelboard",
        subtype: "generic",
        reason: "Additional panelboard to reach the requested node count",
        capacityKw: capacity,
        floor: level.index,
        location: { x: core.xCenter, y: core.yCenter, z: level.z },
        serves: [],
      });
    }
    plannerLog("padded decisions to %d with generic panelboards", decisions.length);
  } else if (decisions.length > targetNodeCount) {
    const nonLoads = decisions.filter((d) => d.nodeType !== "load");
    const budget = Math.max(0, targetNodeCount - nonLoads.length);
    const kept = new Set(
      decisions
        .filter((d) => d.nodeType === "load")
        .sort((a, b) => b.capacityKw - a.capacityKw || a.seq - b.seq)
        .slice(0, budget)
        .map((d) => d.seq),
    );
    const before = decisions.length;
    decisions = decisions.filter((d) => d.nodeType !== "load" || kept.has(d.seq));
    plannerLog("trimmed decisions from %d to %d (target %d)", before, decisions.length, targetNodeCount);
  }

  return decisions;
}
