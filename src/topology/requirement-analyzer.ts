/**
 * Converts a building profile into discrete electrical requirements.
 *
 * Load densities follow the usual W/ft² planning figures; services are
 * pinned to the electrical cores while general floor loads are scattered
 * inside the floor bounds.
 */
import { plannerLog } from "../debug.js";
import { round2 } from "../shared.js";
import { BASEMENT_FLOOR, floorTag, type BuildingProfile } from "./building-profile.js";
import { nearestCore, type CoreStrategy } from "./core-strategy.js";
import type { Point3 } from "./geometry.js";
import type { SeededRandom } from "./random.js";

// ── Types ─────────────────────────────────────────────────────────────────────

export type VoltageClass = "high" | "medium" | "low";

export type LoadType = "main_service" | "hvac" | "lighting" | "receptacle" | "kitchen" | "data_center";

export interface ElectricalRequirement {
  readonly id: number;
  readonly loadKw: number;
  readonly voltageClass: VoltageClass;
  readonly location: Point3;
  readonly loadType: LoadType;
  readonly floor: number;
  readonly room: string;
  /** 1 = critical. */
  readonly priority: number;
}

// ── Constants ─────────────────────────────────────────────────────────────────

export const SQM_TO_SQFT = 10.7639;

export const MAIN_SERVICE_W_PER_SQFT = 5.0;
export const HVAC_W_PER_SQFT = 2.0;
export const LIGHTING_W_PER_SQFT = 1.5;
export const GENERAL_POWER_W_PER_SQFT = 3.0;
export const KITCHEN_LOAD_KW = 30;
export const DATA_CENTER_LOAD_KW = 50;
const KITCHEN_FLOOR_INTERVAL = 3;

// ── Analysis ──────────────────────────────────────────────────────────────────

export function analyzeRequirements(
  profile: BuildingProfile,
  strategy: CoreStrategy,
  rng: SeededRandom,
): ElectricalRequirement[] {
  const requirements: ElectricalRequirement[] = [];
  const floorAreaSqft = profile.floorArea * SQM_TO_SQFT;
  const basementZ = -profile.basementDepth;

  const add = (req: Omit<ElectricalRequirement, "id">) => {
    requirements.push({ ...req, id: requirements.length + 1, loadKw: round2(req.loadKw) });
  };

  const randomPoint = (z: number): Point3 => ({
    x: rng.uniform(0, profile.length),
    y: rng.uniform(0, profile.width),
    z,
  });

  // Basement: service entrance and central plant
  const core = profile.electricalCore;
  add({
    loadKw: (MAIN_SERVICE_W_PER_SQFT * floorAreaSqft * profile.floorCount) / 1000,
    voltageClass: "high",
    location: { x: core.center.x, y: core.center.y, z: basementZ },
    loadType: "main_service",
    floor: BASEMENT_FLOOR,
    room: "Main Electrical Room",
    priority: 1,
  });

  const plantCore = nearestCore(strategy.cores, core.center.x, core.center.y);
  add({
    loadKw: (HVAC_W_PER_SQFT * floorAreaSqft * profile.floorCount) / 1000,
    voltageClass: "medium",
    location: { x: plantCore.xCenter, y: plantCore.yCenter, z: basementZ },
    loadType: "hvac",
    floor: BASEMENT_FLOOR,
    room: "Mechanical Room",
    priority: 2,
  });

  for (const level of profile.floors) {
    if (level.isBasement) continue;
    const k = level.index;
    const tag = floorTag(k);

    add({
      loadKw: (LIGHTING_W_PER_SQFT * floorAreaSqft) / 1000,
      voltageClass: "low",
      location: randomPoint(level.z),
      loadType: "lighting",
      floor: k,
      room: `${tag} Open Area`,
      priority: 2,
    });
    add({
      loadKw: (GENERAL_POWER_W_PER_SQFT * floorAreaSqft) / 1000,
      voltageClass: "low",
      location: randomPoint(level.z),
      loadType: "receptacle",
      floor: k,
      room: `${tag} Open Area`,
      priority: 3,
    });

    if (k % KITCHEN_FLOOR_INTERVAL === 0) {
      add({
        loadKw: KITCHEN_LOAD_KW,
        voltageClass: "low",
        location: randomPoint(level.z),
        loadType: "kitchen",
        floor: k,
        room: `${tag} Kitchen`,
        priority: 2,
      });
    }

    if (k === profile.floorCount) {
      const dcCore = strategy.cores[(k - 1) % strategy.cores.length] ?? plantCore;
      add({
        loadKw: DATA_CENTER_LOAD_KW,
        voltageClass: "medium",
        location: { x: dcCore.xCenter, y: dcCore.yCenter, z: level.z },
        loadType: "data_center",
        floor: k,
        room: `${tag} Data Center`,
        priority: 1,
      });
    }
  }

  plannerLog(
    "analyzed %d requirements, %d kW total",
    requirements.length,
    round2(requirements.reduce((sum, r) => sum + r.loadKw, 0)),
  );
  return requirements;
}
