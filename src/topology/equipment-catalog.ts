/**
 * Cosmetic equipment attributes: manufacturer, enclosure dimensions and
 * nameplate ratings drawn from bounded ranges, plus baseline lifecycle
 * figures for new construction.
 *
 * Nothing here affects electrical correctness. Draw order per node is
 * manufacturer, width, depth, height, manufacture year, then the
 * kind-specific ratings.
 */
import { round2 } from "../shared.js";
import type { BuildingProfile } from "./building-profile.js";
import { lineCurrent, selectDistributionRating } from "./conductor-sizing.js";
import type {
  EquipmentRecord,
  LoadEquipment,
  PanelboardEquipment,
  SwitchboardEquipment,
  TransformerEquipment,
} from "./graph.js";
import type { EquipmentSubtype } from "./node-decision.js";
import type { SeededRandom } from "./random.js";
import type { LoadType } from "./requirement-analyzer.js";

type Range = readonly [min: number, max: number];

interface Envelope {
  width: Range;
  depth: Range;
  height: Range;
}

interface Lifecycle {
  lifespanYears: number;
  maintenanceMonths: number;
}

// ── Catalog ───────────────────────────────────────────────────────────────────

const GEAR_MANUFACTURERS = ["ABB", "Eaton", "Schneider Electric", "Siemens", "GE Vernova"] as const;

const LOAD_MANUFACTURERS: Record<LoadType, readonly string[]> = {
  main_service: ["Eaton", "Siemens"],
  hvac: ["Carrier", "Trane", "Daikin"],
  lighting: ["Acuity Brands", "Signify", "Cooper Lighting"],
  receptacle: ["Leviton", "Hubbell", "Legrand"],
  kitchen: ["Hobart", "Vulcan", "Rational"],
  data_center: ["Vertiv", "APC"],
};

const ENVELOPES = {
  transformer: { width: [1.5, 2.5], depth: [1.2, 2.0], height: [1.8, 2.5] },
  switchboard: { width: [2.0, 4.0], depth: [0.6, 1.0], height: [2.0, 2.4] },
  panelboard: { width: [0.5, 0.8], depth: [0.15, 0.3], height: [1.0, 1.8] },
  load: { width: [0.3, 1.5], depth: [0.3, 1.5], height: [0.3, 2.0] },
} satisfies Record<string, Envelope>;

const LIFECYCLE = {
  mainTransformer: { lifespanYears: 35, maintenanceMonths: 12 },
  transformer: { lifespanYears: 30, maintenanceMonths: 12 },
  switchboard: { lifespanYears: 30, maintenanceMonths: 24 },
  panelboard: { lifespanYears: 25, maintenanceMonths: 24 },
  load: { lifespanYears: 15, maintenanceMonths: 6 },
} satisfies Record<string, Lifecycle>;

const POWER_FACTORS: Record<LoadType, number> = {
  main_service: 0.9,
  hvac: 0.85,
  lighting: 0.95,
  receptacle: 0.9,
  kitchen: 0.9,
  data_center: 0.95,
};

const TRANSFORMER_SC_RATINGS_KA = [25, 35, 50, 65] as const;
const SWITCHBOARD_SC_RATINGS_KA = [42, 65, 100] as const;
const PANELBOARD_SC_RATINGS_KA = [10, 14, 22, 25] as const;
const PANELBOARD_CIRCUITS = [18, 24, 30, 42] as const;

/** Equipment leaves the factory up to this many years before installation. */
const MAX_SHELF_YEARS = 2;
const NOMINAL_POWER_FACTOR = 0.9;
const SWITCHBOARD_BUS_VOLTAGE = 480;

// ── Drawing ───────────────────────────────────────────────────────────────────

function drawBase(
  rng: SeededRandom,
  profile: BuildingProfile,
  manufacturers: readonly string[],
  envelope: Envelope,
  lifecycle: Lifecycle,
): EquipmentRecord {
  const manufacturer = rng.pick(manufacturers);
  const widthM = round2(rng.uniform(...envelope.width));
  const depthM = round2(rng.uniform(...envelope.depth));
  const heightM = round2(rng.uniform(...envelope.height));
  const installYear = profile.constructionYear;
  const manufactureYear = rng.integer(installYear - MAX_SHELF_YEARS, installYear);
  return {
    manufacturer,
    widthM,
    depthM,
    heightM,
    manufactureYear,
    installYear,
    installationDate: `${installYear}-01-01`,
    expectedLifespanYears: lifecycle.lifespanYears,
    maintenanceFrequencyMonths: lifecycle.maintenanceMonths,
  };
}

export function drawTransformerEquipment(
  rng: SeededRandom,
  profile: BuildingProfile,
  subtype: EquipmentSubtype,
  capacityKw: number,
): TransformerEquipment {
  const lifecycle = subtype === "main" ? LIFECYCLE.mainTransformer : LIFECYCLE.transformer;
  const base = drawBase(rng, profile, GEAR_MANUFACTURERS, ENVELOPES.transformer, lifecycle);
  return {
    ...base,
    nominalPowerKva: round2(capacityKw / NOMINAL_POWER_FACTOR),
    shortCircuitRatingKa: rng.pick(TRANSFORMER_SC_RATINGS_KA),
    impedancePercent: round2(rng.uniform(4, 6)),
  };
}

export function drawSwitchboardEquipment(
  rng: SeededRandom,
  profile: BuildingProfile,
  capacityKw: number,
): SwitchboardEquipment {
  const base = drawBase(rng, profile, GEAR_MANUFACTURERS, ENVELOPES.switchboard, LIFECYCLE.switchboard);
  return {
    ...base,
    shortCircuitRatingKa: rng.pick(SWITCHBOARD_SC_RATINGS_KA),
    busRatingAmps: selectDistributionRating(lineCurrent(capacityKw, SWITCHBOARD_BUS_VOLTAGE, 3)).rating,
    sectionCount: rng.integer(2, 5),
  };
}

export function drawPanelboardEquipment(rng: SeededRandom, profile: BuildingProfile): PanelboardEquipment {
  const base = drawBase(rng, profile, GEAR_MANUFACTURERS, ENVELOPES.panelboard, LIFECYCLE.panelboard);
  return {
    ...base,
    shortCircuitRatingKa: rng.pick(PANELBOARD_SC_RATINGS_KA),
    circuitCount: rng.pick(PANELBOARD_CIRCUITS),
  };
}

export function drawLoadEquipment(
  rng: SeededRandom,
  profile: BuildingProfile,
  loadType: LoadType,
  priority: number,
): LoadEquipment {
  const base = drawBase(rng, profile, LOAD_MANUFACTURERS[loadType], ENVELOPES.load, LIFECYCLE.load);
  return { ...base, loadType, priority, powerFactor: POWER_FACTORS[loadType] };
}

export function powerFactorFor(loadType: LoadType): number {
  return POWER_FACTORS[loadType];
}
