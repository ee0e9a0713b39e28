/**
 * Vertical electrical core (riser) planning.
 *
 * Purely geometric: no randomness, so the same profile always yields the
 * same strategy regardless of seed.
 */
import type { BuildingProfile } from "./building-profile.js";

export type CoreStrategyKind = "single_core" | "dual_core" | "multi_core";

export interface CorePosition {
  readonly xCenter: number;
  readonly yCenter: number;
  readonly coreId: string;
}

export interface CoreStrategy {
  readonly kind: CoreStrategyKind;
  readonly coreCount: number;
  readonly cores: readonly CorePosition[];
}

const TALL_BUILDING_HEIGHT_M = 30;
const MID_RISE_MIN_HEIGHT_M = 15;
const COMPACT_ASPECT_RATIO = 2.0;
const COMPACT_MIN_FLOORS = 6;
const DUAL_CORE_MAX_ASPECT_RATIO = 3.5;
const FLOOR_AREA_PER_CORE_SQM = 1200;

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

export function planCoreStrategy(profile: BuildingProfile): CoreStrategy {
  const { length, width, floorCount, floorArea, height } = profile;
  const aspectRatio = Math.max(length, width) / Math.min(length, width);

  let kind: CoreStrategyKind;
  let coreCount: number;
  if (height > TALL_BUILDING_HEIGHT_M || (aspectRatio < COMPACT_ASPECT_RATIO && floorCount > COMPACT_MIN_FLOORS)) {
    kind = "single_core";
    coreCount = 1;
  } else if (
    height >= MID_RISE_MIN_HEIGHT_M &&
    height <= TALL_BUILDING_HEIGHT_M &&
    aspectRatio <= DUAL_CORE_MAX_ASPECT_RATIO
  ) {
    kind = "dual_core";
    coreCount = 2;
  } else {
    kind = "multi_core";
    coreCount = clamp(Math.ceil(floorArea / FLOOR_AREA_PER_CORE_SQM), 2, 4);
  }

  return { kind, coreCount, cores: placeCores(length, width, coreCount) };
}

/**
 * Fractions are given on (longer axis, shorter axis) and mapped back onto
 * (x = length, y = width).
 */
const LAYOUTS: Record<number, Array<[number, number]>> = {
  1: [[0.5, 0.5]],
  2: [
    [0.3, 0.5],
    [0.7, 0.5],
  ],
  3: [
    [0.25, 0.3],
    [0.75, 0.3],
    [0.5, 0.7],
  ],
  4: [
    [0.25, 0.25],
    [0.75, 0.25],
    [0.25, 0.75],
    [0.75, 0.75],
  ],
};

export function placeCores(length: number, width: number, coreCount: number): CorePosition[] {
  const layout = LAYOUTS[coreCount] ?? LAYOUTS[1] ?? [];
  const lengthIsLonger = length >= width;
  return layout.map(([along, across], i) => ({
    xCenter: (lengthIsLonger ? along : across) * length,
    yCenter: (lengthIsLonger ? across : along) * width,
    coreId: `core_${i + 1}`,
  }));
}

export function nearestCore(cores: readonly CorePosition[], x: number, y: number): CorePosition {
  let best: CorePosition | undefined;
  let bestDist = Infinity;
  for (const core of cores) {
    const dist = Math.hypot(core.xCenter - x, core.yCenter - y);
    if (dist < bestDist) {
      bestDist = dist;
      best = core;
    }
  }
  if (!best) {
    throw new RangeError("Core strategy has no cores.");
  }
  return best;
}
