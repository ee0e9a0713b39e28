/**
 * Building parameter validation and normalization.
 *
 * Raw parameters are parsed with zod; the resulting profile is frozen and
 * carries the derived areas, height and per-floor Z levels every later stage
 * reads.
 */
import { z } from "zod";
import { profileLog } from "../debug.js";
import { InvalidParameterError } from "./errors.js";

// ── Schema ────────────────────────────────────────────────────────────────────

const positive = (label: string) =>
  z.number({ invalid_type_error: `${label} must be a number` }).finite().positive(`${label} must be greater than 0`);

export const ElectricalCoreSchema = z.object({
  center: z.object({ x: z.number().finite(), y: z.number().finite() }),
  size: z.object({ width: positive("core width"), depth: positive("core depth") }),
});

export const BuildingParametersSchema = z
  .object({
    length: positive("length"),
    width: positive("width"),
    floorHeight: positive("floorHeight"),
    floorCount: z
      .number({ invalid_type_error: "floorCount must be a number" })
      .int("floorCount must be an integer")
      .min(1, "floorCount must be at least 1"),
    basementDepth: positive("basementDepth").default(4),
    electricalCore: ElectricalCoreSchema.optional(),
    constructionYear: z.number().int().min(1900).max(2200).optional(),
  })
  .superRefine((params, ctx) => {
    const core = params.electricalCore;
    if (!core) return;
    const { x, y } = core.center;
    if (x < 0 || x > params.length || y < 0 || y > params.width) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["electricalCore", "center"],
        message: "electrical core center must lie inside the building footprint",
      });
    }
  });

export type BuildingParameters = z.input<typeof BuildingParametersSchema>;
export type ElectricalCore = z.infer<typeof ElectricalCoreSchema>;

// ── Profile ───────────────────────────────────────────────────────────────────

export interface FloorLevel {
  readonly index: number;
  readonly z: number;
  readonly isBasement: boolean;
}

export interface BuildingProfile {
  readonly length: number;
  readonly width: number;
  readonly floorHeight: number;
  readonly floorCount: number;
  readonly basementDepth: number;
  readonly electricalCore: ElectricalCore;
  readonly constructionYear: number;
  /** Footprint area of one floor, m². */
  readonly floorArea: number;
  /** Floor area summed over every above-ground floor, m². */
  readonly totalFloorArea: number;
  /** Above-ground height, m. */
  readonly height: number;
  /** Index 0 is the basement; 1..floorCount are the above-ground floors. */
  readonly floors: readonly FloorLevel[];
}

export const BASEMENT_FLOOR = 0;
/** Install year when none is given. */
export const DEFAULT_CONSTRUCTION_YEAR = 2024;
const DEFAULT_CORE_SIZE_M = 3;

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
  );
}

export function createBuildingProfile(raw: unknown): BuildingProfile {
  const parsed = BuildingParametersSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidParameterError(formatIssues(parsed.error));
  }
  const params = parsed.data;

  const floors: FloorLevel[] = [{ index: BASEMENT_FLOOR, z: -params.basementDepth, isBasement: true }];
  for (let k = 1; k <= params.floorCount; k++) {
    floors.push({ index: k, z: (k - 1) * params.floorHeight, isBasement: false });
  }

  const floorArea = params.length * params.width;
  const profile: BuildingProfile = {
    length: params.length,
    width: params.width,
    floorHeight: params.floorHeight,
    floorCount: params.floorCount,
    basementDepth: params.basementDepth,
    electricalCore: params.electricalCore ?? {
      center: { x: params.length / 2, y: params.width / 2 },
      size: { width: DEFAULT_CORE_SIZE_M, depth: DEFAULT_CORE_SIZE_M },
    },
    constructionYear: params.constructionYear ?? DEFAULT_CONSTRUCTION_YEAR,
    floorArea,
    totalFloorArea: floorArea * params.floorCount,
    height: params.floorCount * params.floorHeight,
    floors: Object.freeze(floors.map((f) => Object.freeze(f))),
  };

  profileLog(
    "profile %dm x %dm, %d floors @ %dm, basement %dm",
    profile.length,
    profile.width,
    profile.floorCount,
    profile.floorHeight,
    profile.basementDepth,
  );
  return Object.freeze(profile);
}

/** Z level of a floor index; unknown floors fall back to the ground floor. */
export function floorZ(profile: BuildingProfile, floor: number): number {
  return profile.floors.find((f) => f.index === floor)?.z ?? 0;
}

export function floorTag(floor: number): string {
  return floor === BASEMENT_FLOOR ? "B" : `L${String(floor).padStart(2, "0")}`;
}
