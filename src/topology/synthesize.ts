/**
 * End-to-end topology synthesis: profile → cores → requirements → decisions
 * → graph → voltages → validation → roll-up.
 *
 * Every random draw comes from one stream seeded here, so the same
 * parameters, target and seed always give the same graph.
 */
import crypto from "node:crypto";
import { z } from "zod";
import { round2 } from "../shared.js";
import { createBuildingProfile, formatIssues, type BuildingProfile } from "./building-profile.js";
import { validateTopology, type ValidationReport } from "./constraint-validator.js";
import { planCoreStrategy, type CoreStrategy } from "./core-strategy.js";
import { InvalidParameterError } from "./errors.js";
import { buildGraph } from "./graph-builder.js";
import type { TopologyGraph } from "./graph.js";
import { rollUpLoads, type RollupSummary } from "./load-rollup.js";
import { planNodeDecisions } from "./node-decision.js";
import { createRandom } from "./random.js";
import { analyzeRequirements, type ElectricalRequirement } from "./requirement-analyzer.js";
import {
  HIGH_VOLTAGE_TIERS,
  propagateVoltages,
  standardVoltages,
  type PropagationReport,
} from "./voltage-propagator.js";

export const MIN_TARGET_NODE_COUNT = 3;

export const SynthesisOptionsSchema = z.object({
  targetNodeCount: z
    .number({ required_error: "targetNodeCount is required", invalid_type_error: "targetNodeCount must be a number" })
    .int("targetNodeCount must be an integer")
    .min(MIN_TARGET_NODE_COUNT, `targetNodeCount must be at least ${MIN_TARGET_NODE_COUNT}`),
  seed: z
    .number({ invalid_type_error: "seed must be a number" })
    .int("seed must be an integer")
    .min(0, "seed must not be negative")
    .max(0xffffffff, "seed must fit in 32 bits")
    .optional(),
});

export type SynthesisOptions = z.input<typeof SynthesisOptionsSchema>;

export interface TopologyResult {
  graph: TopologyGraph;
  profile: BuildingProfile;
  strategy: CoreStrategy;
  requirements: ElectricalRequirement[];
  propagation: PropagationReport;
  validation: ValidationReport;
  rollup: RollupSummary;
  seed: number;
}

function generationId(profile: BuildingProfile, targetNodeCount: number, seed: number): string {
  const fingerprint = JSON.stringify({
    seed,
    targetNodeCount,
    length: profile.length,
    width: profile.width,
    floorHeight: profile.floorHeight,
    floorCount: profile.floorCount,
    basementDepth: profile.basementDepth,
    electricalCore: profile.electricalCore,
    constructionYear: profile.constructionYear,
  });
  return crypto.createHash("sha1").update(fingerprint).digest("hex").slice(0, 12);
}

export function synthesizeTopology(parameters: unknown, options: SynthesisOptions): TopologyResult {
  const issues: string[] = [];
  const parsedOptions = SynthesisOptionsSchema.safeParse(options);
  if (!parsedOptions.success) issues.push(...formatIssues(parsedOptions.error));

  let profile: BuildingProfile | undefined;
  try {
    profile = createBuildingProfile(parameters);
  } catch (err) {
    if (!(err instanceof InvalidParameterError)) throw err;
    issues.push(...err.issues);
  }
  if (!parsedOptions.success || !profile || issues.length > 0) {
    throw new InvalidParameterError(issues);
  }
  const { targetNodeCount, seed } = parsedOptions.data;

  const rng = createRandom(seed);
  const strategy = planCoreStrategy(profile);
  const requirements = analyzeRequirements(profile, strategy, rng);
  const decisions = planNodeDecisions(requirements, profile, strategy, targetNodeCount, rng);
  const graph = buildGraph(decisions, profile, rng);

  const std = standardVoltages(rng.pick(HIGH_VOLTAGE_TIERS));
  const propagation = propagateVoltages(graph, std);
  const validation = validateTopology(graph, std);
  const rollup = rollUpLoads(graph);

  const totalLoadKw = round2(
    requirements.filter((r) => r.loadType !== "main_service").reduce((sum, r) => sum + r.loadKw, 0),
  );
  Object.assign(graph.metadata, {
    generationId: generationId(profile, targetNodeCount, rng.seed),
    seed: rng.seed,
    description: `Electrical distribution topology for a ${profile.floorCount}-floor ${profile.length} m x ${profile.width} m building`,
    buildingLength: profile.length,
    buildingWidth: profile.width,
    floorCount: profile.floorCount,
    floorHeight: profile.floorHeight,
    basementDepth: profile.basementDepth,
    coreStrategy: strategy.kind,
    coreCount: strategy.coreCount,
    highVoltage: std.high,
    targetNodeCount,
    totalLoadKw,
    constructionYear: profile.constructionYear,
  });

  return { graph, profile, strategy, requirements, propagation, validation, rollup, seed: rng.seed };
}
