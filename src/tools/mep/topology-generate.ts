/**
 * Electrical distribution topology generator.
 *
 * Synthesizes a utility → transformer → switchboard → panelboard → load
 * graph for a building envelope and writes it as a `.mepg` (GraphML) file.
 */
import { z } from "zod";
import { createGraphStore, type GraphFileMetadata } from "../../graph-store.js";
import { resolveBuildingDefaults } from "../../shared.js";
import { serializeGraphMl } from "../../export/graphml.js";
import { formatIssues, type BuildingParameters } from "../../topology/building-profile.js";
import { InvalidParameterError } from "../../topology/errors.js";
import { formatSummary, summarizeTopology, type TopologySummary } from "../../topology/summary.js";
import { synthesizeTopology, type TopologyResult } from "../../topology/synthesize.js";

// ── Types ─────────────────────────────────────────────────────────────────────

export interface GenerateTopologyInput {
  parameters: BuildingParameters;
  targetNodeCount: number;
  seed?: number;
  filename?: string;
  outputDir?: string;
}

export interface GenerateTopologyOutput {
  result: TopologyResult;
  summary: TopologySummary;
  file: GraphFileMetadata;
  filePath: string;
}

// ── Generation ────────────────────────────────────────────────────────────────

export function defaultGraphFilename(seed: number, parameters: BuildingParameters): string {
  return `mep_graph_seed_${seed}_floors_${parameters.floorCount}_${parameters.length}x${parameters.width}.mepg`;
}

export function generateTopologyFile(input: GenerateTopologyInput): GenerateTopologyOutput {
  const result = synthesizeTopology(input.parameters, {
    targetNodeCount: input.targetNodeCount,
    ...(input.seed !== undefined && { seed: input.seed }),
  });
  const content = serializeGraphMl(result.graph);

  const store = createGraphStore(input.outputDir);
  const file = store.saveGraph({
    filename: input.filename ?? defaultGraphFilename(result.seed, input.parameters),
    content,
    generationId: String(result.graph.metadata.generationId ?? ""),
    seed: result.seed,
    nodeCount: result.graph.nodeCount,
    edgeCount: result.graph.edgeCount,
  });

  return { result, summary: summarizeTopology(result), file, filePath: store.filePath(file.filename) };
}

// ── Tool arguments ────────────────────────────────────────────────────────────

const ToolArgsSchema = z.object({
  node_count: z.number({ required_error: "node_count is required" }),
  seed: z.number().optional(),
  length: z.number().optional(),
  width: z.number().optional(),
  floor_height: z.number().optional(),
  floors: z.number().optional(),
  basement_depth: z.number().optional(),
  construction_year: z.number().optional(),
  electrical_core: z
    .object({
      center: z.object({ x: z.number(), y: z.number() }),
      size: z.object({ width: z.number(), depth: z.number() }),
    })
    .optional(),
  filename: z.string().min(1).optional(),
  output_dir: z.string().min(1).optional(),
});

export type TopologyToolArgs = z.infer<typeof ToolArgsSchema>;

export function toGenerateInput(args: TopologyToolArgs): GenerateTopologyInput {
  const defaults = resolveBuildingDefaults();
  const parameters: BuildingParameters = {
    length: args.length ?? defaults.length,
    width: args.width ?? defaults.width,
    floorHeight: args.floor_height ?? defaults.floorHeight,
    floorCount: args.floors ?? defaults.floorCount,
    basementDepth: args.basement_depth ?? defaults.basementDepth,
    ...(args.construction_year !== undefined && { constructionYear: args.construction_year }),
    ...(args.electrical_core !== undefined && { electricalCore: args.electrical_core }),
  };
  return {
    parameters,
    targetNodeCount: args.node_count,
    ...(args.seed !== undefined && { seed: args.seed }),
    ...(args.filename !== undefined && { filename: args.filename }),
    ...(args.output_dir !== undefined && { outputDir: args.output_dir }),
  };
}

// ── Tool definition ───────────────────────────────────────────────────────────

export function createTopologyGenerateToolDefinition() {
  return {
    name: "mep_topology_generate",
    label: "Electrical Topology Generator",
    description:
      "Generate a synthetic electrical distribution topology (utility transformer, switchboards, " +
      "panelboards and end loads) for a building envelope. Voltages, phases and currents are " +
      "propagated through the hierarchy and the result is written as a GraphML-based .mepg file.",
    parameters: {
      type: "object",
      properties: {
        node_count: {
          type: "integer",
          description: "Target number of equipment nodes (minimum 3). Loads are trimmed or panelboards added to approach it.",
          minimum: 3,
        },
        seed: {
          type: "integer",
          description: "Random seed. The same seed and building parameters always produce the same graph.",
          minimum: 0,
        },
        length: { type: "number", description: "Building length in meters. Default: 20.", exclusiveMinimum: 0 },
        width: { type: "number", description: "Building width in meters. Default: 20.", exclusiveMinimum: 0 },
        floor_height: { type: "number", description: "Floor-to-floor height in meters. Default: 3.5.", exclusiveMinimum: 0 },
        floors: { type: "integer", description: "Number of above-ground floors. Default: 4.", minimum: 1 },
        basement_depth: { type: "number", description: "Basement depth in meters. Default: 4.", exclusiveMinimum: 0 },
        construction_year: { type: "integer", description: "Year the equipment is installed. Default: 2024." },
        electrical_core: {
          type: "object",
          description: "Main electrical room footprint. Default: building center, 3 m x 3 m.",
          properties: {
            center: {
              type: "object",
              properties: { x: { type: "number" }, y: { type: "number" } },
              required: ["x", "y"],
            },
            size: {
              type: "object",
              properties: { width: { type: "number" }, depth: { type: "number" } },
              required: ["width", "depth"],
            },
          },
          required: ["center", "size"],
        },
        filename: {
          type: "string",
          description: "Output file name. Default: mep_graph_seed_<seed>_floors_<n>_<L>x<W>.mepg",
        },
        output_dir: {
          type: "string",
          description: "Directory the graph is written to. Default: graph_outputs (or MEPG_OUTPUT_DIR).",
        },
      },
      required: ["node_count"],
    },
    execute: async (
      _toolCallId: string,
      args: unknown,
    ): Promise<{ content: Array<{ type: string; text: string }>; details?: unknown }> => {
      const parsed = ToolArgsSchema.safeParse(args ?? {});
      if (!parsed.success) {
        throw new InvalidParameterError(formatIssues(parsed.error));
      }

      const output = generateTopologyFile(toGenerateInput(parsed.data));
      const { summary } = output;

      const text = [...formatSummary(summary), ``, `Written to: ${output.filePath}`];

      return {
        content: [
          { type: "text", text: text.join("\n") },
          { type: "text", text: JSON.stringify(summary, null, 2) },
        ],
        details: {
          file_path: output.filePath,
          generation_id: output.file.generationId,
          seed: summary.seed,
          node_count: summary.nodeCount,
          edge_count: summary.edgeCount,
          core_strategy: summary.coreStrategy,
        },
      };
    },
  };
}
