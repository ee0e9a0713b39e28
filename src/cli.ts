/**
 * Command-line surface: `mep-topology <node_count> [options]`.
 */
import { parseArgs } from "node:util";
import { cliLog } from "./debug.js";
import { resolveBuildingDefaults } from "./shared.js";
import type { BuildingParameters } from "./topology/building-profile.js";
import { InvalidParameterError, isTopologyError } from "./topology/errors.js";
import { formatSummary } from "./topology/summary.js";
import { generateTopologyFile, type GenerateTopologyInput } from "./tools/mep/topology-generate.js";

export interface CliOutput {
  log(line: string): void;
  error(line: string): void;
}

const consoleOutput: CliOutput = {
  log: (line) => console.log(line),
  error: (line) => console.error(line),
};

export const USAGE = [
  "Usage: mep-topology <node_count> [options]",
  "",
  "Options:",
  "  -s, --seed <n>             random seed (default: random)",
  "  -f, --filename <name>      output file name (default: mep_graph_seed_<seed>_floors_<n>_<L>x<W>.mepg)",
  "      --length <m>           building length",
  "      --width <m>            building width",
  "      --floor-height <m>     floor-to-floor height",
  "      --floors <n>           above-ground floor count",
  "      --basement-depth <m>   basement depth",
  "      --construction-year <y> installation year (default: 2024)",
  "      --output-dir <dir>     output directory (default: graph_outputs)",
  "  -h, --help                 show this help",
].join("\n");

// ─── Argument parsing ───────────────────────────────────────────────────────

export type CliCommand = { kind: "help" } | { kind: "generate"; input: GenerateTopologyInput };

export function parseCliArgs(argv: readonly string[]): CliCommand {
  const { values, positionals } = parseArgs({
    args: [...argv],
    allowPositionals: true,
    strict: true,
    options: {
      seed: { type: "string", short: "s" },
      filename: { type: "string", short: "f" },
      length: { type: "string" },
      width: { type: "string" },
      "floor-height": { type: "string" },
      floors: { type: "string" },
      "basement-depth": { type: "string" },
      "construction-year": { type: "string" },
      "output-dir": { type: "string" },
      help: { type: "boolean", short: "h" },
    },
  });

  if (values.help) return { kind: "help" };

  const issues: string[] = [];
  const numeric = (label: string, raw: string | undefined): number | undefined => {
    if (raw === undefined) return undefined;
    const value = Number(raw);
    if (raw.trim() === "" || !Number.isFinite(value)) {
      issues.push(`${label} must be a number, got '${raw}'`);
      return undefined;
    }
    return value;
  };

  const nodeCount = numeric("node_count", positionals[0]);
  if (positionals.length === 0) issues.push("node_count is required");
  if (positionals.length > 1) issues.push(`unexpected arguments: ${positionals.slice(1).join(" ")}`);

  const seed = numeric("--seed", values.seed);
  const length = numeric("--length", values.length);
  const width = numeric("--width", values.width);
  const floorHeight = numeric("--floor-height", values["floor-height"]);
  const floors = numeric("--floors", values.floors);
  const basementDepth = numeric("--basement-depth", values["basement-depth"]);
  const constructionYear = numeric("--construction-year", values["construction-year"]);

  if (issues.length > 0 || nodeCount === undefined) {
    throw new InvalidParameterError(issues);
  }

  const defaults = resolveBuildingDefaults();
  const parameters: BuildingParameters = {
    length: length ?? defaults.length,
    width: width ?? defaults.width,
    floorHeight: floorHeight ?? defaults.floorHeight,
    floorCount: floors ?? defaults.floorCount,
    basementDepth: basementDepth ?? defaults.basementDepth,
    ...(constructionYear !== undefined && { constructionYear }),
  };

  return {
    kind: "generate",
    input: {
      parameters,
      targetNodeCount: nodeCount,
      ...(seed !== undefined && { seed }),
      ...(values.filename !== undefined && { filename: values.filename }),
      ...(values["output-dir"] !== undefined && { outputDir: values["output-dir"] }),
    },
  };
}

// ─── Run ────────────────────────────────────────────────────────────────────

/** Runs the CLI and returns the process exit code. */
export function runCli(argv: readonly string[], out: CliOutput = consoleOutput): number {
  let command: CliCommand;
  try {
    command = parseCliArgs(argv);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    out.error(`\x1b[31mError: ${message}\x1b[0m`);
    out.error(USAGE);
    return 1;
  }

  if (command.kind === "help") {
    out.log(USAGE);
    return 0;
  }

  const { input } = command;
  cliLog("generating %d nodes with seed %s", input.targetNodeCount, input.seed ?? "random");

  let output: ReturnType<typeof generateTopologyFile>;
  try {
    output = generateTopologyFile(input);
  } catch (err) {
    if (isTopologyError(err)) {
      out.error(`\x1b[31mError: ${err.message}\x1b[0m`);
      return 1;
    }
    throw err;
  }

  for (const line of formatSummary(output.summary)) out.log(line);
  out.log("");
  out.log(`\x1b[2mGraph written to ${output.filePath}\x1b[0m`);
  return 0;
}
