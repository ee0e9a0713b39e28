import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { parseCliArgs, runCli, USAGE, type CliOutput } from "./cli.js";

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "topology-cli-"));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

function capture(): CliOutput & { logs: string[]; errors: string[] } {
  const logs: string[] = [];
  const errors: string[] = [];
  return { logs, errors, log: (line) => logs.push(line), error: (line) => errors.push(line) };
}

describe("parseCliArgs", () => {
  it("reads the node count and options", () => {
    const command = parseCliArgs(["12", "--seed", "5", "--floors", "6", "-f", "tower", "--construction-year", "2020"]);
    expect(command).toMatchObject({
      kind: "generate",
      input: {
        targetNodeCount: 12,
        seed: 5,
        filename: "tower",
        parameters: { floorCount: 6, constructionYear: 2020 },
      },
    });
  });

  it("recognizes help", () => {
    expect(parseCliArgs(["--help"])).toEqual({ kind: "help" });
    expect(parseCliArgs(["10", "-h"])).toEqual({ kind: "help" });
  });

  it("collects argument problems", () => {
    expect(() => parseCliArgs([])).toThrow("Invalid parameters: node_count is required");
    expect(() => parseCliArgs(["abc"])).toThrow("node_count must be a number, got 'abc'");
    expect(() => parseCliArgs(["10", "20"])).toThrow("unexpected arguments: 20");
    expect(() => parseCliArgs(["10", "--width", "wide"])).toThrow("--width must be a number, got 'wide'");
  });
});

describe("runCli", () => {
  it("prints usage for help", () => {
    const out = capture();
    expect(runCli(["-h"], out)).toBe(0);
    expect(out.logs).toEqual([USAGE]);
  });

  it("fails on unknown options", () => {
    const out = capture();
    expect(runCli(["10", "--bogus"], out)).toBe(1);
    expect(out.errors[0]?.startsWith("\x1b[31mError: ")).toBe(true);
    expect(out.errors[1]).toBe(USAGE);
  });

  it("fails on out-of-range parameters", () => {
    const out = capture();
    expect(runCli(["2", "--output-dir", dir], out)).toBe(1);
    expect(out.errors).toEqual([
      "\x1b[31mError: Invalid parameters: targetNodeCount: targetNodeCount must be at least 3\x1b[0m",
    ]);
    expect(fs.readdirSync(dir)).toEqual([]);
  });

  it("generates and writes a graph", () => {
    const out = capture();
    const argv = [
      "10",
      "--seed", "1",
      "--length", "20",
      "--width", "20",
      "--floors", "3",
      "--floor-height", "3.5",
      "--basement-depth", "4",
      "--construction-year", "2024",
      "--output-dir", dir,
    ];
    expect(runCli(argv, out)).toBe(0);

    const filePath = path.join(dir, "mep_graph_seed_1_floors_3_20x20.mepg");
    expect(fs.existsSync(filePath)).toBe(true);
    expect(out.logs[0]).toBe("Electrical Distribution Topology");
    expect(out.logs).toContain("Seed:          1");
    expect(out.logs).toContain("Nodes: 10");
    expect(out.logs.at(-1)).toBe(`\x1b[2mGraph written to ${filePath}\x1b[0m`);
    expect(out.errors).toEqual([]);
  });
});
