/**
 * Shared setup code used by both the CLI (entry.ts) and the tool definitions.
 */
import fs from "node:fs";
import path from "node:path";

// ─── .env loading ────────────────────────────────────────────────────────────

export function loadDotEnv(cwd: string = process.cwd()) {
  let content: string;
  try {
    content = fs.readFileSync(path.join(cwd, ".env"), "utf-8");
  } catch {
    // No .env file
    return;
  }
  for (const line of content.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;
    const eqIdx = trimmed.indexOf("=");
    if (eqIdx === -1) continue;
    const key = trimmed.slice(0, eqIdx).trim();
    const value = trimmed.slice(eqIdx + 1).trim();
    if (key && !(key in process.env)) {
      process.env[key] = value;
    }
  }
}

// Load .env immediately so env vars are available for module-level constants
loadDotEnv();

// ─── Configuration ───────────────────────────────────────────────────────────

function envNumber(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  return Number.isFinite(value) ? value : fallback;
}

export const OUTPUT_DIR = process.env.MEPG_OUTPUT_DIR ?? "graph_outputs";

export interface BuildingDefaults {
  length: number;
  width: number;
  floorCount: number;
  floorHeight: number;
  basementDepth: number;
}

export function resolveBuildingDefaults(): BuildingDefaults {
  return {
    length: envNumber("MEPG_DEFAULT_LENGTH", 20),
    width: envNumber("MEPG_DEFAULT_WIDTH", 20),
    floorCount: Math.round(envNumber("MEPG_DEFAULT_FLOORS", 4)),
    floorHeight: envNumber("MEPG_DEFAULT_FLOOR_HEIGHT", 3.5),
    basementDepth: envNumber("MEPG_DEFAULT_BASEMENT_DEPTH", 4),
  };
}

// ─── Ensure directories ─────────────────────────────────────────────────────

export function resolveOutputDir(override?: string): string {
  return path.resolve(process.cwd(), override ?? OUTPUT_DIR);
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

export function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

export function titleCase(value: string): string {
  return value
    .split(/[_\s-]+/)
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(" ");
}
