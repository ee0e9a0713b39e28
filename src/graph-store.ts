/**
 * On-disk store for generated topology graphs.
 *
 * Graphs are written as `<name>.mepg` files into one output directory, which
 * also holds a `_manifest.json` describing every graph written through the
 * store.
 */
import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { exportLog } from "./debug.js";
import { resolveOutputDir } from "./shared.js";

// ─── Types ──────────────────────────────────────────────────────────────────

export const GRAPH_FILE_SUFFIX = ".mepg";
const MANIFEST_FILE = "_manifest.json";

const GraphFileMetadataSchema = z.object({
  filename: z.string(),
  originalName: z.string(),
  size: z.number(),
  createdAt: z.string(),
  generationId: z.string().optional(),
  seed: z.number().optional(),
  nodeCount: z.number().optional(),
  edgeCount: z.number().optional(),
});

const GraphManifestSchema = z.object({
  files: z.record(GraphFileMetadataSchema),
  createdAt: z.string(),
  updatedAt: z.string(),
});

export type GraphFileMetadata = z.infer<typeof GraphFileMetadataSchema>;
type GraphManifest = z.infer<typeof GraphManifestSchema>;

export interface SaveGraphParams {
  filename: string;
  content: string;
  generationId?: string;
  seed?: number;
  nodeCount?: number;
  edgeCount?: number;
}

interface GraphStoreConfig {
  outputDir: string;
}

// ─── GraphStore ─────────────────────────────────────────────────────────────

export class GraphStore {
  private config: GraphStoreConfig;

  constructor(config: GraphStoreConfig) {
    this.config = config;
  }

  get outputDir(): string {
    return this.config.outputDir;
  }

  private manifestPath(): string {
    return path.join(this.config.outputDir, MANIFEST_FILE);
  }

  /** Ensure the output directory exists */
  ensureOutputDir(): string {
    fs.mkdirSync(this.config.outputDir, { recursive: true });
    return this.config.outputDir;
  }

  filePath(filename: string): string {
    return path.join(this.config.outputDir, filename);
  }

  // ─── Manifest ───────────────────────────────────────────────────────────

  private getManifest(): GraphManifest {
    let raw: string;
    try {
      raw = fs.readFileSync(this.manifestPath(), "utf-8");
    } catch {
      const now = new Date().toISOString();
      return { files: {}, createdAt: now, updatedAt: now };
    }
    const parsed = GraphManifestSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      throw new Error(`Corrupt graph manifest at ${this.manifestPath()}: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  private saveManifest(manifest: GraphManifest): void {
    this.ensureOutputDir();
    manifest.updatedAt = new Date().toISOString();
    fs.writeFileSync(this.manifestPath(), JSON.stringify(manifest, null, 2), "utf-8");
  }

  // ─── Graph operations ───────────────────────────────────────────────────

  saveGraph(params: SaveGraphParams): GraphFileMetadata {
    const filename = graphFilename(params.filename);
    this.ensureOutputDir();

    const data = Buffer.from(params.content, "utf-8");
    fs.writeFileSync(this.filePath(filename), data);

    const metadata: GraphFileMetadata = {
      filename,
      originalName: params.filename,
      size: data.length,
      createdAt: new Date().toISOString(),
      ...(params.generationId !== undefined && { generationId: params.generationId }),
      ...(params.seed !== undefined && { seed: params.seed }),
      ...(params.nodeCount !== undefined && { nodeCount: params.nodeCount }),
      ...(params.edgeCount !== undefined && { edgeCount: params.edgeCount }),
    };

    const manifest = this.getManifest();
    manifest.files[filename] = metadata;
    this.saveManifest(manifest);
    exportLog("wrote %s (%d bytes)", this.filePath(filename), data.length);

    return metadata;
  }

  listGraphs(): GraphFileMetadata[] {
    return Object.values(this.getManifest().files);
  }

  getGraphMetadata(filename: string): GraphFileMetadata | null {
    return this.getManifest().files[filename] ?? null;
  }

  readGraph(filename: string): string {
    return fs.readFileSync(this.filePath(sanitizeFilename(filename)), "utf-8");
  }

  deleteGraph(filename: string): boolean {
    const manifest = this.getManifest();
    if (!manifest.files[filename]) return false;

    fs.rmSync(this.filePath(filename), { force: true });

    delete manifest.files[filename];
    this.saveManifest(manifest);
    return true;
  }
}

// ─── Utilities ──────────────────────────────────────────────────────────────

/** Sanitize a filename: remove path separators, prevent traversal */
export function sanitizeFilename(name: string): string {
  let clean = path.basename(name);
  clean = clean.replace(/^\.+/, "");
  clean = clean.replace(/[<>:"/\\|?*\x00-\x1f]/g, "_");
  if (!clean) clean = "unnamed_graph";
  return clean;
}

/** Sanitized file name carrying the `.mepg` suffix exactly once. */
export function graphFilename(name: string): string {
  const clean = sanitizeFilename(name);
  return clean.endsWith(GRAPH_FILE_SUFFIX) ? clean : `${clean}${GRAPH_FILE_SUFFIX}`;
}

/** Create a GraphStore rooted at the configured (or given) output directory */
export function createGraphStore(outputDir?: string): GraphStore {
  return new GraphStore({ outputDir: resolveOutputDir(outputDir) });
}
