/**
 * GraphML writer for energized topology graphs (`.mepg` files).
 *
 * Every node and edge attribute is flattened into one snake_case scalar
 * namespace per domain. Each attribute name gets a typed `<key>`
 * declaration; a key is `double` when any value is fractional, `long` when
 * all are integral. Undefined values are omitted rather than written as
 * empty data.
 */
import { exportLog } from "../debug.js";
import { SerializationError } from "../topology/errors.js";
import type { TopologyEdge, TopologyGraph, TopologyNode } from "../topology/graph.js";

type AttrValue = string | number | boolean;
type AttrType = "string" | "long" | "double" | "boolean";
type Domain = "graph" | "node" | "edge";
type FlatRecord = Map<string, AttrValue>;

interface KeyDecl {
  id: string;
  domain: Domain;
  name: string;
  type: AttrType;
}

const GRAPHML_NS = "http://graphml.graphdrawing.org/xmlns";
const XSI_NS = "http://www.w3.org/2001/XMLSchema-instance";
const SCHEMA_LOCATION = "http://graphml.graphdrawing.org/xmlns http://graphml.graphdrawing.org/xmlns/1.0/graphml.xsd";

// ── Helpers ───────────────────────────────────────────────────────────────────

function escapeXml(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

export function snakeCase(key: string): string {
  return key.replace(/([a-z0-9])([A-Z])/g, "$1_$2").toLowerCase();
}

/** Copies scalar fields of `source` into `target`, recursing into nested records. */
function flattenInto(target: FlatRecord, source: object, elementId: string): void {
  for (const [key, value] of Object.entries(source)) {
    if (value === undefined || value === null) continue;
    if (typeof value === "object") {
      flattenInto(target, value, elementId);
      continue;
    }
    if (typeof value === "number" && !Number.isFinite(value)) {
      throw new SerializationError(elementId, `attribute '${key}' is not a finite number`);
    }
    if (typeof value !== "string" && typeof value !== "number" && typeof value !== "boolean") {
      throw new SerializationError(elementId, `attribute '${key}' has unsupported type ${typeof value}`);
    }
    const name = snakeCase(key);
    if (target.has(name)) {
      throw new SerializationError(elementId, `attribute '${name}' appears twice after flattening`);
    }
    target.set(name, value);
  }
}

function nodeAttributes(graph: TopologyGraph, node: TopologyNode): FlatRecord {
  const electrical = node.electrical;
  if (!electrical) {
    throw new SerializationError(node.id, "node has no electrical attributes; run voltage propagation first");
  }
  const attrs: FlatRecord = new Map();
  const { type, subtype, x, y, z, floor, roomCode, capacityKw, reason, equipment, analysis } = node;
  flattenInto(attrs, { type, subtype, x, y, z, floor, roomCode, capacityKw, reason }, node.id);
  attrs.set("parent", graph.predecessors(node.id)[0] ?? "");
  flattenInto(attrs, equipment, node.id);
  flattenInto(attrs, electrical, node.id);
  if (analysis) flattenInto(attrs, analysis, node.id);
  return attrs;
}

function edgeAttributes(edge: TopologyEdge): FlatRecord {
  const edgeId = `${edge.source}->${edge.target}`;
  const electrical = edge.electrical;
  if (!electrical) {
    throw new SerializationError(edgeId, "edge has no electrical attributes; run voltage propagation first");
  }
  const attrs: FlatRecord = new Map();
  const { connectionType, cableDistance, loadClassification } = edge;
  flattenInto(attrs, { connectionType, cableDistance, loadClassification }, edgeId);
  flattenInto(attrs, electrical, edgeId);
  return attrs;
}

function valueType(value: AttrValue): AttrType {
  if (typeof value === "string") return "string";
  if (typeof value === "boolean") return "boolean";
  return Number.isInteger(value) ? "long" : "double";
}

function widen(a: AttrType, b: AttrType): AttrType {
  if (a === b) return a;
  if ((a === "long" && b === "double") || (a === "double" && b === "long")) return "double";
  return "string";
}

function formatValue(value: AttrValue): string {
  if (typeof value === "boolean") return value ? "true" : "false";
  return escapeXml(String(value));
}

// ── Serialization ─────────────────────────────────────────────────────────────

export function serializeGraphMl(graph: TopologyGraph): string {
  const graphAttrs: FlatRecord = new Map();
  for (const [key, value] of Object.entries(graph.metadata)) {
    graphAttrs.set(snakeCase(key), value);
  }
  const nodes = graph.nodes().map((node) => ({ id: node.id, attrs: nodeAttributes(graph, node) }));
  const edges = graph.edges().map((edge) => ({ source: edge.source, target: edge.target, attrs: edgeAttributes(edge) }));

  // Key declarations, in first-seen order per domain
  const keys: KeyDecl[] = [];
  const keyIndex = new Map<string, KeyDecl>();
  const declare = (domain: Domain, records: readonly FlatRecord[]) => {
    for (const attrs of records) {
      for (const [name, value] of attrs) {
        const lookup = `${domain}:${name}`;
        const existing = keyIndex.get(lookup);
        if (existing) {
          existing.type = widen(existing.type, valueType(value));
          continue;
        }
        const decl: KeyDecl = { id: `d${keys.length}`, domain, name, type: valueType(value) };
        keys.push(decl);
        keyIndex.set(lookup, decl);
      }
    }
  };
  declare("graph", [graphAttrs]);
  declare("node", nodes.map((n) => n.attrs));
  declare("edge", edges.map((e) => e.attrs));

  const dataLines = (domain: Domain, attrs: FlatRecord, indent: string): string[] => {
    const lines: string[] = [];
    for (const [name, value] of attrs) {
      const decl = keyIndex.get(`${domain}:${name}`);
      if (!decl) continue;
      lines.push(`${indent}<data key="${decl.id}">${formatValue(value)}</data>`);
    }
    return lines;
  };

  const out: string[] = [
    `<?xml version="1.0" encoding="UTF-8"?>`,
    `<graphml xmlns="${GRAPHML_NS}" xmlns:xsi="${XSI_NS}" xsi:schemaLocation="${SCHEMA_LOCATION}">`,
  ];
  for (const key of keys) {
    out.push(
      `  <key id="${key.id}" for="${key.domain}" attr.name="${escapeXml(key.name)}" attr.type="${key.type}"/>`,
    );
  }
  out.push(`  <graph edgedefault="directed">`);
  out.push(...dataLines("graph", graphAttrs, "    "));
  for (const node of nodes) {
    out.push(`    <node id="${escapeXml(node.id)}">`);
    out.push(...dataLines("node", node.attrs, "      "));
    out.push(`    </node>`);
  }
  for (const edge of edges) {
    out.push(`    <edge source="${escapeXml(edge.source)}" target="${escapeXml(edge.target)}">`);
    out.push(...dataLines("edge", edge.attrs, "      "));
    out.push(`    </edge>`);
  }
  out.push(`  </graph>`);
  out.push(`</graphml>`);

  exportLog("serialized %d nodes, %d edges, %d keys", nodes.length, edges.length, keys.length);
  return out.join("\n") + "\n";
}
