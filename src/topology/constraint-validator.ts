/**
 * Post-construction checks with in-place repair.
 *
 * Violations are returned as data. Repairs only happen when they change
 * something, so a second run over a repaired graph reports no repairs.
 */
import { validatorLog } from "../debug.js";
import { closestPanelboard, createPowerEdge, loadClassificationFor, nearestPanelboard } from "./graph-builder.js";
import { isEnergized, type LoadNode, type PanelboardNode, type TopologyGraph } from "./graph.js";
import {
  energizeEdge,
  reenergizeFeeders,
  stepDown,
  transformerElectrical,
  type StandardVoltages,
} from "./voltage-propagator.js";

export type ConstraintRule = "transformer_step_down" | "transformer_hierarchy" | "load_single_feed";

export interface ConstraintViolation {
  rule: ConstraintRule;
  severity: "warning" | "repaired";
  nodeId: string;
  message: string;
  before?: string | number;
  after?: string | number;
}

export interface ValidationReport {
  violations: ConstraintViolation[];
  repaired: number;
  warnings: number;
}

function record(violations: ConstraintViolation[], violation: ConstraintViolation): void {
  violations.push(violation);
  validatorLog(
    "%s %s on %s: %s%s",
    violation.severity,
    violation.rule,
    violation.nodeId,
    violation.message,
    violation.before !== undefined ? ` (${String(violation.before)} -> ${String(violation.after ?? "")})` : "",
  );
}

// ── Pass 1: transformers ──────────────────────────────────────────────────────

function checkTransformers(graph: TopologyGraph, std: StandardVoltages, violations: ConstraintViolation[]): void {
  for (const tr of graph.nodesOfType("transformer")) {
    const elec = tr.electrical;
    if (elec && elec.downstreamVoltage >= elec.upstreamVoltage) {
      const corrected = stepDown(elec.upstreamVoltage, std);
      if (corrected !== elec.downstreamVoltage) {
        const before = elec.downstreamVoltage;
        tr.electrical = transformerElectrical(tr.capacityKw, elec.upstreamVoltage, corrected);
        reenergizeFeeders(graph, tr);
        record(violations, {
          rule: "transformer_step_down",
          severity: "repaired",
          nodeId: tr.id,
          message: `downstream voltage did not step down from ${elec.upstreamVoltage} V`,
          before,
          after: corrected,
        });
      } else {
        record(violations, {
          rule: "transformer_step_down",
          severity: "warning",
          nodeId: tr.id,
          message: `no standard tier sits below ${elec.upstreamVoltage} V`,
        });
      }
    }

    const fedBy = graph.predecessors(tr.id).filter((id) => graph.node(id).type === "transformer");
    const feeds = graph.successors(tr.id).filter((id) => graph.node(id).type === "transformer");
    if (fedBy.length > 0 || feeds.length > 0) {
      record(violations, {
        rule: "transformer_hierarchy",
        severity: "warning",
        nodeId: tr.id,
        message: `transformer adjacent to transformer (fed by [${fedBy.join(", ")}], feeds [${feeds.join(", ")}])`,
      });
    }
  }
}

// ── Pass 2: loads ─────────────────────────────────────────────────────────────

function connectLoad(graph: TopologyGraph, panel: PanelboardNode, load: LoadNode): void {
  const edge = graph.addEdge(createPowerEdge(panel, load, loadClassificationFor(load)));
  if (isEnergized(panel)) {
    energizeEdge(edge, panel, load);
  } else {
    validatorLog("feeder %s -> %s left unenergized: %s has no voltage", panel.id, load.id, panel.id);
  }
}

function checkLoads(graph: TopologyGraph, violations: ConstraintViolation[]): void {
  for (const load of graph.nodesOfType("load")) {
    const preds = graph.predecessors(load.id);
    const panelPreds = preds
      .map((id) => graph.node(id))
      .filter((n): n is PanelboardNode => n.type === "panelboard");

    if (preds.length === 1 && panelPreds.length === 1) continue;

    const keep = closestPanelboard(load, panelPreds) ?? nearestPanelboard(graph, load);
    if (!keep) {
      record(violations, {
        rule: "load_single_feed",
        severity: "warning",
        nodeId: load.id,
        message: "no panelboard available to feed this load",
      });
      continue;
    }

    for (const id of preds) {
      if (id !== keep.id) graph.removeEdge(id, load.id);
    }
    if (!graph.edge(keep.id, load.id)) connectLoad(graph, keep, load);

    let message: string;
    if (preds.length === 0) message = "orphaned load connected to nearest panelboard";
    else if (preds.length > 1) message = `load had ${preds.length} feeders`;
    else message = "load fed by non-panelboard equipment";

    record(violations, {
      rule: "load_single_feed",
      severity: "repaired",
      nodeId: load.id,
      message,
      before: preds.join(","),
      after: keep.id,
    });
  }
}

// ── Entry ─────────────────────────────────────────────────────────────────────

export function validateTopology(graph: TopologyGraph, std: StandardVoltages): ValidationReport {
  const violations: ConstraintViolation[] = [];
  checkTransformers(graph, std, violations);
  checkLoads(graph, violations);
  const repaired = violations.filter((v) => v.severity === "repaired").length;
  return { violations, repaired, warnings: violations.length - repaired };
}
