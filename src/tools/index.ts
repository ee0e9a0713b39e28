/**
 * Barrel file: exports all tool definitions.
 *
 * Each tool follows the pattern: createXxxToolDefinition() → ToolDefinition
 */

// ─── MEP ────────────────────────────────────────────────────────────────────
import { createTopologyGenerateToolDefinition } from "./mep/topology-generate.js";

// ─── Re-export all individual creators ──────────────────────────────────────
export { createTopologyGenerateToolDefinition };

// ─── Convenience: build all tools at once ───────────────────────────────────

export function createAllToolDefinitions() {
  return [
    // MEP
    createTopologyGenerateToolDefinition(),
  ];
}
