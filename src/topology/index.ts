export * from "./building-profile.js";
export * from "./conductor-sizing.js";
export * from "./constraint-validator.js";
export * from "./core-strategy.js";
export * from "./errors.js";
export * from "./geometry.js";
export * from "./graph.js";
export * from "./graph-builder.js";
export * from "./load-rollup.js";
export * from "./node-decision.js";
export * from "./random.js";
export * from "./requirement-analyzer.js";
export * from "./summary.js";
export * from "./synthesize.js";
export * from "./voltage-propagator.js";
export { serializeGraphMl } from "../export/graphml.js";
export { GraphStore, createGraphStore, type GraphFileMetadata } from "../graph-store.js";
