#!/usr/bin/env node
/**
 * mep-topology: generate a synthetic building electrical distribution graph.
 */
import { runCli } from "./cli.js";

async function main() {
  process.exitCode = runCli(process.argv.slice(2));
}

main().catch((err) => {
  console.error("Fatal:", err);
  process.exit(1);
});
