import createDebug from "debug";
// loads .env before MEPG_DEBUG is read
import "./shared.js";

const configured = process.env.MEPG_DEBUG?.trim();

if (configured) {
  createDebug.enable(configured);
}

export const profileLog = createDebug("mep:profile");
export const plannerLog = createDebug("mep:planner");
export const builderLog = createDebug("mep:builder");
export const voltageLog = createDebug("mep:voltage");
export const validatorLog = createDebug("mep:validator");
export const exportLog = createDebug("mep:export");
export const cliLog = createDebug("mep:cli");
