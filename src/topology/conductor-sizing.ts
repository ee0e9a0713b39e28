/**
 * Conductor and equipment sizing tables.
 *
 * Feeder voltage drop per NEC Chapter 9 (K-factor method), standard
 * overcurrent/bus ratings, and standard dry-type transformer kVA sizes with
 * their typical replacement costs.
 *
 * Pure TypeScript -- no external dependencies.
 */
import { round2 } from "../shared.js";

// ── Types ─────────────────────────────────────────────────────────────────────

export interface VoltageDrop {
  voltage_drop_v: number;
  voltage_drop_percent: number;
  wire_size_awg: string;
}

export interface RatedSize {
  rating: number;
  replacementCostUsd: number;
}

// ── Constants ─────────────────────────────────────────────────────────────────

// Resistivity constant K for copper (ohm-cmil/ft)
const K_COPPER = 12.9;
const FEET_PER_METER = 3.28084;

// Standard AWG wire sizes with circular mil areas
const AWG_SIZES: Array<{ label: string; cmil: number; ampacity: number }> = [
  { label: "14",    cmil: 4110,    ampacity: 15 },
  { label: "12",    cmil: 6530,    ampacity: 20 },
  { label: "10",    cmil: 10380,   ampacity: 30 },
  { label: "8",     cmil: 16510,   ampacity: 40 },
  { label: "6",     cmil: 26240,   ampacity: 55 },
  { label: "4",     cmil: 41740,   ampacity: 70 },
  { label: "3",     cmil: 52620,   ampacity: 85 },
  { label: "2",     cmil: 66360,   ampacity: 95 },
  { label: "1",     cmil: 83690,   ampacity: 110 },
  { label: "1/0",   cmil: 105600,  ampacity: 125 },
  { label: "2/0",   cmil: 133100,  ampacity: 145 },
  { label: "3/0",   cmil: 167800,  ampacity: 165 },
  { label: "4/0",   cmil: 211600,  ampacity: 195 },
  { label: "250",   cmil: 250000,  ampacity: 215 },
  { label: "300",   cmil: 300000,  ampacity: 240 },
  { label: "350",   cmil: 350000,  ampacity: 260 },
  { label: "400",   cmil: 400000,  ampacity: 280 },
  { label: "500",   cmil: 500000,  ampacity: 320 },
  { label: "600",   cmil: 600000,  ampacity: 355 },
  { label: "750",   cmil: 750000,  ampacity: 400 },
  { label: "1000",  cmil: 1000000, ampacity: 455 },
];

// Standard bus / overcurrent ratings (A) and typical replacement cost (USD)
const STANDARD_DISTRIBUTION_SIZES: RatedSize[] = [
  { rating: 60, replacementCostUsd: 1000 },
  { rating: 100, replacementCostUsd: 1500 },
  { rating: 150, replacementCostUsd: 2000 },
  { rating: 200, replacementCostUsd: 2250 },
  { rating: 225, replacementCostUsd: 3000 },
  { rating: 300, replacementCostUsd: 4000 },
  { rating: 400, replacementCostUsd: 5000 },
  { rating: 500, replacementCostUsd: 6000 },
  { rating: 600, replacementCostUsd: 8000 },
  { rating: 800, replacementCostUsd: 10000 },
  { rating: 1000, replacementCostUsd: 12000 },
  { rating: 1200, replacementCostUsd: 16000 },
  { rating: 1600, replacementCostUsd: 20000 },
  { rating: 2000, replacementCostUsd: 25000 },
  { rating: 2500, replacementCostUsd: 30000 },
  { rating: 3000, replacementCostUsd: 40000 },
  { rating: 4000, replacementCostUsd: 50000 },
  { rating: 5000, replacementCostUsd: 60000 },
  { rating: 6000, replacementCostUsd: 80000 },
  { rating: 8000, replacementCostUsd: 100000 },
  { rating: 10000, replacementCostUsd: 120000 },
];

// Standard transformer sizes (kVA) and typical replacement cost (USD)
const STANDARD_TRANSFORMER_SIZES: RatedSize[] = [
  { rating: 15, replacementCostUsd: 1500 },
  { rating: 25, replacementCostUsd: 2500 },
  { rating: 37.5, replacementCostUsd: 3750 },
  { rating: 50, replacementCostUsd: 5000 },
  { rating: 75, replacementCostUsd: 7500 },
  { rating: 100, replacementCostUsd: 10000 },
  { rating: 112.5, replacementCostUsd: 11250 },
  { rating: 150, replacementCostUsd: 15000 },
  { rating: 167, replacementCostUsd: 16700 },
  { rating: 200, replacementCostUsd: 20000 },
  { rating: 225, replacementCostUsd: 22500 },
  { rating: 250, replacementCostUsd: 25000 },
  { rating: 300, replacementCostUsd: 30000 },
  { rating: 400, replacementCostUsd: 40000 },
  { rating: 500, replacementCostUsd: 50000 },
];

// Continuous loads may use 80% of a standard rating
const CONTINUOUS_LOAD_FACTOR = 0.8;

// ── Current ───────────────────────────────────────────────────────────────────

/** Line current for a real-power load: P / V single-phase, P / (√3·V) three-phase. */
export function lineCurrent(powerKw: number, voltage: number, phases: 1 | 3): number {
  if (voltage <= 0) return 0;
  const watts = powerKw * 1000;
  return phases === 3 ? watts / (Math.sqrt(3) * voltage) : watts / voltage;
}

// ── Voltage Drop Calculation ──────────────────────────────────────────────────

export function calculateVoltageDrop(
  current: number,
  lengthM: number,
  voltage: number,
  phases: 1 | 3,
): VoltageDrop {
  const lengthFt = lengthM * FEET_PER_METER;
  const multiplier = phases === 1 ? 2 : 1.732;

  // Find smallest wire that handles the current and meets 3% voltage drop
  const targetMaxVD = voltage * 0.03;

  const largest = AWG_SIZES[AWG_SIZES.length - 1];
  if (!largest) {
    throw new RangeError("Conductor table is empty.");
  }
  let selectedWire = largest;
  for (const wire of AWG_SIZES) {
    if (wire.ampacity < current) continue;

    selectedWire = wire;
    const vd = (multiplier * K_COPPER * current * lengthFt) / wire.cmil;
    if (vd <= targetMaxVD) {
      break;
    }
  }

  const actualVD = (multiplier * K_COPPER * current * lengthFt) / selectedWire.cmil;
  const vdPercent = voltage > 0 ? (actualVD / voltage) * 100 : 0;

  return {
    voltage_drop_v: round2(actualVD),
    voltage_drop_percent: round2(vdPercent),
    wire_size_awg: selectedWire.label,
  };
}

// ── Equipment Sizing ──────────────────────────────────────────────────────────

function selectRated(table: readonly RatedSize[], demand: number): RatedSize {
  for (const size of table) {
    if (demand <= size.rating * CONTINUOUS_LOAD_FACTOR) return size;
  }
  const largest = table[table.length - 1];
  if (!largest) {
    throw new RangeError("Sizing table is empty.");
  }
  return largest;
}

/** Smallest standard bus rating whose 80% covers the current; largest size when none does. */
export function selectDistributionRating(currentAmps: number): RatedSize {
  return selectRated(STANDARD_DISTRIBUTION_SIZES, currentAmps);
}

export function selectTransformerRating(powerKva: number): RatedSize {
  return selectRated(STANDARD_TRANSFORMER_SIZES, powerKva);
}
