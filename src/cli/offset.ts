// Command-line moraine offset calculator
// Run with: npm run offset -- --dip-direction=70 --dip=50 --slip=33.5 --trend=40 [--unit=m] [--json] [--verbose]

import { fileURLToPath } from "node:url";
import {
  computeMoraineOffset,
  formatReport,
  formatDegrees,
} from "../moraine-offset.js";
import type { OffsetParams } from "../moraine-offset.js";
import { OffsetError } from "../geometry/index.js";
import { SUPPORTED_UNITS, DEFAULT_UNIT, isUnit } from "../units.js";
import type { Unit } from "../units.js";

export const USAGE =
  "Usage: npm run offset -- --dip-direction=N --dip=N --slip=N --trend=N " +
  `[--unit=${SUPPORTED_UNITS.join("|")}] [--json] [--verbose]`;

// ---------- CLI arg parsing ----------

export interface CliOptions {
  params: OffsetParams;
  unit: Unit;
  json: boolean;
  verbose: boolean;
}

const NUMERIC_FLAGS: readonly { flag: string; key: keyof OffsetParams }[] = [
  { flag: "--dip-direction", key: "faultDipDirectionDeg" },
  { flag: "--dip", key: "faultDipDeg" },
  { flag: "--slip", key: "dipSlipMagnitude" },
  { flag: "--trend", key: "moraineTrendDeg" },
];

function parseNumber(flag: string, raw: string): number {
  const value = Number(raw);
  if (raw.trim() === "" || Number.isNaN(value)) {
    throw new Error(`Invalid ${flag} value: "${raw}" is not a number`);
  }
  return value;
}

/** Parse argv (without node and script path). Throws on anything it cannot use. */
export function parseArgs(argv: string[]): CliOptions | { help: true } {
  const values: Partial<OffsetParams> = {};
  let unit: Unit = DEFAULT_UNIT;
  let json = false;
  let verbose = false;

  for (const arg of argv) {
    if (arg === "--help" || arg === "-h") return { help: true };
    if (arg === "--json") {
      json = true;
      continue;
    }
    if (arg === "--verbose") {
      verbose = true;
      continue;
    }

    const eq = arg.indexOf("=");
    const name = eq >= 0 ? arg.slice(0, eq) : arg;
    const raw = eq >= 0 ? arg.slice(eq + 1) : "";

    if (name === "--unit") {
      if (!isUnit(raw)) {
        throw new Error(
          `Unsupported unit "${raw}". Supported: ${SUPPORTED_UNITS.join(", ")}`,
        );
      }
      unit = raw;
      continue;
    }

    const numeric = NUMERIC_FLAGS.find((f) => f.flag === name);
    if (!numeric) throw new Error(`Unknown argument: ${arg}\n${USAGE}`);
    if (eq < 0) throw new Error(`Missing value for ${name} (use ${name}=N)`);
    values[numeric.key] = parseNumber(name, raw);
  }

  const missing = NUMERIC_FLAGS.filter((f) => values[f.key] === undefined).map(
    (f) => f.flag,
  );
  const {
    faultDipDirectionDeg,
    faultDipDeg,
    dipSlipMagnitude,
    moraineTrendDeg,
  } = values;
  if (
    faultDipDirectionDeg === undefined ||
    faultDipDeg === undefined ||
    dipSlipMagnitude === undefined ||
    moraineTrendDeg === undefined
  ) {
    throw new Error(`Missing required ${missing.join(", ")}\n${USAGE}`);
  }

  return {
    params: { faultDipDirectionDeg, faultDipDeg, dipSlipMagnitude, moraineTrendDeg },
    unit,
    json,
    verbose,
  };
}

// ---------- Output ----------

/** Compute and return the lines to print. Errors from the pipeline propagate. */
export function renderOutput(options: CliOptions): string[] {
  const { params, unit, json, verbose } = options;
  const result = computeMoraineOffset(params);
  const report = formatReport(result, unit);

  if (json) {
    return [JSON.stringify({ ...result, unit, report }, null, 2)];
  }
  if (!verbose) return [report];

  return [
    "moraine offset calculator\n",
    `  --dip-direction=${params.faultDipDirectionDeg}`,
    `  --dip=${params.faultDipDeg}`,
    `  --slip=${params.dipSlipMagnitude}`,
    `  --trend=${params.moraineTrendDeg}`,
    "\nStep 1: Fault strike",
    `  → ${formatDegrees(result.strikeDeg)}`,
    "\nStep 2: Moraine plunge on the fault plane",
    `  → strike difference ${formatDegrees(result.strikeDifferenceDeg)}, apparent dip ${formatDegrees(result.apparentDipDeg)}`,
    "\nStep 3: Rake of the moraine trace",
    `  → ${formatDegrees(result.rakeDeg)}`,
    "\nStep 4: Horizontal projection of the dip slip",
    `  → ${result.horizontalOffset.toFixed(3)} ${unit}`,
    `\n${report}`,
  ];
}

// ---------- Main ----------

function main(): void {
  const options = parseArgs(process.argv.slice(2));
  if ("help" in options) {
    console.log(USAGE);
    return;
  }
  for (const line of renderOutput(options)) {
    console.log(line);
  }
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  try {
    main();
  } catch (err) {
    if (err instanceof OffsetError) {
      console.error(`Offset failed: ${err.name}: ${err.message}`);
    } else {
      console.error("Offset failed:", err instanceof Error ? err.message : err);
    }
    process.exit(1);
  }
}
