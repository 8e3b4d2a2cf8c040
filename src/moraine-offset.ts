// Shared offset pipeline used by both the CLI and the app
// validate → strike → apparent dip → rake → horizontal offset

import {
  strikeLine,
  strikeDifference,
  apparentDip,
  rake,
  horizontalOffset,
  ValidationError,
} from "./geometry/index";
import { DEFAULT_UNIT } from "./units";
import type { Unit } from "./units";

// ---------- Types ----------

export interface OffsetParams {
  faultDipDirectionDeg: number;
  /** 90 passes validation but is singular downstream. */
  faultDipDeg: number;
  /** Dip-slip displacement, in any length unit. */
  dipSlipMagnitude: number;
  moraineTrendDeg: number;
}

export interface OffsetResult {
  readonly params: Readonly<OffsetParams>;
  readonly strikeDeg: number;
  readonly strikeDifferenceDeg: number;
  /** Plunge of the moraine once projected onto the fault plane. */
  readonly apparentDipDeg: number;
  readonly rakeDeg: number;
  /** Same length unit as dipSlipMagnitude. */
  readonly horizontalOffset: number;
}

// ---------- Validation ----------

function requireInRange(
  parameter: keyof OffsetParams,
  value: number,
  ok: boolean,
  constraint: string,
): void {
  if (!Number.isFinite(value)) {
    throw new ValidationError(parameter, "a finite number", value);
  }
  if (!ok) throw new ValidationError(parameter, constraint, value);
}

/** Throw ValidationError for the first parameter outside its domain. */
export function validateParams(params: OffsetParams): void {
  const { faultDipDirectionDeg, faultDipDeg, dipSlipMagnitude, moraineTrendDeg } = params;
  requireInRange(
    "faultDipDirectionDeg",
    faultDipDirectionDeg,
    faultDipDirectionDeg >= 0 && faultDipDirectionDeg < 360,
    "in [0, 360)",
  );
  requireInRange(
    "faultDipDeg",
    faultDipDeg,
    faultDipDeg >= 0 && faultDipDeg <= 90,
    "in [0, 90]",
  );
  requireInRange(
    "dipSlipMagnitude",
    dipSlipMagnitude,
    dipSlipMagnitude >= 0,
    "non-negative",
  );
  requireInRange(
    "moraineTrendDeg",
    moraineTrendDeg,
    moraineTrendDeg >= 0 && moraineTrendDeg < 360,
    "in [0, 360)",
  );
}

// ---------- Pipeline ----------

/**
 * Run the full chain for one fault and moraine. The first stage that hits
 * a singularity throws and the remaining stages do not run.
 */
export function computeMoraineOffset(params: OffsetParams): OffsetResult {
  validateParams(params);

  const plane = {
    dipDirectionDeg: params.faultDipDirectionDeg,
    dipDeg: params.faultDipDeg,
  };
  const strike = strikeLine(plane);
  const apparentDipDeg = apparentDip(
    plane.dipDirectionDeg,
    plane.dipDeg,
    params.moraineTrendDeg,
  );
  const rakeDeg = rake(params.moraineTrendDeg, apparentDipDeg, strike.trendDeg);

  return {
    params: { ...params },
    strikeDeg: strike.trendDeg,
    strikeDifferenceDeg: strikeDifference(
      plane.dipDirectionDeg,
      params.moraineTrendDeg,
    ),
    apparentDipDeg,
    rakeDeg,
    horizontalOffset: horizontalOffset(params.dipSlipMagnitude, rakeDeg),
  };
}

// ---------- Report ----------

/** Round half away from zero to one decimal, without ever printing "-0.0". */
export function formatOneDecimal(value: number): string {
  const rounded = (Math.sign(value) * Math.round(Math.abs(value) * 10)) / 10;
  return (rounded === 0 ? 0 : rounded).toFixed(1);
}

export function formatReport(
  result: Pick<OffsetResult, "horizontalOffset">,
  unit: Unit = DEFAULT_UNIT,
): string {
  return `Moraine offset: ${formatOneDecimal(result.horizontalOffset)} ${unit}`;
}

/** Angle with a degree sign, e.g. "69.64°". */
export function formatDegrees(deg: number, digits = 2): string {
  const fixed = deg.toFixed(digits);
  return `${Number(fixed) === 0 ? (0).toFixed(digits) : fixed}°`;
}
