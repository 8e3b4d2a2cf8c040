// Apparent dip of a plane along an arbitrary trend

import { DEG_TO_RAD, RAD_TO_DEG } from "./index";
import { SingularityError } from "./errors";

/** tan(dip) diverges within this distance of vertical. */
export const SINGULAR_DIP_TOLERANCE_DEG = 1e-9;

/**
 * Angle (degrees) between the strike of the plane and the section trend,
 * measured so that a section along the dip direction gives 90.
 */
export function strikeDifference(
  dipDirectionDeg: number,
  lineTrendDeg: number,
): number {
  return dipDirectionDeg - lineTrendDeg + 90;
}

/**
 * Apparent dip (degrees) of a plane seen in a vertical section along
 * `lineTrendDeg`. Taken along a moraine's trend, this is the moraine's
 * plunge once it is constrained to lie in the fault plane.
 *
 * Throws SingularityError for a vertical plane, where tan(dip) is undefined.
 */
export function apparentDip(
  dipDirectionDeg: number,
  dipDeg: number,
  lineTrendDeg: number,
): number {
  if (Math.abs(dipDeg - 90) <= SINGULAR_DIP_TOLERANCE_DEG) {
    throw new SingularityError(
      "faultDipDeg",
      "makes tan(dip) undefined for a vertical fault",
      dipDeg,
    );
  }
  const diffRad = strikeDifference(dipDirectionDeg, lineTrendDeg) * DEG_TO_RAD;
  return (
    Math.atan(Math.sin(diffRad) * Math.tan(dipDeg * DEG_TO_RAD)) * RAD_TO_DEG
  );
}
