import { toVector, dot, clamp, RAD_TO_DEG } from "./index";

/**
 * Rake (degrees, 0–180): angle within the fault plane between a line
 * lying in the plane and the plane's strike.
 */
export function rake(
  lineTrendDeg: number,
  linePlungeDeg: number,
  faultStrikeDeg: number,
): number {
  const line = toVector(lineTrendDeg, linePlungeDeg);
  const strike = toVector(faultStrikeDeg, 0);
  // Rounding can push the dot product of two unit vectors just past ±1
  return Math.acos(clamp(dot(line, strike), -1, 1)) * RAD_TO_DEG;
}
