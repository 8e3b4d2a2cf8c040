// Shared geometry library: orientation primitives and the fault offset chain
// Used by both the command-line calculator and the web app

// ---------- Types ----------

/** [x, y, z] direction; unit length when built from a trend/plunge pair */
export type Vector3D = [number, number, number];

/** A line's orientation in degrees. Trend clockwise from north, plunge downward from horizontal. */
export type Line = { trendDeg: number; plungeDeg: number };

/** A plane given by the bearing of steepest descent and its dip, both in degrees. */
export type FaultPlane = { dipDirectionDeg: number; dipDeg: number };

// ---------- Internal helpers ----------

export const DEG_TO_RAD = Math.PI / 180;
export const RAD_TO_DEG = 180 / Math.PI;

export function clamp(x: number, lo: number, hi: number): number {
  return x < lo ? lo : x > hi ? hi : x;
}

/** Wrap a bearing into [0, 360). */
export function normalizeAzimuth(deg: number): number {
  const wrapped = deg % 360;
  if (wrapped >= 0) return wrapped + 0; // -0 → 0
  const shifted = wrapped + 360;
  // tiny negatives round up to 360
  return shifted >= 360 ? 0 : shifted;
}

export function vecLength(v: Vector3D): number {
  return Math.sqrt(v[0] * v[0] + v[1] * v[1] + v[2] * v[2]);
}

export function dot(a: Vector3D, b: Vector3D): number {
  return a[0] * b[0] + a[1] * b[1] + a[2] * b[2];
}

// ---------- Angle conversion ----------

/** Convert a trend/plunge pair (degrees) to a Cartesian unit vector. */
export function toVector(trendDeg: number, plungeDeg: number): Vector3D {
  const trendRad = trendDeg * DEG_TO_RAD;
  const plungeRad = plungeDeg * DEG_TO_RAD;
  const cosPlunge = Math.cos(plungeRad);
  return [
    cosPlunge * Math.cos(trendRad),
    cosPlunge * Math.sin(trendRad),
    Math.sin(plungeRad),
  ];
}

/** Convert a unit vector back to trend/plunge (degrees), trend in [0, 360). */
export function toLine(v: Vector3D): Line {
  return {
    trendDeg: normalizeAzimuth(Math.atan2(v[1], v[0]) * RAD_TO_DEG),
    plungeDeg: Math.asin(clamp(v[2], -1, 1)) * RAD_TO_DEG,
  };
}

// ---------- Fault planes ----------

/** Strike bearing, 90° anticlockwise of the dip direction, in [0, 360). */
export function strikeOf(plane: FaultPlane): number {
  return normalizeAzimuth(plane.dipDirectionDeg - 90);
}

/** The horizontal line along a plane's strike. */
export function strikeLine(plane: FaultPlane): Line {
  return { trendDeg: strikeOf(plane), plungeDeg: 0 };
}

// ---------- Offset chain (re-exports) ----------

export {
  apparentDip,
  strikeDifference,
  SINGULAR_DIP_TOLERANCE_DEG,
} from "./apparent-dip";

export { rake } from "./rake";

export { horizontalOffset, SINGULAR_RAKE_TOLERANCE_DEG } from "./offset";

export { OffsetError, ValidationError, SingularityError } from "./errors";
