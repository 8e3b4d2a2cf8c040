// Horizontal component of dip-slip displacement

import { DEG_TO_RAD } from "./index";
import { SingularityError } from "./errors";

/** cot(rake) diverges near 0° and 180°; acos cannot resolve rakes much finer than this there. */
export const SINGULAR_RAKE_TOLERANCE_DEG = 1e-5;

/**
 * Horizontal offset of a feature with the given rake, in the length unit
 * of `dipSlipMagnitude`: slip · tan(90° − rake).
 *
 * Positive for rakes below 90°, negative above, zero at 90°.
 */
export function horizontalOffset(
  dipSlipMagnitude: number,
  rakeDeg: number,
): number {
  if (
    rakeDeg <= SINGULAR_RAKE_TOLERANCE_DEG ||
    rakeDeg >= 180 - SINGULAR_RAKE_TOLERANCE_DEG
  ) {
    throw new SingularityError(
      "rakeDeg",
      "puts the moraine trace along strike, where the offset is unbounded",
      rakeDeg,
    );
  }
  const offset = dipSlipMagnitude * Math.tan((90 - rakeDeg) * DEG_TO_RAD);
  if (!Number.isFinite(offset)) {
    throw new SingularityError(
      "dipSlipMagnitude",
      "overflows the horizontal offset",
      dipSlipMagnitude,
    );
  }
  return offset;
}
