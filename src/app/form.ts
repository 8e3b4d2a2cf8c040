import type { OffsetParams } from "../moraine-offset";
import { OffsetError, ValidationError } from "../geometry/index";
import { DEFAULT_UNIT, isUnit } from "../units";
import type { Unit } from "../units";

/** Raw string values as read from the calculator form. */
export interface FormValues {
  dipDirection: string;
  dip: string;
  slip: string;
  trend: string;
  unit: string;
}

export const EMPTY_FORM: FormValues = {
  dipDirection: "",
  dip: "",
  slip: "",
  trend: "",
  unit: DEFAULT_UNIT,
};

export const PARAM_LABELS: Record<keyof OffsetParams, string> = {
  faultDipDirectionDeg: "Fault dip direction",
  faultDipDeg: "Fault dip",
  dipSlipMagnitude: "Dip slip",
  moraineTrendDeg: "Moraine trend",
};

const SINGULARITY_HINTS: Record<string, string> = {
  faultDipDeg: "A vertical fault has no defined apparent dip. Use a dip below 90°.",
  rakeDeg: "The moraine runs along the fault strike, so the offset is unbounded.",
};

/**
 * Field value as a number. Blank fields become NaN so validation reports
 * them; a decimal comma is accepted.
 */
export function parseField(raw: string): number {
  const trimmed = raw.trim();
  if (trimmed === "") return NaN;
  return Number(trimmed.replace(",", "."));
}

export function parseForm(values: FormValues): { params: OffsetParams; unit: Unit } {
  return {
    params: {
      faultDipDirectionDeg: parseField(values.dipDirection),
      faultDipDeg: parseField(values.dip),
      dipSlipMagnitude: parseField(values.slip),
      moraineTrendDeg: parseField(values.trend),
    },
    unit: isUnit(values.unit) ? values.unit : DEFAULT_UNIT,
  };
}

function isParamKey(key: string): key is keyof OffsetParams {
  return Object.prototype.hasOwnProperty.call(PARAM_LABELS, key);
}

/** User-facing message for a failed computation. */
export function describeError(err: unknown): string {
  if (err instanceof ValidationError && isParamKey(err.parameter)) {
    const label = PARAM_LABELS[err.parameter];
    return Number.isNaN(err.value)
      ? `${label} is required and must be a number.`
      : `${label} must be ${err.constraint} (got ${err.value}).`;
  }
  if (err instanceof OffsetError) {
    return SINGULARITY_HINTS[err.parameter] ?? err.message;
  }
  return err instanceof Error ? err.message : "Unknown error";
}
