export const SUPPORTED_UNITS = ["m", "km", "ft"] as const;
export type Unit = (typeof SUPPORTED_UNITS)[number];
export const DEFAULT_UNIT: Unit = "m";
export const UNIT_NAMES: Record<Unit, string> = { m: "metres", km: "kilometres", ft: "feet" };

export function isUnit(value: string): value is Unit {
  return (SUPPORTED_UNITS as readonly string[]).includes(value);
}
