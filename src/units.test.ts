import { SUPPORTED_UNITS, DEFAULT_UNIT, UNIT_NAMES, isUnit } from "./units";

describe("isUnit", () => {
  it("accepts every supported unit", () => {
    for (const unit of SUPPORTED_UNITS) {
      expect(isUnit(unit)).toBe(true);
    }
  });

  it("rejects unknown and differently-cased units", () => {
    expect(isUnit("mi")).toBe(false);
    expect(isUnit("M")).toBe(false);
    expect(isUnit("")).toBe(false);
  });
});

describe("constants", () => {
  it("defaults to metres", () => {
    expect(DEFAULT_UNIT).toBe("m");
    expect(UNIT_NAMES[DEFAULT_UNIT]).toBe("metres");
  });

  it("names every supported unit", () => {
    expect(Object.keys(UNIT_NAMES).sort()).toEqual([...SUPPORTED_UNITS].sort());
  });
});
