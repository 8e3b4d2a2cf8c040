import { rake } from "./rake";
import { SINGULAR_RAKE_TOLERANCE_DEG } from "./offset";

const EPSILON = 1e-9;

function expectClose(actual: number, expected: number, tol = EPSILON) {
  expect(Math.abs(actual - expected)).toBeLessThan(tol);
}

describe("rake", () => {
  it("is 0 for a line along strike", () => {
    expectClose(rake(340, 0, 340), 0, SINGULAR_RAKE_TOLERANCE_DEG);
  });

  it("is 180 for a line along the opposite strike bearing", () => {
    expectClose(rake(160, 0, 340), 180, SINGULAR_RAKE_TOLERANCE_DEG);
  });

  it("is 90 for a line down the dip direction", () => {
    expectClose(rake(70, 50, 340), 90);
  });

  it("matches scenario A", () => {
    expectClose(rake(40, 45.90468727333837, 340), 69.63942512488693);
  });

  it("matches scenario B", () => {
    expectClose(rake(32, 43.20158747416848, 340), 63.33416405648445);
  });

  it("stays within [0, 180] across trends and plunges", () => {
    for (let trend = 0; trend < 360; trend += 20) {
      for (let plunge = -90; plunge <= 90; plunge += 30) {
        const r = rake(trend, plunge, 340);
        expect(r).toBeGreaterThanOrEqual(0);
        expect(r).toBeLessThanOrEqual(180);
      }
    }
  });

  it("never returns NaN for parallel unit vectors", () => {
    for (let strike = 0; strike < 360; strike += 7) {
      expect(Number.isNaN(rake(strike, 0, strike))).toBe(false);
    }
  });
});
