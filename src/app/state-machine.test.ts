import {
  transition,
  initialState,
  type AppState,
  type Event,
} from "./state-machine";
import { EMPTY_FORM, type FormValues } from "./form";
import { formatReport } from "../moraine-offset";

function makeValues(overrides: Partial<FormValues> = {}): FormValues {
  return {
    dipDirection: "70",
    dip: "50",
    slip: "33.5",
    trend: "40",
    unit: "m",
    ...overrides,
  };
}

function makeState(overrides: Partial<AppState> = {}): AppState {
  return {
    phase: { phase: "editing" },
    values: { ...EMPTY_FORM },
    ...overrides,
  };
}

describe("initialState", () => {
  it("starts editing a blank form in the given unit", () => {
    expect(initialState("ft")).toEqual({
      phase: { phase: "editing" },
      values: { ...EMPTY_FORM, unit: "ft" },
    });
  });
});

describe("transition", () => {
  describe("submit", () => {
    it("moves to result for a valid form", () => {
      const { next } = transition(makeState(), { type: "submit", values: makeValues() });
      expect(next.phase.phase).toBe("result");
      if (next.phase.phase !== "result") return;
      expect(formatReport(next.phase.result, next.phase.unit)).toBe(
        "Moraine offset: 12.4 m",
      );
    });

    it("keeps the submitted values", () => {
      const values = makeValues({ slip: "12" });
      const { next } = transition(makeState(), { type: "submit", values });
      expect(next.values).toBe(values);
    });

    it("stores the unit, then renders", () => {
      const { effects } = transition(makeState(), {
        type: "submit",
        values: makeValues({ unit: "km" }),
      });
      expect(effects).toEqual([{ type: "storeUnit", unit: "km" }, { type: "render" }]);
    });

    it("falls back to the default unit for an unknown one", () => {
      const { next, effects } = transition(makeState(), {
        type: "submit",
        values: makeValues({ unit: "furlong" }),
      });
      expect(next.phase).toMatchObject({ phase: "result", unit: "m" });
      expect(effects[0]).toEqual({ type: "storeUnit", unit: "m" });
    });

    it("moves to error with the field message for a blank field", () => {
      const { next } = transition(makeState(), {
        type: "submit",
        values: makeValues({ dipDirection: "" }),
      });
      expect(next.phase).toEqual({
        phase: "error",
        message: "Fault dip direction is required and must be a number.",
      });
    });

    it("moves to error with the vertical-fault hint and logs the cause", () => {
      const { next, effects } = transition(makeState(), {
        type: "submit",
        values: makeValues({ dip: "90" }),
      });
      expect(next.phase).toEqual({
        phase: "error",
        message: "A vertical fault has no defined apparent dip. Use a dip below 90°.",
      });
      expect(effects).toEqual([
        { type: "storeUnit", unit: "m" },
        {
          type: "log",
          message:
            "SingularityError: faultDipDeg makes tan(dip) undefined for a vertical fault (got 90)",
        },
        { type: "render" },
      ]);
    });

    it("leaves an error once the form is fixed", () => {
      const state = makeState({ phase: { phase: "error", message: "x" } });
      const { next } = transition(state, { type: "submit", values: makeValues() });
      expect(next.phase.phase).toBe("result");
    });

    it("does not mutate the previous state", () => {
      const state = makeState();
      transition(state, { type: "submit", values: makeValues() });
      expect(state).toEqual(makeState());
    });
  });

  describe("reset", () => {
    const event: Event = { type: "reset" };

    it("returns the same state and no effects on a blank form", () => {
      const state = makeState();
      const { next, effects } = transition(state, event);
      expect(next).toBe(state);
      expect(effects).toEqual([]);
    });

    it("clears the fields and the result but keeps the unit", () => {
      const { next: shown } = transition(makeState(), {
        type: "submit",
        values: makeValues({ unit: "ft" }),
      });
      const { next, effects } = transition(shown, event);
      expect(next).toEqual(initialState("ft"));
      expect(effects).toEqual([{ type: "render" }]);
    });

    it("clears typed values while still editing", () => {
      const state = makeState({ values: makeValues() });
      const { next } = transition(state, event);
      expect(next.values).toEqual({ ...EMPTY_FORM, unit: "m" });
    });
  });
});
