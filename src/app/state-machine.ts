// Pure state machine for the calculator: no DOM, no storage, no timing.
// transition(state, event) → { next, effects }

import { computeMoraineOffset } from "../moraine-offset";
import type { OffsetResult } from "../moraine-offset";
import type { Unit } from "../units";
import { parseForm, describeError, EMPTY_FORM } from "./form";
import type { FormValues } from "./form";

// ── Phase (discriminated union for the UI state) ─────────────

export type Phase =
  | { phase: "editing" }
  | { phase: "result"; result: OffsetResult; unit: Unit }
  | { phase: "error"; message: string };

// ── AppState ─────────────────────────────────────────────────

export interface AppState {
  phase: Phase;
  values: FormValues;
}

export function initialState(unit: Unit): AppState {
  return { phase: { phase: "editing" }, values: { ...EMPTY_FORM, unit } };
}

function isBlank(values: FormValues): boolean {
  return !values.dipDirection && !values.dip && !values.slip && !values.trend;
}

// ── Event (all inputs to the state machine) ──────────────────

export type Event =
  | { type: "submit"; values: FormValues }
  | { type: "reset" };

// ── Effect (all side effects the machine requests) ───────────

export type Effect =
  | { type: "render" }
  | { type: "storeUnit"; unit: Unit }
  | { type: "log"; message: string };

// ── Transition function ──────────────────────────────────────

export function transition(
  state: AppState,
  event: Event,
): { next: AppState; effects: Effect[] } {
  switch (event.type) {
    case "submit": {
      const { params, unit } = parseForm(event.values);
      const effects: Effect[] = [{ type: "storeUnit", unit }];
      let phase: Phase;
      try {
        phase = { phase: "result", result: computeMoraineOffset(params), unit };
      } catch (err) {
        phase = { phase: "error", message: describeError(err) };
        effects.push({
          type: "log",
          message: err instanceof Error ? `${err.name}: ${err.message}` : String(err),
        });
      }
      effects.push({ type: "render" });
      return { next: { phase, values: event.values }, effects };
    }

    case "reset":
      if (state.phase.phase === "editing" && isBlank(state.values)) {
        return { next: state, effects: [] };
      }
      return { next: initialState(state.values.unit), effects: [{ type: "render" }] };
  }
}
