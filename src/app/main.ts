import "./style.css";
import { DEFAULT_UNIT, isUnit } from "../units";
import type { Unit } from "../units";
import type { FormValues } from "./form";
import { renderCalculator, renderResult, renderError } from "./render";
import { transition, initialState } from "./state-machine";
import type { AppState, Event, Effect } from "./state-machine";

const UNIT_STORAGE_KEY = "moraine-offset-unit";

const app = document.getElementById("app");
if (!app) throw new Error("Missing #app container");

const formPane = document.createElement("section");
const outputPane = document.createElement("section");
outputPane.className = "output-pane";
outputPane.setAttribute("aria-live", "polite");
app.append(formPane, outputPane);

// ── Helpers ────────────────────────────────────────────────────

function getStoredUnit(): Unit {
  const stored = localStorage.getItem(UNIT_STORAGE_KEY);
  return stored && isUnit(stored) ? stored : DEFAULT_UNIT;
}

let state: AppState = initialState(getStoredUnit());

// ── Dispatch ───────────────────────────────────────────────────

function dispatch(event: Event): void {
  const t0 = performance.now();
  const { next, effects } = transition(state, event);
  console.log(`[perf] ${event.type} in ${(performance.now() - t0).toFixed(3)}ms`);
  state = next;
  for (const effect of effects) runEffect(effect);
}

function runEffect(effect: Effect): void {
  switch (effect.type) {
    case "render":
      render();
      return;
    case "storeUnit":
      localStorage.setItem(UNIT_STORAGE_KEY, effect.unit);
      return;
    case "log":
      console.error(effect.message);
      return;
  }
}

function submit(values: FormValues): void {
  dispatch({ type: "submit", values });
}

function reset(): void {
  dispatch({ type: "reset" });
}

// ── Render (switch on phase) ───────────────────────────────────

function render(): void {
  renderCalculator(formPane, state.values, submit, reset);
  const phase = state.phase;
  switch (phase.phase) {
    case "editing":
      outputPane.innerHTML = "";
      return;

    case "result":
      renderResult(outputPane, phase.result, phase.unit);
      return;

    case "error":
      renderError(outputPane, phase.message);
      return;
  }
}

render();
