import type { OffsetResult } from "../moraine-offset";
import { formatReport, formatDegrees } from "../moraine-offset";
import { SUPPORTED_UNITS, UNIT_NAMES } from "../units";
import type { Unit } from "../units";
import type { FormValues } from "./form";

const FIELDS: { name: Exclude<keyof FormValues, "unit">; label: string; hint: string }[] = [
  { name: "dipDirection", label: "Fault dip direction (°)", hint: "0–360" },
  { name: "dip", label: "Fault dip (°)", hint: "0–90" },
  { name: "slip", label: "Dip slip", hint: "≥ 0" },
  { name: "trend", label: "Moraine trend (°)", hint: "0–360" },
];

/** Build the calculator form into `container`, replacing its contents. */
export function renderCalculator(
  container: HTMLElement,
  values: FormValues,
  onSubmit: (values: FormValues) => void,
  onReset: () => void,
): void {
  container.innerHTML = "";

  const header = document.createElement("header");
  header.className = "app-header";
  const h1 = document.createElement("h1");
  h1.textContent = "Moraine Offset";
  const subtitle = document.createElement("p");
  subtitle.textContent = "Horizontal offset from dip slip on an oblique fault";
  header.append(h1, subtitle);

  const form = document.createElement("form");
  form.className = "calc-form";
  form.noValidate = true;

  const inputs = new Map<string, HTMLInputElement>();
  for (const field of FIELDS) {
    const label = document.createElement("label");
    label.className = "calc-field";
    const caption = document.createElement("span");
    caption.textContent = field.label;
    const input = document.createElement("input");
    input.name = field.name;
    input.inputMode = "decimal";
    input.placeholder = field.hint;
    input.value = values[field.name];
    inputs.set(field.name, input);
    label.append(caption, input);
    form.appendChild(label);
  }

  const unitSelect = document.createElement("select");
  unitSelect.className = "unit-select";
  unitSelect.setAttribute("aria-label", "Length unit");
  for (const code of SUPPORTED_UNITS) {
    const opt = document.createElement("option");
    opt.value = code;
    opt.textContent = UNIT_NAMES[code];
    if (code === values.unit) opt.selected = true;
    unitSelect.appendChild(opt);
  }

  const submit = document.createElement("button");
  submit.type = "submit";
  submit.className = "status-action";
  submit.textContent = "Compute offset";

  const clear = document.createElement("button");
  clear.type = "button";
  clear.className = "status-action secondary";
  clear.textContent = "Clear";
  clear.addEventListener("click", onReset);

  form.append(unitSelect, submit, clear);
  form.addEventListener("submit", (e) => {
    e.preventDefault();
    onSubmit({
      dipDirection: inputs.get("dipDirection")?.value ?? "",
      dip: inputs.get("dip")?.value ?? "",
      slip: inputs.get("slip")?.value ?? "",
      trend: inputs.get("trend")?.value ?? "",
      unit: unitSelect.value,
    });
  });

  container.append(header, form);
}

/** Show the report sentence and the intermediate angles. */
export function renderResult(
  container: HTMLElement,
  result: OffsetResult,
  unit: Unit,
): void {
  container.innerHTML = "";

  const report = document.createElement("p");
  report.className = "offset-report";
  report.textContent = formatReport(result, unit);

  const steps = document.createElement("dl");
  steps.className = "offset-steps";
  const rows: [string, string][] = [
    ["Fault strike", formatDegrees(result.strikeDeg, 1)],
    ["Moraine plunge on fault", formatDegrees(result.apparentDipDeg)],
    ["Rake", formatDegrees(result.rakeDeg)],
    ["Horizontal offset", `${result.horizontalOffset.toFixed(3)} ${unit}`],
  ];
  for (const [term, value] of rows) {
    const dt = document.createElement("dt");
    dt.textContent = term;
    const dd = document.createElement("dd");
    dd.textContent = value;
    steps.append(dt, dd);
  }

  container.append(report, steps);
}

export function renderError(container: HTMLElement, message: string): void {
  container.innerHTML = "";
  const msg = document.createElement("p");
  msg.className = "status-message error";
  msg.setAttribute("role", "alert");
  msg.textContent = message;
  container.appendChild(msg);
}
