// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
const XHTML_NS = "http://www.w3.org/1999/xhtml";

export function esc(s: string): string {
  return s.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

function wrap(lines: string[]): string {
  const body = lines.join("");
  return `<div xmlns="${XHTML_NS}">${body}</div>`;
}

/** FHIR Narrative element with generated status. */
export function generated(div: string): { status: "generated"; div: string } {
  return { status: "generated", div };
}

export function sectionNarrative(text: string): string {
  return wrap([`<p>${esc(text)}</p>`]);
}

export function patientNarrative(
  name: string,
  birthDate: string | undefined,
  gender: string,
): string {
  const lines: string[] = [];
  lines.push(`<p><b>${esc(name)}</b></p>`);
  if (birthDate) lines.push(`<p>DOB: ${esc(birthDate)}</p>`);
  lines.push(`<p>Gender: ${esc(gender)}</p>`);
  return wrap(lines);
}

export function conditionNarrative(
  displayText: string | undefined,
  code: string | undefined,
): string {
  const lines: string[] = [];
  lines.push(`<p><b>${esc(displayText ?? "Condition")}</b></p>`);
  if (code) lines.push(`<p>Code: ${esc(code)}</p>`);
  return wrap(lines);
}

export function medicationNarrative(name: string, dosageText: string | undefined): string {
  const lines: string[] = [];
  lines.push(`<p><b>${esc(name)}</b></p>`);
  if (dosageText) lines.push(`<p>Dosage: ${esc(dosageText)}</p>`);
  return wrap(lines);
}

export function resultNarrative(
  testName: string,
  value: string | undefined,
  unit: string | undefined,
  flag: string | undefined,
): string {
  const lines: string[] = [];
  lines.push(`<p><b>${esc(testName)}</b></p>`);
  if (value !== undefined) {
    const withUnit = unit ? `${value} ${unit}` : value;
    lines.push(`<p>Result: ${esc(withUnit)}</p>`);
  }
  if (flag) lines.push(`<p>Flag: ${esc(flag)}</p>`);
  return wrap(lines);
}
