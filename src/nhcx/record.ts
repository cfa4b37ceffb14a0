// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
/**
 * Typed readers over the loosely shaped clinical record.
 *
 * Extractors produce whatever the source document contained, so every
 * reader narrows the value it finds and falls back to "absent" rather
 * than throwing.
 */

import type {
  ClinicalRecord,
  ClinicalValue,
  CodingResult,
  MedicationEntry,
  TestEntry,
} from "./types.js";

type ClinicalObject = { [key: string]: ClinicalValue | undefined };

export function isClinicalObject(value: ClinicalValue | undefined): value is ClinicalObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Empty string, empty list, null and undefined all count as absent. */
export function isEmptyValue(value: ClinicalValue | undefined): boolean {
  return (
    value === undefined ||
    value === null ||
    value === "" ||
    (Array.isArray(value) && value.length === 0)
  );
}

/** String form used for comparison, deduplication and conflict logs. */
export function stringifyValue(value: ClinicalValue | undefined): string {
  if (value === undefined || value === null) return "";
  if (typeof value === "object") return JSON.stringify(value);
  return String(value);
}

/** Scalar text of a value, or undefined for absent and structured values. */
export function scalarText(value: ClinicalValue | undefined): string | undefined {
  if (typeof value === "string") return value === "" ? undefined : value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return undefined;
}

/** Read a field as text. */
export function readText(record: ClinicalRecord, field: string): string | undefined {
  return scalarText(record[field]);
}

/** Read a field as a list; a single non-list value becomes a one-item list. */
export function readList(record: ClinicalRecord, field: string): ClinicalValue[] {
  const value = record[field];
  if (isEmptyValue(value) || value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}

/** Narrow a value to a coding-engine result, if it has that shape. */
export function readCodingResult(value: ClinicalValue | undefined): CodingResult | undefined {
  if (!isClinicalObject(value) || typeof value.matched !== "boolean") return undefined;
  return {
    matched: value.matched,
    code: scalarText(value.code) ?? null,
    display: scalarText(value.display) ?? null,
    system: scalarText(value.system) ?? "",
    system_uri: scalarText(value.system_uri) ?? "",
    confidence: typeof value.confidence === "number" ? value.confidence : 0,
    match_method: scalarText(value.match_method) ?? "none",
  };
}

/** Normalize a `tests` list item. Structured rows and bare test names are accepted. */
export function readTestEntry(item: ClinicalValue): TestEntry | undefined {
  const name = scalarText(item);
  if (name !== undefined) return { testName: name };
  if (!isClinicalObject(item)) return undefined;

  return {
    testName: scalarText(item.test_name) ?? "Unknown test",
    resultValue: scalarText(item.result_value),
    unit: scalarText(item.unit),
    referenceRange: scalarText(item.reference_range),
    abnormalFlag: scalarText(item.abnormal_flag),
    loincCoding: readCodingResult(item.loinc_coding),
  };
}

/** Normalize a `medications_at_discharge` list item. */
export function readMedicationEntry(item: ClinicalValue): MedicationEntry {
  if (isClinicalObject(item)) {
    return {
      name: scalarText(item.name) ?? stringifyValue(item),
      dose: scalarText(item.dose) ?? "",
      frequency: scalarText(item.frequency) ?? "",
      duration: scalarText(item.duration) ?? "",
    };
  }
  return { name: stringifyValue(item), dose: "", frequency: "", duration: "" };
}

/**
 * Deterministic identifier synthesized from a display name:
 * uppercase, spaces to underscores, optionally truncated.
 */
export function nameToIdentifier(name: string, maxLength?: number): string {
  const value = name.toUpperCase().replace(/ /g, "_");
  return maxLength === undefined ? value : value.slice(0, maxLength);
}
