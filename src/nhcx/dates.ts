// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import { format, getYear, isValid, parse } from "date-fns";

/** Layouts seen on Indian hospital documents, tried in order. */
const CLINICAL_DATE_FORMATS = [
  "d/M/yyyy",
  "d-M-yyyy",
  "yyyy-M-d",
  "d MMM yyyy",
  "d MMMM yyyy",
  "MMMM d, yyyy",
  "d.M.yyyy",
  "yyyy/M/d",
] as const;

/**
 * Parse a free-text document date into FHIR `date` form (YYYY-MM-DD).
 * Day-first layouts win over month-first ones; unparseable input yields undefined.
 */
export function parseClinicalDate(raw: string | undefined): string | undefined {
  const text = raw?.trim();
  if (!text) return undefined;

  const reference = new Date(2000, 0, 1);
  for (const layout of CLINICAL_DATE_FORMATS) {
    const parsed = parse(text, layout, reference);
    // yyyy accepts 1–4 digits; two-digit years are not dates we can trust
    if (isValid(parsed) && getYear(parsed) >= 1000) {
      return format(parsed, "yyyy-MM-dd");
    }
  }
  return undefined;
}

/**
 * Approximate a birth date from an age such as `45` or `"45 Years"`:
 * January 1st of (current year − age).
 */
export function approximateBirthDate(age: string | undefined, now: Date): string | undefined {
  const token = age?.trim().split(/\s+/)[0];
  if (!token || !/^[+-]?\d+$/.test(token)) return undefined;

  const years = parseInt(token, 10);
  if (years <= 0) return undefined;
  const year = String(now.getUTCFullYear() - years).padStart(4, "0");
  return `${year}-01-01`;
}

/** FHIR instant without milliseconds, e.g. `2024-01-07T10:15:00Z`. */
export function fhirInstant(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}
