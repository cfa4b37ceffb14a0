// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import type { Logger } from "../logger.js";

// ---------------------------------------------------------------------------
// Clinical record input types
// ---------------------------------------------------------------------------

/** Document types reported by the upstream detector. */
export const DOC_TYPES = [
  "discharge_summary",
  "diagnostic_report",
  "lab_report",
  "op_consultation",
  "prescription",
  "unknown",
] as const;

export type DocType = (typeof DOC_TYPES)[number];

/** NHCX submission flavours. */
export const USE_CASES = ["claim", "preauthorization"] as const;

export type UseCase = (typeof USE_CASES)[number];

/** A leaf value in an extracted clinical record. */
export type ClinicalScalar = string | number | boolean | null;

/**
 * Any value an extractor may place in a clinical record: scalars, lists
 * (tests, medications, procedures) and nested objects such as a coding
 * result or a structured test row.
 */
export type ClinicalValue =
  | ClinicalScalar
  | ClinicalValue[]
  | { [key: string]: ClinicalValue | undefined };

/**
 * Field name → value mapping produced per source document.
 *
 * Field names follow the extractor's vocabulary (`patient_name`,
 * `primary_diagnosis`, `tests`, `medications_at_discharge`, ...).
 */
export type ClinicalRecord = Record<string, ClinicalValue | undefined>;

/**
 * Result of the offline terminology matcher, attached to a record as
 * `primary_diagnosis_coding` or to a test row as `loinc_coding`.
 */
export interface CodingResult {
  matched: boolean;
  code: string | null;
  display: string | null;
  /** Short system label, e.g. "ICD-10" or "LOINC" */
  system: string;
  /** Canonical system URI, e.g. "http://hl7.org/fhir/sid/icd-10" */
  system_uri: string;
  confidence: number;
  /** "exact", "substring", "fuzzy" or "none" */
  match_method: string;
}

/** One lab test row, normalized from either an object or a bare name. */
export interface TestEntry {
  testName: string;
  resultValue?: string;
  unit?: string;
  referenceRange?: string;
  abnormalFlag?: string;
  loincCoding?: CodingResult;
}

/** One discharge medication, normalized from either an object or a bare string. */
export interface MedicationEntry {
  name: string;
  dose: string;
  frequency: string;
  duration: string;
}

// ---------------------------------------------------------------------------
// Builder options
// ---------------------------------------------------------------------------

/** Options for {@link BundleBuilder}. All members are optional hooks. */
export interface BuilderOptions {
  /** Resource id source. Defaults to `crypto.randomUUID`. */
  generateUuid?: () => string;
  /** Clock used for timestamps and age-based birth dates. */
  now?: () => Date;
  /** Reads a source PDF. Defaults to `fs.readFileSync`. */
  readFile?: (path: string) => Uint8Array;
  logger?: Logger;
}

/** Ids and fullUrls shared between resource builders during one build. */
export interface BuildContext {
  patientRef: string;
  organizationRef: string;
  practitionerRef: string;
  encounterRef: string;
  conditionRef: string;
  timestamp: string;
  now: Date;
  generateUuid: () => string;
}
