// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import type { AuthorityTable, FusionPolicy } from "./types.js";

const DEMOGRAPHICS = { discharge_summary: 3, diagnostic_report: 2, prescription: 1 } as const;

/** Which document type is trusted for which field. */
export const FIELD_AUTHORITY: AuthorityTable = Object.freeze({
  // Patient demographics — the discharge summary is most authoritative
  patient_name: DEMOGRAPHICS,
  patient_age: DEMOGRAPHICS,
  patient_gender: DEMOGRAPHICS,
  patient_id: DEMOGRAPHICS,
  hospital_name: { discharge_summary: 3, diagnostic_report: 2, prescription: 2 },
  treating_doctor: { discharge_summary: 3, prescription: 2, diagnostic_report: 1 },

  // Clinical course
  primary_diagnosis: { discharge_summary: 3, diagnostic_report: 1, prescription: 1 },
  admission_date: { discharge_summary: 3, diagnostic_report: 1 },
  discharge_date: { discharge_summary: 3 },
  condition_at_discharge: { discharge_summary: 3 },
  medications_at_discharge: { discharge_summary: 3, prescription: 2 },
  procedures_performed: { discharge_summary: 3, diagnostic_report: 1 },

  // Lab results
  tests: { diagnostic_report: 3, discharge_summary: 1 },

  // Insurance
  insurer_name: { discharge_summary: 2, diagnostic_report: 2 },
  insurance_id: { discharge_summary: 2, diagnostic_report: 2 },
});

export const MERGE_AS_LIST: ReadonlySet<string> = new Set([
  "tests",
  "secondary_diagnoses",
  "procedures_performed",
]);

export const NUMERIC_TOLERANCE: Readonly<Record<string, number>> = Object.freeze({
  patient_age: 2,
});

/** Provenance marker for list fields assembled from several documents. */
export const MERGED_PROVENANCE = "merged from multiple documents";

export const DEFAULT_FUSION_POLICY: FusionPolicy = Object.freeze({
  authority: FIELD_AUTHORITY,
  mergeAsList: MERGE_AS_LIST,
  numericTolerance: NUMERIC_TOLERANCE,
});
