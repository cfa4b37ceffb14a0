// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.

/** Points lost when a resource type is absent from the bundle. */
export const RESOURCE_WEIGHTS: Readonly<Record<string, number>> = Object.freeze({
  Patient: 10,
  Claim: 15,
  Organization: 8,
  Practitioner: 8,
  Condition: 8,
  Composition: 12,
  Encounter: 5,
  DocumentReference: 5,
  Provenance: 5,
  DiagnosticReport: 5,
  Observation: 5,
  MedicationRequest: 5,
});

const MAX_ERROR_PENALTY = 25;
const ERROR_PENALTY = 3;
const MAX_WARNING_PENALTY = 10;

export type ReadinessColor = "green" | "yellow" | "orange" | "red";

export interface Readiness {
  score: number;
  status: string;
  color: ReadinessColor;
  /** Resource types found, in first-seen order */
  resourcesPresent: string[];
  /** Weighted resource types not found */
  resourcesMissing: string[];
}

export function scoreBand(score: number): { status: string; color: ReadinessColor } {
  if (score >= 90) return { status: "Ready for NHCX submission", color: "green" };
  if (score >= 75) return { status: "Review warnings before submitting", color: "yellow" };
  if (score >= 50) return { status: "Fix errors — not ready for submission", color: "orange" };
  return { status: "Critical issues — major rework needed", color: "red" };
}

/**
 * Submission readiness on a 0–100 scale.
 *
 * @param resourceTypes - resource types present, in first-seen order
 */
export function computeReadiness(
  resourceTypes: readonly string[],
  errorCount: number,
  warningCount: number,
): Readiness {
  const present = new Set(resourceTypes);
  const missing = Object.keys(RESOURCE_WEIGHTS).filter((rt) => !present.has(rt));

  let score = 100;
  for (const rt of missing) {
    score -= RESOURCE_WEIGHTS[rt] ?? 0;
  }
  score -= Math.min(errorCount * ERROR_PENALTY, MAX_ERROR_PENALTY);
  score -= Math.min(warningCount, MAX_WARNING_PENALTY);
  score = Math.max(0, score);

  return {
    score,
    ...scoreBand(score),
    resourcesPresent: [...present],
    resourcesMissing: missing,
  };
}
