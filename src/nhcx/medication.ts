// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import type { BuildContext, ClinicalValue, MedicationEntry } from "./types.js";
import type { BundleEntry, FhirResource } from "./fhir-types.js";
import { CODE_SYSTEMS, profileMeta } from "./profiles.js";
import { readMedicationEntry } from "./record.js";
import { generated, medicationNarrative } from "./narrative.js";

/**
 * Resolve discharge medications into MedicationRequest entries.
 * Accepts structured `{ name, dose, frequency, duration }` items or bare strings.
 */
export function resolveMedications(
  medications: ClinicalValue[],
  ctx: BuildContext,
): BundleEntry[] {
  return medications.map((item) => {
    const id = ctx.generateUuid();
    return {
      fullUrl: `urn:uuid:${id}`,
      resource: buildMedicationRequest(readMedicationEntry(item), id, ctx.patientRef),
    };
  });
}

export function dosageText(med: MedicationEntry): string {
  return [med.dose, med.frequency, med.duration].filter((part) => part !== "").join(" ");
}

export function buildMedicationRequest(
  med: MedicationEntry,
  id: string,
  patientRef: string,
): FhirResource {
  const resource: FhirResource = {
    resourceType: "MedicationRequest",
    id,
    meta: profileMeta("MedicationRequest"),
    status: "active",
    intent: "order",
    medicationCodeableConcept: {
      text: med.name,
      coding: [{ system: CODE_SYSTEMS.RXNORM, display: med.name }],
    },
    subject: { reference: patientRef },
  };

  const text = dosageText(med);
  if (text) {
    resource.dosageInstruction = [
      {
        text,
        ...(med.dose ? { doseAndRate: [{ doseQuantity: { value: 1, unit: med.dose } }] } : {}),
      },
    ];
  }

  resource.text = generated(medicationNarrative(med.name, text || undefined));

  return resource;
}
