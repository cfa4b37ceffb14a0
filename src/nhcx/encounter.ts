// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import type { BuildContext, ClinicalRecord } from "./types.js";
import type { FhirResource, Period } from "./fhir-types.js";
import { CODE_SYSTEMS, profileMeta } from "./profiles.js";
import { readText } from "./record.js";
import { parseClinicalDate } from "./dates.js";

/** Inpatient encounter; the period only carries dates that actually parse. */
export function buildEncounter(
  record: ClinicalRecord,
  id: string,
  ctx: BuildContext,
): FhirResource {
  const encounter: FhirResource = {
    resourceType: "Encounter",
    id,
    meta: profileMeta("Encounter"),
    status: "finished",
    class: {
      system: CODE_SYSTEMS.ENCOUNTER_CLASS,
      code: "IMP",
      display: "Inpatient",
    },
    subject: { reference: ctx.patientRef },
    serviceProvider: { reference: ctx.organizationRef },
    participant: [{ individual: { reference: ctx.practitionerRef } }],
  };

  const period: Period = {};
  const admitted = parseClinicalDate(readText(record, "admission_date"));
  const discharged = parseClinicalDate(readText(record, "discharge_date"));
  if (admitted) period.start = `${admitted}T00:00:00Z`;
  if (discharged) period.end = `${discharged}T23:59:00Z`;
  if (period.start || period.end) {
    encounter.period = period;
  }

  return encounter;
}
