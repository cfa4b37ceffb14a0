// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
/**
 * Primary-diagnosis Condition.
 *
 * Coding preference, first available wins:
 *   1. a matched coding-engine result (`primary_diagnosis_coding`)
 *   2. an explicit ICD-10 code (`primary_diagnosis_icd10`)
 *   3. an uncoded SNOMED entry carrying only the diagnosis text
 */

import type { BuildContext, ClinicalRecord } from "./types.js";
import type { Coding, FhirResource } from "./fhir-types.js";
import { CODE_SYSTEMS, profileMeta } from "./profiles.js";
import { readCodingResult, readText } from "./record.js";
import { conditionNarrative, generated } from "./narrative.js";

export function resolveDiagnosisCoding(record: ClinicalRecord): Coding {
  const diagnosis = readText(record, "primary_diagnosis");

  const engine = readCodingResult(record.primary_diagnosis_coding);
  if (engine?.matched && engine.code) {
    const coding: Coding = {
      system: engine.system_uri || CODE_SYSTEMS.ICD10,
      code: engine.code,
    };
    if (engine.display) coding.display = engine.display;
    return coding;
  }

  const icd10 = readText(record, "primary_diagnosis_icd10");
  if (icd10) {
    const coding: Coding = { system: CODE_SYSTEMS.ICD10, code: icd10 };
    if (diagnosis) coding.display = diagnosis;
    return coding;
  }

  return {
    system: CODE_SYSTEMS.SNOMED,
    display: diagnosis ?? "Unspecified condition",
  };
}

export function buildCondition(
  record: ClinicalRecord,
  id: string,
  ctx: BuildContext,
): FhirResource {
  const coding = resolveDiagnosisCoding(record);
  const text = readText(record, "primary_diagnosis");

  return {
    resourceType: "Condition",
    id,
    meta: profileMeta("Condition"),
    clinicalStatus: {
      coding: [{ system: CODE_SYSTEMS.CONDITION_CLINICAL, code: "resolved", display: "Resolved" }],
    },
    verificationStatus: {
      coding: [{ system: CODE_SYSTEMS.CONDITION_VER_STATUS, code: "confirmed" }],
    },
    category: [
      {
        coding: [
          {
            system: CODE_SYSTEMS.CONDITION_CATEGORY,
            code: "encounter-diagnosis",
            display: "Encounter Diagnosis",
          },
        ],
      },
    ],
    code: {
      coding: [coding],
      ...(text ? { text } : {}),
    },
    subject: { reference: ctx.patientRef },
    encounter: { reference: ctx.encounterRef },
    text: generated(conditionNarrative(text ?? coding.display, coding.code)),
  };
}
