// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
/**
 * Composition — the document "cover page". Its type is the ABDM HI type's
 * SNOMED code and its sections depend on the source document type.
 */

import type { BuildContext, ClinicalRecord, DocType } from "./types.js";
import type { FhirResource } from "./fhir-types.js";
import type { HiType } from "./profiles.js";
import { CODE_SYSTEMS } from "./profiles.js";
import { readText } from "./record.js";
import { generated, sectionNarrative } from "./narrative.js";

/** References the sections can point at. */
export interface SectionRefs {
  conditionRef: string;
  observationRefs: string[];
  medicationRefs: string[];
}

type Section = Record<string, unknown>;

function section(
  title: string,
  code: string,
  display: string,
  text: string,
  refs: string[],
): Section {
  const built: Section = {
    title,
    code: { coding: [{ system: CODE_SYSTEMS.LOINC, code, display }] },
    text: generated(sectionNarrative(text)),
  };
  if (refs.length > 0) {
    built.entry = refs.map((reference) => ({ reference }));
  }
  return built;
}

function chiefComplaintSection(record: ClinicalRecord): Section {
  return section(
    "Chief Complaint",
    "10154-3",
    "Chief complaint",
    readText(record, "chief_complaint") ?? "Not recorded",
    [],
  );
}

function diagnosesSection(record: ClinicalRecord, refs: SectionRefs): Section {
  return section(
    "Diagnoses",
    "29548-5",
    "Diagnosis",
    readText(record, "primary_diagnosis") ?? "Not recorded",
    [refs.conditionRef],
  );
}

function medicationsSection(title: string, refs: SectionRefs): Section {
  return section(
    title,
    "75311-1",
    "Discharge medications",
    refs.medicationRefs.length > 0
      ? `${refs.medicationRefs.length} medication(s). See MedicationRequest resources`
      : "No medications recorded",
    refs.medicationRefs,
  );
}

export function buildSections(
  docType: DocType,
  record: ClinicalRecord,
  refs: SectionRefs,
): Section[] {
  switch (docType) {
    case "discharge_summary":
      return [
        chiefComplaintSection(record),
        diagnosesSection(record, refs),
        medicationsSection("Medications on Discharge", refs),
      ];
    case "diagnostic_report":
    case "lab_report":
      return [
        section(
          "Laboratory Results",
          "30954-2",
          "Relevant diagnostic tests",
          `${refs.observationRefs.length} result(s). See Observation resources`,
          refs.observationRefs,
        ),
      ];
    case "op_consultation":
      return [chiefComplaintSection(record), diagnosesSection(record, refs)];
    case "prescription":
      return [medicationsSection("Medications", refs)];
    default:
      return [];
  }
}

export function buildComposition(
  record: ClinicalRecord,
  docType: DocType,
  hiType: HiType,
  id: string,
  ctx: BuildContext,
  refs: SectionRefs,
): FhirResource {
  return {
    resourceType: "Composition",
    id,
    meta: { profile: [hiType.compositionProfile] },
    status: "final",
    type: {
      coding: [
        {
          system: CODE_SYSTEMS.SNOMED,
          code: hiType.snomedCode,
          display: hiType.snomedDisplay,
        },
      ],
    },
    subject: { reference: ctx.patientRef },
    encounter: { reference: ctx.encounterRef },
    date: ctx.timestamp,
    author: [{ reference: ctx.practitionerRef }],
    custodian: { reference: ctx.organizationRef },
    title: hiType.display,
    section: buildSections(docType, record, refs),
  };
}
