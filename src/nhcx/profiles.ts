// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import type { DocType } from "./types.js";

const NRCES = "https://nrces.in/ndhm/fhir/r4/StructureDefinition";

/** Well-known code system and identifier namespace URIs used in NHCX bundles. */
export const CODE_SYSTEMS = {
  ICD10: "http://hl7.org/fhir/sid/icd-10",
  LOINC: "http://loinc.org",
  SNOMED: "http://snomed.info/sct",
  RXNORM: "http://www.nlm.nih.gov/research/umls/rxnorm",
  UCUM: "http://unitsofmeasure.org",
  CONDITION_CLINICAL: "http://terminology.hl7.org/CodeSystem/condition-clinical",
  CONDITION_VER_STATUS: "http://terminology.hl7.org/CodeSystem/condition-ver-status",
  CONDITION_CATEGORY: "http://terminology.hl7.org/CodeSystem/condition-category",
  OBSERVATION_CATEGORY: "http://terminology.hl7.org/CodeSystem/observation-category",
  OBSERVATION_INTERPRETATION: "http://terminology.hl7.org/CodeSystem/v3-ObservationInterpretation",
  ENCOUNTER_CLASS: "http://terminology.hl7.org/CodeSystem/v3-ActCode",
  QUALIFICATION: "http://terminology.hl7.org/CodeSystem/v2-0360",
  CLAIM_TYPE: "http://terminology.hl7.org/CodeSystem/claim-type",
  CLAIM_PRODUCT: "http://terminology.hl7.org/CodeSystem/ex-USCLS",
  PROCESS_PRIORITY: "http://terminology.hl7.org/CodeSystem/processpriority",
  BENEFIT_CATEGORY: "http://terminology.hl7.org/CodeSystem/ex-benefitcategory",
  PROVENANCE_AGENT: "http://terminology.hl7.org/CodeSystem/provenance-participant-type",
  DATA_OPERATION: "http://terminology.hl7.org/CodeSystem/v3-DataOperation",
  ACT_REASON: "http://terminology.hl7.org/CodeSystem/v3-ActReason",
  NHCX_PROVIDER: "https://nhcx.health.gov.in/providers",
  NHCX_INSURER: "https://nhcx.health.gov.in/insurers",
  NDHM_PATIENT: "https://ndhm.gov.in/patients",
  NDHM_PRACTITIONER: "https://ndhm.gov.in/practitioners",
  NDHM_BUNDLE: "https://ndhm.gov.in",
} as const;

/** ABDM Health Information type keys. */
export type HiTypeKey = "DischargeSummary" | "DiagnosticReport" | "OPConsultation" | "Prescription";

/** Definition of one ABDM Health Information document type. */
export interface HiType {
  code: HiTypeKey;
  display: string;
  compositionProfile: string;
  snomedCode: string;
  snomedDisplay: string;
}

/** ABDM HI types with the SNOMED CT codes mandated for Composition.type. */
export const ABDM_HI_TYPES: Readonly<Record<HiTypeKey, HiType>> = Object.freeze({
  DischargeSummary: {
    code: "DischargeSummary",
    display: "Discharge Summary",
    compositionProfile: `${NRCES}/DischargeSummary`,
    snomedCode: "373942005",
    snomedDisplay: "Discharge summary",
  },
  DiagnosticReport: {
    code: "DiagnosticReport",
    display: "Diagnostic Report",
    compositionProfile: `${NRCES}/DiagnosticReportComposition`,
    snomedCode: "4241000179101",
    snomedDisplay: "Diagnostic report",
  },
  OPConsultation: {
    code: "OPConsultation",
    display: "OP Consultation",
    compositionProfile: `${NRCES}/OPConsultation`,
    snomedCode: "371530004",
    snomedDisplay: "Clinical consultation report",
  },
  Prescription: {
    code: "Prescription",
    display: "Prescription",
    compositionProfile: `${NRCES}/Prescription`,
    snomedCode: "440545006",
    snomedDisplay: "Prescription record",
  },
});

/** The four SNOMED codes ABDM accepts as Composition.type. */
export const ABDM_SNOMED_CODES: ReadonlySet<string> = new Set(
  Object.values(ABDM_HI_TYPES).map((t) => t.snomedCode),
);

/** Document type → ABDM HI type. */
export const DOC_TYPE_TO_HI_TYPE: Readonly<Record<DocType, HiTypeKey>> = Object.freeze({
  discharge_summary: "DischargeSummary",
  diagnostic_report: "DiagnosticReport",
  lab_report: "DiagnosticReport",
  op_consultation: "OPConsultation",
  prescription: "Prescription",
  unknown: "DischargeSummary",
});

/** NRCeS StructureDefinition URLs per resource type. */
export const NHCX_PROFILES = {
  Bundle: `${NRCES}/ClaimBundle`,
  Composition: `${NRCES}/DischargeSummary`,
  Patient: `${NRCES}/Patient`,
  Organization: `${NRCES}/Organization`,
  Practitioner: `${NRCES}/Practitioner`,
  Encounter: `${NRCES}/Encounter`,
  Condition: `${NRCES}/Condition`,
  Observation: `${NRCES}/Observation`,
  DiagnosticReport: `${NRCES}/DiagnosticReportLab`,
  MedicationRequest: `${NRCES}/MedicationRequest`,
  Claim: `${NRCES}/Claim`,
  CoverageEligibilityRequest: `${NRCES}/CoverageEligibilityRequest`,
  DocumentReference: `${NRCES}/DocumentReference`,
  Provenance: `${NRCES}/Provenance`,
} as const;

export type ProfiledResourceType = keyof typeof NHCX_PROFILES;

/** Prefix of every NRCeS profile URL. */
export const NRCES_PROFILE_BASE = `${NRCES}/`;

/** Return the ABDM HI type for a detected document type (DischargeSummary when unrecognized). */
export function getHiType(docType: string): HiType {
  const key = isDocType(docType) ? DOC_TYPE_TO_HI_TYPE[docType] : "DischargeSummary";
  return ABDM_HI_TYPES[key];
}

/** `meta` element carrying the NRCeS profile for a resource type. */
export function profileMeta(resourceType: ProfiledResourceType): { profile: string[] } {
  return { profile: [NHCX_PROFILES[resourceType]] };
}

export function isDocType(value: string): value is DocType {
  return Object.prototype.hasOwnProperty.call(DOC_TYPE_TO_HI_TYPE, value);
}
