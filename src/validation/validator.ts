// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
/**
 * Structural, terminology and referential checks for NHCX document bundles.
 *
 * Input is treated as untrusted JSON: every check narrows what it reads and
 * reports an {@link Issue} instead of throwing.
 */

import { ABDM_SNOMED_CODES, CODE_SYSTEMS, NHCX_PROFILES, NRCES_PROFILE_BASE } from "../nhcx/profiles.js";
import { issue, toOperationOutcome } from "./issues.js";
import type { Issue, OperationOutcome } from "./issues.js";
import { computeReadiness } from "./readiness.js";
import type { Readiness } from "./readiness.js";
import { isJsonObject, walkObjects } from "./walk.js";
import type { JsonObject } from "./walk.js";

const VALID_GENDERS = ["male", "female", "other", "unknown"];
const VALID_CLAIM_USE = ["claim", "preauthorization", "predetermination"];
const VALID_CONDITION_CLINICAL = ["active", "recurrence", "relapse", "inactive", "remission", "resolved"];
const VALID_BUNDLE_TYPES = ["document", "collection", "transaction"];
const VALID_OBS_STATUS = ["registered", "preliminary", "final", "amended", "cancelled"];

/** Coding systems accepted without a warning, matched by prefix. */
export const VALID_SYSTEM_PREFIXES: readonly string[] = [
  CODE_SYSTEMS.ICD10,
  CODE_SYSTEMS.LOINC,
  CODE_SYSTEMS.SNOMED,
  "http://terminology.hl7.org",
  "https://nrces.in/ndhm/fhir",
  CODE_SYSTEMS.UCUM,
  "https://ndhm.gov.in",
  "https://nhcx.health.gov.in",
  CODE_SYSTEMS.RXNORM,
];

const OBSERVATION_VALUES = ["valueQuantity", "valueString", "valueCodeableConcept"];

/**
 * Outcome of validating one bundle.
 */
export interface ValidationResult {
  /** True when there are no errors */
  valid: boolean;
  errorCount: number;
  warningCount: number;
  infoCount: number;
  errors: Issue[];
  warnings: Issue[];
  /** Informational issues */
  suggestions: Issue[];
  operationOutcome: OperationOutcome;
  readiness: Readiness;
  /** Readiness status line */
  summary: string;
}

interface Collected {
  /** resourceType → resources, keys in first-seen order */
  resources: Map<string, JsonObject[]>;
  fullUrls: Set<string>;
  entries: unknown[];
}

/**
 * Validate a bundle. Never mutates its input.
 *
 * @example
 * ```ts
 * const result = Validation.validate(bundle);
 * if (!result.valid) console.log(result.errors);
 * ```
 */
export function validate(bundle: unknown): ValidationResult {
  if (!isJsonObject(bundle) || Object.keys(bundle).length === 0) {
    return buildResult([
      issue(
        "error",
        "required",
        "Bundle is empty or null",
        "Bundle",
        "Ensure the FHIR builder produced output",
      ),
    ]);
  }

  const issues: Issue[] = [];
  const { resources, fullUrls, entries } = collect(bundle);
  const ofType = (rt: string): JsonObject[] => resources.get(rt) ?? [];

  checkBundle(bundle, issues);
  checkRequiredResources(resources, issues);
  checkCompositions(ofType("Composition"), issues);
  checkPatients(ofType("Patient"), issues);
  checkClaims(ofType("Claim"), issues);
  checkConditions(ofType("Condition"), issues);
  checkObservations(ofType("Observation"), issues);
  checkMedicationRequests(ofType("MedicationRequest"), issues);
  checkDiagnosticReports(ofType("DiagnosticReport"), issues);
  checkReferences(entries, fullUrls, issues);
  checkCodingSystems(entries, issues);
  checkProfiles(entries, issues);

  return buildResult(issues, [...resources.keys()]);
}

// ---------------------------------------------------------------------------
// Narrowing helpers
// ---------------------------------------------------------------------------

/** Whether a JSON value carries content: not null, false, 0, "", [] or {}. */
function isPresent(value: unknown): boolean {
  if (value === undefined || value === null || value === false || value === 0 || value === "") {
    return false;
  }
  if (Array.isArray(value)) return value.length > 0;
  if (isJsonObject(value)) return Object.keys(value).length > 0;
  return true;
}

function asObject(value: unknown): JsonObject {
  return isJsonObject(value) ? value : {};
}

function asList(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

function codings(concept: unknown): JsonObject[] {
  return asList(asObject(concept).coding).filter(isJsonObject);
}

function resourceTypeOf(resource: JsonObject): string | undefined {
  const rt = resource.resourceType;
  return typeof rt === "string" && rt !== "" ? rt : undefined;
}

function collect(bundle: JsonObject): Collected {
  const resources = new Map<string, JsonObject[]>();
  const fullUrls = new Set<string>();
  const entries = asList(bundle.entry);

  for (const entry of entries) {
    const e = asObject(entry);
    const resource = asObject(e.resource);
    const rt = resourceTypeOf(resource);
    if (rt) {
      const list = resources.get(rt) ?? [];
      list.push(resource);
      resources.set(rt, list);
    }
    if (typeof e.fullUrl === "string" && e.fullUrl !== "") {
      fullUrls.add(e.fullUrl);
    }
  }

  return { resources, fullUrls, entries };
}

// ---------------------------------------------------------------------------
// Checks
// ---------------------------------------------------------------------------

function checkBundle(bundle: JsonObject, issues: Issue[]): void {
  if (bundle.resourceType !== "Bundle") {
    issues.push(issue("error", "structure",
      "resourceType must be 'Bundle'", "Bundle.resourceType",
      "Set root resourceType to 'Bundle'"));
  }

  const type = bundle.type;
  if (typeof type !== "string" || !VALID_BUNDLE_TYPES.includes(type)) {
    issues.push(issue("error", "value",
      `Bundle.type '${String(type)}' is invalid`, "Bundle.type",
      "ABDM requires Bundle.type = 'document'"));
  } else if (type !== "document") {
    issues.push(issue("warning", "business-rule",
      "ABDM clinical bundles must use type 'document'", "Bundle.type",
      `Change Bundle.type from '${type}' to 'document'`));
  }

  if (!isPresent(bundle.timestamp)) {
    issues.push(issue("warning", "required",
      "Bundle.timestamp missing", "Bundle.timestamp",
      "Add ISO 8601 UTC timestamp"));
  }

  const profiles = asList(asObject(bundle.meta).profile);
  if (!profiles.includes(NHCX_PROFILES.Bundle)) {
    issues.push(issue("warning", "value",
      "Bundle should declare NHCX ClaimBundle profile", "Bundle.meta.profile",
      `Add '${NHCX_PROFILES.Bundle}' to Bundle.meta.profile`));
  }
}

const REQUIRED_RESOURCES: ReadonlyArray<[string, string]> = [
  ["Patient", "Patient demographics required for all NHCX claims"],
  ["Claim", "Claim resource mandatory for NHCX submission"],
  ["Organization", "Provider Organization resource required"],
  ["Practitioner", "Treating doctor Practitioner resource required"],
];

const RECOMMENDED_RESOURCES: ReadonlyArray<[string, string]> = [
  ["Encounter", "Add Encounter with admission/discharge dates"],
  ["Condition", "Add Condition with ICD-10 coded primary diagnosis"],
  ["DocumentReference", "Embed original PDF for complete audit trail"],
  ["Provenance", "Record extraction metadata and data lineage"],
];

function checkRequiredResources(resources: Map<string, JsonObject[]>, issues: Issue[]): void {
  if (!resources.has("Composition")) {
    issues.push(issue("error", "required",
      "Composition resource missing — ABDM mandate for document bundles",
      "Bundle.entry[0]",
      "Add Composition as FIRST entry with ABDM SNOMED HI type codes"));
  }

  for (const [rt, fix] of REQUIRED_RESOURCES) {
    if (!resources.has(rt)) {
      issues.push(issue("error", "required", `Required resource missing: ${rt}`, "Bundle.entry", fix));
    }
  }

  for (const [rt, fix] of RECOMMENDED_RESOURCES) {
    if (!resources.has(rt)) {
      issues.push(issue("information", "required", `Recommended resource missing: ${rt}`, "Bundle.entry", fix));
    }
  }
}

function checkCompositions(compositions: JsonObject[], issues: Issue[]): void {
  for (const comp of compositions) {
    if (!isPresent(comp.status)) {
      issues.push(issue("error", "required",
        "Composition.status required", "Composition.status",
        "Set to 'final' for completed documents"));
    }

    const typeCodings = codings(comp.type);
    if (typeCodings.length === 0) {
      issues.push(issue("error", "required",
        "Composition.type must have SNOMED CT coding for ABDM HI type",
        "Composition.type.coding",
        "Use SNOMED 373942005 (Discharge Summary) or 4241000179101 (Diagnostic Report)"));
    } else {
      const official = typeCodings.some(
        (c) => c.system === CODE_SYSTEMS.SNOMED && typeof c.code === "string" && ABDM_SNOMED_CODES.has(c.code),
      );
      if (!official) {
        issues.push(issue("error", "value",
          "Composition.type must use official ABDM SNOMED HI type code",
          "Composition.type.coding",
          `Use system='${CODE_SYSTEMS.SNOMED}' code='373942005' or '4241000179101'`));
      }
    }

    if (!isPresent(comp.subject)) {
      issues.push(issue("error", "required",
        "Composition.subject (patient reference) required",
        "Composition.subject", "Add reference to Patient resource"));
    }

    if (!isPresent(comp.author)) {
      issues.push(issue("error", "required",
        "Composition.author required", "Composition.author",
        "Add reference to Practitioner resource"));
    }
  }
}

function checkPatients(patients: JsonObject[], issues: Issue[]): void {
  for (const patient of patients) {
    const firstName = asObject(asList(patient.name)[0]);
    if (!isPresent(firstName.text)) {
      issues.push(issue("error", "required",
        "Patient.name missing", "Patient.name",
        "Ensure patient name is present in source document"));
    }

    const gender = patient.gender;
    if (!isPresent(gender)) {
      issues.push(issue("warning", "required",
        "Patient.gender missing", "Patient.gender",
        "Check document for M/F indicator"));
    } else if (typeof gender !== "string" || !VALID_GENDERS.includes(gender)) {
      issues.push(issue("error", "value",
        `Patient.gender '${String(gender)}' invalid`, "Patient.gender",
        `Must be one of: ${VALID_GENDERS.join(", ")}`));
    }

    if (!isPresent(patient.birthDate)) {
      issues.push(issue("warning", "required",
        "Patient.birthDate missing (age approximation used)",
        "Patient.birthDate", "Provide exact date of birth"));
    }
  }
}

function checkClaims(claims: JsonObject[], issues: Issue[]): void {
  for (const claim of claims) {
    const use = claim.use;
    if (typeof use !== "string" || !VALID_CLAIM_USE.includes(use)) {
      issues.push(issue("error", "value",
        `Claim.use '${String(use)}' invalid`, "Claim.use",
        "Set to 'claim' or 'preauthorization'"));
    }

    if (!isPresent(claim.insurer)) {
      issues.push(issue("error", "required",
        "Claim.insurer required for NHCX submission", "Claim.insurer",
        "Add insurer identifier from policy document"));
    }

    if (!isPresent(claim.diagnosis)) {
      issues.push(issue("error", "required",
        "Claim has no diagnosis linked", "Claim.diagnosis",
        "Link primary Condition resource"));
    }

    if (!isPresent(claim.item)) {
      issues.push(issue("warning", "required",
        "Claim has no items (procedures/services)", "Claim.item",
        "List procedures performed during hospitalisation"));
    }
  }
}

function checkConditions(conditions: JsonObject[], issues: Issue[]): void {
  for (const cond of conditions) {
    if (!isPresent(cond.clinicalStatus)) {
      issues.push(issue("error", "required",
        "Condition.clinicalStatus required", "Condition.clinicalStatus",
        "Set to 'resolved' for post-discharge diagnoses"));
    } else {
      const known = codings(cond.clinicalStatus).some(
        (c) => typeof c.code === "string" && VALID_CONDITION_CLINICAL.includes(c.code),
      );
      if (!known) {
        issues.push(issue("error", "value",
          "Condition.clinicalStatus code invalid",
          "Condition.clinicalStatus.coding.code",
          `Must be one of: ${VALID_CONDITION_CLINICAL.join(", ")}`));
      }
    }

    if (!codings(cond.code).some((c) => c.system === CODE_SYSTEMS.ICD10)) {
      issues.push(issue("warning", "value",
        "Condition not ICD-10 coded", "Condition.code.coding",
        "ICD-10 code improves claim processing. Auto-coding was attempted."));
    }
  }
}

function checkObservations(observations: JsonObject[], issues: Issue[]): void {
  for (const obs of observations) {
    const hasValue =
      OBSERVATION_VALUES.some((key) => isPresent(obs[key])) || typeof obs.valueBoolean === "boolean";
    if (!hasValue) {
      issues.push(issue("warning", "required",
        "Observation has no result value", "Observation.value[x]",
        "Ensure lab result value present on the report"));
    }

    if (typeof obs.status !== "string" || !VALID_OBS_STATUS.includes(obs.status)) {
      issues.push(issue("warning", "value",
        "Observation.status invalid", "Observation.status",
        "Set to 'final' for submitted results"));
    }
  }
}

function checkMedicationRequests(meds: JsonObject[], issues: Issue[]): void {
  for (const med of meds) {
    if (!isPresent(med.medicationCodeableConcept) && !isPresent(med.medicationReference)) {
      issues.push(issue("error", "required",
        "MedicationRequest must identify medication",
        "MedicationRequest.medication[x]", "Add medication name"));
    }
    if (!isPresent(med.status)) {
      issues.push(issue("error", "required",
        "MedicationRequest.status required", "MedicationRequest.status",
        "Set to 'active'"));
    }
    if (!isPresent(med.intent)) {
      issues.push(issue("error", "required",
        "MedicationRequest.intent required", "MedicationRequest.intent",
        "Set to 'order' for discharge prescriptions"));
    }
  }
}

function checkDiagnosticReports(reports: JsonObject[], issues: Issue[]): void {
  for (const report of reports) {
    if (report.status !== "final") {
      issues.push(issue("warning", "value",
        "DiagnosticReport.status should be 'final'",
        "DiagnosticReport.status", "Set to 'final'"));
    }
    if (!isPresent(report.result)) {
      issues.push(issue("warning", "required",
        "DiagnosticReport has no Observation results linked",
        "DiagnosticReport.result",
        "Link each lab result as an Observation"));
    }
  }
}

/** Every `urn:uuid:` reference must name a fullUrl in this bundle. */
function checkReferences(entries: unknown[], fullUrls: Set<string>, issues: Issue[]): void {
  for (const entry of entries) {
    const resource = asObject(asObject(entry).resource);
    const rt = resourceTypeOf(resource) ?? "Unknown";
    walkObjects(resource, (obj) => {
      const ref = obj.reference;
      if (typeof ref === "string" && ref.startsWith("urn:uuid:") && !fullUrls.has(ref)) {
        issues.push(issue("error", "not-found",
          `Broken reference '${ref}' in ${rt}`,
          `${rt}.reference`,
          "All urn:uuid references must resolve inside this bundle"));
      }
    });
  }
}

function checkCodingSystems(entries: unknown[], issues: Issue[]): void {
  for (const entry of entries) {
    const resource = asObject(asObject(entry).resource);
    const rt = resourceTypeOf(resource) ?? "Unknown";
    walkObjects(resource, (obj) => {
      for (const coding of asList(obj.coding).filter(isJsonObject)) {
        const system = coding.system;
        if (typeof system !== "string" || system === "") continue;
        if (!VALID_SYSTEM_PREFIXES.some((prefix) => system.startsWith(prefix))) {
          issues.push(issue("warning", "value",
            `Non-standard coding system '${system}' in ${rt}`,
            `${rt}.coding.system`,
            "Use official systems: ICD-10, LOINC, SNOMED CT, NHCX"));
        }
      }
    });
  }
}

function checkProfiles(entries: unknown[], issues: Issue[]): void {
  for (const entry of entries) {
    const resource = asObject(asObject(entry).resource);
    const rt = resourceTypeOf(resource);
    if (rt && !isPresent(asObject(resource.meta).profile)) {
      issues.push(issue("information", "value",
        `${rt} has no NRCeS profile in meta.profile`,
        `${rt}.meta.profile`,
        `Add profile URL: ${NRCES_PROFILE_BASE}${rt}`));
    }
  }
}

// ---------------------------------------------------------------------------
// Result
// ---------------------------------------------------------------------------

function buildResult(issues: Issue[], resourceTypes: string[] = []): ValidationResult {
  const errors = issues.filter((i) => i.severity === "error");
  const warnings = issues.filter((i) => i.severity === "warning");
  const suggestions = issues.filter((i) => i.severity === "information");
  const readiness = computeReadiness(resourceTypes, errors.length, warnings.length);

  return {
    valid: errors.length === 0,
    errorCount: errors.length,
    warningCount: warnings.length,
    infoCount: suggestions.length,
    errors,
    warnings,
    suggestions,
    operationOutcome: toOperationOutcome(issues),
    readiness,
    summary: readiness.status,
  };
}
