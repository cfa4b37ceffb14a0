// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import { describe, it, expect } from "vitest";
import { NHCX, Validation, silentLogger } from "../src/index.js";

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const CLAIM_BUNDLE_PROFILE = "https://nrces.in/ndhm/fhir/r4/StructureDefinition/ClaimBundle";

const record: NHCX.ClinicalRecord = {
  patient_name: "Asha Rao",
  patient_age: "45",
  patient_gender: "female",
  hospital_name: "City Care Hospital",
  treating_doctor: "Dr. Mehta",
  primary_diagnosis: "Dengue fever",
  primary_diagnosis_icd10: "A90",
  tests: [{ test_name: "Hemoglobin", result_value: "11.5", unit: "g/dL" }, "Dengue NS1"],
  medications_at_discharge: ["Paracetamol 500mg"],
};

function builder(): NHCX.BundleBuilder {
  let n = 0;
  return new NHCX.BundleBuilder({
    generateUuid: () => `id-${++n}`,
    now: () => new Date("2024-03-15T10:30:00Z"),
    readFile: () => new Uint8Array([1, 2, 3]),
    logger: silentLogger,
  });
}

const patientEntry = {
  fullUrl: "urn:uuid:p1",
  resource: {
    resourceType: "Patient",
    id: "p1",
    meta: { profile: ["https://nrces.in/ndhm/fhir/r4/StructureDefinition/Patient"] },
    name: [{ text: "Ravi Kumar" }],
    gender: "male",
    birthDate: "1980-01-01",
  },
};

function handBundle(entries: unknown[]): Record<string, unknown> {
  return {
    resourceType: "Bundle",
    type: "document",
    timestamp: "2024-03-15T10:30:00Z",
    meta: { profile: [CLAIM_BUNDLE_PROFILE] },
    entry: entries,
  };
}

function messages(issues: Validation.Issue[]): string[] {
  return issues.map((i) => i.message);
}

// ---------------------------------------------------------------------------
// Empty input
// ---------------------------------------------------------------------------

describe("Validation.validate — empty input", () => {
  it.each([[{}], [null], [undefined], ["bundle"], [[]]])("rejects %j with a single error", (input) => {
    const result = Validation.validate(input);
    expect(result.valid).toBe(false);
    expect(result.errorCount).toBe(1);
    expect(result.errors[0]!.message).toBe("Bundle is empty or null");
    expect(result.errors[0]!.code).toBe("required");
    expect(result.warningCount).toBe(0);
    expect(result.infoCount).toBe(0);
  });

  it("scores an empty bundle as critical", () => {
    const result = Validation.validate({});
    expect(result.readiness.score).toBe(6);
    expect(result.readiness.color).toBe("red");
    expect(result.summary).toBe("Critical issues — major rework needed");
    expect(result.readiness.resourcesPresent).toEqual([]);
    expect(result.readiness.resourcesMissing).toHaveLength(12);
  });

  it("renders the OperationOutcome", () => {
    expect(Validation.validate({}).operationOutcome).toEqual({
      resourceType: "OperationOutcome",
      id: "validation-result",
      issue: [
        {
          severity: "error",
          code: "required",
          details: { text: "Bundle is empty or null" },
          diagnostics: "Ensure the FHIR builder produced output",
          expression: ["Bundle"],
        },
      ],
    });
  });
});

// ---------------------------------------------------------------------------
// Built bundles
// ---------------------------------------------------------------------------

describe("Validation.validate — built bundles", () => {
  it("finds no errors in a freshly built claim bundle", () => {
    const bundle = builder().build(record, "discharge_summary", "claim");
    const result = Validation.validate(bundle);

    expect(result.valid).toBe(true);
    expect(result.errorCount).toBe(0);
    expect(messages(result.warnings)).toEqual(["Observation has no result value"]);
    expect(messages(result.suggestions)).toEqual(["Recommended resource missing: DocumentReference"]);
    expect(result.readiness).toEqual({
      score: 94,
      status: "Ready for NHCX submission",
      color: "green",
      resourcesPresent: [
        "Composition",
        "Patient",
        "Organization",
        "Practitioner",
        "Encounter",
        "Condition",
        "Observation",
        "DiagnosticReport",
        "MedicationRequest",
        "Claim",
        "Provenance",
      ],
      resourcesMissing: ["DocumentReference"],
    });
  });

  it("scores a bundle with an embedded PDF higher", () => {
    const bundle = builder().build(record, "discharge_summary", "claim", ["discharge.pdf"]);
    const result = Validation.validate(bundle);
    expect(result.suggestions).toEqual([]);
    expect(result.readiness.score).toBe(99);
  });

  it("reports the missing Claim in pre-authorization bundles", () => {
    const bundle = builder().build(record, "discharge_summary", "preauthorization");
    const result = Validation.validate(bundle);
    expect(messages(result.errors)).toEqual(["Required resource missing: Claim"]);
    expect(messages(result.suggestions)).toContain("Coverage has no NRCeS profile in meta.profile");
  });

  it("does not mutate the bundle", () => {
    const bundle = builder().build(record, "discharge_summary");
    const before = JSON.stringify(bundle);
    Validation.validate(bundle);
    expect(JSON.stringify(bundle)).toBe(before);
  });
});

// ---------------------------------------------------------------------------
// Individual rules
// ---------------------------------------------------------------------------

describe("Validation.validate — rules", () => {
  it("flags broken urn:uuid references", () => {
    const result = Validation.validate(
      handBundle([
        patientEntry,
        {
          fullUrl: "urn:uuid:o1",
          resource: {
            resourceType: "Observation",
            status: "final",
            valueString: "Positive",
            subject: { reference: "urn:uuid:does-not-exist" },
          },
        },
      ]),
    );

    const notFound = result.errors.filter((i) => i.code === "not-found");
    expect(notFound).toEqual([
      {
        severity: "error",
        code: "not-found",
        message: "Broken reference 'urn:uuid:does-not-exist' in Observation",
        location: "Observation.reference",
        fix: "All urn:uuid references must resolve inside this bundle",
      },
    ]);
  });

  it("ignores references that are not urn:uuid", () => {
    const result = Validation.validate(
      handBundle([
        patientEntry,
        { resource: { resourceType: "Encounter", subject: { reference: "Patient/p1" } } },
      ]),
    );
    expect(result.errors.filter((i) => i.code === "not-found")).toEqual([]);
  });

  it("finds references at any depth", () => {
    let nested: Record<string, unknown> = { reference: "urn:uuid:deep" };
    for (let i = 0; i < 10000; i++) {
      nested = { child: nested };
    }
    const result = Validation.validate(
      handBundle([patientEntry, { resource: { resourceType: "Basic", extension: [nested] } }]),
    );
    expect(messages(result.errors)).toContain("Broken reference 'urn:uuid:deep' in Basic");
  });

  it("checks the bundle type", () => {
    const collection = Validation.validate({ ...handBundle([patientEntry]), type: "collection" });
    expect(collection.warnings).toContainEqual({
      severity: "warning",
      code: "business-rule",
      message: "ABDM clinical bundles must use type 'document'",
      location: "Bundle.type",
      fix: "Change Bundle.type from 'collection' to 'document'",
    });

    const batch = Validation.validate({ ...handBundle([patientEntry]), type: "batch" });
    expect(messages(batch.errors)).toContain("Bundle.type 'batch' is invalid");
  });

  it("checks bundle resourceType, timestamp and profile", () => {
    const result = Validation.validate({ resourceType: "Parameters", type: "document", entry: [] });
    expect(messages(result.errors)).toContain("resourceType must be 'Bundle'");
    expect(messages(result.warnings)).toEqual([
      "Bundle.timestamp missing",
      "Bundle should declare NHCX ClaimBundle profile",
    ]);
  });

  it("rejects invalid patient gender but only warns on a missing one", () => {
    const invalid = Validation.validate(
      handBundle([{ resource: { ...patientEntry.resource, gender: "M" } }]),
    );
    expect(messages(invalid.errors)).toContain("Patient.gender 'M' invalid");

    const missing = Validation.validate(
      handBundle([{ resource: { ...patientEntry.resource, gender: "" } }]),
    );
    expect(messages(missing.warnings)).toContain("Patient.gender missing");
    expect(messages(missing.errors)).not.toContain("Patient.gender '' invalid");
  });

  it("requires a SNOMED ABDM code on the Composition", () => {
    const uncoded = Validation.validate(
      handBundle([{ resource: { resourceType: "Composition", status: "final", type: {} } }]),
    );
    expect(messages(uncoded.errors)).toEqual(
      expect.arrayContaining([
        "Composition.type must have SNOMED CT coding for ABDM HI type",
        "Composition.subject (patient reference) required",
        "Composition.author required",
      ]),
    );

    const wrongCode = Validation.validate(
      handBundle([
        {
          resource: {
            resourceType: "Composition",
            status: "final",
            type: { coding: [{ system: "http://loinc.org", code: "18842-5" }] },
          },
        },
      ]),
    );
    expect(messages(wrongCode.errors)).toContain(
      "Composition.type must use official ABDM SNOMED HI type code",
    );
  });

  it("checks claims", () => {
    const result = Validation.validate(
      handBundle([{ resource: { resourceType: "Claim", use: "refund" } }]),
    );
    expect(messages(result.errors)).toEqual(
      expect.arrayContaining([
        "Claim.use 'refund' invalid",
        "Claim.insurer required for NHCX submission",
        "Claim has no diagnosis linked",
      ]),
    );
    expect(messages(result.warnings)).toContain("Claim has no items (procedures/services)");
  });

  it("checks conditions", () => {
    const result = Validation.validate(
      handBundle([
        {
          resource: {
            resourceType: "Condition",
            clinicalStatus: { coding: [{ code: "cured" }] },
            code: { coding: [{ system: "http://snomed.info/sct", code: "38362002" }] },
          },
        },
      ]),
    );
    expect(messages(result.errors)).toContain("Condition.clinicalStatus code invalid");
    expect(messages(result.warnings)).toContain("Condition not ICD-10 coded");
  });

  it("checks medication requests and diagnostic reports", () => {
    const result = Validation.validate(
      handBundle([
        { resource: { resourceType: "MedicationRequest" } },
        { resource: { resourceType: "DiagnosticReport", status: "preliminary" } },
      ]),
    );
    expect(messages(result.errors)).toEqual(
      expect.arrayContaining([
        "MedicationRequest must identify medication",
        "MedicationRequest.status required",
        "MedicationRequest.intent required",
      ]),
    );
    expect(messages(result.warnings)).toEqual(
      expect.arrayContaining([
        "DiagnosticReport.status should be 'final'",
        "DiagnosticReport has no Observation results linked",
      ]),
    );
  });

  it("accepts valueBoolean false as an observation value", () => {
    const result = Validation.validate(
      handBundle([{ resource: { resourceType: "Observation", status: "final", valueBoolean: false } }]),
    );
    expect(messages(result.warnings)).not.toContain("Observation has no result value");
  });

  it("warns on non-standard coding systems", () => {
    const result = Validation.validate(
      handBundle([
        patientEntry,
        {
          resource: {
            resourceType: "Condition",
            meta: { profile: ["x"] },
            clinicalStatus: { coding: [{ code: "active" }] },
            code: {
              coding: [
                { system: "http://hl7.org/fhir/sid/icd-10", code: "A90" },
                { system: "http://example.org/local-codes", code: "DF" },
              ],
            },
          },
        },
      ]),
    );
    expect(messages(result.warnings)).toEqual([
      "Non-standard coding system 'http://example.org/local-codes' in Condition",
    ]);
  });

  it("suggests NRCeS profiles for unprofiled resources", () => {
    const result = Validation.validate(
      handBundle([{ resource: { resourceType: "Encounter", status: "finished" } }]),
    );
    expect(result.suggestions).toContainEqual({
      severity: "information",
      code: "value",
      message: "Encounter has no NRCeS profile in meta.profile",
      location: "Encounter.meta.profile",
      fix: "Add profile URL: https://nrces.in/ndhm/fhir/r4/StructureDefinition/Encounter",
    });
  });
});

// ---------------------------------------------------------------------------
// Readiness
// ---------------------------------------------------------------------------

describe("Validation readiness", () => {
  it("never drops when a weighted resource type is added", () => {
    const base = Validation.validate(handBundle([patientEntry]));
    const withEncounter = Validation.validate(
      handBundle([
        patientEntry,
        {
          fullUrl: "urn:uuid:e1",
          resource: {
            resourceType: "Encounter",
            meta: { profile: ["https://nrces.in/ndhm/fhir/r4/StructureDefinition/Encounter"] },
            status: "finished",
          },
        },
      ]),
    );

    expect(base.readiness.score).toBe(7);
    expect(withEncounter.readiness.score).toBe(12);
  });

  it("caps the error and warning penalties", () => {
    const all = Object.keys(Validation.RESOURCE_WEIGHTS);
    expect(Validation.computeReadiness(all, 0, 0).score).toBe(100);
    expect(Validation.computeReadiness(all, 100, 0).score).toBe(75);
    expect(Validation.computeReadiness(all, 0, 100).score).toBe(90);
    expect(Validation.computeReadiness([], 100, 100).score).toBe(0);
  });

  it.each([
    [100, "green", "Ready for NHCX submission"],
    [90, "green", "Ready for NHCX submission"],
    [89, "yellow", "Review warnings before submitting"],
    [75, "yellow", "Review warnings before submitting"],
    [74, "orange", "Fix errors — not ready for submission"],
    [50, "orange", "Fix errors — not ready for submission"],
    [49, "red", "Critical issues — major rework needed"],
  ])("maps %i to %s", (score, color, status) => {
    expect(Validation.scoreBand(score)).toEqual({ status, color });
  });
});

describe("Validation.walk", () => {
  it("visits parents before children in document order", () => {
    const kinds: string[] = [];
    Validation.walk({ a: [1, { b: 2 }] }, (node) => kinds.push(node.kind));
    expect(kinds).toEqual(["object", "list", "scalar", "object", "scalar"]);
  });
});
