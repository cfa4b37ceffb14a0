// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import { describe, it, expect } from "vitest";
import { convertDocuments, silentLogger } from "../src/index.js";
import type { Fusion } from "../src/index.js";

const documents: Fusion.ProcessedDocument[] = [
  {
    fileName: "discharge.pdf",
    docType: "discharge_summary",
    clinicalData: {
      patient_name: "Asha Rao",
      patient_gender: "female",
      patient_age: "45",
      hospital_name: "City Care Hospital",
      treating_doctor: "Dr. Mehta",
      primary_diagnosis: "Dengue fever",
      primary_diagnosis_icd10: "A90",
    },
  },
  {
    fileName: "lab.pdf",
    docType: "lab_report",
    clinicalData: {
      primary_diagnosis: "Thrombocytopenia",
      tests: [{ test_name: "Platelet Count", result_value: "90000", unit: "/uL" }],
    },
  },
];

function counter(): () => string {
  let n = 0;
  return () => `id-${++n}`;
}

describe("convertDocuments", () => {
  it("fuses, builds and validates", () => {
    const result = convertDocuments(documents, {
      logger: silentLogger,
      builder: { generateUuid: counter(), now: () => new Date("2024-03-15T10:30:00Z") },
    });

    expect(result.docType).toBe("discharge_summary");
    expect(result.fusion.sources).toEqual(["discharge.pdf", "lab.pdf"]);
    expect(result.fusion.conflicts.map((c) => c.field)).toEqual(["primary_diagnosis"]);
    expect(result.fusion.unifiedRecord.primary_diagnosis).toBe("Dengue fever");

    expect(result.bundle.entry[0]!.resource.resourceType).toBe("Composition");
    expect(result.bundle.entry.filter((e) => e.resource.resourceType === "Observation")).toHaveLength(1);
    expect(result.validation.errorCount).toBe(0);
  });

  it("honours an explicit document type and use case", () => {
    const result = convertDocuments(documents, {
      logger: silentLogger,
      docType: "lab_report",
      useCase: "preauthorization",
    });

    expect(result.docType).toBe("lab_report");
    const types = result.bundle.entry.map((e) => e.resource.resourceType);
    expect(types).toContain("CoverageEligibilityRequest");
    expect(types).not.toContain("Claim");
    expect(result.bundle.entry[0]!.resource.title).toBe("Diagnostic Report");
  });

  it("falls back to unknown with no documents", () => {
    const result = convertDocuments([], { logger: silentLogger });
    expect(result.docType).toBe("unknown");
    expect(result.fusion.unifiedRecord).toEqual({});
    expect(result.validation.valid).toBe(true);
  });
});
