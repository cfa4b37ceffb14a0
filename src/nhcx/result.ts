// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
/**
 * Lab results — one Observation per test row, gathered under a
 * DiagnosticReport.
 */

import type { BuildContext, ClinicalRecord, ClinicalValue, TestEntry } from "./types.js";
import type { BundleEntry, Coding, FhirResource } from "./fhir-types.js";
import { CODE_SYSTEMS, profileMeta } from "./profiles.js";
import { readTestEntry, readText } from "./record.js";
import { parseClinicalDate } from "./dates.js";
import { generated, resultNarrative } from "./narrative.js";

const NUMERIC = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/** Parse a lab value such as `"1,50,000"` or `"11.5"`; undefined when not a plain number. */
export function parseNumericResult(raw: string): number | undefined {
  const cleaned = raw.replace(/,/g, "").trim();
  return NUMERIC.test(cleaned) ? Number(cleaned) : undefined;
}

/** Resolve every test row into an Observation entry, in list order. */
export function resolveObservations(
  tests: ClinicalValue[],
  record: ClinicalRecord,
  ctx: BuildContext,
): BundleEntry[] {
  const effective = parseClinicalDate(readText(record, "sample_collection_date"));
  const entries: BundleEntry[] = [];

  for (const item of tests) {
    const test = readTestEntry(item);
    if (!test) continue;
    const id = ctx.generateUuid();
    entries.push({
      fullUrl: `urn:uuid:${id}`,
      resource: buildObservation(test, id, ctx.patientRef, effective),
    });
  }

  return entries;
}

function observationCoding(test: TestEntry): Coding {
  const loinc = test.loincCoding;
  if (loinc?.matched && loinc.code) {
    const coding: Coding = { system: CODE_SYSTEMS.LOINC, code: loinc.code };
    if (loinc.display) coding.display = loinc.display;
    return coding;
  }
  return { display: test.testName };
}

/** Assemble a FHIR Observation resource from a normalized test row. */
export function buildObservation(
  test: TestEntry,
  id: string,
  patientRef: string,
  effectiveDate?: string,
): FhirResource {
  const resource: FhirResource = {
    resourceType: "Observation",
    id,
    meta: profileMeta("Observation"),
    status: "final",
    category: [
      {
        coding: [
          {
            system: CODE_SYSTEMS.OBSERVATION_CATEGORY,
            code: "laboratory",
            display: "Laboratory",
          },
        ],
      },
    ],
    code: {
      coding: [observationCoding(test)],
      text: test.testName,
    },
    subject: { reference: patientRef },
  };

  if (effectiveDate) {
    resource.effectiveDateTime = effectiveDate;
  }

  // Value — numeric quantity or string
  if (test.resultValue !== undefined) {
    const numeric = parseNumericResult(test.resultValue);
    if (numeric !== undefined) {
      resource.valueQuantity = {
        value: numeric,
        ...(test.unit ? { unit: test.unit, code: test.unit } : {}),
        system: CODE_SYSTEMS.UCUM,
      };
    } else {
      resource.valueString = test.resultValue;
    }
  }

  if (test.referenceRange) {
    resource.referenceRange = [{ text: test.referenceRange }];
  }

  const flag = test.abnormalFlag?.toUpperCase();
  if (flag === "HIGH" || flag === "LOW") {
    resource.interpretation = [
      {
        coding: [
          {
            system: CODE_SYSTEMS.OBSERVATION_INTERPRETATION,
            code: flag === "HIGH" ? "H" : "L",
            display: flag === "HIGH" ? "High" : "Low",
          },
        ],
      },
    ];
  }

  resource.text = generated(
    resultNarrative(test.testName, test.resultValue, test.unit, test.abnormalFlag),
  );

  return resource;
}

/** DiagnosticReport linking every Observation created in this build. */
export function buildDiagnosticReport(
  record: ClinicalRecord,
  id: string,
  ctx: BuildContext,
  observationRefs: string[],
): FhirResource {
  const report: FhirResource = {
    resourceType: "DiagnosticReport",
    id,
    meta: profileMeta("DiagnosticReport"),
    status: "final",
    code: {
      coding: [{ system: CODE_SYSTEMS.LOINC, code: "11502-2", display: "Laboratory report" }],
    },
    subject: { reference: ctx.patientRef },
    performer: [{ reference: ctx.practitionerRef }],
  };

  if (observationRefs.length > 0) {
    report.result = observationRefs.map((reference) => ({ reference }));
  }

  const reported = parseClinicalDate(readText(record, "report_date"));
  if (reported) {
    report.effectiveDateTime = reported;
  }

  const impression = readText(record, "impression");
  if (impression) {
    report.conclusion = impression;
  }

  return report;
}
