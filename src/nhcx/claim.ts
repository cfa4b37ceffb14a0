// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
/**
 * Financial resources. A claim bundle carries a Claim; a pre-authorization
 * bundle carries a Coverage + CoverageEligibilityRequest pair instead.
 */

import type { BuildContext, ClinicalRecord, ClinicalValue } from "./types.js";
import type { FhirResource } from "./fhir-types.js";
import { CODE_SYSTEMS, profileMeta } from "./profiles.js";
import { nameToIdentifier, readList, readText, scalarText, stringifyValue } from "./record.js";
import { parseNumericResult } from "./result.js";

function insurerIdentifier(record: ClinicalRecord): { system: string; value: string } {
  const insurer = readText(record, "insurer_name");
  return {
    system: CODE_SYSTEMS.NHCX_INSURER,
    value: insurer ? nameToIdentifier(insurer) : "UNKNOWN_INSURER",
  };
}

function procedures(record: ClinicalRecord, fallback: string): string[] {
  const listed = readList(record, "procedures_performed");
  const items: ClinicalValue[] = listed.length > 0 ? listed : [fallback];
  return items.map((p) => scalarText(p) ?? stringifyValue(p));
}

export function buildClaim(record: ClinicalRecord, id: string, ctx: BuildContext): FhirResource {
  const insurerName = readText(record, "insurer_name");

  const claim: FhirResource = {
    resourceType: "Claim",
    id,
    meta: profileMeta("Claim"),
    status: "active",
    type: {
      coding: [{ system: CODE_SYSTEMS.CLAIM_TYPE, code: "institutional", display: "Institutional" }],
    },
    use: "claim",
    patient: { reference: ctx.patientRef },
    created: ctx.timestamp,
    insurer: { identifier: insurerIdentifier(record) },
    provider: { reference: ctx.organizationRef },
    priority: {
      coding: [{ system: CODE_SYSTEMS.PROCESS_PRIORITY, code: "normal" }],
    },
    careTeam: [{ sequence: 1, provider: { reference: ctx.practitionerRef } }],
    diagnosis: [{ sequence: 1, diagnosisReference: { reference: ctx.conditionRef } }],
    insurance: [
      {
        sequence: 1,
        focal: true,
        identifier: {
          system: CODE_SYSTEMS.NHCX_INSURER,
          value: readText(record, "insurance_id") ?? "UNKNOWN_POLICY",
        },
        coverage: { display: insurerName ?? "Unknown Insurer" },
      },
    ],
    item: procedures(record, "Inpatient Treatment").map((display, i) => ({
      sequence: i + 1,
      careTeamSequence: [1],
      diagnosisSequence: [1],
      productOrService: {
        coding: [{ system: CODE_SYSTEMS.CLAIM_PRODUCT, display }],
      },
      encounter: [{ reference: ctx.encounterRef }],
    })),
  };

  const amount = readText(record, "claim_amount");
  const total = amount === undefined ? undefined : parseNumericResult(amount);
  if (total !== undefined) {
    claim.total = { value: total, currency: "INR" };
  }

  return claim;
}

export function buildCoverage(record: ClinicalRecord, id: string, ctx: BuildContext): FhirResource {
  const coverage: FhirResource = {
    resourceType: "Coverage",
    id,
    status: "active",
    subscriber: { reference: ctx.patientRef },
    beneficiary: { reference: ctx.patientRef },
    payor: [
      {
        identifier: insurerIdentifier(record),
        display: readText(record, "insurer_name") ?? "Unknown Insurer",
      },
    ],
  };

  const policyId = readText(record, "insurance_id");
  if (policyId) {
    coverage.subscriberId = policyId;
  }

  return coverage;
}

export function buildCoverageEligibilityRequest(
  record: ClinicalRecord,
  id: string,
  ctx: BuildContext,
  coverageRef: string,
): FhirResource {
  return {
    resourceType: "CoverageEligibilityRequest",
    id,
    meta: profileMeta("CoverageEligibilityRequest"),
    status: "active",
    purpose: ["benefits"],
    patient: { reference: ctx.patientRef },
    created: ctx.timestamp,
    provider: { reference: ctx.organizationRef },
    insurer: { identifier: insurerIdentifier(record) },
    insurance: [{ focal: true, coverage: { reference: coverageRef } }],
    item: procedures(record, "Proposed Treatment").map((text) => ({
      category: {
        coding: [{ system: CODE_SYSTEMS.BENEFIT_CATEGORY, code: "medical", display: "Medical" }],
      },
      productOrService: { text },
    })),
  };
}
