// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
/**
 * Care-provider resources: the hospital (Organization) and the treating
 * doctor (Practitioner).
 *
 * When the record carries no registry id, identifiers are synthesized from
 * the display name so that the same record always yields the same
 * identifier value.
 */

import type { ClinicalRecord } from "./types.js";
import type { FhirResource } from "./fhir-types.js";
import { CODE_SYSTEMS, profileMeta } from "./profiles.js";
import { nameToIdentifier, readText } from "./record.js";

const IDENTIFIER_MAX_LENGTH = 30;

export function buildOrganization(record: ClinicalRecord, id: string): FhirResource {
  const name = readText(record, "hospital_name");

  const organization: FhirResource = {
    resourceType: "Organization",
    id,
    meta: profileMeta("Organization"),
    identifier: [
      {
        system: CODE_SYSTEMS.NHCX_PROVIDER,
        value:
          readText(record, "hospital_id") ??
          (name ? nameToIdentifier(name, IDENTIFIER_MAX_LENGTH) : "UNKNOWN_HOSPITAL"),
      },
    ],
    name: name ?? "Unknown Hospital",
  };

  const address = readText(record, "hospital_address");
  if (address) {
    organization.address = [{ text: address }];
  }

  const phone = readText(record, "hospital_phone");
  if (phone) {
    organization.telecom = [{ system: "phone", value: phone }];
  }

  return organization;
}

/** Treating doctor, falling back to the referring doctor on lab reports. */
export function practitionerName(record: ClinicalRecord): string {
  return (
    readText(record, "treating_doctor") ??
    readText(record, "referring_doctor") ??
    "Unknown Doctor"
  );
}

export function buildPractitioner(record: ClinicalRecord, id: string): FhirResource {
  const name = practitionerName(record);

  return {
    resourceType: "Practitioner",
    id,
    meta: profileMeta("Practitioner"),
    identifier: [
      {
        system: CODE_SYSTEMS.NDHM_PRACTITIONER,
        value:
          readText(record, "doctor_registration") ??
          nameToIdentifier(name, IDENTIFIER_MAX_LENGTH),
      },
    ],
    name: [{ use: "official", text: name }],
    qualification: [
      {
        code: {
          coding: [
            {
              system: CODE_SYSTEMS.QUALIFICATION,
              code: "MD",
              display: readText(record, "doctor_qualification") ?? "MBBS",
            },
          ],
        },
      },
    ],
  };
}
