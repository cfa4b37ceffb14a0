// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
/**
 * Patient construction from the demographic fields of a clinical record.
 */

import type { ClinicalRecord } from "./types.js";
import type { FhirResource } from "./fhir-types.js";
import { CODE_SYSTEMS, profileMeta } from "./profiles.js";
import { readText } from "./record.js";
import { approximateBirthDate, parseClinicalDate } from "./dates.js";
import { generated, patientNarrative } from "./narrative.js";

/**
 * Resolve the patient's birth date: an explicit DOB when it parses,
 * otherwise Jan 1 of (current year − age).
 */
export function resolveBirthDate(record: ClinicalRecord, now: Date): string | undefined {
  return (
    parseClinicalDate(readText(record, "patient_dob")) ??
    approximateBirthDate(readText(record, "patient_age"), now)
  );
}

export function buildPatient(
  record: ClinicalRecord,
  id: string,
  now: Date,
  generateUuid: () => string,
): FhirResource {
  const name = readText(record, "patient_name") ?? "Unknown";
  // Gender is copied verbatim; the validator flags values outside the FHIR value set
  const gender = readText(record, "patient_gender") ?? "unknown";
  const birthDate = resolveBirthDate(record, now);

  const patient: FhirResource = {
    resourceType: "Patient",
    id,
    meta: profileMeta("Patient"),
    identifier: [
      {
        system: CODE_SYSTEMS.NDHM_PATIENT,
        value: readText(record, "patient_id") ?? generateUuid().slice(0, 8),
      },
    ],
    name: [{ use: "official", text: name }],
    gender,
  };

  if (birthDate) {
    patient.birthDate = birthDate;
  }

  const phone = readText(record, "patient_phone");
  if (phone) {
    patient.telecom = [{ system: "phone", value: phone }];
  }

  const address = readText(record, "patient_address");
  if (address) {
    patient.address = [{ text: address }];
  }

  patient.text = generated(patientNarrative(name, birthDate, gender));

  return patient;
}
