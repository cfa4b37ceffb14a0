// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
export { BundleBuilder, build } from "./bundle.js";

// Profile, HI type and code system constants
export {
  CODE_SYSTEMS,
  ABDM_HI_TYPES,
  ABDM_SNOMED_CODES,
  DOC_TYPE_TO_HI_TYPE,
  NHCX_PROFILES,
  NRCES_PROFILE_BASE,
  getHiType,
  isDocType,
} from "./profiles.js";
export type { HiType, HiTypeKey, ProfiledResourceType } from "./profiles.js";

// Record helpers
export { parseClinicalDate, approximateBirthDate, fhirInstant } from "./dates.js";
export { readText, readList, readCodingResult, readTestEntry, readMedicationEntry } from "./record.js";

// Input and option types
export { DOC_TYPES, USE_CASES } from "./types.js";
export type {
  DocType,
  UseCase,
  ClinicalScalar,
  ClinicalValue,
  ClinicalRecord,
  CodingResult,
  TestEntry,
  MedicationEntry,
  BuilderOptions,
} from "./types.js";

// FHIR R4 datatypes
export type {
  Coding,
  Identifier,
  Period,
  FhirResource,
  BundleEntry,
  NhcxBundle,
} from "./fhir-types.js";
