// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
/**
 * Shared FHIR R4 datatypes used across NHCX bundle construction.
 *
 * Only the subset of R4 needed by the claim/document resources is modelled.
 * Resources themselves stay open-ended objects so that the validator can
 * walk them structurally.
 */

/** FHIR Coding element — a code from a terminology system. */
export interface Coding {
  system?: string;
  version?: string;
  code?: string;
  display?: string;
}

/** FHIR Identifier — a business identifier for an entity. */
export interface Identifier {
  use?: "usual" | "official" | "temp" | "secondary" | "old";
  system?: string;
  value?: string;
}

/** FHIR Period — a time range. */
export interface Period {
  start?: string;
  end?: string;
}

/** Any FHIR resource produced by the builder. */
export interface FhirResource {
  resourceType: string;
  id: string;
  [element: string]: unknown;
}

/** A Bundle.entry — every entry is addressed by a `urn:uuid:` fullUrl. */
export interface BundleEntry {
  fullUrl: string;
  resource: FhirResource;
}

/** A complete NHCX document bundle as returned by the builder. */
export interface NhcxBundle {
  resourceType: "Bundle";
  id: string;
  meta: { lastUpdated: string; profile: string[] };
  identifier: Identifier;
  type: "document";
  timestamp: string;
  entry: BundleEntry[];
}
