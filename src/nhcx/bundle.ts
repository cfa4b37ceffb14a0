// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import { randomUUID } from "node:crypto";
import { readFileSync } from "node:fs";
import { consoleLogger } from "../logger.js";
import type { Logger } from "../logger.js";
import type { BuildContext, BuilderOptions, ClinicalRecord, DocType, UseCase } from "./types.js";
import type { BundleEntry, FhirResource, NhcxBundle } from "./fhir-types.js";
import { CODE_SYSTEMS, NHCX_PROFILES, getHiType, isDocType } from "./profiles.js";
import { readList } from "./record.js";
import { fhirInstant } from "./dates.js";
import { buildPatient } from "./patient.js";
import { buildOrganization, buildPractitioner } from "./provider.js";
import { buildEncounter } from "./encounter.js";
import { buildCondition } from "./condition.js";
import { buildDiagnosticReport, resolveObservations } from "./result.js";
import { resolveMedications } from "./medication.js";
import { buildClaim, buildCoverage, buildCoverageEligibilityRequest } from "./claim.js";
import { resolveDocuments } from "./document.js";
import { buildProvenance } from "./provenance.js";
import { buildComposition } from "./composition.js";

function entry(resource: FhirResource): BundleEntry {
  return { fullUrl: `urn:uuid:${resource.id}`, resource };
}

/**
 * Builder for NHCX/ABDM FHIR R4 document bundles.
 *
 * Every call to {@link BundleBuilder.build} mints fresh resource ids, so two
 * builds never share identifiers; everything else about the bundle's shape is
 * determined by the inputs.
 *
 * @example
 * ```ts
 * const builder = new NHCX.BundleBuilder();
 * const bundle = builder.build(
 *   { patient_name: "Asha Rao", primary_diagnosis: "Dengue fever" },
 *   "discharge_summary",
 *   "claim",
 *   ["./discharge.pdf"],
 * );
 * ```
 */
export class BundleBuilder {
  private readonly _generateUuid: () => string;
  private readonly _now: () => Date;
  private readonly _readFile: (path: string) => Uint8Array;
  private readonly _logger: Logger;

  constructor(options: BuilderOptions = {}) {
    this._generateUuid = options.generateUuid ?? randomUUID;
    this._now = options.now ?? (() => new Date());
    this._readFile = options.readFile ?? ((path) => readFileSync(path));
    this._logger = options.logger ?? consoleLogger;
  }

  /**
   * Build a complete NHCX document bundle from one (possibly fused) clinical record.
   *
   * Composition is always `entry[0]`, and every `urn:uuid:` reference
   * resolves to an entry of the same bundle. Unreadable source PDFs are
   * embedded as empty attachments.
   */
  build(
    clinicalData: ClinicalRecord,
    docType: string = "unknown",
    useCase: UseCase = "claim",
    sourcePdfPaths: string[] = [],
  ): NhcxBundle {
    const now = this._now();
    const timestamp = fhirInstant(now);
    const knownDocType: DocType = isDocType(docType) ? docType : "unknown";
    const hiType = getHiType(knownDocType);
    const uuid = this._generateUuid;

    const ids = {
      bundle: uuid(),
      composition: uuid(),
      patient: uuid(),
      organization: uuid(),
      practitioner: uuid(),
      encounter: uuid(),
      condition: uuid(),
      diagnosticReport: uuid(),
      claim: uuid(),
      provenance: uuid(),
    };

    const ctx: BuildContext = {
      patientRef: `urn:uuid:${ids.patient}`,
      organizationRef: `urn:uuid:${ids.organization}`,
      practitionerRef: `urn:uuid:${ids.practitioner}`,
      encounterRef: `urn:uuid:${ids.encounter}`,
      conditionRef: `urn:uuid:${ids.condition}`,
      timestamp,
      now,
      generateUuid: uuid,
    };

    const entries: BundleEntry[] = [
      entry(buildPatient(clinicalData, ids.patient, now, uuid)),
      entry(buildOrganization(clinicalData, ids.organization)),
      entry(buildPractitioner(clinicalData, ids.practitioner)),
      entry(buildEncounter(clinicalData, ids.encounter, ctx)),
      entry(buildCondition(clinicalData, ids.condition, ctx)),
    ];

    // Lab results
    const tests = readList(clinicalData, "tests");
    const observations = resolveObservations(tests, clinicalData, ctx);
    entries.push(...observations);
    const observationRefs = observations.map((e) => e.fullUrl);

    if (tests.length > 0 || knownDocType === "diagnostic_report" || knownDocType === "lab_report") {
      entries.push(
        entry(buildDiagnosticReport(clinicalData, ids.diagnosticReport, ctx, observationRefs)),
      );
    }

    // Discharge medications
    const medications = resolveMedications(
      readList(clinicalData, "medications_at_discharge"),
      ctx,
    );
    entries.push(...medications);

    // Claim, or Coverage + CoverageEligibilityRequest for pre-authorization
    if (useCase === "preauthorization") {
      const coverage = buildCoverage(clinicalData, uuid(), ctx);
      entries.push(entry(coverage));
      entries.push(
        entry(
          buildCoverageEligibilityRequest(
            clinicalData,
            ids.claim,
            ctx,
            `urn:uuid:${coverage.id}`,
          ),
        ),
      );
    } else {
      entries.push(entry(buildClaim(clinicalData, ids.claim, ctx)));
    }

    // Original PDFs
    entries.push(
      ...resolveDocuments(sourcePdfPaths, knownDocType, ctx, this._readFile, this._logger),
    );

    // Provenance over everything built so far
    const targets = entries.map((e) => e.fullUrl);
    entries.push(entry(buildProvenance(ids.provenance, targets, sourcePdfPaths, ctx)));

    // Composition goes first in a document bundle
    const composition = buildComposition(clinicalData, knownDocType, hiType, ids.composition, ctx, {
      conditionRef: ctx.conditionRef,
      observationRefs,
      medicationRefs: medications.map((e) => e.fullUrl),
    });
    entries.unshift(entry(composition));

    const bundle: NhcxBundle = {
      resourceType: "Bundle",
      id: ids.bundle,
      meta: {
        lastUpdated: timestamp,
        profile: [NHCX_PROFILES.Bundle],
      },
      identifier: {
        system: CODE_SYSTEMS.NDHM_BUNDLE,
        value: ids.bundle,
      },
      type: "document",
      timestamp,
      entry: entries,
    };

    this._logger.info(
      `Built FHIR bundle: ${entries.length} resources, use_case=${useCase}, doc_type=${knownDocType}`,
    );

    return bundle;
  }
}

/** Build a bundle with default options (random UUIDs, system clock, fs reads). */
export function build(
  clinicalData: ClinicalRecord,
  docType: string = "unknown",
  useCase: UseCase = "claim",
  sourcePdfPaths: string[] = [],
): NhcxBundle {
  return new BundleBuilder().build(clinicalData, docType, useCase, sourcePdfPaths);
}
