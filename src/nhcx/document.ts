// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
/**
 * Source-document embedding — each original PDF becomes a DocumentReference
 * whose attachment carries the file bytes as base64.
 */

import { createHash } from "node:crypto";
import { basename } from "node:path";
import { DocumentReadError } from "../errors.js";
import type { Logger } from "../logger.js";
import type { BuildContext, DocType } from "./types.js";
import type { BundleEntry, FhirResource } from "./fhir-types.js";
import { CODE_SYSTEMS, profileMeta } from "./profiles.js";

const DOCUMENT_TYPE_CODES: Partial<Record<DocType, { code: string; display: string }>> = {
  discharge_summary: { code: "34105-7", display: "Hospital Discharge summary" },
  diagnostic_report: { code: "11502-2", display: "Laboratory report" },
  lab_report: { code: "11502-2", display: "Laboratory report" },
};

const DEFAULT_DOCUMENT_TYPE = { code: "34105-7", display: "Hospital Discharge summary" };

/** Embedded payload for one source file; empty when it could not be read. */
export interface EmbeddedPdf {
  data: string;
  size: number;
  hash?: string;
}

/**
 * Read and base64-encode a source PDF. Failures are logged and yield an
 * empty payload so the build can continue.
 */
export function embedPdf(
  path: string,
  readFile: (path: string) => Uint8Array,
  logger: Logger,
): EmbeddedPdf {
  let bytes: Uint8Array;
  try {
    bytes = readFile(path);
  } catch (err) {
    const error = new DocumentReadError(
      `Could not read source PDF ${path}: ${err instanceof Error ? err.message : String(err)}`,
      path,
    );
    logger.warn(error.message, { path: error.path });
    return { data: "", size: 0 };
  }

  const buffer = Buffer.from(bytes);
  return {
    data: buffer.toString("base64"),
    size: buffer.length,
    hash: createHash("sha1").update(buffer).digest("base64"),
  };
}

/** Resolve every source path into a DocumentReference entry, in input order. */
export function resolveDocuments(
  paths: string[],
  docType: DocType,
  ctx: BuildContext,
  readFile: (path: string) => Uint8Array,
  logger: Logger,
): BundleEntry[] {
  return paths.map((path) => {
    const id = ctx.generateUuid();
    const pdf = embedPdf(path, readFile, logger);
    return {
      fullUrl: `urn:uuid:${id}`,
      resource: buildDocumentReference(path, pdf, docType, id, ctx),
    };
  });
}

export function buildDocumentReference(
  path: string,
  pdf: EmbeddedPdf,
  docType: DocType,
  id: string,
  ctx: BuildContext,
): FhirResource {
  const type = DOCUMENT_TYPE_CODES[docType] ?? DEFAULT_DOCUMENT_TYPE;

  const attachment: Record<string, unknown> = {
    contentType: "application/pdf",
    data: pdf.data,
    title: path ? basename(path) : "source.pdf",
  };
  if (pdf.hash) {
    attachment.size = pdf.size;
    attachment.hash = pdf.hash;
  }

  return {
    resourceType: "DocumentReference",
    id,
    meta: profileMeta("DocumentReference"),
    status: "current",
    type: {
      coding: [{ system: CODE_SYSTEMS.LOINC, code: type.code, display: type.display }],
    },
    subject: { reference: ctx.patientRef },
    date: ctx.timestamp,
    content: [{ attachment }],
  };
}
