// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
/**
 * zod schemas for JSON arriving from outside the process (CLI files, an
 * API layer). Core operations take already-typed values.
 */

import { z } from "zod";
import { InputError } from "./errors.js";
import type { ProcessedDocument } from "./fusion/types.js";
import { DOC_TYPES, USE_CASES } from "./nhcx/types.js";
import type { ClinicalRecord, ClinicalValue, DocType, UseCase } from "./nhcx/types.js";

export const ClinicalValueSchema: z.ZodType<ClinicalValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(ClinicalValueSchema),
    z.record(ClinicalValueSchema.optional()),
  ]),
);

export const ClinicalRecordSchema = z.record(ClinicalValueSchema.optional());

/** Detector output; anything outside the closed set becomes "unknown". */
export const DocTypeSchema = z.enum(DOC_TYPES).catch("unknown");

export const UseCaseSchema = z.enum(USE_CASES);

export const ProcessedDocumentSchema = z.object({
  fileName: z.string().min(1).default("unknown"),
  docType: DocTypeSchema,
  clinicalData: ClinicalRecordSchema,
});

export const ProcessedDocumentListSchema = z.array(ProcessedDocumentSchema);

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((i) => `${i.path.length > 0 ? i.path.join(".") : "(root)"}: ${i.message}`);
}

function parseWith<S extends z.ZodTypeAny>(schema: S, input: unknown, what: string): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new InputError(`Invalid ${what}: ${issues.join("; ")}`, issues);
  }
  return result.data;
}

/** Parse a JSON array of processed documents. */
export function parseProcessedDocuments(input: unknown): ProcessedDocument[] {
  return parseWith(ProcessedDocumentListSchema, input, "processed documents");
}

export function parseClinicalRecord(input: unknown): ClinicalRecord {
  return parseWith(ClinicalRecordSchema, input, "clinical record");
}

export function parseUseCase(input: unknown): UseCase {
  return parseWith(UseCaseSchema, input, "use case");
}

/** Never fails: unrecognized values map to "unknown". */
export function parseDocType(input: unknown): DocType {
  return DocTypeSchema.parse(input);
}
