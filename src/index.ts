// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
/**
 * nhcx-fhir-kit - NHCX/ABDM FHIR conversion core
 *
 * Fuse clinical data extracted from several hospital documents, build an
 * NHCX claim or pre-authorization document bundle from it, and validate the
 * result with a submission-readiness score.
 *
 * @packageDocumentation
 */

// Fusion namespace
export * as Fusion from "./fusion/index.js";

// NHCX bundle namespace
export * as NHCX from "./nhcx/index.js";

// Validation namespace
export * as Validation from "./validation/index.js";

// Top-level conveniences
export { fuse } from "./fusion/engine.js";
export { build } from "./nhcx/bundle.js";
export { validate } from "./validation/validator.js";
export { convertDocuments } from "./pipeline.js";
export type { ConvertOptions, ConversionResult } from "./pipeline.js";

// Untrusted-input parsing
export {
  ClinicalRecordSchema,
  ClinicalValueSchema,
  DocTypeSchema,
  ProcessedDocumentSchema,
  ProcessedDocumentListSchema,
  UseCaseSchema,
  parseClinicalRecord,
  parseDocType,
  parseProcessedDocuments,
  parseUseCase,
} from "./schemas.js";

// Logging
export { consoleLogger, silentLogger, stderrLogger } from "./logger.js";
export type { Logger } from "./logger.js";

// Errors
export { NhcxError, InputError, DocumentReadError } from "./errors.js";
