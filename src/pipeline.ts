// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import { FusionEngine } from "./fusion/engine.js";
import { DEFAULT_FUSION_POLICY } from "./fusion/policy.js";
import type { FusionPolicy, FusionResult, ProcessedDocument } from "./fusion/types.js";
import type { Logger } from "./logger.js";
import { BundleBuilder } from "./nhcx/bundle.js";
import type { NhcxBundle } from "./nhcx/fhir-types.js";
import type { BuilderOptions, DocType, UseCase } from "./nhcx/types.js";
import { validate } from "./validation/validator.js";
import type { ValidationResult } from "./validation/validator.js";

export interface ConvertOptions {
  useCase?: UseCase;
  sourcePdfPaths?: string[];
  /** Primary document type. Defaults to the first document's type. */
  docType?: DocType;
  policy?: FusionPolicy;
  /** Builder hooks; its logger, when set, overrides `logger` for the build step. */
  builder?: BuilderOptions;
  logger?: Logger;
}

export interface ConversionResult {
  fusion: FusionResult;
  docType: DocType;
  bundle: NhcxBundle;
  validation: ValidationResult;
}

/**
 * Fuse → build → validate.
 *
 * @example
 * ```ts
 * const { bundle, validation } = convertDocuments(documents, { useCase: "preauthorization" });
 * console.log(validation.readiness.score);
 * ```
 */
export function convertDocuments(
  documents: readonly ProcessedDocument[],
  options: ConvertOptions = {},
): ConversionResult {
  const fusion = new FusionEngine(options.policy ?? DEFAULT_FUSION_POLICY, {
    logger: options.logger,
  }).fuse(documents);

  const docType = options.docType ?? documents[0]?.docType ?? "unknown";

  const builder = new BundleBuilder({ logger: options.logger, ...options.builder });
  const bundle = builder.build(
    fusion.unifiedRecord,
    docType,
    options.useCase ?? "claim",
    options.sourcePdfPaths ?? [],
  );

  return { fusion, docType, bundle, validation: validate(bundle) };
}
