// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
export { FusionEngine, fuse } from "./engine.js";
export type { FusionOptions } from "./engine.js";
export {
  DEFAULT_FUSION_POLICY,
  FIELD_AUTHORITY,
  MERGE_AS_LIST,
  MERGED_PROVENANCE,
  NUMERIC_TOLERANCE,
} from "./policy.js";
export type {
  AuthorityTable,
  Conflict,
  ConflictValue,
  FusionPolicy,
  FusionResult,
  ProcessedDocument,
} from "./types.js";
