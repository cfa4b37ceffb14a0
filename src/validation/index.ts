// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
export { validate, VALID_SYSTEM_PREFIXES } from "./validator.js";
export type { ValidationResult } from "./validator.js";
export { computeReadiness, scoreBand, RESOURCE_WEIGHTS } from "./readiness.js";
export type { Readiness, ReadinessColor } from "./readiness.js";
export { toOperationOutcome } from "./issues.js";
export type { Issue, IssueCode, IssueSeverity, OperationOutcome, OperationOutcomeIssue } from "./issues.js";
export { walk, walkObjects, classify, isJsonObject } from "./walk.js";
export type { JsonNode, JsonObject } from "./walk.js";
