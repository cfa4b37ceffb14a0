// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import type { ClinicalRecord, DocType } from "../nhcx/types.js";

/** One independently extracted source document. */
export interface ProcessedDocument {
  fileName: string;
  docType: DocType;
  clinicalData: ClinicalRecord;
}

/** A contributing value recorded in a conflict, in arrival order. */
export interface ConflictValue {
  document: string;
  docType: DocType;
  value: string;
}

/** A field on which two or more documents genuinely disagreed. */
export interface Conflict {
  field: string;
  values: ConflictValue[];
  resolvedTo: string;
  resolvedFrom: string;
  resolution: string;
}

/** Output of one fusion call. */
export interface FusionResult {
  unifiedRecord: ClinicalRecord;
  conflicts: Conflict[];
  /** field → source file name (or {@link MERGED_PROVENANCE} for merged lists) */
  provenance: Record<string, string>;
  sources: string[];
}

/** Per-field ranking of document types; a higher number wins. */
export type AuthorityTable = Readonly<Record<string, Readonly<Partial<Record<DocType, number>>>>>;

/** Static conflict-resolution policy consumed by the fusion engine. */
export interface FusionPolicy {
  authority: AuthorityTable;
  /** Fields whose values are concatenated and de-duplicated across documents. */
  mergeAsList: ReadonlySet<string>;
  /**
   * Declared tolerances (e.g. age ±2). Not consulted during conflict
   * detection: values are compared for strict equality after normalization.
   */
  numericTolerance: Readonly<Record<string, number>>;
}
