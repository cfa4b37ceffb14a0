// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
/**
 * Multi-document fusion — merges independently extracted clinical records
 * for one encounter into a single record, logging every disagreement and
 * the document each field was taken from.
 */

import { consoleLogger } from "../logger.js";
import type { Logger } from "../logger.js";
import type { ClinicalRecord, ClinicalValue, DocType } from "../nhcx/types.js";
import { isEmptyValue, stringifyValue } from "../nhcx/record.js";
import { DEFAULT_FUSION_POLICY, MERGED_PROVENANCE } from "./policy.js";
import type { Conflict, FusionPolicy, FusionResult, ProcessedDocument } from "./types.js";

/** Items whose string forms share this many leading characters count as duplicates. */
const DEDUP_KEY_LENGTH = 50;

export interface FusionOptions {
  logger?: Logger;
}

interface Candidate {
  value: ClinicalValue;
  fileName: string;
}

/**
 * Fuses processed documents into one unified clinical record.
 *
 * Documents are processed strictly in the order given: when a field has no
 * authority rule, the first document type to supply it wins.
 *
 * @example
 * ```ts
 * const engine = new Fusion.FusionEngine();
 * const { unifiedRecord, conflicts } = engine.fuse([discharge, labReport]);
 * ```
 */
export class FusionEngine {
  private readonly _policy: FusionPolicy;
  private readonly _logger: Logger;

  constructor(policy: FusionPolicy = DEFAULT_FUSION_POLICY, options: FusionOptions = {}) {
    this._policy = policy;
    this._logger = options.logger ?? consoleLogger;
  }

  /** Returns the policy this engine resolves conflicts with. */
  get policy(): FusionPolicy {
    return this._policy;
  }

  fuse(documents: readonly ProcessedDocument[]): FusionResult {
    const first = documents[0];
    if (!first) {
      return { unifiedRecord: {}, conflicts: [], provenance: {}, sources: [] };
    }

    if (documents.length === 1) {
      const provenance: Record<string, string> = {};
      for (const field of Object.keys(first.clinicalData)) {
        provenance[field] = first.fileName;
      }
      return {
        unifiedRecord: { ...first.clinicalData },
        conflicts: [],
        provenance,
        sources: [first.fileName],
      };
    }

    const unifiedRecord: ClinicalRecord = {};
    const provenance: Record<string, string> = {};
    const conflicts: Conflict[] = [];

    for (const field of collectFields(documents)) {
      const candidates = collectCandidates(field, documents);
      const present = [...candidates.values()];
      const only = present.length === 1 ? present[0] : undefined;

      if (present.length === 0) {
        continue;
      }

      if (only) {
        unifiedRecord[field] = only.value;
        provenance[field] = only.fileName;
        continue;
      }

      if (this._policy.mergeAsList.has(field)) {
        unifiedRecord[field] = mergeLists(present);
        provenance[field] = MERGED_PROVENANCE;
        continue;
      }

      const { docType, candidate, ranked } = this.pickAuthority(field, candidates);

      const normalized = new Set(
        present.map((c) => stringifyValue(c.value).trim().toLowerCase()),
      );
      if (normalized.size === 1) {
        unifiedRecord[field] = candidate.value;
        provenance[field] = candidate.fileName;
        continue;
      }

      const resolvedTo = stringifyValue(candidate.value);
      conflicts.push({
        field,
        values: [...candidates].map(([dt, c]) => ({
          document: c.fileName,
          docType: dt,
          value: stringifyValue(c.value),
        })),
        resolvedTo,
        resolvedFrom: candidate.fileName,
        resolution: ranked
          ? `Used ${docType} (highest authority for this field)`
          : `Used ${docType} (first document; no authority rule for this field)`,
      });
      this._logger.warn(
        `Conflict on '${field}': resolved to '${resolvedTo}' from ${candidate.fileName}`,
      );

      unifiedRecord[field] = candidate.value;
      provenance[field] = candidate.fileName;
    }

    this._logger.info(
      `Fusion complete — ${documents.length} docs, ` +
        `${Object.keys(unifiedRecord).length} fields, ${conflicts.length} conflicts`,
    );

    return {
      unifiedRecord,
      conflicts,
      provenance,
      sources: documents.map((d) => d.fileName),
    };
  }

  /**
   * The document type with the highest authority for a field. Ties, and
   * fields without a rule, go to the earliest document type.
   */
  private pickAuthority(
    field: string,
    candidates: Map<DocType, Candidate>,
  ): { docType: DocType; candidate: Candidate; ranked: boolean } {
    const table = this._policy.authority[field];
    const ranked = table !== undefined && Object.keys(table).length > 0;

    let best: { docType: DocType; candidate: Candidate; score: number } | undefined;
    for (const [docType, candidate] of candidates) {
      const score = table?.[docType] ?? 0;
      if (!best || score > best.score) {
        best = { docType, candidate, score };
      }
    }

    if (!best) {
      throw new Error(`No candidates for field "${field}"`);
    }
    return { docType: best.docType, candidate: best.candidate, ranked };
  }
}

/** Union of all field names, in first-seen order. */
function collectFields(documents: readonly ProcessedDocument[]): string[] {
  const fields = new Set<string>();
  for (const doc of documents) {
    for (const field of Object.keys(doc.clinicalData)) {
      fields.add(field);
    }
  }
  return [...fields];
}

/**
 * Non-empty values of a field keyed by document type. A later document of
 * the same type replaces the value but keeps the type's first-seen position.
 */
function collectCandidates(
  field: string,
  documents: readonly ProcessedDocument[],
): Map<DocType, Candidate> {
  const candidates = new Map<DocType, Candidate>();
  for (const doc of documents) {
    const value = doc.clinicalData[field];
    if (value === undefined || isEmptyValue(value)) continue;
    candidates.set(doc.docType, { value, fileName: doc.fileName });
  }
  return candidates;
}

/** Concatenate list values, dropping items whose lowercase 50-char prefix was already seen. */
function mergeLists(candidates: Candidate[]): ClinicalValue[] {
  const merged: ClinicalValue[] = [];
  const seen = new Set<string>();
  for (const { value } of candidates) {
    const items = Array.isArray(value) ? value : [value];
    for (const item of items) {
      const key = stringifyValue(item).toLowerCase().slice(0, DEDUP_KEY_LENGTH);
      if (!seen.has(key)) {
        merged.push(item);
        seen.add(key);
      }
    }
  }
  return merged;
}

/** Fuse with the default policy. */
export function fuse(documents: readonly ProcessedDocument[], options: FusionOptions = {}): FusionResult {
  return new FusionEngine(DEFAULT_FUSION_POLICY, options).fuse(documents);
}
