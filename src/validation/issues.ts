// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.

export type IssueSeverity = "error" | "warning" | "information";

/** FHIR OperationOutcome issue-type codes used by the validator. */
export type IssueCode = "required" | "structure" | "value" | "business-rule" | "not-found";

/**
 * A single validation finding.
 */
export interface Issue {
  severity: IssueSeverity;
  code: IssueCode;
  /** Human-readable description */
  message: string;
  /** FHIRPath-like element path */
  location: string;
  /** Suggested remedy */
  fix: string;
}

export interface OperationOutcomeIssue {
  severity: IssueSeverity;
  code: IssueCode;
  details: { text: string };
  diagnostics: string;
  expression: string[];
}

export interface OperationOutcome {
  resourceType: "OperationOutcome";
  id: string;
  issue: OperationOutcomeIssue[];
}

export function issue(
  severity: IssueSeverity,
  code: IssueCode,
  message: string,
  location: string,
  fix: string,
): Issue {
  return { severity, code, message, location, fix };
}

/** Render issues as a FHIR OperationOutcome. */
export function toOperationOutcome(issues: readonly Issue[]): OperationOutcome {
  return {
    resourceType: "OperationOutcome",
    id: "validation-result",
    issue: issues.map((i) => ({
      severity: i.severity,
      code: i.code,
      details: { text: i.message },
      diagnostics: i.fix,
      expression: [i.location],
    })),
  };
}
