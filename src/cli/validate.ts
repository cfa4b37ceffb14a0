// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import type { Command } from "commander";
import type { ReadinessColor } from "../validation/readiness.js";
import { validate } from "../validation/validator.js";
import type { ValidationResult } from "../validation/validator.js";
import { readJson, reportError } from "./io.js";

const ANSI: Record<ReadinessColor, string> = {
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  orange: "\x1b[38;5;208m",
  red: "\x1b[31m",
};

export function printReadiness(result: ValidationResult): void {
  const { score, status, color } = result.readiness;
  console.log(`${ANSI[color]}Readiness ${score}/100 — ${status}\x1b[0m`);
}

function printIssues(result: ValidationResult): void {
  if (result.errors.length > 0) {
    console.error(`\x1b[31m✗ ${result.errorCount} error(s)\x1b[0m`);
    for (const e of result.errors) {
      console.error(`  \x1b[31m• ${e.message}\x1b[0m (${e.location})`);
    }
  }
  if (result.warnings.length > 0) {
    console.warn(`\x1b[33m⚠ ${result.warningCount} warning(s)\x1b[0m`);
    for (const w of result.warnings) {
      console.warn(`  \x1b[33m• ${w.message}\x1b[0m (${w.location})`);
    }
  }
  if (result.suggestions.length > 0) {
    console.log(`ℹ ${result.infoCount} informational`);
    for (const i of result.suggestions) {
      console.log(`  • ${i.message} (${i.location})`);
    }
  }
}

export function registerValidateCommand(program: Command): void {
  program
    .command("validate <bundle.json>")
    .description("Validate an NHCX FHIR Bundle JSON file")
    .option("--strict", "Treat warnings as errors")
    .option("--json", "Output results as JSON")
    .action((file: string, opts: { strict?: boolean; json?: boolean }) => {
      try {
        const result = validate(readJson(file));
        const valid = opts.strict ? result.valid && result.warningCount === 0 : result.valid;

        if (opts.json) {
          console.log(JSON.stringify(result, null, 2));
        } else {
          printIssues(result);
          printReadiness(result);
          if (valid) {
            console.log(`\x1b[32m✓ Valid${opts.strict ? " (strict)" : ""}\x1b[0m`);
          }
        }

        process.exitCode = valid ? 0 : result.errorCount > 0 ? 1 : 2;
      } catch (err) {
        reportError(err);
      }
    });
}
