// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import type { Command } from "commander";
import { stderrLogger } from "../logger.js";
import { convertDocuments } from "../pipeline.js";
import { parseDocType, parseProcessedDocuments, parseUseCase } from "../schemas.js";
import { emitJson, readJson, reportError } from "./io.js";
import { printReadiness } from "./validate.js";

export function registerConvertCommand(program: Command): void {
  program
    .command("convert <documents.json>")
    .description("Fuse documents, build the NHCX bundle and validate it")
    .option("--doc-type <type>", "Primary document type (defaults to the first document's)")
    .option("--use-case <case>", "claim or preauthorization", "claim")
    .option("--pdf <paths...>", "Source PDFs to embed as DocumentReference")
    .option("--out <file>", "Write the bundle to a file and print a summary")
    .action((file: string, opts: { docType?: string; useCase: string; pdf?: string[]; out?: string }) => {
      try {
        const documents = parseProcessedDocuments(readJson(file));
        const result = convertDocuments(documents, {
          useCase: parseUseCase(opts.useCase),
          docType: opts.docType === undefined ? undefined : parseDocType(opts.docType),
          sourcePdfPaths: opts.pdf ?? [],
          logger: stderrLogger,
        });

        if (!opts.out) {
          emitJson(result);
          return;
        }

        emitJson(result.bundle, opts.out);
        console.log(`\x1b[32m✓ Bundle written\x1b[0m`);
        console.log(`  File:      ${opts.out}`);
        console.log(`  Doc type:  ${result.docType}`);
        console.log(`  Resources: ${result.bundle.entry.length}`);
        console.log(`  Conflicts: ${result.fusion.conflicts.length}`);
        for (const c of result.fusion.conflicts) {
          console.log(`    • ${c.field}: ${c.resolvedTo} (${c.resolution})`);
        }
        printReadiness(result.validation);
      } catch (err) {
        reportError(err);
      }
    });
}
