// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import type { Command } from "commander";
import { stderrLogger } from "../logger.js";
import { BundleBuilder } from "../nhcx/bundle.js";
import { parseClinicalRecord, parseDocType, parseUseCase } from "../schemas.js";
import { emitJson, readJson, reportError } from "./io.js";

export function registerBuildCommand(program: Command): void {
  program
    .command("build <record.json>")
    .description("Build an NHCX document bundle from one clinical record")
    .option("--doc-type <type>", "Source document type", "unknown")
    .option("--use-case <case>", "claim or preauthorization", "claim")
    .option("--pdf <paths...>", "Source PDFs to embed as DocumentReference")
    .option("--out <file>", "Write the bundle to a file instead of stdout")
    .action((file: string, opts: { docType: string; useCase: string; pdf?: string[]; out?: string }) => {
      try {
        const record = parseClinicalRecord(readJson(file));
        const builder = new BundleBuilder({ logger: stderrLogger });
        const bundle = builder.build(
          record,
          parseDocType(opts.docType),
          parseUseCase(opts.useCase),
          opts.pdf ?? [],
        );
        emitJson(bundle, opts.out);
      } catch (err) {
        reportError(err);
      }
    });
}
