// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import type { Command } from "commander";
import { FusionEngine } from "../fusion/engine.js";
import { stderrLogger } from "../logger.js";
import { parseProcessedDocuments } from "../schemas.js";
import { emitJson, readJson, reportError } from "./io.js";

export function registerFuseCommand(program: Command): void {
  program
    .command("fuse <documents.json>")
    .description("Fuse extracted clinical records from several documents into one")
    .option("--out <file>", "Write the fusion result to a file instead of stdout")
    .action((file: string, opts: { out?: string }) => {
      try {
        const documents = parseProcessedDocuments(readJson(file));
        const result = new FusionEngine(undefined, { logger: stderrLogger }).fuse(documents);
        emitJson(result, opts.out);
      } catch (err) {
        reportError(err);
      }
    });
}
