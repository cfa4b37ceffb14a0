// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import { Command } from "commander";
import { existsSync, readFileSync } from "node:fs";
import { resolve, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import { registerFuseCommand } from "./fuse.js";
import { registerBuildCommand } from "./build.js";
import { registerConvertCommand } from "./convert.js";
import { registerValidateCommand } from "./validate.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

function getVersion(): string {
  // dist/cli.js sits one level below package.json, src/cli/program.ts two
  for (const pkgPath of [resolve(__dirname, "..", "package.json"), resolve(__dirname, "..", "..", "package.json")]) {
    if (!existsSync(pkgPath)) continue;
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, "utf8"));
    if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
      return pkg.version;
    }
  }
  return "0.0.0";
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name("nhcx-fhir")
    .description("Convert extracted hospital documents into validated NHCX/ABDM FHIR bundles")
    .version(getVersion());

  registerFuseCommand(program);
  registerBuildCommand(program);
  registerConvertCommand(program);
  registerValidateCommand(program);

  return program;
}
