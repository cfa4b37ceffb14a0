// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import { readFileSync, writeFileSync } from "node:fs";
import { resolve } from "node:path";
import { InputError } from "../errors.js";

/** Read and parse a JSON file. */
export function readJson(file: string): unknown {
  const content = readFileSync(file, "utf8");
  try {
    return JSON.parse(content);
  } catch (err) {
    throw new InputError(`${file} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
}

/** Write JSON to a file when `out` is given, otherwise to stdout. */
export function emitJson(value: unknown, out?: string): void {
  const text = JSON.stringify(value, null, 2);
  if (out) {
    writeFileSync(resolve(out), `${text}\n`);
  } else {
    console.log(text);
  }
}

export function reportError(err: unknown): void {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  if (err instanceof InputError) {
    for (const issue of err.issues) {
      console.error(`  • ${issue}`);
    }
  }
  process.exitCode = 1;
}
