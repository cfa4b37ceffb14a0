// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
/** Minimal logging surface used by the fusion engine and bundle builder. */
export type Logger = Pick<Console, "info" | "warn">;

/** Logs to the process console. */
export const consoleLogger: Logger = console;

/** Discards everything. Handy for tests and batch jobs. */
export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
};

/** Sends everything to stderr so stdout stays clean for JSON output. */
export const stderrLogger: Logger = {
  info: (...args: unknown[]) => console.error(...args),
  warn: (...args: unknown[]) => console.error(...args),
};
