// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
/**
 * Base error class for all converter errors.
 */
export class NhcxError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "NhcxError";
    Object.setPrototypeOf(this, NhcxError.prototype);
  }
}

/**
 * Error thrown when untrusted JSON input does not match the expected shape.
 */
export class InputError extends NhcxError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = "InputError";
    this.issues = issues;
    Object.setPrototypeOf(this, InputError.prototype);
  }
}

/**
 * Error describing a source PDF that could not be read for embedding.
 */
export class DocumentReadError extends NhcxError {
  readonly path: string;

  constructor(message: string, path: string) {
    super(message);
    this.name = "DocumentReadError";
    this.path = path;
    Object.setPrototypeOf(this, DocumentReadError.prototype);
  }
}
