// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
/**
 * Structural traversal of arbitrary JSON-shaped values.
 *
 * Resources are validated by shape rather than by per-type schemas, so the
 * reference and coding-system checks share this visitor.
 */

export type JsonObject = Record<string, unknown>;

export type JsonNode =
  | { kind: "object"; value: JsonObject }
  | { kind: "list"; value: unknown[] }
  | { kind: "scalar"; value: unknown };

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function classify(value: unknown): JsonNode {
  if (Array.isArray(value)) return { kind: "list", value };
  if (isJsonObject(value)) return { kind: "object", value };
  return { kind: "scalar", value };
}

/**
 * Visit every node of a value depth-first, parents before children and
 * siblings in document order. Uses an explicit stack, so nesting depth is
 * not bounded by the call stack.
 */
export function walk(root: unknown, visit: (node: JsonNode) => void): void {
  const stack: unknown[] = [root];
  while (stack.length > 0) {
    const node = classify(stack.pop());
    visit(node);

    const children =
      node.kind === "object" ? Object.values(node.value) : node.kind === "list" ? node.value : [];
    for (let i = children.length - 1; i >= 0; i--) {
      stack.push(children[i]);
    }
  }
}

/** Visit only the object nodes of a value. */
export function walkObjects(root: unknown, visit: (obj: JsonObject) => void): void {
  walk(root, (node) => {
    if (node.kind === "object") visit(node.value);
  });
}
