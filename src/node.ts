/**
 * Node classification.
 *
 * Trees are JSON-shaped: plain objects are mappings, arrays are sequences,
 * and everything else (strings, byte buffers, dates, class instances, Map,
 * Set, ...) is a terminal value treated atomically.
 */

export type TreeNode = unknown;
export type Mapping = { readonly [key: string]: TreeNode };
export type Sequence = readonly TreeNode[];
export type NodeKind = "mapping" | "sequence" | "terminal";

export function isMapping(node: TreeNode): node is Mapping {
  if (typeof node !== "object" || node === null) return false;
  const proto = Object.getPrototypeOf(node);
  return proto === null || proto === Object.prototype;
}

// Array.isArray is false for strings and typed arrays.
export function isSequence(node: TreeNode): node is Sequence {
  return Array.isArray(node);
}

export function isTerminal(node: TreeNode): boolean {
  return !isMapping(node) && !isSequence(node);
}

export function kindOf(node: TreeNode): NodeKind {
  if (isMapping(node)) return "mapping";
  if (isSequence(node)) return "sequence";
  return "terminal";
}

/** Own enumerable keys in `Object.keys` order. */
export function mappingKeys(node: Mapping): string[] {
  return Object.keys(node);
}

export function hasKey(node: Mapping, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(node, key);
}
