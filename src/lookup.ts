/**
 * Lookup helpers built on search and visit, for the common
 * "find the entry whose `name` field equals X" shape of query.
 */

import type { Cursor, SearchPredicate } from "./cursor.ts";
import { TypeMismatchError } from "./errors.ts";
import { hasKey, isMapping, type TreeNode } from "./node.ts";

/** Matches a mapping whose own `field` is strictly equal to `expected`. */
export function fieldEquals(field: string, expected: unknown): SearchPredicate {
  return anyFieldEquals([field], expected);
}

export function anyFieldEquals(
  fields: readonly string[],
  expected: unknown,
): SearchPredicate {
  return (cursor) => {
    const node = cursor.node;
    if (!isMapping(node)) return false;
    return fields.some((f) => hasKey(node, f) && node[f] === expected);
  };
}

/**
 * Every cursor in the subtree matching `predicate`, in pre-order.
 * A match does not stop descent into its children.
 */
export function findAll(cursor: Cursor, predicate: SearchPredicate): Cursor[] {
  const found: Cursor[] = [];
  cursor.visit((c, entering) => {
    if (entering && predicate(c)) found.push(c);
  });
  return found;
}

export function terminals(cursor: Cursor): Cursor[] {
  return findAll(cursor, (c) => c.isTerminal());
}

/**
 * A new plain object with the mapping's own entries for `keys`.
 * Keys the mapping lacks are left out.
 */
export function pick(
  cursor: Cursor,
  ...keys: string[]
): Record<string, TreeNode> {
  const node = cursor.node;
  if (!isMapping(node)) {
    throw new TypeMismatchError(cursor.path(), "mapping", cursor.kind);
  }
  const out: Record<string, TreeNode> = {};
  for (const key of keys) {
    if (hasKey(node, key)) out[key] = node[key];
  }
  return out;
}
