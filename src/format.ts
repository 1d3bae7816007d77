/**
 * Human-readable formatting for paths and values.
 *
 * Produces unambiguous strings like `root.users[0]["display name"]` for
 * paths and `{a: 1, b: "hello"}` for values. Used by error messages and
 * `Cursor#toString`.
 */

import { isMapping } from "./node.ts";
import type { PathSegment } from "./path.ts";

const IS_IDENT = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

export interface FormatOptions {
  /** Containers nested deeper than this render as `{…}` / `[…]`. */
  maxDepth?: number;
}

export function formatPath(path: readonly PathSegment[]): string {
  let out = "root";
  for (const seg of path) {
    out += formatSegment(seg);
  }
  return out;
}

export function formatSegment(seg: PathSegment): string {
  if (typeof seg === "number") return "[" + seg + "]";
  return IS_IDENT.test(seg) ? "." + seg : "[" + JSON.stringify(seg) + "]";
}

export function formatValue(value: unknown, options?: FormatOptions): string {
  return fmt(value, options?.maxDepth ?? Infinity, 0);
}

function fmt(thing: unknown, maxDepth: number, depth: number): string {
  if (thing === undefined) return "undefined";
  if (thing === null) return "null";

  switch (typeof thing) {
    case "string":
      return JSON.stringify(thing);
    case "number":
      if (Object.is(thing, -0)) return "-0";
      return String(thing);
    case "boolean":
      return String(thing);
    case "bigint":
      return thing + "n";
    case "symbol":
      return (
        "Symbol(" +
        (thing.description !== undefined
          ? JSON.stringify(thing.description)
          : "") +
        ")"
      );
    case "function":
      return "[Function]";
  }

  if (thing instanceof Date) {
    return isNaN(thing.getTime())
      ? "Date(Invalid)"
      : "Date(" + JSON.stringify(thing.toISOString()) + ")";
  }

  if (thing instanceof Uint8Array) {
    return "Uint8Array(" + thing.byteLength + ")";
  }

  if (Array.isArray(thing)) {
    if (depth >= maxDepth) return thing.length === 0 ? "[]" : "[…]";
    const items: string[] = [];
    for (const item of thing) {
      items.push(fmt(item, maxDepth, depth + 1));
    }
    return "[" + items.join(", ") + "]";
  }

  if (isMapping(thing)) {
    const keys = Object.keys(thing);
    if (depth >= maxDepth) return keys.length === 0 ? "{}" : "{…}";
    const entries: string[] = [];
    for (const key of keys) {
      const fmtKey = IS_IDENT.test(key) ? key : JSON.stringify(key);
      entries.push(fmtKey + ": " + fmt(thing[key], maxDepth, depth + 1));
    }
    return "{" + entries.join(", ") + "}";
  }

  // Unknown object type
  return "[" + Object.prototype.toString.call(thing).slice(8, -1) + "]";
}
