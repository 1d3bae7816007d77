/**
 * Type-level tests for the public API.
 *
 * This file is NOT executed at runtime. It is checked by `npm run typecheck`
 * (tsc --noEmit). Every @ts-expect-error must suppress a real error; tsc
 * reports unused @ts-expect-error directives as errors, so each one doubles
 * as a negative assertion.
 */

import { cursorOf, type Cursor, type VisitHandler } from "./cursor.ts";
import { isMapping, isSequence, type Mapping, type Sequence } from "./node.ts";
import type { PathSegment, PathSegments } from "./path.ts";

declare const node: unknown;
const root: Cursor = cursorOf(node);

// ---------------------------------------------------------------------------
// Paths
// ---------------------------------------------------------------------------

const p: PathSegments = root.path();
const seg: PathSegment | undefined = p[0];
void seg;

// @ts-expect-error: booleans are not path segments
const badSegment: PathSegment = true;
void badSegment;

// @ts-expect-error: keys are strings
root.childByKey(1);

// @ts-expect-error: indices are numbers
root.childByIndex("1");

root.child("a").child(0);
root.at(["a", 0, "b"]);

// ---------------------------------------------------------------------------
// Classification narrows
// ---------------------------------------------------------------------------

if (isMapping(node)) {
  const m: Mapping = node;
  const child: unknown = m["key"];
  void child;
  // @ts-expect-error: mappings are read-only views
  m["key"] = 1;
}

if (isSequence(node)) {
  const s: Sequence = node;
  const len: number = s.length;
  void len;
  // @ts-expect-error: sequences are read-only views
  s.push(1);
}

// ---------------------------------------------------------------------------
// Search and visit
// ---------------------------------------------------------------------------

const found: Cursor | undefined = root.search((c) => c.isTerminal());
void found;

// @ts-expect-error: search may come back empty
const mustFind: Cursor = root.search(() => true);
void mustFind;

// Handlers may return anything; only `false` prunes.
const handlers: VisitHandler[] = [
  () => {},
  () => false,
  () => 0,
  (_c, entering) => entering && "",
];
void handlers;

// @ts-expect-error: visit returns nothing
const visited: Cursor = root.visit(() => {});
void visited;
