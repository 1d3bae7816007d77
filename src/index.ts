// Cursor
export { Cursor, cursorOf, walkPath, PRUNE } from "./cursor.ts";
export type { SearchPredicate, VisitHandler } from "./cursor.ts";

// Node classification
export { isMapping, isSequence, isTerminal, kindOf } from "./node.ts";
export type { TreeNode, Mapping, Sequence, NodeKind } from "./node.ts";

// Path utilities
export { isPathSegment } from "./path.ts";
export type { PathSegments, PathSegment } from "./path.ts";

// Formatting
export { formatPath, formatSegment, formatValue } from "./format.ts";
export type { FormatOptions } from "./format.ts";

// Lookup helpers
export {
  fieldEquals,
  anyFieldEquals,
  findAll,
  terminals,
  pick,
} from "./lookup.ts";
export { matchesSchema } from "./schema.ts";

// Errors
export {
  CursorError,
  isCursorError,
  TypeMismatchError,
  KeyNotFoundError,
  NotASequenceError,
  IndexOutOfRangeError,
  NotATerminalError,
  AsyncSchemaError,
} from "./errors.ts";
