import { formatPath, formatValue } from "./format.ts";
import type { PathSegment, PathSegments } from "./path.ts";
import type { NodeKind } from "./node.ts";

export class CursorError extends Error {
  readonly code: string;
  readonly path: PathSegments;

  constructor(code: string, message: string, path: readonly PathSegment[]) {
    super(message);
    this.code = code;
    this.path = [...path];
    this.name = this.constructor.name;
  }
}

export function isCursorError(value: unknown): value is CursorError {
  return value instanceof CursorError;
}

export class TypeMismatchError extends CursorError {
  readonly expected: NodeKind;
  readonly actual: NodeKind;

  constructor(
    path: readonly PathSegment[],
    expected: NodeKind,
    actual: NodeKind,
  ) {
    super(
      "TYPE_MISMATCH",
      `Expected a ${expected} at ${formatPath(path)}, found a ${actual}`,
      path,
    );
    this.expected = expected;
    this.actual = actual;
  }
}

export class KeyNotFoundError extends CursorError {
  readonly key: string;

  constructor(path: readonly PathSegment[], key: string) {
    super(
      "KEY_NOT_FOUND",
      `Key ${JSON.stringify(key)} not found at ${formatPath(path)}`,
      path,
    );
    this.key = key;
  }
}

export class NotASequenceError extends CursorError {
  readonly actual: NodeKind;

  constructor(path: readonly PathSegment[], actual: NodeKind) {
    super(
      "NOT_A_SEQUENCE",
      `Expected a sequence at ${formatPath(path)}, found a ${actual}`,
      path,
    );
    this.actual = actual;
  }
}

export class IndexOutOfRangeError extends CursorError {
  readonly index: number;
  readonly length: number;

  constructor(path: readonly PathSegment[], index: number, length: number) {
    super(
      "INDEX_OUT_OF_RANGE",
      `Index ${formatValue(index)} out of range [0, ${length}) at ${formatPath(path)}`,
      path,
    );
    this.index = index;
    this.length = length;
  }
}

export class NotATerminalError extends CursorError {
  readonly actual: NodeKind;

  constructor(path: readonly PathSegment[], actual: NodeKind) {
    super(
      "NOT_A_TERMINAL",
      `Expected a terminal value at ${formatPath(path)}, found a ${actual}`,
      path,
    );
    this.actual = actual;
  }
}

export class AsyncSchemaError extends CursorError {
  constructor(path: readonly PathSegment[]) {
    super(
      "ASYNC_SCHEMA",
      `Schema validation at ${formatPath(path)} returned a promise; search predicates must be synchronous`,
      path,
    );
  }
}
