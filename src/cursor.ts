/**
 * Cursor: an immutable (node, path) pair over a JSON-shaped tree.
 *
 * Navigation never copies or mutates the tree: a cursor holds a reference
 * into caller-owned data plus the path of segments that led to it from the
 * root. Every derived cursor gets its own freshly allocated path.
 *
 * Search and visit walk the subtree depth-first, pre-order, on an explicit
 * stack rather than the call stack.
 */

import {
  IndexOutOfRangeError,
  KeyNotFoundError,
  NotASequenceError,
  NotATerminalError,
  TypeMismatchError,
} from "./errors.ts";
import { formatPath, formatValue } from "./format.ts";
import {
  hasKey,
  isMapping,
  isSequence,
  kindOf,
  mappingKeys,
  type NodeKind,
  type TreeNode,
} from "./node.ts";
import type { PathSegment, PathSegments } from "./path.ts";

/**
 * Returned from the entering call of a visit handler to skip the node's
 * children and its exit call. Only this exact value prunes: `0`, `""`,
 * `null` and `undefined` all continue.
 */
export const PRUNE = false;

export type SearchPredicate = (cursor: Cursor) => boolean;
export type VisitHandler = (cursor: Cursor, entering: boolean) => unknown;

interface VisitFrame {
  cursor: Cursor;
  exiting: boolean;
}

export class Cursor {
  readonly node: TreeNode;
  #path: readonly PathSegment[] = [];

  constructor(root: TreeNode) {
    this.node = root;
  }

  static #derive(
    node: TreeNode,
    parentPath: readonly PathSegment[],
    seg: PathSegment,
  ): Cursor {
    const cursor = new Cursor(node);
    cursor.#path = [...parentPath, seg];
    return cursor;
  }

  // -- Classification --

  get kind(): NodeKind {
    return kindOf(this.node);
  }

  isMapping(): boolean {
    return isMapping(this.node);
  }

  isSequence(): boolean {
    return isSequence(this.node);
  }

  isTerminal(): boolean {
    return !this.isMapping() && !this.isSequence();
  }

  // -- Addressing --

  get depth(): number {
    return this.#path.length;
  }

  path(): PathSegments {
    return [...this.#path];
  }

  childByKey(name: string): Cursor {
    const node = this.node;
    if (!isMapping(node)) {
      throw new TypeMismatchError(this.#path, "mapping", this.kind);
    }
    if (!hasKey(node, name)) {
      throw new KeyNotFoundError(this.#path, name);
    }
    return Cursor.#derive(node[name], this.#path, name);
  }

  childByIndex(index: number): Cursor {
    const node = this.node;
    if (!isSequence(node)) {
      throw new NotASequenceError(this.#path, this.kind);
    }
    if (!Number.isInteger(index) || index < 0 || index >= node.length) {
      throw new IndexOutOfRangeError(this.#path, index, node.length);
    }
    return Cursor.#derive(node[index], this.#path, index);
  }

  /** A string segment navigates by key, a number by index. */
  child(seg: PathSegment): Cursor {
    return typeof seg === "string"
      ? this.childByKey(seg)
      : this.childByIndex(seg);
  }

  at(path: readonly PathSegment[]): Cursor {
    let cursor: Cursor = this;
    for (const seg of path) {
      cursor = cursor.child(seg);
    }
    return cursor;
  }

  value(): TreeNode {
    if (!this.isTerminal()) {
      throw new NotATerminalError(this.#path, this.kind);
    }
    return this.node;
  }

  keys(): string[] {
    const node = this.node;
    if (!isMapping(node)) {
      throw new TypeMismatchError(this.#path, "mapping", this.kind);
    }
    return mappingKeys(node);
  }

  /** Number of children; 0 for a terminal. */
  size(): number {
    const node = this.node;
    if (isMapping(node)) return mappingKeys(node).length;
    if (isSequence(node)) return node.length;
    return 0;
  }

  /**
   * Child cursors in traversal order: mapping entries in `Object.keys`
   * order, sequence elements by index (holes included). Empty for terminals.
   */
  children(): Cursor[] {
    const node = this.node;
    const out: Cursor[] = [];
    if (isMapping(node)) {
      for (const key of mappingKeys(node)) {
        out.push(Cursor.#derive(node[key], this.#path, key));
      }
    } else if (isSequence(node)) {
      for (let i = 0; i < node.length; i++) {
        out.push(Cursor.#derive(node[i], this.#path, i));
      }
    }
    return out;
  }

  // -- Traversal --

  /**
   * Find the pre-order-first cursor in this subtree (this node included)
   * whose predicate returns true. Stops at the first match.
   */
  search(predicate: SearchPredicate): Cursor | undefined {
    const stack: Cursor[] = [this];
    let cursor = stack.pop();
    while (cursor !== undefined) {
      if (predicate(cursor)) return cursor;
      for (const child of cursor.children().reverse()) {
        stack.push(child);
      }
      cursor = stack.pop();
    }
    return undefined;
  }

  /**
   * Depth-first traversal of this subtree.
   *
   * Calls `handler(cursor, true)` on entering every node. Containers that
   * were not pruned get `handler(cursor, false)` after all their children;
   * terminals get only the entering call.
   */
  visit(handler: VisitHandler): void {
    const stack: VisitFrame[] = [{ cursor: this, exiting: false }];
    for (let frame = stack.pop(); frame !== undefined; frame = stack.pop()) {
      const { cursor } = frame;
      if (frame.exiting) {
        handler(cursor, false);
        continue;
      }
      if (handler(cursor, true) === PRUNE) continue;
      if (cursor.isTerminal()) continue;

      stack.push({ cursor, exiting: true });
      for (const child of cursor.children().reverse()) {
        stack.push({ cursor: child, exiting: false });
      }
    }
  }

  // -- Display --

  toString(): string {
    return (
      "Cursor(" +
      formatPath(this.#path) +
      " = " +
      formatValue(this.node, { maxDepth: 1 }) +
      ")"
    );
  }

  [Symbol.for("nodejs.util.inspect.custom")](): string {
    return this.toString();
  }
}

export function cursorOf(root: TreeNode): Cursor {
  return new Cursor(root);
}

/** Replay `path` from `root`, failing at the first segment that does not resolve. */
export function walkPath(
  root: TreeNode,
  path: readonly PathSegment[],
): Cursor {
  return new Cursor(root).at(path);
}
