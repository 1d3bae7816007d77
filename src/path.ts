/**
 * Path types and utilities.
 *
 * A path is a list of segments representing navigation from the root
 * to a node in the tree. Each segment is either a mapping key (string)
 * or a sequence index (non-negative integer).
 */

export type PathSegment = string | number;
export type PathSegments = PathSegment[];

export function isPathSegment(value: unknown): value is PathSegment {
  return (
    typeof value === "string" ||
    (typeof value === "number" && Number.isInteger(value) && value >= 0)
  );
}
