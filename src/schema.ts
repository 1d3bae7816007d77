/**
 * Search predicates from Standard Schema (https://standardschema.dev/).
 *
 * Any Standard Schema library (zod, valibot, arktype, ...) can
 * describe the node being looked for:
 *
 *   root.search(matchesSchema(z.object({ name: z.literal("Alice") })))
 */

import type { StandardSchemaV1 } from "@standard-schema/spec";
import type { SearchPredicate } from "./cursor.ts";
import { AsyncSchemaError } from "./errors.ts";

export function matchesSchema(schema: StandardSchemaV1): SearchPredicate {
  return (cursor) => {
    const result = schema["~standard"].validate(cursor.node);
    if (result instanceof Promise) {
      throw new AsyncSchemaError(cursor.path());
    }
    return result.issues === undefined;
  };
}
