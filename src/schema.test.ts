import { test, expect } from "vitest";
import { z } from "zod";
import type { StandardSchemaV1 } from "@standard-schema/spec";
import { cursorOf } from "./cursor.ts";
import { AsyncSchemaError } from "./errors.ts";
import { matchesSchema } from "./schema.ts";

const data = {
  users: [
    { name: "Bob", age: 41 },
    { name: "Alice", age: 30, emails: ["alice@example.com"] },
  ],
};

test("matchesSchema finds the first node the schema accepts", () => {
  const hit = cursorOf(data).search(
    matchesSchema(z.object({ name: z.literal("Alice") })),
  );
  expect(hit?.path()).toEqual(["users", 1]);
});

test("matchesSchema works on terminals", () => {
  const hit = cursorOf(data).search(matchesSchema(z.string().email()));
  expect(hit?.path()).toEqual(["users", 1, "emails", 0]);
});

test("matchesSchema reports no match when every node is rejected", () => {
  const hit = cursorOf(data).search(matchesSchema(z.boolean()));
  expect(hit).toBeUndefined();
});

test("asynchronous schemas are rejected", () => {
  const asyncSchema: StandardSchemaV1<unknown> = {
    "~standard": {
      version: 1,
      vendor: "test",
      validate: (value) => Promise.resolve({ value }),
    },
  };
  const root = cursorOf(data).childByKey("users");
  expect(() => root.search(matchesSchema(asyncSchema))).toThrow(
    AsyncSchemaError,
  );
  expect(() => root.search(matchesSchema(asyncSchema))).toThrow(
    "Schema validation at root.users returned a promise; search predicates must be synchronous",
  );
});
