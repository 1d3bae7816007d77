import { test, expect, describe } from "vitest";
import { cursorOf } from "./cursor.ts";
import { isCursorError, TypeMismatchError } from "./errors.ts";
import {
  anyFieldEquals,
  fieldEquals,
  findAll,
  pick,
  terminals,
} from "./lookup.ts";

const projects = () => [
  { id: 1, name: "Checkout", meta: { name: "legacy" } },
  { id: 2, name: "Search", owner: { id: 7, name: "Checkout" } },
  { id: 3, name: "Billing" },
];

describe("fieldEquals", () => {
  test("finds the first mapping with a matching field", () => {
    const hit = cursorOf(projects()).search(fieldEquals("name", "Search"));
    expect(hit?.path()).toEqual([1]);
    expect(hit?.childByKey("id").value()).toBe(2);
  });

  test("compares strictly", () => {
    const root = cursorOf(projects());
    expect(root.search(fieldEquals("id", "3"))).toBeUndefined();
    expect(root.search(fieldEquals("id", 3))?.path()).toEqual([2]);
  });

  test("ignores terminals and inherited fields", () => {
    const root = cursorOf(["name", { other: 1 }]);
    expect(root.search(fieldEquals("name", "name"))).toBeUndefined();
    expect(
      root.search(fieldEquals("constructor", Object.prototype.constructor)),
    ).toBeUndefined();
  });
});

describe("anyFieldEquals", () => {
  test("matches a name or an id", () => {
    const root = cursorOf(projects());
    const byName = root.search(anyFieldEquals(["name", "id"], "Billing"));
    const byId = root.search(anyFieldEquals(["name", "id"], 7));
    expect(byName?.path()).toEqual([2]);
    expect(byId?.path()).toEqual([1, "owner"]);
  });
});

describe("findAll", () => {
  test("collects every match in pre-order, including nested ones", () => {
    const hits = findAll(cursorOf(projects()), fieldEquals("name", "Checkout"));
    expect(hits.map((c) => c.path())).toEqual([[0], [1, "owner"]]);
  });

  test("returns an empty list without matches", () => {
    expect(findAll(cursorOf(projects()), () => false)).toEqual([]);
  });
});

describe("terminals", () => {
  test("lists leaves in pre-order", () => {
    const leaves = terminals(cursorOf({ a: [1, { b: null }], c: "s", d: [] }));
    expect(leaves.map((c) => [c.path(), c.value()])).toEqual([
      [["a", 0], 1],
      [["a", 1, "b"], null],
      [["c"], "s"],
    ]);
  });

  test("a terminal root is its own only leaf", () => {
    expect(terminals(cursorOf(5)).map((c) => c.value())).toEqual([5]);
  });
});

describe("pick", () => {
  test("copies the listed own entries", () => {
    const first = cursorOf(projects()).childByIndex(0);
    expect(pick(first, "id", "name", "missing")).toEqual({
      id: 1,
      name: "Checkout",
    });
  });

  test("shares child references instead of copying them", () => {
    const data = { meta: { x: 1 } };
    expect(pick(cursorOf(data), "meta").meta).toBe(data.meta);
  });

  test("fails on a non-mapping", () => {
    const root = cursorOf(projects());
    expect(() => pick(root, "id")).toThrow(TypeMismatchError);
    expect(() => pick(root, "id")).toThrow(
      "Expected a mapping at root, found a sequence",
    );
    let caught: unknown;
    try {
      pick(root.at([0, "name"]), "x");
    } catch (err) {
      caught = err;
    }
    expect(isCursorError(caught)).toBe(true);
  });
});
