import { describe, expect, test } from "vitest";
import { DEFAULT_REGISTER, RegisterStore } from "../../src/editor/registers.ts";
import { ascii } from "../helpers.ts";

describe("RegisterStore", () => {
  test("an unwritten register reads empty", () => {
    expect(new RegisterStore().read("a")).toEqual([]);
  });

  test("write overwrites the whole register", () => {
    const store = new RegisterStore();
    store.write("a", [ascii("one"), ascii("two")]);
    store.write("a", [ascii("three")]);
    expect(store.read("a")).toEqual([ascii("three")]);
  });

  test("registers are independent", () => {
    const store = new RegisterStore();
    store.write(DEFAULT_REGISTER, [ascii("x")]);
    store.write("b", [ascii("y")]);
    expect(store.read(DEFAULT_REGISTER)).toEqual([ascii("x")]);
    expect(store.names()).toEqual(['"', "b"]);
  });
});
