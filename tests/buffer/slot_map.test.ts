/**
 * SlotMap tests: generational handles for open sessions.
 */

import { describe, expect, test } from "vitest";
import { keysEqual, SlotMap } from "../../src/buffer/slot_map.ts";

describe("SlotMap - Insert & Get", () => {
  test("insert returns a key, get retrieves the value", () => {
    const map = new SlotMap<string>();
    const key = map.insert("hello");
    expect(map.get(key)).toBe("hello");
    expect(map.has(key)).toBe(true);
  });

  test("size tracks live entries", () => {
    const map = new SlotMap<string>();
    const k1 = map.insert("a");
    map.insert("b");
    expect(map.size).toBe(2);
    map.remove(k1);
    expect(map.size).toBe(1);
  });

  test("unknown keys look up undefined", () => {
    const map = new SlotMap<string>();
    expect(map.get({ index: 0, generation: 0 })).toBeUndefined();
    expect(map.get({ index: 42, generation: 0 })).toBeUndefined();
  });
});

describe("SlotMap - Remove", () => {
  test("remove returns the value once", () => {
    const map = new SlotMap<string>();
    const key = map.insert("hello");
    expect(map.remove(key)).toBe("hello");
    expect(map.remove(key)).toBeUndefined();
    expect(map.size).toBe(0);
  });

  test("a stale key does not see the value that reuses its slot", () => {
    const map = new SlotMap<string>();
    const old = map.insert("first");
    map.remove(old);
    const fresh = map.insert("second");

    expect(fresh.index).toBe(old.index);
    expect(fresh.generation).toBe(old.generation + 1);
    expect(map.get(old)).toBeUndefined();
    expect(map.get(fresh)).toBe("second");
    expect(keysEqual(old, fresh)).toBe(false);
  });
});

describe("SlotMap - Set & Entries", () => {
  test("set replaces a live value and rejects a stale key", () => {
    const map = new SlotMap<number>();
    const key = map.insert(1);
    expect(map.set(key, 2)).toBe(true);
    expect(map.get(key)).toBe(2);
    map.remove(key);
    expect(map.set(key, 3)).toBe(false);
  });

  test("entries yields live values in slot order", () => {
    const map = new SlotMap<string>();
    const a = map.insert("a");
    const b = map.insert("b");
    map.insert("c");
    map.remove(b);

    const entries = Array.from(map.entries());
    expect(entries.map(([, value]) => value)).toEqual(["a", "c"]);
    const first = entries[0];
    expect(first && keysEqual(first[0], a)).toBe(true);
  });
});
