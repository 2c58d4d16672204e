/**
 * Rope tests.
 */

import { describe, expect, test } from "vitest";
import { Rope } from "../../src/buffer/rope.ts";
import { OutOfBoundsError } from "../../src/buffer/types.ts";
import { ascii, bytes, list, ropeOf, sequence, text } from "../helpers.ts";

describe("Rope - Creation", () => {
  test("empty rope", () => {
    const rope = Rope.empty();
    expect(rope.length).toBe(0);
    expect(rope.height).toBe(0);
    expect(list(rope.toBytes())).toEqual([]);
    expect(rope.leafLengths()).toEqual([]);
  });

  test("from bytes", () => {
    const rope = Rope.from(bytes(1, 2, 3));
    expect(rope.length).toBe(3);
    expect(list(rope.toBytes())).toEqual([1, 2, 3]);
  });

  test("of values", () => {
    expect(list(Rope.of(9, 8, 7).toBytes())).toEqual([9, 8, 7]);
  });

  test("large input is chunked into leaves of at most 1024 bytes", () => {
    const rope = Rope.from(sequence(10_000));
    const leaves = rope.leafLengths();
    expect(leaves.length).toBe(10);
    expect(leaves.every((n) => n > 0 && n <= 1024)).toBe(true);
    expect(leaves.reduce((a, b) => a + b, 0)).toBe(10_000);
    expect(rope.height).toBe(4);
  });

  test("takes ownership of the array without copying", () => {
    const data = bytes(1, 2, 3);
    const rope = Rope.from(data);
    data[0] = 9;
    expect(rope.byteAt(0)).toBe(9);
  });
});

describe("Rope - Access", () => {
  test("byteAt", () => {
    const rope = ropeOf("hello");
    expect(rope.byteAt(0)).toBe(0x68);
    expect(rope.byteAt(4)).toBe(0x6f);
  });

  test("byteAt out of range throws", () => {
    expect(() => ropeOf("hi").byteAt(2)).toThrow(OutOfBoundsError);
  });

  test("slice", () => {
    expect(list(Rope.of(0, 1, 2, 3, 4).slice(1, 4))).toEqual([1, 2, 3]);
  });

  test("slice across leaves", () => {
    const rope = Rope.from(sequence(3000));
    expect(list(rope.slice(1020, 1030))).toEqual([252, 253, 254, 255, 0, 1, 2, 3, 4, 5]);
  });

  test("empty slice", () => {
    expect(ropeOf("abc").slice(2, 2).length).toBe(0);
  });

  test("slice out of bounds throws", () => {
    const rope = Rope.from(sequence(8));
    expect(() => rope.slice(-1, 2)).toThrow(OutOfBoundsError);
    expect(() => rope.slice(0, 9)).toThrow(OutOfBoundsError);
    expect(() => rope.slice(5, 4)).toThrow(OutOfBoundsError);
  });

  test("out of bounds message names the range", () => {
    expect(() => Rope.from(sequence(8)).slice(0, 9)).toThrow(
      "range [0, 9) is out of bounds for length 8",
    );
  });

  test("chunks cover the requested range in order", () => {
    const rope = Rope.from(sequence(3000));
    const parts = Array.from(rope.chunks(1000, 2100));
    expect(parts.map((p) => p.length)).toEqual([24, 1024, 52]);
    const joined = parts.flatMap((p) => Array.from(p));
    expect(joined).toEqual(list(rope.slice(1000, 2100)));
  });

  test("chunks iterable can be iterated twice", () => {
    const chunks = ropeOf("abcdef").chunks(1, 3);
    expect(Array.from(chunks).length).toBe(1);
    expect(Array.from(chunks).length).toBe(1);
  });

  test("reader reads sequentially and randomly", () => {
    const rope = Rope.from(sequence(2500));
    const reader = rope.reader();
    const forward: number[] = [];
    for (let i = 1020; i < 1030; i++) forward.push(reader.at(i));
    expect(forward).toEqual(list(rope.slice(1020, 1030)));
    expect(reader.at(5)).toBe(5);
    expect(reader.at(2499)).toBe(2499 % 256);
  });
});

describe("Rope - Splice", () => {
  test("insert in the middle", () => {
    expect(text(ropeOf("helo").insert(3, ascii("l")))).toBe("hello");
  });

  test("insert at both ends", () => {
    const rope = ropeOf("b").insert(0, ascii("a")).insert(2, ascii("c"));
    expect(text(rope)).toBe("abc");
  });

  test("delete", () => {
    expect(text(ropeOf("hello world").delete(5, 11))).toBe("hello");
  });

  test("replace a range", () => {
    expect(text(ropeOf("hello world").splice(0, 5, ascii("HOWDY")))).toBe("HOWDY world");
  });

  test("deleting [0,4) of 8 bytes leaves 4 and keeps the original", () => {
    const original = Rope.from(sequence(8));
    const edited = original.splice(0, 4, new Uint8Array(0));
    expect(list(edited.toBytes())).toEqual([4, 5, 6, 7]);
    expect(list(original.toBytes())).toEqual([0, 1, 2, 3, 4, 5, 6, 7]);
  });

  test("splicing a range with its own bytes gives an equal rope", () => {
    const rope = Rope.from(sequence(5000));
    const ranges: Array<[number, number]> = [
      [0, 0],
      [0, 10],
      [1000, 1100],
      [1023, 1025],
      [4990, 5000],
      [0, 5000],
    ];
    for (const [start, end] of ranges) {
      const respliced = rope.splice(start, end, rope.slice(start, end));
      expect(respliced.equals(rope)).toBe(true);
    }
  });

  test("empty splice returns the same rope", () => {
    const rope = ropeOf("abc");
    expect(rope.splice(1, 1)).toBe(rope);
  });

  test("splice copies the replacement", () => {
    const replacement = ascii("XY");
    const rope = ropeOf("abc").splice(1, 2, replacement);
    replacement[0] = 0x5a;
    expect(text(rope)).toBe("aXYc");
  });

  test("out of bounds splice throws", () => {
    expect(() => ropeOf("abc").splice(2, 4, ascii("x"))).toThrow(OutOfBoundsError);
  });

  test("older versions are unchanged", () => {
    const v1 = ropeOf("0123456789");
    const v2 = v1.delete(2, 5);
    const v3 = v2.insert(0, ascii("ab"));
    expect(text(v1)).toBe("0123456789");
    expect(text(v2)).toBe("0156789");
    expect(text(v3)).toBe("ab0156789");
  });
});

describe("Rope - Balance", () => {
  test("single-byte appends fill leaves before starting new ones", () => {
    let rope = Rope.empty();
    for (let i = 0; i < 3000; i++) rope = rope.insert(rope.length, bytes(i % 256));
    expect(rope.leafLengths()).toEqual([1024, 1024, 952]);
    expect(list(rope.slice(1022, 1026))).toEqual([254, 255, 0, 1]);
  });

  test("many scattered edits keep the tree shallow and the content right", () => {
    let rope = Rope.from(sequence(20_000));
    const expected = Array.from(sequence(20_000));
    for (let i = 0; i < 500; i++) {
      const at = (i * 7919) % rope.length;
      rope = rope.insert(at, bytes(i % 256, 0xaa));
      expected.splice(at, 0, i % 256, 0xaa);
      const del = (i * 104_729) % (rope.length - 3);
      rope = rope.delete(del, del + 3);
      expected.splice(del, 3);
    }
    expect(list(rope.toBytes())).toEqual(expected);
    expect(rope.leafLengths().every((n) => n > 0 && n <= 1024)).toBe(true);
    expect(rope.height).toBeLessThanOrEqual(2 * Math.ceil(Math.log2(rope.leafLengths().length)) + 2);
  });
});

describe("Rope - Equality", () => {
  test("equal content with different structure", () => {
    const a = Rope.from(sequence(3000));
    const b = Rope.from(sequence(3000).slice(0, 1500)).insert(1500, sequence(3000).slice(1500));
    expect(a.equals(b)).toBe(true);
  });

  test("different length or content", () => {
    expect(ropeOf("abc").equals(ropeOf("abcd"))).toBe(false);
    expect(ropeOf("abc").equals(ropeOf("abd"))).toBe(false);
  });
});
