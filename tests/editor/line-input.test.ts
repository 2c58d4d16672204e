import { describe, expect, test } from "vitest";
import { EMPTY_LINE, editLine, insertText, isPrintable } from "../../src/editor/line-input.ts";

describe("LineInput", () => {
  test("insertText goes in at the cursor", () => {
    expect(insertText({ text: "ad", cursor: 1 }, "bc")).toEqual({ text: "abcd", cursor: 3 });
  });

  test("printable keys are typed", () => {
    expect(editLine(EMPTY_LINE, { key: "x" })).toEqual({ text: "x", cursor: 1 });
    expect(isPrintable({ key: "Escape" })).toBe(false);
    expect(isPrintable({ key: "w", ctrl: true })).toBe(false);
  });

  test("cursor movement", () => {
    const line = { text: "abc", cursor: 1 };
    expect(editLine(line, { key: "ArrowLeft" })).toEqual({ text: "abc", cursor: 0 });
    expect(editLine(line, { key: "ArrowRight" })).toEqual({ text: "abc", cursor: 2 });
    expect(editLine(line, { key: "Home" })).toEqual({ text: "abc", cursor: 0 });
    expect(editLine(line, { key: "End" })).toEqual({ text: "abc", cursor: 3 });
  });

  test("backspace and delete", () => {
    const line = { text: "abc", cursor: 1 };
    expect(editLine(line, { key: "Backspace" })).toEqual({ text: "bc", cursor: 0 });
    expect(editLine(line, { key: "Delete" })).toEqual({ text: "ac", cursor: 1 });
    expect(editLine({ text: "abc", cursor: 0 }, { key: "Backspace" })).toEqual({ text: "abc", cursor: 0 });
  });

  test("surrogate pairs are edited as one character", () => {
    const line = { text: "a\u{1f600}", cursor: 3 };
    expect(editLine(line, { key: "ArrowLeft" })).toEqual({ text: "a\u{1f600}", cursor: 1 });
    expect(editLine(line, { key: "Backspace" })).toEqual({ text: "a", cursor: 1 });
    expect(editLine({ text: "a\u{1f600}", cursor: 1 }, { key: "ArrowRight" })?.cursor).toBe(3);
  });

  test("other keys are left to the caller", () => {
    expect(editLine(EMPTY_LINE, { key: "Enter" })).toBeUndefined();
    expect(editLine(EMPTY_LINE, { key: "w", ctrl: true })).toBeUndefined();
  });
});
