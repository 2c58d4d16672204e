import { describe, expect, test } from "vitest";
import { History, type Snapshot } from "../../src/editor/history.ts";
import { initialSelectionSet } from "../../src/editor/selection.ts";
import { ropeOf } from "../helpers.ts";

function snapshot(content: string): Snapshot {
  return { rope: ropeOf(content), selections: initialSelectionSet() };
}

describe("History", () => {
  test("undo returns the recorded state and redo steps forward again", () => {
    const history = new History();
    const before = snapshot("a");
    const after = snapshot("ab");
    history.record(before);

    expect(history.undo(after)).toBe(before);
    expect(history.canUndo).toBe(false);
    expect(history.redo(before)).toBe(after);
    expect(history.canRedo).toBe(false);
  });

  test("nothing to undo or redo", () => {
    const history = new History();
    expect(history.undo(snapshot(""))).toBeUndefined();
    expect(history.redo(snapshot(""))).toBeUndefined();
  });

  test("a new record clears redo", () => {
    const history = new History();
    history.record(snapshot("a"));
    history.undo(snapshot("b"));
    expect(history.canRedo).toBe(true);
    history.record(snapshot("a"));
    expect(history.canRedo).toBe(false);
  });

  test("the limit drops the oldest steps", () => {
    const history = new History(2);
    const states = ["a", "b", "c"].map(snapshot);
    for (const state of states) history.record(state);
    expect(history.undoDepth).toBe(2);
    expect(history.undo(snapshot("d"))).toBe(states[2]);
    expect(history.undo(snapshot("c"))).toBe(states[1]);
    expect(history.undo(snapshot("b"))).toBeUndefined();
  });
});
