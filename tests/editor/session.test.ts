/**
 * Buffer session and session list tests.
 */

import { describe, expect, test } from "vitest";
import { moveBy } from "../../src/editor/selection.ts";
import { BufferSession, SessionList } from "../../src/editor/session.ts";
import { ascii, pairs, ropeOf, sel, setOf, text } from "../helpers.ts";

describe("BufferSession - State", () => {
  test("a new session is clean with one selection at 0", () => {
    const session = new BufferSession({ rope: ropeOf("abc"), path: "a.bin" });
    expect(session.dirty).toBe(false);
    expect(session.name).toBe("a.bin");
    expect(pairs(session.selections)).toEqual([[0, 0]]);
  });

  test("scratch sessions have a placeholder name", () => {
    expect(new BufferSession().name).toBe("[scratch]");
  });

  test("setSelections normalizes against the rope", () => {
    const session = new BufferSession({ rope: ropeOf("abc") });
    session.setSelections(setOf(ropeOf("abcdefgh"), [sel(6)]));
    expect(pairs(session.selections)).toEqual([[3, 3]]);
  });

  test("an edit makes the session dirty until it is saved", () => {
    const session = new BufferSession({ rope: ropeOf("abc"), path: "a.bin" });
    const rope = session.rope.insert(0, ascii("x"));
    session.apply({ rope, selections: setOf(rope, [sel(1)]) });
    expect(session.dirty).toBe(true);

    session.markSaved("b.bin");
    expect(session.dirty).toBe(false);
    expect(session.path).toBe("b.bin");
  });

  test("undoing back to the saved version is clean again", () => {
    const session = new BufferSession({ rope: ropeOf("abc") });
    const rope = session.rope.delete(0, 1);
    session.apply({ rope, selections: setOf(rope, [sel(0)]) });
    expect(session.undo()).toBe(true);
    expect(session.dirty).toBe(false);
  });
});

describe("BufferSession - Undo", () => {
  function edit(session: BufferSession, at: number, value: string): void {
    const rope = session.rope.insert(at, ascii(value));
    session.apply({ rope, selections: setOf(rope, [sel(at)]) });
  }

  test("each edit is one undo step", () => {
    const session = new BufferSession({ rope: ropeOf("") });
    edit(session, 0, "a");
    edit(session, 1, "b");
    session.undo();
    expect(text(session.rope)).toBe("a");
    session.undo();
    expect(text(session.rope)).toBe("");
    expect(session.undo()).toBe(false);
    session.redo();
    expect(text(session.rope)).toBe("a");
  });

  test("a group collects edits into one step", () => {
    const session = new BufferSession({ rope: ropeOf("") });
    session.beginGroup();
    edit(session, 0, "a");
    edit(session, 1, "b");
    edit(session, 2, "c");
    session.endGroup();
    edit(session, 3, "d");

    session.undo();
    expect(text(session.rope)).toBe("abc");
    session.undo();
    expect(text(session.rope)).toBe("");
  });

  test("selection-only changes record nothing", () => {
    const session = new BufferSession({ rope: ropeOf("abc") });
    session.apply({ rope: session.rope, selections: moveBy(session.rope, session.selections, 2, false) });
    expect(session.history.canUndo).toBe(false);
  });

  test("undo restores the selections too", () => {
    const session = new BufferSession({ rope: ropeOf("abc") });
    session.setSelections(setOf(session.rope, [sel(1, 2)]));
    edit(session, 0, "x");
    session.undo();
    expect(pairs(session.selections)).toEqual([[1, 2]]);
  });

  test("registers belong to their session", () => {
    const a = new BufferSession();
    const b = new BufferSession();
    a.registers.write('"', [ascii("x")]);
    expect(b.registers.read('"')).toEqual([]);
  });
});

describe("SessionList", () => {
  function named(path: string): BufferSession {
    return new BufferSession({ path });
  }

  test("starts with its initial session current", () => {
    const list = new SessionList(named("a"));
    expect(list.size).toBe(1);
    expect(list.current.path).toBe("a");
  });

  test("open adds in order and makes the new session current", () => {
    const list = new SessionList(named("a"));
    const id = list.open(named("b"));
    expect(list.current.path).toBe("b");
    expect(list.get(id)?.path).toBe("b");
    expect(list.all().map((s) => s.path)).toEqual(["a", "b"]);
  });

  test("findByPath and switchTo", () => {
    const list = new SessionList(named("a"));
    list.open(named("b"));
    const a = list.findByPath("a");
    expect(a).toBeDefined();
    if (!a) return;
    expect(list.switchTo(a)).toBe(true);
    expect(list.current.path).toBe("a");
    expect(list.findByPath("zzz")).toBeUndefined();
  });

  test("removing the current session makes the next one current", () => {
    const list = new SessionList(named("a"));
    list.open(named("b"));
    list.open(named("c"));
    const b = list.findByPath("b");
    if (!b) throw new Error("missing b");
    list.switchTo(b);

    expect(list.remove(b)).toBe(true);
    expect(list.current.path).toBe("c");
    expect(list.get(b)).toBeUndefined();
    expect(list.switchTo(b)).toBe(false);
  });

  test("removing the last session in order falls back to the previous one", () => {
    const list = new SessionList(named("a"));
    const b = list.open(named("b"));
    list.remove(b);
    expect(list.current.path).toBe("a");
  });

  test("the only session cannot be removed", () => {
    const list = new SessionList(named("a"));
    expect(list.remove(list.currentId)).toBe(false);
    expect(list.size).toBe(1);
  });
});
