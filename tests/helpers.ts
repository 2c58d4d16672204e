/**
 * Test helpers and utilities.
 */

import { expect } from "vitest";
import { parseHex } from "../src/buffer/hex.ts";
import { Rope } from "../src/buffer/rope.ts";
import { Editor, type EditorOptions } from "../src/editor/editor.ts";
import { parseKeys } from "../src/editor/key-notation.ts";
import { createSelectionSet, selectionEnd, selectionStart } from "../src/editor/selection.ts";
import type { FileStore, Selection, SelectionSet } from "../src/editor/types.ts";

// =============================================================================
// Byte builders
// =============================================================================

export function bytes(...values: number[]): Uint8Array {
  return Uint8Array.from(values);
}

export function ascii(text: string): Uint8Array {
  return new TextEncoder().encode(text);
}

/** Parse `"de ad be ef"`; throws on malformed input. */
export function hex(text: string): Uint8Array {
  const parsed = parseHex(text);
  if (!parsed) throw new Error(`bad hex fixture: ${text}`);
  return parsed;
}

export function ropeOf(text: string): Rope {
  return Rope.from(ascii(text));
}

export function ropeHex(text: string): Rope {
  return Rope.from(hex(text));
}

/** `n` bytes counting 0, 1, 2, ... modulo 256. */
export function sequence(n: number): Uint8Array {
  const out = new Uint8Array(n);
  for (let i = 0; i < n; i++) out[i] = i % 256;
  return out;
}

export function text(rope: Rope): string {
  return new TextDecoder().decode(rope.toBytes());
}

export function list(data: Uint8Array): number[] {
  return Array.from(data);
}

// =============================================================================
// Selections
// =============================================================================

export function sel(anchor: number, cursor: number = anchor): Selection {
  return { anchor, cursor };
}

export function setOf(rope: Rope, selections: Selection[], mainIndex = 0): SelectionSet {
  return createSelectionSet(rope, selections, mainIndex);
}

/** `[anchor, cursor]` pairs, for compact assertions. */
export function pairs(set: SelectionSet): Array<[number, number]> {
  return set.selections.map((s) => [s.anchor, s.cursor]);
}

export function expectSelectionInvariants(rope: Rope, set: SelectionSet): void {
  expect(set.selections.length).toBeGreaterThan(0);
  expect(set.mainIndex).toBeGreaterThanOrEqual(0);
  expect(set.mainIndex).toBeLessThan(set.selections.length);

  let previousEnd = -1;
  for (const s of set.selections) {
    expect(selectionStart(s)).toBeGreaterThanOrEqual(0);
    expect(selectionEnd(s)).toBeLessThanOrEqual(rope.length);
    expect(selectionStart(s)).toBeGreaterThan(previousEnd);
    previousEnd = selectionEnd(s);
  }
}

// =============================================================================
// Files
// =============================================================================

/** In-memory FileStore. Paths in `failing` throw on read and write. */
export class MemoryFileStore implements FileStore {
  readonly files = new Map<string, Uint8Array>();
  readonly failing = new Set<string>();
  readonly writes: string[] = [];

  constructor(files: Record<string, Uint8Array> = {}) {
    for (const [path, data] of Object.entries(files)) this.files.set(path, data);
  }

  read(path: string): Uint8Array | undefined {
    if (this.failing.has(path)) throw new Error(`EACCES: permission denied, open '${path}'`);
    const data = this.files.get(path);
    return data ? data.slice() : undefined;
  }

  write(path: string, data: Uint8Array): void {
    if (this.failing.has(path)) throw new Error(`EACCES: permission denied, open '${path}'`);
    this.files.set(path, data.slice());
    this.writes.push(path);
  }

  text(path: string): string | undefined {
    const data = this.files.get(path);
    return data ? new TextDecoder().decode(data) : undefined;
  }
}

// =============================================================================
// Editor
// =============================================================================

/** An editor with `data.bin` holding `content` open as the current session. */
export function editorWith(
  content: Uint8Array,
  options: Partial<EditorOptions> = {},
): { editor: Editor; store: MemoryFileStore } {
  const store = new MemoryFileStore({ "data.bin": content });
  const editor = new Editor({ ...options, store });
  editor.openFiles(["data.bin"]);
  return { editor, store };
}

export function type(editor: Editor, notation: string): void {
  editor.handleKeys(parseKeys(notation));
}
