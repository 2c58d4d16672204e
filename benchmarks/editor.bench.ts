/**
 * Editor benchmarks: multi-selection edits driven through key handling.
 */

import { Editor } from "../src/editor/editor.ts";
import { parseKeys } from "../src/editor/key-notation.ts";
import type { FileStore } from "../src/editor/types.ts";
import type { BenchmarkSuite } from "./harness.ts";

const KiB = 1024;

class FixtureStore implements FileStore {
  constructor(private readonly _data: Uint8Array) {}

  read(): Uint8Array {
    return this._data.slice();
  }

  write(): void {}
}

function editorOver(size: number): Editor {
  const data = new Uint8Array(size);
  for (let i = 0; i < size; i++) data[i] = i % 251;
  const editor = new Editor({ store: new FixtureStore(data) });
  editor.openFiles(["fixture.bin"]);
  return editor;
}

const splitKeys = parseKeys("%<A-s>o");
const insertKeys = parseKeys("i<C-n><Esc>u");

export const editorBenchmarks: BenchmarkSuite = {
  name: "Editor",
  benchmarks: [
    {
      name: "split 64 KiB into 4096 selections",
      fn: () => {
        editorOver(64 * KiB).handleKeys(splitKeys);
      },
      iterations: 20,
      targetMs: 50,
    },
    {
      name: "insert at 4096 selections and undo",
      fn: (() => {
        const editor = editorOver(64 * KiB);
        editor.handleKeys(splitKeys);
        return () => editor.handleKeys(insertKeys);
      })(),
      iterations: 20,
      targetMs: 100,
    },
  ],
};
