/**
 * Headless runner: open files, replay keys, report the resulting state.
 */

import { formatHex } from "../buffer/hex.ts";
import { Editor } from "../editor/editor.ts";
import { parseKeys } from "../editor/key-notation.ts";
import { coveredRange, coveredRanges, mainSelection } from "../editor/selection.ts";
import type { FileStore } from "../editor/types.ts";

export interface RunOptions {
  readonly files: readonly string[];
  readonly keys: string;
  readonly bytesPerLine: number;
  readonly historyLimit: number;
  readonly dump: boolean;
}

export interface RunResult {
  readonly exitCode: number;
  readonly editor: Editor;
}

/** `NORMAL data.bin [+] | 12 bytes | 2 selections | main [4, 8)` */
export function formatStatus(editor: Editor): string {
  const session = editor.session;
  const { rope, selections } = session;
  const main = coveredRange(rope, mainSelection(selections));
  const count = selections.selections.length;
  return [
    `${editor.modeName} ${session.name}${session.dirty ? " [+]" : ""}`,
    `${rope.length} bytes`,
    `${count} selection${count === 1 ? "" : "s"}`,
    `main [${main.start}, ${main.end})`,
  ].join(" | ");
}

/** One line per selection: `*0 [4, 8) de ad be ef` (`*` marks the main one). */
export function formatSelections(editor: Editor): string[] {
  const { rope, selections } = editor.session;
  return coveredRanges(rope, selections).map((range, index) => {
    const marker = index === selections.mainIndex ? "*" : " ";
    const bytes = formatHex(rope.slice(range.start, range.end));
    return `${marker}${index} [${range.start}, ${range.end})${bytes ? ` ${bytes}` : ""}`;
  });
}

export function runHeadless(
  options: RunOptions,
  store: FileStore,
  write: (line: string) => void,
): RunResult {
  const editor = new Editor({
    store,
    bytesPerLine: options.bytesPerLine,
    historyLimit: options.historyLimit,
  });
  editor.openFiles(options.files);
  editor.handleKeys(parseKeys(options.keys));

  for (const message of editor.messages) {
    write(`${message.level}: ${message.text}`);
  }
  write(formatStatus(editor));
  if (options.dump) {
    for (const line of formatSelections(editor)) write(line);
  }

  const failed = editor.messages.some((message) => message.level === "error");
  return { exitCode: failed ? 1 : 0, editor };
}
