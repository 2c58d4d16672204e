/**
 * Single-line text entry for the pattern prompt and the command line.
 */

import type { KeyEvent } from "./types.ts";

export interface LineInput {
  readonly text: string;
  /** Cursor position in UTF-16 code units, `0..text.length`. */
  readonly cursor: number;
}

export const EMPTY_LINE: LineInput = { text: "", cursor: 0 };

export function insertText(line: LineInput, text: string): LineInput {
  return {
    text: line.text.slice(0, line.cursor) + text + line.text.slice(line.cursor),
    cursor: line.cursor + text.length,
  };
}

/** Characters typed as-is: one code point, not a named key. */
export function isPrintable(event: KeyEvent): boolean {
  if (event.ctrl || event.alt) return false;
  return Array.from(event.key).length === 1 && event.key >= " ";
}

function previousBoundary(text: string, cursor: number): number {
  if (cursor <= 0) return 0;
  const code = text.charCodeAt(cursor - 1);
  // Step over a whole surrogate pair.
  return code >= 0xdc00 && code <= 0xdfff && cursor >= 2 ? cursor - 2 : cursor - 1;
}

function nextBoundary(text: string, cursor: number): number {
  if (cursor >= text.length) return text.length;
  const code = text.charCodeAt(cursor);
  return code >= 0xd800 && code <= 0xdbff ? cursor + 2 : cursor + 1;
}

/**
 * Apply an editing key. Returns the new line, or undefined when the key is
 * not an editing key (Enter, Escape, bound control keys).
 */
export function editLine(line: LineInput, event: KeyEvent): LineInput | undefined {
  if (isPrintable(event)) return insertText(line, event.key);
  if (event.ctrl || event.alt) return undefined;

  const { text, cursor } = line;
  switch (event.key) {
    case "ArrowLeft":
      return { text, cursor: previousBoundary(text, cursor) };
    case "ArrowRight":
      return { text, cursor: nextBoundary(text, cursor) };
    case "Home":
      return { text, cursor: 0 };
    case "End":
      return { text, cursor: text.length };
    case "Backspace": {
      const start = previousBoundary(text, cursor);
      return { text: text.slice(0, start) + text.slice(cursor), cursor: start };
    }
    case "Delete": {
      const end = nextBoundary(text, cursor);
      return { text: text.slice(0, cursor) + text.slice(end), cursor };
    }
    default:
      return undefined;
  }
}
