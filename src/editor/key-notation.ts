/**
 * Vim-style key notation: `i00<Esc>`, `<A-s>w`, `:w out.bin<CR>`.
 *
 * Plain characters stand for themselves. `<...>` names a special key or a
 * modified key; a `<` that does not start a known name is a literal `<`.
 */

import type { KeyEvent } from "./types.ts";

const NAMED_KEYS: ReadonlyMap<string, string> = new Map([
  ["esc", "Escape"],
  ["escape", "Escape"],
  ["cr", "Enter"],
  ["enter", "Enter"],
  ["return", "Enter"],
  ["bs", "Backspace"],
  ["backspace", "Backspace"],
  ["del", "Delete"],
  ["delete", "Delete"],
  ["tab", "Tab"],
  ["space", " "],
  ["lt", "<"],
  ["left", "ArrowLeft"],
  ["right", "ArrowRight"],
  ["up", "ArrowUp"],
  ["down", "ArrowDown"],
  ["home", "Home"],
  ["end", "End"],
]);

const NOTATION_NAMES: ReadonlyMap<string, string> = new Map([
  ["Escape", "Esc"],
  ["Enter", "CR"],
  ["Backspace", "BS"],
  ["Delete", "Del"],
  ["Tab", "Tab"],
  [" ", "Space"],
  ["<", "lt"],
  ["ArrowLeft", "Left"],
  ["ArrowRight", "Right"],
  ["ArrowUp", "Up"],
  ["ArrowDown", "Down"],
  ["Home", "Home"],
  ["End", "End"],
]);

/** Parse the inside of `<...>`, or undefined when it is not a key name. */
function parseBracketed(body: string): KeyEvent | undefined {
  let ctrl = false;
  let alt = false;
  let rest = body;
  for (;;) {
    const prefix = rest.slice(0, 2).toUpperCase();
    if (rest.length <= 2) break;
    if (prefix === "C-") ctrl = true;
    else if (prefix === "A-" || prefix === "M-") alt = true;
    else break;
    rest = rest.slice(2);
  }

  const named = NAMED_KEYS.get(rest.toLowerCase());
  const key = named ?? (Array.from(rest).length === 1 && (ctrl || alt) ? rest : undefined);
  if (key === undefined) return undefined;

  const event: { key: string; ctrl?: boolean; alt?: boolean } = { key };
  if (ctrl) event.ctrl = true;
  if (alt) event.alt = true;
  return event;
}

export function parseKeys(notation: string): KeyEvent[] {
  const events: KeyEvent[] = [];
  const chars = Array.from(notation);

  for (let i = 0; i < chars.length; i++) {
    const ch = chars[i] ?? "";
    if (ch === "<") {
      const close = chars.indexOf(">", i + 1);
      if (close !== -1) {
        const event = parseBracketed(chars.slice(i + 1, close).join(""));
        if (event) {
          events.push(event);
          i = close;
          continue;
        }
      }
    }
    events.push({ key: ch });
  }
  return events;
}

/** Render a key back to notation. */
export function formatKey(event: KeyEvent): string {
  const name = NOTATION_NAMES.get(event.key);
  const modifiers = `${event.ctrl ? "C-" : ""}${event.alt ? "A-" : ""}`;
  if (modifiers === "" && name === undefined) return event.key;
  return `<${modifiers}${name ?? event.key}>`;
}

export function formatKeys(events: readonly KeyEvent[]): string {
  return events.map(formatKey).join("");
}
