/**
 * Default key bindings.
 *
 * Each function maps one key event to an action for its mode, or undefined
 * when the key is unbound there.
 */

import type { Direction, EditorCommand, JumpName, KeyEvent } from "./types.ts";

const ARROWS: Readonly<Record<string, Direction>> = {
  ArrowLeft: "left",
  ArrowRight: "right",
  ArrowUp: "up",
  ArrowDown: "down",
};

function arrowDirection(key: string): Direction | undefined {
  return Object.hasOwn(ARROWS, key) ? ARROWS[key] : undefined;
}

/** Map a normal-mode key event to a command. */
export function normalKeyToCommand(e: KeyEvent): EditorCommand | undefined {
  if (e.ctrl) return undefined;

  if (e.alt) {
    switch (e.key) {
      case "s":
        return { type: "beginSplit" };
      case ";":
        return { type: "swapEnds" };
      case " ":
        return { type: "dropMain" };
      default:
        return undefined;
    }
  }

  const arrow = arrowDirection(e.key);
  if (arrow) return { type: "move", direction: arrow, extend: false };

  switch (e.key) {
    // ── Movement ────────────────────────────────────────────────
    case "h":
      return { type: "move", direction: "left", extend: false };
    case "j":
      return { type: "move", direction: "down", extend: false };
    case "k":
      return { type: "move", direction: "up", extend: false };
    case "l":
      return { type: "move", direction: "right", extend: false };
    case "H":
      return { type: "move", direction: "left", extend: true };
    case "J":
      return { type: "move", direction: "down", extend: true };
    case "K":
      return { type: "move", direction: "up", extend: true };
    case "L":
      return { type: "move", direction: "right", extend: true };
    case "g":
      return { type: "beginJump", extend: false };
    case "G":
      return { type: "beginJump", extend: true };

    // ── Selections ──────────────────────────────────────────────
    case ";":
      return { type: "collapse" };
    case "%":
      return { type: "selectAll" };
    case " ":
      return { type: "keepMain" };
    case "(":
      return { type: "cycleMain", direction: "backward" };
    case ")":
      return { type: "cycleMain", direction: "forward" };
    case "s":
      return { type: "promptPattern", encoding: "literal", purpose: "select" };
    case "S":
      return { type: "promptPattern", encoding: "hex", purpose: "select" };
    case "/":
      return { type: "promptPattern", encoding: "literal", purpose: "search" };
    case "?":
      return { type: "promptPattern", encoding: "hex", purpose: "search" };

    // ── Editing ─────────────────────────────────────────────────
    case '"':
      return { type: "beginRegister" };
    case "y":
      return { type: "yank" };
    case "d":
      return { type: "delete" };
    case "c":
      return { type: "change", encoding: "ascii" };
    case "C":
      return { type: "change", encoding: "hex" };
    case "p":
      return { type: "paste", placement: "after" };
    case "P":
      return { type: "paste", placement: "before" };
    case "i":
      return { type: "insert", encoding: "ascii", placement: "insert" };
    case "I":
      return { type: "insert", encoding: "hex", placement: "insert" };
    case "a":
      return { type: "insert", encoding: "ascii", placement: "append" };
    case "A":
      return { type: "insert", encoding: "hex", placement: "append" };
    case "r":
      return { type: "replace", encoding: "ascii" };
    case "R":
      return { type: "replace", encoding: "hex" };

    // ── Other ───────────────────────────────────────────────────
    case "M":
      return { type: "measure" };
    case "u":
      return { type: "undo" };
    case "U":
      return { type: "redo" };
    case ":":
      return { type: "commandLine" };

    default:
      return undefined;
  }
}

/** Second key after `g` / `G`. */
export function jumpKeyToTarget(e: KeyEvent): JumpName | undefined {
  if (e.ctrl || e.alt) return undefined;
  switch (arrowDirection(e.key) ?? e.key) {
    case "h":
    case "left":
      return "lineStart";
    case "l":
    case "right":
      return "lineEnd";
    case "k":
    case "up":
      return "fileStart";
    case "j":
    case "down":
      return "fileEnd";
    default:
      return undefined;
  }
}

/** Second key after `Alt-s`. */
export function splitKeyToCommand(e: KeyEvent): EditorCommand | undefined {
  if (e.ctrl || e.alt) return undefined;
  switch (e.key) {
    case "b":
      return { type: "split", unit: "width", width: 1 };
    case "w":
      return { type: "split", unit: "width", width: 2 };
    case "d":
      return { type: "split", unit: "width", width: 4 };
    case "q":
      return { type: "split", unit: "width", width: 8 };
    case "o":
      return { type: "split", unit: "width", width: 16 };
    case "n":
      return { type: "split", unit: "null" };
    case "/":
      return { type: "promptPattern", encoding: "literal", purpose: "split" };
    case "?":
      return { type: "promptPattern", encoding: "hex", purpose: "split" };
    default:
      return undefined;
  }
}

/** Keys shared by insert and replace mode. */
export type TypingAction =
  | { type: "escape" }
  | { type: "null" }
  | { type: "toggleEncoding" }
  | { type: "backspace" }
  | { type: "delete" }
  | { type: "move"; direction: Direction }
  | { type: "char"; char: string };

export function typingKeyToAction(e: KeyEvent): TypingAction | undefined {
  if (e.key === "Escape") return { type: "escape" };
  if (e.ctrl) {
    switch (e.key.toLowerCase()) {
      case "n":
        return { type: "null" };
      case "o":
        return { type: "toggleEncoding" };
      default:
        return undefined;
    }
  }
  if (e.alt) return undefined;

  const arrow = arrowDirection(e.key);
  if (arrow) return { type: "move", direction: arrow };
  switch (e.key) {
    case "Backspace":
      return { type: "backspace" };
    case "Delete":
      return { type: "delete" };
    case "Enter":
      return { type: "char", char: "\n" };
    case "Tab":
      return { type: "char", char: "\t" };
    default:
      return Array.from(e.key).length === 1 ? { type: "char", char: e.key } : undefined;
  }
}

/** Prompt keys beyond plain line editing. */
export type PromptAction =
  | { type: "submit" }
  | { type: "cancel" }
  | { type: "wildcard" }
  | { type: "null" }
  | { type: "toggleEncoding" };

export function promptKeyToAction(e: KeyEvent): PromptAction | undefined {
  if (e.key === "Escape") return { type: "cancel" };
  if (e.key === "Enter" && !e.ctrl && !e.alt) return { type: "submit" };
  if (!e.ctrl) return undefined;
  switch (e.key.toLowerCase()) {
    case "w":
      return { type: "wildcard" };
    case "n":
      return { type: "null" };
    case "o":
      return { type: "toggleEncoding" };
    default:
      return undefined;
  }
}
