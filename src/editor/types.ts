/**
 * Editor state and command types.
 *
 * Selections, sets and modes are plain immutable values: every operation
 * returns new objects.
 */

import type { Rope } from "../buffer/rope.ts";
import type { EditorError } from "../common/errors.ts";
import type { Pattern, PatternEncoding } from "../pattern/pattern.ts";
import type { CountState } from "./count.ts";
import type { LineInput } from "./line-input.ts";

// =============================================================================
// Selections
// =============================================================================

/**
 * A selection over `[min(anchor, cursor), max(anchor, cursor)]`, inclusive.
 * The cursor is the end that moves.
 */
export interface Selection {
  readonly anchor: number;
  readonly cursor: number;
}

/** Selections sorted by start, non-overlapping and never empty. */
export interface SelectionSet {
  readonly selections: readonly Selection[];
  readonly mainIndex: number;
}

/** Direction for cursor movement and selection extension. */
export type Direction = "left" | "right" | "up" | "down";

export type CycleDirection = "backward" | "forward";

/** Named jump destinations, computed per selection. */
export type JumpName = "lineStart" | "lineEnd" | "fileStart" | "fileEnd";

/** An absolute offset, or a per-selection function producing one. */
export type JumpTarget = number | ((selection: Selection, rope: Rope) => number);

export type SplitUnit =
  | { readonly kind: "width"; readonly width: number }
  | { readonly kind: "null" }
  | { readonly kind: "pattern"; readonly pattern: Pattern };

// =============================================================================
// Edits
// =============================================================================

/** How typed bytes and the insertion point relate to each selection. */
export type InsertPlacement = "insert" | "append";

export type PastePlacement = "before" | "after";

/** How bytes typed in insert/replace mode are read. */
export type Encoding = "ascii" | "hex";

export interface EditResult {
  readonly rope: Rope;
  readonly selections: SelectionSet;
}

// =============================================================================
// Input
// =============================================================================

/**
 * A key press. `key` is the character produced (`"a"`, `"A"`, `" "`, `":"`)
 * or a named key: `Escape`, `Enter`, `Backspace`, `Delete`, `Tab`, `Home`,
 * `End`, `ArrowLeft`, `ArrowRight`, `ArrowUp`, `ArrowDown`.
 */
export interface KeyEvent {
  readonly key: string;
  readonly ctrl?: boolean;
  readonly alt?: boolean;
}

/** What the pattern prompt does with the compiled pattern. */
export type PatternPurpose = "select" | "search" | "split";

/** Multi-key prefix awaiting its second key in normal mode. */
export type Pending =
  | { readonly kind: "none" }
  | { readonly kind: "jump"; readonly extend: boolean }
  | { readonly kind: "split" }
  | { readonly kind: "register" };

export type Mode =
  | {
      readonly kind: "normal";
      readonly count: CountState;
      readonly pending: Pending;
      readonly register: string;
    }
  | {
      readonly kind: "insert";
      readonly encoding: Encoding;
      readonly placement: InsertPlacement;
      /** High nibble of a half-typed hex byte. */
      readonly nibble: number | undefined;
    }
  | {
      readonly kind: "replace";
      readonly encoding: Encoding;
      readonly nibble: number | undefined;
    }
  | {
      readonly kind: "pattern";
      readonly encoding: PatternEncoding;
      readonly purpose: PatternPurpose;
      readonly input: LineInput;
    }
  | { readonly kind: "command"; readonly input: LineInput }
  | { readonly kind: "quitting" };

export type ModeKind = Mode["kind"];

export type NormalMode = Extract<Mode, { kind: "normal" }>;

/** Normal-mode commands, resolved from one or more keys. */
export type EditorCommand =
  | { type: "move"; direction: Direction; extend: boolean }
  | { type: "jump"; target: JumpName; extend: boolean }
  | { type: "beginJump"; extend: boolean }
  | { type: "beginSplit" }
  | { type: "beginRegister" }
  | { type: "split"; unit: "width"; width: number }
  | { type: "split"; unit: "null" }
  | { type: "promptPattern"; encoding: PatternEncoding; purpose: PatternPurpose }
  | { type: "collapse" }
  | { type: "swapEnds" }
  | { type: "selectAll" }
  | { type: "keepMain" }
  | { type: "dropMain" }
  | { type: "cycleMain"; direction: CycleDirection }
  | { type: "yank" }
  | { type: "delete" }
  | { type: "change"; encoding: Encoding }
  | { type: "paste"; placement: PastePlacement }
  | { type: "insert"; encoding: Encoding; placement: InsertPlacement }
  | { type: "replace"; encoding: Encoding }
  | { type: "measure" }
  | { type: "undo" }
  | { type: "redo" }
  | { type: "commandLine" };

// =============================================================================
// Output
// =============================================================================

export interface StatusMessage {
  readonly level: "info" | "error";
  readonly text: string;
  readonly error?: EditorError;
}

/**
 * Where buffers are read from and written to. `read` returns undefined for a
 * file that does not exist and throws on any other failure; `write` throws on
 * failure and must not leave a partial file.
 */
export interface FileStore {
  read(path: string): Uint8Array | undefined;
  write(path: string, bytes: Uint8Array): void;
}
