/**
 * Selection set algebra: pure functions from (rope, set) to a new set.
 *
 * Every set leaving this module is normalized by `createSelectionSet`:
 * offsets clamped to `[0, length]`, selections sorted by start, overlapping
 * ones merged, at least one selection, and a valid main index.
 */

import type { Rope } from "../buffer/rope.ts";
import type { ByteRange } from "../buffer/types.ts";
import { emptySelection, type EditorError, noMatch } from "../common/errors.ts";
import { Err, Ok, type Result } from "../common/result.ts";
import { findAll, type Pattern } from "../pattern/pattern.ts";
import type {
  CycleDirection,
  JumpName,
  JumpTarget,
  Selection,
  SelectionSet,
  SplitUnit,
} from "./types.ts";

// =============================================================================
// Single selections
// =============================================================================

export function selection(anchor: number, cursor: number = anchor): Selection {
  return { anchor, cursor };
}

export function selectionStart(sel: Selection): number {
  return Math.min(sel.anchor, sel.cursor);
}

export function selectionEnd(sel: Selection): number {
  return Math.max(sel.anchor, sel.cursor);
}

export function isForward(sel: Selection): boolean {
  return sel.anchor <= sel.cursor;
}

/** Bytes covered by `sel` that exist in `rope`, as a half-open range. */
export function coveredRange(rope: Rope, sel: Selection): ByteRange {
  const start = Math.min(selectionStart(sel), rope.length);
  const end = Math.min(selectionEnd(sel) + 1, rope.length);
  return { start, end: Math.max(start, end) };
}

/** A selection over `[start, last]` with the given direction. */
export function spanning(start: number, last: number, forward: boolean): Selection {
  return forward ? { anchor: start, cursor: last } : { anchor: last, cursor: start };
}

function clampOffset(offset: number, length: number): number {
  if (Number.isNaN(offset)) return 0;
  return Math.max(0, Math.min(length, Math.trunc(offset)));
}

// =============================================================================
// Sets
// =============================================================================

/**
 * Normalize raw selections into a set. `mainIndex` refers to `selections`
 * as passed; the result's main is whichever selection that one ended up in.
 */
export function createSelectionSet(
  rope: Rope,
  selections: readonly Selection[],
  mainIndex = 0,
): SelectionSet {
  const length = rope.length;
  const entries = selections.map((sel, index) => ({
    sel: selection(clampOffset(sel.anchor, length), clampOffset(sel.cursor, length)),
    index,
  }));
  if (entries.length === 0) {
    return { selections: [selection(0)], mainIndex: 0 };
  }

  // Array.prototype.sort is stable, so equal starts keep their input order.
  entries.sort((a, b) => selectionStart(a.sel) - selectionStart(b.sel));

  const merged: Selection[] = [];
  let newMain = 0;
  for (const { sel, index } of entries) {
    const last = merged[merged.length - 1];
    if (last !== undefined && selectionStart(sel) <= selectionEnd(last)) {
      const end = Math.max(selectionEnd(last), selectionEnd(sel));
      merged[merged.length - 1] = spanning(selectionStart(last), end, isForward(last));
    } else {
      merged.push(sel);
    }
    if (index === mainIndex) newMain = merged.length - 1;
  }
  return { selections: merged, mainIndex: newMain };
}

/** The set of one collapsed selection at offset 0. */
export function initialSelectionSet(): SelectionSet {
  return { selections: [selection(0)], mainIndex: 0 };
}

export function mainSelection(set: SelectionSet): Selection {
  return set.selections[set.mainIndex] ?? set.selections[0] ?? selection(0);
}

export function coveredRanges(rope: Rope, set: SelectionSet): ByteRange[] {
  return set.selections.map((sel) => coveredRange(rope, sel));
}

function mapSelections(
  rope: Rope,
  set: SelectionSet,
  fn: (sel: Selection) => Selection,
): SelectionSet {
  return createSelectionSet(rope, set.selections.map(fn), set.mainIndex);
}

// =============================================================================
// Movement
// =============================================================================

/** Move every cursor by `delta` bytes; collapse unless `extend`. */
export function moveBy(rope: Rope, set: SelectionSet, delta: number, extend: boolean): SelectionSet {
  return mapSelections(rope, set, (sel) => {
    const cursor = clampOffset(sel.cursor + delta, rope.length);
    return extend ? selection(sel.anchor, cursor) : selection(cursor);
  });
}

export function jumpTo(
  rope: Rope,
  set: SelectionSet,
  target: JumpTarget,
  extend: boolean,
): SelectionSet {
  return mapSelections(rope, set, (sel) => {
    const offset = clampOffset(typeof target === "number" ? target : target(sel, rope), rope.length);
    return extend ? selection(sel.anchor, offset) : selection(offset);
  });
}

/** Per-selection jump destinations for rows of `bytesPerLine` bytes. */
export function jumpTarget(name: JumpName, bytesPerLine: number): JumpTarget {
  const lastByte = (rope: Rope): number => Math.max(0, rope.length - 1);
  switch (name) {
    case "lineStart":
      return (sel) => sel.cursor - (sel.cursor % bytesPerLine);
    case "lineEnd":
      return (sel, rope) =>
        Math.min(sel.cursor - (sel.cursor % bytesPerLine) + bytesPerLine - 1, lastByte(rope));
    case "fileStart":
      return 0;
    case "fileEnd":
      return (_sel, rope) => lastByte(rope);
  }
}

export function collapseToCursor(rope: Rope, set: SelectionSet): SelectionSet {
  return mapSelections(rope, set, (sel) => selection(sel.cursor));
}

export function swapEnds(rope: Rope, set: SelectionSet): SelectionSet {
  return mapSelections(rope, set, (sel) => selection(sel.cursor, sel.anchor));
}

export function selectAll(rope: Rope): SelectionSet {
  return { selections: [selection(0, Math.max(0, rope.length - 1))], mainIndex: 0 };
}

// =============================================================================
// Splitting
// =============================================================================

function nullRuns(rope: Rope, range: ByteRange): ByteRange[] {
  const runs: ByteRange[] = [];
  const reader = rope.reader();
  let runStart: number | undefined;
  for (let pos = range.start; pos < range.end; pos++) {
    if (reader.at(pos) === 0) {
      if (runStart !== undefined) runs.push({ start: runStart, end: pos });
      runStart = undefined;
    } else if (runStart === undefined) {
      runStart = pos;
    }
  }
  if (runStart !== undefined) runs.push({ start: runStart, end: range.end });
  return runs;
}

function widthPieces(range: ByteRange, width: number): ByteRange[] {
  const pieces: ByteRange[] = [];
  const step = Math.max(1, Math.trunc(width));
  for (let pos = range.start; pos < range.end; pos += step) {
    pieces.push({ start: pos, end: Math.min(pos + step, range.end) });
  }
  return pieces;
}

function piecesOf(rope: Rope, range: ByteRange, unit: SplitUnit): ByteRange[] {
  switch (unit.kind) {
    case "width":
      return widthPieces(range, unit.width);
    case "null":
      return nullRuns(rope, range);
    case "pattern":
      return Array.from(findAll(rope, unit.pattern, range));
  }
}

/**
 * Replace each selection with the pieces of it described by `unit`. Pieces
 * keep the direction of the selection they came from; the new main is the
 * first piece of the old main, or the nearest piece after it.
 */
export function split(
  rope: Rope,
  set: SelectionSet,
  unit: SplitUnit,
): Result<SelectionSet, EditorError> {
  const pieces: Selection[] = [];
  let newMain: number | undefined;

  set.selections.forEach((sel, index) => {
    const forward = isForward(sel);
    if (index >= set.mainIndex && newMain === undefined) newMain = pieces.length;
    for (const piece of piecesOf(rope, coveredRange(rope, sel), unit)) {
      pieces.push(spanning(piece.start, piece.end - 1, forward));
    }
  });

  if (pieces.length === 0) {
    switch (unit.kind) {
      case "width":
        return Ok(set);
      case "null":
        return Err(emptySelection("no non-null bytes to select"));
      case "pattern":
        return Err(noMatch());
    }
  }
  const main = Math.min(newMain ?? 0, pieces.length - 1);
  return Ok(createSelectionSet(rope, pieces, main));
}

// =============================================================================
// Keeping and dropping
// =============================================================================

export function keepOnlyMain(set: SelectionSet): SelectionSet {
  return { selections: [mainSelection(set)], mainIndex: 0 };
}

/** Keep only the selection at `index` (clamped). */
export function keepOnly(set: SelectionSet, index: number): SelectionSet {
  const clamped = Math.max(0, Math.min(set.selections.length - 1, index));
  return { selections: [set.selections[clamped] ?? mainSelection(set)], mainIndex: 0 };
}

export function dropMain(set: SelectionSet): Result<SelectionSet, EditorError> {
  return dropAt(set, set.mainIndex);
}

/** Remove the selection at `index` (clamped). The main index stays in range. */
export function dropAt(set: SelectionSet, index: number): Result<SelectionSet, EditorError> {
  if (set.selections.length <= 1) return Err(emptySelection());
  const clamped = Math.max(0, Math.min(set.selections.length - 1, index));
  const selections = set.selections.filter((_, i) => i !== clamped);
  const mainIndex = set.mainIndex > clamped ? set.mainIndex - 1 : set.mainIndex;
  return Ok({ selections, mainIndex: Math.min(mainIndex, selections.length - 1) });
}

export function cycleMain(set: SelectionSet, direction: CycleDirection, steps = 1): SelectionSet {
  const n = set.selections.length;
  const delta = (direction === "forward" ? steps : -steps) % n;
  return { selections: set.selections, mainIndex: (((set.mainIndex + delta) % n) + n) % n };
}

// =============================================================================
// Pattern selection
// =============================================================================

/**
 * Select every match of `pattern` inside `ranges`, each range searched on
 * its own. The new main is the first match starting at or after the old
 * main's start.
 */
export function selectMatching(
  rope: Rope,
  set: SelectionSet,
  pattern: Pattern,
  ranges: readonly ByteRange[],
): Result<SelectionSet, EditorError> {
  const matches: Selection[] = [];
  for (const range of ranges) {
    for (const match of findAll(rope, pattern, range)) {
      matches.push(spanning(match.start, match.end - 1, true));
    }
  }
  if (matches.length === 0) return Err(noMatch());

  const oldStart = selectionStart(mainSelection(set));
  const main = matches.findIndex((sel) => selectionStart(sel) >= oldStart);
  return Ok(createSelectionSet(rope, matches, main === -1 ? 0 : main));
}
