/**
 * Buffer edits applied at every selection at once.
 *
 * Each operation plans one splice per selection in set order, applies them
 * to a new rope from the highest offset down (so earlier offsets stay
 * valid), then places each selection in the new rope using the total
 * length change of the splices before it.
 */

import type { Rope } from "../buffer/rope.ts";
import type { Splice } from "../buffer/types.ts";
import {
  coveredRange,
  coveredRanges,
  createSelectionSet,
  isForward,
  selection,
  selectionEnd,
  selectionStart,
  spanning,
} from "./selection.ts";
import type {
  EditResult,
  InsertPlacement,
  PastePlacement,
  Selection,
  SelectionSet,
} from "./types.ts";

const NO_BYTES = new Uint8Array(0);

/** Upper bound on the bytes one counted paste adds across all selections. */
export const MAX_PASTE_BYTES = 16 * 1024 * 1024;

interface PlannedEdit extends Splice {
  /** The selection in the new rope, given the offset `start` moved to. */
  readonly place: (newStart: number) => Selection;
}

function applyEdits(rope: Rope, set: SelectionSet, edits: readonly PlannedEdit[]): EditResult {
  let next = rope;
  for (let i = edits.length - 1; i >= 0; i--) {
    const edit = edits[i];
    if (edit === undefined) continue;
    next = next.splice(edit.start, edit.end, edit.bytes);
  }

  let shift = 0;
  const placed = edits.map((edit) => {
    const sel = edit.place(edit.start + shift);
    shift += edit.bytes.length - (edit.end - edit.start);
    return sel;
  });
  return { rope: next, selections: createSelectionSet(next, placed, set.mainIndex) };
}

/** A selection moved by the same distance as `from` moved to `to`. */
function shifted(sel: Selection, from: number, to: number): Selection {
  const delta = to - from;
  return selection(sel.anchor + delta, sel.cursor + delta);
}

function repeatBytes(bytes: Uint8Array, times: number): Uint8Array {
  if (times === 1) return bytes;
  const out = new Uint8Array(bytes.length * times);
  for (let i = 0; i < times; i++) out.set(bytes, i * bytes.length);
  return out;
}

/** Repeat count for a paste, clamped so the pasted total stays within MAX_PASTE_BYTES. */
function pasteTimes(bytesPerCopy: number, count: number): number {
  const requested = Math.max(1, Math.trunc(count));
  if (bytesPerCopy === 0) return 1;
  return Math.min(requested, Math.max(1, Math.floor(MAX_PASTE_BYTES / bytesPerCopy)));
}

/** Offset where typed bytes go for a selection: before it or just past it. */
export function insertionPoint(rope: Rope, sel: Selection, placement: InsertPlacement): number {
  if (placement === "insert") return Math.min(selectionStart(sel), rope.length);
  return Math.min(selectionEnd(sel) + 1, rope.length);
}

// =============================================================================
// Delete / yank
// =============================================================================

/** The covered bytes of each selection, in set order. */
export function yankSelections(rope: Rope, set: SelectionSet): Uint8Array[] {
  return coveredRanges(rope, set).map((range) => rope.slice(range.start, range.end));
}

/** Remove covered bytes; each selection collapses where its bytes were. */
export function deleteSelections(rope: Rope, set: SelectionSet): EditResult {
  const edits = coveredRanges(rope, set).map(
    (range): PlannedEdit => ({
      start: range.start,
      end: range.end,
      bytes: NO_BYTES,
      place: (newStart) => selection(newStart),
    }),
  );
  return applyEdits(rope, set, edits);
}

// =============================================================================
// Paste
// =============================================================================

/**
 * Insert register contents at every selection, `count` times over. One entry
 * is broadcast to all selections; otherwise selection `i` takes entry
 * `i mod entries.length`. The pasted bytes become the new selections.
 */
export function pasteRegister(
  rope: Rope,
  set: SelectionSet,
  entries: readonly Uint8Array[],
  placement: PastePlacement,
  count = 1,
): EditResult {
  if (entries.length === 0) return { rope, selections: set };

  const chosen = set.selections.map(
    (_, index) => (entries.length === 1 ? entries[0] : entries[index % entries.length]) ?? NO_BYTES,
  );
  const times = pasteTimes(
    chosen.reduce((sum, entry) => sum + entry.length, 0),
    count,
  );

  const edits = set.selections.map((sel, index): PlannedEdit => {
    const bytes = repeatBytes(chosen[index] ?? NO_BYTES, times);
    const at = insertionPoint(rope, sel, placement === "before" ? "insert" : "append");
    return {
      start: at,
      end: at,
      bytes,
      place: (newStart) =>
        bytes.length === 0
          ? selection(newStart)
          : spanning(newStart, newStart + bytes.length - 1, true),
    };
  });
  return applyEdits(rope, set, edits);
}

// =============================================================================
// Insert / append
// =============================================================================

/**
 * `insert` puts `bytes` before each selection and shifts the selection
 * right; `append` puts them after it and grows the selection over them.
 */
export function insertAtSelections(
  rope: Rope,
  set: SelectionSet,
  bytes: Uint8Array,
  placement: InsertPlacement,
): EditResult {
  if (bytes.length === 0) return { rope, selections: set };

  const edits = set.selections.map((sel): PlannedEdit => {
    const at = insertionPoint(rope, sel, placement);
    const start = Math.min(selectionStart(sel), rope.length);
    return {
      start: at,
      end: at,
      bytes,
      place: (newStart) => {
        if (placement === "insert") return shifted(sel, at, newStart + bytes.length);
        const newMin = newStart - (at - start);
        return spanning(newMin, newStart + bytes.length - 1, isForward(sel));
      },
    };
  });
  return applyEdits(rope, set, edits);
}

/**
 * Backspace: remove the byte before each insertion point. A byte covered by
 * the previous selection is left alone, as is the last byte of an appending
 * selection.
 */
export function eraseBeforeInsertion(
  rope: Rope,
  set: SelectionSet,
  placement: InsertPlacement,
): EditResult {
  const ranges = coveredRanges(rope, set);
  const edits = set.selections.map((sel, index): PlannedEdit => {
    const at = insertionPoint(rope, sel, placement);
    const own = ranges[index] ?? coveredRange(rope, sel);
    const floor =
      placement === "insert" ? (ranges[index - 1]?.end ?? 0) : own.start + 1;
    if (at - 1 < floor) {
      return { start: at, end: at, bytes: NO_BYTES, place: (newStart) => shifted(sel, at, newStart) };
    }
    return {
      start: at - 1,
      end: at,
      bytes: NO_BYTES,
      place: (newStart) => {
        if (placement === "insert") return shifted(sel, at, newStart);
        return spanning(newStart - (at - 1 - own.start), newStart - 1, isForward(sel));
      },
    };
  });
  return applyEdits(rope, set, edits);
}

/**
 * Delete key: remove the byte at each insertion point, unless it is past the
 * end or covered by the next selection.
 */
export function eraseAtInsertion(
  rope: Rope,
  set: SelectionSet,
  placement: InsertPlacement,
): EditResult {
  const ranges = coveredRanges(rope, set);
  const edits = set.selections.map((sel, index): PlannedEdit => {
    const at = insertionPoint(rope, sel, placement);
    const ceiling = placement === "insert" ? rope.length : (ranges[index + 1]?.start ?? rope.length);
    if (at >= ceiling) {
      return { start: at, end: at, bytes: NO_BYTES, place: (newStart) => shifted(sel, at, newStart) };
    }
    return {
      start: at,
      end: at + 1,
      bytes: NO_BYTES,
      place: (newStart) => {
        if (placement === "append") return shifted(sel, at, newStart);
        const last = Math.max(newStart, newStart + selectionEnd(sel) - at - 1);
        return spanning(newStart, last, isForward(sel));
      },
    };
  });
  return applyEdits(rope, set, edits);
}

// =============================================================================
// Replace
// =============================================================================

/** Overwrite every covered byte with `value`. Selections keep their place. */
export function replaceSelections(rope: Rope, set: SelectionSet, value: number): EditResult {
  const edits = coveredRanges(rope, set).map(
    (range, index): PlannedEdit => {
      const sel = set.selections[index] ?? selection(range.start);
      return {
        start: range.start,
        end: range.end,
        bytes: new Uint8Array(range.end - range.start).fill(value & 0xff),
        place: (newStart) => shifted(sel, range.start, newStart),
      };
    },
  );
  return applyEdits(rope, set, edits);
}
