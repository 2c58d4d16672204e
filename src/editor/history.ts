/**
 * Linear undo/redo over buffer snapshots.
 *
 * Ropes are persistent, so a snapshot is just the rope and selection set
 * that were current; nothing is copied.
 */

import type { Rope } from "../buffer/rope.ts";
import type { SelectionSet } from "./types.ts";

export interface Snapshot {
  readonly rope: Rope;
  readonly selections: SelectionSet;
}

export class History {
  private readonly _undo: Snapshot[] = [];
  private _redo: Snapshot[] = [];
  private readonly _limit: number;

  /** `limit` caps the undo depth; 0 means unbounded. */
  constructor(limit = 0) {
    this._limit = Math.max(0, Math.trunc(limit));
  }

  get canUndo(): boolean {
    return this._undo.length > 0;
  }

  get canRedo(): boolean {
    return this._redo.length > 0;
  }

  get undoDepth(): number {
    return this._undo.length;
  }

  /** Push the state from before an edit. Clears the redo stack. */
  record(before: Snapshot): void {
    this._undo.push(before);
    this._redo = [];
    if (this._limit > 0 && this._undo.length > this._limit) {
      this._undo.splice(0, this._undo.length - this._limit);
    }
  }

  /** Step back from `current`. Returns the state to restore, if any. */
  undo(current: Snapshot): Snapshot | undefined {
    const previous = this._undo.pop();
    if (previous) this._redo.push(current);
    return previous;
  }

  redo(current: Snapshot): Snapshot | undefined {
    const next = this._redo.pop();
    if (next) this._undo.push(current);
    return next;
  }
}
