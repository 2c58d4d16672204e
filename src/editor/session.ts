/**
 * Buffer sessions: one open file (or scratch buffer) each, plus the list of
 * open sessions and which one is current.
 */

import { Rope } from "../buffer/rope.ts";
import { keysEqual, type SlotKey, SlotMap } from "../buffer/slot_map.ts";
import { History, type Snapshot } from "./history.ts";
import { RegisterStore } from "./registers.ts";
import { createSelectionSet, initialSelectionSet } from "./selection.ts";
import type { EditResult, SelectionSet } from "./types.ts";

export interface SessionOptions {
  readonly rope?: Rope;
  readonly path?: string;
  readonly historyLimit?: number;
}

export class BufferSession {
  readonly registers = new RegisterStore();
  private readonly _history: History;
  private _rope: Rope;
  private _selections: SelectionSet;
  private _path: string | undefined;
  private _savedRope: Rope;
  /** Set while an insert/replace/change group is open. */
  private _group: { recorded: boolean } | undefined;

  constructor(options: SessionOptions = {}) {
    this._rope = options.rope ?? Rope.empty();
    this._savedRope = this._rope;
    this._path = options.path;
    this._selections = initialSelectionSet();
    this._history = new History(options.historyLimit);
  }

  get rope(): Rope {
    return this._rope;
  }

  get selections(): SelectionSet {
    return this._selections;
  }

  get path(): string | undefined {
    return this._path;
  }

  /** Display name for status output. */
  get name(): string {
    return this._path ?? "[scratch]";
  }

  /** The rope differs from the version last loaded or written. */
  get dirty(): boolean {
    return this._rope !== this._savedRope;
  }

  get history(): History {
    return this._history;
  }

  setSelections(selections: SelectionSet): void {
    this._selections = createSelectionSet(this._rope, selections.selections, selections.mainIndex);
  }

  /**
   * Make `result` current. A changed rope records an undo step, except
   * inside an open group after its first change.
   */
  apply(result: EditResult): void {
    if (result.rope !== this._rope) {
      if (!this._group?.recorded) this._history.record(this._snapshot());
      if (this._group) this._group.recorded = true;
    }
    this._rope = result.rope;
    this._selections = result.selections;
  }

  /** Collect edits until `endGroup` into one undo step. */
  beginGroup(): void {
    this._group ??= { recorded: false };
  }

  endGroup(): void {
    this._group = undefined;
  }

  undo(): boolean {
    return this._restore(this._history.undo(this._snapshot()));
  }

  redo(): boolean {
    return this._restore(this._history.redo(this._snapshot()));
  }

  /** The current rope was written (optionally under a new path). */
  markSaved(path?: string): void {
    if (path !== undefined) this._path = path;
    this._savedRope = this._rope;
  }

  private _snapshot(): Snapshot {
    return { rope: this._rope, selections: this._selections };
  }

  private _restore(snapshot: Snapshot | undefined): boolean {
    if (!snapshot) return false;
    this.endGroup();
    this._rope = snapshot.rope;
    this._selections = snapshot.selections;
    return true;
  }
}

// =============================================================================
// Session list
// =============================================================================

export type SessionId = SlotKey;

/** Open sessions in opening order. Never empty. */
export class SessionList {
  private readonly _sessions = new SlotMap<BufferSession>();
  private readonly _order: SessionId[] = [];
  private _currentId: SessionId;

  constructor(initial: BufferSession) {
    this._currentId = this._add(initial);
  }

  get size(): number {
    return this._sessions.size;
  }

  get currentId(): SessionId {
    return this._currentId;
  }

  get current(): BufferSession {
    const session = this._sessions.get(this._currentId);
    if (!session) throw new Error("current session is missing from the session list");
    return session;
  }

  get(id: SessionId): BufferSession | undefined {
    return this._sessions.get(id);
  }

  /** Sessions in opening order. */
  all(): BufferSession[] {
    const sessions: BufferSession[] = [];
    for (const id of this._order) {
      const session = this._sessions.get(id);
      if (session) sessions.push(session);
    }
    return sessions;
  }

  findByPath(path: string): SessionId | undefined {
    return this._order.find((id) => this._sessions.get(id)?.path === path);
  }

  /** Add a session and make it current. */
  open(session: BufferSession): SessionId {
    this._currentId = this._add(session);
    return this._currentId;
  }

  switchTo(id: SessionId): boolean {
    if (!this._sessions.has(id)) return false;
    this._currentId = id;
    return true;
  }

  /**
   * Remove a session. The last remaining session cannot be removed. When the
   * current one goes, the session after it (or else before it) becomes current.
   */
  remove(id: SessionId): boolean {
    const position = this._order.findIndex((other) => keysEqual(other, id));
    if (position === -1 || this._order.length <= 1) return false;

    this._sessions.remove(id);
    this._order.splice(position, 1);
    if (keysEqual(this._currentId, id)) {
      const next = this._order[Math.min(position, this._order.length - 1)];
      if (next) this._currentId = next;
    }
    return true;
  }

  private _add(session: BufferSession): SessionId {
    const id = this._sessions.insert(session);
    this._order.push(id);
    return id;
  }
}
