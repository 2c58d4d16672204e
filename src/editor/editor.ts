/**
 * Editor: the modal interpreter that ties sessions, selections, registers
 * and edits together.
 *
 * Keys arrive one at a time through `handleKey`. Each key either updates
 * pending input (count, prefix, half-typed byte, prompt text) or completes a
 * command, which is applied to the current session in one step. Errors
 * become status messages; state is left as it was.
 */

import { hexDigitValue } from "../buffer/hex.ts";
import { describeError, type EditorError } from "../common/errors.ts";
import type { Result } from "../common/result.ts";
import { log } from "../node/log.ts";
import { compilePattern, formatPattern, type Pattern } from "../pattern/pattern.ts";
import { openPath, runCommandLine, type CommandContext } from "./commands.ts";
import { countValue, formatCount, NO_COUNT, updateCount } from "./count.ts";
import { formatKey } from "./key-notation.ts";
import {
  jumpKeyToTarget,
  normalKeyToCommand,
  promptKeyToAction,
  splitKeyToCommand,
  typingKeyToAction,
} from "./keymap.ts";
import { EMPTY_LINE, editLine, insertText } from "./line-input.ts";
import {
  deleteSelections,
  eraseAtInsertion,
  eraseBeforeInsertion,
  insertAtSelections,
  pasteRegister,
  replaceSelections,
  yankSelections,
} from "./operations.ts";
import { DEFAULT_REGISTER } from "./registers.ts";
import {
  collapseToCursor,
  coveredRange,
  coveredRanges,
  cycleMain,
  dropAt,
  dropMain,
  jumpTarget,
  jumpTo,
  keepOnly,
  keepOnlyMain,
  mainSelection,
  moveBy,
  selectAll,
  selectMatching,
  split,
  swapEnds,
} from "./selection.ts";
import { BufferSession, type SessionId, SessionList } from "./session.ts";
import type {
  Direction,
  EditorCommand,
  Encoding,
  FileStore,
  KeyEvent,
  Mode,
  NormalMode,
  PatternPurpose,
  SelectionSet,
  StatusMessage,
} from "./types.ts";

export const DEFAULT_BYTES_PER_LINE = 16;

export interface EditorOptions {
  readonly store: FileStore;
  /** Row width for up/down movement and row start/end jumps. */
  readonly bytesPerLine?: number;
  /** Undo depth per session; 0 is unbounded. */
  readonly historyLimit?: number;
}

const utf8 = new TextEncoder();

function normalMode(): NormalMode {
  return { kind: "normal", count: NO_COUNT, pending: { kind: "none" }, register: DEFAULT_REGISTER };
}

export class Editor {
  readonly bytesPerLine: number;
  readonly historyLimit: number;
  private readonly _store: FileStore;
  private readonly _sessions: SessionList;
  private _mode: Mode = normalMode();
  private readonly _messages: StatusMessage[] = [];
  private _onChange: (() => void) | null = null;

  constructor(options: EditorOptions) {
    this._store = options.store;
    this.bytesPerLine = Math.max(1, Math.trunc(options.bytesPerLine ?? DEFAULT_BYTES_PER_LINE));
    this.historyLimit = Math.max(0, Math.trunc(options.historyLimit ?? 0));
    this._sessions = new SessionList(new BufferSession({ historyLimit: this.historyLimit }));
  }

  // ===========================================================================
  // State
  // ===========================================================================

  get session(): BufferSession {
    return this._sessions.current;
  }

  get sessions(): SessionList {
    return this._sessions;
  }

  get mode(): Mode {
    return this._mode;
  }

  get isQuitting(): boolean {
    return this._mode.kind === "quitting";
  }

  /** Every status message reported so far, oldest first. */
  get messages(): readonly StatusMessage[] {
    return this._messages;
  }

  get lastMessage(): StatusMessage | undefined {
    return this._messages[this._messages.length - 1];
  }

  /** Mode label for the status line, e.g. `NORMAL (12)` or `INSERT (hex)`. */
  get modeName(): string {
    const mode = this._mode;
    switch (mode.kind) {
      case "normal":
        return normalModeName(mode);
      case "insert": {
        const label = mode.placement === "insert" ? "INSERT" : "APPEND";
        return `${label} (${nibbleLabel(mode.encoding, mode.nibble)})`;
      }
      case "replace":
        return `REPLACE (${nibbleLabel(mode.encoding, mode.nibble)})`;
      case "pattern":
        return `${mode.purpose.toUpperCase()} (${mode.encoding})`;
      case "command":
        return "COMMAND";
      case "quitting":
        return "QUITTING";
    }
  }

  /** Set a callback to be notified after every key. */
  onChange(cb: () => void): void {
    this._onChange = cb;
  }

  // ===========================================================================
  // Files
  // ===========================================================================

  /**
   * Open files as sessions, the first becoming current. The initial scratch
   * session is dropped when at least one file opened and it is untouched.
   */
  openFiles(paths: readonly string[]): EditorError[] {
    const scratchId = this._sessions.currentId;
    const scratch = this._sessions.current;
    const errors: EditorError[] = [];
    let first: SessionId | undefined;

    for (const path of paths) {
      const opened = this.open(path);
      if (opened.success) first ??= opened.data;
      else errors.push(opened.error);
    }

    if (first) {
      this._sessions.switchTo(first);
      if (scratch.path === undefined && !scratch.dirty && scratch.rope.length === 0) {
        this._sessions.remove(scratchId);
      }
    }
    return errors;
  }

  /** Open (or switch to) `path`, reporting the outcome as a status message. */
  open(path: string): Result<SessionId, EditorError> {
    const result = openPath(this._commandContext(), path);
    if (!result.success) {
      this._report(result.error);
      return result;
    }
    if (result.data.message) this._info(result.data.message);
    return { success: true, data: this._sessions.currentId };
  }

  // ===========================================================================
  // Keys
  // ===========================================================================

  handleKeys(events: Iterable<KeyEvent>): void {
    for (const event of events) this.handleKey(event);
  }

  handleKey(event: KeyEvent): void {
    const mode = this._mode;
    log.debug("key", formatKey(event), this.modeName);
    switch (mode.kind) {
      case "normal":
        this._normalKey(mode, event);
        break;
      case "insert":
        this._insertKey(mode, event);
        break;
      case "replace":
        this._replaceKey(mode, event);
        break;
      case "pattern":
        this._patternKey(mode, event);
        break;
      case "command":
        this._commandKey(mode, event);
        break;
      case "quitting":
        break;
    }
    this._onChange?.();
  }

  private _normalKey(mode: NormalMode, event: KeyEvent): void {
    if (event.key === "Escape") {
      this._mode = normalMode();
      return;
    }

    switch (mode.pending.kind) {
      case "jump": {
        const target = jumpKeyToTarget(event);
        this._mode = normalMode();
        if (target) this.dispatch({ type: "jump", target, extend: mode.pending.extend });
        return;
      }
      case "split": {
        const command = splitKeyToCommand(event);
        if (command) {
          this._mode = { ...mode, pending: { kind: "none" } };
          this.dispatch(command);
        } else {
          this._mode = normalMode();
        }
        return;
      }
      case "register": {
        const named = !event.ctrl && !event.alt && Array.from(event.key).length === 1;
        this._mode = named
          ? { ...mode, pending: { kind: "none" }, register: event.key }
          : normalMode();
        return;
      }
      case "none":
        break;
    }

    const count = updateCount(mode.count, event);
    if (count) {
      this._mode = { ...mode, count };
      return;
    }

    const command = normalKeyToCommand(event);
    if (command) this.dispatch(command);
  }

  private _insertKey(mode: Extract<Mode, { kind: "insert" }>, event: KeyEvent): void {
    const action = typingKeyToAction(event);
    if (!action) return;
    const session = this.session;

    switch (action.type) {
      case "escape":
        this._leaveEditGroup();
        return;
      case "null":
        this._mode = { ...mode, nibble: undefined };
        session.apply(insertAtSelections(session.rope, session.selections, Uint8Array.of(0), mode.placement));
        return;
      case "toggleEncoding":
        this._mode = { ...mode, encoding: mode.encoding === "hex" ? "ascii" : "hex", nibble: undefined };
        return;
      case "backspace":
        if (mode.nibble !== undefined) {
          this._mode = { ...mode, nibble: undefined };
          return;
        }
        session.apply(eraseBeforeInsertion(session.rope, session.selections, mode.placement));
        return;
      case "delete":
        session.apply(eraseAtInsertion(session.rope, session.selections, mode.placement));
        return;
      case "move":
        this._mode = { ...mode, nibble: undefined };
        this._move(action.direction, 1, false);
        return;
      case "char": {
        const typed = this._typeChar(mode.encoding, mode.nibble, action.char);
        if (!typed) return;
        this._mode = { ...mode, nibble: typed.nibble };
        if (typed.bytes) {
          session.apply(insertAtSelections(session.rope, session.selections, typed.bytes, mode.placement));
        }
        return;
      }
    }
  }

  private _replaceKey(mode: Extract<Mode, { kind: "replace" }>, event: KeyEvent): void {
    const action = typingKeyToAction(event);
    if (!action) return;
    const session = this.session;

    switch (action.type) {
      case "escape":
        this._leaveEditGroup();
        return;
      case "null":
        this._mode = { ...mode, nibble: undefined };
        session.apply(replaceSelections(session.rope, session.selections, 0));
        return;
      case "backspace":
        this._mode = { ...mode, nibble: undefined };
        return;
      case "move":
        this._mode = { ...mode, nibble: undefined };
        this._move(action.direction, 1, false);
        return;
      case "char": {
        const value = action.char.codePointAt(0) ?? 0;
        if (mode.encoding === "ascii" && value > 0xff) return;
        const typed = this._typeChar(mode.encoding, mode.nibble, action.char);
        if (!typed) return;
        this._mode = { ...mode, nibble: typed.nibble };
        const byte = mode.encoding === "ascii" ? value : typed.bytes?.[0];
        if (byte !== undefined) {
          session.apply(replaceSelections(session.rope, session.selections, byte));
        }
        return;
      }
      case "toggleEncoding":
      case "delete":
        return;
    }
  }

  /**
   * Interpret a typed character. ASCII entry yields its UTF-8 bytes; hex
   * entry yields a byte every second digit. Undefined for a non-hex digit.
   */
  private _typeChar(
    encoding: Encoding,
    nibble: number | undefined,
    char: string,
  ): { bytes: Uint8Array | undefined; nibble: number | undefined } | undefined {
    if (encoding === "ascii") return { bytes: utf8.encode(char), nibble: undefined };
    const digit = hexDigitValue(char);
    if (digit === undefined) return undefined;
    if (nibble === undefined) return { bytes: undefined, nibble: digit };
    return { bytes: Uint8Array.of((nibble << 4) | digit), nibble: undefined };
  }

  private _patternKey(mode: Extract<Mode, { kind: "pattern" }>, event: KeyEvent): void {
    const action = promptKeyToAction(event);
    if (!action) {
      const input = editLine(mode.input, event);
      if (input) this._mode = { ...mode, input };
      return;
    }

    switch (action.type) {
      case "cancel":
        this._mode = normalMode();
        return;
      case "wildcard":
        this._mode = { ...mode, input: insertText(mode.input, mode.encoding === "hex" ? "??" : "\\?") };
        return;
      case "null":
        this._mode = { ...mode, input: insertText(mode.input, mode.encoding === "hex" ? "00" : "\\0") };
        return;
      case "toggleEncoding": {
        const compiled = compilePattern(mode.input.text, mode.encoding);
        if (!compiled.success) {
          this._report(compiled.error);
          return;
        }
        const encoding = mode.encoding === "hex" ? "literal" : "hex";
        const text = formatPattern(compiled.data, encoding);
        this._mode = { ...mode, encoding, input: { text, cursor: text.length } };
        return;
      }
      case "submit":
        this._submitPattern(mode);
        return;
    }
  }

  private _submitPattern(mode: Extract<Mode, { kind: "pattern" }>): void {
    const compiled = compilePattern(mode.input.text, mode.encoding);
    if (!compiled.success) {
      this._report(compiled.error);
      return;
    }
    this._mode = normalMode();
    const pattern = compiled.data;
    if (pattern.tokens.length === 0) return;

    this._applySelections(this._selectByPattern(mode.purpose, pattern));
  }

  private _selectByPattern(
    purpose: PatternPurpose,
    pattern: Pattern,
  ): Result<SelectionSet, EditorError> {
    const { rope, selections } = this.session;
    switch (purpose) {
      case "search":
        return selectMatching(rope, selections, pattern, [{ start: 0, end: rope.length }]);
      case "select":
        return selectMatching(rope, selections, pattern, coveredRanges(rope, selections));
      case "split":
        return split(rope, selections, { kind: "pattern", pattern });
    }
  }

  private _commandKey(mode: Extract<Mode, { kind: "command" }>, event: KeyEvent): void {
    if (event.key === "Escape") {
      this._mode = normalMode();
      return;
    }
    if (event.key === "Enter" && !event.ctrl && !event.alt) {
      this._mode = normalMode();
      this.runCommand(mode.input.text);
      return;
    }
    const input = editLine(mode.input, event);
    if (input) this._mode = { ...mode, input };
  }

  // ===========================================================================
  // Commands
  // ===========================================================================

  /** Run a command-line verb as if typed after `:`. */
  runCommand(line: string): void {
    log.debug("command line", JSON.stringify(line));
    const result = runCommandLine(line, this._commandContext());
    if (!result.success) {
      this._report(result.error);
      return;
    }
    if (result.data.message) this._info(result.data.message);
    if (result.data.quit) this._mode = { kind: "quitting" };
  }

  /**
   * Execute a normal-mode command with the pending count and register.
   * Pending input is consumed.
   */
  dispatch(command: EditorCommand): void {
    const mode = this._mode.kind === "normal" ? this._mode : normalMode();
    const count = countValue(mode.count);
    const counted = mode.count.kind === "some";
    const register = mode.register;
    const session = this.session;
    const { rope, selections } = session;

    log.debug("dispatch", command.type, counted ? `count=${count}` : "", `register=${register}`);
    this._mode = normalMode();

    switch (command.type) {
      case "move":
        this._move(command.direction, count, command.extend);
        break;

      case "beginJump":
        if (counted) {
          session.setSelections(jumpTo(rope, selections, count, command.extend));
        } else {
          this._mode = { ...mode, pending: { kind: "jump", extend: command.extend } };
        }
        break;

      case "jump":
        session.setSelections(
          jumpTo(rope, selections, jumpTarget(command.target, this.bytesPerLine), command.extend),
        );
        break;

      case "beginSplit":
        this._mode = { ...mode, pending: { kind: "split" } };
        break;

      case "beginRegister":
        this._mode = { ...mode, pending: { kind: "register" } };
        break;

      case "split":
        if (command.unit === "width") {
          this._applySelections(split(rope, selections, { kind: "width", width: command.width * count }));
        } else {
          this._applySelections(split(rope, selections, { kind: "null" }));
        }
        break;

      case "promptPattern":
        this._mode = {
          kind: "pattern",
          encoding: command.encoding,
          purpose: command.purpose,
          input: EMPTY_LINE,
        };
        break;

      case "collapse":
        session.setSelections(collapseToCursor(rope, selections));
        break;

      case "swapEnds":
        session.setSelections(swapEnds(rope, selections));
        break;

      case "selectAll":
        session.setSelections(selectAll(rope));
        break;

      case "keepMain":
        session.setSelections(counted && count > 0 ? keepOnly(selections, count - 1) : keepOnlyMain(selections));
        break;

      case "dropMain":
        this._applySelections(counted && count > 0 ? dropAt(selections, count - 1) : dropMain(selections));
        break;

      case "cycleMain":
        session.setSelections(cycleMain(selections, command.direction, count));
        break;

      case "yank":
        session.registers.write(register, yankSelections(rope, selections));
        break;

      case "delete":
        session.registers.write(register, yankSelections(rope, selections));
        session.apply(deleteSelections(rope, selections));
        break;

      case "change":
        session.registers.write(register, yankSelections(rope, selections));
        session.beginGroup();
        session.apply(deleteSelections(rope, selections));
        this._mode = { kind: "insert", encoding: command.encoding, placement: "insert", nibble: undefined };
        break;

      case "paste":
        session.apply(
          pasteRegister(rope, selections, session.registers.read(register), command.placement, count),
        );
        break;

      case "insert":
        session.beginGroup();
        this._mode = {
          kind: "insert",
          encoding: command.encoding,
          placement: command.placement,
          nibble: undefined,
        };
        break;

      case "replace":
        session.beginGroup();
        this._mode = { kind: "replace", encoding: command.encoding, nibble: undefined };
        break;

      case "measure": {
        const range = coveredRange(rope, mainSelection(selections));
        const length = range.end - range.start;
        this._info(`${length} = 0x${length.toString(16)} bytes`);
        break;
      }

      case "undo":
        if (!session.undo()) this._info("nothing left to undo");
        break;

      case "redo":
        if (!session.redo()) this._info("nothing left to redo");
        break;

      case "commandLine":
        this._mode = { kind: "command", input: EMPTY_LINE };
        break;
    }
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  private _move(direction: Direction, count: number, extend: boolean): void {
    const session = this.session;
    const step = direction === "up" || direction === "down" ? this.bytesPerLine : 1;
    const sign = direction === "left" || direction === "up" ? -1 : 1;
    session.setSelections(moveBy(session.rope, session.selections, sign * step * count, extend));
  }

  private _applySelections(result: Result<SelectionSet, EditorError>): void {
    if (result.success) this.session.setSelections(result.data);
    else this._report(result.error);
  }

  private _leaveEditGroup(): void {
    this.session.endGroup();
    this._mode = normalMode();
  }

  private _commandContext(): CommandContext {
    return { sessions: this._sessions, store: this._store, historyLimit: this.historyLimit };
  }

  private _report(error: EditorError): void {
    const text = describeError(error);
    if (error.kind === "IoFailure") log.error(text);
    else log.debug(error.kind, text);
    this._messages.push({ level: "error", text, error });
  }

  private _info(text: string): void {
    this._messages.push({ level: "info", text });
  }
}

function normalModeName(mode: NormalMode): string {
  switch (mode.pending.kind) {
    case "jump":
      return mode.pending.extend ? "EXTEND" : "JUMP";
    case "split":
      return `SPLIT${formatCount(mode.count)}`;
    case "register":
      return "REGISTER";
    case "none":
      return `NORMAL${formatCount(mode.count)}`;
  }
}

function nibbleLabel(encoding: Encoding, nibble: number | undefined): string {
  if (encoding === "ascii") return "ascii";
  return nibble === undefined ? "hex" : `hex: ${nibble.toString(16)}...`;
}
