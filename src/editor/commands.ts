/**
 * Command-line verbs (`:q`, `:w out.bin`, `:e other.bin`, ...).
 */

import { Rope } from "../buffer/rope.ts";
import {
  dirtyBufferClose,
  type EditorError,
  ioFailure,
  unknownCommand,
} from "../common/errors.ts";
import { Err, Ok, type Result } from "../common/result.ts";
import { BufferSession, type SessionList } from "./session.ts";
import type { FileStore } from "./types.ts";

export interface CommandContext {
  readonly sessions: SessionList;
  readonly store: FileStore;
  readonly historyLimit: number;
}

export interface CommandOutcome {
  /** The editor should stop. */
  readonly quit: boolean;
  readonly message?: string;
}

type CommandHandler = (ctx: CommandContext, arg: string) => Result<CommandOutcome, EditorError>;

const UNSAVED = "Unsaved changes! Run :wq or :q! instead.";

const CONTINUE: CommandOutcome = { quit: false };

// =============================================================================
// Handlers
// =============================================================================

function writeSession(
  ctx: CommandContext,
  session: BufferSession,
  target?: string,
): Result<string, EditorError> {
  const path = target || session.path;
  if (!path) return Err(ioFailure("buffer has no path", undefined));
  try {
    ctx.store.write(path, session.rope.toBytes());
  } catch (error) {
    return Err(ioFailure(`write to ${path} failed`, error));
  }
  session.markSaved(target || undefined);
  return Ok(path);
}

/** Close the current session; closing the only one quits. */
function closeCurrent(ctx: CommandContext, force: boolean): Result<CommandOutcome, EditorError> {
  const { sessions } = ctx;
  if (!force && sessions.current.dirty) return Err(dirtyBufferClose(UNSAVED));
  if (sessions.size <= 1) return Ok({ quit: true });
  sessions.remove(sessions.currentId);
  return Ok(CONTINUE);
}

/** Close the current session; closing the only one leaves a scratch buffer. */
function deleteBuffer(ctx: CommandContext, force: boolean): Result<CommandOutcome, EditorError> {
  const { sessions } = ctx;
  if (!force && sessions.current.dirty) return Err(dirtyBufferClose(UNSAVED));
  const closing = sessions.currentId;
  if (sessions.size <= 1) {
    sessions.open(new BufferSession({ historyLimit: ctx.historyLimit }));
  }
  sessions.remove(closing);
  return Ok(CONTINUE);
}

function write(ctx: CommandContext, arg: string): Result<CommandOutcome, EditorError> {
  const session = ctx.sessions.current;
  const written = writeSession(ctx, session, arg);
  if (!written.success) return written;
  return Ok({ quit: false, message: `wrote ${session.rope.length} bytes to ${written.data}` });
}

function writeAll(ctx: CommandContext): Result<CommandOutcome, EditorError> {
  let count = 0;
  for (const session of ctx.sessions.all()) {
    if (session.path === undefined) continue;
    const written = writeSession(ctx, session);
    if (!written.success) return written;
    count++;
  }
  return Ok({ quit: false, message: `wrote ${count} buffer${count === 1 ? "" : "s"}` });
}

function writeQuit(ctx: CommandContext, arg: string): Result<CommandOutcome, EditorError> {
  const written = writeSession(ctx, ctx.sessions.current, arg);
  if (!written.success) return written;
  return closeCurrent(ctx, true);
}

/**
 * Switch to the session for `path`, or open it as a new one. A missing file
 * gives an empty session bound to the path.
 */
export function openPath(ctx: CommandContext, path: string): Result<CommandOutcome, EditorError> {
  if (!path) return Err(ioFailure("edit needs a file path", undefined));

  const existing = ctx.sessions.findByPath(path);
  if (existing) {
    ctx.sessions.switchTo(existing);
    return Ok(CONTINUE);
  }

  let bytes: Uint8Array | undefined;
  try {
    bytes = ctx.store.read(path);
  } catch (error) {
    return Err(ioFailure(`cannot open ${path}`, error));
  }
  const rope = bytes ? Rope.from(bytes) : Rope.empty();
  ctx.sessions.open(new BufferSession({ rope, path, historyLimit: ctx.historyLimit }));
  return Ok(bytes ? CONTINUE : { quit: false, message: `new file ${path}` });
}

const COMMANDS: ReadonlyMap<string, CommandHandler> = new Map<string, CommandHandler>([
  ["q", (ctx) => closeCurrent(ctx, false)],
  ["quit", (ctx) => closeCurrent(ctx, false)],
  ["q!", (ctx) => closeCurrent(ctx, true)],
  ["quit!", (ctx) => closeCurrent(ctx, true)],
  ["w", write],
  ["write", write],
  ["wa", writeAll],
  ["write-all", writeAll],
  ["wq", writeQuit],
  ["e", openPath],
  ["edit", openPath],
  ["db", (ctx) => deleteBuffer(ctx, false)],
  ["delete-buffer", (ctx) => deleteBuffer(ctx, false)],
  ["db!", (ctx) => deleteBuffer(ctx, true)],
  ["delete-buffer!", (ctx) => deleteBuffer(ctx, true)],
]);

// =============================================================================
// Entry point
// =============================================================================

/** Split `w out.bin` into verb and argument. */
export function parseCommandLine(line: string): { verb: string; arg: string } {
  const trimmed = line.trim();
  const space = trimmed.search(/\s/);
  if (space === -1) return { verb: trimmed, arg: "" };
  return { verb: trimmed.slice(0, space), arg: trimmed.slice(space + 1).trim() };
}

export function runCommandLine(
  line: string,
  ctx: CommandContext,
): Result<CommandOutcome, EditorError> {
  const { verb, arg } = parseCommandLine(line);
  if (verb === "") return Ok(CONTINUE);
  const handler = COMMANDS.get(verb);
  if (!handler) return Err(unknownCommand(verb));
  return handler(ctx, arg);
}

export function commandNames(): string[] {
  return [...COMMANDS.keys()];
}
