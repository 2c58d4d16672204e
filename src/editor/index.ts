export { commandNames, openPath, parseCommandLine, runCommandLine } from "./commands.ts";
export type { CommandContext, CommandOutcome } from "./commands.ts";
export { countValue, formatCount, NO_COUNT, updateCount } from "./count.ts";
export type { CountState } from "./count.ts";
export { DEFAULT_BYTES_PER_LINE, Editor } from "./editor.ts";
export type { EditorOptions } from "./editor.ts";
export { History } from "./history.ts";
export type { Snapshot } from "./history.ts";
export { formatKey, formatKeys, parseKeys } from "./key-notation.ts";
export {
  jumpKeyToTarget,
  normalKeyToCommand,
  promptKeyToAction,
  splitKeyToCommand,
  typingKeyToAction,
} from "./keymap.ts";
export type { PromptAction, TypingAction } from "./keymap.ts";
export { EMPTY_LINE, editLine, insertText } from "./line-input.ts";
export type { LineInput } from "./line-input.ts";
export {
  deleteSelections,
  eraseAtInsertion,
  eraseBeforeInsertion,
  insertAtSelections,
  insertionPoint,
  pasteRegister,
  replaceSelections,
  yankSelections,
} from "./operations.ts";
export { DEFAULT_REGISTER, RegisterStore } from "./registers.ts";
export {
  collapseToCursor,
  coveredRange,
  coveredRanges,
  createSelectionSet,
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
  selection,
  selectMatching,
  split,
  swapEnds,
} from "./selection.ts";
export { BufferSession, SessionList } from "./session.ts";
export type { SessionId, SessionOptions } from "./session.ts";
export type {
  CycleDirection,
  Direction,
  EditorCommand,
  EditResult,
  Encoding,
  FileStore,
  InsertPlacement,
  JumpName,
  JumpTarget,
  KeyEvent,
  Mode,
  ModeKind,
  NormalMode,
  PastePlacement,
  PatternPurpose,
  Pending,
  Selection,
  SelectionSet,
  SplitUnit,
  StatusMessage,
} from "./types.ts";
