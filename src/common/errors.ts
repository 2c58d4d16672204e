/**
 * Operator-facing error kinds.
 *
 * Every variant is recoverable: the interpreter reports it as a status
 * message and leaves buffer and selection state unchanged.
 */

export type EditorError =
  | { readonly kind: "InvalidPattern"; readonly message: string }
  | { readonly kind: "NoMatch"; readonly message: string }
  | { readonly kind: "EmptySelection"; readonly message: string }
  | { readonly kind: "DirtyBufferClose"; readonly message: string }
  | { readonly kind: "IoFailure"; readonly message: string; readonly cause: unknown }
  | { readonly kind: "UnknownCommand"; readonly message: string };

export type EditorErrorKind = EditorError["kind"];

export function invalidPattern(message: string): EditorError {
  return { kind: "InvalidPattern", message };
}

export function noMatch(message = "no match found"): EditorError {
  return { kind: "NoMatch", message };
}

export function emptySelection(message = "cannot remove the last selection"): EditorError {
  return { kind: "EmptySelection", message };
}

export function dirtyBufferClose(message: string): EditorError {
  return { kind: "DirtyBufferClose", message };
}

export function ioFailure(message: string, cause: unknown): EditorError {
  return { kind: "IoFailure", message, cause };
}

export function unknownCommand(name: string): EditorError {
  return { kind: "UnknownCommand", message: `Unknown command ${name}` };
}

/** Render an error for the status line. */
export function describeError(error: EditorError): string {
  if (error.kind === "IoFailure" && error.cause !== undefined) {
    const cause = error.cause instanceof Error ? error.cause.message : String(error.cause);
    return `${error.message}: ${cause}`;
  }
  return error.message;
}
