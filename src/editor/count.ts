/**
 * Numeric count prefix for normal-mode commands.
 *
 * Digits accumulate a decimal count; `x` toggles hex entry, in which
 * `a`-`f` are digits too. `Backspace` removes the last digit.
 */

import { hexDigitValue } from "../buffer/hex.ts";
import type { KeyEvent } from "./types.ts";

export type CountState =
  | { readonly kind: "none" }
  | { readonly kind: "some"; readonly hex: boolean; readonly value: number };

export const NO_COUNT: CountState = { kind: "none" };

/** The typed count, or 1 when none was typed. */
export function countValue(state: CountState): number {
  return state.kind === "some" ? state.value : 1;
}

/**
 * Feed one key to the count. Returns the new state, or undefined when the
 * key is not part of a count and should be handled as a command.
 */
export function updateCount(state: CountState, event: KeyEvent): CountState | undefined {
  if (event.ctrl || event.alt) return undefined;
  const { key } = event;

  if (key === "x") {
    if (state.kind === "none") return { kind: "some", hex: true, value: 0 };
    return { kind: "some", hex: !state.hex, value: state.value };
  }

  if (key === "Backspace") {
    if (state.kind === "none") return undefined;
    const radix = state.hex ? 16 : 10;
    if (state.value < radix) return NO_COUNT;
    return { kind: "some", hex: state.hex, value: Math.floor(state.value / radix) };
  }

  const digit = hexDigitValue(key);
  if (digit === undefined || key !== key.toLowerCase()) return undefined;
  const hex = state.kind === "some" && state.hex;
  if (digit > 9 && !hex) return undefined;

  const value = (state.kind === "some" ? state.value : 0) * (hex ? 16 : 10) + digit;
  if (value > Number.MAX_SAFE_INTEGER) return state;
  return { kind: "some", hex, value };
}

/** Status suffix: ` (12)`, ` (0x1f)`, ` (0x)`, or empty. */
export function formatCount(state: CountState): string {
  if (state.kind === "none") return "";
  if (!state.hex) return ` (${state.value})`;
  return state.value === 0 ? " (0x)" : ` (0x${state.value.toString(16)})`;
}
