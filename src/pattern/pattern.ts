/**
 * Byte patterns: literal bytes mixed with single-byte wildcards.
 *
 * Patterns are typed either as hex (`00 ?? 22`) or as literal text
 * (`PK\x03\x04`, `ab\?d`). Both compile to the same token list; matching
 * only ever sees tokens.
 */

import type { ByteRange } from "../buffer/types.ts";
import type { Rope, ByteReader } from "../buffer/rope.ts";
import { hexByte, hexDigitValue } from "../buffer/hex.ts";
import { type EditorError, invalidPattern } from "../common/errors.ts";
import { Err, Ok, type Result } from "../common/result.ts";

export type PatternEncoding = "hex" | "literal";

export type PatternToken =
  | { readonly kind: "byte"; readonly value: number }
  | { readonly kind: "wildcard" };

export interface Pattern {
  readonly tokens: readonly PatternToken[];
}

const WILDCARD: PatternToken = { kind: "wildcard" };

const utf8 = new TextEncoder();

function byteToken(value: number): PatternToken {
  return { kind: "byte", value };
}

// =============================================================================
// Compilation
// =============================================================================

export function compilePattern(
  input: string,
  encoding: PatternEncoding,
): Result<Pattern, EditorError> {
  return encoding === "hex" ? compileHex(input) : compileLiteral(input);
}

function compileHex(input: string): Result<Pattern, EditorError> {
  const digits = input.replace(/\s+/g, "");
  if (digits.length % 2 !== 0) {
    return Err(invalidPattern("odd number of hex digits"));
  }

  const tokens: PatternToken[] = [];
  for (let i = 0; i < digits.length; i += 2) {
    const pair = digits.slice(i, i + 2);
    if (pair === "??" || pair === "**") {
      tokens.push(WILDCARD);
      continue;
    }
    const hi = hexDigitValue(pair.charAt(0));
    const lo = hexDigitValue(pair.charAt(1));
    if (hi === undefined || lo === undefined) {
      if (/[?*]/.test(pair)) {
        return Err(invalidPattern(`incomplete wildcard "${pair}"`));
      }
      return Err(invalidPattern(`invalid hex byte "${pair}"`));
    }
    tokens.push(byteToken((hi << 4) | lo));
  }
  return Ok({ tokens });
}

function compileLiteral(input: string): Result<Pattern, EditorError> {
  const tokens: PatternToken[] = [];
  const chars = Array.from(input);

  for (let i = 0; i < chars.length; i++) {
    const ch = chars[i] ?? "";
    if (ch !== "\\") {
      for (const b of utf8.encode(ch)) tokens.push(byteToken(b));
      continue;
    }

    const escape = chars[i + 1];
    switch (escape) {
      case undefined:
        return Err(invalidPattern("unterminated escape"));
      case "?":
        tokens.push(WILDCARD);
        i += 1;
        break;
      case "\\":
        tokens.push(byteToken(0x5c));
        i += 1;
        break;
      case "0":
        tokens.push(byteToken(0));
        i += 1;
        break;
      case "x": {
        const hi = hexDigitValue(chars[i + 2] ?? "");
        const lo = hexDigitValue(chars[i + 3] ?? "");
        if (hi === undefined || lo === undefined) {
          return Err(invalidPattern("unterminated escape \\x"));
        }
        tokens.push(byteToken((hi << 4) | lo));
        i += 3;
        break;
      }
      default:
        return Err(invalidPattern(`unknown escape \\${escape}`));
    }
  }
  return Ok({ tokens });
}

/** Render a pattern as text that compiles back to it under `encoding`. */
export function formatPattern(pattern: Pattern, encoding: PatternEncoding): string {
  if (encoding === "hex") {
    return pattern.tokens
      .map((token) => (token.kind === "wildcard" ? "??" : hexByte(token.value)))
      .join(" ");
  }

  let out = "";
  for (const token of pattern.tokens) {
    if (token.kind === "wildcard") {
      out += "\\?";
    } else if (token.value === 0x5c) {
      out += "\\\\";
    } else if (token.value === 0) {
      out += "\\0";
    } else if (token.value >= 0x20 && token.value < 0x7f) {
      out += String.fromCharCode(token.value);
    } else {
      out += `\\x${hexByte(token.value)}`;
    }
  }
  return out;
}

// =============================================================================
// Matching
// =============================================================================

function matchesAt(reader: ByteReader, tokens: readonly PatternToken[], offset: number): boolean {
  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    if (token === undefined || token.kind === "wildcard") continue;
    if (reader.at(offset + i) !== token.value) return false;
  }
  return true;
}

function* scan(
  rope: Rope,
  tokens: readonly PatternToken[],
  start: number,
  end: number,
): Generator<ByteRange> {
  const width = tokens.length;
  if (width === 0) return;
  const reader = rope.reader();
  let pos = start;
  while (pos + width <= end) {
    if (matchesAt(reader, tokens, pos)) {
      yield { start: pos, end: pos + width };
      pos += width;
    } else {
      pos += 1;
    }
  }
}

/**
 * Non-overlapping matches of `pattern` inside `range` (default: the whole
 * rope), in ascending order. Each iteration rescans from the start.
 */
export function findAll(rope: Rope, pattern: Pattern, range?: ByteRange): Iterable<ByteRange> {
  const start = Math.max(0, range?.start ?? 0);
  const end = Math.min(rope.length, range?.end ?? rope.length);
  return { [Symbol.iterator]: () => scan(rope, pattern.tokens, start, end) };
}
