/** Hex rendering and parsing for status output and test fixtures. */

const HEX_DIGITS = "0123456789abcdef";

export function hexByte(value: number): string {
  return (HEX_DIGITS[(value >> 4) & 0xf] ?? "0") + (HEX_DIGITS[value & 0xf] ?? "0");
}

/** `de ad be ef` */
export function formatHex(bytes: Iterable<number>): string {
  const parts: string[] = [];
  for (const b of bytes) parts.push(hexByte(b));
  return parts.join(" ");
}

/** Value of a single hex digit character, or undefined. */
export function hexDigitValue(ch: string): number | undefined {
  if (ch.length !== 1) return undefined;
  const value = HEX_DIGITS.indexOf(ch.toLowerCase());
  return value === -1 ? undefined : value;
}

/**
 * Parse whitespace-separated hex (`"de ad be ef"`, `"deadbeef"`).
 * Returns undefined on an odd digit count or a non-hex character.
 */
export function parseHex(text: string): Uint8Array | undefined {
  const digits = text.replace(/\s+/g, "");
  if (digits.length % 2 !== 0) return undefined;
  const out = new Uint8Array(digits.length / 2);
  for (let i = 0; i < out.length; i++) {
    const hi = hexDigitValue(digits.charAt(i * 2));
    const lo = hexDigitValue(digits.charAt(i * 2 + 1));
    if (hi === undefined || lo === undefined) return undefined;
    out[i] = (hi << 4) | lo;
  }
  return out;
}
