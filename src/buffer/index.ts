export { ByteReader, Rope } from "./rope.ts";
export { formatHex, hexByte, hexDigitValue, parseHex } from "./hex.ts";
export { keysEqual, SlotMap } from "./slot_map.ts";
export type { SlotKey } from "./slot_map.ts";
export { OutOfBoundsError } from "./types.ts";
export type { ByteRange, Splice } from "./types.ts";
