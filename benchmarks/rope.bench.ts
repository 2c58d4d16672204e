/**
 * Rope and pattern benchmarks.
 *
 * Targets:
 * - splice/slice on a 16 MiB rope: <0.1ms
 * - building a 1 MiB rope: <5ms
 */

import { Rope } from "../src/buffer/rope.ts";
import { compilePattern, findAll, type Pattern } from "../src/pattern/pattern.ts";
import type { BenchmarkSuite } from "./harness.ts";

const MiB = 1024 * 1024;

function noise(length: number): Uint8Array {
  const out = new Uint8Array(length);
  let state = 0x2545f491;
  for (let i = 0; i < length; i++) {
    state ^= state << 13;
    state ^= state >>> 17;
    state ^= state << 5;
    out[i] = state & 0xff;
  }
  return out;
}

function pattern(input: string): Pattern {
  const result = compilePattern(input, "hex");
  if (!result.success) throw new Error(result.error.message);
  return result.data;
}

const big = Rope.from(noise(16 * MiB));
const oneMiB = noise(MiB);
const needle = pattern("de ad ?? ef");
let offset = 0;

function nextOffset(): number {
  offset = (offset + 7_340_033) % big.length;
  return offset;
}

export const ropeBenchmarks: BenchmarkSuite = {
  name: "Rope",
  benchmarks: [
    {
      name: "Rope.from 1 MiB",
      fn: () => {
        Rope.from(oneMiB.slice());
      },
      iterations: 100,
      targetMs: 5,
    },
    {
      name: "insert 4 bytes into 16 MiB",
      fn: () => {
        big.insert(nextOffset(), Uint8Array.of(1, 2, 3, 4));
      },
      iterations: 10_000,
      targetMs: 0.1,
    },
    {
      name: "delete 4 KiB from 16 MiB",
      fn: () => {
        const at = Math.min(nextOffset(), big.length - 4096);
        big.delete(at, at + 4096);
      },
      iterations: 10_000,
      targetMs: 0.1,
    },
    {
      name: "slice 256 bytes from 16 MiB",
      fn: () => {
        const at = Math.min(nextOffset(), big.length - 256);
        big.slice(at, at + 256);
      },
      iterations: 10_000,
      targetMs: 0.1,
    },
    {
      name: "1000 sequential single-byte appends",
      fn: () => {
        let rope = Rope.empty();
        for (let i = 0; i < 1000; i++) rope = rope.insert(rope.length, Uint8Array.of(i & 0xff));
      },
      iterations: 100,
      targetMs: 5,
    },
    {
      name: "findAll with a wildcard over 1 MiB",
      fn: () => {
        const slice = Rope.from(oneMiB);
        for (const _match of findAll(slice, needle)) {
          // drain
        }
      },
      iterations: 20,
      targetMs: 50,
    },
  ],
};
