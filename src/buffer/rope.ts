/**
 * Rope: a height-balanced tree of byte chunks for O(log n) editing.
 *
 * Immutable: splice/insert/delete return new ropes that share every
 * untouched subtree with the rope they came from, so older versions (held by
 * undo history, registers, other callers) stay valid and unchanged.
 *
 * Leaves hold at most MAX_LEAF bytes and are never empty, except for the
 * single leaf of an empty rope. Branches are kept AVL-balanced by `join`,
 * which also merges neighbouring leaves while they fit in one chunk, so a
 * run of single-byte inserts does not degrade into one-byte leaves.
 */

import { OutOfBoundsError } from "./types.ts";

const MAX_LEAF = 1024;

const EMPTY_BYTES = new Uint8Array(0);

interface Leaf {
  readonly kind: "leaf";
  readonly bytes: Uint8Array;
  readonly length: number;
  readonly height: 0;
}

interface Branch {
  readonly kind: "branch";
  readonly left: RopeNode;
  readonly right: RopeNode;
  readonly length: number;
  readonly height: number;
}

type RopeNode = Leaf | Branch;

const EMPTY_LEAF: Leaf = { kind: "leaf", bytes: EMPTY_BYTES, length: 0, height: 0 };

// =============================================================================
// Node construction
// =============================================================================

function leaf(bytes: Uint8Array): Leaf {
  if (bytes.length === 0) return EMPTY_LEAF;
  return { kind: "leaf", bytes, length: bytes.length, height: 0 };
}

function branch(left: RopeNode, right: RopeNode): Branch {
  return {
    kind: "branch",
    left,
    right,
    length: left.length + right.length,
    height: Math.max(left.height, right.height) + 1,
  };
}

function concatBytes(a: Uint8Array, b: Uint8Array): Uint8Array {
  const out = new Uint8Array(a.length + b.length);
  out.set(a, 0);
  out.set(b, a.length);
  return out;
}

/**
 * Build a branch from two subtrees whose heights differ by at most two,
 * rotating once or twice to restore the AVL balance.
 */
function balance(left: RopeNode, right: RopeNode): RopeNode {
  if (left.height > right.height + 1 && left.kind === "branch") {
    const { left: ll, right: lr } = left;
    if (ll.height >= lr.height) return branch(ll, branch(lr, right));
    if (lr.kind === "branch") return branch(branch(ll, lr.left), branch(lr.right, right));
  }
  if (right.height > left.height + 1 && right.kind === "branch") {
    const { left: rl, right: rr } = right;
    if (rr.height >= rl.height) return branch(branch(left, rl), rr);
    if (rl.kind === "branch") return branch(branch(left, rl.left), branch(rl.right, rr));
  }
  return branch(left, right);
}

function edgeLeafLength(node: RopeNode, edge: "first" | "last"): number {
  let current = node;
  while (current.kind === "branch") {
    current = edge === "first" ? current.left : current.right;
  }
  return current.length;
}

/** Concatenate two trees. O(log n). */
function join(left: RopeNode, right: RopeNode): RopeNode {
  if (left.length === 0) return right;
  if (right.length === 0) return left;

  if (left.kind === "leaf" && right.kind === "leaf") {
    if (left.length + right.length <= MAX_LEAF) return leaf(concatBytes(left.bytes, right.bytes));
    return branch(left, right);
  }
  if (left.height > right.height + 1 && left.kind === "branch") {
    return balance(left.left, join(left.right, right));
  }
  if (right.height > left.height + 1 && right.kind === "branch") {
    return balance(join(left, right.left), right.right);
  }

  // Heights within one of each other: still merge the boundary leaves.
  if (right.kind === "leaf" && left.kind === "branch" && edgeLeafLength(left, "last") + right.length <= MAX_LEAF) {
    return balance(left.left, join(left.right, right));
  }
  if (left.kind === "leaf" && right.kind === "branch" && edgeLeafLength(right, "first") + left.length <= MAX_LEAF) {
    return balance(join(left, right.left), right.right);
  }
  return branch(left, right);
}

/** Split a tree at `offset` into `[0, offset)` and `[offset, length)`. */
function split(node: RopeNode, offset: number): [RopeNode, RopeNode] {
  if (offset <= 0) return [EMPTY_LEAF, node];
  if (offset >= node.length) return [node, EMPTY_LEAF];

  if (node.kind === "leaf") {
    // subarray shares memory; leaf bytes are never written after creation.
    return [leaf(node.bytes.subarray(0, offset)), leaf(node.bytes.subarray(offset))];
  }

  const leftLength = node.left.length;
  if (offset === leftLength) return [node.left, node.right];
  if (offset < leftLength) {
    const [a, b] = split(node.left, offset);
    return [a, join(b, node.right)];
  }
  const [a, b] = split(node.right, offset - leftLength);
  return [join(node.left, a), b];
}

function buildRange(leaves: readonly RopeNode[], lo: number, hi: number): RopeNode {
  if (hi - lo <= 1) return leaves[lo] ?? EMPTY_LEAF;
  const mid = (lo + hi) >>> 1;
  return branch(buildRange(leaves, lo, mid), buildRange(leaves, mid, hi));
}

/** Build a balanced tree over `bytes`, chunked into leaves. */
function build(bytes: Uint8Array): RopeNode {
  if (bytes.length === 0) return EMPTY_LEAF;
  const leaves: RopeNode[] = [];
  for (let pos = 0; pos < bytes.length; pos += MAX_LEAF) {
    leaves.push(leaf(bytes.subarray(pos, Math.min(pos + MAX_LEAF, bytes.length))));
  }
  return buildRange(leaves, 0, leaves.length);
}

function checkRange(start: number, end: number, length: number): void {
  if (
    !Number.isInteger(start) ||
    !Number.isInteger(end) ||
    start < 0 ||
    end > length ||
    start > end
  ) {
    throw new OutOfBoundsError(start, end, length);
  }
}

function* iterateChunks(root: RopeNode, start: number, end: number): Generator<Uint8Array> {
  if (start >= end) return;
  const stack: Array<{ node: RopeNode; offset: number }> = [{ node: root, offset: 0 }];
  while (stack.length > 0) {
    const top = stack.pop();
    if (!top) break;
    const { node, offset } = top;
    if (offset + node.length <= start || offset >= end) continue;

    if (node.kind === "leaf") {
      yield node.bytes.subarray(
        Math.max(0, start - offset),
        Math.min(node.length, end - offset),
      );
      continue;
    }
    // Right first so the left subtree is popped (and yielded) first.
    stack.push({ node: node.right, offset: offset + node.left.length });
    stack.push({ node: node.left, offset });
  }
}

// =============================================================================
// Rope
// =============================================================================

export class Rope {
  private readonly _root: RopeNode;

  private constructor(root: RopeNode) {
    this._root = root;
  }

  private static readonly _empty = new Rope(EMPTY_LEAF);

  static empty(): Rope {
    return Rope._empty;
  }

  /**
   * Build a rope over `bytes`. The rope takes ownership of the array: leaves
   * are views into it, so the caller must not write to it afterwards.
   */
  static from(bytes: Uint8Array): Rope {
    if (bytes.length === 0) return Rope._empty;
    return new Rope(build(bytes));
  }

  /** Build a rope from a list of byte values (convenience for small inputs). */
  static of(...values: number[]): Rope {
    return Rope.from(Uint8Array.from(values));
  }

  get length(): number {
    return this._root.length;
  }

  /** Tree height; a rope of n bytes has height O(log n). */
  get height(): number {
    return this._root.height;
  }

  byteAt(offset: number): number {
    checkRange(offset, offset + 1, this._root.length);
    return this.reader().at(offset);
  }

  /** Copy the bytes in `[start, end)`. */
  slice(start: number, end: number): Uint8Array {
    checkRange(start, end, this._root.length);
    const out = new Uint8Array(end - start);
    let pos = 0;
    for (const chunk of iterateChunks(this._root, start, end)) {
      out.set(chunk, pos);
      pos += chunk.length;
    }
    return out;
  }

  /**
   * Iterate the leaf slices covering `[start, end)` without copying.
   * The yielded arrays are views and must not be written to.
   */
  chunks(start = 0, end = this._root.length): Iterable<Uint8Array> {
    checkRange(start, end, this._root.length);
    const root = this._root;
    return { [Symbol.iterator]: () => iterateChunks(root, start, end) };
  }

  /** Replace `[start, end)` with `replacement`. Returns a new rope. */
  splice(start: number, end: number, replacement: Uint8Array = EMPTY_BYTES): Rope {
    checkRange(start, end, this._root.length);
    if (start === end && replacement.length === 0) return this;

    const [before, rest] = split(this._root, start);
    const [, after] = split(rest, end - start);
    // Copy so later writes to the caller's array cannot reach this version.
    const middle = build(replacement.slice());
    return new Rope(join(join(before, middle), after));
  }

  /** Insert bytes at an offset. Returns a new rope. */
  insert(offset: number, bytes: Uint8Array): Rope {
    return this.splice(offset, offset, bytes);
  }

  /** Delete a range [start, end). Returns a new rope. */
  delete(start: number, end: number): Rope {
    return this.splice(start, end);
  }

  /** All bytes as one array. O(n). */
  toBytes(): Uint8Array {
    return this.slice(0, this._root.length);
  }

  /** A cursor for random or sequential byte access. */
  reader(): ByteReader {
    return new ByteReader(this._root);
  }

  equals(other: Rope): boolean {
    if (other === this) return true;
    if (other.length !== this.length) return false;
    const a = this.reader();
    const b = other.reader();
    for (let i = 0; i < this.length; i++) {
      if (a.at(i) !== b.at(i)) return false;
    }
    return true;
  }

  /** Lengths of the leaves in order (empty for an empty rope). */
  leafLengths(): number[] {
    const lengths: number[] = [];
    for (const chunk of iterateChunks(this._root, 0, this._root.length)) {
      lengths.push(chunk.length);
    }
    return lengths;
  }
}

// =============================================================================
// ByteReader
// =============================================================================

/**
 * Byte access that caches the current leaf: sequential reads are amortised
 * O(1), a jump to another leaf costs one O(log n) descent.
 */
export class ByteReader {
  private readonly _root: RopeNode;
  private _leaf: Uint8Array = EMPTY_BYTES;
  private _leafStart = 0;
  private _leafEnd = 0;

  constructor(root: RopeNode) {
    this._root = root;
  }

  get length(): number {
    return this._root.length;
  }

  at(offset: number): number {
    if (offset < this._leafStart || offset >= this._leafEnd) {
      this._seek(offset);
    }
    return this._leaf[offset - this._leafStart] ?? 0;
  }

  private _seek(offset: number): void {
    if (offset < 0 || offset >= this._root.length) {
      throw new OutOfBoundsError(offset, offset + 1, this._root.length);
    }
    let node: RopeNode = this._root;
    let base = 0;
    while (node.kind === "branch") {
      if (offset < base + node.left.length) {
        node = node.left;
      } else {
        base += node.left.length;
        node = node.right;
      }
    }
    this._leaf = node.bytes;
    this._leafStart = base;
    this._leafEnd = base + node.length;
  }
}
