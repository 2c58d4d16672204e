/**
 * Generational arena for long-lived handles (open buffer sessions).
 *
 * A key is `{ index, generation }`. Removing a value bumps its slot's
 * generation before the slot is reused, so a key held past removal looks up
 * `undefined` instead of whatever moved into the slot later.
 */

export interface SlotKey {
  readonly index: number;
  readonly generation: number;
}

export class SlotMap<V> {
  private readonly _values: Array<V | undefined> = [];
  private readonly _generations: number[] = [];
  private readonly _free: number[] = [];
  private _size = 0;

  get size(): number {
    return this._size;
  }

  insert(value: V): SlotKey {
    const reused = this._free.pop();
    const index = reused ?? this._values.length;
    if (reused === undefined) {
      this._generations.push(0);
      this._values.push(value);
    } else {
      this._values[index] = value;
    }
    this._size++;
    return { index, generation: this._generations[index] ?? 0 };
  }

  /** The live value for `key`, or undefined when the key is stale. */
  get(key: SlotKey): V | undefined {
    return this.has(key) ? this._values[key.index] : undefined;
  }

  has(key: SlotKey): boolean {
    return (
      this._generations[key.index] === key.generation &&
      this._values[key.index] !== undefined
    );
  }

  /** Replace a live value. Returns false for a stale key. */
  set(key: SlotKey, value: V): boolean {
    if (!this.has(key)) return false;
    this._values[key.index] = value;
    return true;
  }

  remove(key: SlotKey): V | undefined {
    if (!this.has(key)) return undefined;
    const value = this._values[key.index];
    this._values[key.index] = undefined;
    this._generations[key.index] = key.generation + 1;
    this._free.push(key.index);
    this._size--;
    return value;
  }

  *entries(): IterableIterator<[SlotKey, V]> {
    for (let index = 0; index < this._values.length; index++) {
      const value = this._values[index];
      if (value !== undefined) {
        yield [{ index, generation: this._generations[index] ?? 0 }, value];
      }
    }
  }
}

export function keysEqual(a: SlotKey, b: SlotKey): boolean {
  return a.index === b.index && a.generation === b.generation;
}
