/**
 * Named registers. A register holds one byte sequence per selection that
 * filled it.
 */

export const DEFAULT_REGISTER = '"';

export class RegisterStore {
  private readonly _slots = new Map<string, readonly Uint8Array[]>();

  /** Overwrite a register. */
  write(name: string, contents: readonly Uint8Array[]): void {
    this._slots.set(name, contents);
  }

  /** Contents of a register; empty when it was never written. */
  read(name: string): readonly Uint8Array[] {
    return this._slots.get(name) ?? [];
  }

  names(): string[] {
    return [...this._slots.keys()].sort();
  }
}
