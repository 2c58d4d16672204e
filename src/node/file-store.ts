/**
 * FileStore backed by the local filesystem.
 *
 * Writes go through write-file-atomic (temp file + rename), so a failed
 * write leaves the previous file contents in place.
 */

import * as fs from "fs";
import writeFileAtomic from "write-file-atomic";
import type { FileStore } from "../editor/types.ts";

export class NodeFileStore implements FileStore {
  read(path: string): Uint8Array | undefined {
    try {
      const data = fs.readFileSync(path);
      return new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
    } catch (error) {
      if (error && typeof error === "object" && "code" in error && error.code === "ENOENT") {
        return undefined;
      }
      throw error;
    }
  }

  write(path: string, bytes: Uint8Array): void {
    writeFileAtomic.sync(path, Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength));
  }
}
