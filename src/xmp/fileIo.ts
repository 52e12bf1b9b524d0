// src/xmp/fileIo.ts
import { existsSync, readFileSync, renameSync, rmSync, writeFileSync } from "node:fs";

import { errorMessage } from "../errors.js";

/** The filesystem calls the metadata writers make. Swappable so tests can fail them on purpose. */
export interface FileIo {
  readFile(path: string): Buffer;
  writeFile(path: string, data: Uint8Array): void;
  rename(from: string, to: string): void;
  exists(path: string): boolean;
  remove(path: string): void;
}

export const nodeFileIo: FileIo = {
  readFile: (p) => readFileSync(p),
  writeFile: (p, data) => writeFileSync(p, data),
  rename: (from, to) => renameSync(from, to),
  exists: (p) => existsSync(p),
  remove: (p) => rmSync(p, { force: true }),
};

let tempSeq = 0;

/** A name beside `target` that no earlier call in any process has used. */
export function tempPathFor(target: string): string {
  tempSeq += 1;
  return `${target}.${process.pid}.${Date.now()}.${tempSeq}.tmp`;
}

export type AtomicWriteOutcome = Readonly<{ ok: true }> | Readonly<{ ok: false; message: string }>;

/**
 * Writes `data` next to `target` and renames it over the target, so readers only ever
 * see the old or the new content. On failure the temporary file is removed.
 */
export function writeFileAtomic(
  target: string,
  data: Uint8Array,
  io: FileIo = nodeFileIo,
): AtomicWriteOutcome {
  const tmp = tempPathFor(target);
  try {
    io.writeFile(tmp, data);
    io.rename(tmp, target);
    return { ok: true };
  } catch (err: unknown) {
    const message = errorMessage(err);
    try {
      if (io.exists(tmp)) io.remove(tmp);
    } catch (cleanupErr: unknown) {
      return { ok: false, message: `${message} (temp cleanup failed: ${errorMessage(cleanupErr)})` };
    }
    return { ok: false, message };
  }
}
