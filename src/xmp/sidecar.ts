// src/xmp/sidecar.ts
import { errorMessage } from "../errors.js";
import { nodeFileIo, writeFileAtomic } from "./fileIo.js";
import type { FileIo } from "./fileIo.js";
import { composeProcessedXmp } from "./packet.js";
import type { ProcessedStamp } from "./packet.js";
import { failed, succeeded } from "./result.js";
import type { XmpWriteResult } from "./result.js";

/** `photo.png` -> `photo.png.xmp` */
export function sidecarPathFor(imagePath: string): string {
  return `${imagePath}.xmp`;
}


/**
 * Writes the processed-by packet to `<imagePath>.xmp`, merging into any sidecar
 * already there. Leaves the file alone when its bytes would not change, and when
 * an existing sidecar cannot be read.
 */
export function writeXmpSidecar(
  imagePath: string,
  stamp: ProcessedStamp,
  io: FileIo = nodeFileIo,
): XmpWriteResult {
  const sidecar = sidecarPathFor(imagePath);
  let existing: Buffer | undefined;
  if (io.exists(sidecar)) {
    try {
      existing = io.readFile(sidecar);
    } catch (err: unknown) {
      return failed(sidecar, "read_failed", errorMessage(err));
    }
  }
  const { packet } = composeProcessedXmp(existing, stamp);

  if (existing !== undefined && packet.equals(existing)) return succeeded(sidecar, false);

  const written = writeFileAtomic(sidecar, packet, io);
  if (!written.ok) return failed(sidecar, "write_failed", written.message);
  return succeeded(sidecar, true);
}
