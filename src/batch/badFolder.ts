// src/batch/badFolder.ts
import path from "node:path";
import { copyFile, mkdir, writeFile } from "node:fs/promises";

import { errorMessage } from "../errors.js";

export function errorNotePath(badDir: string, src: string): string {
  return path.join(badDir, `${path.parse(src).name}_ERROR.txt`);
}

/**
 * Copies a file that could not be processed into `badDir` with a `<stem>_ERROR.txt`
 * note beside it. Returns the copy's path, or undefined when the copy failed.
 */
export async function copyToBadFolder(
  src: string,
  badDir: string,
  reason: string,
  detail?: string,
  log: (line: string) => void = console.warn,
): Promise<string | undefined> {
  await mkdir(badDir, { recursive: true });

  let copied: string | undefined = path.join(badDir, path.basename(src));
  try {
    await copyFile(src, copied);
  } catch (err: unknown) {
    log(`  ! could not copy ${src} to ${badDir}: ${errorMessage(err)}`);
    copied = undefined;
  }

  let note = `${reason}\n`;
  if (detail) note += `\n${detail}\n`;
  try {
    await writeFile(errorNotePath(badDir, src), note, "utf8");
  } catch (err: unknown) {
    log(`  ! could not write error note for ${src}: ${errorMessage(err)}`);
  }

  return copied;
}
