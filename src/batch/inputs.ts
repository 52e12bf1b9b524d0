// src/batch/inputs.ts
import path from "node:path";
import { readdir } from "node:fs/promises";

/**
 * How an input reaches remove.bg: as-is, converted to PNG first, or not at all
 * (camera RAW, which needs a decoder this tool does not ship).
 */
export type InputKind = "upload" | "normalize" | "unsupported";

// remove.bg takes these as-is.
const UPLOAD_MIME_TYPES: Readonly<Record<string, string>> = {
  ".png": "image/png",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".webp": "image/webp",
};

const NORMALIZE_EXTENSIONS: ReadonlySet<string> = new Set([".bmp", ".tif", ".tiff"]);

const RAW_EXTENSIONS: ReadonlySet<string> = new Set([".nef", ".arw", ".cr3"]);

export const INPUT_EXTENSIONS: ReadonlySet<string> = new Set([
  ...Object.keys(UPLOAD_MIME_TYPES),
  ...NORMALIZE_EXTENSIONS,
  ...RAW_EXTENSIONS,
]);

function extOf(p: string): string {
  return path.extname(p).toLowerCase();
}

export function inputKind(p: string): InputKind {
  const ext = extOf(p);
  if (UPLOAD_MIME_TYPES[ext] !== undefined) return "upload";
  if (NORMALIZE_EXTENSIONS.has(ext)) return "normalize";
  return "unsupported";
}

export function mimeTypeFor(p: string): string {
  return UPLOAD_MIME_TYPES[extOf(p)] ?? "application/octet-stream";
}

/** Image files directly inside `dir` (not recursive), sorted by path. */
export async function listInputFiles(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  const out = entries
    .filter((e) => e.isFile() && INPUT_EXTENSIONS.has(extOf(e.name)))
    .map((e) => path.join(dir, e.name));
  out.sort();
  return out;
}
