// src/xmp/result.ts
export type XmpFailureReason =
  | "not_applicable" // embedding requested for a file that is not a .png
  | "malformed_png" // bad signature or no IEND
  | "read_failed"
  | "write_failed";

export type XmpWriteResult =
  | Readonly<{ ok: true; path: string; changed: boolean }>
  | Readonly<{ ok: false; path: string; reason: XmpFailureReason; message?: string }>;

export function succeeded(path: string, changed: boolean): XmpWriteResult {
  return { ok: true, path, changed };
}

export function failed(path: string, reason: XmpFailureReason, message?: string): XmpWriteResult {
  return message === undefined ? { ok: false, path, reason } : { ok: false, path, reason, message };
}

export function describeResult(result: XmpWriteResult): string {
  if (result.ok) return result.changed ? "updated" : "unchanged";
  return result.message === undefined ? result.reason : `${result.reason}: ${result.message}`;
}
