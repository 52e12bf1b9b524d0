// src/xmp/pngEmbed.ts
import path from "node:path";

import { errorMessage } from "../errors.js";
import { buildPngChunk, chunkData, hasPngSignature, scanPngChunks } from "../png/chunks.js";
import type { PngChunk } from "../png/chunks.js";
import { decodeITxt, encodeITxt, iTxtTextBytes, readITxtKeyword } from "../png/itxt.js";
import { XMP_ITXT_KEYWORD } from "./constants.js";
import { nodeFileIo, writeFileAtomic } from "./fileIo.js";
import type { FileIo } from "./fileIo.js";
import { composeProcessedXmp } from "./packet.js";
import type { ProcessedStamp } from "./packet.js";
import { failed, succeeded } from "./result.js";
import type { XmpWriteResult } from "./result.js";

/** Where the XMP chunk goes: over an existing one, or just before IEND. */
export type XmpChunkSite =
  | Readonly<{ kind: "existing"; chunk: PngChunk }>
  | Readonly<{ kind: "insert"; offset: number }>;

export type PatchedPng =
  | Readonly<{ ok: true; data: Buffer; changed: boolean }>
  | Readonly<{ ok: false; reason: "malformed_png"; message: string }>;

export function isPngPath(p: string): boolean {
  return path.extname(p).toLowerCase() === ".png";
}

function isXmpChunk(buf: Buffer, chunk: PngChunk): boolean {
  return chunk.type === "iTXt" && readITxtKeyword(chunkData(buf, chunk)) === XMP_ITXT_KEYWORD;
}

/**
 * The first XMP iTXt chunk wins; later ones are left alone. Returns undefined when
 * the walk ends without reaching either an XMP chunk or IEND.
 */
export function locateXmpChunkSite(buf: Buffer): XmpChunkSite | undefined {
  for (const chunk of scanPngChunks(buf)) {
    if (isXmpChunk(buf, chunk)) return { kind: "existing", chunk };
    if (chunk.type === "IEND") return { kind: "insert", offset: chunk.chunkStart };
  }
  return undefined;
}

function packetOf(buf: Buffer, chunk: PngChunk): Buffer | undefined {
  const fields = decodeITxt(chunkData(buf, chunk));
  return fields ? iTxtTextBytes(fields) : undefined;
}

/** XMP packet bytes of the first XMP iTXt chunk, if the PNG has one. */
export function extractXmpFromPng(buf: Buffer): Buffer | undefined {
  const site = locateXmpChunkSite(buf);
  return site?.kind === "existing" ? packetOf(buf, site.chunk) : undefined;
}

export function buildXmpChunk(packet: Uint8Array): Buffer {
  return buildPngChunk("iTXt", encodeITxt({ keyword: XMP_ITXT_KEYWORD, text: packet }));
}

/** Returns a copy of `buf` whose XMP packet carries the processed-by stamp. */
export function patchPngXmp(buf: Buffer, stamp: ProcessedStamp): PatchedPng {
  if (!hasPngSignature(buf)) {
    return { ok: false, reason: "malformed_png", message: "missing PNG signature" };
  }

  const site = locateXmpChunkSite(buf);
  if (!site) {
    return { ok: false, reason: "malformed_png", message: "no IEND chunk" };
  }

  const existing = site.kind === "existing" ? packetOf(buf, site.chunk) : undefined;
  const chunk = buildXmpChunk(composeProcessedXmp(existing, stamp).packet);

  const data =
    site.kind === "existing"
      ? Buffer.concat([
          buf.subarray(0, site.chunk.chunkStart),
          chunk,
          buf.subarray(site.chunk.chunkEnd),
        ])
      : Buffer.concat([buf.subarray(0, site.offset), chunk, buf.subarray(site.offset)]);

  return { ok: true, data, changed: !data.equals(buf) };
}

/**
 * Embeds the processed-by XMP packet into a PNG file in place. Files without a
 * `.png` suffix are reported as not applicable and never opened.
 */
export function embedXmpInPng(
  pngPath: string,
  stamp: ProcessedStamp,
  io: FileIo = nodeFileIo,
): XmpWriteResult {
  if (!isPngPath(pngPath)) return failed(pngPath, "not_applicable");

  let original: Buffer;
  try {
    original = io.readFile(pngPath);
  } catch (err: unknown) {
    return failed(pngPath, "read_failed", errorMessage(err));
  }

  const patched = patchPngXmp(original, stamp);
  if (!patched.ok) return failed(pngPath, patched.reason, patched.message);
  if (!patched.changed) return succeeded(pngPath, false);

  const written = writeFileAtomic(pngPath, patched.data, io);
  if (!written.ok) return failed(pngPath, "write_failed", written.message);
  return succeeded(pngPath, true);
}
