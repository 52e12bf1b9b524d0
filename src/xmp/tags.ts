// src/xmp/tags.ts
import { nodeFileIo } from "./fileIo.js";
import type { FileIo } from "./fileIo.js";
import type { ProcessedStamp } from "./packet.js";
import { embedXmpInPng, isPngPath } from "./pngEmbed.js";
import type { XmpWriteResult } from "./result.js";
import { writeXmpSidecar } from "./sidecar.js";

export type TagOptions = ProcessedStamp &
  Readonly<{
    embedPng: boolean;
    alsoWriteSidecar: boolean;
  }>;

export type TagSummary = Readonly<{
  /** True when at least one of the attempted writes succeeded. */
  ok: boolean;
  embed?: XmpWriteResult;
  sidecar?: XmpWriteResult;
}>;

/**
 * Stamps an output image with its provenance: embedded in PNGs, and in a sidecar
 * when asked for or when the image is not a PNG.
 */
export function writeProcessedTags(
  imagePath: string,
  opts: TagOptions,
  io: FileIo = nodeFileIo,
): TagSummary {
  const stamp: ProcessedStamp = { tool: opts.tool, date: opts.date };
  const isPng = isPngPath(imagePath);

  const embed = isPng && opts.embedPng ? embedXmpInPng(imagePath, stamp, io) : undefined;
  const sidecar =
    opts.alsoWriteSidecar || !isPng ? writeXmpSidecar(imagePath, stamp, io) : undefined;

  const summary: { ok: boolean; embed?: XmpWriteResult; sidecar?: XmpWriteResult } = {
    ok: embed?.ok === true || sidecar?.ok === true,
  };
  if (embed) summary.embed = embed;
  if (sidecar) summary.sidecar = sidecar;
  return summary;
}
