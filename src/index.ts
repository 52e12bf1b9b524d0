// src/index.ts
export { PNG_SIGNATURE, buildPngChunk, chunkData, hasPngSignature, scanPngChunks, verifyChunkCrc } from "./png/chunks.js";
export type { PngChunk } from "./png/chunks.js";
export { decodeITxt, encodeITxt, readITxtKeyword } from "./png/itxt.js";
export type { ITxtFields, ITxtInput } from "./png/itxt.js";

export { DEFAULT_PROCESS_TOOL, NS, XMP_ITXT_KEYWORD } from "./xmp/constants.js";
export {
  composeProcessedXmp,
  ensureDefaultDescription,
  ensureSubjectKeyword,
  getOrCreateDescription,
  parseOrCreateXmpMeta,
  serializeXmpMeta,
} from "./xmp/packet.js";
export type { ComposedPacket, ProcessedStamp } from "./xmp/packet.js";
export { embedXmpInPng, extractXmpFromPng, isPngPath, patchPngXmp } from "./xmp/pngEmbed.js";
export { sidecarPathFor, writeXmpSidecar } from "./xmp/sidecar.js";
export { writeProcessedTags } from "./xmp/tags.js";
export type { TagOptions, TagSummary } from "./xmp/tags.js";
export type { XmpFailureReason, XmpWriteResult } from "./xmp/result.js";
export { nodeFileIo } from "./xmp/fileIo.js";
export type { FileIo } from "./xmp/fileIo.js";

export { processFolder } from "./batch/processFolder.js";
export type { ProcessFolderOptions, ProcessResult } from "./batch/processFolder.js";
export { RemoveBgClient } from "./batch/removeBg.js";
export type { BackgroundRemover, RemovalResult, UploadImage } from "./batch/removeBg.js";
export { fitOnWhiteCanvas } from "./image/canvas.js";
export { ConfigError, RemoveBgHttpError } from "./errors.js";
