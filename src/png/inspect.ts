// src/png/inspect.ts
import { hasPngSignature, scanPngChunks, verifyChunkCrc } from "./chunks.js";

/** One line per chunk: type, file offset, data length and whether the stored CRC matches. */
export function listPngChunks(buf: Buffer): string[] {
  if (!hasPngSignature(buf)) return [];
  const lines: string[] = [];
  for (const c of scanPngChunks(buf)) {
    const crc = verifyChunkCrc(buf, c) ? "ok" : "BAD";
    lines.push(`${c.type}  offset=${c.chunkStart}  length=${c.dataEnd - c.dataStart}  crc=${crc}`);
  }
  return lines;
}
