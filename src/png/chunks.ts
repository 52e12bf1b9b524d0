// src/png/chunks.ts
import { crc32 } from "crc";
import { BinaryReader, BinaryWriter } from "./binary.js";

export const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

// PNG caps chunk payloads at 2^31 - 1 bytes.
const MAX_CHUNK_LENGTH = 0x7fffffff;

/**
 * Offsets of one chunk inside the buffer it was scanned from.
 * `chunkStart..chunkEnd` spans length, type, data and CRC; `dataStart..dataEnd` the data only.
 */
export type PngChunk = Readonly<{
  type: string;
  chunkStart: number;
  dataStart: number;
  dataEnd: number;
  chunkEnd: number;
}>;

export function hasPngSignature(buf: Uint8Array): boolean {
  if (buf.length < PNG_SIGNATURE.length) return false;
  for (let i = 0; i < PNG_SIGNATURE.length; i++) {
    if (buf[i] !== PNG_SIGNATURE[i]) return false;
  }
  return true;
}

/**
 * Walks the chunks of a PNG in file order and stops after IEND.
 * CRCs are not checked. A chunk that runs past the end of the buffer ends the walk
 * silently, and a buffer without the PNG signature yields nothing.
 */
export function* scanPngChunks(buf: Buffer): Generator<PngChunk, void, undefined> {
  if (!hasPngSignature(buf)) return;

  const r = new BinaryReader(buf, PNG_SIGNATURE.length);
  while (r.remaining() >= 12) {
    const chunkStart = r.position();
    const length = r.readU32BE();
    const type = r.readTag4();
    if (length + 4 > r.remaining()) return;

    const dataStart = r.position();
    r.skip(length + 4);

    yield {
      type,
      chunkStart,
      dataStart,
      dataEnd: dataStart + length,
      chunkEnd: r.position(),
    };

    if (type === "IEND") return;
  }
}

export function chunkData(buf: Buffer, chunk: PngChunk): Buffer {
  return buf.subarray(chunk.dataStart, chunk.dataEnd);
}

export function verifyChunkCrc(buf: Buffer, chunk: PngChunk): boolean {
  const stored = buf.readUInt32BE(chunk.dataEnd);
  return (crc32(buf.subarray(chunk.chunkStart + 4, chunk.dataEnd)) >>> 0) === stored;
}

export function buildPngChunk(type: string, payload: Uint8Array): Buffer {
  if (payload.length > MAX_CHUNK_LENGTH) {
    throw new Error(`Chunk payload too large: ${payload.length} bytes`);
  }

  const w = new BinaryWriter();
  w.writeU32BE(payload.length);
  w.writeTag4(type);
  w.writeBytes(payload);

  const crcInput = Buffer.concat([Buffer.from(type, "ascii"), payload]);
  w.writeU32BE(crc32(crcInput) >>> 0);
  return w.toBuffer();
}
