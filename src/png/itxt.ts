// src/png/itxt.ts
import { inflateSync } from "node:zlib";
import { BinaryWriter } from "./binary.js";

export type ITxtFields = Readonly<{
  keyword: string;
  compressionFlag: number;
  compressionMethod: number;
  languageTag: string;
  translatedKeyword: string;
  /** Text bytes as stored, still deflated when `compressionFlag` is 1. */
  text: Buffer;
}>;

export type ITxtInput = Readonly<{
  keyword: string;
  text: Uint8Array;
  languageTag?: string;
  translatedKeyword?: string;
}>;

const MAX_KEYWORD_BYTES = 79;

/** Keyword of an iTXt payload, or undefined when it has no NUL-terminated, non-empty keyword. */
export function readITxtKeyword(data: Buffer): string | undefined {
  const nul = data.indexOf(0);
  if (nul <= 0) return undefined;
  return data.toString("latin1", 0, nul);
}

export function decodeITxt(data: Buffer): ITxtFields | undefined {
  const keyword = readITxtKeyword(data);
  if (keyword === undefined) return undefined;

  let j = keyword.length + 1;
  if (j + 2 > data.length) return undefined;
  const compressionFlag = data[j]!;
  const compressionMethod = data[j + 1]!;
  j += 2;

  const langEnd = data.indexOf(0, j);
  if (langEnd === -1) return undefined;
  const languageTag = data.toString("latin1", j, langEnd);
  j = langEnd + 1;

  const translatedEnd = data.indexOf(0, j);
  if (translatedEnd === -1) return undefined;
  const translatedKeyword = data.toString("utf8", j, translatedEnd);
  j = translatedEnd + 1;

  return {
    keyword,
    compressionFlag,
    compressionMethod,
    languageTag,
    translatedKeyword,
    text: data.subarray(j),
  };
}

/** Text bytes of a decoded iTXt chunk, inflated if needed. Undefined if inflation fails. */
export function iTxtTextBytes(fields: ITxtFields): Buffer | undefined {
  if (fields.compressionFlag === 0) return fields.text;
  if (fields.compressionMethod !== 0) return undefined;
  try {
    return inflateSync(fields.text);
  } catch {
    return undefined;
  }
}

/** Builds an uncompressed iTXt payload. */
export function encodeITxt(input: ITxtInput): Buffer {
  const keywordBytes = Buffer.byteLength(input.keyword, "latin1");
  if (keywordBytes < 1 || keywordBytes > MAX_KEYWORD_BYTES) {
    throw new Error(`iTXt keyword must be 1-${MAX_KEYWORD_BYTES} bytes: '${input.keyword}'`);
  }

  const w = new BinaryWriter();
  w.writeCString(input.keyword);
  w.writeU8(0); // compression flag
  w.writeU8(0); // compression method
  w.writeCString(input.languageTag ?? "");
  w.writeCString(input.translatedKeyword ?? "", "utf8");
  w.writeBytes(input.text);
  return w.toBuffer();
}
