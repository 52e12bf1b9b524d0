// src/xmp/constants.ts
export const DEFAULT_PROCESS_TOOL = "removebg-square-cli";

/** iTXt keyword that marks a chunk as carrying an XMP packet. */
export const XMP_ITXT_KEYWORD = "XML:com.adobe.xmp";

export const NS = Object.freeze({
  x: "adobe:ns:meta/",
  rdf: "http://www.w3.org/1999/02/22-rdf-syntax-ns#",
  dc: "http://purl.org/dc/elements/1.1/",
  xml: "http://www.w3.org/XML/1998/namespace",
  xmlns: "http://www.w3.org/2000/xmlns/",
} as const);

export const DEFAULT_LANGUAGE = "x-default";

export const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>\n';

export function processedKeyword(tool: string): string {
  return `ProcessedWith:${tool}`;
}

export function processedDescription(tool: string, date: string): string {
  return `Processed by ${tool} on ${date}`;
}
