// src/xmp/packet.ts
import { DOMParser, XMLSerializer } from "@xmldom/xmldom";

import {
  DEFAULT_LANGUAGE,
  NS,
  XML_DECLARATION,
  processedDescription,
  processedKeyword,
} from "./constants.js";

export type ProcessedStamp = Readonly<{
  tool: string;
  /** ISO-8601 date, e.g. 2024-01-01. */
  date: string;
}>;

export type ComposedPacket = Readonly<{
  packet: Buffer;
  /** False when the keyword and description were already present as requested. */
  changed: boolean;
}>;

const ELEMENT_NODE = 1;
const TEXT_NODE = 3;
const CDATA_SECTION_NODE = 4;

const PREFERRED_PREFIX: Readonly<Record<string, string>> = {
  [NS.x]: "x",
  [NS.rdf]: "rdf",
  [NS.dc]: "dc",
};

const MINIMAL_PACKET =
  `<x:xmpmeta xmlns:x="${NS.x}">` +
  `<rdf:RDF xmlns:rdf="${NS.rdf}"><rdf:Description rdf:about=""/></rdf:RDF>` +
  `</x:xmpmeta>`;

// Tried in order; the BOM-preserving pass fails to parse when a BOM is present,
// which hands the bytes to the BOM-stripping pass.
const DECODERS: ReadonlyArray<(bytes: Uint8Array) => string | undefined> = [
  (bytes) => decodeUtf8(bytes, true),
  (bytes) => decodeUtf8(bytes, false),
  (bytes) => Buffer.from(bytes).toString("latin1"),
];

function decodeUtf8(bytes: Uint8Array, ignoreBOM: boolean): string | undefined {
  try {
    return new TextDecoder("utf-8", { fatal: true, ignoreBOM }).decode(bytes);
  } catch {
    return undefined;
  }
}

function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

function isNamed(el: Element, ns: string, localName: string): boolean {
  return el.namespaceURI === ns && el.localName === localName;
}

function childElements(parent: Element): Element[] {
  const out: Element[] = [];
  const nodes = parent.childNodes;
  for (let i = 0; i < nodes.length; i++) {
    const n = nodes.item(i);
    if (n !== null && isElement(n)) out.push(n);
  }
  return out;
}

function firstChild(parent: Element, ns: string, localName: string): Element | undefined {
  return childElements(parent).find((el) => isNamed(el, ns, localName));
}

/** Depth-first, document order, `root` included. */
function findElement(root: Element, match: (el: Element) => boolean): Element | undefined {
  if (match(root)) return root;
  for (const child of childElements(root)) {
    const found = findElement(child, match);
    if (found) return found;
  }
  return undefined;
}

function textOf(el: Element): string {
  let out = "";
  const nodes = el.childNodes;
  for (let i = 0; i < nodes.length; i++) {
    const n = nodes.item(i);
    if (n !== null && (n.nodeType === TEXT_NODE || n.nodeType === CDATA_SECTION_NODE)) {
      out += n.nodeValue ?? "";
    }
  }
  return out;
}

function setText(el: Element, text: string): void {
  while (el.firstChild) el.removeChild(el.firstChild);
  el.appendChild(el.ownerDocument.createTextNode(text));
}

/** Prefix -> namespace bindings declared on `el` itself. */
function declaredPrefixes(el: Element): Map<string, string> {
  const out = new Map<string, string>();
  const attrs = el.attributes;
  for (let i = 0; i < attrs.length; i++) {
    const a = attrs.item(i);
    if (a !== null && a.name.startsWith("xmlns:")) out.set(a.name.slice(6), a.value);
  }
  return out;
}

/**
 * Finds the prefix bound to `ns` in the scope of `el`. When none is, picks a free
 * prefix and reports that it needs an xmlns declaration.
 */
function resolvePrefix(el: Element, ns: string): { prefix: string; declare: boolean } {
  const shadowed = new Set<string>();
  for (let cur: Node | null = el; cur !== null && isElement(cur); cur = cur.parentNode) {
    for (const [prefix, uri] of declaredPrefixes(cur)) {
      if (shadowed.has(prefix)) continue;
      if (uri === ns) return { prefix, declare: false };
      shadowed.add(prefix);
    }
  }

  const base = PREFERRED_PREFIX[ns] ?? "ns";
  let prefix = base;
  for (let n = 1; shadowed.has(prefix); n++) prefix = `${base}${n}`;
  return { prefix, declare: true };
}

// A missing binding is declared on the parent so later siblings can share it.
function appendElement(parent: Element, ns: string, localName: string): Element {
  const { prefix, declare } = resolvePrefix(parent, ns);
  if (declare) parent.setAttributeNS(NS.xmlns, `xmlns:${prefix}`, ns);
  const el = parent.ownerDocument.createElementNS(ns, `${prefix}:${localName}`);
  parent.appendChild(el);
  return el;
}

function parseXml(text: string): Document | undefined {
  const errors: string[] = [];
  const parser = new DOMParser({
    errorHandler: {
      warning: () => undefined,
      error: (msg: string) => errors.push(msg),
      fatalError: (msg: string) => errors.push(msg),
    },
  });

  let doc: Document;
  try {
    doc = parser.parseFromString(text, "text/xml");
  } catch {
    return undefined;
  }
  if (errors.length > 0 || !doc.documentElement) return undefined;
  if (findElement(doc.documentElement, hasUnboundPrefix)) return undefined;
  return doc;
}

// xmldom keeps `p:name` with a null namespace when `p` was never declared; such a
// document is not namespace-well-formed.
function hasUnboundPrefix(el: Element): boolean {
  if (el.prefix && el.namespaceURI === null) return true;
  const attrs = el.attributes;
  for (let i = 0; i < attrs.length; i++) {
    const a = attrs.item(i);
    if (a === null || !a.prefix || a.prefix === "xmlns" || a.prefix === "xml") continue;
    if (a.namespaceURI === null) return true;
  }
  return false;
}

function createMinimalXmpMeta(): Element {
  const doc = parseXml(MINIMAL_PACKET);
  if (!doc) throw new Error("Built-in XMP template failed to parse");
  return doc.documentElement;
}

/**
 * Parses an existing XMP packet and returns its `xmpmeta` element (the root or the
 * first descendant with that local name). Bytes that no decoding turns into such a
 * document give a fresh, empty packet instead.
 */
export function parseOrCreateXmpMeta(bytes?: Uint8Array): Element {
  if (bytes && bytes.length > 0) {
    for (const decode of DECODERS) {
      const text = decode(bytes);
      if (text === undefined) continue;

      const doc = parseXml(text);
      if (!doc) continue;

      const xmpmeta = findElement(doc.documentElement, (el) => el.localName === "xmpmeta");
      if (xmpmeta) return xmpmeta;
    }
  }
  return createMinimalXmpMeta();
}

/** First `rdf:Description` directly under the first `rdf:RDF`, creating either as needed. */
export function getOrCreateDescription(xmpmeta: Element): Element {
  const rdf =
    findElement(xmpmeta, (el) => isNamed(el, NS.rdf, "RDF")) ??
    appendElement(xmpmeta, NS.rdf, "RDF");

  const existing = firstChild(rdf, NS.rdf, "Description");
  if (existing) return existing;

  const desc = appendElement(rdf, NS.rdf, "Description");
  desc.setAttributeNS(NS.rdf, `${desc.prefix ?? "rdf"}:about`, "");
  return desc;
}

/** Adds `keyword` to `dc:subject/rdf:Bag` unless an entry already reads the same. */
export function ensureSubjectKeyword(desc: Element, keyword: string): boolean {
  const wanted = keyword.trim();
  let changed = false;

  let subject = firstChild(desc, NS.dc, "subject");
  if (!subject) {
    subject = appendElement(desc, NS.dc, "subject");
    changed = true;
  }

  let bag = firstChild(subject, NS.rdf, "Bag");
  if (!bag) {
    bag = appendElement(subject, NS.rdf, "Bag");
    changed = true;
  }

  for (const li of childElements(bag)) {
    if (isNamed(li, NS.rdf, "li") && textOf(li).trim() === wanted) return changed;
  }

  setText(appendElement(bag, NS.rdf, "li"), wanted);
  return true;
}

function languageOf(li: Element): string {
  const lang = li.getAttributeNS(NS.xml, "lang") || li.getAttribute("xml:lang") || "";
  return lang.trim().toLowerCase();
}

/** Sets the `x-default` entry of `dc:description/rdf:Alt` to `text`. */
export function ensureDefaultDescription(desc: Element, text: string): boolean {
  let changed = false;

  let description = firstChild(desc, NS.dc, "description");
  if (!description) {
    description = appendElement(desc, NS.dc, "description");
    changed = true;
  }

  let alt = firstChild(description, NS.rdf, "Alt");
  if (!alt) {
    alt = appendElement(description, NS.rdf, "Alt");
    changed = true;
  }

  for (const li of childElements(alt)) {
    if (!isNamed(li, NS.rdf, "li") || languageOf(li) !== DEFAULT_LANGUAGE) continue;
    if (textOf(li) === text) return changed;
    setText(li, text);
    return true;
  }

  const li = appendElement(alt, NS.rdf, "li");
  li.setAttributeNS(NS.xml, "xml:lang", DEFAULT_LANGUAGE);
  setText(li, text);
  return true;
}

export function serializeXmpMeta(xmpmeta: Element): Buffer {
  const xml = new XMLSerializer().serializeToString(xmpmeta);
  return Buffer.from(XML_DECLARATION + xml, "utf8");
}

/**
 * Records that a file was processed by `tool` on `date`: a `ProcessedWith:<tool>`
 * subject keyword plus a default-language description.
 */
export function composeProcessedXmp(
  existing: Uint8Array | undefined,
  stamp: ProcessedStamp,
): ComposedPacket {
  const xmpmeta = parseOrCreateXmpMeta(existing);
  const desc = getOrCreateDescription(xmpmeta);

  const keywordChanged = ensureSubjectKeyword(desc, processedKeyword(stamp.tool));
  const descriptionChanged = ensureDefaultDescription(
    desc,
    processedDescription(stamp.tool, stamp.date),
  );

  return {
    packet: serializeXmpMeta(xmpmeta),
    changed: keywordChanged || descriptionChanged,
  };
}
