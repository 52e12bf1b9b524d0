import { existsSync, mkdtempSync, readFileSync, writeFileSync } from "node:fs";
import os from "node:os";
import path from "node:path";

import { describe, expect, it } from "vitest";

import { nodeFileIo } from "../src/xmp/fileIo.js";
import type { FileIo } from "../src/xmp/fileIo.js";
import { extractXmpFromPng } from "../src/xmp/pngEmbed.js";
import { sidecarPathFor, writeXmpSidecar } from "../src/xmp/sidecar.js";
import { writeProcessedTags } from "../src/xmp/tags.js";
import { minimalPng } from "./pngFixtures.js";
import { readStamp } from "./xmpQuery.js";

const STAMP = { tool: "removebg-square-cli", date: "2024-01-01" };

function tmpFile(name: string): string {
  return path.join(mkdtempSync(path.join(os.tmpdir(), "cutout-square-")), name);
}

describe("writeXmpSidecar", () => {
  it("writes <image>.xmp next to the image", () => {
    const image = tmpFile("photo.jpg");
    const sidecar = sidecarPathFor(image);

    expect(sidecar).toBe(`${image}.xmp`);
    expect(writeXmpSidecar(image, STAMP)).toEqual({ ok: true, path: sidecar, changed: true });
    expect(readStamp(readFileSync(sidecar)).keywords).toEqual(["ProcessedWith:removebg-square-cli"]);
    expect(existsSync(image)).toBe(false);
  });

  it("does not rewrite a sidecar that already carries the stamp", () => {
    const image = tmpFile("photo.jpg");
    writeXmpSidecar(image, STAMP);
    const first = readFileSync(sidecarPathFor(image));

    expect(writeXmpSidecar(image, STAMP)).toEqual({
      ok: true,
      path: sidecarPathFor(image),
      changed: false,
    });
    expect(readFileSync(sidecarPathFor(image)).equals(first)).toBe(true);
  });

  it("merges into an existing sidecar", () => {
    const image = tmpFile("photo.jpg");
    writeFileSync(
      sidecarPathFor(image),
      '<x:xmpmeta xmlns:x="adobe:ns:meta/"><rdf:RDF xmlns:rdf="http://www.w3.org/1999/02/22-rdf-syntax-ns#">' +
        '<rdf:Description rdf:about="" xmlns:dc="http://purl.org/dc/elements/1.1/">' +
        "<dc:subject><rdf:Bag><rdf:li>studio</rdf:li></rdf:Bag></dc:subject>" +
        "</rdf:Description></rdf:RDF></x:xmpmeta>",
    );

    writeXmpSidecar(image, STAMP);
    expect(readStamp(readFileSync(sidecarPathFor(image))).keywords).toEqual([
      "studio",
      "ProcessedWith:removebg-square-cli",
    ]);
  });

  it("reports read_failed and keeps a sidecar it cannot read", () => {
    const image = tmpFile("photo.jpg");
    writeFileSync(sidecarPathFor(image), "old");
    const io: FileIo = {
      ...nodeFileIo,
      readFile: () => {
        throw new Error("EACCES");
      },
    };

    expect(writeXmpSidecar(image, STAMP, io)).toEqual({
      ok: false,
      path: sidecarPathFor(image),
      reason: "read_failed",
      message: "EACCES",
    });
    expect(readFileSync(sidecarPathFor(image), "utf8")).toBe("old");
  });

  it("reports write_failed when the file cannot be written", () => {
    const image = tmpFile("photo.jpg");
    const io: FileIo = {
      ...nodeFileIo,
      writeFile: () => {
        throw new Error("disk full");
      },
    };

    expect(writeXmpSidecar(image, STAMP, io)).toEqual({
      ok: false,
      path: sidecarPathFor(image),
      reason: "write_failed",
      message: "disk full",
    });
    expect(existsSync(sidecarPathFor(image))).toBe(false);
  });
});

describe("writeProcessedTags", () => {
  it("embeds into PNGs without a sidecar by default", () => {
    const image = tmpFile("out.png");
    writeFileSync(image, minimalPng());

    const summary = writeProcessedTags(image, { ...STAMP, embedPng: true, alsoWriteSidecar: false });

    expect(summary).toEqual({ ok: true, embed: { ok: true, path: image, changed: true } });
    expect(extractXmpFromPng(readFileSync(image))).toBeDefined();
    expect(existsSync(sidecarPathFor(image))).toBe(false);
  });

  it("writes both when a sidecar is requested", () => {
    const image = tmpFile("out.png");
    writeFileSync(image, minimalPng());

    const summary = writeProcessedTags(image, { ...STAMP, embedPng: true, alsoWriteSidecar: true });

    expect(summary.ok).toBe(true);
    expect(summary.embed?.ok).toBe(true);
    expect(summary.sidecar).toEqual({ ok: true, path: sidecarPathFor(image), changed: true });
  });

  it("always uses a sidecar for images that are not PNGs", () => {
    const image = tmpFile("out.jpg");
    writeFileSync(image, "jpeg bytes");

    const summary = writeProcessedTags(image, { ...STAMP, embedPng: true, alsoWriteSidecar: false });

    expect(summary.embed).toBeUndefined();
    expect(summary.sidecar?.ok).toBe(true);
    expect(readFileSync(image, "utf8")).toBe("jpeg bytes");
  });

  it("is not ok when nothing was attempted", () => {
    const image = tmpFile("out.png");
    writeFileSync(image, minimalPng());

    expect(writeProcessedTags(image, { ...STAMP, embedPng: false, alsoWriteSidecar: false })).toEqual({
      ok: false,
    });
    expect(readFileSync(image).equals(minimalPng())).toBe(true);
  });

  it("is ok when the sidecar succeeds even if embedding fails", () => {
    const image = tmpFile("broken.png");
    writeFileSync(image, "not a png");

    const summary = writeProcessedTags(image, { ...STAMP, embedPng: true, alsoWriteSidecar: true });

    expect(summary.ok).toBe(true);
    expect(summary.embed).toEqual({
      ok: false,
      path: image,
      reason: "malformed_png",
      message: "missing PNG signature",
    });
    expect(summary.sidecar?.ok).toBe(true);
  });
});
