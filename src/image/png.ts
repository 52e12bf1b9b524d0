// src/image/png.ts
import * as pngjs from "pngjs";
import type { RgbaImage } from "./rgbaImage.js";

const { PNG } = pngjs;

export function decodePngRgba(buf: Buffer): RgbaImage {
  const png = PNG.sync.read(buf);
  const data = new Uint8Array(png.data); // copy view
  return { width: png.width, height: png.height, data };
}

/** Encodes as 8-bit truecolor without alpha; transparent pixels flatten onto white. */
export function encodePngRgb(img: RgbaImage): Buffer {
  const png = new PNG({ width: img.width, height: img.height });
  png.data = Buffer.from(img.data);
  return PNG.sync.write(png, { colorType: 2 });
}

export function encodePngRgba(img: RgbaImage): Buffer {
  const png = new PNG({ width: img.width, height: img.height });
  png.data = Buffer.from(img.data);
  return PNG.sync.write(png);
}
