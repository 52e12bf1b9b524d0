import * as pngjs from "pngjs";
import { describe, expect, it } from "vitest";

import { fitOnWhiteCanvas, placeSubject } from "../src/image/canvas.js";
import { decodePngRgba, encodePngRgb } from "../src/image/png.js";
import { createImage, findOpaqueBounds, pixelAt, resizeImage } from "../src/image/rgbaImage.js";
import type { RgbaImage } from "../src/image/rgbaImage.js";

const { PNG } = pngjs;

const RED = [255, 0, 0, 255] as const;
const WHITE = [255, 255, 255, 255] as const;

function setPixel(img: RgbaImage, x: number, y: number, rgba: readonly number[]): void {
  img.data.set(rgba, (y * img.width + x) * 4);
}

/** 4x4 transparent image with an opaque red 2x2 block at (1,1)-(2,2). */
function redBlockCutout(): RgbaImage {
  const img = createImage(4, 4);
  for (const [x, y] of [
    [1, 1],
    [2, 1],
    [1, 2],
    [2, 2],
  ] as const) {
    setPixel(img, x, y, RED);
  }
  return img;
}

describe("placeSubject", () => {
  it("fits a wide subject to the inner width and centers it vertically", () => {
    const margins = { left: 111, right: 111, top: 111, bottom: 111 };
    expect(placeSubject(200, 100, { width: 1000, height: 1000 }, margins)).toEqual({
      x: 111,
      y: 305,
      width: 778,
      height: 389,
    });
  });

  it("honors uneven margins", () => {
    const margins = { left: 10, right: 30, top: 0, bottom: 0 };
    expect(placeSubject(10, 10, { width: 100, height: 100 }, margins)).toEqual({
      x: 10,
      y: 20,
      width: 60,
      height: 60,
    });
  });

  it("never shrinks a side below one pixel", () => {
    const margins = { left: 0, right: 0, top: 0, bottom: 0 };
    expect(placeSubject(1000, 1, { width: 10, height: 10 }, margins)).toEqual({
      x: 0,
      y: 4,
      width: 10,
      height: 1,
    });
  });

  it("rejects margins that leave no room", () => {
    const margins = { left: 5, right: 5, top: 5, bottom: 5 };
    expect(() => placeSubject(4, 4, { width: 11, height: 11 }, margins)).toThrow(/too small/);
  });
});

describe("fitOnWhiteCanvas", () => {
  it("crops to the visible pixels and scales them into the margins", () => {
    const margins = { left: 1, right: 1, top: 1, bottom: 1 };
    const out = fitOnWhiteCanvas(redBlockCutout(), { width: 10, height: 10 }, margins);

    expect([out.width, out.height]).toEqual([10, 10]);
    expect(pixelAt(out, 1, 1)).toEqual(RED);
    expect(pixelAt(out, 8, 8)).toEqual(RED);
    expect(pixelAt(out, 0, 0)).toEqual(WHITE);
    expect(pixelAt(out, 9, 9)).toEqual(WHITE);
    expect(pixelAt(out, 5, 0)).toEqual(WHITE);
  });

  it("gives a blank white canvas for a fully transparent cutout", () => {
    const margins = { left: 1, right: 1, top: 1, bottom: 1 };
    const out = fitOnWhiteCanvas(createImage(3, 3), { width: 6, height: 6 }, margins);

    expect(out.data.every((v) => v === 255)).toBe(true);
  });
});

describe("rgba helpers", () => {
  it("finds half-open opaque bounds", () => {
    expect(findOpaqueBounds(redBlockCutout())).toEqual({ left: 1, top: 1, right: 3, bottom: 3 });
    expect(findOpaqueBounds(createImage(2, 2))).toBeUndefined();
  });

  it("does not darken edges against transparent neighbours when shrinking", () => {
    const src = createImage(2, 1);
    setPixel(src, 0, 0, RED);

    expect(pixelAt(resizeImage(src, 1, 1), 0, 0)).toEqual([255, 0, 0, 128]);
  });

  it("encodes RGB output without an alpha channel", () => {
    const png = encodePngRgb(createImage(2, 1, [10, 20, 30, 255]));

    expect(png[25]).toBe(2); // IHDR colour type: truecolor
    expect(PNG.sync.read(png).width).toBe(2);
    expect(pixelAt(decodePngRgba(png), 1, 0)).toEqual([10, 20, 30, 255]);
  });
});
