// src/image/canvas.ts
import { WHITE, blit, createImage, cropRect, findOpaqueBounds, resizeImage } from "./rgbaImage.js";
import type { RgbaImage } from "./rgbaImage.js";

export type CanvasSize = Readonly<{ width: number; height: number }>;

export type Margins = Readonly<{ left: number; right: number; top: number; bottom: number }>;

export type Placement = Readonly<{ x: number; y: number; width: number; height: number }>;

/**
 * Where a `subjectWidth`x`subjectHeight` subject lands once scaled to fit inside the
 * margins and centered in what is left.
 */
export function placeSubject(
  subjectWidth: number,
  subjectHeight: number,
  size: CanvasSize,
  margins: Margins,
): Placement {
  const innerW = size.width - margins.left - margins.right;
  const innerH = size.height - margins.top - margins.bottom;
  if (innerW <= 1 || innerH <= 1) {
    throw new Error(`Inner area ${innerW}x${innerH} is too small; check margin values`);
  }

  const scale = Math.min(innerW / subjectWidth, innerH / subjectHeight);
  const width = Math.min(innerW, Math.max(1, Math.floor(subjectWidth * scale)));
  const height = Math.min(innerH, Math.max(1, Math.floor(subjectHeight * scale)));

  const x = margins.left + Math.floor((innerW - width) / 2);
  const y = margins.top + Math.floor((innerH - height) / 2);

  return {
    x: Math.max(margins.left, Math.min(x, size.width - margins.right - width)),
    y: Math.max(margins.top, Math.min(y, size.height - margins.bottom - height)),
    width,
    height,
  };
}

/**
 * Crops a cutout to its visible pixels, scales it into the area inside `margins`
 * and composites it onto an opaque white canvas. A fully transparent cutout gives
 * a blank canvas.
 */
export function fitOnWhiteCanvas(img: RgbaImage, size: CanvasSize, margins: Margins): RgbaImage {
  const canvas = createImage(size.width, size.height, WHITE);

  const bounds = findOpaqueBounds(img);
  if (!bounds) return canvas;

  const subject = cropRect(img, bounds.left, bounds.top, bounds.right, bounds.bottom);
  const place = placeSubject(subject.width, subject.height, size, margins);

  const scaled =
    place.width === subject.width && place.height === subject.height
      ? subject
      : resizeImage(subject, place.width, place.height);

  blit(canvas, scaled, place.x, place.y);
  return canvas;
}
