// src/image/rgbaImage.ts
export type RgbaImage = {
  width: number;
  height: number;
  data: Uint8Array; // length = width*height*4 (RGBA)
};

export type Rgba = readonly [number, number, number, number];

/** Half-open pixel rectangle: `left <= x < right`, `top <= y < bottom`. */
export type Bounds = Readonly<{ left: number; top: number; right: number; bottom: number }>;

export const WHITE: Rgba = [255, 255, 255, 255];

export function createImage(width: number, height: number, fill: Rgba = [0, 0, 0, 0]): RgbaImage {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new Error(`Invalid image size ${width}x${height}`);
  }
  const [r, g, b, a] = fill;
  const data = new Uint8Array(width * height * 4);
  for (let i = 0; i < width * height; i++) {
    const o = i * 4;
    data[o + 0] = r;
    data[o + 1] = g;
    data[o + 2] = b;
    data[o + 3] = a;
  }
  return { width, height, data };
}

export function pixelAt(img: RgbaImage, x: number, y: number): Rgba {
  const o = (y * img.width + x) * 4;
  return [img.data[o + 0]!, img.data[o + 1]!, img.data[o + 2]!, img.data[o + 3]!];
}

/** Smallest rectangle holding every pixel with non-zero alpha, or undefined if there is none. */
export function findOpaqueBounds(img: RgbaImage): Bounds | undefined {
  let left = img.width;
  let top = img.height;
  let right = -1;
  let bottom = -1;

  for (let y = 0; y < img.height; y++) {
    for (let x = 0; x < img.width; x++) {
      if (img.data[(y * img.width + x) * 4 + 3]! === 0) continue;
      if (x < left) left = x;
      if (x > right) right = x;
      if (y < top) top = y;
      if (y > bottom) bottom = y;
    }
  }

  if (right < 0) return undefined;
  return { left, top, right: right + 1, bottom: bottom + 1 };
}

export function cropRect(
  src: RgbaImage,
  left: number,
  top: number,
  right: number,
  bottom: number,
): RgbaImage {
  const w = right - left;
  const h = bottom - top;
  if (w <= 0 || h <= 0) throw new Error(`Invalid cropRect w=${w} h=${h}`);
  if (left < 0 || top < 0 || right > src.width || bottom > src.height) {
    throw new Error(
      `cropRect out of bounds: (${left},${top})-(${right},${bottom}) vs ${src.width}x${src.height}`,
    );
  }

  const out = createImage(w, h, [0, 0, 0, 0]);
  for (let y = 0; y < h; y++) {
    const srcRow = (top + y) * src.width * 4;
    const dstRow = y * w * 4;
    const srcStart = srcRow + left * 4;
    const srcEnd = srcStart + w * 4;
    out.data.set(src.data.subarray(srcStart, srcEnd), dstRow);
  }
  return out;
}

type Taps = { start: number; weights: Float64Array };

// Triangle (bilinear) filter whose support widens with the downscale factor,
// so shrinking averages every source pixel instead of skipping some.
function triangleTaps(srcLen: number, dstLen: number): Taps[] {
  const scale = srcLen / dstLen;
  const support = Math.max(1, scale);
  const taps: Taps[] = [];

  for (let i = 0; i < dstLen; i++) {
    const center = (i + 0.5) * scale;
    const start = Math.max(0, Math.floor(center - support));
    const end = Math.min(srcLen, Math.ceil(center + support));
    const weights = new Float64Array(end - start);

    let sum = 0;
    for (let j = start; j < end; j++) {
      const w = Math.max(0, 1 - Math.abs((j + 0.5 - center) / support));
      weights[j - start] = w;
      sum += w;
    }
    if (sum > 0) for (let k = 0; k < weights.length; k++) weights[k] = weights[k]! / sum;

    taps.push({ start, weights });
  }
  return taps;
}

/**
 * Resamples to `width`x`height`. Works on premultiplied alpha so transparent
 * pixels do not bleed their color into the edges of the subject.
 */
export function resizeImage(src: RgbaImage, width: number, height: number): RgbaImage {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new Error(`Invalid resize target ${width}x${height}`);
  }

  const premul = new Float64Array(src.width * src.height * 4);
  for (let i = 0; i < src.width * src.height; i++) {
    const o = i * 4;
    const a = src.data[o + 3]!;
    premul[o + 0] = (src.data[o + 0]! * a) / 255;
    premul[o + 1] = (src.data[o + 1]! * a) / 255;
    premul[o + 2] = (src.data[o + 2]! * a) / 255;
    premul[o + 3] = a;
  }

  // Horizontal pass: src.width -> width, rows unchanged.
  const xTaps = triangleTaps(src.width, width);
  const rows = new Float64Array(width * src.height * 4);
  for (let y = 0; y < src.height; y++) {
    for (let x = 0; x < width; x++) {
      const { start, weights } = xTaps[x]!;
      const d = (y * width + x) * 4;
      for (let k = 0; k < weights.length; k++) {
        const s = (y * src.width + start + k) * 4;
        const w = weights[k]!;
        for (let c = 0; c < 4; c++) rows[d + c] = rows[d + c]! + premul[s + c]! * w;
      }
    }
  }

  // Vertical pass: src.height -> height.
  const yTaps = triangleTaps(src.height, height);
  const out = createImage(width, height);
  for (let y = 0; y < height; y++) {
    const { start, weights } = yTaps[y]!;
    for (let x = 0; x < width; x++) {
      let r = 0;
      let g = 0;
      let b = 0;
      let a = 0;
      for (let k = 0; k < weights.length; k++) {
        const s = ((start + k) * width + x) * 4;
        const w = weights[k]!;
        r += rows[s + 0]! * w;
        g += rows[s + 1]! * w;
        b += rows[s + 2]! * w;
        a += rows[s + 3]! * w;
      }

      const d = (y * width + x) * 4;
      const alpha = clampByte(a);
      if (alpha === 0) continue;
      out.data[d + 0] = clampByte((r * 255) / a);
      out.data[d + 1] = clampByte((g * 255) / a);
      out.data[d + 2] = clampByte((b * 255) / a);
      out.data[d + 3] = alpha;
    }
  }
  return out;
}

function clampByte(v: number): number {
  return Math.max(0, Math.min(255, Math.round(v)));
}

export function blit(dst: RgbaImage, src: RgbaImage, dx: number, dy: number): void {
  // Alpha composite src over dst at (dx,dy)
  const x0 = Math.max(0, dx);
  const y0 = Math.max(0, dy);
  const x1 = Math.min(dst.width, dx + src.width);
  const y1 = Math.min(dst.height, dy + src.height);

  if (x1 <= x0 || y1 <= y0) return;

  for (let y = y0; y < y1; y++) {
    for (let x = x0; x < x1; x++) {
      const si = ((y - dy) * src.width + (x - dx)) * 4;
      const di = (y * dst.width + x) * 4;

      const sa = src.data[si + 3]! / 255;
      if (sa <= 0) continue;

      const da = dst.data[di + 3]! / 255;
      const outA = sa + da * (1 - sa);

      for (let c = 0; c < 3; c++) {
        const sc = src.data[si + c]!;
        const dc = dst.data[di + c]!;
        dst.data[di + c] = clampByte((sc * sa + dc * da * (1 - sa)) / outA);
      }
      dst.data[di + 3] = clampByte(outA * 255);
    }
  }
}
