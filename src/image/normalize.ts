// src/image/normalize.ts
import sharp from "sharp";

/**
 * Re-encodes an image remove.bg does not accept (TIFF, and BMP where the installed
 * libvips can read it) as PNG. Rejects with sharp's error for unreadable input.
 */
export async function normalizeToPng(bytes: Buffer): Promise<Buffer> {
  return sharp(bytes).png().toBuffer();
}
