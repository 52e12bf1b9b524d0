// src/config.ts
import { ConfigError } from "./errors.js";
import type { CanvasSize, Margins } from "./image/canvas.js";
import { DEFAULT_PROCESS_TOOL } from "./xmp/constants.js";

export const API_KEY_ENV = "REMOVE_BG_API_KEY";

export const DEFAULTS = Object.freeze({
  inputDir: "input",
  outputDir: "output",
  outSize: 1000,
  margin: 111,
  removeSize: "auto",
  tool: DEFAULT_PROCESS_TOOL,
  embedPngXmp: true,
  alsoWriteSidecar: false,
} as const);

/** `--api-key` wins over the environment (which may have been filled from .env). */
export function resolveApiKey(
  flag: string | undefined,
  env: Readonly<Record<string, string | undefined>> = process.env,
): string {
  const key = (flag ?? env[API_KEY_ENV] ?? "").trim();
  if (key === "") {
    throw new ConfigError(`No remove.bg API key: pass --api-key or set ${API_KEY_ENV}`);
  }
  return key;
}

export type MarginOptions = Readonly<{
  margin?: number;
  marginLeft?: number;
  marginRight?: number;
  marginTop?: number;
  marginBottom?: number;
}>;

function checkMargin(name: string, v: number): number {
  if (!Number.isInteger(v) || v < 0) {
    throw new ConfigError(`${name} must be a non-negative integer, got ${v}`);
  }
  return v;
}

/**
 * One `margin` for every side, each side overridable. Rejects layouts that leave
 * no room for the subject.
 */
export function resolveMargins(opts: MarginOptions, size: CanvasSize): Margins {
  const all = checkMargin("margin", opts.margin ?? DEFAULTS.margin);
  const margins: Margins = {
    left: checkMargin("margin-left", opts.marginLeft ?? all),
    right: checkMargin("margin-right", opts.marginRight ?? all),
    top: checkMargin("margin-top", opts.marginTop ?? all),
    bottom: checkMargin("margin-bottom", opts.marginBottom ?? all),
  };

  const innerW = size.width - margins.left - margins.right;
  const innerH = size.height - margins.top - margins.bottom;
  if (innerW <= 1 || innerH <= 1) {
    throw new ConfigError(
      `Margins leave ${innerW}x${innerH} px inside a ${size.width}x${size.height} canvas`,
    );
  }
  return margins;
}

export function squareCanvas(outSize: number): CanvasSize {
  if (!Number.isInteger(outSize) || outSize <= 0) {
    throw new ConfigError(`out-size must be a positive integer, got ${outSize}`);
  }
  return { width: outSize, height: outSize };
}

/** Local calendar date as YYYY-MM-DD. */
export function todayIsoDate(now: Date = new Date()): string {
  const y = String(now.getFullYear()).padStart(4, "0");
  const m = String(now.getMonth() + 1).padStart(2, "0");
  const d = String(now.getDate()).padStart(2, "0");
  return `${y}-${m}-${d}`;
}
