// src/batch/processFolder.ts
import path from "node:path";
import { mkdir, readFile, writeFile } from "node:fs/promises";

import { errorMessage } from "../errors.js";
import { fitOnWhiteCanvas } from "../image/canvas.js";
import type { CanvasSize, Margins } from "../image/canvas.js";
import { normalizeToPng } from "../image/normalize.js";
import { decodePngRgba, encodePngRgb } from "../image/png.js";
import type { RgbaImage } from "../image/rgbaImage.js";
import { describeResult } from "../xmp/result.js";
import { writeProcessedTags } from "../xmp/tags.js";
import { copyToBadFolder } from "./badFolder.js";
import { inputKind, listInputFiles, mimeTypeFor } from "./inputs.js";
import type { BackgroundRemover, UploadImage } from "./removeBg.js";

export type ProcessFolderOptions = Readonly<{
  inputDir: string;
  outputDir: string;
  canvas: CanvasSize;
  margins: Margins;
  tool: string;
  /** Stamped into every output's XMP, YYYY-MM-DD. */
  runDate: string;
  runId: string;
  embedPngXmp: boolean;
  alsoWriteSidecar: boolean;
}>;

export type ProcessFolderDeps = Readonly<{
  remover: BackgroundRemover;
  log?: (line: string) => void;
  /** Milliseconds, for per-image timings. */
  now?: () => number;
}>;

export type ProcessedFile = Readonly<{ src: string; dest: string; seconds: number }>;

export type UnprocessedFile = Readonly<{
  src: string;
  dest: string;
  reason: string;
  error: string;
  seconds: number;
}>;

export type ProcessResult = Readonly<{
  runId: string;
  written: string[];
  processed: number;
  unprocessed: number;
  processedFiles: ProcessedFile[];
  unprocessedFiles: UnprocessedFile[];
}>;

const MAX_ERROR_CHARS = 2000;

/** A step that failed for one file: `reason` is the stable code, `note` the human text. */
class FileSkip extends Error {
  public override readonly name = "FileSkip";

  public constructor(
    public readonly reason: string,
    public readonly note: string,
    public readonly error: string,
  ) {
    super(note);
  }
}

export function outputPathFor(outputDir: string, inputFile: string): string {
  return path.join(outputDir, `${path.parse(inputFile).name}.png`);
}

/**
 * Removes the background of every image in `inputDir`, centers each cutout on a white
 * canvas, writes it to `outputDir` as PNG and tags it with XMP provenance. A file that
 * fails is copied to `<outputDir>/bad` with a note and the run moves on.
 */
export async function processFolder(
  opts: ProcessFolderOptions,
  deps: ProcessFolderDeps,
): Promise<ProcessResult> {
  const log = deps.log ?? ((line: string) => console.log(line));
  const now = deps.now ?? (() => performance.now());

  await mkdir(opts.outputDir, { recursive: true });
  await mkdir(opts.inputDir, { recursive: true });

  const totalT0 = now();
  const files = await listInputFiles(opts.inputDir);

  const written: string[] = [];
  const processedFiles: ProcessedFile[] = [];
  const unprocessedFiles: UnprocessedFile[] = [];

  if (files.length === 0) {
    log("No input files found.");
    return { runId: opts.runId, written, processed: 0, unprocessed: 0, processedFiles, unprocessedFiles };
  }

  const badDir = path.join(opts.outputDir, "bad");

  // Each step either returns its value or throws a FileSkip for this file.
  async function produce(file: string): Promise<string> {
    const kind = inputKind(file);
    if (kind === "unsupported") {
      throw new FileSkip(
        "unsupported_input",
        "Unsupported input format (skipped)",
        `no decoder for ${path.extname(file)}`,
      );
    }

    let bytes: Buffer;
    try {
      bytes = await readFile(file);
    } catch (err: unknown) {
      throw new FileSkip("read_failed", "Read input failed (skipped)", errorMessage(err));
    }

    let upload: UploadImage = { fileName: path.basename(file), mimeType: mimeTypeFor(file), bytes };
    if (kind === "normalize") {
      try {
        upload = {
          fileName: `${path.parse(file).name}.png`,
          mimeType: "image/png",
          bytes: await normalizeToPng(bytes),
        };
      } catch (err: unknown) {
        throw new FileSkip("normalize_failed", "Normalize/open failed (skipped)", errorMessage(err));
      }
    }

    const removal = await deps.remover.removeBackground(upload);
    if (!removal.ok) {
      throw new FileSkip(removal.reason, `remove.bg failed: ${removal.reason} (skipped)`, removal.detail);
    }

    let cutout: RgbaImage;
    try {
      cutout = decodePngRgba(removal.png);
    } catch (err: unknown) {
      throw new FileSkip(
        "decode_cutout_failed",
        "Failed to open remove.bg output (skipped)",
        errorMessage(err),
      );
    }

    let composed: RgbaImage;
    try {
      composed = fitOnWhiteCanvas(cutout, opts.canvas, opts.margins);
    } catch (err: unknown) {
      throw new FileSkip("canvas_failed", "Canvas/paste failed (skipped)", errorMessage(err));
    }

    const outPath = outputPathFor(opts.outputDir, file);
    try {
      await writeFile(outPath, encodePngRgb(composed));
    } catch (err: unknown) {
      throw new FileSkip("save_failed", "Save output failed (skipped)", errorMessage(err));
    }
    return outPath;
  }

  for (const [i, file] of files.entries()) {
    const t0 = now();
    const src = path.basename(file);
    log(`[${i + 1}/${files.length}] Processing: ${file}`);

    let outPath: string;
    try {
      outPath = await produce(file);
    } catch (err: unknown) {
      if (!(err instanceof FileSkip)) throw err;

      const badCopy = await copyToBadFolder(file, badDir, err.note, err.error, log);
      log(`  -> Skipped (${err.reason})`);
      unprocessedFiles.push({
        src,
        dest: badCopy ? path.basename(badCopy) : "",
        reason: err.reason,
        error: err.error.slice(0, MAX_ERROR_CHARS),
        seconds: (now() - t0) / 1000,
      });
      continue;
    }

    written.push(outPath);

    const tags = writeProcessedTags(outPath, {
      tool: opts.tool,
      date: opts.runDate,
      embedPng: opts.embedPngXmp,
      alsoWriteSidecar: opts.alsoWriteSidecar,
    });
    if (tags.ok) {
      log(`  [XMP] tagged: ${path.basename(outPath)} (ProcessedWith:${opts.tool})`);
    } else {
      const why = [tags.embed, tags.sidecar].flatMap((r) => (r ? [describeResult(r)] : []));
      log(`  [XMP] FAILED to tag: ${path.basename(outPath)} (${why.join("; ") || "nothing requested"})`);
    }

    const seconds = (now() - t0) / 1000;
    log(`  Wrote: ${outPath}`);
    log(`  Per-image time: ${seconds.toFixed(2)}s`);
    processedFiles.push({ src, dest: path.basename(outPath), seconds });
  }

  log(
    `[TOTAL] Finished ${written.length}/${files.length} images in ${((now() - totalT0) / 1000).toFixed(2)}s`,
  );

  return {
    runId: opts.runId,
    written,
    processed: written.length,
    unprocessed: unprocessedFiles.length,
    processedFiles,
    unprocessedFiles,
  };
}

export function stringifyProcessResult(result: ProcessResult): string {
  return JSON.stringify(result, null, 2) + "\n";
}
