#!/usr/bin/env node
// src/cli.ts
import { Command, InvalidArgumentError } from "commander";
import { config as dotenvConfig } from "dotenv";
import { readFile, writeFile } from "node:fs/promises";

import { processFolder, stringifyProcessResult } from "./batch/processFolder.js";
import { RemoveBgClient } from "./batch/removeBg.js";
import { DEFAULTS, resolveApiKey, resolveMargins, squareCanvas, todayIsoDate } from "./config.js";
import type { MarginOptions } from "./config.js";
import { hasPngSignature } from "./png/chunks.js";
import { listPngChunks } from "./png/inspect.js";
import { extractXmpFromPng } from "./xmp/pngEmbed.js";
import { describeResult } from "./xmp/result.js";
import { writeProcessedTags } from "./xmp/tags.js";

dotenvConfig();

function intAtLeast(min: number): (value: string) => number {
  return (value) => {
    const n = Number(value);
    if (!Number.isInteger(n) || n < min) {
      throw new InvalidArgumentError(`Expected an integer >= ${min}.`);
    }
    return n;
  };
}

function isoDate(value: string): string {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) {
    throw new InvalidArgumentError("Expected a date as YYYY-MM-DD.");
  }
  return value;
}

function defaultRunId(): string {
  return new Date().toISOString().replace(/[:.]/g, "-");
}

const program = new Command();

program
  .name("cutout-square")
  .description("Batch remove backgrounds with remove.bg and output squared images.")
  .version("0.1.0");

program
  .command("run", { isDefault: true })
  .description("Process every image in the input folder")
  .option("-i, --input-dir <dir>", "Folder of input images", DEFAULTS.inputDir)
  .option("-o, --output-dir <dir>", "Folder for output images", DEFAULTS.outputDir)
  .option("--out-size <px>", "Final output square size in pixels", intAtLeast(1), DEFAULTS.outSize)
  .option("--margin <px>", "Margin on every side of the subject", intAtLeast(0), DEFAULTS.margin)
  .option("--margin-left <px>", "Left margin (overrides --margin)", intAtLeast(0))
  .option("--margin-right <px>", "Right margin (overrides --margin)", intAtLeast(0))
  .option("--margin-top <px>", "Top margin (overrides --margin)", intAtLeast(0))
  .option("--margin-bottom <px>", "Bottom margin (overrides --margin)", intAtLeast(0))
  .option("--remove-size <size>", 'remove.bg "size" parameter (auto, preview, full, ...)', DEFAULTS.removeSize)
  .option("--api-key <key>", "remove.bg API key (overrides REMOVE_BG_API_KEY)")
  .option("--tool <name>", "Tool name recorded in the XMP tags", DEFAULTS.tool)
  .option("--no-embed-xmp", "Do not embed XMP into output PNGs")
  .option("--sidecar", "Also write a <file>.xmp sidecar next to each output", DEFAULTS.alsoWriteSidecar)
  .option("--report <path>", "Write the run summary as JSON")
  .option("--run-id <id>", "Identifier recorded in the run summary")
  .action(
    async (opts: {
      inputDir: string;
      outputDir: string;
      outSize: number;
      margin: number;
      marginLeft?: number;
      marginRight?: number;
      marginTop?: number;
      marginBottom?: number;
      removeSize: string;
      apiKey?: string;
      tool: string;
      embedXmp: boolean;
      sidecar: boolean;
      report?: string;
      runId?: string;
    }) => {
      const canvas = squareCanvas(opts.outSize);

      const marginOpts: {
        margin: number;
        marginLeft?: number;
        marginRight?: number;
        marginTop?: number;
        marginBottom?: number;
      } = { margin: opts.margin };
      if (opts.marginLeft !== undefined) marginOpts.marginLeft = opts.marginLeft;
      if (opts.marginRight !== undefined) marginOpts.marginRight = opts.marginRight;
      if (opts.marginTop !== undefined) marginOpts.marginTop = opts.marginTop;
      if (opts.marginBottom !== undefined) marginOpts.marginBottom = opts.marginBottom;
      const margins = resolveMargins(marginOpts satisfies MarginOptions, canvas);

      const remover = new RemoveBgClient({
        apiKey: resolveApiKey(opts.apiKey),
        size: opts.removeSize,
      });

      const result = await processFolder(
        {
          inputDir: opts.inputDir,
          outputDir: opts.outputDir,
          canvas,
          margins,
          tool: opts.tool,
          runDate: todayIsoDate(),
          runId: opts.runId ?? defaultRunId(),
          embedPngXmp: opts.embedXmp,
          alsoWriteSidecar: opts.sidecar,
        },
        { remover },
      );

      if (opts.report) await writeFile(opts.report, stringifyProcessResult(result), "utf8");
      console.log(`Wrote ${result.written.length} file(s) to: ${opts.outputDir}`);
    },
  );

program
  .command("tag")
  .description("Write processed-by XMP tags into existing images")
  .argument("<files...>", "Images to tag")
  .option("--tool <name>", "Tool name recorded in the XMP tags", DEFAULTS.tool)
  .option("--date <yyyy-mm-dd>", "Processing date (default: today)", isoDate)
  .option("--no-embed-xmp", "Do not embed XMP into PNGs")
  .option("--sidecar", "Also write a <file>.xmp sidecar", false)
  .action(
    (files: string[], opts: { tool: string; date?: string; embedXmp: boolean; sidecar: boolean }) => {
      const date = opts.date ?? todayIsoDate();
      let failures = 0;

      for (const file of files) {
        const summary = writeProcessedTags(file, {
          tool: opts.tool,
          date,
          embedPng: opts.embedXmp,
          alsoWriteSidecar: opts.sidecar,
        });

        const parts: string[] = [];
        if (summary.embed) parts.push(`embed=${describeResult(summary.embed)}`);
        if (summary.sidecar) parts.push(`sidecar=${describeResult(summary.sidecar)}`);
        console.log(`${file}: ${parts.join(" ") || "nothing to do"}`);

        if (!summary.ok) failures++;
      }

      if (failures > 0) {
        console.warn(`${failures} of ${files.length} file(s) could not be tagged`);
        process.exitCode = 1;
      }
    },
  );

program
  .command("inspect")
  .description("List the chunks of a PNG and print its embedded XMP packet")
  .argument("<png>", "Path to a PNG file")
  .action(async (file: string) => {
    const buf = await readFile(file);
    if (!hasPngSignature(buf)) throw new Error(`${file}: not a PNG (bad signature)`);

    for (const line of listPngChunks(buf)) process.stdout.write(line + "\n");

    const xmp = extractXmpFromPng(buf);
    if (xmp) process.stdout.write("\n" + xmp.toString("utf8") + "\n");
    else process.stdout.write("\n(no XMP packet)\n");
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const msg = err instanceof Error ? err.message : String(err);
  process.stderr.write(msg + "\n");
  process.exitCode = 1;
});
