#!/usr/bin/env tsx
/**
 * Crops the margins of one PDF file.
 *
 *   npm run crop -- <input.pdf> [output.pdf] [crop.config.yaml]
 */

import crypto from "node:crypto";
import path from "node:path";
import { loadCropConfig, resolveCropConfig } from "../src/main/crop-config.js";
import { loadEnv } from "../src/main/env.js";
import { CropCancelledError, errorMessage } from "../src/main/errors.js";
import { cropPdf } from "../src/main/crop-runner.js";
import { getRunDir } from "../src/main/run-paths.js";
import { createPageProgress, info, note, section, startStep } from "./cli.js";

const defaultOutputPath = (inputPath: string): string => {
  const parsed = path.parse(inputPath);
  return path.join(parsed.dir, `${parsed.name}_cropped${parsed.ext || ".pdf"}`);
};

async function main(): Promise<number> {
  const env = loadEnv();
  const [inputArg, outputArg, configArg] = process.argv.slice(2);
  if (!inputArg) {
    console.error("Usage: crop-pdf <input.pdf> [output.pdf] [crop.config.yaml]");
    return 2;
  }

  const inputPath = path.resolve(inputArg);
  const outputPath = path.resolve(outputArg ?? defaultOutputPath(inputArg));
  const runId = `crop-${Date.now()}-${crypto.randomUUID().split("-")[0]}`;
  const runDir = getRunDir(process.cwd(), runId);

  section("MARGIN CROP");
  info(`Input: ${inputPath}`);
  info(`Output: ${outputPath}`);
  info(`Run dir: ${runDir}`);
  for (const file of env.loadedFiles) note(`Loaded ${file}`);
  for (const skipped of env.skippedFiles) note(`Skipped ${skipped.path}: ${skipped.reason}`);

  const configStep = startStep("Load configuration");
  const loaded = await loadCropConfig(configArg);
  const { resolvedConfig, envOverrides } = resolveCropConfig(loaded.config, { env: process.env });
  configStep.end(
    "ok",
    loaded.loadedFromFile ? loaded.configPath : "defaults (no configuration file)"
  );
  if (Object.keys(envOverrides).length > 0) {
    note(`Environment overrides: ${JSON.stringify(envOverrides)}`);
  }

  const controller = new AbortController();
  const onSigint = (): void => controller.abort();
  process.once("SIGINT", onSigint);

  const cropStep = startStep("Crop pages");
  try {
    const report = await cropPdf({
      inputPath,
      outputPath,
      config: resolvedConfig,
      runDir,
      signal: controller.signal,
      onProgress: createPageProgress("Bounding boxes"),
    });
    cropStep.end("ok", `${report.croppedPages}/${report.pageCount} pages via ${report.source}`);
    return 0;
  } catch (error) {
    if (error instanceof CropCancelledError) {
      cropStep.end("warn", "cancelled");
      return 130;
    }
    cropStep.end("fail", errorMessage(error));
    return 1;
  } finally {
    process.off("SIGINT", onSigint);
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(errorMessage(error));
    process.exitCode = 1;
  });
