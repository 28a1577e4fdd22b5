import fs from "node:fs/promises";
import path from "node:path";
import YAML from "yaml";
import { z } from "zod";
import type { CropPolicy, ExtractionSettings, MarginVector } from "../contracts/contracts.js";
import {
  allPages,
  assertNonNegativeWeights,
  isPlainObject,
  parsePageRanges,
} from "../contracts/validation.js";
import { CropConfigurationError } from "./errors.js";
import { parsePageRatio } from "./page-ratio.js";
import { DEFAULT_THRESHOLD } from "./raster-threshold.js";

const marginTuple = z.tuple([z.number(), z.number(), z.number(), z.number()]);

/** One number applies to all four margins. */
const marginValues = (fallback: number) =>
  z
    .union([z.number(), marginTuple])
    .default(fallback)
    .transform(
      (value): MarginVector => (typeof value === "number" ? [value, value, value, value] : value)
    );

const boxKind = z.enum(["media", "crop", "trim", "art", "bleed"]);

const cropConfigSchema = z.object({
  crop: z
    .object({
      percent_retain: marginValues(10),
      absolute_offset: marginValues(0),
      absolute_pre_crop: marginValues(0),
      uniform: z.boolean().default(false),
      uniform_order_stat: z
        .union([z.number().int(), marginTuple])
        .nullable()
        .default(null)
        .transform((value): MarginVector | null =>
          typeof value === "number" ? [value, value, value, value] : value
        ),
      uniform_order_percent: z.number().nullable().default(null),
      even_odd: z.boolean().default(false),
      same_page_size: z.boolean().default(false),
      same_page_size_order_stat: z.number().int().min(0).default(0),
      set_page_ratio: z.union([z.string(), z.number()]).nullable().default(null),
      page_ratio_weights: marginValues(1),
      percent_text: z.boolean().default(false),
      keep_horiz_center: z.boolean().default(false),
      keep_vert_center: z.boolean().default(false),
      crop_safe: z.boolean().default(false),
      crop_safe_min: marginValues(0),
      pages: z.string().nullable().default(null),
      full_page_box: z.array(boxKind).min(1).default(["media", "crop"]),
      boxes_to_set: z.array(boxKind).min(1).default(["media", "crop"]),
    })
    .default({}),
  bounding_box: z
    .object({
      method: z.enum(["auto", "pdftoppm", "ghostscript-raster", "ghostscript-bbox"]).default("auto"),
      dpi: z
        .object({
          x: z.number().positive().default(150),
          y: z.number().positive().default(150),
        })
        .default({}),
      threshold: z.number().int().min(-255).max(255).default(DEFAULT_THRESHOLD),
      num_blurs: z.number().int().min(0).default(0),
      num_smooths: z.number().int().min(0).default(0),
      concurrency: z.number().int().min(1).default(4),
      max_attempts: z.number().int().min(1).default(3),
      retry_delay_ms: z.number().min(0).default(1000),
    })
    .default({}),
  logging: z
    .object({
      level: z.enum(["debug", "info", "warn", "error"]).default("info"),
      per_page_logs: z.boolean().default(false),
      keep_logs: z.boolean().default(true),
      echo_warnings: z.boolean().default(true),
    })
    .default({}),
});

export type CropConfig = z.infer<typeof cropConfigSchema>;

export type LoadedCropConfig = {
  config: CropConfig;
  configPath: string;
  loadedFromFile: boolean;
};

const resolveConfigPath = (configPath?: string): string =>
  configPath ??
  process.env.MARGIN_CROP_CONFIG_PATH ??
  path.join(process.cwd(), "crop.config.yaml");

export const mergeDeep = (
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> => {
  const output: Record<string, unknown> = { ...target };
  Object.entries(source).forEach(([key, value]) => {
    if (value === undefined) return;
    const base = output[key];
    if (isPlainObject(value) && isPlainObject(base)) {
      output[key] = mergeDeep(base, value);
      return;
    }
    output[key] = value;
  });
  return output;
};

export const parseCropConfig = (raw: unknown, label = "configuration"): CropConfig => {
  const result = cropConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new CropConfigurationError(`Invalid ${label}: ${issues}`);
  }
  return result.data;
};

export const defaultCropConfig = (): CropConfig => parseCropConfig({});

const isMissingFile = (error: unknown): boolean =>
  isPlainObject(error) && error.code === "ENOENT";

export const loadCropConfig = async (configPath?: string): Promise<LoadedCropConfig> => {
  const resolvedPath = resolveConfigPath(configPath);
  let raw: string;
  try {
    raw = await fs.readFile(resolvedPath, "utf-8");
  } catch (error) {
    if (isMissingFile(error)) {
      return { config: defaultCropConfig(), configPath: resolvedPath, loadedFromFile: false };
    }
    throw error;
  }
  const parsed: unknown = YAML.parse(raw);
  if (!isPlainObject(parsed)) {
    return { config: defaultCropConfig(), configPath: resolvedPath, loadedFromFile: false };
  }
  return {
    config: parseCropConfig(parsed, resolvedPath),
    configPath: resolvedPath,
    loadedFromFile: true,
  };
};

const positiveNumber = (value: string | undefined): number | null => {
  if (value === undefined || value.trim() === "") return null;
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : null;
};

/** Applies caller overrides, then `MARGIN_CROP_*` environment variables. */
export const resolveCropConfig = (
  baseConfig: CropConfig,
  options?: {
    overrides?: Record<string, unknown>;
    env?: Record<string, string | undefined>;
  }
): { resolvedConfig: CropConfig; envOverrides: Record<string, unknown> } => {
  const env = options?.env ?? {};
  const boundingBox: Record<string, unknown> = {};

  const dpi = positiveNumber(env.MARGIN_CROP_DPI);
  if (dpi !== null) boundingBox.dpi = { x: dpi, y: dpi };
  const concurrency = positiveNumber(env.MARGIN_CROP_CONCURRENCY);
  if (concurrency !== null) boundingBox.concurrency = Math.floor(concurrency);
  const thresholdRaw = env.MARGIN_CROP_THRESHOLD;
  if (thresholdRaw !== undefined && thresholdRaw.trim() !== "") {
    const threshold = Number(thresholdRaw);
    if (Number.isInteger(threshold)) boundingBox.threshold = threshold;
  }

  const envOverrides: Record<string, unknown> =
    Object.keys(boundingBox).length > 0 ? { bounding_box: boundingBox } : {};
  const merged = mergeDeep(mergeDeep(baseConfig, options?.overrides ?? {}), envOverrides);
  return { resolvedConfig: parseCropConfig(merged), envOverrides };
};

/** Builds the immutable policy for one document; invalid combinations fail here. */
export const resolveCropPolicy = (config: CropConfig, pageCount: number): CropPolicy => {
  const crop = config.crop;
  if (crop.uniform_order_stat !== null && crop.uniform_order_percent !== null) {
    throw new CropConfigurationError(
      "uniform_order_stat and uniform_order_percent cannot be used together"
    );
  }
  const setPageRatio = crop.set_page_ratio === null ? null : parsePageRatio(crop.set_page_ratio);
  const pagesToCrop = crop.pages === null ? allPages(pageCount) : parsePageRanges(crop.pages, pageCount);

  return {
    percentRetain: crop.percent_retain,
    absoluteOffset: crop.absolute_offset,
    absolutePreCrop: crop.absolute_pre_crop,
    uniform: crop.uniform,
    uniformOrderStat: crop.uniform_order_stat,
    uniformOrderPercent: crop.uniform_order_percent,
    evenOdd: crop.even_odd,
    samePageSize: crop.same_page_size || crop.same_page_size_order_stat > 0,
    samePageSizeOrderStat: crop.same_page_size_order_stat,
    setPageRatio,
    pageRatioWeights: assertNonNegativeWeights(crop.page_ratio_weights, "page_ratio_weights"),
    percentText: crop.percent_text,
    keepHorizCenter: crop.keep_horiz_center,
    keepVertCenter: crop.keep_vert_center,
    cropSafe: crop.crop_safe,
    cropSafeMin: crop.crop_safe_min,
    pagesToCrop,
  };
};

export const resolveExtractionSettings = (config: CropConfig): ExtractionSettings => ({
  dpi: { x: config.bounding_box.dpi.x, y: config.bounding_box.dpi.y },
  threshold: config.bounding_box.threshold,
  numBlurs: config.bounding_box.num_blurs,
  numSmooths: config.bounding_box.num_smooths,
  referenceBoxes: config.crop.full_page_box,
  concurrency: config.bounding_box.concurrency,
  maxAttempts: config.bounding_box.max_attempts,
  retryDelayMs: config.bounding_box.retry_delay_ms,
});
