import { describe, expect, it } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import {
  defaultCropConfig,
  loadCropConfig,
  mergeDeep,
  parseCropConfig,
  resolveCropConfig,
  resolveCropPolicy,
  resolveExtractionSettings,
} from "./crop-config.js";
import { CropConfigurationError } from "./errors.js";

const writeConfig = async (contents: string): Promise<string> => {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "margin-crop-config-"));
  const configPath = path.join(dir, "crop.config.yaml");
  await fs.writeFile(configPath, contents);
  return configPath;
};

describe("crop configuration", () => {
  it("fills in defaults", () => {
    const config = defaultCropConfig();
    expect(config.crop.percent_retain).toEqual([10, 10, 10, 10]);
    expect(config.crop.full_page_box).toEqual(["media", "crop"]);
    expect(config.crop.boxes_to_set).toEqual(["media", "crop"]);
    expect(config.bounding_box).toMatchObject({
      method: "auto",
      dpi: { x: 150, y: 150 },
      threshold: 191,
      concurrency: 4,
      max_attempts: 3,
    });
    expect(config.logging.level).toBe("info");
    expect(Object.keys(config)).toEqual(["crop", "bounding_box", "logging"]);
  });

  it("uses defaults when the file is missing", async () => {
    const loaded = await loadCropConfig(path.join(os.tmpdir(), "missing-margin-crop.yaml"));
    expect(loaded.loadedFromFile).toBe(false);
    expect(loaded.config).toEqual(defaultCropConfig());
  });

  it("loads YAML and broadcasts single margin values", async () => {
    const configPath = await writeConfig(
      [
        "crop:",
        "  percent_retain: 5",
        "  absolute_offset: [1, 2, 3, 4]",
        "  uniform: true",
        "  uniform_order_stat: 2",
        "bounding_box:",
        "  method: pdftoppm",
        "  dpi:",
        "    x: 300",
      ].join("\n")
    );
    const loaded = await loadCropConfig(configPath);

    expect(loaded.loadedFromFile).toBe(true);
    expect(loaded.config.crop.percent_retain).toEqual([5, 5, 5, 5]);
    expect(loaded.config.crop.absolute_offset).toEqual([1, 2, 3, 4]);
    expect(loaded.config.crop.uniform_order_stat).toEqual([2, 2, 2, 2]);
    expect(loaded.config.bounding_box.method).toBe("pdftoppm");
    expect(loaded.config.bounding_box.dpi).toEqual({ x: 300, y: 150 });
  });

  it("names every invalid field", async () => {
    const configPath = await writeConfig("bounding_box:\n  threshold: 300\n  method: magic\n");
    const result = loadCropConfig(configPath);
    await expect(result).rejects.toBeInstanceOf(CropConfigurationError);
    await expect(result).rejects.toThrow("bounding_box.threshold");
    await expect(result).rejects.toThrow("bounding_box.method");
  });

  it("applies overrides and MARGIN_CROP_* variables", () => {
    const { resolvedConfig, envOverrides } = resolveCropConfig(defaultCropConfig(), {
      overrides: { crop: { uniform: true } },
      env: {
        MARGIN_CROP_DPI: "200",
        MARGIN_CROP_CONCURRENCY: "2.7",
        MARGIN_CROP_THRESHOLD: "-100",
      },
    });

    expect(envOverrides).toEqual({
      bounding_box: { dpi: { x: 200, y: 200 }, concurrency: 2, threshold: -100 },
    });
    expect(resolvedConfig.crop.uniform).toBe(true);
    expect(resolvedConfig.bounding_box.dpi).toEqual({ x: 200, y: 200 });
    expect(resolvedConfig.bounding_box.concurrency).toBe(2);
    expect(resolvedConfig.bounding_box.threshold).toBe(-100);
  });

  it("ignores unusable environment values", () => {
    const { envOverrides, resolvedConfig } = resolveCropConfig(defaultCropConfig(), {
      env: { MARGIN_CROP_DPI: "abc", MARGIN_CROP_THRESHOLD: "1.5" },
    });
    expect(envOverrides).toEqual({});
    expect(resolvedConfig).toEqual(defaultCropConfig());
  });

  it("merges nested objects without replacing siblings", () => {
    expect(mergeDeep({ a: { b: 1, c: 2 }, d: 3 }, { a: { c: 4 }, d: undefined })).toEqual({
      a: { b: 1, c: 4 },
      d: 3,
    });
  });
});

describe("resolveCropPolicy", () => {
  it("builds the policy for a document", () => {
    const config = parseCropConfig({
      crop: {
        pages: "2-3",
        set_page_ratio: "3:4",
        same_page_size_order_stat: 2,
        page_ratio_weights: [1, 0, 1, 0],
      },
    });
    const policy = resolveCropPolicy(config, 5);

    expect([...policy.pagesToCrop].sort((a, b) => a - b)).toEqual([1, 2]);
    expect(policy.setPageRatio).toBe(0.75);
    expect(policy.samePageSize).toBe(true);
    expect(policy.pageRatioWeights).toEqual([1, 0, 1, 0]);
    expect(policy.percentRetain).toEqual([10, 10, 10, 10]);
  });

  it("crops every page when no range is given", () => {
    const policy = resolveCropPolicy(defaultCropConfig(), 3);
    expect([...policy.pagesToCrop]).toEqual([0, 1, 2]);
  });

  it("rejects conflicting and invalid settings", () => {
    expect(() =>
      resolveCropPolicy(
        parseCropConfig({ crop: { uniform_order_stat: 1, uniform_order_percent: 10 } }),
        3
      )
    ).toThrow("cannot be used together");
    expect(() =>
      resolveCropPolicy(parseCropConfig({ crop: { page_ratio_weights: [1, -1, 1, 1] } }), 3)
    ).toThrow(CropConfigurationError);
    expect(() => resolveCropPolicy(parseCropConfig({ crop: { set_page_ratio: "1:2:3" } }), 3)).toThrow(
      CropConfigurationError
    );
  });

  it("maps the extraction settings", () => {
    const config = parseCropConfig({ bounding_box: { num_blurs: 2, retry_delay_ms: 0 } });
    expect(resolveExtractionSettings(config)).toEqual({
      dpi: { x: 150, y: 150 },
      threshold: 191,
      numBlurs: 2,
      numSmooths: 0,
      referenceBoxes: ["media", "crop"],
      concurrency: 4,
      maxAttempts: 3,
      retryDelayMs: 0,
    });
  });
});
