import { describe, expect, it } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { loadEnv, parseEnv } from "./env.js";

const makeTempDir = (): string => fs.mkdtempSync(path.join(os.tmpdir(), "margin-crop-env-"));

describe("parseEnv", () => {
  it("handles exports, quotes, comments and escaped newlines", () => {
    const parsed = parseEnv(
      [
        "MARGIN_CROP_DPI=300",
        'export MARGIN_CROP_GS_PATH="/opt/gs/bin/gs"',
        "WITH_COMMENT=value # comment",
        "QUOTED='hello world'",
        "MULTI=line1\\nline2",
        "EMPTY=",
        "INVALIDLINE",
        "# comment only",
      ].join("\n")
    );

    expect(parsed).toEqual({
      MARGIN_CROP_DPI: "300",
      MARGIN_CROP_GS_PATH: "/opt/gs/bin/gs",
      WITH_COMMENT: "value",
      QUOTED: "hello world",
      MULTI: "line1\nline2",
      EMPTY: "",
    });
  });
});

describe("loadEnv", () => {
  it("loads .env files from the project root and keeps existing values", () => {
    const root = makeTempDir();
    fs.writeFileSync(path.join(root, "crop.config.yaml"), "");
    const envPath = path.join(root, ".env");
    fs.writeFileSync(envPath, "MARGIN_CROP_DPI=300\nMARGIN_CROP_THRESHOLD=200");
    const localPath = path.join(root, ".env.local");
    fs.writeFileSync(localPath, "MARGIN_CROP_DPI=600\nLOCAL=local");

    const cwd = path.join(root, "apps", "sub");
    fs.mkdirSync(cwd, { recursive: true });

    const env: Record<string, string> = { MARGIN_CROP_THRESHOLD: "150" };
    const result = loadEnv({ cwd, env });

    expect(result.loadedFiles).toEqual([envPath, localPath]);
    expect(result.skippedFiles).toEqual([]);
    expect(env.MARGIN_CROP_DPI).toBe("300");
    expect(env.MARGIN_CROP_THRESHOLD).toBe("150");
    expect(env.LOCAL).toBe("local");
  });

  it("reports .env entries that cannot be read", () => {
    const root = makeTempDir();
    const cwd = path.join(root, "nested");
    fs.mkdirSync(cwd, { recursive: true });
    fs.mkdirSync(path.join(cwd, ".env"));

    const env: Record<string, string> = {};
    const result = loadEnv({ cwd, env });

    expect(result.loadedFiles).toEqual([]);
    expect(result.skippedFiles.map((entry) => entry.path)).toEqual([path.join(cwd, ".env")]);
    expect(Object.keys(env)).toHaveLength(0);
  });
});
