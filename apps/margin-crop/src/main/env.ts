import fs from "node:fs";
import path from "node:path";

type LoadEnvResult = {
  loadedFiles: string[];
  skippedFiles: Array<{ path: string; reason: string }>;
};

const ROOT_MARKERS = ["crop.config.yaml", ".git"];

export const parseEnv = (raw: string): Record<string, string> => {
  const entries: Record<string, string> = {};
  for (const line of raw.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;

    const withoutExport = trimmed.startsWith("export ") ? trimmed.slice(7).trim() : trimmed;
    const eqIndex = withoutExport.indexOf("=");
    if (eqIndex === -1) continue;

    const key = withoutExport.slice(0, eqIndex).trim();
    if (!key) continue;

    let value = withoutExport.slice(eqIndex + 1).trim();
    const isQuoted =
      (value.startsWith('"') && value.endsWith('"')) ||
      (value.startsWith("'") && value.endsWith("'"));

    if (isQuoted) {
      value = value.slice(1, -1);
    } else {
      const hashIndex = value.indexOf("#");
      if (hashIndex !== -1) {
        value = value.slice(0, hashIndex).trim();
      }
    }

    entries[key] = value.replace(/\\n/g, "\n");
  }
  return entries;
};

const findProjectRoot = (startDir: string): string => {
  let current = startDir;
  for (let i = 0; i < 6; i += 1) {
    if (ROOT_MARKERS.some((marker) => fs.existsSync(path.join(current, marker)))) {
      return current;
    }
    const parent = path.dirname(current);
    if (parent === current) break;
    current = parent;
  }
  return startDir;
};

/**
 * Loads `.env` then `.env.local` from the project root into `env` without
 * replacing variables that are already set.
 */
export const loadEnv = (options: { cwd?: string; env?: NodeJS.ProcessEnv } = {}): LoadEnvResult => {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const root = findProjectRoot(cwd);
  const candidates = [path.join(root, ".env"), path.join(root, ".env.local")];
  const result: LoadEnvResult = { loadedFiles: [], skippedFiles: [] };

  for (const filePath of candidates) {
    if (!fs.existsSync(filePath)) continue;
    let raw: string;
    try {
      raw = fs.readFileSync(filePath, "utf-8");
    } catch (error) {
      result.skippedFiles.push({
        path: filePath,
        reason: error instanceof Error ? error.message : String(error),
      });
      continue;
    }
    for (const [key, value] of Object.entries(parseEnv(raw))) {
      if (env[key] === undefined) {
        env[key] = value;
      }
    }
    result.loadedFiles.push(filePath);
  }

  return result;
};
