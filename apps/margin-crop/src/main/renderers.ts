import { spawn, spawnSync } from "node:child_process";
import fs from "node:fs/promises";
import type {
  Box,
  BoundingBoxMethod,
  BoundingBoxSource,
  BoxKind,
  Dpi,
  RasterBoundingBoxSource,
  VectorBoundingBoxSource,
} from "../contracts/contracts.js";
import { CropConfigurationError } from "./errors.js";
import { createNullLogger, type CropLogger } from "./logger.js";
import { decodeRaster } from "./raster-threshold.js";
import { getPageImageRoot } from "./run-paths.js";

type CommandResult = {
  stdout: string;
  stderr: string;
  code: number | null;
};

type ExecutableSpec = {
  label: string;
  envVar: string;
  candidates: string[];
  probeArgs: string[];
  marker: string;
};

const GHOSTSCRIPT: ExecutableSpec = {
  label: "Ghostscript",
  envVar: "MARGIN_CROP_GS_PATH",
  candidates: ["gs", "gswin64c", "gswin32c"],
  probeArgs: ["--version"],
  marker: "",
};

const PDFTOPPM: ExecutableSpec = {
  label: "pdftoppm",
  envVar: "MARGIN_CROP_PDFTOPPM_PATH",
  candidates: ["pdftoppm"],
  probeArgs: ["-v"],
  marker: "pdftoppm",
};

export const runCommand = (
  command: string,
  args: string[],
  options?: { signal?: AbortSignal }
): Promise<CommandResult> =>
  new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      stdio: ["ignore", "pipe", "pipe"],
      signal: options?.signal,
    });
    let stdout = "";
    let stderr = "";
    child.stdout.on("data", (chunk: Buffer) => {
      stdout += chunk.toString("utf-8");
    });
    child.stderr.on("data", (chunk: Buffer) => {
      stderr += chunk.toString("utf-8");
    });
    child.on("error", reject);
    child.on("close", (code) => resolve({ stdout, stderr, code }));
  });

const runChecked = async (
  command: string,
  args: string[],
  signal?: AbortSignal
): Promise<CommandResult> => {
  const result = await runCommand(command, args, { signal });
  if (result.code !== 0) {
    const detail = result.stderr.trim() || result.stdout.trim() || "no output";
    throw new Error(`${command} exited with code ${result.code}: ${detail}`);
  }
  return result;
};

export const findExecutable = (
  spec: ExecutableSpec,
  env: NodeJS.ProcessEnv = process.env
): string | null => {
  const override = env[spec.envVar];
  const candidates = override ? [override, ...spec.candidates] : spec.candidates;
  for (const candidate of candidates) {
    const probe = spawnSync(candidate, spec.probeArgs, { encoding: "utf-8" });
    if (probe.error) continue;
    const output = `${probe.stdout ?? ""}${probe.stderr ?? ""}`;
    if (probe.status === 0 || (spec.marker !== "" && output.includes(spec.marker))) {
      return candidate;
    }
  }
  return null;
};

export const findGhostscript = (env?: NodeJS.ProcessEnv): string | null =>
  findExecutable(GHOSTSCRIPT, env);

export const findPdftoppm = (env?: NodeJS.ProcessEnv): string | null =>
  findExecutable(PDFTOPPM, env);

const renderAndDecode = async (
  command: string,
  args: string[],
  imagePath: string,
  signal?: AbortSignal
) => {
  try {
    await runChecked(command, args, signal);
    return await decodeRaster(imagePath);
  } finally {
    await fs.rm(imagePath, { force: true });
  }
};

export const createPdftoppmRasterizer = (
  executable: string,
  pdfPath: string,
  tempDir: string
): RasterBoundingBoxSource => ({
  kind: "raster",
  name: "pdftoppm",
  renderPage: async (pageIndex: number, dpi: Dpi, signal?: AbortSignal) => {
    const root = getPageImageRoot(tempDir, pageIndex);
    const pageNumber = String(pageIndex + 1);
    const args = [
      "-f",
      pageNumber,
      "-l",
      pageNumber,
      "-rx",
      String(dpi.x),
      "-ry",
      String(dpi.y),
      "-gray",
      "-png",
      "-singlefile",
      pdfPath,
      root,
    ];
    return renderAndDecode(executable, args, `${root}.png`, signal);
  },
});

export const createGhostscriptRasterizer = (
  executable: string,
  pdfPath: string,
  tempDir: string
): RasterBoundingBoxSource => ({
  kind: "raster",
  name: "ghostscript",
  renderPage: async (pageIndex: number, dpi: Dpi, signal?: AbortSignal) => {
    const imagePath = `${getPageImageRoot(tempDir, pageIndex)}.png`;
    const pageNumber = pageIndex + 1;
    const args = [
      "-dSAFER",
      "-dNOPAUSE",
      "-dBATCH",
      "-dQUIET",
      "-sDEVICE=pnggray",
      `-r${dpi.x}x${dpi.y}`,
      `-dFirstPage=${pageNumber}`,
      `-dLastPage=${pageNumber}`,
      `-sOutputFile=${imagePath}`,
      pdfPath,
    ];
    return renderAndDecode(executable, args, imagePath, signal);
  },
});

// Ghostscript honours one page box; later kinds in this list take priority.
const BBOX_BOX_FLAGS: Array<[BoxKind, string]> = [
  ["crop", "-dUseCropBox"],
  ["trim", "-dUseTrimBox"],
  ["art", "-dUseArtBox"],
  ["bleed", "-dUseBleedBox"],
];

export const ghostscriptBoxFlag = (referenceBoxes: readonly BoxKind[]): string => {
  let flag = "-dUseMediaBox";
  for (const [kind, candidate] of BBOX_BOX_FLAGS) {
    if (referenceBoxes.includes(kind)) flag = candidate;
  }
  return flag;
};

/** Reads the `%%HiResBoundingBox:` lines the bbox device prints, one per page. */
export const parseGhostscriptBoundingBoxes = (
  output: string,
  logger: CropLogger = createNullLogger()
): Box[] => {
  const boxes: Box[] = [];
  for (const line of output.split(/\r?\n/)) {
    const parts = line.trim().split(/\s+/);
    if (parts[0] !== "%%HiResBoundingBox:") continue;
    const values = parts.slice(1).map(Number);
    if (values.length !== 4 || values.some((value) => !Number.isFinite(value))) {
      logger.warn("Ignoring an unparsable Ghostscript bounding box line", { line });
      continue;
    }
    boxes.push([values[0], values[1], values[2], values[3]]);
  }
  if (boxes.length === 0) {
    throw new Error("Ghostscript did not report any bounding boxes");
  }
  return boxes;
};

export const createGhostscriptBoundingBoxQuery = (
  executable: string,
  pdfPath: string,
  logger: CropLogger = createNullLogger()
): VectorBoundingBoxSource => ({
  kind: "vector",
  name: "ghostscript-bbox",
  queryBoundingBoxes: async (dpi, referenceBoxes, signal) => {
    const args = [
      "-dSAFER",
      "-dNOPAUSE",
      "-dBATCH",
      "-sDEVICE=bbox",
      ghostscriptBoxFlag(referenceBoxes),
      `-r${dpi.x}x${dpi.y}`,
      pdfPath,
    ];
    // The bbox device reports on stderr.
    const result = await runChecked(executable, args, signal);
    return parseGhostscriptBoundingBoxes(`${result.stderr}\n${result.stdout}`, logger);
  },
});

export type SourceSelection = {
  method: BoundingBoxMethod;
  pdfPath: string;
  tempDir: string;
  logger?: CropLogger;
  env?: NodeJS.ProcessEnv;
};

const requireExecutable = (found: string | null, label: string, method: string): string => {
  if (!found) {
    throw new CropConfigurationError(
      `The "${method}" bounding box method needs ${label}, which was not found`
    );
  }
  return found;
};

/** Picks the bounding box backend once; the engine only sees the capability. */
export const selectBoundingBoxSource = (selection: SourceSelection): BoundingBoxSource => {
  const { method, pdfPath, tempDir, env } = selection;
  const logger = selection.logger ?? createNullLogger();

  if (method === "ghostscript-bbox") {
    const gs = requireExecutable(findGhostscript(env), "Ghostscript", method);
    return createGhostscriptBoundingBoxQuery(gs, pdfPath, logger);
  }
  if (method === "ghostscript-raster") {
    const gs = requireExecutable(findGhostscript(env), "Ghostscript", method);
    return createGhostscriptRasterizer(gs, pdfPath, tempDir);
  }
  if (method === "pdftoppm") {
    const pdftoppm = requireExecutable(findPdftoppm(env), "pdftoppm", method);
    return createPdftoppmRasterizer(pdftoppm, pdfPath, tempDir);
  }

  const pdftoppm = findPdftoppm(env);
  if (pdftoppm) return createPdftoppmRasterizer(pdftoppm, pdfPath, tempDir);
  const gs = findGhostscript(env);
  if (gs) {
    logger.info("pdftoppm not found; rendering with Ghostscript", { executable: gs });
    return createGhostscriptRasterizer(gs, pdfPath, tempDir);
  }
  throw new CropConfigurationError(
    "No bounding box backend is available: install pdftoppm or Ghostscript"
  );
};
