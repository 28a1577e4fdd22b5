import fs from "node:fs/promises";
import type { BoundingBoxSource, CropRunReport } from "../contracts/contracts.js";
import { computeCropBoxes } from "./crop-engine.js";
import {
  resolveCropPolicy,
  resolveExtractionSettings,
  type CropConfig,
} from "./crop-config.js";
import {
  buildCroppedDocument,
  buildRenderCopy,
  loadPdfDocument,
  readPageGeometry,
  readPdfFile,
} from "./document-store.js";
import { errorMessage } from "./errors.js";
import { withTempDir, writeFileAtomic, writeJsonAtomic } from "./file-utils.js";
import { resolveFullPageBoxes } from "./full-page-box.js";
import { roundBox } from "./geometry.js";
import { createRunLogger, type CropLogger } from "./logger.js";
import { selectBoundingBoxSource, type SourceSelection } from "./renderers.js";
import { getRenderCopyPath, getRunReportPath } from "./run-paths.js";

export interface CropPdfParams {
  inputPath: string;
  outputPath: string;
  config: CropConfig;
  runDir: string;
  signal?: AbortSignal;
  /** Defaults to a run logger under `runDir`. */
  logger?: CropLogger;
  selectSource?: (selection: SourceSelection) => BoundingBoxSource;
  onProgress?: (processed: number, total: number) => void;
}

/**
 * Crops one PDF file: resolves the page geometry, finds tight boxes on a
 * render copy, writes the cropped document and a JSON report into `runDir`.
 */
export const cropPdf = async (params: CropPdfParams): Promise<CropRunReport> => {
  const { config, inputPath, outputPath, runDir } = params;
  const ownsLogger = params.logger === undefined;
  const logger = params.logger ?? createRunLogger(runDir, config.logging);
  const selectSource = params.selectSource ?? selectBoundingBoxSource;

  try {
    const bytes = await readPdfFile(inputPath);
    const geometry = readPageGeometry(await loadPdfDocument(bytes));
    const policy = resolveCropPolicy(config, geometry.length);
    const extraction = resolveExtractionSettings(config);
    logger.info("Crop run started", {
      inputPath,
      pages: geometry.length,
      pagesToCrop: policy.pagesToCrop.size,
    });

    const resolved = resolveFullPageBoxes(
      geometry,
      config.crop.full_page_box,
      policy.absolutePreCrop,
      logger
    );
    const fullPageBoxes = resolved.map((page) => page.fullPageBox);
    const rotationAngles = resolved.map((page) => page.rotationAngle);

    const { computed, sourceName } = await withTempDir("margin-crop-", async (tempDir) => {
      const renderCopyPath = getRenderCopyPath(tempDir);
      await fs.writeFile(renderCopyPath, await buildRenderCopy(bytes, fullPageBoxes));
      const source = selectSource({
        method: config.bounding_box.method,
        pdfPath: renderCopyPath,
        tempDir,
        logger,
        env: process.env,
      });
      const result = await computeCropBoxes({
        fullPageBoxes,
        rotationAngles,
        policy,
        source,
        extraction,
        logger,
        signal: params.signal,
        onProgress: params.onProgress,
      });
      return { computed: result, sourceName: source.name };
    });

    const output = await buildCroppedDocument(
      bytes,
      computed.cropBoxes,
      policy.pagesToCrop,
      config.crop.boxes_to_set
    );
    await writeFileAtomic(outputPath, output);

    const report: CropRunReport = {
      inputPath,
      outputPath,
      source: sourceName,
      pageCount: geometry.length,
      croppedPages: policy.pagesToCrop.size,
      pages: resolved.map((page) => ({
        page: page.index + 1,
        rotation: page.rotationAngle,
        cropped: policy.pagesToCrop.has(page.index),
        fullPageBox: roundBox(page.fullPageBox),
        tightBox: roundBox(computed.tightBoxes[page.index]),
        cropBox: roundBox(computed.cropBoxes[page.index]),
      })),
    };
    await writeJsonAtomic(getRunReportPath(runDir), report);
    logger.info("Crop run complete", { outputPath, croppedPages: report.croppedPages });
    return report;
  } catch (error) {
    logger.error("Crop run failed", { error: errorMessage(error) });
    throw error;
  } finally {
    if (ownsLogger) {
      await logger.finalize();
    }
  }
};
