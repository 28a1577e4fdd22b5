import type {
  Box,
  BoundingBoxSource,
  ExtractionSettings,
  RasterBoundingBoxSource,
  VectorBoundingBoxSource,
} from "../contracts/contracts.js";
import { BoundingBoxExtractionError, CropCancelledError, errorMessage } from "./errors.js";
import { translateBox, zeroOriginBox } from "./geometry.js";
import { createNullLogger, type CropLogger } from "./logger.js";
import {
  DEFAULT_THRESHOLD,
  filterRaster,
  findInkBounds,
  pixelBoundsToPageBox,
} from "./raster-threshold.js";

export interface ExtractionRequest {
  /** Full-page boxes after any pre-crop; the rendered pages have exactly this size. */
  fullPageBoxes: readonly Box[];
  pagesToCrop: ReadonlySet<number>;
  source: BoundingBoxSource;
  settings: ExtractionSettings;
  logger?: CropLogger;
  signal?: AbortSignal;
  /** Called after each rendered page; vector sources report once at the end. */
  onProgress?: (processed: number, total: number) => void;
}

type RetryOptions = {
  maxAttempts: number;
  delayMs: number;
  signal?: AbortSignal;
  onRetry?: (attempt: number, error: unknown) => void;
};

/** Adds the full-page box origin to a tight box measured from a zero origin. */
export const correctForOrigin = (tightBox: Box, fullPageBox: Box): Box =>
  translateBox(tightBox, fullPageBox[0], fullPageBox[1]);

export const correctBoxesForOrigin = (tightBoxes: readonly Box[], fullPageBoxes: readonly Box[]): Box[] =>
  tightBoxes.map((box, page) => correctForOrigin(box, fullPageBoxes[page]));

const throwIfAborted = (signal?: AbortSignal): void => {
  if (signal?.aborted) {
    throw new CropCancelledError();
  }
};

const delay = (ms: number, signal?: AbortSignal): Promise<void> =>
  new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CropCancelledError());
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new CropCancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });

export const withRetry = async <T>(
  task: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> => {
  const maxAttempts = Math.max(1, Math.floor(options.maxAttempts));
  for (let attempt = 1; ; attempt++) {
    throwIfAborted(options.signal);
    try {
      return await task(attempt);
    } catch (error) {
      throwIfAborted(options.signal);
      if (attempt >= maxAttempts) throw error;
      options.onRetry?.(attempt, error);
      await delay(options.delayMs, options.signal);
    }
  }
};

export const extractRasterPageBox = async (
  source: RasterBoundingBoxSource,
  pageIndex: number,
  fullPageBox: Box,
  settings: ExtractionSettings,
  logger: CropLogger,
  signal?: AbortSignal
): Promise<Box> => {
  const rendered = await source.renderPage(pageIndex, settings.dpi, signal);
  const image =
    settings.numBlurs > 0 || settings.numSmooths > 0
      ? await filterRaster(rendered, settings.numBlurs, settings.numSmooths)
      : rendered;
  const bounds = findInkBounds(image, settings.threshold);
  if (bounds.blank) {
    logger.page(pageIndex, "warn", "No ink found; treating the page as blank");
    logger.warn("Could not find a bounding box; assuming an empty page", { page: pageIndex + 1 });
  }
  return pixelBoundsToPageBox(bounds, image.width, image.height, fullPageBox);
};

const extractWithRaster = async (
  source: RasterBoundingBoxSource,
  request: ExtractionRequest,
  logger: CropLogger
): Promise<Box[]> => {
  const { fullPageBoxes, pagesToCrop, settings } = request;
  const results: Box[] = fullPageBoxes.map(zeroOriginBox);
  const queue = fullPageBoxes.map((_, page) => page).filter((page) => pagesToCrop.has(page));
  const total = queue.length;
  const workerCount = Math.max(1, Math.min(settings.concurrency, queue.length));

  // Aborted by the caller or by the first fatal page failure.
  const controller = new AbortController();
  const forwardAbort = (): void => controller.abort();
  request.signal?.addEventListener("abort", forwardAbort, { once: true });

  let processed = 0;
  const workers = Array.from({ length: workerCount }, async () => {
    while (queue.length > 0 && !controller.signal.aborted) {
      const page = queue.shift();
      if (page === undefined) continue;
      try {
        results[page] = await withRetry(
          () =>
            extractRasterPageBox(source, page, fullPageBoxes[page], settings, logger, controller.signal),
          {
            maxAttempts: settings.maxAttempts,
            delayMs: settings.retryDelayMs,
            signal: controller.signal,
            onRetry: (attempt, error) => {
              logger.page(page, "warn", "Page extraction failed; retrying", {
                attempt,
                error: errorMessage(error),
              });
            },
          }
        );
      } catch (error) {
        const cancelled = request.signal?.aborted ?? false;
        controller.abort();
        if (cancelled || error instanceof CropCancelledError) {
          throw new CropCancelledError();
        }
        throw new BoundingBoxExtractionError(
          `Failed to find the bounding box of page ${page + 1}: ${errorMessage(error)}`,
          { pageIndex: page, attempts: settings.maxAttempts, cause: error }
        );
      }
      processed += 1;
      logger.debug("page-bounding-box", { page: page + 1, processed, total, box: results[page] });
      request.onProgress?.(processed, total);
    }
  });

  try {
    await Promise.all(workers);
  } finally {
    request.signal?.removeEventListener("abort", forwardAbort);
  }
  throwIfAborted(request.signal);
  return results;
};

const hasRasterSettings = (settings: ExtractionSettings): boolean =>
  settings.threshold !== DEFAULT_THRESHOLD || settings.numBlurs > 0 || settings.numSmooths > 0;

const extractWithVector = async (
  source: VectorBoundingBoxSource,
  request: ExtractionRequest,
  logger: CropLogger
): Promise<Box[]> => {
  const { fullPageBoxes, pagesToCrop, settings } = request;
  if (hasRasterSettings(settings)) {
    logger.warn(
      "Threshold, blur and smooth settings do not apply to vector bounding boxes and are ignored.",
      { source: source.name }
    );
  }
  throwIfAborted(request.signal);
  let boxes: Box[];
  try {
    boxes = await source.queryBoundingBoxes(settings.dpi, settings.referenceBoxes, request.signal);
  } catch (error) {
    if (request.signal?.aborted) throw new CropCancelledError();
    throw new BoundingBoxExtractionError(
      `The ${source.name} bounding box query failed: ${errorMessage(error)}`,
      { cause: error }
    );
  }
  if (boxes.length !== fullPageBoxes.length) {
    throw new BoundingBoxExtractionError(
      `The ${source.name} bounding box query returned ${boxes.length} boxes for ${fullPageBoxes.length} pages`,
      {}
    );
  }
  request.onProgress?.(pagesToCrop.size, pagesToCrop.size);
  return boxes.map((box, page) => (pagesToCrop.has(page) ? box : zeroOriginBox(fullPageBoxes[page])));
};

/**
 * Tight boxes for every page in the image frame: zero origin, not yet
 * translated to the full-page boxes. Pages outside the crop set get their
 * full-page box without being rendered.
 */
export const extractTightBoxes = async (request: ExtractionRequest): Promise<Box[]> => {
  const logger = request.logger ?? createNullLogger();
  const { source } = request;
  throwIfAborted(request.signal);
  logger.info("Finding bounding boxes", {
    source: source.name,
    kind: source.kind,
    pages: request.pagesToCrop.size,
  });
  return source.kind === "vector"
    ? extractWithVector(source, request, logger)
    : extractWithRaster(source, request, logger);
};

export const findTightBoxes = async (request: ExtractionRequest): Promise<Box[]> =>
  correctBoxesForOrigin(await extractTightBoxes(request), request.fullPageBoxes);
